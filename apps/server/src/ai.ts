// apps/server/src/ai.ts
//
// Optional AI extras: a cryptic wordplay clue on the player's name, and a
// short biography shown after the game. Both sit outside the core clue/guess
// flow; callers turn any failure into a 503 and carry on.

import OpenAI from 'openai';
import { fullName, type PlayerRecord } from '@player-daily/game-core';

export interface ClueWriter {
  crypticClue(player: PlayerRecord): Promise<string>;
  playerBio(player: PlayerRecord): Promise<string>;
}

export type OpenAiClueWriterOptions = {
  apiKey: string;
  model: string;
  /** Upper bound for one request, connection included. */
  timeoutMs: number;
  clubName: string;
};

export class OpenAiClueWriter implements ClueWriter {
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAiClueWriterOptions) {
    this.client = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 0 });
  }

  crypticClue(player: PlayerRecord): Promise<string> {
    const name = fullName(player);
    return this.complete(
      'You set short, witty cryptic clues for a football guessing game.',
      [
        `Write one cryptic clue built on wordplay around the name "${name}".`,
        'Play on the sound, spelling or meaning of the first name, last name or both.',
        'Do not use biography: no position, nationality or former clubs.',
        'Never include the name itself. Answer with the clue only, in one line.',
      ].join('\n'),
    );
  }

  playerBio(player: PlayerRecord): Promise<string> {
    const facts = [
      `Name: ${fullName(player)}`,
      `Position: ${player.position || 'unknown'}`,
      `Seasons at ${this.opts.clubName}: ${player.seasons || 'unknown'}`,
      `League appearances: ${player.appearances}`,
      `League goals: ${player.goals}`,
      `Spells at the club: ${player.spells}`,
      `Joined from: ${player.previousTeam ?? 'the youth academy'}`,
      `Left for: ${player.nextTeam ?? 'n/a (still at the club or retired)'}`,
    ];
    return this.complete(
      'You are a knowledgeable, enthusiastic football commentator.',
      [
        `Write a 2-3 sentence biography of this former ${this.opts.clubName} player using only the data below.`,
        'Mention the seasons they played when known. Do not invent facts or nicknames,',
        'and do not overstate their importance.',
        '',
        ...facts,
      ].join('\n'),
    );
  }

  private async complete(system: string, prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.opts.model,
        max_tokens: 200,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
      },
      { timeout: this.opts.timeoutMs, signal: AbortSignal.timeout(this.opts.timeoutMs) },
    );
    const text = completion.choices[0]?.message.content?.trim();
    if (!text) throw new Error('Empty completion');
    return text;
  }
}
