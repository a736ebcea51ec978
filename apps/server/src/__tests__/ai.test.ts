// apps/server/src/__tests__/ai.test.ts
//
// OpenAiClueWriter with the openai client mocked out: prompt contents,
// the request timeout, completion trimming and the empty-answer failure.

import { makePlayer } from '@player-daily/game-core/testing';
import { OpenAiClueWriter } from '../ai';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
  },
}));

const answer = (content: string | null) => ({ choices: [{ message: { content } }] });

describe('OpenAiClueWriter', () => {
  const writer = new OpenAiClueWriter({
    apiKey: 'test-key',
    model: 'gpt-4o-mini',
    timeoutMs: 2000,
    clubName: 'Harbour City',
  });

  beforeEach(() => {
    create.mockReset();
  });

  it('asks for wordplay on the full name and trims the answer', async () => {
    create.mockResolvedValue(answer('  Metal worker, perhaps?  \n'));
    await expect(writer.crypticClue(makePlayer())).resolves.toBe('Metal worker, perhaps?');

    expect(create).toHaveBeenCalledTimes(1);
    const [body] = create.mock.calls[0];
    expect(body).toMatchObject({ model: 'gpt-4o-mini', max_tokens: 200 });
    expect(body.messages[1].content).toContain('around the name "John Smith"');
  });

  it('bounds every request by the configured timeout', async () => {
    create.mockResolvedValue(answer('A clue'));
    await writer.crypticClue(makePlayer());
    await writer.playerBio(makePlayer());

    for (const [, options] of create.mock.calls) {
      expect(options).toMatchObject({ timeout: 2000 });
      expect(options.signal).toBeInstanceOf(AbortSignal);
      expect(options.signal.aborted).toBe(false);
    }
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('builds the bio prompt from the stored facts only', async () => {
    create.mockResolvedValue(answer('John Smith was a steady defender.'));
    const player = makePlayer({ previousTeam: null, nextTeam: 'Millbrook Town' });
    await writer.playerBio(player);

    const prompt: string = create.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain('former Harbour City player');
    expect(prompt).toContain('Seasons at Harbour City: 2004-2012');
    expect(prompt).toContain('Joined from: the youth academy');
    expect(prompt).toContain('Left for: Millbrook Town');
  });

  it('fails on an empty completion', async () => {
    create.mockResolvedValue(answer(null));
    await expect(writer.crypticClue(makePlayer())).rejects.toThrow('Empty completion');

    create.mockResolvedValue({ choices: [] });
    await expect(writer.playerBio(makePlayer())).rejects.toThrow('Empty completion');
  });

  it('passes provider errors through', async () => {
    create.mockRejectedValue(new Error('429 rate limited'));
    await expect(writer.crypticClue(makePlayer())).rejects.toThrow('429 rate limited');
  });
});
