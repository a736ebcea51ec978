// apps/server/src/app.ts
//
// HTTP API for the daily player game.
//
// Routes:
//   GET  /api/daily-challenge      open a game on today's player, first clue
//   POST /api/clues                next clue tier, one at a time
//   POST /api/guess                check a first + last name guess
//   GET  /api/config               flags for the client
//   POST /api/cryptic-clue         optional AI wordplay clue
//   POST /api/player-bio           optional AI bio, once the game is over
//   /api/debug/*                   selection override and recency list (DEBUG only)
//
// Game sessions live in memory and only for the day they were opened on.

import cors from 'cors';
import express, { type RequestHandler } from 'express';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import {
  ConflictError,
  ErrorCodes,
  ForbiddenError,
  GameError,
  NotFoundError,
  starsForTier,
  TIER_COUNT,
  ValidationError,
  validateGuess,
  fullName,
  type ClueTier,
  type DateKey,
  type PlayerRecord,
  type Tier,
} from '@player-daily/game-core';
import {
  challengeRes,
  clueReq,
  clueRes,
  configRes,
  crypticClueRes,
  gameRef,
  guessReq,
  guessRes,
  playerBioRes,
  recentPlayersRes,
  setPlayerReq,
  type Clue,
  type GameState,
} from '@player-daily/protocol';
import type { ClueWriter } from './ai.js';
import type { DailyService } from './daily.js';
import { errorHandler, parseBody, requestId, route } from './http.js';

export type AppOptions = {
  daily: DailyService;
  log: Logger;
  debug: boolean;
  adminKey?: string;
  /** Absent when no AI provider is configured. */
  writer?: ClueWriter;
  /** Upper bound on one AI answer, whatever the writer does. Default 5000. */
  aiTimeoutMs?: number;
};

type GameSession = {
  id: string;
  date: DateKey;
  playerId: number;
  /** Highest tier shown so far. */
  revealed: Tier;
  state: GameState;
};

const toClue = (c: ClueTier): Clue => ({
  tier: c.tier,
  stars: c.stars,
  fact: c.fact,
  text: c.text,
});

export function createApp({
  daily,
  log,
  debug,
  adminKey,
  writer,
  aiTimeoutMs = 5000,
}: AppOptions) {
  const app = express();
  app.use(requestId());
  app.use(cors());
  app.use(express.json());

  const games = new Map<string, GameSession>();

  /** Drop sessions opened on an earlier day. */
  function pruneSessions(today: DateKey) {
    for (const [id, g] of games) if (g.date !== today) games.delete(id);
  }

  function session(gameId: string): { game: GameSession; player: PlayerRecord } {
    const game = games.get(gameId);
    if (!game || game.date !== daily.today()) throw new NotFoundError('Game', gameId);
    const player = daily.player(game.playerId);
    if (!player) throw new NotFoundError('Player', game.playerId);
    return { game, player };
  }

  /* ------------------------------------------------------------------------ */
  /*                                 Game                                     */
  /* ------------------------------------------------------------------------ */

  app.get(
    '/api/daily-challenge',
    route(async (_req, res) => {
      const pick = await daily.current();
      pruneSessions(pick.date);

      const id = nanoid();
      games.set(id, {
        id,
        date: pick.date,
        playerId: pick.player.id,
        revealed: 1,
        state: 'playing',
      });

      res.json(
        challengeRes.parse({
          gameId: id,
          playerId: pick.player.id,
          date: pick.date,
          firstNameLength: pick.player.firstName.length,
          lastNameLength: pick.player.lastName.length,
          totalTiers: TIER_COUNT,
          clue: toClue(pick.clues[0]),
        }),
      );
    }),
  );

  app.post('/api/clues', (req, res) => {
    const { gameId, revealed } = parseBody(clueReq, req.body);
    const { game, player } = session(gameId);

    // A finished game may browse the remaining tiers; its score is already fixed.
    if (game.state === 'playing' && revealed > game.revealed) {
      throw new ConflictError('Clues are revealed one at a time');
    }
    if (revealed >= TIER_COUNT) {
      res.json(clueRes.parse({ done: true }));
      return;
    }

    const next = daily.clues(player)[revealed];
    if (next.tier > game.revealed) game.revealed = next.tier;
    res.json(clueRes.parse({ done: false, clue: toClue(next) }));
  });

  app.post('/api/guess', (req, res) => {
    const { gameId } = parseBody(gameRef, req.body);
    const { game, player } = session(gameId);
    if (game.state !== 'playing') throw new ConflictError('Game finished');

    const parsed = guessReq.safeParse(req.body);
    if (!parsed.success) {
      const err = ValidationError.fromZod(parsed.error);
      log.debug({ gameId, details: err.details }, 'guess rejected');
      res.json(guessRes.parse({ correct: false, state: game.state, reason: 'invalid' }));
      return;
    }

    const { firstName, lastName } = parsed.data;
    if (validateGuess(firstName, lastName, player)) {
      game.state = 'won';
      const stars = starsForTier(game.revealed);
      log.info({ gameId, playerId: player.id, stars }, 'game won');
      res.json(
        guessRes.parse({ correct: true, state: game.state, stars, fullName: fullName(player) }),
      );
      return;
    }

    if (game.revealed === TIER_COUNT) {
      game.state = 'lost';
      log.info({ gameId, playerId: player.id }, 'game lost');
      res.json(guessRes.parse({ correct: false, state: game.state, fullName: fullName(player) }));
      return;
    }
    res.json(guessRes.parse({ correct: false, state: game.state }));
  });

  app.get('/api/config', (_req, res) => {
    res.json(
      configRes.parse({ debug, aiEnabled: writer !== undefined, playerCount: daily.playerCount }),
    );
  });

  /* ------------------------------------------------------------------------ */
  /*                          Optional AI extras                              */
  /* ------------------------------------------------------------------------ */

  async function writeWithAi(
    kind: string,
    task: (w: ClueWriter) => Promise<string>,
  ): Promise<string> {
    if (!writer) {
      throw new GameError(ErrorCodes.AI_DISABLED, 'AI features are not configured', 503);
    }
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${kind} timed out`)), aiTimeoutMs);
    });
    try {
      return await Promise.race([task(writer), expired]);
    } catch (err) {
      log.warn({ err, kind }, 'AI request failed');
      throw new GameError(ErrorCodes.AI_UNAVAILABLE, `Could not generate ${kind}`, 503);
    } finally {
      clearTimeout(timer);
    }
  }

  app.post(
    '/api/cryptic-clue',
    route(async (req, res) => {
      const { player } = session(parseBody(gameRef, req.body).gameId);
      const clue = await writeWithAi('cryptic clue', (w) => w.crypticClue(player));
      res.json(crypticClueRes.parse({ clue }));
    }),
  );

  app.post(
    '/api/player-bio',
    route(async (req, res) => {
      const { game, player } = session(parseBody(gameRef, req.body).gameId);
      if (game.state === 'playing') throw new ConflictError('Finish the game first');
      const bio = await writeWithAi('player bio', (w) => w.playerBio(player));
      res.json(playerBioRes.parse({ bio }));
    }),
  );

  /* ------------------------------------------------------------------------ */
  /*                        Debug (DEBUG=1 only)                              */
  /* ------------------------------------------------------------------------ */

  const debugOnly: RequestHandler = (_req, _res, next) => {
    next(debug ? undefined : new ForbiddenError());
  };

  const debugOrAdmin: RequestHandler = (req, _res, next) => {
    const key = req.query.key;
    const admin = adminKey !== undefined && typeof key === 'string' && key === adminKey;
    next(debug || admin ? undefined : new ForbiddenError());
  };

  app.post('/api/debug/set-player', debugOnly, (req, res) => {
    const { playerId } = parseBody(setPlayerReq, req.body);
    daily.setOverride(playerId);
    res.json({ success: true, playerId });
  });

  app.delete('/api/debug/set-player', debugOnly, (_req, res) => {
    daily.clearOverride();
    res.json({ success: true });
  });

  app.get(
    '/api/debug/recent-players',
    debugOrAdmin,
    route(async (_req, res) => {
      const recent = await daily.recent();
      res.json(
        recentPlayersRes.parse({
          recentPlayers: recent,
          totalPlayers: daily.playerCount,
          recentCount: recent.length,
          windowDays: daily.windowDays,
        }),
      );
    }),
  );

  app.post(
    '/api/debug/reset-recent',
    debugOnly,
    route(async (_req, res) => {
      await daily.resetRecent();
      res.json({ success: true, message: 'Recent players reset' });
    }),
  );

  app.use(errorHandler(log));
  return app;
}
