// packages/protocol/src/index.ts
//
// Shared protocol definitions for the daily player game client and server.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Clue:  one revealed clue tier (text + star value).
//   - Request/response shapes for the daily challenge, clue reveal and guesses.
//   - Config, optional AI extras and the debug surface.
//
// These schemas are consumed on both ends (server validates inputs and its own
// outputs, client infers types and ensures consistent expectations).

import { z } from 'zod';

/**
 * Fact schema: which underlying data a clue reveals.
 * "combination" marks the tier-5 clue built from two earlier facts.
 */
export const factSchema = z.enum([
  'birthdate',
  'birthplace',
  'appearances',
  'goals',
  'position',
  'previous-team',
  'next-team',
  'spells',
  'combination',
]);
export type Fact = z.infer<typeof factSchema>;

/** One clue tier as sent to players. */
export const clueSchema = z.object({
  tier: z.number().int().min(1).max(5),
  stars: z.number().int().min(1).max(5),
  fact: factSchema,
  text: z.string().min(1),
});
export type Clue = z.infer<typeof clueSchema>;

/**
 * Game state:
 *  - "playing" → guesses still accepted
 *  - "won"     → the player was named
 *  - "lost"    → a wrong guess after the last clue
 */
export const gameStateSchema = z.enum(['playing', 'won', 'lost']);
export type GameState = z.infer<typeof gameStateSchema>;

/* -------------------------------------------------------------------------- */
/*                         GET /api/daily-challenge                           */
/* -------------------------------------------------------------------------- */

/**
 * Today's challenge. Opens a game session; `clue` is tier 1.
 * Name lengths count every character, apostrophes and hyphens included.
 */
export const challengeRes = z.object({
  gameId: z.string(),
  playerId: z.number().int(),
  date: z.string(),
  firstNameLength: z.number().int().min(1),
  lastNameLength: z.number().int().min(1),
  totalTiers: z.literal(5),
  clue: clueSchema,
});
export type ChallengeRes = z.infer<typeof challengeRes>;

/* -------------------------------------------------------------------------- */
/*                             POST /api/clues                                */
/* -------------------------------------------------------------------------- */

/**
 * Request the next clue.
 *  - revealed: how many tiers the client has already shown (1–5)
 */
export const clueReq = z.object({
  gameId: z.string().min(1),
  revealed: z.number().int().min(0).max(5),
});

/** Next tier, or `done: true` once all five are out. */
export const clueRes = z.discriminatedUnion('done', [
  z.object({ done: z.literal(false), clue: clueSchema }),
  z.object({ done: z.literal(true) }),
]);
export type ClueRes = z.infer<typeof clueRes>;

/* -------------------------------------------------------------------------- */
/*                             POST /api/guess                                */
/* -------------------------------------------------------------------------- */

/** A guess: both names, trimmed, non-empty. */
export const guessReq = z.object({
  gameId: z.string().min(1),
  firstName: z.string().trim().min(1).max(60),
  lastName: z.string().trim().min(1).max(60),
});

/**
 * Result of a guess.
 *  - stars:    on a win, the star value of the last tier revealed
 *  - fullName: given once the game is over
 *  - reason:   "invalid" when the input itself was rejected
 */
export const guessRes = z.object({
  correct: z.boolean(),
  state: gameStateSchema,
  stars: z.number().int().min(1).max(5).optional(),
  fullName: z.string().optional(),
  reason: z.literal('invalid').optional(),
});
export type GuessRes = z.infer<typeof guessRes>;

/* -------------------------------------------------------------------------- */
/*                               Extras                                       */
/* -------------------------------------------------------------------------- */

export const configRes = z.object({
  debug: z.boolean(),
  aiEnabled: z.boolean(),
  playerCount: z.number().int(),
});

/** Body of /api/cryptic-clue and /api/player-bio. */
export const gameRef = z.object({ gameId: z.string().min(1) });

export const crypticClueRes = z.object({ clue: z.string() });
export const playerBioRes = z.object({ bio: z.string() });

/* -------------------------------------------------------------------------- */
/*                          Debug (DEBUG=1 only)                              */
/* -------------------------------------------------------------------------- */

export const setPlayerReq = z.object({
  playerId: z.number().int().positive(),
});

export const recentPlayersRes = z.object({
  recentPlayers: z.array(
    z.object({
      date: z.string(),
      playerId: z.number().int(),
      playerName: z.string().nullable(),
    }),
  ),
  totalPlayers: z.number().int(),
  recentCount: z.number().int(),
  windowDays: z.number().int(),
});
export type RecentPlayersRes = z.infer<typeof recentPlayersRes>;

/** Error body for every non-2xx answer. */
export const errorRes = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    requestId: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
});
export type ErrorRes = z.infer<typeof errorRes>;
