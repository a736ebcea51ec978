// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • calendar.ts → date keys, timezone rollover, daily seed
//   • random.ts   → seedable PRNG and shuffle
//   • players.ts  → player table parsing (PlayerRecord)
//   • recency.ts  → append-only recency log (RecencyLog)
//   • selector.ts → daily pick with a no-repeat window (selectForDate)
//   • clues.ts    → five clue tiers per player (buildClues)
//   • guess.ts    → name guess checking (validateGuess)
//   • errors.ts   → GameError taxonomy
//
// Example usage:
//   import { selectForDate, buildClues, validateGuess } from '@player-daily/game-core';

export * from './calendar.js';
export * from './random.js';
export * from './errors.js';
export * from './players.js';
export * from './recency.js';
export * from './selector.js';
export * from './clues.js';
export * from './guess.js';
