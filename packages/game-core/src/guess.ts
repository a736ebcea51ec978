// packages/game-core/src/guess.ts
//
// Guess checking. A guess is right only when both names match exactly,
// ignoring case and surrounding whitespace. Hyphens and inner spaces must be
// typed as stored: knowing the spelling is part of the game.

import type { PlayerRecord } from './players.js';

/** Curly quotes typed by phone keyboards count as straight ones. */
export function normalizeName(s: string): string {
  return s
    .trim()
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"');
}

export function validateGuess(
  firstName: string,
  lastName: string,
  player: PlayerRecord,
): boolean {
  const first = normalizeName(firstName);
  const last = normalizeName(lastName);
  if (!first || !last) return false;
  return first === normalizeName(player.firstName) && last === normalizeName(player.lastName);
}
