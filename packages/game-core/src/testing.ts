// packages/game-core/src/testing.ts
//
// Made-up players for tests, shared with the server through
// `@player-daily/game-core/testing`.

import type { PlayerRecord } from './players.js';

export function makePlayer(overrides: Partial<PlayerRecord> = {}): PlayerRecord {
  return {
    id: 1,
    firstName: 'John',
    lastName: 'Smith',
    dateOfBirth: '1985-01-15',
    birthplace: 'Liverpool, England',
    position: 'defender',
    appearances: 156,
    goals: 4,
    spells: 2,
    previousTeam: null,
    nextTeam: null,
    seasons: '2004-2012',
    ...overrides,
  };
}

/** `count` eligible players with ids 1..count. */
export function makeSquad(count: number): PlayerRecord[] {
  return Array.from({ length: count }, (_, i) =>
    makePlayer({ id: i + 1, firstName: `First${i + 1}`, lastName: `Last${i + 1}` }),
  );
}
