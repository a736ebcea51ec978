// packages/game-core/src/selector.ts
//
// Daily selection: which player is the answer on a given day.
//
// The pick is a pure function of (date, player table, recency log):
//   1. A day already in the log keeps its player; nothing is appended.
//   2. The pool is every player with at least one league appearance.
//   3. Players picked within the no-repeat window of the date are removed.
//   4. A PRNG seeded with seedForDate(date) indexes into what is left.
// The returned log carries the new record; the caller decides when to persist.

import { seedForDate, type DateKey } from './calendar.js';
import { DataUnavailableError, PoolExhaustedError } from './errors.js';
import type { PlayerRecord } from './players.js';
import { createRng, pickOne } from './random.js';
import type { RecencyLog } from './recency.js';

/**
 * What to do when the window has excluded every player:
 *   - "reset":  ignore the window and pick from the whole pool
 *   - "shrink": halve the window until someone is eligible, then reset
 *   - "fail":   throw PoolExhaustedError
 */
export type ExhaustionPolicy = 'reset' | 'shrink' | 'fail';

export const DEFAULT_NO_REPEAT_DAYS = 30;

export type SelectOptions = {
  windowDays?: number;
  exhaustion?: ExhaustionPolicy;
};

export type Selection = {
  playerId: number;
  recents: RecencyLog;
  /** false when the date was already resolved. */
  appended: boolean;
  /** Window actually applied; smaller than requested after a shrink, 0 after a reset. */
  windowDays: number;
};

/** Players that can ever be the daily answer, in table order. */
export function selectionPool(players: readonly PlayerRecord[]): number[] {
  return players.filter((p) => p.appearances > 0).map((p) => p.id);
}

function eligibleWithin(
  pool: readonly number[],
  date: DateKey,
  recents: RecencyLog,
  windowDays: number,
): number[] {
  if (windowDays <= 0) return [...pool];
  const used = recents.recentIds(date, windowDays);
  return pool.filter((id) => !used.has(id));
}

export function selectForDate(
  date: DateKey,
  players: readonly PlayerRecord[],
  recents: RecencyLog,
  options: SelectOptions = {},
): Selection {
  const requested = options.windowDays ?? DEFAULT_NO_REPEAT_DAYS;
  const policy = options.exhaustion ?? 'reset';

  if (players.length === 0) {
    throw new DataUnavailableError('Player table is empty');
  }

  const existing = recents.find(date);
  if (existing) {
    return { playerId: existing.playerId, recents, appended: false, windowDays: requested };
  }

  const pool = selectionPool(players);
  if (pool.length === 0) throw new PoolExhaustedError(date);

  let windowDays = requested;
  let eligible = eligibleWithin(pool, date, recents, windowDays);

  if (eligible.length === 0) {
    if (policy === 'fail') throw new PoolExhaustedError(date);
    if (policy === 'shrink') {
      while (eligible.length === 0 && windowDays > 1) {
        windowDays = Math.floor(windowDays / 2);
        eligible = eligibleWithin(pool, date, recents, windowDays);
      }
    }
    if (eligible.length === 0) {
      windowDays = 0;
      eligible = [...pool];
    }
  }

  const playerId = pickOne(eligible, createRng(seedForDate(date)));
  return {
    playerId,
    recents: recents.append({ date, playerId }),
    appended: true,
    windowDays,
  };
}
