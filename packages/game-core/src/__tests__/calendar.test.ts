// packages/game-core/src/__tests__/calendar.test.ts
//
// Date keys, timezone rollover and the daily seed formula.

import {
  addDays,
  createRng,
  dateKeyInZone,
  dayOfYear,
  daysBetween,
  formatLongDate,
  isDateKey,
  pickOne,
  seedForDate,
  shuffle,
} from '../index';

describe('calendar', () => {
  it('derives the seed as year * 1000 + day of year', () => {
    expect(seedForDate('1985-01-15')).toBe(1985015);
    expect(seedForDate('2024-12-31')).toBe(2024366);
  });

  it('counts leap days in the day of year', () => {
    expect(dayOfYear('2024-03-01')).toBe(61);
    expect(dayOfYear('2023-03-01')).toBe(60);
  });

  it('rolls over at midnight in the configured timezone', () => {
    const lateJune = new Date('2024-06-30T23:30:00Z');
    expect(dateKeyInZone(lateJune, 'Europe/London')).toBe('2024-07-01');
    expect(dateKeyInZone(lateJune, 'UTC')).toBe('2024-06-30');
    expect(dateKeyInZone(new Date('2024-07-01T02:00:00Z'), 'America/New_York')).toBe(
      '2024-06-30',
    );
  });

  it('measures and shifts whole days', () => {
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
    expect(daysBetween('2024-03-01', '2024-02-28')).toBe(-2);
    expect(addDays('2024-01-01', -1)).toBe('2023-12-31');
  });

  it('rejects impossible dates', () => {
    expect(isDateKey('2024-02-29')).toBe(true);
    expect(isDateKey('2023-02-29')).toBe(false);
    expect(isDateKey('2024-1-5')).toBe(false);
  });

  it('formats birth dates for clue text', () => {
    expect(formatLongDate('1985-01-15')).toBe('January 15, 1985');
    expect(formatLongDate('1999-12-03')).toBe('December 3, 1999');
  });
});

describe('random', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRng(2024001);
    const b = createRng(2024001);
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('shuffles into a new array holding the same items', () => {
    const items = [1, 2, 3, 4, 5, 6];
    const out = shuffle(items, createRng(7));
    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...out].sort((x, y) => x - y)).toEqual(items);
  });

  it('refuses to pick from nothing', () => {
    expect(() => pickOne([], createRng(1))).toThrow('empty list');
  });
});
