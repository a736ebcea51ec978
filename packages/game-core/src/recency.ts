// packages/game-core/src/recency.ts
//
// The recency list: which player was the answer on which day.
//
// RecencyLog is an immutable, append-only value. The selector receives one and
// hands back a new one; persisting it is the caller's job. Its serialised form
// is a flat array of { date, playerId } in the order records were appended.

import { z } from 'zod';
import { daysBetween, isDateKey, type DateKey } from './calendar.js';

export interface SelectionRecord {
  date: DateKey;
  playerId: number;
}

export const selectionRecordSchema = z.object({
  date: z.string().refine(isDateKey, { message: 'Expected YYYY-MM-DD' }),
  playerId: z.number().int().positive(),
});

export const recencyListSchema = z.array(selectionRecordSchema);

export class RecencyLog {
  private constructor(private readonly records: readonly SelectionRecord[]) {}

  static empty(): RecencyLog {
    return new RecencyLog([]);
  }

  /**
   * Build a log from persisted data.
   * Later duplicates of a date are dropped so the log keeps one pick per day.
   */
  static from(data: unknown): RecencyLog {
    const parsed = recencyListSchema.parse(data);
    const byDate = new Set<string>();
    const records: SelectionRecord[] = [];
    for (const r of parsed) {
      if (byDate.has(r.date)) continue;
      byDate.add(r.date);
      records.push({ date: r.date, playerId: r.playerId });
    }
    return new RecencyLog(records);
  }

  get size(): number {
    return this.records.length;
  }

  get entries(): readonly SelectionRecord[] {
    return this.records;
  }

  find(date: DateKey): SelectionRecord | undefined {
    return this.records.find((r) => r.date === date);
  }

  /** Records dated 1..windowDays days away from `date`, in either direction. */
  within(date: DateKey, windowDays: number): SelectionRecord[] {
    return this.records.filter((r) => {
      const gap = Math.abs(daysBetween(r.date, date));
      return gap >= 1 && gap <= windowDays;
    });
  }

  recentIds(date: DateKey, windowDays: number): Set<number> {
    return new Set(this.within(date, windowDays).map((r) => r.playerId));
  }

  append(record: SelectionRecord): RecencyLog {
    if (this.find(record.date)) {
      throw new Error(`A selection for ${record.date} is already recorded`);
    }
    return new RecencyLog([...this.records, { ...record }]);
  }

  toJSON(): SelectionRecord[] {
    return this.records.map((r) => ({ ...r }));
  }
}
