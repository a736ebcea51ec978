// apps/server/src/daily.ts
//
// Today's answer, resolved once per calendar day and shared by every request.
//
// The first request of a day loads the recency list, runs the selector and
// persists the new record. That sequence runs behind a single-writer queue:
// two near-simultaneous first requests resolve the day once and append one
// record. Later requests that day are answered from memory.

import type { Logger } from 'pino';
import {
  buildClues,
  dateKeyInZone,
  daysBetween,
  fullName,
  NotFoundError,
  DataUnavailableError,
  RecencyLog,
  selectForDate,
  type ClueTier,
  type DateKey,
  type ExhaustionPolicy,
  type PlayerRecord,
} from '@player-daily/game-core';
import type { RecencyStore } from './store.js';

export type DailyOptions = {
  players: readonly PlayerRecord[];
  store: RecencyStore;
  log: Logger;
  timeZone: string;
  windowDays: number;
  exhaustion: ExhaustionPolicy;
  clubName: string;
  now?: () => Date;
};

export type DailyPick = {
  date: DateKey;
  player: PlayerRecord;
  clues: ClueTier[];
  /** Set by the debug override; never persisted. */
  overridden: boolean;
};

export type RecentSelection = {
  date: DateKey;
  playerId: number;
  playerName: string | null;
};

export class DailyService {
  private readonly byId: Map<number, PlayerRecord>;
  private readonly now: () => Date;
  private cached: DailyPick | null = null;
  private override: number | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly opts: DailyOptions) {
    this.byId = new Map(opts.players.map((p) => [p.id, p]));
    this.now = opts.now ?? (() => new Date());
  }

  get playerCount(): number {
    return this.opts.players.length;
  }

  get windowDays(): number {
    return this.opts.windowDays;
  }

  today(): DateKey {
    return dateKeyInZone(this.now(), this.opts.timeZone);
  }

  player(id: number): PlayerRecord | undefined {
    return this.byId.get(id);
  }

  clues(player: PlayerRecord): ClueTier[] {
    return buildClues(player, { clubName: this.opts.clubName });
  }

  async current(): Promise<DailyPick> {
    const date = this.today();

    if (this.override !== null) {
      const player = this.byId.get(this.override);
      if (player) return { date, player, clues: this.clues(player), overridden: true };
    }

    const hit = this.cached;
    if (hit && hit.date === date) return hit;

    return this.exclusive(async () => {
      const again = this.cached;
      if (again && again.date === date) return again;

      const options = { windowDays: this.opts.windowDays, exhaustion: this.opts.exhaustion };
      const recents = await this.opts.store.load();
      let selection = selectForDate(date, this.opts.players, recents, options);
      if (selection.appended) await this.opts.store.save(selection.recents);

      let player = this.byId.get(selection.playerId);
      if (!player) {
        // The table changed since the day was recorded. Pick again without that
        // record; the stored list keeps its one entry for the date.
        this.opts.log.warn(
          { date, playerId: selection.playerId },
          'recorded daily player is not in the table, picking again',
        );
        const rest = RecencyLog.from(recents.entries.filter((r) => r.date !== date));
        selection = selectForDate(date, this.opts.players, rest, options);
        player = this.byId.get(selection.playerId);
      }
      if (!player) {
        throw new DataUnavailableError(`No player in the table for ${date}`);
      }
      this.opts.log.info(
        {
          date,
          playerId: player.id,
          fresh: selection.appended,
          windowDays: selection.windowDays,
        },
        'daily player resolved',
      );
      this.cached = { date, player, clues: this.clues(player), overridden: false };
      return this.cached;
    });
  }

  /** Debug only: make `playerId` today's answer without touching the recency list. */
  setOverride(playerId: number): PlayerRecord {
    const player = this.byId.get(playerId);
    if (!player) throw new NotFoundError('Player', playerId);
    this.override = playerId;
    this.opts.log.warn({ playerId }, 'daily player overridden');
    return player;
  }

  clearOverride(): void {
    this.override = null;
  }

  /** Selections from today back through the no-repeat window, newest first. */
  async recent(): Promise<RecentSelection[]> {
    const today = this.today();
    const recents = await this.opts.store.load();
    return recents.entries
      .filter((r) => {
        const age = daysBetween(r.date, today);
        return age >= 0 && age <= this.opts.windowDays;
      })
      .map((r) => {
        const p = this.byId.get(r.playerId);
        return { date: r.date, playerId: r.playerId, playerName: p ? fullName(p) : null };
      })
      .sort((a, b) => b.date.localeCompare(a.date));
  }

  /** Debug only: forget every recorded selection, today's included. */
  async resetRecent(): Promise<void> {
    await this.exclusive(async () => {
      await this.opts.store.clear();
      this.cached = null;
    });
    this.opts.log.warn('recency list cleared');
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Keep the queue usable after a failure; the caller still gets `run`'s rejection.
    this.queue = run.catch(() => undefined);
    return run;
  }
}
