// apps/server/src/__tests__/daily.test.ts
//
// DailyService: one resolution per day, persisted once, shared by
// concurrent first requests; rollover at London midnight; debug override.

import { NotFoundError, PoolExhaustedError } from '@player-daily/game-core';
import { makeDaily, squad } from './helpers';

describe('DailyService', () => {
  it('resolves the day once and reuses it', async () => {
    const { daily, store } = makeDaily();
    const first = await daily.current();
    const second = await daily.current();

    expect(second).toBe(first);
    expect(first.date).toBe('2024-05-01');
    expect(first.overridden).toBe(false);
    expect(first.clues).toHaveLength(5);
    expect(store.saves).toBe(1);
    expect((await store.load()).toJSON()).toEqual([
      { date: '2024-05-01', playerId: first.player.id },
    ]);
  });

  it('appends a single record when first requests race', async () => {
    const { daily, store } = makeDaily();
    const picks = await Promise.all([daily.current(), daily.current(), daily.current()]);

    expect(new Set(picks.map((p) => p.player.id)).size).toBe(1);
    expect(store.saves).toBe(1);
    expect((await store.load()).size).toBe(1);
  });

  it('keeps the recorded answer for a day that is already in the list', async () => {
    const { daily, store } = makeDaily([{ date: '2024-05-01', playerId: 2 }]);
    const pick = await daily.current();
    expect(pick.player.id).toBe(2);
    expect(store.saves).toBe(0);
  });

  it('picks again when the recorded player has left the table', async () => {
    const { daily, store } = makeDaily([{ date: '2024-05-01', playerId: 99 }]);
    const { daily: fresh } = makeDaily();

    const pick = await daily.current();
    expect(pick.player.id).toBe((await fresh.current()).player.id);
    expect(pick.overridden).toBe(false);
    expect(await daily.current()).toBe(pick);

    // The stored list is left as it was.
    expect(store.saves).toBe(0);
    expect((await store.load()).toJSON()).toEqual([{ date: '2024-05-01', playerId: 99 }]);
  });

  it("avoids yesterday's player inside the window", async () => {
    const { daily } = makeDaily([{ date: '2024-04-30', playerId: 1 }]);
    expect((await daily.current()).player.id).toBe(2);
  });

  it('rolls over at midnight in the configured zone', async () => {
    // 23:30 UTC on 30 April is already 1 May in London (BST).
    let now = new Date('2024-04-30T22:30:00Z');
    const { daily, store } = makeDaily([], { now: () => now });
    expect(daily.today()).toBe('2024-04-30');

    now = new Date('2024-04-30T23:30:00Z');
    expect(daily.today()).toBe('2024-05-01');
    await daily.current();
    expect((await store.load()).entries.map((r) => r.date)).toEqual(['2024-05-01']);
  });

  it('surfaces pool exhaustion under the fail policy', async () => {
    const { daily } = makeDaily(
      [
        { date: '2024-04-29', playerId: 1 },
        { date: '2024-04-30', playerId: 2 },
      ],
      { exhaustion: 'fail' },
    );
    await expect(daily.current()).rejects.toBeInstanceOf(PoolExhaustedError);

    // A failed resolution does not wedge the queue.
    await expect(daily.resetRecent()).resolves.toBeUndefined();
  });

  it('serves the override without touching the recency list', async () => {
    const { daily, store } = makeDaily();
    daily.setOverride(2);
    const pick = await daily.current();
    expect(pick).toMatchObject({ overridden: true, player: { id: 2 } });
    expect(store.saves).toBe(0);

    daily.clearOverride();
    expect((await daily.current()).overridden).toBe(false);
    expect(store.saves).toBe(1);
  });

  it('rejects an override for an unknown player', () => {
    const { daily } = makeDaily();
    expect(() => daily.setOverride(99)).toThrow(NotFoundError);
  });

  it('forgets the cached pick on reset', async () => {
    const { daily, store } = makeDaily();
    await daily.current();
    await daily.resetRecent();
    expect((await store.load()).size).toBe(0);

    await daily.current();
    expect(store.saves).toBe(2);
  });

  it('looks up players and exposes the table size', () => {
    const { daily } = makeDaily();
    expect(daily.playerCount).toBe(squad.length);
    expect(daily.player(2)?.lastName).toBe("O'Hare");
    expect(daily.player(42)).toBeUndefined();
  });

  it('lists recent picks newest first with names', async () => {
    const { daily } = makeDaily([
      { date: '2024-04-01', playerId: 1 },
      { date: '2024-04-20', playerId: 7 },
      { date: '2024-04-30', playerId: 2 },
      { date: '2024-05-02', playerId: 1 },
    ]);
    expect(await daily.recent()).toEqual([
      { date: '2024-04-30', playerId: 2, playerName: "Kevin O'Hare" },
      { date: '2024-04-20', playerId: 7, playerName: null },
      { date: '2024-04-01', playerId: 1, playerName: 'John Smith' },
    ]);
  });
});
