// apps/server/src/__tests__/helpers.ts
//
// Shared setup for the server tests: made-up players, a daily service on a
// fixed clock, and an app served on an ephemeral local port.

import type { AddressInfo } from 'node:net';
import pino from 'pino';
import { RecencyLog, type PlayerRecord, type SelectionRecord } from '@player-daily/game-core';
import { makePlayer } from '@player-daily/game-core/testing';
import { createApp, type AppOptions } from '../app';
import { DailyService, type DailyOptions } from '../daily';
import { MemoryRecencyStore } from '../store';

export const silentLog = pino({ level: 'silent' });

/** Noon UTC on 1 May 2024, which is 13:00 in London. */
export const NOON = new Date('2024-05-01T12:00:00Z');

export const squad: PlayerRecord[] = [
  makePlayer(),
  makePlayer({
    id: 2,
    firstName: 'Kevin',
    lastName: "O'Hare",
    dateOfBirth: '1986-08-25',
    birthplace: 'Belfast, Northern Ireland',
    appearances: 211,
    goals: 12,
  }),
];

export function makeDaily(
  records: SelectionRecord[] = [],
  overrides: Partial<DailyOptions> = {},
): { daily: DailyService; store: MemoryRecencyStore } {
  const store = new MemoryRecencyStore(RecencyLog.from(records));
  const daily = new DailyService({
    players: squad,
    store,
    log: silentLog,
    timeZone: 'Europe/London',
    windowDays: 30,
    exhaustion: 'reset',
    clubName: 'the club',
    now: () => NOON,
    ...overrides,
  });
  return { daily, store };
}

export type Served = { url: string; close: () => Promise<void> };

export function serve(opts: Omit<AppOptions, 'log'>): Promise<Served> {
  const app = createApp({ ...opts, log: silentLog });
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      if (addr === null || typeof addr === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      const { port }: AddressInfo = addr;
      resolve({
        url: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done()))),
      });
    });
  });
}

export function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}
