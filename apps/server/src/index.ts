// apps/server/src/index.ts
//
// Server entry point.
//
// Responsibilities:
//   • Read configuration from the environment (.env supported).
//   • Load the player table; a missing or empty table stops the process.
//   • Wire the recency store, daily service and optional AI writer.
//   • Serve the HTTP API.
//
// ---------------------------------------------------------------------------

import 'dotenv/config';
import pino from 'pino';
import type { PlayerRecord } from '@player-daily/game-core';
import { createApp } from './app.js';
import { OpenAiClueWriter } from './ai.js';
import { loadConfig } from './config.js';
import { DailyService } from './daily.js';
import { loadPlayersFromFile } from './players.js';
import { FileRecencyStore } from './store.js';

const config = loadConfig();
const log = pino({ level: config.logLevel });

/* -------------------------------------------------------------------------- */
/*                               Player table                                 */
/* -------------------------------------------------------------------------- */
function loadPlayersOrExit(): PlayerRecord[] {
  try {
    return loadPlayersFromFile(config.playersFile, log, config.clubName);
  } catch (err) {
    log.fatal({ err }, 'cannot start without a player table');
    process.exit(1);
  }
}
const players = loadPlayersOrExit();

/* -------------------------------------------------------------------------- */
/*                                  Wiring                                    */
/* -------------------------------------------------------------------------- */
const daily = new DailyService({
  players,
  store: new FileRecencyStore(config.recentSelectionsFile, log),
  log,
  timeZone: config.timeZone,
  windowDays: config.noRepeatDays,
  exhaustion: config.exhaustionPolicy,
  clubName: config.clubName,
});

const writer = config.ai
  ? new OpenAiClueWriter({ ...config.ai, clubName: config.clubName })
  : undefined;
if (!writer) log.warn('OPENAI_API_KEY is not set, AI features are disabled');
if (config.debug) log.warn('debug routes are enabled');

const app = createApp({
  daily,
  log,
  debug: config.debug,
  adminKey: config.adminKey,
  writer,
  aiTimeoutMs: config.ai?.timeoutMs,
});

/* -------------------------------------------------------------------------- */
/*                                   Boot                                     */
/* -------------------------------------------------------------------------- */
app.listen(config.port, () =>
  log.info({ port: config.port, timeZone: config.timeZone, today: daily.today() }, 'server up'),
);
