// apps/server/src/config.ts
//
// Environment configuration, parsed once at startup.
// `.env` is loaded by `dotenv/config` in index.ts before this runs.

import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const dataFile = (name: string) =>
  fileURLToPath(new URL(`../data/${name}`, import.meta.url));

const flag = z
  .string()
  .optional()
  .transform((v) => v === '1' || v?.toLowerCase() === 'true');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Player table (JSON array of rows) and the recency list written beside it.
  PLAYERS_FILE: z.string().min(1).default(dataFile('players.json')),
  RECENT_SELECTIONS_FILE: z.string().min(1).default(dataFile('recent-selections.json')),

  // Days before a player may be the answer again.
  NO_REPEAT_DAYS: z.coerce.number().int().min(1).max(366).default(30),
  EXHAUSTION_POLICY: z.enum(['reset', 'shrink', 'fail']).default('reset'),

  // Canonical timezone for the daily rollover.
  TIMEZONE: z
    .string()
    .default('Europe/London')
    .refine(
      (tz) => {
        try {
          new Intl.DateTimeFormat('en-GB', { timeZone: tz });
          return true;
        } catch {
          return false;
        }
      },
      { message: 'Unknown IANA timezone' },
    ),

  CLUB_NAME: z.string().min(1).default('the club'),

  // Debug surface (selection override, recency inspection/reset).
  DEBUG: flag,
  // Lets /api/debug/recent-players be read outside debug mode.
  ADMIN_KEY: z.string().min(1).optional(),

  // Optional AI clues; disabled without a key.
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  AI_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5000),
});

export type Config = {
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  playersFile: string;
  recentSelectionsFile: string;
  noRepeatDays: number;
  exhaustionPolicy: 'reset' | 'shrink' | 'fail';
  timeZone: string;
  clubName: string;
  debug: boolean;
  adminKey?: string;
  ai?: { apiKey: string; model: string; timeoutMs: number };
};

/** @throws ZodError listing every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const e = envSchema.parse(env);
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    playersFile: e.PLAYERS_FILE,
    recentSelectionsFile: e.RECENT_SELECTIONS_FILE,
    noRepeatDays: e.NO_REPEAT_DAYS,
    exhaustionPolicy: e.EXHAUSTION_POLICY,
    timeZone: e.TIMEZONE,
    clubName: e.CLUB_NAME,
    debug: e.DEBUG,
    adminKey: e.ADMIN_KEY,
    ai: e.OPENAI_API_KEY
      ? { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, timeoutMs: e.AI_TIMEOUT_MS }
      : undefined,
  };
}
