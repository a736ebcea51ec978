// apps/server/src/players.ts
//
// Loads the player table from disk at startup.
// A missing or unparsable file is fatal; individual bad rows, and players
// with too little data for five clues, are logged and skipped.

import fs from 'node:fs';
import type { Logger } from 'pino';
import {
  buildClues,
  DataUnavailableError,
  InsufficientDataError,
  parsePlayerTable,
  type PlayerRecord,
} from '@player-daily/game-core';

export function loadPlayersFromFile(
  path: string,
  log: Logger,
  clubName?: string,
): PlayerRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    throw new DataUnavailableError(`Cannot read player table at ${path}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const { players, skipped } = parsePlayerTable(raw);
  for (const s of skipped) {
    log.warn({ row: s.index, reason: s.reason }, 'skipping player row');
  }

  const playable = players.filter((p) => {
    try {
      buildClues(p, { clubName });
      return true;
    } catch (err) {
      if (!(err instanceof InsufficientDataError)) throw err;
      log.warn({ playerId: p.id, reason: err.message }, 'skipping player without enough clues');
      return false;
    }
  });
  if (playable.length === 0) {
    throw new DataUnavailableError('No player in the table has enough data for a game');
  }

  log.info(
    { path, players: playable.length, skipped: players.length - playable.length + skipped.length },
    'player table loaded',
  );
  return playable;
}
