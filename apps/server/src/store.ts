// apps/server/src/store.ts
//
// Persistence for the recency list.
//
// FileRecencyStore keeps the list as a flat JSON array. Saves write a
// temporary file next to the target and rename it into place, so a crash
// mid-write leaves the previous list intact. Serialising writers is the
// caller's job (see DailyService).

import fs from 'node:fs/promises';
import path from 'node:path';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { RecencyLog } from '@player-daily/game-core';

export interface RecencyStore {
  load(): Promise<RecencyLog>;
  save(log: RecencyLog): Promise<void>;
  clear(): Promise<void>;
}

const isMissing = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

export class FileRecencyStore implements RecencyStore {
  constructor(
    private readonly file: string,
    private readonly log: Logger,
  ) {}

  async load(): Promise<RecencyLog> {
    let text: string;
    try {
      text = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (isMissing(err)) return RecencyLog.empty();
      throw err;
    }
    try {
      return RecencyLog.from(JSON.parse(text));
    } catch (err) {
      // Treated like a missing file.
      this.log.warn({ err, file: this.file }, 'recency list unreadable, starting empty');
      return RecencyLog.empty();
    }
  }

  async save(log: RecencyLog): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.${nanoid(8)}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(log.toJSON(), null, 2) + '\n', 'utf8');
    try {
      await fs.rename(tmp, this.file);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  async clear(): Promise<void> {
    await fs.rm(this.file, { force: true });
  }
}

/** In-process store for tests and throwaway runs. */
export class MemoryRecencyStore implements RecencyStore {
  saves = 0;

  constructor(private current: RecencyLog = RecencyLog.empty()) {}

  async load(): Promise<RecencyLog> {
    return this.current;
  }

  async save(log: RecencyLog): Promise<void> {
    this.saves++;
    this.current = log;
  }

  async clear(): Promise<void> {
    this.current = RecencyLog.empty();
  }
}
