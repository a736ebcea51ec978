// packages/game-core/src/players.ts
//
// The player table: one row per former player of the club.
//
// Raw rows come from a JSON file maintained by hand. parsePlayerTable turns
// them into PlayerRecords, normalising the free-text sentinels the data uses
// ("Youth academy", "Still at club", "Retired") into nulls. A bad row is
// skipped and reported; only an unusable table as a whole is fatal.

import { z } from 'zod';
import { isDateKey, type DateKey } from './calendar.js';
import { DataUnavailableError } from './errors.js';

export interface PlayerRecord {
  id: number;
  firstName: string;
  lastName: string;
  /** null when the birth date is unknown. */
  dateOfBirth: DateKey | null;
  /** Town and country, e.g. "Liverpool, England". May be empty. */
  birthplace: string;
  /** Lower case: "defender", "midfielder", "forward", "goalkeeper", ... */
  position: string;
  appearances: number;
  goals: number;
  spells: number;
  /** null: came through the youth academy. */
  previousTeam: string | null;
  /** null: still at the club, or retired there. */
  nextTeam: string | null;
  /** Years at the club as written in the source, e.g. "2010-2015, 2018-". */
  seasons: string;
}

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v?.trim() ?? '');

export const playerRowSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  dateOfBirth: optionalText.refine((v) => v === '' || isDateKey(v), {
    message: 'Expected an ISO date (YYYY-MM-DD)',
  }),
  birthplace: optionalText,
  position: optionalText.transform((v) => v.toLowerCase()),
  appearances: z.number().int().min(0),
  goals: z.number().int().min(0),
  spells: z.number().int().min(1),
  previousTeam: optionalText,
  nextTeam: optionalText,
  seasons: optionalText,
});

export type PlayerRow = z.input<typeof playerRowSchema>;

/**
 * Split a full name at the first space.
 *
 *   splitName('Alexis Mac Allister') → ['Alexis', 'Mac Allister']
 *   splitName('Bernardo')            → ['Bernardo', '']
 */
export function splitName(name: string): [first: string, last: string] {
  const clean = name.trim().replace(/^"+|"+$/g, '').trim();
  const space = clean.indexOf(' ');
  if (space === -1) return [clean, ''];
  return [clean.slice(0, space), clean.slice(space + 1).trim()];
}

function previousTeamOf(raw: string): string | null {
  if (raw === '' || /^(youth )?academy$/i.test(raw)) return null;
  return raw;
}

function nextTeamOf(raw: string): string | null {
  if (raw === '' || /^still at club$/i.test(raw) || /retired/i.test(raw)) {
    return null;
  }
  return raw;
}

export type SkippedRow = { index: number; reason: string };

export type PlayerTable = {
  players: PlayerRecord[];
  skipped: SkippedRow[];
};

/**
 * Validate and normalise a raw table.
 *
 * @throws DataUnavailableError when `raw` is not an array or no row survives.
 */
export function parsePlayerTable(raw: unknown): PlayerTable {
  if (!Array.isArray(raw)) {
    throw new DataUnavailableError('Player table must be a JSON array');
  }

  const players: PlayerRecord[] = [];
  const skipped: SkippedRow[] = [];
  const seen = new Set<number>();

  raw.forEach((row: unknown, index) => {
    const parsed = playerRowSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      skipped.push({ index, reason: `${issue.path.join('.')}: ${issue.message}` });
      return;
    }
    const r = parsed.data;
    const [firstName, lastName] = splitName(r.name);
    if (!firstName || !lastName) {
      skipped.push({ index, reason: `name: expected first and last name, got "${r.name}"` });
      return;
    }
    if (seen.has(r.id)) {
      skipped.push({ index, reason: `id: duplicate id ${r.id}` });
      return;
    }
    seen.add(r.id);

    players.push({
      id: r.id,
      firstName,
      lastName,
      dateOfBirth: r.dateOfBirth === '' ? null : r.dateOfBirth,
      birthplace: r.birthplace,
      position: r.position,
      appearances: r.appearances,
      goals: r.goals,
      spells: r.spells,
      previousTeam: previousTeamOf(r.previousTeam),
      nextTeam: nextTeamOf(r.nextTeam),
      seasons: r.seasons,
    });
  });

  if (players.length === 0) {
    throw new DataUnavailableError('Player table has no usable rows', {
      skipped: skipped.length,
    });
  }
  return { players, skipped };
}

export function fullName(player: PlayerRecord): string {
  return `${player.firstName} ${player.lastName}`;
}
