// packages/game-core/src/clues.ts
//
// Clue building: five tiers of clues per player, hardest first.
//
//   tier 1 (5★)  birth date
//   tier 2 (4★)  birthplace
//   tier 3 (3★)  league appearances
//   tier 4 (2★)  position
//   tier 5 (1★)  two of the facts above combined into one sentence
//
// A tier whose primary fact is unavailable (unknown birth date, blank
// birthplace, ...) takes the first unused fact of the secondary pool instead.
// No fact is revealed twice in tiers 1–4. Tier 5 only recombines facts the
// player has already seen, chosen by a PRNG seeded with the player id.

import { formatLongDate } from './calendar.js';
import { InsufficientDataError } from './errors.js';
import type { PlayerRecord } from './players.js';
import { createRng, shuffle } from './random.js';

export type FactType =
  | 'birthdate'
  | 'birthplace'
  | 'appearances'
  | 'goals'
  | 'position'
  | 'previous-team'
  | 'next-team'
  | 'spells';

export type ClueFact = FactType | 'combination';

export type Tier = 1 | 2 | 3 | 4 | 5;

export interface ClueTier {
  tier: Tier;
  stars: number;
  fact: ClueFact;
  text: string;
  /** The facts a combination tier recombines; absent on single-fact tiers. */
  combines?: [FactType, FactType];
}

export const TIER_COUNT = 5;

const PRIMARY: Record<1 | 2 | 3 | 4, FactType> = {
  1: 'birthdate',
  2: 'birthplace',
  3: 'appearances',
  4: 'position',
};

const SECONDARY: readonly FactType[] = ['goals', 'spells', 'previous-team', 'next-team'];

const FACT_ORDER: readonly FactType[] = [
  'birthdate',
  'birthplace',
  'position',
  'appearances',
  'goals',
  'spells',
  'previous-team',
  'next-team',
];

export function starsForTier(tier: Tier): number {
  return TIER_COUNT + 1 - tier;
}

export type ClueOptions = {
  /** How the club is referred to in clue text. */
  clubName?: string;
};

const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`;
const article = (word: string) => (/^[aeiou]/i.test(word) ? 'an' : 'a');

/**
 * Verb phrase for a fact ("made 156 league appearances for the club"), or null
 * when the player record cannot support it.
 */
function phrase(fact: FactType, p: PlayerRecord, club: string): string | null {
  switch (fact) {
    case 'birthdate':
      return p.dateOfBirth ? `was born on ${formatLongDate(p.dateOfBirth)}` : null;
    case 'birthplace':
      return p.birthplace ? `was born in ${p.birthplace}` : null;
    case 'appearances':
      return `made ${plural(p.appearances, 'league appearance')} for ${club}`;
    case 'goals':
      return `scored ${plural(p.goals, 'league goal')} for ${club}`;
    case 'position':
      return p.position ? `is ${article(p.position)} ${p.position}` : null;
    case 'spells':
      return `had ${plural(p.spells, 'spell')} at ${club}`;
    case 'previous-team':
      return p.previousTeam ? `joined ${club} from ${p.previousTeam}` : null;
    case 'next-team':
      return p.nextTeam ? `left ${club} to join ${p.nextTeam}` : null;
  }
}

function combine(a: FactType, b: FactType, p: PlayerRecord, club: string): string {
  const [first, second] = [a, b].sort(
    (x, y) => FACT_ORDER.indexOf(x) - FACT_ORDER.indexOf(y),
  );
  const pa = phrase(first, p, club) ?? '';
  const pb = phrase(second, p, club) ?? '';

  if (first === 'birthdate' && second === 'birthplace' && p.dateOfBirth) {
    return `This player was born on ${formatLongDate(p.dateOfBirth)} in ${p.birthplace}.`;
  }
  if (first === 'position') return `This ${p.position} ${pb}.`;
  if (second === 'position') return `This ${p.position} ${pa}.`;
  return `This player ${pa} and ${pb}.`;
}

/**
 * Build the five clue tiers for a player, tier 1 first.
 *
 * @throws InsufficientDataError when a tier cannot be filled.
 */
export function buildClues(player: PlayerRecord, options: ClueOptions = {}): ClueTier[] {
  const club = options.clubName ?? 'the club';
  const used = new Set<FactType>();
  const tiers: ClueTier[] = [];

  for (const tier of [1, 2, 3, 4] as const) {
    const candidates = [PRIMARY[tier], ...SECONDARY];
    let chosen: { fact: FactType; text: string } | null = null;
    for (const fact of candidates) {
      if (used.has(fact)) continue;
      const text = phrase(fact, player, club);
      if (text) {
        chosen = { fact, text };
        break;
      }
    }
    if (!chosen) {
      throw new InsufficientDataError(`Not enough facts to build tier ${tier}`, {
        playerId: player.id,
        tier,
      });
    }
    used.add(chosen.fact);
    tiers.push({
      tier,
      stars: starsForTier(tier),
      fact: chosen.fact,
      text: `This player ${chosen.text}.`,
    });
  }

  // One shuffle, seeded by the player, decides which two revealed facts recombine.
  const revealed = tiers.map((t) => t.fact).filter((f): f is FactType => f !== 'combination');
  const [a, b] = shuffle(revealed, createRng(player.id));
  tiers.push({
    tier: 5,
    stars: starsForTier(5),
    fact: 'combination',
    text: combine(a, b, player, club),
    combines: [a, b],
  });

  return tiers;
}
