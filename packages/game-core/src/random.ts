// packages/game-core/src/random.ts
//
// Seedable pseudo-random numbers.
//
// The game needs determinism, not statistical quality: the same seed must
// produce the same sequence on every machine and every release. mulberry32 is
// a 32-bit generator small enough to pin here permanently.

export type Rng = () => number;

/** mulberry32: returns floats in [0, 1) driven entirely by `seed`. */
export function createRng(seed: number): Rng {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Pick one element. Throws on an empty list. */
export function pickOne<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) throw new Error('Cannot pick from an empty list');
  return items[Math.floor(rng() * items.length)];
}

/** Fisher–Yates shuffle into a new array; `items` is left untouched. */
export function shuffle<T>(items: readonly T[], rng: Rng): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
