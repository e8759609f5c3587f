/**
 * Request-scoped random source. With a seed the sequence is reproducible
 * (mulberry32); without one it is Math.random.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export function createRandomSource(seed?: number | null): RandomSource {
  if (seed === undefined || seed === null) return Math.random;
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform pick; null for an empty list. */
export function pickOne<T>(items: readonly T[], random: RandomSource): T | null {
  if (items.length === 0) return null;
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index] ?? null;
}
