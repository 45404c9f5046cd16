/**
 * Random Utilities
 *
 * Every random choice in the pipeline goes through an injected source so
 * tests can pin the outcome.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Index in [0, length) drawn from the source
 */
export function randomIndex(random: RandomSource, length: number): number {
  return Math.min(Math.floor(random() * length), length - 1);
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomIndex(random, items.length)];
}

/**
 * k distinct items in draw order (partial Fisher-Yates).
 */
export function sample<T>(random: RandomSource, items: readonly T[], k: number): T[] {
  const pool = [...items];
  const count = Math.min(Math.max(k, 0), pool.length);
  const out: T[] = [];
  for (let i = 0; i < count; i++) {
    const j = i + randomIndex(random, pool.length - i);
    [pool[i], pool[j]] = [pool[j], pool[i]];
    out.push(pool[i]);
  }
  return out;
}

/**
 * Deterministic source cycling through fixed values
 */
export function sequenceRandom(values: number[]): RandomSource {
  let i = 0;
  return () => {
    const value = values.length > 0 ? values[i % values.length] : 0;
    i++;
    return value;
  };
}
