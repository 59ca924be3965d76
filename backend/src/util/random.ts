/**
 * Seedable randomness for shuffling and picking the first leader.
 *
 * Everything random in a game flows from one `RandomSource`, so a seed
 * replays the exact same deal and leader.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Mulberry32 - small, fast, seedable 32-bit PRNG.
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return function () {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle. Returns a new array; the input is left untouched.
 */
export function fisherYates<T>(items: readonly T[], random: RandomSource): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Hashes a seed string into a non-negative 32-bit integer.
 */
export function stringToSeed(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = (hash << 5) - hash + str.charCodeAt(i);
    hash |= 0;
  }
  return Math.abs(hash);
}

/**
 * Trims and upper-cases a seed so "abc " and "ABC" replay the same game.
 * Returns null when nothing usable is left.
 */
export function normalizeSeed(raw: string | undefined | null): string | null {
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed.toUpperCase() : null;
}

export function createSeededRandom(seedKey: string): RandomSource {
  return createRandom(stringToSeed(seedKey));
}

/** Uniform pick between two options. */
export function coinFlip<T>(heads: T, tails: T, random: RandomSource): T {
  return random() < 0.5 ? heads : tails;
}
