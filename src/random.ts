/**
 * Deterministic randomness for matches.
 *
 * Every shuffle, coin flip and turn-order draw goes through a RandomSource so
 * a match can be replayed from its seed.
 */

export interface RandomSource {
  readonly seed: number;
  /** Uniform float in [0, 1). */
  next(): number;
}

export function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

export function createSeededRandom(seed: number | string): RandomSource {
  const normalizedSeed = typeof seed === 'string' ? hashSeed(seed) : seed >>> 0;
  let current = normalizedSeed;
  return {
    seed: normalizedSeed,
    next: () => {
      current = (current + 0x6d2b79f5) | 0;
      let t = Math.imul(current ^ (current >>> 15), 1 | current);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0;
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

export function flipCoin(random: RandomSource): boolean {
  return random.next() < 0.5;
}

export function flipCoins(random: RandomSource, flips: number): boolean[] {
  return Array.from({ length: Math.max(0, flips) }, () => flipCoin(random));
}

/** Percentage roll, 0-100. */
export function rollChance(random: RandomSource, probability: number): boolean {
  if (probability >= 100) {
    return true;
  }
  if (probability <= 0) {
    return false;
  }
  return random.next() * 100 < probability;
}

// Fisher-Yates
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1));
    const temp = items[i];
    items[i] = items[j];
    items[j] = temp;
  }
  return items;
}

export function shuffled<T>(items: readonly T[], random: RandomSource): T[] {
  return shuffleInPlace([...items], random);
}
