import { describe, expect, it } from 'vitest';
import {
  createSeededRandom,
  flipCoins,
  hashSeed,
  randomInt,
  rollChance,
  shuffleInPlace,
  shuffled
} from '../random';
import { fixedRandom } from './fixtures';

describe('createSeededRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const first = createSeededRandom('match-seed');
    const second = createSeededRandom('match-seed');
    const draws = Array.from({ length: 5 }, () => first.next());

    expect(Array.from({ length: 5 }, () => second.next())).toEqual(draws);
    expect(draws.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it('hashes string seeds and keeps numeric ones', () => {
    expect(createSeededRandom('match-seed').seed).toBe(hashSeed('match-seed'));
    expect(createSeededRandom(1234).seed).toBe(1234);
    expect(hashSeed('')).toBe(2166136261);
  });
});

describe('random helpers', () => {
  it('maps draws onto inclusive integer ranges', () => {
    expect(randomInt(fixedRandom(0.5), 1, 6)).toBe(4);
    expect(randomInt(fixedRandom(0), 1, 6)).toBe(1);
  });

  it('treats draws below one half as heads', () => {
    expect(flipCoins(fixedRandom(0.1), 3)).toEqual([true, true, true]);
    expect(flipCoins(fixedRandom(0.5), 2)).toEqual([false, false]);
  });

  it('rolls percentages with fixed ends', () => {
    expect(rollChance(fixedRandom(0.99), 100)).toBe(true);
    expect(rollChance(fixedRandom(0), 0)).toBe(false);
    expect(rollChance(fixedRandom(0.3), 50)).toBe(true);
    expect(rollChance(fixedRandom(0.6), 50)).toBe(false);
  });

  it('shuffles with Fisher-Yates', () => {
    expect(shuffleInPlace([1, 2, 3], fixedRandom(0.9))).toEqual([1, 2, 3]);
    expect(shuffleInPlace([1, 2, 3], fixedRandom(0))).toEqual([2, 3, 1]);
  });

  it('leaves the input alone when shuffling a copy', () => {
    const items = [1, 2, 3];
    expect(shuffled(items, fixedRandom(0))).toEqual([2, 3, 1]);
    expect(items).toEqual([1, 2, 3]);
  });
});
