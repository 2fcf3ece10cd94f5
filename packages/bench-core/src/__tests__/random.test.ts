import { describe, it, expect } from 'vitest';
import { SeededRandom } from '../random.js';

describe('SeededRandom', () => {
  it('yields the same sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const seqA = Array.from({ length: 8 }, () => a.nextUint32());
    const seqB = Array.from({ length: 8 }, () => b.nextUint32());
    expect(seqA).toEqual(seqB);
  });

  it('yields different sequences for different seeds', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(43);
    expect(a.nextUint32()).not.toBe(b.nextUint32());
  });

  it('keeps floats in [0, 1)', () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('draws integers within inclusive bounds, including wide ranges', () => {
    const rng = new SeededRandom(99);
    for (let i = 0; i < 500; i++) {
      const small = rng.int(3, 5);
      expect(small).toBeGreaterThanOrEqual(3);
      expect(small).toBeLessThanOrEqual(5);

      const wide = rng.int(1_000_000, 10 * 2 ** 33);
      expect(wide).toBeGreaterThanOrEqual(1_000_000);
      expect(wide).toBeLessThanOrEqual(10 * 2 ** 33);
      expect(Number.isInteger(wide)).toBe(true);
    }
  });

  it('returns the lower bound for an empty range', () => {
    expect(new SeededRandom(1).int(10, 10)).toBe(10);
    expect(new SeededRandom(1).int(10, 5)).toBe(10);
  });

  it('shuffles deterministically without losing elements', () => {
    const a = new SeededRandom(5).shuffle([1, 2, 3, 4, 5, 6, 7, 8]);
    const b = new SeededRandom(5).shuffle([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(a).toEqual(b);
    expect([...a].sort((x, y) => x - y)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('fills buffers of any length reproducibly', () => {
    const a = new SeededRandom(11).fill(new Uint8Array(13));
    const b = new SeededRandom(11).fill(new Uint8Array(13));
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(true);
    expect(new Set(a).size).toBeGreaterThan(1);
  });
});
