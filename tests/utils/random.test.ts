import { describe, it, expect } from 'vitest';
import { createSeededRandom } from '@/utils/random';

describe('SeededRandom', () => {
  describe('determinism', () => {
    it('should replay the same sequence for the same seed', () => {
      const rng1 = createSeededRandom(2024);
      const rng2 = createSeededRandom(2024);

      const sequence1 = Array.from({ length: 10 }, () => rng1.nextGaussian(0, 1));
      const sequence2 = Array.from({ length: 10 }, () => rng2.nextGaussian(0, 1));

      expect(sequence1).toEqual(sequence2);
    });

    it('should differ between seeds', () => {
      const rng1 = createSeededRandom(1);
      const rng2 = createSeededRandom(2);

      const sequence1 = Array.from({ length: 10 }, () => rng1.next());
      const sequence2 = Array.from({ length: 10 }, () => rng2.next());

      expect(sequence1).not.toEqual(sequence2);
    });

    it('should rewind uniform and gaussian draws on reset', () => {
      const rng = createSeededRandom(99);

      // odd count leaves a cached Box-Muller deviate behind
      const first = Array.from({ length: 5 }, () => rng.nextGaussian(0, 1));
      rng.reset();
      const second = Array.from({ length: 5 }, () => rng.nextGaussian(0, 1));

      expect(second).toEqual(first);
    });

    it('should expose the seed as an unsigned 32-bit value', () => {
      expect(createSeededRandom(42).seed).toBe(42);
      expect(createSeededRandom(-1).seed).toBe(2 ** 32 - 1);
    });
  });

  describe('next', () => {
    it('should stay in [0, 1)', () => {
      const rng = createSeededRandom(12345);

      for (let i = 0; i < 1000; i++) {
        const value = rng.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('nextInt', () => {
    it('should return integers within the inclusive range', () => {
      const rng = createSeededRandom(12345);

      for (let i = 0; i < 100; i++) {
        const value = rng.nextInt(5, 15);
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(5);
        expect(value).toBeLessThanOrEqual(15);
      }
    });

    it('should reject min > max', () => {
      expect(() => createSeededRandom(1).nextInt(10, 5)).toThrow(RangeError);
    });
  });

  describe('nextGaussian', () => {
    it('should match the requested mean and standard deviation', () => {
      const rng = createSeededRandom(777);
      const values = Array.from({ length: 20000 }, () => rng.nextGaussian(3, 0.5));

      const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
      const variance =
        values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;

      expect(mean).toBeGreaterThan(2.98);
      expect(mean).toBeLessThan(3.02);
      expect(Math.sqrt(variance)).toBeGreaterThan(0.48);
      expect(Math.sqrt(variance)).toBeLessThan(0.52);
    });

    it('should always be finite', () => {
      const rng = createSeededRandom(0);

      for (let i = 0; i < 1000; i++) {
        expect(Number.isFinite(rng.nextGaussian(0, 1))).toBe(true);
      }
    });
  });

  describe('fork', () => {
    it('should derive an independent but reproducible generator', () => {
      const parentA = createSeededRandom(5);
      const parentB = createSeededRandom(5);

      const childA = parentA.fork();
      const childB = parentB.fork();

      expect(childA.seed).toBe(childB.seed);
      expect(childA.next()).toBe(childB.next());
      expect(childA.seed).not.toBe(parentA.seed);
    });
  });
});
