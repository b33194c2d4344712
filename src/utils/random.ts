/**
 * Randomness sources for channel noise
 *
 * The seeded generator is an LCG (Numerical Recipes constants) with a
 * Box-Muller Gaussian, so a given seed replays the exact same noise.
 */

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
  nextGaussian(mean: number, stdDev: number): number;
}

export interface SeededRandom extends RandomSource {
  readonly seed: number;
  nextInt(min: number, max: number): number;
  fork(): SeededRandom;
  reset(): void;
}

const LCG_A = 1664525;
const LCG_C = 1013904223;
const LCG_M = 2 ** 32;

class SeededRandomImpl implements SeededRandom {
  readonly seed: number;
  private state: number;
  // Box-Muller yields two deviates per draw; the second is kept here
  private spare: number | undefined;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  next(): number {
    this.state = (LCG_A * this.state + LCG_C) % LCG_M;
    return this.state / LCG_M;
  }

  /**
   * Random integer in [min, max], inclusive
   */
  nextInt(min: number, max: number): number {
    if (min > max) {
      throw new RangeError('min must be <= max');
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  nextGaussian(mean: number, stdDev: number): number {
    if (this.spare !== undefined) {
      const z1 = this.spare;
      this.spare = undefined;
      return mean + z1 * stdDev;
    }

    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - this.next();
    const u2 = this.next();
    const radius = Math.sqrt(-2 * Math.log(u1));
    const angle = 2 * Math.PI * u2;

    this.spare = radius * Math.sin(angle);
    return mean + radius * Math.cos(angle) * stdDev;
  }

  /**
   * Independent generator with a seed derived from this one
   */
  fork(): SeededRandom {
    return new SeededRandomImpl(this.nextInt(0, 2 ** 31 - 1));
  }

  reset(): void {
    this.state = this.seed;
    this.spare = undefined;
  }
}

export function createSeededRandom(seed: number): SeededRandom {
  return new SeededRandomImpl(seed);
}
