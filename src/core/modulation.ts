/**
 * Amplitude-shift keying between bit sequences and analog sample sequences
 *
 * Each bit occupies one full sine cycle of `samplesPerBit` samples, scaled by
 * the high amplitude for 1 and the low amplitude for 0. The receiver compares
 * the mean absolute sample value of each window against a threshold.
 */

import type { Bit, Bits } from './bit-codec.js';
import { modulationConfigSchema, parseConfig } from './config.js';

export type Signal = Float64Array;

export interface ModulationConfig {
  samplesPerBit: number;
  highAmplitude: number;
  lowAmplitude: number;
  threshold: number; // mean |sample| above which a window reads as 1
}

// Fixed protocol parameters; peers must agree on all four
export const DEFAULT_MODULATION_CONFIG: ModulationConfig = {
  samplesPerBit: 20,
  highAmplitude: 1.0,
  lowAmplitude: 0.1,
  threshold: 0.3,
};

export class Modulator {
  readonly config: ModulationConfig;
  private readonly carrier: Float64Array;

  constructor(config: Partial<ModulationConfig> = {}) {
    this.config = parseConfig(
      modulationConfigSchema,
      { ...DEFAULT_MODULATION_CONFIG, ...config },
      'modulation'
    );

    const { samplesPerBit } = this.config;
    this.carrier = new Float64Array(samplesPerBit);
    for (let j = 0; j < samplesPerBit; j++) {
      this.carrier[j] = Math.sin((2 * Math.PI * j) / samplesPerBit);
    }
  }

  modulate(bits: Bits): Signal {
    const { samplesPerBit, highAmplitude, lowAmplitude } = this.config;
    const signal = new Float64Array(bits.length * samplesPerBit);

    bits.forEach((bit, i) => {
      const amplitude = bit === 1 ? highAmplitude : lowAmplitude;
      const start = i * samplesPerBit;
      for (let j = 0; j < samplesPerBit; j++) {
        signal[start + j] = amplitude * this.carrier[j];
      }
    });

    return signal;
  }

  /**
   * Recover one bit per full window; a trailing partial window is dropped
   */
  demodulate(signal: Signal): Bit[] {
    const { samplesPerBit, threshold } = this.config;
    const bitCount = Math.floor(signal.length / samplesPerBit);
    const bits: Bit[] = new Array<Bit>(bitCount);

    for (let i = 0; i < bitCount; i++) {
      const start = i * samplesPerBit;
      let sum = 0;
      for (let j = start; j < start + samplesPerBit; j++) {
        sum += Math.abs(signal[j]);
      }
      bits[i] = sum / samplesPerBit > threshold ? 1 : 0;
    }

    return bits;
  }

  /**
   * Number of samples needed to carry `bitCount` bits
   */
  signalLength(bitCount: number): number {
    return bitCount * this.config.samplesPerBit;
  }
}

/**
 * Sample-wise sum of signals sharing the medium; shorter signals are padded
 * with silence
 */
export function superpose(signals: readonly Signal[]): Signal {
  const length = signals.reduce((max, signal) => Math.max(max, signal.length), 0);
  const composite = new Float64Array(length);

  for (const signal of signals) {
    for (let i = 0; i < signal.length; i++) {
      composite[i] += signal[i];
    }
  }

  return composite;
}
