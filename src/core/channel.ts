/**
 * Shared analog medium: exponential attenuation plus additive Gaussian noise
 */

import { channelConfigSchema, parseConfig } from './config.js';
import type { Signal } from './modulation.js';
import { createSeededRandom, type RandomSource } from '../utils/random.js';

export interface ChannelConfig {
  length: number; // physical units (meters)
  attenuation: number; // coefficient per 100 length units
  noiseLevel: number; // standard deviation of the additive noise, >= 0
  signalVelocity: number; // length units per second, > 0
}

export interface SignalStats {
  inputMean: number;
  inputStd: number;
  inputMax: number;
  inputMin: number;
  outputMean: number;
  outputStd: number;
  outputMax: number;
  outputMin: number;
  snrDb: number; // Infinity when the output carries no noise
}

export const DEFAULT_CHANNEL_CONFIG: ChannelConfig = {
  length: 100,
  attenuation: 0.1,
  noiseLevel: 0.05,
  signalVelocity: 2e8, // roughly 2/3 of c, typical for copper and fiber
};

interface Moments {
  mean: number;
  std: number;
  max: number;
  min: number;
}

function moments(signal: Signal): Moments {
  let sum = 0;
  let max = -Infinity;
  let min = Infinity;
  for (const sample of signal) {
    sum += sample;
    if (sample > max) max = sample;
    if (sample < min) min = sample;
  }
  const mean = signal.length > 0 ? sum / signal.length : 0;

  let variance = 0;
  for (const sample of signal) {
    variance += (sample - mean) ** 2;
  }
  const std = signal.length > 0 ? Math.sqrt(variance / signal.length) : 0;

  return { mean, std, max, min };
}

export class Channel {
  readonly config: ChannelConfig;
  private readonly random: RandomSource;

  // Diagnostics for display collaborators; not part of the transport contract
  private lastInput: Signal | undefined;
  private lastOutput: Signal | undefined;

  constructor(config: Partial<ChannelConfig> = {}, random?: RandomSource) {
    this.config = parseConfig(
      channelConfigSchema,
      { ...DEFAULT_CHANNEL_CONFIG, ...config },
      'channel'
    );
    this.random = random ?? createSeededRandom(Date.now());
  }

  get lastInputSignal(): Signal | undefined {
    return this.lastInput;
  }

  get lastOutputSignal(): Signal | undefined {
    return this.lastOutput;
  }

  /**
   * A(d) = A0 * exp(-attenuation * length / 100)
   */
  getAttenuationFactor(): number {
    return Math.exp((-this.config.attenuation * this.config.length) / 100);
  }

  /**
   * Pass a signal through the medium. The input is never modified.
   */
  transmit(signal: Signal): Signal {
    const factor = this.getAttenuationFactor();
    const { noiseLevel } = this.config;
    const output = new Float64Array(signal.length);

    for (let i = 0; i < signal.length; i++) {
      output[i] = signal[i] * factor;
      if (noiseLevel > 0) {
        output[i] += this.random.nextGaussian(0, noiseLevel);
      }
    }

    this.lastInput = signal.slice();
    this.lastOutput = output.slice();

    return output;
  }

  /**
   * One-way propagation delay in seconds. Informational only; the channel
   * never waits on it.
   */
  getPropagationDelay(): number {
    return this.config.length / this.config.signalVelocity;
  }

  /**
   * Statistics of the most recent transmission
   */
  getSignalStats(): SignalStats | undefined {
    if (!this.lastInput || !this.lastOutput) {
      return undefined;
    }

    const input = moments(this.lastInput);
    const output = moments(this.lastOutput);

    return {
      inputMean: input.mean,
      inputStd: input.std,
      inputMax: input.max,
      inputMin: input.min,
      outputMean: output.mean,
      outputStd: output.std,
      outputMax: output.max,
      outputMin: output.min,
      snrDb: this.calculateSnr(this.lastInput, this.lastOutput),
    };
  }

  /**
   * SNR in dB, treating output minus attenuated input as noise
   */
  private calculateSnr(input: Signal, output: Signal): number {
    const factor = this.getAttenuationFactor();
    let signalPower = 0;
    let noisePower = 0;

    for (let i = 0; i < input.length; i++) {
      const expected = input[i] * factor;
      signalPower += expected * expected;
      noisePower += (output[i] - expected) ** 2;
    }

    if (noisePower === 0) {
      return Infinity;
    }
    return 10 * Math.log10(signalPower / noisePower);
  }

  clearDiagnostics(): void {
    this.lastInput = undefined;
    this.lastOutput = undefined;
  }

  toString(): string {
    const { length, attenuation, noiseLevel } = this.config;
    return `Channel(length=${length}, attenuation=${attenuation}, noiseLevel=${noiseLevel})`;
  }
}
