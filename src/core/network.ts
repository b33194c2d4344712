/**
 * Multi-host network over one shared channel
 *
 * Owns the seeded randomness, the channel, the waveform history and the
 * router, all built explicitly from a single config object.
 */

import { Channel, type ChannelConfig } from './channel.js';
import { buildFrame, type Frame } from './frame.js';
import type { Host } from './host.js';
import type { ModulationConfig } from './modulation.js';
import { Router, type RouterStats } from './router.js';
import { DEFAULT_HISTORY_SIZE, SignalHistory } from './signal-history.js';
import { createSeededRandom, type SeededRandom } from '../utils/random.js';

export interface NetworkConfig {
  seed: number; // for deterministic channel noise
  channel: Partial<ChannelConfig>;
  modulation: Partial<ModulationConfig>;
  historySize: number; // transmissions kept for waveform display, 0 disables
  simulatePropagationDelay: boolean;
}

// The default seed is taken per network, at construction
const DEFAULT_CONFIG: Omit<NetworkConfig, 'seed'> = {
  channel: {},
  modulation: {},
  historySize: DEFAULT_HISTORY_SIZE,
  simulatePropagationDelay: false,
};

export class Network {
  readonly config: NetworkConfig;
  readonly random: SeededRandom;
  readonly channel: Channel;
  readonly history: SignalHistory | undefined;
  readonly router: Router;
  private readonly noise: SeededRandom;

  constructor(config: Partial<NetworkConfig> = {}) {
    this.config = { seed: Date.now(), ...DEFAULT_CONFIG, ...config };
    this.random = createSeededRandom(this.config.seed);
    this.noise = this.random.fork();
    this.channel = new Channel(this.config.channel, this.noise);
    this.history =
      this.config.historySize > 0 ? new SignalHistory(this.config.historySize) : undefined;
    this.router = new Router(this.channel, {
      modulation: this.config.modulation,
      history: this.history,
      simulatePropagationDelay: this.config.simulatePropagationDelay,
    });
  }

  registerHost(address: number): Host {
    return this.router.registerHost(address);
  }

  getHost(address: number): Host | undefined {
    return this.router.getHost(address);
  }

  sendMessage(src: number, dst: number, message: string): Promise<void> {
    return this.router.send(src, dst, message);
  }

  /**
   * Frame a message without sending it, e.g. for sendSimultaneously
   */
  buildFrame(src: number, dst: number, message: string): Frame {
    return buildFrame(src, dst, message);
  }

  sendSimultaneously(frames: readonly Frame[]): Promise<Frame> {
    return this.router.sendSimultaneously(frames);
  }

  getStats(): RouterStats {
    return this.router.getStats();
  }

  /**
   * Clear host state, statistics and diagnostics and rewind the channel
   * noise, so the same sends replay the same noise. Registrations are kept.
   */
  reset(): void {
    for (const host of this.router.getHosts()) {
      host.reset();
    }
    this.router.resetStats();
    this.channel.clearDiagnostics();
    this.history?.clear();
    this.noise.reset();
  }
}
