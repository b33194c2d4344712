/**
 * One hop over the shared medium: modulate, take the channel, transmit,
 * release, demodulate
 */

import type { Bit, Bits } from './bit-codec.js';
import type { Channel } from './channel.js';
import { ChannelLock } from './channel-lock.js';
import { frameFromWire, frameToWire, type Frame } from './frame.js';
import { Modulator, superpose, type ModulationConfig, type Signal } from './modulation.js';
import type { SignalHistory } from './signal-history.js';

export interface PhysicalLinkOptions {
  modulation?: Partial<ModulationConfig>;
  lock?: ChannelLock;
  history?: SignalHistory;
  simulatePropagationDelay?: boolean; // wait out the delay after each hop
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class PhysicalLink {
  readonly channel: Channel;
  readonly modulator: Modulator;
  readonly lock: ChannelLock;
  readonly history: SignalHistory | undefined;
  private readonly simulatePropagationDelay: boolean;

  constructor(channel: Channel, options: PhysicalLinkOptions = {}) {
    this.channel = channel;
    this.modulator = new Modulator(options.modulation);
    this.lock = options.lock ?? new ChannelLock();
    this.history = options.history;
    this.simulatePropagationDelay = options.simulatePropagationDelay ?? false;
  }

  async transmitBits(bits: Bits): Promise<Bit[]> {
    const received = await this.occupy(this.modulator.modulate(bits));
    return this.modulator.demodulate(received);
  }

  async transmitFrame(frame: Frame): Promise<Frame> {
    return frameFromWire(await this.transmitBits(frameToWire(frame)));
  }

  /**
   * Put several frames on the medium at once. Their signals add up sample by
   * sample; whatever the receiver makes of the sum is parsed as one frame.
   * Parse failures propagate.
   */
  async transmitComposite(frames: readonly Frame[]): Promise<Frame> {
    const composite = superpose(
      frames.map((frame) => this.modulator.modulate(frameToWire(frame)))
    );
    const received = await this.occupy(composite);
    return frameFromWire(this.modulator.demodulate(received));
  }

  /**
   * Hold the channel only for the transmission itself
   */
  private async occupy(signal: Signal): Promise<Signal> {
    const received = await this.lock.runExclusive(() => this.channel.transmit(signal));

    this.history?.record(signal, received);
    if (this.simulatePropagationDelay) {
      await sleep(this.channel.getPropagationDelay() * 1000);
    }

    return received;
  }
}
