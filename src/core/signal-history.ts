/**
 * Bounded ring buffer of recent (input, output) channel signals
 *
 * Owned by whoever wants waveforms for display; recorded after the channel
 * lock is released, never inside the transmission critical section.
 */

import type { Signal } from './modulation.js';

export interface SignalRecord {
  input: Signal;
  output: Signal;
  recordedAt: number;
}

export const DEFAULT_HISTORY_SIZE = 10;

export class SignalHistory {
  readonly capacity: number;
  private readonly records: Array<SignalRecord | undefined>;
  private start = 0;
  private count = 0;

  constructor(capacity: number = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.records = new Array<SignalRecord | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Store copies of a transmission, evicting the oldest when full
   */
  record(input: Signal, output: Signal): void {
    const entry: SignalRecord = {
      input: input.slice(),
      output: output.slice(),
      recordedAt: Date.now(),
    };

    if (this.count < this.capacity) {
      this.records[(this.start + this.count) % this.capacity] = entry;
      this.count++;
    } else {
      this.records[this.start] = entry;
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /**
   * Entry by position, oldest first; negative indices count back from the
   * newest (-1 is the latest transmission)
   */
  get(index: number): SignalRecord | undefined {
    const position = index < 0 ? this.count + index : index;
    if (!Number.isInteger(position) || position < 0 || position >= this.count) {
      return undefined;
    }
    return this.records[(this.start + position) % this.capacity];
  }

  latest(): SignalRecord | undefined {
    return this.get(-1);
  }

  /**
   * All entries, oldest first
   */
  toArray(): SignalRecord[] {
    const entries: SignalRecord[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.get(i);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  clear(): void {
    this.records.fill(undefined);
    this.start = 0;
    this.count = 0;
  }
}
