/**
 * Router on the shared medium
 *
 * Every send is an independent two-hop transaction:
 *   1. validate source, destination and its route (no channel use on failure)
 *   2. uplink: host -> router over the channel
 *   3. recover the payload and resolve the target host(s)
 *   4. downlink: router -> each target, rebuilt with the original source
 *   5. the host accepts the frame if it is addressed to it or to broadcast
 *
 * The channel lock is taken per hop, never for a whole send. Nothing is
 * retried; every failure rejects the send.
 */

import { BROADCAST_ADDRESS, isBroadcast } from './addressing.js';
import { AddressTable } from './address-table.js';
import type { Channel } from './channel.js';
import {
  CollisionError,
  FormatError,
  ParityError,
  type CollisionReason,
} from './errors.js';
import {
  buildFrame,
  framesEqual,
  recoverPayload,
  wireLength,
  type Frame,
  type ReceivedMessage,
} from './frame.js';
import { Host, type HostTransport } from './host.js';
import { PhysicalLink, type PhysicalLinkOptions } from './physical-link.js';
import { TypedEventEmitter } from '../utils/event-emitter.js';

export type HopDirection = 'uplink' | 'downlink' | 'composite';

export type RouterEvents = {
  'host:registered': { host: Host };
  'host:unregistered': { address: number };
  'frame:transmitted': { direction: HopDirection; sent: Frame; received: Frame };
  'frame:delivered': { host: Host; message: ReceivedMessage };
  'frame:dropped': { host: Host; frame: Frame; reason: string };
  'collision:detected': { frames: readonly Frame[]; error: CollisionError };
  'send:failed': { src: number; dst: number; error: Error };
};

export interface RouterStats {
  messagesSent: number; // sends that completed
  messagesFailed: number;
  framesDelivered: number;
  framesDropped: number;
  hops: number;
  bitsOnWire: number;
  parityErrors: number;
  collisions: number;
}

export type RouterOptions = PhysicalLinkOptions;

function emptyStats(): RouterStats {
  return {
    messagesSent: 0,
    messagesFailed: 0,
    framesDelivered: 0,
    framesDropped: 0,
    hops: 0,
    bitsOnWire: 0,
    parityErrors: 0,
    collisions: 0,
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class Router extends TypedEventEmitter<RouterEvents> implements HostTransport {
  readonly link: PhysicalLink;
  readonly addresses: AddressTable;
  private stats: RouterStats;

  constructor(channel: Channel, options: RouterOptions = {}) {
    super();
    this.link = new PhysicalLink(channel, options);
    this.addresses = new AddressTable();
    this.stats = emptyStats();
  }

  get channel(): Channel {
    return this.link.channel;
  }

  /**
   * Take a host's segment down or bring it back; routing follows at once
   */
  setSegmentState(address: number, up: boolean): void {
    this.addresses.setSegmentState(address, up);
  }

  registerHost(address: number): Host {
    const host = new Host(address, this);
    this.addresses.register(host);
    this.emit('host:registered', { host });
    return host;
  }

  unregisterHost(address: number): boolean {
    const removed = this.addresses.unregister(address);
    if (removed) {
      this.emit('host:unregistered', { address });
    }
    return removed;
  }

  getHost(address: number): Host | undefined {
    return this.addresses.get(address);
  }

  getHosts(): Host[] {
    return this.addresses.getHosts();
  }

  /**
   * Route a message from a registered host to a host or to broadcast
   */
  async send(src: number, dst: number, message: string): Promise<void> {
    try {
      await this.route(src, dst, message);
      this.stats.messagesSent++;
    } catch (error) {
      this.stats.messagesFailed++;
      if (error instanceof ParityError) {
        this.stats.parityErrors++;
      }
      this.emit('send:failed', { src, dst, error: toError(error) });
      throw error;
    }
  }

  /**
   * Transmit several frames on the medium at the same instant, bypassing the
   * per-hop serialization. With two or more differing frames the outcome is
   * a CollisionError; the medium does no arbitration and nothing is retried.
   */
  async sendSimultaneously(frames: readonly Frame[]): Promise<Frame> {
    if (frames.length === 0) {
      throw new FormatError('No frames to transmit');
    }
    for (const frame of frames) {
      this.addresses.requireKnown(frame.src);
    }
    if (frames.length === 1) {
      return this.hop('uplink', frames[0]);
    }

    let received: Frame;
    try {
      received = await this.link.transmitComposite(frames);
    } catch (error) {
      throw this.collision(frames, 'unparseable', error);
    }
    this.recordHop(
      'composite',
      frames[0],
      received,
      Math.max(...frames.map((frame) => wireLength(frame)))
    );

    try {
      recoverPayload(received);
    } catch (error) {
      if (error instanceof ParityError) {
        this.stats.parityErrors++;
      }
      throw this.collision(frames, 'corrupted-payload', error);
    }

    if (!frames.every((frame) => framesEqual(frame, received))) {
      throw this.collision(frames, 'mismatch');
    }
    return received;
  }

  getStats(): RouterStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private async route(src: number, dst: number, message: string): Promise<void> {
    this.addresses.requireKnown(src);
    if (!isBroadcast(dst)) {
      this.addresses.requireKnown(dst);
      // an unroutable destination fails before the channel is used
      this.addresses.resolveTargets(dst);
    }

    const ingress = await this.hop('uplink', buildFrame(src, dst, message));
    const payload = recoverPayload(ingress);
    const targets = this.addresses.resolveTargets(ingress.dst);

    for (const host of targets) {
      const outgoingDst = isBroadcast(dst) ? BROADCAST_ADDRESS : host.address;
      const delivered = await this.hop('downlink', buildFrame(ingress.src, outgoingDst, payload));

      const received = host.receive(delivered);
      if (received) {
        this.stats.framesDelivered++;
        this.emit('frame:delivered', { host, message: received });
      } else {
        this.stats.framesDropped++;
        this.emit('frame:dropped', {
          host,
          frame: delivered,
          reason: `addressed to ${delivered.dst}`,
        });
      }
    }
  }

  private async hop(direction: HopDirection, frame: Frame): Promise<Frame> {
    const received = await this.link.transmitFrame(frame);
    this.recordHop(direction, frame, received);
    return received;
  }

  private recordHop(
    direction: HopDirection,
    sent: Frame,
    received: Frame,
    bits: number = wireLength(sent)
  ): void {
    this.stats.hops++;
    this.stats.bitsOnWire += bits;
    this.emit('frame:transmitted', { direction, sent, received });
  }

  private collision(
    frames: readonly Frame[],
    reason: CollisionReason,
    cause?: unknown
  ): CollisionError {
    const error = new CollisionError(frames.length, reason, cause);
    this.stats.collisions++;
    this.emit('collision:detected', { frames, error });
    return error;
  }
}
