/**
 * Host endpoint on the shared medium
 */

import { isBroadcast } from './addressing.js';
import { createReceivedMessage, recoverPayload, type Frame, type ReceivedMessage } from './frame.js';

export interface HostStats {
  messagesSent: number;
  framesReceived: number;
  framesAccepted: number;
  framesIgnored: number;
}

/**
 * What a host needs from its router to send
 */
export interface HostTransport {
  send(src: number, dst: number, message: string): Promise<void>;
}

function emptyStats(): HostStats {
  return {
    messagesSent: 0,
    framesReceived: 0,
    framesAccepted: 0,
    framesIgnored: 0,
  };
}

export class Host {
  readonly address: number;
  private readonly transport: HostTransport;

  // Single slot: a new message overwrites the previous one
  lastReceived: ReceivedMessage | undefined;
  stats: HostStats;

  constructor(address: number, transport: HostTransport) {
    this.address = address;
    this.transport = transport;
    this.lastReceived = undefined;
    this.stats = emptyStats();
  }

  /**
   * Send a message through the router
   */
  async send(destination: number, message: string): Promise<void> {
    await this.transport.send(this.address, destination, message);
    this.stats.messagesSent++;
  }

  accepts(frame: Frame): boolean {
    return frame.dst === this.address || isBroadcast(frame.dst);
  }

  /**
   * Accept a frame addressed to this host or to broadcast. Returns undefined
   * for frames meant for someone else; a ParityError propagates.
   */
  receive(frame: Frame): ReceivedMessage | undefined {
    this.stats.framesReceived++;

    if (!this.accepts(frame)) {
      this.stats.framesIgnored++;
      return undefined;
    }

    const message = createReceivedMessage(frame.src, frame.dst, recoverPayload(frame));
    this.lastReceived = message;
    this.stats.framesAccepted++;
    return message;
  }

  reset(): void {
    this.lastReceived = undefined;
    this.stats = emptyStats();
  }
}
