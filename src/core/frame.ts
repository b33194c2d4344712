/**
 * Frame construction and wire serialization
 *
 * Wire layout (all fields MSB first):
 *   dst (8) | src (8) | length in bytes (16) | payload (length * 9 bits)
 *
 * The payload is parity framed, so `length` counts data bytes before the
 * parity expansion.
 */

import {
  bitsToInt,
  decodeText,
  encodeText,
  intToBits,
  type Bit,
  type Bits,
} from './bit-codec.js';
import { addParity, PARITY_GROUP_SIZE, stripParity } from './parity.js';
import { FormatError, PayloadTooLargeError } from './errors.js';

export interface Frame {
  readonly dst: number;
  readonly src: number;
  readonly payloadBits: Bits;
}

export interface ReceivedMessage {
  readonly src: number;
  readonly dst: number;
  readonly payload: string;
}

export const ADDRESS_BITS = 8;
export const LENGTH_BITS = 16;
export const HEADER_BITS = ADDRESS_BITS * 2 + LENGTH_BITS;
export const MAX_PAYLOAD_BYTES = 2 ** LENGTH_BITS - 1;

function requireAddressField(name: 'dst' | 'src', value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new FormatError(`Frame ${name} must be an integer in 0-255, got ${value}`, {
      field: name,
      value,
    });
  }
}

/**
 * Create an immutable frame, enforcing header ranges and 9-bit payload groups
 */
export function createFrame(fields: Frame): Frame {
  requireAddressField('dst', fields.dst);
  requireAddressField('src', fields.src);

  const { payloadBits } = fields;
  if (payloadBits.length % PARITY_GROUP_SIZE !== 0) {
    throw new FormatError(
      `Frame payload must be a multiple of 9 bits, got ${payloadBits.length}`,
      { length: payloadBits.length }
    );
  }

  const byteLength = payloadBits.length / PARITY_GROUP_SIZE;
  if (byteLength > MAX_PAYLOAD_BYTES) {
    throw new PayloadTooLargeError(byteLength, MAX_PAYLOAD_BYTES);
  }

  return Object.freeze({
    dst: fields.dst,
    src: fields.src,
    payloadBits: Object.freeze([...payloadBits]),
  });
}

/**
 * Encode a text message into a parity-protected frame
 */
export function buildFrame(src: number, dst: number, message: string): Frame {
  return createFrame({ src, dst, payloadBits: addParity(encodeText(message)) });
}

/**
 * Payload byte count as carried in the length field
 */
export function payloadByteLength(frame: Frame): number {
  return frame.payloadBits.length / PARITY_GROUP_SIZE;
}

export function wireLength(frame: Frame): number {
  return HEADER_BITS + frame.payloadBits.length;
}

export function frameToWire(frame: Frame): Bit[] {
  return [
    ...intToBits(frame.dst, ADDRESS_BITS),
    ...intToBits(frame.src, ADDRESS_BITS),
    ...intToBits(payloadByteLength(frame), LENGTH_BITS),
    ...frame.payloadBits,
  ];
}

/**
 * Parse a frame from received bits. Bits past the declared payload are
 * ignored; a payload shorter than declared is a FormatError.
 */
export function frameFromWire(bits: Bits): Frame {
  if (bits.length < HEADER_BITS) {
    throw new FormatError(`Frame too short: ${bits.length} bits, header needs ${HEADER_BITS}`, {
      length: bits.length,
    });
  }

  const dst = bitsToInt(bits.slice(0, ADDRESS_BITS));
  const src = bitsToInt(bits.slice(ADDRESS_BITS, ADDRESS_BITS * 2));
  const byteLength = bitsToInt(bits.slice(ADDRESS_BITS * 2, HEADER_BITS));

  const payloadEnd = HEADER_BITS + byteLength * PARITY_GROUP_SIZE;
  if (bits.length < payloadEnd) {
    throw new FormatError(
      `Frame truncated: header declares ${byteLength} bytes, ` +
        `only ${bits.length - HEADER_BITS} payload bits present`,
      { declaredBytes: byteLength, availableBits: bits.length - HEADER_BITS }
    );
  }

  return createFrame({ dst, src, payloadBits: bits.slice(HEADER_BITS, payloadEnd) });
}

/**
 * Verify parity and decode the payload text
 */
export function recoverPayload(frame: Frame): string {
  return decodeText(stripParity(frame.payloadBits));
}

export function framesEqual(a: Frame, b: Frame): boolean {
  if (a.dst !== b.dst || a.src !== b.src) {
    return false;
  }
  if (a.payloadBits.length !== b.payloadBits.length) {
    return false;
  }
  return a.payloadBits.every((bit, i) => bit === b.payloadBits[i]);
}

export function createReceivedMessage(src: number, dst: number, payload: string): ReceivedMessage {
  return Object.freeze({ src, dst, payload });
}
