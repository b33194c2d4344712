/**
 * Conversion between text and byte-aligned bit sequences
 *
 * Bits are emitted most-significant first, bytes in order.
 */

import { FormatError } from './errors.js';

export type Bit = 0 | 1;
export type Bits = readonly Bit[];

const encoder = new TextEncoder();
// Keep a leading U+FEFF as text and substitute U+FFFD for invalid sequences
const decoder = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * Expand bytes into bits, MSB first
 */
export function bytesToBits(bytes: Uint8Array): Bit[] {
  const bits: Bit[] = new Array<Bit>(bytes.length * 8);
  let offset = 0;
  for (const byte of bytes) {
    for (let shift = 7; shift >= 0; shift--) {
      bits[offset++] = (byte >> shift) & 1 ? 1 : 0;
    }
  }
  return bits;
}

/**
 * Regroup bits into bytes, MSB first
 */
export function bitsToBytes(bits: Bits): Uint8Array {
  if (bits.length % 8 !== 0) {
    throw new FormatError(
      `Bit stream length must be a multiple of 8, got ${bits.length}`,
      { length: bits.length }
    );
  }

  const bytes = new Uint8Array(bits.length / 8);
  for (let i = 0; i < bytes.length; i++) {
    let value = 0;
    for (let j = 0; j < 8; j++) {
      value = (value << 1) | bits[i * 8 + j];
    }
    bytes[i] = value;
  }
  return bytes;
}

export function encodeText(text: string): Bit[] {
  return bytesToBits(encoder.encode(text));
}

/**
 * Decode bits as UTF-8. Malformed sequences decode to U+FFFD instead of failing.
 */
export function decodeText(bits: Bits): string {
  return decoder.decode(bitsToBytes(bits));
}

/**
 * Pack an unsigned integer into a fixed-width field, MSB first
 */
export function intToBits(value: number, width: number = 8): Bit[] {
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** width) {
    throw new FormatError(`Integer ${value} out of range for ${width}-bit field`, {
      value,
      width,
    });
  }

  const bits: Bit[] = [];
  for (let i = width - 1; i >= 0; i--) {
    bits.push(Math.floor(value / 2 ** i) % 2 === 1 ? 1 : 0);
  }
  return bits;
}

export function bitsToInt(bits: Bits): number {
  let value = 0;
  for (const bit of bits) {
    value = value * 2 + bit;
  }
  return value;
}
