/**
 * Even-parity framing: one parity bit after every 8 data bits
 *
 * Detects any odd number of flips inside a 9-bit group. Two flips in the
 * same group cancel out and pass unnoticed; nothing is ever corrected.
 */

import type { Bit, Bits } from './bit-codec.js';
import { FormatError, ParityError } from './errors.js';

export const DATA_BITS_PER_GROUP = 8;
export const PARITY_GROUP_SIZE = DATA_BITS_PER_GROUP + 1;

/**
 * Even parity over bits[start, end)
 */
export function parityOf(bits: Bits, start: number = 0, end: number = bits.length): Bit {
  let sum = 0;
  for (let i = start; i < end; i++) {
    sum += bits[i];
  }
  return sum % 2 === 1 ? 1 : 0;
}

export function addParity(bits: Bits): Bit[] {
  if (bits.length % DATA_BITS_PER_GROUP !== 0) {
    throw new FormatError(
      `Parity calculation expects whole bytes, got ${bits.length} bits`,
      { length: bits.length }
    );
  }

  const framed: Bit[] = [];
  for (let i = 0; i < bits.length; i += DATA_BITS_PER_GROUP) {
    const end = i + DATA_BITS_PER_GROUP;
    for (let j = i; j < end; j++) {
      framed.push(bits[j]);
    }
    framed.push(parityOf(bits, i, end));
  }
  return framed;
}

function requireGroups(bits: Bits): void {
  if (bits.length % PARITY_GROUP_SIZE !== 0) {
    throw new FormatError(
      `Parity validation expects 9-bit groups, got ${bits.length} bits`,
      { length: bits.length }
    );
  }
}

/**
 * Validate and drop the parity bit of every group
 */
export function stripParity(bits: Bits): Bit[] {
  requireGroups(bits);

  const data: Bit[] = [];
  for (let i = 0; i < bits.length; i += PARITY_GROUP_SIZE) {
    const end = i + DATA_BITS_PER_GROUP;
    if (parityOf(bits, i, end) !== bits[end]) {
      throw new ParityError(i / PARITY_GROUP_SIZE);
    }
    for (let j = i; j < end; j++) {
      data.push(bits[j]);
    }
  }
  return data;
}

/**
 * Number of groups whose parity bit disagrees with their data
 */
export function countParityFailures(bits: Bits): number {
  requireGroups(bits);

  let failures = 0;
  for (let i = 0; i < bits.length; i += PARITY_GROUP_SIZE) {
    const end = i + DATA_BITS_PER_GROUP;
    if (parityOf(bits, i, end) !== bits[end]) {
      failures++;
    }
  }
  return failures;
}
