import type { Bit, Bits } from '@/core/bit-codec';

const invert = (bit: Bit): Bit => (bit === 1 ? 0 : 1);

/**
 * Copy of `bits` with the given positions inverted
 */
export function flipBits(bits: Bits, ...positions: number[]): Bit[] {
  return bits.map((bit, i) => (positions.includes(i) ? invert(bit) : bit));
}
