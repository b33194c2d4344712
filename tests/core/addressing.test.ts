import { describe, it, expect } from 'vitest';
import {
  BROADCAST_ADDRESS,
  formatAddress,
  isBroadcast,
  isHostAddress,
  parseAddress,
} from '@/core/addressing';

describe('addressing', () => {
  describe('isHostAddress', () => {
    it('should accept integers 0-254', () => {
      expect(isHostAddress(0)).toBe(true);
      expect(isHostAddress(254)).toBe(true);
    });

    it('should reject broadcast, out-of-range and fractional values', () => {
      expect(isHostAddress(BROADCAST_ADDRESS)).toBe(false);
      expect(isHostAddress(-1)).toBe(false);
      expect(isHostAddress(3.5)).toBe(false);
    });
  });

  describe('isBroadcast', () => {
    it('should match only 255', () => {
      expect(isBroadcast(255)).toBe(true);
      expect(isBroadcast(254)).toBe(false);
    });
  });

  describe('formatAddress', () => {
    it('should format as two hex digits', () => {
      expect(formatAddress(10)).toBe('0x0a');
      expect(formatAddress(0)).toBe('0x00');
      expect(formatAddress(200)).toBe('0xc8');
    });

    it('should name the broadcast address', () => {
      expect(formatAddress(255)).toBe('broadcast');
    });
  });

  describe('parseAddress', () => {
    it('should parse decimal and hex octets', () => {
      expect(parseAddress('42')).toBe(42);
      expect(parseAddress(' 42 ')).toBe(42);
      expect(parseAddress('0x0A')).toBe(10);
      expect(parseAddress('0xff')).toBe(255);
    });

    it('should parse "broadcast"', () => {
      expect(parseAddress('Broadcast')).toBe(BROADCAST_ADDRESS);
    });

    it('should return null for anything else', () => {
      expect(parseAddress('256')).toBeNull();
      expect(parseAddress('0x100')).toBeNull();
      expect(parseAddress('host')).toBeNull();
      expect(parseAddress('')).toBeNull();
      expect(parseAddress('-1')).toBeNull();
    });
  });
});
