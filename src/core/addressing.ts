/**
 * Host address space on the shared medium
 *
 * Addresses are single octets: 0-254 name hosts, 255 is broadcast.
 */

export const BROADCAST_ADDRESS = 255;
export const MIN_HOST_ADDRESS = 0;
export const MAX_HOST_ADDRESS = 254;

export function isHostAddress(address: number): boolean {
  return (
    Number.isInteger(address) &&
    address >= MIN_HOST_ADDRESS &&
    address <= MAX_HOST_ADDRESS
  );
}

export function isBroadcast(address: number): boolean {
  return address === BROADCAST_ADDRESS;
}

/**
 * Format an address as "0x0a", or "broadcast" for 255
 */
export function formatAddress(address: number): string {
  if (isBroadcast(address)) {
    return 'broadcast';
  }
  return `0x${address.toString(16).padStart(2, '0')}`;
}

/**
 * Parse "broadcast", a decimal octet or a 0x-prefixed hex octet
 */
export function parseAddress(str: string): number | null {
  const text = str.trim().toLowerCase();
  if (text === 'broadcast') {
    return BROADCAST_ADDRESS;
  }

  let value: number;
  if (/^0x[0-9a-f]{1,2}$/.test(text)) {
    value = parseInt(text.slice(2), 16);
  } else if (/^\d{1,3}$/.test(text)) {
    value = parseInt(text, 10);
  } else {
    return null;
  }

  return value <= BROADCAST_ADDRESS ? value : null;
}
