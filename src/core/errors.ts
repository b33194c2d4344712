/**
 * Error taxonomy for the communication stack
 *
 * Every failure raised by the stack is a StackError carrying a stable code,
 * so callers can branch on `error.code` or on the subclass.
 */

export const ErrorCodes = {
  /** Malformed bit lengths, truncated frames, out-of-range header fields */
  FORMAT: 'FORMAT_ERROR',
  /** A 9-bit parity group failed its even-parity check */
  PARITY: 'PARITY_ERROR',
  /** Payload byte count does not fit the 16-bit length field */
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  /** Source or destination address is not registered */
  UNKNOWN_HOST: 'UNKNOWN_HOST',
  /** Routing table points at a host that is not registered */
  ROUTING_INCONSISTENCY: 'ROUTING_INCONSISTENCY',
  /** Overlapping transmissions corrupted the shared medium */
  COLLISION: 'COLLISION',
  /** Address already in use, or retired earlier on this router */
  DUPLICATE_ADDRESS: 'DUPLICATE_ADDRESS',
  /** Address outside the host range 0-254 */
  ADDRESS_RANGE: 'ADDRESS_RANGE',
  /** Channel or modulation parameters rejected */
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface StackErrorOptions {
  details?: unknown;
  cause?: unknown;
}

export class StackError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;
  readonly timestamp: number;

  constructor(code: ErrorCode, message: string, options: StackErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StackError';
    this.code = code;
    this.details = options.details;
    this.timestamp = Date.now();
  }

  toJSON(): {
    name: string;
    code: ErrorCode;
    message: string;
    details: unknown;
    timestamp: number;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

export class FormatError extends StackError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.FORMAT, message, { details });
    this.name = 'FormatError';
  }
}

/**
 * Detected (never corrected) corruption of a parity group
 */
export class ParityError extends StackError {
  readonly group: number;

  constructor(group: number) {
    super(ErrorCodes.PARITY, `Parity check failed in group ${group}`, {
      details: { group },
    });
    this.name = 'ParityError';
    this.group = group;
  }
}

export class PayloadTooLargeError extends StackError {
  readonly byteLength: number;

  constructor(byteLength: number, limit: number) {
    super(
      ErrorCodes.PAYLOAD_TOO_LARGE,
      `Payload of ${byteLength} bytes exceeds the ${limit}-byte frame limit`,
      { details: { byteLength, limit } }
    );
    this.name = 'PayloadTooLargeError';
    this.byteLength = byteLength;
  }
}

export class UnknownHostError extends StackError {
  readonly address: number;

  constructor(address: number, message = `Unknown host ${address}`) {
    super(ErrorCodes.UNKNOWN_HOST, message, { details: { address } });
    this.name = 'UnknownHostError';
    this.address = address;
  }
}

export class RoutingInconsistencyError extends StackError {
  constructor(destination: number, nextHop: number) {
    super(
      ErrorCodes.ROUTING_INCONSISTENCY,
      `Route to ${destination} points to missing host ${nextHop}`,
      { details: { destination, nextHop } }
    );
    this.name = 'RoutingInconsistencyError';
  }
}

export type CollisionReason = 'unparseable' | 'corrupted-payload' | 'mismatch';

export class CollisionError extends StackError {
  readonly reason: CollisionReason;

  constructor(frameCount: number, reason: CollisionReason, cause?: unknown) {
    super(
      ErrorCodes.COLLISION,
      `Collision between ${frameCount} simultaneous transmissions (${reason})`,
      { details: { frameCount, reason }, cause }
    );
    this.name = 'CollisionError';
    this.reason = reason;
  }
}

export class DuplicateAddressError extends StackError {
  constructor(address: number, retired: boolean) {
    super(
      ErrorCodes.DUPLICATE_ADDRESS,
      retired
        ? `Host address ${address} was retired and cannot be reused`
        : `Host ${address} already registered`,
      { details: { address, retired } }
    );
    this.name = 'DuplicateAddressError';
  }
}

export class AddressRangeError extends StackError {
  constructor(address: number) {
    super(ErrorCodes.ADDRESS_RANGE, `Host address ${address} is outside 0-254`, {
      details: { address },
    });
    this.name = 'AddressRangeError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends StackError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[]) {
    super(ErrorCodes.INVALID_CONFIG, message, { details: issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Check if an error was raised by the stack
 */
export function isStackError(error: unknown): error is StackError {
  return error instanceof StackError;
}

/**
 * Check if an error carries a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isStackError(error) && error.code === code;
}
