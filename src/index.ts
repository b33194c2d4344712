/**
 * Sharedwire - layered data communication over a simulated shared medium
 * Main entry point
 */

// Bit level
export {
  bytesToBits,
  bitsToBytes,
  encodeText,
  decodeText,
  intToBits,
  bitsToInt,
} from './core/bit-codec.js';
export type { Bit, Bits } from './core/bit-codec.js';

export {
  addParity,
  stripParity,
  countParityFailures,
  parityOf,
  DATA_BITS_PER_GROUP,
  PARITY_GROUP_SIZE,
} from './core/parity.js';

// Physical layer
export { Modulator, superpose, DEFAULT_MODULATION_CONFIG } from './core/modulation.js';
export type { ModulationConfig, Signal } from './core/modulation.js';

export { Channel, DEFAULT_CHANNEL_CONFIG } from './core/channel.js';
export type { ChannelConfig, SignalStats } from './core/channel.js';

export { SignalHistory, DEFAULT_HISTORY_SIZE } from './core/signal-history.js';
export type { SignalRecord } from './core/signal-history.js';

export { ChannelLock } from './core/channel-lock.js';
export type { Release } from './core/channel-lock.js';

export { PhysicalLink } from './core/physical-link.js';
export type { PhysicalLinkOptions } from './core/physical-link.js';

// Frames
export {
  createFrame,
  buildFrame,
  frameToWire,
  frameFromWire,
  recoverPayload,
  payloadByteLength,
  wireLength,
  framesEqual,
  createReceivedMessage,
  HEADER_BITS,
  MAX_PAYLOAD_BYTES,
} from './core/frame.js';
export type { Frame, ReceivedMessage } from './core/frame.js';

// Addressing and routing
export {
  BROADCAST_ADDRESS,
  MIN_HOST_ADDRESS,
  MAX_HOST_ADDRESS,
  isHostAddress,
  isBroadcast,
  formatAddress,
  parseAddress,
} from './core/addressing.js';

export { AddressTable } from './core/address-table.js';
export { RoutingTable } from './core/routing/routing-table.js';
export type { RouteEntry, RouteOrigin } from './core/routing/types.js';

export { LinkGraph, ROUTER_NODE_ID, hostNodeId } from './graph/link-graph.js';
export type { TopologyNode, SegmentData } from './graph/link-graph.js';

// Endpoints
export { Host } from './core/host.js';
export type { HostStats, HostTransport } from './core/host.js';

export { Router } from './core/router.js';
export type { RouterEvents, RouterStats, RouterOptions, HopDirection } from './core/router.js';

export { Network } from './core/network.js';
export type { NetworkConfig } from './core/network.js';

// Errors
export {
  ErrorCodes,
  StackError,
  FormatError,
  ParityError,
  PayloadTooLargeError,
  UnknownHostError,
  RoutingInconsistencyError,
  CollisionError,
  DuplicateAddressError,
  AddressRangeError,
  ConfigurationError,
  isStackError,
  hasErrorCode,
} from './core/errors.js';
export type { ErrorCode, CollisionReason, ConfigIssue } from './core/errors.js';

export { channelConfigSchema, modulationConfigSchema, parseConfig } from './core/config.js';

// Logging
export { attachConsoleLogger } from './core/logging.js';
export type { LogLevel, LogSink } from './core/logging.js';

// Utilities
export { createSeededRandom } from './utils/random.js';
export type { RandomSource, SeededRandom } from './utils/random.js';

export { TypedEventEmitter } from './utils/event-emitter.js';
export type { EventHandler, Unsubscribe } from './utils/event-emitter.js';
