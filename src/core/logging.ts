/**
 * Console output for router events
 *
 * The stack itself never writes to the console; attach a logger to a router
 * to get one line per event at or above the chosen level.
 */

import { formatAddress } from './addressing.js';
import type { Router } from './router.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogSink {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Subscribe a logger to router events. Returns a function that detaches it.
 */
export function attachConsoleLogger(
  router: Router,
  level: LogLevel = 'info',
  sink: LogSink = console
): () => void {
  const write = (messageLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level]) {
      sink[messageLevel](message);
    }
  };

  const unsubscribers = [
    router.on('host:registered', ({ host }) => {
      write('info', `[HOST] registered ${formatAddress(host.address)}`);
    }),
    router.on('host:unregistered', ({ address }) => {
      write('info', `[HOST] unregistered ${formatAddress(address)}`);
    }),
    router.on('frame:transmitted', ({ direction, sent }) => {
      write(
        'debug',
        `[HOP] ${direction} ${formatAddress(sent.src)} -> ${formatAddress(sent.dst)} ` +
          `(${sent.payloadBits.length} payload bits)`
      );
    }),
    router.on('frame:delivered', ({ host, message }) => {
      write(
        'info',
        `[DELIVER] ${formatAddress(message.src)} -> ${formatAddress(host.address)}: ` +
          `${message.payload.length} chars`
      );
    }),
    router.on('frame:dropped', ({ host, reason }) => {
      write('warn', `[DROP] at ${formatAddress(host.address)}: ${reason}`);
    }),
    router.on('collision:detected', ({ error }) => {
      write('warn', `[COLLISION] ${error.message}`);
    }),
    router.on('send:failed', ({ src, dst, error }) => {
      write(
        'error',
        `[SEND] ${formatAddress(src)} -> ${formatAddress(dst)} failed: ${error.message}`
      );
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
