/**
 * Logger / Clock contracts
 *
 * Components take these by injection so tests can pass vi.fn() loggers
 * and a controllable clock. Arguments follow pino's (obj, msg) order, which
 * lets the server hand in Fastify's own logger.
 */

import type { FastifyBaseLogger } from 'fastify';

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
}

export const defaultClock: Clock = {
  now: () => Date.now(),
};

export function createConsoleLogger(scope: string, verbose = false): Logger {
  return {
    info: (obj, msg) => console.log(`[${scope}] ${msg || ''}`, obj),
    warn: (obj, msg) => console.warn(`[${scope}] ${msg || ''}`, obj),
    error: (obj, msg) => console.error(`[${scope}] ${msg || ''}`, obj),
    debug: (obj, msg) => {
      if (verbose) console.debug(`[${scope}] ${msg || ''}`, obj);
    },
  };
}

export function fromFastifyLogger(log: FastifyBaseLogger, scope: string): Logger {
  const child = log.child({ component: scope });
  return {
    info: (obj, msg) => child.info(obj, msg),
    warn: (obj, msg) => child.warn(obj, msg),
    error: (obj, msg) => child.error(obj, msg),
    debug: (obj, msg) => child.debug(obj, msg),
  };
}
