/**
 * ERROR REPORTER
 * ==============
 *
 * Bounded in-memory registry of reported errors. Each report gets a UUID the
 * dashboard can show to users and operators can look up later.
 * Oldest records are evicted once `maxHistory` is exceeded.
 */

import { v4 as uuidv4 } from 'uuid';
import { formatException } from './errors.js';
import type { Clock, Logger } from './logger.js';
import { defaultClock, createConsoleLogger } from './logger.js';

export interface ErrorRecord {
  id: string;
  type: string;
  message: string;
  formattedError: string;
  context: string;
  timestamp: string;
  stack?: string;
}

export type ErrorSummary = Omit<ErrorRecord, 'stack'>;

export interface ErrorReporterConfig {
  maxHistory?: number;
  includeStack?: boolean;
  clock?: Clock;
  logger?: Logger;
}

export class ErrorReporter {
  private records = new Map<string, ErrorRecord>();
  private readonly maxHistory: number;
  private readonly includeStack: boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: ErrorReporterConfig = {}) {
    this.maxHistory = Math.max(1, config.maxHistory ?? 100);
    this.includeStack = config.includeStack ?? true;
    this.clock = config.clock ?? defaultClock;
    this.logger = config.logger ?? createConsoleLogger('ErrorReporter');
  }

  /**
   * Store an error and return its id
   */
  report(error: unknown, context: string): string {
    const id = uuidv4();
    const record: ErrorRecord = {
      id,
      type: error instanceof Error ? error.name : 'UnknownError',
      message: error instanceof Error ? error.message : String(error),
      formattedError: formatException(error),
      context,
      timestamp: new Date(this.clock.now()).toISOString(),
    };
    if (this.includeStack && error instanceof Error && error.stack) {
      record.stack = error.stack;
    }

    this.records.set(id, record);
    this.logger.error({ errorId: id, context }, `Error reported: ${record.formattedError}`);

    // Map keeps insertion order, so the first key is the oldest report
    while (this.records.size > this.maxHistory) {
      const oldest = this.records.keys().next().value;
      if (oldest === undefined) break;
      this.records.delete(oldest);
    }

    return id;
  }

  get(id: string): ErrorRecord | null {
    return this.records.get(id) ?? null;
  }

  clear(id: string): boolean {
    return this.records.delete(id);
  }

  clearAll(): number {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  count(): number {
    return this.records.size;
  }

  /**
   * Newest first, stacks stripped
   */
  summary(): ErrorSummary[] {
    return Array.from(this.records.values())
      .reverse()
      .map(({ stack: _stack, ...rest }) => rest);
  }
}
