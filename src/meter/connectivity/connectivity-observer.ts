/**
 * Connectivity Observer Implementation
 *
 * Polls the host's interface addresses and reports path transitions:
 * satisfied when a physical interface has a routable address,
 * requiresConnection when physical interfaces only hold link-local
 * addresses, unsatisfied when none is up and unknown when enumeration fails.
 */

import { networkInterfaces } from 'node:os';
import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { DEFAULT_EXCLUDED_INTERFACE_PREFIXES } from '../interface-reader/index.js';
import type { InterfaceAddress } from '../types/interface-sample.js';
import type { PathStatus } from '../types/published-metrics.js';

export interface ConnectivityObserverOptions {
  /** Poll period (default: 2000ms) */
  pollIntervalMs: number;
  /** Interface name prefixes that never count as a path */
  excludedPrefixes: readonly string[];
  readAddresses: () => Record<string, InterfaceAddress[] | undefined>;
}

export function isLinkLocal(entry: InterfaceAddress): boolean {
  if (entry.family === 'IPv4' || entry.family === 4) {
    return entry.address.startsWith('169.254.');
  }
  return /^fe[89ab]/i.test(entry.address);
}

/**
 * Derives the path status from an interface address table
 */
export function classifyPath(
  table: Record<string, InterfaceAddress[] | undefined>,
  excludedPrefixes: readonly string[],
): PathStatus {
  let linkLocalOnly = false;

  for (const [name, addresses] of Object.entries(table)) {
    if (!addresses || excludedPrefixes.some((prefix) => name.startsWith(prefix))) {
      continue;
    }
    const external = addresses.filter((entry) => !entry.internal);
    if (external.some((entry) => !isLinkLocal(entry))) {
      return 'satisfied';
    }
    if (external.length > 0) {
      linkLocalOnly = true;
    }
  }

  return linkLocalOnly ? 'requiresConnection' : 'unsatisfied';
}

export class ConnectivityObserver extends EventEmitter {
  private readonly options: ConnectivityObserverOptions;
  private readonly logger = createSubsystemLogger('meter/connectivity');
  private pollTimer?: NodeJS.Timeout;
  private status?: PathStatus;

  constructor(options: Partial<ConnectivityObserverOptions> = {}) {
    super();
    this.options = {
      pollIntervalMs: 2000,
      excludedPrefixes: DEFAULT_EXCLUDED_INTERFACE_PREFIXES,
      readAddresses: () => networkInterfaces(),
      ...options,
    };
  }

  /**
   * Gets the last observed status, undefined before the first poll
   */
  getPathStatus(): PathStatus | undefined {
    return this.status;
  }

  isObserving(): boolean {
    return this.pollTimer !== undefined;
  }

  /**
   * Evaluates the path immediately, then on every poll
   */
  start(): void {
    if (this.pollTimer) {
      return;
    }
    this.check();
    this.pollTimer = setInterval(() => this.check(), this.options.pollIntervalMs);
    this.logger.debug(`Connectivity polling every ${this.options.pollIntervalMs}ms`);
  }

  stop(): void {
    if (!this.pollTimer) {
      return;
    }
    clearInterval(this.pollTimer);
    this.pollTimer = undefined;
    this.status = undefined;
  }

  /**
   * Reads the address table once and emits pathUpdate when the status changed
   */
  check(): PathStatus {
    let next: PathStatus;
    try {
      next = classifyPath(this.options.readAddresses(), this.options.excludedPrefixes);
    } catch (error) {
      if (this.status !== 'unknown') {
        this.logger.warn('Failed to read interface addresses', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      next = 'unknown';
    }

    if (next !== this.status) {
      const previous = this.status;
      this.status = next;
      this.logger.info(`Network path ${next}`, { previous });
      this.emit('pathUpdate', next);
    }
    return next;
  }
}
