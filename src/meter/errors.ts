/**
 * Meter Errors
 *
 * Every failure inside the meter core carries a stable machine-readable code
 * and a one-line description. None of them is fatal to the process.
 */

import type { MeterErrorInfo } from './types/published-metrics.js';

export type MeterErrorCode =
  | 'interface_access'
  | 'no_active_interface'
  | 'external_ip_fetch_failed'
  | 'persistence'
  | 'invalid_interval'
  | 'path_unknown'
  | 'unexpected';

export class MeterError extends Error {
  readonly code: MeterErrorCode;

  constructor(code: MeterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MeterError';
    this.code = code;
  }
}

/** The OS interface table could not be enumerated; retried on the next tick */
export class InterfaceAccessError extends MeterError {
  constructor(message = 'Failed to retrieve network interfaces', options?: { cause?: unknown }) {
    super('interface_access', message, options);
    this.name = 'InterfaceAccessError';
  }
}

/** No physical interface is currently usable */
export class NoActiveInterfaceError extends MeterError {
  constructor(message = 'No active network interfaces found') {
    super('no_active_interface', message);
    this.name = 'NoActiveInterfaceError';
  }
}

/** Every external IP service failed; the caller has to trigger a new lookup */
export class ExternalIPFetchFailedError extends MeterError {
  readonly failures: ReadonlyArray<{ service: string; reason: string }>;

  constructor(failures: ReadonlyArray<{ service: string; reason: string }>) {
    super('external_ip_fetch_failed', `External IP lookup failed on all ${failures.length} services`);
    this.name = 'ExternalIPFetchFailedError';
    this.failures = failures;
  }
}

/** Daily statistics could not be loaded or saved */
export class PersistenceError extends MeterError {
  readonly operation: 'load' | 'save';
  readonly path: string;

  constructor(operation: 'load' | 'save', path: string, options?: { cause?: unknown }) {
    super('persistence', `Failed to ${operation} daily statistics at ${path}: ${describeCause(options?.cause)}`, options);
    this.name = 'PersistenceError';
    this.operation = operation;
    this.path = path;
  }
}

/** Intervals were not positive, or the sampler was slower than the publisher */
export class InvalidIntervalError extends MeterError {
  constructor(sampleIntervalMs: number, publishIntervalMs: number) {
    super('invalid_interval', describeIntervals(sampleIntervalMs, publishIntervalMs));
    this.name = 'InvalidIntervalError';
  }
}

function describeIntervals(sampleIntervalMs: number, publishIntervalMs: number): string {
  const values = `(sample: ${sampleIntervalMs}ms, publish: ${publishIntervalMs}ms)`;
  const positive = [sampleIntervalMs, publishIntervalMs].every((value) => Number.isFinite(value) && value > 0);
  return positive
    ? `Sample interval must not exceed publish interval ${values}`
    : `Intervals must be positive ${values}`;
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return 'unknown cause';
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Converts any thrown value into the published error shape
 */
export function toErrorInfo(error: unknown, timestamp: Date = new Date()): MeterErrorInfo {
  if (error instanceof MeterError) {
    return { code: error.code, message: error.message, timestamp };
  }
  return {
    code: 'unexpected',
    message: error instanceof Error ? error.message : String(error),
    timestamp,
  };
}
