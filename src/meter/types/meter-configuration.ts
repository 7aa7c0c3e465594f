/**
 * MeterConfiguration
 *
 * Settings consumed by the meter core. Only the two interval keys are
 * user-facing preferences; the rest tune the surrounding collaborators.
 */

import type { LogLevel } from '../../logging/subsystem.js';

export type ExternalIPResponseFormat =
  | { kind: 'text' }
  | { kind: 'json'; field: string };

export interface ExternalIPService {
  /** Short label used in logs and results */
  name: string;
  url: string;
  format: ExternalIPResponseFormat;
}

export interface MeterConfiguration {
  /** Fast sampler period in milliseconds */
  sampleIntervalMs: number;
  /** Publish tick period in milliseconds */
  publishIntervalMs: number;
  /** Validity window of the primary interface selection */
  interfaceCacheTtlMs: number;
  /** Connectivity observer poll period */
  connectivityPollMs: number;
  /** Location of the persisted daily statistics */
  statsFilePath: string;
  /** Interface name prefixes never chosen as primary */
  excludedInterfacePrefixes: string[];
  externalIP: {
    /** Resolve once when the meter starts */
    resolveOnStart: boolean;
    /** Per-service request timeout */
    timeoutMs: number;
    services: ExternalIPService[];
  };
  logLevel: LogLevel;
}
