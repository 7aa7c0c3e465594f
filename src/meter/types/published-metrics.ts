/**
 * PublishedMetrics
 *
 * The externally observable state of the meter. Snapshots are frozen and
 * replaced wholesale; consumers never see a partially updated one.
 */

import type { MeterErrorCode } from '../errors.js';

export type ConnectionState = 'connected' | 'disconnected' | 'connecting' | 'error';

export type NetworkStatus =
  | { state: 'connected' }
  | { state: 'disconnected' }
  | { state: 'connecting' }
  | { state: 'error'; reason: MeterErrorCode };

/** Transitions pushed by the connectivity observer */
export type PathStatus = 'satisfied' | 'unsatisfied' | 'requiresConnection' | 'unknown';

export interface MeterErrorInfo {
  /** Stable machine-readable reason */
  code: MeterErrorCode;
  /** One-line description */
  message: string;
  timestamp: Date;
}

export interface PublishedMetrics {
  /** Bytes per second over the last publish window */
  uploadSpeed: number;
  downloadSpeed: number;
  /** Session peaks, reset only by resetStatistics() */
  peakUploadSpeed: number;
  peakDownloadSpeed: number;
  /** Mirror of today's DailyStats totals at the last flush */
  totalUploadedToday: number;
  totalDownloadedToday: number;
  interfaceName: string;
  interfaceDescription: string;
  ipAddress: string;
  externalIPAddress: string;
  /** Seconds since monitoring (re)started */
  networkUptime: number;
  status: NetworkStatus;
  lastError?: MeterErrorInfo;
  /** Increases by one with every published snapshot */
  version: number;
  updatedAt: Date;
}

export const UNKNOWN_VALUE = 'Unknown';
