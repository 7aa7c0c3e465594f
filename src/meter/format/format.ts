/**
 * Display formatting for byte counts, speeds, uptime and status.
 *
 * Units are binary (1 KB = 1024 B). A value exactly at a unit threshold is
 * shown in the larger unit.
 */

import type { PublishedMetrics } from '../types/published-metrics.js';

const UNITS = ['KB', 'MB', 'GB', 'TB'] as const;

export function formatBytes(bytes: number): string {
  const value = Number.isFinite(bytes) ? Math.max(0, bytes) : 0;
  if (Math.round(value) < 1024) {
    return `${Math.round(value)} B`;
  }

  let scaled = value / 1024;
  let unit = 0;
  while (Number(scaled.toFixed(2)) >= 1024 && unit < UNITS.length - 1) {
    scaled /= 1024;
    unit++;
  }
  return `${scaled.toFixed(2)} ${UNITS[unit]}`;
}

export function formatSpeed(bytesPerSecond: number): string {
  return `${formatBytes(bytesPerSecond)}/s`;
}

/**
 * Formats seconds as HH:MM:SS; hours grow past 99 when needed
 */
export function formatUptime(seconds: number): string {
  const total = Number.isFinite(seconds) ? Math.max(0, Math.floor(seconds)) : 0;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return [hours, minutes, secs].map((part) => String(part).padStart(2, '0')).join(':');
}

export function describeStatus(
  metrics: Pick<PublishedMetrics, 'status' | 'uploadSpeed' | 'downloadSpeed' | 'lastError'>,
): string {
  switch (metrics.status.state) {
    case 'connected':
      return `Upload: ${formatSpeed(metrics.uploadSpeed)}, Download: ${formatSpeed(metrics.downloadSpeed)}`;
    case 'disconnected':
      return 'Network disconnected';
    case 'connecting':
      return 'Connecting to network';
    case 'error':
      return `Network error: ${metrics.lastError?.message ?? metrics.status.reason}`;
  }
}
