/**
 * Meter Gateway Methods
 *
 * WebSocket methods exposing bandwidth meter metrics, history and controls
 * to dashboard clients, plus helpers that broadcast meter updates.
 */

import type { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { InvalidIntervalError } from '../../meter/errors.js';
import { describeStatus, formatBytes, formatSpeed, formatUptime } from '../../meter/format/index.js';
import type { MeterOrchestrator, MeterStatus, MeterSystemEvent } from '../../meter/meter-orchestrator.js';
import type { DailyStats, PublishedMetrics } from '../../meter/types/index.js';

const log = createSubsystemLogger('gateway/meter-metrics');

/** The orchestrator surface the gateway calls into */
export type MeterControl = Pick<
  MeterOrchestrator,
  | 'getMetrics'
  | 'getStatus'
  | 'getLastNDays'
  | 'getRecentEvents'
  | 'start'
  | 'stop'
  | 'restart'
  | 'setIntervals'
  | 'resetStatistics'
  | 'resetAllHistory'
  | 'resolveExternalIP'
>;

export interface MeterDisplayText {
  upload: string;
  download: string;
  uploadedToday: string;
  downloadedToday: string;
  uptime: string;
  status: string;
}

export interface CommandResult {
  success: boolean;
  message: string;
}

export interface MeterMetricsHandlers {
  'meter.getMetrics': () => Promise<{ metrics: PublishedMetrics; display: MeterDisplayText }>;
  'meter.getStatus': () => Promise<MeterStatus>;
  'meter.getHistory': (params: { days?: number }) => Promise<DailyStats[]>;
  'meter.getRecentEvents': (params: { limit?: number }) => Promise<MeterSystemEvent[]>;
  'meter.start': () => Promise<CommandResult>;
  'meter.stop': () => Promise<CommandResult>;
  'meter.restart': () => Promise<CommandResult>;
  'meter.setIntervals': (params: { sampleIntervalMs: number; publishIntervalMs: number }) => Promise<CommandResult>;
  'meter.resetStatistics': () => Promise<CommandResult>;
  'meter.resetHistory': () => Promise<CommandResult>;
  'meter.resolveExternalIP': () => Promise<{ outcome: 'resolved' | 'failed' | 'cancelled'; address?: string }>;
}

export type MeterMethod = keyof MeterMetricsHandlers;

const MAX_HISTORY_DAYS = 366;

/**
 * Formats a snapshot for display
 */
export function toDisplayText(metrics: PublishedMetrics): MeterDisplayText {
  return {
    upload: formatSpeed(metrics.uploadSpeed),
    download: formatSpeed(metrics.downloadSpeed),
    uploadedToday: formatBytes(metrics.totalUploadedToday),
    downloadedToday: formatBytes(metrics.totalDownloadedToday),
    uptime: formatUptime(metrics.networkUptime),
    status: describeStatus(metrics),
  };
}

/**
 * Creates meter handlers for Gateway WebSocket methods
 */
export function createMeterMetricsHandlers(meter: MeterControl | null): MeterMetricsHandlers {
  const ensureMeter = (): MeterControl => {
    if (!meter) {
      throw new Error('Bandwidth meter not available');
    }
    return meter;
  };

  const command = (name: string, run: (control: MeterControl) => boolean | void, message: string) => {
    return async (): Promise<CommandResult> => {
      try {
        const result = run(ensureMeter());
        if (result === false) {
          return { success: false, message: `${name} rejected` };
        }
        log.info(message);
        return { success: true, message };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        log.error(`Failed to ${name}:`, { error: reason });
        return { success: false, message: reason };
      }
    };
  };

  return {
    'meter.getMetrics': async () => {
      const metrics = ensureMeter().getMetrics();
      return { metrics, display: toDisplayText(metrics) };
    },

    'meter.getStatus': async () => ensureMeter().getStatus(),

    /**
     * Gets the most recent days, newest first
     */
    'meter.getHistory': async (params) => {
      const days = params.days ?? 7;
      if (!Number.isInteger(days) || days < 1 || days > MAX_HISTORY_DAYS) {
        throw new Error(`days must be an integer between 1 and ${MAX_HISTORY_DAYS}`);
      }
      return ensureMeter().getLastNDays(days);
    },

    'meter.getRecentEvents': async (params) => {
      const limit = params.limit ?? 50;
      return ensureMeter().getRecentEvents(Math.max(1, Math.min(limit, 500)));
    },

    'meter.start': command('start monitoring', (control) => control.start(), 'Monitoring started'),
    'meter.stop': command('stop monitoring', (control) => control.stop(), 'Monitoring stopped'),
    'meter.restart': command('restart monitoring', (control) => control.restart(), 'Monitoring restarted'),

    'meter.setIntervals': async (params) => {
      const { sampleIntervalMs, publishIntervalMs } = params;
      log.debug('Setting monitoring intervals', { sampleIntervalMs, publishIntervalMs });
      if (!ensureMeter().setIntervals(sampleIntervalMs, publishIntervalMs)) {
        return { success: false, message: new InvalidIntervalError(sampleIntervalMs, publishIntervalMs).message };
      }
      return { success: true, message: `Intervals set to ${sampleIntervalMs}ms / ${publishIntervalMs}ms` };
    },

    'meter.resetStatistics': command(
      'reset statistics',
      (control) => control.resetStatistics(),
      'Session statistics reset',
    ),
    'meter.resetHistory': command('reset history', (control) => control.resetAllHistory(), 'Daily history cleared'),

    'meter.resolveExternalIP': async () => {
      const resolution = await ensureMeter().resolveExternalIP();
      switch (resolution.outcome) {
        case 'resolved':
        case 'failed':
          return { outcome: resolution.outcome, address: resolution.address };
        case 'cancelled':
          return { outcome: resolution.outcome };
      }
    },
  };
}

/**
 * Meter event types for WebSocket broadcasting
 */
export const METER_EVENTS = {
  METRICS_UPDATE: 'meter.metrics.update',
  EVENT_OCCURRED: 'meter.event.occurred',
} as const;

export type BroadcastFunction = (event: string, payload: unknown, options?: { dropIfSlow?: boolean }) => void;

export function broadcastMeterMetrics(broadcast: BroadcastFunction, metrics: PublishedMetrics): void {
  broadcast(METER_EVENTS.METRICS_UPDATE, { metrics, display: toDisplayText(metrics) }, { dropIfSlow: true });
}

export function broadcastMeterEvent(broadcast: BroadcastFunction, event: MeterSystemEvent): void {
  broadcast(METER_EVENTS.EVENT_OCCURRED, event, { dropIfSlow: event.severity === 'info' });
}

/**
 * Forwards meter snapshots and events to a broadcaster. Returns the unsubscribe function.
 */
export function attachMeterBroadcasts(meter: EventEmitter, broadcast: BroadcastFunction): () => void {
  const onMetrics = (metrics: PublishedMetrics) => broadcastMeterMetrics(broadcast, metrics);
  const onEvent = (event: MeterSystemEvent) => broadcastMeterEvent(broadcast, event);

  meter.on('metrics', onMetrics);
  meter.on('systemEvent', onEvent);

  return () => {
    meter.off('metrics', onMetrics);
    meter.off('systemEvent', onEvent);
  };
}
