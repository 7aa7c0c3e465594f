/**
 * Sampling Engine Implementation
 *
 * Runs two independent timers. The fast sample timer reads the primary
 * interface's counters and accumulates deltas into a window; the slower
 * publish timer turns the window into speeds, folds it into today's daily
 * statistics, raises peaks and publishes one frozen metrics snapshot.
 *
 * The first sample after start(), resetStatistics(), a recovery from a
 * failed read, a reconnect, or a switch of primary interface only seeds the
 * counter state; it never produces a delta.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { counterDeltas, type CounterPair } from '../delta-calculator/index.js';
import { InvalidIntervalError, MeterError, toErrorInfo } from '../errors.js';
import { dayKey, type DailyStatsStore } from '../daily-stats-store/index.js';
import type { InterfaceSample } from '../types/interface-sample.js';
import {
  UNKNOWN_VALUE,
  type NetworkStatus,
  type PathStatus,
  type PublishedMetrics,
} from '../types/published-metrics.js';

/** The part of InterfaceReader the engine samples */
export interface PrimaryInterfaceSource {
  primaryInterface(): InterfaceSample;
}

/** The part of DailyStatsStore the engine writes to */
export type DailyStatsSink = Pick<DailyStatsStore, 'addDelta' | 'recordPeak' | 'get'>;

export type EngineState = 'idle' | 'running';

export interface SamplingEngineOptions {
  /** Fast sampler period (default: 500ms) */
  sampleIntervalMs: number;
  /** Publish period (default: 1000ms) */
  publishIntervalMs: number;
  /** Status before the first path update */
  initialStatus: NetworkStatus;
  now: () => Date;
}

export interface LiveTotals {
  uploaded: number;
  downloaded: number;
}

interface CounterState extends CounterPair {
  interfaceName: string;
}

const PATH_STATUS_MAP: Record<PathStatus, NetworkStatus> = {
  satisfied: { state: 'connected' },
  unsatisfied: { state: 'disconnected' },
  requiresConnection: { state: 'connecting' },
  unknown: { state: 'error', reason: 'path_unknown' },
};

export function isValidInterval(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Both intervals positive and the sampler no slower than the publisher
 */
export function areValidIntervals(sampleIntervalMs: number, publishIntervalMs: number): boolean {
  return isValidInterval(sampleIntervalMs) && isValidInterval(publishIntervalMs) && sampleIntervalMs <= publishIntervalMs;
}

function sameStatus(a: NetworkStatus, b: NetworkStatus): boolean {
  if (a.state === 'error' && b.state === 'error') {
    return a.reason === b.reason;
  }
  return a.state === b.state;
}

export class SamplingEngine extends EventEmitter {
  private readonly options: SamplingEngineOptions;
  private readonly logger = createSubsystemLogger('meter/engine');
  private state: EngineState = 'idle';
  private sampleTimer?: NodeJS.Timeout;
  private publishTimer?: NodeJS.Timeout;

  private counters?: CounterState;
  private awaitingReseed = true;
  private window: CounterPair = { upload: 0, download: 0 };
  /** Day the pending window was sampled on */
  private windowDay?: string;
  private startTime: Date;
  /** Set while the status is an error raised by a failed read */
  private samplingFailed = false;
  private currentInterface?: InterfaceSample;
  private metrics: PublishedMetrics;

  constructor(
    private readonly reader: PrimaryInterfaceSource,
    private readonly store: DailyStatsSink,
    options: Partial<SamplingEngineOptions> = {},
  ) {
    super();
    this.options = {
      sampleIntervalMs: 500,
      publishIntervalMs: 1000,
      initialStatus: { state: 'connected' },
      now: () => new Date(),
      ...options,
    };

    const now = this.options.now();
    const today = this.store.get(now);
    this.startTime = now;
    this.metrics = Object.freeze({
      uploadSpeed: 0,
      downloadSpeed: 0,
      peakUploadSpeed: 0,
      peakDownloadSpeed: 0,
      totalUploadedToday: today.totalUploaded,
      totalDownloadedToday: today.totalDownloaded,
      interfaceName: UNKNOWN_VALUE,
      interfaceDescription: UNKNOWN_VALUE,
      ipAddress: UNKNOWN_VALUE,
      externalIPAddress: UNKNOWN_VALUE,
      networkUptime: 0,
      status: this.options.initialStatus,
      version: 0,
      updatedAt: now,
    });
  }

  getState(): EngineState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Gets the latest published snapshot
   */
  getMetrics(): PublishedMetrics {
    return this.metrics;
  }

  getIntervals(): { sampleIntervalMs: number; publishIntervalMs: number } {
    return {
      sampleIntervalMs: this.options.sampleIntervalMs,
      publishIntervalMs: this.options.publishIntervalMs,
    };
  }

  /**
   * Today's stored totals plus the traffic accumulated since the last publish tick
   */
  getLiveTotals(now: Date = this.options.now()): LiveTotals {
    const today = this.store.get(now);
    if (this.windowDay !== undefined && this.windowDay !== today.date) {
      return { uploaded: today.totalUploaded, downloaded: today.totalDownloaded };
    }
    return {
      uploaded: today.totalUploaded + this.window.upload,
      downloaded: today.totalDownloaded + this.window.download,
    };
  }

  /**
   * Starts both timers. Calling start while running restarts with the given intervals.
   * Invalid intervals are logged and leave the engine untouched.
   */
  start(
    sampleIntervalMs: number = this.options.sampleIntervalMs,
    publishIntervalMs: number = this.options.publishIntervalMs,
  ): boolean {
    if (!areValidIntervals(sampleIntervalMs, publishIntervalMs)) {
      this.rejectIntervals(sampleIntervalMs, publishIntervalMs);
      return false;
    }

    this.clearTimers();
    this.options.sampleIntervalMs = sampleIntervalMs;
    this.options.publishIntervalMs = publishIntervalMs;

    const now = this.options.now();
    this.startTime = now;
    this.awaitingReseed = true;
    this.counters = undefined;
    this.clearWindow();

    this.sampleTimer = setInterval(() => this.runTick('sample'), sampleIntervalMs);
    this.publishTimer = setInterval(() => this.runTick('publish'), publishIntervalMs);
    this.state = 'running';

    this.publish({ lastError: undefined, networkUptime: 0 }, now);
    this.logger.info(`Monitoring started (sample: ${sampleIntervalMs}ms, publish: ${publishIntervalMs}ms)`);
    this.emit('monitoringStarted', { sampleIntervalMs, publishIntervalMs });
    return true;
  }

  /**
   * Stops both timers. No tick fires after this returns; published values are kept.
   */
  stop(): void {
    if (this.state === 'idle') {
      return;
    }
    this.clearTimers();
    this.state = 'idle';
    this.logger.info('Monitoring stopped');
    this.emit('monitoringStopped');
  }

  restart(): boolean {
    return this.start(this.options.sampleIntervalMs, this.options.publishIntervalMs);
  }

  /**
   * Replaces both intervals with a full stop and start.
   * Invalid values leave the current schedule running.
   */
  setIntervals(sampleIntervalMs: number, publishIntervalMs: number): boolean {
    if (!areValidIntervals(sampleIntervalMs, publishIntervalMs)) {
      this.rejectIntervals(sampleIntervalMs, publishIntervalMs);
      return false;
    }

    this.stop();
    const started = this.start(sampleIntervalMs, publishIntervalMs);
    this.emit('intervalsChanged', { sampleIntervalMs, publishIntervalMs });
    return started;
  }

  /**
   * Clears session peaks, speeds and the pending window and restarts the
   * uptime clock. The next sample seeds the counter state. Stored days are kept.
   */
  resetStatistics(): void {
    const now = this.options.now();
    this.clearWindow();
    this.awaitingReseed = true;
    this.counters = undefined;
    this.startTime = now;

    this.publish(
      {
        uploadSpeed: 0,
        downloadSpeed: 0,
        peakUploadSpeed: 0,
        peakDownloadSpeed: 0,
        networkUptime: 0,
      },
      now,
    );
    this.logger.info('Session statistics reset');
    this.emit('statisticsReset', { timestamp: now });
  }

  /**
   * Applies a connectivity transition. Reconnecting re-seeds the counter state.
   */
  handlePathUpdate(path: PathStatus): void {
    const status = PATH_STATUS_MAP[path];
    if (sameStatus(this.metrics.status, status)) {
      return;
    }

    this.samplingFailed = false;
    const changes: Partial<PublishedMetrics> & Pick<PublishedMetrics, 'status'> = { status };

    if (status.state === 'connected') {
      this.awaitingReseed = true;
    } else if (status.state === 'error') {
      changes.lastError = toErrorInfo(
        new MeterError('path_unknown', 'Network path status is unknown'),
        this.options.now(),
      );
    }

    this.logger.info(`Network path ${path}, status ${status.state}`);
    this.setStatus(changes);
  }

  /**
   * Republishes today's stored totals, e.g. after the history was cleared
   */
  refreshTodayTotals(): void {
    const now = this.options.now();
    const today = this.store.get(now);
    if (
      this.metrics.totalUploadedToday === today.totalUploaded &&
      this.metrics.totalDownloadedToday === today.totalDownloaded
    ) {
      return;
    }
    this.publish({ totalUploadedToday: today.totalUploaded, totalDownloadedToday: today.totalDownloaded }, now);
  }

  /**
   * Publishes a new external IP address
   */
  setExternalIPAddress(address: string): void {
    if (this.metrics.externalIPAddress === address) {
      return;
    }
    this.publish({ externalIPAddress: address });
  }

  /**
   * Records a failure from a collaborator as lastError without touching the status
   */
  reportError(error: unknown): void {
    this.publish({ lastError: toErrorInfo(error, this.options.now()) });
  }

  /**
   * Reads the primary interface and accumulates its deltas
   */
  onSampleTick(): void {
    if (this.state !== 'running' || !this.canSample()) {
      return;
    }

    let sample: InterfaceSample;
    try {
      sample = this.reader.primaryInterface();
    } catch (error) {
      this.handleSampleFailure(error);
      return;
    }

    if (this.samplingFailed) {
      this.samplingFailed = false;
      this.awaitingReseed = true;
      this.logger.info('Interface read recovered');
      this.setStatus({ status: { state: 'connected' } });
    }

    this.currentInterface = sample;
    const current: CounterPair = { upload: sample.outputBytes, download: sample.inputBytes };

    if (this.awaitingReseed || !this.counters || this.counters.interfaceName !== sample.name) {
      if (this.counters && this.counters.interfaceName !== sample.name) {
        this.logger.info(`Primary interface changed from ${this.counters.interfaceName} to ${sample.name}`);
      }
      this.counters = { interfaceName: sample.name, ...current };
      this.awaitingReseed = false;
      return;
    }

    // Traffic sampled before midnight belongs to the previous day
    const day = dayKey(this.options.now());
    if (this.windowDay !== undefined && this.windowDay !== day) {
      this.onPublishTick();
    }

    const deltas = counterDeltas(current, this.counters);
    this.windowDay = day;
    this.window = {
      upload: this.window.upload + deltas.upload,
      download: this.window.download + deltas.download,
    };
    this.counters = { interfaceName: sample.name, ...current };
  }

  /**
   * Converts the window into speeds, folds it into the statistics of the day it
   * was sampled on and publishes
   */
  onPublishTick(): void {
    if (this.state !== 'running') {
      return;
    }

    const now = this.options.now();
    const seconds = this.options.publishIntervalMs / 1000;
    const uploadSpeed = this.window.upload / seconds;
    const downloadSpeed = this.window.download / seconds;

    const windowDay = this.windowDay ?? dayKey(now);
    if (this.window.upload > 0 || this.window.download > 0) {
      this.store.addDelta(windowDay, this.window.upload, this.window.download);
    }
    if (uploadSpeed > 0 || downloadSpeed > 0) {
      this.store.recordPeak(windowDay, uploadSpeed, downloadSpeed);
    }
    this.clearWindow();
    const today = this.store.get(now);

    const changes: Partial<PublishedMetrics> = {
      uploadSpeed,
      downloadSpeed,
      peakUploadSpeed: Math.max(this.metrics.peakUploadSpeed, uploadSpeed),
      peakDownloadSpeed: Math.max(this.metrics.peakDownloadSpeed, downloadSpeed),
      totalUploadedToday: today.totalUploaded,
      totalDownloadedToday: today.totalDownloaded,
      networkUptime: Math.max(0, Math.floor((now.getTime() - this.startTime.getTime()) / 1000)),
    };

    if (this.currentInterface) {
      changes.interfaceName = this.currentInterface.name;
      changes.interfaceDescription = this.currentInterface.description;
      changes.ipAddress = this.currentInterface.ipAddress ?? UNKNOWN_VALUE;
    }

    this.publish(changes, now);
  }

  private clearWindow(): void {
    this.window = { upload: 0, download: 0 };
    this.windowDay = undefined;
  }

  private canSample(): boolean {
    const { status } = this.metrics;
    return status.state === 'connected' || (status.state === 'error' && this.samplingFailed);
  }

  private handleSampleFailure(error: unknown): void {
    const info = toErrorInfo(error, this.options.now());
    const previous = this.metrics.lastError;
    this.samplingFailed = true;

    if (this.metrics.status.state === 'error' && previous?.code === info.code && previous.message === info.message) {
      return;
    }

    this.logger.warn('Failed to sample primary interface', { error: info.message, code: info.code });
    this.setStatus({ status: { state: 'error', reason: info.code }, lastError: info });
    this.emit('meterError', info);
  }

  private setStatus(changes: Partial<PublishedMetrics> & Pick<PublishedMetrics, 'status'>): void {
    const previous = this.metrics.status;
    this.publish(changes);
    if (!sameStatus(previous, changes.status)) {
      this.emit('statusChanged', { previous, current: changes.status });
    }
  }

  private publish(changes: Partial<PublishedMetrics>, now: Date = this.options.now()): void {
    this.metrics = Object.freeze({
      ...this.metrics,
      ...changes,
      version: this.metrics.version + 1,
      updatedAt: now,
    });
    this.emit('metrics', this.metrics);
  }

  private rejectIntervals(sampleIntervalMs: number, publishIntervalMs: number): void {
    const error = new InvalidIntervalError(sampleIntervalMs, publishIntervalMs);
    this.logger.error('Rejected monitoring intervals', { error: error.message });
  }

  private runTick(kind: 'sample' | 'publish'): void {
    try {
      if (kind === 'sample') {
        this.onSampleTick();
      } else {
        this.onPublishTick();
      }
    } catch (error) {
      this.logger.error(`Unexpected failure in ${kind} tick`, {
        error: error instanceof Error ? error.message : String(error),
      });
      this.reportError(error);
      this.emit('meterError', this.metrics.lastError);
    }
  }

  private clearTimers(): void {
    if (this.sampleTimer) {
      clearInterval(this.sampleTimer);
      this.sampleTimer = undefined;
    }
    if (this.publishTimer) {
      clearInterval(this.publishTimer);
      this.publishTimer = undefined;
    }
  }
}
