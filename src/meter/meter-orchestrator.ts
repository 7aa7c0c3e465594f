/**
 * Bandwidth Meter Orchestrator
 *
 * Wires the interface reader, daily statistics store, sampling engine,
 * external IP resolver and connectivity observer together and exposes the
 * control surface used by display layers. Every change to published metrics
 * goes through the sampling engine; the orchestrator only routes signals to it
 * and keeps a bounded history of notable events.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, setLogLevel } from '../logging/subsystem.js';
import { InterfaceReader } from './interface-reader/index.js';
import { DailyStatsStore } from './daily-stats-store/index.js';
import {
  SamplingEngine,
  areValidIntervals,
  type LiveTotals,
  type PrimaryInterfaceSource,
} from './sampling-engine/index.js';
import { ExternalIPResolver, UNAVAILABLE_ADDRESS, type ExternalIPResolution } from './external-ip/index.js';
import { ConnectivityObserver } from './connectivity/index.js';
import type { PersistenceError } from './errors.js';
import type {
  DailyStats,
  MeterConfiguration,
  MeterErrorInfo,
  NetworkStatus,
  PathStatus,
  PublishedMetrics,
} from './types/index.js';

export interface MeterOrchestratorOptions {
  /** Follow OS connectivity; without it the engine assumes a connected path */
  observeConnectivity: boolean;
  logAllEvents: boolean;
  maxEventHistory: number;
  /** Component overrides, mainly for tests */
  reader?: PrimaryInterfaceSource;
  store?: DailyStatsStore;
  resolver?: ExternalIPResolver;
  observer?: ConnectivityObserver;
  now: () => Date;
}

export interface MeterStatus {
  running: boolean;
  status: NetworkStatus;
  sampleIntervalMs: number;
  publishIntervalMs: number;
  observingConnectivity: boolean;
  resolvingExternalIP: boolean;
  statsFilePath: string;
  lastError?: MeterErrorInfo;
  eventCount: number;
  /** Milliseconds since start(), 0 while stopped */
  uptime: number;
}

export interface MeterSystemEvent {
  id: string;
  type: 'monitoring' | 'connectivity' | 'persistence' | 'external_ip' | 'system';
  subtype: string;
  severity: 'info' | 'warning' | 'critical';
  message: string;
  source: string;
  data: Record<string, unknown>;
  timestamp: Date;
}

export class MeterOrchestrator extends EventEmitter {
  private readonly options: MeterOrchestratorOptions;
  private readonly logger = createSubsystemLogger('meter/orchestrator');
  private config: MeterConfiguration;

  private readonly store: DailyStatsStore;
  private readonly engine: SamplingEngine;
  private readonly resolver: ExternalIPResolver;
  private readonly observer?: ConnectivityObserver;

  private isStarted = false;
  private startTime?: Date;
  private eventHistory: MeterSystemEvent[] = [];
  private eventCounter = 0;
  private lastPersistenceMessage?: string;

  constructor(config: MeterConfiguration, options: Partial<MeterOrchestratorOptions> = {}) {
    super();
    this.config = config;
    this.options = {
      observeConnectivity: true,
      logAllEvents: false,
      maxEventHistory: 200,
      now: () => new Date(),
      ...options,
    };

    setLogLevel(config.logLevel);

    const reader =
      this.options.reader ??
      new InterfaceReader({
        cacheTtlMs: config.interfaceCacheTtlMs,
        excludedPrefixes: config.excludedInterfacePrefixes,
      });
    this.store = this.options.store ?? new DailyStatsStore({ filePath: config.statsFilePath });
    this.resolver =
      this.options.resolver ??
      new ExternalIPResolver({
        services: config.externalIP.services,
        timeoutMs: config.externalIP.timeoutMs,
      });

    if (this.options.observeConnectivity) {
      this.observer =
        this.options.observer ??
        new ConnectivityObserver({
          pollIntervalMs: config.connectivityPollMs,
          excludedPrefixes: config.excludedInterfacePrefixes,
        });
    }

    this.engine = new SamplingEngine(reader, this.store, {
      sampleIntervalMs: config.sampleIntervalMs,
      publishIntervalMs: config.publishIntervalMs,
      initialStatus: this.observer ? { state: 'connecting' } : { state: 'connected' },
      now: this.options.now,
    });

    this.wireComponents();

    const loadError = this.store.getLoadError();
    if (loadError) {
      this.engine.reportError(loadError);
    }

    this.logger.debug('Meter orchestrator initialized', {
      sampleIntervalMs: config.sampleIntervalMs,
      publishIntervalMs: config.publishIntervalMs,
      statsFilePath: config.statsFilePath,
    });
  }

  /**
   * Starts connectivity observation and sampling, and resolves the external IP
   * when configured to
   */
  start(): boolean {
    if (this.isStarted) {
      this.logger.warn('Meter already started');
      return true;
    }

    this.observer?.start();
    if (!this.engine.start(this.config.sampleIntervalMs, this.config.publishIntervalMs)) {
      this.observer?.stop();
      return false;
    }

    this.isStarted = true;
    this.startTime = this.options.now();
    this.emitSystemEvent({
      type: 'system',
      subtype: 'started',
      severity: 'info',
      message: 'Bandwidth meter started',
      source: 'orchestrator',
      data: { ...this.engine.getIntervals() },
    });

    if (this.config.externalIP.resolveOnStart) {
      this.resolveExternalIP().catch((error: unknown) => {
        this.logger.error('External IP lookup failed unexpectedly', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }

    return true;
  }

  /**
   * Stops sampling and observation and cancels a pending external IP lookup
   */
  stop(): void {
    if (!this.isStarted) {
      return;
    }

    this.engine.stop();
    this.observer?.stop();
    this.resolver.cancel();
    this.isStarted = false;
    this.startTime = undefined;

    this.emitSystemEvent({
      type: 'system',
      subtype: 'stopped',
      severity: 'info',
      message: 'Bandwidth meter stopped',
      source: 'orchestrator',
      data: {},
    });
  }

  restart(): boolean {
    if (!this.isStarted) {
      return this.start();
    }
    return this.engine.restart();
  }

  /**
   * Changes both intervals; invalid values leave the current schedule running
   */
  setIntervals(sampleIntervalMs: number, publishIntervalMs: number): boolean {
    if (!this.isStarted) {
      return this.updateIntervals(sampleIntervalMs, publishIntervalMs);
    }
    if (!this.engine.setIntervals(sampleIntervalMs, publishIntervalMs)) {
      return false;
    }
    this.config = { ...this.config, sampleIntervalMs, publishIntervalMs };
    return true;
  }

  /**
   * Clears session peaks and speeds; stored days are kept
   */
  resetStatistics(): void {
    this.engine.resetStatistics();
  }

  /**
   * Clears every stored day
   */
  resetAllHistory(): void {
    this.store.resetAll();
  }

  /**
   * Looks up the external IP and publishes the result
   */
  async resolveExternalIP(): Promise<ExternalIPResolution> {
    const resolution = await this.resolver.resolve();

    switch (resolution.outcome) {
      case 'resolved':
        this.engine.setExternalIPAddress(resolution.address);
        this.emitSystemEvent({
          type: 'external_ip',
          subtype: 'resolved',
          severity: 'info',
          message: `External IP resolved via ${resolution.service}`,
          source: 'external-ip',
          data: { service: resolution.service, attempts: resolution.attempts },
        });
        break;
      case 'failed':
        this.engine.setExternalIPAddress(UNAVAILABLE_ADDRESS);
        this.engine.reportError(resolution.error);
        this.emitSystemEvent({
          type: 'external_ip',
          subtype: 'failed',
          severity: 'warning',
          message: resolution.error.message,
          source: 'external-ip',
          data: { failures: resolution.error.failures },
        });
        break;
      case 'cancelled':
        break;
    }

    return resolution;
  }

  getMetrics(): PublishedMetrics {
    return this.engine.getMetrics();
  }

  getLiveTotals(): LiveTotals {
    return this.engine.getLiveTotals();
  }

  getTodayStats(): DailyStats {
    return this.store.getToday(this.options.now());
  }

  getLastNDays(n: number): DailyStats[] {
    return this.store.lastNDays(n, this.options.now());
  }

  getConfiguration(): MeterConfiguration {
    return this.config;
  }

  getStatus(): MeterStatus {
    const metrics = this.engine.getMetrics();
    const intervals = this.engine.getIntervals();
    return {
      running: this.engine.isRunning(),
      status: metrics.status,
      sampleIntervalMs: intervals.sampleIntervalMs,
      publishIntervalMs: intervals.publishIntervalMs,
      observingConnectivity: this.observer?.isObserving() ?? false,
      resolvingExternalIP: this.resolver.isResolving(),
      statsFilePath: this.store.filePath,
      lastError: metrics.lastError,
      eventCount: this.eventHistory.length,
      uptime: this.startTime ? this.options.now().getTime() - this.startTime.getTime() : 0,
    };
  }

  /**
   * Gets the most recent events, newest last
   */
  getRecentEvents(limit: number = 50): MeterSystemEvent[] {
    return this.eventHistory.slice(-limit);
  }

  private updateIntervals(sampleIntervalMs: number, publishIntervalMs: number): boolean {
    if (!areValidIntervals(sampleIntervalMs, publishIntervalMs)) {
      this.logger.warn('Rejected monitoring intervals', { sampleIntervalMs, publishIntervalMs });
      return false;
    }
    this.config = { ...this.config, sampleIntervalMs, publishIntervalMs };
    return true;
  }

  private wireComponents(): void {
    this.engine.on('metrics', (metrics: PublishedMetrics) => {
      this.emit('metrics', metrics);
    });

    this.engine.on('statusChanged', ({ previous, current }: { previous: NetworkStatus; current: NetworkStatus }) => {
      this.emitSystemEvent({
        type: 'connectivity',
        subtype: 'status_changed',
        severity: current.state === 'error' ? 'warning' : 'info',
        message: `Network status ${previous.state} -> ${current.state}`,
        source: 'engine',
        data: { previous, current },
      });
    });

    this.engine.on('meterError', (info: MeterErrorInfo) => {
      this.emitSystemEvent({
        type: 'monitoring',
        subtype: info.code,
        severity: 'warning',
        message: info.message,
        source: 'engine',
        data: { code: info.code },
      });
    });

    this.engine.on('statisticsReset', () => {
      this.emitSystemEvent({
        type: 'monitoring',
        subtype: 'statistics_reset',
        severity: 'info',
        message: 'Session statistics reset',
        source: 'engine',
        data: {},
      });
    });

    this.store.on('persistenceError', (error: PersistenceError) => {
      this.engine.reportError(error);
      if (error.message === this.lastPersistenceMessage) {
        return;
      }
      this.lastPersistenceMessage = error.message;
      this.emitSystemEvent({
        type: 'persistence',
        subtype: `${error.operation}_failed`,
        severity: 'warning',
        message: error.message,
        source: 'daily-stats',
        data: { path: error.path },
      });
    });

    this.store.on('statsReset', ({ removedDays }: { removedDays: number }) => {
      this.engine.refreshTodayTotals();
      this.emitSystemEvent({
        type: 'persistence',
        subtype: 'history_cleared',
        severity: 'info',
        message: `Cleared ${removedDays} days of statistics`,
        source: 'daily-stats',
        data: { removedDays },
      });
    });

    this.observer?.on('pathUpdate', (path: PathStatus) => {
      this.engine.handlePathUpdate(path);
    });
  }

  private emitSystemEvent(eventData: Omit<MeterSystemEvent, 'id' | 'timestamp'>): void {
    const timestamp = this.options.now();
    const event: MeterSystemEvent = {
      id: `${timestamp.getTime()}-${++this.eventCounter}`,
      timestamp,
      ...eventData,
    };

    this.eventHistory.push(event);
    if (this.eventHistory.length > this.options.maxEventHistory) {
      this.eventHistory = this.eventHistory.slice(-this.options.maxEventHistory);
    }

    if (this.options.logAllEvents || event.severity !== 'info') {
      this.logger.info('System event', {
        id: event.id,
        type: event.type,
        subtype: event.subtype,
        severity: event.severity,
        message: event.message,
      });
    }

    this.emit('systemEvent', event);
  }
}
