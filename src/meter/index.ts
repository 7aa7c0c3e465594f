/**
 * Bandwidth Meter Entry Point
 *
 * Process-wide initialization and shutdown of the meter, plus the public
 * exports of its components.
 */

import { createSubsystemLogger } from '../logging/subsystem.js';
import { MeterOrchestrator } from './meter-orchestrator.js';
import { loadMeterConfiguration, validateMeterConfiguration, type Environment } from './configuration/index.js';
import type { MeterOrchestratorOptions, MeterStatus, MeterSystemEvent } from './meter-orchestrator.js';
import type { MeterConfiguration, PublishedMetrics } from './types/index.js';

const log = createSubsystemLogger('meter/index');

// Global meter instance
let meter: MeterOrchestrator | null = null;
let removeSignalHandlers: (() => void) | null = null;

export interface InitializeMeterOptions {
  /** Applied on top of defaults, settings file and environment */
  configuration?: Partial<MeterConfiguration>;
  settingsPath?: string;
  env?: Environment;
  /** Start sampling right away (default: true) */
  autoStart?: boolean;
  /** Shut down on SIGTERM / SIGINT (default: true) */
  handleSignals?: boolean;
  orchestrator?: Partial<MeterOrchestratorOptions>;
}

/**
 * Initializes the process-wide meter. Rejects when the effective
 * configuration is invalid; calling it again returns the running meter.
 */
export async function initializeMeter(options: InitializeMeterOptions = {}): Promise<MeterOrchestrator> {
  if (meter) {
    log.warn('Bandwidth meter already initialized');
    return meter;
  }

  log.info('Initializing bandwidth meter...');

  const loaded = loadMeterConfiguration({ settingsPath: options.settingsPath, env: options.env });
  const config: MeterConfiguration = { ...loaded.config, ...options.configuration };

  const problems = validateMeterConfiguration(config);
  if (problems.length > 0) {
    throw new Error(`Invalid meter configuration: ${problems.join('; ')}`);
  }

  const orchestrator = new MeterOrchestrator(config, options.orchestrator);
  setupGlobalEventHandlers(orchestrator);

  if ((options.autoStart ?? true) && !orchestrator.start()) {
    orchestrator.removeAllListeners();
    throw new Error('Bandwidth meter failed to start');
  }

  if (options.handleSignals ?? true) {
    removeSignalHandlers = installSignalHandlers();
  }

  meter = orchestrator;
  log.info('Bandwidth meter initialized', { statsFilePath: config.statsFilePath });
  return orchestrator;
}

/**
 * Stops the meter and releases the global instance
 */
export async function shutdownMeter(): Promise<void> {
  removeSignalHandlers?.();
  removeSignalHandlers = null;

  if (!meter) {
    return;
  }

  log.info('Shutting down bandwidth meter...');
  meter.stop();
  meter.removeAllListeners();
  meter = null;
  log.info('Bandwidth meter shutdown completed');
}

export function getMeter(): MeterOrchestrator | null {
  return meter;
}

export function getMeterStatus(): MeterStatus | null {
  return meter ? meter.getStatus() : null;
}

export function getMeterMetrics(): PublishedMetrics | null {
  return meter ? meter.getMetrics() : null;
}

/**
 * Gets recent meter events, newest last
 */
export function getRecentMeterEvents(limit: number = 50): MeterSystemEvent[] {
  return meter ? meter.getRecentEvents(limit) : [];
}

export function isMeterActive(): boolean {
  return !!meter && meter.getStatus().running;
}

function setupGlobalEventHandlers(orchestrator: MeterOrchestrator): void {
  orchestrator.on('systemEvent', (event: MeterSystemEvent) => {
    if (event.severity === 'critical') {
      log.error(`Meter event [${event.type}/${event.subtype}]: ${event.message}`, {
        eventId: event.id,
        source: event.source,
        data: event.data,
      });
    }
  });

  log.debug('Global meter event handlers configured');
}

/**
 * Shuts the meter down on a termination signal, then re-raises the signal
 * so the default handler ends the process.
 */
function installSignalHandlers(): () => void {
  const handle = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, shutting down bandwidth meter...`);
    shutdownMeter()
      .catch((error: unknown) => {
        log.error('Error during bandwidth meter shutdown', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        process.kill(process.pid, signal);
      });
  };

  process.once('SIGTERM', handle);
  process.once('SIGINT', handle);

  return () => {
    process.off('SIGTERM', handle);
    process.off('SIGINT', handle);
  };
}

// Export types for external use
export type { MeterOrchestratorOptions, MeterStatus, MeterSystemEvent } from './meter-orchestrator.js';
export * from './types/index.js';

// Export individual components for advanced usage
export { MeterOrchestrator } from './meter-orchestrator.js';
export { InterfaceReader, ProcNetDevSource, parseProcNetDev } from './interface-reader/index.js';
export { counterDeltas, delta } from './delta-calculator/index.js';
export { SamplingEngine } from './sampling-engine/index.js';
export { DailyStatsStore, dayKey } from './daily-stats-store/index.js';
export { ExternalIPResolver, DEFAULT_EXTERNAL_IP_SERVICES, UNAVAILABLE_ADDRESS } from './external-ip/index.js';
export { ConnectivityObserver } from './connectivity/index.js';
export {
  DEFAULT_METER_CONFIG,
  loadMeterConfiguration,
  validateMeterConfiguration,
} from './configuration/index.js';
export { describeStatus, formatBytes, formatSpeed, formatUptime } from './format/index.js';
export * from './errors.js';
