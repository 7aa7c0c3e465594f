/**
 * Subsystem Logging
 *
 * Named loggers for each meter component, backed by tslog. All loggers share
 * one minimum level, read from BANDWIDTH_METER_LOG_LEVEL at startup and
 * adjustable at runtime with setLogLevel().
 */

import { Logger, type ILogObj } from 'tslog';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export interface SubsystemLogger {
  readonly subsystem: string;
  trace(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  fatal(message: string, meta?: unknown): void;
  child(name: string): SubsystemLogger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_IDS, value);
}

const envLevel = process.env.BANDWIDTH_METER_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

// Filtering happens in the wrapper so a level change reaches existing sub-loggers.
const rootLogger = new Logger<ILogObj>({
  name: 'bandwidth-meter',
  type: 'pretty',
  minLevel: 0,
  hideLogPositionForProduction: true,
});

/**
 * Sets the minimum level for every subsystem logger
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVEL_IDS[level] >= LOG_LEVEL_IDS[currentLevel];
}

function wrap(subsystem: string, logger: Logger<ILogObj>): SubsystemLogger {
  const write = (level: LogLevel, message: string, meta: unknown): void => {
    if (!enabled(level)) {
      return;
    }
    if (meta === undefined) {
      logger[level](message);
    } else {
      logger[level](message, meta);
    }
  };

  return {
    subsystem,
    trace: (message, meta) => write('trace', message, meta),
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    fatal: (message, meta) => write('fatal', message, meta),
    child: (name) => {
      const childSubsystem = `${subsystem}/${name}`;
      return wrap(childSubsystem, logger.getSubLogger({ name: childSubsystem }));
    },
  };
}

/**
 * Creates a logger tagged with the given subsystem name, e.g. 'meter/engine'
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(subsystem, rootLogger.getSubLogger({ name: subsystem }));
}
