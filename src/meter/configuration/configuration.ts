/**
 * Bandwidth Meter Configuration
 *
 * Defaults, the JSON settings file and environment overrides, merged in that
 * order. Invalid settings are reported and replaced by their default key by key.
 */

import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { createSubsystemLogger, isLogLevel } from '../../logging/subsystem.js';
import { DEFAULT_EXCLUDED_INTERFACE_PREFIXES } from '../interface-reader/index.js';
import { DEFAULT_EXTERNAL_IP_SERVICES } from '../external-ip/index.js';
import type { ExternalIPService, MeterConfiguration } from '../types/meter-configuration.js';

const logger = createSubsystemLogger('meter/configuration');

export const APP_DIRECTORY_NAME = 'bandwidth-meter';

export type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isService(value: unknown): value is ExternalIPService {
  if (!isRecord(value) || typeof value.name !== 'string' || typeof value.url !== 'string') {
    return false;
  }
  const format = value.format;
  if (!isRecord(format)) return false;
  return format.kind === 'text' || (format.kind === 'json' && typeof format.field === 'string' && format.field !== '');
}

/**
 * Location of the daily statistics file under the XDG data directory
 */
export function defaultStatsFilePath(env: Environment = process.env, home: string = homedir()): string {
  const dataHome = env.XDG_DATA_HOME || join(home, '.local', 'share');
  return join(dataHome, APP_DIRECTORY_NAME, 'daily-stats.json');
}

/**
 * Location of the settings file under the XDG config directory
 */
export function defaultSettingsPath(env: Environment = process.env, home: string = homedir()): string {
  const configHome = env.XDG_CONFIG_HOME || join(home, '.config');
  return join(configHome, APP_DIRECTORY_NAME, 'settings.json');
}

export function createDefaultMeterConfiguration(env: Environment = process.env): MeterConfiguration {
  return {
    sampleIntervalMs: 500,
    publishIntervalMs: 1000,
    interfaceCacheTtlMs: 5000,
    connectivityPollMs: 2000,
    statsFilePath: defaultStatsFilePath(env),
    excludedInterfacePrefixes: [...DEFAULT_EXCLUDED_INTERFACE_PREFIXES],
    externalIP: {
      resolveOnStart: true,
      timeoutMs: 5000,
      services: DEFAULT_EXTERNAL_IP_SERVICES.map((service) => ({ ...service })),
    },
    logLevel: 'info',
  };
}

export const DEFAULT_METER_CONFIG: MeterConfiguration = createDefaultMeterConfiguration();

/**
 * Validates a configuration for consistency
 */
export function validateMeterConfiguration(config: MeterConfiguration): string[] {
  const errors: string[] = [];

  if (!isPositiveNumber(config.sampleIntervalMs)) {
    errors.push('sampleIntervalMs must be a positive number');
  }
  if (!isPositiveNumber(config.publishIntervalMs)) {
    errors.push('publishIntervalMs must be a positive number');
  }
  if (
    isPositiveNumber(config.sampleIntervalMs) &&
    isPositiveNumber(config.publishIntervalMs) &&
    config.sampleIntervalMs > config.publishIntervalMs
  ) {
    errors.push('sampleIntervalMs should not exceed publishIntervalMs');
  }
  if (!isPositiveNumber(config.interfaceCacheTtlMs)) {
    errors.push('interfaceCacheTtlMs must be a positive number');
  }
  if (!isPositiveNumber(config.connectivityPollMs)) {
    errors.push('connectivityPollMs must be a positive number');
  }
  if (config.statsFilePath.trim() === '') {
    errors.push('statsFilePath must not be empty');
  }
  if (!isPositiveNumber(config.externalIP.timeoutMs)) {
    errors.push('externalIP.timeoutMs must be a positive number');
  }
  if (config.externalIP.services.length === 0) {
    errors.push('At least one external IP service must be configured');
  }

  const names = config.externalIP.services.map((service) => service.name);
  const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
  if (duplicates.length > 0) {
    errors.push(`External IP service names must be unique: ${[...new Set(duplicates)].join(', ')}`);
  }

  return errors;
}

/**
 * Applies a parsed settings object over a base configuration
 */
export function applySettings(
  base: MeterConfiguration,
  settings: unknown,
  warnings: string[] = [],
): MeterConfiguration {
  if (!isRecord(settings)) {
    warnings.push('Settings must be a JSON object; using defaults');
    return base;
  }

  const config: MeterConfiguration = {
    ...base,
    excludedInterfacePrefixes: [...base.excludedInterfacePrefixes],
    externalIP: { ...base.externalIP, services: [...base.externalIP.services] },
  };

  const positive = (key: 'sampleIntervalMs' | 'publishIntervalMs' | 'interfaceCacheTtlMs' | 'connectivityPollMs') => {
    const value = settings[key];
    if (value === undefined) return;
    if (isPositiveNumber(value)) {
      config[key] = value;
    } else {
      warnings.push(`Ignoring ${key}: expected a positive number`);
    }
  };
  positive('sampleIntervalMs');
  positive('publishIntervalMs');
  positive('interfaceCacheTtlMs');
  positive('connectivityPollMs');

  if (settings.statsFilePath !== undefined) {
    if (typeof settings.statsFilePath === 'string' && settings.statsFilePath.trim() !== '') {
      config.statsFilePath = settings.statsFilePath;
    } else {
      warnings.push('Ignoring statsFilePath: expected a non-empty string');
    }
  }

  const prefixes = settings.excludedInterfacePrefixes;
  if (prefixes !== undefined) {
    if (Array.isArray(prefixes) && prefixes.every((prefix) => typeof prefix === 'string' && prefix !== '')) {
      config.excludedInterfacePrefixes = prefixes.filter((prefix): prefix is string => typeof prefix === 'string');
    } else {
      warnings.push('Ignoring excludedInterfacePrefixes: expected a list of non-empty strings');
    }
  }

  if (settings.logLevel !== undefined) {
    if (isLogLevel(settings.logLevel)) {
      config.logLevel = settings.logLevel;
    } else {
      warnings.push('Ignoring logLevel: expected one of trace, debug, info, warn, error, fatal');
    }
  }

  const externalIP = settings.externalIP;
  if (externalIP !== undefined) {
    if (!isRecord(externalIP)) {
      warnings.push('Ignoring externalIP: expected an object');
    } else {
      if (externalIP.resolveOnStart !== undefined) {
        if (typeof externalIP.resolveOnStart === 'boolean') {
          config.externalIP.resolveOnStart = externalIP.resolveOnStart;
        } else {
          warnings.push('Ignoring externalIP.resolveOnStart: expected a boolean');
        }
      }
      if (externalIP.timeoutMs !== undefined) {
        if (isPositiveNumber(externalIP.timeoutMs)) {
          config.externalIP.timeoutMs = externalIP.timeoutMs;
        } else {
          warnings.push('Ignoring externalIP.timeoutMs: expected a positive number');
        }
      }
      const services = externalIP.services;
      if (services !== undefined) {
        if (Array.isArray(services) && services.length > 0 && services.every(isService)) {
          config.externalIP.services = services.filter(isService);
        } else {
          warnings.push('Ignoring externalIP.services: expected a non-empty list of services');
        }
      }
    }
  }

  return config;
}

function parsePositiveEnv(env: Environment, name: string, warnings: string[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!isPositiveNumber(value)) {
    warnings.push(`Ignoring ${name}: expected a positive number, got "${raw}"`);
    return undefined;
  }
  return value;
}

/**
 * Applies BANDWIDTH_METER_* environment overrides
 */
export function applyEnvironment(
  base: MeterConfiguration,
  env: Environment,
  warnings: string[] = [],
): MeterConfiguration {
  const config = { ...base };

  const sample = parsePositiveEnv(env, 'BANDWIDTH_METER_SAMPLE_INTERVAL_MS', warnings);
  if (sample !== undefined) config.sampleIntervalMs = sample;

  const publish = parsePositiveEnv(env, 'BANDWIDTH_METER_PUBLISH_INTERVAL_MS', warnings);
  if (publish !== undefined) config.publishIntervalMs = publish;

  const statsFile = env.BANDWIDTH_METER_STATS_FILE;
  if (statsFile !== undefined && statsFile.trim() !== '') config.statsFilePath = statsFile;

  const logLevel = env.BANDWIDTH_METER_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== '') {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      warnings.push(`Ignoring BANDWIDTH_METER_LOG_LEVEL: unknown level "${logLevel}"`);
    }
  }

  return config;
}

export interface LoadConfigurationOptions {
  /** Settings file (default: BANDWIDTH_METER_SETTINGS or the XDG config location) */
  settingsPath?: string;
  env?: Environment;
}

export interface LoadedConfiguration {
  config: MeterConfiguration;
  /** Settings that were ignored, and why */
  warnings: string[];
  settingsPath: string;
}

/**
 * Builds the effective configuration: defaults < settings file < environment
 */
export function loadMeterConfiguration(options: LoadConfigurationOptions = {}): LoadedConfiguration {
  const env = options.env ?? process.env;
  const settingsPath = options.settingsPath ?? env.BANDWIDTH_METER_SETTINGS ?? defaultSettingsPath(env);
  const warnings: string[] = [];

  let config = createDefaultMeterConfiguration(env);

  if (existsSync(settingsPath)) {
    try {
      config = applySettings(config, JSON.parse(readFileSync(settingsPath, 'utf8')), warnings);
    } catch (error) {
      warnings.push(
        `Failed to read settings from ${settingsPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  } else {
    logger.debug('No settings file, using defaults', { path: settingsPath });
  }

  config = applyEnvironment(config, env, warnings);

  const errors = validateMeterConfiguration(config);
  if (errors.length > 0) {
    // Key-level checks passed but the combination is inconsistent
    warnings.push(...errors);
    if (config.sampleIntervalMs > config.publishIntervalMs) {
      const defaults = createDefaultMeterConfiguration(env);
      config = { ...config, sampleIntervalMs: defaults.sampleIntervalMs, publishIntervalMs: defaults.publishIntervalMs };
    }
  }

  for (const warning of warnings) {
    logger.warn(warning, { path: settingsPath });
  }

  return { config, warnings, settingsPath };
}
