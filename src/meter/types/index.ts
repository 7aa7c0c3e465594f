/**
 * Bandwidth Meter - Type Definitions
 */

export * from './interface-sample.js';
export * from './published-metrics.js';
export * from './daily-stats.js';
export * from './meter-configuration.js';
