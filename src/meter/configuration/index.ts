/**
 * Bandwidth Meter Configuration
 */

export * from './configuration.js';
