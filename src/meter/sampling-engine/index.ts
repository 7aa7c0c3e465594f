/**
 * Sampling Engine Component
 *
 * Two-timer sampler that turns counter readings into published metrics.
 */

export * from './sampling-engine.js';
