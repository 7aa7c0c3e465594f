/**
 * Interface Reader Component
 *
 * Reads network interface counters and selects the primary interface.
 */

export * from './interface-reader.js';
