/**
 * Daily Stats Store Component
 *
 * Per-day usage totals with JSON file persistence.
 */

export * from './daily-stats-store.js';
