/**
 * Connectivity Observer Component
 */

export * from './connectivity-observer.js';
