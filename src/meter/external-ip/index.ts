/**
 * External IP Resolver Component
 *
 * Multi-service public address lookup with fallback and cancellation.
 */

export * from './external-ip-resolver.js';
