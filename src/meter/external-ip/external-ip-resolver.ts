/**
 * External IP Resolver Implementation
 *
 * Looks up the host's public address from an ordered list of services with
 * different response formats. Services are tried one after another, never
 * raced; the first valid address wins. At most one lookup is in flight: a
 * new resolve() aborts the previous one.
 */

import { isIP } from 'node:net';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ExternalIPFetchFailedError } from '../errors.js';
import type { ExternalIPResponseFormat, ExternalIPService } from '../types/meter-configuration.js';

export const UNAVAILABLE_ADDRESS = 'Unavailable';

export const DEFAULT_EXTERNAL_IP_SERVICES: readonly ExternalIPService[] = [
  { name: 'ipify', url: 'https://api.ipify.org', format: { kind: 'text' } },
  { name: 'ipinfo', url: 'https://ipinfo.io/json', format: { kind: 'json', field: 'ip' } },
  { name: 'httpbin', url: 'https://httpbin.org/ip', format: { kind: 'json', field: 'origin' } },
];

export type ExternalIPResolution =
  | { outcome: 'resolved'; address: string; service: string; attempts: number }
  | { outcome: 'failed'; address: typeof UNAVAILABLE_ADDRESS; error: ExternalIPFetchFailedError; attempts: number }
  | { outcome: 'cancelled'; attempts: number };

export type FetchFunction = (url: URL, init: RequestInit) => Promise<Response>;

export interface ExternalIPResolverOptions {
  services: readonly ExternalIPService[];
  /** Per-service request timeout (default: 5000ms) */
  timeoutMs: number;
  fetch: FetchFunction;
}

/**
 * Extracts the address from a response body in the given format
 */
export function parseAddress(body: string, format: ExternalIPResponseFormat): string {
  if (format.kind === 'text') {
    return body.trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new Error('Unparseable JSON response');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Expected a JSON object');
  }

  const value: unknown = Object.entries(parsed).find(([key]) => key === format.field)?.[1];
  if (typeof value !== 'string') {
    throw new Error(`Missing field "${format.field}"`);
  }
  // httpbin lists proxies after the client address
  return value.split(',')[0].trim();
}

export class ExternalIPResolver {
  private readonly options: ExternalIPResolverOptions;
  private readonly logger = createSubsystemLogger('meter/external-ip');
  private inFlight?: AbortController;

  constructor(options: Partial<ExternalIPResolverOptions> = {}) {
    this.options = {
      services: DEFAULT_EXTERNAL_IP_SERVICES,
      timeoutMs: 5000,
      fetch: (url, init) => fetch(url, init),
      ...options,
    };
  }

  isResolving(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Aborts the lookup in flight, if any
   */
  cancel(): boolean {
    if (!this.inFlight) {
      return false;
    }
    this.inFlight.abort();
    this.inFlight = undefined;
    this.logger.debug('External IP lookup cancelled');
    return true;
  }

  /**
   * Tries each service in order until one returns a valid address
   */
  async resolve(): Promise<ExternalIPResolution> {
    this.cancel();
    const controller = new AbortController();
    this.inFlight = controller;

    const failures: Array<{ service: string; reason: string }> = [];
    let attempts = 0;

    try {
      for (const service of this.options.services) {
        if (controller.signal.aborted) {
          return { outcome: 'cancelled', attempts };
        }

        attempts++;
        try {
          const address = await this.query(service, controller.signal);
          if (controller.signal.aborted) {
            return { outcome: 'cancelled', attempts };
          }
          this.logger.info(`External IP resolved via ${service.name}`, { attempts });
          return { outcome: 'resolved', address, service: service.name, attempts };
        } catch (error) {
          if (controller.signal.aborted) {
            return { outcome: 'cancelled', attempts };
          }
          const reason = error instanceof Error ? error.message : String(error);
          failures.push({ service: service.name, reason });
          this.logger.debug(`External IP service ${service.name} failed`, { error: reason });
        }
      }

      const error = new ExternalIPFetchFailedError(failures);
      this.logger.warn(error.message, { failures });
      return { outcome: 'failed', address: UNAVAILABLE_ADDRESS, error, attempts };
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = undefined;
      }
    }
  }

  private async query(service: ExternalIPService, lookupSignal: AbortSignal): Promise<string> {
    let url: URL;
    try {
      url = new URL(service.url);
    } catch {
      throw new Error(`Invalid URL: ${service.url}`);
    }

    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const abort = () => controller.abort();
    lookupSignal.addEventListener('abort', abort, { once: true });
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.options.fetch(url, {
        method: 'GET',
        signal: controller.signal,
        headers: { Accept: service.format.kind === 'json' ? 'application/json' : 'text/plain' },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }

      const body = await response.text();
      if (!body.trim()) {
        throw new Error('Empty response body');
      }

      const address = parseAddress(body, service.format);
      if (isIP(address) === 0) {
        throw new Error(`Not an IP address: ${address.slice(0, 64)}`);
      }
      return address;
    } catch (error) {
      if (controller.signal.aborted && !lookupSignal.aborted) {
        throw new Error(`Timed out after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      lookupSignal.removeEventListener('abort', abort);
    }
  }
}
