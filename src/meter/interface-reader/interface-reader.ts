/**
 * Interface Reader Implementation
 *
 * Reads per-interface byte counters from /proc/net/dev and bound addresses
 * from os.networkInterfaces(), and selects the primary interface: the busiest
 * interface left after excluding loopback, tunnel, peer-to-peer, bridge and
 * virtual pseudo-interfaces by name prefix.
 *
 * The primary selection is cached for a short validity window to bound the
 * enumeration rate under sub-second sampling. Counters of the selected
 * interface are re-read on every call.
 */

import { readFileSync, existsSync } from 'node:fs';
import { networkInterfaces } from 'node:os';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { InterfaceAccessError, NoActiveInterfaceError } from '../errors.js';
import type {
  InterfaceAddress,
  InterfaceCounters,
  InterfaceSample,
  InterfaceType,
} from '../types/interface-sample.js';

export const DEFAULT_EXCLUDED_INTERFACE_PREFIXES: readonly string[] = [
  'lo',
  'utun',
  'tun',
  'tap',
  'wg',
  'ppp',
  'ipsec',
  'awdl',
  'llw',
  'p2p',
  'bridge',
  'br-',
  'virbr',
  'docker',
  'veth',
  'gif',
  'stf',
  'anpi',
];

/** Counters at or above 1 PB are treated as corrupt readings */
const MAX_PLAUSIBLE_BYTES = 1_000_000_000_000_000;

const PROC_NET_DEV = '/proc/net/dev';

/**
 * Source of the OS interface table
 */
export interface InterfaceTableSource {
  /** Throws when the table cannot be enumerated */
  readCounters(): InterfaceCounters[];
  readAddresses(): Record<string, InterfaceAddress[] | undefined>;
}

/**
 * Parses the Linux /proc/net/dev table. Receive bytes are the first column
 * after the interface name, transmit bytes the ninth.
 */
export function parseProcNetDev(content: string): InterfaceCounters[] {
  const counters: InterfaceCounters[] = [];

  for (const line of content.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const name = line.slice(0, separator).trim();
    const fields = line.slice(separator + 1).trim().split(/\s+/);
    if (!name || fields.length < 9) continue;

    const inputBytes = Number(fields[0]);
    const outputBytes = Number(fields[8]);
    if (!Number.isFinite(inputBytes) || !Number.isFinite(outputBytes)) continue;

    counters.push({ name, inputBytes, outputBytes });
  }

  return counters;
}

/**
 * Interface table backed by /proc/net/dev and os.networkInterfaces()
 */
export class ProcNetDevSource implements InterfaceTableSource {
  constructor(private readonly path: string = PROC_NET_DEV) {}

  readCounters(): InterfaceCounters[] {
    if (!existsSync(this.path)) {
      throw new InterfaceAccessError(`Interface table not available at ${this.path}`);
    }
    return parseProcNetDev(readFileSync(this.path, 'utf8'));
  }

  readAddresses(): Record<string, InterfaceAddress[] | undefined> {
    return networkInterfaces();
  }
}

/**
 * Classifies an interface by its OS name. macOS names are matched first,
 * then the Linux predictable-naming prefixes.
 */
export function interfaceTypeFromName(name: string): InterfaceType {
  switch (name) {
    case 'en0':
      return 'wifi';
    case 'en1':
    case 'en2':
    case 'en3':
      return 'ethernet';
    case 'en4':
      return 'thunderbolt';
    case 'en5':
      return 'usb';
  }

  if (name.startsWith('lo')) return 'loopback';
  if (/^(utun|tun|tap|wg|ppp|ipsec)/.test(name)) return 'vpn';
  if (/^(bridge|br-|virbr|docker)/.test(name)) return 'bridge';
  if (name.startsWith('wl')) return 'wifi';
  if (name.startsWith('ww')) return 'cellular';
  if (name.startsWith('eth') || name.startsWith('en')) return 'ethernet';
  return 'unknown';
}

function describeInterfaceName(name: string): string {
  switch (name) {
    case 'en0':
      return 'Wi-Fi';
    case 'en1':
      return 'Ethernet';
    case 'en2':
      return 'Ethernet 2';
    case 'en3':
      return 'Ethernet 3';
    case 'en4':
      return 'Thunderbolt Ethernet';
    case 'en5':
      return 'USB Ethernet';
  }

  if (name.startsWith('lo')) return 'Loopback';
  if (/^(eth|enp|eno|ens|enx)/.test(name)) return 'Ethernet';
  if (name.startsWith('en')) return 'Network Interface';
  if (name.startsWith('wl')) return 'Wi-Fi';
  if (name.startsWith('ww')) return 'Cellular';
  if (/^(utun|tun|wg)/.test(name)) return 'VPN Tunnel';
  if (name.startsWith('awdl')) return 'Apple Wireless Direct Link';
  if (/^(bridge|br-|virbr|docker)/.test(name)) return 'Bridge Interface';
  return name;
}

function firstIPv4(addresses: InterfaceAddress[] | undefined): string | undefined {
  const match = addresses?.find(
    (entry) => (entry.family === 'IPv4' || entry.family === 4) && !entry.internal,
  );
  return match?.address;
}

export interface InterfaceReaderOptions {
  /** Validity window of the primary selection (default: 5000ms) */
  cacheTtlMs: number;
  /** Name prefixes never chosen as primary */
  excludedPrefixes: readonly string[];
  source: InterfaceTableSource;
  /** Clock, in milliseconds */
  now: () => number;
}

export interface InterfaceSummary {
  totalInterfaces: number;
  activeInterfaces: number;
  interfaces: Array<Pick<InterfaceSample, 'name' | 'type' | 'ipAddress' | 'isActive' | 'inputBytes' | 'outputBytes'>>;
}

interface PrimarySelection {
  name: string;
  ipAddress?: string;
  expiresAt: number;
}

export class InterfaceReader {
  private readonly options: InterfaceReaderOptions;
  private readonly logger = createSubsystemLogger('meter/interfaces');
  private readonly descriptionCache = new Map<string, string>();
  private selection?: PrimarySelection;
  private lastInterfaceCount?: number;
  private lastPrimaryName?: string;
  private noInterfaceReported = false;

  constructor(options: Partial<InterfaceReaderOptions> = {}) {
    this.options = {
      cacheTtlMs: 5000,
      excludedPrefixes: DEFAULT_EXCLUDED_INTERFACE_PREFIXES,
      source: new ProcNetDevSource(),
      now: Date.now,
      ...options,
    };
  }

  /**
   * Enumerates every interface with its counters and IPv4 address
   */
  listInterfaces(): InterfaceSample[] {
    const counters = this.readCounters();
    let addresses: Record<string, InterfaceAddress[] | undefined>;
    try {
      addresses = this.options.source.readAddresses();
    } catch (error) {
      throw new InterfaceAccessError(
        `Failed to read interface addresses: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const samples = counters
      .map((entry) => this.buildSample(entry, firstIPv4(addresses[entry.name])))
      .filter((sample) => this.validateSample(sample));

    if (this.lastInterfaceCount !== samples.length) {
      this.logger.debug(`Found ${samples.length} network interfaces`);
      this.lastInterfaceCount = samples.length;
    }

    return samples;
  }

  /**
   * Returns the busiest physical interface.
   * Throws NoActiveInterfaceError when no candidate remains after exclusion.
   */
  primaryInterface(): InterfaceSample {
    const now = this.options.now();

    if (this.selection && now < this.selection.expiresAt) {
      const cached = this.selection;
      const counters = this.readCounters().find((entry) => entry.name === cached.name);
      if (counters) {
        const sample = this.buildSample(counters, cached.ipAddress);
        if (this.validateSample(sample)) {
          return sample;
        }
      }
      // Selected interface disappeared; select again
      this.selection = undefined;
    }

    const candidates = this.listInterfaces().filter((sample) => !this.isExcluded(sample.name));
    const primary = candidates.reduce<InterfaceSample | undefined>(
      (best, sample) =>
        !best || sample.inputBytes + sample.outputBytes > best.inputBytes + best.outputBytes ? sample : best,
      undefined,
    );

    if (!primary) {
      this.selection = undefined;
      if (!this.noInterfaceReported) {
        this.logger.warn('No active network interfaces found');
        this.noInterfaceReported = true;
      }
      throw new NoActiveInterfaceError();
    }

    this.noInterfaceReported = false;
    this.selection = {
      name: primary.name,
      ipAddress: primary.ipAddress,
      expiresAt: now + this.options.cacheTtlMs,
    };

    if (this.lastPrimaryName !== primary.name) {
      this.logger.info(`Selected primary interface: ${primary.name} (${primary.description})`);
      this.lastPrimaryName = primary.name;
    }

    return primary;
  }

  /**
   * Gets the display label for an interface name
   */
  describeInterface(name: string): string {
    const cached = this.descriptionCache.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const description = describeInterfaceName(name);
    this.descriptionCache.set(name, description);
    return description;
  }

  /**
   * Checks a sample for an empty name and implausible counter values
   */
  validateSample(sample: InterfaceSample): boolean {
    if (!sample.name) return false;
    if (sample.inputBytes < 0 || sample.outputBytes < 0) return false;

    if (sample.inputBytes >= MAX_PLAUSIBLE_BYTES || sample.outputBytes >= MAX_PLAUSIBLE_BYTES) {
      this.logger.warn(`Interface ${sample.name} has suspiciously large byte values`, {
        inputBytes: sample.inputBytes,
        outputBytes: sample.outputBytes,
      });
      return false;
    }

    return true;
  }

  /**
   * Gets an overview of all interfaces for diagnostics
   */
  getInterfaceSummary(): InterfaceSummary | { error: string } {
    try {
      const interfaces = this.listInterfaces();
      return {
        totalInterfaces: interfaces.length,
        activeInterfaces: interfaces.filter((sample) => sample.isActive).length,
        interfaces: interfaces.map(({ name, type, ipAddress, isActive, inputBytes, outputBytes }) => ({
          name,
          type,
          ipAddress,
          isActive,
          inputBytes,
          outputBytes,
        })),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to get interface summary', { error: message });
      return { error: message };
    }
  }

  /**
   * Drops the cached primary selection and descriptions
   */
  clearCache(): void {
    this.selection = undefined;
    this.descriptionCache.clear();
    this.logger.debug('Interface cache cleared');
  }

  private isExcluded(name: string): boolean {
    return this.options.excludedPrefixes.some((prefix) => name.startsWith(prefix));
  }

  private readCounters(): InterfaceCounters[] {
    try {
      return this.options.source.readCounters();
    } catch (error) {
      if (error instanceof InterfaceAccessError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to get network interfaces', { error: message });
      throw new InterfaceAccessError(`Failed to retrieve network interfaces: ${message}`, { cause: error });
    }
  }

  private buildSample(counters: InterfaceCounters, ipAddress: string | undefined): InterfaceSample {
    return Object.freeze({
      name: counters.name,
      inputBytes: counters.inputBytes,
      outputBytes: counters.outputBytes,
      ipAddress,
      isActive: ipAddress !== undefined,
      type: interfaceTypeFromName(counters.name),
      description: this.describeInterface(counters.name),
    });
  }
}
