/**
 * InterfaceSample
 *
 * Snapshot of one network interface at one instant. Built fresh on every
 * read and never mutated afterwards.
 */

export type InterfaceType =
  | 'wifi'
  | 'ethernet'
  | 'cellular'
  | 'thunderbolt'
  | 'usb'
  | 'vpn'
  | 'loopback'
  | 'bridge'
  | 'unknown';

export interface InterfaceSample {
  /** OS interface name, e.g. en0 or wlp2s0 */
  readonly name: string;
  /** Received byte counter as reported by the OS */
  readonly inputBytes: number;
  /** Transmitted byte counter as reported by the OS */
  readonly outputBytes: number;
  /** First IPv4 address bound to the interface */
  readonly ipAddress?: string;
  /** True when an IPv4 address is bound */
  readonly isActive: boolean;
  readonly type: InterfaceType;
  /** Human label, e.g. "Wi-Fi" */
  readonly description: string;
}

/** Raw per-interface counters as read from the interface table */
export interface InterfaceCounters {
  name: string;
  inputBytes: number;
  outputBytes: number;
}

/** Address entry in the shape returned by os.networkInterfaces() */
export interface InterfaceAddress {
  address: string;
  family: string | number;
  internal: boolean;
}
