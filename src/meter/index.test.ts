/**
 * Tests for the bandwidth meter entry point
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockedFunction } from 'vitest';
import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs';
import {
  getMeter,
  getMeterMetrics,
  getMeterStatus,
  getRecentMeterEvents,
  initializeMeter,
  isMeterActive,
  shutdownMeter,
  type InitializeMeterOptions,
} from './index.js';
import type { PrimaryInterfaceSource } from './sampling-engine/index.js';
import { installMemoryFileSystem, type MemoryFileSystem } from './test-setup.js';
import type { InterfaceSample } from './types/index.js';

vi.mock('node:fs', () => ({
  readFileSync: vi.fn(),
  writeFileSync: vi.fn(),
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  renameSync: vi.fn(),
}));

vi.mock('../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  })),
  setLogLevel: vi.fn(),
  isLogLevel: (value: unknown) =>
    typeof value === 'string' && ['trace', 'debug', 'info', 'warn', 'error', 'fatal'].includes(value),
}));

const fsMocks = {
  readFileSync: readFileSync as MockedFunction<typeof readFileSync>,
  writeFileSync: writeFileSync as MockedFunction<typeof writeFileSync>,
  existsSync: existsSync as MockedFunction<typeof existsSync>,
  mkdirSync: mkdirSync as MockedFunction<typeof mkdirSync>,
  renameSync: renameSync as MockedFunction<typeof renameSync>,
};

const ENV = { XDG_DATA_HOME: '/xdg/data', XDG_CONFIG_HOME: '/xdg/config' };

let reads = 0;

// Every read sees 500 more bytes sent and 1000 more received
const reader: PrimaryInterfaceSource = {
  primaryInterface: (): InterfaceSample => {
    reads++;
    return {
      name: 'eth0',
      inputBytes: 1000 * reads,
      outputBytes: 500 * reads,
      ipAddress: '192.168.1.20',
      isActive: true,
      type: 'ethernet',
      description: 'Ethernet',
    };
  },
};

function options(overrides: InitializeMeterOptions = {}): InitializeMeterOptions {
  return {
    env: ENV,
    handleSignals: false,
    configuration: {
      externalIP: {
        resolveOnStart: false,
        timeoutMs: 1000,
        services: [{ name: 'plain', url: 'https://plain.example.test/', format: { kind: 'text' } }],
      },
    },
    orchestrator: { reader, observeConnectivity: false },
    ...overrides,
  };
}

describe('Bandwidth meter entry point', () => {
  let fs: MemoryFileSystem;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval'] });
    fs = installMemoryFileSystem(fsMocks);
    reads = 0;
  });

  afterEach(async () => {
    await shutdownMeter();
    vi.useRealTimers();
  });

  it('should report nothing before initialization', () => {
    expect(getMeter()).toBeNull();
    expect(getMeterStatus()).toBeNull();
    expect(getMeterMetrics()).toBeNull();
    expect(getRecentMeterEvents()).toEqual([]);
    expect(isMeterActive()).toBe(false);
  });

  it('should start the meter with the loaded configuration', async () => {
    const meter = await initializeMeter(options());

    expect(getMeter()).toBe(meter);
    expect(isMeterActive()).toBe(true);
    expect(getMeterStatus()?.statsFilePath).toBe('/xdg/data/bandwidth-meter/daily-stats.json');
    expect(getRecentMeterEvents().map((event) => event.subtype)).toEqual(['started']);
  });

  it('should persist traffic to the configured statistics file', async () => {
    await initializeMeter(options());

    vi.advanceTimersByTime(1000);

    const saved: unknown = JSON.parse(fs.files.get('/xdg/data/bandwidth-meter/daily-stats.json') ?? '[]');
    expect(saved).toEqual([
      expect.objectContaining({ totalUploaded: 500, totalDownloaded: 1000, peakUploadSpeed: 500 }),
    ]);
    expect(getMeterMetrics()?.uploadSpeed).toBe(500);
  });

  it('should return the running meter when initialized twice', async () => {
    const first = await initializeMeter(options());
    const second = await initializeMeter(options());

    expect(second).toBe(first);
  });

  it('should leave the meter stopped without autoStart', async () => {
    const meter = await initializeMeter(options({ autoStart: false }));

    expect(meter.getStatus().running).toBe(false);
    expect(isMeterActive()).toBe(false);
  });

  it('should reject an invalid configuration', async () => {
    await expect(
      initializeMeter(options({ configuration: { sampleIntervalMs: 0 } })),
    ).rejects.toThrow('Invalid meter configuration: sampleIntervalMs must be a positive number');
    expect(getMeter()).toBeNull();
  });

  it('should stop and release the meter on shutdown', async () => {
    const meter = await initializeMeter(options());

    await shutdownMeter();

    expect(meter.getStatus().running).toBe(false);
    expect(getMeter()).toBeNull();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should install and remove signal handlers', async () => {
    const before = process.listenerCount('SIGTERM');

    await initializeMeter(options({ handleSignals: true }));
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);
    expect(process.listenerCount('SIGINT')).toBeGreaterThan(0);

    await shutdownMeter();
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});
