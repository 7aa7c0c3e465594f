/**
 * Integration Tests for MeterOrchestrator
 *
 * Runs the real engine, store, resolver and connectivity observer against
 * in-process stand-ins for the interface table, the file system and fetch.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock, type MockedFunction } from 'vitest';
import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs';
import { MeterOrchestrator, type MeterSystemEvent } from './meter-orchestrator.js';
import { DailyStatsStore } from './daily-stats-store/index.js';
import { ExternalIPResolver } from './external-ip/index.js';
import { ConnectivityObserver } from './connectivity/index.js';
import type { PrimaryInterfaceSource } from './sampling-engine/index.js';
import { installMemoryFileSystem, type MemoryFileSystem } from './test-setup.js';
import type { InterfaceAddress, InterfaceSample, MeterConfiguration } from './types/index.js';

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
}));

const fsMocks = {
  readFileSync: readFileSync as MockedFunction<typeof readFileSync>,
  writeFileSync: writeFileSync as MockedFunction<typeof writeFileSync>,
  existsSync: existsSync as MockedFunction<typeof existsSync>,
  mkdirSync: mkdirSync as MockedFunction<typeof mkdirSync>,
  renameSync: renameSync as MockedFunction<typeof renameSync>,
};

const STATS_PATH = '/data/bandwidth-meter/daily-stats.json';

type AddressTable = Record<string, InterfaceAddress[] | undefined>;

const CONNECTED: AddressTable = {
  lo: [{ address: '127.0.0.1', family: 'IPv4', internal: true }],
  eth0: [{ address: '192.168.1.20', family: 'IPv4', internal: false }],
};

const OFFLINE: AddressTable = {
  lo: [{ address: '127.0.0.1', family: 'IPv4', internal: true }],
};

class FakeReader implements PrimaryInterfaceSource {
  sample: InterfaceSample = {
    name: 'eth0',
    inputBytes: 80_000_000,
    outputBytes: 20_000_000,
    ipAddress: '192.168.1.20',
    isActive: true,
    type: 'ethernet',
    description: 'Ethernet',
  };
  reads = 0;

  primaryInterface(): InterfaceSample {
    this.reads++;
    return this.sample;
  }

  transfer(upload: number, download: number): void {
    this.sample = {
      ...this.sample,
      inputBytes: this.sample.inputBytes + download,
      outputBytes: this.sample.outputBytes + upload,
    };
  }
}

function testConfig(overrides: Partial<MeterConfiguration> = {}): MeterConfiguration {
  return {
    sampleIntervalMs: 500,
    publishIntervalMs: 1000,
    interfaceCacheTtlMs: 5000,
    connectivityPollMs: 2000,
    statsFilePath: STATS_PATH,
    excludedInterfacePrefixes: ['lo', 'tun'],
    externalIP: {
      resolveOnStart: false,
      timeoutMs: 1000,
      services: [
        { name: 'plain', url: 'https://plain.example.test/', format: { kind: 'text' } },
        { name: 'json-ip', url: 'https://json.example.test/', format: { kind: 'json', field: 'ip' } },
      ],
    },
    logLevel: 'info',
    ...overrides,
  };
}

describe('MeterOrchestrator', () => {
  let fs: MemoryFileSystem;
  let reader: FakeReader;
  let addresses: AddressTable;
  let fetchMock: Mock<(url: URL, init: RequestInit) => Promise<Response>>;
  let clock: Date;
  let orchestrator: MeterOrchestrator;

  function createOrchestrator(config: MeterConfiguration = testConfig()): MeterOrchestrator {
    return new MeterOrchestrator(config, {
      reader,
      store: new DailyStatsStore({ filePath: config.statsFilePath }),
      resolver: new ExternalIPResolver({
        services: config.externalIP.services,
        timeoutMs: config.externalIP.timeoutMs,
        fetch: fetchMock,
      }),
      observer: new ConnectivityObserver({
        pollIntervalMs: config.connectivityPollMs,
        excludedPrefixes: config.excludedInterfacePrefixes,
        readAddresses: () => addresses,
      }),
      now: () => clock,
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval'] });
    fs = installMemoryFileSystem(fsMocks);
    reader = new FakeReader();
    addresses = CONNECTED;
    fetchMock = vi.fn<(url: URL, init: RequestInit) => Promise<Response>>();
    clock = new Date(2026, 2, 3, 12, 0, 0);
    orchestrator = createOrchestrator();
  });

  afterEach(() => {
    orchestrator.stop();
    vi.useRealTimers();
  });

  describe('lifecycle', () => {
    it('should report connecting before the first path update', () => {
      expect(orchestrator.getMetrics().status).toEqual({ state: 'connecting' });
    });

    it('should start sampling with the observed path status', () => {
      expect(orchestrator.start()).toBe(true);

      const status = orchestrator.getStatus();
      expect(status.running).toBe(true);
      expect(status.status).toEqual({ state: 'connected' });
      expect(status.observingConnectivity).toBe(true);
      expect(status.sampleIntervalMs).toBe(500);
      expect(status.publishIntervalMs).toBe(1000);
      expect(status.statsFilePath).toBe(STATS_PATH);
    });

    it('should accumulate traffic and persist it on publish', () => {
      orchestrator.start();
      vi.advanceTimersByTime(500);

      reader.transfer(3000, 12_000);
      vi.advanceTimersByTime(500);

      expect(orchestrator.getMetrics().uploadSpeed).toBe(3000);
      expect(orchestrator.getMetrics().downloadSpeed).toBe(12_000);
      expect(orchestrator.getTodayStats()).toMatchObject({ totalUploaded: 3000, totalDownloaded: 12_000 });
      expect(JSON.parse(fs.files.get(STATS_PATH) ?? '[]')).toHaveLength(1);
    });

    it('should forward snapshots as metrics events', () => {
      const metricsSpy = vi.fn();
      orchestrator.on('metrics', metricsSpy);

      orchestrator.start();

      expect(metricsSpy).toHaveBeenCalled();
      expect(metricsSpy.mock.calls.at(-1)?.[0]).toBe(orchestrator.getMetrics());
    });

    it('should stop every timer on stop', () => {
      orchestrator.start();

      orchestrator.stop();

      expect(orchestrator.getStatus().running).toBe(false);
      expect(orchestrator.getStatus().observingConnectivity).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
      expect(orchestrator.getRecentEvents().map((event) => event.subtype)).toContain('stopped');
    });

    it('should refuse to start with invalid intervals', () => {
      const broken = createOrchestrator(testConfig({ sampleIntervalMs: 0 }));

      expect(broken.start()).toBe(false);
      expect(broken.getStatus().running).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should restart a stopped meter', () => {
      orchestrator.start();
      orchestrator.stop();

      expect(orchestrator.restart()).toBe(true);
      expect(orchestrator.getStatus().running).toBe(true);
    });
  });

  describe('connectivity', () => {
    it('should suspend sampling when the path goes away', () => {
      orchestrator.start();
      vi.advanceTimersByTime(500);
      const reads = reader.reads;

      addresses = OFFLINE;
      vi.advanceTimersByTime(2000);
      const readsAfterPoll = reader.reads;
      vi.advanceTimersByTime(3000);

      expect(orchestrator.getMetrics().status).toEqual({ state: 'disconnected' });
      expect(readsAfterPoll).toBeGreaterThan(reads);
      expect(reader.reads).toBe(readsAfterPoll);
    });

    it('should record status changes as events', () => {
      orchestrator.start();
      addresses = OFFLINE;
      vi.advanceTimersByTime(2000);

      const messages = orchestrator.getRecentEvents().map((event) => event.message);
      expect(messages).toContain('Network status connecting -> connected');
      expect(messages).toContain('Network status connected -> disconnected');
    });
  });

  describe('setIntervals', () => {
    it('should apply valid intervals to the running engine', () => {
      orchestrator.start();

      expect(orchestrator.setIntervals(250, 2000)).toBe(true);

      expect(orchestrator.getStatus().sampleIntervalMs).toBe(250);
      expect(orchestrator.getConfiguration().publishIntervalMs).toBe(2000);
    });

    it('should reject invalid intervals and keep the schedule', () => {
      orchestrator.start();

      expect(orchestrator.setIntervals(-1, 1000)).toBe(false);

      expect(orchestrator.getStatus().sampleIntervalMs).toBe(500);
      expect(orchestrator.getStatus().running).toBe(true);
    });

    it('should reject a sampler slower than the publisher', () => {
      orchestrator.start();

      expect(orchestrator.setIntervals(2000, 1000)).toBe(false);
      orchestrator.stop();
      expect(orchestrator.setIntervals(2000, 1000)).toBe(false);

      expect(orchestrator.getConfiguration().sampleIntervalMs).toBe(500);
      expect(orchestrator.getConfiguration().publishIntervalMs).toBe(1000);
    });

    it('should store intervals for the next start while stopped', () => {
      expect(orchestrator.setIntervals(100, 400)).toBe(true);

      orchestrator.start();

      expect(orchestrator.getStatus().sampleIntervalMs).toBe(100);
      expect(orchestrator.getStatus().publishIntervalMs).toBe(400);
    });
  });

  describe('resolveExternalIP', () => {
    it('should publish the resolved address', async () => {
      fetchMock.mockResolvedValueOnce(new Response('203.0.113.50'));

      const resolution = await orchestrator.resolveExternalIP();

      expect(resolution.outcome).toBe('resolved');
      expect(orchestrator.getMetrics().externalIPAddress).toBe('203.0.113.50');
    });

    it('should publish Unavailable and the error when every service fails', async () => {
      fetchMock.mockRejectedValue(new Error('offline'));

      await orchestrator.resolveExternalIP();

      const metrics = orchestrator.getMetrics();
      expect(metrics.externalIPAddress).toBe('Unavailable');
      expect(metrics.lastError?.code).toBe('external_ip_fetch_failed');
      expect(metrics.lastError?.message).toBe('External IP lookup failed on all 2 services');
      expect(orchestrator.getRecentEvents().at(-1)).toMatchObject({ type: 'external_ip', subtype: 'failed' });
    });

    it('should resolve on start when configured to', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"ip":"198.51.100.8"}'));
      fetchMock.mockResolvedValueOnce(new Response('{"ip":"198.51.100.8"}'));
      const eager = createOrchestrator(
        testConfig({ externalIP: { ...testConfig().externalIP, resolveOnStart: true } }),
      );

      eager.start();

      await vi.waitFor(() => {
        expect(eager.getMetrics().externalIPAddress).toBe('198.51.100.8');
      });
      eager.stop();
    });
  });

  describe('statistics', () => {
    it('should return zero-filled recent days', () => {
      const days = orchestrator.getLastNDays(3);

      expect(days.map((day) => day.date)).toEqual(['2026-03-03', '2026-03-02', '2026-03-01']);
    });

    it('should clear history on resetAllHistory', () => {
      orchestrator.start();
      vi.advanceTimersByTime(500);
      reader.transfer(100, 100);
      vi.advanceTimersByTime(500);

      orchestrator.resetAllHistory();

      expect(orchestrator.getTodayStats().totalUploaded).toBe(0);
      expect(orchestrator.getRecentEvents().at(-1)).toMatchObject({
        type: 'persistence',
        subtype: 'history_cleared',
        message: 'Cleared 1 days of statistics',
      });
    });

    it('should republish totals for today when history is cleared while stopped', () => {
      orchestrator.start();
      vi.advanceTimersByTime(500);
      reader.transfer(800, 800);
      vi.advanceTimersByTime(500);
      expect(orchestrator.getMetrics().totalUploadedToday).toBe(800);
      orchestrator.stop();

      orchestrator.resetAllHistory();

      expect(orchestrator.getMetrics().totalUploadedToday).toBe(0);
      expect(orchestrator.getMetrics().totalDownloadedToday).toBe(0);
      expect(orchestrator.getLiveTotals()).toEqual({ uploaded: 0, downloaded: 0 });
    });

    it('should reset session peaks and keep the stored day', () => {
      orchestrator.start();
      vi.advanceTimersByTime(500);
      reader.transfer(800, 800);
      vi.advanceTimersByTime(500);

      orchestrator.resetStatistics();

      expect(orchestrator.getMetrics().peakUploadSpeed).toBe(0);
      expect(orchestrator.getTodayStats().totalUploaded).toBe(800);
    });
  });

  describe('persistence failures', () => {
    it('should surface save failures as lastError once per distinct failure', () => {
      const events: MeterSystemEvent[] = [];
      orchestrator.on('systemEvent', (event: MeterSystemEvent) => events.push(event));
      orchestrator.start();
      vi.advanceTimersByTime(500);
      fs.writeFailure = new Error('EROFS: read-only file system');

      reader.transfer(10, 10);
      vi.advanceTimersByTime(500);
      reader.transfer(10, 10);
      vi.advanceTimersByTime(1000);

      expect(orchestrator.getMetrics().lastError?.code).toBe('persistence');
      expect(events.filter((event) => event.type === 'persistence')).toHaveLength(1);
    });

    it('should report a corrupt statistics file at startup', () => {
      fs.files.set(STATS_PATH, 'not json');

      const recovered = createOrchestrator();

      expect(recovered.getMetrics().lastError?.code).toBe('persistence');
      expect(recovered.getTodayStats().totalUploaded).toBe(0);
    });
  });

  describe('event history', () => {
    it('should keep only the configured number of events', () => {
      const bounded = new MeterOrchestrator(testConfig(), {
        observeConnectivity: false,
        maxEventHistory: 3,
        reader,
        store: new DailyStatsStore({ filePath: STATS_PATH }),
        now: () => clock,
      });

      for (let i = 0; i < 3; i++) {
        bounded.start();
        bounded.stop();
      }

      expect(bounded.getRecentEvents()).toHaveLength(3);
      expect(bounded.getStatus().eventCount).toBe(3);
      expect(bounded.getRecentEvents(2).map((event) => event.subtype)).toEqual(['started', 'stopped']);
    });
  });
});
