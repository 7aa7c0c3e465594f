/**
 * Property-Based Testing Setup for the bandwidth meter
 *
 * Shared fast-check generators and helpers for the meter components.
 */

import * as fc from 'fast-check';
import type { MockedFunction } from 'vitest';
import type { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs';
import type { DailyStats, InterfaceCounters } from './types/index.js';

const dayKeyFromDate = (date: Date): string => {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
};

/** Local calendar days between 2020 and 2030 as YYYY-MM-DD */
export const dayKeyArbitrary: fc.Arbitrary<string> = fc
  .integer({ min: 0, max: 3650 })
  .map((offset) => dayKeyFromDate(new Date(2020, 0, 1 + offset)));

export const dailyStatsArbitrary: fc.Arbitrary<DailyStats> = fc.record({
  date: dayKeyArbitrary,
  totalUploaded: fc.integer({ min: 0, max: 2 ** 40 }),
  totalDownloaded: fc.integer({ min: 0, max: 2 ** 40 }),
  peakUploadSpeed: fc.double({ min: 0, max: 1e9, noNaN: true }),
  peakDownloadSpeed: fc.double({ min: 0, max: 1e9, noNaN: true }),
});

/** Per-tick counter increments for one interface */
export const trafficStepArbitrary = fc.record({
  upload: fc.integer({ min: 0, max: 50 * 1024 * 1024 }),
  download: fc.integer({ min: 0, max: 200 * 1024 * 1024 }),
});

/** Raw counter readings of a busy interface */
export const interfaceCountersArbitrary: fc.Arbitrary<InterfaceCounters> = fc.record({
  name: fc.constantFrom('eth0', 'wlp2s0', 'en0', 'enp3s0'),
  inputBytes: fc.integer({ min: 0, max: 2 ** 48 }),
  outputBytes: fc.integer({ min: 0, max: 2 ** 48 }),
});

/**
 * Checks that a sequence of values never decreases
 */
export function isNonDecreasing(values: readonly number[]): boolean {
  return values.every((value, index) => index === 0 || value >= values[index - 1]);
}

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 30,
  timeout: 5000,
  verbose: false,
};

/**
 * In-memory stand-in for the node:fs calls made by DailyStatsStore.
 * Test files mock 'node:fs' with vi.fn() members and pass them here.
 */
export interface MemoryFileSystem {
  files: Map<string, string>;
  directories: Set<string>;
  /** When set, writes throw this error */
  writeFailure?: Error;
}

export interface MockedFsFunctions {
  readFileSync: MockedFunction<typeof readFileSync>;
  writeFileSync: MockedFunction<typeof writeFileSync>;
  existsSync: MockedFunction<typeof existsSync>;
  mkdirSync: MockedFunction<typeof mkdirSync>;
  renameSync: MockedFunction<typeof renameSync>;
}

export function installMemoryFileSystem(mocks: MockedFsFunctions): MemoryFileSystem {
  const fs: MemoryFileSystem = { files: new Map(), directories: new Set() };

  mocks.existsSync.mockImplementation((path) => fs.files.has(String(path)) || fs.directories.has(String(path)));
  mocks.mkdirSync.mockImplementation((path) => {
    fs.directories.add(String(path));
    return undefined;
  });
  mocks.readFileSync.mockImplementation((path) => {
    const content = fs.files.get(String(path));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${String(path)}'`);
    }
    return content;
  });
  mocks.writeFileSync.mockImplementation((path, data) => {
    if (fs.writeFailure) throw fs.writeFailure;
    fs.files.set(String(path), String(data));
  });
  mocks.renameSync.mockImplementation((from, to) => {
    const content = fs.files.get(String(from));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, rename '${String(from)}'`);
    }
    fs.files.delete(String(from));
    fs.files.set(String(to), content);
  });

  return fs;
}
