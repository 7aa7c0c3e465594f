/**
 * Daily Stats Store Implementation
 *
 * Keeps upload/download totals and peak speeds per local calendar day and
 * persists the whole collection as a flat JSON array after every mutation.
 * Writes go to a temporary file that is renamed over the target, so a crash
 * mid-write leaves the previous file intact.
 *
 * Persistence failures never propagate: a failed load starts with empty
 * history, a failed save is dropped. Both are logged and emitted as
 * 'persistenceError'.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs';
import { dirname } from 'node:path';
import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { PersistenceError } from '../errors.js';
import type { DailyStats } from '../types/daily-stats.js';

/** A Date (truncated to its local day) or a YYYY-MM-DD day key */
export type DayInput = Date | string;

const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats the local calendar day of a date as YYYY-MM-DD
 */
export function dayKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function toDayKey(day: DayInput): string {
  if (typeof day !== 'string') {
    return dayKey(day);
  }
  if (!DAY_KEY_PATTERN.test(day)) {
    throw new RangeError(`Invalid day key: ${day}`);
  }
  return day;
}

export function emptyDailyStats(date: string): DailyStats {
  return {
    date,
    totalUploaded: 0,
    totalDownloaded: 0,
    peakUploadSpeed: 0,
    peakDownloadSpeed: 0,
  };
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isDailyStatsRecord(value: unknown): value is DailyStats {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.date === 'string' &&
    DAY_KEY_PATTERN.test(record.date) &&
    isNonNegativeNumber(record.totalUploaded) &&
    isNonNegativeNumber(record.totalDownloaded) &&
    isNonNegativeNumber(record.peakUploadSpeed) &&
    isNonNegativeNumber(record.peakDownloadSpeed)
  );
}

export interface DailyStatsStoreOptions {
  /** Path of the JSON array file */
  filePath: string;
  /** Load the file in the constructor (default: true) */
  loadOnCreate: boolean;
}

export class DailyStatsStore extends EventEmitter {
  private readonly options: DailyStatsStoreOptions;
  private readonly logger = createSubsystemLogger('meter/daily-stats');
  private stats = new Map<string, DailyStats>();
  private loadError?: PersistenceError;
  /** Message of the failing save, logged once until a save succeeds */
  private saveFailure?: string;

  constructor(options: Partial<DailyStatsStoreOptions> & Pick<DailyStatsStoreOptions, 'filePath'>) {
    super();
    this.options = {
      loadOnCreate: true,
      ...options,
    };

    if (this.options.loadOnCreate) {
      this.reload();
    }
  }

  get filePath(): string {
    return this.options.filePath;
  }

  /**
   * Gets the failure of the last reload(), if it failed
   */
  getLoadError(): PersistenceError | undefined {
    return this.loadError;
  }

  /**
   * Adds traffic to a day's totals, creating the record on first use
   */
  addDelta(day: DayInput, uploaded: number, downloaded: number): DailyStats {
    const key = toDayKey(day);
    const current = this.stats.get(key) ?? emptyDailyStats(key);
    const updated: DailyStats = {
      ...current,
      totalUploaded: current.totalUploaded + (isNonNegativeNumber(uploaded) ? uploaded : 0),
      totalDownloaded: current.totalDownloaded + (isNonNegativeNumber(downloaded) ? downloaded : 0),
    };

    this.stats.set(key, updated);
    this.save();
    return { ...updated };
  }

  /**
   * Raises a day's peak speeds to the given values where they are higher
   */
  recordPeak(day: DayInput, uploadSpeed: number, downloadSpeed: number): DailyStats {
    const key = toDayKey(day);
    const current = this.stats.get(key) ?? emptyDailyStats(key);
    const updated: DailyStats = {
      ...current,
      peakUploadSpeed: Math.max(current.peakUploadSpeed, isNonNegativeNumber(uploadSpeed) ? uploadSpeed : 0),
      peakDownloadSpeed: Math.max(current.peakDownloadSpeed, isNonNegativeNumber(downloadSpeed) ? downloadSpeed : 0),
    };

    this.stats.set(key, updated);
    this.save();
    return { ...updated };
  }

  /**
   * Gets a day's record; unseen days return a zero-valued record
   */
  get(day: DayInput): DailyStats {
    const key = toDayKey(day);
    const stats = this.stats.get(key);
    return stats ? { ...stats } : emptyDailyStats(key);
  }

  getToday(now: Date = new Date()): DailyStats {
    return this.get(now);
  }

  /**
   * Gets exactly n records, most recent day first, zero-filling days without data
   */
  lastNDays(n: number, now: Date = new Date()): DailyStats[] {
    const count = Math.max(0, Math.floor(n));
    const result: DailyStats[] = [];

    for (let offset = 0; offset < count; offset++) {
      const date = new Date(now.getFullYear(), now.getMonth(), now.getDate() - offset);
      result.push(this.get(date));
    }

    return result;
  }

  /**
   * Gets every stored record in ascending date order
   */
  getAll(): DailyStats[] {
    return [...this.stats.values()]
      .map((stats) => ({ ...stats }))
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  /**
   * Clears the entire history
   */
  resetAll(): void {
    const removed = this.stats.size;
    this.stats = new Map();
    this.save();
    this.logger.info('Daily statistics cleared', { removedDays: removed });
    this.emit('statsReset', { removedDays: removed, timestamp: new Date() });
  }

  /**
   * Writes the full collection to disk. Returns false when the write was dropped.
   */
  save(): boolean {
    const { filePath } = this.options;
    const tempPath = `${filePath}.tmp`;

    try {
      const directory = dirname(filePath);
      if (!existsSync(directory)) {
        mkdirSync(directory, { recursive: true });
      }
      writeFileSync(tempPath, JSON.stringify(this.getAll(), null, 2), 'utf8');
      renameSync(tempPath, filePath);
      if (this.saveFailure) {
        this.logger.info('Daily statistics saved again', { path: filePath });
        this.saveFailure = undefined;
      }
      return true;
    } catch (error) {
      const persistenceError = new PersistenceError('save', filePath, { cause: error });
      if (this.saveFailure !== persistenceError.message) {
        this.logger.error('Failed to save daily statistics', { error: persistenceError.message });
        this.saveFailure = persistenceError.message;
      }
      this.emit('persistenceError', persistenceError);
      return false;
    }
  }

  /**
   * Replaces the in-memory collection with the file's content.
   * A missing file is empty history; an unreadable one is logged and treated the same.
   */
  reload(): void {
    const { filePath } = this.options;
    this.stats = new Map();
    this.loadError = undefined;

    if (!existsSync(filePath)) {
      this.logger.debug('No daily statistics file yet', { path: filePath });
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      this.reportLoadFailure(new PersistenceError('load', filePath, { cause: error }));
      return;
    }

    if (!Array.isArray(parsed)) {
      this.reportLoadFailure(new PersistenceError('load', filePath, { cause: 'expected a JSON array of day records' }));
      return;
    }

    let skipped = 0;
    for (const entry of parsed) {
      if (!isDailyStatsRecord(entry)) {
        skipped++;
        continue;
      }
      this.mergeLoaded(entry);
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} malformed daily statistics records`, { path: filePath });
    }
    this.logger.debug(`Loaded ${this.stats.size} days of statistics`, { path: filePath });
  }

  private mergeLoaded(entry: DailyStats): void {
    const existing = this.stats.get(entry.date);
    if (!existing) {
      this.stats.set(entry.date, {
        date: entry.date,
        totalUploaded: entry.totalUploaded,
        totalDownloaded: entry.totalDownloaded,
        peakUploadSpeed: entry.peakUploadSpeed,
        peakDownloadSpeed: entry.peakDownloadSpeed,
      });
      return;
    }

    this.stats.set(entry.date, {
      date: entry.date,
      totalUploaded: existing.totalUploaded + entry.totalUploaded,
      totalDownloaded: existing.totalDownloaded + entry.totalDownloaded,
      peakUploadSpeed: Math.max(existing.peakUploadSpeed, entry.peakUploadSpeed),
      peakDownloadSpeed: Math.max(existing.peakDownloadSpeed, entry.peakDownloadSpeed),
    });
  }

  private reportLoadFailure(error: PersistenceError): void {
    this.loadError = error;
    this.logger.error('Failed to load daily statistics, starting empty', { error: error.message });
    this.emit('persistenceError', error);
  }
}
