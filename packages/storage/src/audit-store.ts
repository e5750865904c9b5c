// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { mkdir, open, type FileHandle } from 'fs/promises';
import { dirname, resolve } from 'path';
import { createInterface } from 'readline';
import {
  AuditIoError,
  AuditRecordSchema,
  ValidationError,
  type AuditFilter,
  type AuditRecord,
  type AuditStatistics,
  type ScanReport,
} from '@shellguard/shared';
import { decodeAuditLine, encodeAuditRecord } from './audit-codec.js';
import { getDefaultAuditLogPath } from './paths.js';
import { enqueueWrite, getWriteQueue } from './write-queue.js';

const NEWLINE = 0x0a;
const LOG_FILE_MODE = 0o600;

export interface AuditStoreOptions {
  /** Log file location. Defaults to `getDefaultAuditLogPath()`. */
  path?: string;
}

type RecordScanner = (report: ScanReport) => AsyncGenerator<AuditRecord>;

function emptyReport(): ScanReport {
  return { linesRead: 0, recordsParsed: 0, skippedLines: 0 };
}

function matchesFilter(record: AuditRecord, filter: AuditFilter): boolean {
  if (filter.user !== undefined && record.user !== filter.user) return false;
  if (filter.tier !== undefined && record.tier !== filter.tier) return false;
  if (filter.sessionId !== undefined && record.sessionId !== filter.sessionId) return false;

  const time = record.timestamp.getTime();
  if (filter.since && time < filter.since.getTime()) return false;
  if (filter.until && time >= filter.until.getTime()) return false;
  return true;
}

function validateFilter(filter: AuditFilter): void {
  if (filter.limit !== undefined && (!Number.isInteger(filter.limit) || filter.limit < 0)) {
    throw ValidationError.invalid('limit', 'must be a non-negative integer');
  }
  for (const bound of ['since', 'until'] as const) {
    const value = filter[bound];
    if (value !== undefined && Number.isNaN(value.getTime())) {
      throw ValidationError.invalid(bound, 'must be a valid date');
    }
  }
}

async function endsWithNewline(handle: FileHandle): Promise<boolean> {
  const { size } = await handle.stat();
  if (size === 0) {
    return true;
  }
  const last = Buffer.alloc(1);
  await handle.read(last, 0, 1, size - 1);
  return last[0] === NEWLINE;
}

// ============================================================================
// Query Results
// ============================================================================

/**
 * Lazy, restartable view over the records matching a filter. Every iteration
 * re-reads the log from the start, so nothing beyond the current line is kept
 * in memory (except the matches a `newest-first` query must reverse).
 */
export class AuditRecordSequence implements AsyncIterable<AuditRecord> {
  private report: ScanReport | null = null;

  constructor(
    private readonly scan: RecordScanner,
    private readonly filter: AuditFilter,
  ) {}

  /**
   * Counters of the most recently finished iteration, including one that
   * stopped early. Concurrent iterations each report when they finish.
   */
  get lastScan(): ScanReport | null {
    return this.report;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<AuditRecord> {
    const report = emptyReport();
    const limit = this.filter.limit ?? Number.POSITIVE_INFINITY;

    try {
      if (limit === 0) {
        return;
      }

      if (this.filter.order === 'newest-first') {
        const newest: AuditRecord[] = [];
        for await (const record of this.scan(report)) {
          if (!matchesFilter(record, this.filter)) continue;
          newest.push(record);
          if (newest.length > limit) {
            newest.shift();
          }
        }
        for (let index = newest.length - 1; index >= 0; index -= 1) {
          yield newest[index];
        }
        return;
      }

      let yielded = 0;
      for await (const record of this.scan(report)) {
        if (!matchesFilter(record, this.filter)) continue;
        yield record;
        yielded += 1;
        if (yielded >= limit) {
          return;
        }
      }
    } finally {
      this.report = report;
    }
  }

  async toArray(): Promise<AuditRecord[]> {
    const records: AuditRecord[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return records;
  }
}

// ============================================================================
// Audit Store
// ============================================================================

/**
 * Append-only audit trail stored as JSON lines.
 *
 * Appends from this process are serialized through one queue per log file and
 * each record is written with a single append followed by an fsync, so a line
 * is either complete or absent. A line left truncated by a crash is terminated
 * by the next append and skipped by readers. Writers in other processes are
 * not coordinated.
 */
export class AuditStore {
  readonly path: string;
  private directoryReady = false;

  constructor(options: AuditStoreOptions = {}) {
    this.path = resolve(options.path ?? getDefaultAuditLogPath());
  }

  /**
   * Durably append one record. Resolves only once the line is flushed to disk.
   */
  async append(record: AuditRecord): Promise<void> {
    const parsed = AuditRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw ValidationError.invalid('audit record', issues.join('; '));
    }
    const line = encodeAuditRecord(parsed.data);

    await enqueueWrite(this.path, async () => {
      try {
        await this.ensureDirectory();
        const handle = await open(this.path, 'a+', LOG_FILE_MODE);
        try {
          const prefix = (await endsWithNewline(handle)) ? '' : '\n';
          await handle.appendFile(`${prefix}${line}\n`, { encoding: 'utf8' });
          await handle.sync();
        } finally {
          await handle.close();
        }
      } catch (error) {
        const ioError = AuditIoError.fromCause('append', this.path, error);
        console.error(`[AuditStore] ${ioError.message}`);
        throw ioError;
      }
    });
  }

  /**
   * Records matching `filter`, in insertion order unless `order` says
   * otherwise. The log is read when the sequence is iterated.
   */
  query(filter: AuditFilter = {}): AuditRecordSequence {
    validateFilter(filter);
    return new AuditRecordSequence((report) => this.scan(report), { ...filter });
  }

  /**
   * Aggregate counts over the whole log in one streaming pass.
   */
  async statistics(): Promise<AuditStatistics> {
    const report = emptyReport();
    const stats: AuditStatistics = {
      total: 0,
      executed: 0,
      failedExecutions: 0,
      perTierCounts: { safe: 0, warning: 0, dangerous: 0, blocked: 0 },
      skippedLines: 0,
    };

    for await (const record of this.scan(report)) {
      stats.total += 1;
      stats.perTierCounts[record.tier] += 1;
      if (record.executed) {
        stats.executed += 1;
        if (record.exitCode === undefined || record.exitCode !== 0) {
          stats.failedExecutions += 1;
        }
      }
    }

    stats.skippedLines = report.skippedLines;
    return stats;
  }

  /**
   * Resolves once every append queued so far has settled.
   */
  async flush(): Promise<void> {
    await getWriteQueue(this.path)?.idle();
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await mkdir(dirname(this.path), { recursive: true });
    this.directoryReady = true;
  }

  private async openForRead(): Promise<FileHandle> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'r');
    } catch (error) {
      throw AuditIoError.fromCause('read', this.path, error);
    }

    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new AuditIoError('read', this.path, 'invalid_path', `Audit log at ${this.path} is not a regular file`);
      }
      return handle;
    } catch (error) {
      await handle.close();
      throw AuditIoError.fromCause('read', this.path, error);
    }
  }

  private async *scan(report: ScanReport): AsyncGenerator<AuditRecord> {
    const handle = await this.openForRead();
    const input = handle.createReadStream({ encoding: 'utf8' });
    const lines = createInterface({ input, crlfDelay: Infinity });
    let lineNumber = 0;

    try {
      for await (const text of lines) {
        lineNumber += 1;
        if (text.trim() === '') {
          continue;
        }

        report.linesRead += 1;
        const decoded = decodeAuditLine(text, lineNumber);
        if (!decoded.ok) {
          report.skippedLines += 1;
          report.lastParseError = decoded.error;
          continue;
        }

        report.recordsParsed += 1;
        yield decoded.record;
      }
    } catch (error) {
      throw AuditIoError.fromCause('read', this.path, error);
    } finally {
      lines.close();
      input.destroy();
    }
  }
}

// ============================================================================
// Default Store
// ============================================================================

let defaultStore: AuditStore | null = null;

/**
 * Get the shared store for `options.path`, or for the default log location
 * when no path is given. Asking for another path replaces the shared store.
 */
export function getAuditStore(options: AuditStoreOptions = {}): AuditStore {
  const path = resolve(options.path ?? getDefaultAuditLogPath());
  if (!defaultStore || defaultStore.path !== path) {
    defaultStore = new AuditStore({ path });
  }
  return defaultStore;
}

export function appendRecord(record: AuditRecord, store: AuditStore = getAuditStore()): Promise<void> {
  return store.append(record);
}

export function queryRecords(filter: AuditFilter = {}, store: AuditStore = getAuditStore()): AuditRecordSequence {
  return store.query(filter);
}

export function computeStatistics(store: AuditStore = getAuditStore()): Promise<AuditStatistics> {
  return store.statistics();
}
