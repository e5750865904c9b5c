// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Audit store
export {
  AuditStore,
  AuditRecordSequence,
  getAuditStore,
  appendRecord,
  queryRecords,
  computeStatistics,
  type AuditStoreOptions,
} from './audit-store.js';

// Line format
export {
  AuditLogLineSchema,
  encodeAuditRecord,
  decodeAuditLine,
  toAuditLogLine,
  fromAuditLogLine,
  type AuditLogLine,
  type DecodeResult,
} from './audit-codec.js';

// Paths
export { getDefaultAuditLogPath, APP_DIR, AUDIT_LOG_FILE, AUDIT_LOG_ENV } from './paths.js';

// Write serialization
export { WriteQueue, enqueueWrite, getWriteQueue } from './write-queue.js';

// Re-export types from shared
export type {
  AuditRecord,
  AuditFilter,
  AuditOrder,
  AuditStatistics,
  ScanReport,
} from '@shellguard/shared';
