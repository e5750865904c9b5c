// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import type { AuditParseError } from '../errors/index.js';
import { SafetyTierSchema, type SafetyTier } from './safety.js';

// ============================================================================
// Audit Records
// ============================================================================

const MIN_LOGGED_YEAR = 0;
const MAX_LOGGED_YEAR = 9999;

/**
 * Instants whose ISO-8601 form is the plain four-digit-year one the log line
 * format accepts.
 */
const LoggedTimestampSchema = z.date().refine(
  (date) => {
    const year = date.getUTCFullYear();
    return year >= MIN_LOGGED_YEAR && year <= MAX_LOGGED_YEAR;
  },
  { message: `Year must be between ${MIN_LOGGED_YEAR} and ${MAX_LOGGED_YEAR}` },
);

export const AuditRecordSchema = z.object({
  timestamp: LoggedTimestampSchema,
  user: z.string(),
  organization: z.string().optional(),
  department: z.string().optional(),
  naturalLanguageInput: z.string(),
  generatedCommand: z.string(),
  executed: z.boolean(),
  exitCode: z.number().int().optional(),
  tier: SafetyTierSchema,
  backendId: z.string(),
  notes: z.string().optional(),
  sessionId: z.string().optional(),
});

/**
 * One classification and its execution outcome. Never modified after append.
 */
export type AuditRecord = Readonly<z.infer<typeof AuditRecordSchema>>;

// ============================================================================
// Queries
// ============================================================================

export type AuditOrder = 'insertion' | 'newest-first';

export interface AuditFilter {
  user?: string;
  tier?: SafetyTier;
  sessionId?: string;
  /** Inclusive lower bound on `timestamp`. */
  since?: Date;
  /** Exclusive upper bound on `timestamp`. */
  until?: Date;
  order?: AuditOrder;
  limit?: number;
}

export type SafetyTierCounts = Record<SafetyTier, number>;

export interface AuditStatistics {
  total: number;
  executed: number;
  /** Executed records whose exit code is missing or non-zero. */
  failedExecutions: number;
  perTierCounts: SafetyTierCounts;
  skippedLines: number;
}

export interface ScanReport {
  /** Non-blank lines examined. */
  linesRead: number;
  recordsParsed: number;
  /** Malformed or truncated lines that were skipped. */
  skippedLines: number;
  lastParseError?: AuditParseError;
}
