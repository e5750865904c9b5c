// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import { AuditParseError, SafetyTierSchema, truncate, type AuditRecord } from '@shellguard/shared';

// ============================================================================
// Log Line Format
// ============================================================================

/**
 * One line of the audit log. Optional fields are written as `null` and may
 * also be missing entirely.
 */
export const AuditLogLineSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  user: z.string(),
  organization: z.string().nullish(),
  department: z.string().nullish(),
  input: z.string(),
  generated_command: z.string(),
  executed: z.boolean(),
  exit_code: z.number().int().nullish(),
  safety_level: SafetyTierSchema,
  notes: z.string().nullish(),
  llm_backend: z.string(),
  session_id: z.string().nullish(),
});

export type AuditLogLine = z.infer<typeof AuditLogLineSchema>;

export type DecodeResult =
  | { ok: true; record: AuditRecord }
  | { ok: false; error: AuditParseError };

const MAX_REASON_LENGTH = 120;

export function toAuditLogLine(record: AuditRecord): AuditLogLine {
  return {
    timestamp: record.timestamp.toISOString(),
    user: record.user,
    organization: record.organization ?? null,
    department: record.department ?? null,
    input: record.naturalLanguageInput,
    generated_command: record.generatedCommand,
    executed: record.executed,
    exit_code: record.exitCode ?? null,
    safety_level: record.tier,
    notes: record.notes ?? null,
    llm_backend: record.backendId,
    session_id: record.sessionId ?? null,
  };
}

export function fromAuditLogLine(line: AuditLogLine): AuditRecord {
  return {
    timestamp: new Date(line.timestamp),
    user: line.user,
    organization: line.organization ?? undefined,
    department: line.department ?? undefined,
    naturalLanguageInput: line.input,
    generatedCommand: line.generated_command,
    executed: line.executed,
    exitCode: line.exit_code ?? undefined,
    tier: line.safety_level,
    backendId: line.llm_backend,
    notes: line.notes ?? undefined,
    sessionId: line.session_id ?? undefined,
  };
}

/**
 * Serialize a record as a single JSON line, without the trailing newline.
 */
export function encodeAuditRecord(record: AuditRecord): string {
  return JSON.stringify(toAuditLogLine(record));
}

export function decodeAuditLine(text: string, lineNumber: number): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: AuditParseError.invalidJson(lineNumber, truncate(reason, MAX_REASON_LENGTH)) };
  }

  const parsed = AuditLogLineSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, error: AuditParseError.invalidRecord(lineNumber, issues) };
  }

  return { ok: true, record: fromAuditLogLine(parsed.data) };
}
