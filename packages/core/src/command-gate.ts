// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  generateSessionId,
  isAuditIoError,
  wrapError,
  type AuditRecord,
  type PolicyConfig,
  type Verdict,
} from '@shellguard/shared';
import { PolicyEngine } from '@shellguard/policy';
import { AuditStore, getAuditStore } from '@shellguard/storage';

// ============================================================================
// Types
// ============================================================================

/**
 * What happened to one generated command after it was reviewed.
 */
export interface CommandOutcome {
  naturalLanguageInput: string;
  generatedCommand: string;
  verdict: Verdict;
  executed: boolean;
  exitCode?: number;
  /** Defaults to the verdict reason. */
  notes?: string;
}

export interface AuditContext {
  user: string;
  backendId: string;
  organization?: string;
  department?: string;
  sessionId?: string;
  timestamp?: Date;
}

export interface CommandGateOptions {
  policy: PolicyConfig;
  /** Identifier of the backend that generated the commands. */
  backendId: string;
  store?: AuditStore;
  engine?: PolicyEngine;
  user?: string;
  organization?: string;
  department?: string;
  /** A fresh session id is generated when omitted. */
  sessionId?: string;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Record Construction
// ============================================================================

const UNKNOWN_USER = 'unknown';

/**
 * The login name of the current user, or `"unknown"`.
 */
export function resolveCurrentUser(env: NodeJS.ProcessEnv = process.env): string {
  for (const name of [env.USER, env.USERNAME]) {
    if (name && name.trim()) {
      return name;
    }
  }
  return UNKNOWN_USER;
}

export function createAuditRecord(outcome: CommandOutcome, context: AuditContext): AuditRecord {
  return {
    timestamp: context.timestamp ?? new Date(),
    user: context.user,
    organization: context.organization,
    department: context.department,
    naturalLanguageInput: outcome.naturalLanguageInput,
    generatedCommand: outcome.generatedCommand,
    executed: outcome.executed,
    exitCode: outcome.exitCode,
    tier: outcome.verdict.tier,
    backendId: context.backendId,
    notes: outcome.notes ?? outcome.verdict.reason,
    sessionId: context.sessionId,
  };
}

// ============================================================================
// Command Gate
// ============================================================================

/**
 * Reviews generated commands against one policy and records every outcome in
 * the audit trail.
 */
export class CommandGate {
  readonly sessionId: string;
  private readonly policy: PolicyConfig;
  private readonly engine: PolicyEngine;
  private readonly store: AuditStore;
  private readonly context: Omit<AuditContext, 'timestamp'>;

  constructor(options: CommandGateOptions) {
    this.policy = options.policy;
    this.engine = options.engine ?? new PolicyEngine();
    this.store = options.store ?? getAuditStore();
    this.sessionId = options.sessionId ?? generateSessionId();
    this.context = {
      user: options.user ?? resolveCurrentUser(options.env),
      backendId: options.backendId,
      organization: options.organization,
      department: options.department,
      sessionId: this.sessionId,
    };
  }

  review(command: string): Verdict {
    return this.engine.evaluate(command, this.policy);
  }

  /**
   * Append the outcome to the audit log. Resolves with the stored record.
   */
  async record(outcome: CommandOutcome): Promise<AuditRecord> {
    const record = createAuditRecord(outcome, this.context);
    try {
      await this.store.append(record);
    } catch (error) {
      const wrapped = wrapError(error, 'Audit append failed');
      const detail = isAuditIoError(wrapped) ? `${wrapped.code}/${wrapped.reason}` : wrapped.code;
      console.error(`[CommandGate] Failed to record "${outcome.generatedCommand}" (${detail}):`, wrapped.message);
      throw error;
    }
    return record;
  }
}
