// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Gate
export {
  CommandGate,
  createAuditRecord,
  resolveCurrentUser,
  type AuditContext,
  type CommandGateOptions,
  type CommandOutcome,
} from './command-gate.js';

// Caller-facing operations
export { evaluate, resolvePolicyConfig } from '@shellguard/policy';
export { appendRecord, queryRecords, computeStatistics, AuditStore } from '@shellguard/storage';

// Re-export types from shared
export type {
  AuditFilter,
  AuditRecord,
  AuditStatistics,
  PolicyConfig,
  SafetyTier,
  Verdict,
} from '@shellguard/shared';
