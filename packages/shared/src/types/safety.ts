// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';

// ============================================================================
// Safety Tiers
// ============================================================================

/**
 * Risk classification shared by the policy engine and the audit log.
 * The string values are the `safety_level` values written to the log.
 */
export const SafetyTierSchema = z.enum(['safe', 'warning', 'dangerous', 'blocked']);
export type SafetyTier = z.infer<typeof SafetyTierSchema>;

/**
 * Tiers from least to most severe.
 */
export const SAFETY_TIER_ORDER: readonly SafetyTier[] = Object.freeze([
  'safe',
  'warning',
  'dangerous',
  'blocked',
]);

export function safetyTierRank(tier: SafetyTier): number {
  return SAFETY_TIER_ORDER.indexOf(tier);
}

/**
 * Negative when `a` is less severe than `b`, zero when equal.
 */
export function compareSafetyTiers(a: SafetyTier, b: SafetyTier): number {
  return safetyTierRank(a) - safetyTierRank(b);
}

// ============================================================================
// Verdict
// ============================================================================

export interface Verdict {
  readonly tier: SafetyTier;
  /** Human-readable explanation; absent for a plain `safe` verdict. */
  readonly reason?: string;
  /** Deny pattern or heuristic id that produced the verdict. */
  readonly matchedRule?: string;
}
