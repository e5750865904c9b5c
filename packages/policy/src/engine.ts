// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { PolicyConfig, Verdict } from '@shellguard/shared';
import { HEURISTIC_RULES, findHeuristicMatch, type HeuristicRule } from './heuristics.js';

export const NOT_IN_ALLOW_LIST = 'not in allow-list';

const SAFE_VERDICT = Object.freeze<Verdict>({ tier: 'safe' });

interface NormalizedPattern {
  readonly source: string;
  readonly needle: string;
}

/**
 * Lower-cases the usable patterns of a list. Blank entries never match
 * anything, so an empty or blank list is a no-op rule.
 */
function normalizePatterns(patterns: readonly string[] | undefined): NormalizedPattern[] {
  const normalized: NormalizedPattern[] = [];
  for (const source of patterns ?? []) {
    if (typeof source !== 'string' || source.trim() === '') {
      continue;
    }
    normalized.push({ source, needle: source.toLowerCase() });
  }
  return normalized;
}

function verdict(fields: Verdict): Verdict {
  return Object.freeze({ ...fields });
}

// ============================================================================
// Policy Engine
// ============================================================================

/**
 * Classifies shell commands into safety tiers.
 *
 * Evaluation is a pure function of the command and the borrowed config: the
 * engine keeps no state between calls, performs no I/O and never throws, so a
 * single instance can be shared by any number of concurrent callers.
 *
 * Rules apply in order and the first decisive one wins:
 * 1. compliance mode with a non-empty allow list blocks commands that contain
 *    no allow pattern;
 * 2. any deny pattern blocks, whatever the allow list says;
 * 3. the heuristic table assigns `dangerous` or `warning`;
 * 4. everything else is `safe`.
 *
 * Matching is case-insensitive substring containment, so it over-blocks:
 * a deny pattern of `format` also blocks `git commit -m "format"`.
 */
export class PolicyEngine {
  private readonly heuristics: readonly HeuristicRule[];

  constructor(heuristics: readonly HeuristicRule[] = HEURISTIC_RULES) {
    this.heuristics = heuristics;
  }

  evaluate(command: string, config: PolicyConfig): Verdict {
    const normalized = command.toLowerCase();
    if (normalized.trim() === '') {
      return SAFE_VERDICT;
    }

    const allowPatterns = normalizePatterns(config.allowList);
    if (
      config.complianceMode &&
      allowPatterns.length > 0 &&
      !allowPatterns.some((pattern) => normalized.includes(pattern.needle))
    ) {
      return verdict({ tier: 'blocked', reason: NOT_IN_ALLOW_LIST });
    }

    const denied = normalizePatterns(config.denyList).find((pattern) =>
      normalized.includes(pattern.needle),
    );
    if (denied) {
      return verdict({
        tier: 'blocked',
        reason: `matches blocked pattern "${denied.source}"`,
        matchedRule: denied.source,
      });
    }

    const heuristic = findHeuristicMatch(normalized, this.heuristics);
    if (heuristic) {
      return verdict({
        tier: heuristic.tier,
        reason: heuristic.reason,
        matchedRule: heuristic.id,
      });
    }

    return SAFE_VERDICT;
  }

  /**
   * Quick check used by callers that only gate execution.
   */
  isBlocked(command: string, config: PolicyConfig): boolean {
    return this.evaluate(command, config).tier === 'blocked';
  }
}

const defaultEngine = new PolicyEngine();

/**
 * Evaluate a command with the built-in heuristics.
 */
export function evaluate(command: string, config: PolicyConfig): Verdict {
  return defaultEngine.evaluate(command, config);
}

/**
 * Create a policy engine, optionally with a custom heuristic table.
 */
export function createPolicyEngine(heuristics?: readonly HeuristicRule[]): PolicyEngine {
  return new PolicyEngine(heuristics ? Object.freeze([...heuristics]) : HEURISTIC_RULES);
}
