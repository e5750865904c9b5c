// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Engine
export {
  PolicyEngine,
  createPolicyEngine,
  evaluate,
  NOT_IN_ALLOW_LIST,
} from './engine.js';

// Heuristics
export {
  HEURISTIC_RULES,
  findHeuristicMatch,
  type HeuristicRule,
  type HeuristicTier,
} from './heuristics.js';

// Configuration
export { resolvePolicyConfig, type ResolvedPolicy } from './config.js';

// Re-export types from shared
export type { PolicyConfig, PolicySettings, SafetyTier, Verdict } from '@shellguard/shared';
