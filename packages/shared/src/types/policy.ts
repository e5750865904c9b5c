// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';

// ============================================================================
// Policy Configuration
// ============================================================================

/**
 * Rules the engine evaluates a command against. Owned by the caller and only
 * borrowed for the duration of one evaluation.
 */
export interface PolicyConfig {
  /** Substring patterns a command must contain one of in compliance mode. */
  readonly allowList: readonly string[];
  /** Substring patterns that always block. */
  readonly denyList: readonly string[];
  readonly complianceMode: boolean;
}

/**
 * Policy fields as supplied by the configuration loader.
 */
export const PolicySettingsSchema = z.object({
  allowedCommands: z.array(z.string()),
  blockedCommands: z.array(z.string()),
  complianceMode: z.boolean(),
});

export type PolicySettings = z.infer<typeof PolicySettingsSchema>;

export const DEFAULT_POLICY_SETTINGS: PolicySettings = {
  allowedCommands: [],
  blockedCommands: ['rm -rf /', 'format', 'del /s /q C:\\'],
  complianceMode: true,
};

export function toPolicyConfig(settings: PolicySettings): PolicyConfig {
  return {
    allowList: [...settings.allowedCommands],
    denyList: [...settings.blockedCommands],
    complianceMode: settings.complianceMode,
  };
}
