// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_POLICY_SETTINGS,
  toPolicyConfig,
  type PolicyConfig,
  type PolicySettings,
} from '@shellguard/shared';

const SettingsObjectSchema = z.record(z.unknown());
const PatternListSchema = z.array(z.unknown());
const ComplianceModeSchema = z.boolean();

export interface ResolvedPolicy {
  config: PolicyConfig;
  settings: PolicySettings;
  /** Problems that were tolerated by falling back to defaults. */
  issues: ConfigError[];
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}

function resolvePatternList(
  field: 'allowedCommands' | 'blockedCommands',
  value: unknown,
  fallback: readonly string[],
  issues: ConfigError[],
): string[] {
  if (value === undefined) {
    return [...fallback];
  }

  const parsed = PatternListSchema.safeParse(value);
  if (!parsed.success) {
    issues.push(ConfigError.malformedField(field, `expected an array of strings, received ${describe(value)}`));
    return [...fallback];
  }

  const patterns: string[] = [];
  parsed.data.forEach((entry, index) => {
    if (typeof entry !== 'string') {
      issues.push(ConfigError.droppedEntry(field, index, `expected a string, received ${describe(entry)}`));
    } else if (entry.trim() === '') {
      issues.push(ConfigError.droppedEntry(field, index, 'blank patterns match every command'));
    } else {
      patterns.push(entry);
    }
  });
  return patterns;
}

function resolveComplianceMode(value: unknown, fallback: boolean, issues: ConfigError[]): boolean {
  if (value === undefined) {
    return fallback;
  }

  const parsed = ComplianceModeSchema.safeParse(value);
  if (!parsed.success) {
    issues.push(ConfigError.malformedField('complianceMode', `expected a boolean, received ${describe(value)}`));
    return fallback;
  }
  return parsed.data;
}

/**
 * Turn the policy fields supplied by a configuration loader into a
 * `PolicyConfig`. Never throws: missing fields take their defaults, malformed
 * ones fall back to them and are reported in `issues`.
 */
export function resolvePolicyConfig(
  raw: unknown,
  defaults: PolicySettings = DEFAULT_POLICY_SETTINGS,
): ResolvedPolicy {
  const issues: ConfigError[] = [];
  let fields: Record<string, unknown> = {};

  if (raw !== undefined && raw !== null) {
    const parsed = SettingsObjectSchema.safeParse(raw);
    if (parsed.success) {
      fields = parsed.data;
    } else {
      issues.push(ConfigError.notAnObject(describe(raw)));
    }
  }

  const settings: PolicySettings = {
    allowedCommands: resolvePatternList('allowedCommands', fields.allowedCommands, defaults.allowedCommands, issues),
    blockedCommands: resolvePatternList('blockedCommands', fields.blockedCommands, defaults.blockedCommands, issues),
    complianceMode: resolveComplianceMode(fields.complianceMode, defaults.complianceMode, issues),
  };

  for (const issue of issues) {
    console.warn(`[PolicyConfig] ${issue.message}`);
  }

  return { config: toPolicyConfig(settings), settings, issues };
}
