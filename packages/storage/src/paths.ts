// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { homedir } from 'os';
import { join, resolve } from 'path';

/**
 * Per-user application directory holding the audit log.
 */
export const APP_DIR = '.shellguard';
export const AUDIT_LOG_FILE = 'audit.log';

/** Environment variable overriding the default audit log location. */
export const AUDIT_LOG_ENV = 'SHELLGUARD_AUDIT_LOG';

/**
 * Get the default audit log path: `$SHELLGUARD_AUDIT_LOG` when set, otherwise
 * `~/.shellguard/audit.log`.
 */
export function getDefaultAuditLogPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[AUDIT_LOG_ENV]?.trim();
  if (override) {
    return resolve(override);
  }
  return join(homedir(), APP_DIR, AUDIT_LOG_FILE);
}
