// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { compareSafetyTiers, type SafetyTier } from '@shellguard/shared';

// ============================================================================
// Heuristic Danger Patterns
// ============================================================================

export type HeuristicTier = Extract<SafetyTier, 'warning' | 'dangerous'>;

export interface HeuristicRule {
  readonly id: string;
  readonly tier: HeuristicTier;
  /** Tested against the lower-cased command. Never global: `test` must stay stateless. */
  readonly pattern: RegExp;
  readonly reason: string;
}

function rule(id: string, tier: HeuristicTier, pattern: RegExp, reason: string): HeuristicRule {
  return Object.freeze({ id, tier, pattern, reason });
}

/**
 * Built-in heuristics, in declaration order. Among matches of equal tier the
 * earliest entry wins.
 */
export const HEURISTIC_RULES: readonly HeuristicRule[] = Object.freeze([
  // Destruction
  rule(
    'recursive-force-delete',
    'dangerous',
    /\brm(?=.*\s(?:-[a-z]*r|--recursive\b))(?=.*\s(?:-[a-z]*f|--force\b))\s/,
    'Recursive forced deletion removes files without confirmation.',
  ),
  rule(
    'recursive-force-remove-item',
    'dangerous',
    /\bremove-item\b(?=.*\s-recurse\b)(?=.*\s-force\b)/,
    'Remove-Item -Recurse -Force deletes whole trees without confirmation.',
  ),
  rule(
    'silent-tree-delete',
    'dangerous',
    /\b(?:del|erase|rd|rmdir)\b(?=.*\s\/s\b)(?=.*\s\/q\b)/,
    'Silent recursive deletion (/s /q) removes whole trees without confirmation.',
  ),

  // Disk wiping
  rule(
    'disk-utility',
    'dangerous',
    /\b(?:mkfs|fdisk|sfdisk|parted|wipefs|diskpart)\b/,
    'Disk partitioning and formatting utilities can wipe entire volumes.',
  ),
  rule(
    'drive-format',
    'dangerous',
    /\bformat(?:-volume)?\s+(?:-\S+\s+)*[a-z]:/,
    'Formatting a drive erases all of its data.',
  ),
  rule(
    'raw-device-write',
    'dangerous',
    /\bdd\s.*\b(?:if=\/dev\/(?:zero|u?random)\b|of=\/dev\/)/,
    'dd against raw devices can overwrite disks irrecoverably.',
  ),
  rule(
    'device-redirection',
    'dangerous',
    />\s*\/dev\/(?:sd|hd|vd|xvd|nvme|disk|mmcblk)/,
    'Redirecting output onto a block device overwrites it.',
  ),
  rule(
    'fork-bomb',
    'dangerous',
    /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/,
    'Fork bombs exhaust system resources.',
  ),

  // Execution policy tampering
  rule(
    'execution-policy-change',
    'dangerous',
    /\bset-executionpolicy\b/,
    'Changing the PowerShell execution policy weakens script signing protections.',
  ),
  rule(
    'execution-policy-bypass',
    'dangerous',
    /\s-(?:executionpolicy|ep)\s+(?:bypass|unrestricted)\b/,
    'Bypassing the PowerShell execution policy runs unsigned scripts.',
  ),

  // Broad permission changes and remote code
  rule(
    'recursive-root-permissions',
    'dangerous',
    /\b(?:chmod|chown|chgrp)\b(?=.*\s-[a-z]*r)(?=.*\s\/(?:\*|\s|$))/,
    'Recursive permission changes on / can break the whole system.',
  ),
  rule(
    'pipe-to-shell',
    'dangerous',
    /\b(?:curl|wget)\b.*\|\s*(?:sudo\s+)?(?:ba|z|da|k)?sh\b/,
    'Piping downloaded content into a shell runs unreviewed code.',
  ),

  // Warnings
  rule(
    'recursive-delete',
    'warning',
    /\b(?:rm|rmdir)(?=.*\s(?:-[a-z]*r|--recursive\b))\s|\bremove-item\b(?=.*\s-recurse\b)/,
    'Recursive deletion removes whole directory trees.',
  ),
  rule(
    'file-delete',
    'warning',
    /(?:^|[;&|(]\s*|\bsudo\s+)(?:rm|del|erase|rd|rmdir|remove-item|unlink)(?:\s|$)/,
    'Deleting files cannot be undone from the shell.',
  ),
  rule(
    'forced-operation',
    'warning',
    /\s-force\b|-confirm:\$false/,
    'Forced operations skip confirmation prompts.',
  ),
  rule(
    'privilege-escalation',
    'warning',
    /\b(?:sudo|doas|runas)\b|(?:^|[;&|]\s*)su(?:\s|$)/,
    'The command runs with elevated privileges.',
  ),
  rule(
    'permission-change',
    'warning',
    /\b(?:chmod|chown|chgrp|icacls|takeown)\b/,
    'The command changes file ownership or permissions.',
  ),
  rule(
    'overwrite-redirection',
    'warning',
    /(?:^|[^>&0-9])>(?![>&])/,
    'File redirection (>) overwrites existing files.',
  ),
  rule(
    'move-overwrite',
    'warning',
    /(?:^|[;&|]\s*)(?:mv|move|move-item)\s/,
    'Moving files can silently overwrite the destination.',
  ),
  rule(
    'dynamic-execution',
    'warning',
    /\b(?:invoke-expression|iex|eval)\b/,
    'Dynamically evaluated code cannot be reviewed before it runs.',
  ),
  rule(
    'system-power',
    'warning',
    /\b(?:shutdown|reboot|halt|poweroff|restart-computer|stop-computer)\b/,
    'The command shuts down or restarts the machine.',
  ),
  rule(
    'service-control',
    'warning',
    /\b(?:stop-service|remove-service|reset-service|systemctl\s+(?:stop|disable|mask))\b/,
    'Stopping or removing services can interrupt running systems.',
  ),
  rule(
    'mass-kill',
    'warning',
    /\bkill\s+-9\s+-1\b|\b(?:killall|pkill)\b/,
    'The command terminates many processes at once.',
  ),
  rule(
    'git-history-rewrite',
    'warning',
    /\bgit\s+(?:push\s+.*(?:--force|-f)(?:\s|$)|reset\s+--hard\b|clean\s+.*-[a-z]*f)/,
    'The git command discards commits or uncommitted work.',
  ),
]);

/**
 * The most severe matching heuristic, or null when none matches.
 */
export function findHeuristicMatch(
  normalizedCommand: string,
  rules: readonly HeuristicRule[] = HEURISTIC_RULES,
): HeuristicRule | null {
  let best: HeuristicRule | null = null;

  for (const candidate of rules) {
    if (best && compareSafetyTiers(candidate.tier, best.tier) <= 0) {
      continue;
    }
    if (candidate.pattern.test(normalizedCommand)) {
      best = candidate;
    }
  }

  return best;
}
