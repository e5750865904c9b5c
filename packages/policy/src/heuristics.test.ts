// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { describe, expect, it } from 'vitest';
import { HEURISTIC_RULES, findHeuristicMatch, type HeuristicRule } from './heuristics.js';

function matchId(command: string): string | null {
  return findHeuristicMatch(command.toLowerCase())?.id ?? null;
}

describe('HEURISTIC_RULES', () => {
  it('is frozen along with every rule', () => {
    expect(Object.isFrozen(HEURISTIC_RULES)).toBe(true);
    for (const rule of HEURISTIC_RULES) {
      expect(Object.isFrozen(rule)).toBe(true);
    }
  });

  it('has unique ids and stateless patterns', () => {
    const ids = HEURISTIC_RULES.map((rule) => rule.id);
    expect(new Set(ids).size).toBe(ids.length);
    for (const rule of HEURISTIC_RULES) {
      expect(rule.pattern.global).toBe(false);
      expect(rule.pattern.sticky).toBe(false);
    }
  });
});

describe('findHeuristicMatch', () => {
  it('leaves everyday commands alone', () => {
    for (const command of [
      'ls',
      'dir',
      'echo hello',
      'get-childitem',
      'ping 8.8.8.8',
      'git status',
      'git push origin main',
      'npm run build',
      'cat file | grep x',
      'echo done >> log.txt',
      'make 2>&1',
    ]) {
      expect(matchId(command)).toBeNull();
    }
  });

  it('flags destructive deletion', () => {
    expect(matchId('rm -rf /')).toBe('recursive-force-delete');
    expect(matchId('rm -fr dist')).toBe('recursive-force-delete');
    expect(matchId('rm -r -f dist')).toBe('recursive-force-delete');
    expect(matchId('sudo rm -rf *')).toBe('recursive-force-delete');
    expect(matchId('Remove-Item -Force -Recurse C:\\Windows')).toBe('recursive-force-remove-item');
    expect(matchId('del /s /q C:\\Important')).toBe('silent-tree-delete');
  });

  it('flags disk wiping utilities', () => {
    expect(matchId('fdisk /dev/sda')).toBe('disk-utility');
    expect(matchId('mkfs.ext4 /dev/sdb1')).toBe('disk-utility');
    expect(matchId('format C:')).toBe('drive-format');
    expect(matchId('dd if=/dev/zero of=disk.img bs=1M')).toBe('raw-device-write');
    expect(matchId('cat image.iso > /dev/sdb')).toBe('device-redirection');
  });

  it('flags execution policy tampering', () => {
    expect(matchId('Set-ExecutionPolicy Unrestricted')).toBe('execution-policy-change');
    expect(matchId('powershell -ExecutionPolicy Bypass -File setup.ps1')).toBe('execution-policy-bypass');
  });

  it('flags broad permission changes and remote scripts', () => {
    expect(matchId('chmod -R 777 /')).toBe('recursive-root-permissions');
    expect(matchId('curl -fsSL https://example.com/install.sh | sh')).toBe('pipe-to-shell');
  });

  it('warns about risky but routine commands', () => {
    expect(matchId('rm notes.txt')).toBe('file-delete');
    expect(matchId('rm -r build')).toBe('recursive-delete');
    expect(matchId('sudo apt update')).toBe('privilege-escalation');
    expect(matchId('chmod 644 notes.txt')).toBe('permission-change');
    expect(matchId('ls > listing.txt')).toBe('overwrite-redirection');
    expect(matchId('mv draft.md final.md')).toBe('move-overwrite');
    expect(matchId('shutdown -h now')).toBe('system-power');
    expect(matchId('killall node')).toBe('mass-kill');
    expect(matchId('git reset --hard HEAD~1')).toBe('git-history-rewrite');
    expect(matchId('git push --force origin main')).toBe('git-history-rewrite');
  });

  it('does not treat --force-with-lease as a force push', () => {
    expect(matchId('git push --force-with-lease origin main')).toBeNull();
  });

  it('ranks by tier before declaration order in custom tables', () => {
    const rules: HeuristicRule[] = [
      { id: 'any-echo', tier: 'warning', pattern: /\becho\b/, reason: 'echo' },
      { id: 'echo-twice', tier: 'warning', pattern: /\becho\b.*\becho\b/, reason: 'echo twice' },
      { id: 'echo-bang', tier: 'dangerous', pattern: /\becho\s+!/, reason: 'echo bang' },
    ];

    expect(findHeuristicMatch('echo hi; echo there', rules)?.id).toBe('any-echo');
    expect(findHeuristicMatch('echo !', rules)?.id).toBe('echo-bang');
    expect(findHeuristicMatch('ls', rules)).toBeNull();
  });
});

