// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { describe, expect, it } from 'vitest';
import {
  AuditIoError,
  AuditParseError,
  ConfigError,
  ValidationError,
  isAuditIoError,
  isShellGuardError,
  wrapError,
} from './index.js';

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('AuditIoError.fromCause', () => {
  it.each([
    ['ENOENT', 'not_found'],
    ['EACCES', 'permission_denied'],
    ['ENOSPC', 'disk_full'],
    ['ENOTDIR', 'invalid_path'],
    ['EIO', 'io_failure'],
  ])('maps %s to %s', (code, reason) => {
    const error = AuditIoError.fromCause('read', '/var/log/test.log', errnoError(code, 'boom'));

    expect(error.reason).toBe(reason);
    expect(error.context).toEqual({ errno: code });
  });

  it('describes the operation, path and cause', () => {
    const error = AuditIoError.fromCause('append', '/var/log/test.log', errnoError('EACCES', 'access denied'));

    expect(error.operation).toBe('append');
    expect(error.path).toBe('/var/log/test.log');
    expect(error.message).toBe('Failed to write to audit log at /var/log/test.log (permission_denied): access denied');
  });

  it('passes existing audit errors through', () => {
    const original = AuditIoError.notFound('/var/log/test.log');
    expect(AuditIoError.fromCause('read', '/elsewhere.log', original)).toBe(original);
  });

  it('handles non-error causes', () => {
    const error = AuditIoError.fromCause('read', '/var/log/test.log', 'stream closed');
    expect(error.reason).toBe('io_failure');
    expect(error.message).toBe('Failed to read audit log at /var/log/test.log (io_failure): stream closed');
  });
});

describe('error taxonomy', () => {
  it('exposes codes and serializes to JSON', () => {
    const error = ValidationError.invalid('limit', 'must be a non-negative integer');
    const json = error.toJSON();

    expect(error.code).toBe('VALIDATION_ERROR');
    expect(json.name).toBe('ValidationError');
    expect(json.message).toBe('Invalid limit: must be a non-negative integer');
  });

  it('builds parse errors with the line number', () => {
    const error = AuditParseError.invalidRecord(5, ['user: Required', 'executed: Required']);

    expect(error.lineNumber).toBe(5);
    expect(error.message).toBe('Line 5 is not an audit record: user: Required; executed: Required');
  });

  it('narrows with the type guards', () => {
    const config = ConfigError.malformedField('complianceMode', 'expected a boolean');

    expect(isAuditIoError(config)).toBe(false);
    expect(isShellGuardError(config)).toBe(true);
    expect(isShellGuardError(new Error('plain'))).toBe(false);
  });

  it('wraps foreign errors and keeps its own', () => {
    const own = AuditIoError.notFound('/var/log/test.log');

    expect(wrapError(own)).toBe(own);
    expect(wrapError(new TypeError('bad input')).message).toBe('bad input');
    expect(wrapError(new TypeError('bad input')).code).toBe('UNKNOWN_ERROR');
    expect(wrapError('').message).toBe('An unexpected error occurred');
  });
});
