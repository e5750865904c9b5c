// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class ShellGuardError extends Error {
  abstract readonly code: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * A malformed or unusable policy field. Reported, never thrown by the
 * resolver: the field falls back to its default.
 */
export class ConfigError extends ShellGuardError {
  readonly code = 'CONFIG_ERROR';
  readonly field: string;

  constructor(field: string, message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.field = field;
  }

  static malformedField(field: string, reason: string): ConfigError {
    return new ConfigError(field, `Policy field "${field}" is malformed (${reason}); using the default.`);
  }

  static droppedEntry(field: string, index: number, reason: string): ConfigError {
    return new ConfigError(field, `Ignoring ${field}[${index}]: ${reason}.`, { index });
  }

  static notAnObject(received: string): ConfigError {
    return new ConfigError('(root)', `Policy settings must be an object, received ${received}; using defaults.`);
  }
}

// ============================================================================
// Audit Errors
// ============================================================================

export type AuditIoOperation = 'append' | 'read';

export type AuditIoReason =
  | 'not_found'
  | 'permission_denied'
  | 'disk_full'
  | 'invalid_path'
  | 'io_failure';

const ERRNO_REASONS: Record<string, AuditIoReason> = {
  ENOENT: 'not_found',
  EACCES: 'permission_denied',
  EPERM: 'permission_denied',
  EROFS: 'permission_denied',
  ENOSPC: 'disk_full',
  EDQUOT: 'disk_full',
  EFBIG: 'disk_full',
  ENOTDIR: 'invalid_path',
  EISDIR: 'invalid_path',
  EEXIST: 'invalid_path',
  ENAMETOOLONG: 'invalid_path',
};

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * The audit log could not be created, written or read. Fatal to the call that
 * raised it, never to the process.
 */
export class AuditIoError extends ShellGuardError {
  readonly code = 'AUDIT_IO_ERROR';
  readonly operation: AuditIoOperation;
  readonly path: string;
  readonly reason: AuditIoReason;

  constructor(
    operation: AuditIoOperation,
    path: string,
    reason: AuditIoReason,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, context);
    this.operation = operation;
    this.path = path;
    this.reason = reason;
  }

  static fromCause(operation: AuditIoOperation, path: string, cause: unknown): AuditIoError {
    if (cause instanceof AuditIoError) {
      return cause;
    }

    const errno = isErrnoException(cause) ? cause.code : undefined;
    const reason = (errno && ERRNO_REASONS[errno]) || 'io_failure';
    const detail = cause instanceof Error ? cause.message : String(cause);
    const verb = operation === 'append' ? 'write to' : 'read';

    return new AuditIoError(
      operation,
      path,
      reason,
      `Failed to ${verb} audit log at ${path} (${reason}): ${detail}`,
      { errno },
    );
  }

  static notFound(path: string): AuditIoError {
    return new AuditIoError('read', path, 'not_found', `Audit log not found at ${path}`);
  }
}

/**
 * One log line that could not be decoded. Skipped and counted by scans.
 */
export class AuditParseError extends ShellGuardError {
  readonly code = 'AUDIT_PARSE_ERROR';
  readonly lineNumber: number;

  constructor(lineNumber: number, message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.lineNumber = lineNumber;
  }

  static invalidJson(lineNumber: number, reason: string): AuditParseError {
    return new AuditParseError(lineNumber, `Line ${lineNumber} is not valid JSON: ${reason}`);
  }

  static invalidRecord(lineNumber: number, issues: string[]): AuditParseError {
    return new AuditParseError(
      lineNumber,
      `Line ${lineNumber} is not an audit record: ${issues.join('; ')}`,
      { issues },
    );
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends ShellGuardError {
  readonly code = 'VALIDATION_ERROR';
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, context);
    this.field = field;
  }

  static invalid(field: string, reason?: string): ValidationError {
    return new ValidationError(`Invalid ${field}${reason ? `: ${reason}` : ''}`, field);
  }
}

// ============================================================================
// Error Type Guards
// ============================================================================

export function isShellGuardError(error: unknown): error is ShellGuardError {
  return error instanceof ShellGuardError;
}

export function isAuditIoError(error: unknown): error is AuditIoError {
  return error instanceof AuditIoError;
}

// ============================================================================
// Error Wrapping
// ============================================================================

class UnknownError extends ShellGuardError {
  readonly code = 'UNKNOWN_ERROR';
}

export function wrapError(error: unknown, fallbackMessage = 'An unexpected error occurred'): ShellGuardError {
  if (isShellGuardError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new UnknownError(error.message || fallbackMessage, { originalError: error.name });
  }

  return new UnknownError(String(error) || fallbackMessage);
}
