// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { randomBytes } from 'crypto';

const BASE64URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

function randomBase64Url(length: number): string {
  const bytes = randomBytes(length);
  let output = '';

  for (let index = 0; index < length; index += 1) {
    output += BASE64URL_ALPHABET[bytes[index] & 63];
  }

  return output;
}

// ============================================================================
// ID Generation
// ============================================================================

export function generateId(prefix?: string): string {
  const id = randomBase64Url(16);
  return prefix ? `${prefix}_${id}` : id;
}

export function generateSessionId(): string {
  return generateId('sess');
}

// ============================================================================
// String Utilities
// ============================================================================

export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - suffix.length) + suffix;
}
