// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export * from './safety.js';
export * from './policy.js';
export * from './audit.js';
