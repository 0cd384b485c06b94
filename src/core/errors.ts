/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogGroup } from './types.js';

export interface ParseErrorOptions {
  cause?: unknown;
  group?: LogGroup;
}

/**
 * Raised when a log cannot be trusted: its process crashed, or a field every
 * well-formed log carries is missing.
 */
export class ParseError extends Error {
  readonly group?: LogGroup;

  constructor(message: string, options: ParseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ParseError';
    this.group = options.group;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
