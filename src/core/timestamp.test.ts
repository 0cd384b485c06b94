/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ParseError } from './errors.js';
import { toEpochSeconds } from './timestamp.js';

describe('toEpochSeconds', () => {
  it('reads a tracing timestamp as UTC', () => {
    expect(toEpochSeconds('2024-01-01T00:00:00Z')).toBe(1_704_067_200);
    expect(toEpochSeconds('2024-01-01T10:00:00.050000Z')).toBeCloseTo(1_704_103_200.05, 5);
  });

  it('accepts a space between date and time', () => {
    expect(toEpochSeconds('2024-01-01 00:00:01')).toBe(1_704_067_201);
  });

  it('only considers the first 24 characters', () => {
    expect(toEpochSeconds('2024-01-01T00:00:00.123456789Z')).toBeCloseTo(1_704_067_200.1234, 5);
  });

  it('ignores a zone designator', () => {
    expect(toEpochSeconds('2024-01-01T00:00:00+05:00')).toBe(1_704_067_200);
  });

  it('rejects text that does not start with a timestamp', () => {
    expect(() => toEpochSeconds('INFO client: Start')).toThrow(ParseError);
  });
});
