/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { mergeEarliest, mergeLatest, reconcileEvents } from './reconciler.js';

const a = new Map([
  ['D1=', 10],
  ['D2=', 5],
]);
const b = new Map([
  ['D1=', 7],
  ['D3=', 1],
]);

describe('mergeEarliest', () => {
  it('keeps the minimum timestamp per key', () => {
    expect(Object.fromEntries(mergeEarliest([a, b]))).toEqual({ 'D1=': 7, 'D2=': 5, 'D3=': 1 });
  });

  it('does not depend on source order', () => {
    expect(mergeEarliest([b, a])).toEqual(mergeEarliest([a, b]));
  });

  it('is idempotent', () => {
    const once = mergeEarliest([a, b]);
    expect(mergeEarliest([once, once])).toEqual(once);
    expect(mergeEarliest([once, a])).toEqual(once);
  });

  it('returns an empty map without sources', () => {
    expect(mergeEarliest<string>([]).size).toBe(0);
  });
});

describe('reconcileEvents', () => {
  it('collapses repeated observations of one key', () => {
    const events = [
      { key: 'D1=', timestamp: 3 },
      { key: 'D1=', timestamp: 2 },
      { key: 'D1=', timestamp: 4 },
    ];
    expect(reconcileEvents(events).get('D1=')).toBe(2);
  });
});

describe('mergeLatest', () => {
  it('lets later sources override earlier ones', () => {
    expect(mergeLatest([a, b]).get('D1=')).toBe(7);
    expect(mergeLatest([b, a]).get('D1=')).toBe(10);
  });
});
