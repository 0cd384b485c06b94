/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EventKey, EventMap, TimedEvent } from './types.js';

export type KeyedTimestamps<K extends EventKey> = Iterable<readonly [K, number]>;

/**
 * Collapses observations of the same keyed event into the earliest timestamp.
 * Order of the sources does not matter; keys never observed stay absent.
 */
export const mergeEarliest = <K extends EventKey>(
  sources: Iterable<KeyedTimestamps<K>>,
): EventMap<K> => {
  const merged = new Map<K, number>();
  for (const source of sources) {
    for (const [key, timestamp] of source) {
      const current = merged.get(key);
      if (current === undefined || timestamp < current) {
        merged.set(key, timestamp);
      }
    }
  }
  return merged;
};

export const reconcileEvents = <K extends EventKey>(events: Iterable<TimedEvent<K>>): EventMap<K> => {
  const pairs: Array<readonly [K, number]> = [];
  for (const event of events) {
    pairs.push([event.key, event.timestamp]);
  }
  return mergeEarliest([pairs]);
};

/**
 * Overlays keyed values in order; a later source replaces an earlier value.
 */
export const mergeLatest = <K extends EventKey, V>(
  sources: Iterable<ReadonlyMap<K, V>>,
): ReadonlyMap<K, V> => {
  const merged = new Map<K, V>();
  for (const source of sources) {
    for (const [key, value] of source) {
      merged.set(key, value);
    }
  }
  return merged;
};
