/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ClientRecord, SampleId } from '../types.js';
import {
  CLIENT_RULES,
  assertNotTerminated,
  captureNumber,
  captureText,
  captureTimestamp,
  countOccurrences,
  requireFirst,
  scanLines,
  splitLines,
} from './rules.js';

/**
 * Extracts the send-side view of one benchmark client.
 */
export const extractClientLog = (text: string): ClientRecord => {
  assertNotTerminated(CLIENT_RULES.termination, text, 'Client(s) panicked');
  const lines = splitLines(text);

  const rate = captureNumber(requireFirst(CLIENT_RULES.rate, lines), 1);
  const start = captureTimestamp(requireFirst(CLIENT_RULES.start, lines), 1);
  const misses = countOccurrences(CLIENT_RULES.rateMiss, text);

  // A resent id keeps its latest send time.
  const sentSamples = new Map<SampleId, number>();
  for (const match of scanLines(CLIENT_RULES.sampleSent, lines)) {
    sentSamples.set(captureText(match, 2), captureTimestamp(match, 1));
  }

  const skewness = captureNumber(requireFirst(CLIENT_RULES.skewness, lines), 1);

  return { rate, start, misses, sentSamples, skewness };
};
