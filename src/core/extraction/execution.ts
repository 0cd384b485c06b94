/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mergeEarliest } from '../reconciler.js';
import type { AbortSample, ExecutionRecord } from '../types.js';
import {
  EXECUTION_RULES,
  assertNotTerminated,
  captureNumber,
  collectTimedEvents,
  scanLines,
  splitLines,
} from './rules.js';

/**
 * Extracts the execution-side view of one primary. Nothing here is mandatory:
 * a node that executed nothing yields empty maps and no abort samples.
 */
export const extractExecutionLog = (text: string): ExecutionRecord => {
  assertNotTerminated(EXECUTION_RULES.termination, text, 'Primary(s) panicked');
  const lines = splitLines(text);

  const subdagPairs = scanLines(EXECUTION_RULES.subdagSize, lines).map(
    (match) => [captureNumber(match, 2), captureNumber(match, 1)] as const,
  );

  const aborts: AbortSample[] = scanLines(EXECUTION_RULES.abortRate, lines).map((match) => ({
    aborted: captureNumber(match, 1),
    total: captureNumber(match, 2),
  }));

  return {
    subscriberReceive: collectTimedEvents(EXECUTION_RULES.subscriberReceived, lines),
    handlerReceive: collectTimedEvents(EXECUTION_RULES.handlerReceived, lines),
    subdagSizes: mergeEarliest([subdagPairs]),
    executionReceive: collectTimedEvents(EXECUTION_RULES.executionReceived, lines),
    commits: collectTimedEvents(EXECUTION_RULES.batchExecuted, lines),
    aborts,
  };
};
