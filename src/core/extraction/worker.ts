/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Digest, SampleId, WorkerBatch, WorkerRecord } from '../types.js';
import {
  WORKER_RULES,
  assertNotTerminated,
  captureNumber,
  captureText,
  collectKeyedValues,
  requireFirst,
  scanLines,
  splitLines,
} from './rules.js';

export const extractWorkerLog = (text: string): WorkerRecord => {
  assertNotTerminated(WORKER_RULES.termination, text, 'Worker(s) panicked');
  const lines = splitLines(text);

  const batches = new Map<Digest, WorkerBatch>();
  for (const match of scanLines(WORKER_RULES.batchContents, lines)) {
    batches.set(captureText(match, 1), {
      bytes: captureNumber(match, 2),
      txCount: captureNumber(match, 3),
    });
  }

  const receivedSamples = new Map<SampleId, Digest>();
  for (const match of scanLines(WORKER_RULES.batchSample, lines)) {
    receivedSamples.set(captureText(match, 2), captureText(match, 1));
  }

  const batchCreationLatencies = collectKeyedValues(WORKER_RULES.batchCreation, lines);

  const address = captureText(requireFirst(WORKER_RULES.address, lines), 1);

  return { batches, receivedSamples, address, batchCreationLatencies };
};
