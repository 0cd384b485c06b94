/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ConfigSnapshot, ConsensusRecord } from '../types.js';
import {
  CONFIG_RULES,
  CONSENSUS_RULES,
  assertNotTerminated,
  captureNumber,
  captureText,
  collectKeyedValues,
  collectTimedEvents,
  requireFirst,
  scanLines,
  splitLines,
} from './rules.js';

/**
 * Reads the nine configuration parameters a primary prints at boot.
 * Every one of them is mandatory.
 */
export const extractConfigSnapshot = (lines: readonly string[]): ConfigSnapshot => {
  const read = (key: keyof typeof CONFIG_RULES): number =>
    captureNumber(requireFirst(CONFIG_RULES[key], lines), 1);
  return {
    headerNumOfBatchesThreshold: read('headerNumOfBatchesThreshold'),
    maxHeaderNumOfBatches: read('maxHeaderNumOfBatches'),
    maxHeaderDelay: read('maxHeaderDelay'),
    gcDepth: read('gcDepth'),
    syncRetryDelay: read('syncRetryDelay'),
    syncRetryNodes: read('syncRetryNodes'),
    batchSize: read('batchSize'),
    maxBatchDelay: read('maxBatchDelay'),
    maxConcurrentRequests: read('maxConcurrentRequests'),
  };
};

/**
 * Extracts the consensus-side view of one primary: proposals, commits,
 * header/certificate latencies and its configuration.
 */
export const extractConsensusLog = (text: string): ConsensusRecord => {
  assertNotTerminated(CONSENSUS_RULES.termination, text, 'Primary(s) panicked');
  const lines = splitLines(text);

  return {
    proposals: collectTimedEvents(CONSENSUS_RULES.headerProposed, lines),
    orders: collectTimedEvents(CONSENSUS_RULES.headerCommitted, lines),
    batchToHeaderLatencies: collectKeyedValues(CONSENSUS_RULES.batchToHeader, lines),
    headerCreationLatencies: collectKeyedValues(CONSENSUS_RULES.headerCreation, lines),
    headerToCertLatencies: collectKeyedValues(CONSENSUS_RULES.headerToCertificate, lines),
    certCommitLatencies: collectKeyedValues(CONSENSUS_RULES.certificateCommit, lines),
    requestVoteOutboundLatencies: scanLines(CONSENSUS_RULES.requestVoteOutbound, lines).map((match) =>
      captureNumber(match, 1),
    ),
    config: extractConfigSnapshot(lines),
    address: captureText(requireFirst(CONSENSUS_RULES.address, lines), 1),
  };
};
