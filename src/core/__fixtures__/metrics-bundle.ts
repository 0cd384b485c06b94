/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { MetricsBundle } from '../types.js';

export const metricsBundle = (): MetricsBundle => ({
  config: {
    faults: 1,
    committeeSize: 4,
    workersPerNode: 1,
    collocate: true,
    inputRate: 50_000,
    skewness: 0.5,
    duration: 30,
    executionModel: 'nezha',
    concurrencyLevel: 8,
    node: {
      headerNumOfBatchesThreshold: 32,
      maxHeaderNumOfBatches: 1000,
      maxHeaderDelay: 200,
      gcDepth: 50,
      syncRetryDelay: 10_000,
      syncRetryNodes: 3,
      batchSize: 500_000,
      maxBatchDelay: 200,
      maxConcurrentRequests: 500_000,
    },
  },
  results: {
    batchCreationLatencyMs: 12.4,
    headerCreationLatencyMs: 8,
    batchToHeaderLatencyMs: 20,
    headerToCertLatencyMs: 150,
    requestVoteOutboundLatencyMs: -1,
    certCommitLatencyMs: 300,
    averageBatchSizeBytes: 512_000,
    averageSubdagSize: 3.6,
    maxSubdagSize: 6,
    minSubdagSize: 1,
    averageTxSizeBytes: 512,
    actualSendingRate: 49_500.4,
    totalSendingTx: 1_000,
    totalReceivedTx: 990,
    totalOrderedTx: 1_480_000,
    totalCommittedTx: 1_470_000,
    misses: 0,
    consensus: { tps: 49_333.3, bps: 25_258_666.6, duration: 30, latencyMs: 1_500.5 },
    execution: {
      tps: 49_000,
      bps: 25_088_000,
      duration: 30,
      latencyMs: 200,
      consensusToExecutionLatencyMs: 10,
      subscriberLatencyMs: 5,
      handlerLatencyMs: 5,
      batchExecutionLatencyMs: 180,
      abortRate: 0.1234,
      effectiveTps: 42_953.4,
    },
    endToEnd: { tps: 48_000, bps: 24_576_000, duration: 31, latencyMs: 2_100 },
  },
});
