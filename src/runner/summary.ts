/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { MetricsBundle } from '../core/index.js';

const RULE = '-----------------------------------------';

const int = (value: number): string => Math.round(value).toLocaleString('en-US');

/**
 * Renders the fixed CONFIG / RESULTS summary of one benchmark run.
 */
export const renderSummary = (bundle: MetricsBundle): string => {
  const { config, results } = bundle;
  const node = config.node;
  const lines = [
    '',
    RULE,
    ' SUMMARY:',
    RULE,
    ' + CONFIG:',
    ` Faults: ${config.faults} node(s)`,
    ` Committee size: ${config.committeeSize} node(s)`,
    ` Worker(s) per node: ${config.workersPerNode} worker(s)`,
    ` Collocate primary and workers: ${config.collocate}`,
    ` Input rate: ${int(config.inputRate)} tx/s`,
    ` Input skewness: ${config.skewness.toFixed(1)} `,
    ` Execution time: ${int(config.duration)} s`,
    ` Execution mode: ${config.executionModel} `,
    ` Concurrency level: ${config.concurrencyLevel} `,
    '',
    ` Header number of batches threshold: ${int(node.headerNumOfBatchesThreshold)} digests`,
    ` Header maximum number of batches: ${int(node.maxHeaderNumOfBatches)} digests`,
    ` Max header delay: ${int(node.maxHeaderDelay)} ms`,
    ` GC depth: ${int(node.gcDepth)} round(s)`,
    ` Sync retry delay: ${int(node.syncRetryDelay)} ms`,
    ` Sync retry nodes: ${int(node.syncRetryNodes)} node(s)`,
    ` batch size: ${int(node.batchSize)} B`,
    ` Max batch delay: ${int(node.maxBatchDelay)} ms`,
    ` Max concurrent requests: ${int(node.maxConcurrentRequests)} `,
    '',
    ' + RESULTS:',
    ` Batch creation avg latency: ${int(results.batchCreationLatencyMs)} ms`,
    ` Header creation avg latency: ${int(results.headerCreationLatencyMs)} ms`,
    ` \tBatch to header avg latency: ${int(results.batchToHeaderLatencyMs)} ms`,
    ` Header to certificate avg latency: ${int(results.headerToCertLatencyMs)} ms`,
    ` \tRequest vote outbound avg latency: ${int(results.requestVoteOutboundLatencyMs)} ms`,
    ` Average Batch size: ${Math.round(results.averageBatchSizeBytes / 1024)} KB`,
    ` Average Subdag size: ${Math.round(results.averageSubdagSize)} `,
    ` \tMax Subdag size: ${results.maxSubdagSize} `,
    ` \tMin Subdag size: ${results.minSubdagSize} `,
    ` Average Transaction size: ${Math.round(results.averageTxSizeBytes)} B`,
    ` \tActual Sending Rate: ${int(results.actualSendingRate)} tx/s`,
    ` \tTotal Sending Transactions: ${results.totalSendingTx} tx`,
    ` \tTotal Received Transactions: ${results.totalReceivedTx} tx`,
    ` \tTotal Ordered Transactions: ${results.totalOrderedTx} tx`,
    ` \tTotal Committed Transactions: ${results.totalCommittedTx} tx`,
    ` Certificate commit avg latency: ${int(results.certCommitLatencyMs)} ms`,
    '',
    ` Consensus TPS: ${int(results.consensus.tps)} tx/s`,
    ` Consensus BPS: ${int(results.consensus.bps)} B/s`,
    ` Consensus latency: ${int(results.consensus.latencyMs)} ms`,
    '',
    ` Execution TPS: ${int(results.execution.tps)} tx/s`,
    ` Execution BPS: ${int(results.execution.bps)} B/s`,
    ` Execution latency: ${int(results.execution.latencyMs)} ms`,
    ` \tConsensus to execution latency: ${int(results.execution.consensusToExecutionLatencyMs)} ms`,
    ` \tSubscriber latency: ${int(results.execution.subscriberLatencyMs)} ms`,
    ` \tConsensus handler latency: ${int(results.execution.handlerLatencyMs)} ms`,
    ` \tBatch execution latency: ${int(results.execution.batchExecutionLatencyMs)} ms`,
    ` \tAverage Abort Rate: ${(results.execution.abortRate * 100).toFixed(2)} % `,
    ` \tEffective TPS: ${int(results.execution.effectiveTps)} tx/s`,
    '',
    ` End-to-end TPS: ${int(results.endToEnd.tps)} tx/s`,
    ` End-to-end BPS: ${int(results.endToEnd.bps)} B/s`,
    ` End-to-end latency: ${int(results.endToEnd.latencyMs)} ms`,
    RULE,
    '',
  ];
  return lines.join('\n');
};
