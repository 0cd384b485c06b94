/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { JoinedBenchmark } from './join.js';
import type {
  BenchmarkResults,
  EventKey,
  EventMap,
  ExecutionModel,
  LatencyPair,
  MetricsBundle,
  Throughput,
} from './types.js';

/** Reported for a statistic that had no samples at all. */
export const UNAVAILABLE = -1;

export const mean = (values: Iterable<number>): number | undefined => {
  let sum = 0;
  let count = 0;
  for (const value of values) {
    sum += value;
    count += 1;
  }
  return count === 0 ? undefined : sum / count;
};

const extreme = (values: Iterable<number>, pick: (a: number, b: number) => number): number | undefined => {
  let result: number | undefined;
  for (const value of values) {
    result = result === undefined ? value : pick(result, value);
  }
  return result;
};

const sum = (values: Iterable<number>): number => {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
};

/** Per-key `target - source` over the keys both maps share. */
export const stageDeltas = <K extends EventKey>(source: EventMap<K>, target: EventMap<K>): Map<K, number> => {
  const deltas = new Map<K, number>();
  for (const [key, end] of target) {
    const start = source.get(key);
    if (start !== undefined) {
      deltas.set(key, end - start);
    }
  }
  return deltas;
};

/** Mean stage latency in seconds; 0 when the maps share no key. */
export const stageLatency = <K extends EventKey>(source: EventMap<K>, target: EventMap<K>): number =>
  mean(stageDeltas(source, target).values()) ?? 0;

export interface ThroughputWindow {
  starts: Iterable<number>;
  ends: EventMap;
  bytes: number;
  txCount: number;
}

/**
 * Rate over `max(ends) - min(starts)`. Either side empty gives (0, 0, 0); a
 * window that is not positive reports its duration with zero rates.
 */
export const throughput = (window: ThroughputWindow): Throughput => {
  const start = extreme(window.starts, Math.min);
  const end = extreme(window.ends.values(), Math.max);
  if (start === undefined || end === undefined) {
    return { tps: 0, bps: 0, duration: 0 };
  }
  const duration = end - start;
  if (duration <= 0) {
    return { tps: 0, bps: 0, duration };
  }
  return { tps: window.txCount / duration, bps: window.bytes / duration, duration };
};

export const endToEndLatency = (pairs: readonly LatencyPair[]): number =>
  mean(pairs.map((pair) => pair.committed - pair.sent)) ?? 0;

export const abortRate = (aborted: number, total: number): number =>
  aborted > 0 && total > 0 ? aborted / total : 0;

export const effectiveTps = (executionTps: number, aborted: number, rate: number): number =>
  aborted > 0 ? executionTps * (1 - rate) : executionTps;

const toMs = (seconds: number): number => seconds * 1_000;

const meanMsOrUnavailable = (seconds: ReadonlyMap<string, number>): number => {
  const value = mean(seconds.values());
  return value === undefined ? UNAVAILABLE : toMs(value);
};

/**
 * Derives every reported statistic from a joined benchmark. Latencies are in
 * milliseconds, throughput in tx/s and B/s, durations in seconds.
 */
export const computeResults = (joined: JoinedBenchmark): BenchmarkResults => {
  const seq = joined.sequences;

  const consensus = throughput({
    starts: seq.proposals.values(),
    ends: seq.orders,
    bytes: sum(joined.orderedSizes.values()),
    txCount: joined.totalOrderedTx,
  });
  const execution = throughput({
    starts: seq.orders.values(),
    ends: seq.commits,
    bytes: sum(joined.committedSizes.values()),
    txCount: joined.totalCommittedTx,
  });
  const endToEnd = throughput({
    starts: joined.clientStarts,
    ends: seq.commits,
    bytes: sum(joined.committedSizes.values()),
    txCount: joined.totalCommittedTx,
  });

  const rate = abortRate(joined.aborted, joined.total);
  const subdagSizes = Array.from(seq.subdagSizes.values());
  const orderedBytes = sum(joined.orderedSizes.values());
  const requestVote = mean(joined.requestVoteOutboundLatencies);

  return {
    batchCreationLatencyMs: meanMsOrUnavailable(joined.batchCreationLatencies),
    headerCreationLatencyMs: meanMsOrUnavailable(joined.headerCreationLatencies),
    batchToHeaderLatencyMs: meanMsOrUnavailable(joined.batchToHeaderLatencies),
    headerToCertLatencyMs: meanMsOrUnavailable(joined.headerToCertLatencies),
    requestVoteOutboundLatencyMs: requestVote ?? UNAVAILABLE,
    certCommitLatencyMs: meanMsOrUnavailable(joined.certCommitLatencies),
    averageBatchSizeBytes: mean(joined.orderedSizes.values()) ?? 0,
    averageSubdagSize: mean(subdagSizes) ?? 0,
    maxSubdagSize: extreme(subdagSizes, Math.max) ?? 0,
    minSubdagSize: extreme(subdagSizes, Math.min) ?? 0,
    averageTxSizeBytes: joined.totalOrderedTx > 0 ? orderedBytes / joined.totalOrderedTx : 0,
    actualSendingRate: consensus.duration > 0 ? joined.totalSendingTx / consensus.duration : 0,
    totalSendingTx: joined.totalSendingTx,
    totalReceivedTx: joined.totalReceivedTx,
    totalOrderedTx: joined.totalOrderedTx,
    totalCommittedTx: joined.totalCommittedTx,
    misses: joined.misses,
    consensus: {
      ...consensus,
      latencyMs: toMs(stageLatency(seq.proposals, seq.orders)),
    },
    execution: {
      ...execution,
      latencyMs: toMs(stageLatency(seq.orders, seq.commits)),
      consensusToExecutionLatencyMs: toMs(stageLatency(seq.orders, seq.subscriberReceive)),
      subscriberLatencyMs: toMs(stageLatency(seq.subscriberReceive, seq.handlerReceive)),
      handlerLatencyMs: toMs(stageLatency(seq.handlerReceive, seq.executionReceive)),
      batchExecutionLatencyMs: toMs(stageLatency(seq.executionReceive, seq.commits)),
      abortRate: rate,
      effectiveTps: effectiveTps(execution.tps, joined.aborted, rate),
    },
    endToEnd: {
      ...endToEnd,
      latencyMs: toMs(endToEndLatency(joined.latencyPairs)),
    },
  };
};

export const computeMetrics = (
  joined: JoinedBenchmark,
  options: { faults: number; executionModel: ExecutionModel },
): MetricsBundle => {
  const results = computeResults(joined);
  return {
    config: {
      faults: options.faults,
      committeeSize: joined.committeeSize,
      workersPerNode: joined.workersPerNode,
      collocate: joined.collocate,
      inputRate: joined.inputRate,
      skewness: joined.skewness,
      duration: results.consensus.duration,
      executionModel: options.executionModel,
      concurrencyLevel: joined.concurrencyLevel,
      node: { ...joined.config },
    },
    results,
  };
};
