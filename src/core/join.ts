/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ParseError } from './errors.js';
import { mergeEarliest, mergeLatest } from './reconciler.js';
import type {
  AbortSample,
  ClientRecord,
  ConfigSnapshot,
  Digest,
  EventKey,
  EventMap,
  ExecutionModel,
  ExecutionRecord,
  LatencyPair,
  PrimaryRecord,
  SampleCorrelation,
  StageSequences,
  WorkerRecord,
} from './types.js';

export interface JoinInput {
  clients: readonly ClientRecord[];
  primaries: readonly PrimaryRecord[];
  workers: readonly WorkerRecord[];
  executionModel: ExecutionModel;
  faults: number;
  concurrencyLevel: number;
}

export interface JoinedBenchmark {
  sequences: StageSequences;
  config: ConfigSnapshot;
  committeeSize: number;
  workersPerNode: number;
  collocate: boolean;
  concurrencyLevel: number;
  inputRate: number;
  skewness: number;
  misses: number;
  clientStarts: readonly number[];
  totalSendingTx: number;
  totalReceivedTx: number;
  totalOrderedTx: number;
  totalCommittedTx: number;
  /** Byte sizes of ordered batches. */
  orderedSizes: ReadonlyMap<Digest, number>;
  /** Byte sizes of executed batches. */
  committedSizes: ReadonlyMap<Digest, number>;
  latencyPairs: readonly LatencyPair[];
  aborted: number;
  total: number;
  batchCreationLatencies: ReadonlyMap<Digest, number>;
  headerCreationLatencies: ReadonlyMap<Digest, number>;
  batchToHeaderLatencies: ReadonlyMap<Digest, number>;
  headerToCertLatencies: ReadonlyMap<Digest, number>;
  certCommitLatencies: ReadonlyMap<Digest, number>;
  requestVoteOutboundLatencies: readonly number[];
}

/**
 * Sums the transaction counts of the digests present in `events`.
 * Digests whose count no worker reported are left out of the sum.
 */
export const sumTxCounts = (events: EventMap, txCounts: ReadonlyMap<Digest, number>): number => {
  let sum = 0;
  for (const digest of events.keys()) {
    const count = txCounts.get(digest);
    if (count !== undefined) {
      sum += count;
    }
  }
  return sum;
};

export const restrictTo = <K extends EventKey, V>(
  values: ReadonlyMap<K, V>,
  keys: ReadonlyMap<K, unknown>,
): ReadonlyMap<K, V> => {
  const restricted = new Map<K, V>();
  for (const [key, value] of values) {
    if (keys.has(key)) {
      restricted.set(key, value);
    }
  }
  return restricted;
};

export const isCollocated = (
  primaryAddresses: Iterable<string>,
  workerAddresses: Iterable<string>,
): boolean => {
  const primaries = new Set(primaryAddresses);
  const workers = new Set(workerAddresses);
  if (primaries.size !== workers.size) {
    return false;
  }
  for (const address of primaries) {
    if (!workers.has(address)) {
      return false;
    }
  }
  return true;
};

export const committeeShape = (
  primaryCount: number,
  workerCount: number,
  faults: number,
): { committeeSize: number; workersPerNode: number } => {
  if (primaryCount <= 0) {
    throw new ParseError('At least one primary log is required');
  }
  return {
    committeeSize: primaryCount + faults,
    workersPerNode: Math.floor(workerCount / primaryCount),
  };
};

/** Only the nezha execution model runs with a configurable concurrency level. */
export const resolveConcurrencyLevel = (model: ExecutionModel, requested: number): number =>
  model === 'nezha' ? requested : 1;

/**
 * Client `i` feeds worker `i`: their samples form one correlation lane.
 * Unpaired clients or workers are left out.
 */
export const pairSampleLanes = (
  clients: readonly ClientRecord[],
  workers: readonly WorkerRecord[],
): SampleCorrelation[] => {
  const lanes = Math.min(clients.length, workers.length);
  return Array.from({ length: lanes }, (_, i) => ({
    sent: clients[i].sentSamples,
    received: workers[i].receivedSamples,
  }));
};

/**
 * Joins each sample's send time to the execution time of the batch carrying
 * it. Samples whose batch never executed, or that the lane's client never
 * sent, are left out.
 */
export const correlateSamples = (lanes: readonly SampleCorrelation[], commits: EventMap): LatencyPair[] => {
  const pairs: LatencyPair[] = [];
  for (const lane of lanes) {
    for (const [txId, digest] of lane.received) {
      const committed = commits.get(digest);
      const sentAt = lane.sent.get(txId);
      if (committed === undefined || sentAt === undefined) {
        continue;
      }
      pairs.push({ sent: sentAt, committed });
    }
  }
  return pairs;
};

/**
 * Every replica reports the same interval, so the summed counts are divided
 * by the committee size to count each round once.
 */
export const accountAborts = (
  executions: readonly ExecutionRecord[],
  committeeSize: number,
): AbortSample => {
  let aborted = 0;
  let total = 0;
  for (const execution of executions) {
    for (const sample of execution.aborts) {
      aborted += sample.aborted;
      total += sample.total;
    }
  }
  return { aborted: aborted / committeeSize, total: total / committeeSize };
};

export const buildStageSequences = (
  primaries: readonly PrimaryRecord[],
  workers: readonly WorkerRecord[],
): StageSequences => {
  const batches = mergeLatest(workers.map((worker) => worker.batches));
  const batchSizes = new Map<Digest, number>();
  const txCounts = new Map<Digest, number>();
  for (const [digest, batch] of batches) {
    batchSizes.set(digest, batch.bytes);
    txCounts.set(digest, batch.txCount);
  }
  return {
    proposals: mergeEarliest(primaries.map((p) => p.consensus.proposals)),
    orders: mergeEarliest(primaries.map((p) => p.consensus.orders)),
    subscriberReceive: mergeEarliest(primaries.map((p) => p.execution.subscriberReceive)),
    handlerReceive: mergeEarliest(primaries.map((p) => p.execution.handlerReceive)),
    executionReceive: mergeEarliest(primaries.map((p) => p.execution.executionReceive)),
    commits: mergeEarliest(primaries.map((p) => p.execution.commits)),
    subdagSizes: mergeEarliest(primaries.map((p) => p.execution.subdagSizes)),
    batchSizes,
    txCounts,
  };
};

export const joinBenchmark = (input: JoinInput): JoinedBenchmark => {
  const { clients, primaries, workers } = input;
  const [firstClient] = clients;
  const [firstPrimary] = primaries;
  if (!firstClient || !firstPrimary || workers.length === 0) {
    throw new ParseError('Client, primary and worker logs are all required');
  }

  const { committeeSize, workersPerNode } = committeeShape(
    primaries.length,
    workers.length,
    input.faults,
  );
  const sequences = buildStageSequences(primaries, workers);
  const { aborted, total } = accountAborts(
    primaries.map((p) => p.execution),
    committeeSize,
  );

  return {
    sequences,
    config: firstPrimary.consensus.config,
    committeeSize,
    workersPerNode,
    collocate: isCollocated(
      primaries.map((p) => p.consensus.address),
      workers.map((w) => w.address),
    ),
    concurrencyLevel: resolveConcurrencyLevel(input.executionModel, input.concurrencyLevel),
    inputRate: clients.reduce((sum, client) => sum + client.rate, 0),
    skewness: firstClient.skewness,
    misses: clients.reduce((sum, client) => sum + client.misses, 0),
    clientStarts: clients.map((client) => client.start),
    totalSendingTx: clients.reduce((sum, client) => sum + client.sentSamples.size, 0),
    totalReceivedTx: workers.reduce((sum, worker) => sum + worker.receivedSamples.size, 0),
    totalOrderedTx: sumTxCounts(sequences.orders, sequences.txCounts),
    totalCommittedTx: sumTxCounts(sequences.commits, sequences.txCounts),
    orderedSizes: restrictTo(sequences.batchSizes, sequences.orders),
    committedSizes: restrictTo(sequences.batchSizes, sequences.commits),
    latencyPairs: correlateSamples(pairSampleLanes(clients, workers), sequences.commits),
    aborted,
    total,
    batchCreationLatencies: mergeLatest(workers.map((w) => w.batchCreationLatencies)),
    headerCreationLatencies: mergeLatest(primaries.map((p) => p.consensus.headerCreationLatencies)),
    batchToHeaderLatencies: mergeLatest(primaries.map((p) => p.consensus.batchToHeaderLatencies)),
    headerToCertLatencies: mergeLatest(primaries.map((p) => p.consensus.headerToCertLatencies)),
    certCommitLatencies: mergeLatest(primaries.map((p) => p.consensus.certCommitLatencies)),
    requestVoteOutboundLatencies: primaries.flatMap((p) => p.consensus.requestVoteOutboundLatencies),
  };
};
