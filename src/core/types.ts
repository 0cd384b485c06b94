/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogRole = 'client' | 'primary' | 'worker';

export type LogGroup = 'clients' | 'primaries' | 'workers';

export type ExecutionModel = 'optme' | 'nezha' | 'blockstm' | 'serial';

export const EXECUTION_MODELS: readonly ExecutionModel[] = ['optme', 'nezha', 'blockstm', 'serial'];

export interface RawLog {
  readonly role: LogRole;
  readonly text: string;
  readonly source?: string;
}

/** Content-addressed batch or certificate identifier. Never interpreted. */
export type Digest = string;

/**
 * Sample transaction id as printed in the logs. Ids are unsigned 64-bit
 * integers and are kept as decimal text so that none of them are merged.
 */
export type SampleId = string;

export type EventKey = Digest | number;

export interface TimedEvent<K extends EventKey = Digest> {
  key: K;
  timestamp: number;
}

/** One canonical (earliest) epoch-seconds timestamp per key. */
export type EventMap<K extends EventKey = Digest> = ReadonlyMap<K, number>;

export interface ConfigSnapshot {
  headerNumOfBatchesThreshold: number;
  maxHeaderNumOfBatches: number;
  maxHeaderDelay: number;
  gcDepth: number;
  syncRetryDelay: number;
  syncRetryNodes: number;
  batchSize: number;
  maxBatchDelay: number;
  maxConcurrentRequests: number;
}

export interface ClientRecord {
  rate: number;
  start: number;
  misses: number;
  /** Sample transaction id to send time. */
  sentSamples: ReadonlyMap<SampleId, number>;
  skewness: number;
}

export interface ConsensusRecord {
  proposals: EventMap;
  orders: EventMap;
  config: ConfigSnapshot;
  address: string;
  batchToHeaderLatencies: ReadonlyMap<Digest, number>;
  headerCreationLatencies: ReadonlyMap<Digest, number>;
  headerToCertLatencies: ReadonlyMap<Digest, number>;
  certCommitLatencies: ReadonlyMap<Digest, number>;
  /** Milliseconds, unkeyed. */
  requestVoteOutboundLatencies: readonly number[];
}

export interface AbortSample {
  aborted: number;
  total: number;
}

export interface ExecutionRecord {
  subscriberReceive: EventMap;
  handlerReceive: EventMap;
  /** Batch count keyed by subdag index. */
  subdagSizes: ReadonlyMap<number, number>;
  executionReceive: EventMap;
  commits: EventMap;
  aborts: readonly AbortSample[];
}

export interface WorkerBatch {
  bytes: number;
  txCount: number;
}

export interface WorkerRecord {
  batches: ReadonlyMap<Digest, WorkerBatch>;
  /** Sample transaction id to the digest of the batch that contains it. */
  receivedSamples: ReadonlyMap<SampleId, Digest>;
  address: string;
  batchCreationLatencies: ReadonlyMap<Digest, number>;
}

export interface PrimaryRecord {
  consensus: ConsensusRecord;
  execution: ExecutionRecord;
}

export interface StageSequences {
  proposals: EventMap;
  orders: EventMap;
  subscriberReceive: EventMap;
  handlerReceive: EventMap;
  executionReceive: EventMap;
  commits: EventMap;
  batchSizes: ReadonlyMap<Digest, number>;
  txCounts: ReadonlyMap<Digest, number>;
  subdagSizes: ReadonlyMap<number, number>;
}

export interface SampleCorrelation {
  sent: ReadonlyMap<SampleId, number>;
  received: ReadonlyMap<SampleId, Digest>;
}

export interface LatencyPair {
  sent: number;
  committed: number;
}

export interface Throughput {
  tps: number;
  bps: number;
  duration: number;
}

export interface BenchmarkConfigSummary {
  faults: number;
  committeeSize: number;
  workersPerNode: number;
  collocate: boolean;
  inputRate: number;
  skewness: number;
  /** Consensus window, seconds. */
  duration: number;
  executionModel: ExecutionModel;
  concurrencyLevel: number;
  node: ConfigSnapshot;
}

export interface BenchmarkResults {
  batchCreationLatencyMs: number;
  headerCreationLatencyMs: number;
  batchToHeaderLatencyMs: number;
  headerToCertLatencyMs: number;
  requestVoteOutboundLatencyMs: number;
  certCommitLatencyMs: number;
  averageBatchSizeBytes: number;
  averageSubdagSize: number;
  maxSubdagSize: number;
  minSubdagSize: number;
  averageTxSizeBytes: number;
  actualSendingRate: number;
  totalSendingTx: number;
  totalReceivedTx: number;
  totalOrderedTx: number;
  totalCommittedTx: number;
  misses: number;
  consensus: Throughput & { latencyMs: number };
  execution: Throughput & {
    latencyMs: number;
    consensusToExecutionLatencyMs: number;
    subscriberLatencyMs: number;
    handlerLatencyMs: number;
    batchExecutionLatencyMs: number;
    abortRate: number;
    effectiveTps: number;
  };
  endToEnd: Throughput & { latencyMs: number };
}

export interface MetricsBundle {
  config: BenchmarkConfigSummary;
  results: BenchmarkResults;
}

export interface GrpcEndpoint {
  address: string;
  port: string;
}
