/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** 2024-01-01T10:00:00Z in epoch seconds. */
export const BASE_EPOCH = 1_704_103_200;

export const logLine = (time: string, target: string, message: string): string =>
  `2024-01-01T${time}Z  INFO ${target}: ${message}`;

export interface ClientLogOptions {
  rate?: number;
  start?: string;
  skewness?: string;
  samples?: ReadonlyArray<readonly [number | string, string]>;
  misses?: number;
}

export const clientLog = (options: ClientLogOptions = {}): string => {
  const start = options.start ?? '10:00:00.000000';
  const lines = [
    logLine(start, 'client', `Transactions rate: ${options.rate ?? 50_000} tx/s`),
    logLine(start, 'client', `Workload skewness: ${options.skewness ?? '0.0'}`),
    logLine(start, 'client', 'Start sending transactions'),
  ];
  for (const [id, time] of options.samples ?? []) {
    lines.push(logLine(time, 'client', `Sending sample transaction ${id}`));
  }
  for (let i = 0; i < (options.misses ?? 0); i += 1) {
    lines.push(logLine(start, 'client', 'Transaction rate too high for this client'));
  }
  return lines.join('\n');
};

export const CONFIG_LINES = [
  'Header number of batches threshold set to 32',
  'Header max number of batches set to 1000',
  'Max header delay set to 200 ms',
  'Garbage collection depth set to 50 rounds',
  'Sync retry delay set to 10000 ms',
  'Sync retry nodes set to 3 nodes',
  'Batch size set to 500000 B',
  'Max batch delay set to 200 ms',
  'Max concurrent requests set to 500000',
] as const;

export interface PrimaryLogOptions {
  address?: string;
  grpcPort?: number;
  created?: ReadonlyArray<readonly [string, string]>;
  committed?: ReadonlyArray<readonly [string, string]>;
  executed?: ReadonlyArray<readonly [string, string]>;
  extra?: readonly string[];
}

/** Digest-keyed events are given as `[digest, time]` pairs. */
export const primaryLog = (options: PrimaryLogOptions = {}): string => {
  const boot = '09:59:59.000000';
  const address = options.address ?? '127.0.0.1';
  const lines = [
    ...CONFIG_LINES.map((message) => logLine(boot, 'node::config', message)),
    logLine(boot, 'primary', `Primary 0 successfully booted on /ip4/${address}`),
    logLine(
      boot,
      'consensus_api',
      `Consensus API gRPC Server listening on /ip4/${address}/tcp/${options.grpcPort ?? 8000}/http`,
    ),
  ];
  for (const [digest, time] of options.created ?? []) {
    lines.push(logLine(time, 'primary::proposer', `Created B1(header) -> ${digest}`));
  }
  for (const [digest, time] of options.committed ?? []) {
    lines.push(logLine(time, 'consensus', `Committed B1(header) -> ${digest}`));
  }
  for (const [digest, time] of options.executed ?? []) {
    lines.push(logLine(time, 'executor', `Executed Batch -> ${digest}`));
  }
  lines.push(...(options.extra ?? []));
  return lines.join('\n');
};

export interface WorkerLogOptions {
  address?: string;
  batches?: ReadonlyArray<readonly [string, number, number]>;
  samples?: ReadonlyArray<readonly [string, number | string]>;
  extra?: readonly string[];
}

/** Batches are `[digest, bytes, txCount]`, samples `[digest, txId]`. */
export const workerLog = (options: WorkerLogOptions = {}): string => {
  const time = '10:00:00.500000';
  const lines = [
    logLine('09:59:59.000000', 'worker', `Worker 0 successfully booted on /ip4/${options.address ?? '127.0.0.1'}`),
  ];
  for (const [digest, bytes, txCount] of options.batches ?? []) {
    lines.push(logLine(time, 'worker::batch_maker', `Batch ${digest} contains ${bytes} B with ${txCount} tx`));
  }
  for (const [digest, txId] of options.samples ?? []) {
    lines.push(logLine(time, 'worker::batch_maker', `Batch ${digest} contains sample tx ${txId}`));
  }
  lines.push(...(options.extra ?? []));
  return lines.join('\n');
};
