/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AnalysisObserver } from '../types/observer.js';
import { readRawLogs } from '../tools/files.js';
import { ParseError } from './errors.js';
import {
  extractClientLog,
  extractGrpcEndpoint,
  extractPrimaryLog,
  extractWorkerLog,
} from './extraction/index.js';
import { joinBenchmark, type JoinedBenchmark } from './join.js';
import { logConsole } from './logging.js';
import { computeMetrics } from './metrics.js';
import type { ExecutionModel, GrpcEndpoint, LogGroup, MetricsBundle, RawLog } from './types.js';
import { ExtractionWorkerPool } from './workers/extraction-worker-pool.js';

export interface BenchmarkLogs {
  clients: readonly string[];
  primaries: readonly string[];
  workers: readonly string[];
}

export interface BenchmarkLogParserOptions {
  executionModel: ExecutionModel;
  faults?: number;
  concurrencyLevel?: number;
  pool?: ExtractionWorkerPool;
  observer?: AnalysisObserver;
}

const textsOf = (logs: readonly RawLog[]): string[] => logs.map((log) => log.text);

const runGroup = async <T>(
  pool: ExtractionWorkerPool,
  group: LogGroup,
  logs: readonly string[],
  extract: (text: string) => T,
  observer?: AnalysisObserver,
): Promise<T[]> => {
  observer?.onGroupStart?.({ group, total: logs.length });
  const records = await pool.run({
    group,
    logs,
    extract,
    onLogParsed: ({ index, total }) => observer?.onLogParsed?.({ group, current: index + 1, total }),
  });
  observer?.onGroupComplete?.({ group, total: logs.length });
  return records;
};

/**
 * Correlates the logs of one benchmark run and derives its performance
 * statistics. Build with {@link BenchmarkLogParser.parse} or
 * {@link BenchmarkLogParser.process}; read with {@link BenchmarkLogParser.result}.
 */
export class BenchmarkLogParser {
  private constructor(
    readonly joined: JoinedBenchmark,
    readonly executionModel: ExecutionModel,
    readonly faults: number,
  ) {}

  static async parse(logs: BenchmarkLogs, options: BenchmarkLogParserOptions): Promise<BenchmarkLogParser> {
    for (const group of ['clients', 'primaries', 'workers'] as const) {
      if (logs[group].length === 0) {
        throw new ParseError(`No ${group} logs to parse`, { group });
      }
    }

    const pool = options.pool ?? new ExtractionWorkerPool();
    const faults = options.faults ?? 0;
    const observer = options.observer;

    const clients = await runGroup(pool, 'clients', logs.clients, extractClientLog, observer);
    const primaries = await runGroup(pool, 'primaries', logs.primaries, extractPrimaryLog, observer);
    const workers = await runGroup(pool, 'workers', logs.workers, extractWorkerLog, observer);

    const joined = joinBenchmark({
      clients,
      primaries,
      workers,
      executionModel: options.executionModel,
      faults,
      concurrencyLevel: options.concurrencyLevel ?? 1,
    });

    const warn = (label: string, message: string): void => {
      logConsole('warn', label, [['warning', message]]);
      observer?.onWarning?.(message);
    };
    if (joined.misses !== 0) {
      warn('Client rate', `Clients missed their target rate ${joined.misses.toLocaleString('en-US')} time(s)`);
    }
    const dropped = joined.totalReceivedTx - joined.latencyPairs.length;
    if (dropped > 0) {
      warn('Sample latency', `${dropped} sample transaction(s) were left out of the end-to-end latency`);
    }

    return new BenchmarkLogParser(joined, options.executionModel, faults);
  }

  /**
   * Reads `client-*.log`, `primary-*.log` and `worker-*.log` from a benchmark
   * directory, each family sorted by file name.
   */
  static async process(directory: string, options: BenchmarkLogParserOptions): Promise<BenchmarkLogParser> {
    const [clients, primaries, workers] = await Promise.all([
      readRawLogs(directory, 'client'),
      readRawLogs(directory, 'primary'),
      readRawLogs(directory, 'worker'),
    ]);
    return BenchmarkLogParser.parse(
      { clients: textsOf(clients), primaries: textsOf(primaries), workers: textsOf(workers) },
      options,
    );
  }

  result(): MetricsBundle {
    return computeMetrics(this.joined, { faults: this.faults, executionModel: this.executionModel });
  }
}

/**
 * Recovers the consensus API endpoint of every primary, in input order. A
 * primary without one fails the whole group.
 */
export const parseGrpcEndpoints = (
  primaries: readonly string[],
  pool: ExtractionWorkerPool = new ExtractionWorkerPool(),
): Promise<GrpcEndpoint[]> => pool.run({ group: 'primaries', logs: primaries, extract: extractGrpcEndpoint });

export class GrpcPortParser {
  private constructor(readonly endpoints: readonly GrpcEndpoint[]) {}

  get ports(): string[] {
    return this.endpoints.map((endpoint) => endpoint.port);
  }

  static async parse(primaries: readonly string[], pool = new ExtractionWorkerPool()): Promise<GrpcPortParser> {
    return new GrpcPortParser(await parseGrpcEndpoints(primaries, pool));
  }

  static async process(directory: string, pool?: ExtractionWorkerPool): Promise<GrpcPortParser> {
    const primaries = await readRawLogs(directory, 'primary');
    return GrpcPortParser.parse(textsOf(primaries), pool);
  }
}
