/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import initSqlJs from 'sql.js';
import { join } from 'node:path';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { ensureDirectory } from './files.js';
import { EXECUTION_MODELS, type ExecutionModel, type MetricsBundle } from '../core/index.js';

type SqlJs = Awaited<ReturnType<typeof initSqlJs>>;
type SqlJsDatabase = InstanceType<SqlJs['Database']>;

const DEFAULT_FILE_NAME = 'benchmark-results.sqlite';

let sqlModule: Promise<SqlJs> | undefined;
const loadSql = (): Promise<SqlJs> => {
  sqlModule ??= initSqlJs();
  return sqlModule;
};

export interface SqliteResultStoreOptions {
  baseDir: string;
  fileName?: string;
}

export interface BenchmarkRunInput {
  runId: string;
  directory?: string;
  bundle: MetricsBundle;
  recordedAt?: Date;
}

export interface BenchmarkRunSummary {
  runId: string;
  recordedAt: string;
  directory?: string;
  executionModel: ExecutionModel;
  faults: number;
  committeeSize: number;
  consensusTps: number;
  executionTps: number;
  endToEndTps: number;
  endToEndLatencyMs: number;
}

export interface BenchmarkRunRecord extends BenchmarkRunSummary {
  bundle: MetricsBundle;
}

export function getResultDatabasePath(baseDir: string, fileName = DEFAULT_FILE_NAME): string {
  return join(baseDir, fileName);
}

/**
 * Run history of benchmark analyses, one SQLite file per store directory.
 * The database is written back to disk after every change.
 */
export class SqliteResultStore {
  private constructor(
    private readonly db: SqlJsDatabase,
    readonly path: string,
  ) {}

  static async open(options: SqliteResultStoreOptions): Promise<SqliteResultStore> {
    const SQL = await loadSql();
    await ensureDirectory(options.baseDir);
    const path = getResultDatabasePath(options.baseDir, options.fileName);
    const existed = existsSync(path);
    const db = existed ? new SQL.Database(readFileSync(path)) : new SQL.Database();
    const store = new SqliteResultStore(db, path);
    store.setup();
    if (!existed) {
      store.persist();
    }
    return store;
  }

  async recordRun(input: BenchmarkRunInput): Promise<BenchmarkRunRecord> {
    const { bundle } = input;
    const record: BenchmarkRunRecord = {
      runId: input.runId,
      recordedAt: (input.recordedAt ?? new Date()).toISOString(),
      directory: input.directory,
      executionModel: bundle.config.executionModel,
      faults: bundle.config.faults,
      committeeSize: bundle.config.committeeSize,
      consensusTps: bundle.results.consensus.tps,
      executionTps: bundle.results.execution.tps,
      endToEndTps: bundle.results.endToEnd.tps,
      endToEndLatencyMs: bundle.results.endToEnd.latencyMs,
      bundle,
    };
    const stmt = this.db.prepare(
      `INSERT INTO benchmark_runs (run_id, recorded_at, directory, execution_model, faults, committee_size,
                                   consensus_tps, execution_tps, end_to_end_tps, end_to_end_latency_ms, bundle)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(run_id) DO UPDATE SET recorded_at=excluded.recorded_at, directory=excluded.directory,
         execution_model=excluded.execution_model, faults=excluded.faults, committee_size=excluded.committee_size,
         consensus_tps=excluded.consensus_tps, execution_tps=excluded.execution_tps,
         end_to_end_tps=excluded.end_to_end_tps, end_to_end_latency_ms=excluded.end_to_end_latency_ms,
         bundle=excluded.bundle`,
    );
    try {
      stmt.bind([
        record.runId,
        record.recordedAt,
        record.directory ?? null,
        record.executionModel,
        record.faults,
        record.committeeSize,
        record.consensusTps,
        record.executionTps,
        record.endToEndTps,
        record.endToEndLatencyMs,
        JSON.stringify(bundle),
      ]);
      stmt.step();
    } finally {
      stmt.free();
    }
    this.persist();
    return record;
  }

  async listRuns(): Promise<BenchmarkRunSummary[]> {
    const stmt = this.db.prepare(
      `SELECT run_id, recorded_at, directory, execution_model, faults, committee_size,
              consensus_tps, execution_tps, end_to_end_tps, end_to_end_latency_ms
       FROM benchmark_runs
       ORDER BY recorded_at ASC, rowid ASC`,
    );
    const runs: BenchmarkRunSummary[] = [];
    try {
      while (stmt.step()) {
        runs.push(toSummary(stmt.getAsObject()));
      }
    } finally {
      stmt.free();
    }
    return runs;
  }

  async loadRun(runId: string): Promise<BenchmarkRunRecord | undefined> {
    const stmt = this.db.prepare('SELECT * FROM benchmark_runs WHERE run_id = ?');
    try {
      stmt.bind([runId]);
      if (!stmt.step()) {
        return undefined;
      }
      const row = stmt.getAsObject();
      const bundle: unknown = JSON.parse(readText(row, 'bundle'));
      if (!isMetricsBundle(bundle)) {
        throw new Error(`Stored run ${runId} does not hold a metrics bundle`);
      }
      return { ...toSummary(row), bundle };
    } finally {
      stmt.free();
    }
  }

  close(): void {
    this.db.close();
  }

  private setup(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS benchmark_runs (
        run_id TEXT PRIMARY KEY,
        recorded_at TEXT NOT NULL,
        directory TEXT,
        execution_model TEXT NOT NULL,
        faults INTEGER NOT NULL,
        committee_size INTEGER NOT NULL,
        consensus_tps REAL NOT NULL,
        execution_tps REAL NOT NULL,
        end_to_end_tps REAL NOT NULL,
        end_to_end_latency_ms REAL NOT NULL,
        bundle TEXT NOT NULL
      );
    `);
  }

  private persist(): void {
    writeFileSync(this.path, Buffer.from(this.db.export()));
  }
}

const readText = (row: Record<string, unknown>, key: string): string => {
  const value = row[key];
  if (typeof value !== 'string') {
    throw new Error(`Column ${key} is not text`);
  }
  return value;
};

const readNumber = (row: Record<string, unknown>, key: string): number => {
  const value = row[key];
  if (typeof value !== 'number') {
    throw new Error(`Column ${key} is not numeric`);
  }
  return value;
};

const readExecutionModel = (row: Record<string, unknown>): ExecutionModel => {
  const value = readText(row, 'execution_model');
  const model = EXECUTION_MODELS.find((candidate) => candidate === value);
  if (!model) {
    throw new Error(`Unknown execution model ${value}`);
  }
  return model;
};

const toSummary = (row: Record<string, unknown>): BenchmarkRunSummary => {
  const directory = row['directory'];
  return {
    runId: readText(row, 'run_id'),
    recordedAt: readText(row, 'recorded_at'),
    directory: typeof directory === 'string' ? directory : undefined,
    executionModel: readExecutionModel(row),
    faults: readNumber(row, 'faults'),
    committeeSize: readNumber(row, 'committee_size'),
    consensusTps: readNumber(row, 'consensus_tps'),
    executionTps: readNumber(row, 'execution_tps'),
    endToEndTps: readNumber(row, 'end_to_end_tps'),
    endToEndLatencyMs: readNumber(row, 'end_to_end_latency_ms'),
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

function isMetricsBundle(value: unknown): value is MetricsBundle {
  if (!isRecord(value)) {
    return false;
  }
  const { config, results } = value;
  return isRecord(config) && isRecord(results) && isRecord(config['node']) && isRecord(results['consensus']);
}
