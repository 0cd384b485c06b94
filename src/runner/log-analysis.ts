/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  BenchmarkLogParser,
  ExtractionWorkerPool,
  GrpcPortParser,
  type ExecutionModel,
  type GrpcEndpoint,
  type MetricsBundle,
} from '../core/index.js';
import type { AnalysisObserver } from '../types/observer.js';
import { SqliteResultStore } from '../tools/index.js';
import { writeGrpcPortsReport, writeMetricsReport, writeSummaryReport } from './report-writers.js';

export interface LogAnalysisOptions {
  directory: string;
  outputDir: string;
  executionModel: ExecutionModel;
  faults?: number;
  concurrencyLevel?: number;
  workers?: number;
  summaryPath?: string;
  jsonPath?: string;
  resultsDir?: string;
  runId?: string;
  observer?: AnalysisObserver;
}

export interface LogAnalysisResult {
  runId: string;
  bundle: MetricsBundle;
  summaryPath: string;
  jsonPath: string;
  resultsDatabasePath?: string;
}

/**
 * Main entry point for analyzing one benchmark directory.
 * Parses every log, derives the metrics, then writes the summary, the JSON
 * report and, when a results directory is configured, the run history.
 */
export async function runLogAnalysis(options: LogAnalysisOptions): Promise<LogAnalysisResult> {
  const runId = options.runId ?? randomUUID();
  const summaryPath = options.summaryPath ?? join(options.outputDir, 'summary.txt');
  const jsonPath = options.jsonPath ?? join(options.outputDir, `${runId}-metrics.json`);

  const parser = await BenchmarkLogParser.process(options.directory, {
    executionModel: options.executionModel,
    faults: options.faults,
    concurrencyLevel: options.concurrencyLevel,
    pool: new ExtractionWorkerPool({ concurrency: options.workers }),
    observer: options.observer,
  });
  const bundle = parser.result();
  options.observer?.onResult?.(bundle);

  await writeSummaryReport(summaryPath, bundle);
  await writeMetricsReport(jsonPath, runId, bundle, options.directory);

  let resultsDatabasePath: string | undefined;
  if (options.resultsDir) {
    const store = await SqliteResultStore.open({ baseDir: options.resultsDir });
    try {
      await store.recordRun({ runId, directory: options.directory, bundle });
      resultsDatabasePath = store.path;
    } finally {
      store.close();
    }
  }

  return { runId, bundle, summaryPath, jsonPath, resultsDatabasePath };
}

export interface GrpcPortsOptions {
  directory: string;
  outputDir: string;
  workers?: number;
}

export async function runGrpcPortDiscovery(
  options: GrpcPortsOptions,
): Promise<{ endpoints: readonly GrpcEndpoint[]; reportPath: string }> {
  const parser = await GrpcPortParser.process(
    options.directory,
    new ExtractionWorkerPool({ concurrency: options.workers }),
  );
  const reportPath = join(options.outputDir, 'grpc-ports.json');
  await writeGrpcPortsReport(reportPath, parser.endpoints);
  return { endpoints: parser.endpoints, reportPath };
}
