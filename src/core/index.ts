/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './timestamp.js';
export * from './reconciler.js';
export * from './extraction/index.js';
export * from './join.js';
export * from './metrics.js';
export { ExtractionWorkerPool, type ExtractionWorkerPoolOptions, type ExtractionRequest } from './workers/extraction-worker-pool.js';
export {
  BenchmarkLogParser,
  GrpcPortParser,
  parseGrpcEndpoints,
  type BenchmarkLogs,
  type BenchmarkLogParserOptions,
} from './log-parser.js';
export { logConsole, formatLogBlock, type LogLevel, type LogField } from './logging.js';
