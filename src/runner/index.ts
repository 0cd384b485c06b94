/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runLogAnalysis,
  runGrpcPortDiscovery,
  type LogAnalysisOptions,
  type LogAnalysisResult,
  type GrpcPortsOptions,
} from './log-analysis.js';

export { renderSummary } from './summary.js';

export {
  writeSummaryReport,
  writeMetricsReport,
  writeGrpcPortsReport,
} from './report-writers.js';
