/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { GrpcEndpoint, MetricsBundle } from '../core/types.js';
import { appendTextFile, writeJsonFile } from '../tools/files.js';
import { renderSummary } from './summary.js';

/**
 * Appends the text summary of a run to a report file.
 *
 * @param path - Summary file, created when missing
 */
export async function writeSummaryReport(path: string, bundle: MetricsBundle): Promise<void> {
  await appendTextFile(path, renderSummary(bundle));
}

/**
 * Writes the metrics bundle of a run to a JSON file.
 *
 * @param path - Output file path
 * @param runId - Identifier recorded alongside the metrics
 */
export async function writeMetricsReport(
  path: string,
  runId: string,
  bundle: MetricsBundle,
  directory?: string,
): Promise<void> {
  const report = {
    runId,
    timestamp: new Date().toISOString(),
    directory,
    ...bundle,
  };
  await writeJsonFile(path, report);
}

export async function writeGrpcPortsReport(path: string, endpoints: readonly GrpcEndpoint[]): Promise<void> {
  await writeJsonFile(path, {
    timestamp: new Date().toISOString(),
    endpoints,
  });
}
