/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { availableParallelism } from 'node:os';
import { resolve } from 'node:path';

export interface AnalyzerEnvConfig {
  workers: number;
  outputDir: string;
  resultsDir?: string;
}

export const DEFAULT_OUTPUT_DIR = 'benchmark/results';

const parsePositiveInt = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
};

export function resolveAnalyzerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AnalyzerEnvConfig {
  const resultsDir = env['BENCH_LOGS_RESULTS_DB'];
  return {
    workers: parsePositiveInt(env['BENCH_LOGS_WORKERS']) ?? availableParallelism(),
    outputDir: resolve(cwd, env['BENCH_LOGS_OUTPUT'] ?? DEFAULT_OUTPUT_DIR),
    resultsDir: resultsDir ? resolve(cwd, resultsDir) : undefined,
  };
}
