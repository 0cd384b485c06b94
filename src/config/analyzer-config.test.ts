/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { availableParallelism } from 'node:os';
import { describe, expect, it } from 'vitest';
import { resolveAnalyzerConfigFromEnv } from './analyzer-config.js';

describe('resolveAnalyzerConfigFromEnv', () => {
  it('falls back to defaults', () => {
    expect(resolveAnalyzerConfigFromEnv({}, '/work')).toEqual({
      workers: availableParallelism(),
      outputDir: '/work/benchmark/results',
      resultsDir: undefined,
    });
  });

  it('reads the environment', () => {
    const config = resolveAnalyzerConfigFromEnv(
      { BENCH_LOGS_WORKERS: '3', BENCH_LOGS_OUTPUT: 'reports', BENCH_LOGS_RESULTS_DB: '/var/db' },
      '/work',
    );
    expect(config).toEqual({ workers: 3, outputDir: '/work/reports', resultsDir: '/var/db' });
  });

  it('ignores a worker count that is not a positive integer', () => {
    expect(resolveAnalyzerConfigFromEnv({ BENCH_LOGS_WORKERS: '0' }, '/work').workers).toBe(availableParallelism());
    expect(resolveAnalyzerConfigFromEnv({ BENCH_LOGS_WORKERS: 'many' }, '/work').workers).toBe(
      availableParallelism(),
    );
  });
});
