/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { metricsBundle } from '../core/__fixtures__/metrics-bundle.js';
import { SqliteResultStore, getResultDatabasePath } from './sqlite-result-store.js';

describe('SqliteResultStore', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'bench-results-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('records and reloads a run', async () => {
    const store = await SqliteResultStore.open({ baseDir });
    await store.recordRun({
      runId: 'run-1',
      directory: '/logs/a',
      bundle: metricsBundle(),
      recordedAt: new Date('2024-01-01T00:00:00Z'),
    });
    const loaded = await store.loadRun('run-1');
    store.close();

    expect(loaded?.executionModel).toBe('nezha');
    expect(loaded?.committeeSize).toBe(4);
    expect(loaded?.endToEndLatencyMs).toBe(2_100);
    expect(loaded?.bundle).toEqual(metricsBundle());
    expect(store.path).toBe(getResultDatabasePath(baseDir));
  });

  it('persists runs across reopen, oldest first', async () => {
    const first = await SqliteResultStore.open({ baseDir });
    await first.recordRun({ runId: 'late', bundle: metricsBundle(), recordedAt: new Date('2024-02-01T00:00:00Z') });
    await first.recordRun({ runId: 'early', bundle: metricsBundle(), recordedAt: new Date('2024-01-01T00:00:00Z') });
    first.close();

    const second = await SqliteResultStore.open({ baseDir });
    const runs = await second.listRuns();
    second.close();

    expect(runs.map((run) => run.runId)).toEqual(['early', 'late']);
    expect(runs[0]?.directory).toBeUndefined();
  });

  it('replaces a run recorded twice under one id', async () => {
    const store = await SqliteResultStore.open({ baseDir });
    const bundle = metricsBundle();
    await store.recordRun({ runId: 'run-1', bundle });
    bundle.config.faults = 2;
    await store.recordRun({ runId: 'run-1', bundle });
    const runs = await store.listRuns();
    store.close();

    expect(runs).toHaveLength(1);
    expect(runs[0]?.faults).toBe(2);
  });

  it('returns undefined for an unknown run', async () => {
    const store = await SqliteResultStore.open({ baseDir });
    await expect(store.loadRun('missing')).resolves.toBeUndefined();
    store.close();
  });
});
