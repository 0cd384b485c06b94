/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ParseError } from './errors.js';
import {
  accountAborts,
  buildStageSequences,
  committeeShape,
  correlateSamples,
  isCollocated,
  joinBenchmark,
  pairSampleLanes,
  resolveConcurrencyLevel,
  sumTxCounts,
} from './join.js';
import { extractClientLog, extractPrimaryLog, extractWorkerLog } from './extraction/index.js';
import { BASE_EPOCH, clientLog, primaryLog, workerLog } from './__fixtures__/benchmark-logs.js';
import type { ClientRecord, ExecutionRecord, WorkerRecord } from './types.js';

const client = (sent: Array<[string, number]>): ClientRecord => ({
  rate: 1_000,
  start: 0,
  misses: 0,
  sentSamples: new Map(sent),
  skewness: 0,
});

const worker = (received: Array<[string, string]>): WorkerRecord => ({
  batches: new Map(),
  receivedSamples: new Map(received),
  address: '/ip4/127.0.0.1',
  batchCreationLatencies: new Map(),
});

const execution = (aborts: ExecutionRecord['aborts']): ExecutionRecord => ({
  subscriberReceive: new Map(),
  handlerReceive: new Map(),
  subdagSizes: new Map(),
  executionReceive: new Map(),
  commits: new Map(),
  aborts,
});

describe('sumTxCounts', () => {
  it('ignores digests without a known count', () => {
    const events = new Map([
      ['D1=', 1],
      ['D2=', 2],
    ]);
    expect(sumTxCounts(events, new Map([['D1=', 10]]))).toBe(10);
  });
});

describe('committeeShape', () => {
  it('adds faulty nodes to the committee and spreads workers per node', () => {
    expect(committeeShape(4, 9, 1)).toEqual({ committeeSize: 5, workersPerNode: 2 });
  });

  it('requires at least one primary', () => {
    expect(() => committeeShape(0, 1, 0)).toThrow(ParseError);
  });
});

describe('isCollocated', () => {
  it('compares address sets', () => {
    expect(isCollocated(['/ip4/1.1.1.1', '/ip4/2.2.2.2'], ['/ip4/2.2.2.2', '/ip4/1.1.1.1', '/ip4/1.1.1.1'])).toBe(
      true,
    );
    expect(isCollocated(['/ip4/1.1.1.1'], ['/ip4/3.3.3.3'])).toBe(false);
  });
});

describe('resolveConcurrencyLevel', () => {
  it('only honours the requested level for nezha', () => {
    expect(resolveConcurrencyLevel('nezha', 8)).toBe(8);
    expect(resolveConcurrencyLevel('optme', 8)).toBe(1);
  });
});

describe('correlateSamples', () => {
  it('pairs client i with worker i and drops unmatched samples', () => {
    const lanes = pairSampleLanes(
      [
        client([
          ['7', 100],
          ['8', 101],
        ]),
        client([['9', 50]]),
        client([['10', 60]]),
      ],
      [
        worker([
          ['7', 'D3='],
          ['8', 'D4='],
          ['9', 'D3='],
        ]),
        worker([]),
      ],
    );
    expect(lanes).toHaveLength(2);
    const pairs = correlateSamples(lanes, new Map([['D3=', 103.2]]));
    expect(pairs).toEqual([{ sent: 100, committed: 103.2 }]);
  });
});

describe('accountAborts', () => {
  it('divides summed counts by the committee size', () => {
    const executions = [execution([{ aborted: 1, total: 4 }]), execution([{ aborted: 3, total: 4 }])];
    expect(accountAborts(executions, 2)).toEqual({ aborted: 2, total: 4 });
  });

  it('is zero without abort markers', () => {
    expect(accountAborts([execution([])], 4)).toEqual({ aborted: 0, total: 0 });
  });
});

describe('buildStageSequences', () => {
  it('keeps the earliest observation across primaries', () => {
    const primaries = [
      extractPrimaryLog(primaryLog({ created: [['D1=', '10:00:00.100000']] })),
      extractPrimaryLog(primaryLog({ created: [['D1=', '10:00:00.050000']] })),
    ];
    const sequences = buildStageSequences(primaries, []);
    expect(sequences.proposals.get('D1=')).toBeCloseTo(BASE_EPOCH + 0.05, 5);
  });

  it('takes batch sizes and counts from the workers', () => {
    const sequences = buildStageSequences([], [extractWorkerLog(workerLog({ batches: [['D3=', 4096, 10]] }))]);
    expect(sequences.batchSizes.get('D3=')).toBe(4096);
    expect(sequences.txCounts.get('D3=')).toBe(10);
  });
});

describe('joinBenchmark', () => {
  it('requires every group', () => {
    expect(() =>
      joinBenchmark({
        clients: [],
        primaries: [extractPrimaryLog(primaryLog())],
        workers: [extractWorkerLog(workerLog())],
        executionModel: 'optme',
        faults: 0,
        concurrencyLevel: 1,
      }),
    ).toThrow(ParseError);
  });

  it('totals ordered and committed transactions by digest', () => {
    const joined = joinBenchmark({
      clients: [extractClientLog(clientLog({ rate: 1_000 })), extractClientLog(clientLog({ rate: 2_000 }))],
      primaries: [
        extractPrimaryLog(
          primaryLog({
            committed: [
              ['D1=', '10:00:01.000000'],
              ['D2=', '10:00:01.000000'],
            ],
            executed: [['D1=', '10:00:02.000000']],
          }),
        ),
      ],
      workers: [
        extractWorkerLog(
          workerLog({
            batches: [
              ['D1=', 1_000, 4],
              ['D2=', 2_000, 6],
            ],
          }),
        ),
      ],
      executionModel: 'serial',
      faults: 1,
      concurrencyLevel: 4,
    });
    expect(joined.totalOrderedTx).toBe(10);
    expect(joined.totalCommittedTx).toBe(4);
    expect(joined.inputRate).toBe(3_000);
    expect(joined.committeeSize).toBe(2);
    expect(joined.concurrencyLevel).toBe(1);
    expect(joined.collocate).toBe(true);
    expect(Array.from(joined.committedSizes.keys())).toEqual(['D1=']);
  });
});
