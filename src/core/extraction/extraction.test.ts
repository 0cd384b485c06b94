/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ParseError } from '../errors.js';
import { BASE_EPOCH, clientLog, logLine, primaryLog, workerLog } from '../__fixtures__/benchmark-logs.js';
import {
  extractClientLog,
  extractConsensusLog,
  extractExecutionLog,
  extractGrpcEndpoint,
  extractWorkerLog,
} from './index.js';

describe('extractClientLog', () => {
  it('reads rate, start, skewness, misses and samples', () => {
    const record = extractClientLog(
      clientLog({
        rate: 25_000,
        skewness: '0.5',
        samples: [
          [7, '10:00:01.000000'],
          [8, '10:00:02.000000'],
        ],
        misses: 2,
      }),
    );
    expect(record.rate).toBe(25_000);
    expect(record.skewness).toBe(0.5);
    expect(record.start).toBe(BASE_EPOCH);
    expect(record.misses).toBe(2);
    expect(record.sentSamples.get('7')).toBe(BASE_EPOCH + 1);
    expect(record.sentSamples.size).toBe(2);
  });

  it('keeps the last send time of a resent sample', () => {
    const record = extractClientLog(
      clientLog({
        samples: [
          [7, '10:00:01.000000'],
          [7, '10:00:03.000000'],
        ],
      }),
    );
    expect(record.sentSamples.get('7')).toBe(BASE_EPOCH + 3);
  });

  it('reads timestamps with a space between date and time', () => {
    const record = extractClientLog(
      [
        '2024-01-01 10:00:00.000 INFO client: Transactions rate: 1000 tx/s',
        '2024-01-01 10:00:00.000 INFO client: Workload skewness: 0.0',
        '2024-01-01 10:00:00.000 INFO client: Start sending transactions',
        '2024-01-01 10:00:01.500 INFO client: Sending sample transaction 4',
      ].join('\n'),
    );
    expect(record.start).toBe(BASE_EPOCH);
    expect(record.sentSamples.get('4')).toBe(BASE_EPOCH + 1.5);
  });

  it('rejects a client that reported an error', () => {
    const text = `${clientLog()}\n${logLine('10:00:05.000000', 'client', 'Error: connection refused')}`;
    expect(() => extractClientLog(text)).toThrow(new ParseError('Client(s) panicked'));
  });

  it('requires the skewness line', () => {
    const text = clientLog()
      .split('\n')
      .filter((line) => !line.includes('skewness'))
      .join('\n');
    expect(() => extractClientLog(text)).toThrow(/client\.skewness/);
  });
});

describe('extractConsensusLog', () => {
  it('reads proposals, orders, configuration and address', () => {
    const record = extractConsensusLog(
      primaryLog({
        address: '10.0.0.2',
        created: [['D1=', '10:00:00.000000']],
        committed: [['D1=', '10:00:02.000000']],
        extra: [
          'Header H1= was created in 0.010 seconds',
          'Certificate C1= took 0.300 seconds to be committed at round 4',
        ],
      }),
    );
    expect(record.proposals.get('D1=')).toBe(BASE_EPOCH);
    expect(record.orders.get('D1=')).toBe(BASE_EPOCH + 2);
    expect(record.address).toBe('/ip4/10.0.0.2');
    expect(record.config).toEqual({
      headerNumOfBatchesThreshold: 32,
      maxHeaderNumOfBatches: 1000,
      maxHeaderDelay: 200,
      gcDepth: 50,
      syncRetryDelay: 10_000,
      syncRetryNodes: 3,
      batchSize: 500_000,
      maxBatchDelay: 200,
      maxConcurrentRequests: 500_000,
    });
    expect(record.headerCreationLatencies.get('H1=')).toBe(0.01);
    expect(record.certCommitLatencies.get('C1=')).toBe(0.3);
    expect(record.requestVoteOutboundLatencies).toEqual([]);
  });

  it('rejects a primary that panicked', () => {
    const text = `${primaryLog()}\nthread 'main' panicked at src/main.rs`;
    expect(() => extractConsensusLog(text)).toThrow('Primary(s) panicked');
  });

  it('requires every configuration parameter', () => {
    const text = primaryLog()
      .split('\n')
      .filter((line) => !line.includes('Sync retry nodes'))
      .join('\n');
    expect(() => extractConsensusLog(text)).toThrow(/config\.sync-retry-nodes/);
  });
});

describe('extractExecutionLog', () => {
  it('reads execution events, subdag sizes and abort counts', () => {
    const record = extractExecutionLog(
      primaryLog({
        executed: [['D1=', '10:00:03.000000']],
        extra: [
          logLine('10:00:02.100000', 'executor', 'Subscriber received a batch -> D1='),
          logLine('10:00:02.200000', 'executor', 'Consensus handler received a batch -> D1='),
          logLine('10:00:02.300000', 'executor', 'Received Batch -> D1='),
          'Received consensus_output has 3 batches at subdag_index 1',
          'Received consensus_output has 5 batches at subdag_index 2',
          'Abort rate: 0.25 (1/4 aborted)',
        ],
      }),
    );
    expect(record.commits.get('D1=')).toBe(BASE_EPOCH + 3);
    expect(record.subscriberReceive.get('D1=')).toBeCloseTo(BASE_EPOCH + 2.1, 5);
    expect(record.handlerReceive.get('D1=')).toBeCloseTo(BASE_EPOCH + 2.2, 5);
    expect(record.executionReceive.get('D1=')).toBeCloseTo(BASE_EPOCH + 2.3, 5);
    expect(Object.fromEntries(record.subdagSizes)).toEqual({ 1: 3, 2: 5 });
    expect(record.aborts).toEqual([{ aborted: 1, total: 4 }]);
  });

  it('returns empty collections for a node that executed nothing', () => {
    const record = extractExecutionLog(primaryLog());
    expect(record.commits.size).toBe(0);
    expect(record.subdagSizes.size).toBe(0);
    expect(record.aborts).toEqual([]);
  });
});

describe('extractWorkerLog', () => {
  it('reads batch contents, samples and creation latency', () => {
    const record = extractWorkerLog(
      workerLog({
        batches: [['D3=', 4096, 10]],
        samples: [['D3=', 7]],
        extra: ['Batch D3= took 0.150 seconds to create due to size'],
      }),
    );
    expect(record.batches.get('D3=')).toEqual({ bytes: 4096, txCount: 10 });
    expect(record.receivedSamples.get('7')).toBe('D3=');
    expect(record.batchCreationLatencies.get('D3=')).toBe(0.15);
    expect(record.address).toBe('/ip4/127.0.0.1');
  });

  it('keeps sample ids above 2^53 distinct', () => {
    const record = extractWorkerLog(
      workerLog({
        samples: [
          ['D1=', '9007199254740992'],
          ['D1=', 0],
          ['D2=', '9007199254740993'],
        ],
      }),
    );
    expect(record.receivedSamples.size).toBe(3);
    expect(record.receivedSamples.get('9007199254740992')).toBe('D1=');
    expect(record.receivedSamples.get('9007199254740993')).toBe('D2=');
  });

  it('rejects a worker that panicked', () => {
    expect(() => extractWorkerLog(`${workerLog()}\npanicked`)).toThrow('Worker(s) panicked');
  });

  it('requires the boot address', () => {
    expect(() => extractWorkerLog('nothing useful')).toThrow(/node\.address/);
  });
});

describe('extractGrpcEndpoint', () => {
  it('reads the announced consensus API endpoint', () => {
    expect(extractGrpcEndpoint(primaryLog({ address: '10.0.0.3', grpcPort: 8003 }))).toEqual({
      address: '10.0.0.3',
      port: '8003',
    });
  });
});
