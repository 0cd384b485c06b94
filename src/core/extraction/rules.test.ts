/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ParseError } from '../errors.js';
import { BASE_EPOCH, logLine } from '../__fixtures__/benchmark-logs.js';
import {
  CLIENT_RULES,
  CONSENSUS_RULES,
  GRPC_RULES,
  WORKER_RULES,
  collectKeyedValues,
  collectTimedEvents,
  countOccurrences,
  requireFirst,
  splitLines,
} from './rules.js';

describe('extraction rules', () => {
  it('names the missing entry when a required rule never matches', () => {
    expect(() => requireFirst(CLIENT_RULES.rate, ['nothing here'])).toThrow(
      'Missing required log entry: Target send rate (tx/s) (client.rate)',
    );
    expect(() => requireFirst(CLIENT_RULES.rate, [])).toThrow(ParseError);
  });

  it('counts every occurrence, including several on one line', () => {
    const text = 'rate too high\nok\nrate too high, rate too high';
    expect(countOccurrences(CLIENT_RULES.rateMiss, text)).toBe(3);
  });

  it('keeps the earliest time of a digest seen twice', () => {
    const lines = [
      logLine('10:00:01.000000', 'consensus', 'Committed B2(h) -> D1='),
      logLine('10:00:00.500000', 'consensus', 'Committed B2(h) -> D1='),
    ];
    expect(collectTimedEvents(CONSENSUS_RULES.headerCommitted, lines).get('D1=')).toBeCloseTo(
      BASE_EPOCH + 0.5,
      5,
    );
  });

  it('captures a timestamp written with a space separator', () => {
    const lines = ['2024-01-01 10:00:00.250 INFO primary: Created B1(h) -> D9='];
    expect(collectTimedEvents(CONSENSUS_RULES.headerProposed, lines).get('D9=')).toBe(BASE_EPOCH + 0.25);
  });

  it('keeps the last value of a repeated keyed sample', () => {
    const lines = [
      'Batch B1= took 0.250 seconds to create due to timeout',
      'Batch B1= took 0.125 seconds to create due to size',
    ];
    expect(collectKeyedValues(WORKER_RULES.batchCreation, lines).get('B1=')).toBe(0.125);
  });

  it('reads the outbound RequestVote latency', () => {
    const match = requireFirst(CONSENSUS_RULES.requestVoteOutbound, [
      'request: /narwhal.PrimaryToPrimary/RequestVote direction=outbound status=ok latency=12 ms',
    ]);
    expect(match[1]).toBe('12');
  });

  it('splits the gRPC listening address into host and port', () => {
    const match = requireFirst(GRPC_RULES.endpoint, [
      'Consensus API gRPC Server listening on /ip4/10.0.0.1/tcp/8000/http',
    ]);
    expect([match[1], match[2]]).toEqual(['10.0.0.1', '8000']);
  });

  it('splits on both line ending styles', () => {
    expect(splitLines('a\r\nb\nc')).toEqual(['a', 'b', 'c']);
  });
});
