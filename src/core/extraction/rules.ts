/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ParseError } from '../errors.js';
import { reconcileEvents } from '../reconciler.js';
import { toEpochSeconds } from '../timestamp.js';
import type { Digest, EventMap, TimedEvent } from '../types.js';

/**
 * A named pattern over a single log line. Every regex the extractors use is
 * declared here so that a format change touches one rule and its test.
 */
export interface ExtractionRule {
  id: string;
  pattern: RegExp;
  description: string;
}

const rule = (id: string, pattern: RegExp, description: string): ExtractionRule => ({
  id,
  pattern,
  description,
});

// Digests are printed base64-encoded and end with padding.
const DIGEST = '([^ ]+=)';

// Leading timestamp, with either `T` or a space between date and time.
const TIMESTAMP = '^(\\S+(?: \\d{2}:\\d{2}:\\S+)?)';

export const CLIENT_RULES = {
  termination: rule('client.termination', /Error/, 'Client process reported an error'),
  rate: rule('client.rate', /Transactions rate: (\d+)/, 'Target send rate (tx/s)'),
  start: rule('client.start', new RegExp(`${TIMESTAMP} .* Start `), 'Wall-clock start of sending'),
  rateMiss: rule('client.rate-miss', /rate too high/g, 'Client could not keep up with its target rate'),
  sampleSent: rule(
    'client.sample-sent',
    new RegExp(`${TIMESTAMP} .* sample transaction (\\d+)`),
    'Send time of a sample transaction',
  ),
  skewness: rule('client.skewness', /Workload skewness: (\d+\.\d+)/, 'Workload skew coefficient'),
} as const;

export const CONSENSUS_RULES = {
  termination: rule('primary.termination', /panicked/, 'Primary process panicked'),
  headerProposed: rule(
    'primary.header-proposed',
    new RegExp(`${TIMESTAMP} .* Created B\\d+\\([^ ]+\\) -> ${DIGEST}`),
    'Header proposal time by digest',
  ),
  headerCommitted: rule(
    'primary.header-committed',
    new RegExp(`${TIMESTAMP} .* Committed B\\d+\\([^ ]+\\) -> ${DIGEST}`),
    'Header commit (order) time by digest',
  ),
  batchToHeader: rule(
    'primary.batch-to-header',
    /Batch ([^ ]+) from worker \d+ took (\d+\.\d+) seconds from creation to be included in a proposed header/,
    'Seconds from batch creation to header inclusion',
  ),
  headerCreation: rule(
    'primary.header-creation',
    /Header ([^ ]+) was created in (\d+\.\d+) seconds/,
    'Seconds to create a header',
  ),
  headerToCertificate: rule(
    'primary.header-to-certificate',
    /Header ([^ ]+) at round \d+ with \d+ batches, took (\d+\.\d+) seconds to be materialized to a certificate [^ ]+/,
    'Seconds from header to certificate',
  ),
  certificateCommit: rule(
    'primary.certificate-commit',
    /Certificate ([^ ]+) took (\d+\.\d+) seconds to be committed at round \d+/,
    'Seconds from certificate to commit',
  ),
  requestVoteOutbound: rule(
    'primary.request-vote-outbound',
    /\/narwhal\.PrimaryToPrimary\/RequestVote.*direction=outbound.*latency=(\d+) ms/,
    'Outbound RequestVote latency (ms)',
  ),
  address: rule('node.address', /booted on (\/ip4\/\d+\.\d+\.\d+\.\d+)/, 'Network address the node booted on'),
} as const;

export const CONFIG_RULES = {
  headerNumOfBatchesThreshold: rule(
    'config.header-num-of-batches-threshold',
    /Header number of batches threshold .* (\d+)/,
    'Header number of batches threshold',
  ),
  maxHeaderNumOfBatches: rule(
    'config.max-header-num-of-batches',
    /Header max number of batches .* (\d+)/,
    'Header max number of batches',
  ),
  maxHeaderDelay: rule('config.max-header-delay', /Max header delay .* (\d+)/, 'Max header delay'),
  gcDepth: rule('config.gc-depth', /Garbage collection depth .* (\d+)/, 'Garbage collection depth'),
  syncRetryDelay: rule('config.sync-retry-delay', /Sync retry delay .* (\d+)/, 'Sync retry delay'),
  syncRetryNodes: rule('config.sync-retry-nodes', /Sync retry nodes .* (\d+)/, 'Sync retry nodes'),
  batchSize: rule('config.batch-size', /Batch size .* (\d+)/, 'Batch size'),
  maxBatchDelay: rule('config.max-batch-delay', /Max batch delay .* (\d+)/, 'Max batch delay'),
  maxConcurrentRequests: rule(
    'config.max-concurrent-requests',
    /Max concurrent requests .* (\d+)/,
    'Max concurrent requests',
  ),
} as const;

export const EXECUTION_RULES = {
  termination: CONSENSUS_RULES.termination,
  subscriberReceived: rule(
    'execution.subscriber-received',
    new RegExp(`${TIMESTAMP} .* Subscriber received a batch -> ${DIGEST}`),
    'Batch received by the executor subscriber',
  ),
  handlerReceived: rule(
    'execution.handler-received',
    new RegExp(`${TIMESTAMP} .* Consensus handler received a batch -> ${DIGEST}`),
    'Batch received by the consensus handler',
  ),
  subdagSize: rule(
    'execution.subdag-size',
    /Received consensus_output has (\d+) batches at subdag_index (\d+)/,
    'Batches per committed subdag',
  ),
  executionReceived: rule(
    'execution.batch-received',
    new RegExp(`${TIMESTAMP} .* Received Batch -> ${DIGEST}`),
    'Batch received by the execution layer',
  ),
  batchExecuted: rule(
    'execution.batch-executed',
    new RegExp(`${TIMESTAMP} .* Executed Batch -> ${DIGEST}`),
    'Batch executed and committed',
  ),
  abortRate: rule(
    'execution.abort-rate',
    /Abort rate: \d+\.\d+ \((\d+)\/(\d+) aborted\)/,
    'Aborted and total transaction counts',
  ),
} as const;

export const WORKER_RULES = {
  termination: rule('worker.termination', /panicked/, 'Worker process panicked'),
  batchContents: rule(
    'worker.batch-contents',
    /Batch ([^ ]+) contains (\d+) B with (\d+)/,
    'Batch byte size and transaction count',
  ),
  batchSample: rule(
    'worker.batch-sample',
    /Batch ([^ ]+) contains sample tx (\d+)/,
    'Sample transaction carried by a batch',
  ),
  batchCreation: rule(
    'worker.batch-creation',
    /Batch ([^ ]+) took (\d+\.\d+) seconds to create due to /,
    'Seconds to seal a batch',
  ),
  address: CONSENSUS_RULES.address,
} as const;

export const GRPC_RULES = {
  endpoint: rule(
    'primary.grpc-endpoint',
    /Consensus API gRPC Server listening on \/ip4\/(.+)\/tcp\/(.+)\/http/,
    'Consensus API gRPC listening address',
  ),
} as const;

export const splitLines = (text: string): string[] => text.split(/\r?\n/);

export const scanLines = (target: ExtractionRule, lines: readonly string[]): RegExpExecArray[] => {
  const single = new RegExp(target.pattern.source, target.pattern.flags.replace(/g/g, ''));
  const matches: RegExpExecArray[] = [];
  for (const line of lines) {
    const match = single.exec(line);
    if (match) {
      matches.push(match);
    }
  }
  return matches;
};

export const findFirst = (
  target: ExtractionRule,
  lines: readonly string[],
): RegExpExecArray | undefined => {
  const single = new RegExp(target.pattern.source, target.pattern.flags.replace(/g/g, ''));
  for (const line of lines) {
    const match = single.exec(line);
    if (match) {
      return match;
    }
  }
  return undefined;
};

export const requireFirst = (target: ExtractionRule, lines: readonly string[]): RegExpExecArray => {
  const match = findFirst(target, lines);
  if (!match) {
    throw new ParseError(`Missing required log entry: ${target.description} (${target.id})`);
  }
  return match;
};

export const countOccurrences = (target: ExtractionRule, text: string): number => {
  const flags = target.pattern.flags.includes('g') ? target.pattern.flags : `${target.pattern.flags}g`;
  return Array.from(text.matchAll(new RegExp(target.pattern.source, flags))).length;
};

/**
 * Rejects the whole log when the termination marker appears anywhere in it.
 */
export const assertNotTerminated = (target: ExtractionRule, text: string, message: string): void => {
  const single = new RegExp(target.pattern.source, target.pattern.flags.replace(/g/g, ''));
  if (single.test(text)) {
    throw new ParseError(message);
  }
};

export const captureText = (match: RegExpExecArray, index: number): string => {
  const value = match[index];
  if (value === undefined) {
    throw new ParseError(`Pattern ${match[0]} did not capture group ${index}`);
  }
  return value;
};

export const captureNumber = (match: RegExpExecArray, index: number): number => {
  const value = Number(captureText(match, index));
  if (!Number.isFinite(value)) {
    throw new ParseError(`Expected a number in ${JSON.stringify(match[0])}`);
  }
  return value;
};

export const captureTimestamp = (match: RegExpExecArray, index: number): number =>
  toEpochSeconds(captureText(match, index));

/**
 * Reads `(timestamp, digest)` captures from every matching line and keeps the
 * earliest timestamp per digest.
 */
export const collectTimedEvents = (
  target: ExtractionRule,
  lines: readonly string[],
): EventMap => {
  const events: TimedEvent[] = scanLines(target, lines).map((match) => ({
    key: captureText(match, 2),
    timestamp: captureTimestamp(match, 1),
  }));
  return reconcileEvents(events);
};

/**
 * Reads `(digest, seconds)` captures; a repeated digest keeps its last value.
 */
export const collectKeyedValues = (
  target: ExtractionRule,
  lines: readonly string[],
): Map<Digest, number> => {
  const values = new Map<Digest, number>();
  for (const match of scanLines(target, lines)) {
    values.set(captureText(match, 1), captureNumber(match, 2));
  }
  return values;
};
