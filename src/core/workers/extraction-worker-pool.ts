/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { availableParallelism } from 'node:os';
import { ParseError, describeError } from '../errors.js';
import type { LogGroup } from '../types.js';

export interface ExtractionRequest<T> {
  group: LogGroup;
  logs: readonly string[];
  extract: (text: string) => T;
  onLogParsed?: (info: { group: LogGroup; index: number; total: number }) => void;
}

export interface ExtractionWorkerPoolOptions {
  concurrency?: number;
}

const groupLabel = (group: LogGroup): string => {
  switch (group) {
    case 'clients':
      return "clients'";
    case 'primaries':
      return "nodes'";
    case 'workers':
      return "workers'";
  }
};

/**
 * Scatter-gather over the logs of one role group. One task per log, at most
 * `concurrency` in flight; results come back in input order. The first
 * failing log rejects the whole group and sibling results are discarded.
 */
export class ExtractionWorkerPool {
  readonly concurrency: number;

  constructor(options: ExtractionWorkerPoolOptions = {}) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? availableParallelism()));
  }

  async run<T>(request: ExtractionRequest<T>): Promise<T[]> {
    const total = request.logs.length;
    const results = new Array<T>(total);
    let next = 0;
    let failure: unknown;

    const drain = async (): Promise<void> => {
      while (failure === undefined && next < total) {
        const index = next;
        next += 1;
        // Yield between tasks so sibling lanes interleave.
        await Promise.resolve();
        try {
          results[index] = request.extract(request.logs[index]);
        } catch (error) {
          failure ??= error;
          return;
        }
        request.onLogParsed?.({ group: request.group, index, total });
      }
    };

    const lanes = Math.min(this.concurrency, total);
    await Promise.all(Array.from({ length: lanes }, () => drain()));

    if (failure !== undefined) {
      throw new ParseError(`Failed to parse ${groupLabel(request.group)} logs: ${describeError(failure)}`, {
        cause: failure,
        group: request.group,
      });
    }
    return results;
  }
}
