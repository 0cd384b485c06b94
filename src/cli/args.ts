/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { EXECUTION_MODELS, type ExecutionModel } from '../core/types.js';
import { resolveAnalyzerConfigFromEnv, type AnalyzerEnvConfig } from '../config/analyzer-config.js';

export interface RunnerOptions {
  directory: string;
  executionModel: ExecutionModel;
  faults: number;
  concurrencyLevel: number;
  workers: number;
  outputDir: string;
  summaryPath?: string;
  jsonPath?: string;
  resultsDir?: string;
  grpcPorts?: boolean;
  interactive?: boolean;
}

export const parseExecutionModel = (value: string): ExecutionModel => {
  const model = EXECUTION_MODELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!model) {
    throw new Error(`Unknown execution model: ${value} (expected one of ${EXECUTION_MODELS.join(', ')})`);
  }
  return model;
};

const takeValue = (argv: readonly string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
};

const parseCount = (value: string, flag: string, minimum: number): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new Error(`${flag} expects an integer >= ${minimum}, got ${value}`);
  }
  return parsed;
};

export const parseArgs = (
  argv: readonly string[],
  env: AnalyzerEnvConfig = resolveAnalyzerConfigFromEnv(),
): RunnerOptions => {
  const options: RunnerOptions = {
    directory: '',
    executionModel: 'optme',
    faults: 0,
    concurrencyLevel: 1,
    workers: env.workers,
    outputDir: env.outputDir,
    resultsDir: env.resultsDir,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--dir':
      case '-d':
        options.directory = resolve(takeValue(argv, ++i, arg));
        break;
      case '--model':
      case '-m':
        options.executionModel = parseExecutionModel(takeValue(argv, ++i, arg));
        break;
      case '--faults':
      case '-f':
        options.faults = parseCount(takeValue(argv, ++i, arg), arg, 0);
        break;
      case '--concurrency-level':
      case '-c':
        options.concurrencyLevel = parseCount(takeValue(argv, ++i, arg), arg, 1);
        break;
      case '--workers':
      case '-w':
        options.workers = parseCount(takeValue(argv, ++i, arg), arg, 1);
        break;
      case '--output':
      case '-o':
        options.outputDir = resolve(takeValue(argv, ++i, arg));
        break;
      case '--summary':
        options.summaryPath = resolve(takeValue(argv, ++i, arg));
        break;
      case '--json':
        options.jsonPath = resolve(takeValue(argv, ++i, arg));
        break;
      case '--results-db':
        options.resultsDir = resolve(takeValue(argv, ++i, arg));
        break;
      case '--grpc-ports':
        options.grpcPorts = true;
        break;
      case '--interactive':
        options.interactive = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
};
