/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import { EXECUTION_MODELS } from '../core/types.js';
import { parseExecutionModel, type RunnerOptions } from './args.js';

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'directory',
        message: 'Benchmark log directory (client-*.log, primary-*.log, worker-*.log)',
        initial: options.directory,
      },
      {
        type: 'select',
        name: 'executionModel',
        message: 'Execution model used by the run',
        choices: EXECUTION_MODELS.map((model) => ({ title: model, value: model })),
        initial: EXECUTION_MODELS.indexOf(options.executionModel),
      },
      {
        type: 'number',
        name: 'faults',
        message: 'Number of crashed (faulty) nodes',
        initial: options.faults,
        min: 0,
      },
      {
        type: (_prev, values) => (values.executionModel === 'nezha' ? 'number' : null),
        name: 'concurrencyLevel',
        message: 'Concurrency level',
        initial: options.concurrencyLevel,
        min: 1,
      },
      {
        type: 'text',
        name: 'outputDir',
        message: 'Directory to store reports',
        initial: options.outputDir,
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  if (typeof responses.directory === 'string' && responses.directory.trim()) {
    options.directory = resolve(responses.directory.trim());
  }
  if (typeof responses.executionModel === 'string') {
    options.executionModel = parseExecutionModel(responses.executionModel);
  }
  if (typeof responses.faults === 'number' && !Number.isNaN(responses.faults)) {
    options.faults = responses.faults;
  }
  if (typeof responses.concurrencyLevel === 'number' && !Number.isNaN(responses.concurrencyLevel)) {
    options.concurrencyLevel = responses.concurrencyLevel;
  }
  if (typeof responses.outputDir === 'string' && responses.outputDir.trim()) {
    options.outputDir = resolve(responses.outputDir.trim());
  }
}
