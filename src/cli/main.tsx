#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import type { LogAnalysisOptions } from '../runner/index.js';
import { runGrpcPortDiscovery } from '../runner/index.js';
import { AnalyzerApp } from '../ui/analyzer-app.js';
import { describeError, logConsole, type LogField } from '../core/index.js';
import { parseArgs } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  if (!options.directory) {
    throw new Error('Missing --dir <path> argument.');
  }

  if (options.grpcPorts) {
    const { endpoints, reportPath } = await runGrpcPortDiscovery({
      directory: options.directory,
      outputDir: options.outputDir,
      workers: options.workers,
    });
    const fields: LogField[] = endpoints.map((endpoint, index) => [
      `primary-${index}`,
      `${endpoint.address}:${endpoint.port}`,
    ]);
    logConsole('info', 'gRPC endpoints', [...fields, ['report', reportPath]]);
    return;
  }

  const analysisOptions: LogAnalysisOptions = {
    directory: options.directory,
    outputDir: options.outputDir,
    executionModel: options.executionModel,
    faults: options.faults,
    concurrencyLevel: options.concurrencyLevel,
    workers: options.workers,
    summaryPath: options.summaryPath,
    jsonPath: options.jsonPath,
    resultsDir: options.resultsDir,
  };

  const { waitUntilExit } = render(<AnalyzerApp options={analysisOptions} />);
  await waitUntilExit();
};

const entry = process.argv[1] ?? '';
if (/(?:bench-logs|cli[\\/]main\.[jt]sx?)$/.test(entry)) {
  main().catch((error: unknown) => {
    logConsole('error', 'Benchmark analysis failed', [['error', describeError(error)]]);
    process.exit(1);
  });
}
