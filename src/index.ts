/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export * from './runner/index.js';
export * from './tools/index.js';
export type { AnalysisObserver, GroupProgress } from './types/index.js';
export { resolveAnalyzerConfigFromEnv, type AnalyzerEnvConfig } from './config/analyzer-config.js';
export { main as runCli } from './cli/main.js';
