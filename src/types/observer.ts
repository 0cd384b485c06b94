/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Analysis observer interface.
 * Unified definition shared by the parser, the runner and the UI.
 */

import type { LogGroup, MetricsBundle } from '../core/types.js';

export interface GroupProgress {
  group: LogGroup;
  current: number;
  total: number;
}

export interface AnalysisObserver {
  onGroupStart?(info: { group: LogGroup; total: number }): void;
  onLogParsed?(progress: GroupProgress): void;
  onGroupComplete?(info: { group: LogGroup; total: number }): void;
  onWarning?(message: string): void;
  onResult?(bundle: MetricsBundle): void;
}
