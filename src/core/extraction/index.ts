/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { PrimaryRecord } from '../types.js';
import { extractConsensusLog } from './consensus.js';
import { extractExecutionLog } from './execution.js';

export * from './rules.js';
export { extractClientLog } from './client.js';
export { extractConsensusLog, extractConfigSnapshot } from './consensus.js';
export { extractExecutionLog } from './execution.js';
export { extractWorkerLog } from './worker.js';
export { extractGrpcEndpoint } from './grpc.js';

export const extractPrimaryLog = (text: string): PrimaryRecord => ({
  consensus: extractConsensusLog(text),
  execution: extractExecutionLog(text),
});
