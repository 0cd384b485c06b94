/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { GrpcEndpoint } from '../types.js';
import { GRPC_RULES, captureText, requireFirst, splitLines } from './rules.js';

/**
 * Recovers the consensus API endpoint a primary announced at boot.
 */
export const extractGrpcEndpoint = (text: string): GrpcEndpoint => {
  const match = requireFirst(GRPC_RULES.endpoint, splitLines(text));
  return { address: captureText(match, 1), port: captureText(match, 2) };
};
