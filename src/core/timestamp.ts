/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ParseError } from './errors.js';

/** Width of the timestamp prefix considered on every log line. */
export const TIMESTAMP_PREFIX_WIDTH = 24;

const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:[.,](\d+))?/;

/**
 * Converts the leading timestamp of a log line to epoch seconds.
 * The prefix is read as a naive datetime and interpreted as UTC; any zone
 * designator past the prefix is ignored.
 */
export const toEpochSeconds = (text: string): number => {
  const prefix = text.trimStart().slice(0, TIMESTAMP_PREFIX_WIDTH);
  const match = TIMESTAMP_RE.exec(prefix);
  if (!match) {
    throw new ParseError(`Unrecognized timestamp: ${JSON.stringify(prefix)}`);
  }
  const [, year, month, day, hour, minute, second, fraction] = match;
  const millis = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
  );
  if (Number.isNaN(millis)) {
    throw new ParseError(`Invalid timestamp: ${JSON.stringify(prefix)}`);
  }
  const subsecond = fraction ? Number(`0.${fraction}`) : 0;
  return millis / 1000 + subsecond;
};
