/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogField = [string, string | number | boolean | undefined | null];

/**
 * Formats a labelled block with one aligned `key = value` line per non-empty field.
 */
export const formatLogBlock = (label: string, fields: LogField[]): string => {
  const filtered = fields.filter(
    (field): field is [string, string | number | boolean] =>
      field[1] !== undefined && field[1] !== null && field[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[bench-logs] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  return lines.join('\n');
};

/**
 * Unified console logger with structured, multiline output.
 */
export const logConsole = (level: LogLevel, label: string, fields: LogField[]): void => {
  const output = formatLogBlock(label, fields);
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};
