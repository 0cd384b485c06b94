/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LogRole, RawLog } from '../core/types.js';

/**
 * Lists `<role>-*.log` files of a benchmark directory in lexicographic order.
 */
export const listLogFiles = async (directory: string, role: LogRole): Promise<string[]> => {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const prefix = `${role}-`;
  return entries
    .filter((entry) => entry.isFile() && entry.name.startsWith(prefix) && entry.name.endsWith('.log'))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(directory, name));
};

export const readLogTexts = async (paths: readonly string[]): Promise<string[]> =>
  Promise.all(paths.map((path) => fs.readFile(path, 'utf8')));

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const writeJsonFile = async (filePath: string, data: unknown): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
};

export const appendTextFile = async (filePath: string, text: string): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.appendFile(filePath, text, 'utf8');
};

export const readRawLogs = async (directory: string, role: LogRole): Promise<RawLog[]> => {
  const paths = await listLogFiles(directory, role);
  const texts = await readLogTexts(paths);
  return texts.map((text, index) => ({ role, text, source: paths[index] }));
};
