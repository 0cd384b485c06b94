/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { LogAnalysisOptions, LogAnalysisResult } from '../runner/index.js';
import { runLogAnalysis } from '../runner/index.js';
import type { LogGroup } from '../core/index.js';
import type { AnalysisObserver } from '../types/index.js';

interface GroupState {
  current: number;
  total: number;
  done: boolean;
}

type GroupStates = Record<LogGroup, GroupState>;

const GROUP_ORDER: readonly LogGroup[] = ['clients', 'primaries', 'workers'];

const initialGroups: GroupStates = {
  clients: { current: 0, total: 0, done: false },
  primaries: { current: 0, total: 0, done: false },
  workers: { current: 0, total: 0, done: false },
};

export interface AnalyzerAppProps {
  options: LogAnalysisOptions;
}

export const AnalyzerApp: React.FC<AnalyzerAppProps> = ({ options }) => {
  const [groups, setGroups] = useState<GroupStates>(initialGroups);
  const [warnings, setWarnings] = useState<string[]>([]);
  const [lastEvent, setLastEvent] = useState('Initializing...');
  const [result, setResult] = useState<LogAnalysisResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const updateGroup = (group: LogGroup, patch: Partial<GroupState>): void => {
      setGroups((prev) => ({ ...prev, [group]: { ...prev[group], ...patch } }));
    };

    const observer: AnalysisObserver = {
      onGroupStart: ({ group, total }) => {
        if (cancelled) return;
        updateGroup(group, { total, current: 0 });
        setLastEvent(`Parsing ${total} ${group} log(s)`);
      },
      onLogParsed: ({ group, current, total }) => {
        if (cancelled) return;
        updateGroup(group, { current, total });
      },
      onGroupComplete: ({ group }) => {
        if (cancelled) return;
        updateGroup(group, { done: true });
        setLastEvent(`Finished ${group}`);
      },
      onWarning: (message) => {
        if (cancelled) return;
        setWarnings((prev) => [...prev, message]);
      },
      onResult: () => {
        if (cancelled) return;
        setLastEvent('Writing reports');
      },
    };

    runLogAnalysis({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
        setLastEvent('Done');
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          BENCHMARK LOGS
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Directory: </Text>
          <Text color="white">{options.directory}</Text>
          <Text dimColor> | Model: </Text>
          <Text color="cyan">{options.executionModel}</Text>
          <Text dimColor> | Faults: </Text>
          <Text>{options.faults ?? 0}</Text>
        </Box>
        {GROUP_ORDER.map((group) => {
          const state = groups[group];
          const percent = state.total > 0 ? Math.round((state.current / state.total) * 100) : 0;
          return (
            <Box key={group}>
              <Text dimColor>{group.padEnd(10)}</Text>
              <Text color={state.done ? 'greenBright' : 'yellow'}>{renderBar(percent, 30)}</Text>
              <Text color="white">
                {' '}
                {state.current}/{state.total || '?'}
              </Text>
            </Box>
          );
        })}
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{lastEvent}</Text>
      </Box>

      {warnings.length > 0 && (
        <Box marginTop={1} borderStyle="single" borderColor="yellow" flexDirection="column" paddingX={1} paddingY={0}>
          {warnings.map((warning, index) => (
            <Text key={index} color="yellow">
              WARNING: {warning}
            </Text>
          ))}
        </Box>
      )}

      {result && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Run ID: <Text color="cyan">{result.runId}</Text>
          </Text>
          <Text>
            Consensus {Math.round(result.bundle.results.consensus.tps)} tx/s | Execution{' '}
            {Math.round(result.bundle.results.execution.tps)} tx/s | End-to-end{' '}
            {Math.round(result.bundle.results.endToEnd.tps)} tx/s
          </Text>
          <Text>End-to-end latency: {Math.round(result.bundle.results.endToEnd.latencyMs)} ms</Text>
          <Text dimColor>Summary: {result.summaryPath}</Text>
          <Text dimColor>Metrics: {result.jsonPath}</Text>
          {result.resultsDatabasePath && <Text dimColor>Results store: {result.resultsDatabasePath}</Text>}
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};

function renderBar(percent: number, width: number): string {
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;
  return '█'.repeat(filled) + '░'.repeat(empty);
}
