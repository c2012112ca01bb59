import path from 'node:path';
import { promises as fs } from 'node:fs';

import type { UsageTotals } from '../providers/llm';
import { isJsonMap, writeJsonFile } from '../utils/json';

export type PipelineCommand = 'harvest' | 'merge' | 'classify' | 'clauses' | 'join' | 'validate' | 'filter';

export interface LlmRunStats extends UsageTotals {
  costUsd: number;
}

export interface RunLogProps {
  command: PipelineCommand;
  startedAt: Date;
  counts: Record<string, number>;
  /** Items a stage kept but could not fully process, e.g. oracle sentinels. */
  degraded?: Record<string, number>;
  llm?: LlmRunStats;
  output?: string;
}

export interface RunLogEntry {
  command: PipelineCommand;
  timestamp: string;
  durationMs: number;
  counts: Record<string, number>;
  degraded: Record<string, number>;
  llm?: LlmRunStats;
  output?: string;
  alerts: string[];
}

interface RunHistoryFile {
  runs: RunLogEntry[];
}

const MAX_RUNS = 200;
const DEGRADED_ALERT_SHARE = 0.25;

export function historyPath(outputDir: string): string {
  return path.join(outputDir, 'run-history.json');
}

export async function logRun(props: RunLogProps, outputDir: string, now: Date = new Date()): Promise<RunLogEntry> {
  const file = historyPath(outputDir);
  const history = await readHistory(file);
  const degraded = props.degraded ?? {};

  const entry: RunLogEntry = {
    command: props.command,
    timestamp: now.toISOString(),
    durationMs: Math.max(0, now.getTime() - props.startedAt.getTime()),
    counts: props.counts,
    degraded,
    llm: props.llm,
    output: props.output,
    alerts: buildAlerts(props.counts, degraded, props.llm),
  };

  await writeJsonFile(file, { runs: [...history.runs, entry].slice(-MAX_RUNS) });
  return entry;
}

/**
 * Flags runs where a large share of items fell back to a sentinel, or where
 * every oracle call failed.
 */
export function buildAlerts(
  counts: Record<string, number>,
  degraded: Record<string, number>,
  llm?: LlmRunStats
): string[] {
  const alerts: string[] = [];
  const total = counts.input ?? 0;
  for (const [name, value] of Object.entries(degraded)) {
    if (total > 0 && value / total > DEGRADED_ALERT_SHARE) {
      alerts.push(`${name} at ${((value / total) * 100).toFixed(1)}% of input`);
    }
  }
  if (llm && llm.calls > 0 && llm.failures === llm.calls) {
    alerts.push('all LLM calls failed');
  }
  return alerts;
}

export async function readHistory(file: string): Promise<RunHistoryFile> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch {
    return { runs: [] };
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isJsonMap(parsed) && Array.isArray(parsed.runs)) {
      return { runs: parsed.runs.filter(isRunLogEntry) };
    }
  } catch {
    // A corrupt history restarts from empty.
  }
  return { runs: [] };
}

function isRunLogEntry(value: unknown): value is RunLogEntry {
  return isJsonMap(value) && typeof value.command === 'string' && typeof value.timestamp === 'string';
}
