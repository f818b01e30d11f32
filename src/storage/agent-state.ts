/**
 * Agent State Storage
 *
 * Persists one-shot run records as JSON. Every save goes through an atomic
 * replace; a run is written twice, to a timestamped file and to a fixed
 * "latest" file.
 */

import path from 'path';
import type { AgentState, Logger } from '../core/types.js';
import { AgentStateFileSchema } from '../core/types.js';
import { errorMeta } from '../logging/logger.js';
import { ensureDir, nodeFileOps, writeAtomic, type FileOps } from './atomic-file.js';

export const DEFAULT_STATE_DIR = 'state/one-shot';
export const DEFAULT_STATE_PATH = path.join(DEFAULT_STATE_DIR, 'agent_state_latest.json');

export interface SaveStateOptions {
  logger: Logger;
  fileOps?: FileOps;
  now?: Date;
}

/**
 * `20261018T093015Z` style stamp used in run file names.
 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

export function serializeState(state: AgentState): string {
  return JSON.stringify(
    {
      query: state.query,
      intent: state.intent,
      results: state.results,
      insights: state.insights,
      data_issues: state.data_issues,
      timestamp: state.timestamp,
    },
    null,
    2
  );
}

/**
 * Stamp `state` and write it to `target`. Returns false when nothing could be
 * written; the failure is logged, never thrown.
 */
export function saveAgentState(state: AgentState, target: string, options: SaveStateOptions): boolean {
  const ops = options.fileOps ?? nodeFileOps;
  state.timestamp = (options.now ?? new Date()).toISOString();

  try {
    ensureDir(path.dirname(target), ops);
    const result = writeAtomic(target, serializeState(state), ops);
    if (result.mode === 'fallback') {
      options.logger.warn('state_saved_non_atomic', { path: target, error: errorMeta(result.renameError) });
    } else {
      options.logger.info('state_saved', { path: target });
    }
    return true;
  } catch (error) {
    options.logger.error('state_save_failed', { path: target, error: errorMeta(error) });
    return false;
  }
}

export interface SavedRun {
  runPath: string | null;
  latestPath: string | null;
}

/**
 * Write the timestamped run file into `dir` and the fixed latest file.
 */
export function saveRun(
  state: AgentState,
  dir: string,
  latestPath: string,
  options: SaveStateOptions
): SavedRun {
  const now = options.now ?? new Date();
  const runPath = path.join(dir, `agent_state_${compactTimestamp(now)}.json`);

  const savedRun = saveAgentState(state, runPath, { ...options, now });
  const savedLatest = saveAgentState(state, latestPath, { ...options, now });

  return {
    runPath: savedRun ? runPath : null,
    latestPath: savedLatest ? latestPath : null,
  };
}

/**
 * Read a saved state file. Older or partial payloads are accepted; a missing
 * or unreadable file yields null.
 */
export function loadAgentState(target: string, fileOps: FileOps = nodeFileOps): AgentState | null {
  if (!fileOps.existsSync(target)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fileOps.readFileSync(target, 'utf8'));
  } catch {
    return null;
  }

  const parsed = AgentStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    query: parsed.data.query,
    intent: parsed.data.intent,
    results: parsed.data.results,
    insights: parsed.data.insights,
    data_issues: parsed.data.data_issues ?? [],
    timestamp: parsed.data.timestamp,
  };
}
