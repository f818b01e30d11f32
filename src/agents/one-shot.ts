/**
 * One-shot Runner
 *
 * Answers a single query on a fresh session, folds the streamed response
 * into an `AgentState` and saves it twice: a timestamped run file and the
 * fixed latest file.
 */

import type { AgentState, Logger, SessionOptions } from '../core/types.js';
import { attempt } from '../core/errors.js';
import { errorMeta } from '../logging/logger.js';
import { ConnectionManager, type ReasoningService } from '../session/connection.js';
import { toConversationMessage } from '../session/messages.js';
import { MessageRenderer, type ConsoleWriter } from '../session/renderer.js';
import { AgentStateTracker } from '../session/state-tracker.js';
import { saveRun } from '../storage/agent-state.js';
import type { FileOps } from '../storage/atomic-file.js';
import type { TurnGuard } from '../tools/turn-guard.js';

export interface OneShotOptions {
  query: string;
  service: ReasoningService;
  /** Session settings; one-shot runs never resume. */
  session: Omit<SessionOptions, 'resume'>;
  stateDir: string;
  latestPath: string;
  guard: TurnGuard;
  logger: Logger;
  write?: ConsoleWriter;
  fileOps?: FileOps;
  clock?: () => Date;
}

export interface OneShotResult {
  exitCode: number;
  state: AgentState | null;
  runPath: string | null;
  latestPath: string | null;
}

export async function runOneShot(options: OneShotOptions): Promise<OneShotResult> {
  const { logger } = options;
  const write = options.write ?? (line => console.log(line));

  const renderer = new MessageRenderer({ logger, write });
  const tracker = new AgentStateTracker(options.query, logger);
  const connection = new ConnectionManager(options.service, () => ({ ...options.session }), logger);

  logger.info('one_shot_start', { chars: options.query.length, max_turns: options.session.maxTurns });

  const connected = await attempt('connect', () => connection.connect());
  if (!connected.ok) {
    write(connected.error.message);
    return { exitCode: 1, state: null, runPath: null, latestPath: null };
  }

  options.guard.beginTurn();
  let exitCode = 0;
  try {
    const outcome = await attempt('send', async () => {
      for await (const raw of connection.send(options.query)) {
        const message = toConversationMessage(raw);
        renderer.render(message);
        tracker.observe(message);
      }
    });
    if (!outcome.ok) {
      logger.error('one_shot_turn_failed', { error: errorMeta(outcome.error) });
      write(outcome.error.message);
      exitCode = 1;
    }
  } finally {
    await connection.disconnect('one-shot complete');
  }

  const trip = options.guard.halted;
  if (trip !== null) {
    logger.info('one_shot_halted', { reason: trip.reason, issues: trip.issues });
    for (const line of options.guard.report()) {
      write(line);
    }
  }

  const state = tracker.finish();
  const now = options.clock?.() ?? new Date();
  const saved = saveRun(state, options.stateDir, options.latestPath, {
    logger,
    fileOps: options.fileOps,
    now,
  });

  for (const file of [saved.runPath, saved.latestPath]) {
    if (file !== null) write(`[Saved state] to ${file}`);
  }
  if (saved.runPath === null && saved.latestPath === null) {
    write('[Warning] Failed to save agent state; see logs.');
  }

  return { exitCode, state, ...saved };
}
