#!/usr/bin/env node
/**
 * tabular-agent CLI
 *
 *   tabular-agent                       interactive conversation
 *   tabular-agent "What's the total?"   answer once, save the run state, exit
 */

import fs from 'fs';
import readline from 'readline/promises';
import { pathToFileURL } from 'url';
import chalk from 'chalk';
import { Command } from 'commander';
import { runOneShot } from './agents/one-shot.js';
import { createRuntime } from './agents/runtime.js';
import { checkEnvironment, loadDotenv, loadSettings, type Settings } from './config/settings.js';
import { ConfigError, describeCause } from './core/errors.js';
import { ConnectionManager } from './session/connection.js';
import { InteractiveConversation, type OperatorIO } from './session/conversation.js';
import { MessageRenderer } from './session/renderer.js';
import { DEFAULT_STATE_DIR } from './storage/agent-state.js';
import { SessionStore } from './storage/session-store.js';

export const VERSION = '0.1.0';

// =============================================================================
// TERMINAL I/O
// =============================================================================

/**
 * Operator I/O on a readline interface. Ctrl-C goes to the registered
 * interrupt handler; without one, it ends the pending prompt.
 */
export class TerminalIO implements OperatorIO {
  private readonly rl: readline.Interface;
  private pending: AbortController | null = null;
  private closed = false;
  private interruptHandler: (() => boolean) | null = null;

  constructor(input: NodeJS.ReadableStream = process.stdin, private readonly output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('close', () => {
      this.closed = true;
      this.pending?.abort();
    });
    this.rl.on('SIGINT', () => {
      const handled = this.interruptHandler?.() ?? false;
      if (!handled) {
        this.pending?.abort();
      }
    });
  }

  /**
   * `handler` returns true when it consumed the Ctrl-C.
   */
  onInterrupt(handler: () => boolean): void {
    this.interruptHandler = handler;
  }

  async prompt(question: string): Promise<string | null> {
    if (this.closed) return null;

    const controller = new AbortController();
    this.pending = controller;
    try {
      return await this.rl.question(question, { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted || this.closed) {
        return null;
      }
      throw error;
    } finally {
      this.pending = null;
    }
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}

// =============================================================================
// MODES
// =============================================================================

async function runInteractive(settings: Settings): Promise<number> {
  const runtime = createRuntime(settings, 'interactive');
  const { logger } = runtime;

  const sessions = new SessionStore({
    sessionIdPath: settings.sessionIdPath,
    historyDir: settings.sessionHistoryDir,
    logger,
  });
  const connection = new ConnectionManager(
    runtime.service,
    () => {
      const resume = sessions.resolveResumeId();
      return { ...runtime.session, ...(resume ? { resume } : {}) };
    },
    logger
  );

  const io = new TerminalIO();
  const conversation = new InteractiveConversation({
    connection,
    sessions,
    renderer: new MessageRenderer({ logger, write: line => io.print(line) }),
    guard: runtime.guard,
    io,
    logger,
  });

  io.onInterrupt(() => {
    if (conversation.phase !== 'awaiting-response') return false;
    conversation.requestInterrupt().catch(error => logger.failure('interrupt_handler_failed', error));
    return true;
  });

  try {
    await conversation.start();
  } finally {
    io.close();
  }
  return 0;
}

async function runQuery(settings: Settings, query: string): Promise<number> {
  const runtime = createRuntime(settings, 'one_shot');
  const result = await runOneShot({
    query,
    service: runtime.service,
    session: runtime.session,
    stateDir: DEFAULT_STATE_DIR,
    latestPath: settings.agentStatePath,
    guard: runtime.guard,
    logger: runtime.logger,
  });
  return result.exitCode;
}

export async function main(words: string[]): Promise<number> {
  const loaded = loadDotenv();

  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      return 1;
    }
    throw error;
  }

  if (!loaded) {
    console.log(chalk.gray('No .env file found; using the process environment.'));
  }
  for (const warning of checkEnvironment(settings)) {
    console.warn(chalk.yellow(`Warning: ${warning}`));
  }
  console.log(`DATA_PATH: ${settings.dataPath}`);

  const query = words.join(' ').trim();
  return query ? runQuery(settings, query) : runInteractive(settings);
}

export function buildProgram(): Command {
  return new Command()
    .name('tabular-agent')
    .description('Ask questions about a CSV dataset of products and revenue')
    .version(VERSION)
    .argument('[query...]', 'answer this one question, save the run state and exit')
    .action(async (words: string[]) => {
      process.exitCode = await main(words);
    });
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  buildProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error(`Fatal error: ${describeCause(error)}`);
      process.exit(1);
    });
}
