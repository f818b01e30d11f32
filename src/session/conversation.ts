/**
 * Interactive Conversation
 *
 * The operator loop: read a line, dispatch a command or send a query, stream
 * the response through the renderer, repeat. The loop is strictly turn by
 * turn and is always in one of two phases, waiting for operator input or
 * waiting for the service's response. Interrupts only make sense in the
 * second.
 */

import type { Logger, WaitingState } from '../core/types.js';
import { attempt } from '../core/errors.js';
import { errorMeta } from '../logging/logger.js';
import type { SessionStore } from '../storage/session-store.js';
import type { TurnGuard } from '../tools/turn-guard.js';
import type { ConnectionManager, InterruptOutcome } from './connection.js';
import { toConversationMessage } from './messages.js';
import type { MessageRenderer } from './renderer.js';

// =============================================================================
// COMMANDS
// =============================================================================

export type Command =
  | { kind: 'exit' }
  | { kind: 'interrupt' }
  | { kind: 'new' }
  | { kind: 'empty' }
  | { kind: 'query'; text: string };

export function parseCommand(input: string): Command {
  const text = input.trim();
  if (!text) return { kind: 'empty' };

  switch (text.toLowerCase()) {
    case 'exit':
      return { kind: 'exit' };
    case 'interrupt':
      return { kind: 'interrupt' };
    case 'new':
      return { kind: 'new' };
    default:
      return { kind: 'query', text };
  }
}

// =============================================================================
// OPERATOR I/O
// =============================================================================

export interface OperatorIO {
  /** Resolves to null once input has ended (EOF or Ctrl-C at the prompt). */
  prompt(question: string): Promise<string | null>;
  print(line: string): void;
}

/** `idle` means a live connection but no response pending. */
export type InterruptReply = InterruptOutcome | 'idle';

export const BANNER = [
  "You're starting a conversation with the Data Analysis Agent",
  "Commands: type 'exit' to quit, 'interrupt' to stop current task, 'new' for new session.",
];

// =============================================================================
// CONVERSATION
// =============================================================================

export interface ConversationOptions {
  connection: ConnectionManager;
  sessions: SessionStore;
  renderer: MessageRenderer;
  guard: TurnGuard;
  io: OperatorIO;
  logger: Logger;
}

export class InteractiveConversation {
  private readonly connection: ConnectionManager;
  private readonly sessions: SessionStore;
  private readonly renderer: MessageRenderer;
  private readonly guard: TurnGuard;
  private readonly io: OperatorIO;
  private readonly logger: Logger;
  private waiting: WaitingState = 'awaiting-input';

  constructor(options: ConversationOptions) {
    this.connection = options.connection;
    this.sessions = options.sessions;
    this.renderer = options.renderer;
    this.guard = options.guard;
    this.io = options.io;
    this.logger = options.logger;
  }

  get phase(): WaitingState {
    return this.waiting;
  }

  /**
   * Run until `exit` or end of input. The connection is closed on every
   * way out of the loop.
   */
  async start(): Promise<void> {
    try {
      const connected = await attempt('connect', () => this.connection.connect());
      if (!connected.ok) {
        this.io.print(`${connected.error.message}. Will retry on your next query.`);
      }

      for (const line of BANNER) {
        this.io.print(line);
      }

      for (;;) {
        const line = await this.io.prompt('You: ');
        if (line === null) {
          this.io.print('\nExiting session.');
          break;
        }

        const command = parseCommand(line);
        if (command.kind === 'exit') break;

        switch (command.kind) {
          case 'empty':
            break;
          case 'interrupt':
            await this.interrupt();
            break;
          case 'new':
            await this.newSession();
            break;
          case 'query':
            await this.runTurn(command.text);
            break;
          default: {
            const exhaustive: never = command;
            throw new Error(`Unhandled command: ${JSON.stringify(exhaustive)}`);
          }
        }
      }

      this.io.print('Conversation ended.');
    } finally {
      await this.connection.disconnect('shutdown');
    }
  }

  /**
   * Send one query and stream its response. Returns false when the turn
   * could not be completed; the loop carries on either way.
   */
  async runTurn(query: string): Promise<boolean> {
    if (!this.connection.isConnected) {
      const connected = await attempt('connect', () => this.connection.connect());
      if (!connected.ok) {
        this.io.print('Unable to connect client.');
        return false;
      }
    }

    const turn = this.guard.beginTurn();
    this.logger.info('turn_start', { turn, chars: query.length });
    this.waiting = 'awaiting-response';

    const outcome = await attempt('send', async () => {
      for await (const raw of this.connection.send(query)) {
        const message = toConversationMessage(raw);
        if (message.sessionId) {
          this.sessions.recordNewSession(message.sessionId);
        }
        this.renderer.render(message);
      }
    });
    this.waiting = 'awaiting-input';

    if (!outcome.ok) {
      this.logger.error('turn_error', { turn, error: errorMeta(outcome.error) });
      this.io.print('Error during query or response. See logs for details.');
      return false;
    }

    this.io.print('');
    this.reportHalt();
    return true;
  }

  /**
   * The typed `interrupt` command.
   */
  async interrupt(): Promise<InterruptReply> {
    if (this.waiting === 'awaiting-input' && this.connection.isConnected) {
      this.io.print('No task is running.');
      return 'idle';
    }

    const outcome = await this.connection.interrupt();
    switch (outcome) {
      case 'interrupted':
        this.io.print('Task interrupted!');
        break;
      case 'failed':
        this.io.print('Failed to interrupt task.');
        break;
      case 'not-connected':
        this.io.print('No active client to interrupt.');
        break;
    }
    return outcome;
  }

  /**
   * Ctrl-C while a response is streaming. Returns null when no response is
   * pending, so the caller can treat the signal as end of input instead.
   */
  async requestInterrupt(): Promise<InterruptReply | null> {
    if (this.waiting !== 'awaiting-response') {
      return null;
    }
    return this.interrupt();
  }

  /**
   * The `new` command: drop the connection, forget the session id, connect
   * fresh.
   */
  async newSession(): Promise<boolean> {
    await this.connection.disconnect('new session');
    this.sessions.reset();

    const connected = await attempt('connect', () => this.connection.connect());
    if (connected.ok) {
      this.io.print('Started a new session.');
      return true;
    }
    this.io.print('Failed to start new session; see logs.');
    return false;
  }

  private reportHalt(): void {
    const trip = this.guard.halted;
    if (trip === null) return;

    this.logger.info('turn_halted', { reason: trip.reason, issues: trip.issues });
    for (const line of this.guard.report()) {
      this.io.print(line);
    }
  }
}
