/**
 * Claude Agent SDK adapter.
 *
 * A connection is one long-lived `query()` in streaming-input mode: user
 * turns are pushed into an input channel and the shared message stream is
 * read up to each turn's `result` message. Closing the channel ends the
 * conversation on the SDK side.
 */

import { query, type Options, type SDKMessage, type SDKUserMessage } from '@anthropic-ai/claude-agent-sdk';
import type Anthropic from '@anthropic-ai/sdk';
import type { Logger, SessionOptions } from '../core/types.js';
import { SendError } from '../core/errors.js';
import { errorMeta } from '../logging/logger.js';
import type { ReasoningService, ServiceConnection } from './connection.js';

export type McpServers = NonNullable<Options['mcpServers']>;

/** The parts of the SDK's `Query` this adapter drives. */
export interface QueryStream extends AsyncIterator<SDKMessage, void, undefined> {
  return(value?: void): Promise<IteratorResult<SDKMessage, void>>;
  interrupt(): Promise<void>;
  /** Resolves once the SDK has answered its initialisation request. */
  supportedCommands(): Promise<unknown>;
}

export type QueryFn = (params: { prompt: AsyncIterable<SDKUserMessage>; options: Options }) => QueryStream;

// =============================================================================
// INPUT CHANNEL
// =============================================================================

/**
 * Unbounded async queue. Iteration waits for the next `push` and finishes
 * once `close` is called and the queue is drained.
 */
export class InputChannel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) {
      throw new Error('input channel is closed');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.queue.push(value);
    }
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: async (): Promise<IteratorResult<T, undefined>> => {
        if (this.queue.length > 0) {
          const [value, ...rest] = this.queue;
          this.queue = rest;
          return { value, done: false };
        }
        if (this.closed) {
          return { value: undefined, done: true };
        }
        return new Promise<IteratorResult<T, undefined>>(resolve => {
          this.waiters.push(resolve);
        });
      },
    };
  }
}

export function userTurn(prompt: string, sessionId: string): SDKUserMessage {
  const message: Anthropic.MessageParam = { role: 'user', content: prompt };
  return {
    type: 'user',
    message,
    parent_tool_use_id: null,
    session_id: sessionId,
  };
}

// =============================================================================
// CONNECTION
// =============================================================================

export class ClaudeConnection implements ServiceConnection {
  private sessionId: string;
  private closed = false;

  constructor(
    private readonly stream: QueryStream,
    private readonly input: InputChannel<SDKUserMessage>,
    private readonly logger: Logger,
    resume?: string
  ) {
    this.sessionId = resume ?? '';
  }

  async *send(prompt: string): AsyncGenerator<SDKMessage, void, undefined> {
    if (this.closed) {
      throw new SendError('send', 'connection is closed');
    }

    this.input.push(userTurn(prompt, this.sessionId));
    this.logger.debug('turn_sent', { session_id: this.sessionId || undefined, chars: prompt.length });

    for (;;) {
      const next = await this.stream.next();
      if (next.done) {
        throw new SendError('receive', 'stream ended before the turn completed');
      }

      const message = next.value;
      if ('session_id' in message && message.session_id) {
        this.sessionId = message.session_id;
      }
      yield message;

      if (message.type === 'result') {
        return;
      }
    }
  }

  async interrupt(): Promise<void> {
    await this.stream.interrupt();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.input.close();
    await this.stream.return(undefined);
  }
}

// =============================================================================
// SERVICE
// =============================================================================

export interface ClaudeAgentServiceOptions {
  mcpServers: McpServers;
  logger: Logger;
  queryFn?: QueryFn;
}

export class ClaudeAgentService implements ReasoningService {
  private readonly mcpServers: McpServers;
  private readonly logger: Logger;
  private readonly queryFn: QueryFn;

  constructor(options: ClaudeAgentServiceOptions) {
    this.mcpServers = options.mcpServers;
    this.logger = options.logger;
    this.queryFn = options.queryFn ?? query;
  }

  toSdkOptions(options: SessionOptions): Options {
    return {
      systemPrompt: options.systemPrompt,
      mcpServers: this.mcpServers,
      allowedTools: options.allowedTools,
      ...(options.resume ? { resume: options.resume } : {}),
      ...(options.maxTurns !== undefined ? { maxTurns: options.maxTurns } : {}),
      ...(options.model ? { model: options.model } : {}),
    };
  }

  async connect(options: SessionOptions): Promise<ServiceConnection> {
    const input = new InputChannel<SDKUserMessage>();
    const stream = this.queryFn({ prompt: input, options: this.toSdkOptions(options) });

    try {
      await stream.supportedCommands();
    } catch (error) {
      input.close();
      await stream.return(undefined).catch(closeError =>
        this.logger.debug('sdk_query_close_failed', { error: errorMeta(closeError) })
      );
      throw error;
    }

    this.logger.info('sdk_query_opened', {
      resume: options.resume ?? null,
      tools: options.allowedTools.length,
      model: options.model,
    });
    return new ClaudeConnection(stream, input, this.logger, options.resume);
  }
}
