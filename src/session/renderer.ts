/**
 * Message Renderer
 *
 * Prints a compact view of each streamed message to the operator and writes
 * the full detail to the log. Blocks render one at a time, each inside its
 * own try/catch: a malformed block is logged once at error level and the
 * rest of the message still renders.
 */

import chalk from 'chalk';
import type { Block, BlockOrigin, ChatMessage, ConversationMessage, Logger, ToolResult } from '../core/types.js';
import { toAgentError } from '../core/errors.js';
import { errorMeta } from '../logging/logger.js';
import { parseBlock, parseToolPayload, toolResultTexts } from './messages.js';

export type ConsoleWriter = (line: string) => void;

export const USER_PREVIEW_LIMIT = 200;
export const ASSISTANT_PREVIEW_LIMIT = 2000;

export interface RendererOptions {
  logger: Logger;
  write?: ConsoleWriter;
}

/**
 * Structured content as indented JSON, anything else as its string form,
 * cut to `limit` characters.
 */
export function previewContent(content: unknown, limit: number): string {
  let text: string;
  if (content !== null && typeof content === 'object') {
    try {
      text = JSON.stringify(content, null, 2);
    } catch {
      text = String(content);
    }
  } else {
    text = String(content);
  }
  return text.length > limit ? text.slice(0, limit) : text;
}

function statusOf(content: unknown): string | undefined {
  const texts = toolResultTexts(content);
  if (texts === null) {
    if (content !== null && typeof content === 'object' && 'status' in content && typeof content.status === 'string') {
      return content.status;
    }
    return undefined;
  }
  for (const text of texts) {
    const status = parseToolPayload(text)?.status;
    if (status !== undefined) return status;
  }
  return undefined;
}

export class MessageRenderer {
  private readonly logger: Logger;
  private readonly write: ConsoleWriter;

  constructor(options: RendererOptions) {
    this.logger = options.logger;
    this.write = options.write ?? (line => console.log(line));
  }

  render(message: ConversationMessage): void {
    switch (message.kind) {
      case 'chat':
        this.renderChat(message);
        return;
      case 'result':
        this.logger.info('response_result', {
          subtype: message.subtype,
          is_error: message.isError,
          num_turns: message.numTurns,
          total_cost_usd: message.totalCostUsd,
        });
        if (message.isError) {
          this.write(chalk.red(`Response ended with an error (${message.subtype}).`));
        }
        return;
      case 'system':
        this.logger.debug('system_message', { subtype: message.subtype });
        return;
      case 'other':
        this.logger.debug('message_skipped', { type: message.type });
        return;
      default: {
        const exhaustive: never = message;
        return exhaustive;
      }
    }
  }

  private renderChat(message: ChatMessage): void {
    message.blocks.forEach((raw, index) => {
      try {
        this.renderBlock(parseBlock(raw), message.role);
      } catch (error) {
        const failure = toAgentError('render', error);
        this.logger.error('render_block_failed', { role: message.role, index, error: errorMeta(failure) });
      }
    });
  }

  private renderBlock(block: Block, origin: BlockOrigin): void {
    switch (block.kind) {
      case 'text':
        if (origin === 'assistant') {
          this.write(`${chalk.cyan('Claude:')} ${block.text}`);
          this.logger.info('assistant_text', { text: block.text });
        } else {
          this.write(`${chalk.green('User:')} ${block.text}`);
          this.logger.info('user_text', { text: block.text });
        }
        return;
      case 'tool_use': {
        this.write(chalk.yellow(`[Tool use] ${block.name}`));
        if (block.input !== undefined) {
          const input = JSON.stringify(block.input);
          this.write(`  input: ${input}`);
          this.logger.info('tool_use', { name: block.name, tool_use_id: block.id, input: block.input });
        } else {
          this.logger.info('tool_use', { name: block.name, tool_use_id: block.id });
        }
        return;
      }
      case 'tool_result':
        this.renderToolResult(block, origin);
        return;
      case 'unknown':
        this.write(chalk.gray(`[unknown block type: ${block.type}]`));
        this.logger.info('unknown_block', { type: block.type });
        return;
      default: {
        const exhaustive: never = block;
        return exhaustive;
      }
    }
  }

  private renderToolResult(block: ToolResult, origin: BlockOrigin): void {
    const limit = origin === 'user' ? USER_PREVIEW_LIMIT : ASSISTANT_PREVIEW_LIMIT;
    const preview = previewContent(block.content, limit);
    const status = statusOf(block.content);

    this.logger.info('tool_result', {
      origin,
      tool_use_id: block.toolUseId,
      is_error: block.isError,
      status,
      preview,
    });

    if (origin === 'user') {
      return;
    }

    if (block.content !== null && typeof block.content === 'object') {
      this.write('[Tool result]:');
      this.write(preview);
    } else {
      this.write(`[Tool result]: ${preview}`);
    }
  }
}
