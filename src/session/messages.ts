/**
 * Message Normalization
 *
 * The SDK stream carries many message and content-block kinds, and new ones
 * appear between releases. Everything entering the conversation layer goes
 * through `toConversationMessage` and `parseBlock`, which map the raw values
 * onto the closed unions in `core/types`. Unrecognised kinds become `other`
 * or `unknown` variants; only a recognised block missing its required field
 * is an error.
 */

import { z } from 'zod';
import type { Block, ConversationMessage, ToolPayload } from '../core/types.js';
import { ToolPayloadSchema, isRecord } from '../core/types.js';
import { RenderError } from '../core/errors.js';

const BaseMessageSchema = z
  .object({
    type: z.string(),
    session_id: z.string().optional(),
  })
  .passthrough();

const ChatMessageSchema = z.object({
  type: z.enum(['assistant', 'user']),
  message: z
    .object({
      content: z.union([z.string(), z.array(z.unknown())]),
    })
    .passthrough(),
});

const SystemMessageSchema = z.object({
  subtype: z.string().default('unknown'),
});

const ResultMessageSchema = z.object({
  subtype: z.string().default('unknown'),
  is_error: z.boolean().default(false),
  num_turns: z.number().optional(),
  total_cost_usd: z.number().optional(),
  result: z.string().optional(),
});

const RawBlockSchema = z.object({ type: z.string() }).passthrough();

function sessionIdOf(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function toConversationMessage(raw: unknown): ConversationMessage {
  const base = BaseMessageSchema.safeParse(raw);
  if (!base.success) {
    return { kind: 'other', type: raw === null ? 'null' : typeof raw };
  }

  const sessionId = sessionIdOf(base.data.session_id);

  switch (base.data.type) {
    case 'assistant':
    case 'user': {
      const chat = ChatMessageSchema.safeParse(raw);
      if (!chat.success) {
        return { kind: 'other', type: base.data.type, sessionId };
      }
      const content = chat.data.message.content;
      return {
        kind: 'chat',
        role: chat.data.type,
        blocks: typeof content === 'string' ? [{ type: 'text', text: content }] : content,
        sessionId,
      };
    }
    case 'system': {
      const system = SystemMessageSchema.safeParse(raw);
      return {
        kind: 'system',
        subtype: system.success ? system.data.subtype : 'unknown',
        sessionId,
      };
    }
    case 'result': {
      const result = ResultMessageSchema.safeParse(raw);
      if (!result.success) {
        return { kind: 'result', subtype: 'unknown', isError: true, sessionId };
      }
      return {
        kind: 'result',
        subtype: result.data.subtype,
        isError: result.data.is_error,
        numTurns: result.data.num_turns,
        totalCostUsd: result.data.total_cost_usd,
        text: result.data.result,
        sessionId,
      };
    }
    default:
      return { kind: 'other', type: base.data.type, sessionId };
  }
}

/**
 * Map one raw content block to the `Block` union.
 *
 * @throws RenderError when a text, tool_use or tool_result block lacks the
 * field that kind requires.
 */
export function parseBlock(raw: unknown): Block {
  const parsed = RawBlockSchema.safeParse(raw);
  if (!parsed.success) {
    const type = raw !== null && typeof raw === 'object' ? 'untyped' : raw === null ? 'null' : typeof raw;
    return { kind: 'unknown', type };
  }

  const block = parsed.data;
  switch (block.type) {
    case 'text': {
      if (typeof block.text !== 'string') {
        throw new RenderError('text block has no text', 'text');
      }
      return { kind: 'text', text: block.text };
    }
    case 'tool_use': {
      if (typeof block.name !== 'string' || block.name === '') {
        throw new RenderError('tool_use block has no name', 'tool_use');
      }
      return {
        kind: 'tool_use',
        id: typeof block.id === 'string' ? block.id : undefined,
        name: block.name,
        input: block.input,
      };
    }
    case 'tool_result': {
      if (!('content' in block)) {
        throw new RenderError('tool_result block has no content', 'tool_result');
      }
      return {
        kind: 'tool_result',
        toolUseId: typeof block.tool_use_id === 'string' ? block.tool_use_id : undefined,
        content: block.content,
        isError: block.is_error === true,
      };
    }
    default:
      return { kind: 'unknown', type: block.type };
  }
}

/**
 * Text parts of a tool result: a string is one part; a list contributes its
 * `{ type: "text" }` items. Anything else has no text form and yields null.
 */
export function toolResultTexts(content: unknown): string[] | null {
  if (typeof content === 'string') {
    return [content];
  }
  if (!Array.isArray(content)) {
    return null;
  }

  const texts: string[] = [];
  for (const part of content) {
    const text = RawBlockSchema.safeParse(part);
    if (text.success && text.data.type === 'text' && typeof text.data.text === 'string') {
      texts.push(text.data.text);
    }
  }
  return texts;
}

/**
 * Parse a tool's JSON text. Returns null for text that is not a JSON object.
 */
export function parseToolPayload(text: string): ToolPayload | null {
  let value: unknown;
  try {
    value = JSON.parse(text.trim());
  } catch {
    return null;
  }
  if (!isRecord(value)) {
    return null;
  }
  const payload = ToolPayloadSchema.safeParse(value);
  return payload.success ? payload.data : null;
}
