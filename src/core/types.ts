/**
 * Core Types for the Tabular Agent
 *
 * Shared shapes for the conversation layer:
 * - Logger contract
 * - Agent state record (one-shot runs)
 * - Tool result envelope and payloads
 * - Response blocks and normalized messages
 */

import { z } from 'zod';

// =============================================================================
// LOGGING
// =============================================================================

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// =============================================================================
// AGENT STATE
// =============================================================================

export const IntentSchema = z.enum(['aggregation', 'top_n', 'filter', 'ambiguous', 'error', 'unknown']);

export type Intent = z.infer<typeof IntentSchema>;

export interface AgentState {
  query: string;
  intent: Intent | null;
  results: Record<string, unknown> | null;
  insights: string | null;
  data_issues: unknown[];
  timestamp: string | null;
}

/**
 * Lenient reader schema: older or partial state files still load.
 */
export const AgentStateFileSchema = z.object({
  query: z.string().default(''),
  intent: IntentSchema.nullable().catch(null).default(null),
  results: z.record(z.string(), z.unknown()).nullable().catch(null).default(null),
  insights: z.string().nullable().catch(null).default(null),
  data_issues: z.array(z.unknown()).nullable().catch([]).default([]),
  timestamp: z.string().nullable().catch(null).default(null),
});

export function createAgentState(query: string): AgentState {
  return {
    query,
    intent: null,
    results: null,
    insights: null,
    data_issues: [],
    timestamp: null,
  };
}

// =============================================================================
// TOOL RESULTS
// =============================================================================

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolEnvelope {
  content: TextContent[];
}

export const FAILURE_STATUSES: readonly string[] = ['insufficient', 'error', 'halted'];

export const ToolPayloadSchema = z
  .object({
    ok: z.boolean().optional(),
    status: z.string().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type ToolPayload = z.infer<typeof ToolPayloadSchema>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isFailurePayload(payload: ToolPayload): boolean {
  return payload.ok === false || (payload.status !== undefined && FAILURE_STATUSES.includes(payload.status));
}

// =============================================================================
// RESPONSE BLOCKS
// =============================================================================

export type BlockOrigin = 'assistant' | 'user';

export interface TextBlock {
  kind: 'text';
  text: string;
}

export interface ToolInvocation {
  kind: 'tool_use';
  id?: string;
  name: string;
  input?: unknown;
}

export interface ToolResult {
  kind: 'tool_result';
  toolUseId?: string;
  content: unknown;
  isError: boolean;
}

export interface UnknownBlock {
  kind: 'unknown';
  type: string;
}

export type Block = TextBlock | ToolInvocation | ToolResult | UnknownBlock;

// =============================================================================
// NORMALIZED MESSAGES
// =============================================================================

export interface ChatMessage {
  kind: 'chat';
  role: BlockOrigin;
  /** Raw blocks in arrival order; parsed one at a time by the consumers. */
  blocks: unknown[];
  sessionId?: string;
}

export interface SystemMessage {
  kind: 'system';
  subtype: string;
  sessionId?: string;
}

export interface ResultMessage {
  kind: 'result';
  subtype: string;
  isError: boolean;
  numTurns?: number;
  totalCostUsd?: number;
  text?: string;
  sessionId?: string;
}

export interface OtherMessage {
  kind: 'other';
  type: string;
  sessionId?: string;
}

export type ConversationMessage = ChatMessage | SystemMessage | ResultMessage | OtherMessage;

// =============================================================================
// CONVERSATION
// =============================================================================

export type WaitingState = 'awaiting-input' | 'awaiting-response';

export interface SessionOptions {
  systemPrompt: string;
  allowedTools: string[];
  resume?: string;
  maxTurns?: number;
  model?: string;
}
