/**
 * Agent State Tracker
 *
 * Folds the streamed messages of a one-shot run into an `AgentState`:
 * tool payloads become `results` (last write wins) or `data_issues`,
 * assistant text becomes `insights`, and `intent` is derived at the end.
 */

import type { AgentState, Block, ConversationMessage, Intent, Logger, ToolResult } from '../core/types.js';
import { IntentSchema, createAgentState, isFailurePayload, isRecord } from '../core/types.js';
import { errorMeta } from '../logging/logger.js';
import { parseBlock, parseToolPayload, toolResultTexts } from './messages.js';

const FENCED_JSON = /```json\s*([\s\S]*?)```/g;

/**
 * Intent named by the last fenced ```json block in the assistant's answer.
 */
export function intentFromInsights(insights: string | null): Intent | null {
  if (!insights) return null;

  const blocks = [...insights.matchAll(FENCED_JSON)];
  for (let i = blocks.length - 1; i >= 0; i--) {
    const body = blocks[i][1];
    const payload = parseToolPayload(body);
    const intent = IntentSchema.safeParse(payload?.intent);
    if (intent.success) return intent.data;
  }
  return null;
}

export function deriveIntent(state: AgentState): Intent | null {
  const results = state.results;
  if (results !== null) {
    const named = IntentSchema.safeParse(results.intent);
    if (named.success) return named.data;
    if ('total' in results) return 'aggregation';
    if ('n' in results || Array.isArray(results.rows)) return 'top_n';
    if ('count' in results || 'value' in results) return 'filter';
    return 'unknown';
  }

  const stated = intentFromInsights(state.insights);
  if (stated !== null) return stated;

  return state.data_issues.length > 0 ? 'error' : null;
}

export class AgentStateTracker {
  readonly state: AgentState;
  private readonly texts: string[] = [];

  constructor(
    query: string,
    private readonly logger: Logger
  ) {
    this.state = createAgentState(query);
  }

  observe(message: ConversationMessage): void {
    if (message.kind !== 'chat') return;

    for (const raw of message.blocks) {
      let block: Block;
      try {
        block = parseBlock(raw);
      } catch (error) {
        this.logger.debug('state_block_skipped', { error: errorMeta(error) });
        continue;
      }

      if (block.kind === 'tool_result') {
        this.recordToolResult(block);
      } else if (block.kind === 'text' && message.role === 'assistant') {
        const text = block.text.trim();
        if (text) this.texts.push(text);
      }
    }
  }

  private recordToolResult(block: ToolResult): void {
    const texts = toolResultTexts(block.content);
    if (texts === null) {
      this.state.results = { tool_content_repr: String(block.content) };
      return;
    }

    for (const raw of texts) {
      const text = raw.trim();
      const payload = parseToolPayload(text);
      if (payload === null) {
        this.state.results = { raw_text: text };
      } else if (isFailurePayload(payload)) {
        this.state.data_issues.push(payload);
        this.logger.info('state_data_issue', { status: payload.status, tool_use_id: block.toolUseId });
      } else if (isRecord(payload.result)) {
        this.state.results = { ...payload.result };
      } else if ('total' in payload) {
        this.state.results = { column: payload.column ?? null, total: payload.total };
      } else {
        this.state.results = { ...payload };
      }
    }
  }

  /**
   * Close the run: join insights and derive the intent.
   */
  finish(): AgentState {
    this.state.insights = this.texts.length > 0 ? this.texts.join('\n') : null;
    this.state.intent = deriveIntent(this.state);
    this.logger.info('state_finished', {
      intent: this.state.intent,
      has_results: this.state.results !== null,
      data_issues: this.state.data_issues.length,
    });
    return this.state;
  }
}
