/**
 * Agent State Tracker Tests
 */

import { describe, it, expect } from 'vitest';
import { createAgentState } from '../src/core/types.js';
import { toConversationMessage } from '../src/session/messages.js';
import { AgentStateTracker, deriveIntent, intentFromInsights } from '../src/session/state-tracker.js';
import { assistant, createTestLogger, entriesAt, toolResult, user } from './setup.js';

function track(query: string, messages: unknown[]) {
  const { logger, sink } = createTestLogger();
  const tracker = new AgentStateTracker(query, logger);
  for (const message of messages) {
    tracker.observe(toConversationMessage(message));
  }
  return { state: tracker.finish(), sink };
}

describe('AgentStateTracker', () => {
  it('should record a tool error as a data issue', () => {
    const { state } = track('What is the total revenue?', [
      assistant([{ type: 'tool_use', id: 'toolu_1', name: 'calculate_total_tool', input: {} }]),
      user([toolResult({ ok: false, status: 'error', error: 'file not found' })]),
      assistant([{ type: 'text', text: 'The data file is missing.' }]),
    ]);

    expect(state).toEqual({
      query: 'What is the total revenue?',
      intent: 'error',
      results: null,
      insights: 'The data file is missing.',
      data_issues: [{ ok: false, status: 'error', error: 'file not found' }],
      timestamp: null,
    });
  });

  it('should take results from a successful payload', () => {
    const { state } = track('total?', [
      user([
        toolResult({
          ok: true,
          status: 'success',
          result: { intent: 'aggregation', column: 'revenue', total: 4450.75 },
          metadata: { rows_analyzed: 5, non_null_values: 5 },
        }),
      ]),
    ]);

    expect(state.results).toEqual({ intent: 'aggregation', column: 'revenue', total: 4450.75 });
    expect(state.intent).toBe('aggregation');
    expect(state.data_issues).toEqual([]);
  });

  it('should keep the last result', () => {
    const { state } = track('q', [
      user([toolResult({ ok: true, result: { intent: 'aggregation', total: 1 } })]),
      user([toolResult({ ok: true, result: { intent: 'filter', count: 2 } }, 'toolu_2')]),
    ]);

    expect(state.results).toEqual({ intent: 'filter', count: 2 });
    expect(state.intent).toBe('filter');
  });

  it('should read a flat total payload', () => {
    const { state } = track('q', [user([toolResult({ total: 10, column: 'revenue' })])]);
    expect(state.results).toEqual({ column: 'revenue', total: 10 });
    expect(state.intent).toBe('aggregation');
  });

  it('should keep non-JSON tool text', () => {
    const { state } = track('q', [
      user([{ type: 'tool_result', tool_use_id: 'toolu_1', content: [{ type: 'text', text: ' not json ' }] }]),
    ]);
    expect(state.results).toEqual({ raw_text: 'not json' });
    expect(state.intent).toBe('unknown');
  });

  it('should keep the string form of content without text parts', () => {
    const { state } = track('q', [user([{ type: 'tool_result', tool_use_id: 'toolu_1', content: 42 }])]);
    expect(state.results).toEqual({ tool_content_repr: '42' });
  });

  it('should treat halted and insufficient payloads as data issues', () => {
    const halted = { ok: false, status: 'halted', error: 'analysis halted', issues: ['x'] };
    const insufficient = { ok: false, status: 'insufficient', issues: ['1 rows have negative revenue (examples included)'] };
    const { state, sink } = track('q', [user([toolResult(insufficient), toolResult(halted, 'toolu_2')])]);

    expect(state.data_issues).toEqual([insufficient, halted]);
    expect(entriesAt(sink, 'info').filter(e => e.message === 'state_data_issue')).toHaveLength(2);
  });

  it('should join trimmed assistant text and ignore user text', () => {
    const { state } = track('q', [
      user('q'),
      assistant([{ type: 'text', text: '  First.  ' }]),
      assistant([{ type: 'text', text: '   ' }, { type: 'text', text: 'Second.' }]),
    ]);
    expect(state.insights).toBe('First.\nSecond.');
  });

  it('should take the intent from the answer when no tool ran', () => {
    const { state } = track('which one?', [
      assistant([{ type: 'text', text: 'Please clarify.\n```json\n{"intent": "ambiguous"}\n```' }]),
    ]);
    expect(state.intent).toBe('ambiguous');
  });

  it('should skip malformed blocks', () => {
    const { state, sink } = track('q', [assistant([{ type: 'text' }, { type: 'text', text: 'ok' }])]);
    expect(state.insights).toBe('ok');
    expect(entriesAt(sink, 'debug').map(e => e.message)).toContain('state_block_skipped');
  });

  it('should leave everything null for an empty run', () => {
    const { state } = track('q', []);
    expect(state.intent).toBeNull();
    expect(state.insights).toBeNull();
  });
});

describe('deriveIntent', () => {
  function withResults(results: Record<string, unknown>) {
    return { ...createAgentState('q'), results };
  }

  it('should infer intent from result shape', () => {
    expect(deriveIntent(withResults({ rows: [] }))).toBe('top_n');
    expect(deriveIntent(withResults({ n: 3 }))).toBe('top_n');
    expect(deriveIntent(withResults({ value: 'Mango' }))).toBe('filter');
    expect(deriveIntent(withResults({ something: true }))).toBe('unknown');
  });

  it('should prefer an explicit intent', () => {
    expect(deriveIntent(withResults({ intent: 'filter', total: 3 }))).toBe('filter');
  });
});

describe('intentFromInsights', () => {
  it('should use the last fenced block with a valid intent', () => {
    const text = '```json\n{"intent":"top_n"}\n```\nthen\n```json\n{"intent":"filter"}\n```';
    expect(intentFromInsights(text)).toBe('filter');
  });

  it('should ignore blocks without a known intent', () => {
    expect(intentFromInsights('```json\n{"intent":"top_n"}\n```\n```json\n{"intent":"guess"}\n```')).toBe('top_n');
    expect(intentFromInsights('no fences here')).toBeNull();
    expect(intentFromInsights(null)).toBeNull();
  });
});
