/**
 * One-shot run tests
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runOneShot, type OneShotOptions } from '../src/agents/one-shot.js';
import { createRuntime } from '../src/agents/runtime.js';
import { loadSystemPrompt } from '../src/agents/prompt.js';
import { loadSettings } from '../src/config/settings.js';
import type { FileOps } from '../src/storage/atomic-file.js';
import { TurnGuard } from '../src/tools/turn-guard.js';
import {
  BASE_SESSION,
  FakeReasoningService,
  assistant,
  createTempDir,
  createTestLogger,
  errno,
  removeDir,
  result,
  systemInit,
  toolResult,
  user,
  writeCsv,
} from './setup.js';

const FIXED_NOW = new Date('2026-10-18T09:30:15.123Z');

describe('runOneShot', () => {
  let dir: string;
  let lines: string[];
  let latestPath: string;
  let runPath: string;

  function options(service: FakeReasoningService, overrides: Partial<OneShotOptions> = {}): OneShotOptions {
    const { logger } = createTestLogger();
    return {
      query: 'What is the total revenue?',
      service,
      session: { ...BASE_SESSION, maxTurns: 3 },
      stateDir: dir,
      latestPath,
      guard: new TurnGuard(),
      logger,
      write: line => lines.push(line),
      clock: () => FIXED_NOW,
      ...overrides,
    };
  }

  beforeEach(() => {
    dir = createTempDir();
    lines = [];
    latestPath = path.join(dir, 'agent_state_latest.json');
    runPath = path.join(dir, 'agent_state_20261018T093015Z.json');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should record a tool failure and save both state files', async () => {
    const service = new FakeReasoningService([
      [
        systemInit('s1'),
        assistant([{ type: 'tool_use', id: 'toolu_1', name: 'calculate_total_tool', input: {} }], 's1'),
        user([toolResult({ ok: false, status: 'error', error: 'file not found' })], 's1'),
        assistant([{ type: 'text', text: 'The data file is missing.' }], 's1'),
        result('s1'),
      ],
    ]);

    const outcome = await runOneShot(options(service));

    expect(outcome.exitCode).toBe(0);
    expect(outcome.runPath).toBe(runPath);
    expect(outcome.latestPath).toBe(latestPath);
    expect(lines).toEqual([
      '[Tool use] calculate_total_tool',
      '  input: {}',
      'Claude: The data file is missing.',
      `[Saved state] to ${runPath}`,
      `[Saved state] to ${latestPath}`,
    ]);

    const saved = JSON.parse(fs.readFileSync(latestPath, 'utf8'));
    expect(saved).toEqual({
      query: 'What is the total revenue?',
      intent: 'error',
      results: null,
      insights: 'The data file is missing.',
      data_issues: [{ ok: false, status: 'error', error: 'file not found' }],
      timestamp: '2026-10-18T09:30:15.123Z',
    });
    expect(fs.readFileSync(runPath, 'utf8')).toBe(fs.readFileSync(latestPath, 'utf8'));
  });

  it('should never resume and should pass the turn limit', async () => {
    const service = new FakeReasoningService();
    await runOneShot(options(service));

    expect(service.connectCalls).toEqual([{ ...BASE_SESSION, maxTurns: 3 }]);
    expect(service.prompts).toEqual(['What is the total revenue?']);
    expect(service.connections[0].closed).toBe(true);
  });

  it('should start a fresh guard turn', async () => {
    const guard = new TurnGuard();
    guard.halt('stale');
    await runOneShot(options(new FakeReasoningService(), { guard }));

    expect(guard.currentTurn).toBe(1);
    expect(guard.halted).toBeNull();
  });

  it('should list the data issues when validation halts the run', async () => {
    const guard = new TurnGuard();
    const service = new FakeReasoningService([
      () => {
        guard.halt('2 rows have negative revenue (examples included)', [
          '2 rows have negative revenue (examples included)',
        ]);
        return [result()];
      },
    ]);

    const outcome = await runOneShot(options(service, { guard }));

    expect(outcome.exitCode).toBe(0);
    expect(lines).toEqual([
      'Data issues:',
      '  - 2 rows have negative revenue (examples included)',
      `[Saved state] to ${runPath}`,
      `[Saved state] to ${latestPath}`,
    ]);
  });

  it('should exit 1 without saving when it cannot connect', async () => {
    const service = new FakeReasoningService();
    service.connectErrors = [new Error('missing credentials')];

    const outcome = await runOneShot(options(service));

    expect(outcome).toEqual({ exitCode: 1, state: null, runPath: null, latestPath: null });
    expect(lines).toEqual(['Failed to connect: missing credentials']);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('should save what it has when the turn fails', async () => {
    const service = new FakeReasoningService([
      [assistant([{ type: 'text', text: 'Checking the data.' }]), new Error('socket closed')],
    ]);

    const outcome = await runOneShot(options(service));

    expect(outcome.exitCode).toBe(1);
    expect(outcome.state?.insights).toBe('Checking the data.');
    expect(lines).toEqual([
      'Claude: Checking the data.',
      'Error during response: socket closed',
      `[Saved state] to ${runPath}`,
      `[Saved state] to ${latestPath}`,
    ]);
  });

  it('should warn when neither file can be written', async () => {
    const fileOps: FileOps = {
      ...fs,
      writeSync: () => {
        throw errno('ENOSPC', 'no space left on device');
      },
    };

    const outcome = await runOneShot(options(new FakeReasoningService(), { fileOps }));

    expect(outcome.exitCode).toBe(0);
    expect(outcome.runPath).toBeNull();
    expect(lines).toEqual(['[Warning] Failed to save agent state; see logs.']);
  });
});

describe('createRuntime', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function settingsFor(extra: Record<string, string> = {}) {
    return loadSettings({
      DATA_PATH: writeCsv(dir, 'products,revenue\nMango,10\n'),
      LOG_DIR: path.join(dir, 'logs'),
      ...extra,
    });
  }

  it('should limit turns only in one-shot mode', () => {
    const oneShot = createRuntime(settingsFor(), 'one_shot', { console: false, systemPrompt: 'test prompt' });
    const interactive = createRuntime(settingsFor(), 'interactive', { console: false, systemPrompt: 'test prompt' });

    expect(oneShot.session).toEqual({
      systemPrompt: 'test prompt',
      allowedTools: [
        'mcp__dataAnalysis__validate_data_tool',
        'mcp__dataAnalysis__calculate_total_tool',
        'mcp__dataAnalysis__get_top_n_tool',
        'mcp__dataAnalysis__filter_by_value_tool',
      ],
      maxTurns: 3,
    });
    expect(interactive.session.maxTurns).toBeUndefined();
  });

  it('should pass the configured model', () => {
    const runtime = createRuntime(settingsFor({ CLAUDE_MODEL: 'test-model' }), 'interactive', {
      console: false,
      systemPrompt: 'test prompt',
    });
    expect(runtime.session.model).toBe('test-model');
  });

  it('should log to per-channel files', () => {
    createRuntime(settingsFor(), 'one_shot', { console: false, systemPrompt: 'test prompt' });

    expect(fs.readdirSync(path.join(dir, 'logs')).sort()).toEqual(['one_shot.log', 'tools.log']);
  });

  it('should serve the tools through the registry', async () => {
    const runtime = createRuntime(settingsFor(), 'one_shot', { console: false, systemPrompt: 'test prompt' });
    const envelope = await runtime.registry.invoke('calculate_total_tool');

    expect(JSON.parse(envelope.content[0].text).result.total).toBe(10);
  });
});

describe('loadSystemPrompt', () => {
  it('should load the shipped prompt', () => {
    const prompt = loadSystemPrompt();
    expect(prompt.startsWith('You are a Data Analysis Agent.')).toBe(true);
    expect(prompt).toContain('mcp__dataAnalysis__validate_data_tool');
  });
});
