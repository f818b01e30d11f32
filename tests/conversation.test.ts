/**
 * Interactive Conversation Tests
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SessionOptions, WaitingState } from '../src/core/types.js';
import { ConnectionManager } from '../src/session/connection.js';
import { BANNER, InteractiveConversation, parseCommand, type OperatorIO } from '../src/session/conversation.js';
import { MessageRenderer } from '../src/session/renderer.js';
import { SessionStore } from '../src/storage/session-store.js';
import { TurnGuard } from '../src/tools/turn-guard.js';
import {
  BASE_SESSION,
  FakeReasoningService,
  assistant,
  createTempDir,
  createTestLogger,
  entriesAt,
  removeDir,
  result,
  systemInit,
} from './setup.js';

class ScriptedIO implements OperatorIO {
  readonly printed: string[] = [];

  constructor(private readonly lines: Array<string | null>) {}

  async prompt(): Promise<string | null> {
    return this.lines.shift() ?? null;
  }

  print(line: string): void {
    this.printed.push(line);
  }
}

describe('parseCommand', () => {
  it('should recognise commands regardless of case and whitespace', () => {
    expect(parseCommand('  EXIT ')).toEqual({ kind: 'exit' });
    expect(parseCommand('Interrupt')).toEqual({ kind: 'interrupt' });
    expect(parseCommand('new')).toEqual({ kind: 'new' });
  });

  it('should treat blank input as empty', () => {
    expect(parseCommand('   ')).toEqual({ kind: 'empty' });
  });

  it('should pass anything else through as a trimmed query', () => {
    expect(parseCommand('  What is the Total? ')).toEqual({ kind: 'query', text: 'What is the Total?' });
    expect(parseCommand('exit now')).toEqual({ kind: 'query', text: 'exit now' });
  });
});

describe('InteractiveConversation', () => {
  let dir: string;
  let sessionIdPath: string;
  let historyDir: string;

  function createConversation(service: FakeReasoningService, lines: Array<string | null>) {
    const { logger, sink } = createTestLogger();
    const sessions = new SessionStore({ sessionIdPath, historyDir, logger });
    const connection = new ConnectionManager(
      service,
      (): SessionOptions => {
        const resume = sessions.resolveResumeId();
        return { ...BASE_SESSION, ...(resume ? { resume } : {}) };
      },
      logger
    );
    const io = new ScriptedIO(lines);
    const guard = new TurnGuard();
    const conversation = new InteractiveConversation({
      connection,
      sessions,
      renderer: new MessageRenderer({ logger, write: line => io.print(line) }),
      guard,
      io,
      logger,
    });
    return { conversation, connection, sessions, io, guard, sink };
  }

  beforeEach(() => {
    dir = createTempDir();
    sessionIdPath = path.join(dir, 'session_id.txt');
    historyDir = path.join(dir, 'history');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should start fresh and persist the session id the service reports', async () => {
    const service = new FakeReasoningService([
      [systemInit('abc123'), assistant([{ type: 'text', text: 'Hello!' }], 'abc123'), result('abc123')],
    ]);
    const { conversation, connection, io } = createConversation(service, ['hello', 'exit']);

    await conversation.start();

    expect(service.connectCalls).toHaveLength(1);
    expect(service.connectCalls[0].resume).toBeUndefined();
    expect(fs.readFileSync(sessionIdPath, 'utf8')).toBe('abc123');
    expect(fs.readFileSync(path.join(historyDir, 'session_ids.txt'), 'utf8').trim().split('\n')).toHaveLength(1);
    expect(io.printed).toEqual([...BANNER, 'Claude: Hello!', '', 'Conversation ended.']);
    expect(connection.state).toBe('disconnected');
    expect(service.connections[0].closed).toBe(true);
  });

  it('should resume the stored session on the next run', async () => {
    const first = new FakeReasoningService([[systemInit('abc123'), result('abc123')]]);
    await createConversation(first, ['hello', 'exit']).conversation.start();

    const second = new FakeReasoningService();
    await createConversation(second, ['exit']).conversation.start();

    expect(second.connectCalls[0].resume).toBe('abc123');
  });

  it('should end on end of input', async () => {
    const service = new FakeReasoningService();
    const { conversation, io } = createConversation(service, []);

    await conversation.start();

    expect(io.printed).toEqual([...BANNER, '\nExiting session.', 'Conversation ended.']);
  });

  it('should ignore empty lines', async () => {
    const service = new FakeReasoningService();
    await createConversation(service, ['', '   ', 'exit']).conversation.start();
    expect(service.prompts).toEqual([]);
  });

  it('should keep the loop alive when the first connect fails', async () => {
    const service = new FakeReasoningService();
    service.connectErrors = [new Error('network down')];
    const { conversation, io } = createConversation(service, ['hello', 'exit']);

    await conversation.start();

    expect(io.printed).toEqual([
      'Failed to connect: network down. Will retry on your next query.',
      ...BANNER,
      '',
      'Conversation ended.',
    ]);
    expect(service.connectCalls).toHaveLength(2);
    expect(service.prompts).toEqual(['hello']);
  });

  it('should report a query that cannot connect', async () => {
    const service = new FakeReasoningService();
    service.connectErrors = [new Error('network down'), new Error('network down')];
    const { conversation, io } = createConversation(service, ['hello', 'exit']);

    await conversation.start();

    expect(io.printed).toContain('Unable to connect client.');
    expect(service.prompts).toEqual([]);
  });

  it('should recover from a failed turn on the next query', async () => {
    const service = new FakeReasoningService([new Error('socket closed'), [result('s2')]]);
    const { conversation, io, sink } = createConversation(service, ['first', 'second', 'exit']);

    await conversation.start();

    expect(io.printed).toEqual([
      ...BANNER,
      'Error during query or response. See logs for details.',
      '',
      'Conversation ended.',
    ]);
    expect(service.connectCalls).toHaveLength(2);
    expect(entriesAt(sink, 'error').map(e => e.message)).toEqual(['turn_failed', 'turn_error']);
  });

  describe('new', () => {
    it('should forget the session and reconnect without resume', async () => {
      const service = new FakeReasoningService([[systemInit('abc123'), result('abc123')]]);
      const { conversation, io, sessions } = createConversation(service, ['hello', 'new', 'exit']);

      await conversation.start();

      expect(io.printed).toContain('Started a new session.');
      expect(service.connectCalls).toHaveLength(2);
      expect(service.connectCalls[1].resume).toBeUndefined();
      expect(service.connections[0].closed).toBe(true);
      expect(fs.existsSync(sessionIdPath)).toBe(false);
      expect(sessions.currentId).toBeNull();
    });

    it('should report a failed reconnect', async () => {
      const service = new FakeReasoningService();
      const { conversation, connection, io } = createConversation(service, []);
      await connection.connect();
      service.connectErrors = [new Error('network down')];

      expect(await conversation.newSession()).toBe(false);
      expect(io.printed).toEqual(['Failed to start new session; see logs.']);
      expect(connection.state).toBe('disconnected');
    });
  });

  describe('interrupt', () => {
    it('should say nothing is running when typed at the prompt', async () => {
      const service = new FakeReasoningService();
      const { conversation, io } = createConversation(service, ['interrupt', 'exit']);

      await conversation.start();

      expect(io.printed).toEqual([...BANNER, 'No task is running.', 'Conversation ended.']);
      expect(service.connections[0].interrupts).toBe(0);
    });

    it('should say so when there is no connection', async () => {
      const service = new FakeReasoningService();
      service.connectErrors = [new Error('network down')];
      const { conversation, io } = createConversation(service, ['interrupt', 'exit']);

      await conversation.start();

      expect(io.printed).toContain('No active client to interrupt.');
    });

    it('should report a failed interrupt', async () => {
      let pending: Promise<unknown> = Promise.resolve(null);
      const service = new FakeReasoningService();
      const { conversation, connection, io } = createConversation(service, []);
      service.turns = [
        () => {
          pending = conversation.requestInterrupt();
          return [result()];
        },
      ];

      await connection.connect();
      service.connections[0].interruptError = new Error('not running');
      await conversation.runTurn('long question');

      expect(await pending).toBe('failed');
      expect(io.printed).toContain('Failed to interrupt task.');
      expect(connection.state).toBe('connected');
    });

    it('should only honour Ctrl-C while a response is pending', async () => {
      const phases: WaitingState[] = [];
      let pending: Promise<unknown> = Promise.resolve(null);
      const service = new FakeReasoningService();
      const { conversation, connection, io } = createConversation(service, []);
      service.turns = [
        () => {
          phases.push(conversation.phase);
          pending = conversation.requestInterrupt();
          return [result()];
        },
      ];

      expect(await conversation.requestInterrupt()).toBeNull();
      await connection.connect();
      await conversation.runTurn('long question');

      expect(await pending).toBe('interrupted');
      expect(phases).toEqual(['awaiting-response']);
      expect(conversation.phase).toBe('awaiting-input');
      expect(io.printed).toContain('Task interrupted!');
    });
  });

  describe('validation halts', () => {
    it('should list the issues after the turn', async () => {
      const service = new FakeReasoningService();
      const { conversation, connection, io, guard } = createConversation(service, []);
      service.turns = [
        () => {
          guard.halt('1 rows have negative revenue (examples included)', [
            '1 rows have negative revenue (examples included)',
          ]);
          return [result()];
        },
      ];

      await connection.connect();
      expect(await conversation.runTurn('total?')).toBe(true);

      expect(io.printed).toEqual(['', 'Data issues:', '  - 1 rows have negative revenue (examples included)']);
    });

    it('should fall back to the reason when there are no issue lines', async () => {
      const service = new FakeReasoningService();
      const { conversation, connection, io, guard } = createConversation(service, []);
      service.turns = [
        () => {
          guard.halt('Data file not found at /data/missing.csv');
          return [result()];
        },
      ];

      await connection.connect();
      await conversation.runTurn('total?');

      expect(io.printed).toEqual(['', 'Data issues:', '  - Data file not found at /data/missing.csv']);
    });

    it('should start every turn with a clear gate', async () => {
      const service = new FakeReasoningService();
      const { conversation, connection, io, guard } = createConversation(service, []);
      guard.halt('left over from an earlier turn');

      await connection.connect();
      await conversation.runTurn('total?');

      expect(guard.currentTurn).toBe(1);
      expect(io.printed).toEqual(['']);
    });
  });
});
