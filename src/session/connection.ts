/**
 * Connection Manager
 *
 * Owns the one live connection to the reasoning service and the state
 * machine around it:
 *
 *   disconnected -> connecting -> connected
 *                       |
 *                       +-> faulted -> disconnected
 *   connected -> interrupting -> connected
 *   connected -> disconnected
 *
 * Session options are rebuilt by the factory on every connect, so a resume
 * id written or removed since the last connect is always picked up.
 */

import type { Logger, SessionOptions } from '../core/types.js';
import { ConnectError, SendError, describeCause, toAgentError } from '../core/errors.js';
import { errorMeta } from '../logging/logger.js';

// =============================================================================
// PORTS
// =============================================================================

export interface ServiceConnection {
  /** Send one user turn and stream its messages up to the turn's result. */
  send(prompt: string): AsyncIterable<unknown>;
  interrupt(): Promise<void>;
  close(): Promise<void>;
}

export interface ReasoningService {
  connect(options: SessionOptions): Promise<ServiceConnection>;
}

// =============================================================================
// STATE MACHINE
// =============================================================================

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'interrupting' | 'faulted';

export interface Transition {
  from: ConnectionState;
  to: ConnectionState;
  reason?: string;
}

export type TransitionListener = (transition: Transition) => void;

export type InterruptOutcome = 'interrupted' | 'failed' | 'not-connected';

export class ConnectionManager {
  private current: ConnectionState = 'disconnected';
  private connection: ServiceConnection | null = null;
  private listeners: TransitionListener[] = [];

  constructor(
    private readonly service: ReasoningService,
    private readonly buildOptions: () => SessionOptions,
    private readonly logger: Logger
  ) {}

  get state(): ConnectionState {
    return this.current;
  }

  get isConnected(): boolean {
    return this.connection !== null && (this.current === 'connected' || this.current === 'interrupting');
  }

  /**
   * Subscribe to state changes. Returns the unsubscribe function.
   */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  /**
   * Connect unless already connected.
   *
   * @throws ConnectError after settling back to `disconnected`
   */
  async connect(): Promise<ServiceConnection> {
    if (this.connection !== null && this.isConnected) {
      return this.connection;
    }
    if (this.current === 'connecting') {
      throw new ConnectError('a connection attempt is already in progress');
    }

    this.transition('connecting');
    let connection: ServiceConnection;
    try {
      const options = this.buildOptions();
      this.logger.info('connect_start', { resume: options.resume ?? null, max_turns: options.maxTurns });
      connection = await this.service.connect(options);
    } catch (error) {
      const failure = toAgentError('connect', error);
      this.logger.error('connect_failed', { error: errorMeta(failure) });
      this.transition('faulted', failure.message);
      this.transition('disconnected', 'connect failed');
      throw failure;
    }

    this.connection = connection;
    this.transition('connected');
    return connection;
  }

  /**
   * Stream one turn. Any failure drops the connection before the error
   * reaches the caller, so the next turn reconnects.
   *
   * @throws SendError
   */
  async *send(prompt: string): AsyncGenerator<unknown, void, undefined> {
    const connection = this.connection;
    if (connection === null || !this.isConnected) {
      throw new SendError('send', 'not connected');
    }

    let received = 0;
    try {
      for await (const message of connection.send(prompt)) {
        received++;
        yield message;
      }
    } catch (error) {
      const failure = error instanceof SendError
        ? error
        : new SendError(received === 0 ? 'send' : 'receive', describeCause(error), error);
      this.logger.error('turn_failed', { received, error: errorMeta(failure) });
      await this.disconnect('turn failed');
      throw failure;
    }
    this.logger.debug('turn_complete', { received });
  }

  async interrupt(): Promise<InterruptOutcome> {
    const connection = this.connection;
    if (connection === null || this.current !== 'connected') {
      return 'not-connected';
    }

    this.transition('interrupting');
    try {
      await connection.interrupt();
      this.logger.info('interrupt_sent');
      return 'interrupted';
    } catch (error) {
      this.logger.warn('interrupt_failed', { error: errorMeta(error) });
      return 'failed';
    } finally {
      this.settleInterrupt();
    }
  }

  private settleInterrupt(): void {
    if (this.current === 'interrupting') {
      this.transition('connected');
    }
  }

  /**
   * Close the connection if there is one. Safe to call repeatedly; close
   * failures are logged and dropped.
   */
  async disconnect(reason = 'requested'): Promise<void> {
    const connection = this.connection;
    this.connection = null;

    if (connection !== null) {
      try {
        await connection.close();
        this.logger.info('disconnected', { reason });
      } catch (error) {
        this.logger.warn('disconnect_failed', { reason, error: errorMeta(error) });
      }
    }

    if (this.current !== 'disconnected') {
      this.transition('disconnected', reason);
    }
  }

  private transition(to: ConnectionState, reason?: string): void {
    const from = this.current;
    this.current = to;
    this.logger.debug('connection_transition', { from, to, reason });
    for (const listener of this.listeners) {
      listener({ from, to, reason });
    }
  }
}
