/**
 * Error Taxonomy
 *
 * Closed set of error kinds the agent handles explicitly:
 * - Retryable: the loop survives and tries again on the next query
 * - NonRetryable: configuration or input problems that need the operator
 * - Degradable: the conversation continues with reduced capability
 */

// =============================================================================
// BASE ERRORS
// =============================================================================

export type ErrorKind = 'connect' | 'send' | 'persist' | 'render' | 'config' | 'dataset';

export abstract class TabularAgentError extends Error {
  abstract readonly retryable: boolean;
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// RETRYABLE ERRORS - Loop survives, next query tries again
// =============================================================================

export abstract class RetryableError extends TabularAgentError {
  readonly retryable = true;
}

export class ConnectError extends RetryableError {
  readonly code = 'CONNECT_FAILED';
  readonly kind = 'connect';

  constructor(message: string, cause?: unknown) {
    super(`Failed to connect: ${message}`, undefined, { cause });
  }
}

export class SendError extends RetryableError {
  readonly code = 'SEND_FAILED';
  readonly kind = 'send';

  constructor(
    public readonly phase: 'send' | 'receive',
    message: string,
    cause?: unknown
  ) {
    super(`Error during ${phase === 'send' ? 'query' : 'response'}: ${message}`, { phase }, { cause });
  }
}

// =============================================================================
// NON-RETRYABLE ERRORS - Requires operator intervention
// =============================================================================

export abstract class NonRetryableError extends TabularAgentError {
  readonly retryable = false;
}

export class ConfigError extends NonRetryableError {
  readonly code = 'INVALID_CONFIG';
  readonly kind = 'config';

  constructor(message: string, public readonly validationErrors?: unknown[]) {
    super(message, { validationErrors });
  }
}

export type DatasetErrorCode = 'DATASET_NOT_FOUND' | 'DATASET_EMPTY' | 'DATASET_UNREADABLE';

export class DatasetError extends NonRetryableError {
  readonly kind = 'dataset';

  constructor(
    public readonly code: DatasetErrorCode,
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { path }, { cause });
  }
}

// =============================================================================
// DEGRADABLE ERRORS - Conversation continues with reduced capability
// =============================================================================

export abstract class DegradableError extends TabularAgentError {
  readonly retryable = false;
}

export class PersistError extends DegradableError {
  readonly code = 'PERSIST_FAILED';
  readonly kind = 'persist';

  constructor(
    public readonly target: string,
    public readonly step: 'temp_write' | 'rename' | 'fallback_write' | 'append' | 'read' | 'remove',
    cause?: unknown
  ) {
    super(`Could not persist ${target} (${step}): ${describeCause(cause)}`, { target, step }, { cause });
  }
}

export class RenderError extends DegradableError {
  readonly code = 'RENDER_FAILED';
  readonly kind = 'render';

  constructor(message: string, public readonly blockType?: string, cause?: unknown) {
    super(message, { blockType }, { cause });
  }
}

// =============================================================================
// OUTCOME BOUNDARY
// =============================================================================

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: TabularAgentError };

/**
 * Run an operation and capture a failure as a typed error of the given kind
 * instead of letting it escape the conversation loop.
 */
export async function attempt<T>(
  kind: Exclude<ErrorKind, 'dataset'>,
  operation: () => Promise<T>
): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error: toAgentError(kind, error) };
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

export function toAgentError(kind: Exclude<ErrorKind, 'dataset'>, error: unknown): TabularAgentError {
  if (error instanceof TabularAgentError) {
    return error;
  }

  const message = describeCause(error);
  switch (kind) {
    case 'connect':
      return new ConnectError(message, error);
    case 'send':
      return new SendError('receive', message, error);
    case 'persist':
      return new PersistError('state', 'fallback_write', error);
    case 'render':
      return new RenderError(message, undefined, error);
    case 'config':
      return new ConfigError(message);
  }
}
