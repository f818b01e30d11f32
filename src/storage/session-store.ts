/**
 * Session Store
 *
 * Keeps the reasoning-service session id across process restarts:
 * - `session_id.txt` holds the latest id (one line, replaced atomically)
 * - `history/session_ids.txt` is an append-only `<ISO-UTC>\t<id>` log
 *
 * Nothing here throws into the conversation. Failures are logged and the
 * store degrades to "start fresh".
 */

import path from 'path';
import type { Logger } from '../core/types.js';
import { PersistError } from '../core/errors.js';
import { errorMeta } from '../logging/logger.js';
import {
  appendLine,
  ensureDir,
  nodeFileOps,
  readLastLine,
  removeIfPresent,
  writeAtomic,
  type FileOps,
} from './atomic-file.js';

export const DEFAULT_SESSION_ID_PATH = 'state/interactive/session_id.txt';
export const DEFAULT_SESSION_HISTORY_DIR = 'state/interactive/history';
export const HISTORY_FILE_NAME = 'session_ids.txt';

export interface SessionStoreOptions {
  sessionIdPath?: string;
  historyDir?: string;
  logger: Logger;
  fileOps?: FileOps;
  clock?: () => Date;
}

export class SessionStore {
  readonly sessionIdPath: string;
  readonly historyDir: string;
  readonly historyPath: string;

  private readonly logger: Logger;
  private readonly ops: FileOps;
  private readonly clock: () => Date;
  private current: string | null = null;

  constructor(options: SessionStoreOptions) {
    this.sessionIdPath = options.sessionIdPath ?? DEFAULT_SESSION_ID_PATH;
    this.historyDir = options.historyDir ?? DEFAULT_SESSION_HISTORY_DIR;
    this.historyPath = path.join(this.historyDir, HISTORY_FILE_NAME);
    this.logger = options.logger;
    this.ops = options.fileOps ?? nodeFileOps;
    this.clock = options.clock ?? (() => new Date());

    this.ensureDirectories();
  }

  /** Session id held in memory for the running process. */
  get currentId(): string | null {
    return this.current;
  }

  /**
   * Id to resume on the next connect, or null to start a fresh session.
   */
  resolveResumeId(): string | null {
    try {
      if (!this.ops.existsSync(this.sessionIdPath)) {
        this.logger.info('session_resume_none', { path: this.sessionIdPath });
        return null;
      }
      const id = this.ops.readFileSync(this.sessionIdPath, 'utf8').trim();
      if (!id) {
        this.logger.info('session_resume_none', { path: this.sessionIdPath, reason: 'empty' });
        return null;
      }
      this.logger.info('session_resume', { session_id: id });
      return id;
    } catch (error) {
      this.logger.warn('session_id_read_failed', {
        path: this.sessionIdPath,
        error: errorMeta(new PersistError(this.sessionIdPath, 'read', error)),
      });
      return null;
    }
  }

  /**
   * Archive and persist an id reported by the service. No-op when it matches
   * the id already held in memory.
   */
  recordNewSession(observedId: string): void {
    const id = observedId.trim();
    if (!id || id === this.current) {
      return;
    }

    this.ensureDirectories();
    this.appendHistory(id);
    this.writeLatest(id);

    this.current = id;
    this.logger.info('session_recorded', { session_id: id });
  }

  /**
   * Archive the latest id into history and remove it so the next connect
   * starts a fresh session. Clears the in-memory id.
   */
  reset(): void {
    try {
      if (this.ops.existsSync(this.sessionIdPath)) {
        const id = this.ops.readFileSync(this.sessionIdPath, 'utf8').trim();
        if (id) {
          this.ensureDirectories();
          this.appendHistory(id);
        }
        this.removeLatest();
      }
    } catch (error) {
      this.logger.warn('session_archive_failed', {
        path: this.sessionIdPath,
        error: errorMeta(error),
      });
    }

    this.current = null;
  }

  private appendHistory(id: string): void {
    let last: string | null = null;
    try {
      last = readLastLine(this.historyPath, this.ops);
    } catch (error) {
      this.logger.debug('session_history_tail_unreadable', { path: this.historyPath, error: errorMeta(error) });
    }

    if (last !== null && last.endsWith(`\t${id}`)) {
      this.logger.debug('session_history_duplicate', { session_id: id });
      return;
    }

    try {
      appendLine(this.historyPath, `${this.clock().toISOString()}\t${id}`, this.ops);
      this.logger.info('session_history_appended', { path: this.historyPath, session_id: id });
    } catch (error) {
      this.logger.warn('session_history_append_failed', { path: this.historyPath, error: errorMeta(error) });
    }
  }

  private writeLatest(id: string): void {
    try {
      const result = writeAtomic(this.sessionIdPath, id, this.ops);
      if (result.mode === 'fallback') {
        this.logger.warn('session_id_saved_non_atomic', {
          path: this.sessionIdPath,
          error: errorMeta(result.renameError),
        });
      }
    } catch (error) {
      this.logger.error('session_id_save_failed', { path: this.sessionIdPath, error: errorMeta(error) });
    }
  }

  private removeLatest(): void {
    const failure = removeIfPresent(this.sessionIdPath, this.ops);
    if (failure === null) {
      this.logger.info('session_id_removed', { path: this.sessionIdPath });
      return;
    }

    try {
      this.ops.writeFileSync(this.sessionIdPath, '', 'utf8');
      this.logger.info('session_id_cleared', { path: this.sessionIdPath, error: errorMeta(failure) });
    } catch (error) {
      this.logger.warn('session_id_clear_failed', { path: this.sessionIdPath, error: errorMeta(error) });
    }
  }

  private ensureDirectories(): void {
    try {
      ensureDir(path.dirname(this.sessionIdPath), this.ops);
      ensureDir(this.historyDir, this.ops);
    } catch (error) {
      this.logger.warn('session_dirs_unavailable', { error: errorMeta(error) });
    }
  }
}
