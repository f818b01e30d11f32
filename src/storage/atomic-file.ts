/**
 * File primitives for the state directory.
 *
 * Writers go through `FileOps` so callers (and tests) can substitute the
 * file system; the default is Node's `fs`.
 */

import fs from 'fs';
import path from 'path';
import { PersistError, describeCause } from '../core/errors.js';

export type FileOps = Pick<
  typeof fs,
  | 'openSync'
  | 'writeSync'
  | 'fsyncSync'
  | 'closeSync'
  | 'readSync'
  | 'fstatSync'
  | 'renameSync'
  | 'writeFileSync'
  | 'readFileSync'
  | 'unlinkSync'
  | 'existsSync'
  | 'mkdirSync'
>;

export const nodeFileOps: FileOps = fs;

export type AtomicWriteResult =
  | { mode: 'atomic' }
  | { mode: 'fallback'; renameError: PersistError };

/**
 * Write `text` to a temp file beside `target`, fsync it, then rename it over
 * `target`.
 *
 * A failure while producing the temp file leaves `target` untouched and
 * throws. A failed rename (e.g. EXDEV) falls back to writing `target`
 * directly; the caller gets `mode: 'fallback'` and decides how to report it.
 */
export function writeAtomic(target: string, text: string, ops: FileOps = nodeFileOps): AtomicWriteResult {
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

  let fd: number | null = null;
  try {
    fd = ops.openSync(tmp, 'w');
    ops.writeSync(fd, text, null, 'utf8');
    ops.fsyncSync(fd);
    ops.closeSync(fd);
    fd = null;
  } catch (error) {
    if (fd !== null) {
      closeQuietly(fd, ops);
    }
    removeIfPresent(tmp, ops);
    throw new PersistError(target, 'temp_write', error);
  }

  try {
    ops.renameSync(tmp, target);
    return { mode: 'atomic' };
  } catch (renameFailure) {
    const renameError = new PersistError(target, 'rename', renameFailure);
    try {
      ops.writeFileSync(target, text, 'utf8');
    } catch (writeFailure) {
      throw new PersistError(target, 'fallback_write', writeFailure);
    } finally {
      removeIfPresent(tmp, ops);
    }
    return { mode: 'fallback', renameError };
  }
}

/**
 * Append one line and flush it to disk before returning.
 */
export function appendLine(target: string, line: string, ops: FileOps = nodeFileOps): void {
  const data = line.endsWith('\n') ? line : `${line}\n`;
  let fd: number | null = null;
  try {
    fd = ops.openSync(target, 'a');
    ops.writeSync(fd, data, null, 'utf8');
    ops.fsyncSync(fd);
  } catch (error) {
    throw new PersistError(target, 'append', error);
  } finally {
    if (fd !== null) {
      closeQuietly(fd, ops);
    }
  }
}

/**
 * Return the last non-empty line of `target`, scanning backwards from the end
 * of the file in `chunkSize` pieces. Returns null for a missing or empty file.
 */
export function readLastLine(target: string, ops: FileOps = nodeFileOps, chunkSize = 4096): string | null {
  if (!ops.existsSync(target)) {
    return null;
  }

  const fd = ops.openSync(target, 'r');
  try {
    let position = ops.fstatSync(fd).size;
    let tail: Buffer = Buffer.alloc(0);

    while (position > 0) {
      const length = Math.min(chunkSize, position);
      position -= length;

      const chunk = Buffer.alloc(length);
      ops.readSync(fd, chunk, 0, length, position);
      tail = Buffer.concat([chunk, tail]);

      const content = trimTrailingNewlines(tail);
      const newline = content.lastIndexOf(0x0a);
      if (newline !== -1) {
        return content.subarray(newline + 1).toString('utf8').trim() || null;
      }
    }

    return trimTrailingNewlines(tail).toString('utf8').trim() || null;
  } finally {
    closeQuietly(fd, ops);
  }
}

/**
 * Remove a file, treating "already gone" as success.
 * Returns the failure for anything else.
 */
export function removeIfPresent(target: string, ops: FileOps = nodeFileOps): Error | null {
  try {
    ops.unlinkSync(target);
    return null;
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return null;
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}

export function ensureDir(dir: string, ops: FileOps = nodeFileOps): void {
  ops.mkdirSync(dir, { recursive: true });
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function trimTrailingNewlines(buffer: Buffer): Buffer {
  let end = buffer.length;
  while (end > 0 && (buffer[end - 1] === 0x0a || buffer[end - 1] === 0x0d)) {
    end--;
  }
  return buffer.subarray(0, end);
}

function closeQuietly(fd: number, ops: FileOps): void {
  try {
    ops.closeSync(fd);
  } catch (error) {
    process.stderr.write(`close(${fd}) failed: ${describeCause(error)}\n`);
  }
}
