/**
 * Synchronous file I/O for notes, the quote corpus and the session snapshot.
 * Session handlers run to completion, so every helper here blocks.
 */
import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import type { FileEntry } from '@shared/overlay';
import { describeError, sessionError, SessionErrorKind, type WriteResult } from '@shared/errors';
import { createLogger } from '../logger';

const logger = createLogger('file-io');

/**
 * Write content to a file atomically via a temporary file.
 * Creates parent directories if needed. Never throws.
 */
export function atomicWriteFileSync(filePath: string, content: string): WriteResult {
  const tmpPath = `${filePath}.tmp.${String(Date.now())}`;
  try {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(tmpPath, content, 'utf-8');
    renameSync(tmpPath, filePath);
    return { ok: true, path: filePath };
  } catch (err) {
    const message = describeError(err);
    logger.error(`Failed to write ${filePath}`, err instanceof Error ? err : undefined);
    if (existsSync(tmpPath)) {
      try {
        unlinkSync(tmpPath);
      } catch (cleanupErr) {
        logger.warn(`Failed to remove ${tmpPath}: ${describeError(cleanupErr)}`);
      }
    }
    return { ok: false, error: sessionError(SessionErrorKind.IoFailure, message) };
  }
}

/**
 * Read a UTF-8 file. Returns null if the file doesn't exist or can't be read.
 */
export function readFileSafe(filePath: string): string | null {
  if (!existsSync(filePath)) {
    return null;
  }
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    logger.warn(`Failed to read ${filePath}: ${describeError(err)}`);
    return null;
  }
}

/**
 * Modification time in milliseconds, or null if the file is missing.
 */
export function fileModifiedAt(filePath: string): number | null {
  try {
    return statSync(filePath).mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Delete a file. Failures are logged and reported as false.
 */
export function deleteFileSafe(filePath: string): boolean {
  if (!existsSync(filePath)) return false;
  try {
    unlinkSync(filePath);
    return true;
  } catch (err) {
    logger.warn(`Failed to delete ${filePath}: ${describeError(err)}`);
    return false;
  }
}

export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Base name without extension ("data/draft.txt" -> "draft").
 */
export function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/**
 * List files with the given extension in a directory, sorted by name.
 */
export function listNoteFiles(dirPath: string, extension: string): FileEntry[] {
  let names: string[];
  try {
    names = readdirSync(dirPath);
  } catch {
    return [];
  }
  return names
    .filter((name) => extname(name) === extension)
    .sort()
    .map((name) => ({ label: fileStem(name), path: join(dirPath, name) }));
}
