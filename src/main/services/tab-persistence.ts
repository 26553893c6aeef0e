/**
 * Tab persistence service.
 * Saves/restores the list of open tabs to tabs_state.json:
 * { "active": "tab2", "tabs": [{ "id": "tab1", "title": "Note 1", "file": "data/notes1.txt" }] }
 */
import { join } from 'node:path';
import type { SavedNoteTab, SessionSnapshot } from '@shared/session';
import type { WriteResult } from '@shared/errors';
import { SessionSnapshotSchema } from '@shared/zod-schemas';
import { createLogger } from '../logger';
import { atomicWriteFileSync, readFileSafe } from './file-io';

const logger = createLogger('tab-persistence');

const TITLE_EXTENSION = '.txt';

/**
 * Parse snapshot JSON. Returns null for unparseable or invalid content.
 * Titles ending in ".txt" are shown without the extension; duplicate ids keep
 * their first occurrence.
 */
export function parseSessionSnapshot(content: string): SessionSnapshot | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  const result = SessionSnapshotSchema.safeParse(raw);
  if (!result.success) {
    logger.warn(`Invalid session snapshot: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
    return null;
  }

  const seen = new Set<string>();
  const tabs: SavedNoteTab[] = [];
  for (const entry of result.data.tabs) {
    if (seen.has(entry.id)) continue;
    seen.add(entry.id);
    const title = entry.title ?? entry.id;
    tabs.push({
      id: entry.id,
      title: title.endsWith(TITLE_EXTENSION) ? title.slice(0, -TITLE_EXTENSION.length) : title,
      file: entry.file ?? null,
    });
  }

  const first = tabs[0];
  if (first === undefined) return null;
  const active = result.data.active;
  return {
    active: active !== undefined && seen.has(active) ? active : first.id,
    tabs,
  };
}

export function serializeSessionSnapshot(snapshot: SessionSnapshot): string {
  return JSON.stringify({
    active: snapshot.active,
    tabs: snapshot.tabs.map((t) => ({ id: t.id, title: t.title, file: t.file })),
  });
}

/**
 * Load the session snapshot. Missing or corrupt files yield null.
 */
export function loadSessionSnapshot(dataDir: string, fileName: string): SessionSnapshot | null {
  const content = readFileSafe(join(dataDir, fileName));
  if (content === null) return null;
  const snapshot = parseSessionSnapshot(content);
  if (snapshot !== null) {
    logger.info(`Loaded ${String(snapshot.tabs.length)} saved tabs`);
  }
  return snapshot;
}

export function saveSessionSnapshot(
  dataDir: string,
  fileName: string,
  snapshot: SessionSnapshot,
): WriteResult {
  const result = atomicWriteFileSync(join(dataDir, fileName), serializeSessionSnapshot(snapshot));
  if (result.ok) {
    logger.info(`Saved ${String(snapshot.tabs.length)} tabs`);
  }
  return result;
}
