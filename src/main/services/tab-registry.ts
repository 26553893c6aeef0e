/**
 * Tab registry.
 * Owns the open note documents, their file bindings and dirty flags, and
 * which tab is active. There is always at least one tab.
 */
import type { DocumentFactory, TextDocument } from '@shared/document';
import type { SavedNoteTab, SessionSnapshot, TabView } from '@shared/session';
import { sessionError, SessionErrorKind, type SessionError } from '@shared/errors';
import { createLogger } from '../logger';
import { atomicWriteFileSync, fileStem, readFileSafe } from './file-io';

const logger = createLogger('tab-registry');

const TAB_ID_PATTERN = /^tab(\d+)$/;

export interface NoteTab {
  readonly id: string;
  readonly title: string;
  readonly filePath: string | null;
  readonly dirty: boolean;
  readonly document: TextDocument;
}

interface TabRecord {
  readonly id: string;
  title: string;
  filePath: string | null;
  dirty: boolean;
  readonly document: TextDocument;
  readonly unsubscribe: () => void;
}

export type OpenFileResult =
  | { readonly ok: true; readonly tab: NoteTab }
  | { readonly ok: false; readonly error: SessionError };

export type SaveDecision =
  /** No file bound yet, or a double press: ask for a (new) name */
  | { readonly kind: 'prompt-save-as'; readonly initialName: string }
  | { readonly kind: 'written'; readonly path: string }
  | { readonly kind: 'failed'; readonly error: SessionError };

export type SaveAsResult =
  | { readonly ok: true; readonly tab: NoteTab }
  | { readonly ok: false; readonly error: SessionError };

export interface CloseResult {
  readonly closedId: string;
  readonly activeId: string;
  /** Fresh tab created because the closed one was the last */
  readonly recreated: NoteTab | null;
}

export interface TabRegistryOptions {
  readonly createDocument: DocumentFactory;
  /** Two saves closer than this open the save-as menu */
  readonly doublePressMs: number;
  /** Called when a tab becomes dirty through an edit */
  readonly onDirty?: (tabId: string) => void;
  readonly now?: () => number;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** "Note HHMM-DDMM" from the creation time */
export function newTabTitle(at: Date): string {
  return `Note ${pad2(at.getHours())}${pad2(at.getMinutes())}-${pad2(at.getDate())}${pad2(at.getMonth() + 1)}`;
}

export class TabRegistry {
  private readonly tabs: TabRecord[] = [];
  private activeId = '';
  private counter = 0;
  private lastSaveAt = Number.NEGATIVE_INFINITY;
  private readonly createDocument: DocumentFactory;
  private readonly doublePressMs: number;
  private readonly onDirty: (tabId: string) => void;
  private readonly now: () => number;

  constructor(options: TabRegistryOptions) {
    this.createDocument = options.createDocument;
    this.doublePressMs = options.doublePressMs;
    this.onDirty = options.onDirty ?? (() => undefined);
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.tabs.length;
  }

  get ids(): readonly string[] {
    return this.tabs.map((t) => t.id);
  }

  get activeTabId(): string {
    return this.activeId;
  }

  /** Undefined only before restore() */
  get active(): NoteTab | undefined {
    return this.find(this.activeId) ?? this.tabs[0];
  }

  get(id: string): NoteTab | undefined {
    return this.find(id);
  }

  views(): TabView[] {
    return this.tabs.map(({ id, title, filePath, dirty }) => ({ id, title, filePath, dirty }));
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Replace all tabs with the snapshot's, or with `defaults` when there is
   * no snapshot. Note files are read from disk; missing ones start empty.
   */
  restore(snapshot: SessionSnapshot | null, defaults: readonly SavedNoteTab[]): void {
    for (const tab of this.tabs) tab.unsubscribe();
    this.tabs.length = 0;
    this.activeId = '';

    const source = snapshot?.tabs ?? defaults;
    for (const saved of source) {
      if (this.find(saved.id) !== undefined) continue;
      const text = saved.file !== null ? (readFileSafe(saved.file) ?? '') : '';
      this.insert(saved.id, saved.title, saved.file, text);
    }

    this.counter = this.tabs.reduce((max, tab) => {
      const match = TAB_ID_PATTERN.exec(tab.id);
      return match?.[1] !== undefined ? Math.max(max, Number(match[1])) : max;
    }, 0);

    const first = this.tabs[0];
    if (first === undefined) {
      this.newTab();
      return;
    }
    const wanted = snapshot?.active;
    this.activeId = wanted !== undefined && this.find(wanted) !== undefined ? wanted : first.id;
    logger.info(`Restored ${String(this.tabs.length)} tabs (active: ${this.activeId})`);
  }

  /** Create an empty, unbound tab and make it active. */
  newTab(): NoteTab {
    const tab = this.insert(this.nextId(), newTabTitle(new Date(this.now())), null, '');
    this.activeId = tab.id;
    return tab;
  }

  /**
   * Open a file in a new active tab titled by its base name.
   */
  openFile(filePath: string): OpenFileResult {
    const text = readFileSafe(filePath);
    if (text === null) {
      return {
        ok: false,
        error: sessionError(SessionErrorKind.NotFound, `File not found: ${filePath}`),
      };
    }
    const tab = this.insert(this.nextId(), fileStem(filePath), filePath, text);
    this.activeId = tab.id;
    logger.info(`Opened ${filePath} as ${tab.id}`);
    return { ok: true, tab };
  }

  /**
   * Remove a tab. The previous neighbour becomes active (index 0 when the
   * first tab closed); closing the last tab creates a fresh one.
   */
  close(id: string): CloseResult | null {
    const index = this.tabs.findIndex((t) => t.id === id);
    const closing = this.tabs[index];
    if (closing === undefined) return null;

    closing.unsubscribe();
    this.tabs.splice(index, 1);

    if (this.tabs.length === 0) {
      const recreated = this.newTab();
      return { closedId: id, activeId: recreated.id, recreated };
    }
    if (this.activeId === id) {
      const neighbour = this.tabs[index > 0 ? index - 1 : 0] ?? this.tabs[0];
      if (neighbour !== undefined) this.activeId = neighbour.id;
    }
    return { closedId: id, activeId: this.activeId, recreated: null };
  }

  activate(id: string): boolean {
    if (this.find(id) === undefined) return false;
    this.activeId = id;
    return true;
  }

  /** Activate the previous tab, wrapping to the last. */
  previous(): NoteTab | undefined {
    return this.step(-1);
  }

  /** Activate the next tab, wrapping to the first. */
  next(): NoteTab | undefined {
    return this.step(1);
  }

  // -------------------------------------------------------------------------
  // Saving
  // -------------------------------------------------------------------------

  /**
   * Write the tab to its file, or ask for a name when it has none or the
   * save was pressed twice within the double-press window.
   */
  save(id: string): SaveDecision {
    const now = this.now();
    const doublePress = now - this.lastSaveAt < this.doublePressMs;
    this.lastSaveAt = now;

    const tab = this.find(id);
    if (tab === undefined) {
      return {
        kind: 'failed',
        error: sessionError(SessionErrorKind.NotFound, `No tab ${id}`),
      };
    }
    if (tab.filePath === null || doublePress) {
      return {
        kind: 'prompt-save-as',
        initialName: tab.filePath !== null ? fileStem(tab.filePath) : '',
      };
    }

    const result = atomicWriteFileSync(tab.filePath, tab.document.getText());
    if (!result.ok) {
      return { kind: 'failed', error: result.error };
    }
    tab.dirty = false;
    return { kind: 'written', path: result.path };
  }

  /**
   * Write the tab to a new path and rebind it (path, title, dirty flag).
   */
  saveAs(id: string, filePath: string): SaveAsResult {
    const tab = this.find(id);
    if (tab === undefined) {
      return { ok: false, error: sessionError(SessionErrorKind.NotFound, `No tab ${id}`) };
    }
    const result = atomicWriteFileSync(filePath, tab.document.getText());
    if (!result.ok) {
      return { ok: false, error: result.error };
    }
    tab.filePath = filePath;
    tab.title = fileStem(filePath);
    tab.dirty = false;
    return { ok: true, tab };
  }

  /** Forget the tab's file binding (after its file was deleted). */
  detachFile(id: string): void {
    const tab = this.find(id);
    if (tab === undefined) return;
    tab.filePath = null;
    tab.dirty = false;
  }

  markDirty(id: string): void {
    const tab = this.find(id);
    if (tab === undefined || tab.dirty) return;
    tab.dirty = true;
    this.onDirty(id);
  }

  toSnapshot(): SessionSnapshot {
    return {
      active: this.activeId,
      tabs: this.tabs.map(({ id, title, filePath }) => ({ id, title, file: filePath })),
    };
  }

  dispose(): void {
    for (const tab of this.tabs) tab.unsubscribe();
  }

  // -------------------------------------------------------------------------

  private find(id: string): TabRecord | undefined {
    return this.tabs.find((t) => t.id === id);
  }

  private nextId(): string {
    do {
      this.counter += 1;
    } while (this.find(`tab${String(this.counter)}`) !== undefined);
    return `tab${String(this.counter)}`;
  }

  private insert(id: string, title: string, filePath: string | null, text: string): TabRecord {
    const document = this.createDocument(text);
    const unsubscribe = document.onDidChange(() => {
      this.markDirty(id);
    });
    const record: TabRecord = { id, title, filePath, dirty: false, document, unsubscribe };
    this.tabs.push(record);
    return record;
  }

  private step(delta: number): NoteTab | undefined {
    const count = this.tabs.length;
    const index = this.tabs.findIndex((t) => t.id === this.activeId);
    const target = this.tabs[(((index + delta) % count) + count) % count];
    if (target !== undefined) this.activeId = target.id;
    return this.active;
  }
}
