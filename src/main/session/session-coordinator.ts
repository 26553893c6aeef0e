/**
 * Session coordinator.
 *
 * Top-level state machine for a note session. The host shell sends
 * SessionCommands to dispatch(); each command runs to completion against the
 * owned Session aggregate and yields the SessionEffects the host must render.
 * The derived SessionView is published to a zustand store after every
 * command, countdown tick and document edit.
 */
import { EventEmitter } from 'node:events';
import { extname, join } from 'node:path';
import type { SessionCommand, SessionEffect } from '@shared/command';
import type { DocumentFactory, TextDocument } from '@shared/document';
import { describeError, sessionError, SessionErrorKind, type SessionError } from '@shared/errors';
import { OverlayKind, QuoteMode, type Overlay } from '@shared/overlay';
import type { NoteSettings } from '@shared/settings';
import type { SessionView } from '@shared/session';
import { quotesPath } from '../config';
import { normalizeKey, resolveShortcut } from '../keymap';
import { createLogger } from '../logger';
import { CountdownTimer, type TickOutcome } from '../services/countdown-timer';
import { DeletionGate, PromptRotation } from '../services/deletion-gate';
import { deleteFileSafe, listNoteFiles } from '../services/file-io';
import { createMemoryDocument } from '../services/memory-document';
import { ModalCoordinator, type OverlayKeyAction } from '../services/modal-coordinator';
import { createFileCorpusLoader, QuoteLibrary, type CorpusLoader } from '../services/quote-library';
import { RateLimiter } from '../services/rate-limiter';
import { loadSessionSnapshot, saveSessionSnapshot } from '../services/tab-persistence';
import { TabRegistry, type NoteTab } from '../services/tab-registry';
import { parseTimeSpec } from '../services/time-spec';
import { buildSessionView, type Session } from './session';
import { createSessionStore, type SessionStore } from './session-store';

const logger = createLogger('session');

const EFFECTS_EVENT = 'effects';

/** Editor keys blocked while strict mode is on */
const STRICT_BLOCKED_KEYS: ReadonlySet<string> = new Set(['backspace', 'delete', 'left']);

export const MESSAGES = {
  timerStarted: 'Timer started',
  timerStopped: 'Timer stopped',
  timeUp: "Time's up!",
  notesSaved: 'Notes saved',
  savedAs: (name: string) => `Saved as ${name}`,
  saveFailed: (reason: string) => `Could not save: ${reason}`,
  snapshotFailed: 'Could not store the open tabs',
  fileNotFound: 'File not found',
  tabClosed: 'Tab closed',
  nothingToDelete: 'Nothing to delete',
  deleted: 'The words fall. The emptiness wins.',
  strictMode: (on: boolean) => `Strict mode ${on ? 'ON' : 'OFF'}`,
  noQuotes: 'No quotes found',
  quotesDepleted: 'The quote file needs new quotes',
  quotesExhausted: 'Quotes exhausted',
  restartPrompt: 'All quotes have been shown. Start over?',
  rateLimit:
    'This is your third request for a quote in under fifteen minutes.\n' +
    'Even the strongest words lose their power when used as an escape.\n' +
    'Try a breathing exercise instead, and notice how you feel.',
  unexpected: (reason: string) => `Something went wrong: ${reason}`,
} as const;

export interface SessionCoordinatorOptions {
  readonly settings: NoteSettings;
  /** Editor model factory; defaults to in-memory documents */
  readonly createDocument?: DocumentFactory;
  /** Quote source; defaults to the configured quotes file */
  readonly loadCorpus?: CorpusLoader;
  readonly random?: () => number;
  readonly now?: () => number;
}

type EffectListener = (effects: readonly SessionEffect[]) => void;

export class SessionCoordinator {
  readonly store: SessionStore;
  private readonly session: Session;
  private readonly emitter = new EventEmitter();
  private readonly now: () => number;

  constructor(options: SessionCoordinatorOptions) {
    const { settings } = options;
    this.now = options.now ?? (() => Date.now());

    const tabs = new TabRegistry({
      createDocument: options.createDocument ?? createMemoryDocument,
      doublePressMs: settings.doublePressMs,
      onDirty: () => {
        this.publish();
      },
      now: this.now,
    });
    this.session = {
      settings,
      tabs,
      modal: new ModalCoordinator(() => tabs.activeTabId),
      countdown: new CountdownTimer({
        onTick: (outcome) => {
          this.handleTick(outcome);
        },
        stopWindowMs: settings.doublePressMs,
        now: this.now,
      }),
      quotes: new QuoteLibrary(
        options.loadCorpus ?? createFileCorpusLoader(quotesPath(settings)),
        options.random,
      ),
      quoteLimiter: new RateLimiter(settings.quoteRateWindowMs, settings.quoteRateLimit),
      prompts: new PromptRotation(settings.deletionPrompts),
      gate: null,
      strictMode: false,
      tabBarVisible: true,
      notification: null,
    };

    tabs.restore(
      loadSessionSnapshot(settings.dataDir, settings.snapshotFile),
      settings.defaultNotes.map((note) => ({
        id: note.id,
        title: note.title,
        file: join(settings.dataDir, note.file),
      })),
    );
    this.store = createSessionStore(buildSessionView(this.session));
  }

  get view(): SessionView {
    return this.store.getState();
  }

  /** Editor model of a tab, for binding the host's editor widget */
  documentOf(tabId: string): TextDocument | undefined {
    return this.session.tabs.get(tabId)?.document;
  }

  /**
   * Subscribe to effects from commands and from autonomous timer ticks.
   */
  onEffects(listener: EffectListener): () => void {
    this.emitter.on(EFFECTS_EVENT, listener);
    return () => {
      this.emitter.off(EFFECTS_EVENT, listener);
    };
  }

  dispatch(command: SessionCommand): readonly SessionEffect[] {
    const effects: SessionEffect[] = [];
    logger.debug(`Dispatch ${command.type}`);
    try {
      this.handle(command, effects);
    } catch (err) {
      logger.error(`Command ${command.type} failed`, err instanceof Error ? err : undefined);
      this.notify(effects, MESSAGES.unexpected(describeError(err)));
    }
    this.flush(effects);
    return effects;
  }

  dispose(): void {
    this.session.countdown.dispose();
    this.session.tabs.dispose();
    this.emitter.removeAllListeners();
  }

  // -------------------------------------------------------------------------
  // Routing
  // -------------------------------------------------------------------------

  private handle(command: SessionCommand, out: SessionEffect[]): void {
    switch (command.type) {
      case 'toggle-timer-menu':
        this.toggleTimerMenu(out);
        return;
      case 'reset-or-stop-timer':
        this.resetOrStopTimer(out);
        return;
      case 'save':
        this.save(out);
        return;
      case 'toggle-strict-mode':
        this.session.strictMode = !this.session.strictMode;
        this.notify(out, MESSAGES.strictMode(this.session.strictMode));
        return;
      case 'new-tab':
        this.newTab(out);
        return;
      case 'open-file':
        this.showOpenFileMenu(out);
        return;
      case 'close-tab':
        this.closeTab(this.session.tabs.activeTabId, out, true);
        return;
      case 'toggle-tab-bar':
        this.session.tabBarVisible = !this.session.tabBarVisible;
        return;
      case 'prompt-delete':
        this.promptDelete(out);
        return;
      case 'previous-tab':
        this.activatedTab(this.session.tabs.previous(), out);
        return;
      case 'next-tab':
        this.activatedTab(this.session.tabs.next(), out);
        return;
      case 'show-quote':
        this.showQuote(out);
        return;
      case 'activate-tab':
        if (this.session.tabs.activate(command.tabId)) this.activated(command.tabId, out);
        return;
      case 'close-overlay':
        this.hideOverlay(out);
        return;
      case 'select-timer-preset':
        if (this.session.modal.isVisible(OverlayKind.TimerMenu)) {
          this.setTime(command.seconds, out);
        }
        return;
      case 'submit-custom-time':
        this.submitCustomTime(command.text, out);
        return;
      case 'select-file':
        this.openFile(command.path, out);
        return;
      case 'submit-save-as':
        this.saveAs(command.name, out);
        return;
      case 'gate-accept':
        this.gateAccept(out);
        return;
      case 'gate-cancel':
        if (this.visibleGate() !== null) this.hideOverlay(out);
        return;
      case 'gate-input':
        this.visibleGate()?.setLine(command.line, command.value);
        return;
      case 'gate-confirm':
        this.gateConfirm(out);
        return;
      case 'quote-dismiss':
        if (this.session.modal.isVisible(OverlayKind.Quote)) this.hideOverlay(out);
        return;
      case 'quote-restart':
        this.quoteRestart(command.restart, out);
        return;
      case 'quote-force':
        this.quoteForce(out);
        return;
      case 'key':
        this.key(command.key, out);
        return;
    }
  }

  private key(rawKey: string, out: SessionEffect[]): void {
    const key = normalizeKey(rawKey);
    const { modal } = this.session;
    if (modal.current !== null) {
      const action = modal.handleKey(key);
      if (action.kind !== 'ignored') {
        this.overlayKeyAction(action, out);
        return;
      }
    }
    const shortcut = resolveShortcut(key);
    if (shortcut !== null) {
      this.handle(shortcut, out);
      return;
    }
    if (modal.current === null && this.session.strictMode && STRICT_BLOCKED_KEYS.has(key)) {
      out.push({ type: 'key-suppressed', key });
    }
  }

  private overlayKeyAction(action: OverlayKeyAction, out: SessionEffect[]): void {
    const overlay = this.session.modal.current;
    if (action.kind === 'close') {
      this.hideOverlay(out);
      return;
    }
    if (action.kind === 'moved') {
      out.push({ type: 'focus', target: this.session.modal.focus });
      return;
    }
    if (action.kind === 'ignored') return;

    switch (action.control) {
      case 'presets':
        if (overlay?.kind === OverlayKind.TimerMenu) {
          const seconds = overlay.presets[action.highlight];
          if (seconds !== undefined) this.setTime(seconds, out);
        }
        return;
      case 'files':
        if (overlay?.kind === OverlayKind.OpenFile) {
          const file = overlay.files[action.highlight];
          if (file !== undefined) this.openFile(file.path, out);
        }
        return;
      case 'accept':
        this.gateAccept(out);
        return;
      case 'cancel':
        this.hideOverlay(out);
        return;
      case 'submit':
        this.gateConfirm(out);
        return;
      case 'ok':
        this.hideOverlay(out);
        return;
      case 'yes':
      case 'no':
        this.quoteRestart(action.control === 'yes', out);
        return;
      case 'force':
        this.quoteForce(out);
        return;
      case 'custom':
      case 'name':
      case 'line1':
      case 'line2':
      case 'line3':
        // Text inputs submit through their own commands.
        return;
    }
  }

  // -------------------------------------------------------------------------
  // Overlays
  // -------------------------------------------------------------------------

  private showOverlay(overlay: Overlay, out: SessionEffect[]): void {
    const previous = this.session.modal.show(overlay);
    if (previous !== null) {
      this.discardOverlayState(previous);
      out.push({ type: 'overlay-hidden', kind: previous.kind });
    }
    out.push({ type: 'overlay-shown', overlay });
    out.push({ type: 'focus', target: this.session.modal.focus });
  }

  private hideOverlay(out: SessionEffect[]): void {
    const previous = this.session.modal.hide();
    if (previous === null) return;
    this.discardOverlayState(previous);
    out.push({ type: 'overlay-hidden', kind: previous.kind });
    out.push({ type: 'focus', target: this.session.modal.focus });
  }

  private discardOverlayState(overlay: Overlay): void {
    if (overlay.kind === OverlayKind.DeletionGate) {
      this.session.gate = null;
    }
  }

  // -------------------------------------------------------------------------
  // Countdown
  // -------------------------------------------------------------------------

  private toggleTimerMenu(out: SessionEffect[]): void {
    if (this.session.modal.isVisible(OverlayKind.TimerMenu)) {
      this.hideOverlay(out);
      return;
    }
    this.showOverlay({ kind: OverlayKind.TimerMenu, presets: this.session.settings.timerPresets }, out);
  }

  private setTime(seconds: number, out: SessionEffect[]): void {
    if (this.session.countdown.start(seconds)) {
      this.notify(out, MESSAGES.timerStarted);
    }
    if (this.session.modal.isVisible(OverlayKind.TimerMenu)) {
      this.hideOverlay(out);
    }
  }

  private submitCustomTime(text: string, out: SessionEffect[]): void {
    if (!this.session.modal.isVisible(OverlayKind.TimerMenu)) return;
    const result = parseTimeSpec(text, this.session.settings.maxTimerSeconds);
    if (!result.ok) {
      out.push({ type: 'bell' });
      out.push({ type: 'error', error: result.error });
      return;
    }
    this.setTime(result.seconds, out);
  }

  private resetOrStopTimer(out: SessionEffect[]): void {
    const outcome = this.session.countdown.resetOrStop();
    if (outcome.kind === 'stopped') {
      this.notify(out, MESSAGES.timerStopped);
    } else if (outcome.kind === 'restarted') {
      this.notify(out, MESSAGES.timerStarted);
    }
  }

  private handleTick(outcome: TickOutcome): void {
    const effects: SessionEffect[] = [];
    if (outcome.kind === 'ticking') {
      effects.push({ type: 'timer-tick', remainingSeconds: outcome.remainingSeconds });
    } else if (outcome.kind === 'expired') {
      effects.push({ type: 'timer-tick', remainingSeconds: 0 });
      effects.push({ type: 'timer-expired' });
      this.notify(effects, MESSAGES.timeUp);
    }
    this.flush(effects);
  }

  // -------------------------------------------------------------------------
  // Tabs and files
  // -------------------------------------------------------------------------

  private activated(tabId: string, out: SessionEffect[]): void {
    out.push({ type: 'tab-activated', tabId });
    if (this.session.modal.current === null) {
      out.push({ type: 'focus', target: this.session.modal.focus });
    }
  }

  private activatedTab(tab: NoteTab | undefined, out: SessionEffect[]): void {
    if (tab !== undefined) this.activated(tab.id, out);
  }

  private newTab(out: SessionEffect[]): void {
    const tab = this.session.tabs.newTab();
    out.push({ type: 'tab-opened', tabId: tab.id });
    this.activated(tab.id, out);
    this.persistTabs(out);
  }

  private showOpenFileMenu(out: SessionEffect[]): void {
    const { modal, settings } = this.session;
    if (modal.isVisible(OverlayKind.OpenFile)) return;
    const files = listNoteFiles(settings.dataDir, settings.noteExtension);
    this.showOverlay({ kind: OverlayKind.OpenFile, files }, out);
  }

  private openFile(path: string, out: SessionEffect[]): void {
    if (!this.session.modal.isVisible(OverlayKind.OpenFile)) return;
    const result = this.session.tabs.openFile(path);
    this.hideOverlay(out);
    if (!result.ok) {
      this.fail(out, result.error, MESSAGES.fileNotFound);
      return;
    }
    out.push({ type: 'tab-opened', tabId: result.tab.id });
    out.push({ type: 'tab-activated', tabId: result.tab.id });
    this.persistTabs(out);
  }

  private closeTab(tabId: string, out: SessionEffect[], announce: boolean): void {
    const { tabs, modal } = this.session;
    if (this.session.gate?.targetTabId === tabId && modal.isVisible(OverlayKind.DeletionGate)) {
      this.hideOverlay(out);
    }
    const result = tabs.close(tabId);
    if (result === null) return;
    out.push({ type: 'tab-closed', tabId: result.closedId });
    if (result.recreated !== null) {
      out.push({ type: 'tab-opened', tabId: result.recreated.id });
    }
    this.activated(result.activeId, out);
    if (announce) this.notify(out, MESSAGES.tabClosed);
    this.persistTabs(out);
  }

  private save(out: SessionEffect[]): void {
    const { tabs, modal } = this.session;
    const decision = tabs.save(tabs.activeTabId);
    switch (decision.kind) {
      case 'prompt-save-as':
        if (!modal.isVisible(OverlayKind.SaveAs)) {
          this.showOverlay({ kind: OverlayKind.SaveAs, initialName: decision.initialName }, out);
        }
        return;
      case 'written':
        out.push({ type: 'file-written', path: decision.path });
        this.notify(out, MESSAGES.notesSaved);
        return;
      case 'failed':
        this.fail(out, decision.error, MESSAGES.saveFailed(decision.error.message));
        return;
    }
  }

  private saveAs(name: string, out: SessionEffect[]): void {
    const { tabs, modal, settings } = this.session;
    if (!modal.isVisible(OverlayKind.SaveAs)) return;
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      out.push({ type: 'bell' });
      return;
    }
    const fileName = extname(trimmed) === '' ? `${trimmed}${settings.noteExtension}` : trimmed;
    const result = tabs.saveAs(tabs.activeTabId, join(settings.dataDir, fileName));
    if (!result.ok) {
      this.fail(out, result.error, MESSAGES.saveFailed(result.error.message));
      return;
    }
    const { filePath, title } = result.tab;
    if (filePath !== null) out.push({ type: 'file-written', path: filePath });
    this.hideOverlay(out);
    this.notify(out, MESSAGES.savedAs(title));
    this.persistTabs(out);
  }

  private persistTabs(out: SessionEffect[]): void {
    const { settings, tabs } = this.session;
    const result = saveSessionSnapshot(settings.dataDir, settings.snapshotFile, tabs.toSnapshot());
    if (!result.ok) {
      this.fail(out, result.error, MESSAGES.snapshotFailed);
    }
  }

  // -------------------------------------------------------------------------
  // Deletion gate
  // -------------------------------------------------------------------------

  private visibleGate(): DeletionGate | null {
    return this.session.modal.isVisible(OverlayKind.DeletionGate) ? this.session.gate : null;
  }

  private promptDelete(out: SessionEffect[]): void {
    const { tabs, settings } = this.session;
    const tab = tabs.active;
    if (tab === undefined || tab.filePath === null) {
      this.notify(out, MESSAGES.nothingToDelete);
      return;
    }
    this.showOverlay({ kind: OverlayKind.DeletionGate, targetTabId: tab.id }, out);
    this.session.gate = new DeletionGate(tab.id, this.session.prompts, settings.haikuBounds);
  }

  private gateAccept(out: SessionEffect[]): void {
    const gate = this.visibleGate();
    if (gate === null || !gate.accept()) return;
    this.session.modal.focusControl('line1');
    out.push({ type: 'focus', target: this.session.modal.focus });
  }

  private gateConfirm(out: SessionEffect[]): void {
    const gate = this.visibleGate();
    if (gate === null) return;
    const result = gate.confirm();
    // Blocked confirmations stay silent; the control is simply disabled.
    if (!result.ok) return;

    const { tabs } = this.session;
    const tabId = result.targetTabId;
    const filePath = tabs.get(tabId)?.filePath ?? null;
    if (filePath !== null && deleteFileSafe(filePath)) {
      out.push({ type: 'file-deleted', path: filePath });
      logger.info(`Deleted ${filePath}`);
    }
    tabs.detachFile(tabId);
    this.hideOverlay(out);
    this.notify(out, MESSAGES.deleted);
    this.closeTab(tabId, out, false);
  }

  // -------------------------------------------------------------------------
  // Quotes
  // -------------------------------------------------------------------------

  private visibleQuoteMode(): QuoteMode | null {
    const overlay = this.session.modal.current;
    return overlay?.kind === OverlayKind.Quote ? overlay.mode : null;
  }

  private showQuote(out: SessionEffect[]): void {
    if (!this.session.quoteLimiter.tryAcquire(this.now())) {
      this.showOverlay(
        { kind: OverlayKind.Quote, mode: QuoteMode.RateLimit, text: MESSAGES.rateLimit },
        out,
      );
      out.push({
        type: 'error',
        error: sessionError(SessionErrorKind.RateLimited, 'Too many quote requests'),
      });
      return;
    }
    this.deliverQuote(out);
  }

  /** Quote logic without consulting the rate limiter. */
  private deliverQuote(out: SessionEffect[]): void {
    const pick = this.session.quotes.next();
    switch (pick.kind) {
      case 'quote':
        this.showOverlay({ kind: OverlayKind.Quote, mode: QuoteMode.Quote, text: pick.text }, out);
        return;
      case 'restart-prompt':
        this.showOverlay(
          { kind: OverlayKind.Quote, mode: QuoteMode.RestartPrompt, text: MESSAGES.restartPrompt },
          out,
        );
        return;
      case 'exhausted':
        this.fail(
          out,
          sessionError(SessionErrorKind.Exhausted, 'All quotes shown'),
          MESSAGES.quotesDepleted,
        );
        return;
      case 'empty':
        this.notify(out, MESSAGES.noQuotes);
        return;
    }
  }

  private quoteRestart(restart: boolean, out: SessionEffect[]): void {
    if (this.visibleQuoteMode() !== QuoteMode.RestartPrompt) return;
    this.hideOverlay(out);
    if (restart) {
      this.session.quotes.restart();
      this.deliverQuote(out);
      return;
    }
    this.session.quotes.decline();
    this.notify(out, MESSAGES.quotesExhausted);
  }

  private quoteForce(out: SessionEffect[]): void {
    if (this.visibleQuoteMode() !== QuoteMode.RateLimit) return;
    this.session.quoteLimiter.record(this.now());
    this.hideOverlay(out);
    this.deliverQuote(out);
  }

  // -------------------------------------------------------------------------
  // Output
  // -------------------------------------------------------------------------

  private notify(out: SessionEffect[], message: string): void {
    this.session.notification = message;
    out.push({ type: 'notify', message });
  }

  private fail(out: SessionEffect[], error: SessionError, message: string): void {
    out.push({ type: 'error', error });
    this.notify(out, message);
  }

  private publish(): void {
    this.store.setState(buildSessionView(this.session), true);
  }

  private flush(effects: readonly SessionEffect[]): void {
    this.publish();
    if (effects.length > 0) {
      this.emitter.emit(EFFECTS_EVENT, effects);
    }
  }
}
