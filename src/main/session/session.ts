/**
 * Session aggregate.
 * Every piece of mutable session state lives here and is owned by exactly
 * one SessionCoordinator; handlers receive it explicitly.
 */
import { OverlayKind } from '@shared/overlay';
import type { NoteSettings } from '@shared/settings';
import type { SessionView } from '@shared/session';
import type { CountdownTimer } from '../services/countdown-timer';
import type { DeletionGate, PromptRotation } from '../services/deletion-gate';
import type { ModalCoordinator } from '../services/modal-coordinator';
import type { QuoteLibrary } from '../services/quote-library';
import type { RateLimiter } from '../services/rate-limiter';
import type { TabRegistry } from '../services/tab-registry';
import { formatCountdown } from '../services/time-spec';

export interface Session {
  readonly settings: NoteSettings;
  readonly tabs: TabRegistry;
  readonly modal: ModalCoordinator;
  readonly countdown: CountdownTimer;
  readonly quotes: QuoteLibrary;
  readonly quoteLimiter: RateLimiter;
  readonly prompts: PromptRotation;
  /** Open deletion ritual; only meaningful while its overlay is visible */
  gate: DeletionGate | null;
  /** Editor forbids deleting and moving backwards */
  strictMode: boolean;
  tabBarVisible: boolean;
  notification: string | null;
}

export const STATUS_SAVED = 'Saved';
export const STATUS_UNSAVED = 'Unsaved changes';

/**
 * Derive the render state. Timer visibility and the gate view are computed
 * here on every call, never stored.
 */
export function buildSessionView(session: Session): SessionView {
  const { tabs, modal, countdown, settings } = session;
  const active = tabs.active;
  const timer = countdown.snapshot;
  const gate = modal.isVisible(OverlayKind.DeletionGate) ? session.gate : null;

  const dirty = active?.dirty ?? false;

  return {
    tabs: tabs.views(),
    activeTabId: active?.id ?? '',
    overlay: modal.current,
    focus: modal.focus,
    highlight: modal.highlight,
    gate: gate !== null ? gate.toView() : null,
    countdown: {
      ...timer,
      phase: countdown.phase,
      display: formatCountdown(timer.remainingSeconds),
      visible: countdown.isVisible(modal.isVisible(OverlayKind.TimerMenu)),
      blinking: countdown.blinking,
    },
    strictMode: session.strictMode,
    tabBarVisible: session.tabBarVisible,
    unsaved: dirty,
    title: dirty ? `${settings.appTitle}*` : settings.appTitle,
    status: dirty ? STATUS_UNSAVED : STATUS_SAVED,
    notification: session.notification,
  };
}
