/**
 * Command and effect types exchanged between the host shell and the session.
 * Commands flow in through SessionCoordinator.dispatch; effects flow out.
 */
import type { SessionError } from './errors';
import type { FocusTarget, Overlay, OverlayKind } from './overlay';

/** Index of a line in the deletion haiku */
export type GateLine = 1 | 2 | 3;

export type SessionCommand =
  | { readonly type: 'toggle-timer-menu' }
  | { readonly type: 'reset-or-stop-timer' }
  | { readonly type: 'save' }
  | { readonly type: 'toggle-strict-mode' }
  | { readonly type: 'new-tab' }
  | { readonly type: 'open-file' }
  | { readonly type: 'close-tab' }
  | { readonly type: 'toggle-tab-bar' }
  | { readonly type: 'prompt-delete' }
  | { readonly type: 'previous-tab' }
  | { readonly type: 'next-tab' }
  | { readonly type: 'show-quote' }
  | { readonly type: 'activate-tab'; readonly tabId: string }
  | { readonly type: 'close-overlay' }
  | { readonly type: 'select-timer-preset'; readonly seconds: number }
  | { readonly type: 'submit-custom-time'; readonly text: string }
  | { readonly type: 'select-file'; readonly path: string }
  | { readonly type: 'submit-save-as'; readonly name: string }
  | { readonly type: 'gate-accept' }
  | { readonly type: 'gate-cancel' }
  | { readonly type: 'gate-input'; readonly line: GateLine; readonly value: string }
  | { readonly type: 'gate-confirm' }
  | { readonly type: 'quote-dismiss' }
  | { readonly type: 'quote-restart'; readonly restart: boolean }
  | { readonly type: 'quote-force' }
  /** Raw key event, e.g. "enter", "down", "backspace", "ctrl+s" */
  | { readonly type: 'key'; readonly key: string };

/** Observable side effect the host renders */
export type SessionEffect =
  | { readonly type: 'notify'; readonly message: string }
  | { readonly type: 'bell' }
  | { readonly type: 'overlay-shown'; readonly overlay: Overlay }
  | { readonly type: 'overlay-hidden'; readonly kind: OverlayKind }
  | { readonly type: 'focus'; readonly target: FocusTarget }
  | { readonly type: 'file-written'; readonly path: string }
  | { readonly type: 'file-deleted'; readonly path: string }
  | { readonly type: 'tab-opened'; readonly tabId: string }
  | { readonly type: 'tab-closed'; readonly tabId: string }
  | { readonly type: 'tab-activated'; readonly tabId: string }
  | { readonly type: 'timer-tick'; readonly remainingSeconds: number }
  | { readonly type: 'timer-expired' }
  | { readonly type: 'key-suppressed'; readonly key: string }
  | { readonly type: 'error'; readonly error: SessionError };
