/**
 * Modal coordinator.
 * Holds the single overlay slot, tracks which overlay control has focus,
 * and turns navigation keys into focus moves or control activations.
 */
import {
  OverlayKind,
  QuoteMode,
  type DeletionGateControl,
  type FocusTarget,
  type Overlay,
  type OverlayControl,
} from '@shared/overlay';

/** What a navigation key did inside the visible overlay */
export type OverlayKeyAction =
  | { readonly kind: 'close' }
  | { readonly kind: 'activate'; readonly control: OverlayControl; readonly highlight: number }
  | { readonly kind: 'moved' }
  | { readonly kind: 'ignored' };

const GATE_COMPOSE_ORDER: readonly DeletionGateControl[] = ['line1', 'line2', 'line3', 'submit'];

/** Control focused when an overlay appears */
export function defaultControl(overlay: Overlay): OverlayControl {
  switch (overlay.kind) {
    case OverlayKind.TimerMenu:
      return 'presets';
    case OverlayKind.OpenFile:
      return 'files';
    case OverlayKind.SaveAs:
      return 'name';
    case OverlayKind.DeletionGate:
      return 'accept';
    case OverlayKind.Quote:
      if (overlay.mode === QuoteMode.RestartPrompt) return 'yes';
      if (overlay.mode === QuoteMode.RateLimit) return 'force';
      return 'ok';
  }
}

export class ModalCoordinator {
  private slot: Overlay | null = null;
  private control: OverlayControl | null = null;
  private highlighted = 0;
  private readonly activeTabId: () => string;

  constructor(activeTabId: () => string) {
    this.activeTabId = activeTabId;
  }

  get current(): Overlay | null {
    return this.slot;
  }

  get highlight(): number {
    return this.highlighted;
  }

  get focus(): FocusTarget {
    if (this.slot === null || this.control === null) {
      return { kind: 'document', tabId: this.activeTabId() };
    }
    return { kind: 'overlay', overlay: this.slot.kind, control: this.control };
  }

  isVisible(kind: OverlayKind): boolean {
    return this.slot?.kind === kind;
  }

  /**
   * Show an overlay, dismissing whatever was visible without running its
   * cancel logic. Returns the dismissed overlay.
   */
  show(overlay: Overlay): Overlay | null {
    const previous = this.slot;
    this.slot = overlay;
    this.control = defaultControl(overlay);
    this.highlighted = 0;
    return previous;
  }

  /** Clear the slot; focus returns to the active tab's document. */
  hide(): Overlay | null {
    const previous = this.slot;
    this.slot = null;
    this.control = null;
    this.highlighted = 0;
    return previous;
  }

  /** Move focus to another control of the visible overlay. */
  focusControl(control: OverlayControl): void {
    if (this.slot !== null) this.control = control;
  }

  /**
   * Handle a navigation key for the visible overlay.
   */
  handleKey(key: string): OverlayKeyAction {
    const overlay = this.slot;
    const control = this.control;
    if (overlay === null || control === null) return { kind: 'ignored' };
    if (key === 'escape') return { kind: 'close' };

    switch (overlay.kind) {
      case OverlayKind.TimerMenu:
        return this.timerMenuKey(key, control, overlay.presets.length);
      case OverlayKind.OpenFile:
        return this.listKey(key, control, overlay.files.length);
      case OverlayKind.SaveAs:
        return { kind: 'ignored' };
      case OverlayKind.DeletionGate:
        return this.gateKey(key, control);
      case OverlayKind.Quote:
        return this.quoteKey(key, control);
    }
  }

  private timerMenuKey(key: string, control: OverlayControl, count: number): OverlayKeyAction {
    if (control === 'custom') {
      if (key !== 'up') return { kind: 'ignored' };
      this.control = 'presets';
      this.highlighted = Math.max(0, count - 1);
      return { kind: 'moved' };
    }
    if (key === 'down' && this.highlighted >= count - 1) {
      this.control = 'custom';
      return { kind: 'moved' };
    }
    return this.listKey(key, control, count);
  }

  private listKey(key: string, control: OverlayControl, count: number): OverlayKeyAction {
    if (key === 'up') {
      this.highlighted = Math.max(0, this.highlighted - 1);
      return { kind: 'moved' };
    }
    if (key === 'down') {
      this.highlighted = Math.min(Math.max(0, count - 1), this.highlighted + 1);
      return { kind: 'moved' };
    }
    if (key === 'enter' && count > 0) {
      return { kind: 'activate', control, highlight: this.highlighted };
    }
    return { kind: 'ignored' };
  }

  private gateKey(key: string, control: OverlayControl): OverlayKeyAction {
    if (control === 'accept' || control === 'cancel') {
      if (key === 'left' || key === 'right') {
        this.control = control === 'accept' ? 'cancel' : 'accept';
        return { kind: 'moved' };
      }
      return key === 'enter' ? { kind: 'activate', control, highlight: 0 } : { kind: 'ignored' };
    }

    const position = GATE_COMPOSE_ORDER.findIndex((c) => c === control);
    if (position === -1) return { kind: 'ignored' };
    if (key === 'enter') {
      // Enter in any line submits, like the confirm button.
      return { kind: 'activate', control: 'submit', highlight: 0 };
    }
    const delta = key === 'down' ? 1 : key === 'up' ? -1 : 0;
    const target = GATE_COMPOSE_ORDER[position + delta];
    if (delta === 0 || target === undefined) return { kind: 'ignored' };
    this.control = target;
    return { kind: 'moved' };
  }

  private quoteKey(key: string, control: OverlayControl): OverlayKeyAction {
    if ((control === 'yes' || control === 'no') && (key === 'left' || key === 'right')) {
      this.control = control === 'yes' ? 'no' : 'yes';
      return { kind: 'moved' };
    }
    return key === 'enter' ? { kind: 'activate', control, highlight: 0 } : { kind: 'ignored' };
  }
}
