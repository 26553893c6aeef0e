/**
 * Overlay (modal dialog) types.
 * At most one overlay is visible; the slot is modelled as `Overlay | null`.
 */

export const OverlayKind = {
  TimerMenu: 'timer-menu',
  OpenFile: 'open-file',
  SaveAs: 'save-as',
  DeletionGate: 'deletion-gate',
  Quote: 'quote',
} as const;
export type OverlayKind = (typeof OverlayKind)[keyof typeof OverlayKind];

/** What the quote overlay is currently asking or showing */
export const QuoteMode = {
  Quote: 'quote',
  RestartPrompt: 'restart-prompt',
  RateLimit: 'rate-limit',
} as const;
export type QuoteMode = (typeof QuoteMode)[keyof typeof QuoteMode];

/** A note file offered by the open-file menu */
export interface FileEntry {
  /** Base name without extension */
  readonly label: string;
  readonly path: string;
}

export type Overlay =
  | { readonly kind: typeof OverlayKind.TimerMenu; readonly presets: readonly number[] }
  | { readonly kind: typeof OverlayKind.OpenFile; readonly files: readonly FileEntry[] }
  | { readonly kind: typeof OverlayKind.SaveAs; readonly initialName: string }
  | { readonly kind: typeof OverlayKind.DeletionGate; readonly targetTabId: string }
  | {
      readonly kind: typeof OverlayKind.Quote;
      readonly mode: QuoteMode;
      readonly text: string;
    };

export type TimerMenuControl = 'presets' | 'custom';
export type OpenFileControl = 'files';
export type SaveAsControl = 'name';
export type DeletionGateControl = 'accept' | 'cancel' | 'line1' | 'line2' | 'line3' | 'submit';
export type QuoteControl = 'ok' | 'yes' | 'no' | 'force';

export type OverlayControl =
  | TimerMenuControl
  | OpenFileControl
  | SaveAsControl
  | DeletionGateControl
  | QuoteControl;

/** Which element owns keyboard input */
export type FocusTarget =
  | { readonly kind: 'document'; readonly tabId: string }
  | { readonly kind: 'overlay'; readonly overlay: OverlayKind; readonly control: OverlayControl };
