/**
 * Global keyboard shortcuts.
 * Only keys listed here map to session commands; everything else is left to
 * the focused overlay or the editor.
 */
import type { SessionCommand } from '@shared/command';

export interface Shortcut {
  readonly key: string;
  readonly label: string;
  readonly command: SessionCommand;
}

export const SHORTCUTS: readonly Shortcut[] = [
  { key: 'ctrl+t', label: 'Timer menu', command: { type: 'toggle-timer-menu' } },
  { key: 'ctrl+r', label: 'Reset/stop timer', command: { type: 'reset-or-stop-timer' } },
  { key: 'ctrl+s', label: 'Save notes', command: { type: 'save' } },
  { key: 'ctrl+g', label: 'Strict mode', command: { type: 'toggle-strict-mode' } },
  { key: 'ctrl+n', label: 'New tab', command: { type: 'new-tab' } },
  { key: 'ctrl+o', label: 'Open file', command: { type: 'open-file' } },
  { key: 'ctrl+w', label: 'Close tab', command: { type: 'close-tab' } },
  { key: 'ctrl+b', label: 'Show/hide tabs', command: { type: 'toggle-tab-bar' } },
  { key: 'ctrl+delete', label: 'Delete file', command: { type: 'prompt-delete' } },
  { key: 'ctrl+pageup', label: 'Previous tab', command: { type: 'previous-tab' } },
  { key: 'ctrl+pagedown', label: 'Next tab', command: { type: 'next-tab' } },
  { key: 'ctrl+l', label: 'Show quote', command: { type: 'show-quote' } },
  { key: 'escape', label: 'Close menu', command: { type: 'close-overlay' } },
];

const BY_KEY = new Map(SHORTCUTS.map((s) => [s.key, s.command]));

/**
 * Normalize "Ctrl+S" / "ctrl + s" to "ctrl+s".
 */
export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/\s+/g, '');
}

export function resolveShortcut(key: string): SessionCommand | null {
  return BY_KEY.get(normalizeKey(key)) ?? null;
}
