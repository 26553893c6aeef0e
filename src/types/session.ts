/**
 * Session view and snapshot types.
 */
import type { FocusTarget, Overlay } from './overlay';

/** Step of the deletion ritual */
export const GateStep = {
  Warning: 'warning',
  Composing: 'composing',
} as const;
export type GateStep = (typeof GateStep)[keyof typeof GateStep];

/** Countdown phase derived from duration/remaining/expired flag */
export const CountdownPhase = {
  Idle: 'idle',
  Running: 'running',
  Expired: 'expired',
} as const;
export type CountdownPhase = (typeof CountdownPhase)[keyof typeof CountdownPhase];

export interface CountdownState {
  readonly durationSeconds: number;
  readonly remainingSeconds: number;
  /** Unix epoch milliseconds of the last start */
  readonly lastStartedAt: number;
}

export interface TabView {
  readonly id: string;
  readonly title: string;
  readonly filePath: string | null;
  readonly dirty: boolean;
}

export interface CountdownView extends CountdownState {
  readonly phase: CountdownPhase;
  /** "mm:ss" */
  readonly display: string;
  readonly visible: boolean;
  readonly blinking: boolean;
}

export interface DeletionGateView {
  readonly targetTabId: string;
  readonly step: GateStep;
  /** Heading text for the current step */
  readonly message: string;
  readonly lines: readonly [string, string, string];
  readonly canConfirm: boolean;
}

/** Everything the host needs to render the session */
export interface SessionView {
  readonly tabs: readonly TabView[];
  readonly activeTabId: string;
  readonly overlay: Overlay | null;
  readonly focus: FocusTarget;
  /** Highlighted row of the visible list overlay (presets or files) */
  readonly highlight: number;
  readonly gate: DeletionGateView | null;
  readonly countdown: CountdownView;
  readonly strictMode: boolean;
  readonly tabBarVisible: boolean;
  /** Active tab has unsaved changes */
  readonly unsaved: boolean;
  readonly title: string;
  readonly status: string;
  readonly notification: string | null;
}

/** One tab in the persisted session snapshot */
export interface SavedNoteTab {
  readonly id: string;
  readonly title: string;
  readonly file: string | null;
}

/** Persisted list of open tabs */
export interface SessionSnapshot {
  readonly active: string;
  readonly tabs: readonly SavedNoteTab[];
}
