/**
 * Countdown timer.
 * Holds duration/remaining/start time and advances on a one-second interval.
 * Only one interval is ever armed: starting again cancels the previous one.
 */
import { CountdownPhase, type CountdownState } from '@shared/session';
import { createLogger } from '../logger';

const logger = createLogger('countdown');

const TICK_INTERVAL_MS = 1000;

/** Result of one tick */
export type TickOutcome =
  | { readonly kind: 'ticking'; readonly remainingSeconds: number }
  | { readonly kind: 'expired' }
  | { readonly kind: 'idle' };

/** Result of the reset-or-stop action */
export type ResetOutcome =
  | { readonly kind: 'stopped' }
  | { readonly kind: 'restarted'; readonly seconds: number }
  | { readonly kind: 'none' };

export interface CountdownTimerOptions {
  /** Called with the outcome of every scheduled tick */
  readonly onTick: (outcome: TickOutcome) => void;
  /** A reset this soon after a start stops the timer instead */
  readonly stopWindowMs: number;
  readonly now?: () => number;
}

export class CountdownTimer {
  private state: CountdownState = { durationSeconds: 0, remainingSeconds: 0, lastStartedAt: 0 };
  private expired = false;
  private handle: ReturnType<typeof setInterval> | null = null;
  private readonly onTick: (outcome: TickOutcome) => void;
  private readonly stopWindowMs: number;
  private readonly now: () => number;

  constructor(options: CountdownTimerOptions) {
    this.onTick = options.onTick;
    this.stopWindowMs = options.stopWindowMs;
    this.now = options.now ?? (() => Date.now());
  }

  get snapshot(): CountdownState {
    return this.state;
  }

  /** Expired visual flag; cleared by start and stop */
  get blinking(): boolean {
    return this.expired;
  }

  get phase(): CountdownPhase {
    if (this.state.remainingSeconds > 0) return CountdownPhase.Running;
    if (this.expired) return CountdownPhase.Expired;
    return CountdownPhase.Idle;
  }

  get armed(): boolean {
    return this.handle !== null;
  }

  /**
   * Start counting down from `seconds`. Non-positive values are ignored.
   */
  start(seconds: number): boolean {
    if (!(seconds > 0)) return false;
    this.state = {
      durationSeconds: seconds,
      remainingSeconds: seconds,
      lastStartedAt: this.now(),
    };
    this.expired = false;
    this.cancel();
    this.handle = setInterval(() => {
      this.onTick(this.tick());
    }, TICK_INTERVAL_MS);
    logger.info(`Countdown started: ${String(seconds)}s`);
    return true;
  }

  tick(): TickOutcome {
    const { remainingSeconds } = this.state;
    if (remainingSeconds <= 0) {
      this.cancel();
      return { kind: 'idle' };
    }
    const next = remainingSeconds - 1;
    this.state = { ...this.state, remainingSeconds: next };
    if (next === 0) {
      this.expired = true;
      this.cancel();
      logger.info('Countdown expired');
      return { kind: 'expired' };
    }
    return { kind: 'ticking', remainingSeconds: next };
  }

  stop(): void {
    this.cancel();
    this.state = { ...this.state, remainingSeconds: 0 };
    this.expired = false;
  }

  /**
   * Stop when pressed shortly after a start; otherwise restart with the
   * remembered duration.
   */
  resetOrStop(): ResetOutcome {
    const { remainingSeconds, lastStartedAt, durationSeconds } = this.state;
    if (remainingSeconds > 0 && this.now() - lastStartedAt < this.stopWindowMs) {
      this.stop();
      return { kind: 'stopped' };
    }
    if (durationSeconds > 0) {
      this.start(durationSeconds);
      return { kind: 'restarted', seconds: durationSeconds };
    }
    return { kind: 'none' };
  }

  /** Visible while the timer menu is open or time remains. */
  isVisible(menuOpen: boolean): boolean {
    return menuOpen || this.state.remainingSeconds > 0;
  }

  dispose(): void {
    this.cancel();
  }

  private cancel(): void {
    if (this.handle !== null) {
      clearInterval(this.handle);
      this.handle = null;
    }
  }
}
