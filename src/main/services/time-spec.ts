/**
 * Countdown duration parser.
 *
 * Accepted forms (surrounding whitespace ignored):
 *   "90"   -> 90 seconds
 *   "2m"   -> 120 seconds
 *   " 7M " -> 420 seconds
 * Anything else (signs, decimals, other units, empty text) fails so the
 * caller can ring the bell instead of silently picking a default.
 */
import { DEFAULT_SETTINGS } from '@shared/settings';
import { sessionError, SessionErrorKind, type SessionError } from '@shared/errors';

const TIME_SPEC_PATTERN = /^(\d+)(m?)$/;

export type TimeSpecResult =
  | { readonly ok: true; readonly seconds: number }
  | { readonly ok: false; readonly error: SessionError };

export function parseTimeSpec(
  text: string,
  maxSeconds: number = DEFAULT_SETTINGS.maxTimerSeconds,
): TimeSpecResult {
  const match = TIME_SPEC_PATTERN.exec(text.trim().toLowerCase());
  const digits = match?.[1];
  if (match === null || digits === undefined) {
    return {
      ok: false,
      error: sessionError(SessionErrorKind.ParseFailure, `Invalid time: "${text}"`),
    };
  }
  const amount = Number(digits);
  const seconds = match[2] === 'm' ? amount * 60 : amount;
  return { ok: true, seconds: Math.min(seconds, maxSeconds) };
}

/**
 * Format seconds as "mm:ss". Minutes are not wrapped into hours.
 */
export function formatCountdown(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(total / 60);
  const secs = total % 60;
  return `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}
