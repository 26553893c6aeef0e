/**
 * Error taxonomy for session operations.
 * Every fallible operation returns one of these instead of throwing.
 */

export const SessionErrorKind = {
  /** Time specification could not be parsed */
  ParseFailure: 'parse-failure',
  /** File to open does not exist */
  NotFound: 'not-found',
  /** Deletion composition does not meet the word-count rule yet */
  ValidationBlocked: 'validation-blocked',
  /** Too many quote requests inside the rate window */
  RateLimited: 'rate-limited',
  /** Every quote was shown and the user declined to restart */
  Exhausted: 'exhausted',
  /** Underlying read/write/delete failed */
  IoFailure: 'io-failure',
} as const;
export type SessionErrorKind = (typeof SessionErrorKind)[keyof typeof SessionErrorKind];

export interface SessionError {
  readonly kind: SessionErrorKind;
  readonly message: string;
}

/** Result of a write to disk */
export type WriteResult =
  | { readonly ok: true; readonly path: string }
  | { readonly ok: false; readonly error: SessionError };

export function sessionError(kind: SessionErrorKind, message: string): SessionError {
  return { kind, message };
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
