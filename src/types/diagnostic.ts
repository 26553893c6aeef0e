/**
 * Diagnostic log types shared by the logger and its readers.
 */

export const DiagLogLevel = {
  Debug: 'debug',
  Info: 'info',
  Warn: 'warn',
  Error: 'error',
} as const;
export type DiagLogLevel = (typeof DiagLogLevel)[keyof typeof DiagLogLevel];

/** Severity rank; entries below the configured minimum are dropped */
export const DIAG_LOG_RANK: Readonly<Record<DiagLogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface DiagLogEntry {
  /** ISO 8601 */
  readonly timestamp: string;
  readonly level: DiagLogLevel;
  /** Component that logged, e.g. "tab-registry" */
  readonly tag: string;
  /** Home directory already replaced by "~" */
  readonly message: string;
}
