/**
 * Tagged console logger with a bounded history.
 *
 * Output goes to stderr so a terminal host keeps stdout to itself. Paths under
 * the user's home directory are shortened to "~" before anything is printed
 * or kept.
 */
import { homedir } from 'node:os';
import { DIAG_LOG_RANK, type DiagLogEntry, type DiagLogLevel } from '@shared/diagnostic';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: Error): void;
}

const HISTORY_LIMIT = 500;
const history: DiagLogEntry[] = [];
let minLevel: DiagLogLevel = 'info';

function shortenHome(text: string): string {
  const home = homedir();
  return home.length > 1 ? text.split(home).join('~') : text;
}

/** Drop entries below `level` from both output and history. */
export function setLogLevel(level: DiagLogLevel): void {
  minLevel = level;
}

export function getLogLevel(): DiagLogLevel {
  return minLevel;
}

export function pushEntry(level: DiagLogLevel, tag: string, message: string): void {
  history.push({ timestamp: new Date().toISOString(), level, tag, message });
  if (history.length > HISTORY_LIMIT) history.splice(0, history.length - HISTORY_LIMIT);
}

/** Oldest first */
export function getLogBuffer(): readonly DiagLogEntry[] {
  return history.slice();
}

export function clearLogBuffer(): void {
  history.length = 0;
}

export function createLogger(tag: string): Logger {
  const emit = (level: DiagLogLevel, message: string, detail?: string): void => {
    if (DIAG_LOG_RANK[level] < DIAG_LOG_RANK[minLevel]) return;
    const text = shortenHome(message);
    const line = `[${tag}] ${level.toUpperCase()}: ${text}`;
    if (level === 'warn') {
      console.warn(line);
    } else if (detail !== undefined) {
      console.error(line, detail);
    } else {
      console.error(line);
    }
    pushEntry(level, tag, detail !== undefined ? `${text} ${detail}` : text);
  };

  return {
    debug: (message) => {
      emit('debug', message);
    },
    info: (message) => {
      emit('info', message);
    },
    warn: (message) => {
      emit('warn', message);
    },
    error: (message, err) => {
      emit('error', message, err !== undefined ? shortenHome(err.message) : undefined);
    },
  };
}
