/**
 * Note session entry point.
 * Resolves configuration, prepares the data directory and starts a session
 * coordinator for a host shell to drive.
 */
import type { DocumentFactory } from '@shared/document';
import type { NoteSettings } from '@shared/settings';
import { loadConfig } from './config';
import { createLogger, setLogLevel } from './logger';
import { ensureDir } from './services/file-io';
import { SessionCoordinator } from './session/session-coordinator';

const logger = createLogger('main');

export interface StartOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly overrides?: Partial<NoteSettings>;
  readonly createDocument?: DocumentFactory;
}

export function startNoteSession(options: StartOptions = {}): SessionCoordinator {
  const settings = loadConfig(options.env, options.overrides);
  setLogLevel(settings.logLevel);
  ensureDir(settings.dataDir);
  logger.info(`Starting session in ${settings.dataDir}`);
  return new SessionCoordinator({
    settings,
    ...(options.createDocument !== undefined ? { createDocument: options.createDocument } : {}),
  });
}

export { loadConfig } from './config';
export { clearLogBuffer, getLogBuffer, setLogLevel } from './logger';
export { resolveShortcut, SHORTCUTS } from './keymap';
export { MemoryDocument } from './services/memory-document';
export { formatCountdown, parseTimeSpec } from './services/time-spec';
export { MESSAGES, SessionCoordinator } from './session/session-coordinator';
export type { SessionCoordinatorOptions } from './session/session-coordinator';
export type { SessionStore } from './session/session-store';
export type { SessionCommand, SessionEffect } from '@shared/command';
export type { TextDocument } from '@shared/document';
export type { SessionView } from '@shared/session';
