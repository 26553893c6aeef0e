/**
 * Configuration loader.
 * Environment variables override DEFAULT_SETTINGS; explicit overrides win
 * over both. An invalid environment is reported and ignored as a whole.
 */
import { isAbsolute, join, resolve } from 'node:path';
import { DEFAULT_SETTINGS, type NoteSettings } from '@shared/settings';
import { EnvConfigSchema, type EnvConfig } from '@shared/zod-schemas';
import { createLogger } from './logger';

const logger = createLogger('config');

export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: Partial<NoteSettings> = {},
): NoteSettings {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      logger.warn(`Ignoring environment, invalid ${issue.path.join('.')}: ${issue.message}`);
    }
  }
  const e: EnvConfig = parsed.success ? parsed.data : {};
  const fromEnv: Partial<NoteSettings> = {
    ...(e.NOTES_DATA_DIR !== undefined ? { dataDir: e.NOTES_DATA_DIR } : {}),
    ...(e.NOTES_QUOTES_FILE !== undefined ? { quotesFile: e.NOTES_QUOTES_FILE } : {}),
    ...(e.NOTES_APP_TITLE !== undefined ? { appTitle: e.NOTES_APP_TITLE } : {}),
    ...(e.NOTES_MAX_TIMER_SECONDS !== undefined
      ? { maxTimerSeconds: e.NOTES_MAX_TIMER_SECONDS }
      : {}),
    ...(e.NOTES_LOG_LEVEL !== undefined ? { logLevel: e.NOTES_LOG_LEVEL } : {}),
  };

  const settings: NoteSettings = { ...DEFAULT_SETTINGS, ...fromEnv, ...overrides };
  return { ...settings, dataDir: resolve(settings.dataDir) };
}

/** Absolute path of the quote corpus */
export function quotesPath(settings: NoteSettings): string {
  return isAbsolute(settings.quotesFile)
    ? settings.quotesFile
    : join(settings.dataDir, settings.quotesFile);
}
