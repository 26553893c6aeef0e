/**
 * Zod schemas for runtime validation at I/O boundaries.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Session snapshot (tabs_state.json)
// ---------------------------------------------------------------------------

export const SavedNoteTabSchema = z.object({
  id: z.string().min(1),
  /** Older snapshots may omit the title; the id is used instead */
  title: z.string().optional(),
  file: z.string().min(1).nullable().optional(),
});

export const SessionSnapshotSchema = z.object({
  active: z.string().optional(),
  tabs: z.array(SavedNoteTabSchema).min(1, 'Snapshot must contain at least one tab'),
});

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

export const EnvConfigSchema = z.object({
  NOTES_DATA_DIR: z.string().min(1).optional(),
  NOTES_QUOTES_FILE: z.string().min(1).optional(),
  NOTES_APP_TITLE: z.string().min(1).optional(),
  NOTES_MAX_TIMER_SECONDS: z.coerce.number().int().positive().optional(),
  NOTES_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});
export type EnvConfig = z.infer<typeof EnvConfigSchema>;
