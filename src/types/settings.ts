/**
 * Session settings.
 * Defaults can be overridden from the environment (see main/config.ts).
 */
import type { DiagLogLevel } from './diagnostic';

/** Inclusive word-count bounds for one line of the deletion haiku */
export interface WordRange {
  readonly min: number;
  readonly max: number;
}

/** A note created when no session snapshot can be restored */
export interface DefaultNote {
  readonly id: string;
  readonly title: string;
  /** File name relative to the data directory */
  readonly file: string;
}

export interface NoteSettings {
  /** Base window title; an asterisk is appended while work is unsaved */
  readonly appTitle: string;
  /** Minimum level the logger prints and keeps */
  readonly logLevel: DiagLogLevel;
  /** Directory holding notes, the quote corpus and the session snapshot */
  readonly dataDir: string;
  /** Quote corpus file, relative to dataDir unless absolute */
  readonly quotesFile: string;
  /** Session snapshot file name inside dataDir */
  readonly snapshotFile: string;
  /** Extension appended to save-as names that have none */
  readonly noteExtension: string;
  readonly defaultNotes: readonly DefaultNote[];
  /** Preset countdown durations in seconds, in menu order */
  readonly timerPresets: readonly number[];
  /** Parsed custom durations are clamped to this */
  readonly maxTimerSeconds: number;
  /** Two presses closer than this count as a double press */
  readonly doublePressMs: number;
  readonly quoteRateWindowMs: number;
  /** Admitted quote requests allowed inside the rate window */
  readonly quoteRateLimit: number;
  readonly haikuBounds: readonly [WordRange, WordRange, WordRange];
  /** Reflective lines shown in rotation on the deletion warning */
  readonly deletionPrompts: readonly string[];
}

export const DEFAULT_SETTINGS: NoteSettings = {
  appTitle: 'NoteApp',
  logLevel: 'info',
  dataDir: 'data',
  quotesFile: 'quotes.txt',
  snapshotFile: 'tabs_state.json',
  noteExtension: '.txt',
  defaultNotes: [
    { id: 'tab1', title: 'Note 1', file: 'notes1.txt' },
    { id: 'tab2', title: 'Note 2', file: 'notes2.txt' },
  ],
  timerPresets: [30, 180, 420, 660],
  maxTimerSeconds: 24 * 60 * 60,
  doublePressMs: 2000,
  quoteRateWindowMs: 15 * 60 * 1000,
  quoteRateLimit: 3,
  haikuBounds: [
    { min: 3, max: 5 },
    { min: 4, max: 7 },
    { min: 3, max: 5 },
  ],
  deletionPrompts: [
    'What are you trying to forget?\nWhat if this was a beginning,\nnot a slip of the pen?',
    'You reach for delete.\nBut who were you when you wrote?\nAre they still in here?',
    'Every line you wrote\ncarried a dream in disguise.\nHave you tired of it?',
    'Forgetting is easy,\nbut did you give a meaning\nto what you now remove?',
    'The quiet cursor asks:\nshall I go on alone now,\nor still with your hand?',
    'One click and it is gone.\nBut before you let it go,\nsay what it was worth.',
    'A farewell with no words\nis only a dance of flight.\nGive it a rhythm first.',
    'Perhaps it was clumsy.\nBut was it not also you?\nOne day of your life.',
    'Do not let your fear\nbecome the shadow of delete.\nWrite with open eyes.',
    'What are you running from:\nthe words you chose yourself,\nor what they can see?',
    'Are you finished now?\nOr only growing restless\nto forget again?',
    'Some words have to go.\nBut first you must tell them\nwhat they did to you.',
  ],
};
