/**
 * Quote library.
 * Loads a corpus of quotes separated by blank lines and hands out unseen
 * entries at random until the user chooses to start over.
 */
import { createLogger } from '../logger';
import { fileModifiedAt, readFileSafe } from './file-io';

const logger = createLogger('quotes');

/** Corpus text plus a stamp that changes whenever the source changes */
export interface QuoteCorpus {
  readonly version: number;
  readonly text: string;
}

/** Returns the current corpus, or null when there is none */
export type CorpusLoader = () => QuoteCorpus | null;

export type QuotePick =
  | { readonly kind: 'quote'; readonly text: string }
  /** Every entry was shown; ask whether to start over */
  | { readonly kind: 'restart-prompt' }
  /** Every entry was shown and the user declined to start over */
  | { readonly kind: 'exhausted' }
  | { readonly kind: 'empty' };

/**
 * Split corpus text into trimmed, non-empty entries.
 */
export function parseQuoteCorpus(text: string): string[] {
  return text
    .replace(/\r\n/g, '\n')
    .split('\n\n')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Corpus loader backed by a text file; the modification time is the version.
 */
export function createFileCorpusLoader(filePath: string): CorpusLoader {
  return () => {
    const version = fileModifiedAt(filePath);
    if (version === null) return null;
    const text = readFileSafe(filePath);
    if (text === null) return null;
    return { version, text };
  };
}

export class QuoteLibrary {
  private entries: string[] = [];
  private readonly shown = new Set<string>();
  private exhausted = false;
  private version: number | null = null;
  private readonly load: CorpusLoader;
  private readonly random: () => number;

  constructor(load: CorpusLoader, random: () => number = Math.random) {
    this.load = load;
    this.random = random;
  }

  get size(): number {
    return this.entries.length;
  }

  get shownCount(): number {
    return this.shown.size;
  }

  get isExhausted(): boolean {
    return this.exhausted;
  }

  /**
   * Reload the corpus when its version changed.
   * New unseen entries clear the exhausted flag.
   */
  reload(): boolean {
    const corpus = this.load();
    if (corpus === null) {
      this.entries = [];
      this.version = null;
      return false;
    }
    if (corpus.version === this.version) return false;

    this.entries = parseQuoteCorpus(corpus.text);
    this.version = corpus.version;
    if (this.entries.some((entry) => !this.shown.has(entry))) {
      this.exhausted = false;
    }
    logger.info(`Loaded ${String(this.entries.length)} quotes`);
    return true;
  }

  next(): QuotePick {
    this.reload();
    if (this.entries.length === 0) {
      return { kind: 'empty' };
    }
    const unseen = this.entries.filter((entry) => !this.shown.has(entry));
    const index = Math.floor(this.random() * unseen.length);
    const picked = unseen[Math.min(index, unseen.length - 1)];
    if (picked === undefined) {
      return this.exhausted ? { kind: 'exhausted' } : { kind: 'restart-prompt' };
    }
    this.shown.add(picked);
    return { kind: 'quote', text: picked };
  }

  /** Forget which entries were shown. */
  restart(): void {
    this.shown.clear();
    this.exhausted = false;
  }

  /** The user declined to start over. */
  decline(): void {
    this.exhausted = true;
  }
}
