/**
 * Abstract text document capability.
 * The host editor widget implements this; the session only reads, writes and
 * listens for edits.
 */
export interface TextDocument {
  getText(): string;
  setText(text: string): void;
  /** Subscribe to content changes. Returns an unsubscribe function. */
  onDidChange(listener: (text: string) => void): () => void;
}

/** Creates a document pre-filled with the given text */
export type DocumentFactory = (initialText: string) => TextDocument;
