/**
 * In-memory TextDocument used when the host does not supply its own editor
 * model (headless sessions and tests).
 */
import { EventEmitter } from 'node:events';
import type { TextDocument } from '@shared/document';

const CHANGE_EVENT = 'change';

export class MemoryDocument implements TextDocument {
  private text: string;
  private readonly emitter = new EventEmitter();

  constructor(initialText = '') {
    this.text = initialText;
  }

  getText(): string {
    return this.text;
  }

  setText(text: string): void {
    if (text === this.text) return;
    this.text = text;
    this.emitter.emit(CHANGE_EVENT, text);
  }

  onDidChange(listener: (text: string) => void): () => void {
    this.emitter.on(CHANGE_EVENT, listener);
    return () => {
      this.emitter.off(CHANGE_EVENT, listener);
    };
  }
}

export function createMemoryDocument(initialText: string): TextDocument {
  return new MemoryDocument(initialText);
}
