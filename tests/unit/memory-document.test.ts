import { describe, it, expect, vi } from 'vitest';
import { MemoryDocument } from '../../src/main/services/memory-document';

describe('MemoryDocument', () => {
  it('notifies listeners of changed text only', () => {
    const doc = new MemoryDocument('start');
    const listener = vi.fn();
    doc.onDidChange(listener);
    doc.setText('start');
    doc.setText('next');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('next');
    expect(doc.getText()).toBe('next');
  });

  it('stops notifying after unsubscribe', () => {
    const doc = new MemoryDocument();
    const listener = vi.fn();
    const unsubscribe = doc.onDidChange(listener);
    unsubscribe();
    doc.setText('x');
    expect(listener).not.toHaveBeenCalled();
  });
});
