import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createMemoryDocument } from '../../src/main/services/memory-document';
import { newTabTitle, TabRegistry } from '../../src/main/services/tab-registry';

describe('newTabTitle', () => {
  it('formats hours, minutes, day and month', () => {
    expect(newTabTitle(new Date(2024, 2, 5, 9, 7))).toBe('Note 0907-0503');
  });
});

describe('TabRegistry', () => {
  let dir: string;
  let clock: number;
  let onDirty: ReturnType<typeof vi.fn>;
  let registry: TabRegistry;

  const unbound = (...ids: string[]) => ids.map((id) => ({ id, title: id, file: null }));

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'quillbox-tabs-'));
    clock = 0;
    onDirty = vi.fn();
    registry = new TabRegistry({
      createDocument: createMemoryDocument,
      doublePressMs: 2000,
      onDirty,
      now: () => clock,
    });
  });

  it('has no active tab and creates none before restore', () => {
    expect(registry.active).toBeUndefined();
    expect(registry.size).toBe(0);
    expect(registry.previous()).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  describe('restore', () => {
    it('loads the default notes from disk', () => {
      writeFileSync(join(dir, 'notes1.txt'), 'hello', 'utf-8');
      registry.restore(null, [
        { id: 'tab1', title: 'Note 1', file: join(dir, 'notes1.txt') },
        { id: 'tab2', title: 'Note 2', file: join(dir, 'notes2.txt') },
      ]);
      expect(registry.ids).toStrictEqual(['tab1', 'tab2']);
      expect(registry.activeTabId).toBe('tab1');
      expect(registry.get('tab1')?.document.getText()).toBe('hello');
      expect(registry.get('tab2')?.document.getText()).toBe('');
      expect(registry.newTab().id).toBe('tab3');
    });

    it('prefers the snapshot and continues its id counter', () => {
      registry.restore({ active: 'tab7', tabs: unbound('tab1', 'tab7') }, unbound('tab1'));
      expect(registry.ids).toStrictEqual(['tab1', 'tab7']);
      expect(registry.activeTabId).toBe('tab7');
      expect(registry.newTab().id).toBe('tab8');
    });

    it('creates a tab when there is nothing to restore', () => {
      registry.restore(null, []);
      expect(registry.ids).toStrictEqual(['tab1']);
      expect(registry.activeTabId).toBe('tab1');
    });
  });

  describe('close', () => {
    beforeEach(() => {
      registry.restore(null, unbound('tab1', 'tab2', 'tab3'));
    });

    it('activates the previous neighbour', () => {
      registry.activate('tab2');
      expect(registry.close('tab2')).toStrictEqual({
        closedId: 'tab2',
        activeId: 'tab1',
        recreated: null,
      });
    });

    it('activates the new first tab when the first one closes', () => {
      expect(registry.close('tab1')?.activeId).toBe('tab2');
    });

    it('keeps the active tab when another one closes', () => {
      registry.activate('tab3');
      expect(registry.close('tab1')?.activeId).toBe('tab3');
    });

    it('recreates a tab after the last one closes', () => {
      registry.close('tab1');
      registry.close('tab2');
      const result = registry.close('tab3');
      expect(result?.recreated?.id).toBe('tab4');
      expect(registry.ids).toStrictEqual(['tab4']);
      expect(registry.activeTabId).toBe('tab4');
    });

    it('ignores unknown ids', () => {
      expect(registry.close('tab9')).toBeNull();
      expect(registry.size).toBe(3);
    });
  });

  it('wraps previous and next', () => {
    registry.restore(null, unbound('tab1', 'tab2', 'tab3'));
    expect(registry.previous()?.id).toBe('tab3');
    expect(registry.next()?.id).toBe('tab1');
    expect(registry.next()?.id).toBe('tab2');
  });

  describe('save', () => {
    it('asks for a name when the tab has no file', () => {
      registry.restore(null, unbound('tab1'));
      expect(registry.save('tab1')).toStrictEqual({ kind: 'prompt-save-as', initialName: '' });
    });

    it('writes a bound tab and asks for a new name on a double press', () => {
      const file = join(dir, 'notes1.txt');
      registry.restore(null, [{ id: 'tab1', title: 'Note 1', file }]);
      registry.get('tab1')?.document.setText('draft text');

      expect(registry.save('tab1')).toStrictEqual({ kind: 'written', path: file });
      expect(readFileSync(file, 'utf-8')).toBe('draft text');
      expect(registry.get('tab1')?.dirty).toBe(false);

      clock = 1500;
      expect(registry.save('tab1')).toStrictEqual({
        kind: 'prompt-save-as',
        initialName: 'notes1',
      });

      clock = 5000;
      expect(registry.save('tab1').kind).toBe('written');
    });

    it('clears the dirty flag of the saved tab only', () => {
      registry.restore(null, [
        { id: 'tab1', title: 'Note 1', file: join(dir, 'notes1.txt') },
        { id: 'tab2', title: 'Note 2', file: join(dir, 'notes2.txt') },
      ]);
      registry.get('tab1')?.document.setText('one');
      registry.get('tab2')?.document.setText('two');
      expect(registry.save('tab1').kind).toBe('written');
      expect(registry.views().map((t) => [t.id, t.dirty])).toStrictEqual([
        ['tab1', false],
        ['tab2', true],
      ]);
    });

    it('reports write failures and stays dirty', () => {
      const blocker = join(dir, 'blocker');
      writeFileSync(blocker, '', 'utf-8');
      registry.restore(null, [{ id: 'tab1', title: 'x', file: join(blocker, 'x.txt') }]);
      registry.get('tab1')?.document.setText('words');
      const decision = registry.save('tab1');
      expect(decision.kind).toBe('failed');
      expect(registry.get('tab1')?.dirty).toBe(true);
    });

    it('rebinds the tab on save as', () => {
      registry.restore(null, unbound('tab1'));
      registry.get('tab1')?.document.setText('body');
      const target = join(dir, 'draft.txt');
      const result = registry.saveAs('tab1', target);
      expect(result.ok).toBe(true);
      expect(registry.views()).toStrictEqual([
        { id: 'tab1', title: 'draft', filePath: target, dirty: false },
      ]);
      expect(readFileSync(target, 'utf-8')).toBe('body');
    });
  });

  it('opens files in a new active tab', () => {
    const file = join(dir, 'ideas.txt');
    writeFileSync(file, 'idea', 'utf-8');
    registry.restore(null, unbound('tab1'));
    const result = registry.openFile(file);
    expect(result.ok).toBe(true);
    expect(registry.activeTabId).toBe('tab2');
    expect(registry.active?.title).toBe('ideas');
    expect(registry.active?.document.getText()).toBe('idea');
  });

  it('reports missing files as not found', () => {
    registry.restore(null, unbound('tab1'));
    const result = registry.openFile(join(dir, 'missing.txt'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('not-found');
    }
    expect(registry.size).toBe(1);
  });

  it('marks tabs dirty on edit and reports the transition once', () => {
    registry.restore(null, unbound('tab1'));
    registry.get('tab1')?.document.setText('a');
    registry.get('tab1')?.document.setText('ab');
    expect(registry.get('tab1')?.dirty).toBe(true);
    expect(onDirty).toHaveBeenCalledTimes(1);
    expect(onDirty).toHaveBeenCalledWith('tab1');
  });

  it('produces a snapshot of the open tabs', () => {
    registry.restore(null, [
      { id: 'tab1', title: 'Note 1', file: join(dir, 'notes1.txt') },
      { id: 'tab2', title: 'Note 2', file: null },
    ]);
    registry.activate('tab2');
    expect(registry.toSnapshot()).toStrictEqual({
      active: 'tab2',
      tabs: [
        { id: 'tab1', title: 'Note 1', file: join(dir, 'notes1.txt') },
        { id: 'tab2', title: 'Note 2', file: null },
      ],
    });
  });

  it('detaches a deleted file', () => {
    registry.restore(null, [{ id: 'tab1', title: 'Note 1', file: join(dir, 'notes1.txt') }]);
    registry.detachFile('tab1');
    expect(registry.get('tab1')?.filePath).toBeNull();
  });
});
