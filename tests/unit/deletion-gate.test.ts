import { describe, it, expect } from 'vitest';
import { DEFAULT_SETTINGS } from '@shared/settings';
import {
  COMPOSE_HEADING,
  countWords,
  DELETION_PREAMBLE,
  DeletionGate,
  isValidComposition,
  PromptRotation,
} from '../../src/main/services/deletion-gate';

const bounds = DEFAULT_SETTINGS.haikuBounds;

describe('countWords', () => {
  it('counts whitespace-separated tokens', () => {
    expect(countWords('  a  b\tc ')).toBe(3);
    expect(countWords('')).toBe(0);
    expect(countWords('   ')).toBe(0);
  });
});

describe('isValidComposition', () => {
  it('rejects lines outside the word bounds', () => {
    expect(isValidComposition(['a b', 'c d e f', 'g h'], bounds)).toBe(false);
    expect(isValidComposition(['a b c d e f', 'g h i j', 'k l m'], bounds)).toBe(false);
  });

  it('accepts lines inside the word bounds', () => {
    expect(isValidComposition(['a b c', 'd e f g', 'h i j'], bounds)).toBe(true);
    expect(isValidComposition(['a b c d e', 'f g h i j k l', 'm n o p q'], bounds)).toBe(true);
  });

  it('honours custom bounds', () => {
    const loose = [
      { min: 1, max: 1 },
      { min: 1, max: 1 },
      { min: 1, max: 1 },
    ] as const;
    expect(isValidComposition(['a', 'b', 'c'], loose)).toBe(true);
  });
});

describe('PromptRotation', () => {
  it('wraps around the pool', () => {
    const rotation = new PromptRotation(['p0', 'p1', 'p2']);
    expect([rotation.next(), rotation.next(), rotation.next(), rotation.next()]).toStrictEqual([
      { index: 0, prompt: 'p0' },
      { index: 1, prompt: 'p1' },
      { index: 2, prompt: 'p2' },
      { index: 0, prompt: 'p0' },
    ]);
  });

  it('yields an empty prompt for an empty pool', () => {
    expect(new PromptRotation([]).next()).toStrictEqual({ index: 0, prompt: '' });
  });
});

describe('DeletionGate', () => {
  it('opens on the warning with the next prompt', () => {
    const rotation = new PromptRotation(['first', 'second']);
    const gate = new DeletionGate('tab1', rotation, bounds);
    expect(gate.step).toBe('warning');
    expect(gate.message).toBe(`${DELETION_PREAMBLE}\n\nfirst`);
    expect(new DeletionGate('tab1', rotation, bounds).prompt).toBe('second');
  });

  it('blocks confirmation before accepting', () => {
    const gate = new DeletionGate('tab1', new PromptRotation(['p']), bounds);
    expect(gate.setLine(1, 'a b c')).toBe(false);
    const result = gate.confirm();
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('validation-blocked');
    }
  });

  it('enables confirmation once every line is valid', () => {
    const gate = new DeletionGate('tab4', new PromptRotation(['p']), bounds);
    expect(gate.accept()).toBe(true);
    expect(gate.accept()).toBe(false);
    expect(gate.message).toBe(COMPOSE_HEADING);

    expect(gate.setLine(1, 'a b c')).toBe(false);
    expect(gate.setLine(2, 'd e f g')).toBe(false);
    expect(gate.setLine(3, 'h i j')).toBe(true);
    expect(gate.confirm()).toStrictEqual({ ok: true, targetTabId: 'tab4' });

    expect(gate.setLine(2, 'too short')).toBe(false);
    expect(gate.canConfirm).toBe(false);
  });

  it('describes itself as a view', () => {
    const gate = new DeletionGate('tab2', new PromptRotation(['p']), bounds);
    gate.accept();
    gate.setLine(2, 'middle line here now');
    expect(gate.toView()).toStrictEqual({
      targetTabId: 'tab2',
      step: 'composing',
      message: COMPOSE_HEADING,
      lines: ['', 'middle line here now', ''],
      canConfirm: false,
    });
  });
});
