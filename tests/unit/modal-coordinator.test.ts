import { describe, it, expect, beforeEach } from 'vitest';
import { defaultControl, ModalCoordinator } from '../../src/main/services/modal-coordinator';

describe('defaultControl', () => {
  it('picks the first control of each overlay', () => {
    expect(defaultControl({ kind: 'timer-menu', presets: [30] })).toBe('presets');
    expect(defaultControl({ kind: 'open-file', files: [] })).toBe('files');
    expect(defaultControl({ kind: 'save-as', initialName: '' })).toBe('name');
    expect(defaultControl({ kind: 'deletion-gate', targetTabId: 'tab1' })).toBe('accept');
    expect(defaultControl({ kind: 'quote', mode: 'quote', text: 'q' })).toBe('ok');
    expect(defaultControl({ kind: 'quote', mode: 'restart-prompt', text: 'q' })).toBe('yes');
    expect(defaultControl({ kind: 'quote', mode: 'rate-limit', text: 'q' })).toBe('force');
  });
});

describe('ModalCoordinator', () => {
  let modal: ModalCoordinator;

  beforeEach(() => {
    modal = new ModalCoordinator(() => 'tab1');
  });

  it('focuses the active document without an overlay', () => {
    expect(modal.current).toBeNull();
    expect(modal.focus).toStrictEqual({ kind: 'document', tabId: 'tab1' });
    expect(modal.handleKey('enter')).toStrictEqual({ kind: 'ignored' });
  });

  it('holds one overlay at a time', () => {
    const timer = { kind: 'timer-menu', presets: [30, 180] } as const;
    expect(modal.show(timer)).toBeNull();
    expect(modal.show({ kind: 'save-as', initialName: '' })).toBe(timer);
    expect(modal.isVisible('timer-menu')).toBe(false);
    expect(modal.isVisible('save-as')).toBe(true);
    expect(modal.focus).toStrictEqual({ kind: 'overlay', overlay: 'save-as', control: 'name' });
  });

  it('returns focus to the document on hide', () => {
    modal.show({ kind: 'save-as', initialName: '' });
    expect(modal.hide()?.kind).toBe('save-as');
    expect(modal.focus).toStrictEqual({ kind: 'document', tabId: 'tab1' });
    expect(modal.hide()).toBeNull();
  });

  it('closes any overlay on escape', () => {
    modal.show({ kind: 'save-as', initialName: '' });
    expect(modal.handleKey('escape')).toStrictEqual({ kind: 'close' });
  });

  describe('timer menu', () => {
    beforeEach(() => {
      modal.show({ kind: 'timer-menu', presets: [30, 180, 420, 660] });
    });

    it('moves through presets into the custom field and back', () => {
      expect(modal.handleKey('up')).toStrictEqual({ kind: 'moved' });
      expect(modal.highlight).toBe(0);
      modal.handleKey('down');
      modal.handleKey('down');
      modal.handleKey('down');
      expect(modal.highlight).toBe(3);
      modal.handleKey('down');
      expect(modal.focus).toStrictEqual({
        kind: 'overlay',
        overlay: 'timer-menu',
        control: 'custom',
      });
      expect(modal.handleKey('enter')).toStrictEqual({ kind: 'ignored' });
      modal.handleKey('up');
      expect(modal.highlight).toBe(3);
      expect(modal.handleKey('enter')).toStrictEqual({
        kind: 'activate',
        control: 'presets',
        highlight: 3,
      });
    });
  });

  it('ignores enter on an empty file list', () => {
    modal.show({ kind: 'open-file', files: [] });
    expect(modal.handleKey('enter')).toStrictEqual({ kind: 'ignored' });
  });

  it('leaves keys in the save-as field alone', () => {
    modal.show({ kind: 'save-as', initialName: '' });
    expect(modal.handleKey('enter')).toStrictEqual({ kind: 'ignored' });
    expect(modal.handleKey('down')).toStrictEqual({ kind: 'ignored' });
  });

  describe('deletion gate', () => {
    beforeEach(() => {
      modal.show({ kind: 'deletion-gate', targetTabId: 'tab1' });
    });

    it('toggles between accept and cancel', () => {
      expect(modal.handleKey('right')).toStrictEqual({ kind: 'moved' });
      expect(modal.handleKey('enter')).toStrictEqual({
        kind: 'activate',
        control: 'cancel',
        highlight: 0,
      });
      modal.handleKey('left');
      expect(modal.handleKey('enter')).toStrictEqual({
        kind: 'activate',
        control: 'accept',
        highlight: 0,
      });
    });

    it('cycles through the composition lines and submits on enter', () => {
      modal.focusControl('line1');
      modal.handleKey('down');
      modal.handleKey('down');
      modal.handleKey('down');
      expect(modal.focus).toStrictEqual({
        kind: 'overlay',
        overlay: 'deletion-gate',
        control: 'submit',
      });
      expect(modal.handleKey('down')).toStrictEqual({ kind: 'ignored' });
      modal.handleKey('up');
      expect(modal.focus).toStrictEqual({
        kind: 'overlay',
        overlay: 'deletion-gate',
        control: 'line3',
      });
      expect(modal.handleKey('enter')).toStrictEqual({
        kind: 'activate',
        control: 'submit',
        highlight: 0,
      });
    });
  });

  describe('quote', () => {
    it('toggles yes and no on the restart prompt', () => {
      modal.show({ kind: 'quote', mode: 'restart-prompt', text: 'q' });
      modal.handleKey('left');
      expect(modal.handleKey('enter')).toStrictEqual({
        kind: 'activate',
        control: 'no',
        highlight: 0,
      });
    });

    it('activates force on the rate limit dialog', () => {
      modal.show({ kind: 'quote', mode: 'rate-limit', text: 'q' });
      expect(modal.handleKey('left')).toStrictEqual({ kind: 'ignored' });
      expect(modal.handleKey('enter')).toStrictEqual({
        kind: 'activate',
        control: 'force',
        highlight: 0,
      });
    });
  });
});
