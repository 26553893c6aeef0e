import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import {
  createLogger,
  getLogBuffer,
  getLogLevel,
  pushEntry,
  setLogLevel,
} from '../../src/main/logger';

describe('createLogger', () => {
  it('buffers entries with the tag and level', () => {
    const logger = createLogger('unit');
    logger.info('first');
    logger.warn('second');
    expect(getLogBuffer().map(({ level, tag, message }) => ({ level, tag, message }))).toStrictEqual([
      { level: 'info', tag: 'unit', message: 'first' },
      { level: 'warn', tag: 'unit', message: 'second' },
    ]);
  });

  it('masks the home directory', () => {
    createLogger('unit').info(`Opened ${homedir()}/notes/a.txt`);
    expect(getLogBuffer()[0]?.message).toBe('Opened ~/notes/a.txt');
    expect(console.error).toHaveBeenCalledWith('[unit] INFO: Opened ~/notes/a.txt');
  });

  it('appends the error message', () => {
    createLogger('unit').error('failed', new Error('boom'));
    expect(getLogBuffer()[0]?.message).toBe('failed boom');
    expect(console.error).toHaveBeenCalledWith('[unit] ERROR: failed', 'boom');
  });
});

describe('setLogLevel', () => {
  it('drops entries below the minimum level', () => {
    const logger = createLogger('unit');
    logger.debug('hidden');
    setLogLevel('debug');
    logger.debug('shown');
    setLogLevel('warn');
    logger.info('hidden too');
    logger.warn('kept');
    expect(getLogLevel()).toBe('warn');
    expect(getLogBuffer().map((e) => e.message)).toStrictEqual(['shown', 'kept']);
  });
});

describe('log ring buffer', () => {
  it('keeps the newest 500 entries', () => {
    for (let i = 0; i <= 500; i++) {
      pushEntry('info', 'ring', `m${String(i)}`);
    }
    const buffer = getLogBuffer();
    expect(buffer).toHaveLength(500);
    expect(buffer[0]?.message).toBe('m1');
    expect(buffer[499]?.message).toBe('m500');
  });
});
