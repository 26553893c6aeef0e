import { afterEach, beforeEach, vi } from 'vitest';
import { clearLogBuffer, setLogLevel } from '../../src/main/logger';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
  clearLogBuffer();
  setLogLevel('info');
});
