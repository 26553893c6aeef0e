import { describe, it, expect } from 'vitest';
import { formatCountdown, parseTimeSpec } from '../../src/main/services/time-spec';

describe('parseTimeSpec', () => {
  it('reads bare numbers as seconds', () => {
    expect(parseTimeSpec('90')).toStrictEqual({ ok: true, seconds: 90 });
  });

  it('reads an m suffix as minutes', () => {
    expect(parseTimeSpec('2m')).toStrictEqual({ ok: true, seconds: 120 });
  });

  it('ignores surrounding whitespace and case', () => {
    expect(parseTimeSpec('  7M ')).toStrictEqual({ ok: true, seconds: 420 });
  });

  it.each(['abc', '', '   ', '-5', '1.5', '5h', 'm', '2 m'])('rejects %j', (text) => {
    const result = parseTimeSpec(text);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('parse-failure');
    }
  });

  it('clamps to the default maximum of one day', () => {
    expect(parseTimeSpec('100000')).toStrictEqual({ ok: true, seconds: 86400 });
  });

  it('clamps to an explicit maximum', () => {
    expect(parseTimeSpec('10m', 300)).toStrictEqual({ ok: true, seconds: 300 });
  });

  it('accepts zero, leaving the caller to ignore it', () => {
    expect(parseTimeSpec('0')).toStrictEqual({ ok: true, seconds: 0 });
  });
});

describe('formatCountdown', () => {
  it('pads minutes and seconds', () => {
    expect(formatCountdown(0)).toBe('00:00');
    expect(formatCountdown(65)).toBe('01:05');
    expect(formatCountdown(660)).toBe('11:00');
  });

  it('does not wrap minutes into hours', () => {
    expect(formatCountdown(3600)).toBe('60:00');
  });

  it('treats negative values as zero', () => {
    expect(formatCountdown(-3)).toBe('00:00');
  });
});
