import { describe, it, expect } from 'vitest';
import {
  buildAssDocument,
  formatAssTime,
  normalizeAssColor,
  overrideColor,
  sanitizeAssText,
  wrapWithTags,
} from './ass.js';
import { STYLE_PRESETS } from './presets.js';

describe('formatAssTime', () => {
  it('formats hours, minutes, seconds and truncated centiseconds', () => {
    expect(formatAssTime(3_723_456)).toBe('1:02:03.45');
    expect(formatAssTime(999)).toBe('0:00:00.99');
  });

  it('clamps negative values to zero', () => {
    expect(formatAssTime(-5)).toBe('0:00:00.00');
  });
});

describe('sanitizeAssText', () => {
  it('drops control characters and escapes override syntax', () => {
    expect(sanitizeAssText('a\u0007{b}\\c\r\nd')).toBe('a{{b}}\\\\c\\Nd');
  });

  it('returns an empty string for empty input', () => {
    expect(sanitizeAssText('')).toBe('');
  });
});

describe('colours', () => {
  it('normalises short and terminated &H values', () => {
    expect(normalizeAssColor('&h00ddff')).toBe('&H0000DDFF');
    expect(normalizeAssColor('&H00FF00&')).toBe('&H0000FF00');
  });

  it('rejects values that are not &H colours', () => {
    expect(normalizeAssColor('red')).toBeNull();
    expect(normalizeAssColor('&HZZ')).toBeNull();
    expect(normalizeAssColor(undefined)).toBeNull();
  });

  it('builds an inline override without alpha', () => {
    expect(overrideColor('&H009D55FF')).toBe('&H9D55FF&');
    expect(overrideColor('nope')).toBeNull();
  });
});

describe('wrapWithTags', () => {
  it('keeps only backslash tags', () => {
    expect(wrapWithTags('hi', ['\\bord1', 'bad', ' \\shad0 '])).toBe('{\\bord1\\shad0}hi');
  });

  it('leaves text untouched without tags', () => {
    expect(wrapWithTags('hi', [])).toBe('hi');
    expect(wrapWithTags('', ['\\bord1'])).toBe('');
  });
});

describe('buildAssDocument', () => {
  it('writes script info, the style and one dialogue line per event', () => {
    const doc = buildAssDocument({
      style: STYLE_PRESETS['Classic Clean'],
      resolution: { width: 1920, height: 1080 },
      events: [{ start: 0, end: 1500, text: 'Hi' }],
    });
    const lines = doc.split('\n');

    expect(doc.endsWith('\n')).toBe(true);
    expect(lines[0]).toBe('[Script Info]');
    expect(lines).toContain('PlayResX: 1920');
    expect(lines).toContain('PlayResY: 1080');
    expect(lines).toContain(
      'Style: ClassicClean,Arial,40,&H00FFFFFF,&H00FFFFFF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,1,2,80,80,60,1',
    );
    expect(lines[lines.length - 2]).toBe('Dialogue: 0,0:00:00.00,0:00:01.50,ClassicClean,,0,0,0,,Hi');
  });
});
