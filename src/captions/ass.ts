/**
 * Advanced SubStation Alpha (ASS) document writer.
 */
import type { CaptionStyleDefinition } from './presets.js';

export interface AssEvent {
  /** milliseconds */
  start: number;
  end: number;
  text: string;
}

const DEFAULT_COLORS = {
  primary:   '&H00FFFFFF',
  secondary: '&H000000FF',
  outline:   '&H00000000',
  back:      '&H00000000',
} as const;

const BOTTOM_CENTER = 2;

/** Normalise to &HAABBGGRR; null when the value is not an &H colour. */
export function normalizeAssColor(value: string | undefined): string | null {
  if (!value) return null;
  const token = value.trim().toUpperCase();
  if (!token.startsWith('&H')) return null;
  const hex = token.slice(2).replace(/&$/, '').slice(-8).padStart(8, '0');
  return /^[0-9A-F]{8}$/.test(hex) ? `&H${hex}` : null;
}

/** Inline override colour (&HBBGGRR&); alpha stays with the style. */
export function overrideColor(value: string | undefined): string | null {
  const normalized = normalizeAssColor(value);
  return normalized ? `&H${normalized.slice(-6)}&` : null;
}

/** H:MM:SS.cc — centiseconds are truncated, not rounded. */
export function formatAssTime(ms: number): string {
  let rest = Math.max(0, Math.round(ms));
  const h = Math.floor(rest / 3_600_000);
  rest -= h * 3_600_000;
  const m = Math.floor(rest / 60_000);
  rest -= m * 60_000;
  const s = Math.floor(rest / 1_000);
  rest -= s * 1_000;
  const cs = Math.floor(rest / 10);
  const pad2 = (n: number) => String(n).padStart(2, '0');
  return `${h}:${pad2(m)}:${pad2(s)}.${pad2(cs)}`;
}

/**
 * Make raw text safe inside a Dialogue line: control characters dropped,
 * backslashes and braces doubled, newlines turned into \N.
 */
export function sanitizeAssText(text: string): string {
  if (!text) return '';
  return text
    .replace(/\p{C}/gu, (ch) => (ch === '\t' || ch === '\n' || ch === '\r' ? ch : ''))
    .replace(/\\/g, '\\\\')
    .replace(/\{/g, '{{')
    .replace(/\}/g, '}}')
    .replace(/\r/g, '')
    .replace(/\n/g, '\\N');
}

/** Prefix text with an override block built from tags that start with a backslash. */
export function wrapWithTags(text: string, tags: readonly string[]): string {
  if (!text) return '';
  const filtered = tags.map((t) => t.trim()).filter((t) => t.startsWith('\\'));
  return filtered.length ? `{${filtered.join('')}}${text}` : text;
}

function styleLine(style: CaptionStyleDefinition): string {
  const fields = [
    style.styleName,
    style.fontName,
    style.fontSize,
    normalizeAssColor(style.primary) ?? DEFAULT_COLORS.primary,
    normalizeAssColor(style.secondary) ?? DEFAULT_COLORS.secondary,
    normalizeAssColor(style.outlineColor) ?? DEFAULT_COLORS.outline,
    normalizeAssColor(style.backColor) ?? DEFAULT_COLORS.back,
    style.bold ? -1 : 0,
    0, 0, 0,           // italic, underline, strikeout
    100, 100,          // scale x/y
    style.spacing,
    0,                 // angle
    style.borderStyle,
    style.outline,
    style.shadow,
    BOTTOM_CENTER,
    style.marginH,
    style.marginH,
    style.marginV,
    1,                 // encoding
  ];
  return `Style: ${fields.join(',')}`;
}

export function buildAssDocument(opts: {
  style: CaptionStyleDefinition;
  resolution: { width: number; height: number };
  events: readonly AssEvent[];
}): string {
  const { style, resolution, events } = opts;
  const lines = [
    '[Script Info]',
    'ScriptType: v4.00+',
    `PlayResX: ${resolution.width}`,
    `PlayResY: ${resolution.height}`,
    'WrapStyle: 0',
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, ' +
      'Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, ' +
      'Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
    styleLine(style),
    '',
    '[Events]',
    'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
    ...events.map(
      (e) => `Dialogue: 0,${formatAssTime(e.start)},${formatAssTime(e.end)},${style.styleName},,0,0,0,,${e.text}`,
    ),
  ];
  return lines.join('\n') + '\n';
}
