import { RENDER_DEFAULTS } from '../config.js';

export interface CaptionWord {
  text: string;
  start: number;
  end: number;
}

const MIN_WORD_SECONDS = 0.001;

export const round3 = (n: number): number => Math.round(n * 1000) / 1000;

/** Numbers and numeric strings → seconds rounded to the millisecond; anything else → null. */
export function coerceTime(value: unknown): number | null {
  let numeric: number | null = null;
  if (typeof value === 'number') numeric = value;
  else if (typeof value === 'string' && value.trim() !== '') numeric = Number(value);
  return numeric !== null && Number.isFinite(numeric) ? round3(numeric) : null;
}

/**
 * Approximate word timings by spreading the whitespace-separated tokens evenly
 * over `duration`, or over 0.4 s per word when no positive duration is known.
 */
export function fallbackWordsFromText(text: string, duration: number | null): CaptionWord[] {
  const tokens = text.split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return [];
  const total = duration !== null && duration > 0 ? duration : tokens.length * RENDER_DEFAULTS.secondsPerWord;
  const slice = total / tokens.length;
  return tokens.map((token, idx) => {
    const start = round3(idx * slice);
    const end = Math.max(round3(start + slice), round3(start + MIN_WORD_SECONDS));
    return { text: token, start, end };
  });
}

function tokenOf(raw: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return '';
}

/**
 * Normalise a list of loosely-shaped word entries. Missing starts continue
 * from the previous word; missing or non-increasing ends get `defaultLength`.
 */
export function normalizeWordEntries(
  payload: unknown,
  opts: { tokenKeys: readonly string[]; defaultLength: number },
): CaptionWord[] {
  if (!Array.isArray(payload)) return [];
  const words: CaptionWord[] = [];
  let previousEnd: number | null = null;
  for (const raw of payload) {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) continue;
    const entry: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
    const text = tokenOf(entry, opts.tokenKeys);
    if (!text) continue;
    const start = coerceTime(entry['start']) ?? previousEnd ?? 0;
    let end = coerceTime(entry['end']);
    if (end === null || end <= start) end = round3(start + opts.defaultLength);
    words.push({ text, start, end });
    previousEnd = end;
  }
  return words;
}

/**
 * Normalise caption data as scenes carry it: either an array of words or
 * `{ words: [...] }`, with 0.4 s default word length. Sorted by start.
 */
export function normalizeCaptionPayload(captions: unknown): CaptionWord[] {
  let payload: unknown = captions;
  if (typeof captions === 'object' && captions !== null && !Array.isArray(captions) && 'words' in captions) {
    payload = captions.words;
  }
  return normalizeWordEntries(payload, {
    tokenKeys: ['text', 'word', 'token'],
    defaultLength: RENDER_DEFAULTS.secondsPerWord,
  }).sort((a, b) => a.start - b.start);
}
