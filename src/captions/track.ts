/**
 * Subtitle track builder — turns per-scene caption words into one ASS track on
 * the whole-video timeline.
 *
 * Each scene's words are shifted by the running timeline offset, which then
 * advances by the scene's authoritative duration (declared duration or last
 * word end, whichever is greater). Scenes without words get approximate
 * timings spread over their narration text.
 */
import * as fs from 'fs';
import * as path from 'path';
import { RENDER_DEFAULTS, TARGET_RESOLUTIONS, type Orientation } from '../config.js';
import { logger } from '../utils/logger.js';
import { buildAssDocument, overrideColor, sanitizeAssText, wrapWithTags, type AssEvent } from './ass.js';
import { getCaptionStyle, resolveCaptionStyle, STYLE_PRESETS, type CaptionMode, type CaptionStyleDefinition } from './presets.js';
import { fallbackWordsFromText, round3, type CaptionWord } from './words.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface CaptionScene {
  text: string;
  /** Declared scene length in seconds (narration duration), when known. */
  duration: number | null;
  captions: readonly CaptionWord[];
}

/** Renders one scene's absolute-timed words; `state` carries across scenes. */
type SceneRenderer = (words: readonly CaptionWord[], state: { wordIndex: number }) => AssEvent[];

// ── Text helpers ──────────────────────────────────────────────────────────────

const NO_SPACE_BEFORE = new Set([',', '.', '!', '?', ':', ';', ')', ']', '}', '»', '”', '′']);

function transformToken(text: string, style: CaptionStyleDefinition): string {
  return sanitizeAssText(style.uppercase ? text.toUpperCase() : text);
}

export function requiresSpace(nextText: string | undefined): boolean {
  const next = (nextText ?? '').trim();
  if (!next) return false;
  return !NO_SPACE_BEFORE.has(next.charAt(0));
}

const toMs = (seconds: number) => Math.max(0, Math.round(seconds * 1000));

function timedEvent(start: number, end: number, text: string): AssEvent {
  const startMs = toMs(start);
  let endMs = Math.round(end * 1000);
  if (endMs <= startMs) endMs = startMs + 1;
  return { start: startMs, end: endMs, text };
}

/**
 * Close a line at max words, at a sentence end, or at a clause break once the
 * line is at least half full.
 */
export function groupWordsIntoLines(words: readonly CaptionWord[], maxWords: number): CaptionWord[][] {
  const lines: CaptionWord[][] = [];
  let current: CaptionWord[] = [];
  const half = Math.floor(maxWords / 2);
  for (const word of words) {
    current.push(word);
    const token = word.text.trim();
    const sentenceEnd = /[.!?]$/.test(token);
    const clauseBreak = /[;:]$/.test(token);
    if (current.length >= maxWords || sentenceEnd || (clauseBreak && current.length >= half)) {
      lines.push(current);
      current = [];
    }
  }
  if (current.length) lines.push(current);
  return lines;
}

export function buildPlainLine(words: readonly CaptionWord[], style: CaptionStyleDefinition): string {
  const pieces: string[] = [];
  words.forEach((word, idx) => {
    const token = transformToken(word.text, style);
    if (!token) return;
    pieces.push(token);
    if (requiresSpace(words[idx + 1]?.text)) pieces.push(' ');
  });
  return pieces.join('').trim();
}

/** Each word gets a `\k` reveal duration in centiseconds; spaces are hard (`\h`). */
export function buildKaraokeLine(words: readonly CaptionWord[], style: CaptionStyleDefinition): string {
  const fragments: string[] = [];
  words.forEach((word, idx) => {
    const token = transformToken(word.text, style);
    if (!token) return;
    const centiseconds = Math.max(1, Math.round(Math.max(word.end - word.start, 0.01) * 100));
    fragments.push(`{\\k${centiseconds}}${token}`);
    if (requiresSpace(words[idx + 1]?.text)) fragments.push('\\h');
  });
  return fragments.join('');
}

// ── Renderers ─────────────────────────────────────────────────────────────────

const RENDERERS: Record<CaptionMode, (style: CaptionStyleDefinition) => SceneRenderer> = {
  word: (style) => (words, state) => {
    const events: AssEvent[] = [];
    const cycle = style.wordColorCycle;
    for (const word of words) {
      const text = transformToken(word.text, style);
      if (!text) continue;
      const tags = [...style.wordTags];
      if (cycle.length) {
        const color = overrideColor(cycle[state.wordIndex % cycle.length]);
        if (color) tags.push(`\\1c${color}`);
      }
      events.push(timedEvent(word.start, word.end, wrapWithTags(text, tags)));
      state.wordIndex++;
    }
    return events;
  },

  line: (style) => {
    const buildLine = style.karaoke ? buildKaraokeLine : buildPlainLine;
    return (words) => {
      const events: AssEvent[] = [];
      for (const line of groupWordsIntoLines(words, style.maxWordsPerLine)) {
        const body = buildLine(line, style);
        if (!body) continue;
        const start = Math.min(...line.map((w) => w.start));
        const end = Math.max(...line.map((w) => w.end)) + RENDER_DEFAULTS.linePadSeconds;
        events.push(timedEvent(start, end, wrapWithTags(body, style.lineTags)));
      }
      return events;
    };
  },
};

// ── Public API ─────────────────────────────────────────────────────────────────

/** Authoritative scene length: the greater of declared duration and last word end. */
export function sceneDuration(scene: CaptionScene, words: readonly CaptionWord[]): number {
  const lastEnd = words.reduce((max, w) => Math.max(max, w.end), 0);
  const declared = scene.duration ?? 0;
  return Math.max(0, round3(Math.max(declared, lastEnd)));
}

/** Timeline-absolute subtitle events for the ordered scenes, sorted by (start, end). */
export function buildSubtitleEvents(
  scenes: readonly CaptionScene[],
  styleName: string | null | undefined,
): AssEvent[] {
  const style: CaptionStyleDefinition = getCaptionStyle(styleName);
  const render = RENDERERS[style.mode](style);
  const state = { wordIndex: 0 };
  const events: AssEvent[] = [];

  let offset = 0;
  for (const scene of scenes) {
    const local = scene.captions.length ? scene.captions : fallbackWordsFromText(scene.text, scene.duration);
    const absolute = local.map((w) => ({
      text: w.text,
      start: round3(w.start + offset),
      end: round3(w.end + offset),
    }));
    events.push(...render(absolute, state));
    offset = round3(offset + sceneDuration(scene, local));
  }

  return events.sort((a, b) => a.start - b.start || a.end - b.end);
}

/**
 * Write the subtitle track for the ordered scenes to outputPath.
 * Returns null (and removes any stale file) when no events were produced.
 */
export function writeSubtitleTrack(
  scenes: readonly CaptionScene[],
  styleName: string | null | undefined,
  orientation: Orientation,
  outputPath: string,
): string | null {
  const styleKey = resolveCaptionStyle(styleName);
  if (styleName && styleName !== styleKey) {
    logger.info('Subtitles: resolved caption style', { requested: styleName, preset: styleKey });
  }

  const events = buildSubtitleEvents(scenes, styleKey);
  if (events.length === 0) {
    logger.info('Subtitles: no caption events — skipping track', { outputPath });
    fs.rmSync(outputPath, { force: true });
    return null;
  }

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const document = buildAssDocument({
    style: STYLE_PRESETS[styleKey],
    resolution: TARGET_RESOLUTIONS[orientation],
    events,
  });
  fs.writeFileSync(outputPath, document, 'utf-8');
  logger.info('Subtitles: track written', { outputPath, events: events.length, style: styleKey });
  return outputPath;
}
