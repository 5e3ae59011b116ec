/**
 * Word-level caption timing from OpenAI Whisper.
 */
import * as fs from 'fs';
import OpenAI from 'openai';
import { z } from 'zod';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { CaptionTimingError } from '../pipeline/errors.js';
import { fallbackWordsFromText, normalizeWordEntries, type CaptionWord } from '../captions/words.js';

/** Best-effort: failures surface as CaptionTimingError. */
export type CaptionTimer = (audioPath: string, referenceText: string) => Promise<CaptionWord[]>;

const WHISPER_DEFAULT_WORD_SECONDS = 0.2;

const VerboseTranscriptSchema = z.object({
  text:     z.string().optional(),
  words:    z.array(z.unknown()).optional(),
  segments: z.array(z.object({ end: z.coerce.number().optional() }).passthrough()).optional(),
});

/** Whisper word entries → CaptionWords, in the order given. */
export function normalizeWhisperWords(payload: unknown): CaptionWord[] {
  return normalizeWordEntries(payload, {
    tokenKeys: ['word', 'text', 'token'],
    defaultLength: WHISPER_DEFAULT_WORD_SECONDS,
  });
}

/**
 * Words from a verbose transcript. When no word timings came back, the
 * recognised text (or the reference text) is spread over the last segment end.
 */
export function wordsFromTranscript(raw: unknown, referenceText: string): CaptionWord[] {
  const parsed = VerboseTranscriptSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CaptionTimingError(`Unexpected transcription payload: ${parsed.error.message}`);
  }
  const { text, words, segments } = parsed.data;

  const normalized = normalizeWhisperWords(words);
  if (normalized.length) return normalized;

  const segmentEnds = (segments ?? [])
    .map((s) => s.end)
    .filter((end): end is number => end !== undefined && Number.isFinite(end));
  const duration = segmentEnds.length ? Math.max(...segmentEnds) : null;
  return fallbackWordsFromText(text || referenceText, duration);
}

let _openai: OpenAI | null = null;

function getOpenAI(): OpenAI {
  if (!env.OPENAI_API_KEY) throw new CaptionTimingError('OPENAI_API_KEY is not set — cannot time captions');
  if (!_openai) _openai = new OpenAI({ apiKey: env.OPENAI_API_KEY });
  return _openai;
}

export const transcribeWordTimings: CaptionTimer = async (audioPath, referenceText) => {
  if (!fs.existsSync(audioPath)) {
    throw new CaptionTimingError(`Audio file not found: ${audioPath}`);
  }
  logger.info('Transcribe: requesting word timings', { audioPath });

  let raw: unknown;
  try {
    raw = await getOpenAI().audio.transcriptions.create({
      model:                   env.OPENAI_TRANSCRIBE_MODEL,
      file:                    fs.createReadStream(audioPath),
      response_format:         'verbose_json',
      timestamp_granularities: ['word'],
    });
  } catch (err) {
    throw new CaptionTimingError(`Transcription failed for ${audioPath}`, { cause: err });
  }

  const words = wordsFromTranscript(raw, referenceText);
  logger.info('Transcribe: word timings ready', { audioPath, words: words.length });
  return words;
};
