/**
 * Narration synthesis — OpenAI speech, cached per (voice profile, text).
 *
 * Only used by pipeline/producer.ts through the NarrationSynthesizer seam.
 */
import * as fs from 'fs';
import * as path from 'path';
import OpenAI from 'openai';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { hashString } from '../utils/hash.js';
import { NonRetryableError, withRetry } from '../utils/retry.js';
import { probeDuration, writeSilence } from '../media/ffmpeg.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Narration {
  audioPath: string;
  durationSeconds: number;
}

/** Produces a playable narration file or throws. */
export type NarrationSynthesizer = (text: string, voiceId: string | null) => Promise<Narration>;

type SpeechVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

// ── Voice profiles ────────────────────────────────────────────────────────────

export const VOICE_PROFILES: Record<string, SpeechVoice> = {
  documentary:   'onyx',
  news:          'echo',
  entertainment: 'nova',
  satire:        'fable',
  serious:       'onyx',
  corporate:     'alloy',
  kids:          'shimmer',
  tech:          'echo',
  motivational:  'nova',
};

export const DEFAULT_VOICE_PROFILE = 'documentary';

const SPEECH_VOICES = new Set<string>(['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer']);

const isSpeechVoice = (v: string): v is SpeechVoice => SPEECH_VOICES.has(v);

/**
 * Map a voice id to a profile name. Profile names and raw speech voice names
 * are accepted (case-insensitive); a profile name contained in the id also
 * matches. Anything else is the documentary profile.
 */
export function normalizeVoiceProfile(voiceId: string | null | undefined): string {
  const key = (voiceId ?? '').trim().toLowerCase();
  if (!key) return DEFAULT_VOICE_PROFILE;
  if (Object.hasOwn(VOICE_PROFILES, key) || isSpeechVoice(key)) return key;
  return Object.keys(VOICE_PROFILES).find((profile) => key.includes(profile)) ?? DEFAULT_VOICE_PROFILE;
}

function speechVoiceFor(profile: string): SpeechVoice {
  if (isSpeechVoice(profile)) return profile;
  return VOICE_PROFILES[profile] ?? 'onyx';
}

/** Rough spoken length: 2.5 words per second, never under two seconds. */
export function estimateNarrationSeconds(text: string): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.max(2, words / 2.5);
}

export function narrationCacheKey(text: string, profile: string): string {
  return hashString(`${profile}::${text}`);
}

// ── Synthesizer ───────────────────────────────────────────────────────────────

const SPEECH_ATTEMPTS = 2;

let _openai: OpenAI | null = null;

function getOpenAI(): OpenAI {
  if (!env.OPENAI_API_KEY) throw new NonRetryableError('OPENAI_API_KEY is not set — cannot synthesize narration');
  if (!_openai) _openai = new OpenAI({ apiKey: env.OPENAI_API_KEY });
  return _openai;
}

/** Audio tooling the narrator shells out to. */
export interface NarratorMedia {
  probeDuration: (audioPath: string) => Promise<number | null>;
  writeSilence: (outputPath: string, seconds: number) => Promise<void>;
}

const FFMPEG_MEDIA: NarratorMedia = { probeDuration, writeSilence };

export function createOpenAiNarrator(cacheDir: string, media: NarratorMedia = FFMPEG_MEDIA): NarrationSynthesizer {
  fs.mkdirSync(cacheDir, { recursive: true });

  const measure = async (audioPath: string, text: string): Promise<number> => {
    const seconds = (await media.probeDuration(audioPath)) ?? estimateNarrationSeconds(text);
    return Math.round(seconds * 100) / 100;
  };

  return async (rawText, voiceId) => {
    const text = rawText.length > env.TTS_MAX_CHARS ? rawText.slice(0, env.TTS_MAX_CHARS) : rawText;
    if (text !== rawText) {
      logger.warn('Voice: narration text truncated', { from: rawText.length, to: text.length });
    }

    const profile = normalizeVoiceProfile(voiceId);
    const silent = !text.trim();
    // speech comes back as MP3; silence is written as PCM, which needs a WAV container
    const audioPath = path.join(cacheDir, `${narrationCacheKey(text, profile)}.${silent ? 'wav' : 'mp3'}`);

    if (fs.existsSync(audioPath)) {
      logger.debug('Voice: cached narration used', { audioPath });
      return { audioPath, durationSeconds: await measure(audioPath, text) };
    }

    if (silent) {
      const seconds = estimateNarrationSeconds(text);
      await media.writeSilence(audioPath, seconds);
      return { audioPath, durationSeconds: seconds };
    }

    logger.info('Voice: synthesizing narration', { profile, chars: text.length });
    const bytes = await withRetry(async () => {
      const res = await getOpenAI().audio.speech.create({
        model:           env.OPENAI_TTS_MODEL,
        voice:           speechVoiceFor(profile),
        input:           text,
        response_format: 'mp3',
      });
      return Buffer.from(await res.arrayBuffer());
    }, { maxAttempts: SPEECH_ATTEMPTS, label: 'speech synthesis' });
    const tmp = `${audioPath}.${process.pid}.part`;
    fs.writeFileSync(tmp, bytes);
    fs.renameSync(tmp, audioPath);

    return { audioPath, durationSeconds: await measure(audioPath, text) };
  };
}
