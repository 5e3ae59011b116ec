import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const optionalString = z.string().min(1).optional();

const EnvSchema = z.object({
  // Local storage
  OUTPUT_DIR:                    z.string().default('./outputs'),
  PUBLIC_VIDEO_BASE:             z.string().default('/videos'),

  // Render throughput
  SCENE_WORKERS:                 z.coerce.number().int().min(1).default(4),

  // Media tooling
  FFMPEG_PATH:                   z.string().default('ffmpeg'),
  FFPROBE_PATH:                  z.string().default('ffprobe'),
  MEDIA_FETCH_TIMEOUT_MS:        z.coerce.number().int().positive().default(30_000),
  MEDIA_FETCH_ATTEMPTS:          z.coerce.number().int().min(1).default(2),

  // Narration / caption timing (OpenAI)
  OPENAI_API_KEY:                optionalString,
  OPENAI_TTS_MODEL:              z.string().default('tts-1'),
  OPENAI_TRANSCRIBE_MODEL:       z.string().default('whisper-1'),
  TTS_MAX_CHARS:                 z.coerce.number().int().positive().default(4_000),

  // Durable job mirror (optional — local files only when unset)
  SUPABASE_URL:                  z.string().url().optional(),
  SUPABASE_SERVICE_KEY:          optionalString,

  // Video CDN (optional — locally served URLs when unset)
  CLOUDINARY_CLOUD_NAME:         optionalString,
  CLOUDINARY_API_KEY:            optionalString,
  CLOUDINARY_API_SECRET:         optionalString,
  CLOUDINARY_FOLDER:             z.string().default('renders'),

  // Notifications (optional)
  TELEGRAM_BOT_TOKEN:            optionalString,
  TELEGRAM_CHAT_ID:              optionalString,

  // Scratch retention
  SCRATCH_RETENTION_DAYS:        z.coerce.number().min(0).default(3),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

// blank assignments in .env count as unset
const rawEnv = Object.fromEntries(Object.entries(process.env).filter(([, v]) => v !== ''));

const parsed = EnvSchema.safeParse(rawEnv);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

export type Env = z.infer<typeof EnvSchema>;

// ── Domain Types ─────────────────────────────────────────────────────────────

export type Orientation = 'landscape' | 'portrait' | 'square';

// ── Output Geometry ───────────────────────────────────────────────────────────

export const TARGET_RESOLUTIONS: Record<Orientation, { width: number; height: number }> = {
  landscape: { width: 1920, height: 1080 },
  portrait:  { width: 1080, height: 1920 },
  square:    { width: 1080, height: 1080 },
};

export const FRAME_RATE = 30;

export function resolveOrientation(value: unknown): Orientation {
  return value === 'portrait' || value === 'square' ? value : 'landscape';
}

// ── Render Defaults ───────────────────────────────────────────────────────────

export const RENDER_DEFAULTS = {
  sceneDurationSeconds: 3.0,   // used when neither audio nor scene carries a duration
  minSceneSeconds:      0.1,
  backgroundColor:      '0x141414',
  secondsPerWord:       0.4,   // fallback caption pacing when duration is unknown
  linePadSeconds:       0.05,
} as const;

// ── Storage Retention ─────────────────────────────────────────────────────────

export const STORAGE_RETENTION = {
  scratchDays: env.SCRATCH_RETENTION_DAYS,
  purgeCron:   '30 3 * * *',
} as const;

// ── Feature Availability ──────────────────────────────────────────────────────

export const FEATURES = {
  supabase:   Boolean(env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY),
  cloudinary: Boolean(env.CLOUDINARY_CLOUD_NAME && env.CLOUDINARY_API_KEY && env.CLOUDINARY_API_SECRET),
  telegram:   Boolean(env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID),
} as const;
