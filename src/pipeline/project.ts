/**
 * Render request payload — validation, normalisation and scene ordering.
 */
import { z } from 'zod';
import { resolveOrientation, type Orientation } from '../config.js';
import { coerceTime, normalizeCaptionPayload, type CaptionWord } from '../captions/words.js';

// ── Schemas ───────────────────────────────────────────────────────────────────

const optionalText = z.string().nullish().transform((v) => v ?? null);

export const SceneSchema = z.object({
  id:            z.union([z.string(), z.number()]).nullish(),
  order:         z.unknown(),
  script:        optionalText,
  text:          optionalText,
  ttsVoice:      optionalText,
  media:         z.object({ url: optionalText }).passthrough().nullish().catch(null),
  keywords:      z.array(z.string()).catch([]).default([]),
  audioDuration: z.unknown(),
  duration:      z.unknown(),
  captions:      z.unknown(),
}).passthrough();

export const ProjectPayloadSchema = z.object({
  id:           z.union([z.string(), z.number()]).nullish().transform((v) => (v == null || v === '' ? null : String(v))),
  scenes:       z.array(SceneSchema).default([]),
  format:       z.unknown(),
  voiceModel:   optionalText,
  captionStyle: optionalText,
}).passthrough();

// ── Normalised model ──────────────────────────────────────────────────────────

export interface SceneSpec {
  /** Position in the submitted list. */
  index: number;
  /** Declared order, or null when absent or not numeric. */
  order: number | null;
  label: string;
  text: string;
  voice: string | null;
  mediaUrl: string | null;
  keywords: string[];
  declaredDuration: number | null;
  /** Caption words supplied with the request, if any. */
  captions: CaptionWord[];
}

export interface RenderProject {
  projectId: string | null;
  orientation: Orientation;
  voiceModel: string | null;
  captionStyle: string | null;
  scenes: SceneSpec[];
}

/** Finite numbers and numeric strings; anything else is no order. */
export function declaredOrder(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Validate a raw request body. Throws a ZodError when the top-level shape is
 * wrong; individual scene fields are coerced leniently.
 */
export function parseProject(raw: unknown): RenderProject {
  const payload = ProjectPayloadSchema.parse(raw);
  return {
    projectId:    payload.id,
    orientation:  resolveOrientation(payload.format),
    voiceModel:   payload.voiceModel,
    captionStyle: payload.captionStyle,
    scenes: payload.scenes.map((scene, index) => ({
      index,
      order:            declaredOrder(scene.order),
      label:            scene.id != null ? String(scene.id) : `scene_${String(index + 1).padStart(3, '0')}`,
      text:             scene.script || scene.text || '',
      voice:            scene.ttsVoice,
      mediaUrl:         scene.media?.url || null,
      keywords:         scene.keywords,
      declaredDuration: coerceTime(scene.audioDuration) ?? coerceTime(scene.duration),
      captions:         normalizeCaptionPayload(scene.captions),
    })),
  };
}

/**
 * Stable sort by declared order. Scenes without one sort by their submission
 * index; equal keys keep submission order.
 */
export function orderScenes<T extends { index: number; order: number | null }>(scenes: readonly T[]): T[] {
  return [...scenes].sort((a, b) => {
    const ka = a.order ?? a.index;
    const kb = b.order ?? b.index;
    return ka - kb || a.index - b.index;
  });
}
