/**
 * Caption style presets. Colours use ASS &HAABBGGRR notation.
 */

export type CaptionMode = 'word' | 'line';

export interface CaptionStyleDefinition {
  styleName: string;
  mode: CaptionMode;
  fontName: string;
  fontSize: number;
  primary: string;
  secondary?: string;
  outlineColor: string;
  backColor?: string;
  /** 1 = outline + shadow, 3 = opaque box */
  borderStyle: 1 | 3;
  outline: number;
  shadow: number;
  marginV: number;
  marginH: number;
  bold: boolean;
  spacing: number;
  karaoke: boolean;
  maxWordsPerLine: number;
  uppercase: boolean;
  wordColorCycle: readonly string[];
  wordTags: readonly string[];
  lineTags: readonly string[];
}

const base = {
  secondary:       undefined,
  backColor:       undefined,
  bold:            false,
  spacing:         0,
  karaoke:         false,
  maxWordsPerLine: 8,
  uppercase:       false,
  wordColorCycle:  [],
  wordTags:        [],
  lineTags:        [],
} satisfies Partial<CaptionStyleDefinition>;

export const STYLE_PRESETS = {
  'Classic Clean': {
    ...base,
    styleName:       'ClassicClean',
    mode:            'line',
    fontName:        'Arial',
    fontSize:        40,
    primary:         '&H00FFFFFF',
    secondary:       '&H00FFFFFF',
    outlineColor:    '&H00000000',
    borderStyle:     1,
    outline:         2,
    shadow:          1,
    marginV:         60,
    marginH:         80,
    maxWordsPerLine: 10,
  },
  'Kinetic Pop': {
    ...base,
    styleName:       'KineticPop',
    mode:            'word',
    fontName:        'Impact',
    fontSize:        52,
    primary:         '&H0000DDFF',
    secondary:       '&H0000DDFF',
    outlineColor:    '&H00000000',
    borderStyle:     1,
    outline:         4,
    shadow:          0,
    marginV:         84,
    marginH:         90,
    bold:            true,
    maxWordsPerLine: 1,
    spacing:         1.8,
    uppercase:       true,
    wordColorCycle:  ['&H0000DDFF', '&H00FFC600', '&H009D55FF'],
    wordTags:        ['\\bord7', '\\shad0', '\\fscx112', '\\fscy110'],
  },
  'Highlight Bar': {
    ...base,
    styleName:       'HighlightBar',
    mode:            'line',
    fontName:        'Helvetica Neue Bold',
    fontSize:        42,
    primary:         '&H0060FFE8',
    secondary:       '&H0000D5FF',
    outlineColor:    '&H00000000',
    backColor:       '&H99000000',
    borderStyle:     3,
    outline:         1,
    shadow:          0,
    marginV:         70,
    marginH:         90,
    karaoke:         true,
    maxWordsPerLine: 9,
    uppercase:       true,
    lineTags:        ['\\bord0', '\\shad0'],
  },
  'Outline Glow': {
    ...base,
    styleName:       'OutlineGlow',
    mode:            'word',
    fontName:        'Arial Black',
    fontSize:        48,
    primary:         '&H00E4FDFF',
    secondary:       '&H00E4FDFF',
    outlineColor:    '&H007D3DFF',
    borderStyle:     1,
    outline:         5,
    shadow:          0,
    marginV:         80,
    marginH:         100,
    bold:            true,
    spacing:         0.6,
    uppercase:       true,
    maxWordsPerLine: 1,
    wordColorCycle:  ['&H008040FF', '&H00FFFFFF'],
    wordTags:        ['\\bord6', '\\blur4'],
  },
  'Subtitle Boxed': {
    ...base,
    styleName:       'SubtitleBoxed',
    mode:            'line',
    fontName:        'Gill Sans Bold',
    fontSize:        44,
    primary:         '&H00F5F5F5',
    secondary:       '&H003CFFE0',
    outlineColor:    '&H00000000',
    backColor:       '&HB0000000',
    borderStyle:     3,
    outline:         0,
    shadow:          0,
    marginV:         64,
    marginH:         85,
    karaoke:         true,
    maxWordsPerLine: 9,
    bold:            true,
    uppercase:       true,
    lineTags:        ['\\bord0', '\\shad0'],
  },
  'Simple Minimal': {
    ...base,
    styleName:       'SimpleMinimal',
    mode:            'line',
    fontName:        'Helvetica Neue',
    fontSize:        36,
    primary:         '&H00F5F5F5',
    secondary:       '&H00F5F5F5',
    outlineColor:    '&H00202020',
    borderStyle:     1,
    outline:         1,
    shadow:          0.4,
    marginV:         70,
    marginH:         90,
    maxWordsPerLine: 10,
    spacing:         0.4,
    lineTags:        ['\\bord1', '\\shad0'],
  },
} as const satisfies Record<string, CaptionStyleDefinition>;

export type CaptionStyleKey = keyof typeof STYLE_PRESETS;

export const DEFAULT_CAPTION_STYLE: CaptionStyleKey = 'Classic Clean';

const slug = (s: string) => s.toLowerCase().replace(/[^a-z0-9]+/g, '');

const isStyleKey = (s: string): s is CaptionStyleKey => Object.hasOwn(STYLE_PRESETS, s);

const KEY_LOOKUP = new Map<string, CaptionStyleKey>();
const SLUG_LOOKUP = new Map<string, CaptionStyleKey>();

for (const [key, def] of Object.entries(STYLE_PRESETS)) {
  if (!isStyleKey(key)) continue;
  KEY_LOOKUP.set(key.toLowerCase(), key);
  KEY_LOOKUP.set(def.styleName.toLowerCase(), key);
  if (!SLUG_LOOKUP.has(slug(key))) SLUG_LOOKUP.set(slug(key), key);
  if (!SLUG_LOOKUP.has(slug(def.styleName))) SLUG_LOOKUP.set(slug(def.styleName), key);
}

/**
 * Resolve a user-supplied style name: exact display name, then
 * case-insensitive display or style name, then alphanumeric slug.
 * Anything else resolves to the default preset.
 */
export function resolveCaptionStyle(name: string | null | undefined): CaptionStyleKey {
  const token = (name ?? '').trim();
  if (!token) return DEFAULT_CAPTION_STYLE;
  if (isStyleKey(token)) return token;
  return KEY_LOOKUP.get(token.toLowerCase()) ?? SLUG_LOOKUP.get(slug(token)) ?? DEFAULT_CAPTION_STYLE;
}

export function getCaptionStyle(name: string | null | undefined): CaptionStyleDefinition {
  return STYLE_PRESETS[resolveCaptionStyle(name)];
}
