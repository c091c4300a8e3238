import { z } from 'zod';
import {
  ConfigurationError,
  CONTENT_STRUCTURES,
  CONTROVERSY_LEVELS,
  COMMENT_STYLES,
  CTA_STYLES,
  EMOJI_LEVELS,
  EMOTIONS,
  FORMALITY_LEVELS,
  HASHTAG_PLACEMENTS,
  HASHTAG_STRATEGIES,
  HOOK_STYLES,
  HUMOR_LEVELS,
  LINE_BREAK_STYLES,
  MEDIA_FORMATS,
  PARAGRAPH_LENGTHS,
  POSTING_TIMES,
  PRIMARY_GOALS,
  TONES,
  VULNERABILITY_LEVELS,
} from '@postcraft/shared';

/** A theme is a frozen persona: every axis is a closed enumeration and the
 * content mix must add up to 1.0 within ±0.05. */

const CONTENT_MIX_TOLERANCE = 0.05;

const weight = z.number().min(0).max(1);

export const ThemeSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().default(''),

    tone: z.enum(TONES),
    formality: z.enum(FORMALITY_LEVELS),
    emotion: z.enum(EMOTIONS),

    primaryGoal: z.enum(PRIMARY_GOALS),
    contentMix: z.object({
      educational: weight,
      personal: weight,
      promotional: weight,
    }),

    emojiLevel: z.enum(EMOJI_LEVELS),
    lineBreakStyle: z.enum(LINE_BREAK_STYLES),
    paragraphLength: z.enum(PARAGRAPH_LENGTHS),

    preferredStructures: z.array(z.enum(CONTENT_STRUCTURES)),
    hookStyle: z.enum(HOOK_STYLES),
    ctaStyle: z.enum(CTA_STYLES),

    hashtagStrategy: z.enum(HASHTAG_STRATEGIES),
    hashtagPlacement: z.enum(HASHTAG_PLACEMENTS),
    commentStyle: z.enum(COMMENT_STYLES),

    controversyLevel: z.enum(CONTROVERSY_LEVELS),
    vulnerabilityLevel: z.enum(VULNERABILITY_LEVELS),
    humorLevel: z.enum(HUMOR_LEVELS),

    preferredFormats: z.array(z.enum(MEDIA_FORMATS)),
    mediaFrequency: z.number().min(0).max(1),

    postFrequency: z.number().int().min(1).max(14),
    bestPostingTimes: z.array(z.enum(POSTING_TIMES)),
  })
  .refine(
    ({ contentMix: { educational, personal, promotional } }) =>
      // float sums like 0.5 + 0.25 + 0.2 land a hair outside the band
      Math.abs(educational + personal + promotional - 1) <= CONTENT_MIX_TOLERANCE + 1e-9,
    { message: `contentMix must sum to 1.0 (±${CONTENT_MIX_TOLERANCE})`, path: ['contentMix'] },
  );

export type ThemeInput = z.input<typeof ThemeSchema>;
export type ThemeFields = z.output<typeof ThemeSchema>;
export type Theme = Readonly<ThemeFields>;

/** Validate and freeze a theme. Throws ConfigurationError listing every issue. */
export function createTheme(fields: unknown): Theme {
  const result = ThemeSchema.safeParse(fields);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'theme'}: ${i.message}`);
    throw new ConfigurationError(`Invalid theme:\n${issues.map((i) => `  ${i}`).join('\n')}`, issues);
  }

  const theme = result.data;
  Object.freeze(theme.contentMix);
  Object.freeze(theme.preferredStructures);
  Object.freeze(theme.preferredFormats);
  Object.freeze(theme.bestPostingTimes);
  return Object.freeze(theme);
}

/** Registry key for a theme name: lower-cased, spaces to underscores */
export function themeKey(name: string): string {
  return name.trim().toLowerCase().replace(/ /g, '_');
}
