// ─── Post Types ───

export const POST_TYPES = ['text', 'poll', 'document'] as const;
export type PostType = (typeof POST_TYPES)[number];

export const VISIBILITIES = ['PUBLIC', 'CONNECTIONS', 'LOGGED_IN'] as const;
export type Visibility = (typeof VISIBILITIES)[number];

// ─── Voice & Tone ───

export const TONES = ['professional', 'casual', 'inspirational', 'technical', 'humorous'] as const;
export type Tone = (typeof TONES)[number];

export const FORMALITY_LEVELS = ['formal', 'conversational', 'friendly', 'casual'] as const;
export type Formality = (typeof FORMALITY_LEVELS)[number];

export const EMOTIONS = ['neutral', 'warm', 'passionate', 'analytical', 'playful'] as const;
export type Emotion = (typeof EMOTIONS)[number];

// ─── Content Strategy ───

export const PRIMARY_GOALS = ['authority', 'engagement', 'community', 'leads', 'awareness'] as const;
export type PrimaryGoal = (typeof PRIMARY_GOALS)[number];

export interface ContentMix {
  educational: number;
  personal: number;
  promotional: number;
}

// ─── Formatting Style ───

export const EMOJI_LEVELS = ['none', 'minimal', 'moderate', 'expressive', 'heavy'] as const;
export type EmojiLevel = (typeof EMOJI_LEVELS)[number];

export const LINE_BREAK_STYLES = ['dense', 'readable', 'scannable', 'dramatic', 'extreme'] as const;
export type LineBreakStyle = (typeof LINE_BREAK_STYLES)[number];

export const PARAGRAPH_LENGTHS = ['tight', 'standard', 'loose'] as const;
export type ParagraphLength = (typeof PARAGRAPH_LENGTHS)[number];

// ─── Structure Preferences ───

export const CONTENT_STRUCTURES = [
  'linear',
  'listicle',
  'framework',
  'story_arc',
  'comparison',
  'question_based',
] as const;
export type ContentStructure = (typeof CONTENT_STRUCTURES)[number];

/** Structures the body component knows how to render */
export const BODY_STRUCTURES = ['linear', 'listicle', 'framework', 'story_arc', 'comparison'] as const;
export type BodyStructure = (typeof BODY_STRUCTURES)[number];

export const HOOK_STYLES = ['question', 'stat', 'story', 'controversy', 'list', 'curiosity'] as const;
export type HookStyle = (typeof HOOK_STYLES)[number];

export const CTA_STYLES = ['direct', 'curiosity', 'action', 'share', 'soft'] as const;
export type CtaStyle = (typeof CTA_STYLES)[number];

// ─── Engagement Style ───

export const HASHTAG_STRATEGIES = ['minimal', 'optimal', 'branded', 'trending', 'niche', 'mixed'] as const;
export type HashtagStrategy = (typeof HASHTAG_STRATEGIES)[number];

export const HASHTAG_PLACEMENTS = ['inline', 'mid', 'end', 'first_comment'] as const;
export type HashtagPlacement = (typeof HASHTAG_PLACEMENTS)[number];

export const COMMENT_STYLES = ['brief', 'thoughtful', 'conversational', 'deep'] as const;
export type CommentStyle = (typeof COMMENT_STYLES)[number];

// ─── Content Characteristics ───

export const CONTROVERSY_LEVELS = ['safe', 'moderate', 'bold', 'provocative'] as const;
export type ControversyLevel = (typeof CONTROVERSY_LEVELS)[number];

export const VULNERABILITY_LEVELS = ['guarded', 'selective', 'open', 'raw'] as const;
export type VulnerabilityLevel = (typeof VULNERABILITY_LEVELS)[number];

export const HUMOR_LEVELS = ['none', 'subtle', 'moderate', 'frequent'] as const;
export type HumorLevel = (typeof HUMOR_LEVELS)[number];

// ─── Visual & Scheduling ───

export const MEDIA_FORMATS = ['text', 'image', 'video', 'carousel', 'document', 'poll', 'article'] as const;
export type MediaFormat = (typeof MEDIA_FORMATS)[number];

export const POSTING_TIMES = ['morning', 'lunch', 'evening'] as const;
export type PostingTime = (typeof POSTING_TIMES)[number];

// ─── Publishing Types ───

export interface PublishSuccess {
  ok: true;
  postId: string;
  url: string;
}

export interface PublishFailure {
  ok: false;
  error: { message: string; statusCode?: number };
}

export type PublishResult = PublishSuccess | PublishFailure;

// ─── Post Stats ───

/** Primitive stats handed to preview renderers alongside the composed text */
export interface PostStats {
  characterCount: number;
  wordCount: number;
  hashtagCount: number;
  hasHook: boolean;
  hasCta: boolean;
  charactersRemaining: number;
  previewVisible: number;
}

export const TEXT_LIMITS = {
  maxLength: 3000,
  truncationPoint: 210,
} as const;

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && (values as readonly string[]).includes(value);
}
