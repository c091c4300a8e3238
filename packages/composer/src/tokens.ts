import type { LineBreakStyle, CtaStyle, HashtagStrategy } from '@postcraft/shared';

/** Formatting tokens shared by the component renderers.
 * All lengths are counted in code points, so an emoji counts as one character
 * (a flag or a keycap sequence still counts as several). */

// ─── Spacing ───

export const LINE_BREAKS: Record<LineBreakStyle, number> = {
  dense: 1,
  readable: 2,
  scannable: 3,
  dramatic: 5,
  extreme: 7,
};

export const IDEAL_LENGTH = {
  micro: [50, 150],
  short: [150, 300],
  medium: [300, 800],
  long: [800, 1500],
  story: [1000, 3000],
} as const;

// ─── Symbols ───

export const SYMBOLS = {
  arrow: '→',
  bullet: '•',
  checkmark: '✓',
  pin: '📌',
  lightbulb: '💡',
  quote: '💬',
  poll: '📊',
  radio: '◯',
  checked: '✅',
  unchecked: '☐',
  calendar: '📅',
  transformation: '🔄',
  features: '✨',
  list: '📝',
  alert: '🚨',
} as const;

/** Glyphs a listicle line may already start with */
export const BULLET_PREFIXES = ['→', '-', '•', '✓'] as const;

export const INDICATORS = {
  positive: '✅',
  negative: '❌',
} as const;

export const MEDALS = ['🥇', '🥈', '🥉'] as const;

export const EMOJI_NUMBERS = ['1️⃣', '2️⃣', '3️⃣', '4️⃣', '5️⃣', '6️⃣', '7️⃣', '8️⃣', '9️⃣', '🔟'] as const;

// ─── Charts ───

export const CHART_EMOJIS = {
  bar: '⏱️',
  metrics: '📈',
  comparison: '⚖️',
  progress: '📊',
  ranking: '🏆',
  stats: '📊',
} as const;

export const BAR_COLORS = ['🟦', '🟩', '🟨', '🟧', '🟥', '🟪'] as const;

export const PROGRESS_BAR = {
  filled: '█',
  empty: '░',
  cells: 10,
} as const;

// ─── Engagement ───

export const CTA_EMOJIS: Record<CtaStyle, string> = {
  direct: '👇',
  curiosity: '🤔',
  action: '⚡',
  share: '🔄',
  soft: '💭',
};

export const HASHTAG_LIMITS: Partial<Record<HashtagStrategy, number>> = {
  minimal: 3,
  optimal: 5,
};

export const DEFAULT_HASHTAG_LIMIT = 5;

export const DEFAULT_CTA_PROMPT = "What's your take?";

// ─── Text helpers ───

/** Length in code points */
export function charLength(text: string): number {
  return [...text].length;
}

/** First `n` code points of `text` */
export function truncateChars(text: string, n: number): string {
  return Array.from(text).slice(0, n).join('');
}

/** Uppercased title line followed by a blank line, e.g. `📊 RESULTS:` */
export function titleLines(emoji: string, title: string | undefined): string[] {
  return title ? [`${emoji} ${title.toUpperCase()}:`, ''] : [];
}
