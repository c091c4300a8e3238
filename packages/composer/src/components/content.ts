import type { Theme } from '../themes/theme.js';
import type { BodyData, CtaData, HashtagsData, HookData } from './types.js';
import {
  BULLET_PREFIXES,
  CTA_EMOJIS,
  DEFAULT_HASHTAG_LIMIT,
  HASHTAG_LIMITS,
  INDICATORS,
  LINE_BREAKS,
  SYMBOLS,
  charLength,
} from '../tokens.js';

const MAX_HOOK_LENGTH = 200;
const MAX_BODY_LENGTH = 2800;
const MAX_CTA_LENGTH = 200;

// ─── Hook ───

export function renderHook(data: HookData, theme?: Theme): string {
  const emphasize =
    data.style === 'controversy' &&
    (theme?.controversyLevel === 'bold' || theme?.controversyLevel === 'provocative');
  return emphasize ? `${SYMBOLS.alert} ${data.content}` : data.content;
}

export function validateHook(data: HookData): boolean {
  const length = charLength(data.content);
  return length > 0 && length <= MAX_HOOK_LENGTH;
}

// ─── Body ───

export function renderBody(data: BodyData, theme?: Theme): string {
  switch (data.structure) {
    case 'listicle':
      return renderListicle(data.content, theme);
    case 'framework':
      return renderFramework(data.content, theme);
    case 'story_arc':
      return renderStoryArc(data.content, theme);
    case 'comparison':
      return renderComparison(data.content);
    case 'linear':
      return renderLinear(data.content, theme);
  }
}

function renderLinear(content: string, theme?: Theme): string {
  if (!theme) return content;
  const breaks = '\n'.repeat(LINE_BREAKS[theme.lineBreakStyle]);
  return content.split('\n\n').join(breaks);
}

function renderListicle(content: string, theme?: Theme): string {
  const symbol = theme?.emojiLevel === 'none' ? '-' : SYMBOLS.arrow;
  return content
    .trim()
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => (BULLET_PREFIXES.some((p) => line.startsWith(p)) ? line : `${symbol} ${line}`))
    .join('\n');
}

function renderFramework(content: string, theme?: Theme): string {
  const symbol =
    theme?.emojiLevel === 'none' || theme?.emojiLevel === 'minimal' ? SYMBOLS.bullet : SYMBOLS.pin;
  return content
    .split('||')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => `${symbol} ${part}`)
    .join('\n\n');
}

function renderStoryArc(content: string, theme?: Theme): string {
  const separator = theme?.lineBreakStyle === 'extreme' ? '\n\n\n' : '\n\n';
  return content
    .split('\n\n')
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .join(separator);
}

// anything other than exactly two parts passes through untouched
function renderComparison(content: string): string {
  const parts = content.split('||');
  if (parts.length !== 2) return content;
  return `${INDICATORS.negative} ${parts[0].trim()}\n\n${INDICATORS.positive} ${parts[1].trim()}`;
}

export function validateBody(data: BodyData): boolean {
  const length = charLength(data.content);
  return length > 0 && length <= MAX_BODY_LENGTH;
}

// ─── Call to Action ───

export function renderCta(data: CtaData, theme?: Theme): string {
  const level = theme?.emojiLevel;
  if (level === 'moderate' || level === 'expressive' || level === 'heavy') {
    return `${CTA_EMOJIS[data.style]} ${data.text}`;
  }
  return data.text;
}

export function validateCta(data: CtaData): boolean {
  const length = charLength(data.text);
  return length > 0 && length <= MAX_CTA_LENGTH;
}

// ─── Hashtags ───

/** Tags that survive the theme's hashtag limit, in order */
export function visibleTags(data: HashtagsData, theme?: Theme): string[] {
  const limit = (theme && HASHTAG_LIMITS[theme.hashtagStrategy]) ?? DEFAULT_HASHTAG_LIMIT;
  return data.tags.slice(0, limit);
}

export function renderHashtags(data: HashtagsData, theme?: Theme): string {
  return visibleTags(data, theme)
    .map((tag) => `#${tag}`)
    .join(' ');
}

export function validateHashtags(data: HashtagsData): boolean {
  return data.tags.length > 0 && data.tags.every((tag) => tag.length > 0);
}
