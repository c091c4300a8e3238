import {
  BODY_STRUCTURES,
  LengthExceededError,
  TEXT_LIMITS,
  isOneOf,
  type BodyStructure,
  type CtaStyle,
  type HashtagPlacement,
  type HookStyle,
  type PostStats,
  type PostType,
} from '@postcraft/shared';
import {
  Component,
  visibleTags,
  type ChecklistItem,
  type ComponentData,
  type ComponentKind,
  type Entry,
  type FeatureItem,
  type HashtagsData,
  type NumberStyle,
  type SeparatorStyle,
  type TakeawayStyle,
  type TimelineStyle,
  type TipStyle,
} from './components/index.js';
import type { Theme } from './themes/theme.js';
import type { EffectiveConfig } from './variants/resolver.js';
import { DEFAULT_CTA_PROMPT, charLength, truncateChars } from './tokens.js';

export interface ComposerOptions {
  postType?: PostType;
  theme?: Theme;
  /** Resolved variant configuration; its `structure` becomes the default body structure */
  config?: EffectiveConfig;
}

export interface SkippedComponent {
  index: number;
  kind: ComponentKind;
}

export interface ComposeReport {
  text: string;
  /** Components dropped because validate() returned false */
  skipped: SkippedComponent[];
  /** Hashtags placed in the first comment instead of the post */
  firstComment?: string;
}

export interface RenderedComponent {
  kind: ComponentKind;
  valid: boolean;
  content: string;
}

export interface ComposerSummary {
  postType: PostType;
  theme: string | null;
  components: RenderedComponent[];
  finalText: string;
  characterCount: number;
  preview: string;
}

const SECTION_SEPARATOR = '\n\n';

/** Builds one post from an ordered list of components.
 * Not safe to share between concurrent callers: one composer per draft. */
export class PostComposer {
  readonly postType: PostType;
  readonly theme?: Theme;
  readonly config: Readonly<EffectiveConfig>;
  private readonly components: Component[] = [];

  constructor(options: ComposerOptions = {}) {
    this.postType = options.postType ?? 'text';
    this.theme = options.theme;
    this.config = Object.freeze({ ...options.config });
  }

  /** Structure used by addBody() when none is given */
  get defaultStructure(): BodyStructure {
    const structure = this.config.structure;
    return isOneOf(BODY_STRUCTURES, structure) ? structure : 'linear';
  }

  get size(): number {
    return this.components.length;
  }

  list(): readonly Component[] {
    return [...this.components];
  }

  has(kind: ComponentKind): boolean {
    return this.components.some((c) => c.kind === kind);
  }

  add(data: ComponentData): this {
    this.components.push(new Component(data, this.theme));
    return this;
  }

  // ─── Content ───

  addHook(style: HookStyle, content: string): this {
    return this.add({ kind: 'hook', style, content });
  }

  addBody(content: string, structure: BodyStructure = this.defaultStructure): this {
    return this.add({ kind: 'body', content, structure });
  }

  addCta(style: CtaStyle, text: string): this {
    return this.add({ kind: 'cta', style, text });
  }

  addHashtags(tags: string[], placement?: HashtagPlacement): this {
    return this.add(placement ? { kind: 'hashtags', tags, placement } : { kind: 'hashtags', tags });
  }

  // ─── Charts ───

  addBarChart(data: Entry<number>[], options: { title?: string; unit?: string } = {}): this {
    return this.add({ kind: 'bar_chart', data, ...options });
  }

  addMetricsChart(data: Entry<string>[], title?: string): this {
    return this.add({ kind: 'metrics_chart', data, title });
  }

  addComparisonChart(data: Entry<string | string[]>[], title?: string): this {
    return this.add({ kind: 'comparison_chart', data, title });
  }

  addProgressChart(data: Entry<number>[], title?: string): this {
    return this.add({ kind: 'progress_chart', data, title });
  }

  addRankingChart(data: Entry<string>[], options: { title?: string; showMedals?: boolean } = {}): this {
    return this.add({ kind: 'ranking_chart', data, title: options.title, showMedals: options.showMedals ?? true });
  }

  // ─── Features ───

  addQuote(text: string, author: string, source?: string): this {
    return this.add({ kind: 'quote', text, author, source });
  }

  addBigStat(number: string, label: string, context?: string): this {
    return this.add({ kind: 'big_stat', number, label, context });
  }

  addTimeline(steps: Entry<string>[], options: { title?: string; style?: TimelineStyle } = {}): this {
    return this.add({ kind: 'timeline', steps, title: options.title, style: options.style ?? 'arrow' });
  }

  addKeyTakeaway(message: string, options: { title?: string; style?: TakeawayStyle } = {}): this {
    return this.add({
      kind: 'key_takeaway',
      message,
      title: options.title ?? 'KEY TAKEAWAY',
      style: options.style ?? 'box',
    });
  }

  addProCon(pros: string[], cons: string[], title?: string): this {
    return this.add({ kind: 'pro_con', pros, cons, title });
  }

  addChecklist(items: ChecklistItem[], options: { title?: string; showProgress?: boolean } = {}): this {
    return this.add({
      kind: 'checklist',
      items,
      title: options.title,
      showProgress: options.showProgress ?? false,
    });
  }

  addBeforeAfter(
    before: string[],
    after: string[],
    options: { title?: string; labels?: { before?: string; after?: string } } = {},
  ): this {
    return this.add({ kind: 'before_after', before, after, ...options });
  }

  addTipBox(message: string, options: { title?: string; style?: TipStyle } = {}): this {
    return this.add({ kind: 'tip_box', message, title: options.title, style: options.style ?? 'info' });
  }

  addStatsGrid(stats: Entry<string>[], options: { title?: string; columns?: number } = {}): this {
    return this.add({ kind: 'stats_grid', stats, title: options.title, columns: options.columns ?? 2 });
  }

  addPollPreview(question: string, options: string[]): this {
    return this.add({ kind: 'poll_preview', question, options });
  }

  addFeatureList(features: FeatureItem[], title?: string): this {
    return this.add({ kind: 'feature_list', features, title });
  }

  addNumberedList(items: string[], options: { title?: string; style?: NumberStyle; start?: number } = {}): this {
    return this.add({
      kind: 'numbered_list',
      items,
      title: options.title,
      style: options.style ?? 'numbers',
      start: options.start ?? 1,
    });
  }

  // ─── Layout ───

  addSeparator(style: SeparatorStyle = 'line'): this {
    return this.add({ kind: 'separator', style });
  }

  // ─── Composition ───

  /** Render every valid component in order, joined by a blank line, and report the ones dropped.
   * Hashtags follow their placement: `end` moves them last, `mid` keeps them in order,
   * `inline` appends them to the previous section and `first_comment` leaves them out of the text. */
  composeWithReport(): ComposeReport {
    const sections: string[] = [];
    const trailing: string[] = [];
    const comment: string[] = [];
    const skipped: SkippedComponent[] = [];

    this.components.forEach((component, index) => {
      if (!component.validate()) {
        skipped.push({ index, kind: component.kind });
        return;
      }

      const rendered = component.render(this.theme);
      const { data } = component;
      if (data.kind !== 'hashtags') {
        sections.push(rendered);
        return;
      }

      switch (this.hashtagPlacement(data)) {
        case 'end':
          trailing.push(rendered);
          break;
        case 'first_comment':
          comment.push(rendered);
          break;
        case 'inline': {
          const previous = sections.pop();
          sections.push(previous === undefined ? rendered : `${previous} ${rendered}`);
          break;
        }
        case 'mid':
          sections.push(rendered);
          break;
      }
    });

    const text = [...sections, ...trailing].join(SECTION_SEPARATOR);
    const length = charLength(text);
    if (length > TEXT_LIMITS.maxLength) {
      throw new LengthExceededError(length, TEXT_LIMITS.maxLength);
    }
    return comment.length > 0 ? { text, skipped, firstComment: comment.join(' ') } : { text, skipped };
  }

  private hashtagPlacement(data: HashtagsData): HashtagPlacement {
    return data.placement ?? this.theme?.hashtagPlacement ?? 'end';
  }

  /** Final post text. Invalid components are left out without notice. */
  compose(): string {
    return this.composeWithReport().text;
  }

  /** What readers see before "see more". Recomposes on every call. */
  getPreview(chars: number = TEXT_LIMITS.truncationPoint): string {
    const text = this.compose();
    if (charLength(text) <= chars) return text;
    return `${truncateChars(text, chars)}...`;
  }

  /** Ensure a hook and a CTA exist, using the theme's styles. No-op without a theme.
   * The inserted hook is empty, so it fails validation and never reaches the output. */
  optimizeForEngagement(): this {
    if (!this.theme) return this;

    if (!this.has('hook')) {
      this.components.unshift(new Component({ kind: 'hook', style: this.theme.hookStyle, content: '' }, this.theme));
    }
    if (!this.has('cta')) {
      this.addCta(this.theme.ctaStyle, DEFAULT_CTA_PROMPT);
    }
    return this;
  }

  getStats(): PostStats {
    const text = this.compose();
    const characterCount = charLength(text);
    const valid = this.components.filter((c) => c.validate());

    return {
      characterCount,
      wordCount: text.split(/\s+/).filter(Boolean).length,
      hashtagCount: valid
        .filter((c): c is Component<HashtagsData> => c.data.kind === 'hashtags')
        .reduce((sum, c) => sum + visibleTags(c.data, this.theme).length, 0),
      hasHook: valid.some((c) => c.kind === 'hook'),
      hasCta: valid.some((c) => c.kind === 'cta'),
      charactersRemaining: TEXT_LIMITS.maxLength - characterCount,
      previewVisible: Math.min(TEXT_LIMITS.truncationPoint, characterCount),
    };
  }

  toSummary(): ComposerSummary {
    const finalText = this.compose();
    return {
      postType: this.postType,
      theme: this.theme?.name ?? null,
      components: this.components.map((c) => {
        const valid = c.validate();
        return { kind: c.kind, valid, content: valid ? c.render(this.theme) : '' };
      }),
      finalText,
      characterCount: charLength(finalText),
      preview: this.getPreview(),
    };
  }
}
