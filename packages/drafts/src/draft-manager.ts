import {
  ConfigurationError,
  LookupError,
  NoActiveDraftError,
  POST_TYPES,
  TEXT_LIMITS,
  isOneOf,
  scoped,
  type Logger,
  type PostStats,
  type PostType,
} from '@postcraft/shared';
import {
  PostComposer,
  charLength,
  getVariantTable,
  resolveVariants,
  type ComponentData,
  type SkippedComponent,
  type ThemeManager,
} from '@postcraft/composer';
import {
  DRAFT_ID_MAX_LENGTH,
  DraftRecordSchema,
  newDraftId,
  newPreviewToken,
  type DraftContent,
  type DraftRecord,
  type DraftSummary,
} from './draft.js';
import type { DraftStore } from './store.js';

export interface CreateDraftInput {
  name: string;
  postType?: string;
  theme?: string | null;
  variantSelections?: Record<string, string>;
  components?: ComponentData[];
  metadata?: Record<string, unknown>;
}

export interface UpdateDraftInput {
  name?: string;
  content?: Partial<DraftContent>;
  /** null removes the theme */
  theme?: string | null;
  /** Merged into the existing selections */
  variantSelections?: Record<string, string>;
  metadata?: Record<string, unknown>;
}

export interface ComposeOptions {
  /** Insert the theme's hook and CTA when missing (default true) */
  optimize?: boolean;
}

export interface ComposeResult {
  draftId: string;
  text: string;
  characterCount: number;
  skipped: SkippedComponent[];
  /** Hashtags the theme places in the first comment */
  firstComment?: string;
}

export interface DraftStats extends PostStats {
  draftId: string;
}

export interface DraftManagerInfo {
  totalDrafts: number;
  currentDraftId: string | null;
  postTypes: PostType[];
}

export interface DraftManagerOptions {
  clock?: () => Date;
}

/** One drafting session: the drafts in a store plus a "current draft" pointer.
 * Methods taking an optional draftId fall back to the current draft.
 * Writes to one draft run one at a time, in call order. */
export class DraftManager {
  private currentId: string | null = null;
  private readonly writes = new Map<string, Promise<void>>();
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private store: DraftStore,
    private themes: ThemeManager,
    logger: Logger,
    options: DraftManagerOptions = {},
  ) {
    this.logger = scoped(logger, 'draft-manager');
    this.clock = options.clock ?? (() => new Date());
  }

  get currentDraftId(): string | null {
    return this.currentId;
  }

  // ─── Lifecycle ───

  async create(input: CreateDraftInput): Promise<DraftRecord> {
    const postType = input.postType ?? 'text';
    if (!isOneOf(POST_TYPES, postType)) throw new LookupError('post type', postType);
    const theme = input.theme ?? null;
    if (theme !== null) this.themes.get(theme);

    const now = this.clock().toISOString();
    const draft = DraftRecordSchema.parse({
      draftId: newDraftId(),
      name: input.name,
      postType,
      content: { components: input.components ?? [] },
      theme,
      variantSelections: input.variantSelections ?? {},
      metadata: input.metadata ?? {},
      previewToken: newPreviewToken(),
      createdAt: now,
      updatedAt: now,
    });

    await this.store.save(draft);
    this.currentId = draft.draftId;
    this.logger.info({ draftId: draft.draftId, postType, theme }, 'Draft created');
    return draft;
  }

  async get(draftId: string): Promise<DraftRecord | null> {
    return this.store.get(draftId);
  }

  async require(draftId: string): Promise<DraftRecord> {
    const draft = await this.store.get(draftId);
    if (!draft) throw new LookupError('draft', draftId);
    return draft;
  }

  async current(): Promise<DraftRecord | null> {
    return this.currentId ? this.store.get(this.currentId) : null;
  }

  async switch(draftId: string): Promise<DraftRecord> {
    const draft = await this.require(draftId);
    this.currentId = draftId;
    this.logger.debug({ draftId }, 'Switched draft');
    return draft;
  }

  async list(): Promise<DraftSummary[]> {
    const drafts = await this.store.list();
    return drafts.map((d) => ({
      draftId: d.draftId,
      name: d.name,
      postType: d.postType,
      theme: d.theme,
      componentCount: d.content.components.length,
      createdAt: d.createdAt,
      updatedAt: d.updatedAt,
      isCurrent: d.draftId === this.currentId,
    }));
  }

  async update(draftId: string, changes: UpdateDraftInput): Promise<DraftRecord> {
    return this.serialize(draftId, () => this.applyUpdate(draftId, changes));
  }

  private async applyUpdate(draftId: string, changes: UpdateDraftInput): Promise<DraftRecord> {
    const draft = await this.require(draftId);
    if (typeof changes.theme === 'string') this.themes.get(changes.theme);

    const updated = DraftRecordSchema.parse({
      ...draft,
      name: changes.name ?? draft.name,
      content: { ...draft.content, ...changes.content },
      theme: changes.theme === undefined ? draft.theme : changes.theme,
      variantSelections: { ...draft.variantSelections, ...changes.variantSelections },
      metadata: { ...draft.metadata, ...changes.metadata },
      updatedAt: this.clock().toISOString(),
    });

    await this.store.save(updated);
    this.logger.debug({ draftId }, 'Draft updated');
    return updated;
  }

  /** When the current draft is deleted, the first remaining draft becomes current */
  async delete(draftId: string): Promise<boolean> {
    return this.serialize(draftId, async () => {
      const deleted = await this.store.delete(draftId);
      if (!deleted) return false;

      if (this.currentId === draftId) {
        const [next] = await this.store.list();
        this.currentId = next?.draftId ?? null;
      }
      this.logger.info({ draftId, currentDraftId: this.currentId }, 'Draft deleted');
      return true;
    });
  }

  async clear(): Promise<number> {
    const count = await this.store.clear();
    this.currentId = null;
    this.logger.info({ count }, 'Drafts cleared');
    return count;
  }

  async getByPreviewToken(previewToken: string): Promise<DraftRecord | null> {
    return this.store.getByPreviewToken(previewToken);
  }

  async info(): Promise<DraftManagerInfo> {
    const drafts = await this.store.list();
    return {
      totalDrafts: drafts.length,
      currentDraftId: this.currentId,
      postTypes: [...new Set(drafts.map((d) => d.postType))],
    };
  }

  // ─── Import / Export ───

  async export(draftId?: string): Promise<string> {
    return JSON.stringify(await this.target(draftId), null, 2);
  }

  /** Import a draft exported as JSON. A taken draftId gets a numeric suffix,
   * shortening the id as needed to stay within its length limit.
   * A taken preview token is replaced. The current draft is unchanged. */
  async import(json: string): Promise<DraftRecord> {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (err) {
      throw new ConfigurationError('Invalid draft JSON', [err instanceof Error ? err.message : String(err)]);
    }

    const result = DraftRecordSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError(`Invalid draft:\n${issues.join('\n')}`, issues);
    }

    const draft = result.data;
    if (draft.theme !== null) this.themes.get(draft.theme);

    const originalId = draft.draftId;
    let suffix = 2;
    while (await this.store.get(draft.draftId)) {
      const tail = `_${suffix++}`;
      draft.draftId = `${originalId.slice(0, DRAFT_ID_MAX_LENGTH - tail.length)}${tail}`;
    }
    while (await this.store.getByPreviewToken(draft.previewToken)) {
      draft.previewToken = newPreviewToken();
    }

    await this.store.save(draft);
    this.logger.info({ draftId: draft.draftId, originalId }, 'Draft imported');
    return draft;
  }

  // ─── Composition ───

  async addComponent(data: ComponentData, draftId?: string): Promise<DraftRecord> {
    const id = this.targetId(draftId);
    return this.serialize(id, async () => {
      const draft = await this.load(id, Boolean(draftId));
      draft.content.components.push(structuredClone(data));
      draft.updatedAt = this.clock().toISOString();

      await this.store.save(draft);
      this.logger.info(
        { draftId: id, kind: data.kind, index: draft.content.components.length - 1 },
        'Component added',
      );
      return draft;
    });
  }

  /** Rebuild a composer from a draft: theme, resolved variant configuration, then components in order */
  buildComposer(draft: DraftRecord, options: ComposeOptions = {}): PostComposer {
    const theme = draft.theme ? this.themes.get(draft.theme) : undefined;
    const config = resolveVariants(getVariantTable(draft.postType), draft.variantSelections, theme);
    const composer = new PostComposer({ postType: draft.postType, theme, config });

    for (const component of draft.content.components) {
      composer.add(component);
    }
    if (options.optimize ?? true) composer.optimizeForEngagement();
    return composer;
  }

  /** Compose the draft and store the text on it. Throws LengthExceededError without storing. */
  async compose(draftId?: string, options: ComposeOptions = {}): Promise<ComposeResult> {
    const id = this.targetId(draftId);
    return this.serialize(id, async () => {
      const draft = await this.load(id, Boolean(draftId));
      const { text, skipped, firstComment } = this.buildComposer(draft, options).composeWithReport();

      if (skipped.length > 0) {
        this.logger.warn({ draftId: id, skipped }, 'Invalid components left out of post');
      }

      await this.applyUpdate(id, { content: { composedText: text } });
      return {
        draftId: id,
        text,
        characterCount: charLength(text),
        skipped,
        ...(firstComment === undefined ? {} : { firstComment }),
      };
    });
  }

  /** What readers see before "see more", without engagement optimization */
  async preview(draftId?: string, chars: number = TEXT_LIMITS.truncationPoint): Promise<string> {
    const draft = await this.target(draftId);
    return this.buildComposer(draft, { optimize: false }).getPreview(chars);
  }

  async stats(draftId?: string): Promise<DraftStats> {
    const draft = await this.target(draftId);
    return { draftId: draft.draftId, ...this.buildComposer(draft, { optimize: false }).getStats() };
  }

  private targetId(draftId?: string): string {
    if (draftId) return draftId;
    if (!this.currentId) throw new NoActiveDraftError();
    return this.currentId;
  }

  private async target(draftId?: string): Promise<DraftRecord> {
    return this.load(this.targetId(draftId), Boolean(draftId));
  }

  /** A named draft that is missing is a LookupError; a missing current draft means none is active */
  private async load(draftId: string, named: boolean): Promise<DraftRecord> {
    const draft = await this.store.get(draftId);
    if (draft) return draft;
    throw named ? new LookupError('draft', draftId) : new NoActiveDraftError();
  }

  /** Run fn once every earlier write to the same draft has settled */
  private serialize<T>(draftId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.writes.get(draftId) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.writes.set(draftId, settled);

    return run.finally(() => {
      if (this.writes.get(draftId) === settled) this.writes.delete(draftId);
    });
  }
}
