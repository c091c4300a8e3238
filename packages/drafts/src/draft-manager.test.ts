import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import {
  ConfigurationError,
  LengthExceededError,
  LookupError,
  NoActiveDraftError,
  type Logger,
} from '@postcraft/shared';
import { ThemeManager } from '@postcraft/composer';
import { DraftManager } from './draft-manager.js';
import { InMemoryDraftStore } from './store.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: () => mockLogger,
} as unknown as Logger;

let now = new Date('2026-03-01T09:00:00.000Z');
const clock = () => now;

describe('DraftManager', () => {
  let store: InMemoryDraftStore;
  let manager: DraftManager;

  beforeEach(() => {
    vi.clearAllMocks();
    now = new Date('2026-03-01T09:00:00.000Z');
    store = new InMemoryDraftStore();
    manager = new DraftManager(store, new ThemeManager(mockLogger), mockLogger, { clock });
  });

  describe('create', () => {
    it('stores a text draft and makes it current', async () => {
      const draft = await manager.create({ name: 'Launch post' });

      expect(draft).toMatchObject({
        name: 'Launch post',
        postType: 'text',
        theme: null,
        content: { components: [] },
        variantSelections: {},
        metadata: {},
        createdAt: '2026-03-01T09:00:00.000Z',
        updatedAt: '2026-03-01T09:00:00.000Z',
      });
      expect(draft.draftId).toMatch(/^draft_/);
      expect(draft.previewToken).toMatch(/^[0-9a-f]{32}$/);
      expect(manager.currentDraftId).toBe(draft.draftId);
      expect(await manager.current()).toEqual(draft);
    });

    it('rejects unknown post types and themes', async () => {
      await expect(manager.create({ name: 'x', postType: 'carousel' })).rejects.toThrow(
        "Unknown post type: 'carousel'",
      );
      await expect(manager.create({ name: 'x', theme: 'influencer' })).rejects.toThrow(LookupError);
      expect(await manager.list()).toEqual([]);
    });

    it('rejects a blank name', async () => {
      await expect(manager.create({ name: '  ' })).rejects.toThrow(ZodError);
    });
  });

  describe('switch and list', () => {
    it('moves the current pointer', async () => {
      const first = await manager.create({ name: 'First' });
      const second = await manager.create({ name: 'Second', postType: 'poll', theme: 'storyteller' });

      expect((await manager.list()).map((d) => [d.name, d.isCurrent])).toEqual([
        ['First', false],
        ['Second', true],
      ]);

      await manager.switch(first.draftId);
      expect(manager.currentDraftId).toBe(first.draftId);
      expect((await manager.list())[1]).toEqual({
        draftId: second.draftId,
        name: 'Second',
        postType: 'poll',
        theme: 'storyteller',
        componentCount: 0,
        createdAt: '2026-03-01T09:00:00.000Z',
        updatedAt: '2026-03-01T09:00:00.000Z',
        isCurrent: false,
      });
    });

    it('throws LookupError for unknown drafts', async () => {
      await expect(manager.switch('draft_missing')).rejects.toThrow("Unknown draft: 'draft_missing'");
      await expect(manager.require('draft_missing')).rejects.toThrow(LookupError);
      expect(await manager.get('draft_missing')).toBeNull();
    });
  });

  describe('update', () => {
    it('merges selections and metadata and stamps updatedAt', async () => {
      const draft = await manager.create({
        name: 'Post',
        variantSelections: { style: 'story' },
        metadata: { campaign: 'spring' },
      });
      now = new Date('2026-03-02T10:30:00.000Z');

      const updated = await manager.update(draft.draftId, {
        name: 'Renamed',
        theme: 'coach_mentor',
        variantSelections: { tone: 'inspiring' },
        metadata: { owner: 'test-user' },
      });

      expect(updated).toMatchObject({
        name: 'Renamed',
        theme: 'coach_mentor',
        variantSelections: { style: 'story', tone: 'inspiring' },
        metadata: { campaign: 'spring', owner: 'test-user' },
        createdAt: '2026-03-01T09:00:00.000Z',
        updatedAt: '2026-03-02T10:30:00.000Z',
      });
      expect(await manager.get(draft.draftId)).toEqual(updated);
    });

    it('clears the theme with null and validates new themes', async () => {
      const draft = await manager.create({ name: 'Post', theme: 'storyteller' });
      expect((await manager.update(draft.draftId, { theme: null })).theme).toBeNull();
      await expect(manager.update(draft.draftId, { theme: 'influencer' })).rejects.toThrow(LookupError);
    });
  });

  describe('delete and clear', () => {
    it('moves current to the first remaining draft', async () => {
      const a = await manager.create({ name: 'A' });
      const b = await manager.create({ name: 'B' });
      const c = await manager.create({ name: 'C' });

      expect(await manager.delete(c.draftId)).toBe(true);
      expect(manager.currentDraftId).toBe(a.draftId);

      expect(await manager.delete(b.draftId)).toBe(true);
      expect(manager.currentDraftId).toBe(a.draftId);

      expect(await manager.delete(a.draftId)).toBe(true);
      expect(manager.currentDraftId).toBeNull();
      expect(await manager.delete(a.draftId)).toBe(false);
    });

    it('clears every draft', async () => {
      await manager.create({ name: 'A' });
      await manager.create({ name: 'B' });
      expect(await manager.clear()).toBe(2);
      expect(manager.currentDraftId).toBeNull();
      await expect(manager.addComponent({ kind: 'separator', style: 'line' })).rejects.toThrow(NoActiveDraftError);
    });
  });

  describe('export and import', () => {
    it('imports an export under a suffixed id with a fresh preview token', async () => {
      const draft = await manager.create({ name: 'Original', theme: 'data_driven' });
      await manager.addComponent({ kind: 'big_stat', number: '3x', label: 'faster' });
      const json = await manager.export();

      const copy = await manager.import(json);
      expect(copy.draftId).toBe(`${draft.draftId}_2`);
      expect(copy.previewToken).not.toBe(draft.previewToken);
      expect(copy.content.components).toEqual([{ kind: 'big_stat', number: '3x', label: 'faster' }]);
      expect(manager.currentDraftId).toBe(draft.draftId);

      expect((await manager.import(json)).draftId).toBe(`${draft.draftId}_3`);
    });

    it('shortens a long id so the suffixed id stays within 128 characters', async () => {
      const json = JSON.stringify({ draftId: 'd'.repeat(128), name: 'Long id', postType: 'text' });
      await manager.import(json);

      const copy = await manager.import(json);
      expect(copy.draftId).toBe(`${'d'.repeat(126)}_2`);
      expect(copy.draftId).toHaveLength(128);
      expect(await manager.import(json)).toMatchObject({ draftId: `${'d'.repeat(126)}_3` });
    });

    it('keeps the id of a draft new to this store', async () => {
      const json = JSON.stringify({ draftId: 'draft_external', name: 'External', postType: 'document' });
      const imported = await manager.import(json);
      expect(imported).toMatchObject({ draftId: 'draft_external', theme: null, content: { components: [] } });
      expect(imported.previewToken).toMatch(/^[0-9a-f]{32}$/);
    });

    it('rejects malformed JSON and records', async () => {
      await expect(manager.import('{not json')).rejects.toThrow('Invalid draft JSON');
      try {
        await manager.import(JSON.stringify({ draftId: 'd1', postType: 'video' }));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError);
        if (err instanceof ConfigurationError) {
          expect(err.issues.map((i) => i.split(':')[0])).toEqual(['name', 'postType']);
        }
      }
    });

    it('rejects drafts that name an unknown theme', async () => {
      const json = JSON.stringify({ draftId: 'd1', name: 'x', postType: 'text', theme: 'influencer' });
      await expect(manager.import(json)).rejects.toThrow(LookupError);
    });

    it('finds drafts by preview token', async () => {
      const draft = await manager.create({ name: 'Shared' });
      expect((await manager.getByPreviewToken(draft.previewToken))?.draftId).toBe(draft.draftId);
      expect(await manager.getByPreviewToken('unknown')).toBeNull();
    });
  });

  describe('composition', () => {
    it('composes the current draft and stores the text', async () => {
      const draft = await manager.create({ name: 'Post' });
      await manager.addComponent({ kind: 'hook', style: 'stat', content: '95% of buyers…' });
      await manager.addComponent({ kind: 'body', content: 'A||B', structure: 'comparison' });
      await manager.addComponent({ kind: 'cta', style: 'direct', text: 'Comment now' });
      await manager.addComponent({ kind: 'hashtags', tags: ['ai', 'b2b'] });

      const text = '95% of buyers…\n\n❌ A\n\n✅ B\n\nComment now\n\n#ai #b2b';
      expect(await manager.compose()).toEqual({
        draftId: draft.draftId,
        text,
        characterCount: 47,
        skipped: [],
      });
      expect((await manager.get(draft.draftId))?.content.composedText).toBe(text);
    });

    it('adds the theme CTA when optimizing and reports skipped components', async () => {
      await manager.create({ name: 'Post', theme: 'thought_leader' });
      await manager.addComponent({ kind: 'body', content: 'Notes from the week.', structure: 'linear' });

      const result = await manager.compose();
      expect(result.text).toBe("Notes from the week.\n\nWhat's your take?");
      expect(result.skipped).toEqual([{ index: 0, kind: 'hook' }]);
      expect(mockLogger.warn).toHaveBeenCalled();

      expect((await manager.compose(undefined, { optimize: false })).text).toBe('Notes from the week.');
    });

    it('adds components to a named draft without switching', async () => {
      const first = await manager.create({ name: 'First' });
      const second = await manager.create({ name: 'Second' });
      const updated = await manager.addComponent({ kind: 'separator', style: 'dots' }, first.draftId);

      expect(updated.content.components).toEqual([{ kind: 'separator', style: 'dots' }]);
      expect(manager.currentDraftId).toBe(second.draftId);
    });

    it('keeps every component added concurrently, in call order', async () => {
      const draft = await manager.create({ name: 'Post' });
      await Promise.all([
        manager.addComponent({ kind: 'hook', style: 'question', content: 'Ready?' }),
        manager.addComponent({ kind: 'cta', style: 'direct', text: 'Comment now' }),
        manager.update(draft.draftId, { metadata: { audience: 'founders' } }),
      ]);

      const stored = await manager.get(draft.draftId);
      expect(stored?.content.components).toEqual([
        { kind: 'hook', style: 'question', content: 'Ready?' },
        { kind: 'cta', style: 'direct', text: 'Comment now' },
      ]);
      expect(stored?.metadata).toEqual({ audience: 'founders' });
    });

    it('composes after the writes queued before it', async () => {
      await manager.create({ name: 'Post' });
      const [, result] = await Promise.all([
        manager.addComponent({ kind: 'hook', style: 'question', content: 'Ready?' }),
        manager.compose(undefined, { optimize: false }),
      ]);
      expect(result.text).toBe('Ready?');
    });

    it('keeps writing after a queued write fails', async () => {
      const draft = await manager.create({ name: 'Post' });
      const [rejected, added] = await Promise.allSettled([
        manager.update(draft.draftId, { theme: 'influencer' }),
        manager.addComponent({ kind: 'separator', style: 'dots' }),
      ]);

      expect(rejected.status).toBe('rejected');
      expect(added.status).toBe('fulfilled');
      expect((await manager.get(draft.draftId))?.content.components).toEqual([{ kind: 'separator', style: 'dots' }]);
    });

    it('returns hashtags the theme places in the first comment', async () => {
      const draft = await manager.create({ name: 'Community', theme: 'community_builder' });
      await manager.addComponent({ kind: 'hashtags', tags: ['ai'] });

      expect(await manager.compose(undefined, { optimize: false })).toEqual({
        draftId: draft.draftId,
        text: '',
        characterCount: 0,
        skipped: [],
        firstComment: '#ai',
      });
    });

    it('leaves the stored text alone when the post is too long', async () => {
      const draft = await manager.create({ name: 'Long' });
      await manager.addComponent({ kind: 'body', content: 'x'.repeat(2800), structure: 'linear' });
      await manager.addComponent({ kind: 'body', content: 'y'.repeat(2800), structure: 'linear' });

      await expect(manager.compose()).rejects.toThrow(LengthExceededError);
      expect((await manager.get(draft.draftId))?.content.composedText).toBeUndefined();
    });

    it('previews without engagement optimization', async () => {
      await manager.create({ name: 'Post', theme: 'thought_leader' });
      await manager.addComponent({ kind: 'body', content: 'x'.repeat(300), structure: 'linear' });

      const preview = await manager.preview();
      expect(preview).toHaveLength(213);
      expect(await manager.preview(undefined, 10)).toBe('xxxxxxxxxx...');
    });

    it('reports stats for the draft', async () => {
      const draft = await manager.create({ name: 'Post' });
      await manager.addComponent({ kind: 'hook', style: 'question', content: 'Ready?' });

      expect(await manager.stats()).toEqual({
        draftId: draft.draftId,
        characterCount: 6,
        wordCount: 1,
        hashtagCount: 0,
        hasHook: true,
        hasCta: false,
        charactersRemaining: 2994,
        previewVisible: 6,
      });
    });

    it('rebuilds a composer with resolved variants', async () => {
      const draft = await manager.create({ name: 'Post', variantSelections: { style: 'story' } });
      const composer = manager.buildComposer(draft, { optimize: false });
      expect(composer.defaultStructure).toBe('story_arc');
      expect(composer.postType).toBe('text');
    });

    it('requires an active draft', async () => {
      await expect(manager.compose()).rejects.toThrow(NoActiveDraftError);
      await expect(manager.preview()).rejects.toThrow('No active draft');
    });
  });

  it('summarizes the session', async () => {
    await manager.create({ name: 'A' });
    const b = await manager.create({ name: 'B', postType: 'poll' });
    await manager.create({ name: 'C' });
    await manager.switch(b.draftId);

    expect(await manager.info()).toEqual({
      totalDrafts: 3,
      currentDraftId: b.draftId,
      postTypes: ['text', 'poll'],
    });
  });
});
