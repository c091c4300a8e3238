import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from '@postcraft/shared';
import { COMPONENT_KINDS, ThemeManager } from '@postcraft/composer';
import { DraftManager, InMemoryDraftStore } from '@postcraft/drafts';
import { LinkedInClient } from '@postcraft/publisher';
import { createToolRegistry, type ToolRegistry } from './registry.js';
import { handleToolRequest } from './handler.js';
import type { ToolContext } from './tools/context.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: () => mockLogger,
} as unknown as Logger;

function createContext(overrides: Partial<ToolContext> = {}): ToolContext {
  const themes = new ThemeManager(mockLogger);
  return {
    themes,
    drafts: new DraftManager(new InMemoryDraftStore(), themes, mockLogger),
    publisher: new LinkedInClient({ accessToken: '', personUrn: '' }, mockLogger),
    ...overrides,
  };
}

async function call(registry: ToolRegistry, name: string, args: unknown = {}) {
  const response = await handleToolRequest(registry, name, args);
  if (!response.body.ok) throw new Error(`${name} failed: ${response.body.error.message}`);
  return response.body.result;
}

describe('createToolRegistry', () => {
  let context: ToolContext;
  let registry: ToolRegistry;

  beforeEach(() => {
    vi.clearAllMocks();
    context = createContext();
    registry = createToolRegistry(context, mockLogger);
  });

  it('registers one add tool per component kind', () => {
    expect(COMPONENT_KINDS.every((kind) => registry.has(`add_${kind}`))).toBe(true);
    expect(registry.size).toBe(45);
  });

  it('describes component fields with the draft id first', () => {
    const hook = registry.list().find((t) => t.name === 'add_hook');
    expect(hook?.fields).toEqual([
      { name: 'draftId', required: false },
      { name: 'style', required: true },
      { name: 'content', required: true },
    ]);
  });

  it('builds and composes a draft through tools', async () => {
    const created = await call(registry, 'create_draft', { name: 'Post' });
    expect(created).toMatchObject({ name: 'Post', postType: 'text', theme: null });

    expect(await call(registry, 'add_hook', { style: 'stat', content: '95% of buyers…' })).toMatchObject({
      index: 0,
      kind: 'hook',
    });
    await call(registry, 'add_body', { content: 'A||B', structure: 'comparison' });
    await call(registry, 'add_cta', { style: 'direct', text: 'Comment now' });
    await call(registry, 'add_hashtags', { tags: ['ai', 'b2b'] });

    expect(await call(registry, 'compose_draft')).toMatchObject({
      text: '95% of buyers…\n\n❌ A\n\n✅ B\n\nComment now\n\n#ai #b2b',
      characterCount: 47,
      skipped: [],
    });
    expect(await call(registry, 'draft_stats')).toMatchObject({ hashtagCount: 2, hasHook: true, hasCta: true });
  });

  it('ignores a kind passed as an argument', async () => {
    await call(registry, 'create_draft', { name: 'Post' });
    await call(registry, 'add_separator', { kind: 'quote', style: 'dots' });

    const draft = await context.drafts.current();
    expect(draft?.content.components).toEqual([{ kind: 'separator', style: 'dots' }]);
  });

  it('fills the default theme into new drafts', async () => {
    const withDefault = createToolRegistry(createContext({ defaultTheme: 'storyteller' }), mockLogger);
    expect(await call(withDefault, 'create_draft', { name: 'Post' })).toMatchObject({ theme: 'storyteller' });
    expect(await call(withDefault, 'create_draft', { name: 'Other', theme: 'data_driven' })).toMatchObject({
      theme: 'data_driven',
    });
  });

  it('creates drafts from a pattern', async () => {
    const draft = await call(registry, 'create_from_pattern', {
      name: 'Pick',
      content: {
        pattern: 'comparison',
        hook: 'Build or buy?',
        optionA: 'Build',
        optionB: 'Buy',
        recommendation: 'Buy first',
      },
    });
    expect(draft).toMatchObject({ name: 'Pick', metadata: { pattern: 'comparison' } });

    expect(await call(registry, 'compose_draft', { optimize: false })).toMatchObject({
      text: 'Build or buy?\n\n❌ Build\n\n✅ Buy\n\n---\n\nMy take: Buy first\n\nWhich would you choose?',
    });
  });

  it('maps failures to statuses', async () => {
    expect((await handleToolRequest(registry, 'add_separator', {})).status).toBe(409);
    expect((await handleToolRequest(registry, 'nope', {})).body).toEqual({
      ok: false,
      error: { type: 'LookupError', message: "Unknown tool: 'nope'" },
    });
    expect((await handleToolRequest(registry, 'list_variant_axes', { postType: 'carousel' })).status).toBe(404);

    await call(registry, 'create_draft', { name: 'Post' });
    const invalid = await handleToolRequest(registry, 'add_bar_chart', { data: [{ label: 'Q1', value: 'x' }] });
    expect(invalid.status).toBe(400);
    expect(invalid.body).toEqual({
      ok: false,
      error: {
        type: 'ValidationError',
        message: 'Invalid arguments',
        issues: ['data.0.value: Expected number, received string'],
      },
    });

    await call(registry, 'add_body', { content: 'x'.repeat(2800) });
    await call(registry, 'add_body', { content: 'y'.repeat(2800) });
    expect((await handleToolRequest(registry, 'compose_draft', {})).status).toBe(422);
  });

  it('exports and imports drafts', async () => {
    const original = await context.drafts.create({ name: 'Original' });
    const json = await context.drafts.export();
    expect(await call(registry, 'export_draft')).toEqual({ json });

    expect(await call(registry, 'import_draft', { json })).toEqual({
      draftId: `${original.draftId}_2`,
      name: 'Original',
    });
    expect(await call(registry, 'drafts_info')).toMatchObject({ totalDrafts: 2 });
  });

  it('publishes in dry-run mode and records the result', async () => {
    await call(registry, 'create_draft', { name: 'Post' });
    await call(registry, 'add_body', { content: 'Shipping today.' });

    const result = await call(registry, 'publish_draft', { visibility: 'CONNECTIONS', optimize: false });
    expect(result).toMatchObject({ characterCount: 15, dryRun: true, ok: true });

    const draft = await context.drafts.current();
    expect(draft?.metadata.lastPublished).toMatchObject({ visibility: 'CONNECTIONS', dryRun: true });
  });

  it('shows a draft by preview token', async () => {
    await call(registry, 'create_draft', { name: 'Shared', postType: 'poll' });
    await call(registry, 'add_poll_preview', { question: 'Remote?', options: ['Yes', 'No'] });
    const draft = await context.drafts.current();

    expect(await call(registry, 'get_shared_preview', { previewToken: draft?.previewToken })).toEqual({
      name: 'Shared',
      postType: 'poll',
      theme: null,
      composedText: null,
      preview: expect.stringContaining('Remote?'),
    });
    expect((await handleToolRequest(registry, 'get_shared_preview', { previewToken: 'missing' })).status).toBe(404);
  });

  it('answers theme and variant lookups', async () => {
    expect(await call(registry, 'recommend_themes', { goal: 'unknown' })).toEqual({
      goal: 'unknown',
      themes: ['thought_leader'],
    });
    expect(await call(registry, 'suggest_variants', { postType: 'text', goal: 'nothing' })).toEqual({
      postType: 'text',
      goal: 'nothing',
      variantSelections: {},
    });

    const themes = await call(registry, 'list_themes');
    expect(Array.isArray(themes) ? themes.length : 0).toBe(10);
    expect(await call(registry, 'get_theme', { name: 'storyteller' })).toMatchObject({ name: expect.any(String) });
  });
});
