import { z } from 'zod';
import { POST_TYPES } from '@postcraft/shared';
import {
  POST_PATTERNS,
  comparisonPost,
  listiclePost,
  storyPost,
  thoughtLeadershipPost,
  type PostComposer,
  type Theme,
} from '@postcraft/composer';
import { defineTool, type Tool } from '../tool.js';
import { draftIdArg, resolveDraft, type ToolContext } from './context.js';

const selections = z.record(z.string(), z.string());

const PatternContent = z.discriminatedUnion('pattern', [
  z.object({
    pattern: z.literal('thought_leadership'),
    hookStat: z.string(),
    frameworkName: z.string(),
    frameworkParts: z.array(z.string()).min(1),
    conclusion: z.string(),
  }),
  z.object({
    pattern: z.literal('story'),
    hook: z.string(),
    problem: z.string(),
    journey: z.string(),
    solution: z.string(),
    lesson: z.string(),
  }),
  z.object({
    pattern: z.literal('listicle'),
    hook: z.string(),
    items: z.array(z.string()).min(1),
    conclusion: z.string(),
  }),
  z.object({
    pattern: z.literal('comparison'),
    hook: z.string(),
    optionA: z.string(),
    optionB: z.string(),
    recommendation: z.string(),
  }),
]);

function buildPattern(content: z.infer<typeof PatternContent>, theme?: Theme): PostComposer {
  switch (content.pattern) {
    case 'thought_leadership':
      return thoughtLeadershipPost(content, theme);
    case 'story':
      return storyPost(content, theme);
    case 'listicle':
      return listiclePost(content, theme);
    case 'comparison':
      return comparisonPost(content, theme);
  }
}

export function draftTools({ drafts, themes, defaultTheme }: ToolContext): Tool[] {
  return [
    defineTool('create_draft', {
      description: `Create a draft and make it current. Post types: ${POST_TYPES.join(', ')}`,
      input: z.object({
        name: z.string(),
        postType: z.string().optional(),
        theme: z.string().optional(),
        variantSelections: selections.optional(),
      }),
      run: (args) => drafts.create({ ...args, theme: args.theme ?? defaultTheme }),
    }),

    defineTool('create_from_pattern', {
      description: `Create a draft from a ready-made pattern: ${POST_PATTERNS.join(', ')}`,
      input: z.object({ name: z.string(), theme: z.string().optional(), content: PatternContent }),
      run: ({ name, theme: themeName = defaultTheme, content }) => {
        const composer = buildPattern(content, themeName ? themes.get(themeName) : undefined);
        return drafts.create({
          name,
          theme: themeName,
          components: composer.list().map((c) => c.data),
          metadata: { pattern: content.pattern },
        });
      },
    }),

    defineTool('list_drafts', {
      description: 'Summaries of every draft in creation order',
      input: z.object({}),
      run: () => drafts.list(),
    }),

    defineTool('drafts_info', {
      description: 'Draft count, current draft and post types in use',
      input: z.object({}),
      run: () => drafts.info(),
    }),

    defineTool('switch_draft', {
      description: 'Make another draft current',
      input: z.object({ draftId: z.string().min(1) }),
      run: async ({ draftId }) => {
        const draft = await drafts.switch(draftId);
        return { draftId: draft.draftId, name: draft.name };
      },
    }),

    defineTool('get_draft', {
      description: 'Full draft record',
      input: z.object({ draftId: draftIdArg }),
      run: ({ draftId }) => resolveDraft(drafts, draftId),
    }),

    defineTool('update_draft', {
      description: 'Rename a draft, change or clear (null) its theme, merge variant selections and metadata',
      input: z.object({
        draftId: draftIdArg,
        name: z.string().optional(),
        theme: z.string().nullable().optional(),
        variantSelections: selections.optional(),
        metadata: z.record(z.string(), z.unknown()).optional(),
      }),
      run: async ({ draftId, ...changes }) => {
        const draft = await resolveDraft(drafts, draftId);
        return drafts.update(draft.draftId, changes);
      },
    }),

    defineTool('delete_draft', {
      description: 'Delete a draft; the first remaining draft becomes current',
      input: z.object({ draftId: z.string().min(1) }),
      run: async ({ draftId }) => ({
        deleted: await drafts.delete(draftId),
        currentDraftId: drafts.currentDraftId,
      }),
    }),

    defineTool('clear_drafts', {
      description: 'Delete every draft',
      input: z.object({}),
      run: async () => ({ cleared: await drafts.clear() }),
    }),

    defineTool('export_draft', {
      description: 'Draft as a JSON document',
      input: z.object({ draftId: draftIdArg }),
      run: async ({ draftId }) => ({ json: await drafts.export(draftId) }),
    }),

    defineTool('import_draft', {
      description: 'Import a draft exported as JSON; a taken id gets a numeric suffix',
      input: z.object({ json: z.string().min(1) }),
      run: async ({ json }) => {
        const draft = await drafts.import(json);
        return { draftId: draft.draftId, name: draft.name };
      },
    }),

    defineTool('compose_draft', {
      description: 'Compose the post text (adds the theme hook and CTA unless optimize is false)',
      input: z.object({ draftId: draftIdArg, optimize: z.boolean().default(true) }),
      run: ({ draftId, optimize }) => drafts.compose(draftId, { optimize }),
    }),

    defineTool('preview_draft', {
      description: 'Text visible before "see more"',
      input: z.object({ draftId: draftIdArg, chars: z.number().int().positive().optional() }),
      run: async ({ draftId, chars }) => ({ preview: await drafts.preview(draftId, chars) }),
    }),

    defineTool('draft_stats', {
      description: 'Length, word, hashtag and preview statistics',
      input: z.object({ draftId: draftIdArg }),
      run: ({ draftId }) => drafts.stats(draftId),
    }),
  ];
}
