import { z } from 'zod';
import { PRIMARY_GOALS } from '@postcraft/shared';
import { listAxes, suggestVariants, themeKey } from '@postcraft/composer';
import { defineTool, type Tool } from '../tool.js';
import type { ToolContext } from './context.js';

export function themeTools({ themes }: ToolContext): Tool[] {
  return [
    defineTool('list_themes', {
      description: 'Every registered theme with its summary',
      input: z.object({}),
      run: () => themes.list().map((key) => ({ key, ...themes.summary(key) })),
    }),

    defineTool('get_theme', {
      description: 'All fields of one theme',
      input: z.object({ name: z.string().min(1) }),
      run: ({ name }) => themes.exportTheme(name),
    }),

    defineTool('recommend_themes', {
      description: `Themes for a primary goal: ${PRIMARY_GOALS.join(', ')}`,
      input: z.object({ goal: z.string().min(1) }),
      run: ({ goal }) => ({ goal, themes: themes.recommend(goal) }),
    }),

    defineTool('create_theme', {
      description: 'Register a custom theme from its fields; a custom theme with the same key is replaced',
      input: z.object({ theme: z.record(z.string(), z.unknown()) }),
      run: ({ theme }) => {
        const created = themes.importTheme(theme);
        return { key: themeKey(created.name), name: created.name };
      },
    }),

    defineTool('list_variant_axes', {
      description: 'Variant axes and options for a post type',
      input: z.object({ postType: z.string().min(1) }),
      run: ({ postType }) => listAxes(postType),
    }),

    defineTool('suggest_variants', {
      description: 'Suggested axis selection for a post type and goal',
      input: z.object({ postType: z.string().min(1), goal: z.string().min(1) }),
      run: ({ postType, goal }) => ({ postType, goal, variantSelections: suggestVariants(postType, goal) }),
    }),
  ];
}
