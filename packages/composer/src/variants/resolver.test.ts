import { describe, it, expect } from 'vitest';
import { LookupError } from '@postcraft/shared';
import {
  axisStage,
  baseStage,
  compoundStage,
  matchesRule,
  resolveVariants,
  themeStage,
  type ResolveContext,
} from './resolver.js';
import { getVariantTable, listAxes, suggestVariants, type VariantTable } from './tables.js';
import { BUILTIN_THEMES } from '../themes/builtin.js';
import type { Theme } from '../themes/theme.js';

function builtin(name: string): Theme {
  const theme = BUILTIN_THEMES.get(name);
  if (!theme) throw new Error(`missing built-in theme ${name}`);
  return theme;
}

const table: VariantTable = {
  postType: 'text',
  base: { a: 1, keep: 'base' },
  variants: {
    x: { on: { a: 2 }, off: { a: 0 } },
    y: { loud: { emojiLevel: 'heavy', b: 'y' } },
  },
  compoundVariants: [{ conditions: { x: 'on' }, applies: { a: 3 } }],
  defaultVariant: { x: 'off' },
};

const tableWithoutRules: VariantTable = { ...table, compoundVariants: [] };

describe('resolveVariants', () => {
  it('starts from a copy of the base', () => {
    const config = resolveVariants(table);
    expect(config).toEqual({ a: 1, keep: 'base' });
    config.a = 99;
    expect(table.base.a).toBe(1);
  });

  it('applies a selected axis over the base', () => {
    expect(resolveVariants(tableWithoutRules, { x: 'on' }).a).toBe(2);
  });

  it('lets a matching compound rule beat the axis', () => {
    expect(resolveVariants(table, { x: 'on' }).a).toBe(3);
    expect(resolveVariants(table, { x: 'off' }).a).toBe(0);
  });

  it('fills theme fields the selection never set', () => {
    const theme = builtin('thought_leader');
    const config = resolveVariants(table, { x: 'on' }, theme);
    expect(config.emojiLevel).toBe('minimal');
    expect(config.lineBreakStyle).toBe('scannable');
    expect(config.formality).toBe('conversational');
    expect(config.hookStyle).toBe('stat');
    expect(config.ctaStyle).toBe('curiosity');
  });

  it('never lets the theme overwrite a selected field', () => {
    const config = resolveVariants(table, { y: 'loud' }, builtin('thought_leader'));
    expect(config.emojiLevel).toBe('heavy');
    expect(config.lineBreakStyle).toBe('scannable');
  });

  it('ignores unknown axes and options', () => {
    expect(resolveVariants(table, { z: 'on', x: 'sideways' })).toEqual({ a: 1, keep: 'base' });
    expect(resolveVariants(table, { constructor: 'on' })).toEqual({ a: 1, keep: 'base' });
  });

  it('merges axes in caller order', () => {
    const clashing: VariantTable = {
      ...tableWithoutRules,
      variants: { p: { one: { c: 'p' } }, q: { one: { c: 'q' } } },
    };
    expect(resolveVariants(clashing, { p: 'one', q: 'one' }).c).toBe('q');
    expect(resolveVariants(clashing, { q: 'one', p: 'one' }).c).toBe('p');
  });

  it('runs custom stage lists', () => {
    expect(resolveVariants(table, { x: 'on' }, undefined, [baseStage, axisStage])).toEqual({ a: 2, keep: 'base' });
  });
});

describe('stages', () => {
  const ctx = (overrides: Partial<ResolveContext> = {}): ResolveContext => ({ table, selected: {}, ...overrides });

  it('baseStage returns the base', () => {
    expect(baseStage({}, ctx())).toEqual({ a: 1, keep: 'base' });
  });

  it('axisStage returns only selected overrides', () => {
    expect(axisStage({}, ctx({ selected: { x: 'on', y: 'loud' } }))).toEqual({ a: 2, emojiLevel: 'heavy', b: 'y' });
  });

  it('compoundStage returns rules in declared order, later winning', () => {
    const layered: VariantTable = {
      ...table,
      compoundVariants: [
        { conditions: { x: 'on' }, applies: { a: 3, d: 'first' } },
        { conditions: { x: 'on', y: 'loud' }, applies: { d: 'second' } },
      ],
    };
    expect(compoundStage({}, { table: layered, selected: { x: 'on' } })).toEqual({ a: 3, d: 'first' });
    expect(compoundStage({}, { table: layered, selected: { x: 'on', y: 'loud' } })).toEqual({ a: 3, d: 'second' });
  });

  it('themeStage is empty without a theme', () => {
    expect(themeStage({}, ctx())).toEqual({});
  });

  it('themeStage skips keys the caller selected by name', () => {
    const fills = themeStage({}, ctx({ selected: { hookStyle: 'anything' }, theme: builtin('storyteller') }));
    expect(fills).toEqual({
      emojiLevel: 'moderate',
      lineBreakStyle: 'dramatic',
      formality: 'conversational',
      ctaStyle: 'soft',
    });
  });
});

describe('matchesRule', () => {
  it('requires every condition to hold', () => {
    const rule = { conditions: { style: 'story', tone: 'inspiring' }, applies: {} };
    expect(matchesRule(rule, { style: 'story', tone: 'inspiring', length: 'long' })).toBe(true);
    expect(matchesRule(rule, { style: 'story' })).toBe(false);
    expect(matchesRule(rule, { style: 'story', tone: 'casual' })).toBe(false);
  });
});

describe('text variant table', () => {
  const text = getVariantTable('text');

  it('resolves story + inspiring through its compound rule', () => {
    const config = resolveVariants(text, { style: 'story', tone: 'inspiring' });
    expect(config).toMatchObject({
      type: 'text',
      maxLength: 3000,
      structure: 'story_arc',
      emojiLevel: 'expressive',
      lineBreakStyle: 'extreme',
      vulnerabilityLevel: 'raw',
      ctaStyle: 'soft',
      hookStyle: 'story',
    });
  });

  it('resolves humorous + micro to a linear share post', () => {
    const config = resolveVariants(text, { style: 'insight', tone: 'humorous', length: 'micro' });
    expect(config.structure).toBe('linear');
    expect(config.hookStyle).toBe('curiosity');
    expect(config.ctaStyle).toBe('share');
    expect(config.idealLength).toEqual([50, 150]);
  });

  it('keeps hot_take + professional free of emoji even under an expressive theme', () => {
    const config = resolveVariants(text, { style: 'hot_take', tone: 'professional' }, builtin('entertainer'));
    expect(config.emojiLevel).toBe('none');
    expect(config.controversyLevel).toBe('moderate');
    expect(config.ctaStyle).toBe('curiosity');
  });

  it('declares its default selection', () => {
    expect(text.defaultVariant).toEqual({ style: 'insight', tone: 'conversational', length: 'medium' });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(text.variants.style.story)).toBe(true);
  });
});

describe('getVariantTable', () => {
  it('covers text, poll and document posts', () => {
    expect(getVariantTable('poll').base.type).toBe('poll');
    expect(getVariantTable('document').base.format).toBe('pdf');
  });

  it('throws LookupError for unknown post types', () => {
    expect(() => getVariantTable('carousel')).toThrow(LookupError);
    expect(() => getVariantTable('carousel')).toThrow("Unknown post type: 'carousel'");
  });
});

describe('listAxes', () => {
  it('summarizes axes with their defaults', () => {
    expect(listAxes('poll')).toEqual([
      { axis: 'purpose', options: ['engagement', 'research', 'decision', 'fun'], default: 'engagement' },
      { axis: 'questionType', options: ['binary', 'multiple_choice'], default: 'binary' },
    ]);
  });
});

describe('suggestVariants', () => {
  it('looks up a selection by goal', () => {
    expect(suggestVariants('text', 'virality')).toEqual({ style: 'hot_take', tone: 'conversational', length: 'micro' });
    expect(suggestVariants('document', 'education')).toEqual({ contentType: 'guide', designStyle: 'professional' });
  });

  it('returns an empty selection for unknown combinations', () => {
    expect(suggestVariants('text', 'education')).toEqual({});
    expect(suggestVariants('carousel', 'authority')).toEqual({});
    expect(suggestVariants('text', 'toString')).toEqual({});
  });
});
