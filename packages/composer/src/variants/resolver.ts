import type { Theme } from '../themes/theme.js';
import type { CompoundRule, ConfigMap, ConfigValue, Selection, VariantTable } from './tables.js';

/** Effective configuration: the merged result of every stage, recomputed on demand. */
export type EffectiveConfig = Record<string, ConfigValue>;

export interface ResolveContext {
  table: VariantTable;
  selected: Selection;
  theme?: Theme;
}

/** One override-producing stage. Stages run in order; later keys win. */
export type ResolverStage = (acc: Readonly<EffectiveConfig>, ctx: ResolveContext) => ConfigMap;

/** Theme fields the resolver copies into the configuration */
export const THEME_BRIDGE_KEYS = ['emojiLevel', 'lineBreakStyle', 'formality', 'hookStyle', 'ctaStyle'] as const;

function optionOverrides(table: VariantTable, axis: string, option: string): ConfigMap | undefined {
  const options = Object.hasOwn(table.variants, axis) ? table.variants[axis] : undefined;
  return options && Object.hasOwn(options, option) ? options[option] : undefined;
}

/** AND of equalities over the rule's conditions */
export function matchesRule(rule: CompoundRule, selected: Selection): boolean {
  return Object.entries(rule.conditions).every(
    ([axis, option]) => Object.hasOwn(selected, axis) && selected[axis] === option,
  );
}

function merge(maps: readonly ConfigMap[]): EffectiveConfig {
  return maps.reduce<EffectiveConfig>((acc, map) => ({ ...acc, ...map }), {});
}

// ─── Stages ───

export const baseStage: ResolverStage = (_acc, { table }) => table.base;

/** Selected axes in caller order. Unknown axes and options contribute nothing. */
export const axisStage: ResolverStage = (_acc, { table, selected }) =>
  merge(Object.entries(selected).map(([axis, option]) => optionOverrides(table, axis, option) ?? {}));

export const compoundStage: ResolverStage = (_acc, { table, selected }) =>
  merge(table.compoundVariants.filter((rule) => matchesRule(rule, selected)).map((rule) => rule.applies));

/** Fills bridge keys from the theme unless the caller chose them, directly or
 * through a selected option or a matching compound rule. */
export const themeStage: ResolverStage = (_acc, ctx) => {
  const { theme, selected } = ctx;
  if (!theme) return {};

  const explicit = new Set([
    ...Object.keys(selected),
    ...Object.keys(axisStage({}, ctx)),
    ...Object.keys(compoundStage({}, ctx)),
  ]);

  const fills: EffectiveConfig = {};
  for (const key of THEME_BRIDGE_KEYS) {
    if (!explicit.has(key)) fills[key] = theme[key];
  }
  return fills;
};

export const RESOLVER_STAGES: readonly ResolverStage[] = [baseStage, axisStage, compoundStage, themeStage];

/** Fold base, selected axes, matching compound rules and theme gap-fill into one configuration. */
export function resolveVariants(
  table: VariantTable,
  selected: Selection = {},
  theme?: Theme,
  stages: readonly ResolverStage[] = RESOLVER_STAGES,
): EffectiveConfig {
  const ctx: ResolveContext = { table, selected, theme };
  return stages.reduce<EffectiveConfig>((acc, stage) => ({ ...acc, ...stage(acc, ctx) }), {});
}
