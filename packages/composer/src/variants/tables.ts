import { z } from 'zod';
import { LookupError, POST_TYPES, isOneOf, type PostType } from '@postcraft/shared';
import tableData from './tables.json' with { type: 'json' };
import suggestionData from './suggestions.json' with { type: 'json' };

// ─── Shapes ───

const ConfigValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.number())]);
const ConfigMapSchema = z.record(z.string(), ConfigValueSchema);
const SelectionSchema = z.record(z.string(), z.string());

const VariantTableSchema = z.object({
  base: ConfigMapSchema,
  variants: z.record(z.string(), z.record(z.string(), ConfigMapSchema)),
  compoundVariants: z.array(z.object({ conditions: SelectionSchema, applies: ConfigMapSchema })),
  defaultVariant: SelectionSchema,
});

export type ConfigValue = z.infer<typeof ConfigValueSchema>;
export type ConfigMap = Readonly<Record<string, ConfigValue>>;
/** Axis name to chosen option, in the caller's order */
export type Selection = Readonly<Record<string, string>>;

export interface CompoundRule {
  readonly conditions: Selection;
  readonly applies: ConfigMap;
}

export interface VariantTable {
  readonly postType: PostType;
  readonly base: ConfigMap;
  readonly variants: Readonly<Record<string, Readonly<Record<string, ConfigMap>>>>;
  /** Applied in declared order; later rules win */
  readonly compoundVariants: readonly CompoundRule[];
  readonly defaultVariant: Selection;
}

export interface AxisSummary {
  axis: string;
  options: string[];
  default?: string;
}

// ─── Registry ───

function freezeDeep<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) freezeDeep(child);
    Object.freeze(value);
  }
  return value;
}

const TABLES: ReadonlyMap<PostType, VariantTable> = new Map(
  POST_TYPES.map((postType) => {
    const table = VariantTableSchema.parse(tableData[postType]);
    return [postType, freezeDeep({ postType, ...table })];
  }),
);

const SUGGESTIONS = freezeDeep(z.record(z.string(), z.record(z.string(), SelectionSchema)).parse(suggestionData));

export function getVariantTable(postType: string): VariantTable {
  const table = isOneOf(POST_TYPES, postType) ? TABLES.get(postType) : undefined;
  if (!table) throw new LookupError('post type', postType);
  return table;
}

/** Axes of a post type with their options, in declared order */
export function listAxes(postType: string): AxisSummary[] {
  const table = getVariantTable(postType);
  return Object.entries(table.variants).map(([axis, options]) => ({
    axis,
    options: Object.keys(options),
    default: table.defaultVariant[axis],
  }));
}

/** Suggested axis selection for a goal. Unknown post types and goals yield `{}`. */
export function suggestVariants(postType: string, goal: string): Selection {
  const byGoal = Object.hasOwn(SUGGESTIONS, postType) ? SUGGESTIONS[postType] : undefined;
  return byGoal && Object.hasOwn(byGoal, goal) ? byGoal[goal] : {};
}
