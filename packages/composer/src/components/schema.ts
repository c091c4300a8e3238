import { z } from 'zod';
import { BODY_STRUCTURES, CTA_STYLES, HASHTAG_PLACEMENTS, HOOK_STYLES } from '@postcraft/shared';
import {
  NUMBER_STYLES,
  SEPARATOR_STYLES,
  TAKEAWAY_STYLES,
  TIMELINE_STYLES,
  TIP_STYLES,
  type ComponentData,
} from './types.js';

/** Structural schemas for component data arriving from storage or tool calls.
 * They check shape only; content rules stay in each kind's validate(). */

const entry = <V extends z.ZodTypeAny>(value: V) => z.object({ label: z.string(), value });

export const ComponentSchemas = {
  hook: z.object({ kind: z.literal('hook'), style: z.enum(HOOK_STYLES), content: z.string() }),
  body: z.object({
    kind: z.literal('body'),
    content: z.string(),
    structure: z.enum(BODY_STRUCTURES).default('linear'),
  }),
  cta: z.object({ kind: z.literal('cta'), style: z.enum(CTA_STYLES), text: z.string() }),
  hashtags: z.object({
    kind: z.literal('hashtags'),
    tags: z.array(z.string()),
    placement: z.enum(HASHTAG_PLACEMENTS).optional(),
  }),

  bar_chart: z.object({
    kind: z.literal('bar_chart'),
    data: z.array(entry(z.number())),
    title: z.string().optional(),
    unit: z.string().optional(),
  }),
  metrics_chart: z.object({
    kind: z.literal('metrics_chart'),
    data: z.array(entry(z.string())),
    title: z.string().optional(),
  }),
  comparison_chart: z.object({
    kind: z.literal('comparison_chart'),
    data: z.array(entry(z.union([z.string(), z.array(z.string())]))),
    title: z.string().optional(),
  }),
  progress_chart: z.object({
    kind: z.literal('progress_chart'),
    data: z.array(entry(z.number())),
    title: z.string().optional(),
  }),
  ranking_chart: z.object({
    kind: z.literal('ranking_chart'),
    data: z.array(entry(z.string())),
    title: z.string().optional(),
    showMedals: z.boolean().default(true),
  }),

  quote: z.object({
    kind: z.literal('quote'),
    text: z.string(),
    author: z.string(),
    source: z.string().optional(),
  }),
  big_stat: z.object({
    kind: z.literal('big_stat'),
    number: z.string(),
    label: z.string(),
    context: z.string().optional(),
  }),
  timeline: z.object({
    kind: z.literal('timeline'),
    steps: z.array(entry(z.string())),
    title: z.string().optional(),
    style: z.enum(TIMELINE_STYLES).default('arrow'),
  }),
  key_takeaway: z.object({
    kind: z.literal('key_takeaway'),
    message: z.string(),
    title: z.string().default('KEY TAKEAWAY'),
    style: z.enum(TAKEAWAY_STYLES).default('box'),
  }),
  pro_con: z.object({
    kind: z.literal('pro_con'),
    pros: z.array(z.string()),
    cons: z.array(z.string()),
    title: z.string().optional(),
  }),
  checklist: z.object({
    kind: z.literal('checklist'),
    items: z.array(z.object({ text: z.string(), checked: z.boolean().default(false) })),
    title: z.string().optional(),
    showProgress: z.boolean().default(false),
  }),
  before_after: z.object({
    kind: z.literal('before_after'),
    before: z.array(z.string()),
    after: z.array(z.string()),
    title: z.string().optional(),
    labels: z.object({ before: z.string().optional(), after: z.string().optional() }).optional(),
  }),
  tip_box: z.object({
    kind: z.literal('tip_box'),
    message: z.string(),
    title: z.string().optional(),
    style: z.enum(TIP_STYLES).default('info'),
  }),
  stats_grid: z.object({
    kind: z.literal('stats_grid'),
    stats: z.array(entry(z.string())),
    title: z.string().optional(),
    columns: z.number().default(2),
  }),
  poll_preview: z.object({ kind: z.literal('poll_preview'), question: z.string(), options: z.array(z.string()) }),
  feature_list: z.object({
    kind: z.literal('feature_list'),
    features: z.array(
      z.object({ title: z.string(), description: z.string().optional(), icon: z.string().optional() }),
    ),
    title: z.string().optional(),
  }),
  numbered_list: z.object({
    kind: z.literal('numbered_list'),
    items: z.array(z.string()),
    title: z.string().optional(),
    style: z.enum(NUMBER_STYLES).default('numbers'),
    start: z.number().default(1),
  }),

  separator: z.object({ kind: z.literal('separator'), style: z.enum(SEPARATOR_STYLES).default('line') }),
} as const;

export const ComponentDataSchema = z.discriminatedUnion('kind', [
  ComponentSchemas.hook,
  ComponentSchemas.body,
  ComponentSchemas.cta,
  ComponentSchemas.hashtags,
  ComponentSchemas.bar_chart,
  ComponentSchemas.metrics_chart,
  ComponentSchemas.comparison_chart,
  ComponentSchemas.progress_chart,
  ComponentSchemas.ranking_chart,
  ComponentSchemas.quote,
  ComponentSchemas.big_stat,
  ComponentSchemas.timeline,
  ComponentSchemas.key_takeaway,
  ComponentSchemas.pro_con,
  ComponentSchemas.checklist,
  ComponentSchemas.before_after,
  ComponentSchemas.tip_box,
  ComponentSchemas.stats_grid,
  ComponentSchemas.poll_preview,
  ComponentSchemas.feature_list,
  ComponentSchemas.numbered_list,
  ComponentSchemas.separator,
]);

/** Parse untrusted component data; throws ZodError on a malformed shape */
export function parseComponentData(value: unknown): ComponentData {
  return ComponentDataSchema.parse(value);
}
