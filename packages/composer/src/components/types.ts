import type { BodyStructure, CtaStyle, HashtagPlacement, HookStyle } from '@postcraft/shared';

// ─── Component Kinds ───

export const COMPONENT_KINDS = [
  'hook',
  'body',
  'cta',
  'hashtags',
  'bar_chart',
  'metrics_chart',
  'comparison_chart',
  'progress_chart',
  'ranking_chart',
  'quote',
  'big_stat',
  'timeline',
  'key_takeaway',
  'pro_con',
  'checklist',
  'before_after',
  'tip_box',
  'stats_grid',
  'poll_preview',
  'feature_list',
  'numbered_list',
  'separator',
] as const;
export type ComponentKind = (typeof COMPONENT_KINDS)[number];

export const TIMELINE_STYLES = ['arrow', 'numbered', 'dated'] as const;
export type TimelineStyle = (typeof TIMELINE_STYLES)[number];

export const TAKEAWAY_STYLES = ['box', 'highlight', 'simple'] as const;
export type TakeawayStyle = (typeof TAKEAWAY_STYLES)[number];

export const TIP_STYLES = ['info', 'tip', 'warning', 'success'] as const;
export type TipStyle = (typeof TIP_STYLES)[number];

export const NUMBER_STYLES = ['numbers', 'emoji_numbers', 'bold_numbers'] as const;
export type NumberStyle = (typeof NUMBER_STYLES)[number];

export const SEPARATOR_STYLES = ['line', 'dots', 'wave', 'heavy', 'double', 'minimal'] as const;
export type SeparatorStyle = (typeof SEPARATOR_STYLES)[number];

/** Ordered label/value pair. Charts keep entries in the order given. */
export interface Entry<V> {
  label: string;
  value: V;
}

// ─── Content ───

export interface HookData {
  kind: 'hook';
  style: HookStyle;
  content: string;
}

export interface BodyData {
  kind: 'body';
  content: string;
  structure: BodyStructure;
}

export interface CtaData {
  kind: 'cta';
  style: CtaStyle;
  text: string;
}

export interface HashtagsData {
  kind: 'hashtags';
  tags: string[];
  /** Falls back to the theme's placement, then 'end' */
  placement?: HashtagPlacement;
}

// ─── Charts ───

export interface BarChartData {
  kind: 'bar_chart';
  data: Entry<number>[];
  title?: string;
  unit?: string;
}

export interface MetricsChartData {
  kind: 'metrics_chart';
  data: Entry<string>[];
  title?: string;
}

export interface ComparisonChartData {
  kind: 'comparison_chart';
  data: Entry<string | string[]>[];
  title?: string;
}

export interface ProgressChartData {
  kind: 'progress_chart';
  data: Entry<number>[];
  title?: string;
}

export interface RankingChartData {
  kind: 'ranking_chart';
  data: Entry<string>[];
  title?: string;
  showMedals: boolean;
}

// ─── Features ───

export interface QuoteData {
  kind: 'quote';
  text: string;
  author: string;
  source?: string;
}

export interface BigStatData {
  kind: 'big_stat';
  number: string;
  label: string;
  context?: string;
}

export interface TimelineData {
  kind: 'timeline';
  steps: Entry<string>[];
  title?: string;
  style: TimelineStyle;
}

export interface KeyTakeawayData {
  kind: 'key_takeaway';
  message: string;
  title: string;
  style: TakeawayStyle;
}

export interface ProConData {
  kind: 'pro_con';
  pros: string[];
  cons: string[];
  title?: string;
}

export interface ChecklistItem {
  text: string;
  checked: boolean;
}

export interface ChecklistData {
  kind: 'checklist';
  items: ChecklistItem[];
  title?: string;
  showProgress: boolean;
}

export interface BeforeAfterData {
  kind: 'before_after';
  before: string[];
  after: string[];
  title?: string;
  labels?: { before?: string; after?: string };
}

export interface TipBoxData {
  kind: 'tip_box';
  message: string;
  title?: string;
  style: TipStyle;
}

export interface StatsGridData {
  kind: 'stats_grid';
  stats: Entry<string>[];
  title?: string;
  columns: number;
}

export interface PollPreviewData {
  kind: 'poll_preview';
  question: string;
  options: string[];
}

export interface FeatureItem {
  title: string;
  description?: string;
  icon?: string;
}

export interface FeatureListData {
  kind: 'feature_list';
  features: FeatureItem[];
  title?: string;
}

export interface NumberedListData {
  kind: 'numbered_list';
  items: string[];
  title?: string;
  style: NumberStyle;
  start: number;
}

// ─── Layout ───

export interface SeparatorData {
  kind: 'separator';
  style: SeparatorStyle;
}

export type ComponentData =
  | HookData
  | BodyData
  | CtaData
  | HashtagsData
  | BarChartData
  | MetricsChartData
  | ComparisonChartData
  | ProgressChartData
  | RankingChartData
  | QuoteData
  | BigStatData
  | TimelineData
  | KeyTakeawayData
  | ProConData
  | ChecklistData
  | BeforeAfterData
  | TipBoxData
  | StatsGridData
  | PollPreviewData
  | FeatureListData
  | NumberedListData
  | SeparatorData;

export type ComponentOf<K extends ComponentKind> = Extract<ComponentData, { kind: K }>;
