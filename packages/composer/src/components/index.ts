import type { Theme } from '../themes/theme.js';
import type { ComponentData } from './types.js';
import * as content from './content.js';
import * as charts from './charts.js';
import * as features from './features.js';
import { renderSeparator, validateSeparator } from './separator.js';

export * from './types.js';
export { visibleTags } from './content.js';
export { SEPARATORS } from './separator.js';
export { ComponentSchemas, ComponentDataSchema, parseComponentData } from './schema.js';

function assertNever(value: never): never {
  throw new Error(`Unhandled component: ${JSON.stringify(value)}`);
}

/** Render one component. Pure: depends only on the data and the theme. */
export function renderComponent(data: ComponentData, theme?: Theme): string {
  switch (data.kind) {
    case 'hook': return content.renderHook(data, theme);
    case 'body': return content.renderBody(data, theme);
    case 'cta': return content.renderCta(data, theme);
    case 'hashtags': return content.renderHashtags(data, theme);
    case 'bar_chart': return charts.renderBarChart(data);
    case 'metrics_chart': return charts.renderMetricsChart(data);
    case 'comparison_chart': return charts.renderComparisonChart(data);
    case 'progress_chart': return charts.renderProgressChart(data);
    case 'ranking_chart': return charts.renderRankingChart(data);
    case 'quote': return features.renderQuote(data);
    case 'big_stat': return features.renderBigStat(data);
    case 'timeline': return features.renderTimeline(data);
    case 'key_takeaway': return features.renderKeyTakeaway(data);
    case 'pro_con': return features.renderProCon(data);
    case 'checklist': return features.renderChecklist(data);
    case 'before_after': return features.renderBeforeAfter(data);
    case 'tip_box': return features.renderTipBox(data);
    case 'stats_grid': return features.renderStatsGrid(data);
    case 'poll_preview': return features.renderPollPreview(data);
    case 'feature_list': return features.renderFeatureList(data);
    case 'numbered_list': return features.renderNumberedList(data);
    case 'separator': return renderSeparator(data);
    default: return assertNever(data);
  }
}

/** Local shape and size check. Never throws. */
export function validateComponent(data: ComponentData): boolean {
  switch (data.kind) {
    case 'hook': return content.validateHook(data);
    case 'body': return content.validateBody(data);
    case 'cta': return content.validateCta(data);
    case 'hashtags': return content.validateHashtags(data);
    case 'bar_chart': return charts.validateBarChart(data);
    case 'metrics_chart': return charts.validateMetricsChart(data);
    case 'comparison_chart': return charts.validateComparisonChart(data);
    case 'progress_chart': return charts.validateProgressChart(data);
    case 'ranking_chart': return charts.validateRankingChart(data);
    case 'quote': return features.validateQuote(data);
    case 'big_stat': return features.validateBigStat(data);
    case 'timeline': return features.validateTimeline(data);
    case 'key_takeaway': return features.validateKeyTakeaway(data);
    case 'pro_con': return features.validateProCon(data);
    case 'checklist': return features.validateChecklist(data);
    case 'before_after': return features.validateBeforeAfter(data);
    case 'tip_box': return features.validateTipBox(data);
    case 'stats_grid': return features.validateStatsGrid(data);
    case 'poll_preview': return features.validatePollPreview(data);
    case 'feature_list': return features.validateFeatureList(data);
    case 'numbered_list': return features.validateNumberedList(data);
    case 'separator': return validateSeparator();
    default: return assertNever(data);
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** A component instance: frozen data plus a shared, read-only theme reference. */
export class Component<D extends ComponentData = ComponentData> {
  readonly data: D;

  constructor(
    data: D,
    readonly theme?: Theme,
  ) {
    this.data = deepFreeze(structuredClone(data));
  }

  get kind(): D['kind'] {
    return this.data.kind;
  }

  render(theme?: Theme): string {
    return renderComponent(this.data, theme ?? this.theme);
  }

  validate(): boolean {
    return validateComponent(this.data);
  }
}
