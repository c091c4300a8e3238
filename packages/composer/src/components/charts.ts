import type {
  BarChartData,
  ComparisonChartData,
  MetricsChartData,
  ProgressChartData,
  RankingChartData,
} from './types.js';
import {
  BAR_COLORS,
  CHART_EMOJIS,
  INDICATORS,
  MEDALS,
  PROGRESS_BAR,
  SYMBOLS,
  charLength,
  titleLines,
} from '../tokens.js';
import { TEXT_LIMITS } from '@postcraft/shared';

// Charts render the same with or without a theme.

// ─── Bar ───

export function renderBarChart(data: BarChartData): string {
  const lines = titleLines(CHART_EMOJIS.bar, data.title);
  data.data.forEach(({ label, value }, idx) => {
    const bar = BAR_COLORS[idx % BAR_COLORS.length].repeat(Math.trunc(value));
    const valueText = data.unit ? `${value} ${data.unit}`.trim() : String(value);
    lines.push(`${bar} ${label}: ${valueText}`);
  });
  return lines.join('\n');
}

/** Bars are drawn by repeating a square, so values must be finite, non-negative and no wider than a post */
export function validateBarChart(data: BarChartData): boolean {
  return (
    data.data.length > 0 &&
    data.data.every(({ value }) => Number.isFinite(value) && value >= 0 && value <= TEXT_LIMITS.maxLength)
  );
}

// ─── Metrics ───

function metricIndicator(label: string, value: string): string {
  const lower = label.toLowerCase();
  if (value.includes('%') || lower.includes('increase') || lower.includes('growth')) return INDICATORS.positive;
  if (lower.includes('decrease') || lower.includes('down')) return INDICATORS.negative;
  return INDICATORS.positive;
}

export function renderMetricsChart(data: MetricsChartData): string {
  const lines = titleLines(CHART_EMOJIS.metrics, data.title);
  for (const { label, value } of data.data) {
    lines.push(`${metricIndicator(label, value)} ${value} ${SYMBOLS.arrow} ${label}`);
  }
  return lines.join('\n');
}

export function validateMetricsChart(data: MetricsChartData): boolean {
  return data.data.length > 0;
}

// ─── Comparison ───

/** The last entry is the recommended one */
export function renderComparisonChart(data: ComparisonChartData): string {
  const lines = titleLines(CHART_EMOJIS.comparison, data.title);
  const last = data.data.length - 1;
  data.data.forEach(({ label, value }, idx) => {
    lines.push(`${idx === last ? INDICATORS.positive : INDICATORS.negative} ${label}:`);
    if (Array.isArray(value)) {
      for (const point of value) lines.push(`  ${SYMBOLS.bullet} ${point}`);
    } else {
      lines.push(`  ${value}`);
    }
    if (idx < last) lines.push('');
  });
  return lines.join('\n');
}

export function validateComparisonChart(data: ComparisonChartData): boolean {
  return data.data.length >= 2;
}

// ─── Progress ───

export function renderProgressChart(data: ProgressChartData): string {
  const lines = titleLines(CHART_EMOJIS.progress, data.title);
  const width = Math.max(0, ...data.data.map(({ label }) => charLength(label)));
  for (const { label, value } of data.data) {
    const filled = Math.min(PROGRESS_BAR.cells, Math.trunc(value / 10));
    const bar = PROGRESS_BAR.filled.repeat(filled) + PROGRESS_BAR.empty.repeat(PROGRESS_BAR.cells - filled);
    const padded = label + ' '.repeat(width - charLength(label));
    lines.push(`${padded}  ${bar} ${value}%`);
  }
  return lines.join('\n');
}

export function validateProgressChart(data: ProgressChartData): boolean {
  return data.data.length > 0 && data.data.every(({ value }) => value >= 0 && value <= 100);
}

// ─── Ranking ───

export function renderRankingChart(data: RankingChartData): string {
  const lines = titleLines(CHART_EMOJIS.ranking, data.title);
  data.data.forEach(({ label, value }, idx) => {
    const prefix = data.showMedals && idx < MEDALS.length ? MEDALS[idx] : `${idx + 1}.`;
    lines.push(`${prefix} ${label}: ${value}`);
  });
  return lines.join('\n');
}

export function validateRankingChart(data: RankingChartData): boolean {
  return data.data.length > 0;
}
