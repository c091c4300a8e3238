import type {
  BeforeAfterData,
  BigStatData,
  ChecklistData,
  FeatureListData,
  KeyTakeawayData,
  NumberedListData,
  PollPreviewData,
  ProConData,
  QuoteData,
  StatsGridData,
  TimelineData,
  TipBoxData,
  TipStyle,
} from './types.js';
import { CHART_EMOJIS, EMOJI_NUMBERS, INDICATORS, SYMBOLS, charLength, titleLines } from '../tokens.js';

const MAX_QUOTE_LENGTH = 500;
const MAX_TAKEAWAY_LENGTH = 500;

const isFilled = (s: string) => s.trim().length > 0;

// ─── Quote ───

export function renderQuote(data: QuoteData): string {
  const attribution = data.source ? `${data.author}, ${data.source}` : data.author;
  return `${SYMBOLS.quote} "${data.text}"\n   — ${attribution}`;
}

export function validateQuote(data: QuoteData): boolean {
  const length = charLength(data.text);
  return length > 0 && length <= MAX_QUOTE_LENGTH && data.author.length > 0;
}

// ─── Big Stat ───

export function renderBigStat(data: BigStatData): string {
  const lines = [`${CHART_EMOJIS.metrics} ${data.number}`, data.label];
  if (data.context) lines.push('', data.context);
  return lines.join('\n');
}

export function validateBigStat(data: BigStatData): boolean {
  return data.number.length > 0 && data.label.length > 0;
}

// ─── Timeline ───

export function renderTimeline(data: TimelineData): string {
  const lines = titleLines(SYMBOLS.calendar, data.title);
  data.steps.forEach(({ label, value }, idx) => {
    switch (data.style) {
      case 'numbered':
        lines.push(`${idx + 1}. ${label}: ${value}`);
        break;
      case 'dated':
        lines.push(`${label} | ${value}`);
        break;
      case 'arrow':
        lines.push(`${label} ${SYMBOLS.arrow} ${value}`);
        break;
    }
  });
  return lines.join('\n');
}

export function validateTimeline(data: TimelineData): boolean {
  return data.steps.length >= 2;
}

// ─── Key Takeaway ───

export function renderKeyTakeaway(data: KeyTakeawayData): string {
  switch (data.style) {
    case 'box':
      return `${SYMBOLS.lightbulb} ${data.title}:\n\n${data.message}`;
    case 'highlight':
      return `${SYMBOLS.lightbulb} ${data.message}`;
    case 'simple':
      return data.message;
  }
}

export function validateKeyTakeaway(data: KeyTakeawayData): boolean {
  const length = charLength(data.message);
  return length > 0 && length <= MAX_TAKEAWAY_LENGTH;
}

// ─── Pros & Cons ───

export function renderProCon(data: ProConData): string {
  const lines = titleLines(CHART_EMOJIS.comparison, data.title);
  lines.push(`${INDICATORS.positive} PROS:`, ...data.pros.map((p) => `${SYMBOLS.bullet} ${p}`));
  lines.push('');
  lines.push(`${INDICATORS.negative} CONS:`, ...data.cons.map((c) => `${SYMBOLS.bullet} ${c}`));
  return lines.join('\n');
}

export function validateProCon(data: ProConData): boolean {
  return data.pros.length > 0 && data.cons.length > 0 && data.pros.every(isFilled) && data.cons.every(isFilled);
}

// ─── Checklist ───

export function renderChecklist(data: ChecklistData): string {
  const lines = titleLines(SYMBOLS.checkmark, data.title);
  if (data.showProgress) {
    const done = data.items.filter((item) => item.checked).length;
    lines.push(`Progress: ${done}/${data.items.length} complete`, '');
  }
  for (const item of data.items) {
    lines.push(`${item.checked ? SYMBOLS.checked : SYMBOLS.unchecked} ${item.text}`);
  }
  return lines.join('\n');
}

export function validateChecklist(data: ChecklistData): boolean {
  return data.items.length > 0 && data.items.every((item) => item.text.length > 0);
}

// ─── Before / After ───

export function renderBeforeAfter(data: BeforeAfterData): string {
  const lines = titleLines(SYMBOLS.transformation, data.title);
  const before = data.labels?.before ?? 'BEFORE';
  const after = data.labels?.after ?? 'AFTER';
  lines.push(`${INDICATORS.negative} ${before}:`, ...data.before.map((item) => `${SYMBOLS.bullet} ${item}`));
  lines.push('');
  lines.push(`${INDICATORS.positive} ${after}:`, ...data.after.map((item) => `${SYMBOLS.bullet} ${item}`));
  return lines.join('\n');
}

export function validateBeforeAfter(data: BeforeAfterData): boolean {
  return (
    data.before.length > 0 && data.after.length > 0 && data.before.every(isFilled) && data.after.every(isFilled)
  );
}

// ─── Tip Box ───

const TIP_BOXES: Record<TipStyle, { emoji: string; title: string }> = {
  info: { emoji: 'ℹ️', title: 'INFO' },
  tip: { emoji: '💡', title: 'PRO TIP' },
  warning: { emoji: '⚠️', title: 'WARNING' },
  success: { emoji: '✅', title: 'SUCCESS' },
};

export function renderTipBox(data: TipBoxData): string {
  const box = TIP_BOXES[data.style];
  const title = (data.title || box.title).toUpperCase();
  return `${box.emoji} ${title}:\n\n${data.message}`;
}

export function validateTipBox(data: TipBoxData): boolean {
  return isFilled(data.message);
}

// ─── Stats Grid ───

export function renderStatsGrid(data: StatsGridData): string {
  const lines = titleLines(CHART_EMOJIS.stats, data.title);
  for (let i = 0; i < data.stats.length; i += data.columns) {
    const row = data.stats.slice(i, i + data.columns);
    lines.push(row.map(({ label, value }) => `${label}: ${value}`).join('  |  '));
  }
  return lines.join('\n');
}

export function validateStatsGrid(data: StatsGridData): boolean {
  return (
    data.stats.length >= 2 &&
    Number.isInteger(data.columns) &&
    data.columns >= 1 &&
    data.columns <= 4 &&
    data.stats.every(({ label, value }) => isFilled(label) && isFilled(value))
  );
}

// ─── Poll Preview ───

export function renderPollPreview(data: PollPreviewData): string {
  return [
    `${SYMBOLS.poll} POLL:`,
    '',
    data.question,
    '',
    ...data.options.map((option) => `${SYMBOLS.radio} ${option}`),
    '',
    `${SYMBOLS.quote} Vote in the poll below!`,
  ].join('\n');
}

export function validatePollPreview(data: PollPreviewData): boolean {
  return (
    isFilled(data.question) && data.options.length >= 2 && data.options.length <= 4 && data.options.every(isFilled)
  );
}

// ─── Feature List ───

export function renderFeatureList(data: FeatureListData): string {
  const lines = titleLines(SYMBOLS.features, data.title);
  for (const feature of data.features) {
    lines.push(`${feature.icon ?? SYMBOLS.bullet} ${feature.title}`);
    if (feature.description) lines.push(`   ${feature.description}`);
  }
  return lines.join('\n');
}

export function validateFeatureList(data: FeatureListData): boolean {
  return data.features.length > 0 && data.features.every((f) => isFilled(f.title));
}

// ─── Numbered List ───

function numberPrefix(style: NumberedListData['style'], n: number): string {
  switch (style) {
    case 'emoji_numbers':
      // only ten keycap glyphs exist
      return n <= EMOJI_NUMBERS.length ? EMOJI_NUMBERS[n - 1] : `${n}.`;
    case 'bold_numbers':
      return `[${n}]`;
    case 'numbers':
      return `${n}.`;
  }
}

export function renderNumberedList(data: NumberedListData): string {
  const lines = titleLines(SYMBOLS.list, data.title);
  data.items.forEach((item, idx) => {
    lines.push(`${numberPrefix(data.style, data.start + idx)} ${item}`);
  });
  return lines.join('\n');
}

export function validateNumberedList(data: NumberedListData): boolean {
  return data.items.length > 0 && data.items.every(isFilled) && Number.isInteger(data.start) && data.start >= 1;
}
