import type { SeparatorData, SeparatorStyle } from './types.js';

export const SEPARATORS: Record<SeparatorStyle, string> = {
  line: '---',
  dots: '• • •',
  wave: '~',
  heavy: '━━━',
  double: '===',
  minimal: '',
};

export function renderSeparator(data: SeparatorData): string {
  return SEPARATORS[data.style];
}

export function validateSeparator(): boolean {
  return true;
}
