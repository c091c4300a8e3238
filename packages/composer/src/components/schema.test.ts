import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { ComponentSchemas, parseComponentData } from './schema.js';

describe('parseComponentData', () => {
  it('fills the same defaults as the composer builders', () => {
    expect(parseComponentData({ kind: 'ranking_chart', data: [{ label: 'a', value: '1' }] })).toEqual({
      kind: 'ranking_chart',
      data: [{ label: 'a', value: '1' }],
      showMedals: true,
    });
    expect(parseComponentData({ kind: 'key_takeaway', message: 'm' })).toEqual({
      kind: 'key_takeaway',
      message: 'm',
      title: 'KEY TAKEAWAY',
      style: 'box',
    });
    expect(parseComponentData({ kind: 'separator' })).toEqual({ kind: 'separator', style: 'line' });
  });

  it('accepts content that validate() would reject', () => {
    expect(parseComponentData({ kind: 'hook', style: 'stat', content: '' })).toEqual({
      kind: 'hook',
      style: 'stat',
      content: '',
    });
  });

  it('rejects unknown kinds and enum values', () => {
    expect(() => parseComponentData({ kind: 'banner', text: 'x' })).toThrow(ZodError);
    expect(() => parseComponentData({ kind: 'hook', style: 'shout', content: 'x' })).toThrow(ZodError);
    expect(() => parseComponentData({ kind: 'bar_chart', data: [{ label: 'a', value: '3' }] })).toThrow(ZodError);
    expect(() => parseComponentData({ kind: 'hashtags', tags: ['ai'], placement: 'footer' })).toThrow(ZodError);
  });

  it('exposes one schema per kind', () => {
    expect(Object.keys(ComponentSchemas)).toHaveLength(22);
  });
});
