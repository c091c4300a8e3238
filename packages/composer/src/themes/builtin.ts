import builtinThemeData from './builtin-themes.json' with { type: 'json' };
import { createTheme, type Theme } from './theme.js';

/** The ten stock personas, validated and frozen at load. */
export const BUILTIN_THEMES: ReadonlyMap<string, Theme> = new Map(
  Object.entries(builtinThemeData).map(([key, fields]) => [key, createTheme(fields)]),
);

export const FALLBACK_THEME = 'thought_leader';
