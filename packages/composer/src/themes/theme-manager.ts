import { LookupError, scoped, type Logger } from '@postcraft/shared';
import { BUILTIN_THEMES, FALLBACK_THEME } from './builtin.js';
import { createTheme, themeKey, ThemeSchema, type Theme, type ThemeFields, type ThemeInput } from './theme.js';

export interface ThemeSummary {
  name: string;
  description: string;
  tone: Theme['tone'];
  goal: Theme['primaryGoal'];
  postFrequency: string;
  bestFormats: readonly Theme['preferredFormats'][number][];
  emojiLevel: Theme['emojiLevel'];
  controversyLevel: Theme['controversyLevel'];
}

/** Theme registry: the built-in themes plus custom themes registered on this instance.
 * Built-ins cannot be replaced; a custom theme whose key is already taken by another
 * custom theme overwrites it. */
export class ThemeManager {
  private readonly custom = new Map<string, Theme>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = scoped(logger, 'theme-manager');
  }

  get(name: string): Theme {
    const theme = BUILTIN_THEMES.get(name) ?? this.custom.get(name);
    if (!theme) throw new LookupError('theme', name);
    return theme;
  }

  has(name: string): boolean {
    return BUILTIN_THEMES.has(name) || this.custom.has(name);
  }

  list(): string[] {
    return [...BUILTIN_THEMES.keys(), ...[...this.custom.keys()].filter((k) => !BUILTIN_THEMES.has(k))];
  }

  all(): Record<string, Theme> {
    return Object.fromEntries(this.list().map((key) => [key, this.get(key)]));
  }

  createCustom(fields: ThemeInput): Theme {
    return this.register(fields);
  }

  /** Register a theme from untrusted data, e.g. a parsed JSON export */
  importTheme(data: unknown): Theme {
    return this.register(data);
  }

  /** Plain, mutable copy of a theme's fields */
  exportTheme(name: string): ThemeFields {
    return ThemeSchema.parse(this.get(name));
  }

  summary(name: string): ThemeSummary {
    const theme = this.get(name);
    return {
      name: theme.name,
      description: theme.description,
      tone: theme.tone,
      goal: theme.primaryGoal,
      postFrequency: `${theme.postFrequency}x per week`,
      bestFormats: theme.preferredFormats,
      emojiLevel: theme.emojiLevel,
      controversyLevel: theme.controversyLevel,
    };
  }

  /** Theme keys whose primary goal matches, or the fallback theme when none do */
  recommend(goal: string): string[] {
    const wanted = goal.toLowerCase();
    const matches = this.list().filter((key) => this.get(key).primaryGoal === wanted);
    return matches.length > 0 ? matches : [FALLBACK_THEME];
  }

  private register(fields: unknown): Theme {
    const theme = createTheme(fields);
    const key = themeKey(theme.name);
    if (BUILTIN_THEMES.has(key)) {
      this.logger.warn({ key }, 'Custom theme shadowed by built-in theme');
    } else if (this.custom.has(key)) {
      this.logger.info({ key }, 'Replacing custom theme');
    }
    this.custom.set(key, theme);
    this.logger.info({ key, name: theme.name }, 'Custom theme registered');
    return theme;
  }
}
