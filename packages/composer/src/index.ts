export * from './components/index.js';
export {
  LINE_BREAKS,
  IDEAL_LENGTH,
  SYMBOLS,
  CTA_EMOJIS,
  EMOJI_NUMBERS,
  DEFAULT_CTA_PROMPT,
  charLength,
  truncateChars,
} from './tokens.js';
export { ThemeSchema, createTheme, themeKey } from './themes/theme.js';
export type { Theme, ThemeFields, ThemeInput } from './themes/theme.js';
export { BUILTIN_THEMES, FALLBACK_THEME } from './themes/builtin.js';
export { ThemeManager } from './themes/theme-manager.js';
export type { ThemeSummary } from './themes/theme-manager.js';
export { getVariantTable, listAxes, suggestVariants } from './variants/tables.js';
export type { AxisSummary, CompoundRule, ConfigMap, ConfigValue, Selection, VariantTable } from './variants/tables.js';
export {
  resolveVariants,
  matchesRule,
  baseStage,
  axisStage,
  compoundStage,
  themeStage,
  RESOLVER_STAGES,
  THEME_BRIDGE_KEYS,
} from './variants/resolver.js';
export type { EffectiveConfig, ResolveContext, ResolverStage } from './variants/resolver.js';
export { PostComposer } from './composer.js';
export type {
  ComposerOptions,
  ComposeReport,
  ComposerSummary,
  RenderedComponent,
  SkippedComponent,
} from './composer.js';
export {
  POST_PATTERNS,
  thoughtLeadershipPost,
  storyPost,
  listiclePost,
  comparisonPost,
} from './post-builder.js';
export type {
  PostPattern,
  ThoughtLeadershipInput,
  StoryInput,
  ListicleInput,
  ComparisonInput,
} from './post-builder.js';
