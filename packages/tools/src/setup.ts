import type { Config, Logger } from '@postcraft/shared';
import { getDb } from '@postcraft/shared/db';
import { ThemeManager } from '@postcraft/composer';
import { DraftManager, InMemoryDraftStore, PostgresDraftStore, type DraftStore } from '@postcraft/drafts';
import { createLinkedInClient } from '@postcraft/publisher';
import type { ToolContext } from './tools/context.js';

export function createDraftStore(config: Pick<Config, 'draftStore' | 'databaseUrl'>): DraftStore {
  if (config.draftStore === 'postgres' && config.databaseUrl) {
    return new PostgresDraftStore(getDb(config.databaseUrl));
  }
  return new InMemoryDraftStore();
}

/** Wire the services for one session from configuration */
export function createToolContext(config: Config, logger: Logger): ToolContext {
  const themes = new ThemeManager(logger);
  if (config.defaultTheme) themes.get(config.defaultTheme);

  return {
    themes,
    drafts: new DraftManager(createDraftStore(config), themes, logger),
    publisher: createLinkedInClient(logger),
    defaultTheme: config.defaultTheme,
    defaultVisibility: config.defaultVisibility,
  };
}
