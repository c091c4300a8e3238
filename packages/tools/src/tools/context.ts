import { z } from 'zod';
import { NoActiveDraftError, type Visibility } from '@postcraft/shared';
import type { ThemeManager } from '@postcraft/composer';
import type { DraftManager, DraftRecord } from '@postcraft/drafts';
import type { LinkedInClient } from '@postcraft/publisher';

/** Services every tool closes over */
export interface ToolContext {
  drafts: DraftManager;
  themes: ThemeManager;
  publisher: LinkedInClient;
  defaultTheme?: string;
  defaultVisibility?: Visibility;
}

/** Optional draft id; tools fall back to the current draft */
export const draftIdArg = z.string().min(1).optional();

export async function resolveDraft(drafts: DraftManager, draftId?: string): Promise<DraftRecord> {
  if (draftId) return drafts.require(draftId);
  const draft = await drafts.current();
  if (!draft) throw new NoActiveDraftError();
  return draft;
}
