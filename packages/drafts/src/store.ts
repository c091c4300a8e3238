import type { DraftRecord } from './draft.js';

/** Persistence boundary for drafts. Implementations return copies, never live references. */
export interface DraftStore {
  get(draftId: string): Promise<DraftRecord | null>;
  getByPreviewToken(previewToken: string): Promise<DraftRecord | null>;
  /** All drafts in creation order */
  list(): Promise<DraftRecord[]>;
  /** Insert or replace by draftId */
  save(draft: DraftRecord): Promise<void>;
  delete(draftId: string): Promise<boolean>;
  /** Remove every draft, returning how many were removed */
  clear(): Promise<number>;
}

export class InMemoryDraftStore implements DraftStore {
  private readonly drafts = new Map<string, DraftRecord>();

  async get(draftId: string): Promise<DraftRecord | null> {
    const draft = this.drafts.get(draftId);
    return draft ? structuredClone(draft) : null;
  }

  async getByPreviewToken(previewToken: string): Promise<DraftRecord | null> {
    for (const draft of this.drafts.values()) {
      if (draft.previewToken === previewToken) return structuredClone(draft);
    }
    return null;
  }

  async list(): Promise<DraftRecord[]> {
    return [...this.drafts.values()].map((d) => structuredClone(d));
  }

  async save(draft: DraftRecord): Promise<void> {
    this.drafts.set(draft.draftId, structuredClone(draft));
  }

  async delete(draftId: string): Promise<boolean> {
    return this.drafts.delete(draftId);
  }

  async clear(): Promise<number> {
    const count = this.drafts.size;
    this.drafts.clear();
    return count;
  }
}
