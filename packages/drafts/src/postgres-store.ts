import { drafts, eq, asc, type Database, type DraftRow, type NewDraftRow } from '@postcraft/shared/db';
import { parseDraftRecord, type DraftRecord } from './draft.js';
import type { DraftStore } from './store.js';

/** Draft storage in the `drafts` table. Rows are re-validated on read. */
export class PostgresDraftStore implements DraftStore {
  constructor(private db: Database) {}

  async get(draftId: string): Promise<DraftRecord | null> {
    const row = await this.db.query.drafts.findFirst({
      where: eq(drafts.draftId, draftId),
    });
    return row ? toRecord(row) : null;
  }

  async getByPreviewToken(previewToken: string): Promise<DraftRecord | null> {
    const row = await this.db.query.drafts.findFirst({
      where: eq(drafts.previewToken, previewToken),
    });
    return row ? toRecord(row) : null;
  }

  async list(): Promise<DraftRecord[]> {
    const rows = await this.db.query.drafts.findMany({
      orderBy: [asc(drafts.createdAt)],
    });
    return rows.map(toRecord);
  }

  async save(draft: DraftRecord): Promise<void> {
    const values = toRow(draft);
    const existing = await this.db.query.drafts.findFirst({
      where: eq(drafts.draftId, draft.draftId),
      columns: { draftId: true },
    });

    if (existing) {
      await this.db.update(drafts).set(values).where(eq(drafts.draftId, draft.draftId));
    } else {
      await this.db.insert(drafts).values(values);
    }
  }

  async delete(draftId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(drafts)
      .where(eq(drafts.draftId, draftId))
      .returning({ draftId: drafts.draftId });
    return deleted.length > 0;
  }

  async clear(): Promise<number> {
    const deleted = await this.db.delete(drafts).returning({ draftId: drafts.draftId });
    return deleted.length;
  }
}

function toRecord(row: DraftRow): DraftRecord {
  return parseDraftRecord({
    ...row,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  });
}

function toRow(draft: DraftRecord): NewDraftRow {
  return {
    draftId: draft.draftId,
    name: draft.name,
    postType: draft.postType,
    content: { components: draft.content.components, composedText: draft.content.composedText },
    theme: draft.theme,
    variantSelections: draft.variantSelections,
    metadata: draft.metadata,
    previewToken: draft.previewToken,
    createdAt: new Date(draft.createdAt),
    updatedAt: new Date(draft.updatedAt),
  };
}
