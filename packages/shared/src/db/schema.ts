import { pgTable, text, varchar, timestamp, jsonb, pgEnum, uniqueIndex } from 'drizzle-orm/pg-core';

// ─── Enums ───

export const postTypeEnum = pgEnum('post_type', ['text', 'poll', 'document']);

// ─── Drafts ───

export const drafts = pgTable(
  'drafts',
  {
    draftId: varchar('draft_id', { length: 128 }).primaryKey(),
    name: varchar('name', { length: 256 }).notNull(),
    postType: postTypeEnum('post_type').notNull(),
    // { components: ComponentData[], composedText?: string }, validated on read
    content: jsonb('content').$type<Record<string, unknown>>().notNull(),
    theme: varchar('theme', { length: 128 }),
    variantSelections: jsonb('variant_selections').$type<Record<string, string>>().default({}).notNull(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().default({}).notNull(),
    previewToken: varchar('preview_token', { length: 64 }).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => [uniqueIndex('drafts_preview_token_idx').on(table.previewToken)],
);

export type DraftRow = typeof drafts.$inferSelect;
export type NewDraftRow = typeof drafts.$inferInsert;
