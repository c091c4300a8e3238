import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { POST_TYPES, type PostType } from '@postcraft/shared';
import { ComponentDataSchema, type ComponentData } from '@postcraft/composer';

// ─── Schema ───

export const DRAFT_ID_MAX_LENGTH = 128;

export const DraftContentSchema = z.object({
  components: z.array(ComponentDataSchema).default([]),
  composedText: z.string().optional(),
});

export const DraftRecordSchema = z.object({
  draftId: z.string().min(1).max(DRAFT_ID_MAX_LENGTH),
  name: z.string().trim().min(1).max(256),
  postType: z.enum(POST_TYPES),
  content: DraftContentSchema.default({}),
  theme: z.string().nullable().default(null),
  variantSelections: z.record(z.string()).default({}),
  metadata: z.record(z.unknown()).default({}),
  previewToken: z
    .string()
    .min(1)
    .max(64)
    .default(() => newPreviewToken()),
  createdAt: z
    .string()
    .datetime({ offset: true })
    .default(() => new Date().toISOString()),
  updatedAt: z
    .string()
    .datetime({ offset: true })
    .default(() => new Date().toISOString()),
});

// ─── Types ───

export interface DraftContent {
  components: ComponentData[];
  /** Text produced by the last compose() */
  composedText?: string;
}

export interface DraftRecord {
  draftId: string;
  name: string;
  postType: PostType;
  content: DraftContent;
  theme: string | null;
  variantSelections: Record<string, string>;
  metadata: Record<string, unknown>;
  /** Opaque token for shareable preview links */
  previewToken: string;
  createdAt: string;
  updatedAt: string;
}

export interface DraftSummary {
  draftId: string;
  name: string;
  postType: PostType;
  theme: string | null;
  componentCount: number;
  createdAt: string;
  updatedAt: string;
  isCurrent: boolean;
}

// ─── Helpers ───

export function newDraftId(): string {
  return `draft_${randomUUID()}`;
}

export function newPreviewToken(): string {
  return randomUUID().replace(/-/g, '');
}

/** Validate a record from storage or an import; throws ZodError */
export function parseDraftRecord(value: unknown): DraftRecord {
  return DraftRecordSchema.parse(value);
}
