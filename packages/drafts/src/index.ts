export {
  DraftRecordSchema,
  DraftContentSchema,
  parseDraftRecord,
  newDraftId,
  newPreviewToken,
} from './draft.js';
export type { DraftRecord, DraftContent, DraftSummary } from './draft.js';
export { InMemoryDraftStore } from './store.js';
export type { DraftStore } from './store.js';
export { PostgresDraftStore } from './postgres-store.js';
export { DraftManager } from './draft-manager.js';
export type {
  CreateDraftInput,
  UpdateDraftInput,
  ComposeOptions,
  ComposeResult,
  DraftStats,
  DraftManagerInfo,
  DraftManagerOptions,
} from './draft-manager.js';
