export * from "./schemas";
export {
  ARTIFACT_TRANSITIONS,
  BATCH_TRANSITIONS,
  POST_TRANSITIONS,
  SCHEDULABLE_ARTIFACT_STATUSES,
  canTransitionArtifact,
  assertArtifactTransition,
  assertBatchTransition,
  assertPostTransition,
} from "./transitions";
export type {
  ArtifactPatch,
  BatchCounterField,
  IContentStore,
  ListArtifactsOptions,
  ListDuePostsOptions,
  NewArtifact,
  NewBatch,
  NewScheduledPost,
  PlatformAccountHealthInput,
  PlatformAccountInput,
  ScheduledPostPatch,
} from "./types";
export { InMemoryContentStore } from "./memory-content-store";
export { LibSqlContentStore } from "./libsql-content-store";
export { migrateContentStore } from "./migrate";
export { createContentDatabase } from "./db";
export type { ContentStoreDbConfig } from "./db";
