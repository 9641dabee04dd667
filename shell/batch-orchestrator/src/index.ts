export {
  BatchOrchestrator,
  CLASSIFIER_ERROR_FLAG,
  resolveBatchStatus,
} from "./batch-orchestrator";
export type { BatchOrchestratorDeps } from "./batch-orchestrator";
export { BorderlineReview } from "./borderline-review";
export type { BorderlineReviewDeps } from "./borderline-review";
export { summarizeBatch } from "./batch-summary";
export type { BatchSummary } from "./batch-summary";
export { batchOrchestratorConfigSchema } from "./config";
export type { BatchOrchestratorConfig, BatchOrchestratorConfigInput } from "./config";
export {
  TemplateCatalog,
  buildPrompt,
  getDefaultTemplateCatalog,
  promptTemplateSchema,
  templateCatalogSchema,
} from "./templates/template-catalog";
export type { PromptTemplate } from "./templates/template-catalog";
export { createRotatingTemplateSelector } from "./templates/template-selector";
export type {
  GenerationProvider,
  GenerationRequest,
  GenerationResult,
  SafetyClassification,
  SafetyClassificationRequest,
  SafetyGate,
  StartBatchRequest,
  TemplateSelection,
  TemplateSelector,
  WorkItem,
} from "./types";
