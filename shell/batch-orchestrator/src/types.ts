import type {
  SafetyVerdict,
  Tier,
  TierDistribution,
} from "@avatarflow/content-store";
import type { PromptTemplate } from "./templates/template-catalog";

export interface GenerationRequest {
  prompt: string;
  /** Template fields the provider may map onto its own parameters */
  templateParams: Record<string, unknown>;
  /** Opaque reference to the avatar's fine-tuned model */
  avatarModelRef: string;
  /** Aborted when the caller's timeout fires */
  signal: AbortSignal;
}

export interface GenerationResult {
  binaryLocator: string;
  costUsd: number;
  latencyMs: number;
}

/**
 * External image generator. Throw TransientProviderError for failures worth
 * retrying and PermanentProviderError for those that are not.
 */
export interface GenerationProvider {
  readonly name: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface SafetyClassificationRequest {
  binaryLocator: string;
  promptUsed: string;
  signal?: AbortSignal;
}

export interface SafetyClassification {
  verdict: SafetyVerdict;
  /** 0..1, higher is less safe */
  score: number;
  flags: string[];
}

export interface SafetyGate {
  classify(request: SafetyClassificationRequest): Promise<SafetyClassification>;
}

export interface TemplateSelection {
  tier: Tier;
  /** Position of the work item within the batch */
  index: number;
  /** Template ids already assigned in this batch, in assignment order */
  usedTemplateIds: readonly string[];
}

/**
 * Picks the template for one work item. Returning null means the item uses
 * the batch's custom prompt.
 */
export type TemplateSelector = (selection: TemplateSelection) => PromptTemplate | null;

export interface StartBatchRequest {
  avatarId: string;
  avatarModelRef: string;
  requestedCount: number;
  tierDistribution: TierDistribution;
  /** Defaults to the orchestrator's selector */
  templateSelector?: TemplateSelector;
  /** Prompt for items the selector leaves without a template */
  customPrompt?: string;
}

export interface WorkItem {
  index: number;
  tier: Tier;
  template: PromptTemplate | null;
  prompt: string;
}
