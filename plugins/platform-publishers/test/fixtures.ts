import type { ContentArtifact, ScheduledPost } from "@avatarflow/content-store";
import type { PublishRequest } from "@avatarflow/distribution";

const NOW = 1_741_618_680_000;

export function artifact(overrides: Partial<ContentArtifact> = {}): ContentArtifact {
  return {
    id: "art_1",
    avatarId: "avatar-1",
    batchId: "batch_1",
    templateId: "FIT-001",
    promptUsed: "test prompt",
    tier: "basic",
    status: "scheduled",
    generationCostUsd: 0.02,
    generationLatencyMs: 1_000,
    safetyVerdict: "safe",
    safetyScore: 0.01,
    safetyFlags: [],
    storageLocator: "https://cdn.example.com/art_1.png",
    lastError: null,
    createdAt: NOW,
    updatedAt: NOW,
    metadata: { caption: "Morning session" },
    ...overrides,
  };
}

export function post(overrides: Partial<ScheduledPost> = {}): ScheduledPost {
  return {
    id: "post_1",
    artifactId: "art_1",
    platformAccountId: "acct-ig",
    platform: "instagram",
    scheduledAt: NOW,
    status: "publishing",
    attemptCount: 1,
    lastError: null,
    publishingStartedAt: NOW,
    publishedAt: null,
    platformPostId: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function publishRequest(
  overrides: Partial<PublishRequest> = {},
): PublishRequest {
  return {
    post: post(),
    artifact: artifact(),
    idempotencyKey: "post_1",
    signal: new AbortController().signal,
    ...overrides,
  };
}
