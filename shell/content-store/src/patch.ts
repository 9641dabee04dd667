import type { ContentArtifact, ScheduledPost } from "./schemas";
import type { ArtifactPatch, ScheduledPostPatch } from "./types";

function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

export function applyArtifactPatch(
  artifact: ContentArtifact,
  patch: ArtifactPatch,
): ContentArtifact {
  return {
    ...artifact,
    generationCostUsd: pick(patch.generationCostUsd, artifact.generationCostUsd),
    generationLatencyMs: pick(
      patch.generationLatencyMs,
      artifact.generationLatencyMs,
    ),
    safetyVerdict: pick(patch.safetyVerdict, artifact.safetyVerdict),
    safetyScore: pick(patch.safetyScore, artifact.safetyScore),
    safetyFlags: pick(patch.safetyFlags, artifact.safetyFlags),
    storageLocator: pick(patch.storageLocator, artifact.storageLocator),
    lastError: pick(patch.lastError, artifact.lastError),
    metadata: patch.metadata
      ? { ...artifact.metadata, ...patch.metadata }
      : artifact.metadata,
  };
}

export function applyPostPatch(
  post: ScheduledPost,
  patch: ScheduledPostPatch,
): ScheduledPost {
  return {
    ...post,
    scheduledAt: pick(patch.scheduledAt, post.scheduledAt),
    attemptCount: pick(patch.attemptCount, post.attemptCount),
    lastError: pick(patch.lastError, post.lastError),
    publishingStartedAt: pick(
      patch.publishingStartedAt,
      post.publishingStartedAt,
    ),
    publishedAt: pick(patch.publishedAt, post.publishedAt),
    platformPostId: pick(patch.platformPostId, post.platformPostId),
  };
}
