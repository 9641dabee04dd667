import { InvalidRequestError } from "@avatarflow/utils";
import type { ArtifactStatus, BatchStatus, PostStatus } from "./schemas";

/**
 * Artifact lifecycle:
 * requested -> generating -> pending_safety -> safe | borderline | rejected
 * safe -> eligible -> scheduled -> published
 * Anything before published may fail. Rejected and failed are final.
 */
export const ARTIFACT_TRANSITIONS: Record<ArtifactStatus, readonly ArtifactStatus[]> = {
  requested: ["generating", "failed"],
  generating: ["pending_safety", "failed"],
  pending_safety: ["safe", "borderline", "rejected", "failed"],
  safe: ["eligible", "failed"],
  borderline: ["eligible", "rejected", "failed"],
  rejected: [],
  eligible: ["scheduled", "failed"],
  scheduled: ["published", "eligible", "failed"],
  published: [],
  failed: [],
};

export const BATCH_TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  queued: ["running", "cancelled", "failed"],
  running: ["completed", "partially_failed", "failed", "cancelled"],
  completed: [],
  partially_failed: [],
  failed: [],
  cancelled: [],
};

export const POST_TRANSITIONS: Record<PostStatus, readonly PostStatus[]> = {
  pending: ["publishing", "cancelled"],
  // publishing -> publishing reclaims a stalled publish
  publishing: ["published", "pending", "failed", "publishing"],
  published: [],
  failed: [],
  cancelled: [],
};

export function canTransitionArtifact(
  from: ArtifactStatus,
  to: ArtifactStatus,
): boolean {
  return ARTIFACT_TRANSITIONS[from].includes(to);
}

export function assertArtifactTransition(
  from: ArtifactStatus,
  to: ArtifactStatus,
): void {
  if (!canTransitionArtifact(from, to)) {
    throw new InvalidRequestError(
      `Illegal artifact transition ${from} -> ${to}`,
      { from, to },
    );
  }
}

export function assertBatchTransition(from: BatchStatus, to: BatchStatus): void {
  if (!BATCH_TRANSITIONS[from].includes(to)) {
    throw new InvalidRequestError(`Illegal batch transition ${from} -> ${to}`, {
      from,
      to,
    });
  }
}

export function assertPostTransition(from: PostStatus, to: PostStatus): void {
  if (!POST_TRANSITIONS[from].includes(to)) {
    throw new InvalidRequestError(`Illegal post transition ${from} -> ${to}`, {
      from,
      to,
    });
  }
}

/**
 * Statuses from which an artifact may receive a new scheduled post
 */
export const SCHEDULABLE_ARTIFACT_STATUSES: readonly ArtifactStatus[] = [
  "eligible",
  "scheduled",
  "published",
];
