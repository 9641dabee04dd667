import { StorageConflictError } from "@avatarflow/utils";
import type { ContentArtifact, IContentStore } from "@avatarflow/content-store";

type ArtifactStatusStore = Pick<
  IContentStore,
  "getArtifact" | "updateArtifactStatus" | "listArtifactPosts"
>;

const MAX_ATTEMPTS = 3;

/**
 * eligible -> scheduled once the artifact has an active post.
 * Artifacts already scheduled or published are left as they are.
 */
export async function markArtifactScheduled(
  store: ArtifactStatusStore,
  artifactId: string,
): Promise<ContentArtifact | null> {
  return moveIf(store, artifactId, "eligible", "scheduled");
}

/**
 * scheduled -> published on the first successful publish
 */
export async function markArtifactPublished(
  store: ArtifactStatusStore,
  artifactId: string,
): Promise<ContentArtifact | null> {
  return moveIf(store, artifactId, "scheduled", "published");
}

/**
 * scheduled -> eligible when a never-published artifact has no active
 * post left on any platform
 */
export async function releaseArtifactIfIdle(
  store: ArtifactStatusStore,
  artifactId: string,
): Promise<ContentArtifact | null> {
  const remaining = await store.listArtifactPosts(artifactId, [
    "pending",
    "publishing",
    "published",
  ]);
  if (remaining.length > 0) return store.getArtifact(artifactId);
  return moveIf(store, artifactId, "scheduled", "eligible");
}

async function moveIf(
  store: ArtifactStatusStore,
  artifactId: string,
  from: ContentArtifact["status"],
  to: ContentArtifact["status"],
): Promise<ContentArtifact | null> {
  for (let attempt = 1; ; attempt++) {
    const artifact = await store.getArtifact(artifactId);
    if (!artifact || artifact.status !== from) return artifact;
    try {
      return await store.updateArtifactStatus(artifactId, from, to);
    } catch (error) {
      if (!(error instanceof StorageConflictError) || attempt >= MAX_ATTEMPTS) {
        throw error;
      }
    }
  }
}
