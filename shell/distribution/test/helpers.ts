import type {
  ArtifactStatus,
  ContentArtifact,
  IContentStore,
  PlatformAccountInput,
} from "@avatarflow/content-store";

export const MEXICO_CITY = "America/Mexico_City";

export function tiktokAccount(
  overrides: Partial<PlatformAccountInput> = {},
): PlatformAccountInput {
  return {
    id: "acct-tt",
    avatarId: "avatar-1",
    platform: "tiktok",
    handle: "@avatar.one",
    timezone: MEXICO_CITY,
    postingWindow: { startHour: 9, endHour: 21 },
    ...overrides,
  };
}

const PATHS: Record<"eligible" | "borderline" | "rejected", ArtifactStatus[]> = {
  eligible: ["generating", "pending_safety", "safe", "eligible"],
  borderline: ["generating", "pending_safety", "borderline"],
  rejected: ["generating", "pending_safety", "rejected"],
};

/**
 * Create an artifact and walk it through the lifecycle to `status`
 */
export async function createArtifactIn(
  store: IContentStore,
  status: keyof typeof PATHS,
  avatarId = "avatar-1",
): Promise<ContentArtifact> {
  let artifact = await store.createArtifact({
    avatarId,
    batchId: null,
    templateId: "FIT-001",
    promptUsed: "test prompt",
    tier: "basic",
  });
  for (const next of PATHS[status]) {
    artifact = await store.updateArtifactStatus(artifact.id, artifact.status, next);
  }
  return artifact;
}
