import { NotFoundError } from "@avatarflow/utils";
import type {
  ArtifactStatus,
  BatchStatus,
  IContentStore,
  SafetyVerdict,
  Tier,
} from "@avatarflow/content-store";

export interface BatchSummary {
  batchId: string;
  avatarId: string;
  status: BatchStatus;
  requestedCount: number;
  completedCount: number;
  failedCount: number;
  /** Units not yet resolved (or skipped by a cancellation) */
  unresolvedCount: number;
  totalCostUsd: number;
  /** Averages cover artifacts that produced a binary */
  averageCostUsd: number;
  totalLatencyMs: number;
  averageLatencyMs: number;
  byTier: Record<Tier, number>;
  byVerdict: Record<SafetyVerdict | "unclassified", number>;
  byStatus: Partial<Record<ArtifactStatus, number>>;
}

function roundUsd(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

export async function summarizeBatch(
  store: Pick<IContentStore, "getBatch" | "listBatchArtifacts">,
  batchId: string,
): Promise<BatchSummary> {
  const batch = await store.getBatch(batchId);
  if (!batch) throw new NotFoundError("batch", batchId);
  const artifacts = await store.listBatchArtifacts(batchId);

  const byTier: Record<Tier, number> = { basic: 0, premium: 0, custom: 0 };
  const byVerdict: Record<SafetyVerdict | "unclassified", number> = {
    safe: 0,
    borderline: 0,
    rejected: 0,
    unclassified: 0,
  };
  const byStatus: Partial<Record<ArtifactStatus, number>> = {};

  let totalCostUsd = 0;
  let totalLatencyMs = 0;
  let generated = 0;

  for (const artifact of artifacts) {
    byTier[artifact.tier]++;
    byVerdict[artifact.safetyVerdict ?? "unclassified"]++;
    byStatus[artifact.status] = (byStatus[artifact.status] ?? 0) + 1;

    if (artifact.storageLocator !== null) {
      generated++;
      totalCostUsd += artifact.generationCostUsd;
      totalLatencyMs += artifact.generationLatencyMs;
    }
  }

  return {
    batchId: batch.id,
    avatarId: batch.avatarId,
    status: batch.status,
    requestedCount: batch.requestedCount,
    completedCount: batch.completedCount,
    failedCount: batch.failedCount,
    unresolvedCount: batch.requestedCount - batch.completedCount - batch.failedCount,
    totalCostUsd: roundUsd(totalCostUsd),
    averageCostUsd: generated === 0 ? 0 : roundUsd(totalCostUsd / generated),
    totalLatencyMs,
    averageLatencyMs: generated === 0 ? 0 : Math.round(totalLatencyMs / generated),
    byTier,
    byVerdict,
    byStatus,
  };
}
