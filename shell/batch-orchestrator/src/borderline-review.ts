import { StorageConflictError, systemClock } from "@avatarflow/utils";
import type { Clock, Logger } from "@avatarflow/utils";
import type { ContentArtifact, IContentStore } from "@avatarflow/content-store";

export interface BorderlineReviewDeps {
  store: IContentStore;
  logger: Logger;
  clock?: Clock;
  /** Unset means borderline artifacts wait for an explicit decision */
  autoApproveAfterMs?: number | undefined;
}

/**
 * Decisions on artifacts the safety gate marked borderline
 */
export class BorderlineReview {
  private store: IContentStore;
  private logger: Logger;
  private clock: Clock;
  private autoApproveAfterMs: number | undefined;

  constructor(deps: BorderlineReviewDeps) {
    this.store = deps.store;
    this.logger = deps.logger.child("BorderlineReview");
    this.clock = deps.clock ?? systemClock;
    this.autoApproveAfterMs = deps.autoApproveAfterMs;
  }

  public async listPending(): Promise<ContentArtifact[]> {
    return this.store.listArtifactsByStatus("borderline");
  }

  public async approve(artifactId: string, reviewer = "operator"): Promise<ContentArtifact> {
    const artifact = await this.store.updateArtifactStatus(
      artifactId,
      "borderline",
      "eligible",
      { metadata: { review: { decision: "approved", reviewer, at: this.clock.now() } } },
    );
    this.logger.info(`Borderline artifact ${artifactId} approved by ${reviewer}`);
    return artifact;
  }

  public async reject(artifactId: string, reviewer = "operator"): Promise<ContentArtifact> {
    const artifact = await this.store.updateArtifactStatus(
      artifactId,
      "borderline",
      "rejected",
      {
        safetyVerdict: "rejected",
        metadata: { review: { decision: "rejected", reviewer, at: this.clock.now() } },
      },
    );
    this.logger.info(`Borderline artifact ${artifactId} rejected by ${reviewer}`);
    return artifact;
  }

  /**
   * Approve borderline artifacts that have waited longer than the
   * auto-approve delay. Does nothing when no delay is configured.
   */
  public async promoteStale(): Promise<ContentArtifact[]> {
    if (this.autoApproveAfterMs === undefined) return [];

    const cutoff = this.clock.now() - this.autoApproveAfterMs;
    const stale = await this.store.listArtifactsByStatus("borderline", {
      updatedBefore: cutoff,
    });

    const promoted: ContentArtifact[] = [];
    for (const artifact of stale) {
      try {
        promoted.push(await this.approve(artifact.id, "auto-approve"));
      } catch (error) {
        if (!(error instanceof StorageConflictError)) throw error;
        this.logger.debug(`Artifact ${artifact.id} was reviewed concurrently`);
      }
    }

    if (promoted.length > 0) {
      this.logger.info(`Auto-approved ${promoted.length} borderline artifacts`);
    }
    return promoted;
  }
}
