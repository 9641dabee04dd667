import type { Platform } from "@avatarflow/content-store";
import type {
  PlatformPublisher,
  PublishRequest,
  PublishResult,
} from "@avatarflow/distribution";
import { toFailedPublish } from "./http-errors";

export interface InMemoryPublication {
  platformPostId: string;
  postId: string;
  artifactId: string;
  idempotencyKey: string;
  publishedAt: number;
}

/** Scripted result for the next publish; an Error is thrown from publish */
export type ScriptedOutcome = PublishResult | Error;

/**
 * Sandbox publisher for dry runs and tests. A repeated idempotency key
 * returns the original platform post id without publishing again.
 */
export class InMemoryPublisher implements PlatformPublisher {
  public readonly supportsIdempotency = true;

  private publications = new Map<string, InMemoryPublication>();
  private outcomes: ScriptedOutcome[] = [];
  private attempts = 0;
  private sequence = 0;

  constructor(
    public readonly platform: Platform,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Queue outcomes consumed one per publish call, before the default
   * success applies
   */
  public script(...outcomes: ScriptedOutcome[]): void {
    this.outcomes.push(...outcomes);
  }

  public async publish(request: PublishRequest): Promise<PublishResult> {
    this.attempts++;

    const existing = this.publications.get(request.idempotencyKey);
    if (existing) {
      return {
        success: true,
        platformPostId: existing.platformPostId,
        retryableError: false,
      };
    }

    const outcome = this.outcomes.shift();
    if (outcome instanceof Error) return toFailedPublish(outcome);
    if (outcome && !outcome.success) return outcome;

    const platformPostId =
      outcome?.platformPostId ?? `${this.platform}_${++this.sequence}`;
    this.publications.set(request.idempotencyKey, {
      platformPostId,
      postId: request.post.id,
      artifactId: request.artifact.id,
      idempotencyKey: request.idempotencyKey,
      publishedAt: this.now(),
    });
    return { success: true, platformPostId, retryableError: false };
  }

  public getPublications(): InMemoryPublication[] {
    return Array.from(this.publications.values());
  }

  /** Publish calls received, including deduplicated ones */
  public getAttemptCount(): number {
    return this.attempts;
  }

  public reset(): void {
    this.publications.clear();
    this.outcomes = [];
    this.attempts = 0;
    this.sequence = 0;
  }
}
