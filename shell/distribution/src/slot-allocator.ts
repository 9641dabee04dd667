import type {
  IContentStore,
  PlatformAccount,
  ScheduledPost,
} from "@avatarflow/content-store";
import type { DistributionConfig } from "./config";
import { resolvePlatformPolicy } from "./config";
import { planSlot } from "./slot-planner";

export interface AllocateSlotOptions {
  earliest: number;
  latest: number | null;
  /** Post being moved; its own time does not count as occupied */
  excludePostId?: string;
}

/**
 * Times an account already has committed. Published posts count at the
 * time they actually went out.
 */
export function occupiedTimes(
  posts: readonly ScheduledPost[],
  excludePostId?: string,
): number[] {
  return posts
    .filter((post) => post.id !== excludePostId)
    .map((post) =>
      post.status === "published"
        ? (post.publishedAt ?? post.scheduledAt)
        : post.scheduledAt,
    );
}

/**
 * Plans slots for one account against what the store already holds
 */
export class SlotAllocator {
  constructor(
    private readonly store: Pick<IContentStore, "listAccountPosts">,
    private readonly config: Pick<DistributionConfig, "platformPolicies">,
    private readonly random: () => number,
  ) {}

  public async allocate(
    account: PlatformAccount,
    options: AllocateSlotOptions,
  ): Promise<number> {
    const posts = await this.store.listAccountPosts(account.id, [
      "pending",
      "publishing",
      "published",
    ]);

    return planSlot({
      earliest: options.earliest,
      latest: options.latest,
      timeZone: account.timezone,
      postingWindow: account.postingWindow,
      policy: resolvePlatformPolicy(account, this.config),
      occupied: occupiedTimes(posts, options.excludePostId),
      random: this.random,
    });
  }
}
