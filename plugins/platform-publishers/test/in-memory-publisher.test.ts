import { describe, expect, it } from "vitest";
import { TransientProviderError } from "@avatarflow/utils";
import { InMemoryPublisher } from "../src/in-memory-publisher";
import { post, publishRequest } from "./fixtures";

describe("InMemoryPublisher", () => {
  it("should publish with sequential platform ids", async () => {
    const publisher = new InMemoryPublisher("tiktok", () => 42);

    const first = await publisher.publish(publishRequest());
    const second = await publisher.publish(
      publishRequest({ post: post({ id: "post_2" }), idempotencyKey: "post_2" }),
    );

    expect(first).toEqual({ success: true, platformPostId: "tiktok_1", retryableError: false });
    expect(second.platformPostId).toBe("tiktok_2");
    expect(publisher.getPublications()[0]).toEqual({
      platformPostId: "tiktok_1",
      postId: "post_1",
      artifactId: "art_1",
      idempotencyKey: "post_1",
      publishedAt: 42,
    });
  });

  it("should deduplicate a repeated idempotency key", async () => {
    const publisher = new InMemoryPublisher("tiktok");

    const first = await publisher.publish(publishRequest());
    const again = await publisher.publish(publishRequest());

    expect(again.platformPostId).toBe(first.platformPostId);
    expect(publisher.getPublications()).toHaveLength(1);
    expect(publisher.getAttemptCount()).toBe(2);
  });

  it("should play scripted outcomes in order", async () => {
    const publisher = new InMemoryPublisher("twitter");
    publisher.script(
      { success: false, error: "rate limited", retryableError: true },
      new TransientProviderError("connection reset"),
      { success: true, platformPostId: "tw-99", retryableError: false },
    );

    expect(await publisher.publish(publishRequest())).toEqual({
      success: false,
      error: "rate limited",
      retryableError: true,
    });
    expect(await publisher.publish(publishRequest())).toEqual({
      success: false,
      error: "connection reset",
      retryableError: true,
    });
    expect((await publisher.publish(publishRequest())).platformPostId).toBe("tw-99");
    expect((await publisher.publish(publishRequest())).platformPostId).toBe("tw-99");
    expect(publisher.getPublications()).toHaveLength(1);
  });

  it("should forget everything on reset", async () => {
    const publisher = new InMemoryPublisher("onlyfans");
    await publisher.publish(publishRequest());

    publisher.reset();

    expect(publisher.getPublications()).toEqual([]);
    expect(publisher.getAttemptCount()).toBe(0);
    expect((await publisher.publish(publishRequest())).platformPostId).toBe("onlyfans_1");
  });
});
