import { PermanentProviderError, z } from "@avatarflow/utils";
import type { Logger } from "@avatarflow/utils";
import type { ContentArtifact, ScheduledPost } from "@avatarflow/content-store";
import type {
  PlatformPublisher,
  PublishRequest,
  PublishResult,
} from "@avatarflow/distribution";
import { httpError, toFailedPublish } from "./http-errors";

export const instagramConfigSchema = z.object({
  accessToken: z.string().min(1),
  /** Instagram professional account id the token is scoped to */
  igUserId: z.string().min(1),
  apiBaseUrl: z.string().url().default("https://graph.facebook.com/v19.0"),
});

export type InstagramConfig = z.infer<typeof instagramConfigSchema>;
export type InstagramConfigInput = z.input<typeof instagramConfigSchema>;

export interface InstagramPublisherOptions {
  /** Public URL Instagram fetches the image from; defaults to the storage locator */
  mediaUrlFor?: (artifact: ContentArtifact) => string | null;
  captionFor?: (artifact: ContentArtifact, post: ScheduledPost) => string;
}

const graphIdSchema = z.object({ id: z.string() });
const graphErrorSchema = z.object({
  error: z.object({ message: z.string() }).passthrough(),
});

function defaultCaption(artifact: ContentArtifact): string {
  const caption = artifact.metadata["caption"];
  return typeof caption === "string" ? caption : "";
}

/**
 * Instagram Graph API publisher
 *
 * Two calls: create a media container from an image URL, then publish it.
 * The API takes no client idempotency token, so a publish reclaimed after a
 * crash may post twice.
 *
 * @see https://developers.facebook.com/docs/instagram-platform/content-publishing
 */
export class InstagramGraphPublisher implements PlatformPublisher {
  public readonly platform = "instagram";
  public readonly supportsIdempotency = false;

  private config: InstagramConfig;
  private mediaUrlFor: (artifact: ContentArtifact) => string | null;
  private captionFor: (artifact: ContentArtifact, post: ScheduledPost) => string;

  constructor(
    config: InstagramConfigInput,
    private logger: Logger,
    options: InstagramPublisherOptions = {},
  ) {
    this.config = instagramConfigSchema.parse(config);
    this.logger = logger.child("InstagramGraphPublisher");
    this.mediaUrlFor = options.mediaUrlFor ?? ((artifact) => artifact.storageLocator);
    this.captionFor = options.captionFor ?? defaultCaption;
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const { artifact, post, signal } = request;

    try {
      const imageUrl = this.mediaUrlFor(artifact);
      if (!imageUrl) {
        throw new PermanentProviderError(
          `Artifact ${artifact.id} has no media URL to publish`,
        );
      }

      const container = await this.graphPost(
        "media",
        { image_url: imageUrl, caption: this.captionFor(artifact, post) },
        signal,
      );
      const media = await this.graphPost(
        "media_publish",
        { creation_id: container.id },
        signal,
      );

      this.logger.info("Instagram post published", {
        postId: post.id,
        mediaId: media.id,
      });
      return { success: true, platformPostId: media.id, retryableError: false };
    } catch (error) {
      const failed = toFailedPublish(error);
      this.logger.warn("Instagram publish failed", {
        postId: post.id,
        error: failed.error,
        retryable: failed.retryableError,
      });
      return failed;
    }
  }

  private async graphPost(
    edge: string,
    params: Record<string, string>,
    signal: AbortSignal,
  ): Promise<z.infer<typeof graphIdSchema>> {
    const url = `${this.config.apiBaseUrl}/${this.config.igUserId}/${edge}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        ...params,
        access_token: this.config.accessToken,
      }).toString(),
      signal,
    });

    const body: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const parsed = graphErrorSchema.safeParse(body);
      const detail = parsed.success ? parsed.data.error.message : response.statusText;
      throw httpError("Instagram", response.status, detail);
    }

    const parsed = graphIdSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentProviderError(
        `Instagram ${edge} response carried no id`,
      );
    }
    return parsed.data;
  }
}
