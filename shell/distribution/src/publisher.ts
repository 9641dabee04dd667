import type {
  ContentArtifact,
  Platform,
  ScheduledPost,
} from "@avatarflow/content-store";

export interface PublishRequest {
  post: ScheduledPost;
  artifact: ContentArtifact;
  /**
   * Stable across retries and stall reclaims of the same post. Adapters
   * whose platform accepts a client token must pass it through.
   */
  idempotencyKey: string;
  signal: AbortSignal;
}

export interface PublishResult {
  success: boolean;
  platformPostId?: string;
  error?: string;
  /** Rate limits and transient network failures; false means operator attention */
  retryableError: boolean;
}

/**
 * One adapter per social platform
 */
export interface PlatformPublisher {
  readonly platform: Platform;
  /** Whether a repeated idempotencyKey is deduplicated platform-side */
  readonly supportsIdempotency: boolean;
  publish(request: PublishRequest): Promise<PublishResult>;
}

/**
 * PublisherRegistry - Platform adapter per platform enum value
 */
export class PublisherRegistry {
  private static instance: PublisherRegistry | null = null;

  private publishers: Map<Platform, PlatformPublisher> = new Map();

  public static getInstance(): PublisherRegistry {
    PublisherRegistry.instance ??= new PublisherRegistry();
    return PublisherRegistry.instance;
  }

  public static resetInstance(): void {
    PublisherRegistry.instance = null;
  }

  public static createFresh(): PublisherRegistry {
    return new PublisherRegistry();
  }

  private constructor() {}

  /**
   * Register the adapter for its platform, replacing any earlier one
   */
  public register(publisher: PlatformPublisher): void {
    this.publishers.set(publisher.platform, publisher);
  }

  public get(platform: Platform): PlatformPublisher | undefined {
    return this.publishers.get(platform);
  }

  public has(platform: Platform): boolean {
    return this.publishers.has(platform);
  }

  public unregister(platform: Platform): void {
    this.publishers.delete(platform);
  }

  public getRegisteredPlatforms(): Platform[] {
    return Array.from(this.publishers.keys());
  }
}
