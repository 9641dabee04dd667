import { Logger } from "@avatarflow/utils";
import { LibSqlContentStore, migrateContentStore } from "@avatarflow/content-store";
import type {
  GenerationProvider,
  SafetyGate,
  TemplateSelector,
} from "@avatarflow/batch-orchestrator";
import type {
  PlatformPublisher,
  PostFailedEvent,
  PostPublishedEvent,
  SchedulerBackend,
} from "@avatarflow/distribution";
import { loadPipelineConfig } from "./config";
import type { PipelineConfig, PipelineConfigInput } from "./config";
import { ContentPipeline } from "./pipeline";

export interface AppOptions {
  provider: GenerationProvider;
  safetyGate: SafetyGate;
  publishers?: PlatformPublisher[];
  /** Base config; environment variables override it */
  config?: PipelineConfigInput;
  env?: Record<string, string | undefined>;
  backend?: SchedulerBackend;
  templateSelector?: TemplateSelector;
  onPublished?: (event: PostPublishedEvent) => void;
  onFailed?: (event: PostFailedEvent) => void;
}

/**
 * Process host for the pipeline: migrates the database, runs the periodic
 * jobs and shuts down on SIGINT/SIGTERM
 */
export class App {
  private options: AppOptions;
  private config: PipelineConfig;
  private logger: Logger;
  private store: LibSqlContentStore | null = null;
  private pipeline: ContentPipeline | null = null;
  private shutdownHandlers: Array<() => void> = [];
  private isShuttingDown = false;

  public static create(options: AppOptions): App {
    return new App(options);
  }

  private constructor(options: AppOptions) {
    this.options = options;
    this.config = loadPipelineConfig(options.env ?? process.env, options.config);
    this.logger = Logger.createFresh({
      level: this.config.logLevel,
      context: this.config.name,
    });
  }

  public getConfig(): PipelineConfig {
    return this.config;
  }

  public async migrate(): Promise<void> {
    await migrateContentStore(this.config.database, this.logger);
  }

  public async initialize(): Promise<void> {
    if (this.pipeline) return;

    await this.migrate();

    this.store = LibSqlContentStore.createFresh(this.config.database, this.logger);
    this.pipeline = ContentPipeline.createFresh({
      store: this.store,
      provider: this.options.provider,
      safetyGate: this.options.safetyGate,
      logger: this.logger,
      config: this.config,
      publishers: this.options.publishers,
      backend: this.options.backend,
      templateSelector: this.options.templateSelector,
      onPublished: this.options.onPublished,
      onFailed: this.options.onFailed,
    });
  }

  public async start(): Promise<void> {
    await this.initialize();
    this.getPipeline().start();
    this.setupSignalHandlers();
  }

  public async stop(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    this.cleanupSignalHandlers();

    try {
      await this.pipeline?.stop();
    } finally {
      this.store?.close();
      this.store = null;
      this.pipeline = null;
      this.isShuttingDown = false;
    }
  }

  /**
   * Initialize, start and keep the process alive until a signal arrives
   */
  public async run(): Promise<void> {
    try {
      await this.start();
      this.logger.info(`${this.config.name} v${this.config.version} ready`);
      process.stdin.resume();
    } catch (error) {
      this.logger.error(`Failed to start ${this.config.name}:`, error);
      process.exit(1);
    }
  }

  public static async run(options: AppOptions): Promise<void> {
    await App.create(options).run();
  }

  public getPipeline(): ContentPipeline {
    if (!this.pipeline) {
      throw new Error("Pipeline not initialized. Call initialize() first.");
    }
    return this.pipeline;
  }

  private setupSignalHandlers(): void {
    const gracefulShutdown = async (signal: string): Promise<void> => {
      this.logger.info(`Received ${signal}, shutting down gracefully...`);

      try {
        await this.stop();
        process.exit(0);
      } catch (error) {
        this.logger.error("Error during shutdown:", error);
        process.exit(1);
      }
    };

    const sigintHandler = (): void => {
      void gracefulShutdown("SIGINT");
    };
    const sigtermHandler = (): void => {
      void gracefulShutdown("SIGTERM");
    };

    process.on("SIGINT", sigintHandler);
    process.on("SIGTERM", sigtermHandler);

    this.shutdownHandlers.push(
      () => process.removeListener("SIGINT", sigintHandler),
      () => process.removeListener("SIGTERM", sigtermHandler),
    );
  }

  private cleanupSignalHandlers(): void {
    for (const cleanup of this.shutdownHandlers) {
      cleanup();
    }
    this.shutdownHandlers = [];
  }
}
