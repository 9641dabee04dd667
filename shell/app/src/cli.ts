import { PipelineError, getErrorMessage } from "@avatarflow/utils";
import { AccountHealthEnum, TierEnum } from "@avatarflow/content-store";
import type { TierDistribution } from "@avatarflow/content-store";
import { App } from "./app";
import type { AppOptions } from "./app";
import type { ContentPipeline } from "./pipeline";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const USAGE = `Usage:
  <entry> [command] [args]

Commands:
  run                                   Start the pipeline (default)
  migrate                               Apply the database schema and exit
  start-batch <avatar> <modelRef> <tier>=<count>...
                                        Generate a batch and print its summary
  batch <batchId>                       Show a batch and its cost summary
  post <postId>                         Show a scheduled post
  failed-posts                          List posts that failed permanently
  accounts <healthy|degraded|suspended> List accounts by health
  reset-account <accountId>             Clear failures, backoff and suspension
  approve <artifactId>                  Approve a borderline artifact
  reject <artifactId>                   Reject a borderline artifact

Options:
  --help, -h                            Show this help message
  --version, -v                         Show version information`;

class CliUsageError extends Error {}

function printJson(io: CliIO, value: unknown): void {
  io.out(JSON.stringify(value, null, 2));
}

function requireArg(args: readonly string[], index: number, name: string): string {
  const value = args[index];
  if (!value) throw new CliUsageError(`Missing <${name}>`);
  return value;
}

/**
 * Parse "basic=3 premium=2" into a tier distribution
 */
export function parseTierArgs(args: readonly string[]): TierDistribution {
  const distribution: TierDistribution = {};
  for (const arg of args) {
    const [name, count] = arg.split("=");
    const tier = TierEnum.safeParse(name);
    const value = Number(count);
    if (!tier.success || !Number.isInteger(value) || value < 0) {
      throw new CliUsageError(`Invalid tier count "${arg}"`);
    }
    distribution[tier.data] = value;
  }
  return distribution;
}

/**
 * Run one operator command against a pipeline and return the exit code
 */
export async function runCommand(
  pipeline: ContentPipeline,
  argv: readonly string[],
  io: CliIO = consoleIO,
): Promise<number> {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case "start-batch": {
        const avatarId = requireArg(args, 0, "avatar");
        const avatarModelRef = requireArg(args, 1, "modelRef");
        const tierDistribution = parseTierArgs(args.slice(2));
        const requestedCount = Object.values(tierDistribution).reduce(
          (sum, count) => sum + (count ?? 0),
          0,
        );
        const batch = await pipeline.startBatch({
          avatarId,
          avatarModelRef,
          requestedCount,
          tierDistribution,
        });
        const finished = await pipeline.waitForBatch(batch.id);
        printJson(io, {
          batch: finished,
          summary: await pipeline.summarizeBatch(batch.id),
        });
        return 0;
      }
      case "batch": {
        const batchId = requireArg(args, 0, "batchId");
        const batch = await pipeline.getBatch(batchId);
        if (!batch) {
          io.err(`Batch ${batchId} not found`);
          return 1;
        }
        printJson(io, { batch, summary: await pipeline.summarizeBatch(batchId) });
        return 0;
      }
      case "post": {
        const postId = requireArg(args, 0, "postId");
        const post = await pipeline.getScheduledPost(postId);
        if (!post) {
          io.err(`Post ${postId} not found`);
          return 1;
        }
        printJson(io, post);
        return 0;
      }
      case "failed-posts":
        printJson(io, await pipeline.listFailedPosts());
        return 0;
      case "accounts": {
        const health = AccountHealthEnum.safeParse(requireArg(args, 0, "health"));
        if (!health.success) {
          throw new CliUsageError(`Unknown health state "${args[0] ?? ""}"`);
        }
        printJson(io, await pipeline.listAccountsByHealth(health.data));
        return 0;
      }
      case "reset-account":
        printJson(io, await pipeline.resetAccount(requireArg(args, 0, "accountId")));
        return 0;
      case "approve":
        printJson(
          io,
          await pipeline.approveBorderline(requireArg(args, 0, "artifactId")),
        );
        return 0;
      case "reject":
        printJson(
          io,
          await pipeline.rejectBorderline(requireArg(args, 0, "artifactId")),
        );
        return 0;
      default:
        throw new CliUsageError(`Unknown command "${command ?? ""}"`);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.err(error.message);
      io.err(USAGE);
      return 2;
    }
    if (error instanceof PipelineError) {
      io.err(`${error.code}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

/**
 * Entry point for a pipeline process. Resolves with an exit code, or with
 * undefined once the long-running pipeline has started.
 */
export async function handleCLI(
  options: AppOptions,
  argv: readonly string[] = process.argv.slice(2),
  io: CliIO = consoleIO,
): Promise<number | undefined> {
  if (argv.includes("--help") || argv.includes("-h")) {
    io.out(USAGE);
    return 0;
  }

  const app = App.create(options);
  const { name, version } = app.getConfig();

  if (argv.includes("--version") || argv.includes("-v")) {
    io.out(`${name} v${version}`);
    return 0;
  }

  const command = argv[0] ?? "run";

  if (command === "run") {
    io.out(`Starting ${name} v${version}...`);
    await app.run();
    return undefined;
  }

  if (command === "migrate") {
    await app.migrate();
    return 0;
  }

  try {
    await app.initialize();
    return await runCommand(app.getPipeline(), argv, io);
  } catch (error) {
    io.err(`${name} failed: ${getErrorMessage(error)}`);
    return 1;
  } finally {
    await app.stop();
  }
}
