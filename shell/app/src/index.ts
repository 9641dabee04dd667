export { App } from "./app";
export type { AppOptions } from "./app";
export { ContentPipeline } from "./pipeline";
export type { ContentPipelineDeps } from "./pipeline";
export {
  DEFAULT_DATABASE_URL,
  defineConfig,
  loadPipelineConfig,
  pipelineConfigSchema,
} from "./config";
export type { PipelineConfig, PipelineConfigInput } from "./config";
export { handleCLI, parseTierArgs, runCommand } from "./cli";
export type { CliIO } from "./cli";
