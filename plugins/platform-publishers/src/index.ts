export { InMemoryPublisher } from "./in-memory-publisher";
export type { InMemoryPublication, ScriptedOutcome } from "./in-memory-publisher";
export {
  InstagramGraphPublisher,
  instagramConfigSchema,
} from "./instagram-graph-publisher";
export type {
  InstagramConfig,
  InstagramConfigInput,
  InstagramPublisherOptions,
} from "./instagram-graph-publisher";
export { httpError, isRetryableStatus, toFailedPublish } from "./http-errors";
