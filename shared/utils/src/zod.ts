/**
 * Centralized Zod exports for every workspace.
 * Services import `z` from here so the Zod version is pinned in one place.
 */
export { z, ZodError } from "zod";

export type {
  ZodType,
  ZodSchema,
  infer as ZodInfer,
  input as ZodInput,
  output as ZodOutput,
} from "zod";
