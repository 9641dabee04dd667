import { z } from "@avatarflow/utils";

export const healthMonitorConfigSchema = z
  .object({
    /** Base delay of the exponential backoff */
    backoffBaseMs: z.number().int().positive().default(60_000),
    /** Largest exponent applied to the base delay */
    backoffExponentCap: z.number().int().nonnegative().default(6),
    degradedThreshold: z.number().int().positive().default(5),
    suspendedThreshold: z.number().int().positive().default(10),
    /** Attempts at an optimistic health write before giving up */
    maxUpdateAttempts: z.number().int().positive().default(5),
  })
  .refine((config) => config.suspendedThreshold > config.degradedThreshold, {
    message: "suspendedThreshold must be greater than degradedThreshold",
  });

export type HealthMonitorConfig = z.infer<typeof healthMonitorConfigSchema>;
export type HealthMonitorConfigInput = z.input<typeof healthMonitorConfigSchema>;
