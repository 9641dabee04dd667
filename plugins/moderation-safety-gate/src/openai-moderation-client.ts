import {
  PermanentProviderError,
  TransientProviderError,
  z,
} from "@avatarflow/utils";
import type { SafetyClassificationRequest } from "@avatarflow/batch-orchestrator";
import type { CategoryScores, ModerationClient } from "./types";

export const openAiModerationConfigSchema = z.object({
  apiKey: z.string().min(1),
  model: z.string().default("omni-moderation-latest"),
  apiBaseUrl: z.string().url().default("https://api.openai.com/v1"),
});

export type OpenAiModerationConfig = z.infer<typeof openAiModerationConfigSchema>;
export type OpenAiModerationConfigInput = z.input<typeof openAiModerationConfigSchema>;

const score = z.number().min(0).max(1).default(0);

const moderationResponseSchema = z.object({
  results: z
    .array(
      z.object({
        category_scores: z
          .object({
            sexual: score,
            violence: score,
            hate: score,
            "self-harm": score,
            harassment: score,
          })
          .passthrough(),
      }),
    )
    .min(1),
});

/**
 * Scores the prompt text and the image together against the moderation
 * endpoint. The image must be reachable at its binary locator.
 */
export class OpenAiModerationClient implements ModerationClient {
  private config: OpenAiModerationConfig;

  constructor(config: OpenAiModerationConfigInput) {
    this.config = openAiModerationConfigSchema.parse(config);
  }

  async score(request: SafetyClassificationRequest): Promise<CategoryScores> {
    const response = await fetch(`${this.config.apiBaseUrl}/moderations`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.config.model,
        input: [
          { type: "text", text: request.promptUsed },
          { type: "image_url", image_url: { url: request.binaryLocator } },
        ],
      }),
      ...(request.signal ? { signal: request.signal } : {}),
    });

    if (!response.ok) {
      const message = `Moderation API error: ${response.status} - ${await response.text()}`;
      throw response.status === 429 || response.status >= 500
        ? new TransientProviderError(message, { status: response.status })
        : new PermanentProviderError(message, { status: response.status });
    }

    const parsed = moderationResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PermanentProviderError("Unexpected moderation response shape");
    }

    const scores = parsed.data.results[0]?.category_scores;
    if (!scores) {
      throw new PermanentProviderError("Moderation response carried no results");
    }
    return {
      sexual: scores.sexual,
      violence: scores.violence,
      hate: scores.hate,
      self_harm: scores["self-harm"],
      harassment: scores.harassment,
    };
  }
}
