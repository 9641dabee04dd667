import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";
import { PermanentProviderError, TransientProviderError } from "@avatarflow/utils";
import { OpenAiModerationClient } from "../src/openai-moderation-client";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const request = {
  binaryLocator: "https://cdn.example.com/art_1.png",
  promptUsed: "test prompt",
};

describe("OpenAiModerationClient", () => {
  let fetchMock: Mock<FetchFn>;
  let client: OpenAiModerationClient;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal("fetch", fetchMock);
    client = new OpenAiModerationClient({ apiKey: "test-key" });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should map category scores from the response", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          results: [
            {
              flagged: false,
              category_scores: {
                sexual: 0.12,
                "sexual/minors": 0.001,
                violence: 0.03,
                hate: 0.002,
                "self-harm": 0.004,
                harassment: 0.05,
              },
            },
          ],
        }),
        { status: 200 },
      ),
    );

    expect(await client.score(request)).toEqual({
      sexual: 0.12,
      violence: 0.03,
      hate: 0.002,
      self_harm: 0.004,
      harassment: 0.05,
    });

    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("https://api.openai.com/v1/moderations");
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({
      model: "omni-moderation-latest",
      input: [
        { type: "text", text: "test prompt" },
        { type: "image_url", image_url: { url: "https://cdn.example.com/art_1.png" } },
      ],
    });
  });

  it("should raise a transient error on rate limits", async () => {
    fetchMock.mockResolvedValueOnce(new Response("slow down", { status: 429 }));

    await expect(client.score(request)).rejects.toThrow(TransientProviderError);
  });

  it("should raise a permanent error on bad credentials", async () => {
    fetchMock.mockResolvedValueOnce(new Response("invalid key", { status: 401 }));

    await expect(client.score(request)).rejects.toThrow(
      "Moderation API error: 401 - invalid key",
    );
  });

  it("should reject an unexpected response shape", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ results: [] }), { status: 200 }),
    );

    await expect(client.score(request)).rejects.toThrow(PermanentProviderError);
  });
});
