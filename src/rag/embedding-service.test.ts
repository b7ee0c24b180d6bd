import { describe, it, expect } from "vitest";
import { z } from "zod";
import type { EmbeddingConfig, OpenRouterConfig } from "./config.js";
import { OpenRouterEmbedder } from "./embedding-service.js";
import { ProviderRequestError } from "./errors.js";
import { silentLogger } from "./logger.js";

const api: OpenRouterConfig = {
  apiKey: "test-secret",
  baseUrl: "https://router.example.test/api/v1",
  defaultModel: "m/default",
  fallbackModels: [],
  timeoutMs: 5000,
  maxRetries: 0,
  retryBaseDelayMs: 0,
  retryMaxDelayMs: 0,
};

const embedding: EmbeddingConfig = {
  model: "e/small",
  batchSize: 2,
  concurrency: 2,
  queryPrefix: "Query: ",
};

const requestSchema = z.object({ model: z.string(), input: z.array(z.string()) });

/** Answers each batch with one-dimensional vectors holding the input length. */
function lengthFetch(inputs: string[][]): typeof fetch {
  return async (_url, init) => {
    const body = requestSchema.parse(JSON.parse(typeof init?.body === "string" ? init.body : "{}"));
    inputs.push(body.input);
    return new Response(JSON.stringify({ data: body.input.map((t) => ({ embedding: [t.length] })) }), {
      status: 200,
    });
  };
}

describe("OpenRouterEmbedder", () => {
  it("embeds in batches and keeps input order", async () => {
    const inputs: string[][] = [];
    const embedder = new OpenRouterEmbedder(api, embedding, silentLogger(), lengthFetch(inputs));
    const progress: Array<[number, number]> = [];

    const vectors = await embedder.embed(["a", "bb", "ccc", "dddd", "eeeee"], (done, total) =>
      progress.push([done, total]),
    );

    expect(vectors).toEqual([[1], [2], [3], [4], [5]]);
    expect(inputs.map((batch) => batch.length).sort()).toEqual([1, 2, 2]);
    expect(progress.at(-1)).toEqual([5, 5]);
  });

  it("prefixes queries with the instruction", async () => {
    const inputs: string[][] = [];
    const embedder = new OpenRouterEmbedder(api, embedding, silentLogger(), lengthFetch(inputs));

    expect(await embedder.embedQuery("total")).toEqual([12]);
    expect(inputs).toEqual([["Query: total"]]);
  });

  it("reports server errors as transient", async () => {
    const embedder = new OpenRouterEmbedder(api, embedding, silentLogger(), async () =>
      new Response("overloaded", { status: 503 }),
    );

    const err = await embedder.embed(["a"]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderRequestError);
    expect(err instanceof ProviderRequestError && [err.message, err.transient, err.status]).toEqual([
      "Embedding API error (503): overloaded",
      true,
      503,
    ]);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const embedder = new OpenRouterEmbedder(api, embedding, silentLogger(), async () =>
      new Response(JSON.stringify({ data: [] }), { status: 200 }),
    );

    await expect(embedder.embed(["a"])).rejects.toThrow("Embedding API returned an unexpected body");
  });

  it("fails without an API key before sending anything", async () => {
    const inputs: string[][] = [];
    const embedder = new OpenRouterEmbedder({ ...api, apiKey: "" }, embedding, silentLogger(), lengthFetch(inputs));

    await expect(embedder.embed(["a"])).rejects.toThrow("OpenRouter API key is not configured");
    expect(inputs).toEqual([]);
  });
});
