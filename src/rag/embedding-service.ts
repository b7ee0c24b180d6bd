import { z } from "zod";
import type { EmbeddingConfig, OpenRouterConfig } from "./config.js";
import { ProviderRequestError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { isTransientStatus } from "./llm/openrouter-client.js";

export interface Embedder {
  embed(texts: string[], onProgress?: (done: number, total: number) => void): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

export class OpenRouterEmbedder implements Embedder {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly api: OpenRouterConfig,
    private readonly config: EmbeddingConfig,
    private readonly logger: Logger,
    fetchImpl?: typeof fetch,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async embed(
    texts: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<number[][]> {
    // Split into batches
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      batches.push({
        texts: texts.slice(i, i + this.config.batchSize),
        startIdx: i,
      });
    }

    const results: number[][] = new Array(texts.length);
    let completed = 0;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(this.config.concurrency, queue.length) },
      async () => {
        while (queue.length > 0) {
          const batch = queue.shift();
          if (!batch) break;
          const embeddings = await this.embedBatch(batch.texts);
          embeddings.forEach((vector, j) => {
            results[batch.startIdx + j] = vector;
          });
          completed += batch.texts.length;
          onProgress?.(Math.min(completed, texts.length), texts.length);
        }
      },
    );

    await Promise.all(workers);
    return results;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embed([this.config.queryPrefix + query]);
    if (!embedding) {
      throw new ProviderRequestError("Embedding API returned no vector", this.config.model, true);
    }
    return embedding;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const model = this.config.model;
    if (!this.api.apiKey) {
      throw new ProviderRequestError("OpenRouter API key is not configured", model, false, 401);
    }

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.api.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.api.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model, input: batch }),
        signal: AbortSignal.timeout(this.api.timeoutMs),
      });
    } catch (err) {
      throw new ProviderRequestError(`Embedding request failed: ${describeError(err)}`, model, true, undefined, err);
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ProviderRequestError(
        `Embedding API error (${res.status}): ${text.slice(0, 200)}`,
        model,
        isTransientStatus(res.status),
        res.status,
      );
    }

    const parsed = embeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success || parsed.data.data.length !== batch.length) {
      throw new ProviderRequestError("Embedding API returned an unexpected body", model, false);
    }
    this.logger.debug({ model, inputs: batch.length }, "embedded batch");
    return parsed.data.data.map((item) => item.embedding);
  }
}
