import { performance } from "node:perf_hooks";
import type { AnswerGenerator } from "./answer-generator.js";
import type { OpenRouterConfig } from "./config.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { FallbackChain, modelList, retryPolicyFrom, type Sleep } from "./llm/fallback-chain.js";
import type { LlmProvider, ModelInfo } from "./llm/types.js";
import type { CategorySummary, DirectorySummary, MetadataStore } from "./metadata-store.js";
import type { RetrievalAggregator } from "./retriever.js";
import type { RAGResponse, SearchFilters } from "./types.js";

export interface AskOptions {
  filters?: SearchFilters;
  /** Number of passages to retrieve; defaults to retrieval.top_k. */
  limit?: number;
  model?: string;
  signal?: AbortSignal;
}

export interface ModelCheck {
  model: string;
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export interface QueryDeps {
  aggregator: RetrievalAggregator;
  generator: AnswerGenerator;
  llm: LlmProvider;
  metadata: MetadataStore;
  openrouter: OpenRouterConfig;
  topK: number;
  logger: Logger;
  sleep?: Sleep;
}

export class QueryOrchestrator {
  constructor(private readonly deps: QueryDeps) {}

  async ask(question: string, options: AskOptions = {}): Promise<RAGResponse> {
    const q = question.trim();
    if (!q) throw new RangeError("question must not be empty");

    const limit = options.limit ?? this.deps.topK;
    const started = performance.now();
    const results = await this.deps.aggregator.search(q, options.filters, limit);
    this.deps.logger.debug(
      { results: results.length, ms: Math.round(performance.now() - started) },
      "retrieval finished",
    );
    options.signal?.throwIfAborted();

    return this.deps.generator.generate(q, results, { model: options.model, signal: options.signal });
  }

  listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    return this.deps.llm.listModels(signal);
  }

  /**
   * Sends a one-line prompt to each model on its own, with the usual retry
   * policy. Without `model`, checks every configured model.
   */
  async testModels(model?: string): Promise<ModelCheck[]> {
    const models = model ? [model] : modelList(this.deps.openrouter);
    const checks: ModelCheck[] = [];
    for (const m of models) {
      const chain = new FallbackChain([m], retryPolicyFrom(this.deps.openrouter), this.deps.logger, this.deps.sleep);
      const started = performance.now();
      try {
        await chain.run((id, signal) =>
          this.deps.llm.complete(
            { messages: [{ role: "user", content: "Reply with the single word OK." }], maxTokens: 5, temperature: 0 },
            id,
            signal,
          ),
        );
        checks.push({ model: m, ok: true, latencyMs: Math.round(performance.now() - started) });
      } catch (err) {
        checks.push({
          model: m,
          ok: false,
          latencyMs: Math.round(performance.now() - started),
          error: describeError(err),
        });
      }
    }
    return checks;
  }

  async availableFilters(): Promise<{ categories: CategorySummary[]; directories: DirectorySummary[] }> {
    const [categories, directories] = await Promise.all([
      this.deps.metadata.categoriesSummary(),
      this.deps.metadata.directorySummary(),
    ]);
    return { categories, directories };
  }
}
