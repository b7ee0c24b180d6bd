import type { OpenRouterConfig } from "./config.js";
import { buildContext } from "./context-builder.js";
import type { Logger } from "./logger.js";
import { FallbackChain, modelList, retryPolicyFrom, type Sleep } from "./llm/fallback-chain.js";
import type { ChatMessage, LlmProvider } from "./llm/types.js";
import type { RAGResponse, SearchResult } from "./types.js";

export const NO_RESULTS_ANSWER =
  "No relevant information was found in the indexed documents for this question.";

const GROUNDING_PROMPT =
  "You are a document assistant. Answer the user's question using only the document excerpts " +
  "below. If they do not contain the answer, say that the documents do not cover it instead of " +
  "guessing. Cite your sources using the [Source: file, Page N] labels when referencing " +
  "specific information. Answer in the language of the question.";

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

/**
 * 0 without results; otherwise grows with the top score and, up to five,
 * with the number of results.
 */
export function answerConfidence(results: SearchResult[]): number {
  if (results.length === 0) return 0;
  const top = clamp01(Math.max(...results.map((r) => r.score)));
  const breadth = Math.min(results.length, 5) / 5;
  return clamp01(0.15 + 0.6 * top + 0.25 * breadth);
}

export interface GenerateOptions {
  /** Tried before the configured models. */
  model?: string;
  signal?: AbortSignal;
}

export class AnswerGenerator {
  constructor(
    private readonly llm: LlmProvider,
    private readonly config: OpenRouterConfig,
    private readonly contextChars: number,
    private readonly logger: Logger,
    private readonly sleep?: Sleep,
  ) {}

  async generate(
    question: string,
    results: SearchResult[],
    options: GenerateOptions = {},
  ): Promise<RAGResponse> {
    const context = buildContext(results, this.contextChars);
    if (!context) {
      this.logger.info("no search results, answering without the model");
      return { answer: NO_RESULTS_ANSWER, sources: [], confidence: 0, searchResultsCount: 0, model: null };
    }

    const messages: ChatMessage[] = [
      { role: "system", content: `${GROUNDING_PROMPT}\n\n--- Retrieved Context ---\n${context.text}` },
      { role: "user", content: question },
    ];

    const chain = new FallbackChain(
      modelList(this.config, options.model),
      retryPolicyFrom(this.config),
      this.logger,
      this.sleep,
    );
    const { model, value } = await chain.run(
      (m, signal) => this.llm.complete({ messages, temperature: 0.2 }, m, signal),
      options.signal,
    );

    this.logger.info(
      { model, results: results.length, contextBlocks: context.used.length },
      "answer generated",
    );
    return {
      answer: value.trim(),
      sources: context.sources,
      confidence: answerConfidence(results),
      searchResultsCount: results.length,
      model,
    };
  }
}
