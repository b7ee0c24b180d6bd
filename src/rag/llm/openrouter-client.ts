import { z } from "zod";
import type { OpenRouterConfig } from "../config.js";
import { OperationCancelledError, ProviderRequestError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CompletionRequest, LlmProvider, ModelInfo } from "./types.js";

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

const modelsSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      name: z.string().optional(),
      context_length: z.number().nullable().optional(),
    }),
  ),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    /** HTTP-style status of the upstream failure, also sent inside 200 responses. */
    code: z.union([z.number(), z.string()]).optional(),
  }),
});

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class OpenRouterClient implements LlmProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: OpenRouterConfig,
    private readonly logger: Logger,
    fetchImpl?: typeof fetch,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async complete(request: CompletionRequest, model: string, signal?: AbortSignal): Promise<string> {
    const body = {
      model,
      messages: request.messages,
      temperature: request.temperature ?? 0.2,
      max_tokens: request.maxTokens ?? 2000,
    };

    this.logger.debug({ model, messages: request.messages.length }, "chat completion request");
    const json = await this.send("/chat/completions", model, signal, {
      method: "POST",
      body: JSON.stringify(body),
    });

    const parsed = completionSchema.safeParse(json);
    if (!parsed.success) {
      const apiError = errorBodySchema.safeParse(json);
      if (!apiError.success) {
        throw new ProviderRequestError(`Invalid response from ${model}: no choices in response`, model, false);
      }
      const code = Number(apiError.data.error.code);
      const status = Number.isInteger(code) ? code : undefined;
      throw new ProviderRequestError(
        `API error (${status ?? "unknown"}) from ${model}: ${apiError.data.error.message}`,
        model,
        status !== undefined && isTransientStatus(status),
        status,
      );
    }

    const content = parsed.data.choices[0]?.message.content;
    if (!content) {
      throw new ProviderRequestError(`Empty completion from ${model}`, model, true);
    }
    this.logger.debug({ model, chars: content.length }, "chat completion received");
    return content;
  }

  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    const json = await this.send("/models", "(models)", signal, { method: "GET" });
    const parsed = modelsSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderRequestError("Invalid model list from OpenRouter", "(models)", false);
    }
    return parsed.data.data.map((m) => ({
      id: m.id,
      name: m.name ?? m.id,
      contextLength: m.context_length ?? null,
    }));
  }

  private async send(
    endpoint: string,
    model: string,
    signal: AbortSignal | undefined,
    init: { method: string; body?: string },
  ): Promise<unknown> {
    if (!this.config.apiKey) {
      throw new ProviderRequestError("OpenRouter API key is not configured", model, false, 401);
    }

    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      const res = await this.fetchImpl(`${this.config.baseUrl}${endpoint}`, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
          "X-Title": "archivist",
        },
        signal: combined,
      });

      if (!res.ok) {
        const text = await res.text();
        const apiError = errorBodySchema.safeParse(safeJson(text));
        const detail = apiError.success ? apiError.data.error.message : text.slice(0, 200);
        throw new ProviderRequestError(
          `API error (${res.status}) from ${model}: ${detail}`,
          model,
          isTransientStatus(res.status),
          res.status,
        );
      }

      return await res.json();
    } catch (err) {
      if (err instanceof ProviderRequestError) throw err;
      if (signal?.aborted) throw new OperationCancelledError(`Request to ${model}`);
      if (timeout.aborted) {
        throw new ProviderRequestError(
          `Request to ${model} timed out after ${this.config.timeoutMs}ms`,
          model,
          true,
          undefined,
          err,
        );
      }
      if (err instanceof SyntaxError) {
        throw new ProviderRequestError(`Malformed JSON from ${model}`, model, true, undefined, err);
      }
      throw new ProviderRequestError(
        `Network error calling ${model}: ${describeError(err)}`,
        model,
        true,
        undefined,
        err,
      );
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
