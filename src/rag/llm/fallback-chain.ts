import { setTimeout as delay } from "node:timers/promises";
import type { OpenRouterConfig } from "../config.js";
import {
  ConfigurationError,
  OperationCancelledError,
  ProviderExhaustedError,
  ProviderRequestError,
  describeError,
  type ModelAttempt,
} from "../errors.js";
import type { Logger } from "../logger.js";

export interface RetryPolicy {
  /** Retries per model after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type ChainState<T> =
  | { status: "attempting"; model: string; modelIndex: number; attempt: number; history: ModelAttempt[] }
  | { status: "succeeded"; model: string; value: T; history: ModelAttempt[] }
  | { status: "failed"; history: ModelAttempt[] };

export type ChainEvent<T> = { type: "success"; value: T } | { type: "error"; error: unknown };

type Attempting<T> = Extract<ChainState<T>, { status: "attempting" }>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function isTransientError(err: unknown): boolean {
  return err instanceof ProviderRequestError && err.transient;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/** [override, default, ...fallbacks] with duplicates removed, order kept. */
export function modelList(config: OpenRouterConfig, override?: string): string[] {
  const models = [override, config.defaultModel, ...config.fallbackModels].filter(
    (m): m is string => typeof m === "string" && m.length > 0,
  );
  return [...new Set(models)];
}

export function retryPolicyFrom(config: OpenRouterConfig): RetryPolicy {
  return {
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  };
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Attempting(model) → Succeeded | Attempting(same model, retry) |
 * Attempting(next model) | Failed. Only transient errors are retried on the
 * same model; anything else moves straight to the next one.
 */
export class FallbackChain {
  private readonly sleep: Sleep;

  constructor(
    readonly models: string[],
    readonly policy: RetryPolicy,
    private readonly logger: Logger,
    sleep?: Sleep,
  ) {
    if (models.length === 0) {
      throw new ConfigurationError(["openrouter.default_model: no models configured"]);
    }
    this.sleep = sleep ?? defaultSleep;
  }

  initial<T>(): ChainState<T> {
    const first = this.models[0] ?? "";
    return { status: "attempting", model: first, modelIndex: 0, attempt: 0, history: [] };
  }

  transition<T>(state: Attempting<T>, event: ChainEvent<T>): ChainState<T> {
    if (event.type === "success") {
      return { status: "succeeded", model: state.model, value: event.value, history: state.history };
    }

    if (isTransientError(event.error) && state.attempt < this.policy.maxRetries) {
      return { ...state, attempt: state.attempt + 1 };
    }

    const history = [
      ...state.history,
      { model: state.model, attempts: state.attempt + 1, lastError: describeError(event.error) },
    ];
    const nextIndex = state.modelIndex + 1;
    const next = this.models[nextIndex];
    if (next === undefined) return { status: "failed", history };
    return { status: "attempting", model: next, modelIndex: nextIndex, attempt: 0, history };
  }

  async run<T>(
    operation: (model: string, signal?: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<{ model: string; value: T; history: ModelAttempt[] }> {
    let state = this.initial<T>();

    while (state.status === "attempting") {
      const current = state;
      if (signal?.aborted) throw new OperationCancelledError(`Request to ${current.model}`);

      let event: ChainEvent<T>;
      try {
        event = { type: "success", value: await operation(current.model, signal) };
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error;
        if (signal?.aborted) throw new OperationCancelledError(`Request to ${current.model}`);
        event = { type: "error", error };
      }

      const next = this.transition(current, event);
      if (next.status === "attempting" && next.modelIndex === current.modelIndex) {
        const wait = backoffDelay(this.policy, current.attempt);
        this.logger.warn(
          { model: current.model, attempt: next.attempt, waitMs: wait, err: describeErrorOf(event) },
          "transient provider error, retrying",
        );
        try {
          await this.sleep(wait, signal);
        } catch (err) {
          throw new OperationCancelledError(`Retry of ${current.model} (${describeError(err)})`);
        }
      } else if (next.status === "attempting") {
        this.logger.warn(
          { failed: current.model, next: next.model, err: describeErrorOf(event) },
          "model failed, falling back",
        );
      }
      state = next;
    }

    if (state.status === "succeeded") {
      if (state.history.length > 0) {
        this.logger.info({ model: state.model }, "answered by fallback model");
      }
      return { model: state.model, value: state.value, history: state.history };
    }

    this.logger.error({ attempts: state.history }, "all models failed");
    throw new ProviderExhaustedError(state.history);
  }
}

function describeErrorOf<T>(event: ChainEvent<T>): string | undefined {
  return event.type === "error" ? describeError(event.error) : undefined;
}
