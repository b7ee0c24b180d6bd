import { describe, it, expect } from "vitest";
import { OperationCancelledError, ProviderRequestError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { OpenRouterConfig } from "../config.js";
import { OpenRouterClient, isTransientStatus } from "./openrouter-client.js";

const config: OpenRouterConfig = {
  apiKey: "test-secret",
  baseUrl: "https://router.example.test/api/v1",
  defaultModel: "m/default",
  fallbackModels: [],
  timeoutMs: 5000,
  maxRetries: 0,
  retryBaseDelayMs: 0,
  retryMaxDelayMs: 0,
};

interface Call {
  url: string;
  method: string | undefined;
  headers: unknown;
  body: unknown;
}

function fakeFetch(respond: () => Response | Promise<Response>) {
  const calls: Call[] = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      headers: init?.headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return respond();
  };
  return { calls, impl };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

async function failure(promise: Promise<unknown>): Promise<ProviderRequestError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof ProviderRequestError)) throw new Error(`expected ProviderRequestError, got ${String(err)}`);
  return err;
}

describe("OpenRouterClient.complete", () => {
  it("posts the messages and returns the first choice", async () => {
    const { calls, impl } = fakeFetch(() => json({ choices: [{ message: { content: "Hello" } }] }));
    const client = new OpenRouterClient(config, silentLogger(), impl);

    const text = await client.complete(
      { messages: [{ role: "user", content: "Hi" }], temperature: 0 },
      "m/default",
    );

    expect(text).toBe("Hello");
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://router.example.test/api/v1/chat/completions");
    expect(calls[0]?.method).toBe("POST");
    expect(calls[0]?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
    expect(calls[0]?.body).toEqual({
      model: "m/default",
      messages: [{ role: "user", content: "Hi" }],
      temperature: 0,
      max_tokens: 2000,
    });
  });

  it("marks 429 and 5xx as transient", async () => {
    const { impl } = fakeFetch(() => json({ error: { message: "slow down" } }, 429));
    const client = new OpenRouterClient(config, silentLogger(), impl);

    const err = await failure(client.complete({ messages: [] }, "m/a"));
    expect(err.transient).toBe(true);
    expect(err.status).toBe(429);
    expect(err.message).toBe("API error (429) from m/a: slow down");
  });

  it("marks 4xx client errors as permanent", async () => {
    const { impl } = fakeFetch(() => new Response("no such model", { status: 404 }));
    const client = new OpenRouterClient(config, silentLogger(), impl);

    const err = await failure(client.complete({ messages: [] }, "m/missing"));
    expect(err.transient).toBe(false);
    expect(err.message).toBe("API error (404) from m/missing: no such model");
  });

  it("treats network failures as transient", async () => {
    const { impl } = fakeFetch(() => {
      throw new TypeError("fetch failed");
    });
    const client = new OpenRouterClient(config, silentLogger(), impl);

    const err = await failure(client.complete({ messages: [] }, "m/a"));
    expect(err.transient).toBe(true);
    expect(err.message).toBe("Network error calling m/a: fetch failed");
  });

  it("treats a body without choices as a permanent failure", async () => {
    const { impl } = fakeFetch(() => json({ choices: [] }));
    const client = new OpenRouterClient(config, silentLogger(), impl);

    const err = await failure(client.complete({ messages: [] }, "m/a"));
    expect(err.transient).toBe(false);
  });

  it("classifies an error body in a 200 response by its code", async () => {
    const upstream = fakeFetch(() => json({ error: { message: "upstream overloaded", code: 502 } }));
    const overloaded = await failure(new OpenRouterClient(config, silentLogger(), upstream.impl).complete({ messages: [] }, "m/a"));
    expect([overloaded.message, overloaded.transient, overloaded.status]).toEqual([
      "API error (502) from m/a: upstream overloaded",
      true,
      502,
    ]);

    const invalid = fakeFetch(() => json({ error: { message: "bad request", code: 400 } }));
    const rejected = await failure(new OpenRouterClient(config, silentLogger(), invalid.impl).complete({ messages: [] }, "m/a"));
    expect([rejected.transient, rejected.status]).toEqual([false, 400]);

    const uncoded = fakeFetch(() => json({ error: { message: "mystery" } }));
    const unknown = await failure(new OpenRouterClient(config, silentLogger(), uncoded.impl).complete({ messages: [] }, "m/a"));
    expect([unknown.message, unknown.transient]).toEqual(["API error (unknown) from m/a: mystery", false]);
  });

  it("fails without an API key before any request", async () => {
    const { calls, impl } = fakeFetch(() => json({}));
    const client = new OpenRouterClient({ ...config, apiKey: "" }, silentLogger(), impl);

    const err = await failure(client.complete({ messages: [] }, "m/a"));
    expect(err.transient).toBe(false);
    expect(calls).toHaveLength(0);
  });

  it("reports caller cancellation as OperationCancelledError", async () => {
    const controller = new AbortController();
    const { impl } = fakeFetch(() => {
      controller.abort();
      throw new DOMException("aborted", "AbortError");
    });
    const client = new OpenRouterClient(config, silentLogger(), impl);

    await expect(client.complete({ messages: [] }, "m/a", controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
  });
});

describe("OpenRouterClient.listModels", () => {
  it("maps the model catalogue", async () => {
    const { calls, impl } = fakeFetch(() =>
      json({
        data: [
          { id: "m/a", name: "Model A", context_length: 8192 },
          { id: "m/b", context_length: null },
        ],
      }),
    );
    const client = new OpenRouterClient(config, silentLogger(), impl);

    expect(await client.listModels()).toEqual([
      { id: "m/a", name: "Model A", contextLength: 8192 },
      { id: "m/b", name: "m/b", contextLength: null },
    ]);
    expect(calls[0]?.method).toBe("GET");
  });
});

describe("isTransientStatus", () => {
  it("classifies status codes", () => {
    expect([400, 401, 404, 408, 429, 500, 502, 503].map(isTransientStatus)).toEqual([
      false,
      false,
      false,
      true,
      true,
      true,
      true,
      true,
    ]);
  });
});
