import { readFile, writeFile, mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const CONFIG_DEFAULTS = {
  dataDir: "~/.archivist",
  chunkSize: 1000,
  chunkOverlap: 200,

  ocrEnabled: true,
  ocrThreshold: 50,
  ocrLanguage: "deu",
  ocrModel: "google/gemini-2.0-flash-001",
  renderScale: 2,

  baseUrl: "https://openrouter.ai/api/v1",
  defaultModel: "anthropic/claude-3.5-sonnet",
  fallbackModels: ["openai/gpt-4o-mini", "meta-llama/llama-3.1-70b-instruct"],
  timeoutSeconds: 30,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 8000,

  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,
  queryPrefix: "Instruct: Retrieve relevant document passages\nQuery: ",

  topK: 5,
  contextChars: 8000,

  categoryFloor: 0.1,

  logLevel: "info",
} as const;

const D = CONFIG_DEFAULTS;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const positiveInt = z.number().int().positive();

/** Shape of config.json. Keys are the caller-facing snake_case names. */
export const configFileSchema = z
  .object({
    data_dir: z.string().min(1).default(D.dataDir),
    chunk_size: positiveInt.default(D.chunkSize),
    chunk_overlap: z.number().int().nonnegative().default(D.chunkOverlap),
    ocr: z
      .object({
        enabled: z.boolean().default(D.ocrEnabled),
        threshold: z.number().int().nonnegative().default(D.ocrThreshold),
        language: z.string().min(1).default(D.ocrLanguage),
        model: z.string().min(1).default(D.ocrModel),
        render_scale: z.number().positive().default(D.renderScale),
      })
      .default({}),
    openrouter: z
      .object({
        api_key: z.string().default(""),
        base_url: z.string().url().default(D.baseUrl),
        default_model: z.string().min(1).default(D.defaultModel),
        fallback_models: z.array(z.string().min(1)).default([...D.fallbackModels]),
        timeout: positiveInt.default(D.timeoutSeconds),
        max_retries: z.number().int().nonnegative().default(D.maxRetries),
        retry_base_delay_ms: z.number().int().nonnegative().default(D.retryBaseDelayMs),
        retry_max_delay_ms: z.number().int().nonnegative().default(D.retryMaxDelayMs),
      })
      .default({}),
    embedding: z
      .object({
        model: z.string().min(1).default(D.embeddingModel),
        batch_size: positiveInt.default(D.embeddingBatchSize),
        concurrency: positiveInt.default(D.embeddingConcurrency),
        query_prefix: z.string().default(D.queryPrefix),
      })
      .default({}),
    retrieval: z
      .object({
        top_k: positiveInt.default(D.topK),
        context_chars: positiveInt.default(D.contextChars),
      })
      .default({}),
    categorization: z
      .object({
        floor: z.number().min(0).max(1).default(D.categoryFloor),
        tie_break: z.array(z.string()).default([]),
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).default(D.logLevel),
        file: z.boolean().default(true),
      })
      .default({}),
  })
  .superRefine((c, ctx) => {
    if (c.chunk_overlap >= c.chunk_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["chunk_overlap"],
        message: "must be smaller than chunk_size",
      });
    }
  });

export type ConfigFile = z.input<typeof configFileSchema>;

export interface OcrConfig {
  enabled: boolean;
  threshold: number;
  language: string;
  model: string;
  renderScale: number;
}

export interface OpenRouterConfig {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  fallbackModels: string[];
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface EmbeddingConfig {
  model: string;
  batchSize: number;
  concurrency: number;
  queryPrefix: string;
}

export interface AppConfig {
  paths: {
    dataDir: string;
    configFile: string;
    indexDir: string;
    metadataFile: string;
    logsDir: string;
  };
  chunkSize: number;
  chunkOverlap: number;
  ocr: OcrConfig;
  openrouter: OpenRouterConfig;
  embedding: EmbeddingConfig;
  retrieval: { topK: number; contextChars: number };
  categorization: { floor: number; tieBreak: string[] };
  logging: { level: LogLevel; file: boolean };
}

export interface LoadConfigOptions {
  configFile?: string;
  dataDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return path.resolve(p);
}

export function defaultConfigPath(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  if (options.configFile) return path.resolve(options.configFile);
  if (env["ARCHIVIST_CONFIG"]) return path.resolve(env["ARCHIVIST_CONFIG"]);
  const dataDir = options.dataDir ?? env["ARCHIVIST_DATA_DIR"] ?? D.dataDir;
  return path.join(expandHome(dataDir), "config.json");
}

export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let data: string;
  try {
    data = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") return {};
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new ConfigurationError([`${filePath} is not valid JSON (${String(err)})`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError([`${filePath} must contain a JSON object`]);
  }
  return parsed;
}

export async function writeConfigFile(
  filePath: string,
  raw: Record<string, unknown>,
): Promise<void> {
  validateConfigFile(raw);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(raw, null, 2) + "\n");
}

export function validateConfigFile(raw: unknown): z.output<typeof configFileSchema> {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return result.data;
}

export function parseConfig(raw: unknown, configFile: string): AppConfig {
  const c = validateConfigFile(raw);
  const dataDir = expandHome(c.data_dir);
  return {
    paths: {
      dataDir,
      configFile,
      indexDir: path.join(dataDir, "index"),
      metadataFile: path.join(dataDir, "metadata.json"),
      logsDir: path.join(dataDir, "logs"),
    },
    chunkSize: c.chunk_size,
    chunkOverlap: c.chunk_overlap,
    ocr: {
      enabled: c.ocr.enabled,
      threshold: c.ocr.threshold,
      language: c.ocr.language,
      model: c.ocr.model,
      renderScale: c.ocr.render_scale,
    },
    openrouter: {
      apiKey: c.openrouter.api_key,
      baseUrl: c.openrouter.base_url.replace(/\/+$/, ""),
      defaultModel: c.openrouter.default_model,
      fallbackModels: c.openrouter.fallback_models,
      timeoutMs: c.openrouter.timeout * 1000,
      maxRetries: c.openrouter.max_retries,
      retryBaseDelayMs: c.openrouter.retry_base_delay_ms,
      retryMaxDelayMs: c.openrouter.retry_max_delay_ms,
    },
    embedding: {
      model: c.embedding.model,
      batchSize: c.embedding.batch_size,
      concurrency: c.embedding.concurrency,
      queryPrefix: c.embedding.query_prefix,
    },
    retrieval: { topK: c.retrieval.top_k, contextChars: c.retrieval.context_chars },
    categorization: { floor: c.categorization.floor, tieBreak: c.categorization.tie_break },
    logging: c.logging,
  };
}

/**
 * Defaults, then config.json, then environment. `OPENROUTER_API_KEY`,
 * `ARCHIVIST_DATA_DIR` and `LOG_LEVEL` win over the file.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configFile = defaultConfigPath(options);
  const raw = await readConfigFile(configFile);

  const dataDir = options.dataDir ?? env["ARCHIVIST_DATA_DIR"];
  if (dataDir) setConfigValue(raw, "data_dir", dataDir);
  const apiKey = env["OPENROUTER_API_KEY"];
  if (apiKey) setConfigValue(raw, "openrouter.api_key", apiKey);
  const level = env["LOG_LEVEL"];
  if (level) setConfigValue(raw, "logging.level", level);

  return parseConfig(raw, configFile);
}

export function getConfigValue(raw: Record<string, unknown>, key: string): unknown {
  let node: unknown = raw;
  for (const part of key.split(".")) {
    if (!isRecord(node)) return undefined;
    node = node[part];
  }
  return node;
}

export function setConfigValue(raw: Record<string, unknown>, key: string, value: unknown): void {
  const parts = key.split(".");
  const last = parts.pop();
  if (!last) throw new ConfigurationError([`empty key`]);
  let node = raw;
  for (const part of parts) {
    const next = node[part];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[part] = created;
      node = created;
    }
  }
  node[last] = value;
}

/** CLI values: JSON when it parses ("800", "true", '["a"]'), plain string otherwise. */
export function parseConfigValue(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return input;
  }
}

export function redactConfig(raw: Record<string, unknown>): Record<string, unknown> {
  const copy = structuredClone(raw);
  const key = getConfigValue(copy, "openrouter.api_key");
  if (typeof key === "string" && key.length > 0) {
    setConfigValue(copy, "openrouter.api_key", `${key.slice(0, 6)}…`);
  }
  return copy;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
