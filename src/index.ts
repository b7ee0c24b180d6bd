#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { runChat } from "./chat-ui.js";
import { formatSourcesForUI } from "./rag/context-builder.js";
import {
  defaultConfigPath,
  getConfigValue,
  loadConfig,
  parseConfigValue,
  readConfigFile,
  redactConfig,
  setConfigValue,
  validateConfigFile,
  writeConfigFile,
} from "./rag/config.js";
import { ArchivistError, describeError } from "./rag/errors.js";
import { isDirectory } from "./rag/file-scanner.js";
import { createLogger } from "./rag/logger.js";
import { createServices, type Services } from "./rag/services.js";
import type { SearchFilters } from "./rag/types.js";

interface GlobalOptions {
  config?: string;
  dataDir?: string;
  verbose?: boolean;
}

interface FilterOptions {
  category?: string;
  directory?: string;
  from?: Date;
  to?: Date;
}

const program = new Command();

program
  .name("archivist")
  .description("Import PDF documents and ask questions about them")
  .version("0.1.0")
  .option("-c, --config <file>", "Config file (default: <data dir>/config.json)")
  .option("-d, --data-dir <dir>", "Data directory (default: ~/.archivist)")
  .option("-v, --verbose", "Show debug logs on stderr");

// ── Helpers ─────────────────────────────────────────────────────────────────

async function setup(): Promise<Services> {
  const opts = program.opts<GlobalOptions>();
  const config = await loadConfig({ configFile: opts.config, dataDir: opts.dataDir });
  const logger = createLogger(config, { verbose: opts.verbose });
  return createServices(config, logger);
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0 || String(n) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function parseDay(endOfDay: boolean) {
  return (value: string): Date => {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
      throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
    }
    const date = new Date(`${value}T${endOfDay ? "23:59:59.999" : "00:00:00"}`);
    if (Number.isNaN(date.getTime())) throw new InvalidArgumentError(`Invalid date: ${value}`);
    return date;
  };
}

function withFilters(cmd: Command): Command {
  return cmd
    .option("--category <category>", "Only documents of this category")
    .option("--directory <label>", "Only documents under this directory label, e.g. 2024/03")
    .option("--from <date>", "Imported on or after (YYYY-MM-DD)", parseDay(false))
    .option("--to <date>", "Imported on or before (YYYY-MM-DD)", parseDay(true));
}

function toFilters(opts: FilterOptions): SearchFilters {
  return {
    category: opts.category,
    directory: opts.directory,
    importedFrom: opts.from,
    importedTo: opts.to,
  };
}

function fail(err: unknown): never {
  if (err instanceof ArchivistError) {
    console.error(`Error: ${err.message}`);
    if (err.hint) console.error(`  ${err.hint}`);
  } else {
    console.error(`Error: ${describeError(err)}`);
  }
  process.exit(1);
}

function percent(n: number): string {
  return `${Math.round(n * 100)}%`;
}

// ── Documents ───────────────────────────────────────────────────────────────

program
  .command("import")
  .description("Import a PDF file or every PDF under a directory")
  .argument("<path>", "PDF file or directory")
  .option("-f, --force", "Re-import files whose content is unchanged")
  .option("--category <category>", "Assign this category instead of detecting one")
  .option("--directory <label>", "Directory label for a single file")
  .option("--no-recursive", "Do not descend into subdirectories")
  .action(
    async (
      target: string,
      options: { force?: boolean; category?: string; directory?: string; recursive: boolean },
    ) => {
      try {
        const { pipeline } = await setup();
        if (!(await isDirectory(target))) {
          const outcome = await pipeline.importFile(target, options);
          if (outcome.status === "skipped") {
            console.log(`Skipped ${outcome.filePath}: ${outcome.reason}`);
            return;
          }
          const r = outcome.record;
          console.log(`Imported ${r.fileName}`);
          console.log(`  pages: ${r.pageCount} | chunks: ${r.chunkCount} | method: ${r.method}`);
          console.log(`  category: ${r.category.category} (${percent(r.category.confidence)})`);
          for (const [key, value] of Object.entries(r.category.entities)) {
            console.log(`  ${key}: ${value}`);
          }
          if (r.degradedPages.length > 0) {
            console.log(`  OCR failed on page(s) ${r.degradedPages.join(", ")}; direct text kept`);
          }
          return;
        }

        const summary = await pipeline.importDirectory(target, {
          recursive: options.recursive,
          force: options.force,
          category: options.category,
          onProgress: (done, total, file) => {
            console.log(`[${done}/${total}] ${path.basename(file)}`);
          },
        });
        console.log(
          `\n${summary.imported.length} imported, ${summary.skipped.length} skipped, ` +
            `${summary.failed.length} failed (of ${summary.total})`,
        );
        for (const f of summary.failed) {
          console.log(`  ✗ ${f.filePath}: ${f.error}`);
        }
        if (summary.failed.length > 0) process.exitCode = 1;
      } catch (err) {
        fail(err);
      }
    },
  );

program
  .command("list")
  .description("List imported documents")
  .option("--category <category>", "Only this category")
  .option("--directory <label>", "Only under this directory label")
  .option("-l, --limit <n>", "Maximum number of documents", parsePositiveInt)
  .option("--json", "Print JSON")
  .action(async (options: { category?: string; directory?: string; limit?: number; json?: boolean }) => {
    try {
      const { metadata } = await setup();
      const docs = await metadata.list(options);
      if (options.json) {
        console.log(JSON.stringify(docs, null, 2));
        return;
      }
      if (docs.length === 0) {
        console.log("No documents found.");
        console.log('Use "archivist import <path>" to add some.');
        return;
      }
      for (const d of docs) {
        console.log(`${d.fileName}  [${d.category.category}]  ${d.directory || "."}`);
        console.log(
          `  ${d.importedAt.slice(0, 10)} | ${d.pageCount} page(s) | ${d.chunkCount} chunk(s) | ${d.method}`,
        );
      }
      console.log(`\n${docs.length} document(s)`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("delete")
  .description("Remove a document from the index")
  .argument("<path>", "Path of the imported PDF")
  .action(async (target: string) => {
    try {
      const { pipeline } = await setup();
      if (await pipeline.deleteDocument(target)) {
        console.log(`Deleted ${path.resolve(target)}`);
      } else {
        console.log(`Not imported: ${path.resolve(target)}`);
        process.exitCode = 1;
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("recategorize")
  .description("Assign a category to an imported document")
  .argument("<path>", "Path of the imported PDF")
  .argument("<category>", "New category")
  .action(async (target: string, category: string) => {
    try {
      const { pipeline } = await setup();
      const record = await pipeline.recategorize(target, category);
      console.log(`${record.fileName}: ${record.category.category}`);
      for (const [key, value] of Object.entries(record.category.entities)) {
        console.log(`  ${key}: ${value}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("categories")
  .description("Show index totals and document counts per category and directory")
  .action(async () => {
    try {
      const { orchestrator, store } = await setup();
      const [{ categories, directories }, stats] = await Promise.all([
        orchestrator.availableFilters(),
        store.stats(),
      ]);
      console.log(`Index: ${stats.documents} document(s), ${stats.chunks} chunk(s)\n`);
      console.log("Categories:");
      for (const c of categories) console.log(`  ${c.category.padEnd(16)} ${c.documents}`);
      console.log("\nDirectories:");
      for (const d of directories) {
        console.log(`  ${(d.directory || ".").padEnd(16)} ${d.documents} document(s), ${d.pages} page(s)`);
      }
    } catch (err) {
      fail(err);
    }
  });

// ── Questions ───────────────────────────────────────────────────────────────

withFilters(
  program
    .command("query")
    .description("Ask a question about the imported documents")
    .argument("<question...>", "The question"),
)
  .option("-l, --limit <n>", "Number of passages to retrieve", parsePositiveInt)
  .option("-m, --model <model>", "Try this model before the configured ones")
  .option("--json", "Print the full response as JSON")
  .action(async (words: string[], options: FilterOptions & { limit?: number; model?: string; json?: boolean }) => {
    try {
      const { orchestrator } = await setup();
      const response = await orchestrator.ask(words.join(" "), {
        filters: toFilters(options),
        limit: options.limit,
        model: options.model,
      });
      if (options.json) {
        console.log(JSON.stringify(response, null, 2));
        return;
      }
      console.log(response.answer);
      if (response.sources.length > 0) {
        console.log(`\nSources: ${formatSourcesForUI(response.sources)}`);
      }
      console.log(
        `Confidence: ${percent(response.confidence)} | passages: ${response.searchResultsCount}` +
          (response.model ? ` | model: ${response.model}` : ""),
      );
    } catch (err) {
      fail(err);
    }
  });

withFilters(program.command("chat").description("Interactive question session"))
  .option("-m, --model <model>", "Try this model before the configured ones")
  .action(async (options: FilterOptions & { model?: string }) => {
    try {
      const { orchestrator } = await setup();
      await runChat(orchestrator, { filters: toFilters(options), model: options.model });
    } catch (err) {
      fail(err);
    }
  });

// ── Models ──────────────────────────────────────────────────────────────────

const models = program.command("models").description("Language model operations");

models
  .command("list")
  .description("List models available on OpenRouter")
  .option("--filter <text>", "Only ids containing this text")
  .action(async (options: { filter?: string }) => {
    try {
      const { orchestrator, config } = await setup();
      const configured = new Set([config.openrouter.defaultModel, ...config.openrouter.fallbackModels]);
      const all = await orchestrator.listModels();
      const shown = options.filter ? all.filter((m) => m.id.includes(options.filter ?? "")) : all;
      for (const m of shown) {
        const mark = configured.has(m.id) ? "*" : " ";
        const ctx = m.contextLength ? ` (${m.contextLength} ctx)` : "";
        console.log(`${mark} ${m.id}${ctx}`);
      }
      console.log(`\n${shown.length} model(s); * = configured`);
    } catch (err) {
      fail(err);
    }
  });

models
  .command("test")
  .description("Check that the configured models answer")
  .argument("[model]", "Test only this model")
  .action(async (model: string | undefined) => {
    try {
      const { orchestrator } = await setup();
      const checks = await orchestrator.testModels(model);
      for (const c of checks) {
        console.log(c.ok ? `✓ ${c.model} (${c.latencyMs} ms)` : `✗ ${c.model}: ${c.error ?? "failed"}`);
      }
      if (checks.some((c) => !c.ok)) process.exitCode = 1;
    } catch (err) {
      fail(err);
    }
  });

// ── Config ──────────────────────────────────────────────────────────────────

const configCmd = program.command("config").description("Show or change configuration");

function configPath(): string {
  const opts = program.opts<GlobalOptions>();
  return defaultConfigPath({ configFile: opts.config, dataDir: opts.dataDir });
}

configCmd
  .command("show")
  .description("Print the effective config file values")
  .action(async () => {
    try {
      const file = configPath();
      const effective = validateConfigFile(await readConfigFile(file));
      console.log(`# ${file}`);
      console.log(JSON.stringify(redactConfig(effective), null, 2));
    } catch (err) {
      fail(err);
    }
  });

configCmd
  .command("get")
  .argument("<key>", "Dotted key, e.g. ocr.threshold")
  .action(async (key: string) => {
    try {
      const effective = validateConfigFile(await readConfigFile(configPath()));
      const value = getConfigValue(redactConfig(effective), key);
      if (value === undefined) {
        console.error(`Unknown key: ${key}`);
        process.exitCode = 1;
        return;
      }
      console.log(typeof value === "string" ? value : JSON.stringify(value));
    } catch (err) {
      fail(err);
    }
  });

configCmd
  .command("set")
  .argument("<key>", "Dotted key, e.g. openrouter.default_model")
  .argument("<value>", "JSON value or plain string")
  .action(async (key: string, value: string) => {
    try {
      const file = configPath();
      const raw = await readConfigFile(file);
      setConfigValue(raw, key, parseConfigValue(value));
      await writeConfigFile(file, raw);
      console.log(`Set ${key} in ${file}`);
    } catch (err) {
      fail(err);
    }
  });

configCmd
  .command("validate")
  .description("Check the config file and environment")
  .action(async () => {
    try {
      const opts = program.opts<GlobalOptions>();
      const loaded = await loadConfig({ configFile: opts.config, dataDir: opts.dataDir });
      console.log(`Configuration is valid (${loaded.paths.configFile})`);
      if (!loaded.openrouter.apiKey) {
        console.log("Warning: no OpenRouter API key; set OPENROUTER_API_KEY or openrouter.api_key");
        process.exitCode = 1;
      }
    } catch (err) {
      fail(err);
    }
  });

void program.parseAsync(process.argv).catch(fail);
