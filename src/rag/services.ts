import { AnswerGenerator } from "./answer-generator.js";
import { CategorizationEngine, defaultDetectors } from "./categorization/index.js";
import type { AppConfig } from "./config.js";
import { OpenRouterEmbedder } from "./embedding-service.js";
import { FallbackChain, retryPolicyFrom } from "./llm/fallback-chain.js";
import { OpenRouterClient } from "./llm/openrouter-client.js";
import type { Logger } from "./logger.js";
import { JsonMetadataStore } from "./metadata-store.js";
import { VisionOcrEngine } from "./ocr.js";
import { ContentExtractor, PdfjsBackend } from "./pdf-extractor.js";
import { IngestionPipeline } from "./pipeline.js";
import { QueryOrchestrator } from "./query-orchestrator.js";
import { RetrievalAggregator } from "./retriever.js";
import { VectraVectorStore } from "./vector-store.js";

export interface Services {
  config: AppConfig;
  logger: Logger;
  pipeline: IngestionPipeline;
  orchestrator: QueryOrchestrator;
  metadata: JsonMetadataStore;
  store: VectraVectorStore;
}

/** Wires every component from one config value. Nothing touches the network until used. */
export function createServices(config: AppConfig, logger: Logger): Services {
  const llm = new OpenRouterClient(config.openrouter, logger.child({ component: "openrouter" }));
  const embedder = new OpenRouterEmbedder(
    config.openrouter,
    config.embedding,
    logger.child({ component: "embedding" }),
  );
  const store = new VectraVectorStore(config.paths.indexDir, embedder, logger.child({ component: "vectors" }));
  const metadata = new JsonMetadataStore(config.paths.metadataFile, logger.child({ component: "metadata" }));

  const ocrLogger = logger.child({ component: "ocr" });
  const ocr = config.ocr.enabled
    ? new VisionOcrEngine(
        llm,
        new FallbackChain([config.ocr.model], retryPolicyFrom(config.openrouter), ocrLogger),
        ocrLogger,
      )
    : null;

  const extractorLogger = logger.child({ component: "extractor" });
  const extractor = new ContentExtractor(
    new PdfjsBackend(config.ocr.renderScale, extractorLogger),
    ocr,
    config.ocr,
    extractorLogger,
  );

  const categorizer = new CategorizationEngine(defaultDetectors(), config.categorization);

  const pipeline = new IngestionPipeline({
    extractor,
    categorizer,
    embedder,
    store,
    metadata,
    chunking: { chunkSize: config.chunkSize, overlap: config.chunkOverlap },
    logger: logger.child({ component: "ingest" }),
  });

  const queryLogger = logger.child({ component: "query" });
  const orchestrator = new QueryOrchestrator({
    aggregator: new RetrievalAggregator(store, logger.child({ component: "retrieval" })),
    generator: new AnswerGenerator(llm, config.openrouter, config.retrieval.contextChars, queryLogger),
    llm,
    metadata,
    openrouter: config.openrouter,
    topK: config.retrieval.topK,
    logger: queryLogger,
  });

  return { config, logger, pipeline, orchestrator, metadata, store };
}
