import OpenAI from "openai";
import { createApp } from "./app";
import { config } from "./config";
import { CrawlService } from "./crawlers/crawler";
import { loadRetailerCatalog, loadSelectorCatalog } from "./lib/catalogs";
import { buildEmbeddingTiers, Embedder, selectEmbeddingModel } from "./lib/embedder";
import { HtmlFetcher } from "./lib/http";
import { LanguageModel, OpenAILanguageModel, UnavailableLanguageModel } from "./lib/llm";
import { LlmProductExtractor } from "./lib/llmExtract";
import { errorMessage, Logger } from "./lib/logger";
import { ExaSearchProvider, SearxngSearchProvider, UrlDiscovery, WebSearchProvider } from "./lib/search";
import { InMemorySessionStore } from "./lib/sessions";
import { createPool, PgVectorStore, poolClient } from "./lib/vectorStore";
import { ProductCatalogService } from "./services/catalog";
import { ChatOrchestrator } from "./services/chat";
import { ReflectionService } from "./services/reflection";
import { RetrievalService } from "./services/retrieval";

const logger = new Logger("backend", config.LOG_LEVEL);

function createSearchProvider(): WebSearchProvider | null {
  if (config.SEARCH_PROVIDER === "exa") {
    if (!config.EXA_API_KEY) {
      logger.warn("search_provider_disabled", { provider: "exa", reason: "EXA_API_KEY is not set" });
      return null;
    }
    return new ExaSearchProvider({ apiKey: config.EXA_API_KEY, baseUrl: config.EXA_BASE_URL, timeoutMs: config.SEARCH_TIMEOUT_MS });
  }
  return new SearxngSearchProvider({
    baseUrl: config.SEARXNG_API_URL,
    engines: config.SEARCH_ENGINES,
    language: config.SEARCH_LANGUAGE,
    region: config.SEARCH_REGION,
    timeoutMs: config.SEARCH_TIMEOUT_MS
  });
}

async function main(): Promise<void> {
  const openai = config.OPENAI_API_KEY
    ? new OpenAI({ apiKey: config.OPENAI_API_KEY, baseURL: config.OPENAI_BASE_URL, timeout: config.LLM_TIMEOUT_MS })
    : null;

  const pool = createPool(config.VECTOR_DB_URL, config.VECTOR_DB_TIMEOUT_MS);
  const store = new PgVectorStore(poolClient(pool), {
    collection: config.COLLECTION_NAME,
    dimension: config.EMBEDDING_DIMENSION,
    retry: {
      attempts: config.RETRY_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS
    },
    logger: logger.child("vector_store")
  });
  await store.ensureCollection();

  const selection = await selectEmbeddingModel(
    buildEmbeddingTiers({
      client: openai,
      primaryModel: config.EMBEDDING_MODEL,
      fallbackModels: config.EMBEDDING_FALLBACK_MODELS,
      localFallback: config.EMBEDDING_LOCAL_FALLBACK,
      dimension: config.EMBEDDING_DIMENSION,
      batchSize: config.EMBED_BATCH_SIZE
    }),
    logger.child("embedder")
  );

  const model: LanguageModel = openai
    ? new OpenAILanguageModel(
        openai,
        { model: config.LLM_MODEL, temperature: config.LLM_TEMPERATURE, maxTokens: config.LLM_MAX_TOKENS, topP: config.LLM_TOP_P },
        logger.child("llm")
      )
    : new UnavailableLanguageModel();

  const retailers = loadRetailerCatalog(config.RETAILERS_PATH);
  const retrieval = new RetrievalService(
    store,
    new Embedder(selection),
    {
      topK: config.RAG_TOP_K,
      similarityThreshold: config.RAG_SIMILARITY_THRESHOLD,
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      defaultLimit: config.DEFAULT_PAGE_SIZE,
      maxLimit: config.MAX_PAGE_SIZE
    },
    logger.child("retrieval")
  );
  const crawler = new CrawlService(
    new UrlDiscovery(
      createSearchProvider(),
      retailers,
      { maxPages: config.MAX_CRAWL_PAGES, searchLimit: config.SEARCH_LIMIT },
      logger.child("discovery")
    ),
    new HtmlFetcher(
      {
        crawlBackendUrl: config.CRAWL4AI_API_URL,
        crawlBackendEnabled: config.CRAWL_BACKEND_ENABLED,
        timeoutMs: config.CRAWL_TIMEOUT_MS
      },
      logger.child("fetch")
    ),
    loadSelectorCatalog(config.SELECTORS_PATH),
    retailers,
    openai && config.LLM_EXTRACTION_ENABLED
      ? new LlmProductExtractor(model, { maxChars: config.LLM_EXTRACTION_MAX_CHARS }, logger.child("llm_extract"))
      : null,
    retrieval,
    { concurrency: config.CRAWL_CONCURRENCY, defaultLimit: config.DEFAULT_PAGE_SIZE, maxLimit: config.MAX_PAGE_SIZE },
    logger.child("crawl")
  );
  const reflection = new ReflectionService(model, logger.child("reflection"));

  const app = createApp({
    name: config.APP_NAME,
    version: config.APP_VERSION,
    catalog: new ProductCatalogService(reflection, retrieval, crawler, logger.child("catalog")),
    chat: new ChatOrchestrator(
      new InMemorySessionStore(),
      reflection,
      retrieval,
      crawler,
      model,
      logger.child("chat")
    ),
    logger: logger.child("http")
  });

  const server = app.listen(config.PORT, () => {
    logger.info("server_started", {
      port: config.PORT,
      log_level: config.LOG_LEVEL,
      collection: config.COLLECTION_NAME,
      embedding_tier: selection.tier,
      llm: openai ? config.LLM_MODEL : "disabled",
      search_provider: config.SEARCH_PROVIDER,
      crawl_backend: config.CRAWL_BACKEND_ENABLED ? "enabled" : "disabled",
      crawl_concurrency: config.CRAWL_CONCURRENCY
    });
  });

  const shutdown = async (): Promise<void> => {
    logger.info("shutdown_started");
    server.close();
    await pool.end();
    logger.info("shutdown_completed");
  };

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });
}

main().catch((error: unknown) => {
  logger.error("startup_failed", { error: errorMessage(error) });
  process.exit(1);
});
