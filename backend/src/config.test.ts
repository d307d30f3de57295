import assert from "node:assert/strict";
import test from "node:test";
import { parseConfig } from "./config";

test("parseConfig fills defaults from an empty environment", () => {
  const config = parseConfig({});
  assert.equal(config.PORT, 8000);
  assert.equal(config.COLLECTION_NAME, "phone_products");
  assert.equal(config.EMBEDDING_DIMENSION, 768);
  assert.deepEqual(config.EMBEDDING_FALLBACK_MODELS, ["text-embedding-3-large"]);
  assert.deepEqual(config.SEARCH_ENGINES, ["google", "bing", "duckduckgo"]);
  assert.equal(config.SEARCH_PROVIDER, "searxng");
  assert.equal(config.CRAWL_BACKEND_ENABLED, true);
  assert.equal(config.RAG_TOP_K, 5);
  assert.equal(config.RAG_SIMILARITY_THRESHOLD, 0.6);
  assert.equal(config.OPENAI_API_KEY, undefined);
  assert.equal(config.SELECTORS_PATH, undefined);
});

test("parseConfig reads booleans, lists and blank optionals", () => {
  const config = parseConfig({
    CRAWL_BACKEND_ENABLED: "no",
    EMBEDDING_LOCAL_FALLBACK: "0",
    LLM_EXTRACTION_ENABLED: "YES",
    SEARCH_ENGINES: " google , , bing ",
    OPENAI_API_KEY: "   ",
    EXA_API_KEY: "test-secret",
    CRAWL_CONCURRENCY: "1"
  });
  assert.equal(config.CRAWL_BACKEND_ENABLED, false);
  assert.equal(config.EMBEDDING_LOCAL_FALLBACK, false);
  assert.equal(config.LLM_EXTRACTION_ENABLED, true);
  assert.deepEqual(config.SEARCH_ENGINES, ["google", "bing"]);
  assert.equal(config.OPENAI_API_KEY, undefined);
  assert.equal(config.EXA_API_KEY, "test-secret");
  assert.equal(config.CRAWL_CONCURRENCY, 1);
});

test("parseConfig rejects invalid values", () => {
  assert.throws(() => parseConfig({ CRAWL_BACKEND_ENABLED: "maybe" }));
  assert.throws(() => parseConfig({ COLLECTION_NAME: "Phone-Products" }));
  assert.throws(() => parseConfig({ SEARCH_PROVIDER: "bing" }));
  assert.throws(() => parseConfig({ CRAWL_CONCURRENCY: "0" }));
});
