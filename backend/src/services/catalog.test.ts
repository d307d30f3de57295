import assert from "node:assert/strict";
import test from "node:test";
import { CrawlService } from "../crawlers/crawler";
import { loadRetailerCatalog, loadSelectorCatalog } from "../lib/catalogs";
import { Embedder, HashedWordEmbeddingModel } from "../lib/embedder";
import { HtmlSource } from "../lib/http";
import { LanguageModel } from "../lib/llm";
import { quietLogger } from "../lib/logger";
import { UrlSource } from "../lib/search";
import { Payload, PayloadFilter, PointInput, SearchOptions, StoredPoint, VectorStore } from "../lib/vectorStore";
import { ProductListRequest } from "../types";
import { ProductCatalogService } from "./catalog";
import { ReflectionService } from "./reflection";
import { RetrievalService } from "./retrieval";

/** Answers id lookups by matching product_data.id; everything else returns every point. */
class IndexedProducts implements VectorStore {
  constructor(private readonly points: StoredPoint[]) {}

  async ensureCollection(): Promise<void> {}

  async upsert(points: PointInput[]): Promise<string[]> {
    return points.map((_, index) => `new-${index}`);
  }

  async search(_vector: number[], options: SearchOptions): Promise<StoredPoint[]> {
    return this.points.slice(0, options.limit);
  }

  async findByFilter(filter: PayloadFilter, limit: number): Promise<StoredPoint[]> {
    const idCondition = filter.must.find((condition) => condition.key === "product_data.id");
    const wanted = idCondition && "matchValue" in idCondition ? idCondition.matchValue : undefined;
    const matching = this.points.filter((point) => {
      const data = point.payload.product_data;
      return typeof data === "object" && data !== null && "id" in data && data.id === wanted;
    });
    return matching.slice(0, limit);
  }

  async scrollByFilter(_filter: PayloadFilter, _limit: number): Promise<StoredPoint[]> {
    return [];
  }

  async setPayload(pointIds: string[], _payload: Payload): Promise<number> {
    return pointIds.length;
  }

  async count(): Promise<number> {
    return this.points.length;
  }
}

function point(id: string, name: string, price: number): StoredPoint {
  return {
    id: `point-${id}`,
    score: 0.8,
    payload: {
      text: name,
      product_data: {
        id,
        name,
        brand: "Samsung",
        sources: [{ name: "Tiki", url: `https://tiki.vn/${id}`, price, last_updated: "2026-01-01T00:00:00.000Z" }]
      }
    }
  };
}

const listingHtml = `<div class="product-item"><a href="/a06"><h3>Samsung Galaxy A06</h3></a><span class="price">3.190.000₫</span></div>`;
const detailHtml = `<h1 class="product-name">Samsung Galaxy Z Flip6</h1><span class="price">26.990.000₫</span>`;

function setup(points: StoredPoint[], reflectionReply: string) {
  const discoveries: string[] = [];
  const discovery: UrlSource = {
    async discover(query) {
      discoveries.push(query);
      return query.startsWith("điện thoại z-flip6") ? ["https://tiki.vn/z-flip6"] : ["https://tiki.vn/list"];
    }
  };
  const pages: HtmlSource = {
    async fetchHtml(url) {
      return url === "https://tiki.vn/z-flip6" ? detailHtml : listingHtml;
    }
  };
  const model: LanguageModel = {
    async generate() {
      return reflectionReply;
    }
  };
  const embedder = new Embedder({ model: new HashedWordEmbeddingModel(8), tier: "local:test", index: 0, failures: [] });
  const retrieval = new RetrievalService(
    new IndexedProducts(points),
    embedder,
    { topK: 5, similarityThreshold: 0.6, chunkSize: 200, chunkOverlap: 20, defaultLimit: 10, maxLimit: 50 },
    quietLogger()
  );
  const crawler = new CrawlService(
    discovery,
    pages,
    loadSelectorCatalog(),
    loadRetailerCatalog(),
    null,
    retrieval,
    { concurrency: 1, defaultLimit: 10, maxLimit: 50 },
    quietLogger()
  );
  const catalog = new ProductCatalogService(new ReflectionService(model, quietLogger()), retrieval, crawler, quietLogger());
  return { catalog, discoveries };
}

const listRequest: ProductListRequest = { query: "samsung", sort_by: "relevance", page: 1, limit: 10 };

test("listProducts answers from the index when reflection chooses it", async () => {
  const { catalog, discoveries } = setup([point("s24", "Samsung Galaxy S24", 22990000)], '{"decision": "rag_query"}');
  const products = await catalog.listProducts(listRequest);
  assert.deepEqual(
    products.map((product) => product.id),
    ["s24"]
  );
  assert.deepEqual(discoveries, []);
});

test("listProducts crawls when the index is empty or reflection asks for it", async () => {
  const empty = setup([], '{"decision": "rag_query"}');
  const fromEmpty = await empty.catalog.listProducts(listRequest);
  assert.deepEqual(
    fromEmpty.map((product) => product.name),
    ["Samsung Galaxy A06"]
  );

  const fresh = setup([point("s24", "Samsung Galaxy S24", 22990000)], '{"decision": "crawl", "confidence": 0.9}');
  const fromCrawl = await fresh.catalog.listProducts(listRequest);
  assert.deepEqual(
    fromCrawl.map((product) => product.name),
    ["Samsung Galaxy A06"]
  );
  assert.deepEqual(fresh.discoveries, ["samsung"]);
});

test("getProductDetail reads the index, then crawls", async () => {
  const { catalog } = setup([point("s24", "Samsung Galaxy S24", 22990000)], "{}");

  const indexed = await catalog.getProductDetail("s24");
  assert.equal(indexed?.name, "Samsung Galaxy S24");

  const crawled = await catalog.getProductDetail("z-flip6");
  assert.equal(crawled?.id, "z-flip6");
  assert.equal(crawled?.name, "Samsung Galaxy Z Flip6");
  assert.equal(crawled?.min_price, 26990000);
});

test("compareProducts skips unknown ids and needs two products", async () => {
  const { catalog } = setup(
    [point("s24", "Samsung Galaxy S24", 22990000), point("a55", "Samsung Galaxy A55", 9990000)],
    "{}"
  );

  const compared = await catalog.compareProducts(["s24", "missing", "a55"]);
  assert.deepEqual(
    compared.map((product) => product.id),
    ["s24", "a55"]
  );
  assert.deepEqual(await catalog.compareProducts(["s24", "missing"]), []);
  assert.deepEqual(await catalog.compareProducts(["s24", "s24"]), []);
});
