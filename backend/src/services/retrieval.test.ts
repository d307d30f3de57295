import assert from "node:assert/strict";
import test from "node:test";
import { Embedder, HashedWordEmbeddingModel } from "../lib/embedder";
import { quietLogger } from "../lib/logger";
import { validateProduct } from "../lib/normalize";
import { Payload, PayloadFilter, PointInput, SearchOptions, StoredPoint, VectorStore } from "../lib/vectorStore";
import { buildProductFilter, RetrievalService } from "./retrieval";

class FakeVectorStore implements VectorStore {
  readonly searches: Array<{ vector: number[]; options: SearchOptions }> = [];
  readonly upserts: PointInput[][] = [];
  readonly payloadUpdates: Array<{ ids: string[]; payload: Payload }> = [];
  readonly scrolls: Array<{ filter: PayloadFilter; limit: number; offset: number }> = [];
  readonly lookups: Array<{ filter: PayloadFilter; limit: number }> = [];
  hits: StoredPoint[] = [];
  failWith: Error | null = null;

  async ensureCollection(): Promise<void> {}

  async upsert(points: PointInput[]): Promise<string[]> {
    this.upserts.push(points);
    return points.map((_, index) => `point-${index}`);
  }

  async search(vector: number[], options: SearchOptions): Promise<StoredPoint[]> {
    this.searches.push({ vector, options });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.hits.slice(0, options.limit);
  }

  async findByFilter(filter: PayloadFilter, limit: number): Promise<StoredPoint[]> {
    this.lookups.push({ filter, limit });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.hits.slice(0, limit);
  }

  async scrollByFilter(filter: PayloadFilter, limit: number, offset = 0): Promise<StoredPoint[]> {
    this.scrolls.push({ filter, limit, offset });
    return this.hits.slice(offset, offset + limit);
  }

  async setPayload(pointIds: string[], payload: Payload): Promise<number> {
    this.payloadUpdates.push({ ids: pointIds, payload });
    return pointIds.length;
  }

  async count(): Promise<number> {
    if (this.failWith) {
      throw this.failWith;
    }
    return this.hits.length;
  }
}

function phone(id: string, name: string, price: number, brand = "Samsung"): Record<string, unknown> {
  return {
    id,
    name,
    brand,
    sources: [{ name: "FPT Shop", url: `https://fptshop.com.vn/${id}`, price, last_updated: "2026-01-01T00:00:00.000Z" }]
  };
}

function hit(id: string, productData: Record<string, unknown>): StoredPoint {
  return { id, score: 0.9, payload: { text: "chunk", product_data: productData } };
}

const config = {
  topK: 5,
  similarityThreshold: 0.6,
  chunkSize: 40,
  chunkOverlap: 10,
  defaultLimit: 10,
  maxLimit: 50
};

function setup() {
  const store = new FakeVectorStore();
  const embedder = new Embedder({ model: new HashedWordEmbeddingModel(8), tier: "local:test", index: 0, failures: [] });
  const service = new RetrievalService(store, embedder, config, quietLogger());
  return { store, service };
}

test("getProducts dedupes by product id, keeps the first hit and degrades invalid records", async () => {
  const { store, service } = setup();
  store.hits = [
    hit("1", phone("a", "Galaxy A15", 4990000)),
    hit("2", phone("b", "Galaxy A25", 6490000)),
    hit("3", phone("a", "Galaxy A15 (stale)", 1)),
    hit("4", {}),
    hit("5", { id: "c", name: "Galaxy A05", brand: "samsung", min_price: 2500000, sources: [] })
  ];

  const products = await service.getProducts({ query: "samsung dưới 8 triệu", price_max: 8000000, brands: ["SS"] });

  assert.deepEqual(
    products.map((product) => product.name),
    ["Galaxy A15", "Galaxy A25", "Galaxy A05"]
  );
  assert.equal(products[0]?.min_price, 4990000);
  assert.deepEqual(products[2]?.sources, []);
  assert.equal(products[2]?.min_price, 2500000);
  assert.equal(products[2]?.brand, "Samsung");

  const search = store.searches[0];
  assert.equal(search?.options.limit, 25);
  assert.equal(search?.options.scoreThreshold, 0.6);
  assert.deepEqual(search?.options.filter, {
    must: [
      { key: "product_data.min_price", range: { lte: 8000000 } },
      { key: "product_data.brand", matchAny: ["Samsung"] }
    ]
  });
});

test("getProducts sorts and paginates after de-duplication", async () => {
  const { store, service } = setup();
  store.hits = Array.from({ length: 25 }, (_, index) => hit(`p${index}`, phone(`id-${index}`, `Phone ${index}`, 1000 * (25 - index))));

  const page = await service.getProducts({ query: "điện thoại", sort_by: "price_asc", page: 2, limit: 10 });
  assert.deepEqual(
    page.map((product) => product.min_price),
    [11000, 12000, 13000, 14000, 15000, 16000, 17000, 18000, 19000, 20000]
  );

  const clamped = await service.getProducts({ query: "điện thoại", page: 0, limit: 0 });
  assert.equal(clamped.length, 10);
  assert.equal(clamped[0]?.id, "id-0");
});

test("getProducts fails open to an empty list", async () => {
  const { store, service } = setup();
  store.failWith = new Error("connection refused");
  assert.deepEqual(await service.getProducts({ query: "iphone" }), []);
  assert.equal(await service.getProductCount(), 0);
});

test("getProductById reads by id filter without a similarity search", async () => {
  const { store, service } = setup();
  store.hits = [hit("1", phone("a", "Galaxy A15", 4990000))];

  const product = await service.getProductById("a");
  assert.equal(product?.name, "Galaxy A15");
  assert.equal(store.searches.length, 0);
  assert.deepEqual(store.lookups[0], { filter: { must: [{ key: "product_data.id", matchValue: "a" }] }, limit: 1 });

  store.hits = [];
  assert.equal(await service.getProductById("missing"), null);
});

test("indexPage chunks text and tags every chunk with the product", async () => {
  const { store, service } = setup();
  const product = validateProduct(phone("a", "Galaxy A15", 4990000));
  const text = "Samsung Galaxy A15 màn hình 6.5 inch\n\nPin 5000 mAh sạc nhanh 25W\n\nGiá 4.990.000đ tại FPT Shop";

  const count = await service.indexPage(text, "https://www.fptshop.com.vn/a", product);

  const points = store.upserts[0] ?? [];
  assert.equal(count, points.length);
  assert.equal(points.length, 3);
  assert.deepEqual(
    points.map((point) => point.payload.chunk_id),
    [0, 1, 2]
  );
  assert.equal(points[0]?.payload.text, "Samsung Galaxy A15 màn hình 6.5 inch");
  assert.equal(points[0]?.payload.domain, "fptshop.com.vn");
  assert.equal(points[0]?.payload.source, "https://www.fptshop.com.vn/a");
  assert.equal(points[2]?.payload.product_data, product);
  assert.equal(points[0]?.vector.length, 8);

  await service.indexPage("Không có sản phẩm", "https://tiki.vn/x", null);
  assert.deepEqual(store.upserts[1]?.[0]?.payload.product_data, {});
});

test("updateProduct rewrites product_data on every matching point", async () => {
  const { store, service } = setup();
  const product = validateProduct(phone("a", "Galaxy A15", 4590000));
  store.hits = [hit("p1", phone("a", "Galaxy A15", 4990000)), hit("p2", phone("a", "Galaxy A15", 4990000))];

  assert.equal(await service.updateProduct(product), true);
  assert.deepEqual(store.scrolls[0], { filter: { must: [{ key: "product_data.id", matchValue: "a" }] }, limit: 100, offset: 0 });
  assert.deepEqual(store.payloadUpdates[0], { ids: ["p1", "p2"], payload: { product_data: product } });

  store.hits = [];
  assert.equal(await service.updateProduct(product), false);
});

test("updateProduct pages through products indexed many times over", async () => {
  const { store, service } = setup();
  const product = validateProduct(phone("a", "Galaxy A15", 4590000));
  store.hits = Array.from({ length: 250 }, (_, index) => hit(`p${index}`, phone("a", "Galaxy A15", 4990000)));

  assert.equal(await service.updateProduct(product), true);
  assert.deepEqual(
    store.scrolls.map((scroll) => scroll.offset),
    [0, 100, 200]
  );
  const ids = store.payloadUpdates[0]?.ids ?? [];
  assert.equal(ids.length, 250);
  assert.equal(ids[0], "p0");
  assert.equal(ids[249], "p249");
});

test("getProducts returns nothing for a query without words", async () => {
  const { store, service } = setup();
  store.hits = [hit("1", phone("a", "Galaxy A15", 4990000))];

  assert.deepEqual(await service.getProducts({ query: "???" }), []);
  assert.equal(store.searches.length, 0);
  assert.equal(store.lookups.length, 0);
});

test("getProducts keeps stored names with out-of-range character references", async () => {
  const { store, service } = setup();
  store.hits = [
    hit("1", phone("a", "Phone &#x110000;", 4990000)),
    hit("2", phone("b", "Galaxy A15 &amp;lt;5G&amp;gt;", 5490000))
  ];

  const products = await service.getProducts({ query: "phone" });
  assert.deepEqual(
    products.map((product) => product.name),
    ["Phone &#x110000;", "Galaxy A15 &amp;lt;5G&amp;gt;"]
  );
});

test("searchSimilarProducts excludes the product itself", async () => {
  const { store, service } = setup();
  store.hits = [
    hit("1", phone("a", "Galaxy A15", 4990000)),
    hit("2", phone("b", "Galaxy A25", 6490000)),
    hit("3", phone("c", "Galaxy A35", 7990000))
  ];

  const similar = await service.searchSimilarProducts("a", 1);
  assert.deepEqual(
    similar.map((product) => product.id),
    ["b"]
  );
});

test("buildProductFilter omits absent constraints", () => {
  assert.equal(buildProductFilter({}), undefined);
  assert.deepEqual(buildProductFilter({ price_min: 0, brands: ["iphone", "Apple"] }), {
    must: [
      { key: "product_data.min_price", range: { gte: 0 } },
      { key: "product_data.brand", matchAny: ["Apple"] }
    ]
  });
});
