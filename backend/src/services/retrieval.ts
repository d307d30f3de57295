import { Embedder } from "../lib/embedder";
import { chunkText } from "../lib/chunk";
import { errorMessage, Logger } from "../lib/logger";
import { isRecord, toFallbackProduct, tryValidateProduct } from "../lib/normalize";
import { PageBounds, paginate, resolvePage, sortProducts } from "../lib/productQuery";
import { extractDomain, normalizeBrandName } from "../lib/text";
import { FieldCondition, isZeroVector, PayloadFilter, StoredPoint, VectorStore } from "../lib/vectorStore";
import { Product, ProductListRequest } from "../types";

export type ProductQuery = Pick<ProductListRequest, "query"> & Partial<Omit<ProductListRequest, "query">>;

export interface IndexDocument {
  text: string;
  source: string;
  date?: string;
  /** Empty object when the page yielded no product. */
  productData: Product | Record<string, never>;
}

export interface RetrievalConfig extends PageBounds {
  topK: number;
  similarityThreshold: number;
  chunkSize: number;
  chunkOverlap: number;
}

// Page size for walking every chunk of one product.
const UPDATE_SCROLL_PAGE = 100;

export function buildProductFilter(query: Omit<ProductQuery, "query">): PayloadFilter | undefined {
  const must: FieldCondition[] = [];
  if (query.price_min !== undefined) {
    must.push({ key: "product_data.min_price", range: { gte: query.price_min } });
  }
  if (query.price_max !== undefined) {
    must.push({ key: "product_data.min_price", range: { lte: query.price_max } });
  }
  if (query.brands && query.brands.length > 0) {
    must.push({ key: "product_data.brand", matchAny: [...new Set(query.brands.map(normalizeBrandName))] });
  }
  return must.length > 0 ? { must } : undefined;
}

/** Rank order is kept; the first point seen for a product id wins. */
export function dedupeByProductId(points: StoredPoint[]): Array<Record<string, unknown>> {
  const seen = new Set<string>();
  const records: Array<Record<string, unknown>> = [];
  for (const point of points) {
    const data = point.payload.product_data;
    if (!isRecord(data)) {
      continue;
    }
    const id = typeof data.id === "string" ? data.id : "";
    if (!id || seen.has(id)) {
      continue;
    }
    seen.add(id);
    records.push(data);
  }
  return records;
}

export class RetrievalService {
  constructor(
    private readonly store: VectorStore,
    private readonly embedder: Embedder,
    private readonly config: RetrievalConfig,
    private readonly logger: Logger
  ) {}

  private toProduct(record: Record<string, unknown>): Product {
    try {
      const result = tryValidateProduct(record);
      if (result.product) {
        return result.product;
      }
      this.logger.warn("stored_product_invalid", { product_id: record.id, issues: result.issues });
    } catch (error) {
      this.logger.warn("stored_product_invalid", { product_id: record.id, error: errorMessage(error) });
    }
    return toFallbackProduct(record);
  }

  /** Never throws: an unavailable embedder or store yields []. */
  async getProducts(query: ProductQuery): Promise<Product[]> {
    const started = Date.now();
    try {
      const vector = await this.embedder.embed(query.query);
      if (isZeroVector(vector)) {
        this.logger.info("query_vector_empty", { query: query.query });
        return [];
      }
      const points = await this.store.search(vector, {
        limit: this.config.topK * 5,
        filter: buildProductFilter(query),
        scoreThreshold: this.config.similarityThreshold
      });

      const unique = dedupeByProductId(points);
      const sorted = sortProducts(
        unique.map((record) => this.toProduct(record)),
        query.sort_by ?? "relevance"
      );
      const window = resolvePage({ page: query.page ?? 1, limit: query.limit ?? 0 }, this.config);
      const products = paginate(sorted, window);

      this.logger.info("product_search_completed", {
        query: query.query,
        hits: points.length,
        unique_products: unique.length,
        returned: products.length,
        page: window.page,
        limit: window.limit,
        duration_ms: Date.now() - started
      });
      return products;
    } catch (error) {
      this.logger.error("product_search_failed", { query: query.query, error: errorMessage(error) });
      return [];
    }
  }

  async getProductById(productId: string): Promise<Product | null> {
    let points: StoredPoint[];
    try {
      points = await this.store.findByFilter({ must: [{ key: "product_data.id", matchValue: productId }] }, 1);
    } catch (error) {
      this.logger.error("product_lookup_failed", { product_id: productId, error: errorMessage(error) });
      return null;
    }

    const [record] = dedupeByProductId(points);
    if (!record) {
      this.logger.info("product_not_found", { product_id: productId });
      return null;
    }
    return this.toProduct(record);
  }

  /** Embeds and stores documents; write failures propagate. */
  async addDocuments(documents: IndexDocument[]): Promise<number> {
    if (documents.length === 0) {
      return 0;
    }
    const vectors = await this.embedder.embedMany(documents.map((document) => document.text));
    const ingestedAt = new Date().toISOString();
    const ids = await this.store.upsert(
      documents.map((document, index) => ({
        vector: vectors[index] ?? [],
        payload: {
          text: document.text,
          source: document.source,
          date: document.date ?? ingestedAt,
          domain: extractDomain(document.source),
          product_data: document.productData,
          chunk_id: index
        }
      }))
    );
    this.logger.info("documents_indexed", { count: ids.length, source: documents[0]?.source });
    return ids.length;
  }

  /** Chunks page text and tags every chunk with the product found on that page. */
  async indexPage(text: string, sourceUrl: string, product: Product | null): Promise<number> {
    const chunks = chunkText(text, { chunkSize: this.config.chunkSize, chunkOverlap: this.config.chunkOverlap });
    return this.addDocuments(chunks.map((chunk) => ({ text: chunk, source: sourceUrl, productData: product ?? {} })));
  }

  /** Rewrites product_data on every chunk that references the product, without re-embedding. */
  async updateProduct(product: Product): Promise<boolean> {
    const filter: PayloadFilter = { must: [{ key: "product_data.id", matchValue: product.id }] };
    try {
      const pointIds: string[] = [];
      let page: StoredPoint[];
      do {
        page = await this.store.scrollByFilter(filter, UPDATE_SCROLL_PAGE, pointIds.length);
        pointIds.push(...page.map((point) => point.id));
      } while (page.length === UPDATE_SCROLL_PAGE);
      if (pointIds.length === 0) {
        this.logger.warn("product_update_missing", { product_id: product.id });
        return false;
      }
      const updated = await this.store.setPayload(pointIds, { product_data: product });
      this.logger.info("product_updated", { product_id: product.id, points: updated });
      return true;
    } catch (error) {
      this.logger.error("product_update_failed", { product_id: product.id, error: errorMessage(error) });
      return false;
    }
  }

  async searchSimilarProducts(productId: string, limit = 5): Promise<Product[]> {
    const product = await this.getProductById(productId);
    if (!product) {
      return [];
    }
    const query = [product.name, product.brand, product.model].filter(Boolean).join(" ");
    const candidates = await this.getProducts({ query, limit: limit + 1 });
    return candidates.filter((candidate) => candidate.id !== productId).slice(0, limit);
  }

  async getProductCount(): Promise<number> {
    try {
      return await this.store.count();
    } catch (error) {
      this.logger.error("product_count_failed", { error: errorMessage(error) });
      return 0;
    }
  }
}
