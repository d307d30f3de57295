import { CrawlService } from "../crawlers/crawler";
import { Logger } from "../lib/logger";
import { Product, ProductListRequest } from "../types";
import { ReflectionService } from "./reflection";
import { RetrievalService } from "./retrieval";

export const MIN_COMPARISON_PRODUCTS = 2;

/** Product endpoints: each one picks between the index and a live crawl. */
export class ProductCatalogService {
  constructor(
    private readonly reflection: ReflectionService,
    private readonly retrieval: RetrievalService,
    private readonly crawler: CrawlService,
    private readonly logger: Logger
  ) {}

  async listProducts(request: ProductListRequest): Promise<Product[]> {
    const decision = await this.reflection.reflectOnProductList(request);
    if (decision.action === "rag_query") {
      const products = await this.retrieval.getProducts(request);
      if (products.length > 0) {
        return products;
      }
      this.logger.info("index_empty_crawling", { query: request.query });
    }
    return this.crawler.crawlNewProducts(request);
  }

  async getProductDetail(productId: string): Promise<Product | null> {
    const decision = await this.reflection.reflectOnProductDetail(productId);
    if (decision.action === "rag_query") {
      const product = await this.retrieval.getProductById(productId);
      if (product) {
        return product;
      }
    }
    this.logger.info("product_detail_crawling", { product_id: productId });
    return this.crawler.crawlProductDetail(productId);
  }

  /**
   * Index lookups only. Unknown ids are skipped; fewer than two ids, or fewer than two
   * products found, yields [].
   */
  async compareProducts(productIds: string[]): Promise<Product[]> {
    const ids = [...new Set(productIds)];
    if (ids.length < MIN_COMPARISON_PRODUCTS) {
      return [];
    }
    const found = await Promise.all(ids.map((id) => this.retrieval.getProductById(id)));
    const products = found.filter((product): product is Product => product !== null);
    if (products.length < MIN_COMPARISON_PRODUCTS) {
      this.logger.warn("comparison_incomplete", { requested: ids.length, found: products.length });
      return [];
    }
    return products;
  }
}
