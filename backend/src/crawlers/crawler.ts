import {
  detailSelectorsFor,
  listingSelectorsFor,
  RetailerCatalog,
  SelectorCatalog,
  sourceNameForUrl
} from "../lib/catalogs";
import { extractDetailCandidate, extractJsonLdCandidates, extractListingCandidates, PageContext } from "../lib/extract";
import { HtmlSource } from "../lib/http";
import { LlmProductExtractor } from "../lib/llmExtract";
import { errorMessage, Logger } from "../lib/logger";
import { tryValidateProduct } from "../lib/normalize";
import { filterProducts, PageBounds, paginate, resolvePage, sortProducts } from "../lib/productQuery";
import { buildSearchTerms, UrlSource } from "../lib/search";
import { extractDomain, formatVnd, htmlToText } from "../lib/text";
import { RetrievalService } from "../services/retrieval";
import { Product, ProductCandidate, ProductListRequest } from "../types";

export interface CrawlConfig extends PageBounds {
  concurrency: number;
}

type ExtractionStrategy = "selectors" | "json_ld" | "llm";

/** Runs `worker` over `items` with at most `limit` in flight; results keep input order. */
async function mapLimit<T, R>(items: T[], limit: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  if (items.length === 0) {
    return results;
  }
  const concurrency = Math.max(1, Math.min(limit, items.length));
  let next = 0;
  const runners = Array.from({ length: concurrency }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  });
  await Promise.all(runners);
  return results;
}

/** Text stored for one product when a page lists several. */
export function describeProduct(product: Product): string {
  const lines = [
    `${product.name} (${product.brand}${product.model ? ` ${product.model}` : ""})`,
    `Giá: ${formatVnd(product.min_price)} - ${formatVnd(product.max_price)} VND`
  ];
  const specs = product.specifications;
  const specLine = [specs.cpu, specs.ram, specs.storage, specs.display, specs.camera, specs.battery, specs.os]
    .filter(Boolean)
    .join(", ");
  if (specLine) {
    lines.push(`Thông số: ${specLine}`);
  }
  if (product.description) {
    lines.push(product.description);
  }
  return lines.join("\n");
}

export class CrawlService {
  constructor(
    private readonly discovery: UrlSource,
    private readonly fetcher: HtmlSource,
    private readonly selectors: SelectorCatalog,
    private readonly retailers: RetailerCatalog,
    private readonly llmExtractor: LlmProductExtractor | null,
    private readonly retrieval: RetrievalService,
    private readonly config: CrawlConfig,
    private readonly logger: Logger
  ) {}

  private pageContext(url: string): PageContext {
    return { url, sourceName: sourceNameForUrl(this.retailers, url), now: new Date().toISOString() };
  }

  private validate(candidates: ProductCandidate[], url: string, strategy: ExtractionStrategy): Product[] {
    const products: Product[] = [];
    for (const candidate of candidates) {
      const result = tryValidateProduct(candidate);
      if (result.product) {
        products.push(result.product);
      } else {
        this.logger.debug("candidate_dropped", { url, strategy, name: candidate.name, issues: result.issues });
      }
    }
    return products;
  }

  private async extractListing(html: string, context: PageContext): Promise<Product[]> {
    const domain = extractDomain(context.url);
    const fromSelectors = this.validate(
      extractListingCandidates(html, listingSelectorsFor(this.selectors, domain), context),
      context.url,
      "selectors"
    );
    if (fromSelectors.length > 0) {
      return fromSelectors;
    }
    const fromJsonLd = this.validate(extractJsonLdCandidates(html, context), context.url, "json_ld");
    if (fromJsonLd.length > 0 || !this.llmExtractor) {
      return fromJsonLd;
    }
    return this.validate(await this.llmExtractor.extract(html, context), context.url, "llm");
  }

  /** First valid product with a price wins; a priceless valid one is kept as a last resort. */
  private async extractDetail(html: string, context: PageContext, productId: string): Promise<Product | null> {
    const domain = extractDomain(context.url);
    const strategies: Array<[ExtractionStrategy, () => Promise<ProductCandidate[]>]> = [
      ["selectors", async () => {
        const candidate = extractDetailCandidate(html, detailSelectorsFor(this.selectors, domain), context);
        return candidate ? [candidate] : [];
      }],
      ["json_ld", async () => extractJsonLdCandidates(html, context).slice(0, 1)],
      ["llm", async () => (this.llmExtractor ? (await this.llmExtractor.extract(html, context)).slice(0, 1) : [])]
    ];

    let priceless: Product | null = null;
    for (const [strategy, run] of strategies) {
      const candidates = (await run()).map((candidate) => ({ ...candidate, id: productId }));
      const [product] = this.validate(candidates, context.url, strategy);
      if (product && product.min_price > 0) {
        return product;
      }
      priceless = priceless ?? product ?? null;
    }
    return priceless;
  }

  private async indexProducts(html: string, url: string, products: Product[]): Promise<void> {
    try {
      let points: number;
      if (products.length > 1) {
        points = await this.retrieval.addDocuments(
          products.map((product) => ({ text: describeProduct(product), source: url, productData: product }))
        );
      } else {
        points = await this.retrieval.indexPage(htmlToText(html), url, products[0] ?? null);
      }
      this.logger.debug("page_indexed", { url, products: products.length, points });
    } catch (error) {
      this.logger.error("page_index_failed", { url, error: errorMessage(error) });
    }
  }

  private async crawlListingUrl(url: string): Promise<Product[]> {
    try {
      const html = await this.fetcher.fetchHtml(url);
      if (!html) {
        this.logger.warn("url_skipped", { url, reason: "no_html" });
        return [];
      }
      const products = await this.extractListing(html, this.pageContext(url));
      await this.indexProducts(html, url, products);
      this.logger.info("url_crawled", { url, products: products.length });
      return products;
    } catch (error) {
      this.logger.error("url_failed", { url, error: errorMessage(error) });
      return [];
    }
  }

  /** Discovers retailer pages, extracts and indexes their products, then filters, sorts and pages. */
  async crawlNewProducts(request: ProductListRequest): Promise<Product[]> {
    const started = Date.now();
    const terms = buildSearchTerms(request);
    let urls: string[];
    try {
      urls = await this.discovery.discover(terms);
    } catch (error) {
      this.logger.error("url_discovery_failed", { query: terms, error: errorMessage(error) });
      return [];
    }
    if (urls.length === 0) {
      this.logger.warn("no_urls_discovered", { query: terms });
      return [];
    }

    const perUrl = await mapLimit(urls, this.config.concurrency, (url) => this.crawlListingUrl(url));
    const crawled = perUrl.flat();
    const filtered = filterProducts(crawled, request);
    const sorted = sortProducts(filtered, request.sort_by);
    const products = paginate(sorted, resolvePage(request, this.config));

    this.logger.info("crawl_completed", {
      query: terms,
      urls: urls.length,
      crawled_products: crawled.length,
      matching_products: filtered.length,
      returned: products.length,
      duration_ms: Date.now() - started
    });
    return products;
  }

  /** Crawls the first page found for the id; the product keeps that id so later lookups hit the index. */
  async crawlProductDetail(productId: string): Promise<Product | null> {
    const query = `điện thoại ${productId}`;
    let url: string | undefined;
    try {
      [url] = await this.discovery.discover(query);
    } catch (error) {
      this.logger.error("url_discovery_failed", { query, error: errorMessage(error) });
      return null;
    }
    if (!url) {
      this.logger.warn("no_urls_discovered", { query });
      return null;
    }

    try {
      const html = await this.fetcher.fetchHtml(url);
      if (!html) {
        this.logger.warn("url_skipped", { url, reason: "no_html" });
        return null;
      }
      const product = await this.extractDetail(html, this.pageContext(url), productId);
      if (!product) {
        this.logger.warn("detail_not_extracted", { url, product_id: productId });
        return null;
      }
      await this.indexProducts(html, url, [product]);
      return product;
    } catch (error) {
      this.logger.error("url_failed", { url, error: errorMessage(error) });
      return null;
    }
  }
}
