import { RetailerCatalog } from "./catalogs";
import { FetchLike, fetchWithTimeout } from "./http";
import { errorMessage, Logger } from "./logger";
import { canonicalUrl, dedupeUrls, isAllowedDomain } from "./url";

export interface SearchRequest {
  query: string;
  limit: number;
  /** Hosts the caller will accept; providers that can restrict server-side do so. */
  includeDomains: string[];
}

export interface WebSearchProvider {
  readonly name: string;
  search(request: SearchRequest): Promise<string[]>;
}

function resultUrls(payload: unknown): string[] | null {
  if (!payload || typeof payload !== "object") {
    return null;
  }
  let results: unknown = "results" in payload ? payload.results : undefined;
  if (!Array.isArray(results) && "data" in payload && payload.data && typeof payload.data === "object") {
    results = "results" in payload.data ? payload.data.results : undefined;
  }
  if (!Array.isArray(results)) {
    return null;
  }
  const urls: string[] = [];
  for (const result of results) {
    if (result && typeof result === "object" && "url" in result && typeof result.url === "string") {
      urls.push(result.url);
    }
  }
  return urls;
}

export interface SearxngConfig {
  baseUrl: string;
  engines: string[];
  language: string;
  region: string;
  timeoutMs: number;
}

export class SearxngSearchProvider implements WebSearchProvider {
  readonly name = "searxng";

  constructor(
    private readonly config: SearxngConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async search(request: SearchRequest): Promise<string[]> {
    const params = new URLSearchParams({
      q: request.query,
      format: "json",
      language: this.config.language,
      region: this.config.region,
      category_general: "1",
      engines: this.config.engines.join(","),
      limit: String(request.limit)
    });
    const response = await fetchWithTimeout(
      `${this.config.baseUrl.replace(/\/+$/, "")}/search?${params.toString()}`,
      { method: "GET", headers: { accept: "application/json" } },
      this.config.timeoutMs,
      this.fetchImpl
    );
    if (!response.ok) {
      throw new Error(`SearXNG responded with status ${response.status}`);
    }
    const payload: unknown = await response.json();
    const urls = resultUrls(payload);
    if (!urls) {
      throw new Error("SearXNG response has no results array");
    }
    return urls;
  }
}

export interface ExaConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

function buildExaSearchUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim();
  if (/\/search\/?$/i.test(trimmed)) {
    return trimmed;
  }
  return `${trimmed.replace(/\/+$/, "")}/search`;
}

export class ExaSearchProvider implements WebSearchProvider {
  readonly name = "exa";
  private readonly searchUrl: string;

  constructor(
    private readonly config: ExaConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.searchUrl = buildExaSearchUrl(config.baseUrl);
  }

  async search(request: SearchRequest): Promise<string[]> {
    const response = await fetchWithTimeout(
      this.searchUrl,
      {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          "x-api-key": this.config.apiKey
        },
        body: JSON.stringify({
          query: request.query,
          type: "keyword",
          numResults: request.limit,
          includeDomains: request.includeDomains
        })
      },
      this.config.timeoutMs,
      this.fetchImpl
    );
    if (!response.ok) {
      throw new Error(`Exa responded with status ${response.status}`);
    }
    const payload: unknown = await response.json();
    const urls = resultUrls(payload);
    if (!urls) {
      throw new Error("Exa response has no results array");
    }
    return urls;
  }
}

function containsKeyword(text: string, keyword: string): boolean {
  const escaped = keyword.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^\\p{L}\\p{N}])${escaped}($|[^\\p{L}\\p{N}])`, "u").test(text.toLowerCase());
}

/**
 * Deterministic crawl targets for when search is down: brand listing pages for every brand
 * keyword in the query, then retailer search pages, then generic phone categories when no
 * brand matched. Never empty.
 */
export function buildFallbackUrls(query: string, catalog: RetailerCatalog, maxPages: number): string[] {
  const urls: string[] = [];
  let matchedBrand = false;

  for (const entry of catalog.fallback.brands) {
    if (entry.keywords.some((keyword) => containsKeyword(query, keyword))) {
      matchedBrand = true;
      urls.push(...entry.urls);
    }
  }

  const trimmed = query.trim();
  if (trimmed) {
    for (const template of catalog.fallback.searchUrlTemplates) {
      urls.push(template.replace("{query}", encodeURIComponent(trimmed)));
    }
  }

  if (!matchedBrand) {
    urls.push(...catalog.fallback.categoryUrls);
  }

  return dedupeUrls(urls).slice(0, Math.max(1, maxPages));
}

export interface SearchTerms {
  query: string;
  price_min?: number;
  price_max?: number;
  brands?: string[];
}

export function buildSearchTerms(request: SearchTerms): string {
  let terms = request.query.trim();
  if (request.price_min) {
    terms += ` giá từ ${request.price_min}`;
  }
  if (request.price_max) {
    terms += ` giá đến ${request.price_max}`;
  }
  if (request.brands && request.brands.length > 0) {
    terms += ` ${request.brands.join(" ")}`;
  }
  return terms;
}

export interface UrlDiscoveryOptions {
  maxPages: number;
  searchLimit: number;
}

export interface UrlSource {
  discover(query: string): Promise<string[]>;
}

export class UrlDiscovery implements UrlSource {
  constructor(
    private readonly provider: WebSearchProvider | null,
    private readonly catalog: RetailerCatalog,
    private readonly options: UrlDiscoveryOptions,
    private readonly logger: Logger
  ) {}

  /** Allow-listed retailer URLs from search, or the constructed fallback set. */
  async discover(query: string): Promise<string[]> {
    const searched = await this.searchAllowed(query);
    if (searched.length > 0) {
      return searched;
    }
    const fallback = buildFallbackUrls(query, this.catalog, this.options.maxPages);
    this.logger.info("fallback_urls_used", { query, url_count: fallback.length });
    return fallback;
  }

  /** Search results only; empty when the provider is missing, failing or finds nothing usable. */
  async searchAllowed(query: string): Promise<string[]> {
    if (!this.provider) {
      return [];
    }
    let raw: string[];
    try {
      raw = await this.provider.search({
        query,
        limit: this.options.searchLimit,
        includeDomains: this.catalog.allowedDomains
      });
    } catch (error) {
      this.logger.warn("search_failed", { provider: this.provider.name, query, error: errorMessage(error) });
      return [];
    }

    const allowed: string[] = [];
    for (const url of raw) {
      const canonical = canonicalUrl(url);
      if (canonical && isAllowedDomain(new URL(canonical).hostname, this.catalog.allowedDomains)) {
        allowed.push(canonical);
      }
    }
    const unique = dedupeUrls(allowed).slice(0, this.options.maxPages);
    this.logger.info("search_completed", {
      provider: this.provider.name,
      query,
      raw_results: raw.length,
      discovered_urls: unique.length
    });
    return unique;
  }
}
