import { errorMessage, Logger } from "./logger";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  fetchImpl: FetchLike = fetch
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.3 Safari/605.1.15",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:123.0) Gecko/20100101 Firefox/123.0",
  "Mozilla/5.0 (iPhone; CPU iPhone OS 17_3 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.3 Mobile/15E148 Safari/604.1"
];

export function randomUserAgent(random: () => number = Math.random): string {
  const index = Math.min(USER_AGENTS.length - 1, Math.floor(random() * USER_AGENTS.length));
  return USER_AGENTS[index] ?? USER_AGENTS[0] ?? "Mozilla/5.0";
}

export function browserHeaders(userAgent: string, referer?: string): Record<string, string> {
  return {
    "user-agent": userAgent,
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
    "accept-language": "vi-VN,vi;q=0.9,en-US;q=0.8,en;q=0.7",
    "cache-control": "no-cache",
    pragma: "no-cache",
    "upgrade-insecure-requests": "1",
    ...(referer ? { referer } : {})
  };
}

interface CrawlResultEntry {
  url?: unknown;
  html?: unknown;
}

function readEntry(value: unknown): CrawlResultEntry | undefined {
  if (!value || typeof value !== "object") {
    return undefined;
  }
  return {
    url: "url" in value ? value.url : undefined,
    html: "html" in value ? value.html : undefined
  };
}

/** The crawl backend answers either `{results: {[url]: {html}}}` or `{results: [{url, html}]}`. */
export function htmlFromCrawlResponse(payload: unknown, url: string): string | null {
  if (!payload || typeof payload !== "object" || !("results" in payload)) {
    return null;
  }
  const results: unknown = payload.results;
  let entry: CrawlResultEntry | undefined;

  if (Array.isArray(results)) {
    const entries = results.map(readEntry).filter((item): item is CrawlResultEntry => item !== undefined);
    entry = entries.find((item) => item.url === url) ?? entries[0];
  } else if (results && typeof results === "object") {
    entry = readEntry(Object.entries(results).find(([key]) => key === url)?.[1]);
  }

  const html = entry?.html;
  return typeof html === "string" && html.trim().length > 0 ? html : null;
}

function refererFor(url: string): string {
  try {
    return `${new URL(url).origin}/`;
  } catch {
    return "https://www.google.com/";
  }
}

export interface HtmlFetcherConfig {
  crawlBackendUrl: string;
  crawlBackendEnabled: boolean;
  timeoutMs: number;
}

export interface HtmlSource {
  fetchHtml(url: string): Promise<string | null>;
}

/** Crawl backend first, then a direct GET; null when both fail. */
export class HtmlFetcher implements HtmlSource {
  constructor(
    private readonly config: HtmlFetcherConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly random: () => number = Math.random
  ) {}

  async fetchHtml(url: string): Promise<string | null> {
    if (this.config.crawlBackendEnabled) {
      try {
        const html = await this.viaCrawlBackend(url);
        if (html) {
          return html;
        }
      } catch (error) {
        this.logger.warn("crawl_backend_failed", { url, error: errorMessage(error) });
      }
    }

    try {
      return await this.direct(url);
    } catch (error) {
      this.logger.warn("direct_fetch_failed", { url, error: errorMessage(error) });
      return null;
    }
  }

  private async viaCrawlBackend(url: string): Promise<string | null> {
    const userAgent = randomUserAgent(this.random);
    const endpoint = `${this.config.crawlBackendUrl.replace(/\/+$/, "")}/crawl`;
    const response = await fetchWithTimeout(
      endpoint,
      {
        method: "POST",
        headers: { "content-type": "application/json", accept: "application/json" },
        body: JSON.stringify({
          urls: [url],
          depth: 0,
          respect_robots_txt: true,
          user_agent: userAgent,
          headers: browserHeaders(userAgent),
          extract_html: true,
          extract: {}
        })
      },
      this.config.timeoutMs,
      this.fetchImpl
    );

    if (!response.ok) {
      this.logger.warn("crawl_backend_http_error", { url, status: response.status });
      return null;
    }
    const body: unknown = await response.json();
    const html = htmlFromCrawlResponse(body, url);
    if (!html) {
      this.logger.warn("crawl_backend_empty", { url });
    }
    return html;
  }

  private async direct(url: string): Promise<string | null> {
    const response = await fetchWithTimeout(
      url,
      { method: "GET", redirect: "follow", headers: browserHeaders(randomUserAgent(this.random), refererFor(url)) },
      this.config.timeoutMs,
      this.fetchImpl
    );
    if (!response.ok) {
      this.logger.warn("direct_fetch_http_error", { url, status: response.status });
      return null;
    }
    const html = await response.text();
    return html.trim().length > 0 ? html : null;
  }
}
