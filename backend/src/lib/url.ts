const TRACKING_PARAM = /^(utm_\w+|fbclid|gclid|srsltid)$/i;

/** Absolute http(s) form used to compare links: no fragment, no tracking params, no trailing slash. */
export function canonicalUrl(input: string, base?: string): string | null {
  let url: URL;
  try {
    url = new URL(input, base);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }

  url.hash = "";
  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PARAM.test(key)) {
      url.searchParams.delete(key);
    }
  }
  if (url.pathname.length > 1) {
    url.pathname = url.pathname.replace(/\/+$/, "");
  }
  return url.toString();
}

/** "//cdn.x/a.jpg" gets "https:", a bare host gets "https://", anything with a scheme is left alone. */
export function ensureScheme(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed.startsWith("//")) {
    return `https:${trimmed}`;
  }
  if (/^[a-z][a-z0-9+.-]*:/i.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

export function resolveUrl(href: string | undefined | null, base: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith("javascript:") || trimmed.startsWith("mailto:") || trimmed.startsWith("tel:")) {
    return null;
  }
  return canonicalUrl(trimmed.startsWith("//") ? `https:${trimmed}` : trimmed, base);
}

export function isHttpUrl(input: string): boolean {
  try {
    const parsed = new URL(input);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

/** First occurrence wins; URLs are compared in canonical form. */
export function dedupeUrls(urls: Iterable<string>): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const url of urls) {
    const key = canonicalUrl(url) ?? url;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(url);
  }
  return output;
}

/** Exact host match or a subdomain of an allowed host; "www." is ignored on both sides. */
export function isAllowedDomain(hostname: string, allowed: readonly string[]): boolean {
  const host = hostname.toLowerCase().replace(/^www\./, "");
  if (!host) {
    return false;
  }
  return allowed.some((entry) => {
    const domain = entry.toLowerCase().replace(/^www\./, "");
    return host === domain || host.endsWith(`.${domain}`);
  });
}
