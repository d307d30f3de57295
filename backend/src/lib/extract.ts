import { Cheerio, CheerioAPI, load } from "cheerio";
import type { AnyNode } from "domhandler";
import { ProductCandidate } from "../types";
import { DetailSelectors, ListingSelectors } from "./catalogs";
import { mapSpecifications, toSpecificationCandidate } from "./specs";
import { cleanText, collapseWhitespace, extractBrandFromTitle, extractModelFromTitle, extractPrice } from "./text";
import { resolveUrl } from "./url";

export interface PageContext {
  url: string;
  sourceName: string;
  now: string;
}

function asArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function asObject(value: unknown): Record<string, unknown> | null {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : null;
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  if (typeof value === "number") {
    return String(value);
  }

  return undefined;
}

function typeMatches(node: Record<string, unknown>, expected: string): boolean {
  return asArray(node["@type"]).some((value) => asText(value)?.toLowerCase() === expected);
}

// Lazy-loading themes keep the real image in a data attribute and a placeholder in src.
function imageSource(image: Cheerio<AnyNode>): string | undefined {
  for (const attribute of ["data-src", "data-original", "data-lazy-src", "src"]) {
    const value = image.attr(attribute)?.trim();
    if (value && !value.startsWith("data:")) {
      return value;
    }
  }
  return undefined;
}

function baseCandidate(name: string, brandHint: string | undefined): ProductCandidate {
  const brand = extractBrandFromTitle(brandHint || name);
  return {
    name,
    brand,
    model: extractModelFromTitle(name, brand) || name,
    category: "smartphone"
  };
}

function selectorSource(context: PageContext, url: string, price: number): Record<string, unknown> {
  return {
    name: context.sourceName,
    url,
    price,
    price_currency: "VND",
    in_stock: true,
    last_updated: context.now
  };
}

export function extractListingCandidates(html: string, selectors: ListingSelectors, context: PageContext): ProductCandidate[] {
  const $ = load(html);
  const candidates: ProductCandidate[] = [];

  $(selectors.item).each((_, element) => {
    const item = $(element);
    const name = collapseWhitespace(item.find(selectors.name).first().text());
    if (!name) {
      return;
    }

    const price = extractPrice(item.find(selectors.price).first().text());
    const imageElement = item.find(selectors.image).first();
    const image = imageElement.length > 0 ? resolveUrl(imageSource(imageElement), context.url) : null;
    const linkElement = item.is("a") ? item : item.find(selectors.link).first();
    const link = resolveUrl(linkElement.attr("href"), context.url);

    candidates.push({
      ...baseCandidate(name, undefined),
      image_url: image ? [image] : [],
      sources: [selectorSource(context, link ?? context.url, price)]
    });
  });

  return candidates;
}

/** Label/value pairs from a spec table, a list of "label: value" items, or paired name/value nodes. */
export function parseSpecificationPairs($: CheerioAPI, container: Cheerio<AnyNode>): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];

  const rows = container.is("table") ? container.find("tr") : container.find("table tr");
  rows.each((_, row) => {
    const cells = $(row).find("td, th");
    if (cells.length >= 2) {
      pairs.push([cells.eq(0).text(), cells.eq(1).text()]);
    }
  });
  if (pairs.length > 0) {
    return pairs;
  }

  container.find("li").each((_, item) => {
    const text = collapseWhitespace($(item).text());
    const separator = text.indexOf(":");
    if (separator > 0) {
      pairs.push([text.slice(0, separator), text.slice(separator + 1)]);
    }
  });
  if (pairs.length > 0) {
    return pairs;
  }

  const keys = container.find(".param-name, .spec-name, .spec-key");
  const values = container.find(".param-value, .spec-value, .spec-val");
  if (keys.length > 0 && keys.length === values.length) {
    keys.each((index, key) => {
      pairs.push([$(key).text(), values.eq(index).text()]);
    });
  }
  return pairs;
}

function metaContent($: CheerioAPI, selector: string): string | undefined {
  return asText($(selector).first().attr("content"));
}

export function extractDetailCandidate(html: string, selectors: DetailSelectors, context: PageContext): ProductCandidate | null {
  const $ = load(html);

  const name =
    collapseWhitespace($(selectors.name).first().text()) ||
    collapseWhitespace(metaContent($, "meta[property='og:title']")) ||
    collapseWhitespace($("h1").first().text());
  if (!name) {
    return null;
  }

  const priceText =
    collapseWhitespace($(selectors.price).first().text()) ||
    metaContent($, "meta[property='product:price:amount']") ||
    metaContent($, "[itemprop='price']");
  const price = extractPrice(priceText);

  const images: string[] = [];
  $(selectors.images).each((_, element) => {
    const resolved = resolveUrl(imageSource($(element)), context.url);
    if (resolved && !images.includes(resolved)) {
      images.push(resolved);
    }
  });
  if (images.length === 0) {
    const ogImage = resolveUrl(metaContent($, "meta[property='og:image']"), context.url);
    if (ogImage) {
      images.push(ogImage);
    }
  }

  const description =
    collapseWhitespace($(selectors.description).first().text()) ||
    collapseWhitespace(metaContent($, "meta[name='description']"));

  const brandElement = $(selectors.brand).first();
  const brandHint = collapseWhitespace(brandElement.attr("content") ?? brandElement.text()) || undefined;

  const specsContainer = $(selectors.specifications).first();
  const pairs = specsContainer.length > 0 ? parseSpecificationPairs($, specsContainer) : [];

  return {
    ...baseCandidate(name, brandHint),
    description: description || undefined,
    image_url: images,
    specifications: toSpecificationCandidate(mapSpecifications(pairs)),
    sources: [selectorSource(context, context.url, price)]
  };
}

function offerSources(offers: unknown, productUrl: string, context: PageContext): Array<Record<string, unknown>> {
  const sources: Array<Record<string, unknown>> = [];

  const visit = (offerNode: unknown): void => {
    const offer = asObject(offerNode);
    if (!offer) {
      return;
    }
    if (typeMatches(offer, "aggregateoffer") && offer.offers !== undefined) {
      for (const nested of asArray(offer.offers)) {
        visit(nested);
      }
      return;
    }
    const price = asText(offer.price) ?? asText(offer.lowPrice);
    if (price === undefined) {
      return;
    }
    sources.push({
      name: context.sourceName,
      url: resolveUrl(asText(offer.url), context.url) ?? productUrl,
      price,
      price_currency: asText(offer.priceCurrency) ?? "VND",
      in_stock: asText(offer.availability),
      last_updated: context.now
    });
  };

  for (const offer of asArray(offers)) {
    visit(offer);
  }
  return sources;
}

function candidateFromJsonLd(node: Record<string, unknown>, context: PageContext): ProductCandidate | null {
  const name = cleanText(asText(node.name));
  if (!name) {
    return null;
  }
  const productUrl = resolveUrl(asText(node.url), context.url) ?? context.url;
  const brandNode = asObject(node.brand);
  const images = asArray(node.image)
    .map((image) => resolveUrl(asText(image) ?? asText(asObject(image)?.url), context.url))
    .filter((image): image is string => image !== null);

  const pairs: Array<[string, string]> = [];
  for (const property of asArray(node.additionalProperty)) {
    const entry = asObject(property);
    const key = cleanText(asText(entry?.name));
    const value = cleanText(asText(entry?.value));
    if (key && value) {
      pairs.push([key, value]);
    }
  }
  const specs = mapSpecifications(pairs);
  const color = cleanText(asText(node.color));
  if (color && !specs.color.includes(color)) {
    specs.color.push(color);
  }

  return {
    ...baseCandidate(name, asText(brandNode?.name) ?? asText(node.brand)),
    description: cleanText(asText(node.description)) || undefined,
    image_url: images,
    specifications: toSpecificationCandidate(specs),
    sources: offerSources(node.offers, productUrl, context)
  };
}

function collectJsonLdProducts(value: unknown, context: PageContext, collector: ProductCandidate[]): void {
  if (Array.isArray(value)) {
    for (const entry of value) {
      collectJsonLdProducts(entry, context, collector);
    }
    return;
  }

  const node = asObject(value);
  if (!node) {
    return;
  }

  if (Array.isArray(node["@graph"])) {
    for (const graphNode of node["@graph"]) {
      collectJsonLdProducts(graphNode, context, collector);
    }
  }

  if (typeMatches(node, "product")) {
    const mapped = candidateFromJsonLd(node, context);
    if (mapped) {
      collector.push(mapped);
    }
    return;
  }

  if (typeMatches(node, "itemlist")) {
    for (const item of asArray(node.itemListElement)) {
      const itemNode = asObject(item);
      if (itemNode) {
        collectJsonLdProducts(itemNode.item ?? itemNode, context, collector);
      }
    }
  }
}

export function extractJsonLdCandidates(html: string, context: PageContext): ProductCandidate[] {
  const $ = load(html);
  const candidates: ProductCandidate[] = [];

  $("script[type='application/ld+json']").each((_, element) => {
    const rawJson = $(element).contents().text().trim();
    if (!rawJson) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawJson);
    } catch {
      return;
    }
    collectJsonLdProducts(parsed, context, candidates);
  });

  return candidates;
}
