import { readFileSync } from "node:fs";
import { z } from "zod";
import bundledRetailers from "../data/retailers.json";
import bundledSelectors from "../data/selectors.json";
import { extractDomain, titleCase } from "./text";

const ListingSelectorsSchema = z.object({
  item: z.string().min(1),
  name: z.string().min(1),
  price: z.string().min(1),
  image: z.string().min(1),
  link: z.string().min(1)
});

const DetailSelectorsSchema = z.object({
  name: z.string().min(1),
  price: z.string().min(1),
  images: z.string().min(1),
  description: z.string().min(1),
  specifications: z.string().min(1),
  brand: z.string().min(1)
});

export const SelectorCatalogSchema = z.object({
  listing: z.object({ default: ListingSelectorsSchema, domains: z.record(ListingSelectorsSchema).default({}) }),
  detail: z.object({ default: DetailSelectorsSchema, domains: z.record(DetailSelectorsSchema).default({}) })
});

export const RetailerCatalogSchema = z.object({
  allowedDomains: z.array(z.string().min(1)).min(1),
  displayNames: z.record(z.string()).default({}),
  fallback: z.object({
    categoryUrls: z.array(z.string().url()).min(1),
    searchUrlTemplates: z.array(z.string().includes("{query}")).default([]),
    brands: z
      .array(
        z.object({
          brand: z.string().min(1),
          keywords: z.array(z.string().min(1)).min(1),
          urls: z.array(z.string().url()).min(1)
        })
      )
      .default([])
  })
});

export type ListingSelectors = z.infer<typeof ListingSelectorsSchema>;
export type DetailSelectors = z.infer<typeof DetailSelectorsSchema>;
export type SelectorCatalog = z.infer<typeof SelectorCatalogSchema>;
export type RetailerCatalog = z.infer<typeof RetailerCatalogSchema>;

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf8"));
}

export function loadSelectorCatalog(path?: string): SelectorCatalog {
  return SelectorCatalogSchema.parse(path ? readJson(path) : bundledSelectors);
}

export function loadRetailerCatalog(path?: string): RetailerCatalog {
  return RetailerCatalogSchema.parse(path ? readJson(path) : bundledRetailers);
}

/** Longest matching domain suffix wins, so "m.fptshop.com.vn" resolves to "fptshop.com.vn". */
function lookupByDomain<T>(domains: Record<string, T>, fallback: T, domain: string): T {
  const host = domain.toLowerCase();
  let best: { key: string; value: T } | null = null;
  for (const [key, value] of Object.entries(domains)) {
    const suffix = key.toLowerCase();
    if ((host === suffix || host.endsWith(`.${suffix}`)) && (!best || suffix.length > best.key.length)) {
      best = { key: suffix, value };
    }
  }
  return best ? best.value : fallback;
}

export function listingSelectorsFor(catalog: SelectorCatalog, domain: string): ListingSelectors {
  return lookupByDomain(catalog.listing.domains, catalog.listing.default, domain);
}

export function detailSelectorsFor(catalog: SelectorCatalog, domain: string): DetailSelectors {
  return lookupByDomain(catalog.detail.domains, catalog.detail.default, domain);
}

export function sourceNameForUrl(catalog: RetailerCatalog, url: string): string {
  const domain = extractDomain(url);
  const name = lookupByDomain<string | undefined>(catalog.displayNames, undefined, domain);
  if (name) {
    return name;
  }
  return titleCase(domain.split(".")[0] ?? domain) || "Unknown";
}
