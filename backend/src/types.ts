import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ensureScheme, isHttpUrl } from "./lib/url";
import { collapseWhitespace, extractPrice, normalizeBrandName, toAvailabilityBoolean } from "./lib/text";

export const SORT_OPTIONS = ["relevance", "price_asc", "price_desc", "name_asc", "name_desc"] as const;
export const SortBySchema = z.enum(SORT_OPTIONS);
export type SortBy = z.infer<typeof SortBySchema>;

/** Absent stays absent; anything else becomes a non-negative number, 0 when unreadable. */
export function toPrice(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.max(0, value) : 0;
  }
  if (typeof value === "string") {
    return extractPrice(value);
  }
  return 0;
}

function toOptionalText(value: unknown): string | undefined {
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const cleaned = collapseWhitespace(value);
  return cleaned.length > 0 ? cleaned : undefined;
}

function toTextList(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  const entries = Array.isArray(value) ? value : typeof value === "string" ? value.split(/[,;\n]/) : [value];
  const output: string[] = [];
  for (const entry of entries) {
    const text = toOptionalText(entry);
    if (text && !output.includes(text)) {
      output.push(text);
    }
  }
  return output;
}

function toUrl(value: unknown): unknown {
  return typeof value === "string" ? ensureScheme(value) : value;
}

/** Unparsable entries are dropped rather than failing the whole product. */
export function toImageUrls(value: unknown): string[] {
  const candidates = toTextList(value);
  const output: string[] = [];
  for (const candidate of candidates) {
    const url = ensureScheme(candidate);
    if (isHttpUrl(url) && !output.includes(url)) {
      output.push(url);
    }
  }
  return output;
}

function toTimestamp(value: unknown): unknown {
  if (value === undefined || value === null || value === "") {
    return new Date().toISOString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? value : value.toISOString();
  }
  if (typeof value === "number") {
    return new Date(value).toISOString();
  }
  if (typeof value === "string") {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
  }
  return value;
}

const priceField = z.preprocess(toPrice, z.number().nonnegative());
const optionalPriceField = z.preprocess(toPrice, z.number().nonnegative().default(0));
const optionalText = z.preprocess(toOptionalText, z.string().optional());
const textList = z.preprocess(toTextList, z.array(z.string()));

export const ProductSourceSchema = z.object({
  name: z.preprocess(toOptionalText, z.string({ required_error: "source name is required" })),
  url: z.preprocess(toUrl, z.string().url()),
  price: priceField,
  price_currency: z.preprocess(
    (value) => toOptionalText(value)?.toUpperCase(),
    z.string().default("VND")
  ),
  in_stock: z.preprocess((value) => toAvailabilityBoolean(value), z.boolean().default(true)),
  last_updated: z.preprocess(toTimestamp, z.string().datetime({ offset: true })),
  logo_url: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? ensureScheme(value) : undefined),
    z.string().url().optional()
  )
});

export type ProductSource = z.infer<typeof ProductSourceSchema>;

export const SPECIFICATION_FIELDS = [
  "cpu",
  "ram",
  "storage",
  "display",
  "camera",
  "battery",
  "os",
  "dimensions",
  "weight"
] as const;
export type SpecificationField = (typeof SPECIFICATION_FIELDS)[number];

const SPECIFICATION_LIST_FIELDS = ["color", "connectivity"] as const;

function foldUnknownSpecKeys(value: unknown): unknown {
  if (value === undefined || value === null) {
    return {};
  }
  if (typeof value !== "object" || Array.isArray(value)) {
    return value;
  }
  const known = new Set<string>([...SPECIFICATION_FIELDS, ...SPECIFICATION_LIST_FIELDS, "additional_specs"]);
  const output: Record<string, unknown> = {};
  const additional: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    if (key === "additional_specs" && nested && typeof nested === "object" && !Array.isArray(nested)) {
      Object.assign(additional, nested);
    } else if (known.has(key)) {
      output[key] = nested;
    } else {
      additional[key] = nested;
    }
  }
  output.additional_specs = additional;
  return output;
}

function toAdditionalSpecs(value: unknown): Record<string, string> {
  const output: Record<string, string> = {};
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return output;
  }
  for (const [key, nested] of Object.entries(value)) {
    const text = Array.isArray(nested) ? toTextList(nested).join(", ") : toOptionalText(nested);
    if (text) {
      output[key] = text;
    }
  }
  return output;
}

export const ProductSpecificationSchema = z.preprocess(
  foldUnknownSpecKeys,
  z.object({
    cpu: optionalText,
    ram: optionalText,
    storage: optionalText,
    display: optionalText,
    camera: optionalText,
    battery: optionalText,
    os: optionalText,
    dimensions: optionalText,
    weight: optionalText,
    color: textList,
    connectivity: textList,
    additional_specs: z.preprocess(toAdditionalSpecs, z.record(z.string()))
  })
);

export type ProductSpecification = z.infer<typeof ProductSpecificationSchema>;

export const ProductSchema = z.object({
  id: z.preprocess((value) => toOptionalText(value) ?? randomUUID(), z.string().min(1)),
  name: z.preprocess(toOptionalText, z.string({ required_error: "product name is required" })),
  brand: z.preprocess((value) => normalizeBrandName(typeof value === "string" ? value : undefined), z.string()),
  model: z.preprocess((value) => toOptionalText(value) ?? "", z.string()),
  description: optionalText,
  image_url: z.preprocess(toImageUrls, z.array(z.string().url())),
  category: z.preprocess((value) => toOptionalText(value) ?? "smartphone", z.string()),
  specifications: ProductSpecificationSchema,
  sources: z.preprocess(
    (value) => (value === undefined || value === null ? [] : value),
    z.array(ProductSourceSchema).min(1, "a product needs at least one source")
  ),
  average_price: optionalPriceField,
  min_price: optionalPriceField,
  max_price: optionalPriceField
});

export type Product = z.infer<typeof ProductSchema>;

/** Loose shape accepted before validation: extractors and payloads hand over whatever they found. */
export type ProductCandidate = Record<string, unknown>;

export interface ProductListRequest {
  query: string;
  price_min?: number;
  price_max?: number;
  brands?: string[];
  sort_by: SortBy;
  page: number;
  limit: number;
}

export const ProductListRequestSchema = z.object({
  query: z.string().trim().min(1),
  price_min: z.coerce.number().nonnegative().optional(),
  price_max: z.coerce.number().nonnegative().optional(),
  brands: z
    .preprocess((value) => (typeof value === "string" ? value.split(",") : value), z.array(z.string().trim().min(1)))
    .optional(),
  sort_by: SortBySchema.default("relevance"),
  page: z.coerce.number().int().default(1),
  limit: z.coerce.number().int().default(0)
});

export const ProductComparisonRequestSchema = z.object({
  product_ids: z.array(z.string().trim().min(1))
});

export type ProductComparisonRequest = z.infer<typeof ProductComparisonRequestSchema>;

export const REFLECTION_ACTIONS = [
  "rag_query",
  "crawl",
  "product_list",
  "product_detail",
  "product_comparison",
  "answer"
] as const;
export type ReflectionAction = (typeof REFLECTION_ACTIONS)[number];

/**
 * Per-request routing decision. `additional_info` carries action-specific parameters
 * (price bounds, brands, product ids or names) and is read through the helpers in
 * services/reflection.
 */
export interface ReflectionResult {
  action: ReflectionAction;
  query: string;
  confidence: number;
  additional_info: Record<string, unknown>;
}

export type MessageRole = "user" | "system" | "assistant";
export type MessageType = "text" | "product_list" | "product_detail" | "product_comparison";

export interface ChatMessage {
  role: MessageRole;
  content: string;
  type: MessageType;
  timestamp: string;
  metadata?: ChatData;
}

export interface ChatData {
  products?: Product[];
  product?: Product;
}

export interface ChatSession {
  id: string;
  messages: ChatMessage[];
  created_at: string;
  updated_at: string;
}

export const ChatRequestSchema = z.object({
  session_id: z.string().trim().min(1).optional(),
  message: z.string().trim().min(1, "message must not be empty")
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface ChatResponse {
  session_id: string;
  response: ChatMessage;
  data: ChatData;
}
