import { load } from "cheerio";

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "-",
  mdash: "-",
  hellip: "..."
};

const MAX_CODE_POINT = 0x10ffff;

function fromCode(match: string, code: number): string {
  return Number.isFinite(code) && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
}

function decodeEntities(input: string): string {
  return input.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return fromCode(match, Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) {
      return fromCode(match, Number.parseInt(entity.slice(1), 10));
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/** Text that is already decoded (cheerio output, stored payloads): whitespace only. */
export function collapseWhitespace(text: string | null | undefined): string {
  if (!text) {
    return "";
  }
  return text.replace(/\s+/g, " ").trim();
}

/** Raw markup strings such as JSON-LD values: entities are decoded once, then whitespace collapsed. */
export function cleanText(text: string | null | undefined): string {
  if (!text) {
    return "";
  }
  return collapseWhitespace(decodeEntities(text));
}

/**
 * Whole-unit VND: every non-digit is dropped, so "12.990.000 ₫" and "12,990,000" both
 * read as 12990000. Decimal prices are not representable.
 */
export function extractPrice(text: string | null | undefined): number {
  if (!text) {
    return 0;
  }
  const digits = text.replace(/\D/g, "");
  if (!digits) {
    return 0;
  }
  const parsed = Number.parseFloat(digits);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Whole VND with dot thousands separators: 12990000 → "12.990.000". */
export function formatVnd(price: number): string {
  return `${Math.trunc(price)}`.replace(/\B(?=(\d{3})+(?!\d))/g, ".");
}

export function extractDomain(url: string): string {
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    hostname = url.replace(/^[a-z][a-z0-9+.-]*:\/\//i, "").split(/[/?#]/)[0] ?? "";
  }
  hostname = hostname.toLowerCase();
  return hostname.startsWith("www.") ? hostname.slice(4) : hostname;
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map((part) => part.slice(0, 1).toUpperCase() + part.slice(1))
    .join(" ");
}

// Order matters: the first alias that equals the input, or prefixes it followed by a space, wins.
const BRAND_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ["ip", "Apple"],
  ["iphone", "Apple"],
  ["apple", "Apple"],
  ["sam", "Samsung"],
  ["samsung", "Samsung"],
  ["ss", "Samsung"],
  ["xiaomi", "Xiaomi"],
  ["mi", "Xiaomi"],
  ["redmi", "Xiaomi"],
  ["poco", "Xiaomi"],
  ["oppo", "Oppo"],
  ["vivo", "Vivo"],
  ["realme", "Realme"],
  ["nokia", "Nokia"],
  ["itel", "Itel"],
  ["vsmart", "VinSmart"],
  ["lg", "LG"],
  ["sony", "Sony"],
  ["huawei", "Huawei"],
  ["honor", "Honor"],
  ["asus", "Asus"],
  ["oneplus", "OnePlus"],
  ["tecno", "Tecno"],
  ["mobell", "Mobell"],
  ["masstel", "Masstel"]
];

export function normalizeBrandName(brand: string | null | undefined): string {
  const trimmed = (brand ?? "").trim();
  if (!trimmed) {
    return "Unknown";
  }
  const lower = trimmed.toLowerCase();
  for (const [alias, canonical] of BRAND_ALIASES) {
    if (lower === alias || lower.startsWith(`${alias} `)) {
      return canonical;
    }
  }
  return titleCase(trimmed);
}

const TITLE_BRANDS = [
  "Apple",
  "iPhone",
  "Samsung",
  "Xiaomi",
  "Redmi",
  "Oppo",
  "Vivo",
  "Realme",
  "Nokia",
  "Huawei",
  "Honor",
  "OnePlus",
  "Sony",
  "LG",
  "Asus"
];

export function extractBrandFromTitle(title: string | null | undefined): string {
  const text = collapseWhitespace(title);
  if (!text) {
    return "Unknown";
  }
  for (const brand of TITLE_BRANDS) {
    if (new RegExp(`(^|[^a-z0-9])${brand}($|[^a-z0-9])`, "i").test(text)) {
      return normalizeBrandName(brand);
    }
  }
  // Retail titles usually start with a category word ("Điện thoại", "Smartphone").
  const words = text.replace(/^(điện thoại|dien thoai|smartphone|phone)\s+/i, "").split(" ");
  return normalizeBrandName(words[0]);
}

export function extractModelFromTitle(title: string | null | undefined, brand: string): string {
  const text = collapseWhitespace(title);
  if (!text) {
    return "";
  }
  const index = brand ? text.toLowerCase().indexOf(brand.toLowerCase()) : -1;
  const withoutBrand = index >= 0 ? `${text.slice(0, index)} ${text.slice(index + brand.length)}` : text;
  return withoutBrand
    .replace(/^(điện thoại|dien thoai)\s+/i, "")
    .replace(/^[\s-]+/, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function toAvailabilityBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value === 1 ? true : value === 0 ? false : undefined;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const text = value.trim().toLowerCase();
  if (!text) {
    return undefined;
  }
  if (
    ["instock", "in stock", "in_stock", "available", "true", "1", "còn hàng", "http://schema.org/instock", "https://schema.org/instock"].includes(
      text
    )
  ) {
    return true;
  }
  if (
    [
      "outofstock",
      "out of stock",
      "out_of_stock",
      "soldout",
      "sold out",
      "unavailable",
      "false",
      "0",
      "hết hàng",
      "http://schema.org/outofstock",
      "https://schema.org/outofstock"
    ].includes(text)
  ) {
    return false;
  }
  return undefined;
}

const NON_CONTENT_TAGS = "script, style, noscript, nav, header, footer, svg, iframe, template";
const BLOCK_TAGS = "p, div, li, tr, br, h1, h2, h3, h4, h5, h6, section, article, table, ul, ol, dd, dt";

/** Visible page text, one line per block element. */
export function htmlToText(html: string): string {
  const $ = load(html);
  $(NON_CONTENT_TAGS).remove();
  $(BLOCK_TAGS).each((_, element) => {
    $(element).append("\n");
  });
  const body = $("body");
  const raw = body.length > 0 ? body.text() : $.root().text();
  return raw
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}
