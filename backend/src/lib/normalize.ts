import { randomUUID } from "node:crypto";
import { z } from "zod";
import { Product, ProductCandidate, ProductSchema, toPrice } from "../types";
import { collapseWhitespace, normalizeBrandName } from "./text";

export interface ValidationIssue {
  field: string;
  message: string;
}

export class ProductValidationError extends Error {
  constructor(readonly issues: ValidationIssue[]) {
    super(`Invalid product: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ")}`);
    this.name = "ProductValidationError";
  }
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message
  }));
}

/** Min, max and mean over source prices. An empty source list leaves the product untouched. */
export function calculatePrices<T extends Pick<Product, "sources" | "min_price" | "max_price" | "average_price">>(product: T): T {
  if (product.sources.length === 0) {
    return product;
  }
  const prices = product.sources.map((source) => source.price);
  const total = prices.reduce((sum, price) => sum + price, 0);
  return {
    ...product,
    min_price: Math.min(...prices),
    max_price: Math.max(...prices),
    average_price: total / prices.length
  };
}

export function validateProduct(candidate: unknown): Product {
  const parsed = ProductSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ProductValidationError(toIssues(parsed.error));
  }
  return calculatePrices(parsed.data);
}

export function tryValidateProduct(candidate: unknown): { product?: Product; issues?: ValidationIssue[] } {
  try {
    return { product: validateProduct(candidate) };
  } catch (error) {
    if (error instanceof ProductValidationError) {
      return { issues: error.issues };
    }
    throw error;
  }
}

function readString(record: ProductCandidate, key: string): string {
  const value = record[key];
  return typeof value === "string" || typeof value === "number" ? collapseWhitespace(String(value)) : "";
}

/**
 * Lossy read-path degrade for stored payloads that no longer validate: identity and prices
 * only, with empty sources, so it deliberately skips the validator.
 */
export function toFallbackProduct(record: ProductCandidate): Product {
  const price = (key: string) => toPrice(record[key]) ?? 0;
  return {
    id: readString(record, "id") || randomUUID(),
    name: readString(record, "name") || "Unknown product",
    brand: normalizeBrandName(readString(record, "brand")),
    model: readString(record, "model"),
    image_url: [],
    category: readString(record, "category") || "smartphone",
    specifications: { color: [], connectivity: [], additional_specs: {} },
    sources: [],
    average_price: price("average_price"),
    min_price: price("min_price"),
    max_price: price("max_price")
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
