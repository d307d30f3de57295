import { Product, SortBy } from "../types";
import { normalizeBrandName } from "./text";

export interface ProductFilter {
  price_min?: number;
  price_max?: number;
  brands?: string[];
}

type Filterable = Pick<Product, "brand" | "min_price">;
type Sortable = Pick<Product, "name" | "min_price">;

/** In-process equivalent of the store filter: price bounds on min_price, brand set membership. */
export function filterProducts<T extends Filterable>(products: T[], filter: ProductFilter): T[] {
  const brands = filter.brands && filter.brands.length > 0 ? new Set(filter.brands.map(normalizeBrandName)) : null;
  return products.filter((product) => {
    if (filter.price_min !== undefined && product.min_price < filter.price_min) {
      return false;
    }
    if (filter.price_max !== undefined && product.min_price > filter.price_max) {
      return false;
    }
    if (brands && !brands.has(normalizeBrandName(product.brand))) {
      return false;
    }
    return true;
  });
}

/** Stable; `relevance` keeps the incoming rank order. */
export function sortProducts<T extends Sortable>(products: T[], sortBy: SortBy): T[] {
  const sorted = [...products];
  switch (sortBy) {
    case "price_asc":
      return sorted.sort((a, b) => a.min_price - b.min_price);
    case "price_desc":
      return sorted.sort((a, b) => b.min_price - a.min_price);
    case "name_asc":
      return sorted.sort((a, b) => a.name.localeCompare(b.name));
    case "name_desc":
      return sorted.sort((a, b) => b.name.localeCompare(a.name));
    case "relevance":
      return sorted;
  }
}

export interface PageRequest {
  page: number;
  limit: number;
}

export interface PageBounds {
  defaultLimit: number;
  maxLimit: number;
}

/** page <= 0 becomes 1; limit <= 0 takes the default; limit is capped at the maximum. */
export function resolvePage(request: PageRequest, bounds: PageBounds): PageRequest {
  const page = Number.isFinite(request.page) && request.page >= 1 ? Math.floor(request.page) : 1;
  const requested = Number.isFinite(request.limit) && request.limit >= 1 ? Math.floor(request.limit) : bounds.defaultLimit;
  return { page, limit: Math.min(requested, bounds.maxLimit) };
}

export function paginate<T>(items: T[], request: PageRequest): T[] {
  const start = (request.page - 1) * request.limit;
  return items.slice(start, start + request.limit);
}
