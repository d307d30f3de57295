import { Router } from "express";
import { Logger } from "../lib/logger";
import { MIN_COMPARISON_PRODUCTS, ProductCatalogService } from "../services/catalog";
import { ProductComparisonRequestSchema, ProductListRequestSchema } from "../types";

export function createProductRouter(catalog: ProductCatalogService, logger: Logger): Router {
  const router = Router();

  router.get("/", async (request, response, next) => {
    const parsed = ProductListRequestSchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("product_list_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const products = await catalog.listProducts(parsed.data);
      logger.info("products_listed", { query: parsed.data.query, returned: products.length });
      response.json(products);
    } catch (error) {
      next(error);
    }
  });

  router.post("/compare", async (request, response, next) => {
    const parsed = ProductComparisonRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      logger.warn("comparison_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }
    if (parsed.data.product_ids.length < MIN_COMPARISON_PRODUCTS) {
      response.status(400).json({ error: "Cần ít nhất 2 sản phẩm để so sánh" });
      return;
    }

    try {
      const products = await catalog.compareProducts(parsed.data.product_ids);
      if (products.length < MIN_COMPARISON_PRODUCTS) {
        response.status(404).json({ error: "Không đủ sản phẩm để so sánh" });
        return;
      }
      response.json(products);
    } catch (error) {
      next(error);
    }
  });

  router.get("/:productId", async (request, response, next) => {
    const { productId } = request.params;
    try {
      const product = await catalog.getProductDetail(productId);
      if (!product) {
        logger.warn("product_not_found", { product_id: productId });
        response.status(404).json({ error: `Không tìm thấy sản phẩm với ID: ${productId}` });
        return;
      }
      response.json(product);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
