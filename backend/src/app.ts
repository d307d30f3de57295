import express, { Express, NextFunction, Request, Response } from "express";
import { errorMessage, Logger } from "./lib/logger";
import { createChatRouter } from "./routes/chatRoutes";
import { createProductRouter } from "./routes/productRoutes";
import { ChatOrchestrator } from "./services/chat";
import { ProductCatalogService } from "./services/catalog";

export interface AppDependencies {
  name: string;
  version: string;
  catalog: ProductCatalogService;
  chat: ChatOrchestrator;
  logger: Logger;
}

export function createApp({ name, version, catalog, chat, logger }: AppDependencies): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.use((request: Request, response: Response, next: NextFunction) => {
    const started = Date.now();
    response.on("finish", () => {
      logger.info("http_request", {
        method: request.method,
        path: request.path,
        status_code: response.statusCode,
        duration_ms: Date.now() - started
      });
    });
    next();
  });

  app.get("/", (_request, response) => {
    response.json({ name, version, status: "running" });
  });

  app.get("/health", (_request, response) => {
    response.json({ status: "healthy" });
  });

  app.use("/api/products", createProductRouter(catalog, logger.child("products")));
  app.use("/api/chat", createChatRouter(chat, logger.child("chat")));

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    // body-parser marks malformed JSON with a 4xx status.
    const status =
      typeof error === "object" && error !== null && "status" in error && typeof error.status === "number" ? error.status : 500;
    if (status >= 500) {
      logger.error("unhandled_error", { status_code: status, error: errorMessage(error) });
    } else {
      logger.warn("request_rejected", { status_code: status, error: errorMessage(error) });
    }
    response.status(status).json({ error: error instanceof Error ? error.message : "internal server error" });
  });

  return app;
}
