/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 * The server entry point owns listening and shutdown.
 */

import express, { type Express, type Request, type Response } from "express";
import type { AppContext } from "./context";
import { errorHandler, notFoundHandler, requestLogger } from "../middleware/errorHandler";
import { requireApiKey } from "../middleware/apiKey";

// Route registrars
import { registerProductRoutes } from "../routes/products";
import { registerPriceRoutes } from "../routes/prices";
import { registerStoreRoutes } from "../routes/stores";
import { registerBarcodeRoutes } from "../routes/barcodes";
import { registerDeviceRoutes } from "../routes/devices";

export function createApp(ctx: AppContext): Express {
  const { logger, storeRepo, productRepo } = ctx;
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(requestLogger(logger));
  app.use(express.json({ limit: "1mb" }));
  app.use(requireApiKey(ctx.config.apiKey));

  app.get("/", (_req: Request, res: Response) => {
    res.json({ message: "Shopping catalog API is running" });
  });

  app.get("/health", (_req: Request, res: Response) => {
    try {
      res.json({ status: "ok", database: "ok", stores: storeRepo.count(), products: productRepo.count() });
    } catch (error) {
      logger.error({ err: error }, "Health check database probe failed");
      res.status(503).json({ status: "degraded", database: "unavailable" });
    }
  });

  // /stores/search and /stores/products must be registered before /stores/:id
  registerStoreRoutes(app, ctx);
  registerProductRoutes(app, ctx);
  registerPriceRoutes(app, ctx);
  registerBarcodeRoutes(app, ctx);
  registerDeviceRoutes(app, ctx);

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
