/**
 * Product price routes: per-store price listing and submission.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import type { Price, PriceWithStore } from "../domain/catalog";
import { asyncHandler } from "../middleware/errorHandler";
import { serializeStore } from "./stores";

export const PRICE_SAVED = "Price saved";

export const serializePrice = (price: Price) => ({
  id: price.id,
  product_id: price.productId,
  store_id: price.storeId,
  price: price.amount,
  currency: price.currency,
  created_at: new Date(price.createdAt).toISOString(),
  last_updated: new Date(price.updatedAt).toISOString(),
});

const serializePriceWithStore = (price: PriceWithStore) => ({
  ...serializePrice(price),
  store: serializeStore(price.store),
});

export function registerPriceRoutes(app: Express, ctx: AppContext): void {
  const { priceLedger, productIntake, logger } = ctx;
  const log = logger.child({ module: "price-routes" });

  /**
   * GET /products/:id/prices
   * Prices at visible stores, cheapest first.
   */
  app.get(
    "/products/:id/prices",
    asyncHandler(async (req: Request, res: Response) => {
      const prices = priceLedger.listPricesForProduct(req.params.id);
      res.json({ prices: prices.map(serializePriceWithStore) });
    }),
  );

  app.get(
    "/products/:id/prices/lowest",
    asyncHandler(async (req: Request, res: Response) => {
      const lowest = priceLedger.lowestPriceForProduct(req.params.id);
      res.json(serializePriceWithStore(lowest));
    }),
  );

  /**
   * POST /products/:id/prices
   * Body: { place_id, store|name, address?, latitude?, longitude?, price, currency? }
   */
  app.post(
    "/products/:id/prices",
    asyncHandler(async (req: Request, res: Response) => {
      const result = productIntake.submitPrice(req.params.id, req.body);
      log.debug({ productId: req.params.id, storeCreated: result.storeCreated }, "price.submitted");

      res.status(201).json({
        message: PRICE_SAVED,
        price_id: result.price.id,
        store_id: result.store.id,
        estimated_price: result.estimatedPrice,
      });
    }),
  );
}
