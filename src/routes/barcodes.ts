/**
 * Barcode Routes
 *
 * Crowd-sourced barcode → product links. A lookup returns the linked product
 * with its visible store prices.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { NotFoundError, ValidationError } from "../domain/errors";
import { asyncHandler } from "../middleware/errorHandler";
import { BarcodeLinkSchema, asRecord, firstIssueMessage } from "../schemas/catalog";
import { serializeProduct } from "./products";

const BARCODE_PATTERN = /^[0-9A-Za-z-]{4,64}$/;

const validBarcode = (value: string): string => {
  const barcode = value.trim();
  if (!BARCODE_PATTERN.test(barcode)) {
    throw new ValidationError("Invalid barcode");
  }
  return barcode;
};

export function registerBarcodeRoutes(app: Express, ctx: AppContext): void {
  const { barcodeRepo, productCatalog, priceLedger, logger } = ctx;
  const log = logger.child({ module: "barcode-routes" });

  app.get(
    "/barcodes/:barcode",
    asyncHandler(async (req: Request, res: Response) => {
      const barcode = validBarcode(req.params.barcode);
      const link = barcodeRepo.find(barcode);
      const product = link ? ctx.productRepo.findById(link.productId) : undefined;
      if (!product) {
        res.status(404).json({ found: false });
        return;
      }

      const prices = priceLedger.listPricesForProduct(product.id);
      res.json({
        found: true,
        product: {
          ...serializeProduct(product),
          prices: prices.map((price) => ({
            store_id: price.storeId,
            store: price.store.name,
            price: price.amount,
            currency: price.currency,
          })),
        },
      });
    }),
  );

  app.post(
    "/barcodes/:barcode",
    asyncHandler(async (req: Request, res: Response) => {
      const barcode = validBarcode(req.params.barcode);
      const body = BarcodeLinkSchema.safeParse(asRecord(req.body));
      if (!body.success) {
        throw new ValidationError(firstIssueMessage(body.error));
      }

      const product = productCatalog.getProduct(body.data.product_id);
      barcodeRepo.link(barcode, product.id, "user_scan");
      log.info({ barcode, productId: product.id }, "barcode.linked");

      res.status(201).json({ message: "Barcode linked", barcode, product_id: product.id });
    }),
  );

  app.delete(
    "/barcodes/:barcode",
    asyncHandler(async (req: Request, res: Response) => {
      const barcode = validBarcode(req.params.barcode);
      if (!barcodeRepo.unlink(barcode)) {
        throw new NotFoundError("Barcode mapping not found", { barcode });
      }
      log.info({ barcode }, "barcode.unlinked");
      res.json({ message: "Barcode unlinked", barcode });
    }),
  );
}
