/**
 * Products Router
 *
 * Product creation (store + product + price in one request), catalog reads,
 * and category listing.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import type { Product } from "../domain/catalog";
import { ValidationError } from "../domain/errors";
import { asyncHandler } from "../middleware/errorHandler";
import { ProductListQuerySchema, firstIssueMessage } from "../schemas/catalog";

export const PRODUCT_CREATED = "Product created successfully";
export const PRODUCT_UPDATED = "Product updated successfully";

export const serializeProduct = (product: Product) => ({
  id: product.id,
  name: product.name,
  description: product.description,
  brand: product.brand,
  category: product.category,
  match_key: product.matchKey,
  estimated_price: product.estimatedPrice,
  created_at: new Date(product.createdAt).toISOString(),
  updated_at: new Date(product.updatedAt).toISOString(),
});

export function registerProductRoutes(app: Express, ctx: AppContext): void {
  const { productCatalog, productIntake, priceRepo } = ctx;

  /**
   * POST /products
   *
   * Body: { product_data: { name, ... }, store_info: { place_id, store|name, ... }, price, currency? }
   * 201 when the product is new, 200 when an existing product got a price.
   */
  app.post(
    "/products",
    asyncHandler(async (req: Request, res: Response) => {
      const outcome = productIntake.createProduct(req.body);
      if (outcome.state === "Failed") {
        throw outcome.error;
      }

      res.status(outcome.productCreated ? 201 : 200).json({
        message: outcome.productCreated ? PRODUCT_CREATED : PRODUCT_UPDATED,
        product_id: outcome.product.id,
        store_id: outcome.store.id,
        price_id: outcome.price.id,
        estimated_price: outcome.estimatedPrice,
      });
    }),
  );

  /**
   * GET /products?name=<substring>&limit=<n>
   */
  app.get(
    "/products",
    asyncHandler(async (req: Request, res: Response) => {
      const query = ProductListQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError(firstIssueMessage(query.error));
      }

      const products = productCatalog.listProducts(query.data);
      res.json({ products: products.map(serializeProduct) });
    }),
  );

  app.get(
    "/products/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const product = productCatalog.getProduct(req.params.id);
      res.json({ ...serializeProduct(product), price_count: priceRepo.countForProduct(product.id) });
    }),
  );

  app.get(
    "/categories",
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ categories: productCatalog.listCategories() });
    }),
  );
}
