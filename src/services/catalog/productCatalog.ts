/**
 * Product Catalog
 *
 * Products are deduplicated on their exact (trimmed, case-sensitive) name,
 * and on the optional match key when one is supplied. The estimated price is
 * derived from the price ledger and is recomputed after every price write.
 */

import type { Logger } from "pino";
import type { Product, ProductId, ProductInput } from "../../domain/catalog";
import { NotFoundError, ValidationError } from "../../domain/errors";
import type { PriceRepository } from "../../repositories/priceRepository";
import type { ProductRepository } from "../../repositories/productRepository";
import { isUniqueViolation, toStorageError } from "../../repositories/sqliteErrors";

export const PRODUCT_NAME_REQUIRED = "Product data with name is required";

export const MAX_PRODUCT_LIST_LIMIT = 500;

export interface ProductResolution {
  product: Product;
  created: boolean;
}

export interface ProductListQuery {
  name?: string;
  limit?: number;
}

const cleanString = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

/** Mean of the amounts, rounded to cents; null when there are none. */
export function meanPrice(amounts: readonly number[]): number | null {
  if (amounts.length === 0) return null;
  const total = amounts.reduce((sum, amount) => sum + amount, 0);
  return Math.round((total / amounts.length) * 100) / 100;
}

export class ProductCatalog {
  private readonly log: Logger;

  constructor(
    private readonly products: ProductRepository,
    private readonly prices: PriceRepository,
    logger: Logger,
    private readonly defaultListLimit = 100,
  ) {
    this.log = logger.child({ module: "product-catalog" });
  }

  resolveOrCreateProduct(data: ProductInput): ProductResolution {
    const name = cleanString(data.name);
    if (!name) {
      throw new ValidationError(PRODUCT_NAME_REQUIRED);
    }
    const matchKey = cleanString(data.matchKey);

    const existing = this.findExisting(name, matchKey);
    if (existing) {
      return { product: existing, created: false };
    }

    try {
      const product = this.products.insert({
        name,
        description: cleanString(data.description),
        brand: cleanString(data.brand),
        category: cleanString(data.category),
        matchKey,
      });
      this.log.info({ productId: product.id, name }, "product.created");
      return { product, created: true };
    } catch (err) {
      if (!isUniqueViolation(err)) {
        throw toStorageError(err, "products.insert");
      }
      const winner = this.findExisting(name, matchKey);
      if (!winner) {
        throw toStorageError(err, "products.insert");
      }
      this.log.debug({ productId: winner.id, name }, "product.insert_race_resolved");
      return { product: winner, created: false };
    }
  }

  /**
   * Set the product's estimated price to the mean of its current ledger
   * rows (null when there are none). Safe to call repeatedly.
   */
  recomputeEstimatedPrice(productId: ProductId): number | null {
    const estimatedPrice = meanPrice(this.prices.listAmountsForProduct(productId));
    const updated = this.products.setEstimatedPrice(productId, estimatedPrice);
    if (!updated) {
      throw new NotFoundError("Product not found", { productId });
    }
    this.log.debug({ productId, estimatedPrice }, "product.estimated_price_recomputed");
    return estimatedPrice;
  }

  getProduct(id: ProductId): Product {
    const product = this.products.findById(id);
    if (!product) {
      throw new NotFoundError("Product not found", { productId: id });
    }
    return product;
  }

  listProducts({ name, limit }: ProductListQuery = {}): Product[] {
    const effectiveLimit = Math.min(Math.max(1, Math.trunc(limit ?? this.defaultListLimit)), MAX_PRODUCT_LIST_LIMIT);
    return this.products.search({ name: cleanString(name) ?? undefined, limit: effectiveLimit });
  }

  listCategories(): string[] {
    return this.products.listCategories();
  }

  private findExisting(name: string, matchKey: string | null): Product | undefined {
    return this.products.findByName(name) ?? (matchKey ? this.products.findByMatchKey(matchKey) : undefined);
  }
}
