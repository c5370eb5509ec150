/**
 * Price Ledger
 *
 * At most one price row per (product, store). Every write is followed by a
 * recompute of the product's estimated price; the upsert commits before the
 * recompute reads (better-sqlite3 statements run synchronously).
 */

import type { Logger } from "pino";
import type { Price, PriceWithStore, ProductId, StoreId } from "../../domain/catalog";
import { NotFoundError, ValidationError } from "../../domain/errors";
import type { PriceRepository } from "../../repositories/priceRepository";
import type { StoreRepository } from "../../repositories/storeRepository";
import { toStorageError } from "../../repositories/sqliteErrors";
import type { ProductCatalog } from "./productCatalog";

export const PRICE_REQUIRED = "Price is required and must be a number";
export const PRICE_NOT_POSITIVE = "Price must be a positive number";
export const CURRENCY_INVALID = "Currency must be a three-letter code";

const CURRENCY_PATTERN = /^[A-Za-z]{3}$/;

export interface LedgerEntry {
  price: Price;
  estimatedPrice: number | null;
}

export interface CheckedPrice {
  amount: number;
  currency: string;
}

export function validateAmount(amount: unknown): number {
  if (typeof amount !== "number" || !Number.isFinite(amount)) {
    throw new ValidationError(PRICE_REQUIRED);
  }
  if (amount <= 0) {
    throw new ValidationError(PRICE_NOT_POSITIVE);
  }
  return amount;
}

export function normalizeCurrency(currency: unknown, fallback: string): string {
  if (currency === undefined || currency === null) {
    return fallback;
  }
  if (typeof currency !== "string" || !CURRENCY_PATTERN.test(currency.trim())) {
    throw new ValidationError(CURRENCY_INVALID);
  }
  return currency.trim().toUpperCase();
}

export class PriceLedger {
  private readonly log: Logger;

  constructor(
    private readonly prices: PriceRepository,
    private readonly stores: StoreRepository,
    private readonly catalog: ProductCatalog,
    logger: Logger,
    private readonly defaultCurrency: string,
  ) {
    this.log = logger.child({ module: "price-ledger" });
  }

  /**
   * Amount and currency checks with the default currency applied. Callers
   * that write other rows first run this before those writes.
   */
  checkPrice(amount: unknown, currency?: unknown): CheckedPrice {
    return { amount: validateAmount(amount), currency: normalizeCurrency(currency, this.defaultCurrency) };
  }

  upsertPrice(productId: ProductId, storeId: StoreId, amount: unknown, currency?: unknown): LedgerEntry {
    const checked = this.checkPrice(amount, currency);

    this.catalog.getProduct(productId);
    if (!this.stores.findById(storeId)) {
      throw new NotFoundError("Store not found", { storeId });
    }

    const previous = this.prices.findByPair(productId, storeId);
    let price: Price;
    try {
      price = this.prices.upsert({ productId, storeId, ...checked });
    } catch (err) {
      throw toStorageError(err, "prices.upsert");
    }

    const estimatedPrice = this.catalog.recomputeEstimatedPrice(productId);
    this.log.info(
      {
        priceId: price.id,
        productId,
        storeId,
        amount: price.amount,
        previousAmount: previous?.amount ?? null,
        currency: price.currency,
        estimatedPrice,
      },
      previous ? "price.updated" : "price.created",
    );

    return { price, estimatedPrice };
  }

  listPricesForProduct(productId: ProductId): PriceWithStore[] {
    this.catalog.getProduct(productId);
    return this.prices.listForProduct(productId);
  }

  lowestPriceForProduct(productId: ProductId): PriceWithStore {
    const [lowest] = this.listPricesForProduct(productId);
    if (!lowest) {
      throw new NotFoundError("No prices found for product", { productId });
    }
    return lowest;
  }
}
