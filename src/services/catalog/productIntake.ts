/**
 * Product Intake
 *
 * Linear state machine behind POST /products:
 *
 *   ReceivedRequest → StoreResolved → ProductResolved → PriceUpserted → Done
 *
 * with Failed reachable from every step. The whole request, price and
 * currency included, is validated before the first write. Nothing is retried
 * and nothing is rolled back: a store or product created before a later step
 * fails stays persisted, and the next submission resolves to it.
 */

import type { Logger } from "pino";
import type { Price, Product, ProductId, Store, StoreCandidate } from "../../domain/catalog";
import { ValidationError } from "../../domain/errors";
import {
  PriceSubmissionSchema,
  ProductCreationSchema,
  asRecord,
  firstIssueMessage,
  type StoreInfo,
} from "../../schemas/catalog";
import type { LedgerEntry, PriceLedger } from "./priceLedger";
import type { ProductCatalog } from "./productCatalog";
import type { StoreDirectory } from "./storeDirectory";

export type IntakeState =
  | "ReceivedRequest"
  | "StoreResolved"
  | "ProductResolved"
  | "PriceUpserted"
  | "Done"
  | "Failed";

export interface IntakeCompleted {
  state: "Done";
  trail: IntakeState[];
  store: Store;
  storeCreated: boolean;
  product: Product;
  productCreated: boolean;
  price: Price;
  estimatedPrice: number | null;
}

export interface IntakeFailed {
  state: "Failed";
  trail: IntakeState[];
  /** Last state reached before the failure. */
  failedAt: Exclude<IntakeState, "Done" | "Failed">;
  error: unknown;
}

export type IntakeOutcome = IntakeCompleted | IntakeFailed;

export interface PriceSubmissionResult extends LedgerEntry {
  store: Store;
  storeCreated: boolean;
}

export const toStoreCandidate = (info: StoreInfo): StoreCandidate => ({
  placeId: info.place_id,
  name: info.store?.trim() ? info.store : info.name,
  address: info.address,
  latitude: info.latitude,
  longitude: info.longitude,
  isOnline: info.is_online,
});

export class ProductIntake {
  private readonly log: Logger;

  constructor(
    private readonly storeDirectory: StoreDirectory,
    private readonly catalog: ProductCatalog,
    private readonly ledger: PriceLedger,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "product-intake" });
  }

  /**
   * Run the product creation flow for a raw request body. Never throws:
   * failures come back as a `Failed` outcome carrying the error.
   */
  createProduct(body: unknown): IntakeOutcome {
    const trail: IntakeState[] = ["ReceivedRequest"];
    let current: IntakeFailed["failedAt"] = "ReceivedRequest";

    const advance = (next: IntakeFailed["failedAt"] | "Done") => {
      trail.push(next);
      this.log.debug({ from: current, to: next }, "intake.transition");
      if (next !== "Done") current = next;
    };

    try {
      const parsed = ProductCreationSchema.safeParse(asRecord(body));
      if (!parsed.success) {
        throw new ValidationError(firstIssueMessage(parsed.error));
      }
      const payload = parsed.data;
      // Amount and currency are checked before the store or product is written
      const checked = this.ledger.checkPrice(payload.price, payload.currency);

      const { store, created: storeCreated } = this.storeDirectory.resolveOrCreateStore(
        toStoreCandidate(payload.store_info),
      );
      advance("StoreResolved");

      const { product, created: productCreated } = this.catalog.resolveOrCreateProduct({
        name: payload.product_data.name,
        description: payload.product_data.description,
        brand: payload.product_data.brand,
        category: payload.product_data.category,
        matchKey: payload.product_data.match_key,
      });
      advance("ProductResolved");

      const { price, estimatedPrice } = this.ledger.upsertPrice(
        product.id,
        store.id,
        checked.amount,
        checked.currency,
      );
      advance("PriceUpserted");
      advance("Done");

      this.log.info(
        { productId: product.id, storeId: store.id, priceId: price.id, productCreated, storeCreated },
        "intake.completed",
      );

      return { state: "Done", trail, store, storeCreated, product, productCreated, price, estimatedPrice };
    } catch (error) {
      trail.push("Failed");
      this.log.warn(
        { failedAt: current, err: error instanceof Error ? error.message : String(error) },
        "intake.failed",
      );
      return { state: "Failed", trail, failedAt: current, error };
    }
  }

  /**
   * POST /products/:id/prices: resolve the submitting store, then upsert its
   * price for an existing product.
   */
  submitPrice(productId: ProductId, body: unknown): PriceSubmissionResult {
    this.catalog.getProduct(productId);

    const parsed = PriceSubmissionSchema.safeParse(asRecord(body));
    if (!parsed.success) {
      throw new ValidationError(firstIssueMessage(parsed.error));
    }

    const checked = this.ledger.checkPrice(parsed.data.price, parsed.data.currency);

    const { store, created: storeCreated } = this.storeDirectory.resolveOrCreateStore(toStoreCandidate(parsed.data));
    const entry = this.ledger.upsertPrice(productId, store.id, checked.amount, checked.currency);
    return { ...entry, store, storeCreated };
  }
}
