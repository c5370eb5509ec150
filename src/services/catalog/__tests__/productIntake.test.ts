import { beforeEach, describe, expect, it } from "vitest";
import type { AppContext } from "../../../app/context";
import { ValidationError } from "../../../domain/errors";
import { STORE_INFO_REQUIRED } from "../../../schemas/catalog";
import { createTestContext } from "../../../test/helpers/testContext";
import { CURRENCY_INVALID, PRICE_NOT_POSITIVE, PRICE_REQUIRED } from "../priceLedger";
import { PRODUCT_NAME_REQUIRED } from "../productCatalog";
import type { IntakeOutcome } from "../productIntake";
import { STORE_NAME_REQUIRED, STORE_PLACE_ID_REQUIRED } from "../storeDirectory";

const hiLo = {
  place_id: "place-hilo",
  store: "Hi-Lo Liguanea",
  address: "Barbican Rd, Kingston",
  latitude: 18.03,
  longitude: -76.77,
};

const beansRequest = (price: unknown, storeInfo: Record<string, unknown> = hiLo) => ({
  product_data: { name: "Grace Kidney Beans", brand: "Grace", category: "Canned Goods" },
  store_info: storeInfo,
  price,
});

const failureMessage = (outcome: IntakeOutcome): string => {
  if (outcome.state !== "Failed") {
    throw new Error(`Expected a failed intake, got ${outcome.state}`);
  }
  return outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
};

describe("ProductIntake", () => {
  let ctx: AppContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe("createProduct", () => {
    it("walks every state for a new product at a new store", () => {
      const outcome = ctx.productIntake.createProduct(beansRequest(250));

      expect(outcome.trail).toEqual(["ReceivedRequest", "StoreResolved", "ProductResolved", "PriceUpserted", "Done"]);
      if (outcome.state !== "Done") throw new Error("intake failed");

      expect(outcome.productCreated).toBe(true);
      expect(outcome.storeCreated).toBe(true);
      expect(outcome.store.name).toBe("Hi-Lo Liguanea");
      expect(outcome.price.amount).toBe(250);
      expect(outcome.price.currency).toBe("JMD");
      expect(outcome.estimatedPrice).toBe(250);
    });

    it("updates the existing price when the same store reports again", () => {
      const first = ctx.productIntake.createProduct(beansRequest(250));
      const second = ctx.productIntake.createProduct(beansRequest(275));
      if (first.state !== "Done" || second.state !== "Done") throw new Error("intake failed");

      expect(second.productCreated).toBe(false);
      expect(second.storeCreated).toBe(false);
      expect(second.product.id).toBe(first.product.id);
      expect(second.price.id).toBe(first.price.id);
      expect(second.estimatedPrice).toBe(275);
      expect(ctx.priceRepo.countForProduct(first.product.id)).toBe(1);
    });

    it("averages prices from different stores", () => {
      ctx.productIntake.createProduct(beansRequest(200));
      const outcome = ctx.productIntake.createProduct(beansRequest(300, { place_id: "place-mega", name: "MegaMart" }));
      if (outcome.state !== "Done") throw new Error("intake failed");

      expect(outcome.store.name).toBe("MegaMart");
      expect(outcome.estimatedPrice).toBe(250);
      expect(ctx.storeRepo.count()).toBe(2);
    });

    it("takes the first failing field in order", () => {
      expect(failureMessage(ctx.productIntake.createProduct({}))).toBe(PRODUCT_NAME_REQUIRED);
      expect(failureMessage(ctx.productIntake.createProduct({ product_data: { name: "Rice" } }))).toBe(
        STORE_INFO_REQUIRED,
      );
      expect(
        failureMessage(ctx.productIntake.createProduct({ product_data: { name: "Rice" }, store_info: hiLo })),
      ).toBe(PRICE_REQUIRED);
      expect(failureMessage(ctx.productIntake.createProduct(beansRequest(250, { store: "No Id" })))).toBe(
        STORE_PLACE_ID_REQUIRED,
      );
    });

    it("fails before any write when the store has no name", () => {
      const outcome = ctx.productIntake.createProduct(beansRequest(250, { place_id: "place-x" }));

      expect(failureMessage(outcome)).toBe(STORE_NAME_REQUIRED);
      expect(outcome.trail).toEqual(["ReceivedRequest", "Failed"]);
      expect(ctx.storeRepo.count()).toBe(0);
    });

    it("rejects a bad price before writing the store or product", () => {
      const outcome = ctx.productIntake.createProduct(beansRequest(0));

      expect(outcome.state).toBe("Failed");
      if (outcome.state !== "Failed") return;
      expect(outcome.failedAt).toBe("ReceivedRequest");
      expect(outcome.error).toBeInstanceOf(ValidationError);
      expect(failureMessage(outcome)).toBe(PRICE_NOT_POSITIVE);
      expect(outcome.trail).toEqual(["ReceivedRequest", "Failed"]);
      expect(ctx.storeRepo.count()).toBe(0);
      expect(ctx.productRepo.count()).toBe(0);
    });

    it("rejects a bad currency before writing the store or product", () => {
      const outcome = ctx.productIntake.createProduct({ ...beansRequest(250), currency: "DOLLARS" });

      expect(failureMessage(outcome)).toBe(CURRENCY_INVALID);
      expect(ctx.storeRepo.count()).toBe(0);
      expect(ctx.productRepo.count()).toBe(0);
    });

    it("falls back to the store_info name when store is blank", () => {
      const outcome = ctx.productIntake.createProduct(
        beansRequest(250, { place_id: "place-mega", store: "  ", name: "MegaMart" }),
      );
      if (outcome.state !== "Done") throw new Error("intake failed");

      expect(outcome.store.name).toBe("MegaMart");
    });

    it("treats a non-object body as empty", () => {
      expect(failureMessage(ctx.productIntake.createProduct("not json"))).toBe(PRODUCT_NAME_REQUIRED);
      expect(failureMessage(ctx.productIntake.createProduct([1, 2]))).toBe(PRODUCT_NAME_REQUIRED);
    });
  });

  describe("submitPrice", () => {
    it("adds a price for an existing product", () => {
      const created = ctx.productIntake.createProduct(beansRequest(200));
      if (created.state !== "Done") throw new Error("intake failed");

      const result = ctx.productIntake.submitPrice(created.product.id, {
        place_id: "place-mega",
        name: "MegaMart",
        price: 300,
        currency: "jmd",
      });

      expect(result.storeCreated).toBe(true);
      expect(result.price.currency).toBe("JMD");
      expect(result.estimatedPrice).toBe(250);
    });

    it("reports an unknown product before validating the body", () => {
      expect(() => ctx.productIntake.submitPrice("missing", {})).toThrow("Product not found");
    });

    it("validates the submitted store and price", () => {
      const created = ctx.productIntake.createProduct(beansRequest(200));
      if (created.state !== "Done") throw new Error("intake failed");

      expect(() => ctx.productIntake.submitPrice(created.product.id, { name: "MegaMart", price: 1 })).toThrow(
        STORE_PLACE_ID_REQUIRED,
      );
      expect(() => ctx.productIntake.submitPrice(created.product.id, { place_id: "place-mega", name: "M" })).toThrow(
        PRICE_REQUIRED,
      );
    });

    it("writes no store when the submitted price is rejected", () => {
      const created = ctx.productIntake.createProduct(beansRequest(200));
      if (created.state !== "Done") throw new Error("intake failed");

      expect(() =>
        ctx.productIntake.submitPrice(created.product.id, { place_id: "place-mega", name: "MegaMart", price: -1 }),
      ).toThrow(PRICE_NOT_POSITIVE);
      expect(ctx.storeRepo.findByPlaceId("place-mega")).toBeUndefined();
      expect(ctx.storeRepo.count()).toBe(1);
    });
  });
});
