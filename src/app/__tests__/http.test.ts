import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AppContext } from "../context";
import { createApp } from "../http";
import { GatewayError } from "../../domain/errors";
import {
  FakePlaceLookup,
  createTestContext,
  mustExist,
  startServer,
  type RunningServer,
} from "../../test/helpers/testContext";

const hiLo = { place_id: "place-hilo", store: "Hi-Lo Liguanea", address: "Barbican Rd, Kingston" };

const beansBody = (price: number, storeInfo: Record<string, unknown> = hiLo) => ({
  product_data: { name: "Grace Kidney Beans", category: "Canned Goods" },
  store_info: storeInfo,
  price,
});

describe("HTTP API", () => {
  let ctx: AppContext;
  let places: FakePlaceLookup;
  let server: RunningServer;

  const call = (path: string, init: RequestInit = {}) => fetch(`${server.baseUrl}${path}`, init);

  const postJson = (path: string, body: unknown, method = "POST") =>
    call(path, { method, headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) });

  beforeEach(async () => {
    places = new FakePlaceLookup();
    ctx = createTestContext({ placeLookup: places });
    server = await startServer(createApp(ctx));
  });

  afterEach(async () => {
    await server.close();
    ctx.db.close();
  });

  it("answers on the root and health routes", async () => {
    const root = await call("/");
    expect(root.status).toBe(200);
    expect(await root.json()).toEqual({ message: "Shopping catalog API is running" });

    const health = await call("/health");
    expect(await health.json()).toEqual({ status: "ok", database: "ok", stores: 0, products: 0 });
  });

  it("echoes the request id", async () => {
    const res = await call("/", { headers: { "X-Request-Id": "req-123" } });
    expect(res.headers.get("x-request-id")).toBe("req-123");
  });

  it("returns 404 for unknown routes", async () => {
    const res = await call("/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "NOT_FOUND", message: "Route GET /nope not found" });
  });

  describe("POST /products", () => {
    it("creates the product, store and price", async () => {
      const res = await postJson("/products", beansBody(250));

      const product = mustExist(ctx.productRepo.findByName("Grace Kidney Beans"), "product");
      const store = mustExist(ctx.storeRepo.findByPlaceId("place-hilo"), "store");
      const price = mustExist(ctx.priceRepo.findByPair(product.id, store.id), "price");

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        message: "Product created successfully",
        product_id: product.id,
        store_id: store.id,
        price_id: price.id,
        estimated_price: 250,
      });
    });

    it("reports an update for a known product", async () => {
      await postJson("/products", beansBody(200));
      const res = await postJson("/products", beansBody(300, { place_id: "place-mega", name: "MegaMart" }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ message: "Product updated successfully", estimated_price: 250 });
    });

    it("rejects a body without a product name", async () => {
      const res = await postJson("/products", { store_info: hiLo, price: 10 });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "Product data with name is required" });
    });

    it("rejects a missing place id", async () => {
      const res = await postJson("/products", beansBody(250, { store: "Hi-Lo Liguanea" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "Store place_id is required" });
    });

    it("rejects a missing or non-numeric price", async () => {
      const missing = await postJson("/products", { product_data: { name: "Rice" }, store_info: hiLo });
      expect(missing.status).toBe(400);
      expect(await missing.json()).toEqual({
        error: "VALIDATION_ERROR",
        message: "Price is required and must be a number",
      });

      const text = await postJson("/products", { ...beansBody(250), price: "250" });
      expect(text.status).toBe(400);
      expect(await text.json()).toEqual({
        error: "VALIDATION_ERROR",
        message: "Price is required and must be a number",
      });
    });

    it("persists nothing when the price or currency is rejected", async () => {
      const zero = await postJson("/products", beansBody(0));
      expect(zero.status).toBe(400);
      expect(await zero.json()).toEqual({ error: "VALIDATION_ERROR", message: "Price must be a positive number" });

      const currency = await postJson("/products", { ...beansBody(250), currency: "DOLLARS" });
      expect(currency.status).toBe(400);
      expect(await currency.json()).toEqual({
        error: "VALIDATION_ERROR",
        message: "Currency must be a three-letter code",
      });

      expect(ctx.storeRepo.count()).toBe(0);
      expect(ctx.productRepo.count()).toBe(0);
      const list = await call("/products");
      expect(await list.json()).toEqual({ products: [] });
    });

    it("overwrites the price when the same store reports again", async () => {
      await postJson("/products", beansBody(250));
      const res = await postJson("/products", beansBody(275));
      const product = mustExist(ctx.productRepo.findByName("Grace Kidney Beans"), "product");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ message: "Product updated successfully", estimated_price: 275 });
      expect(ctx.priceRepo.countForProduct(product.id)).toBe(1);

      const one = await call(`/products/${product.id}`);
      expect(await one.json()).toMatchObject({ estimated_price: 275, price_count: 1 });
    });

    it("rejects malformed JSON", async () => {
      const res = await call("/products", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "Request body must be valid JSON" });
    });
  });

  describe("products and prices", () => {
    it("lists, fetches and prices products", async () => {
      await postJson("/products", beansBody(300));
      await postJson("/products", beansBody(200, { place_id: "place-mega", name: "MegaMart" }));
      const product = mustExist(ctx.productRepo.findByName("Grace Kidney Beans"), "product");

      const list = await call("/products?name=kidney");
      expect(await list.json()).toMatchObject({ products: [{ id: product.id, estimated_price: 250 }] });

      const one = await call(`/products/${product.id}`);
      expect(await one.json()).toMatchObject({ name: "Grace Kidney Beans", category: "Canned Goods" });

      const prices = await call(`/products/${product.id}/prices`);
      expect(await prices.json()).toMatchObject({
        prices: [
          { price: 200, currency: "JMD", store: { name: "MegaMart" } },
          { price: 300, currency: "JMD", store: { name: "Hi-Lo Liguanea" } },
        ],
      });

      const lowest = await call(`/products/${product.id}/prices/lowest`);
      expect(await lowest.json()).toMatchObject({ price: 200, store: { place_id: "place-mega" } });

      const categories = await call("/categories");
      expect(await categories.json()).toEqual({ categories: ["Canned Goods"] });
    });

    it("accepts a price submission for an existing product", async () => {
      await postJson("/products", beansBody(200));
      const product = mustExist(ctx.productRepo.findByName("Grace Kidney Beans"), "product");

      const res = await postJson(`/products/${product.id}/prices`, {
        place_id: "place-mega",
        name: "MegaMart",
        price: 300,
      });
      const store = mustExist(ctx.storeRepo.findByPlaceId("place-mega"), "store");
      const price = mustExist(ctx.priceRepo.findByPair(product.id, store.id), "price");

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        message: "Price saved",
        price_id: price.id,
        store_id: store.id,
        estimated_price: 250,
      });
    });

    it("returns 404 for an unknown product", async () => {
      const res = await postJson("/products/missing/prices", { place_id: "p", name: "S", price: 1 });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "NOT_FOUND", message: "Product not found" });
    });

    it("rejects an invalid list limit", async () => {
      const res = await call("/products?limit=0");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "limit must be positive" });
    });
  });

  describe("GET /stores/search", () => {
    it("returns candidates", async () => {
      places.candidates = [
        { placeId: "p1", name: "Hi-Lo Liguanea", address: "Barbican Rd", latitude: 18.03, longitude: -76.77 },
      ];

      const res = await call("/stores/search?name=Hi-Lo&location=18.0,-76.8&radius=2000");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        stores: [{ place_id: "p1", name: "Hi-Lo Liguanea", address: "Barbican Rd", latitude: 18.03, longitude: -76.77 }],
      });
      expect(places.queries).toEqual([
        { name: "Hi-Lo", address: undefined, location: { lat: 18, lng: -76.8 }, radiusM: 2000 },
      ]);
    });

    it("returns 404 with an empty list when nothing matches", async () => {
      const byName = await call("/stores/search?name=Nowhere");
      expect(byName.status).toBe(404);
      expect(await byName.json()).toEqual({
        error: "NOT_FOUND",
        message: "No store found with name: Nowhere",
        stores: [],
      });

      const byAddress = await call("/stores/search?address=Atlantis");
      expect(await byAddress.json()).toMatchObject({ message: "No location found for address: Atlantis" });
    });

    it("requires a query", async () => {
      const res = await call("/stores/search");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "VALIDATION_ERROR",
        message: "A 'name' or 'address' query parameter is required",
      });
      expect(places.queries).toHaveLength(0);
    });

    it("surfaces gateway failures", async () => {
      places.failure = new GatewayError("Place lookup timed out", 502);

      const res = await call("/stores/search?name=Hi-Lo");
      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: "GATEWAY_ERROR", message: "Place lookup timed out" });
    });
  });

  describe("stores", () => {
    it("hides a store from price listings", async () => {
      await postJson("/products", beansBody(200));
      const store = mustExist(ctx.storeRepo.findByPlaceId("place-hilo"), "store");
      const product = mustExist(ctx.productRepo.findByName("Grace Kidney Beans"), "product");

      const patched = await postJson(`/stores/${store.id}/visibility`, { visible: false }, "PATCH");
      expect(await patched.json()).toMatchObject({ id: store.id, visible: false });

      const prices = await call(`/products/${product.id}/prices`);
      expect(await prices.json()).toEqual({ prices: [] });

      const stores = await call("/stores");
      expect(await stores.json()).toMatchObject({ stores: [{ id: store.id, visible: false }] });
    });

    it("validates the visibility flag", async () => {
      const res = await postJson("/stores/any/visibility", { visible: "no" }, "PATCH");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "visible must be a boolean" });
    });

    it("returns 404 for an unknown store", async () => {
      const res = await call("/stores/missing");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "NOT_FOUND", message: "Store not found" });
    });
  });

  describe("GET /stores/products", () => {
    it("counts priced products per visible store, most first", async () => {
      await postJson("/products", beansBody(250));
      await postJson("/products", { ...beansBody(120), product_data: { name: "Rice" } });
      await postJson("/products", beansBody(260, { place_id: "place-mega", name: "MegaMart" }));
      ctx.storeDirectory.resolveOrCreateStore({ placeId: "place-empty", name: "Empty Shop" });
      const hiLoStore = mustExist(ctx.storeRepo.findByPlaceId("place-hilo"), "store");
      const mega = mustExist(ctx.storeRepo.findByPlaceId("place-mega"), "store");

      const res = await call("/stores/products");
      expect(await res.json()).toEqual({
        stores: [
          { store_id: hiLoStore.id, store_name: "Hi-Lo Liguanea", product_count: 2 },
          { store_id: mega.id, store_name: "MegaMart", product_count: 1 },
        ],
      });

      ctx.storeDirectory.setVisibility(hiLoStore.id, false);
      const hidden = await call("/stores/products");
      expect(await hidden.json()).toEqual({
        stores: [{ store_id: mega.id, store_name: "MegaMart", product_count: 1 }],
      });
    });
  });

  describe("devices", () => {
    it("registers a device and normalizes the platform", async () => {
      const res = await postJson("/devices", { device_id: " phone-1 ", platform: "iOS" });
      const device = mustExist(ctx.deviceRepo.findById("phone-1"), "device");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        device_id: "phone-1",
        platform: "ios",
        created_at: new Date(device.createdAt).toISOString(),
      });

      const again = await postJson("/devices", { device_id: "phone-1", platform: "blackberry" });
      expect(await again.json()).toMatchObject({ device_id: "phone-1", platform: "unknown" });
    });

    it("requires a device id", async () => {
      const res = await postJson("/devices", { platform: "web" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "device_id is required" });
    });

    it("syncs and returns a shopping list", async () => {
      const empty = await call("/devices/phone-2/shopping-list");
      expect(await empty.json()).toEqual({ shopping_list: [] });

      const items = [{ name: "Rice", qty: 2 }, "Bread"];
      const put = await postJson("/devices/phone-2/shopping-list", { shopping_list: items }, "PUT");
      expect(await put.json()).toEqual({ message: "Shopping list synced", count: 2 });

      const saved = await call("/devices/phone-2/shopping-list");
      expect(await saved.json()).toEqual({ shopping_list: items });
    });

    it("keeps the shopping list when the device registers again", async () => {
      await postJson("/devices/phone-3/shopping-list", { shopping_list: ["Milk"] }, "PUT");
      await postJson("/devices", { device_id: "phone-3", platform: "android" });

      const saved = await call("/devices/phone-3/shopping-list");
      expect(await saved.json()).toEqual({ shopping_list: ["Milk"] });
      expect(ctx.deviceRepo.findById("phone-3")?.platform).toBe("android");
    });

    it("rejects a shopping list that is not an array", async () => {
      const res = await postJson("/devices/phone-4/shopping-list", { shopping_list: "Milk" }, "PUT");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "shopping_list must be an array" });
    });
  });

  describe("barcodes", () => {
    it("links, looks up and unlinks a barcode", async () => {
      await postJson("/products", beansBody(250));
      const product = mustExist(ctx.productRepo.findByName("Grace Kidney Beans"), "product");

      const linked = await postJson("/barcodes/0123456789", { product_id: product.id });
      expect(linked.status).toBe(201);

      const found = await call("/barcodes/0123456789");
      expect(await found.json()).toMatchObject({
        found: true,
        product: { id: product.id, prices: [{ store: "Hi-Lo Liguanea", price: 250, currency: "JMD" }] },
      });

      const removed = await call("/barcodes/0123456789", { method: "DELETE" });
      expect(removed.status).toBe(200);

      const gone = await call("/barcodes/0123456789");
      expect(gone.status).toBe(404);
      expect(await gone.json()).toEqual({ found: false });
    });

    it("rejects malformed barcodes", async () => {
      const res = await call("/barcodes/a%20b");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "VALIDATION_ERROR", message: "Invalid barcode" });
    });
  });
});

describe("API key", () => {
  let ctx: AppContext;
  let server: RunningServer;

  beforeEach(async () => {
    ctx = createTestContext({ config: { apiKey: "test-secret" } });
    server = await startServer(createApp(ctx));
  });

  afterEach(async () => {
    await server.close();
    ctx.db.close();
  });

  it("rejects requests without the key", async () => {
    const res = await fetch(`${server.baseUrl}/products`);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "UNAUTHORIZED", message: "Missing or invalid API key" });
  });

  it("rejects a wrong key", async () => {
    const res = await fetch(`${server.baseUrl}/products`, { headers: { "X-API-Key": "wrong" } });
    expect(res.status).toBe(401);
  });

  it("accepts the configured key", async () => {
    const res = await fetch(`${server.baseUrl}/products`, { headers: { "X-API-Key": "test-secret" } });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ products: [] });
  });

  it("leaves health probes open", async () => {
    const res = await fetch(`${server.baseUrl}/health`);
    expect(res.status).toBe(200);
  });
});
