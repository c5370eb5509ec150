/**
 * AppContext: composition root.
 *
 * Opens the database, applies migrations, and wires repositories and
 * services. Routes receive the context and never construct their own
 * collaborators, so tests can build a context over an in-memory database
 * and a fake place lookup gateway.
 */

import pino, { type Logger } from "pino";
import type Database from "better-sqlite3";

import { runtimeConfig, type RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { applyMigrations } from "../db/migrator";
import { BarcodeRepository } from "../repositories/barcodeRepository";
import { DeviceRepository } from "../repositories/deviceRepository";
import { PriceRepository } from "../repositories/priceRepository";
import { ProductRepository } from "../repositories/productRepository";
import { StoreRepository } from "../repositories/storeRepository";
import { PriceLedger } from "../services/catalog/priceLedger";
import { ProductCatalog } from "../services/catalog/productCatalog";
import { ProductIntake } from "../services/catalog/productIntake";
import { StoreDirectory } from "../services/catalog/storeDirectory";
import { GooglePlacesGateway } from "../services/places/googlePlacesGateway";
import type { PlaceLookupGateway } from "../services/places/placeLookupGateway";

export type ContextConfig = Pick<
  RuntimeConfig,
  | "sqlitePath"
  | "logLevel"
  | "defaultCurrency"
  | "apiKey"
  | "googleMapsApiKey"
  | "googleMapsBaseUrl"
  | "placesTimeoutMs"
  | "placesSearchRadiusM"
  | "placesMaxResults"
  | "productListLimit"
>;

export interface AppContext {
  config: ContextConfig;
  logger: Logger;
  db: Database.Database;
  storeRepo: StoreRepository;
  productRepo: ProductRepository;
  priceRepo: PriceRepository;
  barcodeRepo: BarcodeRepository;
  deviceRepo: DeviceRepository;
  storeDirectory: StoreDirectory;
  productCatalog: ProductCatalog;
  priceLedger: PriceLedger;
  productIntake: ProductIntake;
  placeLookup: PlaceLookupGateway;
}

export interface ContextOverrides {
  config?: Partial<ContextConfig>;
  logger?: Logger;
  db?: Database.Database;
  placeLookup?: PlaceLookupGateway;
}

export function createLogger(level: ContextConfig["logLevel"]): Logger {
  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level }, destination);
}

export function createContext(overrides: ContextOverrides = {}): AppContext {
  const config: ContextConfig = { ...runtimeConfig, ...overrides.config };
  const logger = overrides.logger ?? createLogger(config.logLevel);

  const db = overrides.db ?? openDatabase(config.sqlitePath);
  const applied = applyMigrations(db, logger);
  if (applied.length > 0) {
    logger.info({ applied }, "Database migrations applied");
  }

  const storeRepo = new StoreRepository(db);
  const productRepo = new ProductRepository(db);
  const priceRepo = new PriceRepository(db);
  const barcodeRepo = new BarcodeRepository(db);
  const deviceRepo = new DeviceRepository(db);

  const storeDirectory = new StoreDirectory(storeRepo, logger);
  const productCatalog = new ProductCatalog(productRepo, priceRepo, logger, config.productListLimit);
  const priceLedger = new PriceLedger(priceRepo, storeRepo, productCatalog, logger, config.defaultCurrency);
  const productIntake = new ProductIntake(storeDirectory, productCatalog, priceLedger, logger);

  const placeLookup =
    overrides.placeLookup ??
    new GooglePlacesGateway(logger, {
      apiKey: config.googleMapsApiKey,
      baseUrl: config.googleMapsBaseUrl,
      timeoutMs: config.placesTimeoutMs,
      defaultRadiusM: config.placesSearchRadiusM,
      maxResults: config.placesMaxResults,
    });

  return {
    config,
    logger,
    db,
    storeRepo,
    productRepo,
    priceRepo,
    barcodeRepo,
    deviceRepo,
    storeDirectory,
    productCatalog,
    priceLedger,
    productIntake,
    placeLookup,
  };
}
