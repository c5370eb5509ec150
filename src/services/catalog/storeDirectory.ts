/**
 * Store Directory
 *
 * Resolves a place candidate to a persisted store, keyed by the external
 * place id. The first writer for a place id wins: later submissions get the
 * stored record back untouched, so curated fields are never overwritten by
 * whatever a client sends next.
 */

import type { Logger } from "pino";
import type { Store, StoreCandidate, StoreId, StoreProductCount } from "../../domain/catalog";
import { NotFoundError, ValidationError } from "../../domain/errors";
import type { StoreRepository } from "../../repositories/storeRepository";
import { isUniqueViolation, toStorageError } from "../../repositories/sqliteErrors";

export const STORE_PLACE_ID_REQUIRED = "Store place_id is required";
export const STORE_NAME_REQUIRED = "Store name is required";

export interface StoreResolution {
  store: Store;
  created: boolean;
}

const cleanString = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

const cleanCoordinate = (value: number | null | undefined, field: string): number | null => {
  if (value === null || value === undefined) return null;
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Store ${field} must be a number`);
  }
  return value;
};

export class StoreDirectory {
  private readonly log: Logger;

  constructor(
    private readonly stores: StoreRepository,
    logger: Logger,
  ) {
    this.log = logger.child({ module: "store-directory" });
  }

  resolveOrCreateStore(candidate: StoreCandidate): StoreResolution {
    const placeId = cleanString(candidate.placeId);
    if (!placeId) {
      throw new ValidationError(STORE_PLACE_ID_REQUIRED);
    }
    const name = cleanString(candidate.name);
    if (!name) {
      throw new ValidationError(STORE_NAME_REQUIRED);
    }
    const latitude = cleanCoordinate(candidate.latitude, "latitude");
    const longitude = cleanCoordinate(candidate.longitude, "longitude");

    const existing = this.stores.findByPlaceId(placeId);
    if (existing) {
      return { store: existing, created: false };
    }

    try {
      const store = this.stores.insert({
        placeId,
        name,
        address: cleanString(candidate.address),
        latitude,
        longitude,
        isOnline: candidate.isOnline ?? false,
      });
      this.log.info({ storeId: store.id, placeId }, "store.created");
      return { store, created: true };
    } catch (err) {
      if (!isUniqueViolation(err)) {
        throw toStorageError(err, "stores.insert");
      }
      // Lost the race to a concurrent insert for the same place id
      const winner = this.stores.findByPlaceId(placeId);
      if (!winner) {
        throw toStorageError(err, "stores.insert");
      }
      this.log.debug({ storeId: winner.id, placeId }, "store.insert_race_resolved");
      return { store: winner, created: false };
    }
  }

  getStore(id: StoreId): Store {
    const store = this.stores.findById(id);
    if (!store) {
      throw new NotFoundError("Store not found", { storeId: id });
    }
    return store;
  }

  listStores(): Store[] {
    return this.stores.list();
  }

  listStoresWithProductCounts(): StoreProductCount[] {
    return this.stores.listWithProductCounts();
  }

  setVisibility(id: StoreId, visible: boolean): Store {
    const store = this.stores.setVisibility(id, visible);
    if (!store) {
      throw new NotFoundError("Store not found", { storeId: id });
    }
    this.log.info({ storeId: id, visible }, "store.visibility_changed");
    return store;
  }
}
