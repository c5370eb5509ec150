/**
 * Store Routes
 *
 * Place search (proxied to the place lookup gateway) and the persisted store
 * directory.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import type { PlaceCandidate, Store } from "../domain/catalog";
import { ValidationError } from "../domain/errors";
import { asyncHandler } from "../middleware/errorHandler";
import { StoreVisibilitySchema, asRecord, firstIssueMessage } from "../schemas/catalog";
import { noMatchMessage, resolvePlaceQuery, type PlaceSearchQuery } from "../services/places/placeLookupGateway";

export const serializeStore = (store: Store) => ({
  id: store.id,
  place_id: store.placeId,
  name: store.name,
  address: store.address,
  latitude: store.latitude,
  longitude: store.longitude,
  is_online: store.isOnline,
  visible: store.visible,
});

const serializeCandidate = (candidate: PlaceCandidate) => ({
  place_id: candidate.placeId,
  name: candidate.name,
  address: candidate.address,
  latitude: candidate.latitude,
  longitude: candidate.longitude,
});

const queryString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

/** `location=lat,lng` bias for name searches; ignored when malformed. */
const parseLocation = (value: unknown): { lat: number; lng: number } | null => {
  const raw = queryString(value);
  if (!raw) return null;
  const [lat, lng] = raw.split(",").map((part) => Number.parseFloat(part.trim()));
  return Number.isFinite(lat) && Number.isFinite(lng) ? { lat, lng } : null;
};

const parseRadius = (value: unknown): number | null => {
  const radius = Number.parseInt(queryString(value) ?? "", 10);
  return Number.isFinite(radius) && radius > 0 ? radius : null;
};

export function registerStoreRoutes(app: Express, ctx: AppContext): void {
  const { placeLookup, storeDirectory, logger } = ctx;
  const log = logger.child({ module: "store-routes" });

  /**
   * GET /stores/search?name=<q> | ?address=<q>
   *
   * 200 { stores } or 404 { message, stores: [] } when the lookup finds nothing.
   */
  app.get(
    "/stores/search",
    asyncHandler(async (req: Request, res: Response) => {
      const query: PlaceSearchQuery = {
        name: queryString(req.query.name),
        address: queryString(req.query.address),
        location: parseLocation(req.query.location),
        radiusM: parseRadius(req.query.radius),
      };
      const resolved = resolvePlaceQuery(query);

      const candidates = await placeLookup.search(query);
      if (candidates.length === 0) {
        const message = noMatchMessage(resolved);
        log.info({ kind: resolved.kind }, "store.search_no_match");
        res.status(404).json({ error: "NOT_FOUND", message, stores: [] });
        return;
      }

      res.json({ stores: candidates.map(serializeCandidate) });
    }),
  );

  app.get(
    "/stores",
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ stores: storeDirectory.listStores().map(serializeStore) });
    }),
  );

  /**
   * GET /stores/products
   * Stores that carry priced products, with their product counts.
   */
  app.get(
    "/stores/products",
    asyncHandler(async (_req: Request, res: Response) => {
      const stores = storeDirectory.listStoresWithProductCounts().map(({ store, productCount }) => ({
        store_id: store.id,
        store_name: store.name,
        product_count: productCount,
      }));
      res.json({ stores });
    }),
  );

  app.get(
    "/stores/:id",
    asyncHandler(async (req: Request, res: Response) => {
      res.json(serializeStore(storeDirectory.getStore(req.params.id)));
    }),
  );

  /**
   * PATCH /stores/:id/visibility  { visible: boolean }
   * Hidden stores drop out of public price listings.
   */
  app.patch(
    "/stores/:id/visibility",
    asyncHandler(async (req: Request, res: Response) => {
      const body = StoreVisibilitySchema.safeParse(asRecord(req.body));
      if (!body.success) {
        throw new ValidationError(firstIssueMessage(body.error));
      }
      const store = storeDirectory.setVisibility(req.params.id, body.data.visible);
      res.json(serializeStore(store));
    }),
  );
}
