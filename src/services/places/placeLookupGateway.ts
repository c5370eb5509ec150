import type { PlaceCandidate } from "../../domain/catalog";
import { ValidationError } from "../../domain/errors";

export const PLACE_QUERY_REQUIRED = "A 'name' or 'address' query parameter is required";
export const PLACE_QUERY_AMBIGUOUS = "Provide only one of 'name' or 'address'";

export interface PlaceSearchQuery {
  name?: string | null;
  address?: string | null;
  /** Bias name searches towards this point. */
  location?: { lat: number; lng: number } | null;
  radiusM?: number | null;
}

export type ResolvedPlaceQuery =
  | { kind: "name"; name: string; location: { lat: number; lng: number } | null; radiusM: number | null }
  | { kind: "address"; address: string };

/**
 * External place lookup. Pure query: returns candidates in upstream order,
 * an empty list when nothing matched, and throws GatewayError when the
 * upstream service fails.
 */
export interface PlaceLookupGateway {
  search(query: PlaceSearchQuery): Promise<PlaceCandidate[]>;
}

/** Exactly one of name/address, non-blank. */
export function resolvePlaceQuery(query: PlaceSearchQuery): ResolvedPlaceQuery {
  const name = query.name?.trim();
  const address = query.address?.trim();

  if (name && address) {
    throw new ValidationError(PLACE_QUERY_AMBIGUOUS);
  }
  if (name) {
    return { kind: "name", name, location: query.location ?? null, radiusM: query.radiusM ?? null };
  }
  if (address) {
    return { kind: "address", address };
  }
  throw new ValidationError(PLACE_QUERY_REQUIRED);
}

export function noMatchMessage(query: ResolvedPlaceQuery): string {
  return query.kind === "name"
    ? `No store found with name: ${query.name}`
    : `No location found for address: ${query.address}`;
}
