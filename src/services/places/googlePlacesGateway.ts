/**
 * Google Maps place lookup
 *
 * Name queries go to Places Text Search (top N results), address queries to
 * the Geocoding API (first result only; geocodes carry no business name).
 * Google reports most failures as HTTP 200 with a `status` field, so both the
 * transport and the body status are mapped onto GatewayError.
 */

import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";
import { z } from "zod";
import type { PlaceCandidate } from "../../domain/catalog";
import { GatewayError } from "../../domain/errors";
import {
  resolvePlaceQuery,
  type PlaceLookupGateway,
  type PlaceSearchQuery,
  type ResolvedPlaceQuery,
} from "./placeLookupGateway";

export interface GooglePlacesOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  defaultRadiusM: number;
  maxResults: number;
}

export type PlacesHttpClient = Pick<AxiosInstance, "get">;

const ADDRESS_NOT_AVAILABLE = "Address not available";

// Statuses meaning the upstream refused this request (as opposed to being down)
const REJECTED_STATUSES = new Set(["REQUEST_DENIED", "INVALID_REQUEST"]);

const LocationSchema = z.object({ lat: z.number(), lng: z.number() });

const PlaceResultSchema = z.object({
  place_id: z.string(),
  name: z.string().optional(),
  formatted_address: z.string().optional(),
  geometry: z.object({ location: LocationSchema }),
});

const PlacesResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(z.unknown()).default([]),
});

type PlaceResult = z.infer<typeof PlaceResultSchema>;

export class GooglePlacesGateway implements PlaceLookupGateway {
  private readonly client: PlacesHttpClient;
  private readonly log: Logger;

  constructor(
    logger: Logger,
    private readonly options: GooglePlacesOptions,
    client?: PlacesHttpClient,
  ) {
    this.log = logger.child({ module: "google-places" });
    this.client =
      client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
      });

    if (!options.apiKey) {
      this.log.warn("Google Maps API key not configured - place lookups will fail");
    }
  }

  async search(query: PlaceSearchQuery): Promise<PlaceCandidate[]> {
    const resolved = resolvePlaceQuery(query);

    if (!this.options.apiKey) {
      throw new GatewayError("Place lookup service is not configured", 502);
    }

    const results = resolved.kind === "name" ? await this.textSearch(resolved) : await this.geocode(resolved.address);

    this.log.debug({ kind: resolved.kind, count: results.length }, "places.search");
    return results;
  }

  private async textSearch(query: Extract<ResolvedPlaceQuery, { kind: "name" }>): Promise<PlaceCandidate[]> {
    const params: Record<string, string | number> = {
      query: query.name,
      key: this.options.apiKey,
      radius: query.radiusM ?? this.options.defaultRadiusM,
    };
    if (query.location) {
      params.location = `${query.location.lat},${query.location.lng}`;
    }

    const results = await this.request("/place/textsearch/json", params);
    return results.slice(0, this.options.maxResults).map((place) => this.toCandidate(place));
  }

  private async geocode(address: string): Promise<PlaceCandidate[]> {
    const results = await this.request("/geocode/json", { address, key: this.options.apiKey });
    const [first] = results;
    return first ? [this.toCandidate(first)] : [];
  }

  private async request(path: string, params: Record<string, string | number>): Promise<PlaceResult[]> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>(path, { params });
      body = response.data;
    } catch (err: unknown) {
      throw this.toGatewayError(err, path);
    }

    const parsed = PlacesResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.log.error({ path, issues: parsed.error.issues }, "places.unexpected_response");
      throw new GatewayError("Place lookup service returned an unexpected response", 502);
    }

    const { status, error_message: upstreamMessage, results } = parsed.data;
    if (status === "ZERO_RESULTS") {
      return [];
    }
    if (status !== "OK") {
      const statusCode = REJECTED_STATUSES.has(status) ? 400 : 502;
      this.log.warn({ path, status, upstreamMessage }, "places.upstream_error");
      throw new GatewayError(upstreamMessage ?? `Place lookup failed with status ${status}`, statusCode, { status });
    }

    // Skip individual results that lack an id or coordinates rather than failing the lookup
    const places: PlaceResult[] = [];
    for (const raw of results) {
      const place = PlaceResultSchema.safeParse(raw);
      if (place.success) {
        places.push(place.data);
      } else {
        this.log.debug({ path }, "places.result_skipped");
      }
    }
    return places;
  }

  private toCandidate(place: PlaceResult): PlaceCandidate {
    return {
      placeId: place.place_id,
      name: place.name,
      address: place.formatted_address ?? ADDRESS_NOT_AVAILABLE,
      latitude: place.geometry.location.lat,
      longitude: place.geometry.location.lng,
    };
  }

  private toGatewayError(err: unknown, path: string): GatewayError {
    if (axios.isAxiosError(err)) {
      if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
        this.log.error({ path, code: err.code }, "places.timeout");
        return new GatewayError("Place lookup timed out", 502);
      }

      const status = err.response?.status;
      if (status !== undefined) {
        const upstream = PlacesResponseSchema.partial().safeParse(err.response?.data);
        const upstreamMessage = upstream.success ? upstream.data.error_message : undefined;
        this.log.error({ path, status, upstreamMessage }, "places.http_error");
        return new GatewayError(
          upstreamMessage ?? `Place lookup service responded with ${status}`,
          status >= 500 ? 502 : 400,
          { status },
        );
      }

      this.log.error({ path, err: err.message }, "places.unreachable");
      return new GatewayError("Place lookup service is unavailable", 502);
    }

    this.log.error({ path, err }, "places.unexpected_error");
    return new GatewayError("Place lookup failed", 502);
  }
}
