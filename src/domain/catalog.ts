export type StoreId = string;
export type ProductId = string;
export type PriceId = string;

export interface Store {
  id: StoreId;
  placeId: string;
  name: string;
  address: string | null;
  latitude: number | null;
  longitude: number | null;
  isOnline: boolean;
  visible: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface Product {
  id: ProductId;
  name: string;
  description: string | null;
  brand: string | null;
  category: string | null;
  matchKey: string | null; // exact-match cross-source key, never fuzzy
  estimatedPrice: number | null;
  createdAt: number;
  updatedAt: number;
}

export interface Price {
  id: PriceId;
  productId: ProductId;
  storeId: StoreId;
  amount: number;
  currency: string;
  createdAt: number;
  updatedAt: number;
}

export interface PriceWithStore extends Price {
  store: Store;
}

export interface BarcodeLink {
  barcode: string;
  productId: ProductId;
  source: string;
  createdAt: number;
  updatedAt: number;
}

/**
 * A record returned by the place lookup service. Geocoded (address) results
 * carry no business name.
 */
export interface PlaceCandidate {
  placeId: string;
  name?: string;
  address: string;
  latitude: number;
  longitude: number;
}

/** Store fields as submitted by a client, before the directory resolves them. */
export interface StoreCandidate {
  placeId?: string | null;
  name?: string | null;
  address?: string | null;
  latitude?: number | null;
  longitude?: number | null;
  isOnline?: boolean | null;
}

export interface ProductInput {
  name?: string | null;
  description?: string | null;
  brand?: string | null;
  category?: string | null;
  matchKey?: string | null;
}

export const DEVICE_PLATFORMS = ["ios", "android", "web"] as const;
export type DevicePlatform = (typeof DEVICE_PLATFORMS)[number] | "unknown";

export interface Device {
  deviceId: string;
  platform: DevicePlatform;
  pushToken: string | null;
  /** Opaque client items, stored and returned as sent. */
  shoppingList: unknown[];
  createdAt: number;
  updatedAt: number;
}

export interface StoreProductCount {
  store: Store;
  productCount: number;
}
