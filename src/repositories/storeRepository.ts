import type Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type { Store, StoreId, StoreProductCount } from "../domain/catalog";

export interface StoreRow {
  id: string;
  place_id: string;
  name: string;
  address: string | null;
  latitude: number | null;
  longitude: number | null;
  is_online: number;
  visible: number;
  created_at: number;
  updated_at: number;
}

export interface NewStore {
  placeId: string;
  name: string;
  address: string | null;
  latitude: number | null;
  longitude: number | null;
  isOnline: boolean;
}

const now = () => Date.now();

export class StoreRepository {
  constructor(private readonly db: Database.Database) {}

  findById(id: StoreId): Store | undefined {
    const row = this.db.prepare(`SELECT * FROM stores WHERE id = ?`).get(id) as StoreRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  findByPlaceId(placeId: string): Store | undefined {
    const row = this.db
      .prepare(`SELECT * FROM stores WHERE place_id = ?`)
      .get(placeId) as StoreRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * Insert a new store. Throws the driver's UNIQUE constraint error when a
   * store with the same place_id already exists.
   */
  insert(store: NewStore): Store {
    const timestamp = now();
    const row = this.db
      .prepare(
        `INSERT INTO stores (
          id, place_id, name, address, latitude, longitude, is_online, visible, created_at, updated_at
        ) VALUES (@id, @place_id, @name, @address, @latitude, @longitude, @is_online, 1, @created_at, @updated_at)
        RETURNING *`
      )
      .get({
        id: randomUUID(),
        place_id: store.placeId,
        name: store.name,
        address: store.address,
        latitude: store.latitude,
        longitude: store.longitude,
        is_online: store.isOnline ? 1 : 0,
        created_at: timestamp,
        updated_at: timestamp,
      }) as StoreRow;

    return this.mapRow(row);
  }

  list(): Store[] {
    const rows = this.db.prepare(`SELECT * FROM stores ORDER BY name ASC, created_at ASC`).all() as StoreRow[];
    return rows.map((row) => this.mapRow(row));
  }

  /**
   * Visible stores that carry at least one priced product, with the number of
   * distinct products priced there. Most products first.
   */
  listWithProductCounts(): StoreProductCount[] {
    const rows = this.db
      .prepare(
        `SELECT s.*, COUNT(p.product_id) AS product_count
         FROM stores s
         JOIN prices p ON p.store_id = s.id
         WHERE s.visible = 1
         GROUP BY s.id
         ORDER BY product_count DESC, s.name ASC`
      )
      .all() as (StoreRow & { product_count: number })[];
    return rows.map((row) => ({ store: this.mapRow(row), productCount: row.product_count }));
  }

  setVisibility(id: StoreId, visible: boolean): Store | undefined {
    const row = this.db
      .prepare(`UPDATE stores SET visible = @visible, updated_at = @updated_at WHERE id = @id RETURNING *`)
      .get({ id, visible: visible ? 1 : 0, updated_at: now() }) as StoreRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  count(): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS total FROM stores`).get() as { total: number };
    return row.total;
  }

  mapRow(row: StoreRow): Store {
    return {
      id: row.id,
      placeId: row.place_id,
      name: row.name,
      address: row.address,
      latitude: row.latitude,
      longitude: row.longitude,
      isOnline: row.is_online === 1,
      visible: row.visible === 1,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

