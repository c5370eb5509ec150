import type Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type { Price, PriceWithStore, ProductId, StoreId } from "../domain/catalog";
import { StoreRepository, type StoreRow } from "./storeRepository";

interface PriceRow {
  id: string;
  product_id: string;
  store_id: string;
  amount: number;
  currency: string;
  created_at: number;
  updated_at: number;
}

// Store columns are prefixed with `store_`; the store id is p.store_id itself
type PriceStoreRow = PriceRow & {
  [K in Exclude<keyof StoreRow, "id"> as `store_${K}`]: StoreRow[K];
};

export interface PriceWrite {
  productId: ProductId;
  storeId: StoreId;
  amount: number;
  currency: string;
}

const now = () => Date.now();

const JOINED_COLUMNS = `
  p.*,
  s.place_id AS store_place_id,
  s.name AS store_name,
  s.address AS store_address,
  s.latitude AS store_latitude,
  s.longitude AS store_longitude,
  s.is_online AS store_is_online,
  s.visible AS store_visible,
  s.created_at AS store_created_at,
  s.updated_at AS store_updated_at
`;

export class PriceRepository {
  private readonly stores: StoreRepository;

  constructor(private readonly db: Database.Database) {
    this.stores = new StoreRepository(db);
  }

  /**
   * Storage-level upsert keyed by the (product_id, store_id) unique index.
   * An existing row keeps its id and created_at; amount, currency and
   * updated_at are overwritten.
   */
  upsert(write: PriceWrite): Price {
    const timestamp = now();
    const row = this.db
      .prepare(
        `INSERT INTO prices (id, product_id, store_id, amount, currency, created_at, updated_at)
         VALUES (@id, @product_id, @store_id, @amount, @currency, @created_at, @updated_at)
         ON CONFLICT(product_id, store_id) DO UPDATE
         SET amount = excluded.amount,
             currency = excluded.currency,
             updated_at = excluded.updated_at
         RETURNING *`
      )
      .get({
        id: randomUUID(),
        product_id: write.productId,
        store_id: write.storeId,
        amount: write.amount,
        currency: write.currency,
        created_at: timestamp,
        updated_at: timestamp,
      }) as PriceRow;

    return this.mapRow(row);
  }

  findByPair(productId: ProductId, storeId: StoreId): Price | undefined {
    const row = this.db
      .prepare(`SELECT * FROM prices WHERE product_id = ? AND store_id = ?`)
      .get(productId, storeId) as PriceRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  listAmountsForProduct(productId: ProductId): number[] {
    const rows = this.db
      .prepare(`SELECT amount FROM prices WHERE product_id = ?`)
      .all(productId) as { amount: number }[];
    return rows.map((row) => row.amount);
  }

  /**
   * Prices at visible stores joined with their store, cheapest first.
   */
  listForProduct(productId: ProductId): PriceWithStore[] {
    const rows = this.db
      .prepare(
        `SELECT ${JOINED_COLUMNS}
         FROM prices p
         JOIN stores s ON s.id = p.store_id
         WHERE p.product_id = ? AND s.visible = 1
         ORDER BY p.amount ASC, s.name ASC`
      )
      .all(productId) as PriceStoreRow[];

    return rows.map((row) => this.mapJoinedRow(row));
  }

  countForProduct(productId: ProductId): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS total FROM prices WHERE product_id = ?`)
      .get(productId) as { total: number };
    return row.total;
  }

  private mapRow(row: PriceRow): Price {
    return {
      id: row.id,
      productId: row.product_id,
      storeId: row.store_id,
      amount: row.amount,
      currency: row.currency,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private mapJoinedRow(row: PriceStoreRow): PriceWithStore {
    return {
      ...this.mapRow(row),
      store: this.stores.mapRow({
        id: row.store_id,
        place_id: row.store_place_id,
        name: row.store_name,
        address: row.store_address,
        latitude: row.store_latitude,
        longitude: row.store_longitude,
        is_online: row.store_is_online,
        visible: row.store_visible,
        created_at: row.store_created_at,
        updated_at: row.store_updated_at,
      }),
    };
  }
}
