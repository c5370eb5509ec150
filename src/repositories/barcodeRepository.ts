import type Database from "better-sqlite3";
import type { BarcodeLink, ProductId } from "../domain/catalog";

interface BarcodeRow {
  barcode: string;
  product_id: string;
  source: string;
  created_at: number;
  updated_at: number;
}

const now = () => Date.now();

export class BarcodeRepository {
  constructor(private readonly db: Database.Database) {}

  find(barcode: string): BarcodeLink | undefined {
    const row = this.db.prepare(`SELECT * FROM barcodes WHERE barcode = ?`).get(barcode) as BarcodeRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * Link a barcode to a product, replacing any previous link for the barcode.
   */
  link(barcode: string, productId: ProductId, source: string): BarcodeLink {
    const timestamp = now();
    const row = this.db
      .prepare(
        `INSERT INTO barcodes (barcode, product_id, source, created_at, updated_at)
         VALUES (@barcode, @product_id, @source, @created_at, @updated_at)
         ON CONFLICT(barcode) DO UPDATE
         SET product_id = excluded.product_id,
             source = excluded.source,
             updated_at = excluded.updated_at
         RETURNING *`
      )
      .get({ barcode, product_id: productId, source, created_at: timestamp, updated_at: timestamp }) as BarcodeRow;
    return this.mapRow(row);
  }

  unlink(barcode: string): boolean {
    const result = this.db.prepare(`DELETE FROM barcodes WHERE barcode = ?`).run(barcode);
    return result.changes > 0;
  }

  private mapRow(row: BarcodeRow): BarcodeLink {
    return {
      barcode: row.barcode,
      productId: row.product_id,
      source: row.source,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
