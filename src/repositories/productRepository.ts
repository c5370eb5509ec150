import type Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type { Product, ProductId } from "../domain/catalog";

interface ProductRow {
  id: string;
  name: string;
  description: string | null;
  brand: string | null;
  category: string | null;
  match_key: string | null;
  estimated_price: number | null;
  created_at: number;
  updated_at: number;
}

export interface NewProduct {
  name: string;
  description: string | null;
  brand: string | null;
  category: string | null;
  matchKey: string | null;
}

export interface ProductSearch {
  name?: string;
  limit: number;
}

const now = () => Date.now();

// LIKE wildcards in user input are matched literally
const escapeLike = (value: string) => value.replace(/[\\%_]/g, (ch) => `\\${ch}`);

export class ProductRepository {
  constructor(private readonly db: Database.Database) {}

  findById(id: ProductId): Product | undefined {
    const row = this.db.prepare(`SELECT * FROM products WHERE id = ?`).get(id) as ProductRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  findByName(name: string): Product | undefined {
    const row = this.db.prepare(`SELECT * FROM products WHERE name = ?`).get(name) as ProductRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  findByMatchKey(matchKey: string): Product | undefined {
    const row = this.db
      .prepare(`SELECT * FROM products WHERE match_key = ?`)
      .get(matchKey) as ProductRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * Insert a new product with no estimated price. Throws the driver's UNIQUE
   * constraint error on a duplicate name or match key.
   */
  insert(product: NewProduct): Product {
    const timestamp = now();
    const row = this.db
      .prepare(
        `INSERT INTO products (
          id, name, description, brand, category, match_key, estimated_price, created_at, updated_at
        ) VALUES (@id, @name, @description, @brand, @category, @match_key, NULL, @created_at, @updated_at)
        RETURNING *`
      )
      .get({
        id: randomUUID(),
        name: product.name,
        description: product.description,
        brand: product.brand,
        category: product.category,
        match_key: product.matchKey,
        created_at: timestamp,
        updated_at: timestamp,
      }) as ProductRow;

    return this.mapRow(row);
  }

  setEstimatedPrice(id: ProductId, estimatedPrice: number | null): Product | undefined {
    const row = this.db
      .prepare(
        `UPDATE products
         SET estimated_price = @estimated_price,
             updated_at = @updated_at
         WHERE id = @id
         RETURNING *`
      )
      .get({ id, estimated_price: estimatedPrice, updated_at: now() }) as ProductRow | undefined;
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * Most recently updated first. `name` is a case-insensitive substring match.
   */
  search({ name, limit }: ProductSearch): Product[] {
    const rows = name
      ? (this.db
          .prepare(
            `SELECT * FROM products
             WHERE name LIKE @pattern ESCAPE '\\'
             ORDER BY updated_at DESC, name ASC
             LIMIT @limit`
          )
          .all({ pattern: `%${escapeLike(name)}%`, limit }) as ProductRow[])
      : (this.db
          .prepare(`SELECT * FROM products ORDER BY updated_at DESC, name ASC LIMIT @limit`)
          .all({ limit }) as ProductRow[]);

    return rows.map((row) => this.mapRow(row));
  }

  listCategories(): string[] {
    const rows = this.db
      .prepare(`SELECT DISTINCT category FROM products WHERE category IS NOT NULL ORDER BY category ASC`)
      .all() as { category: string }[];
    return rows.map((row) => row.category);
  }

  count(): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS total FROM products`).get() as { total: number };
    return row.total;
  }

  private mapRow(row: ProductRow): Product {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      brand: row.brand,
      category: row.category,
      matchKey: row.match_key,
      estimatedPrice: row.estimated_price,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
