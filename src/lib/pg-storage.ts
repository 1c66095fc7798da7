/**
 * PostgreSQL Key-Value Storage
 * Stores each key as one row with a jsonb value
 *
 * Table (created by ensureSchema):
 *   key_value_store(key text primary key, value jsonb, updated_at timestamptz)
 */

import { CACHE } from "../config/constants.js";
import type { KeyValueStorage, StorageReadResult } from "./storage.js";

/** The part of pg.Pool this storage needs */
export interface Queryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export class PgKeyValueStorage implements KeyValueStorage {
  constructor(
    private readonly db: Queryable,
    private readonly table: string = CACHE.PG_TABLE
  ) {
    if (!/^[a-z_][a-z0-9_]*$/.test(table)) {
      throw new Error(`Invalid table name: ${table}`);
    }
  }

  async ensureSchema(): Promise<void> {
    await this.db.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        key TEXT PRIMARY KEY,
        value JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )`
    );
  }

  async get(key: string): Promise<StorageReadResult> {
    const result = await this.db.query(
      `SELECT value FROM ${this.table} WHERE key = $1`,
      [key]
    );
    const row = result.rows[0];
    if (!row) return { status: "missing" };
    if (!("value" in row)) {
      return { status: "type-mismatch", reason: "row has no value column" };
    }
    return { status: "found", value: row.value };
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.table} (key, value, updated_at)
       VALUES ($1, $2::jsonb, now())
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = now()`,
      [key, JSON.stringify(value)]
    );
  }

  /**
   * Upsert several keys in one statement, which Postgres applies atomically
   */
  async setMany(entries: Record<string, unknown>): Promise<void> {
    const keys = Object.keys(entries);
    if (keys.length === 0) return;

    const values: string[] = [];
    const rows = keys.map((key, index) => {
      values.push(key, JSON.stringify(entries[key]));
      return `($${index * 2 + 1}, $${index * 2 + 2}::jsonb, now())`;
    });

    await this.db.query(
      `INSERT INTO ${this.table} (key, value, updated_at)
       VALUES ${rows.join(", ")}
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = now()`,
      values
    );
  }

  async remove(key: string): Promise<void> {
    await this.db.query(`DELETE FROM ${this.table} WHERE key = $1`, [key]);
  }
}
