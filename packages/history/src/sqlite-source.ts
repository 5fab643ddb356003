// packages/history/src/sqlite-source.ts
import Database from "better-sqlite3";

import { canonicalizeSalesHistory } from "./canonicalize.js";
import type { SalesRecord } from "./schema.js";
import type { SalesHistorySource } from "./source.js";

type SalesRow = {
  date: string;
  sku_id: string;
  site_id: string;
  qty: number;
};

export type SqliteSalesHistoryOptions = {
  table?: string; // default "sales_history"
};

const IDENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Reads sales rows from a SQLite table with columns
 * (date TEXT, sku_id TEXT, site_id TEXT, qty REAL).
 *
 * Given a filename the database is opened read-only and must exist.
 * Given an open handle the caller keeps ownership of it.
 */
export class SqliteSalesHistorySource implements SalesHistorySource {
  private db: Database.Database;
  private readonly table: string;
  private readonly ownsDb: boolean;

  constructor(db: Database.Database | string, opts: SqliteSalesHistoryOptions = {}) {
    const table = opts.table ?? "sales_history";
    if (!IDENT.test(table)) throw new Error(`Invalid sales table name: ${table}`);
    this.table = table;

    if (typeof db === "string") {
      this.db = new Database(db, { readonly: true, fileMustExist: true });
      this.ownsDb = true;
    } else {
      this.db = db;
      this.ownsDb = false;
    }
  }

  async listSales(sku_id: string, site_id: string): Promise<SalesRecord[]> {
    const rows = this.db
      .prepare<[string, string], SalesRow>(
        `SELECT date, sku_id, site_id, qty
         FROM ${this.table}
         WHERE sku_id = ? AND site_id = ?`
      )
      .all(sku_id, site_id);

    return canonicalizeSalesHistory(rows.map(toRecord));
  }

  async listAll(): Promise<SalesRecord[]> {
    const rows = this.db
      .prepare<[], SalesRow>(`SELECT date, sku_id, site_id, qty FROM ${this.table}`)
      .all();

    return canonicalizeSalesHistory(rows.map(toRecord));
  }

  close(): void {
    if (this.ownsDb) this.db.close();
  }
}

// SQLite is loosely typed; a numeric date or text qty still comes back usable
function toRecord(r: SalesRow): SalesRecord {
  return {
    date: String(r.date),
    sku_id: String(r.sku_id),
    site_id: String(r.site_id),
    qty: Number(r.qty),
  };
}
