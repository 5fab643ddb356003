import type { SalesRecord } from "./schema.js";

/**
 * Read-only access to an external sales history store.
 * - Records come back canonicalized (see canonicalizeSalesHistory).
 * - Sources never write; derived series and statistics are not persisted.
 */
export type SalesHistorySource = {
  // exact, case-sensitive match on both ids
  listSales(sku_id: string, site_id: string): Promise<SalesRecord[]>;
  listAll(): Promise<SalesRecord[]>;
};
