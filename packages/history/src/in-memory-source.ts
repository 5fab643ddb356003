import { canonicalizeSalesHistory } from "./canonicalize.js";
import type { SalesRecord } from "./schema.js";
import type { SalesHistorySource } from "./source.js";

export class InMemorySalesHistorySource implements SalesHistorySource {
  private readonly records: readonly SalesRecord[];

  constructor(records: readonly SalesRecord[]) {
    this.records = canonicalizeSalesHistory(records);
  }

  async listSales(sku_id: string, site_id: string): Promise<SalesRecord[]> {
    return this.records
      .filter((r) => r.sku_id === sku_id && r.site_id === site_id)
      .map((r) => ({ ...r }));
  }

  async listAll(): Promise<SalesRecord[]> {
    return this.records.map((r) => ({ ...r }));
  }
}
