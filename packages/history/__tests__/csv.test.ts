import { describe, expect, it } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import * as path from "node:path";

import { loadSalesCsv, parseSalesCsv } from "../src/csv.js";

describe("sales CSV", () => {
  it("parses rows and ignores extra columns", () => {
    const rows = parseSalesCsv(
      [
        "date,sku_id,site_id,qty,price",
        "2024-01-01,SKU1,STORE1,5,9.99",
        "2024-01-03,SKU1,STORE1,7,9.99",
        "2024-01-01,SKU2,STORE1,3,1.00",
        "",
      ].join("\n")
    );

    expect(rows).toEqual([
      { date: "2024-01-01", sku_id: "SKU1", site_id: "STORE1", qty: 5 },
      { date: "2024-01-03", sku_id: "SKU1", site_id: "STORE1", qty: 7 },
      { date: "2024-01-01", sku_id: "SKU2", site_id: "STORE1", qty: 3 },
    ]);
  });

  it("accepts quantity as the qty column and trims header names", () => {
    const rows = parseSalesCsv("date , sku_id,site_id, quantity\n2024-02-01,A,S1,2.5\n");
    expect(rows).toEqual([{ date: "2024-02-01", sku_id: "A", site_id: "S1", qty: 2.5 }]);
  });

  it("rejects a header without required columns", () => {
    expect(() => parseSalesCsv("date,sku_id,qty\n2024-01-01,SKU1,4\n")).toThrow(
      "Sales CSV is missing column(s): site_id"
    );
    expect(() => parseSalesCsv("date,sku_id,site_id\n2024-01-01,SKU1,S\n")).toThrow(
      "Sales CSV is missing column(s): qty"
    );
  });

  it("rejects non-numeric quantities and bad dates", () => {
    expect(() => parseSalesCsv("date,sku_id,site_id,qty\n2024-01-01,SKU1,S,lots\n")).toThrow();
    expect(() => parseSalesCsv("date,sku_id,site_id,qty\n2024-02-30,SKU1,S,1\n")).toThrow();
  });

  it("rejects rows with missing fields", () => {
    expect(() => parseSalesCsv("date,sku_id,site_id,qty\n2024-01-01,SKU1\n")).toThrow(/could not be parsed/);
  });

  it("loads a file from disk", () => {
    const dir = mkdtempSync(path.join(tmpdir(), "stockplan-csv-"));
    const file = path.join(dir, "sales_history.csv");
    writeFileSync(file, "date,sku_id,site_id,qty\n2024-05-01,SKU9,DC1,11\n", "utf8");

    expect(loadSalesCsv(file)).toEqual([{ date: "2024-05-01", sku_id: "SKU9", site_id: "DC1", qty: 11 }]);
  });
});
