import { describe, expect, it } from "vitest";

import { canonicalizeSalesHistory } from "../src/canonicalize.js";
import { checkHistoryInvariants } from "../src/invariants.js";
import { addDays, toCalendarDate } from "../src/dates.js";

describe("calendar dates", () => {
  it("keeps the written day of ISO strings", () => {
    expect(toCalendarDate("2024-03-05")).toBe("2024-03-05");
    expect(toCalendarDate(" 2024-03-05T23:30:00-05:00 ")).toBe("2024-03-05");
  });

  it("keeps the written day of unpadded and month/day/year strings", () => {
    expect(toCalendarDate("2024-1-5")).toBe("2024-01-05");
    expect(toCalendarDate("2024-1-5 23:59")).toBe("2024-01-05");
    expect(toCalendarDate("01/05/2024")).toBe("2024-01-05");
    expect(toCalendarDate("1/5/2024 00:30")).toBe("2024-01-05");
  });

  it("does not depend on the host time zone", () => {
    const tz = process.env.TZ;
    try {
      for (const zone of ["Asia/Tokyo", "America/New_York", "UTC"]) {
        process.env.TZ = zone;
        expect([toCalendarDate("2024-1-5"), toCalendarDate("01/05/2024")]).toEqual(["2024-01-05", "2024-01-05"]);
      }
    } finally {
      if (tz === undefined) delete process.env.TZ;
      else process.env.TZ = tz;
    }
  });

  it("rejects impossible or unparseable dates", () => {
    expect(toCalendarDate("2024-02-30")).toBeNull();
    expect(toCalendarDate("2/30/2024")).toBeNull();
    expect(toCalendarDate("2024-1-50")).toBeNull();
    expect(toCalendarDate("Jan 5 2024")).toBeNull();
    expect(toCalendarDate("not a date")).toBeNull();
  });

  it("steps across month, leap-day and year boundaries", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
  });
});

describe("canonicalizeSalesHistory", () => {
  it("normalises dates and sorts by date, sku, site", () => {
    const out = canonicalizeSalesHistory([
      { date: "2024-01-02T10:00:00Z", sku_id: "SKU1", site_id: "S1", qty: 1 },
      { date: "2024-01-01", sku_id: "SKU2", site_id: "S1", qty: 2 },
      { date: "2024-01-01", sku_id: "SKU1", site_id: "S2", qty: 3 },
      { date: "2024-01-01", sku_id: "SKU1", site_id: "S1", qty: 4 },
    ]);

    expect(out).toEqual([
      { date: "2024-01-01", sku_id: "SKU1", site_id: "S1", qty: 4 },
      { date: "2024-01-01", sku_id: "SKU1", site_id: "S2", qty: 3 },
      { date: "2024-01-01", sku_id: "SKU2", site_id: "S1", qty: 2 },
      { date: "2024-01-02", sku_id: "SKU1", site_id: "S1", qty: 1 },
    ]);
  });

  it("leaves padded ids untouched", () => {
    const out = canonicalizeSalesHistory([{ date: "2024-1-2", sku_id: " SKU1", site_id: "S1 ", qty: 1 }]);
    expect(out).toEqual([{ date: "2024-01-02", sku_id: " SKU1", site_id: "S1 ", qty: 1 }]);
  });

  it("keeps id case and duplicate rows", () => {
    const out = canonicalizeSalesHistory([
      { date: "2024-01-01", sku_id: "sku1", site_id: "S1", qty: 1 },
      { date: "2024-01-01", sku_id: "sku1", site_id: "S1", qty: 1 },
    ]);
    expect(out).toHaveLength(2);
    expect(out[0]?.sku_id).toBe("sku1");
  });
});

describe("checkHistoryInvariants", () => {
  it("returns nothing for clean history", () => {
    expect(checkHistoryInvariants([{ date: "2024-01-01", sku_id: "A", site_id: "B", qty: 0 }])).toEqual([]);
  });

  it("reports empty ids, bad dates and bad quantities with paths", () => {
    const v = checkHistoryInvariants([
      { date: "2024-01-01", sku_id: " ", site_id: "B", qty: 1 },
      { date: "someday", sku_id: "A", site_id: "B", qty: -2 },
      { date: "2024-01-01", sku_id: "A", site_id: "", qty: Number.NaN },
    ]);

    expect(v.map((x) => [x.code, x.path])).toEqual([
      ["EMPTY_ID", "/0/sku_id"],
      ["INVALID_DATE", "/1/date"],
      ["NEGATIVE_QUANTITY", "/1/qty"],
      ["EMPTY_ID", "/2/site_id"],
      ["NON_FINITE_QUANTITY", "/2/qty"],
    ]);
  });

  it("reports ids with surrounding whitespace", () => {
    const v = checkHistoryInvariants([{ date: "2024-01-01", sku_id: " SKU1", site_id: "STORE1 ", qty: 1 }]);
    expect(v).toEqual([
      {
        code: "UNTRIMMED_ID",
        message: "Sales record sku_id ' SKU1' has leading or trailing whitespace",
        path: "/0/sku_id",
      },
      {
        code: "UNTRIMMED_ID",
        message: "Sales record site_id 'STORE1 ' has leading or trailing whitespace",
        path: "/0/site_id",
      },
    ]);
  });
});
