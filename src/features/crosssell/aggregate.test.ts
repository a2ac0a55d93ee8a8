import { describe, expect, it } from "vitest";

import { aggregateBy, first, latestBy, max, sum } from "@/features/crosssell/aggregate";

interface Sale {
  customer: string;
  date: string;
  seller: string | null;
  units: number;
}

const byText = (a: string, b: string) => a.localeCompare(b);

describe("aggregateBy", () => {
  it("emits one row per key in key order", () => {
    const sales: Sale[] = [
      { customer: "b", date: "2024-01-01", seller: "S1", units: 1 },
      { customer: "a", date: "2024-01-02", seller: "S2", units: 2 },
      { customer: "b", date: "2024-01-03", seller: "S3", units: 3 }
    ];

    const groups = aggregateBy(sales, (sale) => sale.customer, (group, key) => `${key}:${group.length}`, byText);

    expect(groups).toEqual([
      { key: "a", row: "a:1" },
      { key: "b", row: "b:2" }
    ]);
  });

  it("returns no groups for no records", () => {
    expect(aggregateBy<Sale, string, number>([], (sale) => sale.customer, (group) => group.length, byText)).toEqual([]);
  });
});

describe("reducers", () => {
  const group: Sale[] = [
    { customer: "a", date: "2024-01-02", seller: null, units: 2 },
    { customer: "a", date: "2024-01-09", seller: "S2", units: 5 },
    { customer: "a", date: "2024-01-09", seller: "S3", units: 1 },
    { customer: "a", date: "2024-01-20", seller: null, units: 4 }
  ];

  it("first skips missing values", () => {
    expect(first((sale: Sale) => sale.seller)(group)).toBe("S2");
    expect(first((sale: Sale) => sale.seller)([group[0]])).toBeNull();
  });

  it("max picks the latest date", () => {
    expect(max((sale: Sale) => sale.date)(group)).toBe("2024-01-20");
  });

  it("sum adds every value", () => {
    expect(sum((sale: Sale) => sale.units)(group)).toBe(12);
  });

  it("latestBy takes the newest record that has a value, earliest on ties", () => {
    expect(latestBy((sale: Sale) => sale.seller, (sale) => sale.date)(group)).toBe("S2");
  });

  it("latestBy is null when no record has a value", () => {
    expect(latestBy((sale: Sale) => sale.seller, (sale) => sale.date)([group[0], group[3]])).toBeNull();
  });
});
