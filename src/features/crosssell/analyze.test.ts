import { describe, expect, it } from "vitest";

import { analyzeCrossSell, conversionRate } from "@/features/crosssell/analyze";
import { makeRecord } from "@/test/records";

const records = [
  makeRecord({ customerId: "C1", productId: "PA", emissionDate: "2024-01-01", quantity: 2 }),
  makeRecord({ customerId: "C1", productId: "PB", emissionDate: "2024-01-05", quantity: 1 }),
  makeRecord({ customerId: "C2", productId: "PA", emissionDate: "2024-01-02", quantity: 3 })
];

describe("analyzeCrossSell", () => {
  it("splits buyers of two products into only-A, only-B and both", () => {
    const result = analyzeCrossSell(records, "PA", "PB");

    expect(result.onlyA).toEqual(["C2"]);
    expect(result.onlyB).toEqual([]);
    expect(result.both).toEqual(["C1"]);
    expect([result.countOnlyA, result.countOnlyB, result.countBoth]).toEqual([1, 0, 1]);
    expect(result.totalA).toBe(2);
    expect(result.totalB).toBe(1);
    expect(result.totalCustomers).toBe(2);
    expect(conversionRate(result)).toBe(50);
  });

  it("returns empty partitions and a zero rate for no records", () => {
    const result = analyzeCrossSell([], "PA", "PB");

    expect(result).toEqual({
      customersA: [],
      customersB: [],
      onlyA: [],
      onlyB: [],
      both: [],
      totalA: 0,
      totalB: 0,
      countOnlyA: 0,
      countOnlyB: 0,
      countBoth: 0,
      totalCustomers: 0
    });
    expect(conversionRate(result)).toBe(0);
  });

  it("counts a repeat buyer once", () => {
    const repeated = [
      makeRecord({ customerId: "C9", productId: "PA", emissionDate: "2024-03-01" }),
      makeRecord({ customerId: "C9", productId: "PA", emissionDate: "2024-03-02" }),
      makeRecord({ customerId: "C9", productId: "PA", emissionDate: "2024-03-03" })
    ];

    const result = analyzeCrossSell(repeated, "PA", "PB");

    expect(result.customersA).toEqual(["C9"]);
    expect(result.totalA).toBe(1);
    expect(result.onlyA).toEqual(["C9"]);
  });

  it("ignores customers who bought neither product", () => {
    const withOthers = [...records, makeRecord({ customerId: "C7", productId: "PZ", emissionDate: "2024-01-03" })];

    const result = analyzeCrossSell(withOthers, "PA", "PB");

    expect([...result.onlyA, ...result.onlyB, ...result.both]).not.toContain("C7");
  });

  it("keeps partitions disjoint and covering A and B", () => {
    const customers = ["1", "2", "3", "4", "5", "6", "7", "8", "9", "10", "11", "12"];
    const mixed = customers.flatMap((customerId, index) => {
      const sales = [];
      if (index % 2 === 0) {
        sales.push(makeRecord({ customerId, productId: "PA", emissionDate: "2024-05-01" }));
      }
      if (index % 3 === 0) {
        sales.push(makeRecord({ customerId, productId: "PB", emissionDate: "2024-05-02" }));
      }
      return sales;
    });

    const result = analyzeCrossSell(mixed, "PA", "PB");
    const union = new Set([...result.customersA, ...result.customersB]);
    const partitioned = [...result.onlyA, ...result.onlyB, ...result.both];

    expect(new Set(partitioned).size).toBe(partitioned.length);
    expect(new Set(partitioned)).toEqual(union);
    expect(result.countOnlyA + result.countBoth).toBe(result.totalA);
    expect(result.countOnlyB + result.countBoth).toBe(result.totalB);
    expect(result.both).toEqual(["1", "7"]);
  });

  it("orders customer ids numerically", () => {
    const numeric = ["10", "9", "100"].map((customerId) => makeRecord({ customerId, productId: "PA", emissionDate: "2024-01-01" }));

    expect(analyzeCrossSell(numeric, "PA", "PB").onlyA).toEqual(["9", "10", "100"]);
  });
});
