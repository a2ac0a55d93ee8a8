import { compareIdentifiers } from "@/features/sales/repository";
import type { CrossSellResult, CustomerId, ProductId, TransactionRecord } from "@/types/domain";

function customersOf(records: TransactionRecord[], productId: ProductId): Set<CustomerId> {
  const customers = new Set<CustomerId>();
  for (const record of records) {
    if (record.productId === productId) {
      customers.add(record.customerId);
    }
  }
  return customers;
}

function sorted(values: Iterable<CustomerId>): CustomerId[] {
  return Array.from(values).sort(compareIdentifiers);
}

/**
 * Splits the buyers of two products into A-only, B-only and both.
 * Callers must reject `productA === productB` before calling.
 */
export function analyzeCrossSell(records: TransactionRecord[], productA: ProductId, productB: ProductId): CrossSellResult {
  const customersA = customersOf(records, productA);
  const customersB = customersOf(records, productB);

  const onlyA = sorted([...customersA].filter((customer) => !customersB.has(customer)));
  const onlyB = sorted([...customersB].filter((customer) => !customersA.has(customer)));
  const both = sorted([...customersA].filter((customer) => customersB.has(customer)));

  return {
    customersA: sorted(customersA),
    customersB: sorted(customersB),
    onlyA,
    onlyB,
    both,
    totalA: customersA.size,
    totalB: customersB.size,
    countOnlyA: onlyA.length,
    countOnlyB: onlyB.length,
    countBoth: both.length,
    totalCustomers: onlyA.length + onlyB.length + both.length
  };
}

/** Share of product A buyers who also bought product B, in percent. */
export function conversionRate(result: Pick<CrossSellResult, "countBoth" | "totalA">): number {
  return result.totalA > 0 ? (result.countBoth / result.totalA) * 100 : 0;
}
