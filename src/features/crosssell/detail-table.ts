import { aggregateBy, first, latestBy, max, sum } from "@/features/crosssell/aggregate";
import { compareIdentifiers } from "@/features/sales/repository";
import type {
  BothProductsDetailRow,
  CrossSellResult,
  CustomerId,
  DetailTables,
  ProductId,
  SingleProductDetailRow,
  TransactionRecord
} from "@/types/domain";

type SharedColumns = Omit<SingleProductDetailRow, "productDescription">;

const emissionDateOf = (record: TransactionRecord) => record.emissionDate;

function sharedColumns(group: TransactionRecord[], customerId: CustomerId): SharedColumns {
  return {
    customerId,
    legalName: first((record: TransactionRecord) => record.legalName)(group),
    city: first((record: TransactionRecord) => record.city)(group),
    activity: first((record: TransactionRecord) => record.activity)(group),
    network: first((record: TransactionRecord) => record.network)(group),
    lastSalesperson: latestBy((record: TransactionRecord) => record.salespersonId, emissionDateOf)(group),
    lastPurchase: max(emissionDateOf)(group),
    totalQuantity: sum((record: TransactionRecord) => record.quantity)(group)
  };
}

function byLastPurchaseDesc<TRow extends { lastPurchase: string }>(rows: TRow[]): TRow[] {
  // Array.prototype.sort is stable, so equal dates keep customer order
  return [...rows].sort((a, b) => b.lastPurchase.localeCompare(a.lastPurchase));
}

function firstDescriptions(records: TransactionRecord[], productId: ProductId): Map<CustomerId, string | null> {
  const descriptions = new Map<CustomerId, string | null>();
  const groups = aggregateBy(
    records.filter((record) => record.productId === productId),
    (record) => record.customerId,
    first((record: TransactionRecord) => record.productDescription),
    compareIdentifiers
  );
  for (const { key, row } of groups) {
    descriptions.set(key, row);
  }
  return descriptions;
}

/** One row per customer of an A-only or B-only partition, over that product's sales only. */
export function buildSingleProductTable(
  records: TransactionRecord[],
  customerIds: Iterable<CustomerId>,
  productId: ProductId
): SingleProductDetailRow[] {
  const members = new Set(customerIds);
  if (members.size === 0) {
    return [];
  }

  const matching = records.filter((record) => members.has(record.customerId) && record.productId === productId);
  const groups = aggregateBy(
    matching,
    (record) => record.customerId,
    (group, customerId) => ({
      ...sharedColumns(group, customerId),
      productDescription: first((record: TransactionRecord) => record.productDescription)(group)
    }),
    compareIdentifiers
  );

  return byLastPurchaseDesc(groups.map((group) => group.row));
}

/**
 * One row per customer who bought both products. Quantities and dates cover every
 * sale of the customer in the window; `products` joins the first description seen
 * for each product.
 */
export function buildBothProductsTable(
  records: TransactionRecord[],
  customerIds: Iterable<CustomerId>,
  productA: ProductId,
  productB: ProductId
): BothProductsDetailRow[] {
  const members = new Set(customerIds);
  if (members.size === 0) {
    return [];
  }

  const matching = records.filter((record) => members.has(record.customerId));
  const descriptionsA = firstDescriptions(matching, productA);
  const descriptionsB = firstDescriptions(matching, productB);

  const groups = aggregateBy(
    matching,
    (record) => record.customerId,
    (group, customerId) => ({
      ...sharedColumns(group, customerId),
      products: `${descriptionsA.get(customerId) ?? ""} | ${descriptionsB.get(customerId) ?? ""}`
    }),
    compareIdentifiers
  );

  return byLastPurchaseDesc(groups.map((group) => group.row));
}

export function buildDetailTables(
  records: TransactionRecord[],
  analysis: Pick<CrossSellResult, "onlyA" | "onlyB" | "both">,
  productA: ProductId,
  productB: ProductId
): DetailTables {
  return {
    onlyA: buildSingleProductTable(records, analysis.onlyA, productA),
    onlyB: buildSingleProductTable(records, analysis.onlyB, productB),
    both: buildBothProductsTable(records, analysis.both, productA, productB)
  };
}
