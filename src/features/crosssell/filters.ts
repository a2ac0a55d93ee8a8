import { sortedDistinct } from "@/features/sales/repository";
import type { FilterField, FilterOptions, FilterValue, ReferenceLists, SalesFilters, TransactionRecord } from "@/types/domain";

export const NO_FILTERS: SalesFilters = {
  city: "all",
  salesperson: "all",
  activity: "all",
  network: "all"
};

type AttributeOf = (record: TransactionRecord) => string | null;

interface Predicate {
  attribute: AttributeOf;
  accepted: Set<string>;
}

const FILTER_FIELDS: FilterField[] = ["city", "salesperson", "activity", "network"];

const FILTER_ATTRIBUTES: Record<FilterField, AttributeOf> = {
  city: (record) => record.city,
  salesperson: (record) => record.salespersonId,
  activity: (record) => record.activity,
  network: (record) => record.network
};

function restriction(value: FilterValue): Set<string> | null {
  if (value === "all" || value.length === 0) {
    return null;
  }
  return new Set(value);
}

export function applyFilters(records: TransactionRecord[], filters: SalesFilters): TransactionRecord[] {
  const predicates: Predicate[] = [];
  for (const field of FILTER_FIELDS) {
    const accepted = restriction(filters[field]);
    if (accepted) {
      predicates.push({ attribute: FILTER_ATTRIBUTES[field], accepted });
    }
  }

  if (predicates.length === 0) {
    return records;
  }

  return records.filter((record) =>
    predicates.every(({ attribute, accepted }) => {
      const value = attribute(record);
      return value !== null && accepted.has(value);
    })
  );
}

export function collectFilterOptions(records: TransactionRecord[]): FilterOptions {
  return {
    products: sortedDistinct(records.map((record) => record.productId)),
    cities: sortedDistinct(records.map(FILTER_ATTRIBUTES.city)),
    salespeople: sortedDistinct(records.map(FILTER_ATTRIBUTES.salesperson)),
    activities: sortedDistinct(records.map(FILTER_ATTRIBUTES.activity)),
    networks: sortedDistinct(records.map(FILTER_ATTRIBUTES.network))
  };
}

function within(values: string[], allowed: string[]): string[] {
  const accepted = new Set(allowed);
  return values.filter((value) => accepted.has(value));
}

/**
 * Narrows the period's products, cities and salespeople to the store's reference
 * lists (catalog products, cities of the region, active salespeople).
 * Without reference lists the options are returned as they are.
 */
export function restrictToReference(options: FilterOptions, reference: ReferenceLists | null): FilterOptions {
  if (!reference) {
    return options;
  }
  return {
    ...options,
    products: within(options.products, reference.products),
    cities: within(options.cities, reference.cities),
    salespeople: within(options.salespeople, reference.salespeople)
  };
}
