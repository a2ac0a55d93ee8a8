import { QueryCache } from "@/lib/query-cache";
import type { SalesRepository } from "@/features/sales/repository";
import type { DateRange, TransactionRecord } from "@/types/domain";

export interface SalesCaches {
  sales: QueryCache<TransactionRecord[]>;
  lists: QueryCache<string[]>;
}

export function createSalesCaches(ttlMs: number, now?: () => number): SalesCaches {
  return {
    sales: new QueryCache<TransactionRecord[]>({ ttlMs, now }),
    lists: new QueryCache<string[]>({ ttlMs, now })
  };
}

export class CachedSalesRepository implements SalesRepository {
  constructor(
    private readonly inner: SalesRepository,
    private readonly caches: SalesCaches
  ) {}

  fetchSales(range: DateRange): Promise<TransactionRecord[]> {
    return this.caches.sales.getOrLoad(`${range.startDate}|${range.endDate}`, () => this.inner.fetchSales(range));
  }

  listProducts(): Promise<string[]> {
    return this.caches.lists.getOrLoad("products", () => this.inner.listProducts());
  }

  listCities(): Promise<string[]> {
    return this.caches.lists.getOrLoad("cities", () => this.inner.listCities());
  }

  listSalespeople(): Promise<string[]> {
    return this.caches.lists.getOrLoad("salespeople", () => this.inner.listSalespeople());
  }
}
