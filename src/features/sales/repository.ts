import { CrossSellError } from "@/lib/errors";
import type { DateRange, ProductId, TransactionRecord } from "@/types/domain";

export interface SalesRepository {
  /** Sales whose emission date lies in the inclusive range, newest first. */
  fetchSales(range: DateRange): Promise<TransactionRecord[]>;
  listProducts(): Promise<ProductId[]>;
  listCities(): Promise<string[]>;
  listSalespeople(): Promise<string[]>;
}

const collator = new Intl.Collator("pt-BR", { numeric: true });

export function compareIdentifiers(a: string, b: string): number {
  return collator.compare(a, b);
}

export function sortedDistinct(values: Array<string | null>): string[] {
  const distinct = new Set<string>();
  for (const value of values) {
    if (value) {
      distinct.add(value);
    }
  }
  return Array.from(distinct).sort(compareIdentifiers);
}

export function newestFirst(records: TransactionRecord[]): TransactionRecord[] {
  return [...records].sort((a, b) => b.emissionDate.localeCompare(a.emissionDate));
}

export function isInRange(date: string, range: DateRange): boolean {
  return date >= range.startDate && date <= range.endDate;
}

/** Runs a store call, reporting any failure as an unavailable source. */
export async function withSalesSource<T>(call: () => Promise<T>, message = "Erro ao carregar dados"): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof CrossSellError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new CrossSellError("SOURCE_UNAVAILABLE", `${message}: ${detail}`, { cause: error });
  }
}
