import { CrossSellError } from "@/lib/errors";
import { analyzeCrossSell, conversionRate } from "@/features/crosssell/analyze";
import { buildDetailTables } from "@/features/crosssell/detail-table";
import { applyFilters } from "@/features/crosssell/filters";
import { withSalesSource, type SalesRepository } from "@/features/sales/repository";
import type { CrossSellReport, CrossSellRequest, DateRange, TransactionRecord } from "@/types/domain";

export const NO_DATA_MESSAGE = "Nenhum dado encontrado para o período selecionado.";
export const SAME_PRODUCT_MESSAGE = "Por favor, selecione produtos diferentes para Produto A e Produto B.";

export async function loadPeriod(repository: SalesRepository, period: DateRange): Promise<TransactionRecord[]> {
  const records = await withSalesSource(() => repository.fetchSales(period));
  if (records.length === 0) {
    throw new CrossSellError("NO_DATA", NO_DATA_MESSAGE);
  }
  return records;
}

export async function runCrossSellReport(repository: SalesRepository, request: CrossSellRequest): Promise<CrossSellReport> {
  const records = await loadPeriod(repository, request.period);
  const filtered = applyFilters(records, request.filters);

  if (request.productA === request.productB) {
    throw new CrossSellError("SAME_PRODUCT", SAME_PRODUCT_MESSAGE);
  }

  const analysis = analyzeCrossSell(filtered, request.productA, request.productB);

  return {
    period: request.period,
    productA: request.productA,
    productB: request.productB,
    loadedCount: records.length,
    filteredCount: filtered.length,
    analysis,
    conversionRate: conversionRate(analysis),
    tables: buildDetailTables(filtered, analysis, request.productA, request.productB)
  };
}
