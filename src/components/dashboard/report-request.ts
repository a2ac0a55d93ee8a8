import type { DateRange, ProductId, SalesFilters } from "@/types/domain";

export interface ReportRequestBody extends DateRange {
  productA: ProductId;
  productB: ProductId;
  filters: SalesFilters;
}

export function periodKey(period: DateRange): string {
  return `${period.startDate}|${period.endDate}`;
}

/**
 * Body of the next report request, or null while the selection is not ready:
 * the option lists must belong to the period on screen, so products chosen for
 * an earlier period are never sent with a new one.
 */
export function nextReportRequest(
  period: DateRange,
  optionsKey: string | null,
  productA: ProductId,
  productB: ProductId,
  filters: SalesFilters
): ReportRequestBody | null {
  if (optionsKey !== periodKey(period) || !productA || !productB) {
    return null;
  }
  return { ...period, productA, productB, filters };
}
