import { describe, expect, it } from "vitest";

import { nextReportRequest, periodKey } from "@/components/dashboard/report-request";
import { NO_FILTERS } from "@/features/crosssell/filters";

const january = { startDate: "2024-01-01", endDate: "2024-01-31" };
const february = { startDate: "2024-02-01", endDate: "2024-02-29" };

describe("nextReportRequest", () => {
  it("builds the body once the period's options are loaded", () => {
    expect(nextReportRequest(january, periodKey(january), "PA", "PB", NO_FILTERS)).toEqual({
      startDate: "2024-01-01",
      endDate: "2024-01-31",
      productA: "PA",
      productB: "PB",
      filters: NO_FILTERS
    });
  });

  it("waits while the options of a new period are loading", () => {
    expect(nextReportRequest(february, periodKey(january), "PA", "PB", NO_FILTERS)).toBeNull();
  });

  it("waits before any options have loaded", () => {
    expect(nextReportRequest(january, null, "PA", "PB", NO_FILTERS)).toBeNull();
  });

  it("waits until both products are chosen", () => {
    expect(nextReportRequest(january, periodKey(january), "PA", "", NO_FILTERS)).toBeNull();
  });
});
