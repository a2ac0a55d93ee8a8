import { beforeEach, describe, expect, it, vi } from "vitest";

import { GET } from "@/app/api/options/route";
import { getSalesRepository } from "@/features/sales/source";
import { MemorySalesRepository } from "@/test/memory-repository";
import { makeRecord } from "@/test/records";

vi.mock("@/features/sales/source", () => ({ getSalesRepository: vi.fn() }));

const records = [
  makeRecord({ customerId: "C1", productId: "PB", emissionDate: "2024-01-05", city: "Contagem", salespersonId: "V2", activity: "Varejo" }),
  makeRecord({ customerId: "C2", productId: "PA", emissionDate: "2024-01-02", city: "Betim", salespersonId: "V1", network: "Rede Sul" }),
  makeRecord({ customerId: "C3", productId: "PC", emissionDate: "2024-03-02", city: "Ipatinga" })
];

describe("GET /api/options", () => {
  beforeEach(() => {
    vi.mocked(getSalesRepository).mockReturnValue(new MemorySalesRepository(records));
  });

  it("lists the filter values of the period", async () => {
    const response = await GET(new Request("http://localhost/api/options?startDate=2024-01-01&endDate=2024-01-31"));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      period: { startDate: "2024-01-01", endDate: "2024-01-31" },
      loadedCount: 2,
      options: {
        products: ["PA", "PB"],
        cities: ["Betim", "Contagem"],
        salespeople: ["V1", "V2"],
        activities: ["Varejo"],
        networks: ["Rede Sul"]
      }
    });
  });

  it("requires both dates", async () => {
    const response = await GET(new Request("http://localhost/api/options?startDate=2024-01-01"));

    expect(response.status).toBe(400);
    expect((await response.json()).error).toMatch(/^Requisição inválida: endDate: /);
  });
});
