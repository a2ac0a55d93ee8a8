import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { POST } from "@/app/api/cross-sell/route";
import { getSalesRepository } from "@/features/sales/source";
import { FailingSalesRepository, MemorySalesRepository } from "@/test/memory-repository";
import { makeRecord } from "@/test/records";

vi.mock("@/features/sales/source", () => ({ getSalesRepository: vi.fn() }));

const records = [
  makeRecord({ customerId: "C1", productId: "PA", emissionDate: "2024-01-01", quantity: 2 }),
  makeRecord({ customerId: "C1", productId: "PB", emissionDate: "2024-01-05", quantity: 1 }),
  makeRecord({ customerId: "C2", productId: "PA", emissionDate: "2024-01-02", quantity: 3 })
];

function post(body: unknown) {
  return POST(
    new Request("http://localhost/api/cross-sell", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: typeof body === "string" ? body : JSON.stringify(body)
    })
  );
}

const january = { startDate: "2024-01-01", endDate: "2024-01-31", productA: "PA", productB: "PB" };

describe("POST /api/cross-sell", () => {
  beforeEach(() => {
    vi.mocked(getSalesRepository).mockReturnValue(new MemorySalesRepository(records));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the report", async () => {
    const response = await post(january);
    const payload = await response.json();

    expect(response.status).toBe(200);
    expect(payload.report.analysis.both).toEqual(["C1"]);
    expect(payload.report.analysis.onlyA).toEqual(["C2"]);
    expect(payload.report.conversionRate).toBe(50);
  });

  it("answers 422 for the same product twice", async () => {
    const response = await post({ ...january, productB: "PA" });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: "Por favor, selecione produtos diferentes para Produto A e Produto B.",
      code: "SAME_PRODUCT"
    });
  });

  it("answers 404 for a period without sales", async () => {
    const response = await post({ ...january, startDate: "2023-01-01", endDate: "2023-01-31" });

    expect(response.status).toBe(404);
    expect((await response.json()).code).toBe("NO_DATA");
  });

  it("answers 400 for an invalid body", async () => {
    const response = await post({ ...january, startDate: "ontem" });

    expect(response.status).toBe(400);
    expect((await response.json()).code).toBe("INVALID_REQUEST");
  });

  it("answers 400 for malformed JSON", async () => {
    const response = await post("{");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Corpo da requisição não é um JSON válido.", code: "INVALID_REQUEST" });
  });

  it("answers 503 when the store is unreachable", async () => {
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.mocked(getSalesRepository).mockReturnValue(new FailingSalesRepository("timeout"));

    const response = await post(january);

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: "Erro ao carregar dados: timeout", code: "SOURCE_UNAVAILABLE" });
    expect(logged).toHaveBeenCalledTimes(1);
  });
});
