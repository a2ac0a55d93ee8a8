import ExcelJS from "exceljs";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { POST } from "@/app/api/cross-sell/export/route";
import { getSalesRepository } from "@/features/sales/source";
import { MemorySalesRepository } from "@/test/memory-repository";
import { makeRecord } from "@/test/records";

vi.mock("@/features/sales/source", () => ({ getSalesRepository: vi.fn() }));

const records = [
  makeRecord({ customerId: "C1", productId: "PA", emissionDate: "2024-01-01", quantity: 2, productDescription: "Cadeira" }),
  makeRecord({ customerId: "C1", productId: "PB", emissionDate: "2024-01-05", quantity: 1, productDescription: "Mesa" }),
  makeRecord({ customerId: "C2", productId: "PA", emissionDate: "2024-01-02", quantity: 3, productDescription: "Cadeira" })
];

function post(body: unknown) {
  return POST(
    new Request("http://localhost/api/cross-sell/export", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body)
    })
  );
}

const january = { startDate: "2024-01-01", endDate: "2024-01-31", productA: "PA", productB: "PB" };

describe("POST /api/cross-sell/export", () => {
  beforeEach(() => {
    vi.mocked(getSalesRepository).mockReturnValue(new MemorySalesRepository(records));
  });

  it("downloads the requested partition as a workbook", async () => {
    const response = await post({ ...january, partition: "both" });

    expect(response.status).toBe(200);
    expect(response.headers.get("Content-Type")).toBe("application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
    expect(response.headers.get("Content-Disposition")).toMatch(/^attachment; filename="clientes_ambos_\d{8}\.xlsx"$/);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(await response.arrayBuffer());
    const sheet = workbook.worksheets[0];

    expect(sheet.name).toBe("Ambos Produtos");
    expect(sheet.rowCount).toBe(2);
    expect(sheet.getRow(2).getCell(9).value).toBe("Cadeira | Mesa");
  });

  it("rejects an unknown partition", async () => {
    const response = await post({ ...january, partition: "nenhum" });

    expect(response.status).toBe(400);
    expect((await response.json()).code).toBe("INVALID_REQUEST");
  });
});
