import { NextResponse } from "next/server";

import { toErrorResponse } from "@/lib/api-response";
import { crossSellRequestSchema, exportPartitionSchema } from "@/features/crosssell/request-schema";
import { runCrossSellReport } from "@/features/crosssell/report";
import { buildDetailWorkbook, exportFileName, XLSX_MIME_TYPE, type DetailExport } from "@/features/export/workbook";
import { getSalesRepository } from "@/features/sales/source";
import type { DetailTables, Partition } from "@/types/domain";

export const runtime = "nodejs";

function pickTable(tables: DetailTables, partition: Partition): DetailExport {
  switch (partition) {
    case "onlyA":
      return { partition, rows: tables.onlyA };
    case "onlyB":
      return { partition, rows: tables.onlyB };
    case "both":
      return { partition, rows: tables.both };
  }
}

export async function POST(request: Request) {
  try {
    const body: unknown = await request.json();
    const parsed = crossSellRequestSchema.parse(body);
    const { partition } = exportPartitionSchema.parse(body);

    const report = await runCrossSellReport(getSalesRepository(), parsed);
    const workbook = await buildDetailWorkbook(pickTable(report.tables, partition));

    return new NextResponse(workbook, {
      status: 200,
      headers: {
        "Content-Type": XLSX_MIME_TYPE,
        "Content-Disposition": `attachment; filename="${exportFileName(partition, new Date())}"`
      }
    });
  } catch (error) {
    return toErrorResponse(error, "Erro ao exportar planilha");
  }
}
