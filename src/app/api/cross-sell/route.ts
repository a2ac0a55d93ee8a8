import { NextResponse } from "next/server";

import { toErrorResponse } from "@/lib/api-response";
import { crossSellRequestSchema } from "@/features/crosssell/request-schema";
import { runCrossSellReport } from "@/features/crosssell/report";
import { getSalesRepository } from "@/features/sales/source";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const body: unknown = await request.json();
    const parsed = crossSellRequestSchema.parse(body);

    const report = await runCrossSellReport(getSalesRepository(), parsed);
    return NextResponse.json({ report });
  } catch (error) {
    return toErrorResponse(error, "Erro na análise de venda cruzada");
  }
}
