import { NextResponse } from "next/server";

import { toErrorResponse } from "@/lib/api-response";
import { collectFilterOptions } from "@/features/crosssell/filters";
import { periodSchema } from "@/features/crosssell/request-schema";
import { loadPeriod } from "@/features/crosssell/report";
import { getSalesRepository } from "@/features/sales/source";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  try {
    const params = new URL(request.url).searchParams;
    const period = periodSchema.parse({
      startDate: params.get("startDate") ?? undefined,
      endDate: params.get("endDate") ?? undefined
    });

    const records = await loadPeriod(getSalesRepository(), period);

    return NextResponse.json({
      period,
      loadedCount: records.length,
      options: collectFilterOptions(records)
    });
  } catch (error) {
    return toErrorResponse(error, "Erro ao carregar opções");
  }
}
