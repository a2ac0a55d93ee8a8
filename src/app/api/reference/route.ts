import { NextResponse } from "next/server";

import { toErrorResponse } from "@/lib/api-response";
import { withSalesSource } from "@/features/sales/repository";
import { getSalesRepository } from "@/features/sales/source";
import type { ReferenceLists } from "@/types/domain";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const repository = getSalesRepository();
    const [products, cities, salespeople] = await withSalesSource(
      () => Promise.all([repository.listProducts(), repository.listCities(), repository.listSalespeople()]),
      "Erro ao carregar listas de referência"
    );

    const reference: ReferenceLists = { products, cities, salespeople };
    return NextResponse.json(reference);
  } catch (error) {
    return toErrorResponse(error, "Erro ao carregar listas de referência");
  }
}
