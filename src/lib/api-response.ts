import { NextResponse } from "next/server";
import { ZodError } from "zod";

import { CrossSellError, STATUS_BY_CODE } from "@/lib/errors";

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function toErrorResponse(error: unknown, fallbackMessage: string) {
  if (error instanceof CrossSellError) {
    if (error.code === "SOURCE_UNAVAILABLE") {
      console.error("Erro na fonte de vendas:", error.cause ?? error.message);
    }
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.status });
  }

  if (error instanceof ZodError) {
    return NextResponse.json(
      { error: `Requisição inválida: ${describeZodError(error)}`, code: "INVALID_REQUEST" },
      { status: STATUS_BY_CODE.INVALID_REQUEST }
    );
  }

  if (error instanceof SyntaxError) {
    return NextResponse.json({ error: "Corpo da requisição não é um JSON válido.", code: "INVALID_REQUEST" }, { status: 400 });
  }

  console.error(`${fallbackMessage}:`, error);
  const message = error instanceof Error ? error.message : fallbackMessage;
  return NextResponse.json({ error: message }, { status: 500 });
}
