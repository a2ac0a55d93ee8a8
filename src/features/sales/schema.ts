import { z } from "zod";

import type { TransactionRecord } from "@/types/domain";

type RecordField = keyof TransactionRecord;

const COLUMN_ALIASES: Record<RecordField, string[]> = {
  customerId: ["cliente", "cod_cliente", "customer", "customer_id"],
  productId: ["mercadoria", "produto", "cod_produto", "product", "product_id"],
  emissionDate: ["data_emissao", "emissao", "data", "emission_date", "date"],
  netValue: ["valor_liq", "valor_liquido", "valor", "net_value"],
  quantity: ["quant", "quantidade", "qtd", "quantity"],
  salespersonId: ["vendedor", "cod_vendedor", "salesperson", "salesperson_id"],
  city: ["cidade", "city"],
  legalName: ["raz_social", "razao_social", "legal_name"],
  activity: ["atividade", "activity"],
  network: ["rede", "network"],
  productDescription: ["descricao_produto", "descricao", "product_description"]
};

const REQUIRED_FIELDS: RecordField[] = ["customerId", "productId", "emissionDate"];

const rawRowSchema = z.record(z.string(), z.unknown());

export type RawSalesRow = z.infer<typeof rawRowSchema>;

function normalizeHeader(header: string): string {
  return header
    .replace(/^\uFEFF/, "")
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/["'`]/g, "")
    .replace(/[\s_()\-\/.]/g, "")
    .trim()
    .toLowerCase();
}

function numericCell(byHeader: Map<string, unknown>, field: RecordField): number {
  for (const alias of COLUMN_ALIASES[field]) {
    const value = byHeader.get(normalizeHeader(alias));
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : 0;
    }
    const text = cellText(value);
    if (text) {
      return parseNumber(text);
    }
  }
  return 0;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value.toISOString().slice(0, 10);
  }
  return String(value).trim();
}

function pickValue(byHeader: Map<string, string>, field: RecordField): string {
  for (const alias of COLUMN_ALIASES[field]) {
    const value = byHeader.get(normalizeHeader(alias));
    if (value) {
      return value;
    }
  }
  return "";
}

export function parseNumber(value: string): number {
  const trimmed = value.trim();
  if (!trimmed) {
    return 0;
  }
  // "1.234,56" and "1.250" are Brazilian spellings of 1234.56 and 1250
  const normalized = /,\d+$/.test(trimmed)
    ? trimmed.replace(/\./g, "").replace(",", ".")
    : /^-?\d{1,3}(\.\d{3})+$/.test(trimmed)
      ? trimmed.replace(/\./g, "")
      : trimmed.replace(/,/g, "");
  const numeric = Number(normalized);
  return Number.isFinite(numeric) ? numeric : 0;
}

function isValidIsoDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function parseEmissionDate(value: string): string | null {
  const trimmed = value.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(trimmed);
  if (iso) {
    const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    return isValidIsoDate(year, month, day) ? `${iso[1]}-${iso[2]}-${iso[3]}` : null;
  }

  const brazilian = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(trimmed);
  if (brazilian) {
    const [day, month, year] = [Number(brazilian[1]), Number(brazilian[2]), Number(brazilian[3])];
    return isValidIsoDate(year, month, day) ? `${year}-${pad(month)}-${pad(day)}` : null;
  }

  return null;
}

function optionalText(value: string): string | null {
  return value ? value : null;
}

export function missingColumns(headers: string[]): RecordField[] {
  const normalized = new Set(headers.map(normalizeHeader));
  return REQUIRED_FIELDS.filter((field) => !COLUMN_ALIASES[field].some((alias) => normalized.has(normalizeHeader(alias))));
}

export function toTransactionRecord(row: RawSalesRow): TransactionRecord | null {
  const rawByHeader = new Map<string, unknown>(Object.entries(row).map(([key, value]): [string, unknown] => [normalizeHeader(key), value]));
  const byHeader = new Map<string, string>(Array.from(rawByHeader, ([key, value]): [string, string] => [key, cellText(value)]));

  const customerId = pickValue(byHeader, "customerId");
  const productId = pickValue(byHeader, "productId");
  const emissionDate = parseEmissionDate(pickValue(byHeader, "emissionDate"));
  if (!customerId || !productId || !emissionDate) {
    return null;
  }

  return {
    customerId,
    productId,
    emissionDate,
    netValue: numericCell(rawByHeader, "netValue"),
    quantity: numericCell(rawByHeader, "quantity"),
    salespersonId: optionalText(pickValue(byHeader, "salespersonId")),
    city: optionalText(pickValue(byHeader, "city")),
    legalName: optionalText(pickValue(byHeader, "legalName")),
    activity: optionalText(pickValue(byHeader, "activity")),
    network: optionalText(pickValue(byHeader, "network")),
    productDescription: optionalText(pickValue(byHeader, "productDescription"))
  };
}

export function toTransactionRecords(rows: unknown[], source: string): TransactionRecord[] {
  const parsed = z.array(rawRowSchema).safeParse(rows);
  if (!parsed.success) {
    throw new Error(`${source}: linhas de vendas em formato inesperado.`);
  }

  const headers = Object.keys(parsed.data[0] ?? {});
  if (parsed.data.length > 0) {
    const missing = missingColumns(headers);
    if (missing.length > 0) {
      throw new Error(`${source}: colunas obrigatórias ausentes (${missing.map((field) => COLUMN_ALIASES[field][0]).join(", ")}) | cabeçalhos: ${headers.join(", ") || "(nenhum)"}`);
    }
  }

  return parsed.data
    .map(toTransactionRecord)
    .filter((record): record is TransactionRecord => record !== null);
}
