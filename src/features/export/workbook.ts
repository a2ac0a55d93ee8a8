import ExcelJS from "exceljs";

import type { BothProductsDetailRow, Partition, SingleProductDetailRow } from "@/types/domain";

export const XLSX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

type CellValue = string | number | Date | null;

interface ColumnDef<TRow> {
  header: string;
  width: number;
  value: (row: TRow) => CellValue;
}

const SHEET_NAMES: Record<Partition, string> = {
  onlyA: "Apenas Produto A",
  onlyB: "Apenas Produto B",
  both: "Ambos Produtos"
};

const FILE_PREFIXES: Record<Partition, string> = {
  onlyA: "clientes_apenas_A",
  onlyB: "clientes_apenas_B",
  both: "clientes_ambos"
};

function toExcelDate(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00.000Z`);
}

const SINGLE_PRODUCT_COLUMNS: Array<ColumnDef<SingleProductDetailRow>> = [
  { header: "Cliente", width: 12, value: (row) => row.customerId },
  { header: "Razão Social", width: 40, value: (row) => row.legalName },
  { header: "Cidade", width: 22, value: (row) => row.city },
  { header: "Atividade", width: 22, value: (row) => row.activity },
  { header: "Rede", width: 18, value: (row) => row.network },
  { header: "Último Vendedor", width: 16, value: (row) => row.lastSalesperson },
  { header: "Produto", width: 40, value: (row) => row.productDescription },
  { header: "Última Compra", width: 14, value: (row) => toExcelDate(row.lastPurchase) },
  { header: "Qtd Total", width: 12, value: (row) => row.totalQuantity }
];

const BOTH_PRODUCTS_COLUMNS: Array<ColumnDef<BothProductsDetailRow>> = [
  { header: "Cliente", width: 12, value: (row) => row.customerId },
  { header: "Razão Social", width: 40, value: (row) => row.legalName },
  { header: "Cidade", width: 22, value: (row) => row.city },
  { header: "Atividade", width: 22, value: (row) => row.activity },
  { header: "Rede", width: 18, value: (row) => row.network },
  { header: "Último Vendedor", width: 16, value: (row) => row.lastSalesperson },
  { header: "Última Compra", width: 14, value: (row) => toExcelDate(row.lastPurchase) },
  { header: "Qtd Total", width: 12, value: (row) => row.totalQuantity },
  { header: "Produtos", width: 60, value: (row) => row.products }
];

export type DetailExport =
  | { partition: "onlyA" | "onlyB"; rows: SingleProductDetailRow[] }
  | { partition: "both"; rows: BothProductsDetailRow[] };

function fillSheet<TRow>(sheet: ExcelJS.Worksheet, columns: Array<ColumnDef<TRow>>, rows: TRow[]) {
  sheet.columns = columns.map((column) => ({ header: column.header, width: column.width }));
  sheet.getRow(1).font = { bold: true };

  for (const row of rows) {
    sheet.addRow(columns.map((column) => column.value(row)));
  }

  columns.forEach((column, index) => {
    if (column.header === "Última Compra") {
      sheet.getColumn(index + 1).numFmt = "dd/mm/yyyy";
    }
  });
}

export async function buildDetailWorkbook(detail: DetailExport): Promise<ExcelJS.Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAMES[detail.partition]);

  if (detail.partition === "both") {
    fillSheet(sheet, BOTH_PRODUCTS_COLUMNS, detail.rows);
  } else {
    fillSheet(sheet, SINGLE_PRODUCT_COLUMNS, detail.rows);
  }

  return workbook.xlsx.writeBuffer();
}

export function exportFileName(partition: Partition, today: Date): string {
  const stamp = `${today.getFullYear()}${String(today.getMonth() + 1).padStart(2, "0")}${String(today.getDate()).padStart(2, "0")}`;
  return `${FILE_PREFIXES[partition]}_${stamp}.xlsx`;
}
