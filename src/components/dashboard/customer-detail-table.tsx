"use client";

import { FileDown, Loader2 } from "lucide-react";

import { Button } from "@/components/ui/button";
import { formatDate } from "@/lib/format";
import type { BothProductsDetailRow, SingleProductDetailRow } from "@/types/domain";

type DetailRow = SingleProductDetailRow | BothProductsDetailRow;

interface CustomerDetailTableProps {
  title: string;
  rows: DetailRow[];
  downloading: boolean;
  onDownload: () => void;
}

function productCell(row: DetailRow): string {
  return "products" in row ? row.products : row.productDescription ?? "";
}

export function CustomerDetailTable({ title, rows, downloading, onDownload }: CustomerDetailTableProps) {
  const showsBothProducts = rows.some((row) => "products" in row);

  return (
    <section className="space-y-3">
      <h3 className="text-base font-semibold">{title}</h3>
      {rows.length === 0 ? (
        <p className="rounded-md bg-muted px-3 py-2 text-sm text-muted-foreground">Nenhum cliente encontrado nesta categoria.</p>
      ) : (
        <>
          <div className="max-h-[420px] overflow-auto rounded-lg border">
            <table className="w-full text-left text-sm">
              <thead className="sticky top-0 bg-slate-50 text-xs uppercase text-slate-600">
                <tr>
                  <th className="px-3 py-2">Cliente</th>
                  <th className="px-3 py-2">Razão Social</th>
                  <th className="px-3 py-2">Cidade</th>
                  <th className="px-3 py-2">Atividade</th>
                  <th className="px-3 py-2">Rede</th>
                  <th className="px-3 py-2">Último Vendedor</th>
                  {showsBothProducts ? null : <th className="px-3 py-2">Produto</th>}
                  <th className="px-3 py-2">Última Compra</th>
                  <th className="px-3 py-2 text-right">Qtd Total</th>
                  {showsBothProducts ? <th className="px-3 py-2">Produtos</th> : null}
                </tr>
              </thead>
              <tbody>
                {rows.map((row) => (
                  <tr key={row.customerId} className="border-t">
                    <td className="px-3 py-2 font-medium">{row.customerId}</td>
                    <td className="px-3 py-2">{row.legalName ?? ""}</td>
                    <td className="px-3 py-2">{row.city ?? ""}</td>
                    <td className="px-3 py-2">{row.activity ?? ""}</td>
                    <td className="px-3 py-2">{row.network ?? ""}</td>
                    <td className="px-3 py-2">{row.lastSalesperson ?? ""}</td>
                    {showsBothProducts ? null : <td className="px-3 py-2">{productCell(row)}</td>}
                    <td className="px-3 py-2">{formatDate(row.lastPurchase)}</td>
                    <td className="px-3 py-2 text-right">{row.totalQuantity.toLocaleString("pt-BR")}</td>
                    {showsBothProducts ? <td className="px-3 py-2">{productCell(row)}</td> : null}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
          <Button variant="secondary" className="gap-2" onClick={onDownload} disabled={downloading}>
            {downloading ? <Loader2 className="h-4 w-4 animate-spin" /> : <FileDown className="h-4 w-4" />} Download Excel
          </Button>
        </>
      )}
    </section>
  );
}
