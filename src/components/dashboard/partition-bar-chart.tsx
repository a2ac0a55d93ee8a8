"use client";

import { Bar, BarChart, CartesianGrid, Cell, LabelList, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import type { CrossSellResult } from "@/types/domain";

interface PartitionBarChartProps {
  analysis: CrossSellResult;
}

export function PartitionBarChart({ analysis }: PartitionBarChartProps) {
  const data = [
    { category: "Apenas Produto A", customers: analysis.countOnlyA, color: "#4285F4" },
    { category: "Ambos", customers: analysis.countBoth, color: "#9C27B0" },
    { category: "Apenas Produto B", customers: analysis.countOnlyB, color: "#EA4335" }
  ];

  return (
    <div className="h-[400px] w-full rounded-lg border bg-white p-3">
      <p className="mb-2 text-sm font-semibold text-slate-700">Distribuição de Clientes</p>
      <ResponsiveContainer width="100%" height="90%">
        <BarChart data={data} margin={{ top: 12, right: 24, bottom: 28, left: 24 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" vertical={false} />
          <XAxis
            dataKey="category"
            tick={{ fill: "#64748b", fontSize: 12 }}
            label={{ value: "Categoria", position: "bottom", offset: 8, fill: "#334155", fontSize: 12 }}
          />
          <YAxis
            allowDecimals={false}
            tick={{ fill: "#64748b", fontSize: 12 }}
            label={{ value: "Quantidade de Clientes", angle: -90, position: "insideLeft", fill: "#334155", fontSize: 12 }}
          />
          <Tooltip formatter={(value) => [String(value), "Clientes"]} />
          <Bar dataKey="customers" radius={[4, 4, 0, 0]}>
            {data.map((entry) => (
              <Cell key={entry.category} fill={entry.color} />
            ))}
            <LabelList dataKey="customers" position="insideTop" fill="#ffffff" fontSize={14} />
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
