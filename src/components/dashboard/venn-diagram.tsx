"use client";

import { useId } from "react";

import { layoutVenn } from "@/components/dashboard/venn-layout";
import type { CrossSellResult } from "@/types/domain";

interface VennDiagramProps {
  analysis: CrossSellResult;
  conversionRate: number;
  productA: string;
  productB: string;
}

const COLOR_A = "#4285F4";
const COLOR_B = "#EA4335";
const COLOR_BOTH = "#9C27B0";

const WIDTH = 720;
const HEIGHT = 420;
const MAX_RADIUS = 140;
const DISJOINT_GAP = 16;
const CENTER_X = 460;
const CENTER_Y = 230;

export function VennDiagram({ analysis, conversionRate, productA, productB }: VennDiagramProps) {
  const clipId = useId();

  const { radiusA, radiusB, distance } = layoutVenn(analysis.totalA, analysis.totalB, analysis.countBoth, MAX_RADIUS, DISJOINT_GAP);
  const span = radiusA + distance + radiusB;
  const centerA = CENTER_X - span / 2 + radiusA;
  const centerB = centerA + distance;
  const leftA = centerA - radiusA;
  const rightA = centerA + radiusA;
  const leftB = centerB - radiusB;
  const rightB = centerB + radiusB;
  const labelY = CENTER_Y + Math.max(radiusA, radiusB) + 28;

  const statsLines = [
    `Total Clientes: ${analysis.totalCustomers}`,
    `Total Produto A: ${analysis.totalA}`,
    `Total Produto B: ${analysis.totalB}`,
    `Apenas A: ${analysis.countOnlyA}`,
    `Apenas B: ${analysis.countOnlyB}`,
    `Ambos: ${analysis.countBoth}`,
    `Taxa Conversão: ${conversionRate.toFixed(1)}%`
  ];

  return (
    <div className="w-full overflow-x-auto rounded-lg border bg-white p-3">
      <svg viewBox={`0 0 ${WIDTH} ${HEIGHT}`} className="h-auto w-full min-w-[560px]" role="img" aria-label="Diagrama de Venn">
        <defs>
          <clipPath id={clipId}>
            <circle cx={centerA} cy={CENTER_Y} r={radiusA} />
          </clipPath>
        </defs>

        <text x={WIDTH / 2} y={28} textAnchor="middle" className="fill-slate-800 text-[18px] font-bold">
          Análise de Venda Cruzada
        </text>

        <circle cx={centerA} cy={CENTER_Y} r={radiusA} fill={COLOR_A} fillOpacity={0.6} stroke="white" strokeWidth={3} />
        <circle cx={centerB} cy={CENTER_Y} r={radiusB} fill={COLOR_B} fillOpacity={0.6} stroke="white" strokeWidth={3} />
        <circle
          cx={centerB}
          cy={CENTER_Y}
          r={radiusB}
          fill={COLOR_BOTH}
          fillOpacity={0.7}
          stroke="white"
          strokeWidth={3}
          clipPath={`url(#${clipId})`}
        />

        <text x={(leftA + Math.min(leftB, rightA)) / 2} y={CENTER_Y + 6} textAnchor="middle" className="fill-white text-[16px] font-bold">
          {analysis.countOnlyA}
        </text>
        {analysis.countBoth > 0 ? (
          <text x={(Math.max(leftA, leftB) + Math.min(rightA, rightB)) / 2} y={CENTER_Y + 6} textAnchor="middle" className="fill-white text-[16px] font-bold">
            {analysis.countBoth}
          </text>
        ) : null}
        <text x={(Math.max(rightA, leftB) + rightB) / 2} y={CENTER_Y + 6} textAnchor="middle" className="fill-white text-[16px] font-bold">
          {analysis.countOnlyB}
        </text>

        <text x={centerA} y={labelY} textAnchor="middle" className="fill-slate-700 text-[14px] font-bold">
          {productA}
        </text>
        <text x={centerB} y={labelY} textAnchor="middle" className="fill-slate-700 text-[14px] font-bold">
          {productB}
        </text>

        <g transform="translate(12 48)">
          <rect width={200} height={statsLines.length * 18 + 38} rx={8} fill="#f5f5f5" fillOpacity={0.95} stroke="#333" strokeWidth={2} />
          <text x={12} y={22} className="fill-slate-800 font-mono text-[12px] font-semibold">
            Estatísticas:
          </text>
          {statsLines.map((line, index) => (
            <text key={line} x={12} y={44 + index * 18} className="fill-slate-700 font-mono text-[11px]">
              {line}
            </text>
          ))}
        </g>
      </svg>
    </div>
  );
}
