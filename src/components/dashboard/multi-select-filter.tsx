"use client";

import type { FilterValue } from "@/types/domain";

interface MultiSelectFilterProps {
  label: string;
  allLabel: string;
  options: string[];
  value: FilterValue;
  onChange: (value: FilterValue) => void;
}

export function MultiSelectFilter({ label, allLabel, options, value, onChange }: MultiSelectFilterProps) {
  const selected = value === "all" ? [] : value;

  function toggle(option: string) {
    const next = selected.includes(option) ? selected.filter((item) => item !== option) : [...selected, option];
    onChange(next.length === 0 ? "all" : next);
  }

  return (
    <details className="rounded-md border bg-white px-3 py-2 text-sm">
      <summary className="cursor-pointer select-none">
        <span className="text-xs font-semibold text-muted-foreground">{label}: </span>
        {value === "all" ? allLabel : `${selected.length} selecionado(s)`}
      </summary>
      <div className="mt-2 max-h-48 space-y-1 overflow-y-auto">
        <label className="flex items-center gap-2">
          <input type="checkbox" checked={value === "all"} onChange={() => onChange("all")} />
          {allLabel}
        </label>
        {options.map((option) => (
          <label key={option} className="flex items-center gap-2">
            <input type="checkbox" checked={selected.includes(option)} onChange={() => toggle(option)} />
            {option}
          </label>
        ))}
      </div>
    </details>
  );
}
