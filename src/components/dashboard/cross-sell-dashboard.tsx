"use client";

import { useEffect, useState } from "react";
import { motion } from "framer-motion";
import { BarChart3, CalendarDays, Filter, Loader2, PieChart, ShoppingBag, Table2 } from "lucide-react";

import { CustomerDetailTable } from "@/components/dashboard/customer-detail-table";
import { MultiSelectFilter } from "@/components/dashboard/multi-select-filter";
import { PartitionBarChart } from "@/components/dashboard/partition-bar-chart";
import { nextReportRequest, periodKey } from "@/components/dashboard/report-request";
import { VennDiagram } from "@/components/dashboard/venn-diagram";
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";
import { Input } from "@/components/ui/input";
import { Select, SelectContent, SelectItem, SelectTrigger, SelectValue } from "@/components/ui/select";
import { Tabs, TabsContent, TabsList, TabsTrigger } from "@/components/ui/tabs";
import { restrictToReference } from "@/features/crosssell/filters";
import { formatDate, toIsoDate } from "@/lib/format";
import type { CrossSellReport, FilterOptions, FilterValue, Partition, ReferenceLists, SalesFilters } from "@/types/domain";

interface ApiError {
  error?: string;
  code?: string;
}

interface OptionsResponse extends ApiError {
  loadedCount?: number;
  options?: FilterOptions;
}

type ReferenceResponse = ApiError & Partial<ReferenceLists>;

interface ReportResponse extends ApiError {
  report?: CrossSellReport;
}

type Notice = { tone: "warning" | "error"; message: string };

const DEFAULT_WINDOW_DAYS = 90;
const WARNING_CODES = new Set(["NO_DATA", "SAME_PRODUCT"]);

const INITIAL_FILTERS: SalesFilters = { city: "all", salesperson: "all", activity: "all", network: "all" };

const EMPTY_OPTIONS: FilterOptions = { products: [], cities: [], salespeople: [], activities: [], networks: [] };

const PARTITION_TITLES: Record<Partition, string> = {
  onlyA: "🔵 Clientes que compraram apenas Produto A",
  onlyB: "🔴 Clientes que compraram apenas Produto B",
  both: "🟣 Clientes que compraram AMBOS os produtos"
};

function defaultPeriod() {
  const end = new Date();
  const start = new Date(end);
  start.setDate(start.getDate() - DEFAULT_WINDOW_DAYS);
  return { startDate: toIsoDate(start), endDate: toIsoDate(end) };
}

function truncate(label: string, size = 30): string {
  return label.length > size ? `${label.slice(0, size)}...` : label;
}

function noticeFrom(payload: ApiError, fallback: string): Notice {
  const message = payload.error || fallback;
  return { tone: payload.code && WARNING_CODES.has(payload.code) ? "warning" : "error", message };
}

function fileNameFrom(disposition: string | null, fallback: string): string {
  const match = disposition ? /filename="([^"]+)"/.exec(disposition) : null;
  return match ? match[1] : fallback;
}

export function CrossSellDashboard() {
  const [period, setPeriod] = useState(defaultPeriod);
  // undefined while loading, null when the store could not list them
  const [reference, setReference] = useState<ReferenceLists | null | undefined>(undefined);
  const [options, setOptions] = useState<FilterOptions>(EMPTY_OPTIONS);
  const [optionsKey, setOptionsKey] = useState<string | null>(null);
  const [loadedCount, setLoadedCount] = useState(0);
  const [productA, setProductA] = useState("");
  const [productB, setProductB] = useState("");
  const [filters, setFilters] = useState<SalesFilters>(INITIAL_FILTERS);
  const [report, setReport] = useState<CrossSellReport | null>(null);
  const [notice, setNotice] = useState<Notice | null>(null);
  const [loadingOptions, setLoadingOptions] = useState(false);
  const [loadingReport, setLoadingReport] = useState(false);
  const [downloading, setDownloading] = useState<Partition | null>(null);

  useEffect(() => {
    let cancelled = false;

    async function run() {
      try {
        const response = await fetch("/api/reference");
        const payload = (await response.json()) as ReferenceResponse;
        if (cancelled) {
          return;
        }
        const { products, cities, salespeople } = payload;
        setReference(response.ok && products && cities && salespeople ? { products, cities, salespeople } : null);
      } catch (err) {
        console.error("Erro ao carregar listas de referência:", err);
        if (!cancelled) {
          setReference(null);
        }
      }
    }

    void run();

    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    if (reference === undefined) {
      return;
    }

    let cancelled = false;

    async function run() {
      try {
        setLoadingOptions(true);
        setNotice(null);
        const query = new URLSearchParams(period).toString();
        const response = await fetch(`/api/options?${query}`);
        const payload = (await response.json()) as OptionsResponse;
        if (cancelled) {
          return;
        }

        if (!response.ok || !payload.options) {
          setOptions(EMPTY_OPTIONS);
          setOptionsKey(null);
          setLoadedCount(0);
          setReport(null);
          setNotice(noticeFrom(payload, "Erro ao carregar dados"));
          return;
        }

        const choices = restrictToReference(payload.options, reference ?? null);
        const products = choices.products;
        setOptions(choices);
        setLoadedCount(payload.loadedCount ?? 0);
        setProductA((current) => (products.includes(current) ? current : products[0] ?? ""));
        setProductB((current) => (products.includes(current) ? current : products[1] ?? products[0] ?? ""));
        setOptionsKey(periodKey(period));
      } catch (err) {
        if (!cancelled) {
          setNotice({ tone: "error", message: err instanceof Error ? err.message : "Erro ao carregar dados" });
        }
      } finally {
        if (!cancelled) {
          setLoadingOptions(false);
        }
      }
    }

    void run();

    return () => {
      cancelled = true;
    };
  }, [period, reference]);

  useEffect(() => {
    const body = nextReportRequest(period, optionsKey, productA, productB, filters);
    if (!body) {
      return;
    }

    let cancelled = false;

    async function run() {
      try {
        setLoadingReport(true);
        setNotice(null);
        const response = await fetch("/api/cross-sell", {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(body)
        });
        const payload = (await response.json()) as ReportResponse;
        if (cancelled) {
          return;
        }

        if (!response.ok || !payload.report) {
          setReport(null);
          setNotice(noticeFrom(payload, "Erro na análise"));
          return;
        }
        setReport(payload.report);
      } catch (err) {
        if (!cancelled) {
          setNotice({ tone: "error", message: err instanceof Error ? err.message : "Erro na análise" });
        }
      } finally {
        if (!cancelled) {
          setLoadingReport(false);
        }
      }
    }

    void run();

    return () => {
      cancelled = true;
    };
  }, [period, optionsKey, productA, productB, filters]);

  function updateFilter(field: keyof SalesFilters, value: FilterValue) {
    setFilters((current) => ({ ...current, [field]: value }));
  }

  async function downloadPartition(partition: Partition) {
    try {
      setDownloading(partition);
      const response = await fetch("/api/cross-sell/export", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ ...period, productA, productB, filters, partition })
      });

      if (!response.ok) {
        const payload = (await response.json()) as ApiError;
        setNotice(noticeFrom(payload, "Erro ao exportar planilha"));
        return;
      }

      const blob = await response.blob();
      const url = URL.createObjectURL(blob);
      const anchor = document.createElement("a");
      anchor.href = url;
      anchor.download = fileNameFrom(response.headers.get("Content-Disposition"), `clientes_${partition}.xlsx`);
      anchor.click();
      URL.revokeObjectURL(url);
    } catch (err) {
      setNotice({ tone: "error", message: err instanceof Error ? err.message : "Erro ao exportar planilha" });
    } finally {
      setDownloading(null);
    }
  }

  const metrics = report
    ? [
        { id: "total-a", label: `🔵 Total ${truncate(report.productA)}`, value: String(report.analysis.totalA) },
        { id: "total-b", label: `🔴 Total ${truncate(report.productB)}`, value: String(report.analysis.totalB) },
        { id: "both", label: "🟣 Compraram Ambos", value: String(report.analysis.countBoth) },
        { id: "conversion", label: "📊 Taxa de Conversão", value: `${report.conversionRate.toFixed(1)}%` }
      ]
    : [];

  return (
    <main className="mx-auto min-h-screen max-w-[1400px] p-4 md:p-8">
      <section className="mb-6 flex items-end justify-between gap-4">
        <div>
          <h1 className="text-2xl font-bold tracking-tight md:text-4xl">📊 Análise de Venda Cruzada</h1>
          <p className="mt-2 text-sm text-muted-foreground">Compare os clientes que compraram dois produtos no período selecionado.</p>
        </div>
        {loadingOptions || loadingReport ? <Loader2 className="h-6 w-6 animate-spin text-primary" /> : null}
      </section>

      <div className="grid gap-4 lg:grid-cols-[340px_1fr]">
        <Card>
          <CardHeader>
            <CardTitle className="flex items-center gap-2">
              <Filter className="h-4 w-4" /> Filtros
            </CardTitle>
            {loadedCount > 0 ? <CardDescription className="text-teal-700">✅ {loadedCount} registros carregados</CardDescription> : null}
          </CardHeader>
          <CardContent className="space-y-4">
            <div className="space-y-2">
              <p className="flex items-center gap-1 text-xs font-semibold text-muted-foreground">
                <CalendarDays className="h-3 w-3" /> Período
              </p>
              <div className="grid grid-cols-2 gap-2">
                <Input
                  type="date"
                  aria-label="Data Início"
                  value={period.startDate}
                  max={period.endDate}
                  onChange={(event) => event.target.value && setPeriod((current) => ({ ...current, startDate: event.target.value }))}
                />
                <Input
                  type="date"
                  aria-label="Data Fim"
                  value={period.endDate}
                  min={period.startDate}
                  onChange={(event) => event.target.value && setPeriod((current) => ({ ...current, endDate: event.target.value }))}
                />
              </div>
            </div>

            <div className="space-y-2">
              <p className="flex items-center gap-1 text-xs font-semibold text-muted-foreground">
                <ShoppingBag className="h-3 w-3" /> Produtos
              </p>
              <Select value={productA} onValueChange={setProductA}>
                <SelectTrigger aria-label="Produto A">
                  <SelectValue placeholder="Produto A" />
                </SelectTrigger>
                <SelectContent>
                  {options.products.map((product) => (
                    <SelectItem key={product} value={product}>
                      {product}
                    </SelectItem>
                  ))}
                </SelectContent>
              </Select>
              <Select value={productB} onValueChange={setProductB}>
                <SelectTrigger aria-label="Produto B">
                  <SelectValue placeholder="Produto B" />
                </SelectTrigger>
                <SelectContent>
                  {options.products.map((product) => (
                    <SelectItem key={product} value={product}>
                      {product}
                    </SelectItem>
                  ))}
                </SelectContent>
              </Select>
            </div>

            <div className="space-y-2">
              <p className="text-xs font-semibold text-muted-foreground">🎯 Filtros Adicionais</p>
              <MultiSelectFilter label="Cidade" allLabel="Todas" options={options.cities} value={filters.city} onChange={(value) => updateFilter("city", value)} />
              <MultiSelectFilter
                label="Vendedor"
                allLabel="Todos"
                options={options.salespeople}
                value={filters.salesperson}
                onChange={(value) => updateFilter("salesperson", value)}
              />
              <MultiSelectFilter
                label="Atividade"
                allLabel="Todas"
                options={options.activities}
                value={filters.activity}
                onChange={(value) => updateFilter("activity", value)}
              />
              <MultiSelectFilter label="Rede" allLabel="Todas" options={options.networks} value={filters.network} onChange={(value) => updateFilter("network", value)} />
            </div>

            {notice ? (
              <p className={notice.tone === "warning" ? "text-sm text-amber-700" : "text-sm text-red-600"}>⚠️ {notice.message}</p>
            ) : null}
          </CardContent>
        </Card>

        <section className="space-y-4">
          <motion.div
            initial={{ opacity: 0, y: 8 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.4 }}
            className="grid gap-3 md:grid-cols-2 xl:grid-cols-4"
          >
            {metrics.map((metric, idx) => (
              <motion.div key={metric.id} initial={{ opacity: 0, y: 10 }} animate={{ opacity: 1, y: 0 }} transition={{ delay: idx * 0.06 }}>
                <Card>
                  <CardHeader className="pb-3">
                    <CardDescription>{metric.label}</CardDescription>
                    <CardTitle className="text-2xl">{metric.value}</CardTitle>
                  </CardHeader>
                </Card>
              </motion.div>
            ))}
          </motion.div>

          {report ? (
            <Card>
              <CardContent className="pt-6">
                <Tabs defaultValue="venn">
                  <TabsList>
                    <TabsTrigger value="venn">
                      <PieChart className="h-4 w-4" /> Diagrama de Venn
                    </TabsTrigger>
                    <TabsTrigger value="bars">
                      <BarChart3 className="h-4 w-4" /> Gráfico de Barras
                    </TabsTrigger>
                    <TabsTrigger value="tables">
                      <Table2 className="h-4 w-4" /> Tabelas Detalhadas
                    </TabsTrigger>
                  </TabsList>

                  <TabsContent value="venn">
                    <VennDiagram
                      analysis={report.analysis}
                      conversionRate={report.conversionRate}
                      productA={report.productA}
                      productB={report.productB}
                    />
                  </TabsContent>

                  <TabsContent value="bars">
                    <PartitionBarChart analysis={report.analysis} />
                  </TabsContent>

                  <TabsContent value="tables" className="space-y-8">
                    <CustomerDetailTable
                      title={PARTITION_TITLES.onlyA}
                      rows={report.tables.onlyA}
                      downloading={downloading === "onlyA"}
                      onDownload={() => void downloadPartition("onlyA")}
                    />
                    <CustomerDetailTable
                      title={PARTITION_TITLES.onlyB}
                      rows={report.tables.onlyB}
                      downloading={downloading === "onlyB"}
                      onDownload={() => void downloadPartition("onlyB")}
                    />
                    <CustomerDetailTable
                      title={PARTITION_TITLES.both}
                      rows={report.tables.both}
                      downloading={downloading === "both"}
                      onDownload={() => void downloadPartition("both")}
                    />
                  </TabsContent>
                </Tabs>
              </CardContent>
            </Card>
          ) : null}

          {report ? (
            <footer className="space-y-1 text-xs text-muted-foreground">
              <p>
                📅 Período analisado: {formatDate(report.period.startDate)} a {formatDate(report.period.endDate)}
              </p>
              <p>📊 Total de registros: {report.filteredCount.toLocaleString("pt-BR")}</p>
            </footer>
          ) : null}
        </section>
      </div>
    </main>
  );
}
