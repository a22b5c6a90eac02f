"use client";

import { useState, useEffect, useCallback } from "react";
import type { TelecomDataset } from "@/lib/telecom-types";
import { DATA_FILES, DATASET_KEYS, parseDataset } from "@/lib/telecom-data";
import type { DatasetCsvPayload } from "@/lib/telecom-synth-engine";
import { BRAND } from "@/lib/brand";
import PricingDashboard from "@/components/PricingDashboard";
import AiPerformanceDashboard from "@/components/AiPerformanceDashboard";
import DatasetGenerator from "@/components/DatasetGenerator";
import { InfoBanner } from "@/components/InfoTooltip";
import { Smartphone, DollarSign, Bot, Database, Users } from "lucide-react";

type Tab = "pricing" | "ai_performance" | "generator";

const TABS: { id: Tab; label: string; icon: React.ReactNode }[] = [
  { id: "pricing", label: "Pricing", icon: <DollarSign size={14} /> },
  { id: "ai_performance", label: "AI Performance", icon: <Bot size={14} /> },
  { id: "generator", label: "Data Generator", icon: <Database size={14} /> },
];

async function loadCsv(file: string): Promise<string> {
  const res = await fetch(`/data/${file}`, { cache: "no-store" });
  if (!res.ok) throw new Error(`${file}: HTTP ${res.status}`);
  return res.text();
}

async function loadDataset(): Promise<TelecomDataset> {
  const texts = await Promise.all(DATASET_KEYS.map((k) => loadCsv(DATA_FILES[k])));
  const [customers, usage, tickets, interventions] = texts;
  const csv: DatasetCsvPayload = { customers, usage, tickets, interventions };
  return parseDataset(csv);
}

export default function Home() {
  const [tab, setTab] = useState<Tab>("pricing");
  const [data, setData] = useState<TelecomDataset | null>(null);
  const [version, setVersion] = useState(0);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [isLoading, setIsLoading] = useState(true);

  const reload = useCallback(async () => {
    try {
      const dataset = await loadDataset();
      setData(dataset);
      setVersion((v) => v + 1);
      setLoadError(null);
    } catch (err) {
      console.warn("Failed to load synthetic data:", err);
      setLoadError(String(err));
    } finally {
      setIsLoading(false);
    }
  }, []);

  useEffect(() => {
    void reload();
  }, [reload]);

  if (isLoading) {
    return (
      <div className="min-h-screen bg-zinc-950 flex items-center justify-center">
        <div className="flex flex-col items-center gap-4">
          <div className="w-8 h-8 border-4 border-violet-500/30 border-t-violet-500 rounded-full animate-spin" />
          <p className="text-zinc-400 text-sm">Loading customer data...</p>
        </div>
      </div>
    );
  }

  return (
    <div className="min-h-screen bg-zinc-950 text-zinc-100">
      {/* ─── Header ─── */}
      <header className="border-b border-zinc-800 bg-zinc-950/80 backdrop-blur-sm sticky top-0 z-50">
        <div className="max-w-[1600px] mx-auto px-6 py-3 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="w-8 h-8 rounded-lg flex items-center justify-center" style={{ backgroundColor: BRAND.colors.primary }}>
              <Smartphone size={18} className="text-white" />
            </div>
            <div>
              <h1 className="text-base font-bold text-zinc-100">{BRAND.name}</h1>
              <p className="text-[10px] text-zinc-500">{BRAND.product}: pricing &amp; performance</p>
            </div>
          </div>
          <div className="flex items-center gap-4 text-xs text-zinc-500">
            {data && (
              <div className="flex items-center gap-1.5">
                <Users size={12} />
                <span>{data.customers.length.toLocaleString()} customers</span>
              </div>
            )}
            <nav className="flex items-center gap-1 bg-zinc-900 rounded-lg p-1 border border-zinc-800">
              {TABS.map((t) => (
                <button
                  key={t.id}
                  type="button"
                  onClick={() => setTab(t.id)}
                  className={`flex items-center gap-1.5 px-3 py-1.5 rounded-md text-xs font-medium transition-all ${
                    tab === t.id
                      ? "bg-violet-600/20 border border-violet-500/40 text-violet-300"
                      : "border border-transparent text-zinc-400 hover:text-zinc-200 hover:bg-zinc-800"
                  }`}
                >
                  {t.icon}
                  {t.label}
                </button>
              ))}
            </nav>
          </div>
        </div>
      </header>

      <main className="max-w-[1600px] mx-auto px-6 py-6 pb-12 space-y-5">
        {tab === "generator" ? (
          <DatasetGenerator onDataWritten={reload} />
        ) : !data ? (
          <InfoBanner title="No dataset found" variant="warning">
            The dashboards read <code className="text-zinc-300">public/data/*.csv</code>. Run{" "}
            <code className="text-zinc-300">npm run generate</code> or use the Data Generator tab, then reload.
            {loadError && <div className="mt-1 text-zinc-600">{loadError}</div>}
          </InfoBanner>
        ) : tab === "pricing" ? (
          <PricingDashboard customers={data.customers} />
        ) : (
          <AiPerformanceDashboard key={version} customers={data.customers} interventions={data.interventions} />
        )}

        <p className="text-[10px] text-zinc-600 text-center">{BRAND.disclaimer}</p>
      </main>
    </div>
  );
}
