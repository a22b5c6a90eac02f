"use client";

import { useState, useMemo, useCallback } from "react";
import { Play, Loader2, AlertTriangle, CheckCircle2 } from "lucide-react";
import {
  SYNTH_PRESETS,
  getDefaultConfig,
  computePreview,
  validateConfig,
  generateSyntheticData,
  serializeDataset,
} from "@/lib/telecom-synth-engine";
import type { SynthConfig, SynthOutputStats } from "@/lib/telecom-synth-engine";
import { DATA_FILES } from "@/lib/telecom-data";
import { InfoBanner } from "@/components/InfoTooltip";

interface DatasetGeneratorProps {
  /** Called after the API route has written the CSVs; re-reads them from disk. */
  onDataWritten: () => Promise<void>;
}

export default function DatasetGenerator({ onDataWritten }: DatasetGeneratorProps) {
  const [presetId, setPresetId] = useState("standard");
  const [config, setConfig] = useState<SynthConfig>(getDefaultConfig);
  const [running, setRunning] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [stats, setStats] = useState<SynthOutputStats | null>(null);

  const preview = useMemo(() => computePreview(config), [config]);

  const applyPreset = (id: string) => {
    const preset = SYNTH_PRESETS[id];
    if (!preset) return;
    setPresetId(id);
    setConfig(structuredClone(preset.config));
  };

  const setPopulation = (key: "totalCustomers" | "usageMonths", value: number) => {
    setConfig((c) => ({ ...c, population: { ...c.population, [key]: value } }));
  };

  const handleGenerate = useCallback(async () => {
    setError(null);
    try {
      validateConfig(config);
    } catch (e) {
      setError(e instanceof Error ? e.message : String(e));
      return;
    }

    setRunning(true);
    await new Promise((r) => setTimeout(r, 30)); // let the spinner paint

    const result = generateSyntheticData(config);
    try {
      const res = await fetch("/api/write-synth-data", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(serializeDataset(result)),
      });
      if (!res.ok) {
        const body: unknown = await res.json();
        console.error("Failed to write CSVs:", body);
        setError(`Write failed with status ${res.status}`);
        return;
      }
      await onDataWritten();
      setStats(result.stats);
    } catch (e) {
      console.error("Failed to write CSVs:", e);
      setError(String(e));
    } finally {
      setRunning(false);
    }
  }, [config, onDataWritten]);

  return (
    <div className="space-y-5 max-w-[1100px]">
      <InfoBanner title="Synthetic data">
        Generates the four Pulse Mobile tables in the browser and writes them to{" "}
        <code className="text-zinc-300">public/data/</code> ({Object.values(DATA_FILES).join(", ")}).
        The same seed and settings always give the same files.
      </InfoBanner>

      <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4 space-y-4">
        <div className="grid grid-cols-3 gap-3">
          {Object.entries(SYNTH_PRESETS).map(([id, p]) => (
            <button
              key={id}
              type="button"
              onClick={() => applyPreset(id)}
              className={`text-left rounded-lg border p-3 transition-all ${
                presetId === id
                  ? "border-violet-500/50 bg-violet-500/10"
                  : "border-zinc-800 hover:border-zinc-700 hover:bg-zinc-800/50"
              }`}
            >
              <div className="text-xs font-semibold text-zinc-200">{p.label}</div>
              <div className="text-[10px] text-zinc-500 mt-0.5">{p.description}</div>
            </button>
          ))}
        </div>

        <div className="grid grid-cols-4 gap-3">
          <div>
            <label className="text-[11px] text-zinc-500 mb-1 block">Customers</label>
            <input type="number" min={1} value={config.population.totalCustomers}
              onChange={(e) => setPopulation("totalCustomers", Number(e.target.value))}
              className="w-full bg-zinc-800 border border-zinc-700 rounded px-2 py-1.5 text-[12px] text-zinc-200 font-mono" />
          </div>
          <div>
            <label className="text-[11px] text-zinc-500 mb-1 block">Usage months</label>
            <input type="number" min={1} max={36} value={config.population.usageMonths}
              onChange={(e) => setPopulation("usageMonths", Number(e.target.value))}
              className="w-full bg-zinc-800 border border-zinc-700 rounded px-2 py-1.5 text-[12px] text-zinc-200 font-mono" />
          </div>
          <div>
            <label className="text-[11px] text-zinc-500 mb-1 block">Seed</label>
            <input type="number" value={config.simulation.seed}
              onChange={(e) => setConfig((c) => ({ ...c, simulation: { seed: Number(e.target.value) } }))}
              className="w-full bg-zinc-800 border border-zinc-700 rounded px-2 py-1.5 text-[12px] text-zinc-200 font-mono" />
          </div>
          <div>
            <label className="text-[11px] text-zinc-500 mb-1 block">Reference date</label>
            <input type="date" value={config.dates.referenceDate}
              onChange={(e) => setConfig((c) => ({ ...c, dates: { ...c.dates, referenceDate: e.target.value } }))}
              className="w-full bg-zinc-800 border border-zinc-700 rounded px-2 py-1.5 text-[12px] text-zinc-200 font-mono" />
          </div>
        </div>

        {/* ─── Preview ─── */}
        <div className="grid grid-cols-6 gap-2">
          {[
            { label: "Customers", value: preview.customers.toLocaleString() },
            { label: "Usage rows", value: preview.usageRows.toLocaleString() },
            { label: "Tickets", value: preview.tickets.toLocaleString() },
            { label: "AI-assisted", value: preview.aiAssistedCustomers.toLocaleString() },
            { label: "Interventions (est.)", value: preview.expectedInterventions.toLocaleString() },
            { label: "Size (est.)", value: `${preview.estimatedFileSizeKB.toLocaleString()} KB` },
          ].map((s) => (
            <div key={s.label} className="bg-zinc-800/50 rounded-lg px-3 py-2">
              <div className="text-[10px] text-zinc-500">{s.label}</div>
              <div className="text-sm font-mono text-zinc-200">{s.value}</div>
            </div>
          ))}
        </div>

        <div className="flex items-center gap-3">
          <button
            type="button"
            onClick={handleGenerate}
            disabled={running}
            className="flex items-center gap-2 px-4 py-2 rounded-lg text-xs font-semibold bg-violet-600 text-white hover:bg-violet-500 disabled:opacity-50 disabled:cursor-not-allowed transition-all"
          >
            {running ? <Loader2 size={14} className="animate-spin" /> : <Play size={14} />}
            {running ? "Generating..." : "Generate & Write CSVs"}
          </button>
          {error && (
            <span className="flex items-center gap-1.5 text-[11px] text-amber-400">
              <AlertTriangle size={12} />
              {error}
            </span>
          )}
        </div>
      </div>

      {stats && (
        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <div className="flex items-center gap-2 text-xs font-semibold text-green-400 mb-3">
            <CheckCircle2 size={14} />
            Dataset written
          </div>
          <div className="grid grid-cols-4 gap-2">
            {[
              { label: "Customers", value: stats.customers.toLocaleString() },
              { label: "Usage rows", value: stats.usageRows.toLocaleString() },
              { label: "Tickets", value: stats.tickets.toLocaleString() },
              { label: "Interventions", value: stats.interventions.toLocaleString() },
              { label: "Avg monthly bill", value: `$${stats.avgMonthlyBill}` },
              { label: "AI-preventable tickets", value: `${stats.preventableTicketPct}%` },
              { label: "Potential savings", value: `$${stats.totalPotentialSavings.toLocaleString()}` },
              { label: "Intervention savings", value: `$${stats.totalInterventionSavings.toLocaleString()}` },
            ].map((s) => (
              <div key={s.label} className="bg-zinc-800/50 rounded-lg px-3 py-2">
                <div className="text-[10px] text-zinc-500">{s.label}</div>
                <div className="text-sm font-mono text-zinc-200">{s.value}</div>
              </div>
            ))}
          </div>
        </div>
      )}
    </div>
  );
}
