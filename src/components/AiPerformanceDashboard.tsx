"use client";

import { useState, useMemo } from "react";
import {
  LineChart, Line, BarChart, Bar, AreaChart, Area, XAxis, YAxis, CartesianGrid,
  Tooltip, ResponsiveContainer, Legend, Cell,
} from "recharts";
import { PiggyBank, Zap, Gauge, Users } from "lucide-react";
import type { AiInterventionRow, CustomerRow } from "@/lib/telecom-types";
import {
  joinInterventions,
  defaultFilters,
  filterInterventions,
  computeKpis,
  weeklySavingsTrend,
  interventionPortfolio,
  segmentAiAdoption,
  monthlyTrends,
  financialSummary,
  cumulativeSavings,
} from "@/lib/ai-performance-engine";
import type { PerformanceFilters } from "@/lib/ai-performance-engine";
import { formatCurrency } from "@/lib/pricing-sim-engine";
import { BRAND, TOOLTIP_STYLE } from "@/lib/brand";
import ValueBox from "@/components/ValueBox";

interface AiPerformanceDashboardProps {
  customers: CustomerRow[];
  interventions: AiInterventionRow[];
}

function toggle(list: string[], value: string): string[] {
  return list.includes(value) ? list.filter((v) => v !== value) : [...list, value];
}

export default function AiPerformanceDashboard({ customers, interventions }: AiPerformanceDashboardProps) {
  const initialFilters = useMemo(() => defaultFilters(interventions, customers), [interventions, customers]);
  const [filters, setFilters] = useState<PerformanceFilters>(initialFilters);

  const joined = useMemo(() => joinInterventions(interventions, customers), [interventions, customers]);
  const rows = useMemo(() => filterInterventions(joined, filters), [joined, filters]);

  const kpis = useMemo(() => computeKpis(rows), [rows]);
  const weekly = useMemo(() => weeklySavingsTrend(rows), [rows]);
  const portfolio = useMemo(() => interventionPortfolio(rows), [rows]);
  const bySegment = useMemo(() => segmentAiAdoption(rows, customers), [rows, customers]);
  // a cleared date input leaves no range to project over
  const summary = useMemo(
    () => (filters.startDate && filters.endDate ? financialSummary(rows, filters) : null),
    [rows, filters],
  );
  const cumulative = useMemo(() => cumulativeSavings(rows), [rows]);

  // one row per month, one column per intervention type
  const monthly = useMemo(() => {
    const byMonth = new Map<string, Record<string, string | number>>();
    for (const p of monthlyTrends(rows)) {
      const row = byMonth.get(p.month) ?? { month: p.month };
      row[p.interventionType] = p.savings;
      byMonth.set(p.month, row);
    }
    return [...byMonth.values()];
  }, [rows]);

  const typeColor = (type: string) => {
    const idx = initialFilters.interventionTypes.indexOf(type);
    return BRAND.series[Math.max(idx, 0) % BRAND.series.length];
  };

  if (interventions.length === 0) {
    return (
      <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-8 text-center text-sm text-zinc-500">
        No AI interventions in the loaded dataset.
      </div>
    );
  }

  return (
    <div className="space-y-5">
      {/* ─── Filters ─── */}
      <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4 grid grid-cols-4 gap-4">
        <div>
          <label className="text-[11px] text-zinc-500 mb-1 block">From</label>
          <input
            type="date"
            value={filters.startDate}
            min={initialFilters.startDate}
            max={filters.endDate}
            onChange={(e) => setFilters((f) => ({ ...f, startDate: e.target.value }))}
            className="w-full bg-zinc-800 border border-zinc-700 rounded px-2 py-1.5 text-[12px] text-zinc-200 font-mono"
          />
        </div>
        <div>
          <label className="text-[11px] text-zinc-500 mb-1 block">To</label>
          <input
            type="date"
            value={filters.endDate}
            min={filters.startDate}
            max={initialFilters.endDate}
            onChange={(e) => setFilters((f) => ({ ...f, endDate: e.target.value }))}
            className="w-full bg-zinc-800 border border-zinc-700 rounded px-2 py-1.5 text-[12px] text-zinc-200 font-mono"
          />
        </div>
        <div>
          <div className="text-[11px] text-zinc-500 mb-1">Intervention types</div>
          <div className="space-y-1">
            {initialFilters.interventionTypes.map((t) => (
              <label key={t} className="flex items-center gap-2 text-[11px] text-zinc-400">
                <input
                  type="checkbox"
                  checked={filters.interventionTypes.includes(t)}
                  onChange={() => setFilters((f) => ({ ...f, interventionTypes: toggle(f.interventionTypes, t) }))}
                  className="accent-violet-500 w-3.5 h-3.5"
                />
                {t}
              </label>
            ))}
          </div>
        </div>
        <div>
          <div className="text-[11px] text-zinc-500 mb-1">Customer segments</div>
          <div className="space-y-1">
            {initialFilters.segments.map((s) => (
              <label key={s} className="flex items-center gap-2 text-[11px] text-zinc-400">
                <input
                  type="checkbox"
                  checked={filters.segments.includes(s)}
                  onChange={() => setFilters((f) => ({ ...f, segments: toggle(f.segments, s) }))}
                  className="accent-violet-500 w-3.5 h-3.5"
                />
                {s}
              </label>
            ))}
          </div>
        </div>
      </div>

      {/* ─── KPIs ─── */}
      <div className="grid grid-cols-4 gap-4">
        <ValueBox label="Total Savings" value={formatCurrency(kpis.totalSavings)} icon={<PiggyBank size={18} />} accent={BRAND.colors.success} />
        <ValueBox label="Interventions" value={kpis.totalInterventions.toLocaleString("en-US")} icon={<Zap size={18} />} accent={BRAND.colors.primary} />
        <ValueBox
          label="Avg Confidence"
          value={`${(kpis.avgConfidence * 100).toFixed(1)}%`}
          icon={<Gauge size={18} />}
          accent={BRAND.colors.warning}
          hint="Mean model confidence across the filtered interventions."
        />
        <ValueBox label="Customers Helped" value={kpis.uniqueCustomers.toLocaleString("en-US")} icon={<Users size={18} />} accent={BRAND.colors.primary} />
      </div>

      <div className="grid grid-cols-2 gap-5">
        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">Weekly Savings</h3>
          <ResponsiveContainer width="100%" height={240}>
            <BarChart data={weekly}>
              <CartesianGrid strokeDasharray="3 3" stroke={BRAND.colors.grid} />
              <XAxis dataKey="period" tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(d: string) => d.slice(5)} />
              <YAxis tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(v) => formatCurrency(Number(v))} />
              <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v: unknown) => [formatCurrency(Number(v)), "Savings"]} labelFormatter={(l) => `Week of ${l}`} />
              <Bar dataKey="savings" fill={BRAND.colors.primary} radius={[2, 2, 0, 0]} />
            </BarChart>
          </ResponsiveContainer>
        </div>

        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">Intervention Portfolio</h3>
          <ResponsiveContainer width="100%" height={240}>
            <BarChart data={portfolio} layout="vertical">
              <CartesianGrid strokeDasharray="3 3" stroke={BRAND.colors.grid} />
              <XAxis type="number" tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(v) => formatCurrency(Number(v))} />
              <YAxis type="category" dataKey="interventionType" tick={{ fill: BRAND.colors.axis, fontSize: 10 }} width={130} />
              <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v: unknown) => [formatCurrency(Number(v)), "Savings"]} />
              <Bar dataKey="totalSavings" radius={[0, 4, 4, 0]}>
                {portfolio.map((p) => (
                  <Cell key={p.interventionType} fill={typeColor(p.interventionType)} />
                ))}
              </Bar>
            </BarChart>
          </ResponsiveContainer>
          <table className="w-full mt-3 text-[11px]">
            <thead>
              <tr className="text-zinc-500 border-b border-zinc-800">
                <th className="text-left py-1 font-medium">Type</th>
                <th className="text-right py-1 font-medium">Count</th>
                <th className="text-right py-1 font-medium">Avg confidence</th>
              </tr>
            </thead>
            <tbody>
              {portfolio.map((p) => (
                <tr key={p.interventionType} className="text-zinc-300 border-b border-zinc-800/50">
                  <td className="py-1">{p.interventionType}</td>
                  <td className="py-1 text-right font-mono">{p.count}</td>
                  <td className="py-1 text-right font-mono">{(p.avgConfidence * 100).toFixed(1)}%</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>

        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">AI Reach by Segment</h3>
          <ResponsiveContainer width="100%" height={240}>
            <BarChart data={bySegment}>
              <CartesianGrid strokeDasharray="3 3" stroke={BRAND.colors.grid} />
              <XAxis dataKey="segment" tick={{ fill: BRAND.colors.axis, fontSize: 10 }} />
              <YAxis tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(v) => `${(Number(v) * 100).toFixed(0)}%`} />
              <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v: unknown) => [`${(Number(v) * 100).toFixed(1)}%`, "Customers assisted"]} />
              <Bar dataKey="adoptionRate" fill={BRAND.colors.success} radius={[2, 2, 0, 0]} />
            </BarChart>
          </ResponsiveContainer>
        </div>

        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">Monthly Savings by Type</h3>
          <ResponsiveContainer width="100%" height={240}>
            <LineChart data={monthly}>
              <CartesianGrid strokeDasharray="3 3" stroke={BRAND.colors.grid} />
              <XAxis dataKey="month" tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(d: string) => d.slice(0, 7)} />
              <YAxis tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(v) => formatCurrency(Number(v))} />
              <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v: unknown) => formatCurrency(Number(v))} />
              <Legend wrapperStyle={{ fontSize: 10 }} />
              {filters.interventionTypes.map((t) => (
                <Line key={t} type="monotone" dataKey={t} stroke={typeColor(t)} strokeWidth={2} dot={{ r: 2 }} connectNulls />
              ))}
            </LineChart>
          </ResponsiveContainer>
        </div>
      </div>

      {/* ─── Financial impact ─── */}
      <div className="grid grid-cols-3 gap-5">
        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">Financial Summary</h3>
          {summary ? (
          <div className="space-y-2 text-[12px]">
            {[
              { label: "Total savings", value: formatCurrency(summary.totalSavings) },
              { label: "Interventions", value: summary.totalInterventions.toLocaleString("en-US") },
              { label: "Avg per intervention", value: `$${summary.avgSavingsPerIntervention.toFixed(2)}` },
              { label: "Days in period", value: String(summary.daysInPeriod) },
              { label: "Projected annual savings", value: formatCurrency(summary.projectedAnnualSavings) },
            ].map((s) => (
              <div key={s.label} className="flex justify-between border-b border-zinc-800/50 pb-1">
                <span className="text-zinc-500">{s.label}</span>
                <span className="text-zinc-200 font-mono">{s.value}</span>
              </div>
            ))}
          </div>
          ) : (
            <p className="text-[11px] text-zinc-500">Pick a start and end date to project savings.</p>
          )}
        </div>

        <div className="col-span-2 bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">Cumulative Savings</h3>
          <ResponsiveContainer width="100%" height={220}>
            <AreaChart data={cumulative}>
              <CartesianGrid strokeDasharray="3 3" stroke={BRAND.colors.grid} />
              <XAxis dataKey="date" tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(d: string) => d.slice(5)} minTickGap={30} />
              <YAxis tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(v) => formatCurrency(Number(v))} />
              <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v: unknown) => [formatCurrency(Number(v)), "Cumulative"]} />
              <Area type="monotone" dataKey="cumulativeSavings" stroke={BRAND.colors.success} fill={BRAND.colors.success} fillOpacity={0.15} strokeWidth={2} />
            </AreaChart>
          </ResponsiveContainer>
        </div>
      </div>
    </div>
  );
}
