"use client";

import { useState, useMemo } from "react";
import {
  LineChart, Line, BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip,
  ResponsiveContainer, Legend, ReferenceDot,
} from "recharts";
import { Users, DollarSign, TrendingUp } from "lucide-react";
import type { CustomerRow } from "@/lib/telecom-types";
import {
  ADOPTION_SCENARIOS,
  SCENARIOS,
  SLIDER_MIN_PRICE,
  MAX_PRICE,
  isAdoptionScenario,
  simulatePricing,
  priceSweep,
  segmentAdoption,
  formatAdoption,
  formatCurrency,
  formatRoi,
} from "@/lib/pricing-sim-engine";
import type { AdoptionScenario } from "@/lib/pricing-sim-engine";
import { BRAND, TOOLTIP_STYLE } from "@/lib/brand";
import ValueBox from "@/components/ValueBox";

export default function PricingDashboard({ customers }: { customers: CustomerRow[] }) {
  const [price, setPrice] = useState(5);
  const [scenario, setScenario] = useState<AdoptionScenario>("realistic");

  const metrics = useMemo(
    () => simulatePricing({ price, scenario, customerCount: customers.length }),
    [price, scenario, customers.length],
  );
  const sweep = useMemo(() => priceSweep(scenario, customers.length), [scenario, customers.length]);
  const segments = useMemo(() => segmentAdoption(customers, metrics.adoptionRate), [customers, metrics.adoptionRate]);

  return (
    <div className="space-y-5">
      {/* ─── Controls ─── */}
      <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4 grid grid-cols-3 gap-6">
        <div className="col-span-2">
          <label className="text-[11px] text-zinc-500 mb-1 block">Monthly price for AI Assistant ($)</label>
          <input
            type="range"
            min={SLIDER_MIN_PRICE}
            max={MAX_PRICE}
            step={1}
            value={price}
            onChange={(e) => setPrice(Number(e.target.value))}
            className="w-full accent-violet-500"
          />
          <div className="flex justify-between text-[10px] text-zinc-500">
            <span>${SLIDER_MIN_PRICE}</span>
            <span className="text-zinc-200 font-mono text-xs">${price}</span>
            <span>${MAX_PRICE}</span>
          </div>
        </div>
        <div>
          <label className="text-[11px] text-zinc-500 mb-1 block">Adoption scenario</label>
          <select
            value={scenario}
            onChange={(e) => {
              if (isAdoptionScenario(e.target.value)) setScenario(e.target.value);
            }}
            className="w-full bg-zinc-800 border border-zinc-700 rounded px-2 py-1.5 text-[12px] text-zinc-200"
          >
            {ADOPTION_SCENARIOS.map((s) => (
              <option key={s} value={s}>{SCENARIOS[s].label}</option>
            ))}
          </select>
        </div>
      </div>

      {/* ─── Value boxes ─── */}
      <div className="grid grid-cols-3 gap-4">
        <ValueBox
          label="Expected Adoption"
          value={formatAdoption(metrics.adoptionRate)}
          icon={<Users size={18} />}
          accent={BRAND.colors.primary}
          hint={`${metrics.subscribers.toLocaleString("en-US")} subscribers out of an addressable base of ${metrics.addressableBase.toLocaleString("en-US")}.`}
        />
        <ValueBox
          label="Monthly Revenue"
          value={formatCurrency(metrics.revenue)}
          icon={<DollarSign size={18} />}
          accent={BRAND.colors.success}
        />
        <ValueBox
          label="ROI"
          value={formatRoi(metrics.roi)}
          icon={<TrendingUp size={18} />}
          accent={metrics.roi >= 0 ? BRAND.colors.success : BRAND.colors.warning}
          hint={`Profit ${formatCurrency(metrics.profit)} on monthly cost ${formatCurrency(metrics.cost)}.`}
        />
      </div>

      <div className="grid grid-cols-2 gap-5">
        {/* ─── Revenue vs cost ─── */}
        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">Revenue vs. Cost by Price Point</h3>
          <ResponsiveContainer width="100%" height={300}>
            <LineChart data={sweep}>
              <CartesianGrid strokeDasharray="3 3" stroke={BRAND.colors.grid} />
              <XAxis
                dataKey="price"
                type="number"
                domain={[0, MAX_PRICE]}
                tick={{ fill: BRAND.colors.axis, fontSize: 10 }}
                tickFormatter={(v) => `$${Number(v).toFixed(0)}`}
              />
              <YAxis tick={{ fill: BRAND.colors.axis, fontSize: 10 }} tickFormatter={(v) => formatCurrency(Number(v))} width={80} />
              <Tooltip
                contentStyle={TOOLTIP_STYLE}
                formatter={(v: unknown) => formatCurrency(Number(v))}
                labelFormatter={(l) => `$${Number(l).toFixed(2)} / month`}
              />
              <Legend wrapperStyle={{ fontSize: 11 }} />
              <Line type="monotone" dataKey="revenue" name="Revenue" stroke={BRAND.colors.revenue} strokeWidth={2} dot={false} />
              <Line type="monotone" dataKey="cost" name="Cost" stroke={BRAND.colors.cost} strokeWidth={2} strokeDasharray="5 5" dot={false} />
              <ReferenceDot x={price} y={metrics.revenue} r={5} fill={BRAND.colors.primary} stroke="none" />
              <ReferenceDot x={price} y={metrics.cost} r={5} fill={BRAND.colors.primary} stroke="none" />
            </LineChart>
          </ResponsiveContainer>
        </div>

        {/* ─── Segment adoption ─── */}
        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <h3 className="text-sm font-semibold text-zinc-200 mb-3">Adoption by Customer Segment</h3>
          <ResponsiveContainer width="100%" height={300}>
            <BarChart data={segments} layout="vertical">
              <CartesianGrid strokeDasharray="3 3" stroke={BRAND.colors.grid} />
              <XAxis
                type="number"
                domain={[0, 1]}
                tick={{ fill: BRAND.colors.axis, fontSize: 10 }}
                tickFormatter={(v) => `${(Number(v) * 100).toFixed(0)}%`}
              />
              <YAxis type="category" dataKey="displayName" tick={{ fill: BRAND.colors.axis, fontSize: 11 }} width={70} />
              <Tooltip
                contentStyle={TOOLTIP_STYLE}
                formatter={(v: unknown) => [`${(Number(v) * 100).toFixed(1)}%`, "Adoption"]}
              />
              <Bar dataKey="adoption" fill={BRAND.colors.primary} radius={[0, 4, 4, 0]} />
            </BarChart>
          </ResponsiveContainer>
        </div>
      </div>
    </div>
  );
}
