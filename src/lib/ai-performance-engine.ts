// ─── AI Assistant Performance Analytics ─────────────────────────────────────
// Aggregations behind the AI performance dashboard. Interventions are joined
// to customers once, then every filter change re-runs the pure helpers below.

import type { AiInterventionRow, CustomerRow } from "./telecom-types";
import { parseIsoDate, formatIsoDate } from "./telecom-synth-engine";

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface JoinedIntervention extends AiInterventionRow {
  customer_segment: string;
  monthly_bill: number | null;
  satisfaction_score: number | null;
}

export interface PerformanceFilters {
  startDate: string;        // inclusive, YYYY-MM-DD
  endDate: string;          // inclusive
  interventionTypes: string[];
  segments: string[];
}

export interface PerformanceKpis {
  totalSavings: number;
  totalInterventions: number;
  avgConfidence: number;
  uniqueCustomers: number;
}

export interface TrendPoint {
  period: string;           // period start, YYYY-MM-DD
  savings: number;
}

export interface PortfolioEntry {
  interventionType: string;
  totalSavings: number;
  avgConfidence: number;
  count: number;
}

export interface SegmentAiAdoption {
  segment: string;
  assistedCustomers: number;
  totalCustomers: number;
  adoptionRate: number;
  totalSavings: number;
}

export interface MonthlyTrendPoint {
  month: string;
  interventionType: string;
  savings: number;
  avgConfidence: number;
}

export interface FinancialSummary {
  totalSavings: number;
  totalInterventions: number;
  avgSavingsPerIntervention: number;
  daysInPeriod: number;
  projectedAnnualSavings: number;
}

export interface CumulativePoint {
  date: string;
  savings: number;
  cumulativeSavings: number;
}

export const UNKNOWN_SEGMENT = "Unknown";

const DAY = 86400000;

// ═══════════════════════════════════════════════════════════════════════════════
// Join & filter
// ═══════════════════════════════════════════════════════════════════════════════

/** Left join: interventions for unknown customers keep segment "Unknown". */
export function joinInterventions(interventions: AiInterventionRow[], customers: CustomerRow[]): JoinedIntervention[] {
  const byId = new Map(customers.map((c) => [c.customer_id, c]));
  return interventions.map((r) => {
    const c = byId.get(r.customer_id);
    return {
      ...r,
      customer_segment: c?.customer_segment ?? UNKNOWN_SEGMENT,
      monthly_bill: c?.monthly_bill ?? null,
      satisfaction_score: c?.satisfaction_score ?? null,
    };
  });
}

/** Full date span plus every type and segment present. */
export function defaultFilters(interventions: AiInterventionRow[], customers: CustomerRow[]): PerformanceFilters {
  const dates = interventions.map((r) => r.intervention_date).sort();
  return {
    startDate: dates[0] ?? "",
    endDate: dates[dates.length - 1] ?? "",
    interventionTypes: [...new Set(interventions.map((r) => r.intervention_type))],
    segments: [...new Set(customers.map((c) => c.customer_segment))],
  };
}

export function filterInterventions(rows: JoinedIntervention[], filters: PerformanceFilters): JoinedIntervention[] {
  const types = new Set(filters.interventionTypes);
  const segments = new Set(filters.segments);
  return rows.filter((r) =>
    r.intervention_date >= filters.startDate &&
    r.intervention_date <= filters.endDate &&
    types.has(r.intervention_type) &&
    segments.has(r.customer_segment)
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Aggregations
// ═══════════════════════════════════════════════════════════════════════════════

function sum(values: number[]): number {
  return values.reduce((s, v) => s + v, 0);
}

function mean(values: number[]): number {
  return values.length ? sum(values) / values.length : 0;
}

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const out = new Map<string, T[]>();
  for (const r of rows) {
    const k = key(r);
    const bucket = out.get(k);
    if (bucket) bucket.push(r);
    else out.set(k, [r]);
  }
  return out;
}

export function computeKpis(rows: AiInterventionRow[]): PerformanceKpis {
  return {
    totalSavings: sum(rows.map((r) => r.savings_amount)),
    totalInterventions: rows.length,
    avgConfidence: mean(rows.map((r) => r.confidence_score)),
    uniqueCustomers: new Set(rows.map((r) => r.customer_id)).size,
  };
}

/** Monday of the week containing `date`. */
export function weekStart(date: string): string {
  const ms = parseIsoDate(date);
  const offset = (new Date(ms).getUTCDay() + 6) % 7;
  return formatIsoDate(ms - offset * DAY);
}

export function monthStart(date: string): string {
  return `${date.slice(0, 7)}-01`;
}

export function weeklySavingsTrend(rows: AiInterventionRow[]): TrendPoint[] {
  return [...groupBy(rows, (r) => weekStart(r.intervention_date)).entries()]
    .map(([period, group]) => ({ period, savings: sum(group.map((r) => r.savings_amount)) }))
    .sort((a, b) => a.period.localeCompare(b.period));
}

export function interventionPortfolio(rows: AiInterventionRow[]): PortfolioEntry[] {
  return [...groupBy(rows, (r) => r.intervention_type).entries()]
    .map(([interventionType, group]) => ({
      interventionType,
      totalSavings: sum(group.map((r) => r.savings_amount)),
      avgConfidence: mean(group.map((r) => r.confidence_score)),
      count: group.length,
    }))
    .sort((a, b) => a.interventionType.localeCompare(b.interventionType));
}

/**
 * Share of each segment's customers that received at least one intervention
 * in `rows`. Segments without assisted customers are omitted.
 */
export function segmentAiAdoption(rows: JoinedIntervention[], customers: CustomerRow[]): SegmentAiAdoption[] {
  const totals = new Map<string, number>();
  for (const c of customers) totals.set(c.customer_segment, (totals.get(c.customer_segment) || 0) + 1);

  const out: SegmentAiAdoption[] = [];
  for (const [segment, group] of groupBy(rows, (r) => r.customer_segment)) {
    const totalCustomers = totals.get(segment);
    if (!totalCustomers) continue;
    const assisted = new Set(group.map((r) => r.customer_id)).size;
    out.push({
      segment,
      assistedCustomers: assisted,
      totalCustomers,
      adoptionRate: assisted / totalCustomers,
      totalSavings: sum(group.map((r) => r.savings_amount)),
    });
  }
  return out.sort((a, b) => a.segment.localeCompare(b.segment));
}

export function monthlyTrends(rows: AiInterventionRow[]): MonthlyTrendPoint[] {
  return [...groupBy(rows, (r) => `${monthStart(r.intervention_date)}|${r.intervention_type}`).values()]
    .map((group) => ({
      month: monthStart(group[0].intervention_date),
      interventionType: group[0].intervention_type,
      savings: sum(group.map((r) => r.savings_amount)),
      avgConfidence: mean(group.map((r) => r.confidence_score)),
    }))
    .sort((a, b) => a.month.localeCompare(b.month) || a.interventionType.localeCompare(b.interventionType));
}

/** Projects the daily average over the selected range onto a full year. */
export function financialSummary(rows: AiInterventionRow[], range: Pick<PerformanceFilters, "startDate" | "endDate">): FinancialSummary {
  const total = sum(rows.map((r) => r.savings_amount));
  const days = Math.round((parseIsoDate(range.endDate) - parseIsoDate(range.startDate)) / DAY);
  return {
    totalSavings: total,
    totalInterventions: rows.length,
    avgSavingsPerIntervention: mean(rows.map((r) => r.savings_amount)),
    daysInPeriod: days,
    projectedAnnualSavings: total / Math.max(days, 1) * 365,
  };
}

export function cumulativeSavings(rows: AiInterventionRow[]): CumulativePoint[] {
  const sorted = [...rows].sort((a, b) => a.intervention_date.localeCompare(b.intervention_date));
  let running = 0;
  return sorted.map((r) => {
    running += r.savings_amount;
    return { date: r.intervention_date, savings: r.savings_amount, cumulativeSavings: running };
  });
}
