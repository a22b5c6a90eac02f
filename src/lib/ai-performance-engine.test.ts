import { describe, it, expect } from "vitest";
import {
  joinInterventions,
  defaultFilters,
  filterInterventions,
  computeKpis,
  weekStart,
  weeklySavingsTrend,
  interventionPortfolio,
  segmentAiAdoption,
  monthlyTrends,
  financialSummary,
  cumulativeSavings,
  UNKNOWN_SEGMENT,
} from "./ai-performance-engine";
import type { AiInterventionRow, CustomerRow } from "./telecom-types";

function customer(id: string, segment: string): CustomerRow {
  return {
    customer_id: id,
    age: 40,
    plan_type: "Standard",
    monthly_bill: 50,
    signup_date: "2021-01-01",
    customer_segment: segment,
    has_autopay: true,
    satisfaction_score: 8,
    total_lifetime_value: 1000,
  };
}

const customers: CustomerRow[] = [
  customer("C1", "Business User"),
  customer("C2", "Business User"),
  customer("C3", "Budget Conscious"),
  customer("C4", "Power User"),
];

const interventions: AiInterventionRow[] = [
  { customer_id: "C1", intervention_date: "2024-11-04", intervention_type: "Prevented Overage", savings_amount: 35, confidence_score: 0.8 },
  { customer_id: "C3", intervention_date: "2024-11-11", intervention_type: "Prevented Overage", savings_amount: 35, confidence_score: 0.85 },
  { customer_id: "C1", intervention_date: "2024-11-06", intervention_type: "Roaming Alert", savings_amount: 45, confidence_score: 0.9 },
  { customer_id: "C9", intervention_date: "2024-12-02", intervention_type: "Optimized Plan", savings_amount: 25, confidence_score: 0.95 },
];

const joined = joinInterventions(interventions, customers);

describe("joinInterventions", () => {
  it("attaches the customer's segment and keeps unmatched rows", () => {
    expect(joined.map(r => r.customer_segment)).toEqual(["Business User", "Budget Conscious", "Business User", UNKNOWN_SEGMENT]);
    expect(joined[0].monthly_bill).toBe(50);
    expect(joined[3].monthly_bill).toBeNull();
  });
});

describe("defaultFilters", () => {
  it("spans every date, type and segment present", () => {
    expect(defaultFilters(interventions, customers)).toEqual({
      startDate: "2024-11-04",
      endDate: "2024-12-02",
      interventionTypes: ["Prevented Overage", "Roaming Alert", "Optimized Plan"],
      segments: ["Business User", "Budget Conscious", "Power User"],
    });
  });

  it("leaves the range empty without interventions", () => {
    const f = defaultFilters([], customers);
    expect(f.startDate).toBe("");
    expect(f.endDate).toBe("");
  });
});

describe("filterInterventions", () => {
  it("applies date range, types and segments together", () => {
    const rows = filterInterventions(joined, {
      startDate: "2024-11-01",
      endDate: "2024-11-30",
      interventionTypes: ["Prevented Overage", "Roaming Alert"],
      segments: ["Business User"],
    });
    expect(rows.map(r => r.intervention_date)).toEqual(["2024-11-04", "2024-11-06"]);
  });

  it("treats both ends of the range as inclusive", () => {
    const rows = filterInterventions(joined, {
      startDate: "2024-11-04",
      endDate: "2024-11-04",
      interventionTypes: ["Prevented Overage"],
      segments: ["Business User"],
    });
    expect(rows).toHaveLength(1);
  });
});

describe("computeKpis", () => {
  it("totals savings, interventions, confidence and customers", () => {
    const kpis = computeKpis(interventions);
    expect(kpis.totalSavings).toBe(140);
    expect(kpis.totalInterventions).toBe(4);
    expect(kpis.avgConfidence).toBeCloseTo(0.875, 10);
    expect(kpis.uniqueCustomers).toBe(3);
  });

  it("returns zeros for an empty selection", () => {
    expect(computeKpis([])).toEqual({ totalSavings: 0, totalInterventions: 0, avgConfidence: 0, uniqueCustomers: 0 });
  });
});

describe("trends", () => {
  it("starts weeks on Monday", () => {
    expect(weekStart("2024-11-10")).toBe("2024-11-04");
    expect(weekStart("2024-11-11")).toBe("2024-11-11");
  });

  it("sums savings per week in date order", () => {
    expect(weeklySavingsTrend(interventions)).toEqual([
      { period: "2024-11-04", savings: 80 },
      { period: "2024-11-11", savings: 35 },
      { period: "2024-12-02", savings: 25 },
    ]);
  });

  it("groups monthly savings by intervention type", () => {
    const points = monthlyTrends(interventions);
    expect(points.map(p => [p.month, p.interventionType, p.savings])).toEqual([
      ["2024-11-01", "Prevented Overage", 70],
      ["2024-11-01", "Roaming Alert", 45],
      ["2024-12-01", "Optimized Plan", 25],
    ]);
    expect(points[0].avgConfidence).toBeCloseTo(0.825, 10);
  });

  it("accumulates savings in date order", () => {
    expect(cumulativeSavings(interventions).map(p => p.cumulativeSavings)).toEqual([35, 80, 115, 140]);
  });
});

describe("interventionPortfolio", () => {
  it("aggregates per intervention type", () => {
    const portfolio = interventionPortfolio(interventions);
    expect(portfolio.map(p => [p.interventionType, p.totalSavings, p.count])).toEqual([
      ["Optimized Plan", 25, 1],
      ["Prevented Overage", 70, 2],
      ["Roaming Alert", 45, 1],
    ]);
  });
});

describe("segmentAiAdoption", () => {
  it("divides assisted customers by the segment size", () => {
    expect(segmentAiAdoption(joined, customers)).toEqual([
      { segment: "Budget Conscious", assistedCustomers: 1, totalCustomers: 1, adoptionRate: 1, totalSavings: 35 },
      { segment: "Business User", assistedCustomers: 1, totalCustomers: 2, adoptionRate: 0.5, totalSavings: 80 },
    ]);
  });
});

describe("financialSummary", () => {
  it("projects the daily average onto a year", () => {
    const summary = financialSummary(interventions, { startDate: "2024-11-01", endDate: "2024-11-30" });
    expect(summary.totalSavings).toBe(140);
    expect(summary.avgSavingsPerIntervention).toBe(35);
    expect(summary.daysInPeriod).toBe(29);
    expect(summary.projectedAnnualSavings).toBeCloseTo(140 / 29 * 365, 8);
  });

  it("uses at least one day for a single-day range", () => {
    const summary = financialSummary(interventions.slice(0, 1), { startDate: "2024-11-04", endDate: "2024-11-04" });
    expect(summary.projectedAnnualSavings).toBe(35 * 365);
  });
});
