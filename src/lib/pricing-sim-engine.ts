// ─── Pricing / Adoption Simulator ───────────────────────────────────────────
// Pure model behind the pricing dashboard: a linear adoption curve per
// scenario, the point estimate for the selected price, the per-segment
// breakdown and the unrounded sweep curve used for charting.

import type { CustomerRow } from "./telecom-types";

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export const ADOPTION_SCENARIOS = ["optimistic", "realistic", "conservative", "underwhelming"] as const;
export type AdoptionScenario = (typeof ADOPTION_SCENARIOS)[number];

export interface ScenarioBounds {
  label: string;
  maxAdoption: number;   // at MIN_PRICE
  minAdoption: number;   // at MAX_PRICE and beyond
}

export interface PricingEconomics {
  marketMultiplier: number;     // sample → addressable market scale-up
  fixedMonthlyCost: number;
  variableCostPerUser: number;
}

export interface PricingInput {
  price: number;
  scenario: AdoptionScenario;
  customerCount: number;
}

export interface PricingMetrics {
  price: number;
  scenario: AdoptionScenario;
  adoptionRate: number;
  addressableBase: number;
  subscribers: number;
  revenue: number;
  cost: number;
  profit: number;
  roi: number;          // percent
}

export interface SegmentAdoption {
  segment: string;
  displayName: string;
  customers: number;
  adoption: number;
}

export interface SweepPoint {
  price: number;
  adoption: number;
  subscribers: number;  // unrounded
  revenue: number;
  cost: number;
  profit: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Constants
// ═══════════════════════════════════════════════════════════════════════════════

export const MIN_PRICE = 0.99;
export const MAX_PRICE = 20;
export const SLIDER_MIN_PRICE = 1;
export const SWEEP_STEP = 0.05;
export const SEGMENT_ADOPTION_CAP = 0.8;

export const SCENARIOS: Record<AdoptionScenario, ScenarioBounds> = {
  optimistic: { label: "Optimistic", maxAdoption: 0.60, minAdoption: 0.10 },
  realistic: { label: "Realistic", maxAdoption: 0.45, minAdoption: 0.05 },
  conservative: { label: "Conservative", maxAdoption: 0.35, minAdoption: 0.03 },
  underwhelming: { label: "Underwhelming", maxAdoption: 0.25, minAdoption: 0.02 },
};

export const DEFAULT_ECONOMICS: PricingEconomics = {
  marketMultiplier: 50,
  fixedMonthlyCost: 15000,     // infrastructure and support
  variableCostPerUser: 2.25,
};

const SEGMENT_FACTORS = new Map<string, { factor: number; displayName: string }>([
  ["Business User", { factor: 1.5, displayName: "Business" }],
  ["Power User", { factor: 1.2, displayName: "Power" }],
  ["Social Connector", { factor: 0.9, displayName: "Social" }],
  ["Budget Conscious", { factor: 0.6, displayName: "Budget" }],
]);

// ═══════════════════════════════════════════════════════════════════════════════
// Model
// ═══════════════════════════════════════════════════════════════════════════════

export function isAdoptionScenario(value: string): value is AdoptionScenario {
  return ADOPTION_SCENARIOS.some((s) => s === value);
}

function assertPrice(price: number): void {
  if (!Number.isFinite(price) || price < 0) {
    throw new RangeError(`Price must be a finite, non-negative number, got ${price}`);
  }
}

function boundsFor(scenario: string): ScenarioBounds {
  if (!isAdoptionScenario(scenario)) throw new RangeError(`Unknown adoption scenario "${scenario}"`);
  return SCENARIOS[scenario];
}

/**
 * Linear decline from the scenario's max adoption at $0.99 to its min at $20,
 * never below the min.
 */
export function adoptionRate(price: number, scenario: AdoptionScenario): number {
  assertPrice(price);
  const { maxAdoption, minAdoption } = boundsFor(scenario);
  if (price >= MAX_PRICE) return minAdoption;
  const rate = maxAdoption - (price - MIN_PRICE) * (maxAdoption - minAdoption) / (MAX_PRICE - MIN_PRICE);
  return Math.max(minAdoption, rate);
}

export function addressableBase(customerCount: number, economics: PricingEconomics = DEFAULT_ECONOMICS): number {
  return customerCount * economics.marketMultiplier;
}

/** ROI in percent; 0 when there is no positive cost to divide by. */
export function computeRoi(profit: number, cost: number): number {
  if (cost <= 0) return 0;
  return profit / cost * 100;
}

export function simulatePricing(input: PricingInput, economics: PricingEconomics = DEFAULT_ECONOMICS): PricingMetrics {
  const rate = adoptionRate(input.price, input.scenario);
  const base = addressableBase(input.customerCount, economics);
  const subscribers = Math.round(base * rate);
  const revenue = subscribers * input.price;
  const cost = economics.fixedMonthlyCost + subscribers * economics.variableCostPerUser;
  const profit = revenue - cost;

  return {
    price: input.price,
    scenario: input.scenario,
    adoptionRate: rate,
    addressableBase: base,
    subscribers,
    revenue,
    cost,
    profit,
    roi: computeRoi(profit, cost),
  };
}

/** Scales the scalar rate by a fixed per-segment factor, capped at 0.8. */
export function segmentAdoptionFor(segment: string, rate: number): number {
  const factor = SEGMENT_FACTORS.get(segment)?.factor ?? 1;
  return Math.min(SEGMENT_ADOPTION_CAP, rate * factor);
}

/**
 * One entry per segment present in the customer table, ordered by adoption
 * ascending (bar chart order).
 */
export function segmentAdoption(customers: Pick<CustomerRow, "customer_segment">[], rate: number): SegmentAdoption[] {
  const counts = new Map<string, number>();
  for (const c of customers) counts.set(c.customer_segment, (counts.get(c.customer_segment) || 0) + 1);

  return [...counts.entries()]
    .map(([segment, n]) => ({
      segment,
      displayName: SEGMENT_FACTORS.get(segment)?.displayName ?? segment,
      customers: n,
      adoption: segmentAdoptionFor(segment, rate),
    }))
    .sort((a, b) => a.adoption - b.adoption || a.segment.localeCompare(b.segment));
}

/**
 * Dense evaluation over [0.99, 20]. Subscribers are left unrounded so the
 * chart stays smooth; this deliberately differs from simulatePricing.
 */
export function priceSweep(
  scenario: AdoptionScenario,
  customerCount: number,
  economics: PricingEconomics = DEFAULT_ECONOMICS,
  step: number = SWEEP_STEP,
): SweepPoint[] {
  if (!(step > 0)) throw new RangeError(`Sweep step must be positive, got ${step}`);
  const base = addressableBase(customerCount, economics);
  const nPoints = Math.floor((MAX_PRICE - MIN_PRICE) / step + 1e-9) + 1;
  const out: SweepPoint[] = [];

  for (let i = 0; i < nPoints; i++) {
    // index-based so float steps do not accumulate drift
    const price = Math.round((MIN_PRICE + i * step) * 100) / 100;
    const adoption = adoptionRate(price, scenario);
    const subscribers = base * adoption;
    const revenue = subscribers * price;
    const cost = economics.fixedMonthlyCost + subscribers * economics.variableCostPerUser;
    out.push({ price, adoption, subscribers, revenue, cost, profit: revenue - cost });
  }
  return out;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Display formatting
// ═══════════════════════════════════════════════════════════════════════════════

export function formatAdoption(rate: number): string {
  return `${(Math.round(rate * 1000) / 10).toFixed(1)}% of base`;
}

export function formatCurrency(value: number): string {
  const rounded = Math.round(value);
  const sign = rounded < 0 ? "-" : "";
  return `${sign}$${Math.abs(rounded).toLocaleString("en-US")}`;
}

export function formatRoi(roi: number): string {
  return `${(Math.round(roi * 10) / 10).toFixed(1)}%`;
}
