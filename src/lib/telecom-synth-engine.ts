// ─── Pulse Mobile Synthetic Data Generator ──────────────────────────────────
// Generates customers, monthly usage, support tickets and AI-assistant
// interventions in memory, matching the CSV schemas read by the dashboards.
// All data is computer-generated and describes no real customer.

import { SeededRNG } from "./seeded-rng";
import {
  PLAN_TYPES,
  CUSTOMER_SEGMENTS,
  ISSUE_TYPES,
  INTERVENTION_TYPES,
  isPlanType,
  type PlanType,
  type CustomerRow,
  type UsageRow,
  type SupportTicketRow,
  type AiInterventionRow,
  type TelecomDataset,
} from "./telecom-types";

// ═══════════════════════════════════════════════════════════════════════════════
// Config Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface SynthPopulationConfig {
  totalCustomers: number;
  usageMonths: number;         // trailing window, reference month included
  ticketRate: number;          // tickets per customer, e.g. 0.8
  aiAssistedShare: number;     // 0-1 share of customers with interventions
}

export interface SynthDateConfig {
  referenceDate: string;       // YYYY-MM-DD, anchors usage months and windows
  signupStart: string;
  signupEnd: string;
  ticketWindowStart: string;
  interventionWindowDays: number;
}

export interface SynthSimulationConfig {
  seed: number;
}

export interface SynthConfig {
  population: SynthPopulationConfig;
  dates: SynthDateConfig;
  simulation: SynthSimulationConfig;
}

export interface SynthPreviewStats {
  customers: number;
  usageRows: number;
  tickets: number;
  aiAssistedCustomers: number;
  expectedInterventions: number;
  estimatedFileSizeKB: number;
}

export interface SynthOutputStats {
  customers: number;
  usageRows: number;
  tickets: number;
  interventions: number;
  aiAssistedCustomers: number;
  avgMonthlyBill: number;
  preventableTicketPct: number;
  totalPotentialSavings: number;
  totalInterventionSavings: number;
  planDistribution: Record<string, number>;
  segmentDistribution: Record<string, number>;
}

export interface SynthResult extends TelecomDataset {
  stats: SynthOutputStats;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Presets
// ═══════════════════════════════════════════════════════════════════════════════

const DEFAULT_DATES: SynthDateConfig = {
  referenceDate: "2024-12-31",
  signupStart: "2020-01-01",
  signupEnd: "2024-01-01",
  ticketWindowStart: "2023-01-01",
  interventionWindowDays: 90,
};

export const SYNTH_PRESETS: Record<string, { label: string; description: string; config: SynthConfig }> = {
  standard: {
    label: "Standard Demo",
    description: "5,000 customers with a full year of usage history",
    config: {
      population: { totalCustomers: 5000, usageMonths: 12, ticketRate: 0.8, aiAssistedShare: 0.3 },
      dates: DEFAULT_DATES,
      simulation: { seed: 42 },
    },
  },
  quick: {
    label: "Quick Look",
    description: "Small sample for fast iteration on the dashboards",
    config: {
      population: { totalCustomers: 500, usageMonths: 6, ticketRate: 0.8, aiAssistedShare: 0.3 },
      dates: DEFAULT_DATES,
      simulation: { seed: 42 },
    },
  },
  large: {
    label: "Large Market",
    description: "20,000 customers; about 240k usage rows",
    config: {
      population: { totalCustomers: 20000, usageMonths: 12, ticketRate: 0.8, aiAssistedShare: 0.3 },
      dates: DEFAULT_DATES,
      simulation: { seed: 42 },
    },
  },
};

export function getDefaultConfig(): SynthConfig {
  return structuredClone(SYNTH_PRESETS.standard.config);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Constants
// ═══════════════════════════════════════════════════════════════════════════════

const PLAN_WEIGHTS = [0.30, 0.35, 0.25, 0.10];

const BILL_BANDS: Record<PlanType, [number, number]> = {
  Basic: [25, 35],
  Standard: [45, 65],
  Premium: [75, 95],
  Unlimited: [95, 120],
};

const DATA_GB_PARAMS: Record<PlanType, [mean: number, sd: number]> = {
  Basic: [8, 3],
  Standard: [15, 5],
  Premium: [25, 8],
  Unlimited: [45, 15],
};

// Unlimited has no entry: it never pays overage.
const OVERAGE_RULES: Partial<Record<PlanType, { includedGb: number; ratePerGb: number }>> = {
  Basic: { includedGb: 10, ratePerGb: 10 },
  Standard: { includedGb: 20, ratePerGb: 8 },
  Premium: { includedGb: 35, ratePerGb: 5 },
};

const PREVENTION_SAVINGS = new Map<string, number>([
  ["Billing Error", 25],
  ["Overage Surprise", 35],
  ["Plan Optimization", 15],
  ["Payment Failure", 10],
  ["Roaming Charges", 45],
]);

const INTERVENTION_SAVINGS = new Map<string, number>([
  ["Prevented Overage", 35],
  ["Optimized Plan", 25],
  ["Caught Billing Error", 20],
  ["Prevented Payment Failure", 10],
  ["Roaming Alert", 45],
]);

const INTERVENTION_COUNTS = [1, 2, 3, 4, 5];
const INTERVENTION_COUNT_WEIGHTS = [0.40, 0.30, 0.20, 0.08, 0.02];

const HOURS_ADMIN = Array.from({ length: 24 }, (_, i) => i + 1);        // 1..24
const HOURS_NETWORK = [0.5, 1.5, 2.5, 3.5];
const HOURS_OTHER = Array.from({ length: 8 }, (_, i) => i + 0.25);      // 0.25..7.25

const DAY = 86400000;

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function clamp(x: number, a: number, b: number): number { return Math.max(a, Math.min(b, x)); }
function round2(x: number): number { return Math.round(x * 100) / 100; }
function pad6(n: number): string { return String(n).padStart(6, "0"); }

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parses YYYY-MM-DD as a UTC midnight timestamp. */
export function parseIsoDate(value: string): number {
  const m = ISO_DATE.exec(value);
  if (!m) throw new RangeError(`Invalid date "${value}", expected YYYY-MM-DD`);
  const ms = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
  if (formatIsoDate(ms) !== value) throw new RangeError(`Invalid date "${value}"`);
  return ms;
}

export function formatIsoDate(ms: number): string {
  return new Date(ms).toISOString().split("T")[0];
}

function randomDay(rng: SeededRNG, startMs: number, endMs: number): string {
  const span = Math.max(0, Math.round((endMs - startMs) / DAY));
  return formatIsoDate(startMs + rng.int(0, span) * DAY);
}

/**
 * First day of each month in the trailing window, newest first: offset 0 is
 * the month containing `referenceDate`.
 */
export function billingMonths(referenceDate: string, months: number): string[] {
  const ref = new Date(parseIsoDate(referenceDate));
  const out: string[] = [];
  for (let offset = 0; offset < months; offset++) {
    out.push(formatIsoDate(Date.UTC(ref.getUTCFullYear(), ref.getUTCMonth() - offset, 1)));
  }
  return out;
}

export function overageCharge(planType: string, dataGb: number): number {
  const rule = isPlanType(planType) ? OVERAGE_RULES[planType] : undefined;
  if (!rule || dataGb <= rule.includedGb) return 0;
  return Math.max(0, round2((dataGb - rule.includedGb) * rule.ratePerGb));
}

/** Potential savings for a ticket's issue type; 0 when not preventable. */
export function potentialSavings(issueType: string): number {
  return PREVENTION_SAVINGS.get(issueType) ?? 0;
}

export function isAiPreventable(issueType: string): boolean {
  return PREVENTION_SAVINGS.has(issueType);
}

export function interventionSavings(interventionType: string): number {
  return INTERVENTION_SAVINGS.get(interventionType) ?? 0;
}

export function resolutionHoursFor(issueType: string): readonly number[] {
  if (issueType === "Billing Error" || issueType === "Plan Optimization") return HOURS_ADMIN;
  if (issueType === "Network Issue" || issueType === "Service Outage") return HOURS_NETWORK;
  return HOURS_OTHER;
}

export function validateConfig(cfg: SynthConfig): void {
  const { population: pop, dates } = cfg;
  if (!Number.isInteger(pop.totalCustomers) || pop.totalCustomers < 1) {
    throw new RangeError(`totalCustomers must be a positive integer, got ${pop.totalCustomers}`);
  }
  if (!Number.isInteger(pop.usageMonths) || pop.usageMonths < 1) {
    throw new RangeError(`usageMonths must be a positive integer, got ${pop.usageMonths}`);
  }
  if (!(pop.ticketRate >= 0)) throw new RangeError(`ticketRate must be >= 0, got ${pop.ticketRate}`);
  if (!(pop.aiAssistedShare >= 0 && pop.aiAssistedShare <= 1)) {
    throw new RangeError(`aiAssistedShare must be within [0, 1], got ${pop.aiAssistedShare}`);
  }
  if (!Number.isFinite(cfg.simulation.seed)) throw new RangeError("seed must be a finite number");
  if (parseIsoDate(dates.signupStart) > parseIsoDate(dates.signupEnd)) {
    throw new RangeError("signupStart must not be after signupEnd");
  }
  if (parseIsoDate(dates.ticketWindowStart) > parseIsoDate(dates.referenceDate)) {
    throw new RangeError("ticketWindowStart must not be after referenceDate");
  }
  if (!Number.isInteger(dates.interventionWindowDays) || dates.interventionWindowDays < 0) {
    throw new RangeError(`interventionWindowDays must be a non-negative integer, got ${dates.interventionWindowDays}`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Preview (fast estimation without full generation)
// ═══════════════════════════════════════════════════════════════════════════════

export function computePreview(cfg: SynthConfig): SynthPreviewStats {
  const pop = cfg.population;
  const N = pop.totalCustomers;
  const usageRows = N * pop.usageMonths;
  const tickets = Math.round(N * pop.ticketRate);
  const aiAssisted = Math.round(N * pop.aiAssistedShare);
  const meanCount = INTERVENTION_COUNTS.reduce((s, c, i) => s + c * INTERVENTION_COUNT_WEIGHTS[i], 0);
  const expectedInterventions = Math.round(aiAssisted * meanCount);

  // Rough row widths: ~110 bytes/customer, ~150/usage, ~90/ticket, ~75/intervention
  const estSizeKB = Math.round((N * 110 + usageRows * 150 + tickets * 90 + expectedInterventions * 75) / 1024);

  return {
    customers: N,
    usageRows,
    tickets,
    aiAssistedCustomers: aiAssisted,
    expectedInterventions,
    estimatedFileSizeKB: Math.max(1, estSizeKB),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Table Generators
// ═══════════════════════════════════════════════════════════════════════════════

export function generateCustomers(rng: SeededRNG, n: number, dates: SynthDateConfig): CustomerRow[] {
  const signupStart = parseIsoDate(dates.signupStart);
  const signupEnd = parseIsoDate(dates.signupEnd);
  const out: CustomerRow[] = [];

  for (let i = 0; i < n; i++) {
    const age = rng.int(18, 65);
    const planType = rng.weighted(PLAN_TYPES, PLAN_WEIGHTS);
    const [billMin, billMax] = BILL_BANDS[planType];
    const monthlyBill = round2(rng.float(billMin, billMax));
    const signupDate = randomDay(rng, signupStart, signupEnd);
    // Segment is drawn independently of plan type.
    const segment = rng.pick(CUSTOMER_SEGMENTS);
    const hasAutopay = rng.bernoulli(0.7);
    const satisfaction = clamp(Math.round(rng.normal(7.5, 1.5)), 1, 10);
    const lifetimeValue = round2(rng.float(200, 2500));

    out.push({
      customer_id: `CUST${pad6(i + 1)}`,
      age,
      plan_type: planType,
      monthly_bill: monthlyBill,
      signup_date: signupDate,
      customer_segment: segment,
      has_autopay: hasAutopay,
      satisfaction_score: satisfaction,
      total_lifetime_value: lifetimeValue,
    });
  }
  return out;
}

function sampleDataGb(rng: SeededRNG, planType: string): number {
  const [mean, sd] = isPlanType(planType) ? DATA_GB_PARAMS[planType] : DATA_GB_PARAMS.Standard;
  return Math.max(0, rng.normal(mean, sd));
}

function sampleVoiceMinutes(rng: SeededRNG, segment: string): number {
  if (segment === "Business User") return Math.max(0, rng.normal(800, 200));
  if (segment === "Social Connector") return Math.max(0, rng.normal(600, 150));
  return Math.max(0, rng.normal(400, 100));
}

function sampleTextMessages(rng: SeededRNG, age: number): number {
  if (age < 30) return Math.max(0, rng.normal(2500, 500));
  if (age < 50) return Math.max(0, rng.normal(1200, 300));
  return Math.max(0, rng.normal(400, 100));
}

/** Months outer (newest first), customers inner; data, voice, text per row. */
export function generateUsageData(
  rng: SeededRNG,
  customers: CustomerRow[],
  months: number,
  referenceDate: string,
): UsageRow[] {
  const out: UsageRow[] = [];
  for (const billingMonth of billingMonths(referenceDate, months)) {
    for (const c of customers) {
      const dataGb = round2(sampleDataGb(rng, c.plan_type));
      const voiceMinutes = round2(sampleVoiceMinutes(rng, c.customer_segment));
      const textMessages = round2(sampleTextMessages(rng, c.age));
      out.push({
        ...c,
        billing_month: billingMonth,
        data_gb: dataGb,
        voice_minutes: voiceMinutes,
        text_messages: textMessages,
        overage_charges: overageCharge(c.plan_type, dataGb),
      });
    }
  }
  return out;
}

/** Customers are drawn with replacement: some get many tickets, some none. */
export function generateSupportTickets(
  rng: SeededRNG,
  customers: CustomerRow[],
  ticketRate: number,
  dates: SynthDateConfig,
): SupportTicketRow[] {
  if (!customers.length) return [];
  const nTickets = Math.round(customers.length * ticketRate);
  const windowStart = parseIsoDate(dates.ticketWindowStart);
  const windowEnd = parseIsoDate(dates.referenceDate);
  const out: SupportTicketRow[] = [];

  for (let t = 0; t < nTickets; t++) {
    const customer = rng.pick(customers);
    const issueType = rng.pick(ISSUE_TYPES);
    const createdDate = randomDay(rng, windowStart, windowEnd);
    const resolutionHours = rng.pick(resolutionHoursFor(issueType));

    out.push({
      ticket_id: `TKT${pad6(t + 1)}`,
      customer_id: customer.customer_id,
      issue_type: issueType,
      created_date: createdDate,
      resolution_time_hours: resolutionHours,
      ai_preventable: isAiPreventable(issueType),
      potential_savings: potentialSavings(issueType),
    });
  }
  return out;
}

export function generateAiInterventions(
  rng: SeededRNG,
  customers: CustomerRow[],
  aiAssistedShare: number,
  dates: SynthDateConfig,
): AiInterventionRow[] {
  const windowEnd = parseIsoDate(dates.referenceDate);
  const windowStart = windowEnd - dates.interventionWindowDays * DAY;
  const assisted = rng.sample(customers, Math.round(customers.length * aiAssistedShare));
  const out: AiInterventionRow[] = [];

  for (const customer of assisted) {
    const count = rng.weighted(INTERVENTION_COUNTS, INTERVENTION_COUNT_WEIGHTS);
    for (let k = 0; k < count; k++) {
      const date = randomDay(rng, windowStart, windowEnd);
      const type = rng.pick(INTERVENTION_TYPES);
      const confidence = Math.round(rng.float(0.75, 0.98) * 1000) / 1000;
      out.push({
        customer_id: customer.customer_id,
        intervention_date: date,
        intervention_type: type,
        savings_amount: interventionSavings(type),
        confidence_score: confidence,
      });
    }
  }
  return out;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Full Generation
// ═══════════════════════════════════════════════════════════════════════════════

export function generateSyntheticData(cfg: SynthConfig): SynthResult {
  validateConfig(cfg);
  const rng = new SeededRNG(cfg.simulation.seed);
  const { population: pop, dates } = cfg;

  // Table order is part of the reproducibility contract.
  const customers = generateCustomers(rng, pop.totalCustomers, dates);
  const usage = generateUsageData(rng, customers, pop.usageMonths, dates.referenceDate);
  const tickets = generateSupportTickets(rng, customers, pop.ticketRate, dates);
  const interventions = generateAiInterventions(rng, customers, pop.aiAssistedShare, dates);

  const dataset = { customers, usage, tickets, interventions };
  return { ...dataset, stats: computeStatsFromData(dataset) };
}

export function computeStatsFromData(data: TelecomDataset): SynthOutputStats {
  const { customers, usage, tickets, interventions } = data;
  const N = customers.length;

  const planDistribution: Record<string, number> = {};
  const segmentDistribution: Record<string, number> = {};
  let billSum = 0;
  for (const c of customers) {
    planDistribution[c.plan_type] = (planDistribution[c.plan_type] || 0) + 1;
    segmentDistribution[c.customer_segment] = (segmentDistribution[c.customer_segment] || 0) + 1;
    billSum += c.monthly_bill;
  }

  const preventable = tickets.filter(t => t.ai_preventable).length;
  const potential = tickets.reduce((s, t) => s + t.potential_savings, 0);
  const saved = interventions.reduce((s, r) => s + r.savings_amount, 0);

  return {
    customers: N,
    usageRows: usage.length,
    tickets: tickets.length,
    interventions: interventions.length,
    aiAssistedCustomers: new Set(interventions.map(r => r.customer_id)).size,
    avgMonthlyBill: N > 0 ? round2(billSum / N) : 0,
    preventableTicketPct: tickets.length > 0 ? Math.round(preventable / tickets.length * 10000) / 100 : 0,
    totalPotentialSavings: round2(potential),
    totalInterventionSavings: round2(saved),
    planDistribution,
    segmentDistribution,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CSV Serialization
// ═══════════════════════════════════════════════════════════════════════════════

function csvLine(values: (string | number | boolean)[]): string {
  return values.map(v => {
    const s = typeof v === "boolean" ? (v ? "TRUE" : "FALSE") : String(v);
    return s.includes(",") || s.includes('"') || s.includes("\n") ? `"${s.replace(/"/g, '""')}"` : s;
  }).join(",");
}

const CUSTOMER_COLUMNS = "customer_id,age,plan_type,monthly_bill,signup_date,customer_segment,has_autopay,satisfaction_score,total_lifetime_value";

function customerValues(r: CustomerRow): (string | number | boolean)[] {
  return [r.customer_id, r.age, r.plan_type, r.monthly_bill, r.signup_date, r.customer_segment, r.has_autopay, r.satisfaction_score, r.total_lifetime_value];
}

export function serializeCustomersCsv(rows: CustomerRow[]): string {
  const lines = rows.map(r => csvLine(customerValues(r)));
  return [CUSTOMER_COLUMNS, ...lines].join("\n");
}

export function serializeUsageCsv(rows: UsageRow[]): string {
  const header = `${CUSTOMER_COLUMNS},billing_month,data_gb,voice_minutes,text_messages,overage_charges`;
  const lines = rows.map(r => csvLine([...customerValues(r), r.billing_month, r.data_gb, r.voice_minutes, r.text_messages, r.overage_charges]));
  return [header, ...lines].join("\n");
}

export function serializeTicketsCsv(rows: SupportTicketRow[]): string {
  const header = "ticket_id,customer_id,issue_type,created_date,resolution_time_hours,ai_preventable,potential_savings";
  const lines = rows.map(r => csvLine([r.ticket_id, r.customer_id, r.issue_type, r.created_date, r.resolution_time_hours, r.ai_preventable, r.potential_savings]));
  return [header, ...lines].join("\n");
}

export function serializeInterventionsCsv(rows: AiInterventionRow[]): string {
  const header = "customer_id,intervention_date,intervention_type,savings_amount,confidence_score";
  const lines = rows.map(r => csvLine([r.customer_id, r.intervention_date, r.intervention_type, r.savings_amount, r.confidence_score]));
  return [header, ...lines].join("\n");
}

export interface DatasetCsvPayload {
  customers: string;
  usage: string;
  tickets: string;
  interventions: string;
}

export function serializeDataset(data: TelecomDataset): DatasetCsvPayload {
  return {
    customers: serializeCustomersCsv(data.customers),
    usage: serializeUsageCsv(data.usage),
    tickets: serializeTicketsCsv(data.tickets),
    interventions: serializeInterventionsCsv(data.interventions),
  };
}
