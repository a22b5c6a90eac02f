// ─── Dataset parsing ────────────────────────────────────────────────────────
// Turns the generated CSV files back into typed rows. Works in the browser
// (dashboard fetches) and in Node (dataset-store, tests).

import Papa from "papaparse";
import type {
  CustomerRow,
  UsageRow,
  SupportTicketRow,
  AiInterventionRow,
  TelecomDataset,
} from "./telecom-types";
import type { DatasetCsvPayload } from "./telecom-synth-engine";

export const DATASET_KEYS = ["customers", "usage", "tickets", "interventions"] as const;

export const DATA_FILES = {
  customers: "synthetic-customers.csv",
  usage: "synthetic-usage-data.csv",
  tickets: "synthetic-support-tickets.csv",
  interventions: "synthetic-ai-interventions.csv",
} as const satisfies Record<keyof DatasetCsvPayload, string>;

function parseBool(v: string | undefined): boolean {
  return String(v).toLowerCase() === "true";
}

function parseNum(v: string | undefined): number {
  return Number(v) || 0;
}

export function parseCsvRows(text: string): Record<string, string>[] {
  return Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true }).data;
}

export function parseCustomers(rows: Record<string, string>[]): CustomerRow[] {
  return rows.map((r) => ({
    customer_id: r.customer_id ?? "",
    age: parseNum(r.age),
    plan_type: r.plan_type ?? "",
    monthly_bill: parseNum(r.monthly_bill),
    signup_date: r.signup_date ?? "",
    customer_segment: r.customer_segment ?? "",
    has_autopay: parseBool(r.has_autopay),
    satisfaction_score: parseNum(r.satisfaction_score),
    total_lifetime_value: parseNum(r.total_lifetime_value),
  }));
}

export function parseUsage(rows: Record<string, string>[]): UsageRow[] {
  const customers = parseCustomers(rows);
  return rows.map((r, i) => ({
    ...customers[i],
    billing_month: r.billing_month ?? "",
    data_gb: parseNum(r.data_gb),
    voice_minutes: parseNum(r.voice_minutes),
    text_messages: parseNum(r.text_messages),
    overage_charges: parseNum(r.overage_charges),
  }));
}

export function parseTickets(rows: Record<string, string>[]): SupportTicketRow[] {
  return rows.map((r) => ({
    ticket_id: r.ticket_id ?? "",
    customer_id: r.customer_id ?? "",
    issue_type: r.issue_type ?? "",
    created_date: r.created_date ?? "",
    resolution_time_hours: parseNum(r.resolution_time_hours),
    ai_preventable: parseBool(r.ai_preventable),
    potential_savings: parseNum(r.potential_savings),
  }));
}

export function parseInterventions(rows: Record<string, string>[]): AiInterventionRow[] {
  return rows.map((r) => ({
    customer_id: r.customer_id ?? "",
    intervention_date: r.intervention_date ?? "",
    intervention_type: r.intervention_type ?? "",
    savings_amount: parseNum(r.savings_amount),
    confidence_score: parseNum(r.confidence_score),
  }));
}

export function parseDataset(csv: DatasetCsvPayload): TelecomDataset {
  return {
    customers: parseCustomers(parseCsvRows(csv.customers)),
    usage: parseUsage(parseCsvRows(csv.usage)),
    tickets: parseTickets(parseCsvRows(csv.tickets)),
    interventions: parseInterventions(parseCsvRows(csv.interventions)),
  };
}

/** Every customer_id referenced by usage, tickets or interventions that has no customer row. */
export function findOrphanReferences(data: TelecomDataset): string[] {
  const known = new Set(data.customers.map((c) => c.customer_id));
  const orphans = new Set<string>();
  for (const r of data.usage) if (!known.has(r.customer_id)) orphans.add(r.customer_id);
  for (const r of data.tickets) if (!known.has(r.customer_id)) orphans.add(r.customer_id);
  for (const r of data.interventions) if (!known.has(r.customer_id)) orphans.add(r.customer_id);
  return [...orphans].sort();
}

/** Narrows a request body to the four CSV strings, or null when any is missing. */
export function toCsvPayload(body: unknown): DatasetCsvPayload | null {
  if (typeof body !== "object" || body === null) return null;
  const fields = new Map(Object.entries(body));
  const pick = (key: string): string | null => {
    const v = fields.get(key);
    return typeof v === "string" ? v : null;
  };
  const customers = pick("customers");
  const usage = pick("usage");
  const tickets = pick("tickets");
  const interventions = pick("interventions");
  if (customers === null || usage === null || tickets === null || interventions === null) return null;
  return { customers, usage, tickets, interventions };
}
