// ─── Pulse Mobile dataset types ─────────────────────────────────────────────
// Row shapes match the CSV columns written by telecom-synth-engine and read
// back by telecom-data.

export const PLAN_TYPES = ["Basic", "Standard", "Premium", "Unlimited"] as const;
export type PlanType = (typeof PLAN_TYPES)[number];

export const CUSTOMER_SEGMENTS = ["Budget Conscious", "Power User", "Social Connector", "Business User"] as const;
export type CustomerSegment = (typeof CUSTOMER_SEGMENTS)[number];

export const ISSUE_TYPES = [
  "Billing Error", "Overage Surprise", "Plan Optimization",
  "Network Issue", "Account Security", "Service Outage",
  "Payment Failure", "Roaming Charges", "Feature Confusion",
] as const;
export type IssueType = (typeof ISSUE_TYPES)[number];

export const INTERVENTION_TYPES = [
  "Prevented Overage", "Optimized Plan", "Caught Billing Error",
  "Prevented Payment Failure", "Roaming Alert",
] as const;
export type InterventionType = (typeof INTERVENTION_TYPES)[number];

// Parsed files may carry labels outside the closed sets; rows keep them as
// plain strings and the engines treat unknown values with defaults.

export interface CustomerRow {
  customer_id: string;
  age: number;
  plan_type: string;
  monthly_bill: number;
  signup_date: string;          // YYYY-MM-DD
  customer_segment: string;
  has_autopay: boolean;
  satisfaction_score: number;   // 1-10
  total_lifetime_value: number;
}

export interface UsageRow extends CustomerRow {
  billing_month: string;        // first day of month, YYYY-MM-DD
  data_gb: number;
  voice_minutes: number;
  text_messages: number;
  overage_charges: number;
}

export interface SupportTicketRow {
  ticket_id: string;
  customer_id: string;
  issue_type: string;
  created_date: string;
  resolution_time_hours: number;
  ai_preventable: boolean;
  potential_savings: number;
}

export interface AiInterventionRow {
  customer_id: string;
  intervention_date: string;
  intervention_type: string;
  savings_amount: number;
  confidence_score: number;     // 0.75-0.98
}

export interface TelecomDataset {
  customers: CustomerRow[];
  usage: UsageRow[];
  tickets: SupportTicketRow[];
  interventions: AiInterventionRow[];
}

export function isPlanType(value: string): value is PlanType {
  return PLAN_TYPES.some((p) => p === value);
}

export function isCustomerSegment(value: string): value is CustomerSegment {
  return CUSTOMER_SEGMENTS.some((s) => s === value);
}
