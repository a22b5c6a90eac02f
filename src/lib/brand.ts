// Brand theming for the dashboards. Styling only; nothing here feeds a
// computation.

export const BRAND = {
  name: "Pulse Mobile",
  product: "Pulse AI Assistant",
  colors: {
    primary: "#8a2be2",
    success: "#4cd964",
    warning: "#ffc107",
    revenue: "#595959",
    cost: "#a1a1aa",
    grid: "#27272a",
    axis: "#71717a",
  },
  // one colour per intervention type, in INTERVENTION_TYPES order
  series: ["#8a2be2", "#4cd964", "#06b6d4", "#f59e0b", "#ef4444"],
  disclaimer: "This project contains synthetic data and analysis created for demonstration purposes only.",
} as const;

export const TOOLTIP_STYLE = {
  backgroundColor: "#18181b",
  border: "1px solid #3f3f46",
  borderRadius: 8,
  fontSize: 11,
} as const;
