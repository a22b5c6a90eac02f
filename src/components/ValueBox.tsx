import InfoTooltip from "@/components/InfoTooltip";

interface ValueBoxProps {
  label: string;
  value: string;
  icon: React.ReactNode;
  accent: string;
  hint?: string;
}

export default function ValueBox({ label, value, icon, accent, hint }: ValueBoxProps) {
  return (
    <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4 flex items-center gap-4">
      <div
        className="w-10 h-10 rounded-lg flex items-center justify-center shrink-0"
        style={{ backgroundColor: `${accent}33`, color: accent }}
      >
        {icon}
      </div>
      <div className="min-w-0">
        <div className="text-[11px] text-zinc-500 flex items-center gap-1">
          {label}
          {hint && <InfoTooltip title={label} content={hint} />}
        </div>
        <div className="text-xl font-bold text-zinc-100 font-mono truncate">{value}</div>
      </div>
    </div>
  );
}
