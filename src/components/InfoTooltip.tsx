"use client";

import { useState } from "react";
import { Info, AlertTriangle } from "lucide-react";

type TooltipVariant = "info" | "warning";

const VARIANT_STYLES: Record<TooltipVariant, { icon: React.ReactNode; border: string; titleColor: string }> = {
  info: {
    icon: <Info size={12} />,
    border: "border-violet-500/30",
    titleColor: "text-violet-400",
  },
  warning: {
    icon: <AlertTriangle size={12} />,
    border: "border-amber-500/30",
    titleColor: "text-amber-400",
  },
};

/** Hover hint next to a metric label. */
export default function InfoTooltip({ title, content }: { title: string; content: React.ReactNode }) {
  const [isOpen, setIsOpen] = useState(false);

  return (
    <span className="relative inline-flex items-center">
      <button
        type="button"
        aria-label={title}
        onClick={() => setIsOpen(!isOpen)}
        onMouseEnter={() => setIsOpen(true)}
        onMouseLeave={() => setIsOpen(false)}
        className="inline-flex items-center justify-center w-4 h-4 rounded-full text-violet-500/60 hover:text-violet-400 hover:bg-violet-500/10 transition-all"
      >
        <Info size={12} />
      </button>
      {isOpen && (
        <div className="absolute z-50 bottom-full left-1/2 -translate-x-1/2 mb-2 w-64 rounded-lg border border-violet-500/30 bg-zinc-950 shadow-xl shadow-black/50 p-3">
          <div className="text-xs font-semibold text-violet-400 mb-1.5">{title}</div>
          <div className="text-[11px] text-zinc-400 leading-relaxed">{content}</div>
        </div>
      )}
    </span>
  );
}

export function InfoBanner({
  title,
  children,
  variant = "info",
}: {
  title: string;
  children: React.ReactNode;
  variant?: TooltipVariant;
}) {
  const [collapsed, setCollapsed] = useState(false);
  const style = VARIANT_STYLES[variant];

  return (
    <div className={`rounded-lg border ${style.border} bg-zinc-950 overflow-hidden`}>
      <button
        type="button"
        onClick={() => setCollapsed(!collapsed)}
        className={`w-full flex items-center gap-2 px-3 py-2 text-xs font-semibold ${style.titleColor} hover:bg-zinc-900/50 transition-colors`}
      >
        {style.icon}
        {title}
        <span className="ml-auto text-zinc-600 text-[10px]">{collapsed ? "show" : "hide"}</span>
      </button>
      {!collapsed && (
        <div className="px-3 pb-3 text-[11px] text-zinc-400 leading-relaxed">{children}</div>
      )}
    </div>
  );
}
