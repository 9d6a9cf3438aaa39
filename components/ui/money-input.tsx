"use client";

import * as React from "react";
import { cn } from "@/lib/utils";

export function formatWithCommas(value: string): string {
  if (value === "" || value === "-") return value;
  const hasNegative = value.startsWith("-");
  const cleaned = value.replace(/[^0-9.]/g, "");
  const [intPart = "", decPart] = cleaned.split(".");
  const formatted = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return (hasNegative ? "-" : "") + formatted + (decPart !== undefined ? "." + decPart : "");
}

/** Parse user text ("12,500.50") to a number; empty or invalid text is 0. */
export function parseMoney(text: string): number {
  const n = parseFloat(text.replace(/,/g, ""));
  return Number.isNaN(n) ? 0 : n;
}

interface MoneyInputProps
  extends Omit<React.ComponentProps<"input">, "type" | "value" | "onChange"> {
  value: number;
  onChange: (value: number) => void;
}

/** Dollar amount input. Shows thousands separators while keeping the typed text stable. */
export function MoneyInput({ className, value, onChange, ...props }: MoneyInputProps) {
  const [text, setText] = React.useState(() => (value === 0 ? "" : String(value)));

  React.useEffect(() => {
    if (parseMoney(text) !== value) {
      setText(value === 0 ? "" : String(value));
    }
    // Only resync when the value changes from outside (e.g. reset).
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [value]);

  return (
    <div
      className={cn(
        "flex h-9 w-full items-center rounded-md border border-border bg-surface px-2 text-sm focus-within:ring-2 focus-within:ring-border",
        className
      )}
    >
      <span className="pr-1 text-content-muted">$</span>
      <input
        type="text"
        inputMode="decimal"
        autoComplete="off"
        placeholder="0"
        className="w-full bg-transparent tabular-nums text-content outline-none"
        value={formatWithCommas(text)}
        onChange={(e) => {
          const raw = e.target.value.replace(/,/g, "");
          setText(raw);
          onChange(parseMoney(raw));
        }}
        {...props}
      />
    </div>
  );
}
