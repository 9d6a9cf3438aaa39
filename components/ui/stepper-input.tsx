"use client";

import * as React from "react";
import { MinusIcon, PlusIcon } from "lucide-react";
import { cn } from "@/lib/utils";

interface StepperInputProps
  extends Omit<React.ComponentProps<"input">, "value" | "onChange" | "min" | "max" | "step"> {
  value: number;
  onChange: (value: number) => void;
  min?: number;
  max?: number;
  step?: number;
  /** When set, display value is value * factor (e.g. 100 for %). onChange receives raw value. */
  displayFactor?: number;
  /** Decimal places shown when displayFactor scales the value. */
  precision?: number;
}

const buttonBase =
  "inline-flex h-9 w-9 shrink-0 items-center justify-center border border-border bg-surface text-content hover:bg-surface-elevated disabled:cursor-not-allowed disabled:opacity-50";

function roundTo(value: number, precision: number): number {
  const f = Math.pow(10, precision);
  return Math.round(value * f) / f;
}

export function StepperInput({
  value,
  onChange,
  min = 0,
  max = 100,
  step = 1,
  displayFactor = 1,
  precision = 0,
  className,
  id,
  ...inputProps
}: StepperInputProps) {
  const clamp = (v: number) => Math.max(min, Math.min(max, v));
  const displayValue = roundTo(value * displayFactor, precision);

  const handleInputChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    const v = parseFloat(e.target.value);
    onChange(clamp(Number.isNaN(v) ? min : v / displayFactor));
  };

  // Rounded in display units.
  const handleStep = (delta: number) => {
    onChange(clamp(roundTo((value + delta) * displayFactor, precision) / displayFactor));
  };

  return (
    <div className={cn("flex w-fit", className)}>
      <input
        id={id}
        type="number"
        min={min * displayFactor}
        max={max * displayFactor}
        step={step * displayFactor}
        value={String(displayValue)}
        onChange={handleInputChange}
        {...inputProps}
        className="h-9 w-20 rounded-l-md border border-r-0 border-border bg-surface px-2 text-sm tabular-nums text-content [appearance:textfield] [&::-webkit-inner-spin-button]:appearance-none [&::-webkit-outer-spin-button]:appearance-none"
      />
      <button
        type="button"
        className={buttonBase}
        aria-label="Decrease"
        onClick={() => handleStep(-step)}
        disabled={value <= min}
      >
        <MinusIcon className="size-4" />
      </button>
      <button
        type="button"
        className={cn(buttonBase, "rounded-r-md border-l-0")}
        aria-label="Increase"
        onClick={() => handleStep(step)}
        disabled={value >= max}
      >
        <PlusIcon className="size-4" />
      </button>
    </div>
  );
}
