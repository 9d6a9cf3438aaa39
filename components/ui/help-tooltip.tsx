"use client";

import * as TooltipPrimitive from "@radix-ui/react-tooltip";
import { Info } from "lucide-react";

type TooltipSide = "top" | "right" | "bottom" | "left";

interface HelpTooltipProps {
  /** Help text shown in the tooltip */
  content: string;
  /** Placement of tooltip relative to trigger */
  side?: TooltipSide;
  /** Accessible name for the default info trigger */
  label?: string;
  /** Custom trigger element. When omitted, uses a small info icon. Must accept ref and be focusable. */
  children?: React.ReactNode;
}

export function HelpTooltip({
  content,
  side = "top",
  label = "Help",
  children,
}: HelpTooltipProps) {
  const trigger = children ?? (
    <button
      type="button"
      className="inline-flex h-4 w-4 shrink-0 cursor-help items-center justify-center rounded text-content-muted hover:text-content focus:outline-none focus-visible:ring-2 focus-visible:ring-border"
      aria-label={label}
    >
      <Info className="h-3 w-3" aria-hidden />
    </button>
  );

  return (
    <TooltipPrimitive.Provider delayDuration={300}>
      <TooltipPrimitive.Root>
        <TooltipPrimitive.Trigger asChild>{trigger}</TooltipPrimitive.Trigger>
        <TooltipPrimitive.Portal>
          <TooltipPrimitive.Content
            side={side}
            sideOffset={6}
            className="z-50 max-w-xs rounded-md bg-content px-3 py-2 text-sm text-background shadow-md"
          >
            {content}
            <TooltipPrimitive.Arrow className="fill-content" />
          </TooltipPrimitive.Content>
        </TooltipPrimitive.Portal>
      </TooltipPrimitive.Root>
    </TooltipPrimitive.Provider>
  );
}
