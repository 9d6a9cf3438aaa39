import * as React from "react";
import { cn } from "@/lib/utils";

const VARIANT_CLASSES = {
  default: "border-border bg-surface-elevated text-content",
  destructive: "border-red-200 bg-red-50 text-red-800",
  warning: "border-amber-200 bg-amber-50 text-amber-800",
  info: "border-blue-200 bg-blue-50 text-blue-800",
} as const;

interface AlertProps extends React.ComponentProps<"div"> {
  variant?: keyof typeof VARIANT_CLASSES;
}

function Alert({ className, variant = "default", ...props }: AlertProps) {
  return (
    <div
      role="alert"
      className={cn(
        "relative grid w-full grid-cols-[auto_1fr] items-start gap-x-3 gap-y-0.5 rounded-lg border px-4 py-3 text-sm",
        VARIANT_CLASSES[variant],
        className
      )}
      {...props}
    />
  );
}

function AlertTitle({ className, ...props }: React.ComponentProps<"div">) {
  return <div className={cn("col-start-2 font-medium", className)} {...props} />;
}

function AlertDescription({ className, ...props }: React.ComponentProps<"div">) {
  return <div className={cn("col-start-2 text-sm", className)} {...props} />;
}

export { Alert, AlertTitle, AlertDescription };
