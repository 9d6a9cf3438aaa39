/**
 * Helpers to derive "why" a zero-value cell appears in the period table.
 * Used for tooltips when a flow is $0 because of phase, or a balance is $0 because it ran out.
 */

import type { PeriodRow } from "@/lib/model/engine";
import type { SimulationParameters } from "@/lib/types/zod";
import { formatCurrency } from "./format";

export type ZeroExplainedField =
  | "income"
  | "contribution"
  | "withdrawal"
  | "oneTimeContribution"
  | "oneTimeWithdrawal"
  | "balanceNominal";

/**
 * Get explanation for why a cell is $0.
 * Returns null when the value is non-zero or there is nothing useful to say.
 */
export function getWhyZero(
  row: Pick<PeriodRow, ZeroExplainedField | "phase" | "wentNegative" | "preFloorBalance">,
  field: ZeroExplainedField,
  params: Pick<SimulationParameters, "periodicIncome" | "periodicContribution" | "oneTimeContribution" | "oneTimeWithdrawal">
): string | null {
  if (row[field] !== 0) return null;

  switch (field) {
    case "income":
      return row.phase === "distribution" && params.periodicIncome > 0
        ? "Retirement: no income"
        : null;
    case "contribution":
      return row.phase === "distribution" && params.periodicContribution > 0
        ? "Retirement: contributions stop"
        : null;
    case "withdrawal":
      return row.phase === "accumulation" ? "No withdrawals configured before retirement" : null;
    case "oneTimeContribution":
      return params.oneTimeContribution && params.oneTimeContribution.amount > 0
        ? `Scheduled for period ${params.oneTimeContribution.period}`
        : null;
    case "oneTimeWithdrawal":
      return params.oneTimeWithdrawal && params.oneTimeWithdrawal.amount > 0
        ? `Scheduled for period ${params.oneTimeWithdrawal.period}`
        : null;
    case "balanceNominal":
      return row.wentNegative
        ? `Balance ran out (would have been ${formatCurrency(row.preFloorBalance)}); floored at $0`
        : null;
  }
}
