/**
 * Export simulation output as CSV for download.
 * Period export carries every field of the period record; yearly export mirrors the yearly table.
 */

import type { PeriodRow, SimulationResult } from "@/lib/model/engine";
import type { YearlyRow } from "./yearly-summary";
import { aggregateByYear } from "./yearly-summary";

export const DEFAULT_EXPORT_FILENAME = "retirement_simulation.csv";

function escapeCsv(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Money to cents; rates and indexes keep full precision. */
function formatCsvAmount(n: number): string {
  return n.toFixed(2);
}

const PERIOD_HEADERS = [
  "period",
  "year",
  "phase",
  "openingBalance",
  "growthRate",
  "inflationRate",
  "income",
  "contribution",
  "withdrawal",
  "oneTimeContribution",
  "oneTimeWithdrawal",
  "netCashflow",
  "growth",
  "preFloorBalance",
  "balanceNominal",
  "balanceReal",
  "wentNegative",
] as const;

function periodRowToCells(row: PeriodRow): string[] {
  return [
    String(row.period),
    String(row.year),
    escapeCsv(row.phase),
    formatCsvAmount(row.openingBalance),
    String(row.growthRate),
    String(row.inflationRate),
    formatCsvAmount(row.income),
    formatCsvAmount(row.contribution),
    formatCsvAmount(row.withdrawal),
    formatCsvAmount(row.oneTimeContribution),
    formatCsvAmount(row.oneTimeWithdrawal),
    formatCsvAmount(row.netCashflow),
    formatCsvAmount(row.growth),
    formatCsvAmount(row.preFloorBalance),
    formatCsvAmount(row.balanceNominal),
    formatCsvAmount(row.balanceReal),
    row.wentNegative ? "true" : "false",
  ];
}

/** Build CSV string with one line per period, followed by warnings and assumptions. */
export function projectionToCsv(result: SimulationResult): string {
  const lines: string[] = [PERIOD_HEADERS.join(",")];
  for (const row of result.rows) {
    lines.push(periodRowToCells(row).join(","));
  }

  let csv = lines.join("\n");

  const { warnings, assumptions } = result.validation;
  if (warnings.length > 0 || assumptions.length > 0) {
    csv += "\n\n";
    csv += "--- Validation ---\n";
    if (warnings.length > 0) {
      csv += "Warnings:\n";
      for (const w of warnings) {
        csv += `  ${w.code}: ${w.message.replace(/\n/g, " ")}\n`;
      }
    }
    if (assumptions.length > 0) {
      csv += "Assumptions:\n";
      for (const a of assumptions) {
        csv += `  ${a.code}: ${a.message.replace(/\n/g, " ")}\n`;
      }
    }
  }

  return csv;
}

const YEARLY_HEADERS = [
  "year",
  "phase",
  "income",
  "contribution",
  "withdrawal",
  "oneTimeContribution",
  "oneTimeWithdrawal",
  "netCashflow",
  "growth",
  "endingBalanceNominal",
  "endingBalanceReal",
  "depleted",
] as const;

export function yearlySummaryToCsv(rows: readonly YearlyRow[]): string {
  const lines: string[] = [YEARLY_HEADERS.join(",")];
  for (const row of rows) {
    lines.push(
      [
        String(row.year),
        escapeCsv(row.phase),
        formatCsvAmount(row.income),
        formatCsvAmount(row.contribution),
        formatCsvAmount(row.withdrawal),
        formatCsvAmount(row.oneTimeContribution),
        formatCsvAmount(row.oneTimeWithdrawal),
        formatCsvAmount(row.netCashflow),
        formatCsvAmount(row.growth),
        formatCsvAmount(row.endingBalanceNominal),
        formatCsvAmount(row.endingBalanceReal),
        row.depleted ? "true" : "false",
      ].join(",")
    );
  }
  return lines.join("\n");
}

/** Trigger browser download of the simulation as CSV. */
export function downloadProjectionCsv(
  result: SimulationResult,
  options?: { view?: "period" | "yearly"; filename?: string }
): void {
  if (result.rows.length === 0) {
    console.warn("[Export] Simulation has no periods; nothing to download");
    return;
  }
  const view = options?.view ?? "period";
  const csv =
    view === "yearly"
      ? yearlySummaryToCsv(aggregateByYear(result.rows))
      : projectionToCsv(result);
  const blob = new Blob([csv], { type: "text/csv;charset=utf-8;" });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download =
    options?.filename ??
    (view === "yearly" ? "retirement_simulation_yearly.csv" : DEFAULT_EXPORT_FILENAME);
  document.body.appendChild(a);
  a.click();
  document.body.removeChild(a);
  URL.revokeObjectURL(url);
}
