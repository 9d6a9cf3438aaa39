/**
 * Roll period rows up into one row per (year, phase).
 * Flow fields are summed; balance fields take the last period's value in the group.
 */

import type { PeriodRow } from "@/lib/model/engine";
import type { Phase } from "@/lib/types/zod";

export interface YearlyRow {
  year: number;
  phase: Phase;
  /** First and last period in the group. */
  firstPeriod: number;
  lastPeriod: number;
  income: number;
  contribution: number;
  withdrawal: number;
  oneTimeContribution: number;
  oneTimeWithdrawal: number;
  netCashflow: number;
  growth: number;
  endingBalanceNominal: number;
  endingBalanceReal: number;
  /** Any period in the group went negative. */
  depleted: boolean;
}

const FLOW_FIELDS = [
  "income",
  "contribution",
  "withdrawal",
  "oneTimeContribution",
  "oneTimeWithdrawal",
  "netCashflow",
  "growth",
] as const;

export function aggregateByYear(rows: readonly PeriodRow[]): YearlyRow[] {
  const yearly: YearlyRow[] = [];
  let current: YearlyRow | null = null;

  for (const row of rows) {
    if (!current || current.year !== row.year || current.phase !== row.phase) {
      current = {
        year: row.year,
        phase: row.phase,
        firstPeriod: row.period,
        lastPeriod: row.period,
        income: 0,
        contribution: 0,
        withdrawal: 0,
        oneTimeContribution: 0,
        oneTimeWithdrawal: 0,
        netCashflow: 0,
        growth: 0,
        endingBalanceNominal: row.balanceNominal,
        endingBalanceReal: row.balanceReal,
        depleted: false,
      };
      yearly.push(current);
    }
    for (const field of FLOW_FIELDS) {
      current[field] += row[field];
    }
    current.lastPeriod = row.period;
    current.endingBalanceNominal = row.balanceNominal;
    current.endingBalanceReal = row.balanceReal;
    current.depleted = current.depleted || row.wentNegative;
  }

  return yearly;
}
