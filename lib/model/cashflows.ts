/**
 * Per-period cashflows. Contributions and withdrawals are mutually exclusive by phase:
 * distribution never reads the configured contribution or income.
 */

import type { OneTimeEvent, Phase, SimulationParameters } from "@/lib/types/zod";
import { periodsIntoDistribution, type HorizonSchedule } from "./horizon";

export interface PeriodCashflows {
  income: number;
  contribution: number;
  withdrawal: number;
  oneTimeContribution: number;
  oneTimeWithdrawal: number;
}

/** Amount of a one-time event in a given period (0 unless it is the target period). */
export function oneTimeAmountAt(event: OneTimeEvent | undefined, period: number): number {
  if (!event) return 0;
  return event.period === period ? event.amount : 0;
}

/**
 * Withdrawal for a period. Indexed post-retirement withdrawals grow with inflation,
 * anchored so the first distribution period pays the configured amount.
 */
export function withdrawalAt(
  period: number,
  phase: Phase,
  schedule: HorizonSchedule,
  params: Pick<SimulationParameters, "periodicWithdrawalPre" | "periodicWithdrawalPost" | "inflatePostWithdrawals">,
  inflationRatePerPeriod: number
): number {
  if (phase === "accumulation") return params.periodicWithdrawalPre;
  if (!params.inflatePostWithdrawals) return params.periodicWithdrawalPost;
  const n = periodsIntoDistribution(period, schedule);
  return params.periodicWithdrawalPost * Math.pow(1 + inflationRatePerPeriod, n - 1);
}

export function computeCashflows(
  period: number,
  phase: Phase,
  schedule: HorizonSchedule,
  params: SimulationParameters,
  inflationRatePerPeriod: number
): PeriodCashflows {
  const inAccumulation = phase === "accumulation";
  return {
    income: inAccumulation ? params.periodicIncome : 0,
    contribution: inAccumulation ? params.periodicContribution : 0,
    withdrawal: withdrawalAt(period, phase, schedule, params, inflationRatePerPeriod),
    oneTimeContribution: oneTimeAmountAt(params.oneTimeContribution, period),
    oneTimeWithdrawal: oneTimeAmountAt(params.oneTimeWithdrawal, period),
  };
}

export function totalInflows(c: PeriodCashflows): number {
  return c.income + c.contribution + c.oneTimeContribution;
}

export function totalOutflows(c: PeriodCashflows): number {
  return c.withdrawal + c.oneTimeWithdrawal;
}

export function netCashflow(c: PeriodCashflows): number {
  return totalInflows(c) - totalOutflows(c);
}
