/**
 * Savings projection engine.
 * One pass over periods: rates and phase are lookups, cashflows and the balance step run
 * inside the loop; real values and the depletion point are derived from the finished sequence.
 *
 * Operation order defaults to growth-then-cashflow: the balance entering a period grows first,
 * then that period's inflows and outflows are netted in. This is a modeling convention, and
 * cashflow-then-growth gives different numbers for the same inputs.
 */

import type { OperationOrder, Phase, SimulationParameters } from "@/lib/types/zod";
import { classifyPeriod, resolveHorizon, yearOfPeriod, type HorizonSchedule } from "./horizon";
import {
  computeCashflows,
  netCashflow,
  totalInflows,
  totalOutflows,
  type PeriodCashflows,
} from "./cashflows";
import { netAnnualYield, resolvePeriodRates } from "./rates";
import { assertValidParameters, type ValidationWarning } from "./validation";

export interface PeriodRow extends PeriodCashflows {
  /** 1-based, gap-free. */
  period: number;
  /** 1-based projection year the period falls in. */
  year: number;
  phase: Phase;
  /** Balance carried in from the previous period (post-floor). */
  openingBalance: number;
  /** Amount added by growth this period. */
  growth: number;
  /** Balance after growth and cashflow, before the zero floor. */
  preFloorBalance: number;
  /** Reported balance in nominal terms; never negative. */
  balanceNominal: number;
  /** Reported balance deflated to period-1 money. */
  balanceReal: number;
  /** Cumulative inflation index; 1.0 at period 1. */
  inflationIndex: number;
  growthRate: number;
  inflationRate: number;
  netCashflow: number;
  /** True when preFloorBalance was negative and the reported balance was clamped to 0. */
  wentNegative: boolean;
}

/** Row as produced by the loop, before real values are derived. */
export type NominalPeriodRow = Omit<PeriodRow, "balanceReal" | "inflationIndex">;

export interface ValidationAssumption {
  code: string;
  message: string;
}

export interface SimulationValidation {
  warnings: ValidationWarning[];
  assumptions: ValidationAssumption[];
}

export interface SimulationResult {
  rows: PeriodRow[];
  schedule: HorizonSchedule;
  periodsPerYear: number;
  endingBalanceNominal: number;
  endingBalanceReal: number;
  /** First period whose pre-floor balance was negative; null when the balance never ran out. */
  depletionPeriod: number | null;
  validation: SimulationValidation;
}

export interface BalanceStep {
  growth: number;
  preFloorBalance: number;
  reportedBalance: number;
  wentNegative: boolean;
}

/**
 * Advance the balance by one period.
 * A negative result is floored at 0 and flagged; the floored value is what carries forward.
 */
export function advanceBalance(
  balance: number,
  growthRate: number,
  cashflows: PeriodCashflows,
  order: OperationOrder
): BalanceStep {
  const inflows = totalInflows(cashflows);
  const outflows = totalOutflows(cashflows);
  let growth: number;
  let preFloorBalance: number;
  if (order === "growth-then-cashflow") {
    const grown = balance * (1 + growthRate);
    growth = grown - balance;
    preFloorBalance = grown + inflows - outflows;
  } else {
    const afterCashflow = balance + inflows - outflows;
    preFloorBalance = afterCashflow * (1 + growthRate);
    growth = preFloorBalance - afterCashflow;
  }
  const wentNegative = preFloorBalance < 0;
  return {
    growth,
    preFloorBalance,
    reportedBalance: wentNegative ? 0 : preFloorBalance,
    wentNegative,
  };
}

/** (1 + inflation)^(period - 1); anchored at 1.0 for period 1. */
export function inflationIndexAt(period: number, inflationRate: number): number {
  return Math.pow(1 + inflationRate, period - 1);
}

/** Attach inflation index and real balance to each row. Returns new rows. */
export function deriveRealValues(
  rows: readonly NominalPeriodRow[],
  inflationRate: number
): PeriodRow[] {
  return rows.map((row) => {
    const inflationIndex = inflationIndexAt(row.period, inflationRate);
    return {
      ...row,
      inflationIndex,
      balanceReal: row.balanceNominal / inflationIndex,
    };
  });
}

/** First period flagged wentNegative, scanning in period order. */
export function findDepletionPeriod(rows: readonly Pick<PeriodRow, "period" | "wentNegative">[]): number | null {
  const row = rows.find((r) => r.wentNegative);
  return row?.period ?? null;
}

function buildAssumptions(params: SimulationParameters): ValidationAssumption[] {
  const assumptions: ValidationAssumption[] = [
    {
      code: "OPERATION_ORDER",
      message:
        params.operationOrder === "growth-then-cashflow"
          ? "Growth is applied to the opening balance before each period's cashflows."
          : "Each period's cashflows are applied before growth.",
    },
    {
      code: "COMPOUNDING_MODE",
      message:
        params.compoundingMode === "monthly-effective"
          ? "Rates are converted to effective per-period rates; real values use a separate inflation index."
          : "Growth uses the Fisher real rate; balances are in today's money and nominal equals real.",
    },
  ];
  if (params.feeRateAnnual > 0) {
    assumptions.push({
      code: "FEE_DRAG",
      message: `Fees of ${(params.feeRateAnnual * 100).toFixed(1)}% are subtracted from yield (net ${(netAnnualYield(params) * 100).toFixed(1)}%) before conversion.`,
    });
  }
  return assumptions;
}

/**
 * Run the projection. Throws InvalidParameterError before computing anything
 * if the parameters fail validation.
 */
export function runSimulation(params: SimulationParameters): SimulationResult {
  const warnings = assertValidParameters(params);

  const schedule = resolveHorizon(params.horizon, params.periodsPerYear);
  const { growthRate, inflationRate } = resolvePeriodRates(params);

  const nominalRows: NominalPeriodRow[] = [];
  let balance = params.openingBalance;

  for (let period = 1; period <= schedule.totalPeriods; period++) {
    const phase = classifyPeriod(period, schedule);
    const cashflows = computeCashflows(period, phase, schedule, params, inflationRate);
    const step = advanceBalance(balance, growthRate, cashflows, params.operationOrder);

    nominalRows.push({
      period,
      year: yearOfPeriod(period, params.periodsPerYear),
      phase,
      openingBalance: balance,
      growth: step.growth,
      preFloorBalance: step.preFloorBalance,
      balanceNominal: step.reportedBalance,
      growthRate,
      inflationRate,
      ...cashflows,
      netCashflow: netCashflow(cashflows),
      wentNegative: step.wentNegative,
    });

    balance = step.reportedBalance;
  }

  const rows = deriveRealValues(nominalRows, inflationRate);
  const last = rows[rows.length - 1];

  return {
    rows,
    schedule,
    periodsPerYear: params.periodsPerYear,
    endingBalanceNominal: last?.balanceNominal ?? params.openingBalance,
    endingBalanceReal: last?.balanceReal ?? params.openingBalance,
    depletionPeriod: findDepletionPeriod(rows),
    validation: {
      warnings,
      assumptions: buildAssumptions(params),
    },
  };
}
