/**
 * Golden scenario fixtures shared by engine, aggregation and export tests.
 */

import type { SimulationParameters } from "@/lib/types/zod";

export function createBaseParameters(
  overrides?: Partial<SimulationParameters>
): SimulationParameters {
  return {
    openingBalance: 250_000,
    horizon: { kind: "periods", accumulationPeriods: 180, distributionPeriods: 300 },
    periodsPerYear: 12,
    periodicIncome: 12_000,
    periodicContribution: 2_500,
    periodicWithdrawalPre: 0,
    periodicWithdrawalPost: 6_000,
    inflationRateAnnual: 0.025,
    yieldRateAnnual: 0.06,
    feeRateAnnual: 0.008,
    inflatePostWithdrawals: true,
    compoundingMode: "monthly-effective",
    operationOrder: "growth-then-cashflow",
    ...overrides,
  };
}

/** 15 years saving, 25 years drawing down, monthly. */
export function getBaseScenario(): SimulationParameters {
  return createBaseParameters();
}

/** Same horizon as the base scenario, expressed as ages 50 / 65 / 90. */
export function getAgeBasedScenario(): SimulationParameters {
  return createBaseParameters({
    horizon: { kind: "ages", currentAge: 50, retirementAge: 65, lifeExpectancy: 90 },
  });
}

/** Nothing saved, withdrawing 100 a period from the start. */
export function getDepletionScenario(): SimulationParameters {
  return createBaseParameters({
    openingBalance: 0,
    horizon: { kind: "periods", accumulationPeriods: 12, distributionPeriods: 12 },
    periodicIncome: 0,
    periodicContribution: 0,
    periodicWithdrawalPre: 100,
    periodicWithdrawalPost: 0,
  });
}

/** No growth, fees or inflation: the balance is plain arithmetic. */
export function getZeroRateScenario(): SimulationParameters {
  return createBaseParameters({
    openingBalance: 10_000,
    horizon: { kind: "periods", accumulationPeriods: 24, distributionPeriods: 12 },
    periodicIncome: 0,
    periodicContribution: 500,
    periodicWithdrawalPost: 0,
    inflationRateAnnual: 0,
    yieldRateAnnual: 0,
    feeRateAnnual: 0,
    inflatePostWithdrawals: false,
  });
}

/** Accumulation phase of zero length. */
export function getImmediateRetirementScenario(): SimulationParameters {
  return createBaseParameters({
    openingBalance: 1_000_000,
    horizon: { kind: "periods", accumulationPeriods: 0, distributionPeriods: 360 },
  });
}
