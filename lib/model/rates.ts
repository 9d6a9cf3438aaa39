/**
 * Rate conversion: annual rates to per-period effective rates.
 */

import type { SimulationParameters } from "@/lib/types/zod";

export interface PeriodRates {
  /** Per-period growth applied to the balance. */
  growthRate: number;
  /** Per-period inflation used for the real-value index. 0 when inflation is already netted into growth. */
  inflationRate: number;
}

/**
 * Effective per-period rate with the same annual compounding.
 * (1 + annual)^(1 / periodsPerYear) - 1; identity for annual periods.
 */
export function annualToPeriodic(annual: number, periodsPerYear: number): number {
  if (periodsPerYear === 1) return annual;
  return Math.pow(1 + annual, 1 / periodsPerYear) - 1;
}

/**
 * Real rate from nominal and inflation (Fisher).
 * real = (1 + nominal) / (1 + inflation) - 1
 */
export function fisherRealRate(nominal: number, inflation: number): number {
  return (1 + nominal) / (1 + inflation) - 1;
}

/** Annual yield net of fees. Fees are a flat drag, not compounded against yield. */
export function netAnnualYield(params: Pick<SimulationParameters, "yieldRateAnnual" | "feeRateAnnual">): number {
  return params.yieldRateAnnual - params.feeRateAnnual;
}

/** Per-period growth and inflation for the configured compounding mode. */
export function resolvePeriodRates(
  params: Pick<
    SimulationParameters,
    "yieldRateAnnual" | "feeRateAnnual" | "inflationRateAnnual" | "periodsPerYear" | "compoundingMode"
  >
): PeriodRates {
  const netYield = netAnnualYield(params);
  switch (params.compoundingMode) {
    case "monthly-effective":
      return {
        growthRate: annualToPeriodic(netYield, params.periodsPerYear),
        inflationRate: annualToPeriodic(params.inflationRateAnnual, params.periodsPerYear),
      };
    case "annual-real-rate":
      return {
        growthRate: annualToPeriodic(
          fisherRealRate(netYield, params.inflationRateAnnual),
          params.periodsPerYear
        ),
        inflationRate: 0,
      };
  }
}
