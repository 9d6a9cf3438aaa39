/**
 * Horizon schedule and phase classification.
 */

import type { AgeHorizon, Horizon, PeriodHorizon, Phase } from "@/lib/types/zod";

export interface HorizonSchedule {
  accumulationPeriods: number;
  distributionPeriods: number;
  totalPeriods: number;
}

/** Floor that ignores binary rounding noise, e.g. (65.1 - 30.1) * 12 = 419.99999999999994. */
function floorPeriods(value: number): number {
  return Math.floor(Math.round(value * 1e9) / 1e9);
}

/**
 * Resolve period counts or an age triple to a schedule.
 * Ages: (retirement - current) and (life expectancy - retirement) years, floored at 0 periods.
 */
export function resolveHorizon(horizon: Horizon, periodsPerYear: number): HorizonSchedule {
  let accumulationPeriods: number;
  let distributionPeriods: number;
  if (horizon.kind === "periods") {
    accumulationPeriods = Math.max(0, horizon.accumulationPeriods);
    distributionPeriods = Math.max(0, horizon.distributionPeriods);
  } else {
    accumulationPeriods = Math.max(
      0,
      floorPeriods((horizon.retirementAge - horizon.currentAge) * periodsPerYear)
    );
    distributionPeriods = Math.max(
      0,
      floorPeriods((horizon.lifeExpectancy - horizon.retirementAge) * periodsPerYear)
    );
  }
  return {
    accumulationPeriods,
    distributionPeriods,
    totalPeriods: accumulationPeriods + distributionPeriods,
  };
}

/** Age triple spanning the same schedule, starting at currentAge. */
export function toAgeHorizon(
  horizon: PeriodHorizon,
  periodsPerYear: number,
  currentAge: number
): AgeHorizon {
  const retirementAge = currentAge + horizon.accumulationPeriods / periodsPerYear;
  return {
    kind: "ages",
    currentAge,
    retirementAge,
    lifeExpectancy: retirementAge + horizon.distributionPeriods / periodsPerYear,
  };
}

export function toPeriodHorizon(horizon: Horizon, periodsPerYear: number): PeriodHorizon {
  if (horizon.kind === "periods") return horizon;
  const { accumulationPeriods, distributionPeriods } = resolveHorizon(horizon, periodsPerYear);
  return { kind: "periods", accumulationPeriods, distributionPeriods };
}

/** Keep a one-time event inside 1..totalPeriods (1 when the horizon is empty). */
export function clampEventPeriod(period: number, totalPeriods: number): number {
  return Math.max(1, Math.min(Math.max(1, totalPeriods), period));
}

/** Last accumulation period belongs to accumulation; everything after is distribution. */
export function classifyPeriod(period: number, schedule: HorizonSchedule): Phase {
  return period <= schedule.accumulationPeriods ? "accumulation" : "distribution";
}

/** 1-based position within the distribution phase; 0 during accumulation. */
export function periodsIntoDistribution(period: number, schedule: HorizonSchedule): number {
  return Math.max(0, period - schedule.accumulationPeriods);
}

/** 1-based calendar year of the projection a period falls in. */
export function yearOfPeriod(period: number, periodsPerYear: number): number {
  return Math.floor((period - 1) / periodsPerYear) + 1;
}

/** Convert a period count between granularities, e.g. 180 months to 15 years. */
export function rescalePeriodCount(count: number, fromPerYear: number, toPerYear: number): number {
  return Math.round((count * toPerYear) / fromPerYear);
}

/** Map a 1-based period to the first period of the same point in time at another granularity. */
export function rescalePeriodIndex(period: number, fromPerYear: number, toPerYear: number): number {
  return Math.floor(((period - 1) * toPerYear) / fromPerYear) + 1;
}
