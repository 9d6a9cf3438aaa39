/**
 * Zod schemas for the savings simulator.
 * Input record for the projection engine plus the phase/mode enums shared with the UI.
 */

import { z } from "zod";

export const PhaseSchema = z.enum(["accumulation", "distribution"]);
export type Phase = z.infer<typeof PhaseSchema>;

/**
 * monthly-effective: compound at the per-period effective rate and deflate with a separate inflation index.
 * annual-real-rate: compound at the Fisher real rate; inflation is subtracted inline, balances are already real.
 */
export const CompoundingModeSchema = z.enum(["monthly-effective", "annual-real-rate"]);
export type CompoundingMode = z.infer<typeof CompoundingModeSchema>;

/** Order in which growth and net cashflow are applied within one period. */
export const OperationOrderSchema = z.enum(["growth-then-cashflow", "cashflow-then-growth"]);
export type OperationOrder = z.infer<typeof OperationOrderSchema>;

export const PeriodsPerYearSchema = z.union([z.literal(1), z.literal(12)]);
export type PeriodsPerYear = z.infer<typeof PeriodsPerYearSchema>;

export const PeriodHorizonSchema = z.object({
  kind: z.literal("periods"),
  accumulationPeriods: z.number().int().min(0),
  distributionPeriods: z.number().int().min(0),
});
export type PeriodHorizon = z.infer<typeof PeriodHorizonSchema>;

export const AgeHorizonSchema = z.object({
  kind: z.literal("ages"),
  currentAge: z.number().min(0),
  retirementAge: z.number().min(0),
  lifeExpectancy: z.number().min(0),
});
export type AgeHorizon = z.infer<typeof AgeHorizonSchema>;

/** Either explicit period counts or an age triple; both resolve to the same HorizonSchedule. */
export const HorizonSchema = z.discriminatedUnion("kind", [
  PeriodHorizonSchema,
  AgeHorizonSchema,
]);
export type Horizon = z.infer<typeof HorizonSchema>;

export const OneTimeEventSchema = z.object({
  amount: z.number(),
  /** 1-based period the amount applies in. */
  period: z.number().int(),
});
export type OneTimeEvent = z.infer<typeof OneTimeEventSchema>;

export const SimulationParametersSchema = z.object({
  openingBalance: z.number(),
  horizon: HorizonSchema,
  periodsPerYear: PeriodsPerYearSchema.default(12),
  periodicIncome: z.number().default(0),
  periodicContribution: z.number().default(0),
  periodicWithdrawalPre: z.number().default(0),
  periodicWithdrawalPost: z.number().default(0),
  /** Annual rates as decimals, e.g. 0.025 for 2.5%. */
  inflationRateAnnual: z.number(),
  yieldRateAnnual: z.number(),
  /** Fees / tax drag, subtracted from yield before conversion. */
  feeRateAnnual: z.number().default(0),
  /** Scale post-retirement withdrawals by cumulative inflation from the first distribution period. */
  inflatePostWithdrawals: z.boolean().default(false),
  oneTimeContribution: OneTimeEventSchema.optional(),
  oneTimeWithdrawal: OneTimeEventSchema.optional(),
  compoundingMode: CompoundingModeSchema.default("monthly-effective"),
  operationOrder: OperationOrderSchema.default("growth-then-cashflow"),
});
export type SimulationParameters = z.infer<typeof SimulationParametersSchema>;
