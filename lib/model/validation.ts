/**
 * Validation and guardrails for simulation parameters.
 * Hard errors block the run (InvalidParameterError); soft warnings ride along with the result.
 */

import {
  CompoundingModeSchema,
  OperationOrderSchema,
  SimulationParametersSchema,
  type OneTimeEvent,
  type SimulationParameters,
} from "@/lib/types/zod";
import { AGGRESSIVE_NET_YIELD } from "./constants";
import { resolveHorizon } from "./horizon";
import { netAnnualYield } from "./rates";
import { formatPercent } from "@/lib/utils/format";

export interface ValidationError {
  code: string;
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/** Raised before any period is computed when parameters fail validation. */
export class InvalidParameterError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(errors.map((e) => `${e.code}: ${e.message}`).join("; "));
    this.name = "InvalidParameterError";
    this.errors = errors;
  }
}

const AMOUNT_FIELDS = [
  ["openingBalance", "Opening balance"],
  ["periodicIncome", "Periodic income"],
  ["periodicContribution", "Periodic contribution"],
  ["periodicWithdrawalPre", "Withdrawal before retirement"],
  ["periodicWithdrawalPost", "Withdrawal after retirement"],
] as const;

function checkOneTimeEvent(
  event: OneTimeEvent | undefined,
  label: string,
  totalPeriods: number,
  result: ValidationResult
): void {
  if (!event) return;
  if (!Number.isFinite(event.amount)) {
    result.errors.push({ code: "INVALID_INPUT", message: `${label} amount must be a finite number` });
  } else if (event.amount < 0) {
    result.errors.push({
      code: "NEGATIVE_AMOUNT",
      message: `${label} amount cannot be negative (got ${event.amount})`,
    });
  }
  if (!Number.isInteger(event.period) || event.period < 1 || event.period > totalPeriods) {
    result.errors.push({
      code: "ONE_TIME_PERIOD_OUT_OF_RANGE",
      message: `${label} period must be between 1 and ${totalPeriods} (got ${event.period})`,
    });
  }
  if (event.amount === 0) {
    result.warnings.push({
      code: "ZERO_ONE_TIME_AMOUNT",
      message: `${label} is scheduled for period ${event.period} with a $0 amount`,
    });
  }
}

/**
 * Validate a parsed parameter record.
 * Errors mean the engine must not run; warnings are informational.
 */
export function validateParameters(params: SimulationParameters): ValidationResult {
  const result: ValidationResult = { errors: [], warnings: [] };
  const { errors, warnings } = result;

  if (!CompoundingModeSchema.options.includes(params.compoundingMode)) {
    errors.push({
      code: "UNKNOWN_COMPOUNDING_MODE",
      message: `Unknown compounding mode: ${String(params.compoundingMode)}`,
    });
  }

  if (!OperationOrderSchema.options.includes(params.operationOrder)) {
    errors.push({
      code: "UNKNOWN_OPERATION_ORDER",
      message: `Unknown operation order: ${String(params.operationOrder)}`,
    });
  }

  if (params.periodsPerYear !== 1 && params.periodsPerYear !== 12) {
    errors.push({
      code: "INVALID_PERIODS_PER_YEAR",
      message: `Periods per year must be 1 or 12 (got ${String(params.periodsPerYear)})`,
    });
  }

  for (const [field, label] of AMOUNT_FIELDS) {
    const value = params[field];
    if (!Number.isFinite(value)) {
      errors.push({ code: "INVALID_INPUT", message: `${label} must be a finite number` });
    } else if (value < 0) {
      errors.push({
        code: "NEGATIVE_AMOUNT",
        message: `${label} cannot be negative (got ${value})`,
      });
    }
  }

  const rates = [params.inflationRateAnnual, params.yieldRateAnnual, params.feeRateAnnual];
  if (!rates.every(Number.isFinite)) {
    errors.push({ code: "INVALID_INPUT", message: "Rates must be finite numbers" });
  } else {
    if (params.inflationRateAnnual <= -1) {
      errors.push({
        code: "INVALID_RATES",
        message: `Inflation must be above -100% (got ${formatPercent(params.inflationRateAnnual)})`,
      });
    }
    if (params.feeRateAnnual < 0) {
      errors.push({
        code: "INVALID_RATES",
        message: `Fees cannot be negative (got ${formatPercent(params.feeRateAnnual)})`,
      });
    }
    const netYield = netAnnualYield(params);
    if (netYield <= -1) {
      errors.push({
        code: "INVALID_RATES",
        message: `Yield net of fees must be above -100% (got ${formatPercent(netYield)})`,
      });
    }
    if (netYield > AGGRESSIVE_NET_YIELD) {
      warnings.push({
        code: "AGGRESSIVE_RETURNS",
        message: `Net yield ${formatPercent(netYield)} is aggressive; consider a conservative case`,
      });
    }
    if (params.feeRateAnnual > params.yieldRateAnnual) {
      warnings.push({
        code: "FEES_EXCEED_YIELD",
        message: "Fees exceed yield; the balance shrinks before any withdrawals",
      });
    }
  }

  if (params.compoundingMode === "annual-real-rate" && params.inflatePostWithdrawals) {
    warnings.push({
      code: "INFLATION_INLINE",
      message:
        "Annual real-rate mode already works in today's money; withdrawals are not scaled by inflation again",
    });
  }

  const { horizon } = params;
  const horizonFields: [number, string][] =
    horizon.kind === "periods"
      ? [
          [horizon.accumulationPeriods, "Accumulation periods"],
          [horizon.distributionPeriods, "Distribution periods"],
        ]
      : [
          [horizon.currentAge, "Current age"],
          [horizon.retirementAge, "Retirement age"],
          [horizon.lifeExpectancy, "Life expectancy"],
        ];
  const horizonErrorCount = errors.length;
  for (const [value, label] of horizonFields) {
    if (!Number.isFinite(value)) {
      errors.push({ code: "INVALID_INPUT", message: `${label} must be a finite number` });
    } else if (value < 0) {
      errors.push({ code: "NEGATIVE_AMOUNT", message: `${label} cannot be negative (got ${value})` });
    } else if (horizon.kind === "periods" && !Number.isInteger(value)) {
      errors.push({ code: "INVALID_INPUT", message: `${label} must be a whole number (got ${value})` });
    }
  }
  if (errors.length > horizonErrorCount) return result;

  if (horizon.kind === "ages") {
    if (horizon.retirementAge < horizon.currentAge) {
      warnings.push({
        code: "AGES_CLAMPED",
        message: `Retirement age ${horizon.retirementAge} is before current age ${horizon.currentAge}; accumulation phase is empty`,
      });
    }
    if (horizon.lifeExpectancy < horizon.retirementAge) {
      warnings.push({
        code: "AGES_CLAMPED",
        message: `Life expectancy ${horizon.lifeExpectancy} is before retirement age ${horizon.retirementAge}; distribution phase is empty`,
      });
    }
  }

  const schedule = resolveHorizon(horizon, params.periodsPerYear);
  if (schedule.totalPeriods <= 0) {
    errors.push({
      code: "EMPTY_HORIZON",
      message: "Accumulation and distribution phases add up to zero periods",
    });
    return result;
  }

  checkOneTimeEvent(params.oneTimeContribution, "One-time contribution", schedule.totalPeriods, result);
  checkOneTimeEvent(params.oneTimeWithdrawal, "One-time withdrawal", schedule.totalPeriods, result);

  return result;
}

/** Throw InvalidParameterError when validation reports any error. */
export function assertValidParameters(params: SimulationParameters): ValidationWarning[] {
  const { errors, warnings } = validateParameters(params);
  if (errors.length > 0) throw new InvalidParameterError(errors);
  return warnings;
}

/**
 * Parse untrusted input (form state, JSON) into a parameter record.
 * Schema failures and guardrail errors both surface as InvalidParameterError.
 */
export function parseSimulationParameters(input: unknown): SimulationParameters {
  const parsed = SimulationParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidParameterError(
      parsed.error.issues.map((issue) => {
        const field = issue.path.join(".");
        const code =
          field === "compoundingMode"
            ? "UNKNOWN_COMPOUNDING_MODE"
            : field === "operationOrder"
              ? "UNKNOWN_OPERATION_ORDER"
              : field === "periodsPerYear"
                ? "INVALID_PERIODS_PER_YEAR"
                : "INVALID_INPUT";
        return { code, message: field ? `${field}: ${issue.message}` : issue.message };
      })
    );
  }
  assertValidParameters(parsed.data);
  return parsed.data;
}
