/**
 * Zustand store for simulation parameters and the computed result.
 * Every parameter change builds a fresh parameter record and reruns the engine.
 */

import { create } from "zustand";
import type {
  Horizon,
  OneTimeEvent,
  PeriodsPerYear,
  SimulationParameters,
} from "@/lib/types/zod";
import { SimulationParametersSchema } from "@/lib/types/zod";
import { runSimulation, type SimulationResult } from "@/lib/model/engine";
import { InvalidParameterError, type ValidationError } from "@/lib/model/validation";
import { rescalePeriodCount, rescalePeriodIndex } from "@/lib/model/horizon";
import {
  DEFAULT_FEE,
  DEFAULT_INFLATION,
  DEFAULT_OPENING_BALANCE,
  DEFAULT_PERIODIC_CONTRIBUTION,
  DEFAULT_PERIODIC_INCOME,
  DEFAULT_PERIODIC_WITHDRAWAL_POST,
  DEFAULT_PERIODIC_WITHDRAWAL_PRE,
  DEFAULT_PERIODS_PER_YEAR,
  DEFAULT_YEARS_IN_RETIREMENT,
  DEFAULT_YEARS_TO_RETIREMENT,
  DEFAULT_YIELD,
} from "@/lib/model/constants";

// --- Defaults ---

export function createDefaultParameters(): SimulationParameters {
  return SimulationParametersSchema.parse({
    openingBalance: DEFAULT_OPENING_BALANCE,
    horizon: {
      kind: "periods",
      accumulationPeriods: DEFAULT_YEARS_TO_RETIREMENT * DEFAULT_PERIODS_PER_YEAR,
      distributionPeriods: DEFAULT_YEARS_IN_RETIREMENT * DEFAULT_PERIODS_PER_YEAR,
    },
    periodsPerYear: DEFAULT_PERIODS_PER_YEAR,
    periodicIncome: DEFAULT_PERIODIC_INCOME,
    periodicContribution: DEFAULT_PERIODIC_CONTRIBUTION,
    periodicWithdrawalPre: DEFAULT_PERIODIC_WITHDRAWAL_PRE,
    periodicWithdrawalPost: DEFAULT_PERIODIC_WITHDRAWAL_POST,
    inflationRateAnnual: DEFAULT_INFLATION,
    yieldRateAnnual: DEFAULT_YIELD,
    feeRateAnnual: DEFAULT_FEE,
    inflatePostWithdrawals: true,
  });
}

interface ComputedState {
  result: SimulationResult | null;
  errors: ValidationError[];
}

/** Run the engine; invalid parameters clear the result instead of leaving a stale one. */
export function computeSimulation(parameters: SimulationParameters): ComputedState {
  try {
    return { result: runSimulation(parameters), errors: [] };
  } catch (e) {
    if (e instanceof InvalidParameterError) {
      console.warn(
        "[Simulation] Invalid parameters:",
        e.errors.map((err) => err.code).join(", ")
      );
      return { result: null, errors: e.errors };
    }
    throw e;
  }
}

function rescaleEvent(
  event: OneTimeEvent | undefined,
  from: number,
  to: number
): OneTimeEvent | undefined {
  if (!event) return undefined;
  return { ...event, period: rescalePeriodIndex(event.period, from, to) };
}

function rescaleHorizon(horizon: Horizon, from: number, to: number): Horizon {
  if (horizon.kind === "ages") return horizon;
  return {
    kind: "periods",
    accumulationPeriods: rescalePeriodCount(horizon.accumulationPeriods, from, to),
    distributionPeriods: rescalePeriodCount(horizon.distributionPeriods, from, to),
  };
}

// --- Store ---

interface SimulationState extends ComputedState {
  parameters: SimulationParameters;
}

interface SimulationActions {
  updateParameters: (patch: Partial<SimulationParameters>) => void;
  setHorizon: (horizon: Horizon) => void;
  /** Switch granularity, keeping horizon lengths and one-time events at the same point in time. */
  setPeriodsPerYear: (periodsPerYear: PeriodsPerYear) => void;
  setOneTimeContribution: (event: OneTimeEvent | undefined) => void;
  setOneTimeWithdrawal: (event: OneTimeEvent | undefined) => void;
  resetParameters: () => void;
}

const initialParameters = createDefaultParameters();

export const useSimulationStore = create<SimulationState & SimulationActions>()(
  (set, get) => {
    const apply = (parameters: SimulationParameters) => {
      set({ parameters, ...computeSimulation(parameters) });
    };

    return {
      parameters: initialParameters,
      ...computeSimulation(initialParameters),

      updateParameters: (patch) => {
        apply({ ...get().parameters, ...patch });
      },

      setHorizon: (horizon) => {
        apply({ ...get().parameters, horizon });
      },

      setPeriodsPerYear: (periodsPerYear) => {
        const current = get().parameters;
        const from = current.periodsPerYear;
        if (from === periodsPerYear) return;
        apply({
          ...current,
          periodsPerYear,
          horizon: rescaleHorizon(current.horizon, from, periodsPerYear),
          oneTimeContribution: rescaleEvent(current.oneTimeContribution, from, periodsPerYear),
          oneTimeWithdrawal: rescaleEvent(current.oneTimeWithdrawal, from, periodsPerYear),
        });
      },

      setOneTimeContribution: (event) => {
        apply({ ...get().parameters, oneTimeContribution: event });
      },

      setOneTimeWithdrawal: (event) => {
        apply({ ...get().parameters, oneTimeWithdrawal: event });
      },

      resetParameters: () => {
        apply(createDefaultParameters());
      },
    };
  }
);
