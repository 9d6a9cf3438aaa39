import { describe, it, expect, beforeEach, vi } from "vitest";
import { computeSimulation, createDefaultParameters, useSimulationStore } from "./simulation";
import { getBaseScenario } from "@/fixtures/golden-scenarios";

describe("createDefaultParameters", () => {
  it("matches the base scenario", () => {
    expect(createDefaultParameters()).toEqual(getBaseScenario());
  });
});

describe("computeSimulation", () => {
  it("returns errors and no result for invalid parameters", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const computed = computeSimulation({ ...getBaseScenario(), openingBalance: -5 });
    expect(computed.result).toBeNull();
    expect(computed.errors.map((e) => e.code)).toEqual(["NEGATIVE_AMOUNT"]);
    expect(warn).toHaveBeenCalledWith("[Simulation] Invalid parameters:", "NEGATIVE_AMOUNT");
    warn.mockRestore();
  });
});

describe("useSimulationStore", () => {
  beforeEach(() => {
    useSimulationStore.getState().resetParameters();
  });

  it("starts with a computed result", () => {
    const { result, errors } = useSimulationStore.getState();
    expect(errors).toEqual([]);
    expect(result?.rows).toHaveLength(480);
  });

  it("recomputes on every parameter change", () => {
    useSimulationStore.getState().updateParameters({ periodicContribution: 0 });
    const { result, parameters } = useSimulationStore.getState();
    expect(parameters.periodicContribution).toBe(0);
    expect(result?.rows[0]?.contribution).toBe(0);
  });

  it("drops the result while parameters are invalid", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    useSimulationStore.getState().setOneTimeWithdrawal({ amount: 1_000, period: 900 });
    expect(useSimulationStore.getState().result).toBeNull();
    expect(useSimulationStore.getState().errors.map((e) => e.code)).toEqual([
      "ONE_TIME_PERIOD_OUT_OF_RANGE",
    ]);
    warn.mockRestore();
  });

  it("rescales the horizon and one-time events when switching to annual periods", () => {
    useSimulationStore.getState().setOneTimeContribution({ amount: 10_000, period: 14 });
    useSimulationStore.getState().setPeriodsPerYear(1);
    const { parameters, result } = useSimulationStore.getState();
    expect(parameters.horizon).toEqual({
      kind: "periods",
      accumulationPeriods: 15,
      distributionPeriods: 25,
    });
    expect(parameters.oneTimeContribution).toEqual({ amount: 10_000, period: 2 });
    expect(result?.rows).toHaveLength(40);
  });

  it("keeps an age-based horizon unchanged across granularities", () => {
    const horizon = { kind: "ages", currentAge: 40, retirementAge: 60, lifeExpectancy: 85 } as const;
    useSimulationStore.getState().setHorizon(horizon);
    useSimulationStore.getState().setPeriodsPerYear(1);
    const { parameters, result } = useSimulationStore.getState();
    expect(parameters.horizon).toEqual(horizon);
    expect(result?.schedule.totalPeriods).toBe(45);
  });
});
