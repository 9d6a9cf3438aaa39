import { describe, it, expect } from "vitest";
import { getWhyZero } from "./why-zero";
import { runSimulation } from "@/lib/model/engine";
import { createBaseParameters, getDepletionScenario } from "@/fixtures/golden-scenarios";

describe("getWhyZero", () => {
  const params = createBaseParameters({
    oneTimeContribution: { amount: 5_000, period: 7 },
  });
  const { rows } = runSimulation(params);

  it("explains contributions and income stopping in retirement", () => {
    const retired = rows[200];
    expect(retired && getWhyZero(retired, "contribution", params)).toBe("Retirement: contributions stop");
    expect(retired && getWhyZero(retired, "income", params)).toBe("Retirement: no income");
  });

  it("points one-time columns at their scheduled period", () => {
    const row = rows[0];
    expect(row && getWhyZero(row, "oneTimeContribution", params)).toBe("Scheduled for period 7");
    expect(row && getWhyZero(row, "oneTimeWithdrawal", params)).toBeNull();
  });

  it("returns null for non-zero cells", () => {
    const row = rows[6];
    expect(row && getWhyZero(row, "oneTimeContribution", params)).toBeNull();
    expect(row && getWhyZero(row, "contribution", params)).toBeNull();
  });

  it("explains a floored balance", () => {
    const depletion = getDepletionScenario();
    const first = runSimulation(depletion).rows[0];
    expect(first && getWhyZero(first, "balanceNominal", depletion)).toBe(
      "Balance ran out (would have been -$100); floored at $0"
    );
  });
});
