import { describe, it, expect } from "vitest";
import { aggregateByYear } from "./yearly-summary";
import { runSimulation } from "@/lib/model/engine";
import {
  createBaseParameters,
  getBaseScenario,
  getZeroRateScenario,
} from "@/fixtures/golden-scenarios";

describe("aggregateByYear", () => {
  it("produces one row per year when phases align with years", () => {
    const { rows } = runSimulation(getBaseScenario());
    const yearly = aggregateByYear(rows);
    expect(yearly).toHaveLength(40);
    expect(yearly[14]?.phase).toBe("accumulation");
    expect(yearly[15]?.phase).toBe("distribution");
  });

  it("sums flow fields and takes the last period's balances", () => {
    const { rows } = runSimulation(getBaseScenario());
    const yearly = aggregateByYear(rows);
    for (const y of yearly) {
      const inYear = rows.filter((r) => r.year === y.year && r.phase === y.phase);
      const sum = (field: "income" | "contribution" | "withdrawal" | "netCashflow") =>
        inYear.reduce((s, r) => s + r[field], 0);
      expect(y.income).toBeCloseTo(sum("income"), 6);
      expect(y.contribution).toBeCloseTo(sum("contribution"), 6);
      expect(y.withdrawal).toBeCloseTo(sum("withdrawal"), 6);
      expect(y.netCashflow).toBeCloseTo(sum("netCashflow"), 6);
      expect(y.endingBalanceNominal).toBe(inYear[inYear.length - 1]?.balanceNominal);
      expect(y.endingBalanceReal).toBe(inYear[inYear.length - 1]?.balanceReal);
    }
    expect(yearly[0]?.contribution).toBe(30_000);
    expect(yearly[0]?.income).toBe(144_000);
    expect(yearly[16]?.contribution).toBe(0);
  });

  it("splits a year that straddles retirement by phase", () => {
    const { rows } = runSimulation(
      createBaseParameters({
        horizon: { kind: "periods", accumulationPeriods: 18, distributionPeriods: 6 },
      })
    );
    const yearly = aggregateByYear(rows);
    expect(
      yearly.map((y) => [y.year, y.phase, y.firstPeriod, y.lastPeriod])
    ).toEqual([
      [1, "accumulation", 1, 12],
      [2, "accumulation", 13, 18],
      [2, "distribution", 19, 24],
    ]);
  });

  it("zero rates: yearly balances step by twelve contributions", () => {
    const yearly = aggregateByYear(runSimulation(getZeroRateScenario()).rows);
    expect(yearly.map((y) => y.endingBalanceNominal)).toEqual([16_000, 22_000, 22_000]);
    expect(yearly.map((y) => y.depleted)).toEqual([false, false, false]);
  });

  it("marks a year depleted if any period in it went negative", () => {
    const yearly = aggregateByYear(
      runSimulation(
        createBaseParameters({
          openingBalance: 0,
          horizon: { kind: "periods", accumulationPeriods: 24, distributionPeriods: 0 },
          periodicIncome: 0,
          periodicContribution: 0,
          periodicWithdrawalPre: 100,
          oneTimeContribution: { amount: 10_000, period: 2 },
        })
      ).rows
    );
    expect(yearly.map((y) => y.depleted)).toEqual([true, false]);
  });
});
