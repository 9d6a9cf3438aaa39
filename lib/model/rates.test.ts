import { describe, it, expect } from "vitest";
import {
  annualToPeriodic,
  fisherRealRate,
  netAnnualYield,
  resolvePeriodRates,
} from "./rates";
import { createBaseParameters } from "@/fixtures/golden-scenarios";

describe("annualToPeriodic", () => {
  it("is the identity for annual periods", () => {
    expect(annualToPeriodic(0.12, 1)).toBe(0.12);
  });

  it("compounds back to the annual rate over 12 months", () => {
    const monthly = annualToPeriodic(0.1, 12);
    expect(monthly).toBeLessThan(0.1 / 12);
    expect(Math.pow(1 + monthly, 12)).toBeCloseTo(1.1, 12);
  });

  it("returns exactly 0 for a 0% rate", () => {
    expect(annualToPeriodic(0, 12)).toBe(0);
  });
});

describe("fisherRealRate", () => {
  it("combines nominal and inflation as (1+n)/(1+i) - 1", () => {
    expect(fisherRealRate(0.05, 0.02)).toBeCloseTo(0.0294117647, 9);
  });

  it("is 0 when nominal equals inflation", () => {
    expect(fisherRealRate(0.03, 0.03)).toBe(0);
  });
});

describe("resolvePeriodRates", () => {
  it("subtracts fees from yield", () => {
    expect(netAnnualYield({ yieldRateAnnual: 0.06, feeRateAnnual: 0.01 })).toBeCloseTo(0.05, 12);
  });

  it("monthly-effective: converts net yield and inflation separately", () => {
    const rates = resolvePeriodRates(createBaseParameters());
    expect(rates.growthRate).toBe(annualToPeriodic(0.06 - 0.008, 12));
    expect(rates.inflationRate).toBe(annualToPeriodic(0.025, 12));
  });

  it("annual-real-rate: nets inflation into growth and drops the inflation index", () => {
    const rates = resolvePeriodRates(
      createBaseParameters({ compoundingMode: "annual-real-rate" })
    );
    expect(rates.growthRate).toBe(
      annualToPeriodic(fisherRealRate(0.06 - 0.008, 0.025), 12)
    );
    expect(rates.inflationRate).toBe(0);
  });

  it("annual-real-rate with annual periods uses the Fisher rate directly", () => {
    const rates = resolvePeriodRates(
      createBaseParameters({ compoundingMode: "annual-real-rate", periodsPerYear: 1 })
    );
    expect(rates.growthRate).toBe(fisherRealRate(0.06 - 0.008, 0.025));
  });

  it("the two modes give different growth rates for the same inputs", () => {
    const monthly = resolvePeriodRates(createBaseParameters());
    const real = resolvePeriodRates(createBaseParameters({ compoundingMode: "annual-real-rate" }));
    expect(real.growthRate).toBeLessThan(monthly.growthRate);
  });
});
