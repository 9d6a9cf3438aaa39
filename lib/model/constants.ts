/**
 * Default constants for the savings simulator.
 * Defaults mirror a mid-career saver: 15 years to retirement, 25 years drawing down.
 */

/** Monthly granularity; 1 switches to annual periods. */
export const DEFAULT_PERIODS_PER_YEAR = 12 as const;

export const DEFAULT_OPENING_BALANCE = 250_000;

export const DEFAULT_YEARS_TO_RETIREMENT = 15;

export const DEFAULT_YEARS_IN_RETIREMENT = 25;

export const DEFAULT_PERIODIC_INCOME = 12_000;

export const DEFAULT_PERIODIC_CONTRIBUTION = 2_500;

export const DEFAULT_PERIODIC_WITHDRAWAL_PRE = 0;

export const DEFAULT_PERIODIC_WITHDRAWAL_POST = 6_000;

/** Inflation assumption, decimal. Default 2.5%. */
export const DEFAULT_INFLATION = 0.025;

/** Average yield on investment, decimal. Default 6%. */
export const DEFAULT_YIELD = 0.06;

/** Fees / tax drag, decimal. Default 0.8%. */
export const DEFAULT_FEE = 0.008;

/** Net yield above this triggers AGGRESSIVE_RETURNS. */
export const AGGRESSIVE_NET_YIELD = 0.1;

/** Slider and input bounds for the parameter form. Rates are decimals. */
export const INPUT_BOUNDS = {
  yearsToRetirement: { min: 0, max: 50 },
  yearsInRetirement: { min: 1, max: 50 },
  age: { min: 0, max: 120 },
  inflation: { min: 0, max: 0.15, step: 0.001 },
  yield: { min: 0, max: 0.2, step: 0.001 },
  fee: { min: 0, max: 0.05, step: 0.001 },
} as const;
