/**
 * Centralized help content for the parameter form, metrics and table.
 * Plain-language descriptions for non-experts.
 * Format: { title, description, example? }
 */

export type HelpEntry = {
  title: string;
  description: string;
  example?: string;
};

/** Format HelpEntry for tooltip/help display */
export function formatHelpContent(entry: HelpEntry): string {
  return entry.example
    ? `${entry.description} Example: ${entry.example}`
    : entry.description;
}

export type FormHelpKey =
  | "openingBalance"
  | "horizonKind"
  | "yearsToRetirement"
  | "yearsInRetirement"
  | "currentAge"
  | "retirementAge"
  | "lifeExpectancy"
  | "periodsPerYear"
  | "periodicIncome"
  | "periodicContribution"
  | "periodicWithdrawalPre"
  | "periodicWithdrawalPost"
  | "inflation"
  | "yield"
  | "fee"
  | "inflatePostWithdrawals"
  | "compoundingMode"
  | "operationOrder"
  | "oneTimeContribution"
  | "oneTimeWithdrawal";

/** Parameter form field help */
export const HELP_FORM: Record<FormHelpKey, HelpEntry> = {
  openingBalance: {
    title: "Opening balance",
    description: "What you have saved and invested today.",
  },
  horizonKind: {
    title: "Horizon",
    description:
      "Enter the saving and retirement phases as lengths in years, or as your current age, retirement age and life expectancy. Both give the same schedule.",
  },
  yearsToRetirement: {
    title: "Years till retirement",
    description: "Length of the saving phase. 0 means you retire immediately.",
  },
  yearsInRetirement: {
    title: "Years in retirement",
    description: "How long withdrawals need to last.",
    example: "25 years for a retirement from 65 to 90",
  },
  currentAge: {
    title: "Current age",
    description: "Your age today.",
  },
  retirementAge: {
    title: "Retirement age",
    description: "Age at which contributions stop and withdrawals start.",
  },
  lifeExpectancy: {
    title: "Life expectancy",
    description: "Age the plan needs to last until. Plan conservatively.",
  },
  periodsPerYear: {
    title: "Granularity",
    description:
      "Monthly simulates each month; annual simulates one step per year. Amounts are per period either way.",
  },
  periodicIncome: {
    title: "Income till retirement",
    description: "Income per period before retirement. It is added to the balance along with contributions.",
  },
  periodicContribution: {
    title: "Contribution till retirement",
    description: "Amount saved and invested each period before retirement. Always $0 after retirement.",
  },
  periodicWithdrawalPre: {
    title: "Withdrawal till retirement",
    description: "Amount taken out each period before retirement. Usually $0.",
  },
  periodicWithdrawalPost: {
    title: "Withdrawal after retirement",
    description: "Amount taken out each period in retirement, in today's money for the first retirement period.",
    example: "6,000/month",
  },
  inflation: {
    title: "Inflation (annual %)",
    description: "Used to show balances in today's money and, optionally, to raise retirement withdrawals.",
    example: "2.5% is close to long-run targets.",
  },
  yield: {
    title: "Average yield (annual %)",
    description: "Average annual return on the invested balance before fees.",
    example: "6% for a balanced portfolio",
  },
  fee: {
    title: "Fees / tax drag (annual %)",
    description: "Subtracted from yield each year: fund fees, advisory fees, tax drag.",
  },
  inflatePostWithdrawals: {
    title: "Increase retirement withdrawals with inflation",
    description:
      "When on, each retirement withdrawal grows with inflation from the first retirement period so spending power stays constant.",
  },
  compoundingMode: {
    title: "Compounding mode",
    description:
      "Effective per-period: grow at the per-period equivalent of the net yield and track inflation separately. Annual real rate: grow at the inflation-adjusted (Fisher) rate so every balance is already in today's money.",
  },
  operationOrder: {
    title: "Operation order",
    description:
      "Growth first applies the period's return to the opening balance, then adds and subtracts cashflows. Cashflow first lets this period's contribution earn the period's return.",
  },
  oneTimeContribution: {
    title: "One-time contribution",
    description: "A single deposit in one period, such as an inheritance or bonus.",
  },
  oneTimeWithdrawal: {
    title: "One-time withdrawal",
    description: "A single withdrawal in one period, such as a house down payment.",
  },
};

/** Primary dashboard metrics */
export const HELP_METRICS = {
  endingNominal: {
    title: "Ending balance (nominal)",
    description: "Balance at the end of the last period, in the money of that period.",
  },
  endingReal: {
    title: "Ending balance (today's $)",
    description: "Ending balance deflated by cumulative inflation back to the first period's purchasing power.",
  },
  horizon: {
    title: "Horizon",
    description: "Total length of saving plus retirement.",
  },
  depletion: {
    title: "Depletion",
    description:
      "First period where withdrawals exceeded the balance. The balance is floored at $0 from then on, but the simulation keeps running.",
  },
} satisfies Record<string, HelpEntry>;

/** Period / yearly table column help */
export const HELP_TABLE = {
  netCashflow: {
    title: "Net cashflow",
    description: "Income + contributions + one-time contribution − withdrawals − one-time withdrawal.",
  },
  growth: {
    title: "Growth",
    description: "Investment return added this period, net of fees.",
  },
  balanceNominal: {
    title: "Balance",
    description: "Reported balance, never below $0.",
  },
  balanceReal: {
    title: "Balance (today's $)",
    description: "Balance in first-period purchasing power.",
  },
} satisfies Record<string, HelpEntry>;
