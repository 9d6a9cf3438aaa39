/**
 * Format currency for display.
 */
const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return CURRENCY_FORMAT.format(amount);
}

/** Axis labels: $1.2M, $350k, $900. */
export function formatCompactCurrency(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1_000_000) return `$${(value / 1_000_000).toFixed(1)}M`;
  if (abs >= 1_000) return `$${(value / 1_000).toFixed(0)}k`;
  return `$${Math.round(value).toLocaleString("en-US")}`;
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** "Month 14" for monthly runs, "Year 14" for annual ones. */
export function formatPeriodLabel(period: number, periodsPerYear: number): string {
  return periodsPerYear === 12 ? `Month ${period}` : `Year ${period}`;
}

/** "40 years (480 months)"; annual runs omit the parenthetical. */
export function formatHorizon(totalPeriods: number, periodsPerYear: number): string {
  const years = totalPeriods / periodsPerYear;
  const yearsLabel = Number.isInteger(years) ? String(years) : years.toFixed(1);
  if (periodsPerYear === 1) return `${yearsLabel} years`;
  return `${yearsLabel} years (${totalPeriods} months)`;
}
