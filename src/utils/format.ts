/**
 * Display formatting for explanation text.
 */

const GBP = new Intl.NumberFormat("en-GB", {
  style: "currency",
  currency: "GBP",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Formats an amount as pounds with two decimals.
 *
 * @example
 * ```ts
 * formatCurrency(1234.5) // returns "£1,234.50"
 * ```
 */
export function formatCurrency(value: number): string {
  // -0 would print as "-£0.00"
  return GBP.format(value === 0 ? 0 : value);
}

/**
 * Formats a decimal rate as a percentage with one decimal.
 *
 * @example
 * ```ts
 * formatRate(0.045) // returns "4.5%"
 * ```
 */
export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
