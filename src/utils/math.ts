/**
 * Financial calculation utilities for the yearly projection.
 * All calculations use annual compounding periods unless stated otherwise.
 */

/**
 * Calculates the future value of a single sum with compound growth.
 * Formula: FV = PV × (1 + r)^n
 *
 * @param presentValue - Starting amount
 * @param rate - Growth rate per period as a decimal
 * @param periods - Number of periods
 * @returns Compounded value
 */
export function compound(presentValue: number, rate: number, periods: number): number {
  return presentValue * Math.pow(1 + rate, periods);
}

/**
 * Discount factor for a cash flow `period` periods away.
 * Formula: 1 / (1 + r)^t
 */
export function discountFactor(rate: number, period: number): number {
  return 1 / Math.pow(1 + rate, period);
}

/**
 * Net present value of a cash flow series where the first entry falls at t = 0.
 * Formula: NPV = Σ CF_t / (1 + r)^t
 *
 * @param rate - Discount rate per period as a decimal (must be greater than -1)
 * @param cashFlows - Cash flows for t = 0..N
 *
 * @example
 * ```ts
 * npv(0.1, [-100, 110]) // returns 0
 * ```
 */
export function npv(rate: number, cashFlows: readonly number[]): number {
  if (!Number.isFinite(rate) || rate <= -1) {
    throw new Error(`Discount rate must be a finite number greater than -1, got ${rate}`);
  }
  return cashFlows.reduce((sum, cashFlow, t) => sum + cashFlow * discountFactor(rate, t), 0);
}

/**
 * Sums a series of numbers.
 */
export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
