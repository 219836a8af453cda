/**
 * Shared constants for the buy vs rent projection.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** A marginal stamp duty band: value above `lower` and up to `upper` is taxed at `rate`. */
export interface TaxBand {
  lower: number;
  upper: number;
  rate: number;
}

/** Standard residential stamp duty bands. */
export const STANDARD_STAMP_DUTY_BANDS: readonly TaxBand[] = [
  { lower: 0, upper: 250000, rate: 0 },
  { lower: 250000, upper: 925000, rate: 0.05 },
  { lower: 925000, upper: 1500000, rate: 0.1 },
  { lower: 1500000, upper: Infinity, rate: 0.12 },
];

/** Stamp duty bands for an additional (second) home. */
export const SECOND_HOME_STAMP_DUTY_BANDS: readonly TaxBand[] = [
  { lower: 0, upper: 125000, rate: 0.05 },
  { lower: 125000, upper: 250000, rate: 0.07 },
  { lower: 250000, upper: Infinity, rate: 0.1 },
];

/** Default capital gains tax rate for residential property. */
export const DEFAULT_CGT_RATE = 0.28;

/** Share of cumulative mortgage interest deducted from the capital gain. */
export const MORTGAGE_INTEREST_DEDUCTION_SHARE = 0.2;

/** Once the dependent moves out the whole property is let: two tenants, all year. */
export const FULL_HOUSE_TENANTS = 2;

export const MONTHS_PER_YEAR = 12;
