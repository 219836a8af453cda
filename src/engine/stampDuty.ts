import {
  TaxBand,
  STANDARD_STAMP_DUTY_BANDS,
  SECOND_HOME_STAMP_DUTY_BANDS,
} from "../utils/constants";

/**
 * Get the stamp duty band table for a purchase
 */
export function getStampDutyBands(isSecondHome: boolean): readonly TaxBand[] {
  return isSecondHome ? SECOND_HOME_STAMP_DUTY_BANDS : STANDARD_STAMP_DUTY_BANDS;
}

/**
 * Calculate progressive stamp duty on a property purchase.
 *
 * Each band taxes the slice of the value that falls inside it at its own rate,
 * so lower bands are always fully taxed before a higher band applies.
 * No rounding is applied.
 *
 * @example
 * ```ts
 * stampDuty(300000, false) // returns 2500 (50,000 taxed at 5%)
 * ```
 */
export function stampDuty(propertyValue: number, isSecondHome: boolean = false): number {
  if (!Number.isFinite(propertyValue) || propertyValue < 0) {
    throw new Error(`propertyValue must be a non-negative finite number, got ${propertyValue}`);
  }

  let duty = 0;
  for (const band of getStampDutyBands(isSecondHome)) {
    if (propertyValue > band.lower) {
      const taxable = Math.min(propertyValue - band.lower, band.upper - band.lower);
      duty += taxable * band.rate;
    }
  }
  return duty;
}
