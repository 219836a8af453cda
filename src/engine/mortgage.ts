import { MONTHS_PER_YEAR } from "../utils/constants";

/**
 * One year of a fixed-rate repayment mortgage.
 */
export interface YearlyAmortization {
  year: number; // 1-indexed
  openingBalance: number;
  payment: number;
  interest: number;
  principal: number;
  closingBalance: number;
}

function assertLoanTerms(principal: number, annualRate: number, years: number): void {
  if (!Number.isFinite(principal) || principal < 0) {
    throw new Error(`Mortgage principal must be a non-negative finite number, got ${principal}`);
  }
  if (!Number.isFinite(annualRate) || annualRate < 0) {
    throw new Error(`Mortgage rate must be a non-negative finite number, got ${annualRate}`);
  }
  if (!Number.isFinite(years) || years <= 0) {
    throw new Error(`Loan term must be a positive number of years, got ${years}`);
  }
}

/**
 * Calculates the monthly payment of a fixed-rate annuity mortgage.
 * Formula: PMT = P × r / (1 - (1+r)^-n), r = annualRate / 12, n = years × 12
 *
 * A 0% rate amortizes linearly (P / n).
 *
 * @param principal - Loan amount
 * @param annualRate - Annual interest rate as a decimal
 * @param years - Loan term in years
 */
export function monthlyPayment(principal: number, annualRate: number, years: number): number {
  assertLoanTerms(principal, annualRate, years);

  const periods = years * MONTHS_PER_YEAR;
  if (annualRate === 0) {
    return principal / periods;
  }

  const monthlyRate = annualRate / MONTHS_PER_YEAR;
  const payment = (principal * monthlyRate) / (1 - Math.pow(1 + monthlyRate, -periods));
  if (!Number.isFinite(payment)) {
    throw new Error(
      `Mortgage payment is not finite for principal ${principal}, rate ${annualRate}, term ${years} years`
    );
  }
  return payment;
}

/**
 * Builds the yearly schedule used by the projection.
 *
 * Interest is charged once a year on the balance at the start of the year and the
 * rest of twelve monthly payments reduces principal. The last year of the term
 * repays whatever is still outstanding, and nothing is paid after the term.
 *
 * @param horizonYears - Number of years to schedule; defaults to the full term
 */
export function yearlyAmortizationSchedule(
  principal: number,
  annualRate: number,
  termYears: number,
  horizonYears: number = termYears
): YearlyAmortization[] {
  const annualPayment = monthlyPayment(principal, annualRate, termYears) * MONTHS_PER_YEAR;
  const schedule: YearlyAmortization[] = [];
  let balance = principal;

  for (let year = 1; year <= horizonYears; year++) {
    const openingBalance = balance;
    let interest = 0;
    let principalPaid = 0;

    if (year <= termYears && openingBalance > 0) {
      interest = openingBalance * annualRate;
      principalPaid = annualPayment - interest;
      if (year >= termYears || principalPaid > openingBalance) {
        principalPaid = openingBalance;
      }
    }

    balance = openingBalance - principalPaid;
    schedule.push({
      year,
      openingBalance,
      payment: interest + principalPaid,
      interest,
      principal: principalPaid,
      closingBalance: balance,
    });
  }

  return schedule;
}

/**
 * Total interest over a schedule
 */
export function totalInterest(schedule: readonly YearlyAmortization[]): number {
  return schedule.reduce((sum, row) => sum + row.interest, 0);
}
