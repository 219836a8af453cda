/**
 * Scenario input data structures.
 * All rates are decimal fractions (e.g., 0.045 for 4.5%).
 */

/**
 * Letting part of the property while the dependent lives there.
 * Present or absent as a whole.
 */
export interface RoomRental {
  monthlyRent: number;
  annualIncrease: number;
  monthsRentedPerYear: number;
}

export interface BuyScenario {
  mortgageRate: number;
  loanTerm: number; // years
  deposit: number;
  conveyancingFees: number;
  propertyValue: number;
  sellingAgentFeesPercent: number;
  homeAppreciationRate: number;
  investmentReturnRate: number;
  upfrontRenovationCost: number;
  upfrontFurnitureCost: number;
  homeInsurance: number; // annual
  roomRental?: RoomRental;
  loanAmount: number; // propertyValue - deposit, computed by the caller
  isSecondHome: boolean;
  cgtRate: number;
}

export interface RentScenario {
  rentPerMonth: number;
  rentAnnualIncrease: number;
}

export interface CommonParams {
  utilitiesPerMonth: number;
  sellAfterYears: number;
  childLivingYears: number; // occupancy window
}

export interface AnalysisRequest {
  buy: BuyScenario;
  rent: RentScenario;
  common: CommonParams;
}

export type CgtPolicy = "second_home_only" | "always";
export type OpeningBalance = "funds_spent" | "debited";
export type RecommendationBasis = "bank_balance" | "bank_balance_plus_equity";

/**
 * Switches between the accounting conventions the calculator has supported.
 */
export interface ProjectionPolicy {
  cgtPolicy: CgtPolicy;
  openingBalance: OpeningBalance;
  recommendationBasis: RecommendationBasis;
}

export const DEFAULT_POLICY: ProjectionPolicy = {
  cgtPolicy: "second_home_only",
  openingBalance: "funds_spent",
  recommendationBasis: "bank_balance",
};

/**
 * Get the loan amount implied by a property value and deposit
 */
export function getLoanAmount(propertyValue: number, deposit: number): number {
  return propertyValue - deposit;
}

/**
 * Check whether CGT is charged on sale under a policy
 */
export function isCgtApplicable(buy: BuyScenario, policy: CgtPolicy): boolean {
  return policy === "always" || buy.isSecondHome;
}
