import { BalanceSheet, BuyYearRecord, RentYearRecord } from "./YearRecord";
import { ProjectionPolicy } from "./Scenario";

/**
 * Projection result data structures
 */

export type Strategy = "buy" | "rent";

export interface SaleSummary {
  year: number;
  sellingPrice: number;
  agentFees: number;
  remainingMortgage: number;
  originalCost: number; // purchase price + conveyancing + stamp duty
  totalMortgageInterest: number;
  mortgageInterestDeduction: number;
  capitalGain: number;
  taxableGain: number;
  capitalGainsTax: number;
  saleProceeds: number;
}

export interface NpvSummary {
  buy: number;
  rent: number;
  discountRate: number;
}

export interface ProjectionTotals {
  buyCashFlow: number; // sum of the buy cash flow series
  rentCashFlow: number;
  finalBuyBalance: number;
  finalRentBalance: number;
  investmentReturns: number;
  rentPaid: number;
  rentalIncome: number;
  mortgageInterest: number;
}

export interface CostBreakdown {
  buy: {
    initialCosts: {
      deposit: number;
      conveyancingFees: number;
      stampDuty: number;
      upfrontRenovation: number;
      upfrontFurniture: number;
    };
    ongoingCosts: {
      mortgagePayments: number;
      homeInsurance: number;
      utilities: number;
    };
    sellingCosts: {
      agentFees: number;
      capitalGainsTax: number;
    };
  };
  rent: {
    rentPayments: number;
    utilities: number;
  };
}

export interface Recommendation {
  advantageous: Strategy; // by final position
  difference: number; // absolute, in currency
  finalBuyPosition: number;
  finalRentPosition: number;
  npvFavours: Strategy;
  npvDifference: number; // absolute
  explanation: string;
}

export interface ProjectionResult {
  years: number[];
  buy: BuyYearRecord[];
  rent: RentYearRecord[];
  buyBalanceSheets: BalanceSheet[];
  rentBalanceSheets: BalanceSheet[];
  stampDuty: number;
  monthlyMortgagePayment: number;
  sale: SaleSummary;
  npv: NpvSummary;
  totals: ProjectionTotals;
  costBreakdown: CostBreakdown;
  recommendation: Recommendation;
  policy: ProjectionPolicy;
}

/**
 * Get the last year record of a series
 */
export function getFinalRecord<T>(records: readonly T[]): T {
  const last = records[records.length - 1];
  if (last === undefined) {
    throw new Error("Projection series is empty");
  }
  return last;
}
