import { BuyScenario, CommonParams, ProjectionPolicy, RecommendationBasis, isCgtApplicable } from "../models/Scenario";
import { BuyYearRecord, RentYearRecord } from "../models/YearRecord";
import {
  NpvSummary,
  ProjectionTotals,
  Recommendation,
  SaleSummary,
  Strategy,
  getFinalRecord,
} from "../models/ProjectionResult";
import { getUpfrontCost } from "./valuation";
import { formatCurrency, formatRate } from "../utils/format";

/**
 * Inputs for the recommendation, all taken from a finished projection.
 */
export interface RecommendationInput {
  buy: BuyScenario;
  common: CommonParams;
  stampDuty: number;
  buyRecords: readonly BuyYearRecord[];
  rentRecords: readonly RentYearRecord[];
  sale: SaleSummary;
  npv: NpvSummary;
  totals: ProjectionTotals;
  policy: ProjectionPolicy;
}

/**
 * Final position of the buy strategy.
 * The bank balance already includes the sale proceeds. The equity basis instead
 * takes the balance before the sale and adds the equity held at that point, so
 * the property is counted once.
 */
export function getFinalBuyPosition(
  buyRecords: readonly BuyYearRecord[],
  sale: SaleSummary,
  basis: RecommendationBasis
): number {
  const finalRecord = getFinalRecord(buyRecords);
  if (basis === "bank_balance_plus_equity") {
    return finalRecord.bankBalance - sale.saleProceeds + finalRecord.equity;
  }
  return finalRecord.bankBalance;
}

function strategyVerb(strategy: Strategy): string {
  return strategy === "buy" ? "Buying" : "Renting";
}

/**
 * Compare the strategies by final position and, separately, by NPV.
 * The two verdicts can disagree and both are reported. Ties go to renting.
 */
export function buildRecommendation(input: RecommendationInput): Recommendation {
  const finalBuyPosition = getFinalBuyPosition(
    input.buyRecords,
    input.sale,
    input.policy.recommendationBasis
  );
  const finalRentPosition = getFinalRecord(input.rentRecords).bankBalance;
  const advantageous: Strategy = finalBuyPosition > finalRentPosition ? "buy" : "rent";
  const npvFavours: Strategy = input.npv.buy > input.npv.rent ? "buy" : "rent";

  const recommendation: Omit<Recommendation, "explanation"> = {
    advantageous,
    difference: Math.abs(finalBuyPosition - finalRentPosition),
    finalBuyPosition,
    finalRentPosition,
    npvFavours,
    npvDifference: Math.abs(input.npv.buy - input.npv.rent),
  };

  return {
    ...recommendation,
    explanation: buildExplanation(input, recommendation),
  };
}

/**
 * Assemble the explanation, one sentence per line.
 */
export function buildExplanation(
  input: RecommendationInput,
  recommendation: Omit<Recommendation, "explanation">
): string {
  const { buy, common, sale, totals, npv } = input;
  const years = common.sellAfterYears;
  const lines: string[] = [];

  lines.push(
    `${strategyVerb(recommendation.advantageous)} appears to be more financially advantageous by ${formatCurrency(recommendation.difference)} after ${years} years.`
  );
  lines.push(
    `The Net Present Value (NPV) analysis favours ${recommendation.npvFavours === "buy" ? "buying" : "renting"}, with a difference of ${formatCurrency(recommendation.npvDifference)} when using a discount rate of ${formatRate(npv.discountRate)}.`
  );

  const appreciation = getFinalRecord(input.buyRecords).propertyValue - buy.propertyValue;
  lines.push(
    `Property appreciation: the property value is expected to increase by ${formatCurrency(appreciation)} over ${years} years at ${formatRate(buy.homeAppreciationRate)} annual appreciation.`
  );
  lines.push(
    `Investment returns: the deposit of ${formatCurrency(buy.deposit)} would generate ${formatCurrency(totals.investmentReturns)} in investment returns at ${formatRate(buy.investmentReturnRate)} annual return.`
  );

  if (buy.roomRental) {
    lines.push(
      `Rental income: expected to generate ${formatCurrency(totals.rentalIncome)} in total rental income over the period.`
    );
  }

  lines.push(
    `Initial costs: the total upfront cost of ${formatCurrency(getUpfrontCost(input.buyRecords))} includes the deposit (${formatCurrency(buy.deposit)}), stamp duty (${formatCurrency(input.stampDuty)}) and other fees.`
  );
  lines.push(
    `Mortgage costs: total interest paid over the period would be ${formatCurrency(totals.mortgageInterest)} at ${formatRate(buy.mortgageRate)} interest rate.`
  );

  if (!isCgtApplicable(buy, input.policy.cgtPolicy)) {
    lines.push("Capital gains tax: none is due on sale because the property is a primary residence.");
  } else if (sale.capitalGainsTax === 0) {
    lines.push("Capital gains tax: none is due on sale as there is no taxable gain.");
  } else {
    lines.push(
      `Capital gains tax: ${formatCurrency(sale.capitalGainsTax)} is due on a taxable gain of ${formatCurrency(sale.taxableGain)}.`
    );
  }

  return lines.join("\n");
}
