import { AnalysisRequest, DEFAULT_POLICY, ProjectionPolicy } from "../models/Scenario";
import { ProjectionResult, SaleSummary } from "../models/ProjectionResult";
import { AnalysisRequestSchema, parseOrThrow } from "../utils/validation";
import { formatCurrency } from "../utils/format";
import { stampDuty as calculateStampDuty } from "./stampDuty";
import { monthlyPayment, yearlyAmortizationSchedule } from "./mortgage";
import { buildBuyTrajectory } from "./buyProjection";
import { buildRentTrajectory } from "./rentProjection";
import { calculateCostBreakdown, calculateNpvSummary, calculateTotals } from "./valuation";
import { buildRecommendation } from "./recommendation";

export interface ProjectionOptions {
  /** Log the sale breakdown through console.debug. Never affects results. */
  debug?: boolean;
}

function logSale(sale: SaleSummary): void {
  console.debug(
    [
      `Original cost: ${formatCurrency(sale.originalCost)}`,
      `Total mortgage interest: ${formatCurrency(sale.totalMortgageInterest)}`,
      `Mortgage interest deduction: ${formatCurrency(sale.mortgageInterestDeduction)}`,
      `Capital gain: ${formatCurrency(sale.capitalGain)}`,
      `Taxable gain: ${formatCurrency(sale.taxableGain)}`,
      `CGT: ${formatCurrency(sale.capitalGainsTax)}`,
      `Agent fees: ${formatCurrency(sale.agentFees)}`,
      `Remaining mortgage: ${formatCurrency(sale.remainingMortgage)}`,
      `Final sale proceeds: ${formatCurrency(sale.saleProceeds)}`,
    ].join("\n")
  );
}

/**
 * Project buying against renting over the holding period.
 *
 * Validates the request first and throws InvalidProjectionInputError listing every
 * failed precondition; nothing is computed for an invalid request. Each call works
 * on its own data only, so identical inputs always give identical results.
 *
 * @param request - Buy, rent and common parameters with rates as decimal fractions
 * @param policy - Overrides for the accounting conventions; see DEFAULT_POLICY
 */
export function runProjection(
  request: AnalysisRequest,
  policy: Partial<ProjectionPolicy> = {},
  options: ProjectionOptions = {}
): ProjectionResult {
  const parsed = parseOrThrow(AnalysisRequestSchema, {
    ...request,
    policy: { ...DEFAULT_POLICY, ...policy },
  });
  const { buy, rent, common } = parsed;
  const resolvedPolicy: ProjectionPolicy = parsed.policy ?? DEFAULT_POLICY;

  const stampDuty = calculateStampDuty(buy.propertyValue, buy.isSecondHome);
  const schedule = yearlyAmortizationSchedule(
    buy.loanAmount,
    buy.mortgageRate,
    buy.loanTerm,
    common.sellAfterYears
  );

  const buyTrajectory = buildBuyTrajectory(buy, common, stampDuty, schedule, resolvedPolicy);
  const rentTrajectory = buildRentTrajectory(buy, rent, common);
  if (options.debug) {
    logSale(buyTrajectory.sale);
  }

  const npv = calculateNpvSummary(
    buyTrajectory.records,
    rentTrajectory.records,
    buy.investmentReturnRate
  );
  const totals = calculateTotals(buyTrajectory.records, rentTrajectory.records);

  return {
    years: buyTrajectory.records.map((record) => record.year),
    buy: buyTrajectory.records,
    rent: rentTrajectory.records,
    buyBalanceSheets: buyTrajectory.balanceSheets,
    rentBalanceSheets: rentTrajectory.balanceSheets,
    stampDuty,
    monthlyMortgagePayment: monthlyPayment(buy.loanAmount, buy.mortgageRate, buy.loanTerm),
    sale: buyTrajectory.sale,
    npv,
    totals,
    costBreakdown: calculateCostBreakdown(
      buy,
      stampDuty,
      buyTrajectory.records,
      rentTrajectory.records,
      buyTrajectory.sale
    ),
    recommendation: buildRecommendation({
      buy,
      common,
      stampDuty,
      buyRecords: buyTrajectory.records,
      rentRecords: rentTrajectory.records,
      sale: buyTrajectory.sale,
      npv,
      totals,
      policy: resolvedPolicy,
    }),
    policy: resolvedPolicy,
  };
}
