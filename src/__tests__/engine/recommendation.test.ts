import { buildRecommendation, getFinalBuyPosition, RecommendationInput } from '../../engine/recommendation';
import { buildBuyTrajectory } from '../../engine/buyProjection';
import { buildRentTrajectory } from '../../engine/rentProjection';
import { yearlyAmortizationSchedule } from '../../engine/mortgage';
import { calculateNpvSummary, calculateTotals } from '../../engine/valuation';
import { AnalysisRequest, DEFAULT_POLICY, ProjectionPolicy } from '../../models/Scenario';
import { flatCashRequest } from '../fixtures/scenarios';

function buildInput(request: AnalysisRequest, policy: ProjectionPolicy = DEFAULT_POLICY): RecommendationInput {
  const { buy, rent, common } = request;
  const schedule = yearlyAmortizationSchedule(buy.loanAmount, buy.mortgageRate, buy.loanTerm, common.sellAfterYears);
  const buyTrajectory = buildBuyTrajectory(buy, common, 0, schedule, policy);
  const rentTrajectory = buildRentTrajectory(buy, rent, common);
  return {
    buy,
    common,
    stampDuty: 0,
    buyRecords: buyTrajectory.records,
    rentRecords: rentTrajectory.records,
    sale: buyTrajectory.sale,
    npv: calculateNpvSummary(buyTrajectory.records, rentTrajectory.records, buy.investmentReturnRate),
    totals: calculateTotals(buyTrajectory.records, rentTrajectory.records),
    policy,
  };
}

describe('getFinalBuyPosition', () => {
  const input = buildInput(flatCashRequest);

  it('should use the final bank balance by default', () => {
    expect(getFinalBuyPosition(input.buyRecords, input.sale, 'bank_balance')).toBe(200000);
  });

  it('should count the sold property once on the equity basis', () => {
    expect(getFinalBuyPosition(input.buyRecords, input.sale, 'bank_balance_plus_equity')).toBe(200000);
  });

  it('should value equity before selling costs on the equity basis', () => {
    const withFees: AnalysisRequest = {
      ...flatCashRequest,
      buy: { ...flatCashRequest.buy, sellingAgentFeesPercent: 0.01 },
    };
    const feesInput = buildInput(withFees);

    expect(feesInput.sale.saleProceeds).toBe(198000);
    expect(getFinalBuyPosition(feesInput.buyRecords, feesInput.sale, 'bank_balance')).toBe(198000);
    expect(getFinalBuyPosition(feesInput.buyRecords, feesInput.sale, 'bank_balance_plus_equity')).toBe(200000);
  });
});

describe('buildRecommendation', () => {
  it('should favour the strategy with the larger final position', () => {
    const recommendation = buildRecommendation(buildInput(flatCashRequest));

    expect(recommendation.advantageous).toBe('buy');
    expect(recommendation.difference).toBe(24000);
    expect(recommendation.finalBuyPosition).toBe(200000);
    expect(recommendation.finalRentPosition).toBe(176000);
    expect(recommendation.npvFavours).toBe('buy');
    expect(recommendation.npvDifference).toBe(24000);
  });

  it('should give ties to renting', () => {
    const tied: AnalysisRequest = {
      ...flatCashRequest,
      rent: { rentPerMonth: 0, rentAnnualIncrease: 0 },
    };
    const recommendation = buildRecommendation(buildInput(tied));

    expect(recommendation.advantageous).toBe('rent');
    expect(recommendation.difference).toBe(0);
    expect(recommendation.npvFavours).toBe('rent');
    expect(recommendation.explanation.split('\n')[0]).toBe(
      'Renting appears to be more financially advantageous by £0.00 after 2 years.'
    );
  });

  it('should explain the outcome one sentence per line', () => {
    const { explanation } = buildRecommendation(buildInput(flatCashRequest));

    expect(explanation.split('\n')).toEqual([
      'Buying appears to be more financially advantageous by £24,000.00 after 2 years.',
      'The Net Present Value (NPV) analysis favours buying, with a difference of £24,000.00 when using a discount rate of 0.0%.',
      'Property appreciation: the property value is expected to increase by £0.00 over 2 years at 0.0% annual appreciation.',
      'Investment returns: the deposit of £200,000.00 would generate £0.00 in investment returns at 0.0% annual return.',
      'Initial costs: the total upfront cost of £200,000.00 includes the deposit (£200,000.00), stamp duty (£0.00) and other fees.',
      'Mortgage costs: total interest paid over the period would be £0.00 at 0.0% interest rate.',
      'Capital gains tax: none is due on sale because the property is a primary residence.',
    ]);
  });

  it('should mention rental income only when rooms are let', () => {
    const withRental: AnalysisRequest = {
      ...flatCashRequest,
      buy: {
        ...flatCashRequest.buy,
        roomRental: { monthlyRent: 500, annualIncrease: 0, monthsRentedPerYear: 6 },
      },
    };
    const lines = buildRecommendation(buildInput(withRental)).explanation.split('\n');

    expect(lines[4]).toBe('Rental income: expected to generate £6,000.00 in total rental income over the period.');
  });

  it('should report no CGT when a taxable sale makes no gain', () => {
    const input = buildInput(flatCashRequest, { ...DEFAULT_POLICY, cgtPolicy: 'always' });
    const lines = buildRecommendation(input).explanation.split('\n');

    expect(lines[lines.length - 1]).toBe('Capital gains tax: none is due on sale as there is no taxable gain.');
  });

  it('should report the CGT due on a taxable gain', () => {
    const appreciating: AnalysisRequest = {
      ...flatCashRequest,
      buy: { ...flatCashRequest.buy, homeAppreciationRate: 0.1, isSecondHome: true, cgtRate: 0.2 },
    };
    const lines = buildRecommendation(buildInput(appreciating)).explanation.split('\n');

    expect(lines[lines.length - 1]).toBe('Capital gains tax: £8,400.00 is due on a taxable gain of £42,000.00.');
  });
});
