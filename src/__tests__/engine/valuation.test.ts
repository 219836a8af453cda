import { buildBuyTrajectory } from '../../engine/buyProjection';
import { buildRentTrajectory } from '../../engine/rentProjection';
import { yearlyAmortizationSchedule } from '../../engine/mortgage';
import {
  calculateCostBreakdown,
  calculateNpvSummary,
  calculateTotals,
  getUpfrontCost,
  sumComponent,
} from '../../engine/valuation';
import { DEFAULT_POLICY } from '../../models/Scenario';
import { flatCashRequest } from '../fixtures/scenarios';

function buildFlat() {
  const { buy, rent, common } = flatCashRequest;
  const schedule = yearlyAmortizationSchedule(buy.loanAmount, buy.mortgageRate, buy.loanTerm, common.sellAfterYears);
  const buyTrajectory = buildBuyTrajectory(buy, common, 0, schedule, DEFAULT_POLICY);
  const rentTrajectory = buildRentTrajectory(buy, rent, common);
  return { buyTrajectory, rentTrajectory };
}

describe('valuation', () => {
  const { buyTrajectory, rentTrajectory } = buildFlat();

  describe('sumComponent', () => {
    it('should sum a label across years, treating missing years as 0', () => {
      expect(sumComponent(rentTrajectory.records, 'rent_payments')).toBe(-24000);
      expect(sumComponent(rentTrajectory.records, 'rental_income')).toBe(0);
    });
  });

  describe('calculateNpvSummary', () => {
    it('should discount both series at the same rate', () => {
      const summary = calculateNpvSummary(buyTrajectory.records, rentTrajectory.records, 0);
      expect(summary).toEqual({ buy: 0, rent: -24000, discountRate: 0 });
    });

    it('should discount later cash flows more heavily', () => {
      const summary = calculateNpvSummary(buyTrajectory.records, rentTrajectory.records, 0.1);
      expect(summary.buy).toBeCloseTo(-200000 + 200000 / 1.21, 6);
      expect(summary.rent).toBeCloseTo(-12000 / 1.1 - 12000 / 1.21, 6);
    });
  });

  describe('calculateTotals', () => {
    it('should total cash flows and final balances', () => {
      expect(calculateTotals(buyTrajectory.records, rentTrajectory.records)).toEqual({
        buyCashFlow: 0,
        rentCashFlow: -24000,
        finalBuyBalance: 200000,
        finalRentBalance: 176000,
        investmentReturns: 0,
        rentPaid: 24000,
        rentalIncome: 0,
        mortgageInterest: 0,
      });
    });
  });

  describe('calculateCostBreakdown', () => {
    it('should report every cost as a positive amount', () => {
      const breakdown = calculateCostBreakdown(
        flatCashRequest.buy,
        0,
        buyTrajectory.records,
        rentTrajectory.records,
        buyTrajectory.sale
      );
      expect(breakdown.buy.initialCosts.deposit).toBe(200000);
      expect(breakdown.buy.ongoingCosts.mortgagePayments).toBe(0);
      expect(breakdown.buy.sellingCosts.capitalGainsTax).toBe(0);
      expect(breakdown.rent.rentPayments).toBe(24000);
      expect(breakdown.rent.utilities).toBe(0);
    });
  });

  describe('getUpfrontCost', () => {
    it('should negate the year-0 cash flow', () => {
      expect(getUpfrontCost(buyTrajectory.records)).toBe(200000);
    });

    it('should throw on an empty series', () => {
      expect(() => getUpfrontCost([])).toThrow('Buy series must start at year 0');
    });
  });
});
