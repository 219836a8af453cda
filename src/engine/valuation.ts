import { BuyScenario } from "../models/Scenario";
import { BuyYearRecord, COMPONENT, RentYearRecord, YearRecord } from "../models/YearRecord";
import {
  CostBreakdown,
  NpvSummary,
  ProjectionTotals,
  SaleSummary,
  getFinalRecord,
} from "../models/ProjectionResult";
import { npv, sum } from "../utils/math";

/**
 * Sum one component label across a series, 0 where a year lacks it
 */
export function sumComponent(records: readonly YearRecord[], label: string): number {
  return sum(records.map((record) => record.components[label] ?? 0));
}

/**
 * Discount both cash flow series at the same rate.
 * The investment return rate is the discount rate for both strategies.
 */
export function calculateNpvSummary(
  buyRecords: readonly YearRecord[],
  rentRecords: readonly YearRecord[],
  discountRate: number
): NpvSummary {
  return {
    buy: npv(discountRate, buyRecords.map((record) => record.cashFlow)),
    rent: npv(discountRate, rentRecords.map((record) => record.cashFlow)),
    discountRate,
  };
}

export function calculateTotals(
  buyRecords: readonly BuyYearRecord[],
  rentRecords: readonly RentYearRecord[]
): ProjectionTotals {
  return {
    buyCashFlow: sum(buyRecords.map((record) => record.cashFlow)),
    rentCashFlow: sum(rentRecords.map((record) => record.cashFlow)),
    finalBuyBalance: getFinalRecord(buyRecords).bankBalance,
    finalRentBalance: getFinalRecord(rentRecords).bankBalance,
    investmentReturns: sumComponent(rentRecords, COMPONENT.investmentReturns),
    rentPaid: Math.abs(sumComponent(rentRecords, COMPONENT.rentPayments)),
    rentalIncome: sumComponent(buyRecords, COMPONENT.rentalIncome),
    mortgageInterest: sum(buyRecords.map((record) => record.interestPaid)),
  };
}

/**
 * Break costs down by stage. All amounts are positive costs.
 */
export function calculateCostBreakdown(
  buy: BuyScenario,
  stampDuty: number,
  buyRecords: readonly BuyYearRecord[],
  rentRecords: readonly RentYearRecord[],
  sale: SaleSummary
): CostBreakdown {
  return {
    buy: {
      initialCosts: {
        deposit: buy.deposit,
        conveyancingFees: buy.conveyancingFees,
        stampDuty,
        upfrontRenovation: buy.upfrontRenovationCost,
        upfrontFurniture: buy.upfrontFurnitureCost,
      },
      ongoingCosts: {
        mortgagePayments: Math.abs(sumComponent(buyRecords, COMPONENT.mortgagePayment)),
        homeInsurance: Math.abs(sumComponent(buyRecords, COMPONENT.insurance)),
        utilities: Math.abs(sumComponent(buyRecords, COMPONENT.utilities)),
      },
      sellingCosts: {
        agentFees: sale.agentFees,
        capitalGainsTax: sale.capitalGainsTax,
      },
    },
    rent: {
      rentPayments: Math.abs(sumComponent(rentRecords, COMPONENT.rentPayments)),
      utilities: Math.abs(sumComponent(rentRecords, COMPONENT.utilities)),
    },
  };
}

/**
 * Upfront cost of buying: the negated year-0 cash flow
 */
export function getUpfrontCost(buyRecords: readonly BuyYearRecord[]): number {
  const year0 = buyRecords[0];
  if (!year0) {
    throw new Error("Buy series must start at year 0");
  }
  return -year0.cashFlow;
}
