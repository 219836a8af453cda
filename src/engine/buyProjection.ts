import { BuyScenario, CommonParams, ProjectionPolicy, RoomRental, isCgtApplicable } from "../models/Scenario";
import { BalanceSheet, BuyYearRecord, COMPONENT, sumComponents } from "../models/YearRecord";
import { SaleSummary } from "../models/ProjectionResult";
import { YearlyAmortization, totalInterest } from "./mortgage";
import { compound } from "../utils/math";
import {
  FULL_HOUSE_TENANTS,
  MONTHS_PER_YEAR,
  MORTGAGE_INTEREST_DEDUCTION_SHARE,
} from "../utils/constants";

export interface BuyTrajectory {
  records: BuyYearRecord[];
  balanceSheets: BalanceSheet[];
  sale: SaleSummary;
}

/**
 * Rental income for a year of ownership.
 *
 * While the dependent lives in the property only rooms are let, for the configured
 * months. Afterwards the whole house is let to two tenants all year. Room rent grows
 * by its annual increase from year 1.
 */
export function calculateRentalIncome(
  roomRental: RoomRental | undefined,
  year: number,
  childLivingYears: number
): number {
  if (!roomRental || year < 1) {
    return 0;
  }
  const monthlyRent = compound(roomRental.monthlyRent, roomRental.annualIncrease, year - 1);
  if (year <= childLivingYears) {
    return monthlyRent * roomRental.monthsRentedPerYear;
  }
  return monthlyRent * MONTHS_PER_YEAR * FULL_HOUSE_TENANTS;
}

/**
 * Settle the sale at the end of the horizon.
 * The capital gain is reduced by a share of all mortgage interest paid up to and
 * including the sale year; CGT is charged only where the policy applies.
 */
export function calculateSale(
  buy: BuyScenario,
  stampDuty: number,
  finalRecord: Pick<BuyYearRecord, "year" | "propertyValue" | "mortgageBalance">,
  schedule: readonly YearlyAmortization[],
  policy: ProjectionPolicy
): SaleSummary {
  const sellingPrice = finalRecord.propertyValue;
  const agentFees = sellingPrice * buy.sellingAgentFeesPercent;
  const remainingMortgage = finalRecord.mortgageBalance;
  const originalCost = buy.propertyValue + buy.conveyancingFees + stampDuty;

  const totalMortgageInterest = totalInterest(schedule.filter((row) => row.year <= finalRecord.year));
  const mortgageInterestDeduction = totalMortgageInterest * MORTGAGE_INTEREST_DEDUCTION_SHARE;

  const capitalGain = sellingPrice - originalCost;
  const taxableGain = Math.max(0, capitalGain - mortgageInterestDeduction);
  const capitalGainsTax = isCgtApplicable(buy, policy.cgtPolicy) ? taxableGain * buy.cgtRate : 0;

  return {
    year: finalRecord.year,
    sellingPrice,
    agentFees,
    remainingMortgage,
    originalCost,
    totalMortgageInterest,
    mortgageInterestDeduction,
    capitalGain,
    taxableGain,
    capitalGainsTax,
    saleProceeds: sellingPrice - agentFees - remainingMortgage - capitalGainsTax,
  };
}

function ownershipBalanceSheet(record: BuyYearRecord): BalanceSheet {
  return {
    year: record.year,
    assets: {
      propertyValue: record.propertyValue,
      totalAssets: record.propertyValue,
    },
    liabilities: {
      mortgageBalance: record.mortgageBalance,
      totalLiabilities: record.mortgageBalance,
    },
    netWorth: record.propertyValue - record.mortgageBalance,
  };
}

function postSaleBalanceSheet(year: number, sale: SaleSummary): BalanceSheet {
  return {
    year,
    assets: {
      propertyValue: 0,
      cash: sale.saleProceeds,
      totalAssets: sale.saleProceeds,
    },
    liabilities: {
      mortgageBalance: 0,
      totalLiabilities: 0,
    },
    netWorth: sale.saleProceeds,
  };
}

/**
 * Build the buy trajectory for years 0..sellAfterYears.
 *
 * @param schedule - Yearly amortization covering at least the horizon
 */
export function buildBuyTrajectory(
  buy: BuyScenario,
  common: CommonParams,
  stampDuty: number,
  schedule: readonly YearlyAmortization[],
  policy: ProjectionPolicy
): BuyTrajectory {
  const horizon = common.sellAfterYears;
  const records: BuyYearRecord[] = [];
  const balanceSheets: BalanceSheet[] = [];

  // Year 0: upfront costs
  const initialCosts: Record<string, number> = {
    [COMPONENT.deposit]: -buy.deposit,
    [COMPONENT.conveyancingFees]: -buy.conveyancingFees,
    [COMPONENT.stampDuty]: -stampDuty,
    [COMPONENT.upfrontRenovation]: -buy.upfrontRenovationCost,
    [COMPONENT.upfrontFurniture]: -buy.upfrontFurnitureCost,
  };
  const initialCashFlow = sumComponents(initialCosts);
  const year0: BuyYearRecord = {
    year: 0,
    cashFlow: initialCashFlow,
    components: initialCosts,
    bankBalance: policy.openingBalance === "debited" ? initialCashFlow : 0,
    propertyValue: buy.propertyValue,
    mortgageBalance: buy.loanAmount,
    equity: buy.deposit,
    interestPaid: 0,
    principalPaid: 0,
  };
  records.push(year0);
  balanceSheets.push(ownershipBalanceSheet(year0));

  let previous = year0;
  let sale: SaleSummary | null = null;

  for (let year = 1; year <= horizon; year++) {
    const row = schedule[year - 1];
    if (!row || row.year !== year) {
      throw new Error(`Amortization schedule is missing year ${year}`);
    }

    const propertyValue = previous.propertyValue * (1 + buy.homeAppreciationRate);
    const components: Record<string, number> = {
      [COMPONENT.propertyAppreciation]: propertyValue - previous.propertyValue,
      [COMPONENT.mortgagePayment]: -row.payment,
      [COMPONENT.interestPaid]: -row.interest,
      [COMPONENT.principalPaid]: -row.principal,
      [COMPONENT.insurance]: -buy.homeInsurance,
      [COMPONENT.utilities]: -common.utilitiesPerMonth * MONTHS_PER_YEAR,
    };
    if (buy.roomRental) {
      components[COMPONENT.rentalIncome] = calculateRentalIncome(
        buy.roomRental,
        year,
        common.childLivingYears
      );
    }

    if (year === horizon) {
      sale = calculateSale(
        buy,
        stampDuty,
        { year, propertyValue, mortgageBalance: row.closingBalance },
        schedule,
        policy
      );
      components[COMPONENT.propertySale] = sale.sellingPrice;
      components[COMPONENT.agentFees] = -sale.agentFees;
      components[COMPONENT.mortgageRepayment] = -sale.remainingMortgage;
      components[COMPONENT.capitalGainsTax] = -sale.capitalGainsTax;
      components[COMPONENT.mortgageInterestDeduction] = sale.mortgageInterestDeduction;
      components[COMPONENT.saleProceeds] = sale.saleProceeds;
    }

    const cashFlow = sumComponents(components);
    const record: BuyYearRecord = {
      year,
      cashFlow,
      components,
      bankBalance: previous.bankBalance + cashFlow,
      propertyValue,
      mortgageBalance: row.closingBalance,
      equity: propertyValue - row.closingBalance,
      interestPaid: row.interest,
      principalPaid: row.principal,
    };
    records.push(record);
    balanceSheets.push(sale ? postSaleBalanceSheet(year, sale) : ownershipBalanceSheet(record));
    previous = record;
  }

  if (!sale) {
    throw new Error(`Horizon must be at least one year, got ${horizon}`);
  }

  return { records, balanceSheets, sale };
}
