import { BuyScenario, CommonParams, RentScenario } from "../models/Scenario";
import { BalanceSheet, COMPONENT, RentYearRecord, sumComponents } from "../models/YearRecord";
import { compound } from "../utils/math";
import { MONTHS_PER_YEAR } from "../utils/constants";

export interface RentTrajectory {
  records: RentYearRecord[];
  balanceSheets: BalanceSheet[];
}

/**
 * Annual rent for a year of renting, 0 once the occupancy window has closed.
 */
export function calculateAnnualRent(rent: RentScenario, year: number, childLivingYears: number): number {
  if (year < 1 || year > childLivingYears) {
    return 0;
  }
  return compound(rent.rentPerMonth * MONTHS_PER_YEAR, rent.rentAnnualIncrease, year - 1);
}

/**
 * Build the rent trajectory for years 0..sellAfterYears.
 *
 * The deposit that buying would tie up is invested instead and compounds at the
 * investment return rate. Rent is paid only during the occupancy window; utilities
 * are paid every year, as on the buy side.
 */
export function buildRentTrajectory(
  buy: BuyScenario,
  rent: RentScenario,
  common: CommonParams
): RentTrajectory {
  const records: RentYearRecord[] = [];
  const balanceSheets: BalanceSheet[] = [];
  let outgoings = 0;

  const year0: RentYearRecord = {
    year: 0,
    cashFlow: 0,
    components: { [COMPONENT.initialDeposit]: buy.deposit },
    bankBalance: buy.deposit,
    investmentBalance: buy.deposit,
  };
  records.push(year0);
  balanceSheets.push(rentBalanceSheet(year0, outgoings));

  let previous = year0;
  for (let year = 1; year <= common.sellAfterYears; year++) {
    const investmentReturn = previous.investmentBalance * buy.investmentReturnRate;
    const annualRent = calculateAnnualRent(rent, year, common.childLivingYears);
    const utilities = common.utilitiesPerMonth * MONTHS_PER_YEAR;

    const components: Record<string, number> = {
      [COMPONENT.investmentReturns]: investmentReturn,
      [COMPONENT.utilities]: -utilities,
    };
    if (annualRent > 0) {
      components[COMPONENT.rentPayments] = -annualRent;
    }
    const cashFlow = sumComponents(components);
    outgoings += annualRent + utilities;

    const record: RentYearRecord = {
      year,
      cashFlow,
      components,
      bankBalance: previous.bankBalance + cashFlow,
      investmentBalance: previous.investmentBalance + investmentReturn,
    };
    records.push(record);
    balanceSheets.push(rentBalanceSheet(record, outgoings));
    previous = record;
  }

  return { records, balanceSheets };
}

function rentBalanceSheet(record: RentYearRecord, outgoings: number): BalanceSheet {
  return {
    year: record.year,
    assets: {
      investmentBalance: record.investmentBalance,
      totalAssets: record.investmentBalance,
    },
    liabilities: {
      rentAndUtilitiesPaid: outgoings,
      totalLiabilities: outgoings,
    },
    netWorth: record.investmentBalance - outgoings,
  };
}
