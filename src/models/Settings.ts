import { AnalysisRequest, BuyScenario, getLoanAmount } from "./Scenario";
import { DEFAULT_CGT_RATE } from "../utils/constants";

/**
 * Calculator settings as entered in the form.
 * Rates and fees are in percent (e.g., 4.5 means 4.5%).
 */
export interface CalculatorSettings {
  propertyValue: number;
  isSecondHome: boolean;
  depositType: "percentage" | "fixed";
  depositPercentage: number;
  depositAmount: number;
  mortgageRate: number;
  loanTerm: number;
  conveyancingFees: number;
  sellingAgentFees: number;
  homeInsurance: number;
  upfrontRenovation: number;
  upfrontFurniture: number;
  homeAppreciation: number;
  investmentReturn: number;
  includeRental: boolean;
  roomRent: number;
  roomRentIncrease: number;
  monthsRented: number;
  monthlyRent: number;
  rentIncrease: number;
  utilities: number;
  sellAfter: number;
  childYears: number;
}

export const DEFAULT_SETTINGS: Readonly<CalculatorSettings> = {
  propertyValue: 300000,
  isSecondHome: false,
  depositType: "percentage",
  depositPercentage: 20,
  depositAmount: 60000,
  mortgageRate: 4.5,
  loanTerm: 25,
  conveyancingFees: 1500,
  sellingAgentFees: 1.5,
  homeInsurance: 300,
  upfrontRenovation: 5000,
  upfrontFurniture: 3000,
  homeAppreciation: 3.0,
  investmentReturn: 7.0,
  includeRental: false,
  roomRent: 500,
  roomRentIncrease: 3.0,
  monthsRented: 9,
  monthlyRent: 1200,
  rentIncrease: 3.0,
  utilities: 150,
  sellAfter: 5,
  childYears: 3,
};

/**
 * Merge partial settings over the defaults
 */
export function withDefaults(settings: Partial<CalculatorSettings> = {}): CalculatorSettings {
  return { ...DEFAULT_SETTINGS, ...settings };
}

/**
 * Resolve the deposit from either a percentage of the property value or a fixed amount
 */
export function resolveDeposit(settings: CalculatorSettings): number {
  if (settings.depositType === "percentage") {
    return settings.propertyValue * (settings.depositPercentage / 100);
  }
  return settings.depositAmount;
}

const fromPercent = (value: number): number => value / 100;

/**
 * Convert calculator settings into an engine request, turning percentages into
 * decimal fractions. Room rental is included only when the rental toggle is on.
 */
export function settingsToRequest(settings: CalculatorSettings): AnalysisRequest {
  const deposit = resolveDeposit(settings);

  const buy: BuyScenario = {
    mortgageRate: fromPercent(settings.mortgageRate),
    loanTerm: settings.loanTerm,
    deposit,
    conveyancingFees: settings.conveyancingFees,
    propertyValue: settings.propertyValue,
    sellingAgentFeesPercent: fromPercent(settings.sellingAgentFees),
    homeAppreciationRate: fromPercent(settings.homeAppreciation),
    investmentReturnRate: fromPercent(settings.investmentReturn),
    upfrontRenovationCost: settings.upfrontRenovation,
    upfrontFurnitureCost: settings.upfrontFurniture,
    homeInsurance: settings.homeInsurance,
    loanAmount: getLoanAmount(settings.propertyValue, deposit),
    isSecondHome: settings.isSecondHome,
    cgtRate: DEFAULT_CGT_RATE,
  };
  if (settings.includeRental) {
    buy.roomRental = {
      monthlyRent: settings.roomRent,
      annualIncrease: fromPercent(settings.roomRentIncrease),
      monthsRentedPerYear: settings.monthsRented,
    };
  }

  return {
    buy,
    rent: {
      rentPerMonth: settings.monthlyRent,
      rentAnnualIncrease: fromPercent(settings.rentIncrease),
    },
    common: {
      utilitiesPerMonth: settings.utilities,
      sellAfterYears: settings.sellAfter,
      childLivingYears: settings.childYears,
    },
  };
}
