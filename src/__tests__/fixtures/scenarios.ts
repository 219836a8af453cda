import { AnalysisRequest, BuyScenario, CommonParams, RentScenario, RoomRental } from '../../models/Scenario';

export const baseBuyScenario: BuyScenario = {
  mortgageRate: 0.045,
  loanTerm: 25,
  deposit: 60000,
  conveyancingFees: 1500,
  propertyValue: 300000,
  sellingAgentFeesPercent: 0.015,
  homeAppreciationRate: 0.03,
  investmentReturnRate: 0.07,
  upfrontRenovationCost: 5000,
  upfrontFurnitureCost: 3000,
  homeInsurance: 300,
  loanAmount: 240000,
  isSecondHome: false,
  cgtRate: 0.28,
};

export const baseRentScenario: RentScenario = {
  rentPerMonth: 1200,
  rentAnnualIncrease: 0.03,
};

export const baseCommonParams: CommonParams = {
  utilitiesPerMonth: 150,
  sellAfterYears: 5,
  childLivingYears: 3,
};

export const roomRental: RoomRental = {
  monthlyRent: 500,
  annualIncrease: 0.03,
  monthsRentedPerYear: 9,
};

export const baseRequest: AnalysisRequest = {
  buy: baseBuyScenario,
  rent: baseRentScenario,
  common: baseCommonParams,
};

export const withRoomRental: AnalysisRequest = {
  ...baseRequest,
  buy: { ...baseBuyScenario, roomRental },
};

export const secondHomeRequest: AnalysisRequest = {
  ...baseRequest,
  buy: { ...baseBuyScenario, isSecondHome: true },
};

/** Cash purchase: no mortgage, no appreciation, no returns. */
export const flatCashRequest: AnalysisRequest = {
  buy: {
    ...baseBuyScenario,
    mortgageRate: 0,
    deposit: 200000,
    propertyValue: 200000,
    loanAmount: 0,
    homeAppreciationRate: 0,
    investmentReturnRate: 0,
    sellingAgentFeesPercent: 0,
    conveyancingFees: 0,
    upfrontRenovationCost: 0,
    upfrontFurnitureCost: 0,
    homeInsurance: 0,
  },
  rent: { rentPerMonth: 1000, rentAnnualIncrease: 0 },
  common: { utilitiesPerMonth: 0, sellAfterYears: 2, childLivingYears: 2 },
};
