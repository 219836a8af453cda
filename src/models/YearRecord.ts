/**
 * Year-indexed projection data structures
 */

export interface YearRecord {
  year: number;
  cashFlow: number;
  components: Record<string, number>; // label -> signed amount
  bankBalance: number;
}

export interface BuyYearRecord extends YearRecord {
  propertyValue: number;
  mortgageBalance: number;
  equity: number; // propertyValue - mortgageBalance, before any sale
  interestPaid: number;
  principalPaid: number;
}

export interface RentYearRecord extends YearRecord {
  investmentBalance: number;
}

export interface BalanceSheet {
  year: number;
  assets: Record<string, number> & { totalAssets: number };
  liabilities: Record<string, number> & { totalLiabilities: number };
  netWorth: number;
}

/**
 * Component labels used in the cash flow breakdowns.
 * Informational components are reported but excluded from the cash flow total.
 */
export const COMPONENT = {
  deposit: "deposit",
  conveyancingFees: "conveyancing_fees",
  stampDuty: "stamp_duty",
  upfrontRenovation: "upfront_renovation",
  upfrontFurniture: "upfront_furniture",
  propertyAppreciation: "property_appreciation",
  mortgagePayment: "mortgage_payment",
  interestPaid: "interest_paid",
  principalPaid: "principal_paid",
  insurance: "insurance",
  utilities: "utilities",
  rentalIncome: "rental_income",
  propertySale: "property_sale",
  agentFees: "agent_fees",
  mortgageRepayment: "mortgage_repayment",
  capitalGainsTax: "capital_gains_tax",
  mortgageInterestDeduction: "mortgage_interest_deduction",
  saleProceeds: "sale_proceeds",
  initialDeposit: "initial_deposit",
  investmentReturns: "investment_returns",
  rentPayments: "rent_payments",
} as const;

export const INFORMATIONAL_COMPONENTS: ReadonlySet<string> = new Set([
  COMPONENT.propertyAppreciation,
  COMPONENT.interestPaid,
  COMPONENT.principalPaid,
  COMPONENT.propertySale,
  COMPONENT.agentFees,
  COMPONENT.mortgageRepayment,
  COMPONENT.capitalGainsTax,
  COMPONENT.mortgageInterestDeduction,
  COMPONENT.initialDeposit,
]);

/**
 * Sum a year's components, skipping informational ones
 */
export function sumComponents(components: Record<string, number>): number {
  return Object.entries(components).reduce(
    (sum, [label, amount]) => (INFORMATIONAL_COMPONENTS.has(label) ? sum : sum + amount),
    0
  );
}
