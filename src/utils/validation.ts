import { z } from "zod";
import { DEFAULT_CGT_RATE } from "./constants";
import { InvalidProjectionInputError } from "./errors";

/**
 * Zod validation schemas for input data validation.
 * Engine schemas take rates as decimal fractions (e.g., 0.045 means 4.5%);
 * the calculator settings schema takes them in percent.
 */

const amount = () => z.number().finite().min(0);
const rate = () => z.number().finite().min(0);

/**
 * Schema for the optional room rental structure.
 * All three fields are required together; unknown keys are rejected.
 */
export const RoomRentalSchema = z
  .object({
    monthlyRent: amount(),
    annualIncrease: z.number().finite().gt(-1),
    monthsRentedPerYear: z.number().int().min(0).max(12),
  })
  .strict();

/**
 * Schema for the buy scenario. Stamp duty is derived, never an input.
 * Unknown keys are rejected; room rental fields belong under `roomRental`.
 */
export const BuyScenarioSchema = z
  .object({
    mortgageRate: rate(),
    loanTerm: z.number().int().min(1),
    deposit: amount(),
    conveyancingFees: amount(),
    propertyValue: amount(),
    sellingAgentFeesPercent: rate().max(1),
    homeAppreciationRate: rate(),
    investmentReturnRate: rate(),
    upfrontRenovationCost: amount(),
    upfrontFurnitureCost: amount(),
    homeInsurance: amount(),
    roomRental: RoomRentalSchema.optional(),
    loanAmount: amount(),
    isSecondHome: z.boolean().default(false),
    cgtRate: rate().max(1).default(DEFAULT_CGT_RATE),
  })
  .strict();

export const RentScenarioSchema = z.object({
  rentPerMonth: amount(),
  rentAnnualIncrease: z.number().finite().gt(-1),
});

export const CommonParamsSchema = z.object({
  utilitiesPerMonth: amount(),
  sellAfterYears: z.number().int().min(1),
  childLivingYears: z.number().int().min(0),
});

export const ProjectionPolicySchema = z.object({
  cgtPolicy: z.enum(["second_home_only", "always"]).default("second_home_only"),
  openingBalance: z.enum(["funds_spent", "debited"]).default("funds_spent"),
  recommendationBasis: z
    .enum(["bank_balance", "bank_balance_plus_equity"])
    .default("bank_balance"),
});

/**
 * Schema for a complete analysis request with an optional policy.
 */
export const AnalysisRequestSchema = z.object({
  buy: BuyScenarioSchema,
  rent: RentScenarioSchema,
  common: CommonParamsSchema,
  policy: ProjectionPolicySchema.optional(),
});

/**
 * Schema for the calculator settings. Rates and fees are in percent.
 */
export const CalculatorSettingsSchema = z.object({
  propertyValue: amount(),
  isSecondHome: z.boolean(),
  depositType: z.enum(["percentage", "fixed"]),
  depositPercentage: z.number().finite().min(5).max(100),
  depositAmount: amount(),
  mortgageRate: z.number().finite().min(0).max(20),
  loanTerm: z.number().int().min(5).max(35),
  conveyancingFees: amount(),
  sellingAgentFees: z.number().finite().min(0).max(100),
  homeInsurance: amount(),
  upfrontRenovation: amount(),
  upfrontFurniture: amount(),
  homeAppreciation: z.number().finite().min(0),
  investmentReturn: z.number().finite().min(0),
  includeRental: z.boolean(),
  roomRent: amount(),
  roomRentIncrease: z.number().finite().gt(-100),
  monthsRented: z.number().int().min(0).max(12),
  monthlyRent: amount(),
  rentIncrease: z.number().finite().gt(-100),
  utilities: amount(),
  sellAfter: z.number().int().min(1),
  childYears: z.number().int().min(0),
});

/**
 * Schema for saving a report: settings may be partial and are merged over defaults.
 */
export const SaveReportSchema = z.object({
  settings: CalculatorSettingsSchema.partial().default({}),
  comment: z.string().default(""),
});

/**
 * Schema for the stamp duty query string.
 */
export const StampDutyQuerySchema = z.object({
  propertyValue: z.coerce.number().finite().min(0),
  secondHome: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

/**
 * Parse a value against a schema, throwing InvalidProjectionInputError on failure.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw InvalidProjectionInputError.fromZodError(result.error);
  }
  return result.data;
}
