// src/domain/rentVsBuy/parameters.ts
import type { RentVsBuyParameters } from "./types";

export class InvalidParameterError extends Error {
  readonly field: keyof RentVsBuyParameters;

  constructor(field: keyof RentVsBuyParameters, message: string) {
    super(`${field} ${message}`);
    this.name = "InvalidParameterError";
    this.field = field;
  }
}

export function createDefaultParameters(): RentVsBuyParameters {
  return {
    houseSize: 500,
    pricePerArea: 20_000,
    rentPerArea: 50,
    downPaymentFraction: 0.3,
    mortgageRateAnnual: 0.035,
    mortgageYears: 30,
    investmentReturnAnnual: 0.07,
    houseAppreciationAnnual: 0.01,
    rentIncreaseAnnual: 0.02,
    govLevyFractionOfRent: 0.05,
    managementFeeFractionOfValue: 0.0015,
    buyClosingCostFraction: 0.05, // stamp duty + agent + legal
    sellClosingCostFraction: 0.01, // agent + legal
    horizonYears: 30,
    investMonthlyDiffs: true,
  };
}

type NumericField = {
  [K in keyof RentVsBuyParameters]: RentVsBuyParameters[K] extends number
    ? K
    : never;
}[keyof RentVsBuyParameters];

const NUMERIC_FIELDS: NumericField[] = [
  "houseSize",
  "pricePerArea",
  "rentPerArea",
  "downPaymentFraction",
  "mortgageRateAnnual",
  "mortgageYears",
  "investmentReturnAnnual",
  "houseAppreciationAnnual",
  "rentIncreaseAnnual",
  "govLevyFractionOfRent",
  "managementFeeFractionOfValue",
  "buyClosingCostFraction",
  "sellClosingCostFraction",
  "horizonYears",
];

const POSITIVE_FIELDS: NumericField[] = ["houseSize", "pricePerArea", "rentPerArea"];
const TERM_FIELDS: NumericField[] = ["mortgageYears", "horizonYears"];
const ANNUAL_RATE_FIELDS: NumericField[] = [
  "mortgageRateAnnual",
  "investmentReturnAnnual",
  "houseAppreciationAnnual",
  "rentIncreaseAnnual",
];
const NON_NEGATIVE_FIELDS: NumericField[] = [
  "govLevyFractionOfRent",
  "managementFeeFractionOfValue",
  "buyClosingCostFraction",
  "sellClosingCostFraction",
];

/**
 * Reject parameter sets the simulation cannot run on. Throws on the first
 * offending field.
 */
export function validateParameters(params: RentVsBuyParameters): void {
  for (const field of NUMERIC_FIELDS) {
    if (!Number.isFinite(params[field])) {
      throw new InvalidParameterError(field, "must be a finite number");
    }
  }

  for (const field of POSITIVE_FIELDS) {
    if (params[field] <= 0) {
      throw new InvalidParameterError(field, "must be positive");
    }
  }

  for (const field of TERM_FIELDS) {
    if (params[field] <= 0 || !Number.isInteger(params[field])) {
      throw new InvalidParameterError(field, "must be a positive whole number of years");
    }
  }

  // (1 + rate)^(1/12) is undefined for rate <= -1.
  for (const field of ANNUAL_RATE_FIELDS) {
    if (params[field] <= -1) {
      throw new InvalidParameterError(field, "must be greater than -1");
    }
  }

  for (const field of NON_NEGATIVE_FIELDS) {
    if (params[field] < 0) {
      throw new InvalidParameterError(field, "must not be negative");
    }
  }

  if (params.downPaymentFraction < 0 || params.downPaymentFraction > 1) {
    throw new InvalidParameterError("downPaymentFraction", "must be between 0 and 1");
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Upgrade raw JSON (e.g. a parameters file) into a complete parameter set,
 * filling in defaults for anything missing or of the wrong type.
 * The result is not validated.
 */
export function upgradeParameters(raw: unknown): RentVsBuyParameters {
  const params = createDefaultParameters();
  if (!isRecord(raw)) {
    return params;
  }

  for (const field of NUMERIC_FIELDS) {
    const value = raw[field];
    if (typeof value === "number") {
      params[field] = value;
    }
  }

  if (typeof raw.investMonthlyDiffs === "boolean") {
    params.investMonthlyDiffs = raw.investMonthlyDiffs;
  }

  return params;
}
