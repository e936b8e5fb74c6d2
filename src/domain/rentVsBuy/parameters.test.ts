// src/domain/rentVsBuy/parameters.test.ts
import { describe, it, expect } from "vitest";
import {
  createDefaultParameters,
  InvalidParameterError,
  upgradeParameters,
  validateParameters,
} from "./parameters";
import type { RentVsBuyParameters } from "./types";

function expectInvalid(
  overrides: Partial<RentVsBuyParameters>,
  field: keyof RentVsBuyParameters
) {
  const params = { ...createDefaultParameters(), ...overrides };
  let caught: unknown = null;
  try {
    validateParameters(params);
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(InvalidParameterError);
  if (caught instanceof InvalidParameterError) {
    expect(caught.field).toBe(field);
  }
}

describe("validateParameters", () => {
  it("accepts the defaults", () => {
    expect(() => validateParameters(createDefaultParameters())).not.toThrow();
  });

  it("accepts a zero mortgage rate and an all-cash purchase", () => {
    expect(() =>
      validateParameters({
        ...createDefaultParameters(),
        mortgageRateAnnual: 0,
        downPaymentFraction: 1,
      })
    ).not.toThrow();
  });

  it("accepts a mortgage term longer than the horizon", () => {
    expect(() =>
      validateParameters({ ...createDefaultParameters(), mortgageYears: 30, horizonYears: 5 })
    ).not.toThrow();
  });

  it("rejects non-positive size and prices", () => {
    expectInvalid({ houseSize: 0 }, "houseSize");
    expectInvalid({ pricePerArea: -1 }, "pricePerArea");
    expectInvalid({ rentPerArea: 0 }, "rentPerArea");
  });

  it("rejects non-positive or fractional terms", () => {
    expectInvalid({ horizonYears: 0 }, "horizonYears");
    expectInvalid({ horizonYears: 2.5 }, "horizonYears");
    expectInvalid({ mortgageYears: -30 }, "mortgageYears");
  });

  it("rejects annual rates whose monthly factor is undefined", () => {
    expectInvalid({ mortgageRateAnnual: -1 }, "mortgageRateAnnual");
    expectInvalid({ houseAppreciationAnnual: -1.5 }, "houseAppreciationAnnual");
  });

  it("rejects non-finite numbers", () => {
    expectInvalid({ investmentReturnAnnual: Number.NaN }, "investmentReturnAnnual");
    expectInvalid({ pricePerArea: Number.POSITIVE_INFINITY }, "pricePerArea");
  });

  it("rejects negative fees and a down payment outside [0, 1]", () => {
    expectInvalid({ sellClosingCostFraction: -0.01 }, "sellClosingCostFraction");
    expectInvalid({ downPaymentFraction: 1.2 }, "downPaymentFraction");
  });

  it("puts the field name in the message", () => {
    expect(() =>
      validateParameters({ ...createDefaultParameters(), houseSize: -3 })
    ).toThrow("houseSize must be positive");
  });
});

describe("upgradeParameters", () => {
  it("returns defaults for non-object input", () => {
    expect(upgradeParameters(undefined)).toEqual(createDefaultParameters());
    expect(upgradeParameters("nope")).toEqual(createDefaultParameters());
    expect(upgradeParameters([1, 2])).toEqual(createDefaultParameters());
  });

  it("takes well-typed fields and falls back on the rest", () => {
    const params = upgradeParameters({
      horizonYears: 10,
      downPaymentFraction: 0.2,
      mortgageYears: "20",
      investMonthlyDiffs: false,
      unknownField: 1,
    });

    expect(params.horizonYears).toBe(10);
    expect(params.downPaymentFraction).toBe(0.2);
    expect(params.mortgageYears).toBe(30);
    expect(params.investMonthlyDiffs).toBe(false);
    expect(params).not.toHaveProperty("unknownField");
  });
});
