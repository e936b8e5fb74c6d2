// src/domain/rentVsBuy/normalizer.ts
import type { DerivedQuantities, Money, RentVsBuyParameters } from "./types";

/**
 * Monthly rate equivalent to an effective annual rate: (1 + annual)^(1/12) - 1.
 */
export function monthlyRateFromAnnual(annualRate: number): number {
  return Math.pow(1.0 + annualRate, 1.0 / 12.0) - 1.0;
}

export function monthlyGrowthFactor(annualRate: number): number {
  return Math.pow(1.0 + annualRate, 1.0 / 12.0);
}

/**
 * Compute the level payment that repays `principal` after `payments`
 * periods at `monthlyRate`.
 */
export function computeMonthlyPayment(
  principal: Money,
  monthlyRate: number,
  payments: number
): Money {
  if (payments <= 0) {
    throw new Error("payments must be > 0");
  }

  if (monthlyRate === 0) {
    // Straight-line.
    return principal / payments;
  }

  const pow = Math.pow(1 + monthlyRate, payments);
  return (principal * monthlyRate * pow) / (pow - 1);
}

export function deriveQuantities(params: RentVsBuyParameters): DerivedQuantities {
  const housePrice = params.houseSize * params.pricePerArea;
  const monthlyRent = params.houseSize * params.rentPerArea;
  const downPayment = housePrice * params.downPaymentFraction;
  const loanPrincipal = housePrice - downPayment;

  const mortgageRateMonthly = monthlyRateFromAnnual(params.mortgageRateAnnual);
  const mortgagePayments = params.mortgageYears * 12;

  return {
    housePrice,
    monthlyRent,
    downPayment,
    loanPrincipal,
    mortgageRateMonthly,
    mortgagePayments,
    monthlyMortgagePayment: computeMonthlyPayment(
      loanPrincipal,
      mortgageRateMonthly,
      mortgagePayments
    ),
    houseGrowthFactor: monthlyGrowthFactor(params.houseAppreciationAnnual),
    rentGrowthFactor: monthlyGrowthFactor(params.rentIncreaseAnnual),
    investmentRateMonthly: monthlyRateFromAnnual(params.investmentReturnAnnual),
    buyClosingCost: housePrice * params.buyClosingCostFraction,
  };
}
