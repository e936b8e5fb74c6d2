// src/domain/rentVsBuy/closedForm.ts
import type { ClosedFormEstimate, Money, RentVsBuyParameters } from "./types";

/**
 * Level payment of an ordinary annuity with present value `principal`.
 */
export function annuityPayment(
  principal: Money,
  periodicRate: number,
  periods: number
): Money {
  if (periods <= 0) {
    throw new Error("periods must be > 0");
  }
  if (periodicRate === 0) {
    return principal / periods;
  }

  const growth = Math.pow(1 + periodicRate, periods);
  return (principal * periodicRate * growth) / (growth - 1);
}

/**
 * Future value of `payment` deposited at the end of each period.
 */
export function futureValueOfAnnuity(
  payment: Money,
  periodicRate: number,
  periods: number
): Money {
  if (periodicRate === 0) {
    return payment * periods;
  }
  return (payment * (Math.pow(1 + periodicRate, periods) - 1)) / periodicRate;
}

/**
 * Shortcut estimate with constant cash flows and nominal monthly rates.
 *
 * Finances the full price over the horizon and ignores down payment,
 * closing costs, levy and rent growth. Only meant as a cross-check for the
 * monthly simulation.
 */
export function computeClosedFormEstimate(
  params: RentVsBuyParameters
): ClosedFormEstimate {
  const housePrice = params.houseSize * params.pricePerArea;
  const monthlyRent = params.houseSize * params.rentPerArea;
  const months = params.horizonYears * 12;

  const monthlyPayment = annuityPayment(
    housePrice,
    params.mortgageRateAnnual / 12,
    months
  );
  const monthlyInvestment =
    monthlyPayment +
    (housePrice * params.managementFeeFractionOfValue) / 12 -
    monthlyRent;

  const investmentFutureValue = futureValueOfAnnuity(
    monthlyInvestment,
    params.investmentReturnAnnual / 12,
    months
  );
  const houseFutureValue =
    housePrice * Math.pow(1 + params.houseAppreciationAnnual, params.horizonYears);

  return {
    priceToRentRatio: housePrice / (monthlyRent * 12),
    monthlyPayment,
    monthlyInvestment,
    investmentFutureValue,
    houseFutureValue,
    investmentLead: investmentFutureValue - houseFutureValue,
  };
}
