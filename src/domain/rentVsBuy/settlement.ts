// src/domain/rentVsBuy/settlement.ts
import type {
  DerivedQuantities,
  MonthlySnapshot,
  RentVsBuyParameters,
  RentVsBuyResult,
  SimulationState,
} from "./types";

/**
 * Sell the property at the end of the horizon and compare both sides.
 *
 * Realized equity is added at its nominal value; nothing compounds past the
 * horizon.
 */
export function settleAtHorizon(
  params: RentVsBuyParameters,
  derived: DerivedQuantities,
  state: SimulationState,
  schedule: MonthlySnapshot[]
): RentVsBuyResult {
  const saleProceeds = state.propertyValue;
  const saleClosingCost = saleProceeds * params.sellClosingCostFraction;
  const ownerEquityRealized = Math.max(
    saleProceeds - saleClosingCost - state.remainingBalance,
    0
  );

  const buyNetWorth = ownerEquityRealized + state.ownerInvestment;
  const rentNetWorth = state.renterInvestment;

  return {
    params: {
      housePrice: derived.housePrice,
      monthlyRent: derived.monthlyRent,
      downPaymentFraction: params.downPaymentFraction,
      mortgageRateAnnual: params.mortgageRateAnnual,
      mortgageYears: params.mortgageYears,
      investmentReturnAnnual: params.investmentReturnAnnual,
      houseAppreciationAnnual: params.houseAppreciationAnnual,
      rentIncreaseAnnual: params.rentIncreaseAnnual,
      govLevyFractionOfRent: params.govLevyFractionOfRent,
      managementFeeFractionOfValue: params.managementFeeFractionOfValue,
      buyClosingCostFraction: params.buyClosingCostFraction,
      sellClosingCostFraction: params.sellClosingCostFraction,
      horizonYears: params.horizonYears,
      investMonthlyDiffs: params.investMonthlyDiffs,
    },
    months: schedule.length,
    buyNetWorth,
    rentNetWorth,
    netAdvantageBuy: buyNetWorth - rentNetWorth,
    details: {
      remainingMortgageBalance: state.remainingBalance,
      propertyValueEnd: state.propertyValue,
      monthlyRentEnd: state.marketRent,
      saleClosingCost,
      ownerEquityRealized,
      ownerSideInvestEnd: state.ownerInvestment,
      renterInvestEnd: state.renterInvestment,
      totalOwnerCashOut: state.totalOwnerCashOut,
      totalRenterCashOut: state.totalRenterCashOut,
      monthlyMortgagePayment: derived.monthlyMortgagePayment,
    },
    schedule,
  };
}
