// src/domain/rentVsBuy/types.ts

export type Money = number;

// ------------------------
// Inputs
// ------------------------

export interface RentVsBuyParameters {
  houseSize: number;
  pricePerArea: Money;
  rentPerArea: Money; // monthly
  downPaymentFraction: number; // e.g. 0.3 for 30%
  mortgageRateAnnual: number; // effective annual rate
  mortgageYears: number;
  investmentReturnAnnual: number;
  houseAppreciationAnnual: number;
  rentIncreaseAnnual: number;
  /**
   * Charged every month as `marketRent * govLevyFractionOfRent`.
   * It is NOT divided by 12, so 0.05 costs 5% of each month's rent.
   */
  govLevyFractionOfRent: number;
  managementFeeFractionOfValue: number; // per year, charged monthly
  buyClosingCostFraction: number;
  sellClosingCostFraction: number;
  horizonYears: number;
  investMonthlyDiffs: boolean;
}

// ------------------------
// Normalizer output
// ------------------------

export interface DerivedQuantities {
  housePrice: Money;
  monthlyRent: Money;
  downPayment: Money;
  loanPrincipal: Money;
  mortgageRateMonthly: number;
  mortgagePayments: number;
  monthlyMortgagePayment: Money;
  houseGrowthFactor: number;
  rentGrowthFactor: number;
  investmentRateMonthly: number;
  buyClosingCost: Money;
}

// ------------------------
// Loop state
// ------------------------

export interface SimulationState {
  remainingBalance: Money;
  propertyValue: Money;
  marketRent: Money;
  ownerInvestment: Money;
  renterInvestment: Money;
  totalOwnerCashOut: Money;
  totalRenterCashOut: Money;
}

// One row per simulated month. Property value and rent are the values the
// month's costs were computed from (before that month's growth).
export interface MonthlySnapshot {
  month: number; // 1-based
  interest: Money;
  principal: Money;
  remainingBalance: Money;
  propertyValue: Money;
  marketRent: Money;
  ownerMonthlyCost: Money;
  renterMonthlyCost: Money;
  ownerInvestment: Money;
  renterInvestment: Money;
}

// ------------------------
// Result
// ------------------------

export type EchoedParameters = Omit<
  RentVsBuyParameters,
  "houseSize" | "pricePerArea" | "rentPerArea"
> & {
  housePrice: Money;
  monthlyRent: Money;
};

export interface SimulationDetails {
  remainingMortgageBalance: Money;
  propertyValueEnd: Money;
  monthlyRentEnd: Money;
  saleClosingCost: Money;
  ownerEquityRealized: Money;
  ownerSideInvestEnd: Money;
  renterInvestEnd: Money;
  totalOwnerCashOut: Money;
  totalRenterCashOut: Money;
  monthlyMortgagePayment: Money;
}

export interface RentVsBuyResult {
  readonly params: Readonly<EchoedParameters>;
  readonly months: number;
  readonly buyNetWorth: Money;
  readonly rentNetWorth: Money;
  readonly netAdvantageBuy: Money; // > 0 means buying wins
  readonly details: Readonly<SimulationDetails>;
  readonly schedule: ReadonlyArray<Readonly<MonthlySnapshot>>;
}

// ------------------------
// Closed-form cross-check
// ------------------------

export interface ClosedFormEstimate {
  priceToRentRatio: number;
  monthlyPayment: Money;
  monthlyInvestment: Money;
  investmentFutureValue: Money;
  houseFutureValue: Money;
  investmentLead: Money;
}
