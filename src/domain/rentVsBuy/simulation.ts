// src/domain/rentVsBuy/simulation.ts
import type {
  DerivedQuantities,
  MonthlySnapshot,
  RentVsBuyParameters,
  SimulationState,
} from "./types";

/**
 * Starting position at month 0. The renter keeps the cash the buyer spends
 * upfront (down payment + buy closing cost) and invests it.
 */
export function createInitialState(derived: DerivedQuantities): SimulationState {
  const upfront = derived.downPayment + derived.buyClosingCost;

  return {
    remainingBalance: derived.loanPrincipal,
    propertyValue: derived.housePrice,
    marketRent: derived.monthlyRent,
    ownerInvestment: 0,
    renterInvestment: upfront,
    totalOwnerCashOut: upfront,
    totalRenterCashOut: 0,
  };
}

/**
 * Advance the state by one month, in place, and return that month's row.
 */
function stepMonth(
  state: SimulationState,
  derived: DerivedQuantities,
  params: RentVsBuyParameters,
  month: number
): MonthlySnapshot {
  const payment = derived.monthlyMortgagePayment;

  const interest = state.remainingBalance * derived.mortgageRateMonthly;
  const principal = Math.max(payment - interest, 0);
  state.remainingBalance = Math.max(state.remainingBalance - principal, 0);

  const mgmtFee = (state.propertyValue * params.managementFeeFractionOfValue) / 12;
  // Levy is charged monthly on the monthly rent, not annualized.
  const govLevy = state.marketRent * params.govLevyFractionOfRent;

  const ownerMonthlyCost = payment + mgmtFee + govLevy;
  const renterMonthlyCost = state.marketRent;

  // Compound last month's balances before adding this month's cash.
  state.ownerInvestment *= 1 + derived.investmentRateMonthly;
  state.renterInvestment *= 1 + derived.investmentRateMonthly;

  if (params.investMonthlyDiffs) {
    const diff = ownerMonthlyCost - renterMonthlyCost;
    if (diff > 0) {
      // Renting is cheaper; the renter invests the savings.
      state.renterInvestment += diff;
    } else {
      state.ownerInvestment += -diff;
    }
  }

  state.totalOwnerCashOut += ownerMonthlyCost;
  state.totalRenterCashOut += renterMonthlyCost;

  const snapshot: MonthlySnapshot = {
    month,
    interest,
    principal,
    remainingBalance: state.remainingBalance,
    propertyValue: state.propertyValue,
    marketRent: state.marketRent,
    ownerMonthlyCost,
    renterMonthlyCost,
    ownerInvestment: state.ownerInvestment,
    renterInvestment: state.renterInvestment,
  };

  // Growth shows up in next month's costs.
  state.propertyValue *= derived.houseGrowthFactor;
  state.marketRent *= derived.rentGrowthFactor;

  return snapshot;
}

export interface MonthlyLoopResult {
  state: SimulationState;
  schedule: MonthlySnapshot[];
}

/**
 * Run the simulation for exactly `horizonYears * 12` months.
 */
export function runMonthlyLoop(
  derived: DerivedQuantities,
  params: RentVsBuyParameters
): MonthlyLoopResult {
  const months = params.horizonYears * 12;
  const state = createInitialState(derived);
  const schedule: MonthlySnapshot[] = [];

  for (let i = 0; i < months; i++) {
    schedule.push(stepMonth(state, derived, params, i + 1));
  }

  return { state, schedule };
}
