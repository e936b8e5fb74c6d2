// src/domain/rentVsBuy/index.ts
export * from "./types";
export {
  InvalidParameterError,
  createDefaultParameters,
  validateParameters,
  upgradeParameters,
} from "./parameters";
export {
  computeMonthlyPayment,
  deriveQuantities,
  monthlyGrowthFactor,
  monthlyRateFromAnnual,
} from "./normalizer";
export { createInitialState, runMonthlyLoop } from "./simulation";
export type { MonthlyLoopResult } from "./simulation";
export { settleAtHorizon } from "./settlement";
export { simulateRentVsBuy } from "./engine";
export {
  annuityPayment,
  computeClosedFormEstimate,
  futureValueOfAnnuity,
} from "./closedForm";
