// src/domain/rentVsBuy/engine.ts
import type { RentVsBuyParameters, RentVsBuyResult } from "./types";
import { validateParameters } from "./parameters";
import { deriveQuantities } from "./normalizer";
import { runMonthlyLoop } from "./simulation";
import { settleAtHorizon } from "./settlement";

/**
 * Compare end-of-horizon net worth for buying with a mortgage versus renting
 * and investing the difference.
 *
 *  - RENTER invests the upfront cash the buyer spends (down payment + buy
 *    closing cost), then each month invests whatever owning costs above
 *    rent. When renting is the more expensive side there is no borrowing to
 *    cover it.
 *  - OWNER pays the mortgage, levy and management fee, and invests any
 *    month where owning is cheaper than rent.
 *  - At the horizon the owner sells and pays sale closing costs.
 *
 * Throws InvalidParameterError before doing any work if `params` is invalid.
 */
export function simulateRentVsBuy(params: RentVsBuyParameters): RentVsBuyResult {
  validateParameters(params);

  const derived = deriveQuantities(params);
  const { state, schedule } = runMonthlyLoop(derived, params);

  return settleAtHorizon(params, derived, state, schedule);
}
