/**
 * Hedge Sizer
 *
 * Converts a target notional into a spot quote amount and a whole number
 * of futures contracts. Positive funding (longs pay shorts) → short futures
 * sized against the bid, buy spot. Otherwise long futures sized against
 * the ask, sell spot.
 */

import type { HedgeOrderSizes } from '@/types/funding-hedge';

export interface SizingInput {
  /** Funding rate in percent (0.3 = 0.3%) */
  fundingRatePct: number;
  futuresBid: number;
  futuresAsk: number;
  spotAsk: number;
  quantoMultiplier: number;
  /** Notional per leg in quote currency */
  targetBalance: number;
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * @returns null when any input is unusable or the balance does not buy
 * one whole contract; the hedge is never rounded up or partially sized.
 */
export function computeOrderSizes(
  input: SizingInput,
  spotQuoteBuffer = 1.01,
): HedgeOrderSizes | null {
  const shortFutures = input.fundingRatePct > 0;
  const referencePrice = shortFutures ? input.futuresBid : input.futuresAsk;

  if (
    !isPositiveFinite(referencePrice) ||
    !isPositiveFinite(input.spotAsk) ||
    !isPositiveFinite(input.quantoMultiplier) ||
    !isPositiveFinite(input.targetBalance)
  ) {
    return null;
  }

  const coinAmount = input.targetBalance / referencePrice;
  const contractCount = Math.floor(coinAmount / input.quantoMultiplier);
  if (contractCount < 1) return null;

  return {
    direction: shortFutures ? 'short_futures' : 'long_futures',
    referencePrice,
    coinAmount,
    spotQuoteAmount: input.spotAsk * coinAmount * spotQuoteBuffer,
    spotSide: shortFutures ? 'buy' : 'sell',
    futuresContracts: shortFutures ? -contractCount : contractCount,
  };
}
