/**
 * Settlement Gate
 *
 * Funding goes to whoever holds the position at the settlement instant.
 * The hedge is opened only inside the last `bufferSeconds` of the funding
 * interval, wide enough for one full hedge round trip.
 */

export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** Seconds left until the next settlement boundary of the interval */
export function secondsUntilSettlement(
  fundingIntervalSeconds: number,
  nowSeconds = nowInSeconds(),
): number {
  const elapsed = nowSeconds % fundingIntervalSeconds;
  return fundingIntervalSeconds - elapsed;
}

export function isNearSettlement(
  fundingIntervalSeconds: number,
  bufferSeconds = 10,
  nowSeconds = nowInSeconds(),
): boolean {
  if (!(fundingIntervalSeconds > 0)) return false;
  return secondsUntilSettlement(fundingIntervalSeconds, nowSeconds) <= bufferSeconds;
}
