export const TRADE_OFF_SCALE_FACTOR = 1000;

/**
 * Scales a trade-off into integer space. Truncates toward zero, so values
 * that are not multiples of 0.001 lose their remainder.
 */
export function scaleTradeOff(tradeOff: number): number {
  return Math.trunc(tradeOff * TRADE_OFF_SCALE_FACTOR);
}

/**
 * Score gained by including an interval on top of its predecessor's entry.
 *
 * Rules, in order:
 * 1. Zero trade-off and zero cost: one unit.
 * 2. Trade-off of exactly 1 (pure count): one unit, cost ignored.
 * 3. Otherwise the blended rule: tradeOffScaled minus the scaled cost.
 *
 * A costly interval at zero trade-off does not match rule 1 and lands in
 * rule 3, where it is penalized by `1000 * cost`.
 */
export function scoreIfIncluded(
  tradeOff: number,
  tradeOffScaled: number,
  cost: number,
): number {
  if (tradeOff === 0 && cost === 0) {
    return 1;
  }

  if (tradeOff === 1) {
    return 1;
  }

  return (
    tradeOffScaled -
    Math.max(0, (TRADE_OFF_SCALE_FACTOR - tradeOffScaled) * cost)
  );
}
