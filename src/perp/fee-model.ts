/** Fee rate is 1/FEE_DIVISOR of the requested size. */
const FEE_DIVISOR = 100n;

/**
 * Entry fee for a new trade.
 *
 * Charged only when the trade lands on the side whose aggregate notional is
 * strictly larger than the other's, i.e. when it widens an existing
 * imbalance. A balanced market charges nothing either way.
 */
export function calcOpenFee(
  totalLong: bigint,
  totalShort: bigint,
  requestedValue: bigint,
  long: boolean,
): bigint {
  const widensImbalance = long ? totalLong > totalShort : totalShort > totalLong;
  return widensImbalance ? requestedValue / FEE_DIVISOR : 0n;
}
