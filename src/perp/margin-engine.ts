export const BASIS_POINTS = 10_000n;
export const DEFAULT_MARGIN_REQUIREMENT = 300n;

/** Settlement value in basis points of the collateral originally allocated. */
export function calcMarginRatio(settlement: bigint, value: bigint): bigint {
  return (settlement * BASIS_POINTS) / value;
}

/** A position may be liquidated only while its ratio is strictly below the requirement. */
export function isBelowMargin(marginRatio: bigint, marginRequirement: bigint): boolean {
  return marginRatio < marginRequirement;
}

/** Liquidator reward: one third of the settlement value, truncated. */
export function calcLiquidationReward(settlement: bigint): bigint {
  return settlement / 3n;
}
