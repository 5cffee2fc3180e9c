import type { Position } from "./perp-position.js";
import { PriceUnavailableError } from "./perp-errors.js";

export type PriceMove =
  | { kind: "gain"; amount: bigint }
  | { kind: "loss"; amount: bigint }
  | { kind: "unchanged" };

export function classifyPriceMove(long: boolean, openPrice: bigint, currentPrice: bigint): PriceMove {
  const delta = long ? currentPrice - openPrice : openPrice - currentPrice;
  if (delta > 0n) {
    return { kind: "gain", amount: delta };
  }
  if (delta < 0n) {
    return { kind: "loss", amount: -delta };
  }
  return { kind: "unchanged" };
}

/** amount × (leverage × value / openPrice), dividing once at the end. */
export function applyMultiplier(
  amount: bigint,
  leverage: bigint,
  value: bigint,
  openPrice: bigint,
): bigint {
  return (amount * leverage * value) / openPrice;
}

/**
 * Settlement value of a leveraged position at a given reference price.
 * An adverse move with move × leverage > value wipes the position out;
 * otherwise the result never goes below 0.
 *
 * All arithmetic is truncating bigint arithmetic. The leverage multiplier is
 * the ratio leverage × value / openPrice; it is applied multiply-first so the
 * only division happens last:
 *
 *   applied(amount) = amount × leverage × value / openPrice
 *
 * Long:  gains when price > openPrice, loses when price < openPrice
 * Short: gains when price < openPrice, loses when price > openPrice
 */
export function calcSettlementValue(
  position: Pick<Position, "value" | "openPrice" | "long">,
  currentPrice: bigint,
  leverage: bigint,
): bigint {
  if (position.openPrice <= 0n) {
    throw new PriceUnavailableError(
      position.openPrice,
      `Position has no usable open price (${position.openPrice})`,
    );
  }

  const move = classifyPriceMove(position.long, position.openPrice, currentPrice);
  switch (move.kind) {
    case "gain":
      return position.value + applyMultiplier(move.amount, leverage, position.value, position.openPrice);
    case "loss": {
      if (move.amount * leverage > position.value) {
        return 0n;
      }
      const remaining =
        position.value - applyMultiplier(move.amount, leverage, position.value, position.openPrice);
      return remaining > 0n ? remaining : 0n;
    }
    case "unchanged":
      return position.value;
  }
}
