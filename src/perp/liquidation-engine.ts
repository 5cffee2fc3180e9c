import type { LiquidationResult } from "./perp-position.js";
import type { BroadcastFn } from "./perp-events.js";
import type { TradeLifecycle } from "./trade-lifecycle.js";
import { logger as defaultLogger, serializeError, type Logger } from "../logging/logger.js";
import { toWire } from "./perp-events.js";

/**
 * Liquidate every open position whose margin ratio is below the requirement,
 * on behalf of `liquidator`. Meant to run on a host timer.
 *
 * Positions are checked one at a time against the price of the moment; one
 * failing liquidation is logged and the sweep moves on. Each liquidation is
 * broadcast as a `perp.updated` change, like the gateway's `perp.liquidate`;
 * the `perp.liquidation` event itself comes from the lifecycle's event sink.
 */
export async function checkPerpLiquidations(
  lifecycle: TradeLifecycle,
  liquidator: string,
  broadcast?: BroadcastFn,
  log: Logger = defaultLogger,
): Promise<LiquidationResult[]> {
  const traders = lifecycle.listTraders();
  if (traders.length === 0) {
    return [];
  }

  const results: LiquidationResult[] = [];
  for (const trader of traders) {
    try {
      if (!(await lifecycle.isLiquidatable(trader))) {
        continue;
      }
      const result = await lifecycle.liquidate(liquidator, trader);
      results.push(result);
      if (broadcast) {
        broadcast(
          "perp.updated",
          toWire({
            action: "liquidation",
            trader: result.target,
            liquidator: result.liquidator,
            long: result.position.long,
            value: result.position.value,
            openPrice: result.position.openPrice,
            closePrice: result.position.closePrice,
            settlement: result.settlement,
            reward: result.reward,
            liquidatedAt: result.position.archivedAt,
          }),
        );
      }
    } catch (err) {
      log.error("PERP_LIQUIDATION_SWEEP_FAILED", { trader, error: serializeError(err) });
    }
  }
  return results;
}
