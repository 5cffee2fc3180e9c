import type { LedgerData } from "./perp-position.js";

export interface PriceOracle {
  /** Latest reference price; 0 when no price was ever reported. */
  currentPrice(): Promise<bigint>;
}

/**
 * Settlement-currency custody. Both calls must reject (never truncate) when
 * the source lacks balance or allowance.
 */
export interface TokenLedger {
  /** Move `amount` from `from` into `to` using the allowance `from` granted. */
  pull(from: string, to: string, amount: bigint): Promise<void>;
  /** Pay `amount` out of custody to `to`. */
  push(to: string, amount: bigint): Promise<void>;
}

export interface AuthorizationProvider {
  require(principal: string): Promise<void>;
}

export type PerpTopic = "perp.open" | "perp.close" | "perp.liquidation";

export interface EventSink {
  publish(topic: PerpTopic, payload: Record<string, unknown>): void | Promise<void>;
}

export interface LedgerStore {
  /** null when nothing was persisted yet. */
  load(): Promise<LedgerData | null>;
  save(data: LedgerData): Promise<void>;
}
