export { TradeLifecycle } from "./trade-lifecycle.js";
export type { TradeLifecycleDeps } from "./trade-lifecycle.js";
export { PositionLedger } from "./position-ledger.js";
export type { LedgerCheckpoint } from "./position-ledger.js";
export { PerpStore, MemoryLedgerStore, encodeLedger, decodeLedger } from "./perp-store.js";
export type { StoredLedger } from "./perp-store.js";
export type {
  Position,
  ArchivedPosition,
  PositionOutcome,
  LedgerData,
  PerpAccount,
  CloseResult,
  LiquidationResult,
} from "./perp-position.js";
export type {
  PriceOracle,
  TokenLedger,
  AuthorizationProvider,
  EventSink,
  LedgerStore,
  PerpTopic,
} from "./collaborators.js";
export { calcOpenFee } from "./fee-model.js";
export { calcSettlementValue, classifyPriceMove, applyMultiplier } from "./pnl-engine.js";
export type { PriceMove } from "./pnl-engine.js";
export {
  BASIS_POINTS,
  DEFAULT_MARGIN_REQUIREMENT,
  calcMarginRatio,
  isBelowMargin,
  calcLiquidationReward,
} from "./margin-engine.js";
export { parsePerpConfig, loadPerpConfigFromEnv, PerpConfigSchema } from "./perp-config.js";
export type { PerpConfig, PerpConfigInput, DuplicateOpenPolicy } from "./perp-config.js";
export * from "./perp-errors.js";
export { ManagedPriceOracle } from "./price-oracle.js";
export { InMemoryTokenLedger } from "./token-ledger.js";
export { AllowListAuthorization } from "./authorization.js";
export { createBroadcastSink, toWire } from "./perp-events.js";
export type { BroadcastFn } from "./perp-events.js";
export { checkPerpLiquidations } from "./liquidation-engine.js";

import type { Logger } from "../logging/logger.js";
import type {
  AuthorizationProvider,
  EventSink,
  LedgerStore,
  PriceOracle,
  TokenLedger,
} from "./collaborators.js";
import type { PerpConfig } from "./perp-config.js";
import { AllowListAuthorization } from "./authorization.js";
import { PerpStore } from "./perp-store.js";
import { ManagedPriceOracle } from "./price-oracle.js";
import { InMemoryTokenLedger } from "./token-ledger.js";
import { TradeLifecycle } from "./trade-lifecycle.js";

export interface PerpServiceDeps {
  oracle?: PriceOracle;
  tokens?: TokenLedger;
  auth?: AuthorizationProvider;
  store?: LedgerStore;
  events?: EventSink;
  logger?: Logger;
}

export interface PerpService {
  config: PerpConfig;
  lifecycle: TradeLifecycle;
  oracle: PriceOracle;
  tokens: TokenLedger;
  auth: AuthorizationProvider;
  store: LedgerStore;
}

/**
 * Wire a lifecycle from configuration. Collaborators not supplied by the host
 * fall back to the in-process implementations: a managed oracle trusting
 * `config.oracle`, an in-memory token ledger, an empty allow-list and the
 * JSON file store under `config.storageDir`.
 */
export async function createPerpService(
  config: PerpConfig,
  deps: PerpServiceDeps = {},
): Promise<PerpService> {
  const oracle = deps.oracle ?? new ManagedPriceOracle(config.oracle);
  const tokens = deps.tokens ?? new InMemoryTokenLedger(config.settlementToken, config.custodyAccount);
  const auth = deps.auth ?? new AllowListAuthorization();
  const store = deps.store ?? new PerpStore(config.storageDir);
  const lifecycle = await TradeLifecycle.create(config, {
    oracle,
    tokens,
    auth,
    store,
    ...(deps.events ? { events: deps.events } : {}),
    ...(deps.logger ? { logger: deps.logger } : {}),
  });
  return { config, lifecycle, oracle, tokens, auth, store };
}

let servicePromise: Promise<PerpService> | null = null;

/** Lazily initialise and return the singleton perp service. */
export function getPerpService(config: PerpConfig, deps: PerpServiceDeps = {}): Promise<PerpService> {
  if (!servicePromise) {
    servicePromise = createPerpService(config, deps).catch((err: unknown) => {
      servicePromise = null;
      throw err;
    });
  }
  return servicePromise;
}
