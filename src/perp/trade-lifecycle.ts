import type {
  AuthorizationProvider,
  EventSink,
  LedgerStore,
  PerpTopic,
  PriceOracle,
  TokenLedger,
} from "./collaborators.js";
import type { PerpConfig } from "./perp-config.js";
import type {
  ArchivedPosition,
  CloseResult,
  LedgerData,
  LiquidationResult,
  PerpAccount,
  Position,
} from "./perp-position.js";
import { logger as defaultLogger, serializeError, type Logger } from "../logging/logger.js";
import { calcOpenFee } from "./fee-model.js";
import { calcLiquidationReward, calcMarginRatio, isBelowMargin } from "./margin-engine.js";
import {
  AboveMarginError,
  PerpConfigError,
  PositionNotOpenError,
  PositionOpenError,
  PriceUnavailableError,
  ZeroValueError,
} from "./perp-errors.js";
import { calcSettlementValue } from "./pnl-engine.js";
import { PositionLedger, type LedgerCheckpoint } from "./position-ledger.js";

export interface TradeLifecycleDeps {
  oracle: PriceOracle;
  tokens: TokenLedger;
  auth: AuthorizationProvider;
  store: LedgerStore;
  events?: EventSink;
  logger?: Logger;
}

interface Compensation {
  label: string;
  run: () => Promise<void>;
}

interface Payout {
  to: string;
  amount: bigint;
}

interface Transaction {
  /** Undo step for an external effect that already happened inside the operation. */
  onRollback(label: string, run: () => Promise<void>): void;
  /** Pay out of custody once the new ledger state is persisted. One per operation. */
  payout(to: string, amount: bigint): void;
}

/**
 * Open / close / liquidate. The only component that mutates the ledger; every
 * operation either completes, including persistence and transfers, or leaves
 * ledger, store and custody as they were.
 */
export class TradeLifecycle {
  private readonly config: PerpConfig;
  private readonly ledger: PositionLedger;
  private readonly oracle: PriceOracle;
  private readonly tokens: TokenLedger;
  private readonly auth: AuthorizationProvider;
  private readonly store: LedgerStore;
  private readonly events: EventSink | undefined;
  private readonly log: Logger;
  // Tail of the mutation queue; settles when the last queued operation does.
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(config: PerpConfig, ledger: PositionLedger, deps: TradeLifecycleDeps) {
    this.config = config;
    this.ledger = ledger;
    this.oracle = deps.oracle;
    this.tokens = deps.tokens;
    this.auth = deps.auth;
    this.store = deps.store;
    this.events = deps.events;
    this.log = deps.logger ?? defaultLogger;
  }

  /** Load the persisted ledger, or initialize and persist a fresh one. */
  static async create(config: PerpConfig, deps: TradeLifecycleDeps): Promise<TradeLifecycle> {
    const stored = await deps.store.load();
    if (stored && stored.leverage !== config.leverage) {
      throw new PerpConfigError(
        `Ledger was initialized with leverage ${stored.leverage}, configuration asks for ${config.leverage}`,
      );
    }

    if (!stored) {
      const ledger = PositionLedger.initialize(config.leverage, config.marginRequirement);
      await deps.store.save(ledger.toData());
      return new TradeLifecycle(config, ledger, deps);
    }

    const ledger = PositionLedger.fromData(stored);
    const issues = ledger.checkInvariants();
    if (issues.length > 0) {
      throw new PerpConfigError("Stored ledger is inconsistent", issues);
    }
    return new TradeLifecycle(config, ledger, deps);
  }

  /**
   * Mutations run one at a time: each open, close or liquidation finishes,
   * payout and rollback included, before the next one reads the ledger.
   */
  open(trader: string, requestedValue: bigint, long: boolean): Promise<Position> {
    return this.enqueue(() => this.openPosition(trader, requestedValue, long));
  }

  close(trader: string): Promise<CloseResult> {
    return this.enqueue(() => this.closePosition(trader));
  }

  liquidate(liquidator: string, target: string): Promise<LiquidationResult> {
    return this.enqueue(() => this.liquidatePosition(liquidator, target));
  }

  private async openPosition(trader: string, requestedValue: bigint, long: boolean): Promise<Position> {
    await this.auth.require(trader);
    if (requestedValue <= 0n) {
      throw new ZeroValueError(requestedValue);
    }
    if (this.config.duplicateOpen === "reject" && this.ledger.has(trader)) {
      throw new PositionOpenError(trader);
    }

    const price = await this.oracle.currentPrice();
    if (price <= 0n) {
      throw new PriceUnavailableError(price);
    }

    const { position, fee } = await this.transact("open", async (tx) => {
      await this.tokens.pull(trader, this.config.custodyAccount, requestedValue);
      tx.onRollback("refund deposit", () => this.tokens.push(trader, requestedValue));

      const fee = calcOpenFee(this.ledger.totalLong, this.ledger.totalShort, requestedValue, long);
      const position: Position = {
        value: requestedValue - fee,
        openPrice: price,
        closePrice: 0n,
        long,
      };

      const replaced = this.ledger.get(trader);
      if (replaced) {
        // Legacy behavior: the replaced position's value stays in its aggregate.
        this.log.warn("PERP_POSITION_OVERWRITTEN", { trader, replaced });
      }
      this.ledger.open(trader, position);
      return { position, fee };
    });

    this.log.info("PERP_POSITION_OPENED", {
      trader,
      long,
      requestedValue,
      fee,
      value: position.value,
      openPrice: price,
    });
    await this.notify("perp.open", { trader, value: requestedValue, long });
    return position;
  }

  private async closePosition(trader: string): Promise<CloseResult> {
    await this.auth.require(trader);
    const position = this.requirePosition(trader);
    const price = await this.oracle.currentPrice();
    const settlement = calcSettlementValue(position, price, this.ledger.leverage);

    const archived = await this.transact("close", async (tx) => {
      const archived = this.ledger.archive(trader, price, "closed", settlement);
      if (settlement > 0n) {
        tx.payout(trader, settlement);
      }
      return archived;
    });

    this.log.info("PERP_POSITION_CLOSED", {
      trader,
      value: archived.value,
      openPrice: archived.openPrice,
      closePrice: price,
      settlement,
    });
    await this.notify("perp.close", { trader, settlement });
    return { trader, settlement, position: archived };
  }

  private async liquidatePosition(liquidator: string, target: string): Promise<LiquidationResult> {
    await this.auth.require(liquidator);
    const position = this.requirePosition(target);
    const price = await this.oracle.currentPrice();
    const settlement = calcSettlementValue(position, price, this.ledger.leverage);
    const marginRatio = calcMarginRatio(settlement, position.value);
    const requirement = this.ledger.marginRequirement;

    if (!isBelowMargin(marginRatio, requirement)) {
      throw new AboveMarginError(target, marginRatio, requirement);
    }

    const reward = calcLiquidationReward(settlement);
    const archived = await this.transact("liquidate", async (tx) => {
      const archived = this.ledger.archive(target, price, "liquidated", settlement);
      if (reward > 0n) {
        tx.payout(liquidator, reward);
      }
      return archived;
    });

    this.log.info("PERP_POSITION_LIQUIDATED", {
      target,
      liquidator,
      value: archived.value,
      closePrice: price,
      settlement,
      marginRatio,
      reward,
    });
    await this.notify("perp.liquidation", { target, liquidator, settlement });
    return { target, liquidator, settlement, marginRatio, reward, position: archived };
  }

  /** Settlement value at the current price; 0 when the trader has no position. */
  async positionValue(trader: string): Promise<bigint> {
    const position = this.ledger.get(trader);
    if (!position) {
      return 0n;
    }
    const price = await this.oracle.currentPrice();
    return calcSettlementValue(position, price, this.ledger.leverage);
  }

  /** Current margin ratio in basis points, or null when the trader has no position. */
  async marginRatio(trader: string): Promise<bigint | null> {
    const position = this.ledger.get(trader);
    if (!position) {
      return null;
    }
    const settlement = await this.positionValue(trader);
    return calcMarginRatio(settlement, position.value);
  }

  async isLiquidatable(trader: string): Promise<boolean> {
    const ratio = await this.marginRatio(trader);
    return ratio !== null && isBelowMargin(ratio, this.ledger.marginRequirement);
  }

  /** Fee an open of this size and direction would pay right now. */
  quoteFee(requestedValue: bigint, long: boolean): bigint {
    return calcOpenFee(this.ledger.totalLong, this.ledger.totalShort, requestedValue, long);
  }

  getPosition(trader: string): Position | undefined {
    return this.ledger.get(trader);
  }

  /** Traders with an open position. */
  listTraders(): string[] {
    return this.ledger.traders();
  }

  getHistory(limit = 50): ArchivedPosition[] {
    return this.ledger.getHistory().slice(-limit).toReversed();
  }

  getAccount(): PerpAccount {
    return {
      asset: this.config.asset,
      leverage: this.ledger.leverage,
      marginRequirement: this.ledger.marginRequirement,
      totalLong: this.ledger.totalLong,
      totalShort: this.ledger.totalShort,
      openPositions: this.ledger.size,
    };
  }

  snapshot(): LedgerData {
    return this.ledger.toData();
  }

  private requirePosition(trader: string): Position {
    const position = this.ledger.get(trader);
    if (!position) {
      throw new PositionNotOpenError(trader);
    }
    return position;
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn, fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async transact<T>(operation: string, work: (tx: Transaction) => Promise<T>): Promise<T> {
    const checkpoint = this.ledger.checkpoint();
    const compensations: Compensation[] = [];
    const payouts: Payout[] = [];
    let committed = false;

    const tx: Transaction = {
      onRollback: (label, run) => {
        compensations.push({ label, run });
      },
      payout: (to, amount) => {
        if (payouts.length > 0) {
          throw new Error(`${operation} already scheduled a payout`);
        }
        payouts.push({ to, amount });
      },
    };

    try {
      const result = await work(tx);
      await this.store.save(this.ledger.toData());
      committed = true;
      for (const payout of payouts) {
        await this.tokens.push(payout.to, payout.amount);
      }
      return result;
    } catch (err) {
      await this.rollback(operation, checkpoint, compensations, committed, err);
      throw err;
    }
  }

  private async rollback(
    operation: string,
    checkpoint: LedgerCheckpoint,
    compensations: Compensation[],
    committed: boolean,
    cause: unknown,
  ): Promise<void> {
    this.ledger.restore(checkpoint);
    this.log.warn("PERP_ROLLBACK", { operation, committed, error: serializeError(cause) });

    const failures: unknown[] = [];
    for (const step of compensations.toReversed()) {
      try {
        await step.run();
      } catch (err) {
        failures.push(err);
        this.log.error("PERP_COMPENSATION_FAILED", {
          operation,
          step: step.label,
          error: serializeError(err),
        });
      }
    }

    if (committed) {
      try {
        await this.store.save(checkpoint.data);
      } catch (err) {
        failures.push(err);
        this.log.error("PERP_RESTORE_PERSIST_FAILED", { operation, error: serializeError(err) });
      }
    }

    if (failures.length > 0) {
      throw new AggregateError([cause, ...failures], `${operation} failed and was not fully rolled back`);
    }
  }

  private async notify(topic: PerpTopic, payload: Record<string, unknown>): Promise<void> {
    if (!this.events) {
      return;
    }
    try {
      await this.events.publish(topic, payload);
    } catch (err) {
      this.log.warn("PERP_EVENT_PUBLISH_FAILED", { topic, error: serializeError(err) });
    }
  }
}
