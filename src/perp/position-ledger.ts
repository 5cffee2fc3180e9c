import type { ArchivedPosition, LedgerData, Position, PositionOutcome } from "./perp-position.js";
import { DEFAULT_MARGIN_REQUIREMENT } from "./margin-engine.js";
import { PositionNotOpenError } from "./perp-errors.js";

export interface LedgerCheckpoint {
  readonly data: LedgerData;
}

function clonePosition(position: Position): Position {
  return { ...position };
}

/**
 * Owns the trader → position map, the per-side notional aggregates and the
 * append-only history. Aggregates move by the position's stored value only:
 * up on open, down on archive.
 */
export class PositionLedger {
  private positions: Map<string, Position>;
  private history: ArchivedPosition[];
  private _totalLong: bigint;
  private _totalShort: bigint;
  private _marginRequirement: bigint;
  private readonly _leverage: bigint;

  private constructor(data: LedgerData) {
    this.positions = new Map(
      Object.entries(data.positions).map(([trader, p]) => [trader, clonePosition(p)]),
    );
    this.history = data.history.map((h) => ({ ...h }));
    this._totalLong = data.totalLong;
    this._totalShort = data.totalShort;
    this._marginRequirement = data.marginRequirement;
    this._leverage = data.leverage;
  }

  static initialize(
    leverage: bigint,
    marginRequirement: bigint = DEFAULT_MARGIN_REQUIREMENT,
  ): PositionLedger {
    return new PositionLedger({
      positions: {},
      totalLong: 0n,
      totalShort: 0n,
      marginRequirement,
      leverage,
      history: [],
    });
  }

  static fromData(data: LedgerData): PositionLedger {
    return new PositionLedger(data);
  }

  get totalLong(): bigint {
    return this._totalLong;
  }

  get totalShort(): bigint {
    return this._totalShort;
  }

  get marginRequirement(): bigint {
    return this._marginRequirement;
  }

  get leverage(): bigint {
    return this._leverage;
  }

  get size(): number {
    return this.positions.size;
  }

  get(trader: string): Position | undefined {
    const position = this.positions.get(trader);
    return position ? clonePosition(position) : undefined;
  }

  has(trader: string): boolean {
    return this.positions.has(trader);
  }

  traders(): string[] {
    return [...this.positions.keys()];
  }

  /** Store a position and add its value to its side. Replaces any existing entry for the trader. */
  open(trader: string, position: Position): void {
    this.positions.set(trader, clonePosition(position));
    if (position.long) {
      this._totalLong += position.value;
    } else {
      this._totalShort += position.value;
    }
  }

  /**
   * Remove a trader's position, take its original value off its side and
   * append it to history with the given close price.
   */
  archive(
    trader: string,
    closePrice: bigint,
    outcome: PositionOutcome,
    settlement: bigint,
  ): ArchivedPosition {
    const position = this.positions.get(trader);
    if (!position) {
      throw new PositionNotOpenError(trader);
    }

    const archived: ArchivedPosition = {
      ...position,
      closePrice,
      trader,
      outcome,
      settlement,
      archivedAt: new Date().toISOString(),
    };
    this.history.push(archived);

    if (position.long) {
      this._totalLong -= position.value;
    } else {
      this._totalShort -= position.value;
    }
    this.positions.delete(trader);

    return { ...archived };
  }

  getHistory(): ArchivedPosition[] {
    return this.history.map((h) => ({ ...h }));
  }

  toData(): LedgerData {
    const positions: Record<string, Position> = {};
    for (const [trader, position] of this.positions) {
      positions[trader] = clonePosition(position);
    }
    return {
      positions,
      totalLong: this._totalLong,
      totalShort: this._totalShort,
      marginRequirement: this._marginRequirement,
      leverage: this._leverage,
      history: this.getHistory(),
    };
  }

  checkpoint(): LedgerCheckpoint {
    return { data: this.toData() };
  }

  restore(checkpoint: LedgerCheckpoint): void {
    const { data } = checkpoint;
    this.positions = new Map(
      Object.entries(data.positions).map(([trader, p]) => [trader, clonePosition(p)]),
    );
    this.history = data.history.map((h) => ({ ...h }));
    this._totalLong = data.totalLong;
    this._totalShort = data.totalShort;
    this._marginRequirement = data.marginRequirement;
  }

  /** Aggregate mismatches, empty when each side equals the sum of its open positions. */
  checkInvariants(): string[] {
    let long = 0n;
    let short = 0n;
    const issues: string[] = [];
    for (const [trader, position] of this.positions) {
      if (position.value <= 0n) {
        issues.push(`position of ${trader} has non-positive value ${position.value}`);
      }
      if (position.long) {
        long += position.value;
      } else {
        short += position.value;
      }
    }
    if (long !== this._totalLong) {
      issues.push(`totalLong ${this._totalLong} != sum of long positions ${long}`);
    }
    if (short !== this._totalShort) {
      issues.push(`totalShort ${this._totalShort} != sum of short positions ${short}`);
    }
    return issues;
  }
}
