export interface Position {
  /** Collateral allocated to the position, net of the entry fee. */
  value: bigint;
  openPrice: bigint;
  /** 0 while the position is open. */
  closePrice: bigint;
  long: boolean;
}

export type PositionOutcome = "closed" | "liquidated";

export interface ArchivedPosition extends Position {
  trader: string;
  outcome: PositionOutcome;
  /** Settlement value computed at the close price. */
  settlement: bigint;
  archivedAt: string; // ISO 8601
}

export interface LedgerData {
  positions: Record<string, Position>;
  totalLong: bigint;
  totalShort: bigint;
  /** Liquidation threshold in basis points. */
  marginRequirement: bigint;
  leverage: bigint;
  history: ArchivedPosition[];
}

export interface PerpAccount {
  asset: string;
  leverage: bigint;
  marginRequirement: bigint;
  totalLong: bigint;
  totalShort: bigint;
  openPositions: number;
}

export interface CloseResult {
  trader: string;
  settlement: bigint;
  position: ArchivedPosition;
}

export interface LiquidationResult {
  target: string;
  liquidator: string;
  settlement: bigint;
  marginRatio: bigint;
  reward: bigint;
  position: ArchivedPosition;
}
