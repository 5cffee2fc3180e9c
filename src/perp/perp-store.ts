import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { LedgerStore } from "./collaborators.js";
import type { ArchivedPosition, LedgerData, Position } from "./perp-position.js";

const Amount = Type.String({ pattern: "^-?[0-9]+$" });

const StoredPositionSchema = Type.Object({
  value: Amount,
  openPrice: Amount,
  closePrice: Amount,
  long: Type.Boolean(),
});

const StoredArchivedPositionSchema = Type.Composite([
  StoredPositionSchema,
  Type.Object({
    trader: Type.String(),
    outcome: Type.Union([Type.Literal("closed"), Type.Literal("liquidated")]),
    settlement: Amount,
    archivedAt: Type.String(),
  }),
]);

export const StoredLedgerSchema = Type.Object({
  version: Type.Literal(1),
  positions: Type.Record(Type.String(), StoredPositionSchema),
  totalLong: Amount,
  totalShort: Amount,
  marginRequirement: Amount,
  leverage: Amount,
  history: Type.Array(StoredArchivedPositionSchema),
});

export type StoredLedger = Static<typeof StoredLedgerSchema>;
type StoredPosition = Static<typeof StoredPositionSchema>;

function encodePosition(p: Position): StoredPosition {
  return {
    value: p.value.toString(),
    openPrice: p.openPrice.toString(),
    closePrice: p.closePrice.toString(),
    long: p.long,
  };
}

function decodePosition(p: StoredPosition): Position {
  return {
    value: BigInt(p.value),
    openPrice: BigInt(p.openPrice),
    closePrice: BigInt(p.closePrice),
    long: p.long,
  };
}

export function encodeLedger(data: LedgerData): StoredLedger {
  const positions: Record<string, StoredPosition> = {};
  for (const [trader, position] of Object.entries(data.positions)) {
    positions[trader] = encodePosition(position);
  }
  return {
    version: 1,
    positions,
    totalLong: data.totalLong.toString(),
    totalShort: data.totalShort.toString(),
    marginRequirement: data.marginRequirement.toString(),
    leverage: data.leverage.toString(),
    history: data.history.map((h) => ({
      ...encodePosition(h),
      trader: h.trader,
      outcome: h.outcome,
      settlement: h.settlement.toString(),
      archivedAt: h.archivedAt,
    })),
  };
}

export function decodeLedger(stored: StoredLedger): LedgerData {
  const positions: Record<string, Position> = {};
  for (const [trader, position] of Object.entries(stored.positions)) {
    positions[trader] = decodePosition(position);
  }
  const history: ArchivedPosition[] = stored.history.map((h) => ({
    ...decodePosition(h),
    trader: h.trader,
    outcome: h.outcome,
    settlement: BigInt(h.settlement),
    archivedAt: h.archivedAt,
  }));
  return {
    positions,
    totalLong: BigInt(stored.totalLong),
    totalShort: BigInt(stored.totalShort),
    marginRequirement: BigInt(stored.marginRequirement),
    leverage: BigInt(stored.leverage),
    history,
  };
}

export class PerpStore implements LedgerStore {
  private storagePath: string;

  constructor(storageDir?: string) {
    const dir = storageDir ?? path.join(os.homedir(), ".perp-ledger");
    this.storagePath = path.join(dir, "perp-ledger.json");
  }

  getPath(): string {
    return this.storagePath;
  }

  async load(): Promise<LedgerData | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storagePath, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return null;
      }
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Value.Check(StoredLedgerSchema, parsed)) {
      const first = Value.Errors(StoredLedgerSchema, parsed).First();
      throw new Error(
        `Corrupt ledger file ${this.storagePath}: ${first ? `${first.path} ${first.message}` : "schema mismatch"}`,
      );
    }
    return decodeLedger(parsed);
  }

  async save(data: LedgerData): Promise<void> {
    const dir = path.dirname(this.storagePath);
    await fs.mkdir(dir, { recursive: true });

    // Write to temp file then rename for atomicity
    const tmpPath = `${this.storagePath}.${crypto.randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(encodeLedger(data), null, 2), "utf-8");
    await fs.rename(tmpPath, this.storagePath);
  }
}

/** Keeps the last saved state in process. */
export class MemoryLedgerStore implements LedgerStore {
  private stored: StoredLedger | null = null;

  async load(): Promise<LedgerData | null> {
    return this.stored ? decodeLedger(this.stored) : null;
  }

  async save(data: LedgerData): Promise<void> {
    this.stored = encodeLedger(data);
  }
}
