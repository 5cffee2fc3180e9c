import { describe, it, expect } from "vitest";
import type { Position } from "./perp-position.js";
import { isPerpError } from "./perp-errors.js";
import { applyMultiplier, calcSettlementValue, classifyPriceMove } from "./pnl-engine.js";

const LEVERAGE = 10n;

function position(long: boolean, value = 1000n, openPrice = 50_000n): Position {
  return { value, openPrice, closePrice: 0n, long };
}

describe("classifyPriceMove", () => {
  it.each([
    { long: true, price: 55_000n, expected: { kind: "gain", amount: 5000n } },
    { long: true, price: 45_000n, expected: { kind: "loss", amount: 5000n } },
    { long: false, price: 45_000n, expected: { kind: "gain", amount: 5000n } },
    { long: false, price: 55_000n, expected: { kind: "loss", amount: 5000n } },
    { long: true, price: 50_000n, expected: { kind: "unchanged" } },
    { long: false, price: 50_000n, expected: { kind: "unchanged" } },
  ])("long=$long at $price", ({ long, price, expected }) => {
    expect(classifyPriceMove(long, 50_000n, price)).toEqual(expected);
  });
});

describe("applyMultiplier", () => {
  it("multiplies before dividing", () => {
    // 5000 × 10 × 1000 / 50000 = 1000; an integer multiplier (10 × 1000 / 50000 = 0) would give 0
    expect(applyMultiplier(5000n, 10n, 1000n, 50_000n)).toBe(1000n);
  });

  it("truncates the single division", () => {
    // 7 × 10 × 1000 / 50000 = 1.4 -> 1
    expect(applyMultiplier(7n, 10n, 1000n, 50_000n)).toBe(1n);
  });
});

describe("calcSettlementValue", () => {
  // ── Long ──

  it("adds leveraged gain for a long when price rises", () => {
    // gain 5000 × (10 × 1000 / 50000) = 1000 -> 1000 + 1000
    expect(calcSettlementValue(position(true), 55_000n, LEVERAGE)).toBe(2000n);
  });

  it("wipes out a long when loss × leverage exceeds the value", () => {
    // loss 5000 × 10 = 50000 > 1000
    expect(calcSettlementValue(position(true), 45_000n, LEVERAGE)).toBe(0n);
  });

  it("wipes out a 2% adverse move at leverage 10", () => {
    // loss 1000 × 10 = 10000 > 1000
    expect(calcSettlementValue(position(true), 49_000n, LEVERAGE)).toBe(0n);
  });

  it("subtracts leveraged loss for a small adverse move", () => {
    // loss 10: 10 × 10 = 100 <= 1000; 10 × 10 × 1000 / 50000 = 2 -> 998
    expect(calcSettlementValue(position(true), 49_990n, LEVERAGE)).toBe(998n);
  });

  it("returns the stored value when price is unchanged", () => {
    expect(calcSettlementValue(position(true), 50_000n, LEVERAGE)).toBe(1000n);
    expect(calcSettlementValue(position(false), 50_000n, LEVERAGE)).toBe(1000n);
  });

  // ── Short ──

  it("mirrors the long case for a short", () => {
    expect(calcSettlementValue(position(false), 45_000n, LEVERAGE)).toBe(2000n);
    expect(calcSettlementValue(position(false), 55_000n, LEVERAGE)).toBe(0n);
    expect(calcSettlementValue(position(false), 50_010n, LEVERAGE)).toBe(998n);
  });

  // ── Boundaries ──

  it("keeps a loss of exactly value / leverage inside the loss branch", () => {
    // open 1000, value 1000: loss 100 × 10 = 1000, not > 1000; 100 × 10 × 1000 / 1000 = 1000 -> 0
    expect(calcSettlementValue(position(true, 1000n, 1000n), 900n, LEVERAGE)).toBe(0n);
  });

  it("never goes negative when the applied loss exceeds the value", () => {
    // open 100, value 1000: loss 99 × 10 = 990 <= 1000; 99 × 10 × 1000 / 100 = 9900 > 1000
    expect(calcSettlementValue(position(true, 1000n, 100n), 1n, LEVERAGE)).toBe(0n);
  });

  it("refuses a position without a usable open price", () => {
    let caught: unknown;
    try {
      calcSettlementValue(position(true, 1000n, 0n), 50_000n, LEVERAGE);
    } catch (err) {
      caught = err;
    }
    expect(isPerpError(caught, "PriceUnavailable")).toBe(true);
  });
});
