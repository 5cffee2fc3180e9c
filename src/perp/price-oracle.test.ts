import { describe, it, expect } from "vitest";
import { PriceUnavailableError, UntrustedOracleError } from "./perp-errors.js";
import { ManagedPriceOracle } from "./price-oracle.js";

describe("ManagedPriceOracle", () => {
  it("reports 0 until a price is set", async () => {
    const oracle = new ManagedPriceOracle("oracle-1");
    expect(await oracle.currentPrice()).toBe(0n);
    expect(oracle.lastUpdatedAt).toBeNull();
  });

  it("accepts prices from trusted reporters only", async () => {
    const oracle = new ManagedPriceOracle("oracle-1");
    oracle.setPrice("oracle-1", 50_000n);

    expect(() => oracle.setPrice("mallory", 1n)).toThrow(UntrustedOracleError);
    expect(await oracle.currentPrice()).toBe(50_000n);
    expect(oracle.lastUpdatedAt).not.toBeNull();
  });

  it("rejects non-positive prices", () => {
    const oracle = new ManagedPriceOracle("oracle-1");
    expect(() => oracle.setPrice("oracle-1", 0n)).toThrow(PriceUnavailableError);
  });

  it("lets trusted reporters manage the reporter set", async () => {
    const oracle = new ManagedPriceOracle("oracle-1");
    oracle.addOracle("oracle-1", "oracle-2");
    oracle.setPrice("oracle-2", 51_000n);

    expect(oracle.listOracles()).toEqual(["oracle-1", "oracle-2"]);
    expect(oracle.removeOracle("oracle-2", "oracle-1")).toBe(true);
    expect(oracle.isTrusted("oracle-1")).toBe(false);
    expect(() => oracle.addOracle("oracle-1", "oracle-3")).toThrow(UntrustedOracleError);
    expect(await oracle.currentPrice()).toBe(51_000n);
  });

  it("keeps the last reporter", () => {
    const oracle = new ManagedPriceOracle("oracle-1");
    expect(oracle.removeOracle("oracle-1", "oracle-1")).toBe(false);
    expect(oracle.isTrusted("oracle-1")).toBe(true);
  });
});
