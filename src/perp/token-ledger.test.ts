import { describe, it, expect } from "vitest";
import { InsufficientFundsError } from "./perp-errors.js";
import { InMemoryTokenLedger } from "./token-ledger.js";

describe("InMemoryTokenLedger", () => {
  it("pulls within the allowance and spends it down", async () => {
    const tokens = new InMemoryTokenLedger("pUSD", "custody");
    tokens.mint("alice", 1000n);
    tokens.approve("alice", "custody", 700n);

    await tokens.pull("alice", "custody", 400n);

    expect(tokens.balanceOf("alice")).toBe(600n);
    expect(tokens.balanceOf("custody")).toBe(400n);
    expect(tokens.allowance("alice", "custody")).toBe(300n);
  });

  it("fails a pull beyond the allowance without moving anything", async () => {
    const tokens = new InMemoryTokenLedger("pUSD", "custody");
    tokens.mint("alice", 1000n);
    tokens.approve("alice", "custody", 100n);

    await expect(tokens.pull("alice", "custody", 400n)).rejects.toMatchObject({
      code: "InsufficientFunds",
      required: 400n,
      available: 100n,
    });
    expect(tokens.balanceOf("alice")).toBe(1000n);
  });

  it("fails a pull beyond the balance and keeps the allowance", async () => {
    const tokens = new InMemoryTokenLedger("pUSD", "custody");
    tokens.mint("alice", 100n);
    tokens.approve("alice", "custody", 400n);

    await expect(tokens.pull("alice", "custody", 400n)).rejects.toBeInstanceOf(InsufficientFundsError);
    expect(tokens.allowance("alice", "custody")).toBe(400n);
  });

  it("pushes out of custody", async () => {
    const tokens = new InMemoryTokenLedger("pUSD", "custody");
    tokens.mint("custody", 50n);

    await tokens.push("bob", 20n);
    await expect(tokens.push("bob", 31n)).rejects.toBeInstanceOf(InsufficientFundsError);

    expect(tokens.balanceOf("bob")).toBe(20n);
    expect(tokens.balanceOf("custody")).toBe(30n);
  });

  it("rejects non-positive transfers", async () => {
    const tokens = new InMemoryTokenLedger("pUSD", "custody");
    await expect(tokens.push("bob", 0n)).rejects.toBeInstanceOf(RangeError);
  });
});
