import type { TokenLedger } from "./collaborators.js";
import { InsufficientFundsError } from "./perp-errors.js";

/**
 * Balances and spending allowances for one settlement token, held in memory.
 * `push` pays out of the custody account given at construction.
 */
export class InMemoryTokenLedger implements TokenLedger {
  private readonly balances = new Map<string, bigint>();
  // owner -> spender -> remaining allowance
  private readonly allowances = new Map<string, Map<string, bigint>>();

  constructor(
    readonly token: string,
    readonly custodyAccount: string,
  ) {}

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  mint(to: string, amount: bigint): void {
    this.assertPositive(amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  approve(owner: string, spender: string, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Allowance must not be negative, got ${amount}`);
    }
    const byOwner = this.allowances.get(owner) ?? new Map<string, bigint>();
    byOwner.set(spender, amount);
    this.allowances.set(owner, byOwner);
  }

  async pull(from: string, to: string, amount: bigint): Promise<void> {
    this.assertPositive(amount);
    const allowed = this.allowance(from, to);
    if (allowed < amount) {
      throw new InsufficientFundsError(from, amount, allowed, "allowance");
    }
    this.move(from, to, amount);
    this.approve(from, to, allowed - amount);
  }

  async push(to: string, amount: bigint): Promise<void> {
    this.assertPositive(amount);
    this.move(this.custodyAccount, to, amount);
  }

  private move(from: string, to: string, amount: bigint): void {
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new InsufficientFundsError(from, amount, available);
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  private assertPositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new RangeError(`Transfer amount must be positive, got ${amount}`);
    }
  }
}
