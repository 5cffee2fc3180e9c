import type { PriceOracle } from "./collaborators.js";
import { PriceUnavailableError, UntrustedOracleError } from "./perp-errors.js";

/**
 * In-process reference price. Only trusted reporters may publish a price or
 * change the reporter set; the first reporter comes from configuration.
 */
export class ManagedPriceOracle implements PriceOracle {
  private price = 0n;
  private updatedAt: string | null = null;
  private readonly reporters = new Set<string>();

  constructor(initialReporter: string) {
    this.reporters.add(initialReporter);
  }

  async currentPrice(): Promise<bigint> {
    return this.price;
  }

  get lastUpdatedAt(): string | null {
    return this.updatedAt;
  }

  isTrusted(reporter: string): boolean {
    return this.reporters.has(reporter);
  }

  listOracles(): string[] {
    return [...this.reporters];
  }

  setPrice(reporter: string, price: bigint): void {
    this.assertTrusted(reporter);
    if (price <= 0n) {
      throw new PriceUnavailableError(price);
    }
    this.price = price;
    this.updatedAt = new Date().toISOString();
  }

  addOracle(by: string, reporter: string): void {
    this.assertTrusted(by);
    this.reporters.add(reporter);
  }

  /** The last trusted reporter cannot be removed. */
  removeOracle(by: string, reporter: string): boolean {
    this.assertTrusted(by);
    if (!this.reporters.has(reporter) || this.reporters.size === 1) {
      return false;
    }
    return this.reporters.delete(reporter);
  }

  private assertTrusted(reporter: string): void {
    if (!this.reporters.has(reporter)) {
      throw new UntrustedOracleError(reporter);
    }
  }
}
