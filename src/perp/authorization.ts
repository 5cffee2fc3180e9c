import type { AuthorizationProvider } from "./collaborators.js";
import { UnauthorizedError } from "./perp-errors.js";

/** Authorizes exactly the principals that were granted. */
export class AllowListAuthorization implements AuthorizationProvider {
  private readonly principals: Set<string>;

  constructor(principals: Iterable<string> = []) {
    this.principals = new Set(principals);
  }

  grant(principal: string): void {
    this.principals.add(principal);
  }

  revoke(principal: string): void {
    this.principals.delete(principal);
  }

  async require(principal: string): Promise<void> {
    if (!this.principals.has(principal)) {
      throw new UnauthorizedError(principal);
    }
  }
}
