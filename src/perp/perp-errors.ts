export type PerpErrorCode =
  | "ZeroValue"
  | "PositionNotOpen"
  | "AboveMargin"
  | "PositionOpen"
  | "PriceUnavailable"
  | "Unauthorized"
  | "InsufficientFunds"
  | "UntrustedOracle";

export class PerpError extends Error {
  constructor(
    public readonly code: PerpErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "PerpError";
  }
}

export class ZeroValueError extends PerpError {
  constructor(public readonly requestedValue: bigint) {
    super("ZeroValue", `Trade size must be positive, got ${requestedValue}`);
    this.name = "ZeroValueError";
  }
}

export class PositionNotOpenError extends PerpError {
  constructor(public readonly trader: string) {
    super("PositionNotOpen", `No open position for ${trader}`);
    this.name = "PositionNotOpenError";
  }
}

export class AboveMarginError extends PerpError {
  constructor(
    public readonly trader: string,
    public readonly marginRatio: bigint,
    public readonly marginRequirement: bigint,
  ) {
    super(
      "AboveMargin",
      `Position of ${trader} is at ${marginRatio} bps, not below the ${marginRequirement} bps requirement`,
    );
    this.name = "AboveMarginError";
  }
}

export class PositionOpenError extends PerpError {
  constructor(public readonly trader: string) {
    super("PositionOpen", `${trader} already has an open position`);
    this.name = "PositionOpenError";
  }
}

export class PriceUnavailableError extends PerpError {
  constructor(
    public readonly price: bigint,
    message = `Reference price must be positive, got ${price}`,
  ) {
    super("PriceUnavailable", message);
    this.name = "PriceUnavailableError";
  }
}

export class UnauthorizedError extends PerpError {
  constructor(public readonly principal: string) {
    super("Unauthorized", `${principal} is not authorized`);
    this.name = "UnauthorizedError";
  }
}

export class InsufficientFundsError extends PerpError {
  constructor(
    public readonly account: string,
    public readonly required: bigint,
    public readonly available: bigint,
    kind: "balance" | "allowance" = "balance",
  ) {
    super(
      "InsufficientFunds",
      `Insufficient ${kind} for ${account}: need ${required}, have ${available}`,
    );
    this.name = "InsufficientFundsError";
  }
}

export class UntrustedOracleError extends PerpError {
  constructor(public readonly reporter: string) {
    super("UntrustedOracle", `${reporter} is not a trusted price reporter`);
    this.name = "UntrustedOracleError";
  }
}

export class PerpConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "PerpConfigError";
  }
}

export function isPerpError(error: unknown, code?: PerpErrorCode): error is PerpError {
  return error instanceof PerpError && (code === undefined || error.code === code);
}
