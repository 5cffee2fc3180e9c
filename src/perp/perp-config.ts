import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_MARGIN_REQUIREMENT } from "./margin-engine.js";
import { PerpConfigError } from "./perp-errors.js";

export const DEFAULT_CUSTODY_ACCOUNT = "perp-custody";

/** What an open does when the trader already holds a position. */
export type DuplicateOpenPolicy = "reject" | "overwrite";

export const PerpConfigSchema = Type.Object({
  asset: Type.String({ minLength: 1, description: "Asset identifier, e.g. BTC" }),
  leverage: Type.Integer({ minimum: 1, description: "Leverage multiplier applied to every position" }),
  settlementToken: Type.String({ minLength: 1, description: "Settlement-currency ledger reference" }),
  oracle: Type.String({ minLength: 1, description: "Initial trusted price reporter" }),
  marginRequirement: Type.Optional(
    Type.Integer({
      minimum: 0,
      maximum: 10_000,
      default: Number(DEFAULT_MARGIN_REQUIREMENT),
      description: "Liquidation threshold in basis points",
    }),
  ),
  custodyAccount: Type.Optional(Type.String({ minLength: 1, default: DEFAULT_CUSTODY_ACCOUNT })),
  duplicateOpen: Type.Optional(
    Type.Union([Type.Literal("reject"), Type.Literal("overwrite")], { default: "reject" }),
  ),
  storageDir: Type.Optional(Type.String({ minLength: 1 })),
});

export type PerpConfigInput = Static<typeof PerpConfigSchema>;

export interface PerpConfig {
  asset: string;
  leverage: bigint;
  settlementToken: string;
  oracle: string;
  marginRequirement: bigint;
  custodyAccount: string;
  duplicateOpen: DuplicateOpenPolicy;
  storageDir?: string;
}

function collectIssues(value: unknown): string[] {
  return [...Value.Errors(PerpConfigSchema, value)].map(
    (e) => `${e.path || "/"} ${e.message}`,
  );
}

export function parsePerpConfig(input: unknown): PerpConfig {
  const withDefaults = Value.Default(PerpConfigSchema, Value.Clone(input));
  if (!Value.Check(PerpConfigSchema, withDefaults)) {
    throw new PerpConfigError("Invalid perp configuration", collectIssues(withDefaults));
  }

  return {
    asset: withDefaults.asset,
    leverage: BigInt(withDefaults.leverage),
    settlementToken: withDefaults.settlementToken,
    oracle: withDefaults.oracle,
    marginRequirement: BigInt(withDefaults.marginRequirement ?? Number(DEFAULT_MARGIN_REQUIREMENT)),
    custodyAccount: withDefaults.custodyAccount ?? DEFAULT_CUSTODY_ACCOUNT,
    duplicateOpen: withDefaults.duplicateOpen ?? "reject",
    ...(withDefaults.storageDir ? { storageDir: withDefaults.storageDir } : {}),
  };
}

const ENV_KEYS: Record<keyof PerpConfigInput, string> = {
  asset: "PERP_ASSET",
  leverage: "PERP_LEVERAGE",
  settlementToken: "PERP_SETTLEMENT_TOKEN",
  oracle: "PERP_ORACLE",
  marginRequirement: "PERP_MARGIN_REQUIREMENT",
  custodyAccount: "PERP_CUSTODY_ACCOUNT",
  duplicateOpen: "PERP_DUPLICATE_OPEN",
  storageDir: "PERP_STORAGE_DIR",
};

/** Build the configuration from PERP_* environment variables. Blank values count as unset. */
export function loadPerpConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PerpConfig {
  const raw: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) {
      raw[key] = value;
    }
  }
  return parsePerpConfig(Value.Convert(PerpConfigSchema, raw));
}
