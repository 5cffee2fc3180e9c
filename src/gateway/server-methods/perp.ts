import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PerpService } from "../../perp/index.js";
import type { PerpErrorCode } from "../../perp/perp-errors.js";
import type { GatewayRequestHandlers, RespondFn } from "./types.js";
import { isPerpError } from "../../perp/perp-errors.js";
import { toWire } from "../../perp/perp-events.js";
import { ManagedPriceOracle } from "../../perp/price-oracle.js";

const Amount = Type.String({ pattern: "^-?[0-9]+$", description: "Integer amount as a decimal string" });
const Principal = Type.String({ minLength: 1 });
const Side = Type.Union([Type.Literal("long"), Type.Literal("short")]);

const OpenParams = Type.Object({ trader: Principal, value: Amount, side: Side });
const TraderParams = Type.Object({ trader: Principal });
const LiquidateParams = Type.Object({ liquidator: Principal, target: Principal });
const HistoryParams = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500 })),
});
const FeeParams = Type.Object({ value: Amount, side: Side });
const SetPriceParams = Type.Object({ reporter: Principal, price: Amount });

const ERROR_CODES: Record<PerpErrorCode, string> = {
  ZeroValue: "ZERO_VALUE",
  PositionNotOpen: "POSITION_NOT_OPEN",
  AboveMargin: "ABOVE_MARGIN",
  PositionOpen: "POSITION_OPEN",
  PriceUnavailable: "PRICE_UNAVAILABLE",
  Unauthorized: "UNAUTHORIZED",
  InsufficientFunds: "INSUFFICIENT_FUNDS",
  UntrustedOracle: "UNTRUSTED_ORACLE",
};

function readParams<T extends TSchema>(
  schema: T,
  params: unknown,
  respond: RespondFn,
): Static<T> | null {
  const value = params ?? {};
  if (Value.Check(schema, value)) {
    return value;
  }
  const issues = [...Value.Errors(schema, value)].map((e) => `${e.path || "/"} ${e.message}`);
  respond(false, undefined, {
    code: "INVALID_PARAMS",
    message: `Invalid params: ${issues.join("; ")}`,
    details: issues,
  });
  return null;
}

function respondError(respond: RespondFn, err: unknown): void {
  if (isPerpError(err)) {
    respond(false, undefined, { code: ERROR_CODES[err.code], message: err.message });
    return;
  }
  respond(false, undefined, {
    code: "INTERNAL_ERROR",
    message: err instanceof Error ? err.message : String(err),
  });
}

export function createPerpHandlers(getService: () => Promise<PerpService>): GatewayRequestHandlers {
  return {
    "perp.open": async ({ params, respond, context }) => {
      const input = readParams(OpenParams, params, respond);
      if (!input) {
        return;
      }
      try {
        const { lifecycle } = await getService();
        const position = await lifecycle.open(input.trader, BigInt(input.value), input.side === "long");
        context.broadcast("perp.updated", {
          action: `open_${input.side}`,
          trader: input.trader,
          value: input.value,
        });
        respond(true, toWire({ trader: input.trader, position }));
      } catch (err) {
        respondError(respond, err);
      }
    },

    "perp.close": async ({ params, respond, context }) => {
      const input = readParams(TraderParams, params, respond);
      if (!input) {
        return;
      }
      try {
        const { lifecycle } = await getService();
        const result = await lifecycle.close(input.trader);
        context.broadcast("perp.updated", {
          action: "close",
          trader: input.trader,
          settlement: result.settlement.toString(),
        });
        respond(true, toWire(result));
      } catch (err) {
        respondError(respond, err);
      }
    },

    "perp.liquidate": async ({ params, respond, context }) => {
      const input = readParams(LiquidateParams, params, respond);
      if (!input) {
        return;
      }
      try {
        const { lifecycle } = await getService();
        const result = await lifecycle.liquidate(input.liquidator, input.target);
        context.broadcast("perp.updated", {
          action: "liquidation",
          trader: input.target,
          liquidator: input.liquidator,
          settlement: result.settlement.toString(),
        });
        respond(true, toWire(result));
      } catch (err) {
        respondError(respond, err);
      }
    },

    "perp.position": async ({ params, respond }) => {
      const input = readParams(TraderParams, params, respond);
      if (!input) {
        return;
      }
      try {
        const { lifecycle } = await getService();
        const position = lifecycle.getPosition(input.trader) ?? null;
        const settlementValue = await lifecycle.positionValue(input.trader);
        const marginRatio = await lifecycle.marginRatio(input.trader);
        respond(true, toWire({ trader: input.trader, position, settlementValue, marginRatio }));
      } catch (err) {
        respondError(respond, err);
      }
    },

    "perp.account": async ({ respond }) => {
      try {
        const { lifecycle } = await getService();
        respond(true, toWire(lifecycle.getAccount()));
      } catch (err) {
        respondError(respond, err);
      }
    },

    "perp.history": async ({ params, respond }) => {
      const input = readParams(HistoryParams, params, respond);
      if (!input) {
        return;
      }
      try {
        const { lifecycle } = await getService();
        respond(true, toWire({ history: lifecycle.getHistory(input.limit) }));
      } catch (err) {
        respondError(respond, err);
      }
    },

    "perp.fee": async ({ params, respond }) => {
      const input = readParams(FeeParams, params, respond);
      if (!input) {
        return;
      }
      try {
        const { lifecycle } = await getService();
        const fee = lifecycle.quoteFee(BigInt(input.value), input.side === "long");
        respond(true, toWire({ fee }));
      } catch (err) {
        respondError(respond, err);
      }
    },

    "perp.price.set": async ({ params, respond, context }) => {
      const input = readParams(SetPriceParams, params, respond);
      if (!input) {
        return;
      }
      try {
        const { oracle } = await getService();
        if (!(oracle instanceof ManagedPriceOracle)) {
          respond(false, undefined, {
            code: "UNSUPPORTED",
            message: "The configured price oracle does not accept reports",
          });
          return;
        }
        oracle.setPrice(input.reporter, BigInt(input.price));
        context.broadcast("perp.price", { price: input.price });
        respond(true, { price: input.price });
      } catch (err) {
        respondError(respond, err);
      }
    },
  };
}
