import type { EventSink } from "./collaborators.js";

export type BroadcastFn = (event: string, data: unknown) => void;

/** Deep copy with every bigint rendered as a decimal string, for JSON transports. */
export function toWire(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toWire);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toWire(v)]));
  }
  return value;
}

/** Publish lifecycle events through a gateway broadcast function. */
export function createBroadcastSink(broadcast: BroadcastFn): EventSink {
  return {
    publish: (topic, payload) => {
      broadcast(topic, toWire(payload));
    },
  };
}
