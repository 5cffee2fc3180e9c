export interface GatewayErrorShape {
  code: string;
  message: string;
  details?: unknown;
}

export type RespondFn = (ok: boolean, payload?: unknown, error?: GatewayErrorShape) => void;

export interface GatewayRequestContext {
  broadcast: (event: string, data: unknown) => void;
}

export interface GatewayRequestOptions {
  params: unknown;
  respond: RespondFn;
  context: GatewayRequestContext;
}

export type GatewayRequestHandler = (opts: GatewayRequestOptions) => Promise<void> | void;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;
