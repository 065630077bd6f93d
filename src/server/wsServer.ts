import { WebSocketServer, type WebSocket } from "ws";
import type { ClientMessage, ErrorCode, ServerMessage } from "./protocol";
import { handleClientMessage, SERVER_VERSION, type AdvisorContext } from "./handleMessage";
import type { AdvisorConfig } from "./config";
import { createRng, mathRandomRng } from "../engine";

export type MessageHandler = (ctx: AdvisorContext, msg: ClientMessage) => ServerMessage;

export type WsServerOptions = {
  port: number;
  config: Pick<AdvisorConfig, "trials" | "compareLegs" | "maxTrials" | "seed">;

  /** Defaults to handleClientMessage. */
  handler?: MessageHandler;
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x["reqId"];
  return typeof v === "string" ? v : undefined;
}

function optional(x: Record<string, unknown>, key: string, type: "string" | "number"): boolean {
  return !(key in x) || typeof x[key] === type;
}

function optionalSeed(x: Record<string, unknown>): boolean {
  return !("seed" in x) || typeof x["seed"] === "number" || typeof x["seed"] === "string";
}

function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if (!optional(x, "reqId", "string")) return false;

  switch (x["type"]) {
    case "hello":
      return optional(x, "clientId", "string");

    case "evaluate":
      // snapshot contents are checked by parseSnapshot in the handler
      return "snapshot" in x && optional(x, "trials", "number") && optionalSeed(x);

    case "claimTicket":
      return "snapshot" in x && typeof x["camel"] === "string";

    case "compare":
      return optional(x, "legs", "number") && optional(x, "evTrials", "number") && optionalSeed(x);

    default:
      return false;
  }
}

function makeError(code: ErrorCode, message: string, reqId?: string): ServerMessage {
  return reqId ? { type: "error", code, message, reqId } : { type: "error", code, message };
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

export function startWsServer(opts: WsServerOptions): WsServerHandle {
  const wss = new WebSocketServer({ port: opts.port });
  const sockets = new Set<WebSocket>();
  const handle = opts.handler ?? handleClientMessage;

  const ctx: AdvisorContext = {
    rng: opts.config.seed === undefined ? mathRandomRng : createRng(opts.config.seed),
    defaultTrials: opts.config.trials,
    defaultCompareLegs: opts.config.compareLegs,
    maxTrials: opts.config.maxTrials,
  };

  wss.on("connection", (ws) => {
    sockets.add(ws);

    // welcome-on-connect
    send(ws, { type: "welcome", serverVersion: SERVER_VERSION, clientId: "anon" });

    ws.on("message", (data) => {
      const raw = Buffer.isBuffer(data)
        ? data.toString("utf8")
        : Array.isArray(data)
          ? Buffer.concat(data).toString("utf8")
          : Buffer.from(data).toString("utf8");
      const parsed = safeParseJson(raw);

      if (parsed === undefined) {
        send(ws, makeError("BAD_MESSAGE", "Invalid JSON."));
        return;
      }

      const reqId = getReqId(parsed);

      if (!isClientMessage(parsed)) {
        const t = isPlainObject(parsed) ? parsed["type"] : undefined;
        send(ws, makeError("BAD_MESSAGE", `Invalid client message shape. type=${String(t)}`, reqId));
        return;
      }

      try {
        send(ws, handle(ctx, parsed));
      } catch (err) {
        console.error("[advisor] unexpected failure handling", parsed.type, err);
        send(ws, makeError("INTERNAL_ERROR", "Internal server error.", reqId));
      }
    });

    ws.on("close", () => {
      sockets.delete(ws);
    });

    ws.on("error", (err) => {
      console.error("[advisor] socket error", err);
    });
  });

  const address = wss.address();
  const port = typeof address === "string" ? opts.port : address.port;

  return {
    port,
    close: async () => {
      for (const ws of sockets) ws.terminate();
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
