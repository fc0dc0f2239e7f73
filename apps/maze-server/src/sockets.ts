import type { IncomingMessage, Server } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";

import { ClientMsg, type ServerMsg } from "@shared/core";
import { isMazeError } from "@sim/core";
import { generateBody } from "./app";
import type { Config } from "./config";
import type { MazeHub } from "./hub";
import type { Metrics } from "./metrics";

function send(ws: WebSocket, msg: ServerMsg) {
  if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(msg));
}

function sendError(ws: WebSocket, err: unknown) {
  if (isMazeError(err)) return send(ws, { kind: "ERROR", code: err.code, message: err.message });
  console.error("ws command failed", err);
  send(ws, { kind: "ERROR", code: "Internal", message: String(err) });
}

/**
 * `/ws?maze=<id>` streams one maze's events. Without a known id a fresh maze slot is created.
 * Clients drive the slot with GENERATE and SOLVE; failures come back as ERROR messages.
 */
export function attachSockets(server: Server, hub: MazeHub, metrics: Metrics, config: Config) {
  const wss = new WebSocketServer({ server, path: "/ws" });
  const GenerateBody = generateBody(config);

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    metrics.wsConnections.inc();
    const query = new URLSearchParams(req.url?.split("?")[1] ?? "");
    const requested = query.get("maze");
    const mazeId = requested && hub.has(requested) ? requested : hub.create();
    const owned = mazeId !== requested;

    const unsubscribe = hub.subscribe(mazeId, msg => send(ws, msg));
    send(ws, { kind: "READY", mazeId });

    ws.on("message", (data: RawData) => {
      let parsed: ReturnType<typeof ClientMsg.safeParse>;
      try {
        parsed = ClientMsg.safeParse(JSON.parse(String(data)));
      } catch (err) {
        return send(ws, { kind: "ERROR", code: "BadRequest", message: err instanceof Error ? err.message : String(err) });
      }
      if (!parsed.success) return send(ws, { kind: "ERROR", code: "BadRequest", message: parsed.error.message });

      const msg = parsed.data;
      let run: () => Promise<unknown>;
      if (msg.kind === "GENERATE") {
        const checked = GenerateBody.safeParse(msg);
        if (!checked.success) return send(ws, { kind: "ERROR", code: "BadRequest", message: checked.error.message });
        const params = checked.data;
        run = () => hub.generate(mazeId, params);
      } else {
        const { stepwise } = msg;
        run = () => hub.solve(mazeId, { stepwise });
      }
      try {
        run().catch((err: unknown) => sendError(ws, err));
      } catch (err) {
        sendError(ws, err);
      }
    });

    // protocol violations from the client, e.g. unmasked frames
    ws.on("error", (err: Error) => console.error("ws error", err));

    ws.on("close", () => {
      unsubscribe();
      // slots opened for this socket go with it
      if (owned) hub.delete(mazeId);
    });
  });

  return wss;
}
