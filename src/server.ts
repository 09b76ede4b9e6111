import { createServer } from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { WebSocketServer } from "ws";
import type { AppConfig } from "./types.js";
import { RelayHub } from "./services/relay-hub.js";

const BANNER = "Push-to-talk relay server";

export interface RelayServer {
  readonly port: number;
  readonly hub: RelayHub;
  close(): Promise<void>;
}

function handleHttp(
  config: AppConfig,
  hub: RelayHub,
  req: IncomingMessage,
  res: ServerResponse,
): void {
  const { pathname } = new URL(req.url ?? "/", "http://localhost");

  // Liveness probe
  if (pathname === config.healthPath) {
    res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
    res.end("OK");
    return;
  }

  if (pathname === "/status") {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify(hub.getStatus()));
    return;
  }

  res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(BANNER);
}

export async function startRelayServer(
  config: AppConfig,
  hub: RelayHub = new RelayHub(config),
): Promise<RelayServer> {
  const server = createServer((req, res) => handleHttp(config, hub, req, res));
  const wss = new WebSocketServer({ server, path: config.wsPath });

  wss.on("connection", (ws, req) => {
    const session = hub.handleOpen(ws, req.socket.remoteAddress);

    ws.on("message", (data, isBinary) => {
      hub.handleMessage(session, data, isBinary);
    });

    ws.on("close", () => {
      hub.handleClose(session);
    });

    ws.on("error", (err) => {
      console.error(`[web] WebSocket error from ${session.label()}: ${err.message}`);
      hub.handleClose(session);
    });
  });

  wss.on("error", (err) =>
    console.error("[web] WebSocket server error:", err.message),
  );
  server.on("error", (err) =>
    console.error("[web] HTTP server error:", err.message),
  );

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port =
    address !== null && typeof address === "object" ? address.port : config.port;

  console.log(`[web] Relay listening on ${config.host}:${port}`);
  console.log(`[web] WebSocket: ws://${config.host}:${port}${config.wsPath}`);
  console.log(`[web] Health: http://${config.host}:${port}${config.healthPath}`);

  return {
    port,
    hub,
    async close() {
      await hub.shutdown();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
      console.log("[web] Relay closed");
    },
  };
}
