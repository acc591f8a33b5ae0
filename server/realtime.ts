import type { Server } from "http";
import { WebSocket, WebSocketServer } from "ws";
import { log, logWarn } from "./lib/log";
import { streamClients } from "./metrics";
import type { SpinCoreService } from "./services/spin-core/service";

export type RealtimeHandle = {
  close: () => Promise<void>;
  clientCount: () => number;
};

const PING_INTERVAL_MS = 30_000;

/** Push every tick snapshot to WebSocket clients connected on `path`. */
export function attachTelemetrySocket(
  httpServer: Server,
  service: SpinCoreService,
  path = "/ws",
): RealtimeHandle {
  const wss = new WebSocketServer({ server: httpServer, path });
  const clients = new Set<WebSocket>();

  const drop = (ws: WebSocket) => {
    if (clients.delete(ws)) streamClients.dec({ transport: "ws" });
  };

  const unsubscribe = service.subscribe((snapshot) => {
    const data = JSON.stringify({ type: "telemetry", snapshot });
    for (const ws of Array.from(clients)) {
      if (ws.readyState !== WebSocket.OPEN) {
        drop(ws);
        continue;
      }
      ws.send(data, (err) => {
        if (err) {
          logWarn(`send failed: ${err.message}`, "ws");
          drop(ws);
        }
      });
    }
  });

  // Keepalive sweep for dead sockets
  const pingInterval = setInterval(() => {
    for (const ws of Array.from(clients)) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      } else {
        drop(ws);
      }
    }
  }, PING_INTERVAL_MS);
  httpServer.on("close", () => clearInterval(pingInterval));

  wss.on("connection", (ws) => {
    clients.add(ws);
    streamClients.inc({ transport: "ws" });
    ws.send(JSON.stringify({ type: "hello", snapshot: service.bus.latest() }));
    ws.on("close", () => drop(ws));
    ws.on("error", (err) => {
      logWarn(`socket error: ${err.message}`, "ws");
      drop(ws);
      ws.terminate();
    });
  });

  log(`telemetry socket listening on ${path}`, "ws");

  return {
    clientCount: () => clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(pingInterval);
        unsubscribe();
        for (const ws of Array.from(clients)) {
          ws.terminate();
          drop(ws);
        }
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
