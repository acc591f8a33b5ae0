import { createServer, type Server } from "http";
import { createApp } from "./app";
import { readServerEnv } from "./config/env";
import { log, logError } from "./lib/log";
import { attachTelemetrySocket, type RealtimeHandle } from "./realtime";
import { SpinCoreService } from "./services/spin-core/service";

const env = readServerEnv();

const service = new SpinCoreService({
  tickMs: env.tickMs,
  logTicks: env.logTicks,
  machine: {
    accelRate_rpmPerS: env.accelRpmPerS,
    decelRate_rpmPerS: env.decelRpmPerS,
  },
});

const app = createApp(service);
const serverInstance: Server = createServer(app);
let realtime: RealtimeHandle | null = null;
let shuttingDown = false;

if (env.enableWs) {
  realtime = attachTelemetrySocket(serverInstance, service);
}

const requestShutdown = (signal: NodeJS.Signals) => {
  logError(`signal received: ${signal}`, "process");
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  service.shutdown();

  const forceExitTimer = setTimeout(() => {
    logError("forcing exit after graceful shutdown timeout", "process");
    process.exit(1);
  }, 5000);

  const exit = (code: number) => {
    clearTimeout(forceExitTimer);
    process.exit(code);
  };

  const socketHandle = realtime;
  realtime = null;
  const closeSockets = socketHandle ? socketHandle.close() : Promise.resolve();

  void closeSockets
    .catch((err: unknown) => {
      logError("telemetry socket close failed", "ws", err);
    })
    .finally(() => {
      serverInstance.close((err) => {
        if (err) {
          logError("error while closing server", "process", err);
          exit(1);
          return;
        }
        exit(0);
      });
    });
};

process.on("uncaughtException", (err) => {
  logError("uncaughtException", "process", err.stack ?? err);
});
process.on("unhandledRejection", (reason) => {
  logError("unhandledRejection", "process", reason);
});
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.on(sig, () => requestShutdown(sig));
}

service.startScheduler();

serverInstance.listen({ port: env.port, host: env.host }, () => {
  const address = serverInstance.address();
  const addressLabel =
    typeof address === "string"
      ? address
      : address
        ? `${address.address}:${address.port}`
        : `${env.host}:${env.port}`;
  log(`serving on ${addressLabel} (tick=${env.tickMs}ms, ws=${env.enableWs ? "on" : "off"})`);
});
