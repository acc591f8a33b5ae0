import type { Express } from "express";
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from "prom-client";
import type { TTelemetrySnapshot } from "@shared/spin-core";

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

const coreRpm = new Gauge({
  name: "spin_core_rpm",
  help: "Current core rotational speed",
  registers: [registry],
});

const corePowerGw = new Gauge({
  name: "spin_core_power_gw",
  help: "Current generated power in GW",
  registers: [registry],
});

const coreStressPct = new Gauge({
  name: "spin_core_material_stress_pct",
  help: "Current material stress as a percentage of the rated maximum",
  registers: [registry],
});

const coreCycles = new Gauge({
  name: "spin_core_cycles_total",
  help: "Completed spin cycles since process start",
  registers: [registry],
});

const coreTicksTotal = new Counter({
  name: "spin_core_ticks_total",
  help: "Simulation ticks processed",
  labelNames: ["status"],
  registers: [registry],
});

const commandsTotal = new Counter({
  name: "spin_core_commands_total",
  help: "Commands issued to the simulation, by outcome",
  labelNames: ["command", "status"],
  registers: [registry],
});

export const streamClients = new Gauge({
  name: "spin_core_stream_clients",
  help: "Connected telemetry stream clients",
  labelNames: ["transport"],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "Total HTTP requests processed by Express",
  labelNames: ["method", "route", "status"],
  registers: [registry],
});

const httpRequestDuration = new Histogram({
  name: "http_request_duration_ms",
  help: "HTTP request duration in milliseconds",
  labelNames: ["method", "route", "status"],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [registry],
});

export const metrics = {
  recordSnapshot(snapshot: TTelemetrySnapshot): void {
    coreRpm.set(snapshot.rpm);
    corePowerGw.set(snapshot.power_gw);
    coreStressPct.set(snapshot.material_stress_pct);
    coreCycles.set(snapshot.cycle_count);
    coreTicksTotal.inc({ status: snapshot.status });
  },
  recordCommand(command: string, outcome: string): void {
    commandsTotal.inc({ command, status: outcome });
  },
  observeHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    const cleanRoute = route || "unknown";
    const status = Number.isFinite(statusCode) ? String(statusCode) : "0";
    httpRequestsTotal.inc({ method: method || "GET", route: cleanRoute, status });
    httpRequestDuration.observe({ method: method || "GET", route: cleanRoute, status }, durationMs);
  },
};

export function registerMetricsEndpoint(app: Express): void {
  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", registry.contentType);
    res.send(await registry.metrics());
  });
}
