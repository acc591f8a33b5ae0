import express, { type Response } from "express";
import { ZodError } from "zod";
import {
  FleetProjectionQuery,
  NetworkConfigInput,
  StartCommandInput,
  type SpinCoreFailure,
  type TSpinCoreErrorCode,
} from "@shared/spin-core";
import { logError } from "../lib/log";
import { streamClients } from "../metrics";
import type { SpinCoreService } from "../services/spin-core/service";

const STATUS_BY_ERROR: Record<TSpinCoreErrorCode, number> = {
  UnknownScenario: 404,
  AlreadyRunning: 409,
  NotRunning: 409,
  InvalidConfig: 400,
};

const sendFailure = (res: Response, failure: SpinCoreFailure) => {
  res.status(STATUS_BY_ERROR[failure.error]).json({ error: failure.error, message: failure.message });
};

const sendUnexpected = (res: Response, err: unknown, fallback: string) => {
  if (err instanceof ZodError) {
    res.status(400).json({ message: err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ") });
    return;
  }
  logError(fallback, "spin-core", err);
  res.status(500).json({ message: err instanceof Error ? err.message : fallback });
};

export function createSpinCoreRouter(service: SpinCoreService) {
  const router = express.Router();

  router.post("/start", (req, res) => {
    try {
      const command = StartCommandInput.parse(req.body ?? {});
      const result = service.start(command.scenario, command.duration);
      if (!result.ok) return sendFailure(res, result);
      res.json({
        status: result.status,
        scenario: result.scenario,
        duration_minutes: result.duration_minutes,
        target_rpm: result.target_rpm,
      });
    } catch (err) {
      sendUnexpected(res, err, "start_failed");
    }
  });

  router.post("/stop", (_req, res) => {
    const result = service.stop();
    if (!result.ok) return sendFailure(res, result);
    res.json({ status: result.status });
  });

  router.post("/emergency-stop", (_req, res) => {
    const result = service.emergencyStop();
    res.json({ status: result.status, stress_spike_pct: result.stress_spike_pct });
  });

  router.post("/reset", (_req, res) => {
    const result = service.reset();
    if (!result.ok) return sendFailure(res, result);
    res.json({ status: result.status });
  });

  router.post("/network-config", (req, res) => {
    try {
      const input = NetworkConfigInput.parse(req.body ?? {});
      const result = service.updateNetworkConfig(input.conduit_length_m, input.num_conduits, input.active_conduits);
      if (!result.ok) return sendFailure(res, result);
      res.json(result.capacity);
    } catch (err) {
      sendUnexpected(res, err, "network_config_failed");
    }
  });

  router.get("/scenarios", (_req, res) => {
    res.json(service.getScenarios());
  });

  router.get("/status", (_req, res) => {
    res.json(service.getSystemStatus());
  });

  router.get("/fleet-projection", (req, res) => {
    try {
      const query = FleetProjectionQuery.parse(req.query);
      const result = service.getFleetProjection(query.facilities);
      if (!result.ok) return sendFailure(res, result);
      res.json(result.projection);
    } catch (err) {
      sendUnexpected(res, err, "fleet_projection_failed");
    }
  });

  // --- SSE telemetry ---------------------------------------------------------
  router.get("/stream", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders?.();

    res.write(`data: ${JSON.stringify({ type: "hello", snapshot: service.bus.latest() })}\n\n`);
    streamClients.inc({ transport: "sse" });

    const unsubscribe = service.subscribe((snapshot) => {
      res.write(`data: ${JSON.stringify({ type: "telemetry", snapshot })}\n\n`);
    });

    req.on("close", () => {
      unsubscribe();
      streamClients.dec({ transport: "sse" });
    });
  });

  return router;
}
