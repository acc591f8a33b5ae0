import express, { type NextFunction, type Request, type Response } from "express";
import { logError } from "./lib/log";
import { metrics, registerMetricsEndpoint } from "./metrics";
import { createSpinCoreRouter } from "./routes/spin-core";
import type { SpinCoreService } from "./services/spin-core/service";

export function createApp(service: SpinCoreService) {
  const app = express();
  app.use(express.json());

  app.use((req, res, next) => {
    const startedAt = process.hrtime.bigint();
    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      metrics.observeHttpRequest(req.method, req.baseUrl + (req.route?.path ?? req.path), res.statusCode, durationMs);
    });
    next();
  });

  app.get("/healthz", (_req, res) => {
    res.json({
      status: "ok",
      ticking: service.scheduler.isTicking(),
      timestamp: new Date().toISOString(),
    });
  });

  registerMetricsEndpoint(app);
  app.use("/api/spin-core", createSpinCoreRouter(service));

  // Malformed JSON bodies and anything the routes did not handle
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ message: "malformed JSON body" });
      return;
    }
    logError("unhandled route error", "express", err);
    res.status(500).json({ message: err instanceof Error ? err.message : "internal_error" });
  });

  return app;
}
