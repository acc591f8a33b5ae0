import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NetworkCapacity, SpinCoreErrorCode, TelemetrySnapshot } from "@shared/spin-core";
import { createApp } from "../server/app";
import { storageCapacity } from "../server/services/spin-core/energy-model";
import { SpinCoreService } from "../server/services/spin-core/service";

const buildApp = () => {
  const service = new SpinCoreService({ machine: { clock: () => 0 } });
  return { service, app: createApp(service) };
};

describe("spin-core routes", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts a run and rejects a second start with 409", async () => {
    const { app, service } = buildApp();

    const res = await request(app).post("/api/spin-core/start").send({ scenario: "Base Load", duration: 20 });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "started",
      scenario: "Base Load",
      duration_minutes: 20,
      target_rpm: 150_000,
    });
    expect(service.machine.status).toBe("ACCELERATING");

    const again = await request(app).post("/api/spin-core/start").send({ scenario: "Base Load" });
    expect(again.status).toBe(409);
    expect(again.body.error).toBe("AlreadyRunning");
  });

  it("defaults to Peak Demand with its own spin time", async () => {
    const { app } = buildApp();
    const res = await request(app).post("/api/spin-core/start").send({});
    expect(res.status).toBe(200);
    expect(res.body.scenario).toBe("Peak Demand");
    expect(res.body.duration_minutes).toBe(15);
  });

  it("maps unknown scenarios to 404 and bad bodies to 400", async () => {
    const { app } = buildApp();
    const unknown = await request(app).post("/api/spin-core/start").send({ scenario: "Overdrive" });
    expect(unknown.status).toBe(404);
    expect(unknown.body.error).toBe("UnknownScenario");
    expect(SpinCoreErrorCode.safeParse(unknown.body.error).success).toBe(true);

    const badDuration = await request(app).post("/api/spin-core/start").send({ duration: "soon" });
    expect(badDuration.status).toBe(400);
    expect(badDuration.body.message).toMatch(/^duration: /);

    const negative = await request(app).post("/api/spin-core/start").send({ duration: -3 });
    expect(negative.status).toBe(400);
    expect(negative.body.error).toBe("InvalidConfig");
  });

  it("stops, emergency-stops and resets", async () => {
    const { app } = buildApp();

    const idleStop = await request(app).post("/api/spin-core/stop");
    expect(idleStop.status).toBe(409);
    expect(idleStop.body.error).toBe("NotRunning");

    await request(app).post("/api/spin-core/start").send({});
    const stop = await request(app).post("/api/spin-core/stop");
    expect(stop.status).toBe(200);
    expect(stop.body).toEqual({ status: "stopped" });

    const emergency = await request(app).post("/api/spin-core/emergency-stop");
    expect(emergency.status).toBe(200);
    expect(emergency.body).toEqual({ status: "emergency_stopped", stress_spike_pct: 0 });

    const reset = await request(app).post("/api/spin-core/reset");
    expect(reset.status).toBe(200);
    expect(reset.body).toEqual({ status: "idle" });
  });

  it("updates the network config", async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post("/api/spin-core/network-config")
      .send({ conduit_length_m: 1200, num_conduits: 10, active_conduits: 10 });
    expect(res.status).toBe(200);
    expect(res.body.standby_conduits).toBe(0);
    expect(res.body.redundancy_factor).toBe(1);
    expect(res.body.total_capacity_gwh).toBe(10 * storageCapacity(1200, 48, 2.5));
    expect(NetworkCapacity.safeParse(res.body).success).toBe(true);

    const invalid = await request(app)
      .post("/api/spin-core/network-config")
      .send({ conduit_length_m: 100, num_conduits: 5, active_conduits: 10 });
    expect(invalid.status).toBe(400);
    expect(invalid.body.error).toBe("InvalidConfig");

    const status = await request(app).get("/api/spin-core/status");
    expect(status.body.network.num_conduits).toBe(10);
  });

  it("lists scenario energy figures", async () => {
    const { app } = buildApp();
    const res = await request(app).get("/api/spin-core/scenarios");
    expect(res.status).toBe(200);
    expect(Object.keys(res.body)).toEqual(["Peak Demand", "Base Load", "Emergency", "Storage Fill"]);
    expect(res.body["Emergency"].daily_energy_gwh).toBe(200);
    expect(res.body["Emergency"].params).toEqual({ spin_minutes: 60, spins_per_day: 1 });
  });

  it("serves status and fleet projections", async () => {
    const { app } = buildApp();
    const status = await request(app).get("/api/spin-core/status");
    expect(status.status).toBe(200);
    expect(status.body.telemetry.status).toBe("IDLE");
    expect(status.body.telemetry.safety_level).toBe("green");
    expect(TelemetrySnapshot.safeParse(status.body.telemetry).success).toBe(true);

    const fleet = await request(app).get("/api/spin-core/fleet-projection").query({ facilities: 10 });
    expect(fleet.status).toBe(200);
    expect(fleet.body.total_daily_energy_gwh).toBe(2000);
    expect(fleet.body.displacement).toBe("partial");

    const bad = await request(app).get("/api/spin-core/fleet-projection").query({ facilities: 0 });
    expect(bad.status).toBe(400);
  });

  it("answers malformed JSON with 400", async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post("/api/spin-core/start")
      .set("Content-Type", "application/json")
      .send("{not json");
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("malformed JSON body");
  });

  it("exposes health and metrics", async () => {
    const { app } = buildApp();
    const health = await request(app).get("/healthz");
    expect(health.status).toBe(200);
    expect(health.body.ticking).toBe(false);

    await request(app).post("/api/spin-core/start").send({});
    const metricsRes = await request(app).get("/metrics");
    expect(metricsRes.status).toBe(200);
    expect(metricsRes.text).toContain('spin_core_commands_total{command="start",status="ok"}');
  });
});
