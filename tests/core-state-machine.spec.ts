import { describe, expect, it } from "vitest";
import { SimulationState, TelemetrySnapshot } from "@shared/spin-core";
import { CoreStateMachine } from "../server/services/spin-core/core-state-machine";

const FIXED_CLOCK = () => Date.UTC(2026, 0, 1);

const makeMachine = () => new CoreStateMachine({ clock: FIXED_CLOCK });

describe("CoreStateMachine commands", () => {
  it("starts from IDLE with the scenario target and startup debit", () => {
    const machine = makeMachine();
    const result = machine.start("Base Load", 30);
    expect(result).toEqual({
      ok: true,
      status: "started",
      scenario: "Base Load",
      duration_minutes: 30,
      target_rpm: 150_000,
    });
    const state = machine.getState();
    expect(SimulationState.safeParse(state).success).toBe(true);
    expect(state.status).toBe("ACCELERATING");
    expect(state.cumulative_energy_gj).toBe(-2217.3);
    expect(state.elapsed_seconds).toBe(0);
  });

  it("uses the scenario spin time when no duration is given", () => {
    const machine = makeMachine();
    const result = machine.start("Emergency");
    expect(result.ok && result.duration_minutes).toBe(60);
  });

  it("rejects unknown scenarios and bad durations without leaving IDLE", () => {
    const machine = makeMachine();
    const unknown = machine.start("Overdrive", 10);
    expect(unknown.ok).toBe(false);
    expect(!unknown.ok && unknown.error).toBe("UnknownScenario");

    const zero = machine.start("Peak Demand", 0);
    expect(!zero.ok && zero.error).toBe("InvalidConfig");
    expect(machine.status).toBe("IDLE");
  });

  it("reports AlreadyRunning on repeated starts and keeps the cycle count", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);
    for (let i = 0; i < 4; i += 1) machine.tick(60);
    expect(machine.status).toBe("RUNNING");

    const first = machine.start("Peak Demand", 15);
    const second = machine.start("Base Load", 30);
    expect(!first.ok && first.error).toBe("AlreadyRunning");
    expect(!second.ok && second.error).toBe("AlreadyRunning");
    expect(machine.getState().cycle_count).toBe(0);
    expect(machine.getState().target_rpm).toBe(200_000);
  });

  it("reports NotRunning when stopping at rest", () => {
    const machine = makeMachine();
    const idle = machine.stop();
    expect(!idle.ok && idle.error).toBe("NotRunning");

    machine.emergencyStop();
    const stopped = machine.stop();
    expect(!stopped.ok && stopped.error).toBe("NotRunning");
  });

  it("decelerates instead of idling when stopped before reaching target", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);
    machine.tick(10);
    expect(machine.getState().rpm).toBe(10_000);

    expect(machine.stop()).toEqual({ ok: true, status: "stopped" });
    expect(machine.status).toBe("DECELERATING");
    expect(machine.getState().rpm).toBe(10_000);

    // stopping again while decelerating is accepted
    expect(machine.stop().ok).toBe(true);
    expect(machine.status).toBe("DECELERATING");
  });

  it("allows reset only from IDLE or after an emergency stop", () => {
    const machine = makeMachine();
    expect(machine.reset()).toEqual({ ok: true, status: "idle" });

    machine.start("Peak Demand", 15);
    const running = machine.reset();
    expect(!running.ok && running.error).toBe("AlreadyRunning");

    machine.emergencyStop();
    expect(machine.reset()).toEqual({ ok: true, status: "idle" });
    expect(machine.status).toBe("IDLE");
    expect(machine.getState().rpm).toBe(0);
  });
});

describe("CoreStateMachine emergency stop", () => {
  it("halts instantly and reports the stress spike exactly once", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);
    machine.tick(60);
    expect(machine.getState().rpm).toBe(60_000);

    const result = machine.emergencyStop();
    expect(result.status).toBe("emergency_stopped");
    expect(result.stress_spike_pct).toBeCloseTo(9, 10);
    expect(machine.status).toBe("EMERGENCY_STOPPED");
    expect(machine.getState().rpm).toBe(0);

    const first = machine.tick(1);
    expect(first.rpm).toBe(0);
    expect(first.stress_spike_pct).toBeCloseTo(9, 10);
    expect(first.material_stress_pct).toBe(0);

    const second = machine.tick(1);
    expect(second.stress_spike_pct).toBeUndefined();
    expect(second.status).toBe("EMERGENCY_STOPPED");
  });

  it("does not record a new spike when already stopped", () => {
    const machine = makeMachine();
    machine.emergencyStop();
    machine.tick(1);
    expect(machine.emergencyStop().stress_spike_pct).toBeNull();
  });

  it("stays stopped until reset", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);
    machine.emergencyStop();
    const restart = machine.start("Peak Demand", 15);
    expect(!restart.ok && restart.error).toBe("AlreadyRunning");
    machine.tick(120);
    expect(machine.status).toBe("EMERGENCY_STOPPED");
  });
});

describe("CoreStateMachine ticks", () => {
  it("runs a full Peak Demand cycle", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);

    const accel = [machine.tick(60), machine.tick(60), machine.tick(60)];
    expect(accel.map((snap) => snap.rpm)).toEqual([60_000, 120_000, 180_000]);
    expect(accel.every((snap) => snap.status === "ACCELERATING")).toBe(true);

    const reached = machine.tick(60);
    expect(reached.status).toBe("RUNNING");
    expect(Math.abs(reached.rpm - reached.target_rpm)).toBeLessThanOrEqual(1);

    let snap = reached;
    for (let i = 0; i < 14; i += 1) {
      snap = machine.tick(60);
      expect(snap.status).toBe("RUNNING");
    }
    snap = machine.tick(60);
    expect(snap.status).toBe("DECELERATING");
    expect(snap.rpm).toBe(200_000);

    const decel = [machine.tick(60), machine.tick(60), machine.tick(60)];
    expect(decel.map((s) => s.rpm)).toEqual([140_000, 80_000, 20_000]);

    const done = machine.tick(60);
    expect(done.status).toBe("IDLE");
    expect(done.rpm).toBe(0);
    expect(done.cycle_count).toBe(1);
    expect(done.scenario_id).toBeNull();
    expect(done.target_rpm).toBe(0);
  });

  it("derives power, kinetic energy and safety from rpm", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);
    const snap = machine.tick(60);

    expect(snap.power_gw).toBeCloseTo(60, 10);
    const inertia = 0.5 * 199 * 1.5 ** 2;
    const omega = (60_000 * 2 * Math.PI) / 60;
    expect(snap.kinetic_energy_gj).toBeCloseTo((0.5 * inertia * omega * omega) / 1e9, 9);
    expect(snap.material_stress_pct).toBeCloseTo(9, 10);
    expect(snap.safety_level).toBe("green");
    expect(snap.safety_status).toBe("NOMINAL");
    expect(snap.timestamp).toBe("2026-01-01T00:00:00.000Z");
  });

  it("accumulates generated energy on top of the startup debit", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);
    const snap = machine.tick(60);
    // 60 GW for 60 s = 3600 GJ
    expect(snap.cumulative_energy_gj).toBeCloseTo(-2217.3 + 3600, 9);
  });

  it("reaches CRITICAL at full speed", () => {
    const machine = makeMachine();
    machine.start("Emergency", 60);
    let snap = machine.tick(60);
    while (snap.status === "ACCELERATING") snap = machine.tick(60);
    expect(snap.material_stress_pct).toBe(100);
    expect(snap.safety_status).toBe("CRITICAL");
  });

  it("ignores non-positive dt", () => {
    const machine = makeMachine();
    machine.start("Peak Demand", 15);
    expect(machine.tick(-5).rpm).toBe(0);
    expect(machine.tick(Number.NaN).rpm).toBe(0);
    expect(machine.status).toBe("ACCELERATING");
  });

  it("keeps rpm and stress bounded with strictly increasing sequence numbers", () => {
    const machine = new CoreStateMachine({ clock: FIXED_CLOCK, accelRate_rpmPerS: 7_919, decelRate_rpmPerS: 3_301 });
    const dts = [0.5, 13, 2.7, 31, 0.1, 45, 9, 120];
    machine.start("Storage Fill", 1);
    let lastSeq = 0;
    for (let i = 0; i < 200; i += 1) {
      const snap = machine.tick(dts[i % dts.length] ?? 1);
      expect(snap.rpm).toBeGreaterThanOrEqual(0);
      expect(snap.rpm).toBeLessThanOrEqual(200_000);
      expect(snap.material_stress_pct).toBeGreaterThanOrEqual(0);
      expect(snap.material_stress_pct).toBeLessThanOrEqual(100);
      expect(snap.seq).toBeGreaterThan(lastSeq);
      expect(TelemetrySnapshot.safeParse(snap).success).toBe(true);
      lastSeq = snap.seq;
      if (snap.status === "IDLE") {
        expect(snap.rpm).toBe(0);
        machine.start("Storage Fill", 1);
      }
    }
    expect(machine.getState().cycle_count).toBeGreaterThan(0);
  });
});
