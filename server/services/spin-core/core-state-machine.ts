/**
 * Core spin state machine.
 *
 * Owns the single SimulationState of the process and advances it on each
 * tick.  Commands and ticks are synchronous, so on the Node event loop no
 * caller ever observes a half-applied tick.
 *
 *   IDLE → ACCELERATING → RUNNING → DECELERATING → IDLE
 *   any  → EMERGENCY_STOPPED → (reset) → IDLE
 */

import {
  fail,
  type SpinCoreResult,
  type TSimulationState,
  type TSpinCoreStatus,
  type TTelemetrySnapshot,
} from "@shared/spin-core";
import {
  ACCEL_RATE_RPM_PER_S,
  CORE_MASS_KG,
  CORE_RADIUS_M,
  DECEL_RATE_RPM_PER_S,
  PEAK_POWER_GW,
  POWER_EXPONENT,
  RPM_MAX,
  RPM_TOLERANCE,
  STARTUP_ENERGY_GJ,
  STRESS_EXPONENT,
} from "@shared/spin-core-constants";
import { getScenario } from "./scenario-catalog";
import { classify, materialStressPct } from "./safety-classifier";

// ─── Options ────────────────────────────────────────────────────────────────

export type CoreStateMachineOptions = {
  rpmMax?: number;
  peakPower_gw?: number;
  coreMass_kg?: number;
  coreRadius_m?: number;
  startupEnergy_gj?: number;
  accelRate_rpmPerS?: number;
  decelRate_rpmPerS?: number;
  rpmTolerance?: number;
  powerExponent?: number;
  stressExponent?: number;
  /** Wall clock for snapshot timestamps [ms since epoch] */
  clock?: () => number;
};

type ResolvedOptions = Required<CoreStateMachineOptions>;

const positiveOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;

const resolveOptions = (options: CoreStateMachineOptions): ResolvedOptions => ({
  rpmMax: positiveOr(options.rpmMax, RPM_MAX),
  peakPower_gw: positiveOr(options.peakPower_gw, PEAK_POWER_GW),
  coreMass_kg: positiveOr(options.coreMass_kg, CORE_MASS_KG),
  coreRadius_m: positiveOr(options.coreRadius_m, CORE_RADIUS_M),
  startupEnergy_gj: positiveOr(options.startupEnergy_gj, STARTUP_ENERGY_GJ),
  accelRate_rpmPerS: positiveOr(options.accelRate_rpmPerS, ACCEL_RATE_RPM_PER_S),
  decelRate_rpmPerS: positiveOr(options.decelRate_rpmPerS, DECEL_RATE_RPM_PER_S),
  rpmTolerance: positiveOr(options.rpmTolerance, RPM_TOLERANCE),
  powerExponent: Math.max(1, positiveOr(options.powerExponent, POWER_EXPONENT)),
  stressExponent: positiveOr(options.stressExponent, STRESS_EXPONENT),
  clock: options.clock ?? Date.now,
});

// ─── Results ────────────────────────────────────────────────────────────────

export type StartResult = SpinCoreResult<{
  status: "started";
  scenario: string;
  duration_minutes: number;
  target_rpm: number;
}>;
export type StopResult = SpinCoreResult<{ status: "stopped" }>;
export type EmergencyStopResult = { ok: true; status: "emergency_stopped"; stress_spike_pct: number | null };
export type ResetResult = SpinCoreResult<{ status: "idle" }>;

const ACTIVE_STATUSES: ReadonlySet<TSpinCoreStatus> = new Set<TSpinCoreStatus>([
  "ACCELERATING",
  "RUNNING",
  "DECELERATING",
]);

export const isAtRest = (status: TSpinCoreStatus): boolean => !ACTIVE_STATUSES.has(status);

const initialState = (): TSimulationState => ({
  status: "IDLE",
  rpm: 0,
  target_rpm: 0,
  elapsed_seconds: 0,
  cumulative_energy_gj: 0,
  scenario_id: null,
  run_duration_minutes: null,
  cycle_count: 0,
});

// ─── Machine ────────────────────────────────────────────────────────────────

export class CoreStateMachine {
  private readonly options: ResolvedOptions;
  private readonly inertia_kgm2: number;
  private state: TSimulationState = initialState();
  private seq = 0;
  /** Stress at the instant of the last emergency halt, until reported */
  private pendingSpike: number | null = null;

  constructor(options: CoreStateMachineOptions = {}) {
    this.options = resolveOptions(options);
    // Solid disk: I = ½ m r²
    this.inertia_kgm2 = 0.5 * this.options.coreMass_kg * this.options.coreRadius_m ** 2;
  }

  get status(): TSpinCoreStatus {
    return this.state.status;
  }

  get rpmMax(): number {
    return this.options.rpmMax;
  }

  getState(): TSimulationState {
    return { ...this.state };
  }

  // ─── Commands ─────────────────────────────────────────────────────────────

  start(scenarioName: string, durationMinutes?: number): StartResult {
    if (this.state.status !== "IDLE") {
      return fail("AlreadyRunning", `core is ${this.state.status}; start requires IDLE`);
    }
    const lookup = getScenario(scenarioName);
    if (!lookup.ok) return lookup;
    const { scenario } = lookup;

    const duration = durationMinutes ?? scenario.spin_minutes;
    if (!Number.isFinite(duration) || duration <= 0) {
      return fail("InvalidConfig", `duration must be a positive number of minutes (got ${duration})`);
    }

    const target = this.options.rpmMax * Math.min(1, Math.max(0, scenario.power_fraction));
    this.state = {
      ...this.state,
      status: "ACCELERATING",
      target_rpm: target,
      elapsed_seconds: 0,
      cumulative_energy_gj: -this.options.startupEnergy_gj,
      scenario_id: scenario.name,
      run_duration_minutes: duration,
    };
    return {
      ok: true,
      status: "started",
      scenario: scenario.name,
      duration_minutes: duration,
      target_rpm: target,
    };
  }

  stop(): StopResult {
    const { status } = this.state;
    if (status === "IDLE" || status === "EMERGENCY_STOPPED") {
      return fail("NotRunning", `core is ${status}; nothing to stop`);
    }
    if (status !== "DECELERATING") {
      this.enter("DECELERATING");
    }
    return { ok: true, status: "stopped" };
  }

  emergencyStop(): EmergencyStopResult {
    if (this.state.status !== "EMERGENCY_STOPPED") {
      this.pendingSpike = this.stressAt(this.state.rpm);
      this.state = {
        ...this.state,
        status: "EMERGENCY_STOPPED",
        rpm: 0,
        target_rpm: 0,
        elapsed_seconds: 0,
        scenario_id: null,
        run_duration_minutes: null,
      };
    }
    return { ok: true, status: "emergency_stopped", stress_spike_pct: this.pendingSpike };
  }

  reset(): ResetResult {
    const { status } = this.state;
    if (status === "EMERGENCY_STOPPED") {
      this.pendingSpike = null;
      this.enter("IDLE");
    } else if (status !== "IDLE") {
      return fail("AlreadyRunning", `core is ${status}; reset is only valid after an emergency stop`);
    }
    return { ok: true, status: "idle" };
  }

  // ─── Time ─────────────────────────────────────────────────────────────────

  /** Advance by dt seconds and return the resulting telemetry. */
  tick(dt_s: number): TTelemetrySnapshot {
    const dt = Number.isFinite(dt_s) && dt_s > 0 ? dt_s : 0;
    this.advance(dt);
    const power = this.powerAt(this.state.rpm);
    this.state.cumulative_energy_gj += power * dt;

    const snapshot = this.buildSnapshot();
    this.pendingSpike = null;
    return snapshot;
  }

  /** Telemetry for the current state without advancing time. */
  snapshot(): TTelemetrySnapshot {
    return this.buildSnapshot();
  }

  private advance(dt: number): void {
    const s = this.state;
    s.elapsed_seconds += dt;
    switch (s.status) {
      case "ACCELERATING": {
        s.rpm += Math.min(this.options.accelRate_rpmPerS * dt, s.target_rpm - s.rpm);
        if (s.target_rpm - s.rpm <= this.options.rpmTolerance) {
          this.enter("RUNNING");
        }
        break;
      }
      case "RUNNING": {
        const plateau_s = (s.run_duration_minutes ?? 0) * 60;
        if (s.elapsed_seconds >= plateau_s) {
          this.enter("DECELERATING");
        }
        break;
      }
      case "DECELERATING": {
        s.rpm -= Math.min(this.options.decelRate_rpmPerS * dt, s.rpm);
        if (s.rpm <= 0) {
          s.cycle_count += 1;
          this.enter("IDLE");
        }
        break;
      }
      case "IDLE":
      case "EMERGENCY_STOPPED":
        break;
    }
    s.rpm = Math.min(this.options.rpmMax, Math.max(0, s.rpm));
  }

  private enter(status: TSpinCoreStatus): void {
    this.state.status = status;
    this.state.elapsed_seconds = 0;
    if (status === "IDLE") {
      this.state.rpm = 0;
      this.state.target_rpm = 0;
      this.state.scenario_id = null;
      this.state.run_duration_minutes = null;
    }
  }

  // ─── Derived quantities ───────────────────────────────────────────────────

  private powerAt(rpm: number): number {
    const ratio = Math.min(1, Math.max(0, rpm / this.options.rpmMax));
    return this.options.peakPower_gw * ratio ** this.options.powerExponent;
  }

  private kineticEnergyAt(rpm: number): number {
    const omega = (rpm * 2 * Math.PI) / 60;
    return (0.5 * this.inertia_kgm2 * omega * omega) / 1e9;
  }

  private stressAt(rpm: number): number {
    return materialStressPct(rpm, this.options.rpmMax, this.options.stressExponent);
  }

  private buildSnapshot(): TTelemetrySnapshot {
    const s = this.state;
    const stress = this.stressAt(s.rpm);
    const safety = classify(stress);
    this.seq += 1;
    return {
      seq: this.seq,
      timestamp: new Date(this.options.clock()).toISOString(),
      status: s.status,
      scenario_id: s.scenario_id,
      rpm: s.rpm,
      target_rpm: s.target_rpm,
      power_gw: this.powerAt(s.rpm),
      kinetic_energy_gj: this.kineticEnergyAt(s.rpm),
      material_stress_pct: stress,
      safety_level: safety.level,
      safety_status: safety.status_label,
      safety_message: safety.message,
      cumulative_energy_gj: s.cumulative_energy_gj,
      cycle_count: s.cycle_count,
      ...(this.pendingSpike !== null ? { stress_spike_pct: this.pendingSpike } : {}),
    };
  }
}
