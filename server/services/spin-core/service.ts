import type {
  SpinCoreResult,
  TNetworkCapacity,
  TNetworkConfig,
  TSpinCoreStatus,
  TTelemetrySnapshot,
} from "@shared/spin-core";
import { PEAK_POWER_GW, STARTUP_ENERGY_GJ } from "@shared/spin-core-constants";
import { log } from "../../lib/log";
import { metrics } from "../../metrics";
import {
  CoreStateMachine,
  type CoreStateMachineOptions,
  type EmergencyStopResult,
  type ResetResult,
  type StartResult,
  type StopResult,
} from "./core-state-machine";
import {
  compareScenarios,
  projectFleetImpact,
  storageDurationHours,
  type FleetProjection,
  type ScenarioComparison,
} from "./energy-model";
import { NetworkConfigStore } from "./network-config-store";
import { getScenario, listScenarios } from "./scenario-catalog";
import { TelemetryBus, type TelemetryListener } from "./telemetry-bus";
import { createTickScheduler, type TickScheduler, type TickSchedulerOptions } from "./tick-scheduler";

export type SpinCoreServiceOptions = {
  machine?: CoreStateMachineOptions;
  network?: TNetworkConfig;
  tickMs?: number;
  logTicks?: boolean;
  timers?: Pick<TickSchedulerOptions, "now" | "setTimer" | "clearTimer">;
};

export type SystemStatus = {
  telemetry: TTelemetrySnapshot;
  network: TNetworkConfig & TNetworkCapacity & { storage_hours_at_peak: number };
};

const REFERENCE_SCENARIO = "Base Load";

const outcome = (result: { ok: boolean; error?: string }): string =>
  result.ok ? "ok" : (result.error ?? "error");

/**
 * Command/query surface of the simulation.  One instance per process, owned by
 * the bootstrap and handed to the HTTP and realtime layers.
 */
export class SpinCoreService {
  readonly machine: CoreStateMachine;
  readonly network: NetworkConfigStore;
  readonly bus = new TelemetryBus();
  readonly scheduler: TickScheduler;
  private readonly peakPower_gw: number;
  private readonly startupEnergy_gj: number;
  private lastStatus: TSpinCoreStatus;

  constructor(options: SpinCoreServiceOptions = {}) {
    this.machine = new CoreStateMachine(options.machine);
    this.network = new NetworkConfigStore(options.network);
    this.peakPower_gw = options.machine?.peakPower_gw ?? PEAK_POWER_GW;
    this.startupEnergy_gj = options.machine?.startupEnergy_gj ?? STARTUP_ENERGY_GJ;
    this.lastStatus = this.machine.status;
    const logTicks = options.logTicks ?? false;

    this.scheduler = createTickScheduler({
      machine: this.machine,
      bus: this.bus,
      period_ms: options.tickMs,
      ...options.timers,
      onTick: (snapshot) => {
        metrics.recordSnapshot(snapshot);
        if (snapshot.status !== this.lastStatus) {
          log(`${this.lastStatus} -> ${snapshot.status} (rpm=${snapshot.rpm.toFixed(0)})`, "spin-core");
          this.lastStatus = snapshot.status;
        }
        if (logTicks) {
          log(
            `tick seq=${snapshot.seq} rpm=${snapshot.rpm.toFixed(0)} power=${snapshot.power_gw.toFixed(2)}GW ` +
              `stress=${snapshot.material_stress_pct.toFixed(1)}% ${snapshot.safety_status}`,
            "spin-core",
          );
        }
      },
    });
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────

  startScheduler(): void {
    this.scheduler.start();
  }

  shutdown(): void {
    this.scheduler.shutdown();
  }

  // ─── Commands ─────────────────────────────────────────────────────────────

  start(scenario: string, durationMinutes?: number): StartResult {
    const result = this.machine.start(scenario, durationMinutes);
    metrics.recordCommand("start", outcome(result));
    if (result.ok) {
      log(`start "${result.scenario}" for ${result.duration_minutes} min -> ${result.target_rpm} rpm`, "spin-core");
      this.scheduler.wake();
    }
    return result;
  }

  stop(): StopResult {
    const result = this.machine.stop();
    metrics.recordCommand("stop", outcome(result));
    if (result.ok) this.scheduler.wake();
    return result;
  }

  emergencyStop(): EmergencyStopResult {
    const result = this.machine.emergencyStop();
    metrics.recordCommand("emergency_stop", "ok");
    log(`EMERGENCY STOP (stress spike ${result.stress_spike_pct?.toFixed(1) ?? "n/a"}%)`, "spin-core");
    this.scheduler.wake();
    return result;
  }

  reset(): ResetResult {
    const result = this.machine.reset();
    metrics.recordCommand("reset", outcome(result));
    if (result.ok) this.scheduler.wake();
    return result;
  }

  updateNetworkConfig(
    length: number,
    numConduits: number,
    activeConduits: number,
  ): SpinCoreResult<{ capacity: TNetworkCapacity }> {
    const result = this.network.update(length, numConduits, activeConduits);
    metrics.recordCommand("network_config", outcome(result));
    if (result.ok) {
      log(
        `network ${numConduits} conduits (${activeConduits} active) x ${length} m -> ` +
          `${result.capacity.total_capacity_gwh.toFixed(1)} GWh`,
        "spin-core",
      );
    }
    return result;
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  getScenarios(): ScenarioComparison {
    return compareScenarios(listScenarios(), this.peakPower_gw, this.startupEnergy_gj);
  }

  getSystemStatus(): SystemStatus {
    const capacity = this.network.capacity();
    return {
      telemetry: this.machine.snapshot(),
      network: {
        ...this.network.get(),
        ...capacity,
        storage_hours_at_peak: storageDurationHours(capacity.total_capacity_gwh, this.peakPower_gw),
      },
    };
  }

  getFleetProjection(facilities: number): SpinCoreResult<{ projection: FleetProjection }> {
    const reference = getScenario(REFERENCE_SCENARIO);
    if (!reference.ok) return reference;
    return {
      ok: true,
      projection: projectFleetImpact(facilities, reference.scenario, this.peakPower_gw),
    };
  }

  subscribe(listener: TelemetryListener): () => void {
    return this.bus.subscribe(listener);
  }
}
