import { z } from "zod";

export const SpinCoreStatus = z.enum([
  "IDLE",
  "ACCELERATING",
  "RUNNING",
  "DECELERATING",
  "EMERGENCY_STOPPED",
]);

export type TSpinCoreStatus = z.infer<typeof SpinCoreStatus>;

export const SafetyLevel = z.enum(["green", "yellow", "orange", "red"]);

export type TSafetyLevel = z.infer<typeof SafetyLevel>;

export const SafetyStatusLabel = z.enum(["NOMINAL", "ELEVATED", "HIGH", "CRITICAL"]);

export type TSafetyStatusLabel = z.infer<typeof SafetyStatusLabel>;

export const SpinCoreErrorCode = z.enum([
  "UnknownScenario",
  "AlreadyRunning",
  "NotRunning",
  "InvalidConfig",
]);

export type TSpinCoreErrorCode = z.infer<typeof SpinCoreErrorCode>;

export type SpinCoreFailure = {
  ok: false;
  error: TSpinCoreErrorCode;
  message: string;
};

export type SpinCoreResult<T> = ({ ok: true } & T) | SpinCoreFailure;

export const fail = (error: TSpinCoreErrorCode, message: string): SpinCoreFailure => ({
  ok: false,
  error,
  message,
});

export const ScenarioDefinition = z.object({
  name: z.string().min(1),
  spin_minutes: z.number().nonnegative(),
  spins_per_day: z.number().nonnegative(),
  power_fraction: z.number().gt(0).max(1),
});

export type TScenarioDefinition = z.infer<typeof ScenarioDefinition>;

export const NetworkConfig = z.object({
  conduit_length_m: z.number().int().positive(),
  num_conduits: z.number().int().positive(),
  active_conduits: z.number().int().positive(),
});

export type TNetworkConfig = z.infer<typeof NetworkConfig>;

export const NetworkCapacity = z.object({
  standby_conduits: z.number().int().nonnegative(),
  redundancy_factor: z.number().positive(),
  total_capacity_gwh: z.number().nonnegative(),
  single_conduit_capacity_gwh: z.number().nonnegative(),
  installed_capacity_gwh: z.number().nonnegative(),
});

export type TNetworkCapacity = z.infer<typeof NetworkCapacity>;

export const ScenarioEnergy = z.object({
  daily_energy_gwh: z.number(),
  startup_costs_gwh: z.number(),
  net_energy_gwh: z.number(),
  efficiency_ratio: z.number().nonnegative(),
  break_even_minutes: z.number().nonnegative(),
});

export type TScenarioEnergy = z.infer<typeof ScenarioEnergy>;

export const SimulationState = z.object({
  status: SpinCoreStatus,
  rpm: z.number().nonnegative(),
  target_rpm: z.number().nonnegative(),
  elapsed_seconds: z.number().nonnegative(),
  cumulative_energy_gj: z.number(),
  scenario_id: z.string().nullable(),
  run_duration_minutes: z.number().positive().nullable(),
  cycle_count: z.number().int().nonnegative(),
});

export type TSimulationState = z.infer<typeof SimulationState>;

export const TelemetrySnapshot = z.object({
  seq: z.number().int().nonnegative(),
  timestamp: z.string().datetime(),
  status: SpinCoreStatus,
  scenario_id: z.string().nullable(),
  rpm: z.number().nonnegative(),
  target_rpm: z.number().nonnegative(),
  power_gw: z.number().nonnegative(),
  kinetic_energy_gj: z.number().nonnegative(),
  material_stress_pct: z.number().min(0).max(100),
  safety_level: SafetyLevel,
  safety_status: SafetyStatusLabel,
  safety_message: z.string(),
  cumulative_energy_gj: z.number(),
  cycle_count: z.number().int().nonnegative(),
  stress_spike_pct: z.number().min(0).max(100).optional(),
});

export type TTelemetrySnapshot = z.infer<typeof TelemetrySnapshot>;

// --- Command inputs ----------------------------------------------------------

export const StartCommandInput = z.object({
  scenario: z.string().trim().min(1).default("Peak Demand"),
  duration: z.number().finite().optional(),
});

export type TStartCommandInput = z.infer<typeof StartCommandInput>;

// Range checks live in the store so the caller gets InvalidConfig, not a schema error.
export const NetworkConfigInput = z.object({
  conduit_length_m: z.number().finite(),
  num_conduits: z.number().finite(),
  active_conduits: z.number().finite(),
});

export type TNetworkConfigInput = z.infer<typeof NetworkConfigInput>;

export const FleetProjectionQuery = z.object({
  facilities: z.coerce.number().int().positive().max(1_000_000).default(1),
});

export type TFleetProjectionQuery = z.infer<typeof FleetProjectionQuery>;
