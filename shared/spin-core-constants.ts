/**
 * Spin-up core constants (shared).
 *
 * Illustrative values for the simulated generator and the storage network.
 * Curves (power and stress exponents) are tunable: only monotonicity and
 * boundedness are load-bearing.
 */

// Maximum rotational speed of the core (RPM).
export const RPM_MAX = 200_000;

// Electrical output at RPM_MAX (GW).
export const PEAK_POWER_GW = 200;

// Solid-disk rotor.
export const CORE_MASS_KG = 199;
export const CORE_RADIUS_M = 1.5;

// Energy debited at the start of every spin cycle (GJ).
export const STARTUP_ENERGY_GJ = 2217.3;

// Ramp rates (RPM per second).
export const ACCEL_RATE_RPM_PER_S = 1_000;
export const DECEL_RATE_RPM_PER_S = 1_000;

// ACCELERATING → RUNNING once within this many RPM of target.
export const RPM_TOLERANCE = 1;

// power = PEAK × (rpm / RPM_MAX)^k, k ≥ 1.
export const POWER_EXPONENT = 1;

// stress% = 100 × (rpm / RPM_MAX)^STRESS_EXPONENT (centrifugal ~ ω²).
export const STRESS_EXPONENT = 2;

// Conduit geometry and storage density.
export const CONDUIT_DIAMETER_IN = 48;
export const STORAGE_DENSITY_GWH_PER_M3 = 2.5;
export const METERS_PER_INCH = 0.0254;

// 1 GWh = 3.6e12 J = 3600 GJ.
export const GJ_PER_GWH = 3_600;

// Nominal global daily electricity consumption used for fleet projections (GWh/day).
export const GLOBAL_DAILY_CONSUMPTION_GWH = 65_000;

export const DEFAULT_NETWORK_CONFIG = {
  conduit_length_m: 6_437,
  num_conduits: 3,
  active_conduits: 2,
} as const;
