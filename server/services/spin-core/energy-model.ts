import type {
  TNetworkCapacity,
  TNetworkConfig,
  TScenarioDefinition,
  TScenarioEnergy,
} from "@shared/spin-core";
import {
  CONDUIT_DIAMETER_IN,
  GJ_PER_GWH,
  GLOBAL_DAILY_CONSUMPTION_GWH,
  METERS_PER_INCH,
  PEAK_POWER_GW,
  STARTUP_ENERGY_GJ,
  STORAGE_DENSITY_GWH_PER_M3,
} from "@shared/spin-core-constants";

export class DivisionByZeroError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DivisionByZero";
  }
}

export type ConduitParams = {
  diameter_in: number;
  density_gwh_per_m3: number;
};

export const DEFAULT_CONDUIT_PARAMS: ConduitParams = {
  diameter_in: CONDUIT_DIAMETER_IN,
  density_gwh_per_m3: STORAGE_DENSITY_GWH_PER_M3,
};

/** Cylinder volume × storage density. */
export function storageCapacity(
  conduitLength_m: number,
  diameter_in: number,
  density_gwh_per_m3: number,
): number {
  const radius_m = (diameter_in * METERS_PER_INCH) / 2;
  const volume_m3 = Math.PI * radius_m * radius_m * conduitLength_m;
  return volume_m3 * density_gwh_per_m3;
}

export function networkCapacity(
  config: TNetworkConfig,
  params: ConduitParams = DEFAULT_CONDUIT_PARAMS,
): TNetworkCapacity {
  if (config.active_conduits < 1) {
    throw new DivisionByZeroError("active_conduits must be at least 1");
  }
  const single = storageCapacity(config.conduit_length_m, params.diameter_in, params.density_gwh_per_m3);
  return {
    standby_conduits: config.num_conduits - config.active_conduits,
    redundancy_factor: config.num_conduits / config.active_conduits,
    total_capacity_gwh: config.active_conduits * single,
    single_conduit_capacity_gwh: single,
    installed_capacity_gwh: config.num_conduits * single,
  };
}

export function scenarioEnergy(
  scenario: Pick<TScenarioDefinition, "spin_minutes" | "spins_per_day">,
  peakPower_gw: number = PEAK_POWER_GW,
  startupEnergy_gj: number = STARTUP_ENERGY_GJ,
): TScenarioEnergy {
  const daily = peakPower_gw * (scenario.spin_minutes / 60) * scenario.spins_per_day;
  const startupPerSpin_gwh = startupEnergy_gj / GJ_PER_GWH;
  const startupCosts = startupPerSpin_gwh * scenario.spins_per_day;
  const net = daily - startupCosts;
  const ratio = daily > 0 ? net / daily : 0;
  return {
    daily_energy_gwh: daily,
    startup_costs_gwh: startupCosts,
    net_energy_gwh: net,
    efficiency_ratio: Number.isFinite(ratio) ? Math.max(0, ratio) : 0,
    break_even_minutes: peakPower_gw > 0 ? (startupPerSpin_gwh / peakPower_gw) * 60 : 0,
  };
}

/** Hours a stored capacity lasts at a constant draw. */
export const storageDurationHours = (capacity_gwh: number, power_gw: number): number =>
  power_gw > 0 ? capacity_gwh / power_gw : 0;

export type ScenarioComparison = Record<
  string,
  TScenarioEnergy & { params: Pick<TScenarioDefinition, "spin_minutes" | "spins_per_day"> }
>;

export function compareScenarios(
  catalog: readonly TScenarioDefinition[],
  peakPower_gw: number = PEAK_POWER_GW,
  startupEnergy_gj: number = STARTUP_ENERGY_GJ,
): ScenarioComparison {
  const out: ScenarioComparison = {};
  for (const scenario of catalog) {
    out[scenario.name] = {
      params: { spin_minutes: scenario.spin_minutes, spins_per_day: scenario.spins_per_day },
      ...scenarioEnergy(scenario, peakPower_gw, startupEnergy_gj),
    };
  }
  return out;
}

export type FleetProjection = {
  facilities: number;
  total_daily_energy_gwh: number;
  global_coverage_pct: number;
  displacement: "partial" | "complete";
};

export function projectFleetImpact(
  facilities: number,
  reference: Pick<TScenarioDefinition, "spin_minutes" | "spins_per_day">,
  peakPower_gw: number = PEAK_POWER_GW,
  globalDaily_gwh: number = GLOBAL_DAILY_CONSUMPTION_GWH,
): FleetProjection {
  const count = Math.max(0, Math.floor(facilities));
  const perFacility = peakPower_gw * (reference.spin_minutes / 60) * reference.spins_per_day;
  const total = perFacility * count;
  const coverage = globalDaily_gwh > 0 ? (total / globalDaily_gwh) * 100 : 0;
  return {
    facilities: count,
    total_daily_energy_gwh: total,
    global_coverage_pct: Math.min(coverage, 100),
    displacement: coverage >= 100 ? "complete" : "partial",
  };
}
