import { fail, type SpinCoreResult, type TScenarioDefinition } from "@shared/spin-core";

const DAYS_PER_WEEK = 7;

const CATALOG: readonly TScenarioDefinition[] = Object.freeze(
  [
    { name: "Peak Demand", spin_minutes: 15, spins_per_day: 4, power_fraction: 1 },
    { name: "Base Load", spin_minutes: 30, spins_per_day: 2, power_fraction: 0.75 },
    { name: "Emergency", spin_minutes: 60, spins_per_day: 1, power_fraction: 1 },
    // Twice a week.
    { name: "Storage Fill", spin_minutes: 120, spins_per_day: 2 / DAYS_PER_WEEK, power_fraction: 0.5 },
  ].map((entry) => Object.freeze(entry)),
);

const byName = new Map<string, TScenarioDefinition>(CATALOG.map((entry) => [entry.name, entry]));

export const scenarioNames: readonly string[] = CATALOG.map((entry) => entry.name);

export const listScenarios = (): readonly TScenarioDefinition[] => CATALOG;

export const getScenario = (
  name: string,
): SpinCoreResult<{ scenario: TScenarioDefinition }> => {
  const scenario = byName.get(name);
  if (!scenario) {
    return fail("UnknownScenario", `unknown scenario "${name}"; expected one of ${scenarioNames.join(", ")}`);
  }
  return { ok: true, scenario };
};
