import type { TSafetyLevel, TSafetyStatusLabel } from "@shared/spin-core";
import { RPM_MAX, STRESS_EXPONENT } from "@shared/spin-core-constants";

export type SafetyClassification = {
  level: TSafetyLevel;
  status_label: TSafetyStatusLabel;
  message: string;
};

type SafetyBand = SafetyClassification & {
  /** Exclusive upper bound on stress [%] */
  below: number;
};

// Ordered; first band whose bound exceeds the stress wins.
export const SAFETY_BANDS: readonly SafetyBand[] = [
  {
    below: 40,
    level: "green",
    status_label: "NOMINAL",
    message: "Core stress nominal - low kinetic energy hazard",
  },
  {
    below: 70,
    level: "yellow",
    status_label: "ELEVATED",
    message: "Elevated stress - monitoring required",
  },
  {
    below: 90,
    level: "orange",
    status_label: "HIGH",
    message: "High stress operation - containment systems armed",
  },
  {
    below: Number.POSITIVE_INFINITY,
    level: "red",
    status_label: "CRITICAL",
    message: "Critical stress - full safety protocols active",
  },
];

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export const materialStressPct = (
  rpm: number,
  rpmMax = RPM_MAX,
  exponent = STRESS_EXPONENT,
): number => {
  if (!Number.isFinite(rpm) || rpmMax <= 0) return rpm > 0 ? 100 : 0;
  return 100 * clamp01(rpm / rpmMax) ** exponent;
};

export function classify(stressPct: number): SafetyClassification {
  const stress = Number.isFinite(stressPct) ? stressPct : 100;
  const band = SAFETY_BANDS.find((entry) => stress < entry.below) ?? SAFETY_BANDS[SAFETY_BANDS.length - 1];
  return { level: band.level, status_label: band.status_label, message: band.message };
}
