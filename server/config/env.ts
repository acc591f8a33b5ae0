// Centralized environment switches for the simulation server
export const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

export const positiveNumber = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined || value.trim() === "") return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
};

export type ServerEnv = {
  port: number;
  host: string;
  nodeEnv: string;
  enableWs: boolean;
  tickMs: number;
  accelRpmPerS: number;
  decelRpmPerS: number;
  logTicks: boolean;
};

export const readServerEnv = (env: NodeJS.ProcessEnv = process.env): ServerEnv => {
  const nodeEnv = env.NODE_ENV ?? "development";
  return {
    port: Math.floor(positiveNumber(env.PORT, 5000)),
    host: env.HOST?.trim() || "0.0.0.0",
    nodeEnv,
    enableWs: flagEnabled(env.ENABLE_WS, nodeEnv === "production"),
    tickMs: positiveNumber(env.SPIN_CORE_TICK_MS, 1000),
    accelRpmPerS: positiveNumber(env.SPIN_CORE_ACCEL_RPM_PER_S, 1000),
    decelRpmPerS: positiveNumber(env.SPIN_CORE_DECEL_RPM_PER_S, 1000),
    logTicks: flagEnabled(env.SPIN_CORE_LOG_TICKS, false),
  };
};
