import type { TTelemetrySnapshot } from "@shared/spin-core";
import { isAtRest, type CoreStateMachine } from "./core-state-machine";
import type { TelemetryBus } from "./telemetry-bus";

type TimerHandle = ReturnType<typeof setTimeout>;

export type TickSchedulerOptions = {
  machine: CoreStateMachine;
  bus: TelemetryBus;
  /** Wall time per tick [ms] */
  period_ms?: number;
  maxCatchUpTicks?: number;
  now?: () => number;
  setTimer?: (callback: () => void, delay_ms: number) => TimerHandle;
  clearTimer?: (handle: TimerHandle) => void;
  onTick?: (snapshot: TTelemetrySnapshot) => void;
};

export type TickScheduler = {
  /** Begin the scheduler lifecycle (process init). */
  start: () => void;
  /** End the lifecycle (graceful shutdown). */
  shutdown: () => void;
  /** Resume ticking after a command; ticks once and pauses again if the core is at rest. */
  wake: () => void;
  isRunning: () => boolean;
  isTicking: () => boolean;
  tickCount: () => number;
};

const DEFAULT_PERIOD_MS = 1000;

const defaultNow = (): number => {
  if (typeof performance !== "undefined" && typeof performance.now === "function") {
    return performance.now();
  }
  return Date.now();
};

export const createTickScheduler = (options: TickSchedulerOptions): TickScheduler => {
  const period_ms =
    Number.isFinite(options.period_ms) && Number(options.period_ms) > 0
      ? Number(options.period_ms)
      : DEFAULT_PERIOD_MS;
  const dt_s = period_ms / 1000;
  const maxCatchUpTicks = Math.max(1, Math.floor(options.maxCatchUpTicks ?? 4));
  const now = options.now ?? defaultNow;
  const setTimer =
    options.setTimer ?? ((cb: () => void, delay: number): TimerHandle => setTimeout(cb, delay));
  const clearTimer = options.clearTimer ?? ((handle: TimerHandle) => clearTimeout(handle));
  const { machine, bus } = options;

  let running = false;
  let ticking = false;
  let timer: TimerHandle | undefined;
  let nextScheduledAt = 0;
  let ticks = 0;

  const cancelTimer = () => {
    if (timer !== undefined) {
      clearTimer(timer);
      timer = undefined;
    }
  };

  const schedule = () => {
    if (!running || !ticking) return;
    const delay = Math.max(0, nextScheduledAt - now());
    timer = setTimer(flush, delay);
  };

  const flush = () => {
    timer = undefined;
    if (!running || !ticking) return;

    const now_ms = now();
    let processed = 0;

    while (ticking && now_ms >= nextScheduledAt && processed < maxCatchUpTicks) {
      const snapshot = machine.tick(dt_s);
      ticks += 1;
      bus.publish(snapshot);
      options.onTick?.(snapshot);
      nextScheduledAt += period_ms;
      processed += 1;
      if (isAtRest(snapshot.status)) {
        ticking = false;
      }
    }

    if (now_ms > nextScheduledAt + period_ms) {
      nextScheduledAt = now_ms + period_ms;
    }

    schedule();
  };

  const beginTicking = () => {
    if (ticking) return;
    ticking = true;
    nextScheduledAt = now() + period_ms;
    schedule();
  };

  return {
    start: () => {
      if (running) return;
      running = true;
      if (!isAtRest(machine.status)) beginTicking();
    },
    shutdown: () => {
      running = false;
      ticking = false;
      cancelTimer();
    },
    wake: () => {
      if (!running) return;
      beginTicking();
    },
    isRunning: () => running,
    isTicking: () => ticking,
    tickCount: () => ticks,
  };
};
