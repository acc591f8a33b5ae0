import { EventEmitter } from "node:events";
import type { TTelemetrySnapshot } from "@shared/spin-core";
import { logWarn } from "../../lib/log";

export type TelemetryListener = (snapshot: TTelemetrySnapshot) => void;

export const TELEMETRY_EVENT = "spin-core:telemetry";

/**
 * Fan-out for tick snapshots.  Delivery is synchronous and in publish order;
 * only the newest snapshot is retained for late joiners.
 */
export class TelemetryBus {
  private readonly emitter = new EventEmitter();
  private last: TTelemetrySnapshot | null = null;

  constructor() {
    // Dashboards, WS and SSE buckets, metrics; no fixed cap.
    this.emitter.setMaxListeners(0);
  }

  publish(snapshot: TTelemetrySnapshot): void {
    if (this.last && snapshot.seq <= this.last.seq) {
      logWarn(`dropped stale snapshot seq=${snapshot.seq} (latest ${this.last.seq})`, "telemetry");
      return;
    }
    this.last = snapshot;
    this.emitter.emit(TELEMETRY_EVENT, snapshot);
  }

  subscribe(listener: TelemetryListener): () => void {
    const wrapped = (snapshot: TTelemetrySnapshot) => {
      try {
        listener({ ...snapshot });
      } catch (error) {
        logWarn("subscriber threw; continuing delivery", "telemetry", error);
      }
    };
    this.emitter.on(TELEMETRY_EVENT, wrapped);
    return () => {
      this.emitter.off(TELEMETRY_EVENT, wrapped);
    };
  }

  latest(): TTelemetrySnapshot | null {
    return this.last ? { ...this.last } : null;
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount(TELEMETRY_EVENT);
  }
}
