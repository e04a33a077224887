import type { FastifyInstance } from "fastify";
import type { RolloutEventContext, RolloutEventType, RolloutPlugin } from "./types.js";

export type EventCounts = Record<RolloutEventType, number>;

export interface TelemetrySnapshot {
  /** HTTP requests answered by the status server. */
  requests: number;
  events: EventCounts;
}

export interface TelemetryPlugin extends RolloutPlugin {
  snapshot(): TelemetrySnapshot;
}

function emptyCounts(): EventCounts {
  return {
    "pass.started": 0,
    "pass.finished": 0,
    "node.dispatched": 0,
    "node.finished": 0,
    "node.evicted": 0,
  };
}

export function createTelemetryPlugin(): TelemetryPlugin {
  let requests = 0;
  const events = emptyCounts();

  const snapshot = (): TelemetrySnapshot => ({ requests, events: { ...events } });

  return {
    name: "telemetry",
    register(app: FastifyInstance, ctx: RolloutEventContext) {
      app.addHook("onResponse", async () => {
        requests += 1;
      });

      const originalEmit = ctx.emit;
      ctx.emit = (event) => {
        events[event.type] += 1;
        originalEmit(event);
      };

      app.get("/v1/plugins/telemetry", async () => ({
        ok: true,
        plugin: "telemetry",
        ...snapshot(),
      }));
    },
    snapshot,
  };
}
