import { PassThrough } from "node:stream";
import Fastify from "fastify";
import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import type { RolloutRunner } from "./rollout-runner.js";
import type { RolloutEvent, RolloutPlugin } from "./plugins/types.js";
import { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";

export function buildStatusServer(
  runner: RolloutRunner,
  options: {
    plugins?: RolloutPlugin[];
    logger?: FastifyBaseLogger;
  } = {}
): FastifyInstance {
  const app = Fastify({ loggerInstance: options.logger });
  const ctx = runner.events;

  const telemetry: TelemetryPlugin = createTelemetryPlugin();
  for (const plugin of [telemetry, ...(options.plugins ?? [])]) {
    plugin.register(app, ctx);
  }

  // SSE fan-out; wrapped after plugins so subscribers see every event
  const sseSubscribers = new Set<(event: RolloutEvent) => void>();
  {
    const prevEmit = ctx.emit;
    ctx.emit = (event: RolloutEvent) => {
      prevEmit(event);
      for (const sub of sseSubscribers) sub(event);
    };
  }

  app.get("/health", async () => ({ ok: true }));

  app.get("/v1/rollout", async () => ({
    ok: true,
    concurrency: runner.concurrency,
    ...runner.snapshot(),
  }));

  app.get("/metrics", async (_req, reply) => {
    const { running, queued, passes } = runner.snapshot();
    const { requests, events } = telemetry.snapshot();

    const lines: string[] = [
      "# HELP fleetrun_http_requests_total Total HTTP requests processed",
      "# TYPE fleetrun_http_requests_total counter",
      `fleetrun_http_requests_total ${requests}`,
      "# HELP fleetrun_passes_total Passes completed since startup",
      "# TYPE fleetrun_passes_total counter",
      `fleetrun_passes_total ${passes}`,
      "# HELP fleetrun_nodes_dispatched_total Runs triggered since startup",
      "# TYPE fleetrun_nodes_dispatched_total counter",
      `fleetrun_nodes_dispatched_total ${events["node.dispatched"]}`,
      "# HELP fleetrun_nodes_finished_total Runs seen to complete since startup",
      "# TYPE fleetrun_nodes_finished_total counter",
      `fleetrun_nodes_finished_total ${events["node.finished"]}`,
      "# HELP fleetrun_nodes_evicted_total Nodes dropped for never reaching an applying state",
      "# TYPE fleetrun_nodes_evicted_total counter",
      `fleetrun_nodes_evicted_total ${events["node.evicted"]}`,
      "# HELP fleetrun_nodes_in_flight Nodes currently dispatched and not finished",
      "# TYPE fleetrun_nodes_in_flight gauge",
      `fleetrun_nodes_in_flight ${running.length}`,
      "# HELP fleetrun_nodes_queued Nodes waiting for a free slot in the current pass",
      "# TYPE fleetrun_nodes_queued gauge",
      `fleetrun_nodes_queued ${queued}`,
      "",
    ];

    reply.header("content-type", "text/plain; version=0.0.4; charset=utf-8");
    return reply.send(lines.join("\n"));
  });

  app.get("/v1/events", (req, reply) => {
    const stream = new PassThrough();
    stream.write(": connected\n\n");

    const send = (event: RolloutEvent) => stream.write(`data: ${JSON.stringify(event)}\n\n`);
    sseSubscribers.add(send);

    const cleanup = () => {
      sseSubscribers.delete(send);
      if (!stream.destroyed) stream.end();
    };
    req.raw.on("close", cleanup);

    reply.header("content-type", "text/event-stream; charset=utf-8");
    reply.header("cache-control", "no-cache");
    reply.header("x-accel-buffering", "no");
    return reply.send(stream);
  });

  return app;
}
