import test from "node:test";
import assert from "node:assert/strict";
import http from "node:http";
import type { FastifyInstance } from "fastify";
import type { Clock } from "./clock.js";
import type { RolloutSnapshot, StatusData } from "./contracts.js";
import { InMemoryFleetClient, type SimulatedNode } from "./fleet/in-memory-client.js";
import { RolloutRunner } from "./rollout-runner.js";
import { buildStatusServer } from "./status-server.js";

// ── Helpers ────────────────────────────────────────────────────────────────

const idleClock: Clock = { now: () => 0, sleep: async () => {} };

const finished: StatusData = { applying: false, lastrun: 11, initiated_at: 10 };
const stuck: StatusData = { applying: false, lastrun: 1, initiated_at: 1 };

function buildRunner(nodes: SimulatedNode[], concurrency = 2): RolloutRunner {
  return new RolloutRunner(new InMemoryFleetClient(nodes), { concurrency }, { clock: idleClock });
}

async function closeApp(app: FastifyInstance): Promise<void> {
  app.server.closeAllConnections();
  await app.close();
}

function openSse(port: number, limit = 1, timeoutMs = 1000): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const dataLines: string[] = [];
    let done = false;

    const finish = () => {
      if (!done) {
        done = true;
        clearTimeout(timer);
        req.destroy();
        resolve(dataLines);
      }
    };

    const req = http.get(`http://127.0.0.1:${port}/v1/events`, (res) => {
      res.on("data", (chunk: Buffer) => {
        for (const line of chunk.toString().split("\n")) {
          if (line.startsWith("data: ")) {
            dataLines.push(line.slice(6).trim());
            if (dataLines.length >= limit) finish();
          }
        }
      });
      res.on("end", finish);
      res.on("error", finish);
    });

    req.on("error", (err) => {
      if (done) return;
      reject(err);
    });

    const timer = setTimeout(finish, timeoutMs);
  });
}

// ── Tests ──────────────────────────────────────────────────────────────────

test("GET /health answers ok", async () => {
  const app = buildStatusServer(buildRunner([]));
  await app.ready();

  const res = await app.inject({ method: "GET", url: "/health" });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { ok: true });

  await app.close();
});

test("GET /v1/rollout reports an idle runner", async () => {
  const app = buildStatusServer(buildRunner([], 3));
  await app.ready();

  const res = await app.inject({ method: "GET", url: "/v1/rollout" });
  assert.deepEqual(res.json(), {
    ok: true,
    concurrency: 3,
    active: false,
    passes: 0,
    queued: 0,
    running: [],
  });

  await app.close();
});

test("plugins observe the in-flight set while a pass runs", async () => {
  const runner = buildRunner([
    { name: "a", initiatedAt: 10, statuses: [finished] },
    { name: "b", initiatedAt: 10, statuses: [finished] },
  ]);
  const snapshots: RolloutSnapshot[] = [];
  const app = buildStatusServer(runner, {
    plugins: [
      {
        name: "observer",
        register(_app, ctx) {
          const prev = ctx.emit;
          ctx.emit = (event) => {
            prev(event);
            if (event.type === "node.dispatched") snapshots.push(runner.snapshot());
          };
        },
      },
    ],
  });
  await app.ready();

  await runner.runallOnce();

  assert.deepEqual(snapshots, [
    { active: true, passes: 0, queued: 1, running: [{ name: "a", initiatedAt: 10, checks: 0 }] },
    {
      active: true,
      passes: 0,
      queued: 0,
      running: [
        { name: "a", initiatedAt: 10, checks: 0 },
        { name: "b", initiatedAt: 10, checks: 0 },
      ],
    },
  ]);

  await app.close();
});

test("GET /metrics counts passes, dispatches, completions and evictions", async () => {
  const runner = buildRunner([
    { name: "a", initiatedAt: 10, statuses: [finished] },
    { name: "b", initiatedAt: 10, statuses: [stuck] },
  ]);
  const app = buildStatusServer(runner);
  await app.ready();

  await runner.runallOnce();
  const res = await app.inject({ method: "GET", url: "/metrics" });

  assert.equal(res.statusCode, 200);
  assert.match(String(res.headers["content-type"]), /^text\/plain/);
  const lines = res.body.split("\n");
  for (const expected of [
    "fleetrun_passes_total 1",
    "fleetrun_nodes_dispatched_total 2",
    "fleetrun_nodes_finished_total 1",
    "fleetrun_nodes_evicted_total 1",
    "fleetrun_nodes_in_flight 0",
    "fleetrun_nodes_queued 0",
  ]) {
    assert.ok(lines.includes(expected), `missing metric line: ${expected}`);
  }

  await app.close();
});

test("GET /v1/plugins/telemetry exposes event counters", async () => {
  const runner = buildRunner([{ name: "a", initiatedAt: 10, statuses: [finished] }]);
  const app = buildStatusServer(runner);
  await app.ready();

  await runner.runallOnce();
  const res = await app.inject({ method: "GET", url: "/v1/plugins/telemetry" });

  assert.deepEqual(res.json(), {
    ok: true,
    plugin: "telemetry",
    requests: 0,
    events: {
      "pass.started": 1,
      "pass.finished": 1,
      "node.dispatched": 1,
      "node.finished": 1,
      "node.evicted": 0,
    },
  });

  await app.close();
});

test("GET /v1/events streams rollout events to subscribers", async () => {
  const runner = buildRunner([{ name: "a", initiatedAt: 10, statuses: [finished] }]);
  const app = buildStatusServer(runner);
  await app.listen({ host: "127.0.0.1", port: 0 });
  const port = app.addresses()[0].port;

  const ssePromise = openSse(port, 2, 1000);
  await new Promise((r) => setTimeout(r, 50));

  await runner.runallOnce();

  const dataLines = await ssePromise;
  assert.equal(dataLines.length, 2);
  const first = JSON.parse(dataLines[0]);
  const second = JSON.parse(dataLines[1]);
  assert.equal(first.type, "pass.started");
  assert.deepEqual(first.detail, { nodes: 1 });
  assert.equal(second.type, "node.dispatched");
  assert.equal(second.nodeId, "a");

  await closeApp(app);
});
