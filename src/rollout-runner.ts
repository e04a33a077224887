import type { RolloutSnapshot, RunnerConfiguration, TrackedNode } from "./contracts.js";
import type { FleetClient } from "./fleet-client.js";
import { systemClock, type Clock } from "./clock.js";
import { ConfigurationError } from "./errors.js";
import { findApplyingNodes } from "./control/applying-tracker.js";
import { runonceArguments } from "./control/run-arguments.js";
import type { RolloutEventContext } from "./plugins/types.js";

export const ENABLED_PREDICATE = "agent().enabled=true";
const POLL_INTERVAL_SECONDS = 1;

export type LogSink = (message: string) => void;

export interface RolloutRunnerOptions {
  clock?: Clock;
  /** Compound predicate selecting nodes whose agent is not administratively disabled. */
  enabledPredicate?: string;
}

function toTimestamp(value: number | string | undefined): number {
  if (value === undefined) return 0;
  const parsed = typeof value === "number" ? Math.trunc(value) : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

export class RolloutRunner {
  readonly client: FleetClient;
  readonly configuration: RunnerConfiguration;
  readonly concurrency: number;
  /** Plugins wrap `emit` to observe the rollout. */
  readonly events: RolloutEventContext = { emit: () => {} };

  private readonly clock: Clock;
  private readonly enabledPredicate: string;
  private sink: LogSink | null = null;
  private passes = 0;
  private active = false;
  private queued = 0;
  private running: TrackedNode[] = [];

  constructor(
    client: FleetClient,
    configuration: RunnerConfiguration,
    options: RolloutRunnerOptions = {}
  ) {
    const concurrency = Math.floor(configuration.concurrency ?? 0);
    if (!(concurrency >= 1)) throw new ConfigurationError("Concurrency has to be > 0");
    if (client.filter.compound.length > 0) {
      throw new ConfigurationError("The compound filter should be empty");
    }

    this.client = client;
    this.configuration = configuration;
    this.concurrency = concurrency;
    this.clock = options.clock ?? systemClock;
    this.enabledPredicate = options.enabledPredicate ?? ENABLED_PREDICATE;
    this.client.progress = false;
  }

  logger(sink: LogSink): void {
    this.sink = sink;
  }

  log(message: string): void {
    this.sink?.(message);
  }

  snapshot(): RolloutSnapshot {
    return {
      active: this.active,
      passes: this.passes,
      queued: this.queued,
      running: this.running.map((entry) => ({ ...entry })),
    };
  }

  async runall(repeat: boolean, minInterval: number): Promise<void> {
    if (repeat) {
      await this.runallForever(minInterval);
    } else {
      await this.runallOnce();
    }
  }

  async runallForever(
    minInterval: number,
    iterations = Number.POSITIVE_INFINITY
  ): Promise<void> {
    for (let i = 0; i < iterations; i++) {
      const startedAt = this.clock.now();
      await this.runallOnce();
      const elapsed = this.clock.now() - startedAt;

      if (elapsed < minInterval) {
        const remaining = minInterval - elapsed;
        this.log(`Sleeping for ${remaining} seconds before the next pass`);
        await this.clock.sleep(remaining);
      }
    }
  }

  async runallOnce(): Promise<void> {
    this.active = true;
    try {
      const hosts = await this.findEnabledNodes();
      this.log(`Running ${hosts.length} enabled nodes with a concurrency of ${this.concurrency}`);
      this.events.emit({
        type: "pass.started",
        at: this.clock.now(),
        detail: { nodes: hosts.length },
      });

      await this.runhosts(hosts);

      this.passes += 1;
      this.events.emit({
        type: "pass.finished",
        at: this.clock.now(),
        detail: { pass: this.passes },
      });
    } finally {
      this.active = false;
    }
  }

  async findEnabledNodes(): Promise<string[]> {
    this.client.compoundFilter(this.enabledPredicate);
    try {
      return await this.client.discover();
    } finally {
      this.client.reset();
    }
  }

  /**
   * Keeps at most `concurrency` nodes in flight until the queue is drained and every
   * dispatched node has finished or been evicted.
   */
  async runhosts(hosts: string[]): Promise<void> {
    const queue = [...hosts];
    let running: TrackedNode[] = [];
    const inFlight = (name: string) => running.some((entry) => entry.name === name);
    const nextDispatchable = () => queue.findIndex((name) => !inFlight(name));

    this.publish(queue, running);

    while (queue.length > 0 || running.length > 0) {
      while (running.length < this.concurrency) {
        // a name queued twice waits until its first run leaves the in-flight set
        const next = nextDispatchable();
        if (next === -1) break;

        const [host] = queue.splice(next, 1);
        const initiatedAt = await this.runhost(host);
        running.push({ name: host, initiatedAt, checks: 0 });
        this.publish(queue, running);
        this.events.emit({
          type: "node.dispatched",
          at: this.clock.now(),
          nodeId: host,
          detail: { initiatedAt },
        });
      }

      running = await this.findApplyingNodes(
        running.map((entry) => entry.name),
        running
      );
      this.publish(queue, running);

      const slotFree = running.length < this.concurrency && nextDispatchable() !== -1;
      if (running.length > 0 && !slotFree) {
        await this.clock.sleep(POLL_INTERVAL_SECONDS);
      }
    }
  }

  /** Returns the agent-reported start time of the run, or 0 for agents that do not report one. */
  async runhost(host: string): Promise<number> {
    this.log(`Running agent on ${host}`);
    try {
      await this.client.discover({ nodes: [host] });
      const replies = await this.client.runonce({
        ...runonceArguments(this.configuration),
        force: true,
      });

      const reply = replies.at(0);
      if (!reply) {
        this.log(`Host ${host} did not respond to the run request`);
        return 0;
      }
      this.log(`${host}: ${reply.data.summary}`);
      return toTimestamp(reply.data.initiated_at);
    } finally {
      this.client.reset();
    }
  }

  findApplyingNodes(candidates: string[], previous: TrackedNode[] = []): Promise<TrackedNode[]> {
    return findApplyingNodes(
      {
        client: this.client,
        clock: this.clock,
        events: this.events,
        log: (message) => this.log(message),
      },
      candidates,
      previous
    );
  }

  private publish(queue: string[], running: TrackedNode[]): void {
    this.queued = queue.length;
    this.running = running;
  }
}
