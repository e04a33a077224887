import type { Clock } from "../clock.js";
import type { StatusReply, TrackedNode } from "../contracts.js";
import type { FleetClient } from "../fleet-client.js";
import type { RolloutEventContext } from "../plugins/types.js";
import { computeEvictionDecision } from "./eviction-policy.js";

export interface ApplyingTrackerContext {
  client: FleetClient;
  clock: Clock;
  log(message: string): void;
  events: RolloutEventContext;
}

function latestReplyFor(replies: StatusReply[], name: string): StatusReply | undefined {
  let latest: StatusReply | undefined;
  for (const reply of replies) {
    if (reply.sender === name) latest = reply;
  }
  return latest;
}

async function pollStatus(client: FleetClient, name: string): Promise<StatusReply[]> {
  client.identityFilter(name);
  try {
    return await client.status();
  } finally {
    client.reset();
  }
}

/**
 * Polls each candidate and returns the entries still in flight.
 *
 * An applying node has its checks reset, and an idle node still waiting for its requested
 * run gets one more. A node with no status reply, or whose last run completed after the
 * request, drops out.
 */
export async function findApplyingNodes(
  ctx: ApplyingTrackerContext,
  candidates: string[],
  previous: TrackedNode[] = []
): Promise<TrackedNode[]> {
  const tracked = new Map<string, TrackedNode>();
  for (const entry of previous) tracked.set(entry.name, entry);
  const result: TrackedNode[] = [];
  const seen = new Set<string>();

  for (const name of candidates) {
    if (seen.has(name)) continue;
    seen.add(name);

    const reply = latestReplyFor(await pollStatus(ctx.client, name), name);
    const prior = tracked.get(name);

    if (!reply) {
      if (prior) {
        ctx.events.emit({ type: "node.finished", at: ctx.clock.now(), nodeId: name });
      }
      continue;
    }

    if (reply.data.applying) {
      result.push({
        name,
        initiatedAt: prior?.initiatedAt ?? reply.data.initiated_at,
        checks: 0,
      });
      continue;
    }

    if (prior && reply.data.lastrun >= prior.initiatedAt) {
      ctx.events.emit({
        type: "node.finished",
        at: ctx.clock.now(),
        nodeId: name,
        detail: { lastrun: reply.data.lastrun },
      });
      continue;
    }

    const decision = computeEvictionDecision({ previousChecks: prior?.checks });
    if (decision.evict) {
      ctx.log(`Host ${name} did not move into an applying state. Skipping.`);
      ctx.events.emit({
        type: "node.evicted",
        at: ctx.clock.now(),
        nodeId: name,
        detail: { checks: decision.checks },
      });
      continue;
    }

    result.push({
      name,
      initiatedAt: prior?.initiatedAt ?? reply.data.initiated_at,
      checks: decision.checks,
    });
  }

  return result;
}
