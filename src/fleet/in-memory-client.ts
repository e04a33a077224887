import type {
  DiscoverOptions,
  FleetFilter,
  RunOnceArguments,
  RunOnceReply,
  StatusData,
  StatusReply,
} from "../contracts.js";
import { emptyFilter, type FleetClient } from "../fleet-client.js";

export interface SimulatedNode {
  name: string;
  enabled?: boolean;
  /** Returned from runonce. Leave unset to behave like an agent that predates start times. */
  initiatedAt?: number | string;
  /** One entry is consumed per status request; the last one repeats. Empty means no reply. */
  statuses?: StatusData[];
}

export type FleetCall =
  | { op: "discover"; nodes: string[] }
  | { op: "runonce"; nodes: string[]; args: RunOnceArguments }
  | { op: "status"; nodes: string[] }
  | { op: "reset" };

const ENABLED_PREDICATE = /^\w+\(\)\.enabled=(true|false)$/;

/** A fleet that lives in process. Only understands `<agent>().enabled=<bool>` predicates. */
export class InMemoryFleetClient implements FleetClient {
  filter: FleetFilter = emptyFilter();
  progress = true;
  readonly calls: FleetCall[] = [];

  private readonly nodes = new Map<string, SimulatedNode>();
  private readonly statusCursor = new Map<string, number>();
  private discovered: string[] | null = null;

  constructor(nodes: SimulatedNode[] = []) {
    for (const node of nodes) this.nodes.set(node.name, node);
  }

  compoundFilter(predicate: string): void {
    if (!ENABLED_PREDICATE.test(predicate)) {
      throw new Error(`unsupported_predicate:${predicate}`);
    }
    this.filter.compound.push(predicate);
  }

  identityFilter(name: string): void {
    this.filter.identity.push(name);
  }

  async discover(options: DiscoverOptions = {}): Promise<string[]> {
    const names = options.nodes
      ? options.nodes.filter((name) => this.nodes.has(name))
      : this.matchFilter();
    this.discovered = names;
    this.calls.push({ op: "discover", nodes: [...names] });
    return [...names];
  }

  async runonce(args: RunOnceArguments): Promise<RunOnceReply[]> {
    const targets = this.targets();
    this.calls.push({ op: "runonce", nodes: [...targets], args: { ...args } });

    return targets.map((name) => {
      const node = this.nodes.get(name);
      const summary = "Started a run";
      return node?.initiatedAt === undefined
        ? { sender: name, data: { summary } }
        : { sender: name, data: { summary, initiated_at: node.initiatedAt } };
    });
  }

  async status(): Promise<StatusReply[]> {
    const targets = this.targets();
    this.calls.push({ op: "status", nodes: [...targets] });

    const replies: StatusReply[] = [];
    for (const name of targets) {
      const data = this.nextStatus(name);
      if (data) replies.push({ sender: name, data: { ...data } });
    }
    return replies;
  }

  reset(): void {
    this.filter = emptyFilter();
    this.discovered = null;
    this.calls.push({ op: "reset" });
  }

  /** Calls of one kind, in the order they were made. */
  callsOf<T extends FleetCall["op"]>(op: T): Extract<FleetCall, { op: T }>[] {
    return this.calls.filter((call): call is Extract<FleetCall, { op: T }> => call.op === op);
  }

  private targets(): string[] {
    return this.discovered ?? this.matchFilter();
  }

  private matchFilter(): string[] {
    return [...this.nodes.values()]
      .filter((node) => {
        if (this.filter.identity.length > 0 && !this.filter.identity.includes(node.name)) {
          return false;
        }
        return this.filter.compound.every((predicate) => {
          const wanted = predicate.endsWith("=true");
          return (node.enabled ?? true) === wanted;
        });
      })
      .map((node) => node.name);
  }

  private nextStatus(name: string): StatusData | undefined {
    const statuses = this.nodes.get(name)?.statuses ?? [];
    if (statuses.length === 0) return undefined;

    const cursor = this.statusCursor.get(name) ?? 0;
    this.statusCursor.set(name, cursor + 1);
    return statuses[Math.min(cursor, statuses.length - 1)];
  }
}
