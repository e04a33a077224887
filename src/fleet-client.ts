import type {
  DiscoverOptions,
  FleetFilter,
  RunOnceArguments,
  RunOnceReply,
  StatusReply,
} from "./contracts.js";

export interface FleetClient {
  readonly filter: FleetFilter;
  /** Whether the client reports per-request progress. */
  progress: boolean;

  compoundFilter(predicate: string): void;
  identityFilter(name: string): void;
  discover(options?: DiscoverOptions): Promise<string[]>;
  runonce(args: RunOnceArguments): Promise<RunOnceReply[]>;
  status(): Promise<StatusReply[]>;
  /** Clears filters and any discovered node list. */
  reset(): void;
}

export function emptyFilter(): FleetFilter {
  return { identity: [], compound: [] };
}
