export interface RunnerConfiguration {
  concurrency?: number;
  force?: boolean;
  server?: string;
  noop?: boolean;
  environment?: string;
  splay?: boolean;
  splaylimit?: number;
  tag?: string[];
  ignoreschedules?: boolean;
}

/** Parameters of the agent's runonce action. Keys the configuration leaves out are omitted. */
export interface RunOnceArguments {
  force?: boolean;
  server?: string;
  noop?: boolean;
  environment?: string;
  splay?: boolean;
  splaylimit?: number;
  tags?: string;
  ignoreschedules?: boolean;
}

export interface FleetFilter {
  identity: string[];
  compound: string[];
}

export interface DiscoverOptions {
  nodes?: string[];
}

export interface RunOnceReply {
  sender: string;
  data: {
    summary: string;
    /** Older agents leave this out. Some report it as a numeric string. */
    initiated_at?: number | string;
  };
}

export interface StatusData {
  applying: boolean;
  lastrun: number;
  initiated_at: number;
}

export interface StatusReply {
  sender: string;
  data: StatusData;
}

export interface TrackedNode {
  name: string;
  initiatedAt: number;
  /** Consecutive polls without the node reporting an applying state. */
  checks: number;
}

export interface RolloutSnapshot {
  active: boolean;
  passes: number;
  queued: number;
  running: TrackedNode[];
}
