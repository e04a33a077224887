import type { FastifyInstance } from "fastify";

export type RolloutEventType =
  | "pass.started"
  | "pass.finished"
  | "node.dispatched"
  | "node.finished"
  | "node.evicted";

export interface RolloutEvent {
  type: RolloutEventType;
  at: number;
  nodeId?: string;
  detail?: Record<string, unknown>;
}

export interface RolloutEventContext {
  emit(event: RolloutEvent): void;
}

export interface RolloutPlugin {
  name: string;
  register(app: FastifyInstance, ctx: RolloutEventContext): Promise<void> | void;
}
