export * from "./contracts.js";
export { ConfigurationError, FleetRequestError } from "./errors.js";
export { systemClock, type Clock } from "./clock.js";
export { emptyFilter, type FleetClient } from "./fleet-client.js";
export { HttpFleetClient, type HttpFleetClientOptions } from "./fleet/http-client.js";
export { InMemoryFleetClient, type SimulatedNode, type FleetCall } from "./fleet/in-memory-client.js";
export { MAX_APPLYING_CHECKS, computeEvictionDecision } from "./control/eviction-policy.js";
export { findApplyingNodes, type ApplyingTrackerContext } from "./control/applying-tracker.js";
export { runonceArguments } from "./control/run-arguments.js";
export {
  RolloutRunner,
  ENABLED_PREDICATE,
  type LogSink,
  type RolloutRunnerOptions,
} from "./rollout-runner.js";
export { buildStatusServer } from "./status-server.js";
export { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";
export type { RolloutEvent, RolloutEventContext, RolloutPlugin } from "./plugins/types.js";
export { createLogger, type LogLevel } from "./logger.js";
export { loadEnv, type FleetrunEnv } from "./config.js";
