import type { RunOnceArguments, RunnerConfiguration } from "../contracts.js";

/** Keys absent from the configuration stay absent so the agent's own defaults apply. */
export function runonceArguments(configuration: RunnerConfiguration): RunOnceArguments {
  const args: RunOnceArguments = {};

  if (configuration.force !== undefined) args.force = configuration.force;
  if (configuration.server !== undefined) args.server = configuration.server;
  if (configuration.noop !== undefined) args.noop = configuration.noop;
  if (configuration.environment !== undefined) args.environment = configuration.environment;
  if (configuration.splay !== undefined) args.splay = configuration.splay;
  if (configuration.splaylimit !== undefined) args.splaylimit = configuration.splaylimit;
  if (configuration.tag !== undefined) args.tags = configuration.tag.join(",");
  if (configuration.ignoreschedules !== undefined) {
    args.ignoreschedules = configuration.ignoreschedules;
  }

  return args;
}
