import { Command, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import type { Clock } from "./clock.js";
import { loadEnv, type FleetrunEnv } from "./config.js";
import type { RunnerConfiguration } from "./contracts.js";
import { ConfigurationError } from "./errors.js";
import type { FleetClient } from "./fleet-client.js";
import { HttpFleetClient } from "./fleet/http-client.js";
import { createLogger, isLogLevel } from "./logger.js";
import { RolloutRunner } from "./rollout-runner.js";
import { buildStatusServer } from "./status-server.js";

export interface CliDeps {
  env?: FleetrunEnv;
  logger?: Logger;
  clock?: Clock;
  createClient?: (env: FleetrunEnv, logger: Logger) => FleetClient;
}

interface RunallOptions {
  concurrency?: number;
  rerun?: number;
  force?: boolean;
  server?: string;
  noop?: boolean;
  environment?: string;
  splay?: boolean;
  splaylimit?: number;
  tag?: string[];
  ignoreschedules?: boolean;
  gateway?: string;
  statusPort?: number;
  logLevel?: string;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function collectTags(value: string, previous: string[] = []): string[] {
  const tags = value
    .split(",")
    .map((tag) => tag.trim())
    .filter(Boolean);
  return [...previous, ...tags];
}

export function toRunnerConfiguration(opts: RunallOptions): RunnerConfiguration {
  return {
    concurrency: opts.concurrency,
    force: opts.force,
    server: opts.server,
    noop: opts.noop,
    environment: opts.environment,
    splay: opts.splay,
    splaylimit: opts.splaylimit,
    tag: opts.tag,
    ignoreschedules: opts.ignoreschedules,
  };
}

async function runall(opts: RunallOptions, deps: CliDeps): Promise<void> {
  const baseEnv = deps.env ?? loadEnv();
  const env: FleetrunEnv = {
    ...baseEnv,
    gatewayUrl: opts.gateway ?? baseEnv.gatewayUrl,
    logLevel: opts.logLevel && isLogLevel(opts.logLevel) ? opts.logLevel : baseEnv.logLevel,
    statusPort: opts.statusPort ?? baseEnv.statusPort,
  };
  const logger = deps.logger ?? createLogger({ level: env.logLevel });
  const client = deps.createClient
    ? deps.createClient(env, logger)
    : new HttpFleetClient({
        baseUrl: env.gatewayUrl,
        token: env.gatewayToken,
        timeoutMs: env.requestTimeoutMs,
        logger,
      });

  let runner: RolloutRunner;
  try {
    runner = new RolloutRunner(client, toRunnerConfiguration(opts), { clock: deps.clock });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`fleetrun: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
  runner.logger((message) => logger.info(message));

  const server = env.statusPort !== undefined ? buildStatusServer(runner, { logger }) : null;
  if (server) await server.listen({ host: "0.0.0.0", port: env.statusPort });

  try {
    await runner.runall(opts.rerun !== undefined, opts.rerun ?? 0);
  } finally {
    await server?.close();
  }
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command();
  program.name("fleetrun").description("Roll agent runs across a fleet a few nodes at a time");

  program
    .command("runall")
    .description("Run the agent on every enabled node")
    .option("-c, --concurrency <count>", "nodes allowed to run at the same time", parseNumber)
    .option("--rerun <seconds>", "repeat passes forever, at most once per interval", parseNumber)
    .option("--force", "run without splay")
    .option("--server <host:port>", "configuration server to use")
    .option("--noop", "apply in noop mode")
    .option("--no-noop", "apply without noop mode")
    .option("--environment <name>", "environment to apply")
    .option("--splay", "sleep a random time before applying")
    .option("--no-splay", "apply without splay")
    .option("--splaylimit <seconds>", "upper bound of the splay", parseNumber)
    .option("-t, --tag <tags>", "restrict the run to tags, comma separated", collectTags)
    .option("--ignoreschedules", "ignore schedules on the nodes")
    .option("--gateway <url>", "fleet gateway base URL")
    .option("--status-port <port>", "serve rollout status on this port", parseNumber)
    .option("--log-level <level>", "log level")
    .action(async (opts: RunallOptions) => {
      await runall(opts, deps);
    });

  return program;
}
