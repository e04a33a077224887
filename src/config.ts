import { isLogLevel, type LogLevel } from "./logger.js";

export interface FleetrunEnv {
  gatewayUrl: string;
  gatewayToken?: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  statusPort?: number;
}

const DEFAULT_GATEWAY_URL = "http://localhost:8788";
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

function positiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): FleetrunEnv {
  const logLevel = env.FLEETRUN_LOG_LEVEL?.trim().toLowerCase() ?? "info";

  return {
    gatewayUrl: env.FLEETRUN_GATEWAY_URL?.trim() || DEFAULT_GATEWAY_URL,
    gatewayToken: env.FLEETRUN_GATEWAY_TOKEN?.trim() || undefined,
    requestTimeoutMs: positiveInt(env.FLEETRUN_REQUEST_TIMEOUT_MS) ?? DEFAULT_REQUEST_TIMEOUT_MS,
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    statusPort: positiveInt(env.FLEETRUN_STATUS_PORT),
  };
}
