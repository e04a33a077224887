import type { Logger } from "pino";
import type {
  DiscoverOptions,
  FleetFilter,
  RunOnceArguments,
  RunOnceReply,
  StatusReply,
} from "../contracts.js";
import { FleetRequestError } from "../errors.js";
import { emptyFilter, type FleetClient } from "../fleet-client.js";

export interface HttpFleetClientOptions {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

function parseRunOnceReply(value: unknown): RunOnceReply | null {
  if (!isRecord(value) || typeof value.sender !== "string" || !isRecord(value.data)) return null;
  const summary = typeof value.data.summary === "string" ? value.data.summary : "";
  const initiatedAt = value.data.initiated_at;
  if (typeof initiatedAt === "number" || typeof initiatedAt === "string") {
    return { sender: value.sender, data: { summary, initiated_at: initiatedAt } };
  }
  return { sender: value.sender, data: { summary } };
}

function parseStatusReply(value: unknown): StatusReply | null {
  if (!isRecord(value) || typeof value.sender !== "string" || !isRecord(value.data)) return null;
  if (typeof value.data.applying !== "boolean") return null;
  return {
    sender: value.sender,
    data: {
      applying: value.data.applying,
      lastrun: toNumber(value.data.lastrun) ?? 0,
      initiated_at: toNumber(value.data.initiated_at) ?? 0,
    },
  };
}

function parseReplies<T>(body: unknown, parse: (value: unknown) => T | null): T[] {
  if (!isRecord(body) || !Array.isArray(body.replies)) return [];
  return body.replies.map(parse).filter((reply): reply is T => reply !== null);
}

/** Fleet client backed by a gateway that fans requests out to node agents. */
export class HttpFleetClient implements FleetClient {
  filter: FleetFilter = emptyFilter();
  progress = true;

  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private discovered: string[] | null = null;

  constructor(options: HttpFleetClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
  }

  compoundFilter(predicate: string): void {
    this.filter.compound.push(predicate);
  }

  identityFilter(name: string): void {
    this.filter.identity.push(name);
  }

  async discover(options: DiscoverOptions = {}): Promise<string[]> {
    if (options.nodes) {
      this.discovered = [...options.nodes];
      return [...options.nodes];
    }

    const body = await this.post("/v1/discover", { filter: this.filter });
    const nodes =
      isRecord(body) && Array.isArray(body.nodes)
        ? body.nodes.filter((node): node is string => typeof node === "string")
        : [];
    this.discovered = nodes;
    this.report(`discovered ${nodes.length} nodes`);
    return [...nodes];
  }

  async runonce(args: RunOnceArguments): Promise<RunOnceReply[]> {
    const nodes = await this.targets();
    const body = await this.post("/v1/agent/runonce", { nodes, arguments: args });
    const replies = parseReplies(body, parseRunOnceReply);
    this.report(`runonce: ${replies.length}/${nodes.length} replies`);
    return replies;
  }

  async status(): Promise<StatusReply[]> {
    const nodes = await this.targets();
    const body = await this.post("/v1/agent/status", { nodes });
    const replies = parseReplies(body, parseStatusReply);
    this.report(`status: ${replies.length}/${nodes.length} replies`);
    return replies;
  }

  reset(): void {
    this.filter = emptyFilter();
    this.discovered = null;
  }

  private async targets(): Promise<string[]> {
    return this.discovered ?? (await this.discover());
  }

  private report(message: string): void {
    if (this.progress) {
      this.logger?.info(message);
    } else {
      this.logger?.debug(message);
    }
  }

  private async post(path: string, payload: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...(this.token ? { authorization: `Bearer ${this.token}` } : {}),
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new FleetRequestError(
        `POST ${path} failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (!res.ok) {
      const text = await res.text();
      throw new FleetRequestError(`HTTP ${res.status} ${res.statusText}: ${text}`, res.status);
    }
    try {
      return await res.json();
    } catch (err) {
      throw new FleetRequestError(
        `POST ${path} returned a body that is not JSON: ${err instanceof Error ? err.message : String(err)}`,
        res.status
      );
    }
  }
}
