import { setTimeout as delay } from "node:timers/promises";
import { Agent, fetch, type RequestInit, type Response } from "undici";
import { z } from "zod";
import { applyRule, FAN_SPEED, resolveAction, toDirection } from "../util/actions.js";
import {
  ActionError,
  AuthError,
  BridgeHttpError,
  BridgeUnavailableError,
  ConnectionError,
  describeFailure,
  InvalidArgumentError,
  isTransient,
  NotFoundError,
  ProtocolError,
  type TransientError,
} from "../util/errors.js";
import { ConcurrencyLimiter } from "../util/limiter.js";
import { silentLogger, type Logger } from "../util/logger.js";
import type {
  ActionArgument,
  BridgeConfig,
  Device,
  DeviceKind,
  DeviceListEntry,
  DeviceState,
  FanDirection,
} from "../util/types.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type BridgeClientOptions = {
  logger?: Logger;
  /** Replaces the pooled undici fetch; tests hand in fakes here. */
  fetch?: FetchFn;
};

type HttpMethod = "GET" | "PUT";

const KIND_BY_TYPE: Record<string, DeviceKind> = {
  CF: "fan",
  MS: "shade",
  LT: "light",
  FP: "fireplace",
  GX: "generic",
};

const DeviceSchema = z
  .object({
    name: z.string().default(""),
    type: z.string().default("GX"),
    location: z.string().optional(),
    template: z.string().optional(),
    actions: z.array(z.string()).default([]),
  })
  .passthrough();

const DEVICE_FIELDS = new Set(["name", "type", "location", "template", "actions"]);

const JsonObject = z.record(z.unknown());

function withoutMetadata(raw: Record<string, unknown>, skip: Set<string> = new Set()): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (!k.startsWith("_") && !skip.has(k)) out[k] = v;
  }
  return out;
}

export function kindOf(type: string): DeviceKind {
  return KIND_BY_TYPE[type.toUpperCase()] ?? "generic";
}

function requireId(deviceId: string): string {
  const id = deviceId.trim();
  if (!id) throw new InvalidArgumentError("device_id must not be empty");
  return id;
}

/**
 * Client for the Bond Bridge Local API (v2).
 *
 * Every call goes through {@link BridgeClient.request}, which applies the
 * per-attempt timeout and the retry policy: network failures, timeouts,
 * HTTP 5xx and 429 are retried with a linearly growing delay; 401 and other
 * 4xx surface immediately.
 */
export class BridgeClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly agent?: Agent;
  private readonly send: FetchFn;

  constructor(readonly config: BridgeConfig, options: BridgeClientOptions = {}) {
    this.baseUrl = `http://${config.host}/v2`;
    this.logger = options.logger ?? silentLogger();
    if (options.fetch) {
      this.send = options.fetch;
    } else {
      const agent = new Agent({ connections: config.maxConcurrency, keepAliveTimeout: 10_000 });
      this.agent = agent;
      this.send = (url, init) => fetch(url, { ...init, dispatcher: agent });
    }
  }

  private headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      Authorization: `Bearer ${this.config.token}`,
      "BOND-Token": this.config.token,
    };
  }

  private async attempt(method: HttpMethod, path: string, payload?: unknown): Promise<unknown> {
    const signal = AbortSignal.timeout(this.config.timeoutMs);
    let res: Response;
    let text: string;
    try {
      res = await this.send(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers(),
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal,
      });
      text = await res.text();
    } catch (err) {
      if (signal.aborted) {
        throw new ConnectionError(`Bond request ${method} ${path} timed out after ${this.config.timeoutMs}ms`, true, {
          cause: err,
        });
      }
      const reason = err instanceof Error ? describeCause(err) : String(err);
      throw new ConnectionError(`Bond request ${method} ${path} failed: ${reason}`, false, { cause: err });
    }

    this.logger.debug({ method, path, status: res.status }, "bond response");
    if (res.status === 401) throw new AuthError();
    if (res.status === 404) throw new NotFoundError(`Bond resource not found: ${path}`);
    if (!res.ok) throw new BridgeHttpError(res.status, text, path);

    if (!text.trim()) return {};
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ProtocolError(`Non-JSON response from ${path}: ${text.slice(0, 200)}`, { cause: err });
    }
  }

  private async request(method: HttpMethod, path: string, payload?: unknown): Promise<unknown> {
    const attempts = this.config.maxRetries + 1;
    let last: TransientError | undefined;
    for (let n = 1; n <= attempts; n++) {
      try {
        this.logger.debug({ method, path, attempt: n }, "bond request");
        return await this.attempt(method, path, payload);
      } catch (err) {
        if (!isTransient(err)) throw err;
        last = err;
        this.logger.warn({ method, path, attempt: n, attempts, error: err.message }, "bond request failed");
        if (n < attempts) await delay(this.config.retryDelayMs * n);
      }
    }
    throw new BridgeUnavailableError(
      `Bond Bridge at ${this.config.host} unavailable after ${attempts} attempt(s): ${last?.message ?? "no response"}`,
      attempts,
      { cause: last },
    );
  }

  private async getObject(path: string): Promise<Record<string, unknown>> {
    const body = await this.request("GET", path);
    const parsed = JsonObject.safeParse(body);
    if (!parsed.success) throw new ProtocolError(`Expected a JSON object from ${path}`);
    return parsed.data;
  }

  async getBridgeInfo(): Promise<Record<string, unknown>> {
    return withoutMetadata(await this.getObject("/sys/version"));
  }

  async getDeviceInfo(deviceId: string): Promise<Device> {
    const id = requireId(deviceId);
    const path = `/devices/${encodeURIComponent(id)}`;
    const raw = await this.getObject(path);
    const parsed = DeviceSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError(`Unexpected device payload from ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    const d = parsed.data;
    const device: Device = {
      id,
      name: d.name,
      type: d.type,
      kind: kindOf(d.type),
      actions: d.actions,
      extra: withoutMetadata(raw, DEVICE_FIELDS),
    };
    if (d.location !== undefined) device.location = d.location;
    if (d.template !== undefined) device.template = d.template;
    return device;
  }

  async getDeviceState(deviceId: string): Promise<DeviceState> {
    const id = requireId(deviceId);
    const raw = await this.getObject(`/devices/${encodeURIComponent(id)}/state`);
    return { id, state: withoutMetadata(raw) };
  }

  /**
   * Lists every device with its details. Detail fetches run through a bounded
   * limiter; one that fails becomes a placeholder entry instead of failing the
   * listing.
   */
  async listDevices(): Promise<DeviceListEntry[]> {
    const ids = Object.keys(await this.getObject("/devices")).filter((k) => !k.startsWith("_"));
    const limiter = new ConcurrencyLimiter(this.config.maxConcurrency);
    return Promise.all(
      ids.map((id) =>
        limiter.run(async (): Promise<DeviceListEntry> => {
          try {
            return await this.getDeviceInfo(id);
          } catch (err) {
            const error = describeFailure(err);
            this.logger.warn({ deviceId: id, error }, "device detail fetch failed");
            return { id, error };
          }
        }),
      ),
    );
  }

  async executeAction(deviceId: string, action: string, argument?: ActionArgument): Promise<void> {
    const id = requireId(deviceId);
    const command = resolveAction(action, argument);
    const path = `/devices/${encodeURIComponent(id)}/actions/${encodeURIComponent(command.action)}`;
    const payload = command.argument === undefined ? {} : { argument: command.argument };
    // opaque actions were never checked locally
    const opaque = command.kind === "opaque";
    const label = opaque ? `unrecognised action ${command.action}` : command.action;
    this.logger.debug({ deviceId: id, action: command.action, kind: command.kind }, "bond action");
    try {
      await this.request("PUT", path, payload);
    } catch (err) {
      if (err instanceof BridgeHttpError) {
        throw new ActionError(`Bridge rejected ${label} on device ${id} (HTTP ${err.status})`, err.status, {
          cause: err,
        });
      }
      if (err instanceof NotFoundError) {
        const target = opaque ? label : `action ${label}`;
        throw new ActionError(`Device ${id} or ${target} not found (HTTP 404)`, 404, { cause: err });
      }
      throw err;
    }
  }

  async turnOn(deviceId: string): Promise<void> {
    await this.executeAction(deviceId, "TurnOn");
  }

  async turnOff(deviceId: string): Promise<void> {
    await this.executeAction(deviceId, "TurnOff");
  }

  /** Speed 0 turns the fan off; 1–8 set the speed. Returns the action sent. */
  async setFanSpeed(deviceId: string, speed: number): Promise<"TurnOff" | "SetSpeed"> {
    const value = applyRule("SetSpeed", FAN_SPEED, speed);
    if (value === 0) {
      await this.turnOff(deviceId);
      return "TurnOff";
    }
    await this.executeAction(deviceId, "SetSpeed", value);
    return "SetSpeed";
  }

  async setFanDirection(deviceId: string, direction: string): Promise<FanDirection> {
    const value = toDirection(direction);
    await this.executeAction(deviceId, "SetDirection", value);
    return value === 1 ? "forward" : "reverse";
  }

  async openShades(deviceId: string): Promise<void> {
    await this.executeAction(deviceId, "Open");
  }

  async closeShades(deviceId: string): Promise<void> {
    await this.executeAction(deviceId, "Close");
  }

  async setShadePosition(deviceId: string, position: number): Promise<void> {
    await this.executeAction(deviceId, "SetPosition", position);
  }

  async setBrightness(deviceId: string, brightness: number): Promise<void> {
    await this.executeAction(deviceId, "SetBrightness", brightness);
  }

  async close(): Promise<void> {
    await this.agent?.close();
  }
}

function describeCause(err: Error): string {
  // undici reports "fetch failed" and keeps the socket error (ECONNREFUSED, ECONNRESET, ...) as the cause
  const cause = err.cause;
  if (cause instanceof Error) return `${err.message} (${cause.message})`;
  return err.message;
}
