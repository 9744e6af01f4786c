import { Headers, Response, type RequestInit } from "undici";
import { vi } from "vitest";
import type { FetchFn } from "../src/adapters/bridge.js";
import type { BridgeConfig } from "../src/util/types.js";

export function makeConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    host: "192.168.1.50",
    token: "test-secret-token",
    timeoutMs: 1000,
    maxRetries: 3,
    retryDelayMs: 0,
    maxConcurrency: 4,
    ...overrides,
  };
}

export type BridgeRequest = {
  method: string;
  path: string;
  body: unknown;
  headers: Headers;
  init: RequestInit;
};

export function json(status: number, body?: unknown): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/** Never answers; rejects once the request's own timeout fires. */
export function hang(init: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason));
  });
}

export function fakeFetch(handler: (req: BridgeRequest) => Response | Promise<Response>) {
  return vi.fn<FetchFn>(async (url, init) => {
    const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : undefined;
    return handler({
      method: init.method ?? "GET",
      path: new URL(url).pathname,
      body,
      headers: new Headers(init.headers),
      init,
    });
  });
}

export async function rejection<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected ${type.name} rejection`);
}

export const FAN = {
  name: "Living Room Fan",
  type: "CF",
  location: "Living Room",
  template: "A1",
  actions: ["TurnOn", "TurnOff", "SetSpeed", "SetDirection"],
  max_speed: 6,
  _: "7fc1e84b",
};

export const SHADE = {
  name: "Bedroom Shade",
  type: "MS",
  actions: ["Open", "Close", "SetPosition"],
  _: "0a1b2c3d",
};
