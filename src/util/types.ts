import type { FailureKind } from "./errors.js";

export type BridgeConfig = {
  readonly host: string; // bare host or IP, e.g. "192.168.1.50"
  readonly token: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly maxConcurrency: number; // detail fetches in flight during listing
};

export type DeviceKind = "fan" | "shade" | "light" | "fireplace" | "generic";

export type Device = {
  id: string;
  name: string;
  type: string; // bridge type code, e.g. "CF", "MS", "LT"
  kind: DeviceKind;
  location?: string;
  template?: string;
  actions: string[]; // e.g., ["TurnOn", "TurnOff", "SetSpeed"]
  extra: Record<string, unknown>;
};

export type DeviceState = {
  id: string;
  state: Record<string, unknown>; // power, speed, direction, position, brightness, ...
};

export type DevicePlaceholder = {
  id: string;
  error: { kind: FailureKind; message: string };
};

export type DeviceListEntry = Device | DevicePlaceholder;

export function isDevicePlaceholder(entry: DeviceListEntry): entry is DevicePlaceholder {
  return "error" in entry;
}

export type ActionArgument = number | string;

export type FanDirection = "forward" | "reverse";
