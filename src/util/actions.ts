import { InvalidArgumentError } from "./errors.js";
import type { ActionArgument } from "./types.js";

export type ArgumentRule =
  | { type: "none" }
  | { type: "integer"; label: string; min: number; max: number }
  | { type: "direction" };

const NO_ARGUMENT: ArgumentRule = { type: "none" };

export const FAN_SPEED: ArgumentRule = { type: "integer", label: "Fan speed", min: 0, max: 8 };
export const PERCENT_POSITION: ArgumentRule = { type: "integer", label: "Position", min: 0, max: 100 };
export const PERCENT_BRIGHTNESS: ArgumentRule = { type: "integer", label: "Brightness", min: 0, max: 100 };

const KNOWN_ACTIONS = [
  "TurnOn",
  "TurnOff",
  "TogglePower",
  "TurnLightOn",
  "TurnLightOff",
  "ToggleLight",
  "Open",
  "Close",
  "Stop",
  "Hold",
  "SetSpeed",
  "SetDirection",
  "SetPosition",
  "SetBrightness",
] as const;

export type KnownAction = (typeof KNOWN_ACTIONS)[number];

const ACTION_RULES: Record<KnownAction, ArgumentRule> = {
  TurnOn: NO_ARGUMENT,
  TurnOff: NO_ARGUMENT,
  TogglePower: NO_ARGUMENT,
  TurnLightOn: NO_ARGUMENT,
  TurnLightOff: NO_ARGUMENT,
  ToggleLight: NO_ARGUMENT,
  Open: NO_ARGUMENT,
  Close: NO_ARGUMENT,
  Stop: NO_ARGUMENT,
  Hold: NO_ARGUMENT,
  SetSpeed: FAN_SPEED,
  SetDirection: { type: "direction" },
  SetPosition: PERCENT_POSITION,
  SetBrightness: PERCENT_BRIGHTNESS,
};

/**
 * An action ready to send. `known` actions have passed their argument rule;
 * `opaque` actions are forwarded untouched and the bridge decides.
 */
export type ActionCommand =
  | { kind: "known"; action: KnownAction; argument?: number }
  | { kind: "opaque"; action: string; argument?: ActionArgument };

const KNOWN_BY_LOWER = new Map<string, KnownAction>(
  KNOWN_ACTIONS.map((name): [string, KnownAction] => [name.toLowerCase(), name]),
);

export function lookupAction(action: string): KnownAction | undefined {
  return KNOWN_BY_LOWER.get(action.trim().toLowerCase());
}

export function resolveAction(action: string, argument?: ActionArgument): ActionCommand {
  const name = action.trim();
  if (!name) throw new InvalidArgumentError("Action name must not be empty");

  const known = lookupAction(name);
  if (!known) {
    return argument === undefined ? { kind: "opaque", action: name } : { kind: "opaque", action: name, argument };
  }

  const value = applyRule(known, ACTION_RULES[known], argument);
  return value === undefined ? { kind: "known", action: known } : { kind: "known", action: known, argument: value };
}

export function applyRule(action: string, rule: ArgumentRule, argument?: ActionArgument): number | undefined {
  switch (rule.type) {
    case "none":
      if (argument !== undefined) throw new InvalidArgumentError(`${action} does not take an argument`);
      return undefined;
    case "integer": {
      const n = toInteger(argument);
      if (n === undefined || n < rule.min || n > rule.max) {
        throw new InvalidArgumentError(
          `${rule.label} must be an integer between ${rule.min} and ${rule.max}, got ${describe(argument)}`,
        );
      }
      return n;
    }
    case "direction":
      return toDirection(argument);
  }
}

export function toDirection(argument?: ActionArgument): 1 | -1 {
  if (argument === 1 || argument === -1) return argument;
  if (typeof argument === "string") {
    const d = argument.trim().toLowerCase();
    if (d === "forward" || d === "1") return 1;
    if (d === "reverse" || d === "-1") return -1;
  }
  throw new InvalidArgumentError(`Direction must be 'forward' or 'reverse', got ${describe(argument)}`);
}

function toInteger(argument?: ActionArgument): number | undefined {
  if (typeof argument === "number") return Number.isInteger(argument) ? argument : undefined;
  if (typeof argument === "string" && /^\s*-?\d+\s*$/.test(argument)) return Number(argument);
  return undefined;
}

function describe(argument?: ActionArgument): string {
  return argument === undefined ? "nothing" : JSON.stringify(argument);
}
