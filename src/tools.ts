import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { BridgeClient } from "./adapters/bridge.js";
import { describeFailure, InvalidArgumentError } from "./util/errors.js";
import { silentLogger, type Logger } from "./util/logger.js";
import { isDevicePlaceholder } from "./util/types.js";

export type ToolSpec = {
  name: string;
  description: string;
  inputSchema: z.ZodRawShape;
  readOnly: boolean;
  run: (args: unknown) => Promise<unknown>;
};

function defineTool<S extends z.ZodRawShape>(
  name: string,
  description: string,
  inputSchema: S,
  run: (args: z.infer<z.ZodObject<S>>) => Promise<unknown>,
  readOnly = false,
): ToolSpec {
  const schema = z.object(inputSchema);
  return {
    name,
    description,
    inputSchema,
    readOnly,
    run: async (raw) => {
      const parsed = schema.safeParse(raw ?? {});
      if (!parsed.success) {
        const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`);
        throw new InvalidArgumentError(problems.join("; "));
      }
      return run(parsed.data);
    },
  };
}

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function successResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: toJsonText(data) }],
    structuredContent: { result: data },
  };
}

function errorResult(error: { kind: string; message: string }): CallToolResult {
  return {
    isError: true,
    content: [{ type: "text", text: toJsonText({ error }) }],
    structuredContent: { error },
  };
}

const deviceId = z.string().min(1, "must not be empty").describe("Bond device identifier, as returned by list_devices");

export type DispatcherOptions = {
  logger?: Logger;
};

/**
 * Named tools over a {@link BridgeClient}. Every call is independent; every
 * outcome, failures included, comes back as a CallToolResult.
 */
export class ToolDispatcher {
  readonly tools: ToolSpec[];
  private readonly byName: Map<string, ToolSpec>;
  private readonly logger: Logger;

  constructor(private readonly client: BridgeClient, options: DispatcherOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.tools = this.buildTools();
    this.byName = new Map(this.tools.map((t) => [t.name, t]));
  }

  async call(name: string, args: unknown): Promise<CallToolResult> {
    const tool = this.byName.get(name);
    if (!tool) return errorResult({ kind: "InvalidArgumentError", message: `Unknown tool: ${name}` });
    this.logger.debug({ tool: name }, "tool call");
    try {
      return successResult(await tool.run(args));
    } catch (err) {
      const error = describeFailure(err);
      if (error.kind === "InternalError") this.logger.error({ tool: name, err }, "unexpected tool failure");
      else this.logger.info({ tool: name, error }, "tool call failed");
      return errorResult(error);
    }
  }

  private buildTools(): ToolSpec[] {
    const client = this.client;
    return [
      defineTool(
        "list_devices",
        "List all devices paired with the Bond Bridge, with their type and supported actions.",
        {},
        async () => {
          const devices = await client.listDevices();
          return {
            devices,
            total_count: devices.length,
            failed_count: devices.filter(isDevicePlaceholder).length,
          };
        },
        true,
      ),

      defineTool(
        "get_device_info",
        "Get detailed information about one device: name, type, location and supported actions.",
        { device_id: deviceId },
        async ({ device_id }) => ({ device: await client.getDeviceInfo(device_id) }),
        true,
      ),

      defineTool(
        "get_device_state",
        "Get the current state of a device (power, speed, direction, position, brightness...).",
        { device_id: deviceId },
        async ({ device_id }) => {
          const { id, state } = await client.getDeviceState(device_id);
          return { device_id: id, state };
        },
        true,
      ),

      defineTool(
        "get_bridge_info",
        "Get Bond Bridge firmware and model information.",
        {},
        async () => ({
          bridge: await client.getBridgeInfo(),
          server_config: {
            host: client.config.host,
            timeout_ms: client.config.timeoutMs,
            max_retries: client.config.maxRetries,
          },
        }),
        true,
      ),

      defineTool(
        "toggle_device_power",
        "Toggle a device on or off based on its current power state.",
        { device_id: deviceId },
        async ({ device_id }) => {
          const { state } = await client.getDeviceState(device_id);
          if (state.power === 1) {
            await client.turnOff(device_id);
            return { device_id, action: "TurnOff", power: 0 };
          }
          await client.turnOn(device_id);
          return { device_id, action: "TurnOn", power: 1 };
        },
      ),

      defineTool(
        "send_custom_action",
        "Send any Bond action to a device (e.g. TurnOn, SetSpeed, IncreaseBrightness). Known actions are " +
          "validated locally; unrecognised ones are passed to the bridge as-is.",
        {
          device_id: deviceId,
          action: z.string().min(1, "must not be empty").describe("Bond action name, e.g. \"SetSpeed\""),
          argument: z.union([z.number(), z.string()]).optional().describe("Optional action argument"),
        },
        async ({ device_id, action, argument }) => {
          await client.executeAction(device_id, action, argument);
          return argument === undefined ? { device_id, action } : { device_id, action, argument };
        },
      ),

      defineTool(
        "set_fan_speed",
        "Set a ceiling fan's speed. 0 turns the fan off, 1-8 select a speed.",
        {
          device_id: deviceId,
          speed: z.number().describe("Fan speed, integer 0-8"),
        },
        async ({ device_id, speed }) => {
          const action = await client.setFanSpeed(device_id, speed);
          return { device_id, speed, action };
        },
      ),

      defineTool(
        "set_fan_direction",
        "Set a ceiling fan's rotation direction.",
        {
          device_id: deviceId,
          direction: z.string().describe("\"forward\" or \"reverse\""),
        },
        async ({ device_id, direction }) => ({
          device_id,
          direction: await client.setFanDirection(device_id, direction),
        }),
      ),

      defineTool(
        "control_shades",
        "Open, close or position motorized shades.",
        {
          device_id: deviceId,
          action: z.string().describe("\"open\", \"close\" or \"set_position\""),
          position: z.number().optional().describe("Position 0-100, required for set_position"),
        },
        async ({ device_id, action, position }) => {
          switch (action.trim().toLowerCase()) {
            case "open":
              await client.openShades(device_id);
              return { device_id, action: "open" };
            case "close":
              await client.closeShades(device_id);
              return { device_id, action: "close" };
            case "set_position":
              if (position === undefined) throw new InvalidArgumentError("position is required for set_position");
              await client.setShadePosition(device_id, position);
              return { device_id, action: "set_position", position };
            default:
              throw new InvalidArgumentError(`Action must be one of: open, close, set_position (got "${action}")`);
          }
        },
      ),

      defineTool(
        "set_light_brightness",
        "Set a dimmable light's brightness in percent.",
        {
          device_id: deviceId,
          brightness: z.number().describe("Brightness, integer 0-100"),
        },
        async ({ device_id, brightness }) => {
          await client.setBrightness(device_id, brightness);
          return { device_id, brightness };
        },
      ),
    ];
  }
}

/**
 * Shape handed to the SDK: same fields and descriptions, but every value is
 * accepted so presence and type failures reach the dispatcher and come back
 * as InvalidArgumentError instead of a protocol error.
 */
export function advertisedShape(shape: z.ZodRawShape): z.ZodRawShape {
  const out: z.ZodRawShape = {};
  for (const [key, field] of Object.entries(shape)) {
    const open: z.ZodTypeAny = field.isOptional() ? z.unknown().optional() : z.unknown();
    out[key] = field.description ? open.describe(field.description) : open;
  }
  return out;
}

export function registerTools(server: McpServer, dispatcher: ToolDispatcher): void {
  for (const tool of dispatcher.tools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: advertisedShape(tool.inputSchema),
        annotations: { readOnlyHint: tool.readOnly },
      },
      async (args) => dispatcher.call(tool.name, args),
    );
  }
}
