import type { z } from "zod";
import type { RCONClient } from "../rcon/client";
import type { JsonHelper } from "../config";
import { AgentCallError, AgentProtocolError, AgentTransportError } from "./errors";
import { type LuaValue, luaExpr, luaString, toLua } from "./lua";
import {
  type AgentFunction,
  type ExecuteArgs,
  ExecuteArgsSchema,
  type ExecuteResult,
  ExecuteResultSchema,
  FailureSchema,
  type Op,
  type PingResult,
  PingResultSchema,
  type ScreenshotArgs,
  ScreenshotArgsSchema,
  type ScreenshotResult,
  ScreenshotResultSchema,
  type SetIntervalArgs,
  SetIntervalArgsSchema,
  type SetIntervalResult,
  SetIntervalResultSchema,
  type SnapshotArgs,
  SnapshotArgsSchema,
  type SnapshotResult,
  SnapshotResultSchema,
} from "./schemas";

export type CommandTransport = Pick<RCONClient, "sendCommand">;

export interface AgentClientOptions {
  interfaceName?: string;
  jsonHelper?: JsonHelper;
  timeoutMs?: number;
}

/**
 * Calls the agent mod's remote interface over RCON.
 *
 * Each call is wrapped in `rcon.print(<helper>.table_to_json(...))` so the
 * returned Lua table comes back as one line of JSON.
 */
export class AgentClient {
  readonly interfaceName: string;
  private readonly jsonHelper: JsonHelper;
  private readonly timeoutMs?: number;

  constructor(private readonly rcon: CommandTransport, options: AgentClientOptions = {}) {
    this.interfaceName = options.interfaceName ?? "agent";
    this.jsonHelper = options.jsonHelper ?? "game";
    this.timeoutMs = options.timeoutMs;
  }

  buildRemoteCall(fn: AgentFunction, args?: LuaValue): string {
    const target = [luaString(this.interfaceName), luaString(fn)];
    if (args !== undefined) target.push(toLua(args));
    return `/silent-command rcon.print(${this.jsonHelper}.table_to_json(remote.call(${target.join(", ")})))`;
  }

  async hasInterface(): Promise<boolean> {
    const command = `/silent-command rcon.print(remote.interfaces[${luaString(this.interfaceName)}] and "true" or "false")`;
    const response = await this.rcon.sendCommand(command, this.timeoutMs);
    if (!response.success) {
      throw new AgentTransportError("interfaces", response.error ?? "command failed");
    }
    return response.data.trim() === "true";
  }

  async ping(): Promise<PingResult> {
    return this.call("ping", undefined, PingResultSchema);
  }

  async snapshot(args: SnapshotArgs = {}): Promise<SnapshotResult> {
    return this.call("snapshot", SnapshotArgsSchema.parse(args), SnapshotResultSchema);
  }

  async setInterval(args: SetIntervalArgs): Promise<SetIntervalResult> {
    return this.call("set_interval", SetIntervalArgsSchema.parse(args), SetIntervalResultSchema);
  }

  async screenshot(args: ScreenshotArgs = {}): Promise<ScreenshotResult> {
    return this.call("screenshot", ScreenshotArgsSchema.parse(args), ScreenshotResultSchema);
  }

  async execute(args: ExecuteArgs): Promise<ExecuteResult> {
    const { ops, player_index } = ExecuteArgsSchema.parse(args);
    return this.call("execute", { ops: ops.map(opToLua), player_index }, ExecuteResultSchema);
  }

  private async call<T>(fn: AgentFunction, args: LuaValue, schema: z.ZodType<T>): Promise<T> {
    const response = await this.rcon.sendCommand(this.buildRemoteCall(fn, args), this.timeoutMs);
    if (!response.success) {
      throw new AgentTransportError(fn, response.error ?? "command failed");
    }
    return parseReply(fn, response.data, schema);
  }
}

function opToLua(op: Op): LuaValue {
  if (op.kind === "place_entity" && typeof op.direction === "string") {
    return { ...op, direction: luaExpr(`defines.direction.${op.direction}`) };
  }
  return op;
}

export function parseReply<T>(fn: string, raw: string, schema: z.ZodType<T>): T {
  // Anything printed before the JSON line (e.g. a mod's own rcon.print) is ignored.
  const line = raw.split("\n").map((l) => l.trim()).filter(Boolean).pop();
  if (!line) {
    throw new AgentProtocolError(fn, "empty reply; is the agent mod loaded?", raw);
  }

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    throw new AgentProtocolError(fn, `not a JSON reply: ${line}`, raw);
  }

  const failure = FailureSchema.safeParse(value);
  if (failure.success) {
    throw new AgentCallError(fn, failure.data.err, failure.data.index);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join(".") || "reply";
    throw new AgentProtocolError(fn, `unexpected reply shape at ${where}: ${issue?.message ?? "invalid"}`, raw);
  }
  return result.data;
}
