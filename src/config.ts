import { z } from "zod";
import type { RCONConfig } from "./rcon/types";

export type { RCONConfig };

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

// Factorio 1.1 exposes table_to_json on `game`; 2.x moved it to `helpers`.
export type JsonHelper = "game" | "helpers";

export interface AgentConfig {
  interfaceName: string;
  jsonHelper: JsonHelper;
  scriptOutput: string;
  commandTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

const portSchema = z.coerce.number().int();
const timeoutSchema = z.coerce.number().int().positive();
const helperSchema = z.enum(["game", "helpers"]);
const identifierSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, "expected an interface name");

function read<T>(env: Env, variable: string, schema: z.ZodType<T>, fallback: string): T {
  const raw = env[variable] || fallback;
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(variable, `${issue?.message ?? "invalid value"} (got "${raw}")`);
  }
  return result.data;
}

export function getRCONConfig(env: Env = process.env): RCONConfig {
  return {
    host: env.FACTORIO_HOST || "127.0.0.1",
    port: read(env, "FACTORIO_RCON_PORT", portSchema, "34198"),
    password: env.FACTORIO_RCON_PASSWORD || "factorio",
  };
}

export function getAgentConfig(env: Env = process.env): AgentConfig {
  return {
    interfaceName: read(env, "FACTORIO_AGENT_INTERFACE", identifierSchema, "agent"),
    jsonHelper: read(env, "FACTORIO_JSON_HELPER", helperSchema, "game"),
    scriptOutput: env.FACTORIO_SCRIPT_OUTPUT || "./script-output",
    commandTimeoutMs: read(env, "FACTORIO_COMMAND_TIMEOUT_MS", timeoutSchema, "5000"),
  };
}

export function validateRCONConfig(config: RCONConfig): void {
  if (!config.host) {
    throw new Error("RCON host cannot be empty");
  }
  if (config.port <= 0 || config.port > 65535) {
    throw new Error(`Invalid RCON port: ${config.port}`);
  }
  if (!config.password) {
    throw new Error("RCON password cannot be empty");
  }
}
