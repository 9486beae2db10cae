import { z } from "zod";
import type { AgentClient } from "../agent/remote";
import { OpSchema } from "../agent/schemas";
import { latestSnapshot, screenshotPath, snapshotDir, summarizeSnapshot } from "../agent/snapshots";

export interface ToolContext {
  agent: Pick<AgentClient, "ping" | "snapshot" | "setInterval" | "screenshot" | "execute" | "hasInterface">;
  scriptOutput: string;
}

type ParamSpec = { type: "number" | "string" | "boolean"; desc?: string; required?: boolean };

export interface ToolSpec {
  desc: string;
  params: Record<string, ParamSpec>;
  call(args: unknown, ctx: ToolContext): Promise<unknown>;
}

function defineTool<S extends z.ZodTypeAny>(spec: {
  desc: string;
  params: Record<string, ParamSpec>;
  input: S;
  run: (args: z.infer<S>, ctx: ToolContext) => Promise<unknown>;
}): ToolSpec {
  return {
    desc: spec.desc,
    params: spec.params,
    call: async (args, ctx) => {
      const parsed = spec.input.safeParse(args ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue?.path.join(".");
        throw new Error(`Invalid arguments${where ? ` at ${where}` : ""}: ${issue?.message ?? "invalid value"}`);
      }
      return spec.run(parsed.data, ctx);
    },
  };
}

// Ops arrive as a JSON string from most MCP clients; accept a raw array too.
const OpsParam = z
  .union([z.string(), z.array(z.unknown())])
  .transform((value, ctx) => {
    if (typeof value !== "string") return value;
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "ops must be a JSON array" });
      return z.NEVER;
    }
  })
  .pipe(z.array(OpSchema).min(1, "provide at least one op"));

// Single source of truth for all MCP tools
export const TOOLS: Record<string, ToolSpec> = {
  agent_status: defineTool({
    desc: "Check that the agent interface is loaded and return the current game tick",
    params: {},
    input: z.object({}),
    run: async (_args, { agent }) => {
      if (!(await agent.hasInterface())) {
        return { loaded: false };
      }
      const { tick } = await agent.ping();
      return { loaded: true, tick };
    },
  }),
  agent_ping: defineTool({
    desc: "Ping the agent mod; prints a pong in game chat and returns the tick",
    params: {},
    input: z.object({}),
    run: (_args, { agent }) => agent.ping(),
  }),
  agent_snapshot: defineTool({
    desc: "Write a snapshot of entities around the player to script-output/agent/snapshots/<tick>.json",
    params: {
      radius: { type: "number", desc: "Half-width of the square window in tiles (default 64)" },
      playerIndex: { type: "number", desc: "Optional: player to centre on (default: first connected)" },
    },
    input: z.object({ radius: z.number().positive().optional(), playerIndex: z.number().int().positive().optional() }),
    run: ({ radius, playerIndex }, { agent }) => agent.snapshot({ radius, player_index: playerIndex }),
  }),
  agent_set_interval: defineTool({
    desc: "Set how often (in ticks) periodic snapshots are written; 0 disables them",
    params: { ticks: { type: "number", desc: "Interval in ticks (60 ticks = 1s)", required: true } },
    input: z.object({ ticks: z.number().int().min(0) }),
    run: ({ ticks }, { agent }) => agent.setInterval({ ticks }),
  }),
  agent_screenshot: defineTool({
    desc: "Take a screenshot around the player; returns the path under script-output and the local file",
    params: {
      width: { type: "number", desc: "Width in pixels (default 1280)" },
      height: { type: "number", desc: "Height in pixels (default 720)" },
      zoom: { type: "number", desc: "Zoom level (default 1)" },
      gui: { type: "boolean", desc: "Include the GUI (default false)" },
    },
    input: z
      .object({
        width: z.number().int().positive().optional(),
        height: z.number().int().positive().optional(),
        zoom: z.number().positive().optional(),
        gui: z.boolean().optional(),
      })
      .refine((a) => (a.width === undefined) === (a.height === undefined), "width and height go together"),
    run: async ({ width, height, zoom, gui }, { agent, scriptOutput }) => {
      const result = await agent.screenshot({
        res: width !== undefined && height !== undefined ? { x: width, y: height } : undefined,
        zoom,
        gui,
      });
      return { ...result, file: screenshotPath(scriptOutput, result.path) };
    },
  }),
  agent_execute: defineTool({
    desc:
      "Apply world edits in order, rolling everything back if one fails. Ops: " +
      "{kind:'place_entity',name,position:{x,y},direction?,ghost?}, " +
      "{kind:'set_recipe',name,position:{x,y}}, " +
      "{kind:'deconstruct_area',area:[[x1,y1],[x2,y2]]}",
    params: { ops: { type: "string", desc: "JSON array of ops", required: true } },
    input: z.object({ ops: OpsParam }),
    run: ({ ops }, { agent }) => agent.execute({ ops }),
  }),
  snapshot_latest: defineTool({
    desc: "Summarize the newest snapshot file on disk (entity counts by name)",
    params: {},
    input: z.object({}),
    run: async (_args, { scriptOutput }) => {
      const dir = snapshotDir(scriptOutput);
      const doc = await latestSnapshot(dir);
      if (!doc) {
        throw new Error(`No snapshots found in ${dir}`);
      }
      return { ...summarizeSnapshot(doc), player: doc.player };
    },
  }),
};

// Generate MCP tool schemas from TOOLS
export function generateToolSchemas() {
  return Object.entries(TOOLS).map(([name, tool]) => ({
    name,
    description: tool.desc,
    inputSchema: {
      type: "object" as const,
      properties: Object.fromEntries(
        Object.entries(tool.params).map(([pName, p]) => [pName, { type: p.type, description: p.desc }])
      ),
      required: Object.entries(tool.params)
        .filter(([, p]) => p.required)
        .map(([pName]) => pName),
    },
  }));
}
