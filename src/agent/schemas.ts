import { z } from "zod";

export const AGENT_FUNCTIONS = ["ping", "snapshot", "set_interval", "screenshot", "execute"] as const;
export type AgentFunction = (typeof AGENT_FUNCTIONS)[number];

const DIRECTIONS = [
  "north", "northeast", "east", "southeast", "south", "southwest", "west", "northwest",
] as const;

const PositionSchema = z.object({ x: z.number(), y: z.number() });

const PointSchema = z.tuple([z.number(), z.number()]);
const AreaSchema = z.tuple([PointSchema, PointSchema]);

const DirectionSchema = z.union([z.enum(DIRECTIONS), z.number().int().min(0)]);

const PlayerTarget = { player_index: z.number().int().positive().optional() };

// Arguments

export const SnapshotArgsSchema = z.object({
  radius: z.number().positive().optional(),
  ...PlayerTarget,
});

export const SetIntervalArgsSchema = z.object({
  ticks: z.number().int().min(0),
});

export const ScreenshotArgsSchema = z.object({
  res: z.object({ x: z.number().int().positive(), y: z.number().int().positive() }).optional(),
  zoom: z.number().positive().optional(),
  gui: z.boolean().optional(),
  ...PlayerTarget,
});

const PlaceEntityOpSchema = z.object({
  kind: z.literal("place_entity"),
  name: z.string().min(1),
  position: PositionSchema,
  direction: DirectionSchema.optional(),
  ghost: z.boolean().optional(),
});

const SetRecipeOpSchema = z.object({
  kind: z.literal("set_recipe"),
  name: z.string().min(1),
  position: PositionSchema,
});

const DeconstructAreaOpSchema = z.object({
  kind: z.literal("deconstruct_area"),
  area: AreaSchema,
});

export const OpSchema = z.discriminatedUnion("kind", [
  PlaceEntityOpSchema,
  SetRecipeOpSchema,
  DeconstructAreaOpSchema,
]);
export type Op = z.infer<typeof OpSchema>;

export const ExecuteArgsSchema = z.object({
  ops: z.array(OpSchema).min(1, "provide at least one op"),
  ...PlayerTarget,
});

export type SnapshotArgs = z.infer<typeof SnapshotArgsSchema>;
export type SetIntervalArgs = z.infer<typeof SetIntervalArgsSchema>;
export type ScreenshotArgs = z.infer<typeof ScreenshotArgsSchema>;
export type ExecuteArgs = z.infer<typeof ExecuteArgsSchema>;

// Results

export const FailureSchema = z.object({
  ok: z.literal(false),
  err: z.string(),
  index: z.number().int().optional(),
});

export const PingResultSchema = z.object({ ok: z.literal(true), tick: z.number().int() });
export const SnapshotResultSchema = z.object({ ok: z.literal(true), count: z.number().int(), tick: z.number().int() });
export const SetIntervalResultSchema = z.object({ ok: z.literal(true), interval: z.number().int() });
export const ScreenshotResultSchema = z.object({ ok: z.literal(true), path: z.string(), tick: z.number().int() });
export const ExecuteResultSchema = z.object({
  ok: z.literal(true),
  applied: z.object({
    created: z.number().int(),
    recipes: z.number().int(),
    deconstruct: z.number().int(),
  }),
});

export type PingResult = z.infer<typeof PingResultSchema>;
export type SnapshotResult = z.infer<typeof SnapshotResultSchema>;
export type SetIntervalResult = z.infer<typeof SetIntervalResultSchema>;
export type ScreenshotResult = z.infer<typeof ScreenshotResultSchema>;
export type ExecuteResult = z.infer<typeof ExecuteResultSchema>;

// Snapshot document written to script-output/agent/snapshots/<tick>.json

// table_to_json renders an empty Lua table as {}.
const EmptyTable = z.object({}).strict().transform(() => []);

const SnapshotEntitySchema = z.object({
  name: z.string(),
  type: z.string(),
  position: PositionSchema,
  direction: z.number().optional(),
  force: z.string().optional(),
});

export const SnapshotDocumentSchema = z.object({
  tick: z.number().int(),
  player: z.object({
    position: PositionSchema,
    surface: z.string(),
    force: z.string(),
  }),
  window: z.object({
    center: PositionSchema,
    radius: z.number(),
  }),
  entities: z.union([z.array(SnapshotEntitySchema), EmptyTable]),
});
export type SnapshotDocument = z.infer<typeof SnapshotDocumentSchema>;
