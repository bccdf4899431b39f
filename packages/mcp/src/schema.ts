import { EASING_KINDS } from "@tilecam/engine";
import { z } from "zod";

export const JsonValueSchema: z.ZodType<unknown> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

const PointSchema = z.tuple([z.number().finite(), z.number().finite()]);

export const TcPingInputSchema = z.object({
  nonce: z.string().optional(),
});

export const TcLevelLoadInputSchema = z.object({
  path: z.string().min(1).optional(),
  text: z.string().min(1).optional(),
});

export const TcLevelSaveInputSchema = z.object({
  path: z.string().min(1).optional(),
});

export const TcLevelSummaryInputSchema = z.object({});
export const TcTrackListInputSchema = z.object({});

export const TcTrackStateAtInputSchema = z.object({
  time: z.number().finite(),
});

export const TcTrackExecuteInputSchema = z.object({
  action: z.string().min(1),
  input: JsonValueSchema.optional(),
});

export const TcEasingListInputSchema = z.object({});

export const TcEasingSampleInputSchema = z.object({
  ease: z.enum(EASING_KINDS),
  count: z.number().int().min(2).max(10_000).optional(),
  params: z
    .object({
      elastic: z.object({ oscillations: z.number(), decay: z.number() }).partial().optional(),
      back: z.object({ overshoot: z.number() }).partial().optional(),
      bounce: z.object({ n1: z.number(), d1: z.number() }).partial().optional(),
      bezier: z.object({ p1: PointSchema, p2: PointSchema }).partial().optional(),
    })
    .optional(),
});

export const ToolSchemas = {
  "tc.ping": TcPingInputSchema,
  "tc.level.load": TcLevelLoadInputSchema,
  "tc.level.save": TcLevelSaveInputSchema,
  "tc.level.summary": TcLevelSummaryInputSchema,
  "tc.track.list": TcTrackListInputSchema,
  "tc.track.stateAt": TcTrackStateAtInputSchema,
  "tc.track.execute": TcTrackExecuteInputSchema,
  "tc.easing.list": TcEasingListInputSchema,
  "tc.easing.sample": TcEasingSampleInputSchema,
} as const;

export const ToolDefinitions = [
  {
    name: "tc.ping",
    description: "Health check.",
    input: TcPingInputSchema,
    output: "{ ok, version, commit, nonce }",
  },
  {
    name: "tc.level.load",
    description: "Load a level from a file path or from raw level text.",
    input: TcLevelLoadInputSchema,
    output: "{ ok, summary, events }",
  },
  {
    name: "tc.level.save",
    description: "Write the level with the edited camera track; defaults to the loaded file.",
    input: TcLevelSaveInputSchema,
    output: "{ ok, path, bytes, events }",
  },
  {
    name: "tc.level.summary",
    description: "Floors, BPM, duration, camera event count and tile bounds of the loaded level.",
    input: TcLevelSummaryInputSchema,
    output: "{ ok, summary, sourcePath, dirty }",
  },
  {
    name: "tc.track.list",
    description: "Camera keyframes in time order with the current selection.",
    input: TcTrackListInputSchema,
    output: "{ ok, keyframes, selectedId, selectedIndex }",
  },
  {
    name: "tc.track.stateAt",
    description: "Interpolated camera state at a time in milliseconds.",
    input: TcTrackStateAtInputSchema,
    output: "{ ok, time, state }",
  },
  {
    name: "tc.track.execute",
    description: "Run a keyframe or selection command.",
    input: TcTrackExecuteInputSchema,
    output: "{ ok, result, events }",
  },
  {
    name: "tc.easing.list",
    description: "Easing kinds in cycle order and the available track commands.",
    input: TcEasingListInputSchema,
    output: "{ ok, kinds, actions }",
  },
  {
    name: "tc.easing.sample",
    description: "Sample an easing curve at evenly spaced progress steps.",
    input: TcEasingSampleInputSchema,
    output: "{ ok, ease, count, samples }",
  },
] as const;

export type TilecamToolName = typeof ToolDefinitions[number]["name"];
