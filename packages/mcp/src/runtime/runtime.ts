import {
  EASING_KINDS,
  PERSIST_SAMPLE_COUNT,
  computeTilePositions,
  computeTileTimes,
  countCameraEvents,
  createCameraTrack,
  mergeEasingParams,
  parseLevelText,
  readCameraKeyframes,
  serializeLevel,
  timeForFloor,
  writeCameraEvents,
  type CameraState,
  type CameraTrack,
  type KeyframeView,
  type LevelData,
} from "@tilecam/engine";
import { z, type ZodTypeAny } from "zod";
import { createRuntimeEventLog, type RuntimeEvent } from "./events.js";
import { RuntimeError } from "./errors.js";

const DEFAULT_MAX_LEVEL_BYTES = 25 * 1024 * 1024;

interface LoadedLevel {
  data: LevelData;
  times: number[];
  sourcePath: string | null;
}

interface RuntimeState {
  level: LoadedLevel | null;
  track: CameraTrack;
  dirty: boolean;
}

interface CommandContext {
  state: RuntimeState;
  emit: (type: RuntimeEvent["type"], payload: Record<string, unknown>) => RuntimeEvent;
}

export interface RuntimeCommandResult {
  result: Record<string, unknown> | null;
  events: RuntimeEvent[];
}

interface RuntimeCommand<T extends ZodTypeAny = ZodTypeAny> {
  id: string;
  input: T;
  run: (ctx: CommandContext, input: z.output<T>) => RuntimeCommandResult;
}

export interface LevelSummary {
  floors: number;
  bpm: number;
  durationMs: number;
  cameraEvents: number;
  otherActions: number;
  bounds: { minX: number; maxX: number; minY: number; maxY: number };
}

export interface LoadLevelOptions {
  sourcePath?: string;
}

export interface LoadLevelResult {
  summary: LevelSummary;
  events: RuntimeEvent[];
}

export interface RuntimeSnapshot {
  level: {
    loaded: boolean;
    sourcePath: string | null;
    summary: LevelSummary | null;
  };
  track: {
    keyframes: KeyframeView[];
    selectedId: number | null;
    selectedIndex: number | null;
  };
  dirty: boolean;
}

export interface RuntimeInstance {
  getCapabilities(): { actions: string[] };
  loadLevelText(text: string, options?: LoadLevelOptions): LoadLevelResult;
  exportLevelText(): string;
  markSaved(path: string): RuntimeEvent[];
  summary(): LevelSummary;
  snapshot(): RuntimeSnapshot;
  stateAt(time: number): CameraState;
  execute(action: string, input: unknown): RuntimeCommandResult;
}

export interface RuntimeOptions {
  maxLevelBytes?: number;
  persistSampleCount?: number;
}

export function parseCommandInput<T extends ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new RuntimeError("TC_ERR_INVALID_INPUT", parsed.error.issues.map((item) => item.message).join("; "));
  }
  return parsed.data;
}

class RuntimeCommandBus {
  private readonly commands = new Map<string, RuntimeCommand>();

  register<T extends ZodTypeAny>(command: RuntimeCommand<T>) {
    this.commands.set(command.id, {
      id: command.id,
      input: command.input,
      run: (ctx, input) => command.run(ctx, parseCommandInput(command.input, input)),
    });
  }

  list() {
    return Array.from(this.commands.keys()).sort((a, b) => a.localeCompare(b));
  }

  execute(ctx: CommandContext, action: string, input: unknown): RuntimeCommandResult {
    const command = this.commands.get(action);
    if (!command) {
      throw new RuntimeError("TC_ERR_UNKNOWN_ACTION", `Unknown action "${action}".`);
    }
    return command.run(ctx, input);
  }
}

const Finite = z.number().finite();
const EaseSchema = z.enum(EASING_KINDS);
const EmptyInput = z.object({});
const KeyframeIdInput = z.object({ id: z.number().int().positive().optional() });

function markDirty(ctx: CommandContext, events: RuntimeEvent[]) {
  if (!ctx.state.dirty) {
    ctx.state.dirty = true;
    events.push(ctx.emit("session.dirtyChanged", { dirty: true }));
  }
}

/** Run `mutate` and report a selection change if the selected id moved. */
function trackSelection<T>(ctx: CommandContext, events: RuntimeEvent[], mutate: () => T): T {
  const before = ctx.state.track.selectedId();
  const result = mutate();
  const after = ctx.state.track.selectedId();
  if (before !== after) {
    events.push(ctx.emit("selection.changed", { keyframeId: after, index: ctx.state.track.selectedIndex() }));
  }
  return result;
}

function resolveTargetId(ctx: CommandContext, id: number | undefined): number {
  if (id !== undefined) {
    if (!ctx.state.track.get(id)) {
      throw new RuntimeError("TC_ERR_KEYFRAME_NOT_FOUND", `Keyframe ${id} was not found.`);
    }
    return id;
  }
  const selected = ctx.state.track.selectedId();
  if (selected === null) {
    throw new RuntimeError("TC_ERR_NO_SELECTION", "No keyframe is selected.");
  }
  return selected;
}

function tileBounds(level: LevelData): LevelSummary["bounds"] {
  const bounds = { minX: 0, maxX: 0, minY: 0, maxY: 0 };
  for (const point of computeTilePositions(level)) {
    if (point.x < bounds.minX) bounds.minX = point.x;
    if (point.x > bounds.maxX) bounds.maxX = point.x;
    if (point.y < bounds.minY) bounds.minY = point.y;
    if (point.y > bounds.maxY) bounds.maxY = point.y;
  }
  return bounds;
}

function summarize(level: LoadedLevel, track: CameraTrack): LevelSummary {
  const cameraEvents = countCameraEvents(level.data);
  return {
    floors: level.times.length,
    bpm: level.data.settings.bpm,
    durationMs: level.times[level.times.length - 1] ?? 0,
    cameraEvents: track.size(),
    otherActions: level.data.actions.length - cameraEvents,
    bounds: tileBounds(level.data),
  };
}

function registerCommands(bus: RuntimeCommandBus) {
  bus.register({
    id: "keyframe.add",
    input: z
      .object({
        time: Finite.nonnegative().optional(),
        floor: z.number().int().nonnegative().optional(),
        x: Finite,
        y: Finite,
        zoom: Finite.default(100),
        angle: Finite.default(0),
        ease: EaseSchema.default("Linear"),
      })
      .refine((input) => input.time !== undefined || input.floor !== undefined, {
        message: "keyframe.add requires time or floor.",
      }),
    run(ctx, input) {
      let time = input.time;
      if (time === undefined) {
        if (!ctx.state.level) {
          throw new RuntimeError("TC_ERR_NO_LEVEL", "Placing a keyframe by floor needs a loaded level.");
        }
        time = timeForFloor(ctx.state.level.times, input.floor ?? 0);
      }
      const at = time;
      const selectionEvents: RuntimeEvent[] = [];
      const keyframe = trackSelection(ctx, selectionEvents, () =>
        ctx.state.track.addKeyframe({ time: at, x: input.x, y: input.y, zoom: input.zoom, angle: input.angle, ease: input.ease }),
      );
      const events = [...selectionEvents, ctx.emit("keyframe.added", { keyframeId: keyframe.id, time: keyframe.time })];
      markDirty(ctx, events);
      return { result: { keyframe }, events };
    },
  });

  bus.register({
    id: "keyframe.moveSelected",
    input: z.object({ dx: Finite, dy: Finite }),
    run(ctx, input) {
      const id = ctx.state.track.selectedId();
      if (id === null) return { result: { moved: false }, events: [] };
      ctx.state.track.moveSelected(input.dx, input.dy);
      const events = [ctx.emit("keyframe.moved", { keyframeId: id, dx: input.dx, dy: input.dy })];
      markDirty(ctx, events);
      return { result: { moved: true, keyframe: ctx.state.track.selected() }, events };
    },
  });

  bus.register({
    id: "keyframe.moveTimeSelected",
    input: z.object({ dt: Finite }),
    run(ctx, input) {
      const id = ctx.state.track.selectedId();
      if (id === null) return { result: { moved: false }, events: [] };
      ctx.state.track.moveTimeSelected(input.dt);
      const keyframe = ctx.state.track.selected();
      const events = [
        ctx.emit("keyframe.retimed", { keyframeId: id, time: keyframe?.time ?? null, index: ctx.state.track.selectedIndex() }),
      ];
      markDirty(ctx, events);
      return { result: { moved: true, keyframe }, events };
    },
  });

  bus.register({
    id: "keyframe.deleteSelected",
    input: EmptyInput,
    run(ctx) {
      const selectionEvents: RuntimeEvent[] = [];
      const deleted = trackSelection(ctx, selectionEvents, () => ctx.state.track.deleteSelected());
      if (deleted === null) return { result: { deleted: null }, events: [] };
      const events = [...selectionEvents, ctx.emit("keyframe.deleted", { keyframeId: deleted.id, time: deleted.time })];
      markDirty(ctx, events);
      return { result: { deleted }, events };
    },
  });

  bus.register({
    id: "keyframe.duplicateSelected",
    input: z.object({ offsetMs: Finite.default(0) }),
    run(ctx, input) {
      const selectionEvents: RuntimeEvent[] = [];
      const duplicate = trackSelection(ctx, selectionEvents, () => ctx.state.track.duplicateSelected(input.offsetMs));
      if (duplicate === null) return { result: { keyframe: null }, events: [] };
      const events = [...selectionEvents, ctx.emit("keyframe.added", { keyframeId: duplicate.id, time: duplicate.time })];
      markDirty(ctx, events);
      return { result: { keyframe: duplicate }, events };
    },
  });

  bus.register({
    id: "keyframe.cycleEase",
    input: z.object({ direction: z.union([z.literal(1), z.literal(-1)]).default(1) }),
    run(ctx, input) {
      const id = ctx.state.track.selectedId();
      const ease = ctx.state.track.cycleEase(input.direction);
      if (ease === null) return { result: { ease: null }, events: [] };
      const events = [ctx.emit("keyframe.easeChanged", { keyframeId: id, ease })];
      markDirty(ctx, events);
      return { result: { ease }, events };
    },
  });

  bus.register({
    id: "keyframe.setEase",
    input: KeyframeIdInput.extend({ ease: EaseSchema }),
    run(ctx, input) {
      const id = resolveTargetId(ctx, input.id);
      ctx.state.track.setEase(id, input.ease);
      const events = [ctx.emit("keyframe.easeChanged", { keyframeId: id, ease: input.ease })];
      markDirty(ctx, events);
      return { result: { keyframe: ctx.state.track.get(id) }, events };
    },
  });

  bus.register({
    id: "keyframe.setEasingParams",
    input: KeyframeIdInput.extend({
      params: z.object({
        elastic: z.object({ oscillations: Finite, decay: Finite }).partial().optional(),
        back: z.object({ overshoot: Finite }).partial().optional(),
        bounce: z.object({ n1: Finite, d1: Finite }).partial().optional(),
        bezier: z
          .object({ p1: z.tuple([Finite, Finite]), p2: z.tuple([Finite, Finite]) })
          .partial()
          .optional(),
      }),
    }),
    run(ctx, input) {
      const id = resolveTargetId(ctx, input.id);
      const current = ctx.state.track.get(id);
      if (current) {
        const merged = mergeEasingParams(current.params, input.params);
        if (!merged.success) {
          throw new RuntimeError("TC_ERR_INVALID_INPUT", merged.message);
        }
      }
      ctx.state.track.setEasingParams(id, input.params);
      const keyframe = ctx.state.track.get(id);
      const events = [ctx.emit("keyframe.paramsChanged", { keyframeId: id, params: keyframe?.params ?? null })];
      markDirty(ctx, events);
      return { result: { keyframe }, events };
    },
  });

  bus.register({
    id: "keyframe.setChannels",
    input: KeyframeIdInput.extend({
      x: Finite.optional(),
      y: Finite.optional(),
      zoom: Finite.optional(),
      angle: Finite.optional(),
    }),
    run(ctx, input) {
      const { id: requested, ...channels } = input;
      const id = resolveTargetId(ctx, requested);
      ctx.state.track.setChannels(id, channels);
      const events = [ctx.emit("keyframe.channelsChanged", { keyframeId: id, ...channels })];
      markDirty(ctx, events);
      return { result: { keyframe: ctx.state.track.get(id) }, events };
    },
  });

  bus.register({
    id: "selection.byPosition",
    input: z.object({ x: Finite, y: Finite, radius: Finite.nonnegative() }),
    run(ctx, input) {
      const events: RuntimeEvent[] = [];
      const hit = trackSelection(ctx, events, () => ctx.state.track.selectByPosition({ x: input.x, y: input.y }, input.radius));
      return { result: { keyframe: hit }, events };
    },
  });

  bus.register({
    id: "selection.set",
    input: z.object({ id: z.number().int().positive() }),
    run(ctx, input) {
      const events: RuntimeEvent[] = [];
      trackSelection(ctx, events, () => {
        if (!ctx.state.track.selectById(input.id)) {
          throw new RuntimeError("TC_ERR_KEYFRAME_NOT_FOUND", `Keyframe ${input.id} was not found.`);
        }
      });
      return { result: { keyframeId: input.id }, events };
    },
  });

  const stepSelection = (id: string, step: (track: CameraTrack) => void) => {
    bus.register({
      id,
      input: EmptyInput,
      run(ctx) {
        const events: RuntimeEvent[] = [];
        trackSelection(ctx, events, () => step(ctx.state.track));
        return { result: { keyframeId: ctx.state.track.selectedId() }, events };
      },
    });
  };

  stepSelection("selection.next", (track) => track.selectNext());
  stepSelection("selection.prev", (track) => track.selectPrev());
  stepSelection("selection.clear", (track) => track.clearSelection());
}

export function createRuntime(options: RuntimeOptions = {}): RuntimeInstance {
  const maxLevelBytes = options.maxLevelBytes ?? DEFAULT_MAX_LEVEL_BYTES;
  const persistSampleCount = options.persistSampleCount ?? PERSIST_SAMPLE_COUNT;
  const state: RuntimeState = {
    level: null,
    track: createCameraTrack(),
    dirty: false,
  };
  const eventLog = createRuntimeEventLog(0);
  const commandBus = new RuntimeCommandBus();
  registerCommands(commandBus);

  const emit = (type: RuntimeEvent["type"], payload: Record<string, unknown>) => eventLog.next(type, payload);
  const ctx: CommandContext = { state, emit };

  const requireLevel = (): LoadedLevel => {
    if (!state.level) {
      throw new RuntimeError("TC_ERR_NO_LEVEL", "No level is loaded.");
    }
    return state.level;
  };

  return {
    getCapabilities: () => ({ actions: commandBus.list() }),

    loadLevelText(text, loadOptions = {}) {
      if (Buffer.byteLength(text, "utf8") > maxLevelBytes) {
        throw new RuntimeError("TC_ERR_PAYLOAD_TOO_LARGE", "Level text exceeds max import size.");
      }
      const data = parseLevelText(text);
      const times = computeTileTimes(data);
      const level: LoadedLevel = { data, times, sourcePath: loadOptions.sourcePath ?? null };
      const track = createCameraTrack(readCameraKeyframes(data, times));
      const summary = summarize(level, track);
      state.level = level;
      state.track = track;
      state.dirty = false;
      return {
        summary,
        events: [emit("level.loaded", { sourcePath: level.sourcePath, cameraEvents: summary.cameraEvents })],
      };
    },

    exportLevelText() {
      const level = requireLevel();
      const written = writeCameraEvents(level.data, state.track, level.times, { sampleCount: persistSampleCount });
      return serializeLevel(written);
    },

    markSaved(path) {
      requireLevel();
      const events = [emit("level.saved", { path })];
      if (state.dirty) {
        state.dirty = false;
        events.push(emit("session.dirtyChanged", { dirty: false }));
      }
      return events;
    },

    summary: () => summarize(requireLevel(), state.track),

    snapshot() {
      return {
        level: {
          loaded: state.level !== null,
          sourcePath: state.level?.sourcePath ?? null,
          summary: state.level ? summarize(state.level, state.track) : null,
        },
        track: {
          keyframes: state.track.keyframes(),
          selectedId: state.track.selectedId(),
          selectedIndex: state.track.selectedIndex(),
        },
        dirty: state.dirty,
      };
    },

    stateAt: (time) => state.track.getStateAt(time),

    execute: (action, input) => commandBus.execute(ctx, action, input),
  };
}
