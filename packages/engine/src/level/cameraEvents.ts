import type { CameraTrack } from "../animation/track.js";
import type { CameraState, KeyframeInput, KeyframeView } from "../animation/types.js";
import { DEFAULT_CAMERA_STATE } from "../animation/types.js";
import { isKnownEaseName, resolveEasingKind } from "../easing/evaluate.js";
import { normalizeEasingParams } from "../easing/params.js";
import { isSampleCache, sampleEasing } from "../easing/sample.js";
import { PERSIST_SAMPLE_COUNT, type EasingKind } from "../easing/types.js";
import type { LevelAction, LevelData } from "./levelSchema.js";
import { floorForTime, timeForFloor } from "./tiles.js";

export const CAMERA_EVENT_TYPE = "MoveCamera";

/** Fields of a camera event this library reads and rewrites. */
const OWNED_FIELDS = new Set([
  "floor",
  "eventType",
  "position",
  "zoom",
  "angleOffset",
  "ease",
  "elastic",
  "back",
  "bounce",
  "bezier",
  "samples",
]);

/** Written on events created in the editor, which have no source event. */
const NEW_EVENT_DEFAULTS: Readonly<Record<string, unknown>> = {
  duration: 1,
  relativeTo: "Player",
  rotation: 0,
  eventTag: "",
};

export function isCameraEvent(action: LevelAction): boolean {
  return action.eventType === CAMERA_EVENT_TYPE;
}

export function countCameraEvents(level: LevelData): number {
  return level.actions.filter(isCameraEvent).length;
}

function finiteOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function readPosition(value: unknown, previous: { x: number; y: number }): { x: number; y: number } {
  if (!Array.isArray(value)) return { ...previous };
  return {
    x: finiteOr(value[0], previous.x),
    y: finiteOr(value[1], previous.y),
  };
}

function collectExtras(action: LevelAction): Record<string, unknown> | undefined {
  const extras: Record<string, unknown> = {};
  let any = false;
  for (const [key, value] of Object.entries(action)) {
    if (OWNED_FIELDS.has(key)) continue;
    extras[key] = value;
    any = true;
  }
  return any ? extras : undefined;
}

/**
 * Turn every camera event into keyframe input, in file order. Missing or null
 * position, zoom and angle values carry the previous camera event's value
 * forward.
 */
export function readCameraKeyframes(level: LevelData, times: readonly number[]): KeyframeInput[] {
  const inputs: KeyframeInput[] = [];
  let previous: CameraState = { ...DEFAULT_CAMERA_STATE };

  for (const action of level.actions) {
    if (!isCameraEvent(action)) continue;

    const position = readPosition(action.position, previous);
    const zoom = finiteOr(action.zoom, previous.zoom);
    const angle = finiteOr(action.angleOffset, previous.angle);
    previous = { ...position, zoom, angle };
    const samples = action.samples;

    const input: KeyframeInput = {
      time: timeForFloor(times, action.floor),
      x: position.x,
      y: position.y,
      zoom,
      angle,
      ease: resolveEasingKind(action.ease),
      params: normalizeEasingParams({
        elastic: action.elastic,
        back: action.back,
        bounce: action.bounce,
        bezier: action.bezier,
      }),
      samples: isSampleCache(samples) ? [...samples] : null,
    };
    if (typeof action.ease === "string" && !isKnownEaseName(action.ease)) {
      input.sourceEase = action.ease;
    }
    const extras = collectExtras(action);
    if (extras) input.extras = extras;
    inputs.push(input);
  }

  return inputs;
}

function paramsField(kf: KeyframeView): Record<string, unknown> {
  const family = familyOf(kf.ease);
  switch (family) {
    case "elastic": return { elastic: { ...kf.params.elastic } };
    case "back": return { back: { ...kf.params.back } };
    case "bounce": return { bounce: { ...kf.params.bounce } };
    case "bezier": return { bezier: [[...kf.params.bezier.p1], [...kf.params.bezier.p2]] };
    default: return {};
  }
}

function familyOf(kind: EasingKind): "elastic" | "back" | "bounce" | "bezier" | null {
  if (kind === "Elastic") return "elastic";
  if (kind === "Bezier") return "bezier";
  if (kind.endsWith("Back")) return "back";
  if (kind.endsWith("Bounce")) return "bounce";
  return null;
}

export function toCameraEvent(
  kf: KeyframeView,
  times: readonly number[],
  sampleCount = PERSIST_SAMPLE_COUNT,
): LevelAction {
  return {
    ...(kf.extras ?? NEW_EVENT_DEFAULTS),
    floor: floorForTime(times, kf.time),
    eventType: CAMERA_EVENT_TYPE,
    position: [kf.x, kf.y],
    zoom: kf.zoom,
    angleOffset: kf.angle,
    ease: kf.sourceEase ?? kf.ease,
    ...paramsField(kf),
    samples: sampleEasing(kf.ease, kf.params, sampleCount),
  };
}

export interface WriteCameraEventsOptions {
  sampleCount?: number;
}

/**
 * Copy of `level` with its camera events replaced by the track's keyframes.
 * Sample caches are always regenerated rather than copied.
 */
export function writeCameraEvents(
  level: LevelData,
  track: CameraTrack,
  times: readonly number[],
  options: WriteCameraEventsOptions = {},
): LevelData {
  const kept = level.actions.filter((action) => !isCameraEvent(action));
  const written = track.keyframes().map((kf) => toCameraEvent(kf, times, options.sampleCount));
  return {
    ...level,
    actions: [...kept, ...written],
  };
}
