// Easing
export {
  EASING_KINDS,
  DEFAULT_ELASTIC_PARAMS,
  DEFAULT_BACK_PARAMS,
  DEFAULT_BOUNCE_PARAMS,
  DEFAULT_BEZIER_PARAMS,
  PERSIST_SAMPLE_COUNT,
  PREVIEW_SAMPLE_COUNT,
  EasingError,
} from "./easing/types.js";
export type {
  EasingKind,
  EasingParams,
  EasingParamsPatch,
  ElasticParams,
  BackParams,
  BounceParams,
  BezierParams,
  Point2,
} from "./easing/types.js";
export * as easings from "./easing/functions.js";
export type { EasingFunction } from "./easing/functions.js";
export {
  applyEasing,
  isEasingKind,
  isKnownEaseName,
  resolveEasingKind,
  nextEasingKind,
} from "./easing/evaluate.js";
export {
  createEasingParams,
  cloneEasingParams,
  withEasingParams,
  mergeEasingParams,
  normalizeEasingParams,
} from "./easing/params.js";
export type { RawEasingParams, EasingParamsMergeResult } from "./easing/params.js";
export { sampleEasing, sampleFromCache, isSampleCache } from "./easing/sample.js";

// Animation
export { DEFAULT_CAMERA_STATE } from "./animation/types.js";
export type {
  CameraState,
  Keyframe,
  KeyframeInput,
  KeyframeView,
  Point,
} from "./animation/types.js";
export { evaluateKeyframes, easedProgress } from "./animation/evaluate.js";
export { createCameraTrack } from "./animation/track.js";
export type { CameraTrack } from "./animation/track.js";

// Level files
export { LevelDataSchema, LevelFormatError } from "./level/levelSchema.js";
export type { LevelAction, LevelData, LevelSettings } from "./level/levelSchema.js";
export { parseLevelText, serializeLevel, stripTrailingCommas } from "./level/parse.js";
export {
  MIDSPIN_ANGLE,
  resolveAngles,
  computeTileTimes,
  computeTilePositions,
  timeForFloor,
  floorForTime,
} from "./level/tiles.js";
export {
  CAMERA_EVENT_TYPE,
  isCameraEvent,
  countCameraEvents,
  readCameraKeyframes,
  toCameraEvent,
  writeCameraEvents,
} from "./level/cameraEvents.js";
export type { WriteCameraEventsOptions } from "./level/cameraEvents.js";
