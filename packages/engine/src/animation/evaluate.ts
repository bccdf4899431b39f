import { applyEasing } from "../easing/evaluate.js";
import { sampleFromCache } from "../easing/sample.js";
import { DEFAULT_CAMERA_STATE, type CameraState, type Keyframe } from "./types.js";

type EvaluableKeyframe = Pick<Keyframe, "time" | "x" | "y" | "zoom" | "angle" | "ease" | "params" | "samples">;

function stateOf(kf: EvaluableKeyframe): CameraState {
  return { x: kf.x, y: kf.y, zoom: kf.zoom, angle: kf.angle };
}

/**
 * Evaluate sorted keyframes at `time`. Returns the default camera state for an
 * empty list and clamps to the first/last keyframe outside their range.
 *
 * With repeated times the first bracketing pair in list order wins.
 */
export function evaluateKeyframes(kfs: readonly EvaluableKeyframe[], time: number): CameraState {
  if (kfs.length === 0) return { ...DEFAULT_CAMERA_STATE };
  if (kfs.length === 1) return stateOf(kfs[0]);

  // Before first keyframe
  if (time < kfs[0].time) return stateOf(kfs[0]);
  // After last keyframe
  if (time > kfs[kfs.length - 1].time) return stateOf(kfs[kfs.length - 1]);

  for (let i = 0; i < kfs.length - 1; i++) {
    const a = kfs[i];
    const b = kfs[i + 1];
    if (time >= a.time && time <= b.time) {
      return interpolate(a, b, time);
    }
  }

  return stateOf(kfs[kfs.length - 1]);
}

/** Eased progress of the segment ending at `b`; the sample cache wins when present. */
export function easedProgress(b: EvaluableKeyframe, alpha: number): number {
  if (b.samples && b.samples.length > 0) {
    return sampleFromCache(b.samples, alpha);
  }
  return applyEasing(b.ease, alpha, b.params);
}

function interpolate(a: EvaluableKeyframe, b: EvaluableKeyframe, time: number): CameraState {
  const dt = b.time - a.time;
  if (dt === 0) return stateOf(b);
  const alpha = (time - a.time) / dt;
  const eased = easedProgress(b, alpha);
  return {
    x: a.x * (1 - eased) + b.x * eased,
    y: a.y * (1 - eased) + b.y * eased,
    zoom: a.zoom * (1 - eased) + b.zoom * eased,
    angle: a.angle * (1 - eased) + b.angle * eased,
  };
}
