import type { EasingKind, EasingParams } from "../easing/types.js";

export interface CameraState {
  x: number;
  y: number;
  zoom: number;
  angle: number;
}

export const DEFAULT_CAMERA_STATE: Readonly<CameraState> = { x: 0, y: 0, zoom: 100, angle: 0 };

export interface Keyframe extends CameraState {
  /** Stable per track; later insertions get larger ids. */
  id: number;
  /** Milliseconds from the first tile. */
  time: number;
  /** Easing of the segment arriving at this keyframe. */
  ease: EasingKind;
  params: EasingParams;
  samples: number[] | null;
  /** Ease name read from a file that did not resolve to a known kind. */
  sourceEase?: string;
  /** Fields of the source event this library does not interpret. */
  extras?: Record<string, unknown>;
}

export interface KeyframeInput extends CameraState {
  time: number;
  ease?: EasingKind;
  params?: EasingParams;
  samples?: number[] | null;
  sourceEase?: string;
  extras?: Record<string, unknown>;
}

export type KeyframeView = Readonly<Keyframe>;

export interface Point {
  x: number;
  y: number;
}
