export const EASING_KINDS = [
  "Linear",
  "InQuad", "OutQuad", "InOutQuad",
  "InCubic", "OutCubic", "InOutCubic",
  "InQuart", "OutQuart", "InOutQuart",
  "InQuint", "OutQuint", "InOutQuint",
  "InSine", "OutSine", "InOutSine",
  "InExpo", "OutExpo", "InOutExpo",
  "InCirc", "OutCirc", "InOutCirc",
  "InBack", "OutBack", "InOutBack",
  "InBounce", "OutBounce", "InOutBounce",
  "Elastic",
  "Bezier",
] as const;

export type EasingKind = typeof EASING_KINDS[number];

export interface ElasticParams {
  /** Full sine cycles over the segment. */
  oscillations: number;
  /** Exponential damping rate. */
  decay: number;
}

export interface BackParams {
  overshoot: number;
}

export interface BounceParams {
  n1: number;
  d1: number;
}

export type Point2 = [number, number];

/**
 * Inner control points of a cubic Bezier whose endpoints are fixed at (0,0)
 * and (1,1).
 */
export interface BezierParams {
  p1: Point2;
  p2: Point2;
}

/**
 * Parameters for every parameterised family. A keyframe carries all of them
 * so switching kinds back and forth keeps earlier edits; only the record
 * matching the active kind is read.
 */
export interface EasingParams {
  elastic: ElasticParams;
  back: BackParams;
  bounce: BounceParams;
  bezier: BezierParams;
}

export type EasingParamsPatch = {
  [K in keyof EasingParams]?: Partial<EasingParams[K]>;
};

export const DEFAULT_ELASTIC_PARAMS: Readonly<ElasticParams> = { oscillations: 3, decay: 3 };
export const DEFAULT_BACK_PARAMS: Readonly<BackParams> = { overshoot: 1.70158 };
export const DEFAULT_BOUNCE_PARAMS: Readonly<BounceParams> = { n1: 7.5625, d1: 2.75 };
export const DEFAULT_BEZIER_PARAMS: Readonly<BezierParams> = { p1: [0.25, 0.1], p2: [0.25, 1] };

/** Sample count written into persisted camera events. */
export const PERSIST_SAMPLE_COUNT = 60;
/** Sample count used for on-screen curve previews. */
export const PREVIEW_SAMPLE_COUNT = 100;

export class EasingError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "EasingError";
    this.code = code;
  }
}
