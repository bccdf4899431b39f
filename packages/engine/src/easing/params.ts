import { z } from "zod";
import {
  DEFAULT_BACK_PARAMS,
  DEFAULT_BEZIER_PARAMS,
  DEFAULT_BOUNCE_PARAMS,
  DEFAULT_ELASTIC_PARAMS,
  type BezierParams,
  type EasingParams,
  type EasingParamsPatch,
  type Point2,
} from "./types.js";

const FiniteNumber = z.number().finite();
const UnitNumber = FiniteNumber.min(0).max(1);

export const ElasticParamsSchema = z.object({
  oscillations: FiniteNumber.int().positive(),
  decay: FiniteNumber.positive(),
});

export const BackParamsSchema = z.object({
  overshoot: FiniteNumber,
});

export const BounceParamsSchema = z.object({
  n1: FiniteNumber,
  d1: FiniteNumber.positive(),
});

const PointSchema = z.tuple([UnitNumber, UnitNumber]);

/** Persisted as `[[x1, y1], [x2, y2]]` or as `{ p1, p2 }`. */
export const BezierParamsSchema = z.union([
  z.object({ p1: PointSchema, p2: PointSchema }),
  z.tuple([PointSchema, PointSchema]).transform(([p1, p2]): BezierParams => ({ p1, p2 })),
]);

function copyPoint(point: Readonly<Point2>): Point2 {
  return [point[0], point[1]];
}

export function createEasingParams(patch: EasingParamsPatch = {}): EasingParams {
  const base: EasingParams = {
    elastic: { ...DEFAULT_ELASTIC_PARAMS },
    back: { ...DEFAULT_BACK_PARAMS },
    bounce: { ...DEFAULT_BOUNCE_PARAMS },
    bezier: { p1: copyPoint(DEFAULT_BEZIER_PARAMS.p1), p2: copyPoint(DEFAULT_BEZIER_PARAMS.p2) },
  };
  return withEasingParams(base, patch);
}

export function cloneEasingParams(params: EasingParams): EasingParams {
  return {
    elastic: { ...params.elastic },
    back: { ...params.back },
    bounce: { ...params.bounce },
    bezier: { p1: copyPoint(params.bezier.p1), p2: copyPoint(params.bezier.p2) },
  };
}

/**
 * Return a new record with `patch` merged per family. Merged values are
 * validated; a family whose merged record is invalid keeps its previous
 * values.
 */
export function withEasingParams(params: EasingParams, patch: EasingParamsPatch): EasingParams {
  const next = cloneEasingParams(params);
  if (patch.elastic) {
    const parsed = ElasticParamsSchema.safeParse({ ...next.elastic, ...patch.elastic });
    if (parsed.success) next.elastic = parsed.data;
  }
  if (patch.back) {
    const parsed = BackParamsSchema.safeParse({ ...next.back, ...patch.back });
    if (parsed.success) next.back = parsed.data;
  }
  if (patch.bounce) {
    const parsed = BounceParamsSchema.safeParse({ ...next.bounce, ...patch.bounce });
    if (parsed.success) next.bounce = parsed.data;
  }
  if (patch.bezier) {
    const parsed = BezierParamsSchema.safeParse({ ...next.bezier, ...patch.bezier });
    if (parsed.success) next.bezier = parsed.data;
  }
  return next;
}

export type EasingParamsMergeResult =
  | { success: true; params: EasingParams }
  | { success: false; message: string };

function issueText(family: string, error: z.ZodError): string {
  const issue = error.issues[0];
  const path = [family, ...(issue?.path ?? [])].join(".");
  return `${path}: ${issue?.message ?? "invalid value"}`;
}

/**
 * Strict counterpart of `withEasingParams`: every patched family must
 * validate after merging or nothing is applied.
 */
export function mergeEasingParams(params: EasingParams, patch: EasingParamsPatch): EasingParamsMergeResult {
  const next = cloneEasingParams(params);
  if (patch.elastic) {
    const parsed = ElasticParamsSchema.safeParse({ ...next.elastic, ...patch.elastic });
    if (!parsed.success) return { success: false, message: issueText("elastic", parsed.error) };
    next.elastic = parsed.data;
  }
  if (patch.back) {
    const parsed = BackParamsSchema.safeParse({ ...next.back, ...patch.back });
    if (!parsed.success) return { success: false, message: issueText("back", parsed.error) };
    next.back = parsed.data;
  }
  if (patch.bounce) {
    const parsed = BounceParamsSchema.safeParse({ ...next.bounce, ...patch.bounce });
    if (!parsed.success) return { success: false, message: issueText("bounce", parsed.error) };
    next.bounce = parsed.data;
  }
  if (patch.bezier) {
    const parsed = BezierParamsSchema.safeParse({ ...next.bezier, ...patch.bezier });
    if (!parsed.success) return { success: false, message: issueText("bezier", parsed.error) };
    next.bezier = parsed.data;
  }
  return { success: true, params: next };
}

export interface RawEasingParams {
  elastic?: unknown;
  back?: unknown;
  bounce?: unknown;
  bezier?: unknown;
}

/**
 * Build parameters from untrusted sub-records (e.g. read from a level file).
 * Missing or malformed families fall back to their defaults.
 */
export function normalizeEasingParams(raw: RawEasingParams): EasingParams {
  const params = createEasingParams();
  const elastic = ElasticParamsSchema.safeParse(raw.elastic);
  if (elastic.success) params.elastic = elastic.data;
  const back = BackParamsSchema.safeParse(raw.back);
  if (back.success) params.back = back.data;
  const bounce = BounceParamsSchema.safeParse(raw.bounce);
  if (bounce.success) params.bounce = bounce.data;
  const bezier = BezierParamsSchema.safeParse(raw.bezier);
  if (bezier.success) params.bezier = bezier.data;
  return params;
}
