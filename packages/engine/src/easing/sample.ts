import { applyEasing } from "./evaluate.js";
import { EasingError, type EasingKind, type EasingParams } from "./types.js";

/**
 * Evaluate the curve at `count` evenly spaced progress steps, first and last
 * sample landing on t = 0 and t = 1.
 */
export function sampleEasing(kind: EasingKind, params: EasingParams | undefined, count: number): number[] {
  if (!Number.isInteger(count) || count < 2) {
    throw new EasingError("TC_ERR_SAMPLE_COUNT", `Sample count must be an integer >= 2, got ${count}.`);
  }
  const samples: number[] = [];
  const last = count - 1;
  for (let i = 0; i <= last; i += 1) {
    samples.push(applyEasing(kind, i / last, params));
  }
  return samples;
}

/** Look up an eased value in a sample cache; lower step, no blending. */
export function sampleFromCache(samples: readonly number[], alpha: number): number {
  const last = samples.length - 1;
  const index = Math.min(last, Math.max(0, Math.floor(alpha * last)));
  return samples[index];
}

export function isSampleCache(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    value.every((item) => typeof item === "number" && Number.isFinite(item))
  );
}
