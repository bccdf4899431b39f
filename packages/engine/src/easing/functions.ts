import {
  DEFAULT_BACK_PARAMS,
  DEFAULT_BEZIER_PARAMS,
  DEFAULT_BOUNCE_PARAMS,
  DEFAULT_ELASTIC_PARAMS,
  type BackParams,
  type BezierParams,
  type BounceParams,
  type ElasticParams,
} from "./types.js";

export type EasingFunction = (t: number) => number;

export function linear(t: number): number {
  return t;
}

// Polynomial families

function polyIn(power: number): EasingFunction {
  return (t) => t ** power;
}

function polyOut(power: number): EasingFunction {
  return (t) => 1 - (1 - t) ** power;
}

function polyInOut(power: number): EasingFunction {
  const scale = 2 ** (power - 1);
  return (t) => (t < 0.5 ? scale * t ** power : 1 - (-2 * t + 2) ** power / 2);
}

export const easeInQuad = polyIn(2);
export const easeOutQuad = polyOut(2);
export const easeInOutQuad = polyInOut(2);
export const easeInCubic = polyIn(3);
export const easeOutCubic = polyOut(3);
export const easeInOutCubic = polyInOut(3);
export const easeInQuart = polyIn(4);
export const easeOutQuart = polyOut(4);
export const easeInOutQuart = polyInOut(4);
export const easeInQuint = polyIn(5);
export const easeOutQuint = polyOut(5);
export const easeInOutQuint = polyInOut(5);

// Sine

export function easeInSine(t: number): number {
  return 1 - Math.cos((t * Math.PI) / 2);
}

export function easeOutSine(t: number): number {
  return Math.sin((t * Math.PI) / 2);
}

export function easeInOutSine(t: number): number {
  return -(Math.cos(Math.PI * t) - 1) / 2;
}

// Exponential

export function easeInExpo(t: number): number {
  return t === 0 ? 0 : 2 ** (10 * (t - 1));
}

export function easeOutExpo(t: number): number {
  return t === 1 ? 1 : 1 - 2 ** (-10 * t);
}

export function easeInOutExpo(t: number): number {
  if (t === 0) return 0;
  if (t === 1) return 1;
  return t < 0.5 ? 2 ** (20 * t - 10) / 2 : (2 - 2 ** (-20 * t + 10)) / 2;
}

// Circular

export function easeInCirc(t: number): number {
  return 1 - Math.sqrt(1 - t * t);
}

export function easeOutCirc(t: number): number {
  return Math.sqrt(1 - (t - 1) ** 2);
}

export function easeInOutCirc(t: number): number {
  return t < 0.5
    ? (1 - Math.sqrt(1 - (2 * t) ** 2)) / 2
    : (Math.sqrt(1 - (-2 * t + 2) ** 2) + 1) / 2;
}

// Back

export function easeInBack(t: number, params: BackParams = DEFAULT_BACK_PARAMS): number {
  const c = params.overshoot;
  return (c + 1) * t * t * t - c * t * t;
}

export function easeOutBack(t: number, params: BackParams = DEFAULT_BACK_PARAMS): number {
  const c = params.overshoot;
  const u = t - 1;
  return 1 + (c + 1) * u * u * u + c * u * u;
}

export function easeInOutBack(t: number, params: BackParams = DEFAULT_BACK_PARAMS): number {
  const c = params.overshoot * 1.525;
  if (t < 0.5) {
    const u = 2 * t;
    return (u * u * ((c + 1) * u - c)) / 2;
  }
  const u = 2 * t - 2;
  return (u * u * ((c + 1) * u + c) + 2) / 2;
}

// Bounce

export function easeOutBounce(t: number, params: BounceParams = DEFAULT_BOUNCE_PARAMS): number {
  const { n1, d1 } = params;
  if (t < 1 / d1) {
    return n1 * t * t;
  }
  if (t < 2 / d1) {
    const u = t - 1.5 / d1;
    return n1 * u * u + 0.75;
  }
  if (t < 2.5 / d1) {
    const u = t - 2.25 / d1;
    return n1 * u * u + 0.9375;
  }
  const u = t - 2.625 / d1;
  return n1 * u * u + 0.984375;
}

export function easeInBounce(t: number, params: BounceParams = DEFAULT_BOUNCE_PARAMS): number {
  return 1 - easeOutBounce(1 - t, params);
}

export function easeInOutBounce(t: number, params: BounceParams = DEFAULT_BOUNCE_PARAMS): number {
  return t < 0.5
    ? (1 - easeOutBounce(1 - 2 * t, params)) / 2
    : (1 + easeOutBounce(2 * t - 1, params)) / 2;
}

// Elastic

/**
 * Damped oscillation settling on 1. The bounds are returned as-is so the
 * curve starts at exactly 0 even though the general formula gives 1 there.
 */
export function elastic(t: number, params: ElasticParams = DEFAULT_ELASTIC_PARAMS): number {
  if (t === 0 || t === 1) return t;
  const sinTerm = Math.sin(params.oscillations * 2 * Math.PI * t);
  const decayTerm = Math.exp(-params.decay * t);
  return 1 - sinTerm * decayTerm;
}

// Cubic Bezier

const BEZIER_NEWTON_ITERATIONS = 5;

function bezierCoord(u: number, c1: number, c2: number): number {
  const inv = 1 - u;
  return 3 * inv * inv * u * c1 + 3 * inv * u * u * c2 + u * u * u;
}

function bezierSlope(u: number, c1: number, c2: number): number {
  const inv = 1 - u;
  return 3 * inv * inv * c1 + 6 * inv * u * (c2 - c1) + 3 * u * u * (1 - c2);
}

/**
 * Approximate y for a given x on the curve (0,0) p1 p2 (1,1). Five Newton
 * steps on x(u), each clamped into [0, 1]; output depends on that count.
 */
export function cubicBezier(t: number, params: BezierParams = DEFAULT_BEZIER_PARAMS): number {
  const [x1, y1] = params.p1;
  const [x2, y2] = params.p2;
  let u = t;
  for (let i = 0; i < BEZIER_NEWTON_ITERATIONS; i += 1) {
    const dx = bezierSlope(u, x1, x2);
    if (dx === 0) continue;
    const err = bezierCoord(u, x1, x2) - t;
    u = Math.min(1, Math.max(0, u - err / dx));
  }
  return bezierCoord(u, y1, y2);
}
