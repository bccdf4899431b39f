import * as curves from "./functions.js";
import { createEasingParams } from "./params.js";
import { EASING_KINDS, type EasingKind, type EasingParams } from "./types.js";

const DEFAULT_PARAMS = createEasingParams();

/**
 * Evaluate the curve of `kind` at progress `t` in [0, 1]. Back and elastic
 * curves may leave [0, 1] between the bounds.
 */
export function applyEasing(kind: EasingKind, t: number, params: EasingParams = DEFAULT_PARAMS): number {
  switch (kind) {
    case "Linear": return curves.linear(t);
    case "InQuad": return curves.easeInQuad(t);
    case "OutQuad": return curves.easeOutQuad(t);
    case "InOutQuad": return curves.easeInOutQuad(t);
    case "InCubic": return curves.easeInCubic(t);
    case "OutCubic": return curves.easeOutCubic(t);
    case "InOutCubic": return curves.easeInOutCubic(t);
    case "InQuart": return curves.easeInQuart(t);
    case "OutQuart": return curves.easeOutQuart(t);
    case "InOutQuart": return curves.easeInOutQuart(t);
    case "InQuint": return curves.easeInQuint(t);
    case "OutQuint": return curves.easeOutQuint(t);
    case "InOutQuint": return curves.easeInOutQuint(t);
    case "InSine": return curves.easeInSine(t);
    case "OutSine": return curves.easeOutSine(t);
    case "InOutSine": return curves.easeInOutSine(t);
    case "InExpo": return curves.easeInExpo(t);
    case "OutExpo": return curves.easeOutExpo(t);
    case "InOutExpo": return curves.easeInOutExpo(t);
    case "InCirc": return curves.easeInCirc(t);
    case "OutCirc": return curves.easeOutCirc(t);
    case "InOutCirc": return curves.easeInOutCirc(t);
    case "InBack": return curves.easeInBack(t, params.back);
    case "OutBack": return curves.easeOutBack(t, params.back);
    case "InOutBack": return curves.easeInOutBack(t, params.back);
    case "InBounce": return curves.easeInBounce(t, params.bounce);
    case "OutBounce": return curves.easeOutBounce(t, params.bounce);
    case "InOutBounce": return curves.easeInOutBounce(t, params.bounce);
    case "Elastic": return curves.elastic(t, params.elastic);
    case "Bezier": return curves.cubicBezier(t, params.bezier);
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

const KIND_SET = new Set<string>(EASING_KINDS);

export function isEasingKind(name: unknown): name is EasingKind {
  return typeof name === "string" && KIND_SET.has(name);
}

function lookupEasingKind(name: unknown): EasingKind | null {
  if (isEasingKind(name)) return name;
  if (typeof name === "string" && name.startsWith("Ease")) {
    const stripped = name.slice("Ease".length);
    if (isEasingKind(stripped)) return stripped;
  }
  return null;
}

export function isKnownEaseName(name: unknown): boolean {
  return lookupEasingKind(name) !== null;
}

/**
 * Map a persisted ease name onto a kind. Older files spell names as
 * `EaseInQuad`; names we do not know resolve to `Linear`.
 */
export function resolveEasingKind(name: unknown): EasingKind {
  return lookupEasingKind(name) ?? "Linear";
}

export function nextEasingKind(kind: EasingKind, direction: 1 | -1 = 1): EasingKind {
  const index = EASING_KINDS.indexOf(kind);
  const count = EASING_KINDS.length;
  return EASING_KINDS[(index + direction + count) % count];
}
