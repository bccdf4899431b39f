import { describe, expect, it } from "vitest";
import { applyEasing, isKnownEaseName, nextEasingKind, resolveEasingKind } from "./evaluate.js";
import { createEasingParams } from "./params.js";
import { EASING_KINDS } from "./types.js";

describe("applyEasing", () => {
  it.each(EASING_KINDS.map((kind) => [kind]))("%s maps 0 to 0 and 1 to 1", (kind) => {
    expect(Math.abs(applyEasing(kind, 0))).toBeLessThan(1e-9);
    expect(Math.abs(applyEasing(kind, 1) - 1)).toBeLessThan(1e-9);
  });

  it("reads only the parameter record of the active family", () => {
    const params = createEasingParams({ elastic: { oscillations: 1, decay: 1 }, back: { overshoot: 0 } });
    expect(applyEasing("Elastic", 0.25, params)).toBeCloseTo(1 - Math.exp(-0.25), 12);
    expect(applyEasing("InBack", 0.5, params)).toBeCloseTo(0.125, 12);
    expect(applyEasing("InQuad", 0.5, params)).toBe(0.25);
  });

  it("passes progress through for Linear", () => {
    expect(applyEasing("Linear", 0.37)).toBe(0.37);
  });
});

describe("resolveEasingKind", () => {
  it("accepts canonical names", () => {
    expect(resolveEasingKind("OutBounce")).toBe("OutBounce");
    expect(resolveEasingKind("Bezier")).toBe("Bezier");
  });

  it("accepts Ease-prefixed aliases", () => {
    expect(resolveEasingKind("EaseInQuad")).toBe("InQuad");
    expect(isKnownEaseName("EaseInOutQuad")).toBe(true);
  });

  it("falls back to Linear for unknown names", () => {
    expect(resolveEasingKind("InOutFlash")).toBe("Linear");
    expect(resolveEasingKind(42)).toBe("Linear");
    expect(resolveEasingKind(undefined)).toBe("Linear");
    expect(isKnownEaseName("InOutFlash")).toBe(false);
  });
});

describe("nextEasingKind", () => {
  it("wraps at both ends", () => {
    expect(nextEasingKind("Bezier")).toBe("Linear");
    expect(nextEasingKind("Linear", -1)).toBe("Bezier");
    expect(nextEasingKind("Linear")).toBe("InQuad");
  });

  it("returns to the start after a full cycle", () => {
    let kind = nextEasingKind("OutSine");
    for (let i = 1; i < EASING_KINDS.length; i++) {
      kind = nextEasingKind(kind);
    }
    expect(kind).toBe("OutSine");
  });
});
