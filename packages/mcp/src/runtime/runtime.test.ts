import { describe, expect, it } from "vitest";
import { createRuntime } from "./runtime.js";
import { createLevelText } from "../__tests__/fixtures.js";
import { RuntimeError } from "./errors.js";

function errorCodeOf(run: () => unknown): string | null {
  try {
    run();
  } catch (error) {
    const code: unknown = error instanceof Error ? Reflect.get(error, "code") : null;
    return typeof code === "string" ? code : null;
  }
  return null;
}

describe("runtime level session", () => {
  it("loads a level and summarizes it", () => {
    const runtime = createRuntime();
    const loaded = runtime.loadLevelText(createLevelText(), { sourcePath: "levels/test.adofai" });

    expect(loaded.summary).toEqual({
      floors: 5,
      bpm: 120,
      durationMs: 2000,
      cameraEvents: 2,
      otherActions: 1,
      bounds: { minX: 0, maxX: 4, minY: 0, maxY: 0 },
    });
    expect(loaded.events).toEqual([
      { seq: 1, type: "level.loaded", payload: { sourcePath: "levels/test.adofai", cameraEvents: 2 } },
    ]);

    const snapshot = runtime.snapshot();
    expect(snapshot.level.loaded).toBe(true);
    expect(snapshot.track.keyframes.map((kf) => [kf.id, kf.time, kf.ease])).toEqual([
      [1, 500, "Linear"],
      [2, 1500, "OutQuad"],
    ]);
    expect(snapshot.track.selectedId).toBeNull();
    expect(snapshot.dirty).toBe(false);
  });

  it("evaluates the camera between keyframes", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());

    expect(runtime.stateAt(1000)).toEqual({ x: 7.5, y: 15, zoom: 175, angle: 67.5 });
    expect(runtime.stateAt(0)).toEqual({ x: 0, y: 0, zoom: 100, angle: 0 });
    expect(runtime.stateAt(9000)).toEqual({ x: 10, y: 20, zoom: 200, angle: 90 });
  });

  it("rejects oversized level text", () => {
    const runtime = createRuntime({ maxLevelBytes: 10 });
    expect(errorCodeOf(() => runtime.loadLevelText(createLevelText()))).toBe("TC_ERR_PAYLOAD_TOO_LARGE");
  });

  it("surfaces level format errors with their code", () => {
    const runtime = createRuntime();
    expect(errorCodeOf(() => runtime.loadLevelText("{}"))).toBe("TC_ERR_LEVEL_FORMAT");
    expect(runtime.snapshot().level.loaded).toBe(false);
  });

  it("summarizes a long straight path", () => {
    const runtime = createRuntime();
    const text = JSON.stringify({ pathData: "R".repeat(300_000), settings: { bpm: 100 }, actions: [] });
    const loaded = runtime.loadLevelText(text);

    expect(loaded.summary.floors).toBe(300_001);
    expect(loaded.summary.cameraEvents).toBe(0);
    expect(loaded.summary.bounds).toEqual({ minX: 0, maxX: 300_000, minY: 0, maxY: 0 });
    expect(runtime.snapshot().level.loaded).toBe(true);
    expect(runtime.summary().floors).toBe(300_001);
  });

  it("keeps the previous level when a load fails", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());
    expect(errorCodeOf(() => runtime.loadLevelText("{}"))).toBe("TC_ERR_LEVEL_FORMAT");

    expect(runtime.summary().cameraEvents).toBe(2);
    expect(runtime.stateAt(1000)).toEqual({ x: 7.5, y: 15, zoom: 175, angle: 67.5 });
  });

  it("requires a level to export", () => {
    const runtime = createRuntime();
    expect(errorCodeOf(() => runtime.exportLevelText())).toBe("TC_ERR_NO_LEVEL");
    expect(errorCodeOf(() => runtime.summary())).toBe("TC_ERR_NO_LEVEL");
  });
});

describe("runtime commands", () => {
  it("lists registered actions sorted", () => {
    const runtime = createRuntime();
    expect(runtime.getCapabilities().actions).toEqual([
      "keyframe.add",
      "keyframe.cycleEase",
      "keyframe.deleteSelected",
      "keyframe.duplicateSelected",
      "keyframe.moveSelected",
      "keyframe.moveTimeSelected",
      "keyframe.setChannels",
      "keyframe.setEase",
      "keyframe.setEasingParams",
      "selection.byPosition",
      "selection.clear",
      "selection.next",
      "selection.prev",
      "selection.set",
    ]);
  });

  it("emits ordered events and marks the session dirty once", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());

    const selected = runtime.execute("selection.next", {});
    expect(selected.result).toEqual({ keyframeId: 1 });
    expect(selected.events).toEqual([{ seq: 2, type: "selection.changed", payload: { keyframeId: 1, index: 0 } }]);

    const moved = runtime.execute("keyframe.moveSelected", { dx: 2, dy: -1 });
    expect(moved.events.map((event) => `${event.seq}:${event.type}`)).toEqual([
      "3:keyframe.moved",
      "4:session.dirtyChanged",
    ]);

    const added = runtime.execute("keyframe.add", { floor: 2, x: 5, y: 5 });
    expect(added.events.map((event) => `${event.seq}:${event.type}`)).toEqual([
      "5:selection.changed",
      "6:keyframe.added",
    ]);

    const snapshot = runtime.snapshot();
    expect(snapshot.dirty).toBe(true);
    expect(snapshot.track.selectedId).toBe(3);
    expect(snapshot.track.selectedIndex).toBe(1);
    expect(snapshot.track.keyframes.map((kf) => [kf.id, kf.time, kf.x, kf.y])).toEqual([
      [1, 500, 2, -1],
      [3, 1000, 5, 5],
      [2, 1500, 10, 20],
    ]);
  });

  it("adds keyframes by time without a level", () => {
    const runtime = createRuntime();
    const added = runtime.execute("keyframe.add", { time: 250, x: 1, y: 2, ease: "InCubic" });
    expect(added.result?.keyframe).toMatchObject({ id: 1, time: 250, x: 1, y: 2, zoom: 100, angle: 0, ease: "InCubic" });
    expect(errorCodeOf(() => runtime.execute("keyframe.add", { floor: 1, x: 0, y: 0 }))).toBe("TC_ERR_NO_LEVEL");
  });

  it("validates command input", () => {
    const runtime = createRuntime();
    expect(() => runtime.execute("keyframe.add", { x: 1, y: 1 })).toThrowError(
      new RuntimeError("TC_ERR_INVALID_INPUT", "keyframe.add requires time or floor."),
    );
    expect(errorCodeOf(() => runtime.execute("keyframe.moveSelected", { dx: "a", dy: 0 }))).toBe(
      "TC_ERR_INVALID_INPUT",
    );
    expect(errorCodeOf(() => runtime.execute("keyframe.setEase", { ease: "Wobble" }))).toBe("TC_ERR_INVALID_INPUT");
    expect(errorCodeOf(() => runtime.execute("camera.explode", {}))).toBe("TC_ERR_UNKNOWN_ACTION");
  });

  it("targets the selection or an explicit id", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());

    expect(errorCodeOf(() => runtime.execute("keyframe.setEase", { ease: "InSine" }))).toBe("TC_ERR_NO_SELECTION");
    expect(errorCodeOf(() => runtime.execute("keyframe.setEase", { id: 99, ease: "InSine" }))).toBe(
      "TC_ERR_KEYFRAME_NOT_FOUND",
    );

    runtime.execute("keyframe.setEase", { id: 2, ease: "Elastic" });
    runtime.execute("keyframe.setEasingParams", { id: 2, params: { elastic: { oscillations: 5 } } });
    runtime.execute("selection.set", { id: 1 });
    runtime.execute("keyframe.setChannels", { zoom: 80 });

    const [first, second] = runtime.snapshot().track.keyframes;
    expect(first.zoom).toBe(80);
    expect(second.ease).toBe("Elastic");
    expect(second.params.elastic).toEqual({ oscillations: 5, decay: 3 });
  });

  it("rejects invalid easing parameters without touching the keyframe", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());

    expect(() =>
      runtime.execute("keyframe.setEasingParams", { id: 2, params: { elastic: { oscillations: 2.5 } } }),
    ).toThrowError(new RuntimeError("TC_ERR_INVALID_INPUT", "elastic.oscillations: Expected integer, received float"));
    expect(() =>
      runtime.execute("keyframe.setEasingParams", { id: 2, params: { bezier: { p1: [1.5, 0] } } }),
    ).toThrowError(RuntimeError);

    const snapshot = runtime.snapshot();
    expect(snapshot.track.keyframes[1]?.params.elastic).toEqual({ oscillations: 3, decay: 3 });
    expect(snapshot.dirty).toBe(false);
  });

  it("selects by position and clears on a miss", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());

    const hit = runtime.execute("selection.byPosition", { x: 9, y: 19, radius: 2 });
    expect(hit.result?.keyframe).toMatchObject({ id: 2 });
    expect(hit.events[0]?.payload).toEqual({ keyframeId: 2, index: 1 });

    const miss = runtime.execute("selection.byPosition", { x: 100, y: 100, radius: 1 });
    expect(miss.result?.keyframe).toBeNull();
    expect(runtime.snapshot().track.selectedId).toBeNull();
  });

  it("duplicates, retimes and deletes the selection", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());
    runtime.execute("selection.set", { id: 1 });

    const duplicate = runtime.execute("keyframe.duplicateSelected", { offsetMs: 100 });
    expect(duplicate.result?.keyframe).toMatchObject({ id: 3, time: 600, x: 0, y: 0 });

    runtime.execute("keyframe.moveTimeSelected", { dt: 1000 });
    expect(runtime.snapshot().track.keyframes.map((kf) => kf.id)).toEqual([1, 2, 3]);
    expect(runtime.snapshot().track.selectedIndex).toBe(2);

    const deleted = runtime.execute("keyframe.deleteSelected", {});
    expect(deleted.result?.deleted).toMatchObject({ id: 3, time: 1600 });
    expect(runtime.snapshot().track.selectedId).toBe(2);
  });

  it("reports no-ops without events", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());

    expect(runtime.execute("keyframe.moveSelected", { dx: 1, dy: 1 })).toEqual({ result: { moved: false }, events: [] });
    expect(runtime.execute("keyframe.deleteSelected", {})).toEqual({ result: { deleted: null }, events: [] });
    expect(runtime.execute("keyframe.cycleEase", {})).toEqual({ result: { ease: null }, events: [] });
    expect(runtime.snapshot().dirty).toBe(false);
  });

  it("cycles the ease of the selection", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());
    runtime.execute("selection.set", { id: 1 });

    expect(runtime.execute("keyframe.cycleEase", {}).result).toEqual({ ease: "InQuad" });
    expect(runtime.execute("keyframe.cycleEase", { direction: -1 }).result).toEqual({ ease: "Linear" });
    expect(runtime.execute("keyframe.cycleEase", { direction: -1 }).result).toEqual({ ease: "Bezier" });
  });
});

describe("runtime export", () => {
  it("writes camera events after the other actions", () => {
    const runtime = createRuntime({ persistSampleCount: 5 });
    runtime.loadLevelText(createLevelText());
    runtime.execute("selection.set", { id: 1 });
    runtime.execute("keyframe.moveSelected", { dx: 1, dy: 0 });

    const exported: unknown = JSON.parse(runtime.exportLevelText());
    expect(exported).toMatchObject({
      angleData: [0, 0, 0, 0],
      settings: { bpm: 120, artist: "test" },
      decorations: [],
      actions: [
        { floor: 0, eventType: "SetHitsound", hitsound: "Kick" },
        {
          floor: 1,
          eventType: "MoveCamera",
          duration: 1,
          relativeTo: "Tile",
          position: [1, 0],
          zoom: 100,
          angleOffset: 0,
          ease: "Linear",
          samples: [0, 0.25, 0.5, 0.75, 1],
        },
        {
          floor: 3,
          eventType: "MoveCamera",
          duration: 2,
          position: [10, 20],
          zoom: 200,
          angleOffset: 90,
          ease: "OutQuad",
          samples: [0, 0.4375, 0.75, 0.9375, 1],
        },
      ],
    });
  });

  it("reloads exported text to the same camera path", () => {
    const runtime = createRuntime({ persistSampleCount: 5 });
    runtime.loadLevelText(createLevelText());
    const text = runtime.exportLevelText();

    const reloaded = createRuntime();
    reloaded.loadLevelText(text);
    expect(reloaded.stateAt(1000)).toEqual({ x: 7.5, y: 15, zoom: 175, angle: 67.5 });
  });

  it("clears the dirty flag when saved", () => {
    const runtime = createRuntime();
    runtime.loadLevelText(createLevelText());
    runtime.execute("selection.next", {});
    runtime.execute("keyframe.moveSelected", { dx: 1, dy: 1 });

    const events = runtime.markSaved("out.adofai");
    expect(events.map((event) => [event.type, event.payload])).toEqual([
      ["level.saved", { path: "out.adofai" }],
      ["session.dirtyChanged", { dirty: false }],
    ]);
    expect(runtime.snapshot().dirty).toBe(false);
  });
});
