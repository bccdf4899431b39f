import { nextEasingKind } from "../easing/evaluate.js";
import { cloneEasingParams, createEasingParams, withEasingParams } from "../easing/params.js";
import { sampleEasing } from "../easing/sample.js";
import { PERSIST_SAMPLE_COUNT, type EasingKind, type EasingParamsPatch } from "../easing/types.js";
import { evaluateKeyframes } from "./evaluate.js";
import type { CameraState, Keyframe, KeyframeInput, KeyframeView, Point } from "./types.js";

export interface CameraTrack {
  size(): number;
  keyframes(): KeyframeView[];
  get(id: number): KeyframeView | null;
  clear(): void;

  addKeyframe(input: KeyframeInput): KeyframeView;
  getStateAt(time: number): CameraState;

  selected(): KeyframeView | null;
  selectedId(): number | null;
  selectedIndex(): number | null;
  selectById(id: number): boolean;
  selectByPosition(point: Point, radius: number): KeyframeView | null;
  selectNext(): void;
  selectPrev(): void;
  clearSelection(): void;

  moveSelected(dx: number, dy: number): void;
  moveTimeSelected(dt: number): void;
  deleteSelected(): KeyframeView | null;
  duplicateSelected(offsetMs: number): KeyframeView | null;
  cycleEase(direction?: 1 | -1): EasingKind | null;

  setEase(id: number, kind: EasingKind): boolean;
  setEasingParams(id: number, patch: EasingParamsPatch): boolean;
  setChannels(id: number, patch: Partial<CameraState>): boolean;
  regenerateSamples(count?: number): void;
}

function cloneKeyframe(kf: Keyframe): Keyframe {
  const copy: Keyframe = {
    ...kf,
    params: cloneEasingParams(kf.params),
    samples: kf.samples ? [...kf.samples] : null,
  };
  if (kf.extras) copy.extras = { ...kf.extras };
  return copy;
}

function byTimeThenId(a: Keyframe, b: Keyframe): number {
  return a.time - b.time || a.id - b.id;
}

/**
 * Camera keyframes ordered by time with a single selection. The selection
 * is held by keyframe id so it follows the same keyframe across re-sorts.
 */
export function createCameraTrack(initial: readonly KeyframeInput[] = []): CameraTrack {
  let kfs: Keyframe[] = [];
  let selectedId: number | null = null;
  let nextId = 1;

  const sort = () => {
    kfs.sort(byTimeThenId);
  };

  const indexOf = (id: number | null): number => {
    if (id === null) return -1;
    return kfs.findIndex((kf) => kf.id === id);
  };

  const findSelected = (): Keyframe | undefined => {
    const index = indexOf(selectedId);
    return index >= 0 ? kfs[index] : undefined;
  };

  const find = (id: number): Keyframe | undefined => kfs.find((kf) => kf.id === id);

  const insert = (input: KeyframeInput): Keyframe => {
    const kf: Keyframe = {
      id: nextId,
      time: input.time,
      x: input.x,
      y: input.y,
      zoom: input.zoom,
      angle: input.angle,
      ease: input.ease ?? "Linear",
      params: input.params ? cloneEasingParams(input.params) : createEasingParams(),
      samples: input.samples ? [...input.samples] : null,
    };
    if (input.sourceEase !== undefined) kf.sourceEase = input.sourceEase;
    if (input.extras) kf.extras = { ...input.extras };
    nextId += 1;
    kfs.push(kf);
    sort();
    return kf;
  };

  for (const input of initial) {
    insert(input);
  }

  const track: CameraTrack = {
    size: () => kfs.length,

    keyframes: () => kfs.map(cloneKeyframe),

    get(id) {
      const kf = find(id);
      return kf ? cloneKeyframe(kf) : null;
    },

    clear() {
      kfs = [];
      selectedId = null;
    },

    addKeyframe(input) {
      const kf = insert(input);
      selectedId = kf.id;
      return cloneKeyframe(kf);
    },

    getStateAt: (time) => evaluateKeyframes(kfs, time),

    selected() {
      const kf = findSelected();
      return kf ? cloneKeyframe(kf) : null;
    },

    selectedId: () => (findSelected() ? selectedId : null),

    selectedIndex() {
      const index = indexOf(selectedId);
      return index >= 0 ? index : null;
    },

    selectById(id) {
      if (!find(id)) return false;
      selectedId = id;
      return true;
    },

    selectByPosition(point, radius) {
      const hit = kfs.find((kf) => Math.hypot(kf.x - point.x, kf.y - point.y) <= radius);
      selectedId = hit ? hit.id : null;
      return hit ? cloneKeyframe(hit) : null;
    },

    selectNext() {
      if (kfs.length === 0) return;
      const index = indexOf(selectedId);
      selectedId = index < 0 ? kfs[0].id : kfs[Math.min(index + 1, kfs.length - 1)].id;
    },

    selectPrev() {
      if (kfs.length === 0) return;
      const index = indexOf(selectedId);
      selectedId = index < 0 ? kfs[kfs.length - 1].id : kfs[Math.max(index - 1, 0)].id;
    },

    clearSelection() {
      selectedId = null;
    },

    moveSelected(dx, dy) {
      const kf = findSelected();
      if (!kf) return;
      kf.x += dx;
      kf.y += dy;
    },

    moveTimeSelected(dt) {
      const kf = findSelected();
      if (!kf) return;
      kf.time = Math.max(0, kf.time + dt);
      sort();
    },

    deleteSelected() {
      const index = indexOf(selectedId);
      if (index < 0) return null;
      const [removed] = kfs.splice(index, 1);
      selectedId = kfs.length === 0 ? null : kfs[Math.min(index, kfs.length - 1)].id;
      return cloneKeyframe(removed);
    },

    duplicateSelected(offsetMs) {
      const kf = findSelected();
      if (!kf) return null;
      const copy = insert({
        ...cloneKeyframe(kf),
        time: kf.time + offsetMs,
      });
      selectedId = copy.id;
      return cloneKeyframe(copy);
    },

    cycleEase(direction = 1) {
      const kf = findSelected();
      if (!kf) return null;
      kf.ease = nextEasingKind(kf.ease, direction);
      kf.samples = null;
      delete kf.sourceEase;
      return kf.ease;
    },

    setEase(id, kind) {
      const kf = find(id);
      if (!kf) return false;
      kf.ease = kind;
      kf.samples = null;
      delete kf.sourceEase;
      return true;
    },

    setEasingParams(id, patch) {
      const kf = find(id);
      if (!kf) return false;
      kf.params = withEasingParams(kf.params, patch);
      kf.samples = null;
      return true;
    },

    setChannels(id, patch) {
      const kf = find(id);
      if (!kf) return false;
      if (patch.x !== undefined) kf.x = patch.x;
      if (patch.y !== undefined) kf.y = patch.y;
      if (patch.zoom !== undefined) kf.zoom = patch.zoom;
      if (patch.angle !== undefined) kf.angle = patch.angle;
      return true;
    },

    regenerateSamples(count = PERSIST_SAMPLE_COUNT) {
      for (const kf of kfs) {
        kf.samples = sampleEasing(kf.ease, kf.params, count);
      }
    },
  };

  return track;
}
