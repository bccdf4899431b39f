import type { Point } from "../animation/types.js";
import { LevelFormatError, type LevelAction, type LevelData } from "./levelSchema.js";

/** Angle sentinel for a midspin tile. */
export const MIDSPIN_ANGLE = 999;

const PATH_LETTER_ANGLES: Readonly<Record<string, number>> = {
  R: 0, p: 15, J: 30, E: 45, T: 60, o: 75,
  U: 90, q: 105, G: 120, Q: 135, H: 150, W: 165,
  L: 180, x: 195, N: 210, Z: 225, F: 240, V: 255,
  D: 270, Y: 285, B: 300, C: 315, M: 330, A: 345,
  "!": MIDSPIN_ANGLE,
};

/**
 * Heading of every tile after the first, in degrees. `angleData` wins over
 * the older `pathData` letter encoding.
 */
export function resolveAngles(level: Pick<LevelData, "angleData" | "pathData">): number[] {
  if (level.angleData) return [...level.angleData];
  const path = level.pathData ?? "";
  const angles: number[] = [];
  for (let i = 0; i < path.length; i++) {
    const angle = PATH_LETTER_ANGLES[path[i]];
    if (angle === undefined) {
      throw new LevelFormatError(`unknown path letter "${path[i]}" at path pathData[${i}]`);
    }
    angles.push(angle);
  }
  return angles;
}

function actionsByFloor(actions: readonly LevelAction[], eventType: string): Map<number, LevelAction[]> {
  const map = new Map<number, LevelAction[]>();
  for (const action of actions) {
    if (action.eventType !== eventType) continue;
    const list = map.get(action.floor);
    if (list) {
      list.push(action);
    } else {
      map.set(action.floor, [action]);
    }
  }
  return map;
}

function applySpeedChange(bpm: number, action: LevelAction): number {
  if (action.speedType === "Multiplier") {
    const multiplier = action.bpmMultiplier;
    return typeof multiplier === "number" && multiplier > 0 ? bpm * multiplier : bpm;
  }
  const next = action.beatsPerMinute;
  return typeof next === "number" && next > 0 ? next : bpm;
}

function normalizeDegrees(angle: number): number {
  return ((angle % 360) + 360) % 360;
}

/**
 * Hit time in milliseconds of every floor, floor 0 at 0. Travelling into a
 * floor costs the turn between the previous heading and the new one, 180
 * degrees per beat; speed and twirl events act from their own floor on.
 */
export function computeTileTimes(level: LevelData): number[] {
  const angles = resolveAngles(level);
  const speeds = actionsByFloor(level.actions, "SetSpeed");
  const twirls = actionsByFloor(level.actions, "Twirl");

  const times: number[] = [0];
  let bpm = level.settings.bpm;
  let clockwise = true;
  let heading = 0;
  let elapsed = 0;

  for (let floor = 0; floor < angles.length; floor++) {
    for (const action of speeds.get(floor) ?? []) {
      bpm = applySpeedChange(bpm, action);
    }
    if ((twirls.get(floor)?.length ?? 0) % 2 === 1) {
      clockwise = !clockwise;
    }

    const angle = angles[floor];
    if (angle === MIDSPIN_ANGLE) {
      heading = normalizeDegrees(heading + 180);
      times.push(elapsed);
      continue;
    }

    let turn = normalizeDegrees(heading + 180 - angle);
    if (!clockwise) turn = normalizeDegrees(360 - turn);
    if (turn === 0) turn = 360;

    elapsed += (turn / 180) * (60000 / bpm);
    heading = angle;
    times.push(elapsed);
  }

  return times;
}

export function timeForFloor(times: readonly number[], floor: number): number {
  if (times.length === 0) return 0;
  const index = Math.min(times.length - 1, Math.max(0, Math.floor(floor)));
  return times[index];
}

/** Smallest floor whose time is at or after `time`; the last floor when none is. */
export function floorForTime(times: readonly number[], time: number): number {
  for (let floor = 0; floor < times.length; floor++) {
    if (times[floor] >= time) return floor;
  }
  return Math.max(0, times.length - 1);
}

/** Tile centres on a unit grid, floor 0 at the origin. */
export function computeTilePositions(level: Pick<LevelData, "angleData" | "pathData">): Point[] {
  const positions: Point[] = [{ x: 0, y: 0 }];
  let x = 0;
  let y = 0;
  for (const angle of resolveAngles(level)) {
    if (angle !== MIDSPIN_ANGLE) {
      const rad = (angle * Math.PI) / 180;
      x += Math.cos(rad);
      y += Math.sin(rad);
    }
    positions.push({ x, y });
  }
  return positions;
}
