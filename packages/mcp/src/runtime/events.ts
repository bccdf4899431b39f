export type RuntimeEventType =
  | "level.loaded"
  | "level.saved"
  | "selection.changed"
  | "keyframe.added"
  | "keyframe.deleted"
  | "keyframe.moved"
  | "keyframe.retimed"
  | "keyframe.easeChanged"
  | "keyframe.paramsChanged"
  | "keyframe.channelsChanged"
  | "session.dirtyChanged";

export interface RuntimeEvent {
  seq: number;
  type: RuntimeEventType;
  payload: Record<string, unknown>;
}

export interface RuntimeEventLog {
  next(type: RuntimeEventType, payload: Record<string, unknown>): RuntimeEvent;
}

export function createRuntimeEventLog(startAt = 0): RuntimeEventLog {
  let seq = startAt;
  return {
    next(type, payload) {
      seq += 1;
      return {
        seq,
        type,
        payload,
      };
    },
  };
}
