export type RuntimeErrorCode =
  | "TC_ERR_INVALID_INPUT"
  | "TC_ERR_NO_LEVEL"
  | "TC_ERR_UNKNOWN_ACTION"
  | "TC_ERR_NO_SELECTION"
  | "TC_ERR_KEYFRAME_NOT_FOUND"
  | "TC_ERR_PAYLOAD_TOO_LARGE"
  | "TC_ERR_LEVEL_FORMAT"
  | "TC_ERR_SAMPLE_COUNT"
  | "TC_ERR_IO"
  | "TC_ERR_INTERNAL";

export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: RuntimeErrorCode | (string & {}), message: string) {
    super(message);
    this.name = "RuntimeError";
    this.code = code;
  }
}

export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

function readCode(error: Error): string | null {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" && code.startsWith("TC_ERR_") ? code : null;
}

/**
 * Normalise anything thrown below the tool layer. Engine errors carrying a
 * `TC_ERR_*` code keep it; other errors take `fallbackCode`.
 */
export function asRuntimeError(error: unknown, fallbackCode: RuntimeErrorCode, fallbackMessage: string): RuntimeError {
  if (isRuntimeError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new RuntimeError(readCode(error) ?? fallbackCode, error.message);
  }
  return new RuntimeError(fallbackCode, fallbackMessage);
}
