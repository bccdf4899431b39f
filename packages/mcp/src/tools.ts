import { readFile, writeFile } from "node:fs/promises";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { EASING_KINDS, PREVIEW_SAMPLE_COUNT, createEasingParams, mergeEasingParams, sampleEasing } from "@tilecam/engine";
import { ZodObject, type ZodTypeAny } from "zod";
import {
  TcEasingListInputSchema,
  TcEasingSampleInputSchema,
  TcLevelLoadInputSchema,
  TcLevelSaveInputSchema,
  TcLevelSummaryInputSchema,
  TcPingInputSchema,
  TcTrackExecuteInputSchema,
  TcTrackListInputSchema,
  TcTrackStateAtInputSchema,
  ToolDefinitions,
  ToolSchemas,
  type TilecamToolName,
} from "./schema.js";
import type { RuntimeInstance } from "./runtime/runtime.js";
import { RuntimeError, asRuntimeError, type RuntimeErrorCode } from "./runtime/errors.js";

export interface RegisterToolsOptions {
  version: string;
  commit?: string;
  previewSampleCount?: number;
}

type ToolFailure = {
  ok: false;
  error: {
    code: string;
    message: string;
  };
};

export type ToolResponse = {
  ok: boolean;
  [key: string]: unknown;
};

export type ToolHandler = (input: unknown) => Promise<ToolResponse>;

export type ToolHandlerMap = Record<TilecamToolName, ToolHandler>;

function toToolResult(payload: ToolResponse) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
    structuredContent: { ...payload },
    isError: !payload.ok,
  };
}

function resolveError(error: unknown, fallbackCode: RuntimeErrorCode, fallbackMessage: string): ToolFailure {
  const resolved = asRuntimeError(error, fallbackCode, fallbackMessage);
  return {
    ok: false,
    error: {
      code: resolved.code,
      message: resolved.message,
    },
  };
}

function parseInput<T extends ZodTypeAny>(schema: T, input: unknown): ReturnType<T["parse"]> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new RuntimeError("TC_ERR_INVALID_INPUT", parsed.error.issues.map((item) => item.message).join("; "));
  }
  return parsed.data;
}

async function readLevelFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RuntimeError("TC_ERR_IO", `Failed to read level "${path}": ${message}`);
  }
}

export function createToolHandlers(runtime: RuntimeInstance, options: RegisterToolsOptions): ToolHandlerMap {
  const previewSampleCount = options.previewSampleCount ?? PREVIEW_SAMPLE_COUNT;

  return {
    "tc.ping": async (input) => {
      const payload = parseInput(TcPingInputSchema, input ?? {});
      return {
        ok: true,
        version: options.version,
        commit: options.commit ?? null,
        nonce: payload.nonce ?? null,
      };
    },

    "tc.level.load": async (input) => {
      try {
        const payload = parseInput(TcLevelLoadInputSchema, input ?? {});
        if ((payload.path === undefined) === (payload.text === undefined)) {
          throw new RuntimeError("TC_ERR_INVALID_INPUT", "Provide exactly one of path or text.");
        }
        const text = payload.path !== undefined ? await readLevelFile(payload.path) : (payload.text ?? "");
        const loaded = runtime.loadLevelText(text, { sourcePath: payload.path });
        return {
          ok: true,
          ...loaded,
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_LEVEL_FORMAT", "Failed to load level.");
      }
    },

    "tc.level.save": async (input) => {
      try {
        const payload = parseInput(TcLevelSaveInputSchema, input ?? {});
        const text = runtime.exportLevelText();
        const path = payload.path ?? runtime.snapshot().level.sourcePath;
        if (path === null) {
          throw new RuntimeError("TC_ERR_INVALID_INPUT", "The level was not loaded from a file; pass a path.");
        }
        try {
          await writeFile(path, text, "utf8");
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          throw new RuntimeError("TC_ERR_IO", `Failed to write level "${path}": ${message}`);
        }
        return {
          ok: true,
          path,
          bytes: Buffer.byteLength(text, "utf8"),
          events: runtime.markSaved(path),
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_IO", "Failed to save level.");
      }
    },

    "tc.level.summary": async (input) => {
      try {
        parseInput(TcLevelSummaryInputSchema, input ?? {});
        const snapshot = runtime.snapshot();
        return {
          ok: true,
          summary: runtime.summary(),
          sourcePath: snapshot.level.sourcePath,
          dirty: snapshot.dirty,
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_INTERNAL", "Failed to summarize level.");
      }
    },

    "tc.track.list": async (input) => {
      try {
        parseInput(TcTrackListInputSchema, input ?? {});
        return {
          ok: true,
          ...runtime.snapshot().track,
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_INTERNAL", "Failed to list keyframes.");
      }
    },

    "tc.track.stateAt": async (input) => {
      try {
        const payload = parseInput(TcTrackStateAtInputSchema, input ?? {});
        return {
          ok: true,
          time: payload.time,
          state: runtime.stateAt(payload.time),
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_INTERNAL", "Failed to evaluate camera state.");
      }
    },

    "tc.track.execute": async (input) => {
      try {
        const payload = parseInput(TcTrackExecuteInputSchema, input ?? {});
        const executed = runtime.execute(payload.action, payload.input ?? {});
        return {
          ok: true,
          result: executed.result,
          events: executed.events,
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_INTERNAL", "Command execution failed.");
      }
    },

    "tc.easing.list": async (input) => {
      try {
        parseInput(TcEasingListInputSchema, input ?? {});
        return {
          ok: true,
          kinds: [...EASING_KINDS],
          actions: runtime.getCapabilities().actions,
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_INTERNAL", "Failed to list easing kinds.");
      }
    },

    "tc.easing.sample": async (input) => {
      try {
        const payload = parseInput(TcEasingSampleInputSchema, input ?? {});
        const count = payload.count ?? previewSampleCount;
        const merged = mergeEasingParams(createEasingParams(), payload.params ?? {});
        if (!merged.success) {
          throw new RuntimeError("TC_ERR_INVALID_INPUT", merged.message);
        }
        return {
          ok: true,
          ease: payload.ease,
          count,
          samples: sampleEasing(payload.ease, merged.params, count),
        };
      } catch (error) {
        return resolveError(error, "TC_ERR_INTERNAL", "Failed to sample easing.");
      }
    },
  };
}

export async function invokeTool(
  runtime: RuntimeInstance,
  options: RegisterToolsOptions,
  name: TilecamToolName,
  input: unknown,
): Promise<ToolResponse> {
  const handlers = createToolHandlers(runtime, options);
  const schema = ToolSchemas[name];
  parseInput(schema, input ?? {});
  return handlers[name](input ?? {});
}

function getSchemaShape(schema: ZodTypeAny): Record<string, unknown> {
  if (schema instanceof ZodObject) {
    return schema.shape;
  }
  return {};
}

export function registerTilecamTools(server: McpServer, runtime: RuntimeInstance, options: RegisterToolsOptions) {
  const handlers = createToolHandlers(runtime, options);
  const registerTool = server.tool.bind(server) as (...args: unknown[]) => void;

  for (const definition of ToolDefinitions) {
    const toolName = definition.name;
    const handler = handlers[toolName];
    registerTool(toolName, definition.description, getSchemaShape(definition.input), async (input: unknown) => {
      const payload = await handler(input);
      return toToolResult(payload);
    });
  }
}
