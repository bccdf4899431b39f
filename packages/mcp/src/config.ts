import { PREVIEW_SAMPLE_COUNT } from "@tilecam/engine";

export interface TilecamMcpConfig {
  transport: "stdio";
  maxJsonBytes: number;
  previewSampleCount: number;
}

export interface ParsedCliConfig {
  config: TilecamMcpConfig;
  error?: string;
}

export const DEFAULT_MCP_CONFIG: TilecamMcpConfig = {
  transport: "stdio",
  maxJsonBytes: 25 * 1024 * 1024,
  previewSampleCount: PREVIEW_SAMPLE_COUNT,
};

function parsePositive(value: string | undefined): number | null {
  const parsed = Number(value);
  if (!value || !Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return parsed;
}

function parseSampleCount(value: string | undefined): number | null {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed < 2) {
    return null;
  }
  return parsed;
}

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const config: TilecamMcpConfig = {
    ...DEFAULT_MCP_CONFIG,
  };

  if (env.TC_MCP_MAX_JSON_BYTES) {
    const parsed = parsePositive(env.TC_MCP_MAX_JSON_BYTES);
    if (parsed === null) {
      return { config, error: `Invalid TC_MCP_MAX_JSON_BYTES value "${env.TC_MCP_MAX_JSON_BYTES}".` };
    }
    config.maxJsonBytes = parsed;
  }
  if (env.TC_MCP_PREVIEW_SAMPLES) {
    const parsed = parseSampleCount(env.TC_MCP_PREVIEW_SAMPLES);
    if (parsed === null) {
      return { config, error: `Invalid TC_MCP_PREVIEW_SAMPLES value "${env.TC_MCP_PREVIEW_SAMPLES}".` };
    }
    config.previewSampleCount = parsed;
  }

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      continue;
    }
    if (arg === "--stdio") {
      config.transport = "stdio";
      continue;
    }
    if (arg === "--max-json-bytes") {
      const value = argv[index + 1];
      const parsed = parsePositive(value);
      if (parsed === null) {
        return {
          config,
          error: `Invalid --max-json-bytes value "${value ?? ""}".`,
        };
      }
      config.maxJsonBytes = parsed;
      index += 1;
      continue;
    }
    if (arg === "--preview-samples") {
      const value = argv[index + 1];
      const parsed = parseSampleCount(value);
      if (parsed === null) {
        return {
          config,
          error: `Invalid --preview-samples value "${value ?? ""}".`,
        };
      }
      config.previewSampleCount = parsed;
      index += 1;
      continue;
    }
    if (arg === "--version" || arg === "-v") {
      return {
        config,
        error: "version",
      };
    }
    if (arg === "--help" || arg === "-h") {
      return {
        config,
        error: "help",
      };
    }
    return {
      config,
      error: `Unknown flag "${arg}".`,
    };
  }

  return { config };
}

export function renderHelpText() {
  return [
    "tilecam-mcp",
    "",
    "Usage:",
    "  tilecam-mcp --stdio",
    "",
    "Flags:",
    "  --stdio                 Run MCP over stdio (default).",
    "  --max-json-bytes <n>    Max level text bytes (env: TC_MCP_MAX_JSON_BYTES).",
    "  --preview-samples <n>   Default sample count for tc.easing.sample (env: TC_MCP_PREVIEW_SAMPLES).",
    "  -v, --version           Print the server version.",
    "  -h, --help              Show help.",
  ].join("\n");
}
