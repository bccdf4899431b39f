import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createRuntime, type RuntimeInstance } from "./runtime/runtime.js";
import { registerTilecamTools } from "./tools.js";
import type { TilecamMcpConfig } from "./config.js";

export const MCP_SERVER_NAME = "tilecam-mcp";
export const MCP_SERVER_VERSION = "0.1.0";

export interface TilecamMcpServerContext {
  server: McpServer;
  runtime: RuntimeInstance;
}

export function createTilecamMcpServer(config: TilecamMcpConfig): TilecamMcpServerContext {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });
  const runtime = createRuntime({
    maxLevelBytes: config.maxJsonBytes,
  });
  registerTilecamTools(server, runtime, {
    version: MCP_SERVER_VERSION,
    commit: process.env.GITHUB_SHA?.slice(0, 7),
    previewSampleCount: config.previewSampleCount,
  });
  return {
    server,
    runtime,
  };
}

export async function startTilecamMcpServer(config: TilecamMcpConfig): Promise<void> {
  const { server } = createTilecamMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

export { createRuntime } from "./runtime/runtime.js";
export type { RuntimeInstance, RuntimeSnapshot, LevelSummary } from "./runtime/runtime.js";
export { RuntimeError } from "./runtime/errors.js";
export { createToolHandlers, invokeTool } from "./tools.js";
export { DEFAULT_MCP_CONFIG, parseCliConfig } from "./config.js";
export type { TilecamMcpConfig } from "./config.js";
