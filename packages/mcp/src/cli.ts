#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import { parseCliConfig, renderHelpText, type TilecamMcpConfig } from "./config.js";
import { MCP_SERVER_NAME, MCP_SERVER_VERSION, startTilecamMcpServer } from "./index.js";
import type { CliIo } from "./tilecamCli.js";

const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

export type StartServer = (config: TilecamMcpConfig) => Promise<void>;

/**
 * Resolve flags and environment, then hand the config to `start`. Stdout
 * belongs to the MCP transport once the server runs, so status lines go to
 * stderr.
 */
export async function runMcpCli(
  argv: string[],
  env: NodeJS.ProcessEnv,
  io: CliIo = defaultIo,
  start: StartServer = startTilecamMcpServer,
): Promise<number> {
  const parsed = parseCliConfig(argv, env);
  if (parsed.error === "help") {
    io.writeStdout(renderHelpText());
    return 0;
  }
  if (parsed.error === "version") {
    io.writeStdout(`${MCP_SERVER_NAME} ${MCP_SERVER_VERSION}`);
    return 0;
  }
  if (parsed.error) {
    io.writeStderr(`${MCP_SERVER_NAME}: ${parsed.error}`);
    io.writeStderr(renderHelpText());
    return 1;
  }

  const { config } = parsed;
  io.writeStderr(
    `${MCP_SERVER_NAME} ${MCP_SERVER_VERSION} on ${config.transport} (max level bytes ${config.maxJsonBytes}, preview samples ${config.previewSampleCount})`,
  );
  try {
    await start(config);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.writeStderr(`${MCP_SERVER_NAME} failed: ${message}`);
    return 1;
  }
}

async function main() {
  process.exitCode = await runMcpCli(process.argv.slice(2), process.env);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
