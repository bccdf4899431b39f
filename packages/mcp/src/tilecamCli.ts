#!/usr/bin/env node
import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { PERSIST_SAMPLE_COUNT } from "@tilecam/engine";
import { createRuntime, type RuntimeInstance } from "./runtime/runtime.js";
import { RuntimeError, asRuntimeError } from "./runtime/errors.js";

export interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

function renderHelpText(): string {
  return [
    "tilecam",
    "",
    "Usage:",
    "  tilecam count <level>",
    "  tilecam state <level> --time <ms>",
    "  tilecam resample <level> --out <path> [--samples <n>]",
    "",
    "Commands:",
    "  count       Print the number of camera events in the level",
    "  state       Print the camera state at a time as JSON",
    "  resample    Rewrite every camera event with fresh sample caches",
    "",
    "  -h, --help  Show help",
  ].join("\n");
}

interface CommandArgs {
  levelPath: string;
  time?: number;
  outPath?: string;
  samples: number;
}

function parseCommandArgs(argv: string[]): CommandArgs {
  let levelPath: string | undefined;
  let time: number | undefined;
  let outPath: string | undefined;
  let samples = PERSIST_SAMPLE_COUNT;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--time") {
      const value = argv[i + 1];
      const parsed = Number(value);
      if (!value || !Number.isFinite(parsed)) throw new Error(`Invalid --time value "${value ?? ""}".`);
      time = parsed;
      i += 1;
      continue;
    }
    if (arg === "--out") {
      const value = argv[i + 1];
      if (!value) throw new Error("--out requires a value.");
      outPath = resolve(value);
      i += 1;
      continue;
    }
    if (arg === "--samples") {
      const value = argv[i + 1];
      const parsed = Number(value);
      if (!value || !Number.isInteger(parsed) || parsed < 2) {
        throw new Error(`Invalid --samples value "${value ?? ""}".`);
      }
      samples = parsed;
      i += 1;
      continue;
    }
    if (arg.startsWith("-")) {
      throw new Error(`Unknown flag "${arg}".`);
    }
    if (levelPath !== undefined) {
      throw new Error(`Unexpected argument "${arg}".`);
    }
    levelPath = resolve(arg);
  }

  if (!levelPath) throw new Error("A level path is required.");
  return { levelPath, time, outPath, samples };
}

async function loadRuntime(levelPath: string, persistSampleCount: number): Promise<RuntimeInstance> {
  let text: string;
  try {
    text = await readFile(levelPath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RuntimeError("TC_ERR_IO", `Failed to read level "${levelPath}": ${message}`);
  }
  const runtime = createRuntime({ persistSampleCount });
  runtime.loadLevelText(text, { sourcePath: levelPath });
  return runtime;
}

async function runCommand(command: string, args: CommandArgs, io: CliIo): Promise<void> {
  const runtime = await loadRuntime(args.levelPath, args.samples);

  if (command === "count") {
    io.writeStdout(String(runtime.summary().cameraEvents));
    return;
  }

  if (command === "state") {
    if (args.time === undefined) throw new RuntimeError("TC_ERR_INVALID_INPUT", "--time is required.");
    io.writeStdout(JSON.stringify({ time: args.time, ...runtime.stateAt(args.time) }));
    return;
  }

  if (args.outPath === undefined) throw new RuntimeError("TC_ERR_INVALID_INPUT", "--out is required.");
  const text = runtime.exportLevelText();
  try {
    await writeFile(args.outPath, text, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RuntimeError("TC_ERR_IO", `Failed to write level "${args.outPath}": ${message}`);
  }
  runtime.markSaved(args.outPath);
  io.writeStdout(`Wrote ${runtime.summary().cameraEvents} camera events to ${args.outPath}`);
}

const COMMANDS = new Set(["count", "state", "resample"]);

export async function runTilecamCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    io.writeStdout(renderHelpText());
    return 0;
  }

  const command = argv[0];
  if (!COMMANDS.has(command)) {
    io.writeStderr(`Unknown command "${command}".`);
    io.writeStdout(renderHelpText());
    return 1;
  }

  let parsed: CommandArgs;
  try {
    parsed = parseCommandArgs(argv.slice(1));
  } catch (error) {
    io.writeStderr(error instanceof Error ? error.message : String(error));
    io.writeStdout(renderHelpText());
    return 1;
  }

  try {
    await runCommand(command, parsed, io);
    return 0;
  } catch (error) {
    const resolved = asRuntimeError(error, "TC_ERR_INTERNAL", `${command} failed.`);
    io.writeStderr(`${resolved.code}: ${resolved.message}`);
    return 1;
  }
}

async function main() {
  const exitCode = await runTilecamCli(process.argv.slice(2), defaultIo);
  process.exitCode = exitCode;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
