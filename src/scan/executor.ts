import path from "node:path";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm } from "node:fs/promises";
import {
  EngineOutputParseError,
  ScanInvocationError,
  errorMessage
} from "../errors/pipeline.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { EngineReport, Outcome } from "../types.js";
import { spawnCapture, type CommandResult, type CommandRunner } from "./engine.js";
import { engineSubcommand, type EngineMode } from "./strategy.js";

export const DEFAULT_SCAN_TIMEOUT_SECONDS = 300;

export interface EngineRuntime {
  path: string;
  /** Template for the human-readable rendering; rendering is skipped when null or missing on disk. */
  templatePath: string | null;
  timeoutSeconds: number;
  /** Restrict filesystem and image scans to vulnerability detection. */
  vulnOnly: boolean;
  quiet: boolean;
  run?: CommandRunner;
}

export interface ScanRequest {
  /** File, directory or image reference handed to the engine. */
  target: string;
  mode: EngineMode;
  /** Parent directory for the temporary output files. */
  scratchDir: string;
  /** Extraction directory to delete once the scan is over, whatever the result. */
  workDir?: string | null;
}

export interface ScanExecution {
  report: EngineReport;
  rendering: string | null;
  durationMs: number;
  command: string;
}

export type ScanOutcome = Outcome<ScanExecution, ScanInvocationError | EngineOutputParseError>;

type OutputFormat = { kind: "json" } | { kind: "template"; templatePath: string };

export function buildEngineArgs(
  runtime: EngineRuntime,
  mode: EngineMode,
  format: OutputFormat,
  outputPath: string,
  target: string
): string[] {
  const args: string[] = [engineSubcommand(mode)];
  if (format.kind === "json") {
    args.push("--format", "json");
  } else {
    args.push("--format", "template", "--template", `@${format.templatePath}`);
  }
  args.push("--output", outputPath);
  if (runtime.vulnOnly && mode !== "config") {
    args.push("--scanners", "vuln");
  }
  if (runtime.quiet) {
    args.push("--quiet");
  }
  args.push(target);
  return args;
}

function describeFailure(result: CommandResult, timeoutSeconds: number): string {
  if (result.timedOut) return `timed out after ${timeoutSeconds}s`;
  if (result.exitCode === null) return `terminated by ${result.signal ?? "signal"}`;
  const stderr = result.stderr.trim();
  return stderr ? `exit code ${result.exitCode}: ${stderr}` : `exit code ${result.exitCode}`;
}

function isEngineReport(value: unknown): value is EngineReport {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  if (!("Results" in value)) return true;
  return value.Results === null || value.Results === undefined || Array.isArray(value.Results);
}

async function readOptional(filePath: string): Promise<string | null> {
  if (!existsSync(filePath)) return null;
  return await readFile(filePath, "utf-8");
}

/**
 * Runs the engine once for structured output and once for the rendering.
 * Temporary output files and `request.workDir` are removed on every path out.
 */
export async function executeScan(
  runtime: EngineRuntime,
  request: ScanRequest,
  logger: Logger = noopLogger
): Promise<ScanOutcome> {
  const run = runtime.run ?? spawnCapture;
  const timeoutMs = runtime.timeoutSeconds * 1000;
  const start = Date.now();
  let outputDir: string | null = null;

  try {
    await mkdir(request.scratchDir, { recursive: true });
    outputDir = await mkdtemp(path.join(request.scratchDir, "engine-"));
    const jsonPath = path.join(outputDir, "result.json");
    const renderingPath = path.join(outputDir, "rendering.html");

    const jsonArgs = buildEngineArgs(runtime, request.mode, { kind: "json" }, jsonPath, request.target);
    const command = `${path.basename(runtime.path)} ${jsonArgs.join(" ")}`;
    logger.debug("Engine command", { command });

    const jsonResult = await run(runtime.path, jsonArgs, { timeoutMs });
    if (jsonResult.timedOut || jsonResult.exitCode !== 0) {
      const error = new ScanInvocationError(request.target, describeFailure(jsonResult, runtime.timeoutSeconds), {
        exitCode: jsonResult.exitCode,
        timedOut: jsonResult.timedOut,
        stderr: jsonResult.stderr
      });
      logger.error(error.message);
      return { ok: false, error };
    }

    let rendering: string | null = null;
    if (runtime.templatePath && existsSync(runtime.templatePath)) {
      const templateArgs = buildEngineArgs(
        runtime,
        request.mode,
        { kind: "template", templatePath: runtime.templatePath },
        renderingPath,
        request.target
      );
      const templateResult = await run(runtime.path, templateArgs, { timeoutMs });
      if (templateResult.timedOut || templateResult.exitCode !== 0) {
        logger.warn("Engine rendering failed", {
          target: request.target,
          reason: describeFailure(templateResult, runtime.timeoutSeconds)
        });
      } else {
        rendering = await readOptional(renderingPath);
      }
    } else if (runtime.templatePath) {
      logger.debug("Rendering template not found, skipping rendering", { template: runtime.templatePath });
    }

    const raw = await readOptional(jsonPath);
    if (raw === null || !raw.trim()) {
      const error = new EngineOutputParseError(request.target, "engine produced no structured output");
      logger.error(error.message);
      return { ok: false, error };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const error = new EngineOutputParseError(request.target, errorMessage(err));
      logger.error(error.message);
      return { ok: false, error };
    }
    if (!isEngineReport(parsed)) {
      const error = new EngineOutputParseError(request.target, "unexpected JSON shape");
      logger.error(error.message);
      return { ok: false, error };
    }

    return {
      ok: true,
      value: { report: parsed, rendering, durationMs: Date.now() - start, command }
    };
  } catch (err) {
    const error = new ScanInvocationError(request.target, errorMessage(err));
    logger.error(error.message);
    return { ok: false, error };
  } finally {
    const leftovers = [outputDir, request.workDir ?? null].filter((dir): dir is string => dir !== null);
    for (const dir of leftovers) {
      try {
        await rm(dir, { recursive: true, force: true });
      } catch (err) {
        logger.warn("Could not remove scan working directory", { dir, error: errorMessage(err) });
      }
    }
  }
}
