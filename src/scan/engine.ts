import path from "node:path";
import { existsSync } from "node:fs";
import { spawn } from "node:child_process";
import { EngineNotFoundError } from "../errors/config.errors.js";
import { errorMessage } from "../errors/pipeline.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";

export const ENGINE_COMMAND = "trivy";
export const ENGINE_VERSION_TIMEOUT_MS = 30_000;

export type CommandResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
};

export type CommandOptions = {
  timeoutMs: number;
  cwd?: string;
};

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

function findOnPath(command: string): string | null {
  const pathEnv = process.env.PATH || "";
  const parts = pathEnv.split(path.delimiter).filter(Boolean);
  const extList = process.platform === "win32" ? [".exe", ".cmd", ".bat", ""] : [""];

  for (const dir of parts) {
    for (const ext of extList) {
      const candidate = path.join(dir, `${command}${ext}`);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

/** Explicit override, then `<projectRoot>/trivy/`, then PATH. */
export function resolveEnginePath(projectRoot: string, override?: string | null): string | null {
  if (override) {
    const resolved = path.resolve(projectRoot, override);
    return existsSync(resolved) ? resolved : null;
  }
  const ext = process.platform === "win32" ? ".exe" : "";
  const bundled = path.join(projectRoot, "trivy", `${ENGINE_COMMAND}${ext}`);
  if (existsSync(bundled)) return bundled;
  return findOnPath(ENGINE_COMMAND);
}

export function assertEngineAvailable(projectRoot: string, override?: string | null): string {
  const resolved = resolveEnginePath(projectRoot, override);
  if (!resolved) {
    throw new EngineNotFoundError(override);
  }
  return resolved;
}

/** Trivy's bundled HTML template lives in `contrib/` beside the binary. */
export function defaultTemplatePath(enginePath: string): string {
  return path.join(path.dirname(enginePath), "contrib", "html.tpl");
}

export const spawnCapture: CommandRunner = async (command, args, options) => {
  return await new Promise((resolve, reject) => {
    const start = Date.now();
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], cwd: options.cwd });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, options.timeoutMs);

    proc.stdout.on("data", (chunk) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    proc.on("close", (code, signal) => {
      clearTimeout(timer);
      resolve({ exitCode: code, signal, stdout, stderr, timedOut, durationMs: Date.now() - start });
    });
  });
};

export async function probeEngineVersion(
  enginePath: string,
  logger: Logger = noopLogger,
  run: CommandRunner = spawnCapture
): Promise<string | null> {
  try {
    const result = await run(enginePath, ["--version"], { timeoutMs: ENGINE_VERSION_TIMEOUT_MS });
    if (result.exitCode !== 0) {
      logger.error("Engine version check failed", { exitCode: result.exitCode, stderr: result.stderr.trim() });
      return null;
    }
    const version = result.stdout.trim();
    logger.debug("Engine version", { version });
    return version;
  } catch (err) {
    logger.error("Failed to get engine version", { error: errorMessage(err) });
    return null;
  }
}
