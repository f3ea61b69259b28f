import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { loadDotEnv, readBooleanEnv, readEnv, readListEnv, readNumberEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_ENGINE_TIMEOUT_SECONDS,
  DEFAULT_LOG_LEVEL,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_REPOSITORY_KINDS,
  DEFAULT_REQUEST_TIMEOUT_MS
} from "./defaults.js";
import {
  ConfigInvalidFileError,
  ConfigMissingCredentialsError,
  ConfigMissingRepositoryUrlError
} from "../errors/config.errors.js";
import { errorMessage } from "../errors/pipeline.errors.js";
import { parseLogLevel, type LogLevel } from "../logging/logger.js";
import { defaultTemplatePath, resolveEnginePath } from "../scan/engine.js";

export type OutputFormat = "text" | "json";

export interface ArtiscanConfig {
  projectRoot: string;
  repository: {
    url: string;
    username: string;
    password: string;
    requestTimeoutMs: number;
  };
  engine: {
    /** Resolved binary, or null when it could not be found. */
    path: string | null;
    templatePath: string | null;
    timeoutSeconds: number;
    vulnOnly: boolean;
  };
  scan: {
    /** Allow-list of repository names; null scans every repository of an allowed kind. */
    repositories: string[] | null;
    repositoryKinds: string[];
    nodeManifestSynthesis: boolean;
  };
  output: {
    dir: string;
    format: OutputFormat;
    retainIndividualReports: boolean;
  };
  logging: {
    level: LogLevel;
    console: boolean;
  };
}

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: ConfigOverrides;
}

export interface ConfigOverrides {
  repositories?: string[] | null;
  outputDir?: string | null;
  format?: OutputFormat | null;
  retainIndividualReports?: boolean | null;
  logLevel?: LogLevel | null;
  logToConsole?: boolean | null;
  enginePath?: string | null;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(source: JsonObject, key: string): JsonObject {
  const value = source[key];
  return isObject(value) ? value : {};
}

function str(source: JsonObject, key: string): string | null {
  const value = source[key];
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function num(source: JsonObject, key: string): number | null {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : null;
}

function bool(source: JsonObject, key: string): boolean | null {
  const value = source[key];
  return typeof value === "boolean" ? value : null;
}

function strList(source: JsonObject, key: string): string[] | null {
  const value = source[key];
  if (!Array.isArray(value)) return null;
  const items = value.filter((item): item is string => typeof item === "string" && item.trim() !== "");
  return items.length ? items.map((item) => item.trim()) : null;
}

function parseOutputFormat(raw: string | null): OutputFormat {
  return raw === "json" ? "json" : "text";
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<JsonObject> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigInvalidFileError(candidate, errorMessage(err));
    }
    if (!isObject(parsed)) {
      throw new ConfigInvalidFileError(candidate, "root must be an object");
    }
    return parsed;
  }

  return {};
}

/**
 * Resolves configuration from (highest first) explicit overrides, the
 * environment, a `.env` file, the config file and defaults. Never throws on
 * missing values; see `validateConfig` and `loadConfig`.
 */
export async function resolveConfig(params: LoadConfigParams): Promise<ArtiscanConfig> {
  loadDotEnv(params.projectRoot);
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);
  const overrides = params.overrides ?? {};

  const repositoryFile = section(configFile, "repository");
  const engineFile = section(configFile, "engine");
  const scanFile = section(configFile, "scan");
  const outputFile = section(configFile, "output");
  const loggingFile = section(configFile, "logging");

  const enginePath = resolveEnginePath(
    params.projectRoot,
    overrides.enginePath ?? readEnv("ARTISCAN_TRIVY_PATH") ?? str(engineFile, "path")
  );
  const templateOverride = readEnv("ARTISCAN_TRIVY_TEMPLATE") ?? str(engineFile, "templatePath");
  const templatePath = templateOverride
    ? path.resolve(params.projectRoot, templateOverride)
    : enginePath
      ? defaultTemplatePath(enginePath)
      : null;

  const outputDir = overrides.outputDir ?? readEnv("ARTISCAN_OUTPUT_DIR") ?? str(outputFile, "dir") ?? DEFAULT_OUTPUT_DIR;

  return {
    projectRoot: params.projectRoot,
    repository: {
      url: (readEnv("NEXUS_URL") ?? str(repositoryFile, "url") ?? "").replace(/\/+$/, ""),
      username: readEnv("NEXUS_USERNAME") ?? str(repositoryFile, "username") ?? "",
      password: readEnv("NEXUS_PASSWORD") ?? str(repositoryFile, "password") ?? "",
      requestTimeoutMs: num(repositoryFile, "requestTimeoutMs") ?? DEFAULT_REQUEST_TIMEOUT_MS
    },
    engine: {
      path: enginePath,
      templatePath,
      timeoutSeconds:
        readNumberEnv("ARTISCAN_SCAN_TIMEOUT_SECONDS") ?? num(engineFile, "timeoutSeconds") ?? DEFAULT_ENGINE_TIMEOUT_SECONDS,
      vulnOnly: bool(engineFile, "vulnOnly") ?? true
    },
    scan: {
      repositories: overrides.repositories ?? readListEnv("ARTISCAN_REPOSITORIES") ?? strList(scanFile, "repositories"),
      repositoryKinds: strList(scanFile, "repositoryKinds") ?? DEFAULT_REPOSITORY_KINDS,
      nodeManifestSynthesis: bool(scanFile, "nodeManifestSynthesis") ?? true
    },
    output: {
      dir: path.resolve(params.projectRoot, outputDir),
      format: overrides.format ?? parseOutputFormat(str(outputFile, "format")),
      retainIndividualReports:
        overrides.retainIndividualReports ??
        readBooleanEnv("ARTISCAN_RETAIN_REPORTS") ??
        bool(outputFile, "retainIndividualReports") ??
        false
    },
    logging: {
      level: overrides.logLevel ?? parseLogLevel(readEnv("ARTISCAN_LOG_LEVEL") ?? str(loggingFile, "level"), DEFAULT_LOG_LEVEL),
      console: overrides.logToConsole ?? bool(loggingFile, "console") ?? false
    }
  };
}

/** Human-readable list of what is missing for a scan to run. Empty when the config is complete. */
export function validateConfig(config: ArtiscanConfig): string[] {
  const missing: string[] = [];
  if (!config.repository.url) missing.push("NEXUS_URL");
  if (!config.repository.username) missing.push("NEXUS_USERNAME");
  if (!config.repository.password) missing.push("NEXUS_PASSWORD");
  if (!config.engine.path) missing.push("Trivy executable (not found in ./trivy/ or on PATH)");
  return missing;
}

export async function loadConfig(params: LoadConfigParams): Promise<ArtiscanConfig> {
  const cfg = await resolveConfig(params);

  if (!cfg.repository.url) {
    throw new ConfigMissingRepositoryUrlError();
  }

  const missingCredentials = [
    cfg.repository.username ? null : "NEXUS_USERNAME",
    cfg.repository.password ? null : "NEXUS_PASSWORD"
  ].filter((item): item is string => item !== null);
  if (missingCredentials.length) {
    throw new ConfigMissingCredentialsError(missingCredentials);
  }

  return cfg;
}
