import type { LogLevel } from "../logging/logger.js";
import type { RepositoryKind } from "../types.js";

export const CONFIG_FILE_NAMES = ["artiscan.config.json", ".artiscanrc.json"];

export const DEFAULT_OUTPUT_DIR = "./vulnerability_reports";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_ENGINE_TIMEOUT_SECONDS = 300;
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
export const DEFAULT_REPOSITORY_KINDS: RepositoryKind[] = ["hosted"];

export const REPORT_FOLDER_PREFIX = "scan_reports_";
export const TEMP_DIR_NAME = "temp";
export const LOG_DIR_NAME = "logs";
export const INDIVIDUAL_REPORTS_DIR = "individual_files_reports";
