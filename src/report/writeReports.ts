import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import { INDIVIDUAL_REPORTS_DIR, REPORT_FOLDER_PREFIX } from "../config/defaults.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { SessionResult } from "../types.js";
import { formatFindingsCsv, formatIssuesJson, formatSessionJson } from "./formatters.js";

export interface WrittenReports {
  folder: string;
  resultsJson: string;
  /** Null when the session produced no findings. */
  resultsCsv: string | null;
  issuesJson: string;
  /** Individual asset reports written while the session ran. */
  renderings: string[];
}

/** ISO timestamp made safe for file names. */
export function fileTimestamp(isoTimestamp: string): string {
  return isoTimestamp.replace(/[:.]/g, "-");
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]+/g, "_");
}

export function renderingFileName(component: string, asset: string): string {
  return `${safeSegment(component)}_${safeSegment(asset)}_report.html`;
}

/** Folder holding every report file of the session started at `scanTimestamp`. */
export function reportFolderPath(outputDir: string, scanTimestamp: string): string {
  return path.join(outputDir, `${REPORT_FOLDER_PREFIX}${fileTimestamp(scanTimestamp)}`);
}

export function renderingDirPath(outputDir: string, scanTimestamp: string): string {
  return path.join(reportFolderPath(outputDir, scanTimestamp), INDIVIDUAL_REPORTS_DIR);
}

/** Writes one asset's rendering into `renderingDir` and resolves to its path. */
export async function saveRendering(
  renderingDir: string,
  component: string,
  asset: string,
  content: string
): Promise<string> {
  await mkdir(renderingDir, { recursive: true });
  const filePath = path.join(renderingDir, renderingFileName(component, asset));
  await writeFile(filePath, content, "utf-8");
  return filePath;
}

export async function writeReports(
  result: SessionResult,
  outputDir: string,
  logger: Logger = noopLogger
): Promise<WrittenReports> {
  const stamp = fileTimestamp(result.scanTimestamp);
  const folder = reportFolderPath(outputDir, result.scanTimestamp);
  await mkdir(folder, { recursive: true });

  const resultsJson = path.join(folder, `scan_results_${stamp}.json`);
  await writeFile(resultsJson, `${formatSessionJson(result)}\n`, "utf-8");

  let resultsCsv: string | null = null;
  if (result.findings.length) {
    resultsCsv = path.join(folder, `scan_results_${stamp}.csv`);
    await writeFile(resultsCsv, formatFindingsCsv(result.findings), "utf-8");
  }

  const issuesJson = path.join(folder, `scan_issues_${stamp}.json`);
  await writeFile(issuesJson, `${formatIssuesJson(result)}\n`, "utf-8");

  // Renderings were saved during the scan; only their paths are carried here.
  const renderings = result.renderings.map((rendering) => rendering.filePath);

  logger.info("Reports written", { folder, findings: result.findings.length, renderings: renderings.length });
  return { folder, resultsJson, resultsCsv, issuesJson, renderings };
}
