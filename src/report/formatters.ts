import pc from "picocolors";
import { SEVERITIES, type SessionFinding, type SessionResult, type Severity } from "../types.js";
import { groupIssuesByReason, groupSuccessfulScansByType } from "../scan/issues.js";

type Colors = ReturnType<typeof pc.createColors>;

export type TextFormatOptions = {
  color?: boolean;
};

function severityLabel(c: Colors, severity: Severity): string {
  switch (severity) {
    case "CRITICAL":
      return c.bgRed(c.white(" CRITICAL "));
    case "HIGH":
      return c.red("HIGH");
    case "MEDIUM":
      return c.yellow("MEDIUM");
    case "LOW":
      return c.green("LOW");
    case "UNKNOWN":
    default:
      return c.dim("UNKNOWN");
  }
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

function breakdown(entries: Array<[string, number]>): string[] {
  return entries.length ? entries.map(([key, count]) => `  ${key}: ${count}`) : ["  (none)"];
}

export function formatSummaryText(result: SessionResult, options: TextFormatOptions = {}): string {
  const c = pc.createColors(options.color ?? pc.isColorSupported);
  const stats = result.statistics;
  const successful = result.issues.successful;
  const vulnerable = successful.filter((scan) => scan.vulnerabilitiesFound > 0).length;

  const severityLines = SEVERITIES.filter((severity) => stats.bySeverity[severity]).map(
    (severity) => `  ${severityLabel(c, severity)} ${stats.bySeverity[severity] ?? 0}`
  );
  const affectedLines = Object.entries(stats.affectedComponents).map(
    ([repository, components]) => `  ${repository}: ${components.join(", ")}`
  );

  const lines = [
    c.bold("SCAN SUMMARY"),
    "------------",
    `- Repositories scanned: ${stats.repositoriesScanned}`,
    `- Components found: ${stats.componentsFound}`,
    `- Assets scanned: ${stats.assetsScanned}`,
    `- Vulnerabilities found: ${stats.vulnerabilitiesFound}`,
    `- Scan errors: ${stats.scanErrors}`,
    `- Skipped: ${result.issues.skipped.length}`,
    `- Warnings: ${result.issues.warnings.length}`,
    `- Successful scans: ${successful.length} (clean ${successful.length - vulnerable}, vulnerable ${vulnerable})`,
    `- Duration: ${formatDuration(result.durationMs)}`,
    "- Severity:",
    ...(severityLines.length ? severityLines : ["  (none)"]),
    "- Artifact types:",
    ...breakdown(Object.entries(stats.byArtifactType)),
    "- Repository formats:",
    ...breakdown(Object.entries(stats.byRepositoryFormat)),
    "- Affected components:",
    ...(affectedLines.length ? affectedLines : ["  (none)"])
  ];
  return lines.join("\n");
}

export function formatSessionJson(result: SessionResult): string {
  return JSON.stringify(
    {
      scanTimestamp: result.scanTimestamp,
      repositoryUrl: result.repositoryUrl,
      durationMs: result.durationMs,
      statistics: result.statistics,
      vulnerabilities: result.findings
    },
    null,
    2
  );
}

export const FINDING_CSV_COLUMNS = [
  "repository",
  "repositoryFormat",
  "component",
  "componentVersion",
  "asset",
  "artifactType",
  "imageReference",
  "target",
  "vulnerabilityId",
  "packageName",
  "installedVersion",
  "fixedVersion",
  "severity",
  "title",
  "description",
  "references",
  "strategy",
  "scanTimestamp"
] as const;

type CsvColumn = (typeof FINDING_CSV_COLUMNS)[number];

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvValue(finding: SessionFinding, column: CsvColumn): string {
  if (column === "references") return finding.references.join(" ");
  return finding[column] ?? "";
}

/** RFC 4180: CRLF line endings, header row first. */
export function formatFindingsCsv(findings: readonly SessionFinding[]): string {
  const rows = [
    FINDING_CSV_COLUMNS.join(","),
    ...findings.map((finding) => FINDING_CSV_COLUMNS.map((column) => csvField(csvValue(finding, column))).join(","))
  ];
  return `${rows.join("\r\n")}\r\n`;
}

export function formatIssuesJson(result: SessionResult): string {
  const { errors, skipped, warnings, successful } = result.issues;
  return JSON.stringify(
    {
      scanMetadata: {
        timestamp: result.scanTimestamp,
        repositoryUrl: result.repositoryUrl,
        totalErrors: errors.length,
        totalSkipped: skipped.length,
        totalWarnings: warnings.length,
        totalSuccessfulScans: successful.length
      },
      summary: {
        errorsByReason: groupIssuesByReason(errors),
        skipsByReason: groupIssuesByReason(skipped),
        warningsByReason: groupIssuesByReason(warnings),
        successfulScansByType: groupSuccessfulScansByType(successful)
      },
      issues: { errors, skipped, warnings },
      successfulScans: successful
    },
    null,
    2
  );
}
