import { noopLogger, type Logger } from "../logging/logger.js";
import type { AssetContext, ScanIssue, ScanIssueLog, ScanIssueType, SuccessfulScan } from "../types.js";

export type SuccessfulScanDetails = Omit<SuccessfulScan, keyof AssetContext | "timestamp">;

export interface ArtifactTypeScanSummary {
  count: number;
  totalVulnerabilities: number;
  cleanScans: number;
}

export function createIssueLog(): ScanIssueLog {
  return { errors: [], skipped: [], warnings: [], successful: [] };
}

export function logIssue(
  log: ScanIssueLog,
  type: ScanIssueType,
  context: AssetContext,
  reason: string,
  details = "",
  logger: Logger = noopLogger
): ScanIssue {
  const issue: ScanIssue = {
    timestamp: new Date().toISOString(),
    type,
    ...context,
    reason,
    details
  };

  if (type === "error") {
    log.errors.push(issue);
    logger.error(`Scan error - ${reason}: ${context.asset}`, { details });
  } else if (type === "skip") {
    log.skipped.push(issue);
    logger.info(`Skipping ${context.asset} - ${reason}`);
  } else {
    log.warnings.push(issue);
    logger.warn(`Scan warning - ${reason}: ${context.asset}`, { details });
  }
  return issue;
}

export function logSuccessfulScan(
  log: ScanIssueLog,
  context: AssetContext,
  details: SuccessfulScanDetails,
  logger: Logger = noopLogger
): SuccessfulScan {
  const scan: SuccessfulScan = { timestamp: new Date().toISOString(), ...context, ...details };
  log.successful.push(scan);
  logger.info(
    details.vulnerabilitiesFound
      ? `Scanned ${context.asset} - found ${details.vulnerabilitiesFound} vulnerabilities`
      : `Scanned ${context.asset} - no vulnerabilities found`
  );
  return scan;
}

export function groupIssuesByReason(issues: readonly ScanIssue[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const issue of issues) {
    counts[issue.reason] = (counts[issue.reason] ?? 0) + 1;
  }
  return counts;
}

export function groupSuccessfulScansByType(scans: readonly SuccessfulScan[]): Record<string, ArtifactTypeScanSummary> {
  const summary: Record<string, ArtifactTypeScanSummary> = {};
  for (const scan of scans) {
    const entry = summary[scan.artifactType] ?? { count: 0, totalVulnerabilities: 0, cleanScans: 0 };
    entry.count += 1;
    entry.totalVulnerabilities += scan.vulnerabilitiesFound;
    if (scan.vulnerabilitiesFound === 0) entry.cleanScans += 1;
    summary[scan.artifactType] = entry;
  }
  return summary;
}
