import { SEVERITIES, type Severity, type VulnerabilityRecord } from "../types.js";

const UNKNOWN_TARGET = "Unknown";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function normalizeSeverity(raw: unknown): Severity {
  const value = text(raw).trim().toUpperCase();
  return SEVERITIES.find((severity) => severity === value) ?? "UNKNOWN";
}

function references(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

function toRecord(target: string, finding: Record<string, unknown>): VulnerabilityRecord {
  return Object.freeze({
    target,
    vulnerabilityId: text(finding.VulnerabilityID),
    packageName: text(finding.PkgName),
    installedVersion: text(finding.InstalledVersion),
    severity: normalizeSeverity(finding.Severity),
    title: text(finding.Title),
    description: text(finding.Description),
    fixedVersion: text(finding.FixedVersion),
    references: Object.freeze(references(finding.References))
  });
}

/**
 * Flattens engine JSON into one record per finding. Accepts anything: input
 * that is not a report, or a report without results, yields no records.
 */
export function normalizeEngineReport(report: unknown): VulnerabilityRecord[] {
  if (!isRecord(report) || !Array.isArray(report.Results)) return [];

  const records: VulnerabilityRecord[] = [];
  for (const section of report.Results) {
    if (!isRecord(section)) continue;
    const target = text(section.Target).trim() || UNKNOWN_TARGET;
    const findings = Array.isArray(section.Vulnerabilities) ? section.Vulnerabilities : [];
    for (const finding of findings) {
      if (!isRecord(finding)) continue;
      records.push(toRecord(target, finding));
    }
  }
  return records;
}
