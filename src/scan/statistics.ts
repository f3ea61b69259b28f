import {
  ARTIFACT_TYPES,
  SEVERITIES,
  type ArtifactType,
  type FinalizedStatistics,
  type ScanIssueType,
  type Severity,
  type VulnerabilityRecord
} from "../types.js";

/**
 * Accumulator owned by one scan session. It only grows; start a new one per
 * session and combine partial results with `mergeStatistics`.
 */
export interface RunningStatistics {
  repositoriesScanned: number;
  componentsFound: number;
  assetsScanned: number;
  assetsSkipped: number;
  vulnerabilitiesFound: number;
  scanErrors: number;
  bySeverity: Map<Severity, number>;
  byArtifactType: Map<ArtifactType, number>;
  byRepositoryFormat: Map<string, number>;
  affectedComponents: Map<string, Set<string>>;
}

export interface AssetObservation {
  repository: string;
  component: string;
  artifactType: ArtifactType;
  records: readonly Pick<VulnerabilityRecord, "severity">[];
}

export function createRunningStatistics(): RunningStatistics {
  return {
    repositoriesScanned: 0,
    componentsFound: 0,
    assetsScanned: 0,
    assetsSkipped: 0,
    vulnerabilitiesFound: 0,
    scanErrors: 0,
    bySeverity: new Map(),
    byArtifactType: new Map(),
    byRepositoryFormat: new Map(),
    affectedComponents: new Map()
  };
}

function increment<K>(map: Map<K, number>, key: K, by = 1): void {
  map.set(key, (map.get(key) ?? 0) + by);
}

function addAffected(stats: RunningStatistics, repository: string, component: string): void {
  const components = stats.affectedComponents.get(repository) ?? new Set<string>();
  components.add(component);
  stats.affectedComponents.set(repository, components);
}

/** Called exactly once per asset, with no records when the asset was skipped or failed. */
export function recordAsset(stats: RunningStatistics, observation: AssetObservation): void {
  increment(stats.byArtifactType, observation.artifactType);
  for (const record of observation.records) {
    increment(stats.bySeverity, record.severity);
  }
  stats.vulnerabilitiesFound += observation.records.length;
  if (observation.records.length) {
    addAffected(stats, observation.repository, observation.component);
  }
}

export function recordIssue(stats: RunningStatistics, type: ScanIssueType): void {
  if (type === "error") stats.scanErrors += 1;
  else if (type === "skip") stats.assetsSkipped += 1;
}

export function recordRepository(stats: RunningStatistics, format: string, componentCount: number): void {
  stats.repositoriesScanned += 1;
  stats.componentsFound += componentCount;
  increment(stats.byRepositoryFormat, format || "unknown");
}

export function mergeStatistics(a: RunningStatistics, b: RunningStatistics): RunningStatistics {
  const merged = createRunningStatistics();
  for (const source of [a, b]) {
    merged.repositoriesScanned += source.repositoriesScanned;
    merged.componentsFound += source.componentsFound;
    merged.assetsScanned += source.assetsScanned;
    merged.assetsSkipped += source.assetsSkipped;
    merged.vulnerabilitiesFound += source.vulnerabilitiesFound;
    merged.scanErrors += source.scanErrors;
    source.bySeverity.forEach((count, key) => increment(merged.bySeverity, key, count));
    source.byArtifactType.forEach((count, key) => increment(merged.byArtifactType, key, count));
    source.byRepositoryFormat.forEach((count, key) => increment(merged.byRepositoryFormat, key, count));
    source.affectedComponents.forEach((components, repository) => {
      components.forEach((component) => addAffected(merged, repository, component));
    });
  }
  return merged;
}

export function severityCounts(stats: RunningStatistics): Partial<Record<Severity, number>> {
  const counts: Partial<Record<Severity, number>> = {};
  for (const severity of SEVERITIES) {
    const count = stats.bySeverity.get(severity);
    if (count) counts[severity] = count;
  }
  return counts;
}

export function finalizeStatistics(stats: RunningStatistics): FinalizedStatistics {
  const byArtifactType: Partial<Record<ArtifactType, number>> = {};
  for (const artifactType of ARTIFACT_TYPES) {
    const count = stats.byArtifactType.get(artifactType);
    if (count) byArtifactType[artifactType] = count;
  }

  const byRepositoryFormat: Record<string, number> = {};
  for (const format of [...stats.byRepositoryFormat.keys()].sort()) {
    byRepositoryFormat[format] = stats.byRepositoryFormat.get(format) ?? 0;
  }

  const affectedComponents: Record<string, string[]> = {};
  for (const repository of [...stats.affectedComponents.keys()].sort()) {
    const components = stats.affectedComponents.get(repository) ?? new Set<string>();
    affectedComponents[repository] = [...components].sort((a, b) => a.localeCompare(b));
  }

  return {
    repositoriesScanned: stats.repositoriesScanned,
    componentsFound: stats.componentsFound,
    assetsScanned: stats.assetsScanned,
    assetsSkipped: stats.assetsSkipped,
    vulnerabilitiesFound: stats.vulnerabilitiesFound,
    scanErrors: stats.scanErrors,
    bySeverity: severityCounts(stats),
    byArtifactType,
    byRepositoryFormat,
    affectedComponents
  };
}
