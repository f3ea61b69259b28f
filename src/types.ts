export const SEVERITIES = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "UNKNOWN"] as const;

export type Severity = (typeof SEVERITIES)[number];

export const ARTIFACT_TYPES = [
  "java_jar",
  "java_source",
  "maven_pom",
  "python_package",
  "node_package",
  "nuget_package",
  "container_image",
  "docker_manifest",
  "archive",
  "source_code",
  "binary_executable",
  "script",
  "configuration",
  "sbom",
  "security_report",
  "maven_artifact",
  "raw_file",
  "unknown"
] as const;

export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

/**
 * Format tag of a repository as reported by the repository service. The
 * canonical tags are listed here; any other string is carried through as-is
 * and only ever matches the generic rules.
 */
export type RepositoryFormat =
  | "container"
  | "node"
  | "python"
  | "nuget"
  | "maven2"
  | "raw"
  | (string & {});

export type RepositoryKind = "hosted" | "proxy" | "group";

export interface RepositoryDescriptor {
  name: string;
  format: RepositoryFormat;
  type: RepositoryKind | (string & {});
  url?: string;
}

export interface Asset {
  /** Path of the asset inside its repository; identity within the owning component. */
  name: string;
  downloadUrl: string;
  lastModified: string | null;
  fileSize: number | null;
}

export interface Component {
  id?: string;
  repository: string;
  group?: string | null;
  name: string;
  version: string;
  assets: Asset[];
}

export interface VulnerabilityRecord {
  readonly target: string;
  readonly vulnerabilityId: string;
  readonly packageName: string;
  readonly installedVersion: string;
  readonly severity: Severity;
  readonly title: string;
  readonly description: string;
  readonly fixedVersion: string;
  readonly references: readonly string[];
}

/** Raw structured output of the scan engine (`--format json`). Only the fields the normalizer reads. */
export interface EngineReport {
  Results?: EngineResultSection[] | null;
  [key: string]: unknown;
}

export interface EngineResultSection {
  Target?: string;
  Vulnerabilities?: EngineVulnerability[] | null;
  [key: string]: unknown;
}

export interface EngineVulnerability {
  VulnerabilityID?: string;
  PkgName?: string;
  InstalledVersion?: string;
  Severity?: string;
  Title?: string;
  Description?: string;
  FixedVersion?: string;
  References?: string[] | null;
  [key: string]: unknown;
}

export interface SessionFinding extends VulnerabilityRecord {
  readonly repository: string;
  readonly repositoryFormat: RepositoryFormat;
  readonly component: string;
  readonly componentVersion: string;
  readonly asset: string;
  readonly artifactType: ArtifactType;
  readonly strategy: string;
  readonly scanTimestamp: string;
  readonly imageReference?: string;
}

export type ScanIssueType = "error" | "skip" | "warning";

export interface AssetContext {
  repository: string;
  component: string;
  asset: string;
  artifactType: ArtifactType;
}

export interface ScanIssue extends AssetContext {
  timestamp: string;
  type: ScanIssueType;
  reason: string;
  details: string;
}

export interface SuccessfulScan extends AssetContext {
  timestamp: string;
  strategy: string;
  engineMode: string;
  vulnerabilitiesFound: number;
  fileSize: number | null;
  durationMs: number;
  command: string;
}

export interface ScanIssueLog {
  errors: ScanIssue[];
  skipped: ScanIssue[];
  warnings: ScanIssue[];
  successful: SuccessfulScan[];
}

/** Human-readable engine output saved for one asset when individual reports are retained. */
export interface AssetRendering {
  component: string;
  asset: string;
  filePath: string;
}

export interface FinalizedStatistics {
  repositoriesScanned: number;
  componentsFound: number;
  assetsScanned: number;
  assetsSkipped: number;
  vulnerabilitiesFound: number;
  scanErrors: number;
  bySeverity: Partial<Record<Severity, number>>;
  byArtifactType: Partial<Record<ArtifactType, number>>;
  byRepositoryFormat: Record<string, number>;
  affectedComponents: Record<string, string[]>;
}

export interface SessionResult {
  scanTimestamp: string;
  repositoryUrl: string;
  enginePath: string;
  durationMs: number;
  findings: SessionFinding[];
  statistics: FinalizedStatistics;
  issues: ScanIssueLog;
  renderings: AssetRendering[];
}

export type Outcome<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
