import { hasChecksumExtension, normalizeRepositoryFormat } from "../classify/artifactClassifier.js";
import type { ArtifactType, RepositoryFormat } from "../types.js";

export type EngineMode = "filesystem" | "image" | "config";

export type ScanStrategy =
  | { readonly kind: "skip"; readonly reason: string }
  | {
      readonly kind: "filesystem";
      readonly extractFirst: boolean;
      readonly treatAsArchive: boolean;
      /** Set when the artifact type had no dedicated entry and the scan is best-effort. */
      readonly fallback: boolean;
      readonly reason: string;
    }
  | { readonly kind: "image"; readonly reason: string }
  | { readonly kind: "config"; readonly reason: string };

export type FilesystemStrategy = Extract<ScanStrategy, { kind: "filesystem" }>;

function requireReason(reason: string): string {
  const trimmed = reason.trim();
  if (!trimmed) {
    throw new Error("Scan strategy requires a non-empty reason.");
  }
  return trimmed;
}

export function skipStrategy(reason: string): ScanStrategy {
  return Object.freeze({ kind: "skip", reason: requireReason(reason) });
}

export function filesystemStrategy(
  reason: string,
  options: { extractFirst?: boolean; treatAsArchive?: boolean; fallback?: boolean } = {}
): ScanStrategy {
  const extractFirst = options.extractFirst ?? false;
  const treatAsArchive = options.treatAsArchive ?? false;
  if (extractFirst && treatAsArchive) {
    throw new Error("A filesystem strategy either extracts first or scans the archive directly, not both.");
  }
  return Object.freeze({
    kind: "filesystem",
    extractFirst,
    treatAsArchive,
    fallback: options.fallback ?? false,
    reason: requireReason(reason)
  });
}

export function imageStrategy(reason: string): ScanStrategy {
  return Object.freeze({ kind: "image", reason: requireReason(reason) });
}

export function configStrategy(reason: string): ScanStrategy {
  return Object.freeze({ kind: "config", reason: requireReason(reason) });
}

export function planScanStrategy(
  artifactType: ArtifactType,
  assetName: string,
  repositoryFormat: RepositoryFormat
): ScanStrategy {
  const format = normalizeRepositoryFormat(repositoryFormat);

  // Checked ahead of the type table so checksum files are skipped whatever the repository format.
  if (hasChecksumExtension(assetName)) {
    return skipStrategy("Hash/checksum file - not scannable");
  }

  switch (artifactType) {
    case "java_jar":
    case "maven_artifact":
      return filesystemStrategy("Java archive - scan for dependencies and vulnerabilities", {
        treatAsArchive: true
      });
    default:
      break;
  }

  if (artifactType === "container_image" || format === "container") {
    return imageStrategy("Container image - engine scans the image layers");
  }

  switch (artifactType) {
    case "python_package":
      return filesystemStrategy("Python package - scan for dependencies", { treatAsArchive: true });
    case "node_package": {
      const lower = assetName.toLowerCase();
      if (lower.endsWith(".tgz") || lower.endsWith(".tar.gz")) {
        return filesystemStrategy("Node package tarball - extract to locate package manifests", {
          extractFirst: true
        });
      }
      return filesystemStrategy("Node package - scan for dependencies", { treatAsArchive: true });
    }
    case "nuget_package":
      return filesystemStrategy("NuGet package - scan for dependencies", { treatAsArchive: true });
    case "archive":
    case "source_code":
      return filesystemStrategy("Archive/source code - extract and scan contents", { extractFirst: true });
    case "configuration":
    case "sbom":
      return configStrategy("Configuration/SBOM file - scan for misconfigurations");
    case "security_report":
      return skipStrategy("Existing security report - skip to avoid recursive scanning of scan output");
    default:
      return filesystemStrategy(
        `Unrecognized artifact type (${artifactType}) - best-effort filesystem scan`,
        { fallback: true }
      );
  }
}

export function engineModeOf(strategy: ScanStrategy): EngineMode | null {
  return strategy.kind === "skip" ? null : strategy.kind;
}

/** Subcommand the engine CLI expects for a mode. */
export function engineSubcommand(mode: EngineMode): "fs" | "image" | "config" {
  return mode === "filesystem" ? "fs" : mode;
}

export function describeStrategy(strategy: ScanStrategy): string {
  switch (strategy.kind) {
    case "skip":
      return `skip (${strategy.reason})`;
    case "filesystem": {
      const flags = [
        strategy.extractFirst ? "extract first" : null,
        strategy.treatAsArchive ? "as archive" : null,
        strategy.fallback ? "fallback" : null
      ].filter((flag): flag is string => flag !== null);
      return flags.length ? `filesystem [${flags.join(", ")}]` : "filesystem";
    }
    case "image":
      return "image";
    case "config":
      return "config";
  }
}
