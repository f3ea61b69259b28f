import type { ArtifactType, RepositoryFormat } from "../types.js";

/** Bumped whenever a rule is added, removed or moved. */
export const CLASSIFIER_RULESET_VERSION = 1;

export const CHECKSUM_EXTENSIONS = [".md5", ".sha1", ".sha256", ".sha512"];

const FORMAT_ALIASES: Record<string, string> = {
  docker: "container",
  npm: "node",
  pypi: "python",
  maven: "maven2",
  "java-archive": "maven2",
  "generic-raw": "raw"
};

export interface ClassificationInput {
  /** Lower-cased asset name. */
  name: string;
  /** Lower-cased, alias-resolved repository format. */
  format: string;
}

export interface ClassifierRule {
  id: string;
  artifactType: ArtifactType;
  matches: (input: ClassificationInput) => boolean;
}

export function normalizeRepositoryFormat(format: RepositoryFormat | null | undefined): string {
  const value = (format ?? "").trim().toLowerCase();
  return FORMAT_ALIASES[value] ?? value;
}

const endsWithAny = (name: string, suffixes: readonly string[]): boolean =>
  suffixes.some((suffix) => name.endsWith(suffix));

const includesAny = (name: string, needles: readonly string[]): boolean =>
  needles.some((needle) => name.includes(needle));

export function hasChecksumExtension(name: string): boolean {
  return endsWithAny(name.toLowerCase(), CHECKSUM_EXTENSIONS);
}

const isTarball = (name: string): boolean => endsWithAny(name, [".tgz", ".tar.gz"]);

// First match wins. Order is part of the contract: see CLASSIFIER_RULESET_VERSION.
export const CLASSIFIER_RULES: readonly ClassifierRule[] = [
  {
    id: "container-format",
    artifactType: "container_image",
    matches: ({ format }) => format === "container"
  },
  {
    id: "node-format",
    artifactType: "node_package",
    matches: ({ format }) => format === "node"
  },
  {
    id: "checksum",
    artifactType: "script",
    matches: ({ name }) => endsWithAny(name, CHECKSUM_EXTENSIONS)
  },
  {
    id: "java-archive",
    artifactType: "java_jar",
    matches: ({ name }) => endsWithAny(name, [".jar", ".war", ".ear"])
  },
  {
    id: "java-source",
    artifactType: "java_source",
    matches: ({ name }) => endsWithAny(name, [".java", ".class"])
  },
  {
    id: "maven-pom",
    artifactType: "maven_pom",
    matches: ({ name }) => name.includes("pom.xml") || name.endsWith(".pom")
  },
  {
    id: "python-package",
    artifactType: "python_package",
    matches: ({ name }) =>
      endsWithAny(name, [".whl", ".egg"]) || (name.endsWith(".tar.gz") && name.includes("python"))
  },
  {
    id: "nuget-package",
    artifactType: "nuget_package",
    matches: ({ name }) => endsWithAny(name, [".nupkg", ".nuspec"])
  },
  {
    id: "node-package",
    artifactType: "node_package",
    matches: ({ name }) =>
      name.includes("package.json") ||
      name.endsWith(".npm") ||
      (isTarball(name) && includesAny(name, ["node", "client", "npm"]))
  },
  {
    id: "docker-manifest",
    artifactType: "docker_manifest",
    matches: ({ name, format }) =>
      format !== "container" && includesAny(name, ["manifest.json", "config.json"])
  },
  {
    id: "archive",
    artifactType: "archive",
    matches: ({ name, format }) =>
      endsWithAny(name, [".zip", ".7z", ".rar"]) ||
      (format !== "container" && endsWithAny(name, [".tar", ".tar.gz", ".tgz"]))
  },
  {
    id: "binary-executable",
    artifactType: "binary_executable",
    matches: ({ name }) => endsWithAny(name, [".exe", ".dll", ".so", ".dylib"])
  },
  {
    id: "script",
    artifactType: "script",
    matches: ({ name }) => endsWithAny(name, [".sh", ".bat", ".ps1", ".py", ".js"])
  },
  {
    id: "configuration",
    artifactType: "configuration",
    matches: ({ name }) =>
      endsWithAny(name, [".xml", ".json", ".yaml", ".yml", ".properties", ".conf"])
  },
  {
    id: "sbom",
    artifactType: "sbom",
    matches: ({ name }) => name.includes(".spdx") || (name.endsWith(".json") && name.includes("sbom"))
  },
  {
    id: "security-report",
    artifactType: "security_report",
    matches: ({ name }) => includesAny(name, ["trivy-report", "scan-report", ".sarif"])
  },
  {
    id: "maven-format",
    artifactType: "maven_artifact",
    matches: ({ format }) => format === "maven2"
  },
  {
    id: "nuget-format",
    artifactType: "nuget_package",
    matches: ({ format }) => format === "nuget"
  },
  {
    id: "raw-format",
    artifactType: "raw_file",
    matches: ({ format }) => format === "raw"
  }
];

export interface Classification {
  artifactType: ArtifactType;
  /** Id of the rule that matched, or null when nothing did and the result is `unknown`. */
  ruleId: string | null;
}

export function explainClassification(name: string, format: RepositoryFormat): Classification {
  const input: ClassificationInput = {
    name: name.toLowerCase(),
    format: normalizeRepositoryFormat(format)
  };
  for (const rule of CLASSIFIER_RULES) {
    if (rule.matches(input)) {
      return { artifactType: rule.artifactType, ruleId: rule.id };
    }
  }
  return { artifactType: "unknown", ruleId: null };
}

export function classifyArtifact(name: string, format: RepositoryFormat): ArtifactType {
  return explainClassification(name, format).artifactType;
}
