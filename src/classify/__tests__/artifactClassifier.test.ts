import assert from "node:assert/strict";
import { test } from "node:test";
import {
  CHECKSUM_EXTENSIONS,
  CLASSIFIER_RULES,
  classifyArtifact,
  explainClassification,
  normalizeRepositoryFormat
} from "../artifactClassifier.js";
import { planScanStrategy } from "../../scan/strategy.js";
import { ARTIFACT_TYPES } from "../../types.js";

const FORMATS = ["maven2", "node", "python", "nuget", "raw", "container", "docker", "npm", "helm", ""];

const NAMES = [
  "libfoo-1.2.3.jar",
  "checksums/app.sha256",
  "web-client-1.0.0.tgz",
  "requests-2.31.0-py3-none-any.whl",
  "Package.1.0.0.nupkg",
  "config/application.yaml",
  "bin/tool.exe",
  "README",
  "",
  "weird name with spaces.TXT"
];

test("classifier: java archive in a maven repository", () => {
  assert.equal(classifyArtifact("libfoo-1.2.3.jar", "maven2"), "java_jar");
});

test("classifier: checksum file in a raw repository is a script", () => {
  assert.equal(classifyArtifact("checksums/app.sha256", "raw"), "script");
  assert.equal(explainClassification("checksums/app.sha256", "raw").ruleId, "checksum");
});

test("classifier: repository format overrides the file name", () => {
  assert.equal(classifyArtifact("library/nginx/manifests/latest", "container"), "container_image");
  assert.equal(classifyArtifact("libfoo-1.2.3.jar", "docker"), "container_image");
  assert.equal(classifyArtifact("lodash/-/lodash-4.17.21.tgz", "node"), "node_package");
  assert.equal(classifyArtifact("app.sha1", "npm"), "node_package");
});

test("classifier: matching ignores case", () => {
  assert.equal(classifyArtifact("APP.JAR", "raw"), "java_jar");
  assert.equal(classifyArtifact("Setup.EXE", "raw"), "binary_executable");
  assert.equal(classifyArtifact("anything", "MAVEN2"), "maven_artifact");
});

test("classifier: extension rules", () => {
  const cases: Array<[string, string, string]> = [
    ["src/Main.java", "raw", "java_source"],
    ["Main.class", "raw", "java_source"],
    ["com/acme/lib/1.0/pom.xml", "maven2", "maven_pom"],
    ["lib-1.0.pom", "maven2", "maven_pom"],
    ["requests-2.31.0-py3-none-any.whl", "pypi", "python_package"],
    ["python-utils-1.0.tar.gz", "raw", "python_package"],
    ["Package.1.0.0.nupkg", "raw", "nuget_package"],
    ["web-client-1.0.0.tgz", "raw", "node_package"],
    ["app/package.json", "raw", "node_package"],
    ["image/manifest.json", "raw", "docker_manifest"],
    ["bundle.zip", "raw", "archive"],
    ["data.tar", "raw", "archive"],
    ["release.tgz", "raw", "archive"],
    ["lib/native.so", "raw", "binary_executable"],
    ["install.sh", "raw", "script"],
    ["settings.properties", "raw", "configuration"],
    ["bom.spdx", "raw", "sbom"],
    ["results.sarif", "raw", "security_report"]
  ];
  for (const [name, format, expected] of cases) {
    assert.equal(classifyArtifact(name, format), expected, `${name} (${format})`);
  }
});

test("classifier: earlier rules shadow later ones", () => {
  // Configuration is checked before the sbom and report hints.
  assert.equal(classifyArtifact("app.sbom.json", "raw"), "configuration");
  assert.equal(classifyArtifact("trivy-report.json", "raw"), "configuration");
  // A python tarball wins over the generic archive rule.
  assert.equal(classifyArtifact("python-lib-2.0.tar.gz", "raw"), "python_package");
});

test("classifier: repository format fallbacks", () => {
  assert.equal(classifyArtifact("README", "maven2"), "maven_artifact");
  assert.equal(classifyArtifact("README", "nuget"), "nuget_package");
  assert.equal(classifyArtifact("README", "raw"), "raw_file");
  assert.equal(classifyArtifact("README", "generic-raw"), "raw_file");
});

test("classifier: nothing matches => unknown with no rule", () => {
  assert.deepEqual(explainClassification("README", "helm"), { artifactType: "unknown", ruleId: null });
});

test("classifier: deterministic and total", () => {
  for (const format of FORMATS) {
    for (const name of NAMES) {
      const first = classifyArtifact(name, format);
      assert.ok(ARTIFACT_TYPES.some((type) => type === first), `${name} (${format}) => ${first}`);
      assert.equal(classifyArtifact(name, format), first);
    }
  }
});

test("classifier: checksum names are skipped in every repository format", () => {
  for (const ext of CHECKSUM_EXTENSIONS) {
    for (const format of FORMATS) {
      const name = `dist/artifact-1.0${ext}`;
      const strategy = planScanStrategy(classifyArtifact(name, format), name, format);
      assert.equal(strategy.kind, "skip", `${name} (${format})`);
    }
  }
});

test("classifier: rule ids are unique and the order starts with the format overrides", () => {
  const ids = CLASSIFIER_RULES.map((rule) => rule.id);
  assert.equal(new Set(ids).size, ids.length);
  assert.deepEqual(ids.slice(0, 3), ["container-format", "node-format", "checksum"]);
});

test("classifier: format aliases", () => {
  assert.equal(normalizeRepositoryFormat(" Docker "), "container");
  assert.equal(normalizeRepositoryFormat("java-archive"), "maven2");
  assert.equal(normalizeRepositoryFormat(null), "");
  assert.equal(normalizeRepositoryFormat("helm"), "helm");
});
