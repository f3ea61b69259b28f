import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { loadConfig, resolveConfig, validateConfig } from "../loadConfig.js";
import { loadDotEnv } from "../env.js";
import {
  ConfigInvalidFileError,
  ConfigMissingCredentialsError,
  ConfigMissingRepositoryUrlError
} from "../../errors/config.errors.js";

const ENV_KEYS = [
  "NEXUS_URL",
  "NEXUS_USERNAME",
  "NEXUS_PASSWORD",
  "ARTISCAN_TRIVY_PATH",
  "ARTISCAN_TRIVY_TEMPLATE",
  "ARTISCAN_OUTPUT_DIR",
  "ARTISCAN_SCAN_TIMEOUT_SECONDS",
  "ARTISCAN_REPOSITORIES",
  "ARTISCAN_RETAIN_REPORTS",
  "ARTISCAN_LOG_LEVEL"
];

const applyEnv = (t: { after: (fn: () => void) => void }, env: Record<string, string | undefined>) => {
  const snapshot = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  for (const key of ENV_KEYS) {
    const value = Object.prototype.hasOwnProperty.call(env, key) ? env[key] : undefined;
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  t.after(() => {
    for (const key of ENV_KEYS) {
      const value = snapshot.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });
};

async function makeProject(
  t: { after: (fn: () => Promise<void>) => void },
  files: Record<string, string> = {}
): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), "artiscan-config-"));
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(root, name), content, "utf-8");
  }
  return root;
}

test("config: environment supplies the repository and engine", async (t) => {
  const root = await makeProject(t, { "trivy-bin": "" });
  applyEnv(t, {
    NEXUS_URL: "https://nexus.example.test///",
    NEXUS_USERNAME: "scanner",
    NEXUS_PASSWORD: "test-secret",
    ARTISCAN_TRIVY_PATH: "trivy-bin",
    ARTISCAN_REPOSITORIES: "maven-releases, npm-hosted,,",
    ARTISCAN_SCAN_TIMEOUT_SECONDS: "120",
    ARTISCAN_LOG_LEVEL: "WARNING"
  });

  const cfg = await loadConfig({ projectRoot: root });

  assert.equal(cfg.repository.url, "https://nexus.example.test");
  assert.equal(cfg.repository.username, "scanner");
  assert.equal(cfg.repository.password, "test-secret");
  assert.equal(cfg.engine.path, path.join(root, "trivy-bin"));
  assert.equal(cfg.engine.templatePath, path.join(root, "contrib", "html.tpl"));
  assert.equal(cfg.engine.timeoutSeconds, 120);
  assert.equal(cfg.engine.vulnOnly, true);
  assert.deepEqual(cfg.scan.repositories, ["maven-releases", "npm-hosted"]);
  assert.deepEqual(cfg.scan.repositoryKinds, ["hosted"]);
  assert.equal(cfg.output.dir, path.join(root, "vulnerability_reports"));
  assert.equal(cfg.output.format, "text");
  assert.equal(cfg.output.retainIndividualReports, false);
  assert.equal(cfg.logging.level, "warn");
  assert.equal(cfg.logging.console, false);
});

test("config: file values apply where the environment is silent", async (t) => {
  const root = await makeProject(t, {
    "artiscan.config.json": JSON.stringify({
      repository: { url: "https://file.example.test/", username: "file-user", password: "file-secret", requestTimeoutMs: 5000 },
      engine: { timeoutSeconds: 60, vulnOnly: false, templatePath: "templates/report.tpl" },
      scan: { repositories: ["raw-hosted"], repositoryKinds: ["hosted", "proxy"], nodeManifestSynthesis: false },
      output: { dir: "out", format: "json", retainIndividualReports: true },
      logging: { level: "debug", console: true }
    })
  });
  applyEnv(t, { NEXUS_PASSWORD: "test-secret", ARTISCAN_TRIVY_PATH: "missing/trivy" });

  const cfg = await resolveConfig({ projectRoot: root });

  assert.equal(cfg.repository.url, "https://file.example.test");
  assert.equal(cfg.repository.username, "file-user");
  assert.equal(cfg.repository.password, "test-secret");
  assert.equal(cfg.repository.requestTimeoutMs, 5000);
  assert.equal(cfg.engine.path, null);
  assert.equal(cfg.engine.templatePath, path.join(root, "templates", "report.tpl"));
  assert.equal(cfg.engine.timeoutSeconds, 60);
  assert.equal(cfg.engine.vulnOnly, false);
  assert.deepEqual(cfg.scan, { repositories: ["raw-hosted"], repositoryKinds: ["hosted", "proxy"], nodeManifestSynthesis: false });
  assert.deepEqual(cfg.output, { dir: path.join(root, "out"), format: "json", retainIndividualReports: true });
  assert.deepEqual(cfg.logging, { level: "debug", console: true });
});

test("config: overrides beat the environment and the file", async (t) => {
  const root = await makeProject(t, {
    "artiscan.config.json": JSON.stringify({ output: { format: "json", dir: "file-out" } })
  });
  applyEnv(t, {
    NEXUS_URL: "https://nexus.example.test",
    ARTISCAN_OUTPUT_DIR: "env-out",
    ARTISCAN_REPOSITORIES: "from-env",
    ARTISCAN_RETAIN_REPORTS: "yes",
    ARTISCAN_TRIVY_PATH: "missing/trivy"
  });

  const cfg = await resolveConfig({
    projectRoot: root,
    overrides: {
      repositories: ["from-cli"],
      outputDir: "cli-out",
      format: "text",
      retainIndividualReports: false,
      logLevel: "debug",
      logToConsole: true
    }
  });

  assert.deepEqual(cfg.scan.repositories, ["from-cli"]);
  assert.equal(cfg.output.dir, path.join(root, "cli-out"));
  assert.equal(cfg.output.format, "text");
  assert.equal(cfg.output.retainIndividualReports, false);
  assert.equal(cfg.logging.level, "debug");
  assert.equal(cfg.logging.console, true);
});

test("config: .env fills unset variables only", async (t) => {
  const root = await makeProject(t, {
    ".env": [
      "# repository",
      "NEXUS_URL=https://dotenv.example.test",
      'NEXUS_USERNAME="dotenv-user"',
      "export NEXUS_PASSWORD='test-secret'"
    ].join("\n")
  });
  applyEnv(t, { NEXUS_USERNAME: "shell-user", ARTISCAN_TRIVY_PATH: "missing/trivy" });

  const cfg = await resolveConfig({ projectRoot: root });

  assert.equal(cfg.repository.url, "https://dotenv.example.test");
  assert.equal(cfg.repository.username, "shell-user");
  assert.equal(cfg.repository.password, "test-secret");
});

test("config: loadDotEnv reports the keys it applied", async (t) => {
  const root = await makeProject(t, {
    "scan.env": ["NEXUS_URL=https://dotenv.example.test", "ARTISCAN_LOG_LEVEL=debug"].join("\n")
  });
  applyEnv(t, { NEXUS_URL: "https://shell.example.test" });

  assert.deepEqual(loadDotEnv(root, "scan.env"), ["ARTISCAN_LOG_LEVEL"]);
  assert.equal(process.env.NEXUS_URL, "https://shell.example.test");
  assert.equal(process.env.ARTISCAN_LOG_LEVEL, "debug");
  assert.deepEqual(loadDotEnv(root, "absent.env"), []);
});

test("config: missing URL and credentials are reported", async (t) => {
  const root = await makeProject(t);
  applyEnv(t, { ARTISCAN_TRIVY_PATH: "missing/trivy" });

  await assert.rejects(loadConfig({ projectRoot: root }), ConfigMissingRepositoryUrlError);

  const cfg = await resolveConfig({ projectRoot: root });
  assert.deepEqual(validateConfig(cfg), [
    "NEXUS_URL",
    "NEXUS_USERNAME",
    "NEXUS_PASSWORD",
    "Trivy executable (not found in ./trivy/ or on PATH)"
  ]);
});

test("config: missing credentials name every absent variable", async (t) => {
  const root = await makeProject(t);
  applyEnv(t, { NEXUS_URL: "https://nexus.example.test", NEXUS_USERNAME: "scanner" });

  await assert.rejects(loadConfig({ projectRoot: root }), (err: unknown) => {
    assert.ok(err instanceof ConfigMissingCredentialsError);
    assert.deepEqual(err.missing, ["NEXUS_PASSWORD"]);
    return true;
  });
});

test("config: malformed config file is rejected", async (t) => {
  const root = await makeProject(t, { "custom.json": "{ not json", "array.json": "[]" });
  applyEnv(t, {});

  await assert.rejects(resolveConfig({ projectRoot: root, configPath: "custom.json" }), ConfigInvalidFileError);
  await assert.rejects(resolveConfig({ projectRoot: root, configPath: "array.json" }), /root must be an object/);
});
