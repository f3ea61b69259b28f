import path from "node:path";
import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import fg from "fast-glob";
import { ManifestSynthesisError, errorMessage } from "../errors/pipeline.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";

export const NODE_MANIFEST = "package.json";
export const SYNTHETIC_LOCK_FILE = "package-lock.json";
export const RECOGNIZED_LOCK_FILES = [
  "package-lock.json",
  "npm-shrinkwrap.json",
  "yarn.lock",
  "pnpm-lock.yaml"
];

const PLACEHOLDER_INTEGRITY = `sha512-${"0".repeat(64)}`;
const PLACEHOLDER_LICENSE = "MIT";
const REGISTRY_BASE = "https://registry.npmjs.org";
const PACKAGE_NAME_PATTERN = /^(?:@[a-z0-9-~][a-z0-9-._~]*\/)?[a-z0-9-~][a-z0-9-._~]*$/i;

export interface DeclaredManifest {
  name: string;
  version: string;
  dependencies: Record<string, string>;
}

export interface SyntheticLockEntry {
  version: string;
  resolved: string;
  integrity: string;
}

export interface SyntheticRootPackage {
  name: string;
  version: string;
  license: string;
  dependencies?: Record<string, string>;
}

/** `packages` entries carry a license; the legacy `dependencies` section does not. */
export interface SyntheticPackageEntry extends SyntheticLockEntry {
  license: string;
}

export interface SyntheticLock {
  name: string;
  version: string;
  lockfileVersion: 3;
  requires: true;
  packages: Record<string, SyntheticRootPackage | SyntheticPackageEntry>;
  dependencies: Record<string, SyntheticLockEntry>;
}

export type ManifestSynthesisResult =
  | { manifestPath: string; status: "skipped"; lockFile: string }
  | {
      manifestPath: string;
      status: "synthesized";
      lockFile: string;
      dependencies: string[];
      ignoredDependencies: string[];
    }
  | { manifestPath: string; status: "failed"; error: ManifestSynthesisError };

export interface SynthesisSummary {
  results: ManifestSynthesisResult[];
  synthesized: number;
  skipped: number;
  failed: number;
}

/**
 * Reduces a declared range to a single version by dropping leading range
 * operators. Lossy: `>=1.0.0 <2.0.0` becomes `1.0.0 <2.0.0`, and tags such
 * as `latest` pass through untouched.
 */
export function normalizeVersionRange(range: string): string {
  return range.replace(/^[\s^~>=<]+/, "").trim();
}

export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME_PATTERN.test(name) && !name.split("/").some((part) => part === "." || part === "..");
}

function tarballUrl(name: string, version: string): string {
  const bareName = name.startsWith("@") ? name.slice(name.indexOf("/") + 1) : name;
  return `${REGISTRY_BASE}/${name}/-/${bareName}-${version}.tgz`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseDeclaredManifest(raw: string): DeclaredManifest {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("manifest root is not an object");
  }
  const declared = parsed.dependencies ?? {};
  if (!isRecord(declared)) {
    throw new Error("dependencies is not an object");
  }
  const dependencies: Record<string, string> = {};
  for (const [name, range] of Object.entries(declared)) {
    if (typeof range === "string") dependencies[name] = range;
  }
  return {
    name: typeof parsed.name === "string" && parsed.name ? parsed.name : "unknown",
    version: typeof parsed.version === "string" && parsed.version ? parsed.version : "0.0.0",
    dependencies
  };
}

export function buildSyntheticLock(manifest: DeclaredManifest): SyntheticLock {
  const lock: SyntheticLock = {
    name: manifest.name,
    version: manifest.version,
    lockfileVersion: 3,
    requires: true,
    packages: {
      "": {
        name: manifest.name,
        version: manifest.version,
        license: PLACEHOLDER_LICENSE,
        ...(Object.keys(manifest.dependencies).length ? { dependencies: { ...manifest.dependencies } } : {})
      }
    },
    dependencies: {}
  };

  for (const [name, range] of Object.entries(manifest.dependencies)) {
    const version = normalizeVersionRange(range);
    const entry: SyntheticLockEntry = {
      version,
      resolved: tarballUrl(name, version),
      integrity: PLACEHOLDER_INTEGRITY
    };
    lock.packages[`node_modules/${name}`] = { ...entry, license: PLACEHOLDER_LICENSE };
    lock.dependencies[name] = entry;
  }

  return lock;
}

export function findExistingLockFile(packageDir: string): string | null {
  for (const lockName of RECOGNIZED_LOCK_FILES) {
    const candidate = path.join(packageDir, lockName);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

export async function locateNodeManifests(root: string): Promise<string[]> {
  const entries = await fg([`**/${NODE_MANIFEST}`], {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: ["**/node_modules/**"]
  });
  return entries.sort((a, b) => a.localeCompare(b));
}

async function materializeDependency(packageDir: string, name: string, version: string): Promise<void> {
  const modulesDir = path.join(packageDir, "node_modules");
  const depDir = path.resolve(modulesDir, name);
  if (!depDir.startsWith(`${modulesDir}${path.sep}`)) {
    throw new Error(`dependency ${name} resolves outside node_modules`);
  }
  await mkdir(depDir, { recursive: true });
  await writeFile(path.join(depDir, NODE_MANIFEST), `${JSON.stringify({ name, version }, null, 2)}\n`, "utf-8");
}

export async function synthesizeManifest(
  manifestPath: string,
  logger: Logger = noopLogger
): Promise<ManifestSynthesisResult> {
  const packageDir = path.dirname(manifestPath);
  const existing = findExistingLockFile(packageDir);
  if (existing) {
    logger.debug("Lock file already present, leaving manifest as-is", { manifest: manifestPath, lockFile: existing });
    return { manifestPath, status: "skipped", lockFile: existing };
  }

  try {
    const declared = parseDeclaredManifest(await readFile(manifestPath, "utf-8"));
    const ignoredDependencies = Object.keys(declared.dependencies).filter((name) => !isValidPackageName(name));
    for (const name of ignoredDependencies) {
      delete declared.dependencies[name];
    }
    if (ignoredDependencies.length) {
      logger.warn("Ignoring dependencies with invalid package names", { manifest: manifestPath, ignoredDependencies });
    }

    const lock = buildSyntheticLock(declared);
    for (const [name, entry] of Object.entries(lock.dependencies)) {
      await materializeDependency(packageDir, name, entry.version);
    }
    // Lock file last: its presence marks the package as done.
    const lockFile = path.join(packageDir, SYNTHETIC_LOCK_FILE);
    await writeFile(lockFile, `${JSON.stringify(lock, null, 2)}\n`, "utf-8");

    const dependencies = Object.keys(lock.dependencies);
    logger.info("Synthesized lock file for node package", {
      manifest: manifestPath,
      package: `${declared.name}@${declared.version}`,
      dependencies: dependencies.length
    });
    return { manifestPath, status: "synthesized", lockFile, dependencies, ignoredDependencies };
  } catch (err) {
    const error = new ManifestSynthesisError(manifestPath, errorMessage(err));
    logger.warn(error.message);
    return { manifestPath, status: "failed", error };
  }
}

/**
 * Writes a lock file and a minimal `node_modules/` tree next to every
 * `package.json` under `root` that has no lock file of its own.
 */
export async function synthesizeNodeManifests(
  root: string,
  logger: Logger = noopLogger,
  locate: (root: string) => Promise<string[]> = locateNodeManifests
): Promise<SynthesisSummary> {
  let manifests: string[];
  try {
    manifests = await locate(root);
  } catch (err) {
    const error = new ManifestSynthesisError(root, `could not walk extracted tree: ${errorMessage(err)}`);
    logger.warn(error.message);
    return { results: [{ manifestPath: root, status: "failed", error }], synthesized: 0, skipped: 0, failed: 1 };
  }
  const results: ManifestSynthesisResult[] = [];
  for (const manifestPath of manifests) {
    results.push(await synthesizeManifest(manifestPath, logger));
  }
  return {
    results,
    synthesized: results.filter((result) => result.status === "synthesized").length,
    skipped: results.filter((result) => result.status === "skipped").length,
    failed: results.filter((result) => result.status === "failed").length
  };
}
