import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { createAppLogger, isLevelEnabled, parseLogLevel } from "../logger.js";

const ANSI = /\x1b\[[0-9;]*m/g;

async function makeTempDir(t: { after: (fn: () => Promise<void>) => void }): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "artiscan-log-"));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  return dir;
}

test("logger: level parsing", () => {
  assert.equal(parseLogLevel("DEBUG"), "debug");
  assert.equal(parseLogLevel("warning"), "warn");
  assert.equal(parseLogLevel("verbose", "error"), "error");
  assert.equal(parseLogLevel(null), "info");
  assert.equal(isLevelEnabled("warn", "info"), true);
  assert.equal(isLevelEnabled("debug", "info"), false);
});

test("logger: writes JSONL at or above the threshold", async (t) => {
  const dir = await makeTempDir(t);
  const logger = await createAppLogger({ logDir: path.join(dir, "logs"), label: "scan", level: "info" });

  logger.debug("hidden");
  logger.info("Scanning repository: maven-releases", { format: "maven2" });
  logger.warn("Scan warning - Archive extraction failed: bundle.zip");
  await logger.close();
  logger.error("after close");

  assert.equal(path.dirname(logger.path), path.join(dir, "logs"));
  assert.match(path.basename(logger.path), /^scan-.*\.jsonl$/);
  const entries = (await readFile(logger.path, "utf-8"))
    .trim()
    .split("\n")
    .map((line): unknown => JSON.parse(line));
  assert.equal(entries.length, 2);
  const [first, second] = entries;
  assert.ok(typeof first === "object" && first !== null && "timestamp" in first);
  assert.ok(typeof first.timestamp === "string");
  assert.deepEqual({ ...first, timestamp: "" }, {
    timestamp: "",
    level: "info",
    message: "Scanning repository: maven-releases",
    meta: { format: "maven2" }
  });
  assert.ok(typeof second === "object" && second !== null);
  assert.deepEqual({ ...second, timestamp: "" }, {
    timestamp: "",
    level: "warning",
    message: "Scan warning - Archive extraction failed: bundle.zip"
  });
});

test("logger: console sink mirrors entries", async (t) => {
  const dir = await makeTempDir(t);
  const chunks: string[] = [];
  const logger = await createAppLogger({
    logDir: dir,
    level: "warn",
    console: { write: (chunk) => chunks.push(chunk) }
  });

  logger.info("quiet");
  logger.warn("Requested repositories not found", { repositories: ["ghost"] });
  await logger.close();

  assert.deepEqual(
    chunks.map((chunk) => chunk.replace(ANSI, "")),
    ['WARN Requested repositories not found {"repositories":["ghost"]}\n']
  );
});
