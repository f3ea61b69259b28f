import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import AdmZip from "adm-zip";
import { create as createTar } from "tar";
import { detectArchiveFormat, extractArchive } from "../extractArchive.js";

async function makeTempDir(t: { after: (fn: () => Promise<void>) => void }): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "artiscan-extract-"));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  return dir;
}

async function makeSourceTree(root: string): Promise<void> {
  await mkdir(path.join(root, "src", "pkg"), { recursive: true });
  await writeFile(path.join(root, "src", "pkg", "package.json"), '{"name":"demo"}\n', "utf-8");
}

test("extractArchive: detects formats by extension", () => {
  assert.equal(detectArchiveFormat("a/b/lib.JAR"), "zip");
  assert.equal(detectArchiveFormat("app.war"), "zip");
  assert.equal(detectArchiveFormat("bundle.zip"), "zip");
  assert.equal(detectArchiveFormat("lodash-4.17.21.tgz"), "tar.gz");
  assert.equal(detectArchiveFormat("release.tar.gz"), "tar.gz");
  assert.equal(detectArchiveFormat("release.tar"), "tar");
  assert.equal(detectArchiveFormat("release.rar"), null);
});

test("extractArchive: zip", async (t) => {
  const dir = await makeTempDir(t);
  const archive = path.join(dir, "bundle.zip");
  const zip = new AdmZip();
  zip.addFile("pkg/package.json", Buffer.from('{"name":"demo"}\n', "utf-8"));
  zip.writeZip(archive);

  const dest = path.join(dir, "out");
  const result = await extractArchive(archive, dest);

  assert.deepEqual(result, { ok: true, value: { format: "zip", destination: dest } });
  assert.equal(await readFile(path.join(dest, "pkg", "package.json"), "utf-8"), '{"name":"demo"}\n');
});

test("extractArchive: jar is unpacked as zip", async (t) => {
  const dir = await makeTempDir(t);
  const archive = path.join(dir, "lib-1.0.jar");
  const zip = new AdmZip();
  zip.addFile("META-INF/MANIFEST.MF", Buffer.from("Manifest-Version: 1.0\n", "utf-8"));
  zip.writeZip(archive);

  const dest = path.join(dir, "out");
  const result = await extractArchive(archive, dest);

  assert.equal(result.ok, true);
  assert.ok(existsSync(path.join(dest, "META-INF", "MANIFEST.MF")));
});

test("extractArchive: gzip tarball", async (t) => {
  const dir = await makeTempDir(t);
  const source = path.join(dir, "source");
  await makeSourceTree(source);
  const archive = path.join(dir, "demo-1.0.0.tgz");
  await createTar({ gzip: true, file: archive, cwd: path.join(source, "src") }, ["pkg"]);

  const dest = path.join(dir, "out");
  const result = await extractArchive(archive, dest);

  assert.deepEqual(result, { ok: true, value: { format: "tar.gz", destination: dest } });
  assert.equal(await readFile(path.join(dest, "pkg", "package.json"), "utf-8"), '{"name":"demo"}\n');
});

test("extractArchive: plain tar", async (t) => {
  const dir = await makeTempDir(t);
  const source = path.join(dir, "source");
  await makeSourceTree(source);
  const archive = path.join(dir, "demo.tar");
  await createTar({ file: archive, cwd: path.join(source, "src") }, ["pkg"]);

  const dest = path.join(dir, "out");
  const result = await extractArchive(archive, dest);

  assert.equal(result.ok, true);
  assert.ok(existsSync(path.join(dest, "pkg", "package.json")));
});

test("extractArchive: unsupported format fails with the destination already created", async (t) => {
  const dir = await makeTempDir(t);
  const archive = path.join(dir, "release.rar");
  await writeFile(archive, "rar", "utf-8");

  const dest = path.join(dir, "out");
  const result = await extractArchive(archive, dest);

  assert.ok(!result.ok);
  assert.equal(result.error.unsupported, true);
  assert.equal(result.error.kind, "extraction");
  assert.equal(result.error.message, "Unsupported archive format: release.rar");
  assert.deepEqual(await readdir(dest), []);
});

test("extractArchive: a destination that cannot be created is reported", async (t) => {
  const dir = await makeTempDir(t);
  const blocker = path.join(dir, "blocker");
  await writeFile(blocker, "", "utf-8");
  const archive = path.join(dir, "bundle.zip");
  await writeFile(archive, "zip", "utf-8");

  const result = await extractArchive(archive, path.join(blocker, "out"));

  assert.ok(!result.ok);
  assert.equal(result.error.unsupported, false);
  assert.ok(result.error.message.startsWith(`Could not create ${path.join(blocker, "out")}: `));
});

test("extractArchive: corrupt archive is reported, not thrown", async (t) => {
  const dir = await makeTempDir(t);
  const archive = path.join(dir, "broken.zip");
  await writeFile(archive, "this is not a zip file", "utf-8");

  const result = await extractArchive(archive, path.join(dir, "out"));

  assert.ok(!result.ok);
  assert.equal(result.error.unsupported, false);
  assert.match(result.error.message, /^Error extracting broken\.zip: /);
});
