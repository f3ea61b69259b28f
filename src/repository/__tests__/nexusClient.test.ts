import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { NexusClient, type FetchLike } from "../nexusClient.js";
import { RepositoryRequestError } from "../../errors/repository.errors.js";

type Call = { url: string; headers: Record<string, string> };

function fakeFetch(routes: Record<string, () => Response>): { fetch: FetchLike; calls: Call[] } {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({ url, headers });
    const route = routes[url];
    if (!route) return new Response("not found", { status: 404, statusText: "Not Found" });
    return route();
  };
  return { fetch, calls };
}

const json = (body: unknown, status = 200) => () =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

const BASE = "https://nexus.example.test";

function client(fetch: FetchLike): NexusClient {
  return new NexusClient({ baseUrl: `${BASE}/`, username: "scanner", password: "test-secret", requestTimeoutMs: 1000, fetch });
}

test("nexus client: status check sends basic auth", async () => {
  const { fetch, calls } = fakeFetch({ [`${BASE}/service/rest/v1/status`]: () => new Response(null, { status: 200 }) });

  assert.equal(await client(fetch).testConnection(), true);
  assert.equal(calls[0]?.headers.authorization, `Basic ${Buffer.from("scanner:test-secret").toString("base64")}`);
});

test("nexus client: failed status check is false, not an exception", async () => {
  const refused: FetchLike = async () => {
    throw new Error("connect ECONNREFUSED");
  };
  const unauthorized = fakeFetch({ [`${BASE}/service/rest/v1/status`]: () => new Response(null, { status: 401 }) });

  assert.equal(await client(refused).testConnection(), false);
  assert.equal(await client(unauthorized.fetch).testConnection(), false);
});

test("nexus client: registry host drops the scheme", () => {
  assert.equal(client(fakeFetch({}).fetch).registryHost, "nexus.example.test");
});

test("nexus client: repositories filtered by kind", async () => {
  const { fetch } = fakeFetch({
    [`${BASE}/service/rest/v1/repositories`]: json([
      { name: "maven-releases", format: "maven2", type: "hosted", url: `${BASE}/repository/maven-releases` },
      { name: "maven-central", format: "maven2", type: "proxy" },
      { name: "docker-hosted", format: "docker", type: "hosted" },
      { format: "raw", type: "hosted" }
    ])
  });

  const repositories = await client(fetch).listRepositories(["hosted"]);

  assert.deepEqual(repositories, [
    { name: "maven-releases", format: "maven2", type: "hosted", url: `${BASE}/repository/maven-releases` },
    { name: "docker-hosted", format: "docker", type: "hosted", url: undefined }
  ]);
});

test("nexus client: rejected listing raises a request error", async () => {
  const { fetch } = fakeFetch({});
  await assert.rejects(client(fetch).listRepositories(["hosted"]), (err: unknown) => {
    assert.ok(err instanceof RepositoryRequestError);
    assert.equal(err.status, 404);
    assert.equal(err.message, `Repository request to ${BASE}/service/rest/v1/repositories failed (HTTP 404): Not Found`);
    return true;
  });
});

test("nexus client: components follow continuation tokens", async () => {
  const { fetch, calls } = fakeFetch({
    [`${BASE}/service/rest/v1/components?repository=raw+hosted`]: json({
      items: [
        {
          id: "c1",
          repository: "raw hosted",
          name: "tools",
          version: "1.0",
          assets: [
            { path: "tools/1.0/tools.zip", downloadUrl: `${BASE}/repository/raw/tools.zip`, fileSize: 12 },
            { downloadUrl: `${BASE}/repository/raw/extra.tar.gz?x=1` },
            { path: "no-url" }
          ]
        }
      ],
      continuationToken: "page 2"
    }),
    [`${BASE}/service/rest/v1/components?repository=raw+hosted&continuationToken=page+2`]: json({
      items: [{ name: "docs", assets: [] }],
      continuationToken: null
    })
  });

  const components = await client(fetch).listComponents("raw hosted");

  assert.equal(calls.length, 2);
  assert.deepEqual(components, [
    {
      id: "c1",
      repository: "raw hosted",
      group: null,
      name: "tools",
      version: "1.0",
      assets: [
        { name: "tools/1.0/tools.zip", downloadUrl: `${BASE}/repository/raw/tools.zip`, lastModified: null, fileSize: 12 },
        { name: "extra.tar.gz", downloadUrl: `${BASE}/repository/raw/extra.tar.gz?x=1`, lastModified: null, fileSize: null }
      ]
    },
    { id: undefined, repository: "raw hosted", group: null, name: "docs", version: "unknown", assets: [] }
  ]);
});

test("nexus client: download writes the body and reports its size", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "artiscan-download-"));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  const url = `${BASE}/repository/raw/tools.zip`;
  const { fetch } = fakeFetch({ [url]: () => new Response("zip-bytes", { status: 200 }) });
  const destination = path.join(dir, "nested", "tools.zip");

  const outcome = await client(fetch).downloadAsset(url, destination);

  assert.deepEqual(outcome, { ok: true, value: 9 });
  assert.equal(await readFile(destination, "utf-8"), "zip-bytes");
});

test("nexus client: download streams a chunked body to disk", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "artiscan-download-"));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  const url = `${BASE}/repository/raw/bundle.tar.gz`;
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(encoder.encode("part-1,"));
      controller.enqueue(encoder.encode("part-2"));
      controller.close();
    }
  });
  const { fetch } = fakeFetch({ [url]: () => new Response(body, { status: 200 }) });
  const destination = path.join(dir, "bundle.tar.gz");

  const outcome = await client(fetch).downloadAsset(url, destination);

  assert.deepEqual(outcome, { ok: true, value: 13 });
  assert.equal(await readFile(destination, "utf-8"), "part-1,part-2");
});

test("nexus client: a body that fails mid-stream leaves no partial file", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "artiscan-download-"));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  const url = `${BASE}/repository/raw/broken.zip`;
  let sent = false;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (!sent) {
        sent = true;
        controller.enqueue(new TextEncoder().encode("first chunk"));
        return;
      }
      controller.error(new Error("connection reset"));
    }
  });
  const { fetch } = fakeFetch({ [url]: () => new Response(body, { status: 200 }) });
  const destination = path.join(dir, "broken.zip");

  const outcome = await client(fetch).downloadAsset(url, destination);

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.message, `Download of ${url} failed: connection reset`);
  assert.equal(existsSync(destination), false);
});

test("nexus client: download failures are outcomes", async () => {
  const { fetch } = fakeFetch({});
  const url = `${BASE}/repository/raw/gone.zip`;

  const outcome = await client(fetch).downloadAsset(url, path.join(os.tmpdir(), "never-written.zip"));

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.status, 404);
  assert.equal(outcome.error.message, `Download of ${url} failed: HTTP 404`);
});
