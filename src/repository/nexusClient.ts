import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { RepositoryRequestError } from "../errors/repository.errors.js";
import { DownloadError, errorMessage } from "../errors/pipeline.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { Asset, Component, Outcome, RepositoryDescriptor } from "../types.js";

const API_PREFIX = "/service/rest/v1";
/** Upper bound on pages followed for one repository. */
const MAX_COMPONENT_PAGES = 10_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface NexusClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  requestTimeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

function toAsset(raw: unknown): Asset | null {
  if (!isObject(raw)) return null;
  const downloadUrl = text(raw.downloadUrl);
  if (!downloadUrl) return null;
  return {
    name: text(raw.path) ?? text(raw.name) ?? path.posix.basename(downloadUrl.split("?")[0] ?? downloadUrl),
    downloadUrl,
    lastModified: text(raw.lastModified),
    fileSize: typeof raw.fileSize === "number" ? raw.fileSize : null
  };
}

function toComponent(raw: unknown, repository: string): Component | null {
  if (!isObject(raw)) return null;
  const assets = Array.isArray(raw.assets)
    ? raw.assets.map(toAsset).filter((asset): asset is Asset => asset !== null)
    : [];
  return {
    id: text(raw.id) ?? undefined,
    repository: text(raw.repository) ?? repository,
    group: text(raw.group),
    name: text(raw.name) ?? "unknown",
    version: text(raw.version) ?? "unknown",
    assets
  };
}

function toRepository(raw: unknown): RepositoryDescriptor | null {
  if (!isObject(raw)) return null;
  const name = text(raw.name);
  if (!name) return null;
  return {
    name,
    format: text(raw.format) ?? "unknown",
    type: text(raw.type) ?? "unknown",
    url: text(raw.url) ?? undefined
  };
}

export class NexusClient {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: NexusClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString("base64")}`;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? noopLogger;
  }

  /** Host (and port) of the service, as used in container image references. */
  get registryHost(): string {
    return this.baseUrl.replace(/^https?:\/\//, "");
  }

  private async request(url: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        headers: { Authorization: this.authorization, Accept: "application/json" },
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });
    } catch (err) {
      throw new RepositoryRequestError(url, errorMessage(err));
    }
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.request(url);
    if (!response.ok) {
      throw new RepositoryRequestError(url, response.statusText || "request rejected", response.status);
    }
    try {
      return await response.json();
    } catch (err) {
      throw new RepositoryRequestError(url, `invalid JSON body: ${errorMessage(err)}`, response.status);
    }
  }

  async testConnection(): Promise<boolean> {
    const url = `${this.baseUrl}${API_PREFIX}/status`;
    try {
      const response = await this.request(url);
      if (response.ok) {
        this.logger.info("Connected to repository service", { url: this.baseUrl });
        return true;
      }
      this.logger.error("Repository service connection failed", { status: response.status });
      return false;
    } catch (err) {
      this.logger.error("Repository service connection failed", { error: errorMessage(err) });
      return false;
    }
  }

  async listRepositories(kinds: readonly string[]): Promise<RepositoryDescriptor[]> {
    const url = `${this.baseUrl}${API_PREFIX}/repositories`;
    const payload = await this.getJson(url);
    if (!Array.isArray(payload)) {
      throw new RepositoryRequestError(url, "expected a JSON array of repositories");
    }
    const repositories = payload
      .map(toRepository)
      .filter((repo): repo is RepositoryDescriptor => repo !== null)
      .filter((repo) => kinds.includes(repo.type));

    const formats: Record<string, number> = {};
    for (const repo of repositories) {
      formats[repo.format] = (formats[repo.format] ?? 0) + 1;
    }
    this.logger.info(`Found ${repositories.length} repositories`, { kinds: [...kinds], formats });
    return repositories;
  }

  async listComponents(repository: string): Promise<Component[]> {
    const components: Component[] = [];
    let continuationToken: string | null = null;

    for (let page = 0; page < MAX_COMPONENT_PAGES; page += 1) {
      const params = new URLSearchParams({ repository });
      if (continuationToken) params.set("continuationToken", continuationToken);
      const url = `${this.baseUrl}${API_PREFIX}/components?${params.toString()}`;

      const payload = await this.getJson(url);
      if (!isObject(payload)) {
        throw new RepositoryRequestError(url, "expected a JSON object with items");
      }
      const items = Array.isArray(payload.items) ? payload.items : [];
      for (const item of items) {
        const component = toComponent(item, repository);
        if (component) components.push(component);
      }

      continuationToken = text(payload.continuationToken);
      if (!continuationToken) break;
      this.logger.debug("Fetched component page", { repository, page: page + 1, total: components.length });
    }

    this.logger.info(`Found ${components.length} components in ${repository}`);
    return components;
  }

  /** Resolves to the number of bytes written. */
  async downloadAsset(downloadUrl: string, destination: string): Promise<Outcome<number, DownloadError>> {
    try {
      const response = await this.fetchImpl(downloadUrl, {
        headers: { Authorization: this.authorization },
        signal: AbortSignal.timeout(this.requestTimeoutMs * 2)
      });
      if (!response.ok) {
        return {
          ok: false,
          error: new DownloadError(downloadUrl, `HTTP ${response.status}`, response.status)
        };
      }
      await mkdir(path.dirname(destination), { recursive: true });
      if (response.body) {
        await pipeline(Readable.fromWeb(response.body), createWriteStream(destination));
      } else {
        await writeFile(destination, "");
      }
      const { size } = await stat(destination);
      this.logger.debug("Downloaded asset", { url: downloadUrl, bytes: size });
      return { ok: true, value: size };
    } catch (err) {
      try {
        await rm(destination, { force: true });
      } catch (rmErr) {
        this.logger.warn("Could not remove partial download", { path: destination, error: errorMessage(rmErr) });
      }
      return { ok: false, error: new DownloadError(downloadUrl, errorMessage(err)) };
    }
  }
}

/** The slice of the client a scan session depends on. */
export type RepositoryService = Pick<
  NexusClient,
  "registryHost" | "testConnection" | "listRepositories" | "listComponents" | "downloadAsset"
>;
