import path from "node:path";
import { rm } from "node:fs/promises";
import type { ArtiscanConfig } from "../config/loadConfig.js";
import { TEMP_DIR_NAME } from "../config/defaults.js";
import { normalizeRepositoryFormat } from "../classify/artifactClassifier.js";
import { EngineNotFoundError } from "../errors/config.errors.js";
import { RepositoryConnectionError } from "../errors/repository.errors.js";
import { errorMessage } from "../errors/pipeline.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { NexusClient, type RepositoryService } from "../repository/nexusClient.js";
import { renderingDirPath } from "../report/writeReports.js";
import type { Component, RepositoryDescriptor, SessionResult } from "../types.js";
import { probeEngineVersion, type CommandRunner } from "./engine.js";
import type { EngineRuntime } from "./executor.js";
import { createIssueLog, logIssue } from "./issues.js";
import { processAsset, processContainerComponent, type PipelineContext } from "./pipeline.js";
import type { ScanProgressHandler } from "./progress.js";
import { createRunningStatistics, finalizeStatistics, recordIssue, recordRepository } from "./statistics.js";

export interface RunScanOptions {
  config: ArtiscanConfig;
  /** Defaults to a `NexusClient` built from `config.repository`. */
  repositoryService?: RepositoryService;
  /** Replaces the engine subprocess runner. */
  run?: CommandRunner;
  logger?: Logger;
  progress?: ScanProgressHandler;
}

export function filterRepositories(
  repositories: RepositoryDescriptor[],
  allowList: readonly string[] | null,
  logger: Logger = noopLogger
): RepositoryDescriptor[] {
  if (!allowList) return repositories;
  const known = new Set(repositories.map((repo) => repo.name));
  const missing = allowList.filter((name) => !known.has(name));
  if (missing.length) {
    logger.warn("Requested repositories not found", { repositories: missing });
  }
  return repositories.filter((repo) => allowList.includes(repo.name));
}

export async function runScan(options: RunScanOptions): Promise<SessionResult> {
  const start = Date.now();
  const { config } = options;
  const logger = options.logger ?? noopLogger;
  const enginePath = config.engine.path;
  if (!enginePath) {
    throw new EngineNotFoundError();
  }

  const repositoryService =
    options.repositoryService ??
    new NexusClient({
      baseUrl: config.repository.url,
      username: config.repository.username,
      password: config.repository.password,
      requestTimeoutMs: config.repository.requestTimeoutMs,
      logger
    });

  if (!(await repositoryService.testConnection())) {
    throw new RepositoryConnectionError(config.repository.url);
  }

  const version = await probeEngineVersion(enginePath, logger, options.run);
  if (version) {
    logger.info(`Using ${version.split("\n")[0] ?? version}`);
  }

  const engine: EngineRuntime = {
    path: enginePath,
    templatePath: config.engine.templatePath,
    timeoutSeconds: config.engine.timeoutSeconds,
    vulnOnly: config.engine.vulnOnly,
    quiet: config.logging.level !== "debug",
    run: options.run
  };

  const scanTimestamp = new Date().toISOString();
  const ctx: PipelineContext = {
    repositoryService,
    engine,
    tempDir: path.join(config.output.dir, TEMP_DIR_NAME),
    scanTimestamp,
    nodeManifestSynthesis: config.scan.nodeManifestSynthesis,
    renderingDir: config.output.retainIndividualReports ? renderingDirPath(config.output.dir, scanTimestamp) : null,
    renderings: [],
    stats: createRunningStatistics(),
    issues: createIssueLog(),
    findings: [],
    logger
  };

  try {
    const repositories = filterRepositories(
      await repositoryService.listRepositories(config.scan.repositoryKinds),
      config.scan.repositories,
      logger
    );
    logger.info(`Starting scan of ${repositories.length} repositories`);

    for (const [repoIndex, repository] of repositories.entries()) {
      options.progress?.({
        phase: "repositories",
        current: repoIndex,
        total: repositories.length,
        message: repository.name
      });
      logger.info(`Scanning repository: ${repository.name}`, { format: repository.format });

      let components: Component[];
      try {
        components = await repositoryService.listComponents(repository.name);
      } catch (err) {
        recordRepository(ctx.stats, repository.format, 0);
        logIssue(
          ctx.issues,
          "error",
          { repository: repository.name, component: "", asset: "", artifactType: "unknown" },
          "Component listing failed",
          errorMessage(err),
          logger
        );
        recordIssue(ctx.stats, "error");
        continue;
      }
      recordRepository(ctx.stats, repository.format, components.length);
      const isContainer = normalizeRepositoryFormat(repository.format) === "container";

      for (const [componentIndex, component] of components.entries()) {
        options.progress?.({
          phase: "components",
          current: componentIndex,
          total: components.length,
          message: `${component.name}:${component.version}`
        });
        logger.info(`Processing component: ${component.name}:${component.version}`);

        if (isContainer) {
          await processContainerComponent(ctx, repository, component, repositoryService.registryHost);
          continue;
        }
        for (const asset of component.assets) {
          await processAsset(ctx, repository, component, asset);
        }
      }
      options.progress?.({ phase: "components", current: components.length, total: components.length });
    }
    options.progress?.({ phase: "repositories", current: repositories.length, total: repositories.length });
  } finally {
    try {
      await rm(ctx.tempDir, { recursive: true, force: true });
    } catch (err) {
      logger.warn("Could not remove temp directory", { dir: ctx.tempDir, error: errorMessage(err) });
    }
  }

  return {
    scanTimestamp,
    repositoryUrl: config.repository.url,
    enginePath,
    durationMs: Date.now() - start,
    findings: ctx.findings,
    statistics: finalizeStatistics(ctx.stats),
    issues: ctx.issues,
    renderings: ctx.renderings
  };
}
