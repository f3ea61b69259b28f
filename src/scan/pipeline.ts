import path from "node:path";
import { rm } from "node:fs/promises";
import { classifyArtifact } from "../classify/artifactClassifier.js";
import { extractArchive } from "../fs/extractArchive.js";
import { errorMessage } from "../errors/pipeline.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { RepositoryService } from "../repository/nexusClient.js";
import { saveRendering } from "../report/writeReports.js";
import type {
  Asset,
  AssetContext,
  AssetRendering,
  ArtifactType,
  Component,
  RepositoryDescriptor,
  ScanIssueLog,
  SessionFinding,
  VulnerabilityRecord
} from "../types.js";
import { executeScan, type EngineRuntime } from "./executor.js";
import { logIssue, logSuccessfulScan } from "./issues.js";
import { synthesizeNodeManifests } from "./manifestSynthesizer.js";
import { normalizeEngineReport } from "./normalize.js";
import { recordAsset, recordIssue, type RunningStatistics } from "./statistics.js";
import { describeStrategy, planScanStrategy, type ScanStrategy } from "./strategy.js";

/** Everything one session shares across assets. The collections grow as assets are processed. */
export interface PipelineContext {
  repositoryService: Pick<RepositoryService, "downloadAsset">;
  engine: EngineRuntime;
  /** Downloads, extraction trees and engine output live here, one asset at a time. */
  tempDir: string;
  scanTimestamp: string;
  nodeManifestSynthesis: boolean;
  /** Individual asset reports are written here as they arrive. Null when they are not retained. */
  renderingDir: string | null;
  renderings: AssetRendering[];
  stats: RunningStatistics;
  issues: ScanIssueLog;
  findings: SessionFinding[];
  logger?: Logger;
}

export type AssetStatus = "skipped" | "failed" | "scanned";

export interface AssetResult {
  status: AssetStatus;
  artifactType: ArtifactType;
  strategy: ScanStrategy;
  records: VulnerabilityRecord[];
}

/** Flattens an asset path into a single file name inside the temp directory. */
export function localFileName(assetName: string): string {
  return assetName.replace(/[\\/]/g, "_");
}

/** References tried in order when scanning a container component by image. */
export function imageReferences(registryHost: string, repository: string, name: string, version: string): string[] {
  const host = registryHost.replace(/^https?:\/\//, "").replace(/\/+$/, "");
  return [`${host}/${repository}/${name}:${version}`, `${host}/${name}:${version}`, `${name}:${version}`];
}

function enrich(
  ctx: PipelineContext,
  context: AssetContext,
  repository: RepositoryDescriptor,
  component: Component,
  strategy: ScanStrategy,
  records: readonly VulnerabilityRecord[],
  imageReference?: string
): SessionFinding[] {
  return records.map((record) =>
    Object.freeze({
      ...record,
      repository: context.repository,
      repositoryFormat: repository.format,
      component: component.name,
      componentVersion: component.version,
      asset: context.asset,
      artifactType: context.artifactType,
      strategy: strategy.reason,
      scanTimestamp: ctx.scanTimestamp,
      ...(imageReference ? { imageReference } : {})
    })
  );
}

async function keepRendering(
  ctx: PipelineContext,
  context: AssetContext,
  content: string | null,
  logger: Logger
): Promise<void> {
  if (!ctx.renderingDir || !content) return;
  try {
    const filePath = await saveRendering(ctx.renderingDir, context.component, context.asset, content);
    ctx.renderings.push({ component: context.component, asset: context.asset, filePath });
  } catch (err) {
    logIssue(ctx.issues, "warning", context, "Could not save individual report", errorMessage(err), logger);
  }
}

function finish(
  ctx: PipelineContext,
  context: AssetContext,
  status: AssetStatus,
  strategy: ScanStrategy,
  records: VulnerabilityRecord[] = []
): AssetResult {
  recordAsset(ctx.stats, {
    repository: context.repository,
    component: context.component,
    artifactType: context.artifactType,
    records
  });
  return { status, artifactType: context.artifactType, strategy, records };
}

/**
 * Runs one asset through classify, plan, download, extract, synthesize, scan
 * and normalize, then folds the outcome into the session. Never throws for a
 * failure of a single asset; local copies are gone when it resolves.
 */
export async function processAsset(
  ctx: PipelineContext,
  repository: RepositoryDescriptor,
  component: Component,
  asset: Asset
): Promise<AssetResult> {
  const logger = ctx.logger ?? noopLogger;
  const artifactType = classifyArtifact(asset.name, repository.format);
  const context: AssetContext = {
    repository: repository.name,
    component: component.name,
    asset: asset.name,
    artifactType
  };
  const strategy = planScanStrategy(artifactType, asset.name, repository.format);
  logger.debug("Planned scan", { asset: asset.name, artifactType, strategy: describeStrategy(strategy) });

  if (artifactType === "unknown") {
    logIssue(ctx.issues, "warning", context, "Unrecognized artifact type", `Repository format: ${repository.format}`, logger);
  }

  if (strategy.kind === "skip") {
    logIssue(ctx.issues, "skip", context, strategy.reason, `Download URL: ${asset.downloadUrl}`, logger);
    recordIssue(ctx.stats, "skip");
    return finish(ctx, context, "skipped", strategy);
  }

  if (strategy.kind === "image") {
    logIssue(
      ctx.issues,
      "skip",
      context,
      "Container image layers are scanned by image reference, not as downloaded assets",
      `Download URL: ${asset.downloadUrl}`,
      logger
    );
    recordIssue(ctx.stats, "skip");
    return finish(ctx, context, "skipped", strategy);
  }

  logger.info(`Scanning asset: ${asset.name} (${artifactType})`, { strategy: strategy.reason });
  ctx.stats.assetsScanned += 1;
  const localPath = path.join(ctx.tempDir, localFileName(asset.name));
  let workDir: string | null = null;

  try {
    const download = await ctx.repositoryService.downloadAsset(asset.downloadUrl, localPath);
    if (!download.ok) {
      logIssue(ctx.issues, "error", context, "Asset download failed", download.error.message, logger);
      recordIssue(ctx.stats, "error");
      return finish(ctx, context, "failed", strategy);
    }

    let target = localPath;
    if (strategy.kind === "filesystem" && strategy.extractFirst) {
      workDir = `${localPath}_extracted`;
      const extracted = await extractArchive(localPath, workDir, logger);
      if (extracted.ok) {
        target = workDir;
        if (ctx.nodeManifestSynthesis) {
          const summary = await synthesizeNodeManifests(workDir, logger);
          for (const result of summary.results) {
            if (result.status === "failed") {
              logIssue(ctx.issues, "warning", context, "Manifest synthesis failed", result.error.message, logger);
            }
          }
        }
      } else {
        logIssue(
          ctx.issues,
          "warning",
          context,
          "Archive extraction failed, scanning unextracted",
          extracted.error.message,
          logger
        );
      }
    }

    const scan = await executeScan(
      ctx.engine,
      { target, mode: strategy.kind, scratchDir: ctx.tempDir, workDir },
      logger
    );
    if (!scan.ok) {
      const reason = scan.error.kind === "parse" ? "Scan output could not be parsed" : "Scan failed";
      logIssue(ctx.issues, "error", context, reason, `Strategy: ${strategy.reason}. ${scan.error.message}`, logger);
      recordIssue(ctx.stats, "error");
      return finish(ctx, context, "failed", strategy);
    }

    const records = normalizeEngineReport(scan.value.report);
    ctx.findings.push(...enrich(ctx, context, repository, component, strategy, records));
    logSuccessfulScan(
      ctx.issues,
      context,
      {
        strategy: strategy.reason,
        engineMode: strategy.kind,
        vulnerabilitiesFound: records.length,
        fileSize: download.value,
        durationMs: scan.value.durationMs,
        command: scan.value.command
      },
      logger
    );
    await keepRendering(ctx, context, scan.value.rendering, logger);
    return finish(ctx, context, "scanned", strategy, records);
  } catch (err) {
    logIssue(ctx.issues, "error", context, "Asset processing failed", errorMessage(err), logger);
    recordIssue(ctx.stats, "error");
    if (workDir) {
      try {
        await rm(workDir, { recursive: true, force: true });
      } catch (rmErr) {
        logger.warn("Could not remove extraction directory", { path: workDir, error: errorMessage(rmErr) });
      }
    }
    return finish(ctx, context, "failed", strategy);
  } finally {
    try {
      await rm(localPath, { force: true });
    } catch (err) {
      logger.warn("Could not remove downloaded asset", { path: localPath, error: errorMessage(err) });
    }
  }
}

/**
 * Scans a container-format component by image reference, trying each
 * candidate reference until one scan succeeds. Counts as one asset.
 */
export async function processContainerComponent(
  ctx: PipelineContext,
  repository: RepositoryDescriptor,
  component: Component,
  registryHost: string
): Promise<AssetResult> {
  const logger = ctx.logger ?? noopLogger;
  const assetName = `docker_image_${component.version}`;
  const artifactType = classifyArtifact(component.name, repository.format);
  const context: AssetContext = {
    repository: repository.name,
    component: component.name,
    asset: assetName,
    artifactType
  };
  const strategy = planScanStrategy(artifactType, component.name, repository.format);
  if (strategy.kind !== "image") {
    const reason = strategy.kind === "skip" ? strategy.reason : "Not a container image";
    logIssue(ctx.issues, "skip", context, reason, `Component: ${component.name}:${component.version}`, logger);
    recordIssue(ctx.stats, "skip");
    return finish(ctx, context, "skipped", strategy);
  }

  ctx.stats.assetsScanned += 1;
  const references = imageReferences(registryHost, repository.name, component.name, component.version);
  for (const reference of references) {
    logger.info(`Trying image reference: ${reference}`);
    const scan = await executeScan(ctx.engine, { target: reference, mode: "image", scratchDir: ctx.tempDir }, logger);
    if (!scan.ok) {
      logger.debug("Image reference not scannable", { reference, error: scan.error.message });
      continue;
    }

    const records = normalizeEngineReport(scan.value.report);
    ctx.findings.push(...enrich(ctx, context, repository, component, strategy, records, reference));
    logSuccessfulScan(
      ctx.issues,
      context,
      {
        strategy: strategy.reason,
        engineMode: "image",
        vulnerabilitiesFound: records.length,
        fileSize: null,
        durationMs: scan.value.durationMs,
        command: scan.value.command
      },
      logger
    );
    await keepRendering(ctx, context, scan.value.rendering, logger);
    return finish(ctx, context, "scanned", strategy, records);
  }

  logIssue(
    ctx.issues,
    "warning",
    context,
    "Container image not accessible",
    `Tried: ${references.join(", ")}`,
    logger
  );
  return finish(ctx, context, "failed", strategy);
}
