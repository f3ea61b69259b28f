#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import { loadConfig, resolveConfig, validateConfig, type OutputFormat } from "./config/loadConfig.js";
import { LOG_DIR_NAME } from "./config/defaults.js";
import { explainClassification } from "./classify/artifactClassifier.js";
import { errorMessage } from "./errors/pipeline.errors.js";
import { createAppLogger, noopLogger, type AppLogger, type Logger } from "./logging/logger.js";
import { runScan } from "./scan/runScan.js";
import { describeStrategy, planScanStrategy } from "./scan/strategy.js";
import { formatDuration, formatSessionJson, formatSummaryText } from "./report/formatters.js";
import { writeReports } from "./report/writeReports.js";
import type { ScanProgressEvent, ScanProgressHandler, ScanProgressPhase } from "./scan/progress.js";

const program = new Command();

class Spinner {
  private frames = ["-", "\\", "|", "/"];
  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private text = "";

  constructor(private stream: { isTTY?: boolean; write: (chunk: string) => void }) {}

  start(text: string) {
    this.text = text;
    if (!this.stream.isTTY) return;
    if (this.timer) return;
    this.render();
    this.timer = setInterval(() => this.render(), 120);
  }

  update(text: string) {
    this.text = text;
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.clear();
  }

  private render() {
    if (!this.stream.isTTY) return;
    const frame = this.frames[this.frameIndex % this.frames.length];
    this.frameIndex += 1;
    this.stream.write(`\r\x1b[2K${frame} ${this.text}`);
  }

  private clear() {
    if (!this.stream.isTTY) return;
    this.stream.write("\r\x1b[2K");
  }
}

const PROGRESS_PHASE_LABELS: Record<ScanProgressPhase, string> = {
  repositories: "Repositories",
  components: "Components"
};

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

function renderProgressBar(value: number, width = 24): string {
  const normalized = clampProgress(value);
  const filled = Math.round(normalized * width);
  const empty = Math.max(0, width - filled);
  const percent = Math.round(normalized * 100);
  return `[${"#".repeat(filled)}${"-".repeat(empty)}] ${percent}%`;
}

function createProgressReporter(update: (message: string) => void): ScanProgressHandler {
  let repositoryFraction = 0;
  let repositoryTotal = 0;

  return (event: ScanProgressEvent) => {
    const total = Math.max(0, Math.trunc(event.total));
    const current = Math.max(0, Math.trunc(event.current));
    const fraction = total === 0 ? 1 : clampProgress(current / total);

    let overall = repositoryFraction;
    if (event.phase === "repositories") {
      repositoryTotal = total;
      repositoryFraction = fraction;
      overall = fraction;
    } else if (repositoryTotal > 0) {
      overall = repositoryFraction + fraction / repositoryTotal;
    }

    const label = PROGRESS_PHASE_LABELS[event.phase];
    const detail = total === 0 ? "none" : `${Math.min(current, total)}/${total}`;
    const suffix = event.message ? ` ${event.message}` : "";
    update(`${renderProgressBar(overall)} ${label} (${detail})${suffix}`);
  };
}

function parseOutputFormat(raw: string | undefined): OutputFormat | null {
  if (raw === undefined) return null;
  if (raw === "text" || raw === "json") return raw;
  throw new Error(`Unknown output format "${raw}" (expected text or json).`);
}

program
  .name("artiscan")
  .description("Scan artifacts stored in a Nexus repository manager for known vulnerabilities with Trivy")
  .version("0.1.0");

program
  .command("scan")
  .description("Scan every hosted repository (or the ones named with --repository)")
  .option("-c, --config <path>", "Path to artiscan.config.json")
  .option("-r, --repository <names...>", "Only scan these repositories")
  .option("-f, --format <format>", "Console output format (text|json)")
  .option("--json", "Shortcut for --format json")
  .option("-o, --output-dir <path>", "Directory for reports, logs and temporary downloads")
  .option("--retain-reports", "Keep the human-readable report of every scanned asset")
  .option("--debug", "Enable debug logging (mirrored to stderr)")
  .action(
    async (options: {
      config?: string;
      repository?: string[];
      format?: string;
      json?: boolean;
      outputDir?: string;
      retainReports?: boolean;
      debug?: boolean;
    }) => {
      const projectRoot = process.cwd();
      let appLogger: AppLogger | null = null;
      let spinner: Spinner | null = null;
      let elapsedTimer: ReturnType<typeof setInterval> | null = null;
      const stopUi = () => {
        if (elapsedTimer) {
          clearInterval(elapsedTimer);
          elapsedTimer = null;
        }
        spinner?.stop();
      };

      try {
        const format = options.json ? "json" : parseOutputFormat(options.format);
        const config = await loadConfig({
          projectRoot,
          configPath: options.config,
          overrides: {
            repositories: options.repository?.length ? options.repository : null,
            outputDir: options.outputDir ?? null,
            format,
            retainIndividualReports: options.retainReports ? true : null,
            logLevel: options.debug ? "debug" : null,
            logToConsole: options.debug ? true : null
          }
        });
        const isJsonOutput = config.output.format === "json";

        try {
          appLogger = await createAppLogger({
            logDir: path.join(config.output.dir, LOG_DIR_NAME),
            label: "scan",
            level: config.logging.level,
            console: config.logging.console ? process.stderr : null
          });
        } catch (err) {
          console.error(pc.yellow(`Could not open log file: ${errorMessage(err)}`));
          appLogger = null;
        }
        const appLog = appLogger ?? noopLogger;

        // Progress goes to stderr so JSON on stdout stays clean.
        spinner = process.stderr.isTTY && !config.logging.console ? new Spinner(process.stderr) : null;
        const scanStart = Date.now();
        let statusMessage = "Connecting...";
        const formatStatus = (message: string) => `${message} (elapsed ${formatDuration(Date.now() - scanStart)})`;
        const setStatus = (message: string) => {
          statusMessage = message;
          spinner?.update(formatStatus(statusMessage));
        };
        const uiLogger: Logger = {
          debug: (message, meta) => appLog.debug(message, meta),
          info: (message, meta) => {
            appLog.info(message, meta);
            if (spinner) setStatus(message);
          },
          warn: (message, meta) => {
            appLog.warn(message, meta);
            if (spinner) setStatus(pc.yellow(message));
            else if (!config.logging.console && !isJsonOutput) console.error(pc.yellow(message));
          },
          error: (message, meta) => {
            appLog.error(message, meta);
            if (spinner) setStatus(pc.red(message));
            else if (!config.logging.console && !isJsonOutput) console.error(pc.red(message));
          }
        };

        if (spinner) {
          spinner.start(formatStatus(statusMessage));
          elapsedTimer = setInterval(() => spinner?.update(formatStatus(statusMessage)), 1000);
        }

        const result = await runScan({
          config,
          logger: uiLogger,
          progress: spinner ? createProgressReporter(setStatus) : undefined
        });
        const reports = await writeReports(result, config.output.dir, appLog);
        stopUi();

        if (isJsonOutput) {
          console.log(formatSessionJson(result));
        } else {
          console.log(formatSummaryText(result));
          console.log(`\nReports saved to ${reports.folder}`);
          if (appLogger) console.log(pc.dim(`Log: ${appLogger.path}`));
        }
        process.exitCode = result.findings.length ? 1 : 0;
      } catch (err) {
        stopUi();
        const message = errorMessage(err);
        appLogger?.error(`Error: ${message}`);
        console.error(pc.red(`Error: ${message}`));
        process.exitCode = 2;
      } finally {
        await appLogger?.close();
      }
    }
  );

program
  .command("classify <names...>")
  .description("Show the artifact type and scan strategy chosen for asset names (no network, no engine)")
  .requiredOption("--format <repoFormat>", "Format of the owning repository (maven2, node, python, nuget, raw, container...)")
  .option("--json", "Output JSON")
  .action((names: string[], options: { format: string; json?: boolean }) => {
    const rows = names.map((name) => {
      const { artifactType, ruleId } = explainClassification(name, options.format);
      const strategy = planScanStrategy(artifactType, name, options.format);
      return { name, artifactType, ruleId, strategy: describeStrategy(strategy), reason: strategy.reason };
    });

    if (options.json) {
      console.log(JSON.stringify(rows, null, 2));
      return;
    }
    for (const row of rows) {
      console.log(`${pc.bold(row.name)} -> ${row.artifactType} ${pc.dim(`[${row.ruleId ?? "no rule"}]`)}`);
      console.log(`  ${row.strategy}: ${row.reason}`);
    }
  });

program
  .command("check-config")
  .description("Print the resolved configuration and report anything missing")
  .option("-c, --config <path>", "Path to artiscan.config.json")
  .action(async (options: { config?: string }) => {
    try {
      const config = await resolveConfig({ projectRoot: process.cwd(), configPath: options.config });
      const notSet = pc.dim("(not set)");
      console.log(`Repository URL:   ${config.repository.url || notSet}`);
      console.log(`Username:         ${config.repository.username || notSet}`);
      console.log(`Password:         ${config.repository.password ? "********" : notSet}`);
      console.log(`Trivy:            ${config.engine.path ?? pc.dim("(not found)")}`);
      console.log(`Report template:  ${config.engine.templatePath ?? notSet}`);
      console.log(`Output directory: ${config.output.dir}`);
      console.log(`Repositories:     ${config.scan.repositories?.join(", ") ?? `all ${config.scan.repositoryKinds.join("/")}`}`);
      console.log(`Log level:        ${config.logging.level}`);

      const missing = validateConfig(config);
      if (missing.length) {
        console.log(pc.red(`\nMissing: ${missing.join(", ")}`));
        process.exitCode = 1;
        return;
      }
      console.log(pc.green("\nConfiguration OK"));
      process.exitCode = 0;
    } catch (err) {
      console.error(pc.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 2;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(pc.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 2;
});
