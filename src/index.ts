export * from "./types.js";
export * from "./classify/artifactClassifier.js";
export * from "./scan/strategy.js";
export * from "./fs/extractArchive.js";
export * from "./scan/manifestSynthesizer.js";
export * from "./scan/engine.js";
export * from "./scan/executor.js";
export * from "./scan/normalize.js";
export * from "./scan/statistics.js";
export * from "./scan/issues.js";
export * from "./scan/pipeline.js";
export * from "./scan/runScan.js";
export * from "./scan/progress.js";
export * from "./repository/nexusClient.js";
export * from "./config/loadConfig.js";
export * from "./report/formatters.js";
export * from "./report/writeReports.js";
export * from "./logging/logger.js";
export * from "./errors/config.errors.js";
export * from "./errors/repository.errors.js";
export * from "./errors/pipeline.errors.js";
