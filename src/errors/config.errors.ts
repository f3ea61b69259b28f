export class ConfigMissingRepositoryUrlError extends Error {
  constructor() {
    super("Missing repository URL. Set NEXUS_URL or repository.url in artiscan.config.json.");
    this.name = "ConfigMissingRepositoryUrlError";
  }
}

export class ConfigMissingCredentialsError extends Error {
  missing: string[];

  constructor(missing: string[]) {
    super(
      `Missing repository credentials: ${missing.join(", ")}. Set them in the environment, a .env file or artiscan.config.json.`
    );
    this.name = "ConfigMissingCredentialsError";
    this.missing = missing;
  }
}

export class ConfigInvalidFileError extends Error {
  constructor(filePath: string, message: string) {
    super(`Config file ${filePath} is not valid JSON: ${message}`);
    this.name = "ConfigInvalidFileError";
  }
}

export class EngineNotFoundError extends Error {
  constructor(override?: string | null) {
    const hint = override ? ` (configured path ${override} does not exist)` : "";
    super(
      `Trivy executable not found${hint}. Install it on PATH, place it in ./trivy/, or set ARTISCAN_TRIVY_PATH.`
    );
    this.name = "EngineNotFoundError";
  }
}
