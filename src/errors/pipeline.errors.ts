export type PipelineErrorKind =
  | "download"
  | "extraction"
  | "manifest_synthesis"
  | "scan_invocation"
  | "parse";

/**
 * Failure of one stage of the per-asset pipeline. These are returned inside an
 * `Outcome`, never thrown past the component that produced them.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly subject: string;

  protected constructor(subject: string, message: string) {
    super(message);
    this.subject = subject;
  }
}

export class DownloadError extends PipelineError {
  readonly kind = "download";
  status: number | null;

  constructor(url: string, message: string, status: number | null = null) {
    super(url, `Download of ${url} failed: ${message}`);
    this.name = "DownloadError";
    this.status = status;
  }
}

export class ExtractionError extends PipelineError {
  readonly kind = "extraction";
  unsupported: boolean;

  constructor(archivePath: string, message: string, unsupported = false) {
    super(archivePath, message);
    this.name = "ExtractionError";
    this.unsupported = unsupported;
  }
}

export class ManifestSynthesisError extends PipelineError {
  readonly kind = "manifest_synthesis";

  constructor(manifestPath: string, message: string) {
    super(manifestPath, `Could not synthesize lock file for ${manifestPath}: ${message}`);
    this.name = "ManifestSynthesisError";
  }
}

export class ScanInvocationError extends PipelineError {
  readonly kind = "scan_invocation";
  exitCode: number | null;
  timedOut: boolean;
  stderr: string;

  constructor(
    target: string,
    message: string,
    params: { exitCode?: number | null; timedOut?: boolean; stderr?: string } = {}
  ) {
    super(target, `Scan of ${target} failed: ${message}`);
    this.name = "ScanInvocationError";
    this.exitCode = params.exitCode ?? null;
    this.timedOut = params.timedOut ?? false;
    this.stderr = params.stderr ?? "";
  }
}

export class EngineOutputParseError extends PipelineError {
  readonly kind = "parse";

  constructor(target: string, message: string) {
    super(target, `Scan output for ${target} could not be parsed: ${message}`);
    this.name = "EngineOutputParseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
