import path from "node:path";
import { mkdir } from "node:fs/promises";
import AdmZip from "adm-zip";
import { extract as extractTar } from "tar";
import { ExtractionError, errorMessage } from "../errors/pipeline.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { Outcome } from "../types.js";

export type ArchiveFormat = "zip" | "tar.gz" | "tar";

const ZIP_EXTENSIONS = [".zip", ".jar", ".war"];
const GZIP_TAR_EXTENSIONS = [".tar.gz", ".tgz"];

export function detectArchiveFormat(archivePath: string): ArchiveFormat | null {
  const lower = archivePath.toLowerCase();
  if (ZIP_EXTENSIONS.some((ext) => lower.endsWith(ext))) return "zip";
  if (GZIP_TAR_EXTENSIONS.some((ext) => lower.endsWith(ext))) return "tar.gz";
  if (lower.endsWith(".tar")) return "tar";
  return null;
}

export interface ExtractedArchive {
  format: ArchiveFormat;
  destination: string;
}

/**
 * Unpacks `archivePath` into `destination`. The directory is created before
 * anything else and left in place on failure; removing it is up to the caller.
 */
export async function extractArchive(
  archivePath: string,
  destination: string,
  logger: Logger = noopLogger
): Promise<Outcome<ExtractedArchive, ExtractionError>> {
  try {
    await mkdir(destination, { recursive: true });
  } catch (err) {
    const message = errorMessage(err);
    logger.error("Could not create extraction directory", { archive: archivePath, destination, error: message });
    return {
      ok: false,
      error: new ExtractionError(archivePath, `Could not create ${destination}: ${message}`)
    };
  }

  const format = detectArchiveFormat(archivePath);
  if (!format) {
    logger.warn("Unsupported archive format", { archive: archivePath });
    return {
      ok: false,
      error: new ExtractionError(archivePath, `Unsupported archive format: ${path.basename(archivePath)}`, true)
    };
  }

  try {
    if (format === "zip") {
      const zip = new AdmZip(archivePath);
      zip.extractAllTo(destination, true);
    } else {
      await extractTar({
        file: archivePath,
        cwd: destination,
        strict: true
      });
    }
  } catch (err) {
    const message = errorMessage(err);
    logger.error("Archive extraction failed", { archive: archivePath, format, error: message });
    return {
      ok: false,
      error: new ExtractionError(archivePath, `Error extracting ${path.basename(archivePath)}: ${message}`)
    };
  }

  logger.debug("Archive extracted", { archive: archivePath, format, destination });
  return { ok: true, value: { format, destination } };
}
