/**
 * Output packaging: the same generation result as plain text, a JSON record
 * and a rendered PDF, plus the filenames they are written under.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { AppConfig } from "@/core/config";
import { resolveCatalogValue } from "@/core/config";
import type {
  ArtifactFilenames,
  ArtifactSet,
  GenerationSettings,
  ResumeRecord,
  UserProfile,
  WrittenArtifacts,
} from "@/core/types";
import { logger } from "@/utils/logger";
import { renderDocument } from "./render";
import { sanitize } from "./sanitize";

const log = logger.artifacts;

// ============================================================================
// Filenames
// ============================================================================

const pad = (n: number) => n.toString().padStart(2, "0");

/** Local time as YYYYMMDD_HHMMSS */
export function formatStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Name reduced to letters, digits, "-" and "_" (spaces become "_") */
export function safeFileName(name: string): string {
  return Array.from(sanitize(name).replace(/ /g, "_"))
    .filter((ch) => /^[\p{L}\p{N}_-]$/u.test(ch))
    .join("");
}

export function buildFilenames(name: string, timestamp: Date): ArtifactFilenames {
  const stamp = formatStamp(timestamp);
  const safe = safeFileName(name);
  const fallback = `resume_${stamp}`;
  const base = safe ? `resume_${safe}_${stamp}` : fallback;
  return {
    text: `${base}.txt`,
    record: `${base}.json`,
    document: `${base}.pdf`,
    textFallback: `${fallback}.txt`,
    recordFallback: `${fallback}.json`,
    documentFallback: `${fallback}.pdf`,
  };
}

// ============================================================================
// Packaging
// ============================================================================

export interface PackageInput {
  profile: UserProfile;
  generatedText: string;
  settings: GenerationSettings;
  timestamp: Date;
  config: Pick<AppConfig, "fonts">;
}

export function buildRecord(input: Omit<PackageInput, "config">): ResumeRecord {
  return {
    user_data: input.profile,
    generated_text: input.generatedText,
    settings: {
      model: input.settings.model,
      template: input.settings.template,
      font: input.settings.font,
      font_size: input.settings.fontSize,
    },
    timestamp: input.timestamp.toISOString(),
  };
}

/**
 * Build all three artifacts. Text and record come first; a rendering fault
 * is not caught here and ends the run.
 */
export function packageArtifacts(input: PackageInput): ArtifactSet {
  const text = input.generatedText;
  const record = buildRecord(input);
  const font = resolveCatalogValue(input.config.fonts, input.settings.font, "font");

  const document = renderDocument(input.generatedText, input.profile, {
    font,
    fontSize: input.settings.fontSize,
    generatedAt: input.timestamp,
  });

  return {
    text,
    record,
    document,
    filenames: buildFilenames(input.profile.name, input.timestamp),
  };
}

// ============================================================================
// Writing
// ============================================================================

/**
 * Write under `preferred`; on failure retry once under `fallback`.
 * A second failure propagates.
 */
export async function writeWithFallback(
  dir: string,
  preferred: string,
  fallback: string,
  data: Uint8Array | string,
): Promise<string> {
  const preferredPath = join(dir, preferred);
  try {
    await writeFile(preferredPath, data);
    return preferredPath;
  } catch (error) {
    log.warn("Write failed, retrying with fallback name", {
      path: preferredPath,
      fallback,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const fallbackPath = join(dir, fallback);
  await writeFile(fallbackPath, data);
  return fallbackPath;
}

/**
 * Write the three artifacts, document first. Each one falls back to its
 * timestamp-only name on its own, so a name the filesystem refuses (too
 * long, for instance) does not stop the others.
 */
export async function writeArtifacts(dir: string, artifacts: ArtifactSet): Promise<WrittenArtifacts> {
  await mkdir(dir, { recursive: true });
  const { filenames } = artifacts;

  const document = await writeWithFallback(
    dir,
    filenames.document,
    filenames.documentFallback,
    artifacts.document.bytes,
  );
  const text = await writeWithFallback(dir, filenames.text, filenames.textFallback, artifacts.text);
  const record = await writeWithFallback(
    dir,
    filenames.record,
    filenames.recordFallback,
    JSON.stringify(artifacts.record, null, 2) + "\n",
  );

  log.info("Artifacts written", { dir, text, record, document });
  return { text, record, document };
}
