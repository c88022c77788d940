#!/usr/bin/env node
/**
 * resumecraft CLI
 *
 * Commands:
 *   generate - Collect a profile, generate a resume, write text/JSON/PDF
 *   init     - Interactive credential setup (.env)
 *   catalog  - List available models, templates and fonts
 */

import "dotenv/config";

import { Command, InvalidArgumentError } from "commander";
import { readFile } from "fs/promises";
import * as clack from "@clack/prompts";
import {
  createConfig,
  loadCredentials,
  ResumeError,
  ResumeStyleSchema,
  ValidationError,
} from "@/core";
import { templateLabelFor } from "@/core/config";
import { runPipeline, validateProfile } from "@/pipeline";
import { writeArtifacts } from "@/services/artifacts";
import { WatsonxClient } from "@/services/watsonx";
import { logger, setLogLevel } from "@/utils/logger";
import { chooseSettings, collectProfile } from "./form";
import { runInit } from "./init";
import { displayPath, envFilePath, outputDir, resolveRoot } from "./workspace";

const VERSION = "0.1.0";

// ============================================================================
// CLI Configuration
// ============================================================================

const program = new Command();

program
  .name("resumecraft")
  .description("Generate a resume with watsonx.ai and export it as text, JSON and PDF")
  .version(VERSION);

// ============================================================================
// Init Command
// ============================================================================

program
  .command("init")
  .description("Interactive credential setup (writes .env)")
  .option("--dir <path>", "Directory to write .env into")
  .action(async (options: { dir?: string }) => {
    try {
      await runInit(options);
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  });

// ============================================================================
// Catalog Command
// ============================================================================

program
  .command("catalog")
  .description("List available models, templates and fonts")
  .action(() => {
    const config = createConfig();
    clack.note(formatCatalog(config.models), "Models (--model)");
    clack.note(formatCatalog(config.templates), "Templates (--style)");
    clack.note(formatCatalog(config.fonts), "Fonts (--font)");
  });

// ============================================================================
// Generate Command
// ============================================================================

function parseFontSize(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 9 || n > 14) {
    throw new InvalidArgumentError("Font size must be a whole number from 9 to 14.");
  }
  return n;
}

function parseStyle(value: string) {
  const result = ResumeStyleSchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new InvalidArgumentError(`Style must be one of: ${ResumeStyleSchema.options.join(", ")}.`);
  }
  return result.data;
}

program
  .command("generate", { isDefault: true })
  .description("Generate a resume (interactive unless --input is given)")
  .option("--input <path>", "Profile JSON file (skips the interactive form)")
  .option("--style <style>", "professional, technical, creative or academic", parseStyle)
  .option("--model <label>", "Model label, see `resumecraft catalog`")
  .option("--font <label>", "PDF font label, see `resumecraft catalog`")
  .option("--font-size <n>", "PDF body font size (9-14)", parseFontSize)
  .option("--dir <path>", "Root directory (defaults to the current directory)")
  .option("--out <dir>", "Output directory (defaults to resumes/)")
  .option("--yes", "Use defaults for missing settings and skip confirmation", false)
  .option("--verbose", "Show detailed logging", false)
  .action(async (options: GenerateOptions) => {
    try {
      await runGenerate(options);
    } catch (error) {
      reportError(error);
      clack.outro("Exiting.");
      process.exit(1);
    }
  });

// ============================================================================
// Generation
// ============================================================================

interface GenerateOptions {
  input?: string;
  style?: ReturnType<typeof parseStyle>;
  model?: string;
  font?: string;
  fontSize?: number;
  dir?: string;
  out?: string;
  yes: boolean;
  verbose: boolean;
}

async function runGenerate(options: GenerateOptions) {
  const log = logger.cli;
  setLogLevel(options.verbose ? "debug" : "warn");

  const root = resolveRoot(options.dir);
  const { config: loadEnv } = await import("dotenv");
  loadEnv({ path: envFilePath(root) });

  clack.intro(`resumecraft v${VERSION}`);

  // Credentials are required before anything is asked
  const { credentials, watsonxUrl } = loadCredentials();
  const config = createConfig(watsonxUrl ? { watsonxUrl } : {});
  log.debug("Configuration loaded", { watsonxUrl: config.watsonxUrl });

  // 1. Profile
  let profileData: unknown;
  if (options.input) {
    profileData = await readProfileFile(options.input);
    // Report bad input before any settings prompt
    validateProfile(profileData);
    clack.log.success(`Profile loaded from ${options.input}`);
  } else {
    const collected = await collectProfile();
    if (collected === null) {
      clack.outro("Cancelled.");
      return;
    }
    profileData = collected;
  }

  // 2. Settings
  const settings = await chooseSettings(config, {
    model: options.model,
    template: options.style ? templateLabelFor(config, options.style) : undefined,
    font: options.font,
    fontSize: options.fontSize,
    yes: options.yes,
  });
  if (settings === null) {
    clack.outro("Cancelled.");
    return;
  }

  const outDir = outputDir(root, options.out);
  clack.note(
    [
      `Model: ${settings.model}`,
      `Template: ${settings.template}`,
      `Font: ${settings.font} ${settings.fontSize}pt`,
      `Output: ${displayPath(root, outDir)}`,
    ].join("\n"),
    "Run Configuration"
  );

  if (!options.yes) {
    const confirmed = await clack.confirm({ message: "Generate resume?" });
    if (clack.isCancel(confirmed) || !confirmed) {
      clack.outro("Cancelled.");
      return;
    }
  }

  // 3. Generate
  const s = clack.spinner();
  s.start(`Generating resume with ${settings.model}...`);

  const result = await runPipeline(
    { profile: profileData, settings },
    { client: new WatsonxClient(credentials, config), config },
  );

  if (!result.success) {
    s.stop("Generation failed", 1);
    reportError(result.error);
    clack.outro("Exiting.");
    process.exit(1);
  }

  s.stop(`Resume generated in ${(result.durationMs / 1000).toFixed(1)}s`);
  clack.note(result.generatedText, "Your Resume");

  // 4. Write artifacts
  const written = await writeArtifacts(outDir, result.artifacts);
  clack.note(
    [
      `PDF:   ${displayPath(root, written.document)} (${result.artifacts.document.pageCount} page${result.artifacts.document.pageCount !== 1 ? "s" : ""})`,
      `Text:  ${displayPath(root, written.text)}`,
      `Data:  ${displayPath(root, written.record)}`,
    ].join("\n"),
    "Downloads"
  );

  clack.outro(
    `Generated with: ${settings.model} | ${settings.template} template | ${settings.font} ${settings.fontSize}pt`
  );
}

// ============================================================================
// Helpers
// ============================================================================

async function readProfileFile(path: string): Promise<unknown> {
  const raw = await readFile(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `Profile file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function formatCatalog(catalog: Readonly<Record<string, string>>): string {
  const width = Math.max(...Object.keys(catalog).map((label) => label.length)) + 2;
  return Object.entries(catalog)
    .map(([label, value]) => `${label.padEnd(width)}${value}`)
    .join("\n");
}

function reportError(error: unknown) {
  if (error instanceof ResumeError) {
    clack.log.error(error.message);
    clack.log.info(error.hint);
    return;
  }
  clack.log.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
}

// ============================================================================
// Start CLI
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  reportError(error);
  process.exit(1);
});
