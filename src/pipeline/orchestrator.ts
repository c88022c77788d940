/**
 * Resume generation pipeline
 *
 * validate -> build prompt -> generate -> package artifacts
 *
 * Classified failures (validation, remote service, transport) come back as
 * `{ success: false, error }`; anything else the client throws is reported
 * as an UnexpectedServerError. Packaging runs outside that net: a fault while
 * rendering the document is not classified and propagates to the caller.
 */

import { formatIssues, GenerationSettingsSchema, UserProfileSchema } from "@/core/schemas";
import { ResumeError, UnexpectedServerError, ValidationError } from "@/core/errors";
import { resolveCatalogValue, type AppConfig } from "@/core/config";
import type { ArtifactSet, GenerationSettings, ResumeStyle, UserProfile } from "@/core/types";
import { buildPrompt } from "@/services/prompt";
import { packageArtifacts } from "@/services/artifacts";
import type { GenerationClient } from "@/services/watsonx";
import { logger } from "@/utils/logger";

const log = logger.pipeline;

// ============================================================================
// Types
// ============================================================================

export interface PipelineDeps {
  client: GenerationClient;
  config: Readonly<AppConfig>;
  /** Defaults to the current time */
  now?: () => Date;
}

export interface PipelineRequest {
  /** Unvalidated form data */
  profile: unknown;
  settings: GenerationSettings;
}

export type PipelineResult =
  | {
      success: true;
      profile: UserProfile;
      style: ResumeStyle;
      prompt: string;
      generatedText: string;
      artifacts: ArtifactSet;
      durationMs: number;
    }
  | {
      success: false;
      error: ResumeError;
    };

// ============================================================================
// Validation
// ============================================================================

/** Validate raw form data; the result is frozen */
export function validateProfile(data: unknown): Readonly<UserProfile> {
  const result = UserProfileSchema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid profile:\n${issues.join("\n")}`, issues);
  }
  return Object.freeze(result.data);
}

export function validateSettings(settings: GenerationSettings): GenerationSettings {
  const result = GenerationSettingsSchema.safeParse(settings);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid settings:\n${issues.join("\n")}`, issues);
  }
  return result.data;
}

// ============================================================================
// Pipeline
// ============================================================================

/** Any client failure that is not already classified becomes an UnexpectedServerError */
async function generate(client: GenerationClient, prompt: string, modelId: string): Promise<string> {
  try {
    return await client.generate(prompt, modelId);
  } catch (error) {
    if (error instanceof ResumeError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new UnexpectedServerError(`Unexpected error: ${message}`, error);
  }
}

export async function runPipeline(request: PipelineRequest, deps: PipelineDeps): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());
  const start = performance.now();

  let profile: Readonly<UserProfile>;
  let settings: GenerationSettings;
  let style: ResumeStyle;
  let prompt: string;
  let generatedText: string;

  try {
    profile = validateProfile(request.profile);
    settings = validateSettings(request.settings);
    const modelId = resolveCatalogValue(deps.config.models, settings.model, "model");
    style = resolveCatalogValue(deps.config.templates, settings.template, "template");
    resolveCatalogValue(deps.config.fonts, settings.font, "font");

    log.info("Pipeline started", { name: profile.name, modelId, style });

    prompt = buildPrompt(profile, style);
    log.debug("Prompt built", { chars: prompt.length });

    generatedText = await generate(deps.client, prompt, modelId);
  } catch (error) {
    if (error instanceof ResumeError) {
      log.error("Pipeline failed", { code: error.code, error: error.message });
      return { success: false, error };
    }
    throw error;
  }

  const artifacts = packageArtifacts({
    profile,
    generatedText,
    settings,
    timestamp: now(),
    config: deps.config,
  });

  const durationMs = Math.round(performance.now() - start);
  log.info("Pipeline completed", { durationMs, pages: artifacts.document.pageCount });

  return { success: true, profile, style, prompt, generatedText, artifacts, durationMs };
}
