/**
 * watsonx.ai text generation client
 *
 * One IAM token exchange and one generation request per call. Nothing is
 * retried and the bearer token is never cached between calls.
 */

import { z } from "zod";
import { logger } from "@/utils/logger";
import type { AppConfig, Credentials } from "@/core/config";
import {
  AuthenticationFailure,
  AuthorizationFailure,
  EmptyResponse,
  ModelUnavailable,
  RateLimited,
  ResumeError,
  TransportTimeout,
  TransportUnreachable,
  UnexpectedServerError,
} from "@/core/errors";

const log = logger.watsonx;

// ============================================================================
// Interface
// ============================================================================

/** Anything that turns a prompt into generated text */
export interface GenerationClient {
  generate(prompt: string, modelId: string): Promise<string>;
}

// ============================================================================
// Response shapes
// ============================================================================

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

const GenerationResponseSchema = z.object({
  results: z
    .array(z.object({ generated_text: z.string().optional() }).passthrough())
    .optional(),
});

// undici reports connect/header timeouts as `fetch failed` with one of these codes
const TIMEOUT_CAUSE_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "ETIMEDOUT",
]);

function causeCode(error: unknown): string | undefined {
  if (error instanceof Error && typeof error.cause === "object" && error.cause !== null && "code" in error.cause) {
    const code = error.cause.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Map a thrown fetch error onto the transport taxonomy.
 * Already-classified errors pass through untouched.
 */
export function classifyTransportError(error: unknown, what: string): ResumeError {
  if (error instanceof ResumeError) return error;

  const message = error instanceof Error ? error.message : String(error);
  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  const name = typeof error === "object" && error !== null && "name" in error ? error.name : undefined;
  if (name === "TimeoutError" || name === "AbortError") {
    return new TransportTimeout(`${what} timed out. Please try again.`, error);
  }
  const code = causeCode(error);
  if (code && TIMEOUT_CAUSE_CODES.has(code)) {
    return new TransportTimeout(`${what} timed out. Please try again.`, error);
  }
  if (error instanceof TypeError) {
    return new TransportUnreachable(`Connection error during ${what.toLowerCase()}${code ? ` (${code})` : ""}.`, error);
  }
  return new UnexpectedServerError(`Unexpected error: ${message}`, error);
}

// The request timeout keeps running while the body streams in
async function readText(response: Response, what: string): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw classifyTransportError(error, what);
  }
}

async function readJson(response: Response, what: string): Promise<unknown> {
  const body = await readText(response, what);
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new UnexpectedServerError(`${what} returned a body that is not JSON`, error);
  }
}

// ============================================================================
// Client
// ============================================================================

export class WatsonxClient implements GenerationClient {
  constructor(
    private readonly credentials: Credentials,
    private readonly config: Pick<AppConfig, "watsonxUrl" | "iamUrl" | "apiVersion" | "parameters" | "timeouts">,
  ) {}

  async generate(prompt: string, modelId: string): Promise<string> {
    const token = await this.fetchToken();
    return this.requestGeneration(token, prompt, modelId);
  }

  /** Exchange the long-lived API key for a short-lived bearer token */
  private async fetchToken(): Promise<string> {
    log.debug("IAM token request", { url: this.config.iamUrl });
    const start = performance.now();

    let response: Response;
    try {
      response = await fetch(this.config.iamUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({
          apikey: this.credentials.apiKey,
          grant_type: "urn:ibm:params:oauth:grant-type:apikey",
        }),
        signal: AbortSignal.timeout(this.config.timeouts.tokenMs),
      });
    } catch (error) {
      throw classifyTransportError(error, "Token request");
    }

    log.debug("IAM token response", {
      status: response.status,
      durationMs: Math.round(performance.now() - start),
    });

    if (response.status !== 200) {
      const body = await readText(response, "Token request");
      log.error("IAM token request failed", { status: response.status });
      switch (response.status) {
        case 400:
          throw new AuthenticationFailure("Invalid API key format");
        case 401:
          throw new AuthenticationFailure("API key authentication failed");
        case 403:
          throw new AuthorizationFailure("API key access denied");
        default:
          throw new UnexpectedServerError(`IAM token error [${response.status}]: ${body}`);
      }
    }

    const parsed = TokenResponseSchema.safeParse(await readJson(response, "Token request"));
    if (!parsed.success) {
      throw new UnexpectedServerError("IAM token response did not include an access token");
    }
    return parsed.data.access_token;
  }

  private async requestGeneration(token: string, prompt: string, modelId: string): Promise<string> {
    const url = `${this.config.watsonxUrl}/ml/v1/text/generation?version=${this.config.apiVersion}`;
    log.info("Generation request", { modelId, promptChars: prompt.length });
    const start = performance.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model_id: modelId,
          input: prompt,
          parameters: this.config.parameters,
          project_id: this.credentials.projectId,
        }),
        signal: AbortSignal.timeout(this.config.timeouts.generationMs),
      });
    } catch (error) {
      throw classifyTransportError(error, "Generation request");
    }

    const duration = Math.round(performance.now() - start);
    log.debug("Generation response", { status: response.status, durationMs: duration });

    if (response.status !== 200) {
      const body = await readText(response, "Generation request");
      log.error("Generation request failed", { status: response.status, modelId });
      switch (response.status) {
        case 404:
          throw new ModelUnavailable(modelId);
        case 403:
          throw new AuthorizationFailure("Access denied. Check your project setup.");
        case 429:
          throw new RateLimited("Rate limit exceeded. Please wait a moment and try again.");
        default:
          throw new UnexpectedServerError(`API error [${response.status}]: ${body}`);
      }
    }

    const parsed = GenerationResponseSchema.safeParse(await readJson(response, "Generation request"));
    if (!parsed.success) {
      throw new UnexpectedServerError("Generation response has an unexpected shape");
    }

    const first = parsed.data.results?.[0];
    if (!first) {
      throw new EmptyResponse("No response from model");
    }
    const text = (first.generated_text ?? "").trim();
    if (!text) {
      throw new EmptyResponse("Empty response. Try again.");
    }

    log.info("Generation completed", { modelId, chars: text.length, durationMs: duration });
    return text;
  }
}
