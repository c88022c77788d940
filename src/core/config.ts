/**
 * Immutable application configuration.
 *
 * Catalogs map the labels shown to the user onto the identifiers the
 * generation API and the PDF renderer understand. The whole value is frozen
 * and handed to the pipeline at construction time.
 */

import { CredentialsSchema, formatIssues } from "./schemas";
import { ConfigError } from "./errors";
import type { PdfFontFamily, ResumeStyle } from "./types";

export interface GenerationParameters {
  decoding_method: "greedy" | "sample";
  max_new_tokens: number;
  temperature: number;
  top_p: number;
  repetition_penalty: number;
}

export interface AppConfig {
  models: Readonly<Record<string, string>>;
  fonts: Readonly<Record<string, PdfFontFamily>>;
  templates: Readonly<Record<string, ResumeStyle>>;
  watsonxUrl: string;
  iamUrl: string;
  apiVersion: string;
  parameters: Readonly<GenerationParameters>;
  timeouts: Readonly<{ tokenMs: number; generationMs: number }>;
}

export interface Credentials {
  apiKey: string;
  projectId: string;
}

export const DEFAULT_WATSONX_URL = "https://us-south.ml.cloud.ibm.com";
export const DEFAULT_FONT_SIZE = 11;

export function createConfig(overrides: Partial<AppConfig> = {}): Readonly<AppConfig> {
  return Object.freeze({
    models: Object.freeze({
      "Mistral Large": "mistralai/mistral-large",
      "Meta Llama 3 405B Instruct": "meta-llama/llama-3-405b-instruct",
      "IBM Granite 13B Instruct": "ibm/granite-13b-instruct-v2",
      "IBM Granite 20B Instruct": "ibm/granite-20b-instruct-v1",
    }),
    fonts: Object.freeze({
      Arial: "helvetica",
      "Times New Roman": "times",
      Helvetica: "helvetica",
      Calibri: "helvetica", // no Calibri among the standard PDF fonts
    } satisfies Record<string, PdfFontFamily>),
    templates: Object.freeze({
      Professional: "professional",
      Technical: "technical",
      Creative: "creative",
      Academic: "academic",
    } satisfies Record<string, ResumeStyle>),
    watsonxUrl: DEFAULT_WATSONX_URL,
    iamUrl: "https://iam.cloud.ibm.com/identity/token",
    apiVersion: "2023-05-29",
    parameters: Object.freeze({
      decoding_method: "greedy",
      max_new_tokens: 1200,
      temperature: 0.3,
      top_p: 0.9,
      repetition_penalty: 1.1,
    } satisfies GenerationParameters),
    timeouts: Object.freeze({ tokenMs: 30_000, generationMs: 60_000 }),
    ...overrides,
  });
}

/** First label of a catalog, used as the default selection */
export function firstLabel(catalog: Readonly<Record<string, string>>): string {
  const [label] = Object.keys(catalog);
  if (label === undefined) {
    throw new ConfigError("Catalog is empty");
  }
  return label;
}

/** Label for a style value, e.g. "technical" -> "Technical" */
export function templateLabelFor(config: AppConfig, style: ResumeStyle): string {
  const entry = Object.entries(config.templates).find(([, value]) => value === style);
  return entry ? entry[0] : style;
}

export function resolveCatalogValue<T extends string>(
  catalog: Readonly<Record<string, T>>,
  label: string,
  kind: string,
): T {
  const value = catalog[label];
  if (value === undefined) {
    throw new ConfigError(
      `Unknown ${kind} "${label}". Choose one of: ${Object.keys(catalog).join(", ")}`,
    );
  }
  return value;
}

/**
 * Read credentials (and an optional endpoint override) from the environment.
 * Missing values are a startup error, reported before anything is prompted.
 */
export function loadCredentials(
  env: NodeJS.ProcessEnv = process.env,
): { credentials: Credentials; watsonxUrl?: string } {
  const result = CredentialsSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Missing secret configuration:\n${formatIssues(result.error).join("\n")}`);
  }
  return {
    credentials: {
      apiKey: result.data.WATSONX_API_KEY,
      projectId: result.data.WATSONX_PROJECT_ID,
    },
    watsonxUrl: result.data.WATSONX_URL,
  };
}
