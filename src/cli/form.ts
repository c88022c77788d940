/**
 * Interactive profile and settings form
 *
 * Each field is checked with the same zod rules the pipeline applies, so a
 * submitted form is already valid.
 */

import * as clack from "@clack/prompts";
import { UserProfileSchema } from "@/core/schemas";
import { DEFAULT_FONT_SIZE, firstLabel, type AppConfig } from "@/core/config";
import type { GenerationSettings } from "@/core/types";

type ProfileField = keyof typeof UserProfileSchema.shape;

interface FieldPrompt {
  key: ProfileField;
  message: string;
  placeholder: string;
  /** Accepts `\n` as a line break */
  multiline?: boolean;
}

const FIELDS: FieldPrompt[] = [
  { key: "name", message: "Full name", placeholder: "Jane Doe" },
  { key: "role", message: "Target role", placeholder: "Software Engineer" },
  { key: "phone", message: "Phone number", placeholder: "+1 (555) 123-4567" },
  { key: "email", message: "Email address", placeholder: "jane@example.com" },
  { key: "location", message: "Location (optional)", placeholder: "City, State" },
  { key: "linkedin", message: "LinkedIn (optional)", placeholder: "linkedin.com/in/janedoe" },
  { key: "github", message: "GitHub (optional)", placeholder: "github.com/janedoe" },
  { key: "skills", message: "Technical skills (optional)", placeholder: "TypeScript, Node.js, PostgreSQL, Docker" },
  {
    key: "experience",
    message: "Work experience (optional, \\n for new lines)",
    placeholder: "Developer at ABC Corp (2020-2023)\\n- Built the billing service",
    multiline: true,
  },
  {
    key: "education",
    message: "Education (optional, \\n for new lines)",
    placeholder: "BSc Computer Science, University of Technology, 2020",
    multiline: true,
  },
  {
    key: "certifications",
    message: "Certifications (optional, \\n for new lines)",
    placeholder: "AWS Certified Developer",
    multiline: true,
  },
];

function validateField(key: ProfileField) {
  return (value: string | undefined): string | undefined => {
    const result = UserProfileSchema.shape[key].safeParse(value ?? "");
    return result.success ? undefined : result.error.issues[0]?.message;
  };
}

/**
 * Ask for every profile field. Returns null when the user cancels.
 */
export async function collectProfile(): Promise<Record<string, string> | null> {
  const data: Record<string, string> = {};

  for (const field of FIELDS) {
    const answer = await clack.text({
      message: field.message,
      placeholder: field.placeholder,
      validate: validateField(field.key),
    });
    if (clack.isCancel(answer)) return null;

    const value = answer ?? "";
    data[field.key] = field.multiline ? value.replace(/\\n/g, "\n") : value;
  }

  return data;
}

export interface SettingsFlags {
  model?: string;
  template?: string;
  font?: string;
  fontSize?: number;
  /** Take defaults instead of prompting */
  yes: boolean;
}

async function pick(
  message: string,
  catalog: Readonly<Record<string, string>>,
  given: string | undefined,
  yes: boolean,
): Promise<string | null> {
  if (given) return given;
  if (yes) return firstLabel(catalog);

  const choice = await clack.select({
    message,
    options: Object.entries(catalog).map(([label, value]) => ({ value: label, label, hint: value })),
  });
  return clack.isCancel(choice) ? null : choice;
}

/**
 * Resolve generation settings from flags, prompting for whatever is missing.
 * Returns null when the user cancels.
 */
export async function chooseSettings(
  config: Pick<AppConfig, "models" | "templates" | "fonts">,
  flags: SettingsFlags,
): Promise<GenerationSettings | null> {
  const model = await pick("AI model", config.models, flags.model, flags.yes);
  if (model === null) return null;

  const template = await pick("Template style", config.templates, flags.template, flags.yes);
  if (template === null) return null;

  const font = await pick("PDF font", config.fonts, flags.font, flags.yes);
  if (font === null) return null;

  let fontSize = flags.fontSize;
  if (fontSize === undefined && !flags.yes) {
    const answer = await clack.text({
      message: "Font size (9-14)",
      placeholder: String(DEFAULT_FONT_SIZE),
      initialValue: String(DEFAULT_FONT_SIZE),
      validate: (v) => {
        const n = Number(v);
        if (!Number.isInteger(n) || n < 9 || n > 14) return "Enter a whole number from 9 to 14";
        return undefined;
      },
    });
    if (clack.isCancel(answer)) return null;
    fontSize = Number(answer);
  }

  return { model, template, font, fontSize: fontSize ?? DEFAULT_FONT_SIZE };
}
