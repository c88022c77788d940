import { z } from "zod";
import { RESUME_STYLES } from "./types";

/**
 * Zod validation schemas for the profile, settings and credentials
 */

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
export const LINKEDIN_PATTERN = /^(https?:\/\/)?(www\.)?linkedin\.com\/in\/[a-zA-Z0-9-]+\/?$/;
export const GITHUB_PATTERN = /^(https?:\/\/)?(www\.)?github\.com\/[a-zA-Z0-9-]+\/?$/;

const PHONE_CHARS = /^\+?[\d\s().-]+$/;

/** Digits, spaces and `-().` with an optional leading `+`; 7 to 15 digits */
export function isValidPhone(phone: string): boolean {
  if (!PHONE_CHARS.test(phone)) return false;
  const digits = phone.replace(/\D/g, "").length;
  return digits >= 7 && digits <= 15;
}

const requiredText = (label: string) =>
  z.string().trim().min(1, `${label} is required`);

// Blank optional fields become absent
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const optionalUrl = (pattern: RegExp, message: string) =>
  optionalText.refine((value) => value === undefined || pattern.test(value), message);

export const UserProfileSchema = z.object({
  name: requiredText("Name"),
  role: requiredText("Role"),
  phone: requiredText("Phone").refine(isValidPhone, "Invalid phone number format"),
  email: requiredText("Email").regex(EMAIL_PATTERN, "Invalid email format"),
  location: optionalText,
  linkedin: optionalUrl(LINKEDIN_PATTERN, "Invalid LinkedIn profile URL"),
  github: optionalUrl(GITHUB_PATTERN, "Invalid GitHub profile URL"),
  skills: optionalText,
  experience: optionalText,
  education: optionalText,
  certifications: optionalText,
});

export const ResumeStyleSchema = z.enum(RESUME_STYLES);

export const GenerationSettingsSchema = z.object({
  model: z.string().min(1),
  template: z.string().min(1),
  font: z.string().min(1),
  fontSize: z.number().int().min(9, "Font size must be 9-14").max(14, "Font size must be 9-14"),
});

/**
 * Credentials read from the environment (.env)
 */
export const CredentialsSchema = z.object({
  WATSONX_API_KEY: z.string().trim().min(1, "WATSONX_API_KEY is not set"),
  WATSONX_PROJECT_ID: z.string().trim().min(1, "WATSONX_PROJECT_ID is not set"),
  WATSONX_URL: z.string().trim().url("WATSONX_URL must be a URL").optional(),
});

/** One `  path: message` line per issue */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  ${path}: ${issue.message}`;
  });
}
