/**
 * Core TypeScript types
 */

// ============================================================================
// User Profile
// ============================================================================

/**
 * Contact and career details collected before generation.
 * Optional fields are absent (never empty strings) once validated.
 */
export interface UserProfile {
  name: string;
  role: string;
  phone: string;
  email: string;
  location?: string;
  linkedin?: string;
  github?: string;
  skills?: string;
  experience?: string;
  education?: string;
  certifications?: string;
}

// ============================================================================
// Styles and Settings
// ============================================================================

export const RESUME_STYLES = ["professional", "technical", "creative", "academic"] as const;

/** Formatting policy controlling prompt instructions and section order */
export type ResumeStyle = (typeof RESUME_STYLES)[number];

/** jsPDF standard font families */
export type PdfFontFamily = "helvetica" | "times" | "courier";

/**
 * User-selected settings, stored by catalog label so the JSON record
 * reads the way the user picked them.
 */
export interface GenerationSettings {
  model: string;
  template: string;
  font: string;
  fontSize: number;
}

// ============================================================================
// Layout
// ============================================================================

export type LayoutBlock =
  | { kind: "heading"; text: string }
  | { kind: "bullet"; text: string }
  | { kind: "body"; text: string }
  | { kind: "blank" };

export interface RenderedDocument {
  blocks: LayoutBlock[];
  pageCount: number;
  bytes: Uint8Array;
}

// ============================================================================
// Artifacts
// ============================================================================

/** Structured JSON artifact (snake_case keys are part of the file format) */
export interface ResumeRecord {
  user_data: UserProfile;
  generated_text: string;
  settings: {
    model: string;
    template: string;
    font: string;
    font_size: number;
  };
  timestamp: string;
}

/** Preferred names carry the profile name; the fallbacks only the timestamp */
export interface ArtifactFilenames {
  text: string;
  record: string;
  document: string;
  textFallback: string;
  recordFallback: string;
  documentFallback: string;
}

export interface ArtifactSet {
  text: string;
  record: ResumeRecord;
  document: RenderedDocument;
  filenames: ArtifactFilenames;
}

export interface WrittenArtifacts {
  text: string;
  record: string;
  document: string;
}
