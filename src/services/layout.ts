/**
 * Line-level structure of generated resume text.
 *
 * The model's output has no schema. Lines are classified as headings
 * (short, all caps), bullets ("- ", "* ", "+ ") or body text, after a
 * heuristic pass that drops the contact details the model tends to repeat
 * at the top (they are already printed in the page header).
 */

import type { LayoutBlock, UserProfile } from "@/core/types";
import { sanitize } from "./sanitize";

export const MAX_HEADING_LENGTH = 50;
const BULLET_MARKERS = ["- ", "* ", "+ "] as const;

/** At least one cased character and no lower-case ones */
export function isUpperCase(line: string): boolean {
  return line === line.toUpperCase() && line !== line.toLowerCase();
}

export function isSectionHeading(line: string): boolean {
  return (
    isUpperCase(line) &&
    line.length < MAX_HEADING_LENGTH &&
    !line.startsWith("-") &&
    !line.startsWith("*")
  );
}

export function isBullet(line: string): boolean {
  return BULLET_MARKERS.some((marker) => line.startsWith(marker));
}

// ============================================================================
// Body-start detection
// ============================================================================

export interface BodyStartDetector {
  /** true while lines are still being skipped */
  readonly skipping: boolean;
  /** Returns true when the line belongs to the body and should be rendered */
  accept(line: string): boolean;
}

/**
 * Heuristic: skip everything until the first short all-caps line.
 *
 * Lines repeating the name, phone or email are always dropped while
 * skipping. Text that precedes the first heading is lost, and if no line
 * ever qualifies the whole body is dropped. Both are known limitations of
 * this heuristic and are kept as-is.
 */
export function createBodyStartDetector(profile: UserProfile): BodyStartDetector {
  const echoes = [
    sanitize(profile.name.toUpperCase()),
    sanitize(profile.phone),
    sanitize(profile.email),
  ].filter(Boolean);
  let skipping = true;

  return {
    get skipping() {
      return skipping;
    },
    accept(line: string): boolean {
      if (!skipping) return true;
      if (echoes.some((echo) => line.includes(echo))) return false;
      if (isUpperCase(line) && line.length < MAX_HEADING_LENGTH) {
        skipping = false;
        return true;
      }
      return false;
    },
  };
}

// ============================================================================
// Layout
// ============================================================================

export function classifyLine(line: string): LayoutBlock {
  if (!line) return { kind: "blank" };
  if (isSectionHeading(line)) return { kind: "heading", text: line };
  if (isBullet(line)) return { kind: "bullet", text: line.slice(2).trim() };
  return { kind: "body", text: line };
}

/**
 * Sanitize the generated text and turn it into layout blocks.
 * Blank lines keep their spacing even while the header is being skipped.
 */
export function layoutDocument(generatedText: string, profile: UserProfile): LayoutBlock[] {
  const detector = createBodyStartDetector(profile);
  const blocks: LayoutBlock[] = [];

  for (const raw of sanitize(generatedText).split("\n")) {
    const line = raw.trim();
    if (!line) {
      blocks.push({ kind: "blank" });
      continue;
    }
    if (!detector.accept(line)) continue;
    blocks.push(classifyLine(line));
  }

  return blocks;
}
