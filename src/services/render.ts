import { jsPDF } from "jspdf";
import type { LayoutBlock, PdfFontFamily, RenderedDocument, UserProfile } from "@/core/types";
import { logger } from "@/utils/logger";
import { layoutDocument } from "./layout";
import { sanitize } from "./sanitize";

const log = logger.render;

// A4 in points
const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const MARGIN_X = 57;
const MARGIN_TOP = 50;
const MARGIN_BOTTOM = 60;
const FOOTER_BASELINE = PAGE_HEIGHT - 30;
export const CONTENT_WIDTH = PAGE_WIDTH - MARGIN_X * 2;

const BULLET_INDENT = 16;
const BLANK_GAP = 8;
const BLOCK_GAP = 3;
const LINE_HEIGHT_RATIO = 1.45;

const NAME_SIZE = 20;
const CONTACT_SIZE = 11;
const SOCIAL_SIZE = 10;
const HEADING_SIZE = 13;
const FOOTER_SIZE = 8;

export interface RenderOptions {
  font: PdfFontFamily;
  fontSize: number;
  /** Printed in the footer of every page */
  generatedAt: Date;
}

interface HeaderLine {
  text: string;
  size: number;
  bold: boolean;
}

/** Name, contact line and (when present) social line, all sanitized */
export function buildPageHeader(profile: UserProfile): HeaderLine[] {
  const lines: HeaderLine[] = [
    { text: sanitize(profile.name.toUpperCase()), size: NAME_SIZE, bold: true },
  ];

  const contact = [profile.phone, profile.email, profile.location]
    .filter((part): part is string => Boolean(part))
    .map(sanitize);
  lines.push({ text: contact.join(" | "), size: CONTACT_SIZE, bold: false });

  const social: string[] = [];
  if (profile.linkedin) social.push(`LinkedIn: ${sanitize(profile.linkedin)}`);
  if (profile.github) social.push(`GitHub: ${sanitize(profile.github)}`);
  if (social.length > 0) {
    lines.push({ text: social.join(" | "), size: SOCIAL_SIZE, bold: false });
  }

  return lines;
}

export function formatFooterDate(date: Date): string {
  return date.toLocaleDateString("en-US", { year: "numeric", month: "long", day: "numeric" });
}

/**
 * Lay out generated text into a paginated PDF.
 *
 * Header and footer are drawn on every page; a new page starts whenever
 * the next line would cross the bottom margin.
 */
export function renderDocument(
  generatedText: string,
  profile: UserProfile,
  options: RenderOptions,
): RenderedDocument {
  const blocks = layoutDocument(generatedText, profile);
  const header = buildPageHeader(profile);
  const footer = `Generated on ${formatFooterDate(options.generatedAt)}`;
  const lineHeight = options.fontSize * LINE_HEIGHT_RATIO;

  const doc = new jsPDF({ orientation: "portrait", unit: "pt", format: "a4" });
  let y = MARGIN_TOP;

  function decoratePage() {
    y = MARGIN_TOP;
    for (const line of header) {
      doc.setFont(options.font, line.bold ? "bold" : "normal");
      doc.setFontSize(line.size);
      const rows: string[] = doc.splitTextToSize(line.text, CONTENT_WIDTH);
      for (const row of rows) {
        y += line.size * LINE_HEIGHT_RATIO;
        doc.text(row, PAGE_WIDTH / 2, y, { align: "center" });
      }
    }
    y += 20;

    doc.setFont(options.font, "italic");
    doc.setFontSize(FOOTER_SIZE);
    doc.text(footer, PAGE_WIDTH / 2, FOOTER_BASELINE, { align: "center" });
  }

  function ensureRoom(height: number) {
    if (y + height <= PAGE_HEIGHT - MARGIN_BOTTOM) return;
    doc.addPage();
    decoratePage();
  }

  function drawWrapped(text: string, indent: number, marker?: string) {
    doc.setFont(options.font, "normal");
    doc.setFontSize(options.fontSize);
    const wrapped: string[] = doc.splitTextToSize(text, CONTENT_WIDTH - indent);
    wrapped.forEach((row, i) => {
      ensureRoom(lineHeight);
      y += lineHeight;
      if (marker && i === 0) doc.text(marker, MARGIN_X, y);
      doc.text(row, MARGIN_X + indent, y);
    });
    y += BLOCK_GAP;
  }

  function drawBlock(block: LayoutBlock) {
    switch (block.kind) {
      case "blank":
        y += BLANK_GAP;
        return;
      case "heading": {
        const height = HEADING_SIZE * LINE_HEIGHT_RATIO;
        y += 6;
        ensureRoom(height + 8);
        doc.setFont(options.font, "bold");
        doc.setFontSize(HEADING_SIZE);
        y += height;
        doc.text(block.text, MARGIN_X, y);
        y += 4;
        doc.setLineWidth(0.5);
        doc.line(MARGIN_X, y, PAGE_WIDTH - MARGIN_X, y);
        y += 8;
        return;
      }
      case "bullet":
        drawWrapped(block.text, BULLET_INDENT, "*");
        return;
      case "body":
        drawWrapped(block.text, 0);
        return;
    }
  }

  decoratePage();
  let currentSection: string | undefined;
  for (const block of blocks) {
    if (block.kind === "heading") currentSection = block.text;
    drawBlock(block);
  }

  const pageCount = doc.getNumberOfPages();
  log.debug("Document rendered", {
    blocks: blocks.length,
    pageCount,
    lastSection: currentSection,
  });

  return {
    blocks,
    pageCount,
    bytes: new Uint8Array(doc.output("arraybuffer")),
  };
}
