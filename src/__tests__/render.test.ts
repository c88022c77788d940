import { describe, it, expect, vi, beforeEach } from "vitest";
import type { UserProfile } from "@/core/types";

// jsPDF is replaced by a recorder; the tests assert on what was drawn.
const pdf = vi.hoisted(() => ({
  texts: [] as string[],
  fonts: [] as string[],
  pages: 1,
  rules: 0,
}));

vi.mock("jspdf", () => ({
  jsPDF: vi.fn(function JsPDFCtor() {
    return {
      setFont: (family: string) => {
        pdf.fonts.push(family);
      },
      setFontSize: () => undefined,
      setLineWidth: () => undefined,
      text: (text: string) => {
        pdf.texts.push(text);
      },
      line: () => {
        pdf.rules += 1;
      },
      addPage: () => {
        pdf.pages += 1;
      },
      splitTextToSize: (text: string) => [text],
      getNumberOfPages: () => pdf.pages,
      output: () => new TextEncoder().encode("%PDF-1.3\n").buffer,
    };
  }),
}));

import { buildPageHeader, formatFooterDate, renderDocument } from "@/services/render";

const jane: UserProfile = {
  name: "Jane Doe",
  role: "Engineer",
  phone: "555-0100",
  email: "jane@ex.com",
};

const options = {
  font: "helvetica" as const,
  fontSize: 11,
  generatedAt: new Date(2026, 9, 19, 9, 30),
};

beforeEach(() => {
  pdf.texts.length = 0;
  pdf.fonts.length = 0;
  pdf.pages = 1;
  pdf.rules = 0;
});

describe("buildPageHeader", () => {
  it("prints the name in capitals and joins the contact details", () => {
    expect(buildPageHeader({ ...jane, location: "Austin, TX" }).map((line) => line.text)).toEqual([
      "JANE DOE",
      "555-0100 | jane@ex.com | Austin, TX",
    ]);
  });

  it("adds a social line when profiles are given", () => {
    const header = buildPageHeader({ ...jane, linkedin: "linkedin.com/in/jdoe", github: "github.com/jdoe" });
    expect(header.map((line) => line.text)).toEqual([
      "JANE DOE",
      "555-0100 | jane@ex.com",
      "LinkedIn: linkedin.com/in/jdoe | GitHub: github.com/jdoe",
    ]);
  });

  it("sanitizes header text", () => {
    expect(buildPageHeader({ ...jane, name: "Zo\u00eb \u0141ukasz" })[0].text).toBe("ZO\u00cb ?UKASZ");
  });
});

describe("formatFooterDate", () => {
  it("writes the month out in full", () => {
    expect(formatFooterDate(new Date(2026, 9, 19))).toBe("October 19, 2026");
  });
});

describe("renderDocument", () => {
  it("draws header, footer and body", () => {
    const rendered = renderDocument("EXPERIENCE\n- Did X", jane, options);

    expect(rendered.pageCount).toBe(1);
    expect(rendered.blocks).toEqual([
      { kind: "heading", text: "EXPERIENCE" },
      { kind: "bullet", text: "Did X" },
    ]);
    expect(pdf.texts).toEqual([
      "JANE DOE",
      "555-0100 | jane@ex.com",
      "Generated on October 19, 2026",
      "EXPERIENCE",
      "*",
      "Did X",
    ]);
  });

  it("underlines every heading", () => {
    renderDocument("EXPERIENCE\n- Did X\n\nEDUCATION\n- BSc", jane, options);
    expect(pdf.rules).toBe(2);
  });

  it("repeats header and footer on every page", () => {
    const body = Array.from({ length: 120 }, (_, i) => `Line ${i + 1}`).join("\n");
    const rendered = renderDocument(`EXPERIENCE\n${body}`, jane, options);

    expect(rendered.pageCount).toBeGreaterThan(1);
    expect(pdf.texts.filter((t) => t === "JANE DOE")).toHaveLength(rendered.pageCount);
    expect(pdf.texts.filter((t) => t === "Generated on October 19, 2026")).toHaveLength(rendered.pageCount);
    expect(pdf.texts).toContain("Line 120");
  });

  it("uses the chosen font family throughout", () => {
    renderDocument("EXPERIENCE\n- Did X", jane, { ...options, font: "times" });
    expect(new Set(pdf.fonts)).toEqual(new Set(["times"]));
  });

  it("returns the PDF bytes", () => {
    const { bytes } = renderDocument("EXPERIENCE", jane, options);
    expect(new TextDecoder().decode(bytes.slice(0, 4))).toBe("%PDF");
  });
});
