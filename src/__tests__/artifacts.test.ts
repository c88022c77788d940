import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { GenerationSettings, UserProfile } from "@/core/types";

vi.mock("jspdf", () => ({
  jsPDF: vi.fn(function JsPDFCtor() {
    return {
      setFont: vi.fn(),
      setFontSize: vi.fn(),
      setLineWidth: vi.fn(),
      text: vi.fn(),
      line: vi.fn(),
      addPage: vi.fn(),
      splitTextToSize: vi.fn((text: string) => [text]),
      getNumberOfPages: vi.fn(() => 1),
      output: vi.fn(() => new TextEncoder().encode("%PDF-1.3\n").buffer),
    };
  }),
}));

import {
  buildFilenames,
  buildRecord,
  formatStamp,
  packageArtifacts,
  safeFileName,
  writeArtifacts,
  writeWithFallback,
} from "@/services/artifacts";
import { createConfig } from "@/core/config";
import { ConfigError } from "@/core/errors";

const jane: UserProfile = {
  name: "Jane Doe",
  role: "Engineer",
  phone: "555-0100",
  email: "jane@ex.com",
  skills: "Go",
};

const settings: GenerationSettings = {
  model: "Mistral Large",
  template: "Professional",
  font: "Arial",
  fontSize: 11,
};

const localStamp = new Date(2026, 9, 19, 8, 5, 9);

describe("filenames", () => {
  it("formats the local time as YYYYMMDD_HHMMSS", () => {
    expect(formatStamp(localStamp)).toBe("20261019_080509");
  });

  it("reduces the name to safe characters", () => {
    expect(safeFileName("Jane Doe")).toBe("Jane_Doe");
    expect(safeFileName("Jos\u00e9 O'Brien")).toBe("Jos\u00e9_OBrien");
    expect(safeFileName("../etc/passwd")).toBe("etcpasswd");
    expect(safeFileName("\u65e5\u672c")).toBe("");
  });

  it("builds the three names from one stem", () => {
    expect(buildFilenames("Jane Doe", localStamp)).toEqual({
      text: "resume_Jane_Doe_20261019_080509.txt",
      record: "resume_Jane_Doe_20261019_080509.json",
      document: "resume_Jane_Doe_20261019_080509.pdf",
      textFallback: "resume_20261019_080509.txt",
      recordFallback: "resume_20261019_080509.json",
      documentFallback: "resume_20261019_080509.pdf",
    });
  });

  it("drops the name part when nothing safe is left", () => {
    expect(buildFilenames("!!!", localStamp).text).toBe("resume_20261019_080509.txt");
  });
});

describe("buildRecord", () => {
  it("stores the profile, text and settings with an ISO timestamp", () => {
    const timestamp = new Date("2026-10-19T08:05:09.000Z");
    expect(buildRecord({ profile: jane, generatedText: "EXPERIENCE", settings, timestamp })).toEqual({
      user_data: jane,
      generated_text: "EXPERIENCE",
      settings: { model: "Mistral Large", template: "Professional", font: "Arial", font_size: 11 },
      timestamp: "2026-10-19T08:05:09.000Z",
    });
  });
});

describe("packageArtifacts", () => {
  const config = createConfig();

  it("keeps the generated text verbatim and renders the document", () => {
    const artifacts = packageArtifacts({
      profile: jane,
      generatedText: "EXPERIENCE\n- Did X \u2014 fast",
      settings,
      timestamp: localStamp,
      config,
    });

    expect(artifacts.text).toBe("EXPERIENCE\n- Did X \u2014 fast");
    expect(artifacts.record.generated_text).toBe(artifacts.text);
    expect(artifacts.document.blocks).toEqual([
      { kind: "heading", text: "EXPERIENCE" },
      { kind: "bullet", text: "Did X - fast" },
    ]);
    expect(artifacts.filenames.document).toBe("resume_Jane_Doe_20261019_080509.pdf");
  });

  it("rejects a font missing from the catalog", () => {
    expect(() =>
      packageArtifacts({
        profile: jane,
        generatedText: "EXPERIENCE",
        settings: { ...settings, font: "Comic Sans" },
        timestamp: localStamp,
        config,
      })
    ).toThrowError(ConfigError);
  });
});

describe("writing", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "resumecraft-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes text, record and document", async () => {
    const artifacts = packageArtifacts({
      profile: jane,
      generatedText: "EXPERIENCE\n- Did X",
      settings,
      timestamp: localStamp,
      config: createConfig(),
    });
    const out = join(dir, "resumes");

    const written = await writeArtifacts(out, artifacts);

    expect(written).toEqual({
      text: join(out, "resume_Jane_Doe_20261019_080509.txt"),
      record: join(out, "resume_Jane_Doe_20261019_080509.json"),
      document: join(out, "resume_Jane_Doe_20261019_080509.pdf"),
    });
    expect(await readFile(written.text, "utf8")).toBe("EXPERIENCE\n- Did X");
    expect(JSON.parse(await readFile(written.record, "utf8"))).toEqual(artifacts.record);
    expect((await readFile(written.document, "latin1")).slice(0, 4)).toBe("%PDF");
  });

  it("saves every artifact under its timestamp name when the profile name is too long for a file", async () => {
    const artifacts = packageArtifacts({
      profile: { ...jane, name: "A".repeat(300) },
      generatedText: "EXPERIENCE\n- Did X",
      settings,
      timestamp: localStamp,
      config: createConfig(),
    });

    const written = await writeArtifacts(dir, artifacts);

    expect(written).toEqual({
      text: join(dir, "resume_20261019_080509.txt"),
      record: join(dir, "resume_20261019_080509.json"),
      document: join(dir, "resume_20261019_080509.pdf"),
    });
    expect((await readdir(dir)).sort()).toEqual([
      "resume_20261019_080509.json",
      "resume_20261019_080509.pdf",
      "resume_20261019_080509.txt",
    ]);
    expect(await readFile(written.text, "utf8")).toBe("EXPERIENCE\n- Did X");
  });

  it("falls back to the second name when the first cannot be written", async () => {
    const path = await writeWithFallback(dir, join("missing", "resume.pdf"), "fallback.pdf", "data");
    expect(path).toBe(join(dir, "fallback.pdf"));
    expect(await readFile(path, "utf8")).toBe("data");
  });

  it("propagates a failure of the fallback too", async () => {
    await expect(
      writeWithFallback(dir, join("missing", "a.pdf"), join("missing", "b.pdf"), "data")
    ).rejects.toThrowError();
  });
});
