import type { ResumeStyle, UserProfile } from "@/core/types";

// ============================================================================
// Style policies
// ============================================================================

interface StylePolicy {
  opening: string;
  sections: readonly string[];
  /** Directives listed before the section list */
  lead: readonly string[];
  /** Directives listed after the section list */
  trail: readonly string[];
}

export const STYLE_POLICIES: Readonly<Record<ResumeStyle, StylePolicy>> = {
  professional: {
    opening: "Create a professional, ATS-friendly resume with clean formatting.",
    sections: ["CONTACT INFO", "EDUCATION", "TECHNICAL SKILLS", "EXPERIENCE", "CERTIFICATIONS"],
    lead: [
      "Use ALL CAPS for section headers",
      "Use simple dashes (-) for bullet points",
      "Keep formatting clean and scannable",
    ],
    trail: [
      "Make it concise but comprehensive",
      "Use action verbs and quantify achievements where possible",
    ],
  },
  technical: {
    opening: "Create a technical resume optimized for software engineering roles.",
    sections: ["CONTACT INFO", "TECHNICAL SKILLS", "EXPERIENCE", "EDUCATION", "CERTIFICATIONS"],
    lead: [
      "Emphasize technical skills and projects",
      "Use ALL CAPS for section headers",
    ],
    trail: [
      "Highlight programming languages, frameworks, and tools",
      "Focus on technical achievements and impact",
      "Use metrics and numbers where possible",
    ],
  },
  creative: {
    opening: "Create a creative but professional resume with engaging language.",
    sections: ["CONTACT INFO", "SUMMARY", "EXPERIENCE", "SKILLS", "EDUCATION", "CERTIFICATIONS"],
    lead: [
      "Use dynamic action words",
      "Show personality while maintaining professionalism",
      "Use ALL CAPS for section headers",
    ],
    trail: [
      "Include a brief professional summary",
      "Highlight unique achievements and value propositions",
    ],
  },
  academic: {
    opening: "Create an academic-style resume with detailed education focus.",
    sections: ["CONTACT INFO", "EDUCATION", "RESEARCH EXPERIENCE", "SKILLS", "CERTIFICATIONS"],
    lead: [
      "Emphasize education, research, and academic achievements",
      "Use ALL CAPS for section headers",
    ],
    trail: [
      "Include GPA if mentioned in education",
      "Focus on academic contributions and scholarly work",
    ],
  },
};

// ============================================================================
// Prompt
// ============================================================================

/** `Label: value` lines for every profile field */
export function formatProfileBlock(profile: UserProfile): string {
  return [
    `Name: ${profile.name}`,
    `Role: ${profile.role}`,
    `Phone: ${profile.phone}`,
    `Email: ${profile.email}`,
    `Location: ${profile.location ?? "Not specified"}`,
    `LinkedIn: ${profile.linkedin ?? "Not provided"}`,
    `GitHub: ${profile.github ?? "Not provided"}`,
    `Skills: ${profile.skills ?? "None listed"}`,
    `Experience: ${profile.experience ?? "Not specified"}`,
    `Education: ${profile.education ?? "Not specified"}`,
    `Certifications: ${profile.certifications ?? "None listed"}`,
  ].join("\n");
}

/**
 * Build the instruction sent to the generation endpoint.
 * Field values go in verbatim; nothing is escaped or truncated.
 */
export function buildPrompt(profile: UserProfile, style: ResumeStyle): string {
  const policy = STYLE_POLICIES[style];
  const directives = [
    ...policy.lead,
    `Include sections: ${policy.sections.join(", ")}`,
    ...policy.trail,
  ];

  return [
    `${policy.opening} Use the following information:`,
    "",
    formatProfileBlock(profile),
    "",
    "Format requirements:",
    ...directives.map((d) => `- ${d}`),
    "",
    `Generate a complete, ${style} resume.`,
  ].join("\n");
}
