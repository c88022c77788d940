/**
 * resumecraft init -- interactive credential setup
 *
 * Writes the watsonx.ai API key and project id to `.env` in the root
 * directory, where `generate` picks them up.
 */

import * as clack from "@clack/prompts";
import { existsSync } from "fs";
import { writeFile } from "fs/promises";
import { DEFAULT_WATSONX_URL } from "@/core/config";
import { displayPath, envFilePath, resolveRoot } from "./workspace";

// ============================================================================
// Init Command
// ============================================================================

export async function runInit(opts: { dir?: string } = {}) {
  const root = resolveRoot(opts.dir);
  const envPath = envFilePath(root);

  clack.intro("resumecraft setup");

  if (existsSync(envPath)) {
    const overwrite = await clack.confirm({
      message: `${displayPath(root, envPath)} already exists. Overwrite?`,
    });
    if (clack.isCancel(overwrite) || !overwrite) {
      clack.outro("Setup cancelled.");
      return;
    }
  }

  clack.note(
    [
      "You'll need an IBM Cloud API key and a watsonx.ai project:",
      "",
      "  API key     ->  https://cloud.ibm.com/iam/apikeys",
      "  Project id  ->  watsonx.ai project > Manage > General",
    ].join("\n"),
    "Credentials"
  );

  const apiKey = await clack.password({
    message: "WATSONX_API_KEY",
    validate: (v) => (!v ? "API key is required" : undefined),
  });
  if (clack.isCancel(apiKey)) return cancel();

  const projectId = await clack.text({
    message: "WATSONX_PROJECT_ID",
    placeholder: "00000000-0000-0000-0000-000000000000",
    validate: (v) => (!v ? "Project id is required" : undefined),
  });
  if (clack.isCancel(projectId)) return cancel();

  const url = await clack.text({
    message: "WATSONX_URL (optional)",
    placeholder: DEFAULT_WATSONX_URL,
  });
  if (clack.isCancel(url)) return cancel();

  const envLines = [
    `WATSONX_API_KEY=${apiKey}`,
    `WATSONX_PROJECT_ID=${projectId}`,
  ];
  if (url) envLines.push(`WATSONX_URL=${url}`);
  envLines.push(""); // trailing newline

  await writeFile(envPath, envLines.join("\n"));

  clack.outro("Generate your first resume:  npx resumecraft generate");
}

// ============================================================================
// Helpers
// ============================================================================

function cancel() {
  clack.outro("Setup cancelled.");
}
