/**
 * Paths used by the resumecraft CLI.
 *
 * Everything resolves relative to a root directory (the current working
 * directory unless --dir is given): `.env` for credentials and `resumes/`
 * for generated artifacts.
 */

import { join, relative, resolve } from "path";

export const OUTPUT_DIR_NAME = "resumes";
export const ENV_FILE_NAME = ".env";

/** Root directory, from --dir or the current working directory */
export function resolveRoot(dir?: string): string {
  return dir ? resolve(dir) : process.cwd();
}

/** Absolute path to the `.env` file */
export function envFilePath(root: string): string {
  return join(root, ENV_FILE_NAME);
}

/** Directory artifacts are written to; an explicit --out wins */
export function outputDir(root: string, out?: string): string {
  return out ? resolve(root, out) : join(root, OUTPUT_DIR_NAME);
}

/** Path shown to the user: relative when it sits under root */
export function displayPath(root: string, target: string): string {
  const rel = relative(root, target);
  return rel && !rel.startsWith("..") ? rel : target;
}
