/**
 * Example sites bundled in the examples directory: every `<name>.html` is a
 * site served at `/<name>`.
 */

import fs from "fs/promises";
import path from "path";
import { isMissingFileError } from "./errors.js";

/** Non-site files served from the examples directory, with their types */
export const STATIC_ASSETS: Readonly<Record<string, string>> = {
  "style.css": "text/css",
  "thesis.js": "text/javascript",
};

export async function listExampleSites(examplesDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(examplesDir);
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((file) => file.endsWith(".html"))
    .map((file) => path.basename(file, ".html"))
    .sort();
}

/**
 * Absolute path of a named example site, or null when there is none.
 */
export async function resolveExampleSite(
  examplesDir: string,
  name: string
): Promise<string | null> {
  const sites = await listExampleSites(examplesDir);
  return sites.includes(name) ? path.join(examplesDir, `${name}.html`) : null;
}

export function staticAssetType(name: string): string | null {
  return Object.prototype.hasOwnProperty.call(STATIC_ASSETS, name)
    ? STATIC_ASSETS[name]
    : null;
}
