/**
 * Directory scanner for font files.
 * Recursively collects font file paths under a set of directories.
 */

import { type Dirent, readdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { catalogLogger } from "../engine/logger";
import { hasFontExtension } from "../utils/fontUtils";

function scan(directory: string, found: Set<string>): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(directory, { withFileTypes: true });
  } catch (err) {
    catalogLogger.warn("DirectoryScanner", "skip directory", {
      directory,
      error: err instanceof Error ? err.message : String(err),
    });
    return;
  }

  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      scan(path, found);
    } else if (entry.isFile() && hasFontExtension(entry.name)) {
      found.add(path);
    }
  }
}

/**
 * Collect every font file (.ttf .otf .ttc .otc .woff .woff2) below the given directories.
 * Missing or unreadable directories are logged and skipped.
 * Returns absolute paths, de-duplicated and sorted.
 */
export function collectFontFiles(directories: readonly string[]): string[] {
  const found = new Set<string>();
  for (const directory of directories) {
    scan(resolve(directory), found);
  }
  return [...found].sort();
}
