/**
 * Provider that scans font directories and reads each file with fontkit,
 * falling back to opentype.js for files fontkit rejects.
 */

import { readFileSync } from "node:fs";
import { collectFontFiles } from "../../lib/directoryScanner";
import type { ParsedFace } from "../../types/catalog.types";
import type {
  FontEnumerationProvider,
  FontFamilyRecord,
  FontVariantRecord,
} from "../../types/font.types";
import { getFontFormat } from "../../utils/fontUtils";
import { catalogLogger } from "../logger";
import { parseWithFontkit } from "../parsers/FontkitParser";
import { parseWithOpentype } from "../parsers/OpentypeParser";
import { sortFamilies } from "../utils/FaceSorter";

export interface DirectoryProviderOptions {
  /** Locale used to pick family and face names out of localized name records */
  locale?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FontkitDirectoryProvider implements FontEnumerationProvider {
  private readonly locale: string;

  constructor(
    private readonly directories: readonly string[],
    options: DirectoryProviderOptions = {}
  ) {
    this.locale = options.locale ?? "en-US";
  }

  /**
   * Parse one file: fontkit first, opentype.js for single fonts fontkit cannot read.
   * Returns an empty list for files neither parser understands.
   */
  private parseFile(path: string): ParsedFace[] {
    let buffer: Buffer;
    try {
      buffer = readFileSync(path);
    } catch (err) {
      catalogLogger.warn("FontkitDirectoryProvider", "skip unreadable file", {
        path,
        error: errorMessage(err),
      });
      return [];
    }

    try {
      return parseWithFontkit(buffer, this.locale);
    } catch (fontkitError) {
      const format = getFontFormat(path);
      if (format === "ttf" || format === "otf" || format === "woff") {
        try {
          return parseWithOpentype(buffer, this.locale);
        } catch (opentypeError) {
          catalogLogger.warn("FontkitDirectoryProvider", "skip unparseable file", {
            path,
            error: errorMessage(opentypeError),
          });
          return [];
        }
      }
      catalogLogger.warn("FontkitDirectoryProvider", "skip unparseable file", {
        path,
        error: errorMessage(fontkitError),
      });
      return [];
    }
  }

  enumerate(): FontFamilyRecord[] {
    const startTime = Date.now();
    const files = collectFontFiles(this.directories);
    const families = new Map<string, FontVariantRecord[]>();

    for (const path of files) {
      const faces = this.parseFile(path);
      if (faces.length === 0) {
        catalogLogger.debug("FontkitDirectoryProvider", "no faces", { path });
      }

      for (const face of faces) {
        const variants = families.get(face.familyName) ?? [];
        variants.push({
          name: face.faceName,
          weight: face.weight,
          style: face.style,
          width: face.width,
          filename: path,
          properties: face.properties,
        });
        families.set(face.familyName, variants);
      }
    }

    const records = sortFamilies(
      [...families].map(([name, variants]) => ({ name, variants }))
    );
    catalogLogger.timed("info", "FontkitDirectoryProvider", "enumerate", startTime, {
      directories: this.directories.length,
      files: files.length,
      families: records.length,
    });
    return records;
  }
}
