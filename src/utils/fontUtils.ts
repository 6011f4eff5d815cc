/**
 * Font utility functions
 */

import { homedir } from "node:os";
import { delimiter, join } from "node:path";
import { IndexOutOfRangeError } from "../engine/errors";

export type FontFormat = "ttf" | "otf" | "ttc" | "otc" | "woff" | "woff2";

const FONT_EXTENSIONS: Record<string, FontFormat> = {
  ".ttf": "ttf",
  ".otf": "otf",
  ".ttc": "ttc",
  ".otc": "otc",
  ".woff": "woff",
  ".woff2": "woff2",
};

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.toLowerCase().slice(dot);
}

export function hasFontExtension(fileName: string): boolean {
  return extensionOf(fileName) in FONT_EXTENSIONS;
}

/**
 * Get font format from file extension, null for non-font files
 */
export function getFontFormat(fileName: string): FontFormat | null {
  return FONT_EXTENSIONS[extensionOf(fileName)] ?? null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a finite number property off an untyped parser table
 */
export function readNumber(table: unknown, key: string): number | null {
  if (!isRecord(table)) return null;
  const value = table[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Normalize a possibly negative index against a length.
 * Negative indexes count from the end.
 */
export function resolveIndex(index: number, length: number, label: string): number {
  const resolved = index < 0 ? index + length : index;
  if (!Number.isInteger(index) || resolved < 0 || resolved >= length) {
    throw new IndexOutOfRangeError(`${label} index ${index} out of range`);
  }
  return resolved;
}

/**
 * Platform font directories, followed by any listed in FONT_CATALOG_DIRS
 */
export function getSystemFontDirectories(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const home = homedir();
  let directories: string[];

  switch (platform) {
    case "win32": {
      const windir = env.WINDIR ?? env.SystemRoot ?? "C:\\Windows";
      directories = [join(windir, "Fonts")];
      if (env.LOCALAPPDATA) {
        directories.push(join(env.LOCALAPPDATA, "Microsoft", "Windows", "Fonts"));
      }
      break;
    }
    case "darwin":
      directories = ["/System/Library/Fonts", "/Library/Fonts", join(home, "Library", "Fonts")];
      break;
    default:
      directories = [
        "/usr/share/fonts",
        "/usr/local/share/fonts",
        join(home, ".local", "share", "fonts"),
        join(home, ".fonts"),
      ];
  }

  const extra = (env.FONT_CATALOG_DIRS ?? "")
    .split(delimiter)
    .map((dir) => dir.trim())
    .filter((dir) => dir.length > 0);

  return [...directories, ...extra];
}
