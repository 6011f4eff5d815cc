/**
 * OS/2 and name-table readers shared by the fontkit and opentype.js parsers
 */

import type { ParsedFace } from "../../types/catalog.types";
import {
  MAX_WEIGHT,
  MAX_WIDTH,
  MIN_WEIGHT,
  MIN_WIDTH,
  type PropertyTable,
  Style,
  Weight,
  Width,
} from "../../types/font.types";
import { clamp, isRecord, readNumber } from "../../utils/fontUtils";
import { resolveLocalizedString } from "../resolvers/NameResolver";

// fsSelection bits
const FS_ITALIC = 0x0001;
const FS_OBLIQUE = 0x0200;

/**
 * usWeightClass, clamped; regular when the table is missing
 */
export function readWeightClass(os2: unknown): number {
  const value = readNumber(os2, "usWeightClass");
  return value === null || value === 0 ? Weight.REGULAR : clamp(value, MIN_WEIGHT, MAX_WEIGHT);
}

export function readWidthClass(os2: unknown): number {
  const value = readNumber(os2, "usWidthClass");
  return value === null || value === 0 ? Width.NORMAL : clamp(value, MIN_WIDTH, MAX_WIDTH);
}

/**
 * fsSelection comes as a flag object from fontkit and as a raw number from opentype.js
 */
export function readStyle(os2: unknown): Style {
  if (!isRecord(os2)) return Style.NORMAL;
  const selection = os2.fsSelection;

  if (typeof selection === "number") {
    if (selection & FS_OBLIQUE) return Style.OBLIQUE;
    if (selection & FS_ITALIC) return Style.ITALIC;
    return Style.NORMAL;
  }
  if (isRecord(selection)) {
    if (selection.oblique === true) return Style.OBLIQUE;
    if (selection.italic === true) return Style.ITALIC;
  }
  return Style.NORMAL;
}

function nameOf(properties: PropertyTable, keys: string[], locale: string): string | null {
  for (const key of keys) {
    const raw = properties[key];
    const value = raw === undefined ? null : resolveLocalizedString(raw, locale);
    if (value !== null) return value;
  }
  return null;
}

/**
 * Build a face from its collected name records and OS/2 table.
 * Family: typographic family, else the legacy family. Face: typographic subfamily,
 * else the legacy subfamily, else "Regular".
 * Returns null when the font carries no family name at all.
 */
export function buildParsedFace(
  properties: PropertyTable,
  os2: unknown,
  locale: string
): ParsedFace | null {
  const familyName = nameOf(properties, ["typographicFamilyNames", "win32FamilyNames"], locale);
  if (familyName === null) return null;

  return {
    familyName,
    faceName:
      nameOf(properties, ["typographicSubfamilyNames", "win32SubfamilyNames"], locale) ??
      "Regular",
    weight: readWeightClass(os2),
    style: readStyle(os2),
    width: readWidthClass(os2),
    properties,
  };
}
