/**
 * Opentype.js parser wrapper
 * Fallback for files fontkit rejects. Single fonts only (no collections, no WOFF2).
 */

import opentype from "opentype.js";
import type { ParsedFace } from "../../types/catalog.types";
import { isRecord } from "../../utils/fontUtils";
import { collectNameRecords } from "../resolvers/NameResolver";
import { buildParsedFace } from "./faceTables";

/**
 * opentype.js `names` keys -> information property names
 */
export const OPENTYPE_NAME_KEYS: Readonly<Record<string, string>> = {
  copyright: "copyright",
  version: "versions",
  trademark: "trademark",
  manufacturer: "manufacturer",
  designer: "designer",
  designerURL: "designerUrl",
  description: "description",
  manufacturerURL: "vendorUrl",
  license: "licenseDescription",
  licenseURL: "licenseInfoUrl",
  fontFamily: "win32FamilyNames",
  fontSubfamily: "win32SubfamilyNames",
  preferredFamily: "typographicFamilyNames",
  preferredSubfamily: "typographicSubfamilyNames",
  sampleText: "sampleText",
  fullName: "fullName",
  postScriptName: "postscriptName",
  postScriptFindFontName: "postscriptCidName",
  wwsFamily: "weightStretchStyleFamilyName",
};

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return copy;
}

/**
 * Newer opentype.js releases nest names per platform; prefer the Windows records
 */
function nameRecordsOf(names: unknown): unknown {
  if (isRecord(names) && isRecord(names.windows)) return names.windows;
  return names;
}

/**
 * Parse a single-font buffer. Throws whatever opentype.js throws.
 */
export function parseWithOpentype(buffer: Buffer, locale: string): ParsedFace[] {
  const font: unknown = opentype.parse(toArrayBuffer(buffer));
  if (!isRecord(font)) return [];

  const properties = collectNameRecords(nameRecordsOf(font.names), OPENTYPE_NAME_KEYS);
  const os2 = isRecord(font.tables) ? font.tables.os2 : undefined;
  const face = buildParsedFace(properties, os2, locale);
  return face ? [face] : [];
}
